import { describe, it, expect, vi, afterEach } from 'vitest';
import { matchLogPath, parseMatchLogs, recentMatchesBefore } from '../data/scrapers/fbref.js';
import { formatDate } from '../data/observations.js';

afterEach(() => {
  vi.restoreAllMocks();
});

function logRow(cells: Record<string, string>): string {
  const tds = Object.entries(cells)
    .map(([stat, text]) => `<td data-stat="${stat}">${text}</td>`)
    .join('');
  return `<tr>${tds}</tr>`;
}

const html = `
<html><body>
<table id="matchlogs_for">
  <thead><tr><th data-stat="date">Date</th></tr></thead>
  <tbody>
    ${logRow({
      date: '2024-02-24', comp: 'Premier League', opponent: 'Town', goals_for: '2', goals_against: '1',
      shots: '14', shots_on_target: '6', average_shot_distance: '16.8', shots_free_kicks: '1',
      pens_made: '1', pens_att: '1',
    })}
    <tr class="thead"><th data-stat="date">Date</th></tr>
    ${logRow({
      date: '2024-03-02', comp: 'FA Cup', opponent: 'City', goals_for: '0', goals_against: '0',
      shots: '9', shots_on_target: '', average_shot_distance: '', shots_free_kicks: '0',
      pens_made: '0', pens_att: '0',
    })}
    ${logRow({
      date: '2024-03-30', comp: 'Premier League', opponent: 'Athletic', goals_for: '', goals_against: '',
    })}
  </tbody>
</table>
</body></html>`;

describe('parseMatchLogs', () => {
  const scrapeDate = new Date('2024-03-11T12:00:00Z');

  it('reads completed matches and skips header rows and fixtures', () => {
    const records = parseMatchLogs(html, 'Rovers', scrapeDate);

    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      matchId: '20240224_Rovers_Town',
      date: new Date('2024-02-24T00:00:00Z'),
      team: 'Rovers',
      opponent: 'Town',
      gf: 2,
      ga: 1,
      sh: 14,
      sot: 6,
      dist: 16.8,
      fk: 1,
      pk: 1,
      pkatt: 1,
      leagueId: 'premier_league',
      leagueName: 'Premier League',
      scrapeDate,
    });
  });

  it('leaves empty stat cells undefined', () => {
    const [, cup] = parseMatchLogs(html, 'Rovers', scrapeDate);

    expect(formatDate(cup.date)).toBe('2024-03-02');
    expect(cup.leagueId).toBe('fa_cup');
    expect(cup.sh).toBe(9);
    expect(cup.sot).toBeUndefined();
    expect(cup.dist).toBeUndefined();
  });

  it('returns nothing when the page has no match log table', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(parseMatchLogs('<html><body><p>Not found</p></body></html>', 'Rovers')).toEqual([]);
  });
});

describe('recentMatchesBefore', () => {
  const season = `
<table id="matchlogs_for"><tbody>
  ${logRow({ date: '2024-02-24', comp: 'League', opponent: 'Town', goals_for: '2', goals_against: '1' })}
  ${logRow({ date: '2024-03-02', comp: 'League', opponent: 'City', goals_for: '0', goals_against: '0' })}
  ${logRow({ date: '2024-03-09', comp: 'League', opponent: 'Athletic', goals_for: '1', goals_against: '3' })}
  ${logRow({ date: '2024-03-16', comp: 'League', opponent: 'Wanderers', goals_for: '4', goals_against: '0' })}
</tbody></table>`;
  const records = parseMatchLogs(season, 'Rovers');

  it('keeps only matches before the target date, newest first', () => {
    const recent = recentMatchesBefore(records, new Date('2024-03-09T00:00:00Z'), 2);
    expect(recent.map(m => m.matchId)).toEqual(['20240302_Rovers_City', '20240224_Rovers_Town']);
  });

  it('applies the window after the date filter', () => {
    const recent = recentMatchesBefore(records, new Date('2024-03-10T00:00:00Z'), 1);
    expect(recent.map(m => m.opponent)).toEqual(['Athletic']);
  });

  it('returns nothing when every match is on or after the target', () => {
    expect(recentMatchesBefore(records, new Date('2024-02-24T00:00:00Z'), 7)).toEqual([]);
  });
});

describe('matchLogPath', () => {
  it('points at the all-competitions shooting log', () => {
    expect(matchLogPath('abc123')).toBe('/abc123/matchlogs/all_comps/shooting/');
  });
});
