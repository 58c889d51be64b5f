import { describe, it, expect, vi, afterEach } from 'vitest';
import { matchResult, preprocessTeamStats } from '../data/preprocess-teams.js';
import {
  aggregateTeamForm,
  compileTeamRecentForm,
  getTeamForm,
  summarizeTeamForm,
} from '../ml/team-form.js';
import type { TeamFormSummary, TeamMatchRecord } from '../src/types/index.js';
import { day } from './helpers.js';

function match(team: string, date: string, gf: number, ga: number, extra: Partial<TeamMatchRecord> = {}): TeamMatchRecord {
  return {
    matchId: `${date.replace(/-/g, '')}_${team}_Opp`,
    date: day(date),
    team,
    opponent: 'Opp',
    gf,
    ga,
    leagueId: 'test_league',
    leagueName: 'Test League',
    scrapeDate: day('2024-03-11'),
    ...extra,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('preprocessTeamStats', () => {
  it('adds derived ratios and the result', () => {
    const [processed] = preprocessTeamStats([
      match('Rovers', '2024-03-01', 2, 1, { sh: 10, sot: 4, pk: 1, pkatt: 2, dist: 17.5 }),
    ]);

    expect(processed.result).toBe('win');
    expect(processed.stats).toEqual({
      gf: 2, ga: 1, sh: 10, sot: 4, dist: 17.5, fk: 0, pk: 1, pkatt: 2,
      goal_diff: 1, shot_accuracy: 0.4, pk_conversion: 0.5,
    });
  });

  it('uses 0 for ratios without attempts', () => {
    const [processed] = preprocessTeamStats([match('Rovers', '2024-03-01', 0, 0)]);

    expect(processed.stats['shot_accuracy']).toBe(0);
    expect(processed.stats['pk_conversion']).toBe(0);
    expect(processed.result).toBe('draw');
  });

  it('classifies results from the team side', () => {
    expect(matchResult(3, 1)).toBe('win');
    expect(matchResult(1, 1)).toBe('draw');
    expect(matchResult(0, 2)).toBe('loss');
  });
});

describe('team form', () => {
  const matches = preprocessTeamStats([
    match('Rovers', '2024-03-01', 2, 0),
    match('Rovers', '2024-03-05', 1, 1),
    match('Rovers', '2024-03-08', 0, 1),
    match('Rovers', '2024-03-10', 3, 0),
    match('United', '2024-03-07', 4, 2),
  ]);
  const target = day('2024-03-10');

  it('takes the most recent matches strictly before the target', () => {
    const form = getTeamForm(matches, 'Rovers', target, 2);
    expect(form.map(m => m.matchId)).toEqual(['20240308_Rovers_Opp', '20240305_Rovers_Opp']);
  });

  it('counts results and averages uniformly when unweighted', () => {
    const form = getTeamForm(matches, 'Rovers', target, 2);
    const stats = aggregateTeamForm(form, target, { weighted: false });

    expect(stats?.wins).toBe(0);
    expect(stats?.draws).toBe(1);
    expect(stats?.losses).toBe(1);
    expect(stats?.points).toBe(1);
    expect(stats?.averages['avg_gf']).toBe(0.5);
    expect(stats?.averages['avg_ga']).toBe(1);
    expect(stats?.averages['avg_goal_diff']).toBe(-0.5);
  });

  it('weights recent matches more by default', () => {
    const form = getTeamForm(matches, 'Rovers', target, 2);
    const stats = aggregateTeamForm(form, target, { alpha: 0.1 });

    // (e^-0.2 * 0 + e^-0.5 * 1) / (e^-0.2 + e^-0.5)
    expect(stats?.averages['avg_gf']).toBeCloseTo(0.425557, 6);
    expect(stats?.averages['avg_ga']).toBeCloseTo(1, 12);
  });

  it('returns null for an empty window', () => {
    expect(aggregateTeamForm([], target)).toBeNull();
  });

  it('skips teams without matches before the target', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const forms = compileTeamRecentForm(matches, ['Rovers', 'United', 'Ghosts'], target, 7);

    expect(forms.map(f => [f.team, f.matchesIncluded, f.points])).toEqual([
      ['Rovers', 3, 4],
      ['United', 1, 3],
    ]);
    expect(forms[0].formDate).toBe(target);
    expect(warn).toHaveBeenCalledWith('[team-form] No matches for Ghosts before 2024-03-10');
  });
});

describe('summarizeTeamForm', () => {
  it('sorts by points and rounds averages to two decimals', () => {
    const base = { formDate: day('2024-03-10'), matchesIncluded: 3, wins: 1, draws: 1, losses: 1 };
    const forms: TeamFormSummary[] = [
      { ...base, team: 'A', points: 4, averages: { avg_gf: 1.236, avg_ga: 0.5, avg_sh: 10, avg_sot: 3.333 } },
      { ...base, team: 'B', points: 7, averages: { avg_gf: 2 } },
    ];

    const summary = summarizeTeamForm(forms);

    expect(summary.map(r => r.team)).toEqual(['B', 'A']);
    expect(summary[1]).toEqual({
      team: 'A', points: 4, wins: 1, draws: 1, losses: 1,
      avg_gf: 1.24, avg_ga: 0.5, avg_sh: 10, avg_sot: 3.33,
    });
    expect(summary[0].avg_ga).toBeNaN();
  });
});
