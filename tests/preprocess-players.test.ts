import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import {
  parseCompactDate,
  parseMinutes,
  parseScore,
  preprocessPlayerStats,
} from '../data/preprocess-players.js';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

const homePlayer: Record<string, string> = {
  'Player': 'Test Player',
  'Player_ID': '101',
  'Team': 'Rovers',
  'Position': 'M',
  'Home/Away': '1',
  'Date': '10032024',
  'Score': '2-1',
  'Minutes played': "90'",
  'Sofascore Rating': '7.1',
  'Notes Attack': '3.2',
  'Accurate passes': '45/50 (90%)',
  'Dribble attempts (succ.)': '4 (2)',
  'Expected Goals (xG)': '0.45',
  'Goals': '1',
  'Assists': '',
};

describe('preprocessPlayerStats', () => {
  it('splits compound cells and converts stats to per-minute rates', () => {
    const { rows } = preprocessPlayerStats([homePlayer]);
    const r = rows[0];

    expect(r['Successful Passes']).toBe(0.5);
    expect(r['Pass Attempts']).toBe(50 / 90);
    expect(r['Dribble attempts Total']).toBe(4 / 90);
    expect(r['Dribble attempts Successful']).toBe(2 / 90);
    expect(r['Expected Goals (xG)']).toBe(0.45 / 90);
    expect(r['Goals']).toBe(1 / 90);
    expect(r['Assists']).toBe(0);
  });

  it('encodes identity and match context', () => {
    const { rows } = preprocessPlayerStats([homePlayer]);
    const r = rows[0];

    expect(r['Player_ID']).toBe('101');
    expect(r['Date']).toBe('2024-03-10');
    expect(r['Minutes played']).toBe(1);
    expect(r['Position']).toBe(2 / 3);
    expect(r['Home/Away']).toBe(1);
    expect(r['Goals for']).toBe(2);
    expect(r['Goals against']).toBe(1);
  });

  it('drops names, notes and the rating from the features', () => {
    const { rows } = preprocessPlayerStats([homePlayer]);
    const keys = Object.keys(rows[0]);

    expect(keys).not.toContain('Player');
    expect(keys).not.toContain('Team');
    expect(keys).not.toContain('Score');
    expect(keys).not.toContain('Notes Attack');
    expect(keys).not.toContain('Sofascore Rating');
  });

  it('keeps the rating separately', () => {
    const { ratings } = preprocessPlayerStats([homePlayer]);
    expect(ratings).toEqual([{ playerId: '101', date: '2024-03-10', rating: 7.1 }]);
  });

  it('reads the score from the away side and leaves 0-minute rates non-finite', () => {
    const { rows } = preprocessPlayerStats([
      { ...homePlayer, 'Home/Away': '0', 'Minutes played': "0'", 'Position': 'X' },
    ]);
    const r = rows[0];

    expect(r['Goals for']).toBe(1);
    expect(r['Goals against']).toBe(2);
    expect(r['Goals']).toBe(Infinity);
    expect(r['Assists']).toBeNaN();
    expect(r['Minutes played']).toBe(0);
    expect(r['Position']).toBeNull();
  });

  it('marks an unreadable compound cell as NaN', () => {
    const { rows } = preprocessPlayerStats([{ ...homePlayer, 'Dribble attempts (succ.)': 'n/a' }]);
    expect(rows[0]['Dribble attempts Total']).toBeNaN();
  });
});

describe('cell parsers', () => {
  it('parses minutes', () => {
    expect(parseMinutes("85'")).toBe(85);
    expect(parseMinutes('')).toBeUndefined();
    expect(parseMinutes(undefined)).toBeUndefined();
  });

  it('parses scores from either side', () => {
    expect(parseScore('3 - 0', true)).toEqual([3, 0]);
    expect(parseScore('3 - 0', false)).toEqual([0, 3]);
    expect(parseScore('-', true)).toBeNull();
  });

  it('converts ddmmyyyy dates', () => {
    expect(parseCompactDate('01022024')).toBe('2024-02-01');
    expect(parseCompactDate(' 2024-02-01 ')).toBe('2024-02-01');
  });
});
