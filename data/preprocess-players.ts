/**
 * Player Match Stats Preprocessing
 *
 * Raw SofaScore-style player rows hold text such as "85'", "12 (4)" and
 * "23/30 (77%)". This turns them into per-minute numeric rows ready for
 * createObservationTable(..., PLAYER_LAYOUT).
 *
 * Rows for players who did not play (0 minutes) end up with non-finite
 * per-minute values; they are kept and the aggregator drops those cells.
 */

import type { RawRecord } from '../src/types/index.js';
import { parseCell } from './observations.js';

const DROPPED_COLUMNS = [
  'Duels (won)', 'Sofascore Rating', 'Notes Attack', 'Defensive actions',
  'Notes Defence', 'Notes Passing', 'Notes Goalkeeper',
];

/** Identity and context columns, handled separately from the per-minute stats */
const NON_NORMED = ['Player', 'Player_ID', 'Team', 'Position', 'Home/Away', 'Date', 'Score', 'Minutes played'];

const KEPT_WHOLE = ['Expected Goals (xG)'];

const POSITION_MAP: Record<string, number> = {
  G: 0,
  D: 1 / 3,
  M: 2 / 3,
  F: 1,
};

export interface PlayerRating {
  playerId: string;
  date: string;
  rating: number;
}

export interface PreprocessedPlayers {
  rows: RawRecord[];
  ratings: PlayerRating[];
}

export function preprocessPlayerStats(records: readonly Record<string, string>[]): PreprocessedPlayers {
  const rows: RawRecord[] = [];
  const ratings: PlayerRating[] = [];

  for (const raw of records) {
    const playerId = (raw['Player_ID'] ?? '').trim();
    const date = parseCompactDate(raw['Date'] ?? '');

    const rating = parseCell(raw['Sofascore Rating']);
    if (rating.kind === 'number') {
      ratings.push({ playerId, date, rating: rating.value });
    }

    const out: Record<string, number | string> = {};
    const minutes = parseMinutes(raw['Minutes played']) ?? 0;

    for (const [column, value] of Object.entries(raw)) {
      if (DROPPED_COLUMNS.includes(column)) continue;
      if (NON_NORMED.includes(column)) continue;

      if (column === 'Accurate passes') {
        const m = /(\d+)\/(\d+)/.exec(value ?? '');
        out['Successful Passes'] = m ? Number(m[1]) : cellOrZero(value, true);
        out['Pass Attempts'] = m ? Number(m[2]) : cellOrZero(value, true);
        continue;
      }

      if (column.includes('(') && !KEPT_WHOLE.includes(column)) {
        const base = column.split(' (')[0];
        const m = /(\d+)\s*\((\d+)\)/.exec(value ?? '');
        out[`${base} Total`] = m ? Number(m[1]) : cellOrZero(value, true);
        out[`${base} Successful`] = m ? Number(m[2]) : cellOrZero(value, true);
        continue;
      }

      out[column] = cellOrZero(value, false);
    }

    // Per-minute rates
    for (const [column, value] of Object.entries(out)) {
      if (typeof value === 'number') out[column] = value / minutes;
    }

    const homeAway = parseCell(raw['Home/Away']);
    const isHome = homeAway.kind === 'number' && homeAway.value === 1;
    const goals = parseScore(raw['Score'] ?? '', isHome);

    rows.push({
      ...out,
      'Player_ID': playerId,
      'Date': date,
      'Minutes played': minutes / 90,
      'Position': POSITION_MAP[(raw['Position'] ?? '').trim()] ?? null,
      'Home/Away': homeAway.kind === 'number' ? homeAway.value : null,
      'Goals for': goals ? goals[0] : null,
      'Goals against': goals ? goals[1] : null,
    });
  }

  console.log(`[preprocess] ${rows.length} player rows, ${ratings.length} ratings`);
  return { rows, ratings };
}

/** "85'" -> 85 */
export function parseMinutes(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw.replace(/(\d+)'/, '$1').trim());
  return isNaN(n) ? undefined : n;
}

/**
 * "2-1" from the player's side: home players read it as-is, away players reversed.
 * Returns null when the score cannot be read.
 */
export function parseScore(score: string, isHome: boolean): [number, number] | null {
  const m = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(score);
  if (!m) return null;
  const home = Number(m[1]);
  const away = Number(m[2]);
  return isHome ? [home, away] : [away, home];
}

/** ddmmyyyy -> YYYY-MM-DD; anything else is passed through for parseDate() to judge */
export function parseCompactDate(raw: string): string {
  const m = /^(\d{2})(\d{2})(\d{4})$/.exec(raw.trim());
  return m ? `${m[3]}-${m[2]}-${m[1]}` : raw.trim();
}

/** Empty cells count as 0; unreadable text stays NaN when `numericOnly` */
function cellOrZero(value: string | undefined, numericOnly: boolean): number | string {
  const cell = parseCell(value);
  if (cell.kind === 'empty') return 0;
  if (cell.kind === 'number') return cell.value;
  return numericOnly ? NaN : (value ?? '').trim();
}
