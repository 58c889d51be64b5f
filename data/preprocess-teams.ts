/**
 * Team Match Preprocessing
 *
 * Adds the derived ratios and the W/D/L result to scraped team match logs.
 */

import type { MatchResult, ProcessedTeamMatch, TeamMatchRecord } from '../src/types/index.js';

const RAW_STAT_KEYS = ['gf', 'ga', 'sh', 'sot', 'dist', 'fk', 'pk', 'pkatt'] as const;

export function preprocessTeamStats(records: readonly TeamMatchRecord[]): ProcessedTeamMatch[] {
  return records.map(rec => {
    const stats: Record<string, number> = {};
    for (const key of RAW_STAT_KEYS) {
      const v = Number(rec[key]);
      stats[key] = Number.isFinite(v) ? v : 0;
    }

    stats['goal_diff'] = stats['gf'] - stats['ga'];
    stats['shot_accuracy'] = stats['sh'] > 0 ? stats['sot'] / stats['sh'] : 0;
    stats['pk_conversion'] = stats['pkatt'] > 0 ? stats['pk'] / stats['pkatt'] : 0;

    return {
      matchId: rec.matchId,
      date: rec.date,
      team: rec.team,
      opponent: rec.opponent,
      leagueId: rec.leagueId,
      result: matchResult(stats['gf'], stats['ga']),
      stats,
    };
  });
}

export function matchResult(goalsFor: number, goalsAgainst: number): MatchResult {
  if (goalsFor > goalsAgainst) return 'win';
  if (goalsFor < goalsAgainst) return 'loss';
  return 'draw';
}
