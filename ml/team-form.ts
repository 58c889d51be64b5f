/**
 * Team Recent Form
 *
 * Form = the team's last N matches before a target date, summarized as
 * time-decayed averages of the shooting-log stats plus W/D/L counts.
 *
 * Weighting goes through the same aggregator as player vectors, so the
 * decay convention (age = target - match date) is identical in both paths.
 */

import type {
  ObservationRow,
  ProcessedTeamMatch,
  TeamFormStats,
  TeamFormSummary,
} from '../src/types/index.js';
import { DEFAULT_ALPHA, DEFAULT_FORM_WINDOW, TEAM_FEATURE_COLUMNS } from '../src/config.js';
import { aggregate } from './aggregate.js';
import { isBeforeDay } from './decay.js';

export interface TeamFormOptions {
  weighted?: boolean;
  alpha?: number;
}

/**
 * Last `window` matches of `team` strictly before `target`, most recent first
 */
export function getTeamForm(
  matches: readonly ProcessedTeamMatch[],
  team: string,
  target: Date = new Date(),
  window: number = DEFAULT_FORM_WINDOW,
): ProcessedTeamMatch[] {
  return matches
    .filter(m => m.team === team && isBeforeDay(m.date, target))
    .sort((a, b) => b.date.getTime() - a.date.getTime())
    .slice(0, Math.max(0, window));
}

/**
 * Aggregate a form window. Returns null for an empty window.
 */
export function aggregateTeamForm(
  form: readonly ProcessedTeamMatch[],
  target: Date,
  options: TeamFormOptions = {},
): TeamFormStats | null {
  if (form.length === 0) return null;

  const weighted = options.weighted ?? true;
  const columns = TEAM_FEATURE_COLUMNS.filter(c => form.some(m => m.stats[c] !== undefined));

  let means: Record<string, number>;
  if (weighted) {
    const rows: ObservationRow[] = form.map(m => ({
      entityId: m.team,
      date: m.date,
      values: m.stats,
    }));
    const vector = aggregate(rows, target, {
      alpha: options.alpha ?? DEFAULT_ALPHA,
      columns,
    });
    if (!vector) return null;
    means = vector.features;
  } else {
    means = {};
    for (const col of columns) {
      const values = form.map(m => m.stats[col]).filter(v => Number.isFinite(v));
      if (values.length > 0) means[col] = values.reduce((a, b) => a + b, 0) / values.length;
    }
  }

  const averages: Record<string, number> = {};
  for (const col of columns) {
    if (means[col] !== undefined) averages[`avg_${col}`] = means[col];
  }

  const wins = form.filter(m => m.result === 'win').length;
  const draws = form.filter(m => m.result === 'draw').length;
  const losses = form.filter(m => m.result === 'loss').length;

  return {
    averages,
    wins,
    draws,
    losses,
    points: wins * 3 + draws,
  };
}

/**
 * Form for each team; teams with no match before the target are left out
 */
export function compileTeamRecentForm(
  matches: readonly ProcessedTeamMatch[],
  teams: readonly string[],
  target: Date = new Date(),
  window: number = DEFAULT_FORM_WINDOW,
  options: TeamFormOptions = {},
): TeamFormSummary[] {
  const forms: TeamFormSummary[] = [];

  for (const team of teams) {
    const form = getTeamForm(matches, team, target, window);
    const stats = aggregateTeamForm(form, target, options);
    if (!stats) {
      console.warn(`[team-form] No matches for ${team} before ${target.toISOString().slice(0, 10)}`);
      continue;
    }
    forms.push({ ...stats, team, formDate: target, matchesIncluded: form.length });
  }

  return forms;
}

export type TeamFormSummaryRow = {
  team: string;
  points: number;
  wins: number;
  draws: number;
  losses: number;
  avg_gf: number;
  avg_ga: number;
  avg_sh: number;
  avg_sot: number;
};

/**
 * League-table style summary: by points, descending, rounded to 2 dp
 */
export function summarizeTeamForm(forms: readonly TeamFormSummary[]): TeamFormSummaryRow[] {
  return [...forms]
    .sort((a, b) => b.points - a.points)
    .map(f => ({
      team: f.team,
      points: f.points,
      wins: f.wins,
      draws: f.draws,
      losses: f.losses,
      avg_gf: round2(f.averages['avg_gf']),
      avg_ga: round2(f.averages['avg_ga']),
      avg_sh: round2(f.averages['avg_sh']),
      avg_sot: round2(f.averages['avg_sot']),
    }));
}

function round2(v: number | undefined): number {
  return v === undefined ? NaN : Math.round(v * 100) / 100;
}
