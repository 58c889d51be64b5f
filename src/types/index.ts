/**
 * form-latents - Core Types
 */

// ─── Observation Table ───

/** Raw cell as it arrives from CSV (strings) or JSON (numbers, null) */
export type RawCell = string | number | null | undefined;

export type RawRecord = Record<string, RawCell>;

/** Names of the two reserved columns that key every row */
export interface TableLayout {
  idColumn: string;    // e.g. "Player_ID" or "team"
  dateColumn: string;  // e.g. "Date" or "date"
}

/**
 * One observation for one entity on one date.
 * `values` holds only numeric feature columns; a missing key means the cell was empty.
 * Values may be NaN / ±Infinity: the aggregator decides how to treat them.
 */
export interface ObservationRow {
  readonly entityId: string;
  readonly date: Date;
  readonly values: Readonly<Record<string, number>>;
}

export interface ObservationTable {
  readonly layout: TableLayout;
  /** Numeric feature columns, in first-seen order */
  readonly columns: readonly string[];
  readonly rows: readonly ObservationRow[];
}

// ─── Aggregation ───

/**
 * How missing or non-finite cells are treated before weighting.
 *   drop-cell: exclude the cell from that column's sums only
 *   drop-row:  exclude the whole row if any requested cell is unusable
 *   fill-zero: count the cell as 0
 */
export type MissingValuePolicy = 'drop-cell' | 'drop-row' | 'fill-zero';

export interface AggregateOptions {
  alpha?: number;
  /** Columns to aggregate; defaults to every numeric non-reserved column in the rows */
  columns?: readonly string[];
  missing?: MissingValuePolicy;
}

export interface WeightedFeatureVector {
  entityId: string;
  cutoff: Date;
  /** Output columns in request (or first-seen) order */
  columns: string[];
  features: Record<string, number>;
  rowsUsed: number;
  totalWeight: number;
}

// ─── Supervised pairs ───

export interface TrainingPair {
  entityId: string;
  features: number[];  // aggregated history, aligned with TrainingSet.columns
  target: number[];    // ground truth on the cutoff date, same alignment
}

export interface TrainingSet {
  cutoff: Date;
  alpha: number;
  columns: string[];
  pairs: TrainingPair[];
  eligible: number;
  skipped: {
    noHistory: string[];
    columnMismatch: string[];
  };
}

// ─── Team form ───

export type MatchResult = 'win' | 'draw' | 'loss';

/** One team's view of one match, as scraped from an FBRef shooting log */
export interface TeamMatchRecord {
  matchId: string;
  date: Date;
  team: string;
  opponent: string;
  gf: number;
  ga: number;
  sh?: number;
  sot?: number;
  dist?: number;      // average shot distance (yards)
  fk?: number;        // shots from free kicks
  pk?: number;        // penalty goals
  pkatt?: number;     // penalty attempts
  leagueId: string;
  leagueName: string;
  scrapeDate: Date;
}

export interface ProcessedTeamMatch {
  matchId: string;
  date: Date;
  team: string;
  opponent: string;
  leagueId: string;
  result: MatchResult;
  stats: Record<string, number>; // gf, ga, ..., goal_diff, shot_accuracy, pk_conversion
}

export interface TeamFormStats {
  averages: Record<string, number>; // avg_gf, avg_ga, ...
  wins: number;
  draws: number;
  losses: number;
  points: number;
}

export interface TeamFormSummary extends TeamFormStats {
  team: string;
  formDate: Date;
  matchesIncluded: number;
}

// ─── Latents ───

export interface PlayerLatent {
  entityId: string;
  cutoff: string;     // YYYY-MM-DD
  latent: number[];
}
