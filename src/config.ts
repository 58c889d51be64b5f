/**
 * form-latents - Configuration
 */

import { z } from 'zod';
import type { MissingValuePolicy, TableLayout } from './types/index.js';

// ─── Decay & windows ───

/** Exponential decay rate per day: weight = exp(-alpha * ageInDays) */
export const DEFAULT_ALPHA = 0.1;

/** Team form: number of most recent matches considered before weighting */
export const DEFAULT_FORM_WINDOW = 7;

export const DEFAULT_MISSING_POLICY: MissingValuePolicy = 'drop-cell';

/** Bookkeeping names never treated as features (besides the layout's id/date columns) */
export const RESERVED_COLUMNS = ['age', 'weight'] as const;

// ─── Table layouts ───

export const PLAYER_LAYOUT: TableLayout = {
  idColumn: 'Player_ID',
  dateColumn: 'Date',
};

export const TEAM_LAYOUT: TableLayout = {
  idColumn: 'team',
  dateColumn: 'date',
};

/** FBRef shooting-log columns plus the derived ratios */
export const TEAM_FEATURE_COLUMNS = [
  'gf', 'ga', 'sh', 'sot', 'dist', 'fk', 'pk', 'pkatt',
  'goal_diff', 'shot_accuracy', 'pk_conversion',
] as const;

// ─── Autoencoder ───

export const ENCODER_CONFIG = {
  encodingDims: [128, 64, 32],
  epochs: 50,
  learningRate: 0.001,
};

// ─── Environment ───

const EnvSchema = z.object({
  DECAY_ALPHA: z.coerce.number().positive().default(DEFAULT_ALPHA),
  FORM_WINDOW: z.coerce.number().int().min(1).default(DEFAULT_FORM_WINDOW),
  DATA_DIR: z.string().min(1).default('data'),
  FBREF_BASE_URL: z.string().url().default('https://fbref.com/en/squads'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(2000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Read settings from the environment (scripts load `.env` via dotenv first).
 * Throws a ZodError when a variable is set to an invalid value.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  return EnvSchema.parse(env);
}
