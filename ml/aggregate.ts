/**
 * Time-decayed Aggregation
 *
 * Collapses one entity's history into a single weighted-mean feature vector
 * as of a cutoff date. Only rows from strictly earlier days are used, so
 * nothing observed on or after the cutoff can leak into the result.
 *
 * The caller's rows are never modified: ages and weights live in a private
 * working array scoped to the call.
 */

import type {
  AggregateOptions,
  ObservationRow,
  WeightedFeatureVector,
} from '../src/types/index.js';
import { DEFAULT_ALPHA, DEFAULT_MISSING_POLICY, RESERVED_COLUMNS } from '../src/config.js';
import { ageInDays, assertAlpha, isBeforeDay, temporalWeight } from './decay.js';

const RESERVED: readonly string[] = RESERVED_COLUMNS;

interface WeightedRow {
  values: Readonly<Record<string, number>>;
  age: number;
  weight: number;
}

/**
 * Weighted mean per column over the entity's history.
 * Returns null when no row before the cutoff has a finite value in any
 * requested column, or the total weight underflows to zero; the caller must
 * treat that as "no history". `rowsUsed` and `totalWeight` count only rows
 * with at least one usable cell.
 */
export function aggregate(
  rows: readonly ObservationRow[],
  cutoff: Date,
  options: AggregateOptions = {},
): WeightedFeatureVector | null {
  const alpha = options.alpha ?? DEFAULT_ALPHA;
  const missing = options.missing ?? DEFAULT_MISSING_POLICY;
  assertAlpha(alpha);
  if (isNaN(cutoff.getTime())) {
    throw new RangeError('Cutoff date is invalid');
  }
  if (rows.length === 0) return null;

  const entityId = rows[0].entityId;
  if (rows.some(r => r.entityId !== entityId)) {
    throw new Error(`aggregate() expects rows for a single entity, got several (first: ${entityId})`);
  }

  const history = rows.filter(r => isBeforeDay(r.date, cutoff));
  const columns = (options.columns ?? featureColumns(history)).filter(c => !isReserved(c));

  let working: WeightedRow[] = history.map(r => {
    const age = ageInDays(r.date, cutoff);
    return { values: r.values, age, weight: temporalWeight(age, alpha) };
  });

  if (missing === 'drop-row') {
    working = working.filter(w => columns.every(c => isUsable(w.values[c])));
  }

  // A row with no usable cell in any requested column is not an observation
  const used = working.filter(w => columns.some(c => isUsable(w.values[c])));
  const totalWeight = used.reduce((s, w) => s + w.weight, 0);
  if (used.length === 0 || totalWeight === 0) return null;

  const outColumns: string[] = [];
  const features: Record<string, number> = {};

  for (const col of columns) {
    const contributing = used.filter(w => missing === 'fill-zero' || isUsable(w.values[col]));
    const weightTotal = contributing.reduce((s, w) => s + w.weight, 0);
    if (weightTotal === 0) continue;

    // Normalize first: a single contributing row then reproduces its value exactly
    let mean = 0;
    for (const w of contributing) {
      const v = w.values[col];
      mean += (w.weight / weightTotal) * (isUsable(v) ? v : 0);
    }

    outColumns.push(col);
    features[col] = mean;
  }

  if (outColumns.length === 0) return null;

  return {
    entityId,
    cutoff,
    columns: outColumns,
    features,
    rowsUsed: used.length,
    totalWeight,
  };
}

/** Numeric, non-reserved columns across the rows, in first-seen order */
export function featureColumns(rows: readonly ObservationRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row.values)) {
      if (!isReserved(key)) seen.add(key);
    }
  }
  return [...seen];
}

function isReserved(column: string): boolean {
  return RESERVED.includes(column);
}

function isUsable(v: number | undefined): v is number {
  return v !== undefined && Number.isFinite(v);
}
