/**
 * Supervised Pair Builder
 *
 * For a cutoff date D, pairs each entity's decayed history (days < D) with
 * what it actually produced on D. Only entities seen on both sides of the
 * cutoff take part: no history means no input, no row on D means no label.
 *
 * Every pair shares one ordered column set, so the encoder input has a fixed
 * dimension.
 */

import { z } from 'zod';
import type {
  AggregateOptions,
  ObservationRow,
  ObservationTable,
  TrainingPair,
  TrainingSet,
} from '../src/types/index.js';
import { DEFAULT_ALPHA } from '../src/config.js';
import { compareIds, formatDate, groupByEntity, parseDate } from '../data/observations.js';
import { ModelFormatError } from '../src/errors.js';
import { aggregate } from './aggregate.js';
import { isBeforeDay, isSameDay } from './decay.js';

interface Candidate {
  entityId: string;
  features: Record<string, number>;
  target: Readonly<Record<string, number>>;
  columns: Set<string>;
}

export function buildTrainingSet(
  table: ObservationTable,
  cutoff: Date,
  options: AggregateOptions = {},
): TrainingSet {
  const alpha = options.alpha ?? DEFAULT_ALPHA;

  // 1. Partition
  const history = table.rows.filter(r => isBeforeDay(r.date, cutoff));
  const groundTruth = table.rows.filter(r => isSameDay(r.date, cutoff));

  // 2. Eligibility: seen before AND on the cutoff
  const historyIds = new Set(history.map(r => r.entityId));
  const eligible = [...new Set(groundTruth.map(r => r.entityId))]
    .filter(id => historyIds.has(id))
    .sort(compareIds);
  const eligibleSet = new Set(eligible);

  // 3. Restrict
  const historyByEntity = groupByEntity(history.filter(r => eligibleSet.has(r.entityId)));
  const truthByEntity = groupByEntity(groundTruth.filter(r => eligibleSet.has(r.entityId)));

  const requested = options.columns ?? table.columns;
  const noHistory: string[] = [];
  const columnMismatch: string[] = [];
  const candidates: Candidate[] = [];

  // 4-5. Aggregate and reconcile per entity
  for (const entityId of eligible) {
    const rows = historyByEntity.get(entityId) ?? [];
    const truthRows = truthByEntity.get(entityId) ?? [];
    const truth = firstRow(truthRows);
    if (truthRows.length > 1) {
      console.warn(
        `[training-set] ${entityId} has ${truthRows.length} rows on ${formatDay(cutoff)}; using the first as ground truth`,
      );
    }

    const vector = aggregate(rows, cutoff, { ...options, alpha, columns: requested });
    if (!vector || !truth) {
      noHistory.push(entityId);
      continue;
    }

    const common = vector.columns.filter(c => Number.isFinite(truth.values[c]));
    if (common.length === 0) {
      columnMismatch.push(entityId);
      continue;
    }

    candidates.push({
      entityId,
      features: vector.features,
      target: truth.values,
      columns: new Set(common),
    });
  }

  // 6. One ordered column set for all pairs
  const columns = requested.filter(c => candidates.every(cand => cand.columns.has(c)));

  let pairs: TrainingPair[] = [];
  if (columns.length > 0) {
    pairs = candidates.map(cand => ({
      entityId: cand.entityId,
      features: columns.map(c => cand.features[c]),
      target: columns.map(c => cand.target[c]),
    }));
  } else if (candidates.length > 0) {
    console.warn(`[training-set] No column shared by all ${candidates.length} entities; no pairs built`);
    columnMismatch.push(...candidates.map(c => c.entityId));
    columnMismatch.sort(compareIds);
  }

  if (noHistory.length > 0 || columnMismatch.length > 0) {
    console.warn(
      `[training-set] ${formatDay(cutoff)}: skipped ${noHistory.length} without usable history, ` +
      `${columnMismatch.length} with no common columns`,
    );
  }
  console.log(
    `[training-set] ${formatDay(cutoff)}: ${pairs.length} pairs / ${eligible.length} eligible, ${columns.length} columns`,
  );

  return {
    cutoff,
    alpha,
    columns,
    pairs,
    eligible: eligible.length,
    skipped: { noHistory, columnMismatch },
  };
}

/**
 * Restrict two training sets (e.g. train and validation cutoffs) to the
 * columns they share, keeping the first set's order.
 */
export function reconcileTrainingSets(
  a: TrainingSet,
  b: TrainingSet,
): [TrainingSet, TrainingSet] {
  const inB = new Set(b.columns);
  const columns = a.columns.filter(c => inB.has(c));
  return [restrictColumns(a, columns), restrictColumns(b, columns)];
}

export function restrictColumns(set: TrainingSet, columns: readonly string[]): TrainingSet {
  const index = columns.map(c => {
    const i = set.columns.indexOf(c);
    if (i === -1) throw new Error(`Column "${c}" not in training set`);
    return i;
  });

  return {
    ...set,
    columns: [...columns],
    pairs: set.pairs.map(p => ({
      entityId: p.entityId,
      features: index.map(i => p.features[i]),
      target: index.map(i => p.target[i]),
    })),
  };
}

// ─── Persistence ───

const TrainingSetFileSchema = z.object({
  cutoff: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  alpha: z.number().positive(),
  columns: z.array(z.string()),
  pairs: z.array(z.object({
    entityId: z.string(),
    features: z.array(z.number()),
    target: z.array(z.number()),
  })),
  eligible: z.number().int().min(0),
  skipped: z.object({
    noHistory: z.array(z.string()),
    columnMismatch: z.array(z.string()),
  }),
});

export type TrainingSetFile = z.infer<typeof TrainingSetFileSchema>;

/** JSON-ready form, cutoff as YYYY-MM-DD */
export function toTrainingSetFile(set: TrainingSet): TrainingSetFile {
  return { ...set, cutoff: formatDate(set.cutoff) };
}

/**
 * Parse a saved training set. Throws ModelFormatError when the file is
 * malformed or a pair does not match the column count.
 */
export function fromTrainingSetFile(data: unknown): TrainingSet {
  const parsed = TrainingSetFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ModelFormatError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const file = parsed.data;
  const width = file.columns.length;
  const bad = file.pairs.filter(p => p.features.length !== width || p.target.length !== width);
  if (bad.length > 0) {
    throw new ModelFormatError(bad.map(p => `pair ${p.entityId}: expected ${width} values`));
  }
  return { ...file, cutoff: parseDate(file.cutoff) };
}

function firstRow(rows: readonly ObservationRow[]): ObservationRow | undefined {
  return rows.length > 0 ? rows[0] : undefined;
}

function formatDay(date: Date): string {
  return isNaN(date.getTime()) ? 'invalid date' : formatDate(date);
}
