/**
 * Latent Extraction
 *
 * Serving-time path: decayed aggregate of an entity's history as of a
 * cutoff, then the encoder. Entities without history come back as null with
 * a warning so batch jobs over a whole squad or league keep going.
 */

import type { AggregateOptions, ObservationRow, ObservationTable, PlayerLatent } from '../src/types/index.js';
import { entityIds, formatDate, groupByEntity } from '../data/observations.js';
import { aggregate } from './aggregate.js';
import type { Encoder } from './autoencoder.js';

export interface InferOptions extends AggregateOptions {
  /** Encoder input order; required when it differs from the aggregate's own column order */
  columns?: readonly string[];
}

export function inferLatent(
  rows: readonly ObservationRow[],
  cutoff: Date,
  encoder: Encoder,
  options: InferOptions = {},
): number[] | null {
  const vector = aggregate(rows, cutoff, options);
  if (!vector) {
    const who = rows.length > 0 ? rows[0].entityId : '(no rows)';
    console.warn(`[latents] Warning: no historical data for ${who} before ${formatDate(cutoff)}`);
    return null;
  }

  const columns = options.columns ?? vector.columns;
  if (columns.length !== encoder.inputDim) {
    throw new RangeError(
      `Encoder expects ${encoder.inputDim} features, got ${columns.length} columns`,
    );
  }

  // Columns the history never filled fall back to 0 here, after aggregation
  const input = columns.map(c => vector.features[c] ?? 0);
  return encoder.encode(input);
}

/**
 * Latent vector for every entity in the table that has history before the cutoff
 */
export function extractLatents(
  table: ObservationTable,
  cutoff: Date,
  encoder: Encoder,
  options: InferOptions = {},
): { latents: PlayerLatent[]; missing: string[] } {
  const byEntity = groupByEntity(table.rows);
  const latents: PlayerLatent[] = [];
  const missing: string[] = [];

  for (const id of entityIds(table)) {
    const latent = inferLatent(byEntity.get(id) ?? [], cutoff, encoder, options);
    if (latent) {
      latents.push({ entityId: id, cutoff: formatDate(cutoff), latent });
    } else {
      missing.push(id);
    }
  }

  console.log(`[latents] ${latents.length} latent vectors, ${missing.length} entities without history`);
  return { latents, missing };
}
