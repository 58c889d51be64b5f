#!/usr/bin/env tsx
/**
 * Build supervised (history aggregate → cutoff-day performance) pairs.
 *
 * Usage:
 *   tsx scripts/build-training-set.ts --cutoff 2024-03-10
 *   tsx scripts/build-training-set.ts --cutoff 2024-03-10 --validation-cutoff 2024-03-17 --alpha 0.05
 *   tsx scripts/build-training-set.ts --cutoff 2024-03-10 --missing drop-row
 */

import 'dotenv/config';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, PLAYER_LAYOUT } from '../src/config.js';
import type { MissingValuePolicy, TrainingSet } from '../src/types/index.js';
import { formatDate, loadObservationCsv, parseDate } from '../data/observations.js';
import { writeJson } from '../data/io.js';
import { buildTrainingSet, reconcileTrainingSets, toTrainingSetFile } from '../ml/training-set.js';

const __dirname = join(fileURLToPath(import.meta.url), '..');

const POLICIES: MissingValuePolicy[] = ['drop-cell', 'drop-row', 'fill-zero'];

async function main() {
  console.log('=== form-latents - Build Training Set ===\n');

  const config = loadConfig();
  const dataDir = resolve(__dirname, '..', config.DATA_DIR);

  let inputPath = join(dataDir, 'processed', 'player_stats.csv');
  let cutoffArg: string | undefined;
  let validationArg: string | undefined;
  let alpha = config.DECAY_ALPHA;
  let missing: MissingValuePolicy | undefined;

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--input' && args[i + 1]) {
      inputPath = resolve(args[++i]);
    } else if (args[i] === '--cutoff' && args[i + 1]) {
      cutoffArg = args[++i];
    } else if (args[i] === '--validation-cutoff' && args[i + 1]) {
      validationArg = args[++i];
    } else if (args[i] === '--alpha' && args[i + 1]) {
      alpha = parseFloat(args[++i]);
    } else if (args[i] === '--missing' && args[i + 1]) {
      const policy = POLICIES.find(p => p === args[i + 1]);
      if (!policy) {
        console.error(`Unknown missing-value policy: ${args[i + 1]} (expected ${POLICIES.join(', ')})`);
        process.exit(1);
      }
      missing = policy;
      i++;
    }
  }

  if (!cutoffArg) {
    console.error('Usage: tsx scripts/build-training-set.ts --cutoff YYYY-MM-DD [--validation-cutoff YYYY-MM-DD]');
    process.exit(1);
  }

  const cutoff = parseDate(cutoffArg);
  if (isNaN(cutoff.getTime())) {
    console.error(`Invalid cutoff date: ${cutoffArg}`);
    process.exit(1);
  }

  console.log(`Input:  ${inputPath}`);
  console.log(`Cutoff: ${formatDate(cutoff)}  alpha=${alpha}  missing=${missing ?? 'drop-cell'}\n`);

  const table = await loadObservationCsv(inputPath, PLAYER_LAYOUT);
  let train: TrainingSet = buildTrainingSet(table, cutoff, { alpha, missing });

  if (validationArg) {
    const validationCutoff = parseDate(validationArg);
    if (isNaN(validationCutoff.getTime())) {
      console.error(`Invalid validation cutoff date: ${validationArg}`);
      process.exit(1);
    }
    let validation = buildTrainingSet(table, validationCutoff, { alpha, missing });
    [train, validation] = reconcileTrainingSets(train, validation);

    const validationPath = join(dataDir, 'processed', `training_set_${formatDate(validationCutoff)}.json`);
    await writeJson(validationPath, toTrainingSetFile(validation));
    console.log(`Validation: ${validation.pairs.length} pairs → ${validationPath}`);
  }

  const outputPath = join(dataDir, 'processed', `training_set_${formatDate(cutoff)}.json`);
  await writeJson(outputPath, toTrainingSetFile(train));

  console.log(`\n✅ ${train.pairs.length} pairs, ${train.columns.length} columns → ${outputPath}`);
  if (train.skipped.noHistory.length > 0) {
    console.log(`   No history:      ${train.skipped.noHistory.length}`);
  }
  if (train.skipped.columnMismatch.length > 0) {
    console.log(`   Column mismatch: ${train.skipped.columnMismatch.length}`);
  }
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
