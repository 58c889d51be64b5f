#!/usr/bin/env tsx
/**
 * Encode every player's history as of a date into a latent vector.
 *
 * Usage:
 *   tsx scripts/extract-latents.ts --cutoff 2024-04-01
 *   tsx scripts/extract-latents.ts --cutoff 2024-04-01 --model data/processed/autoencoder.json
 */

import 'dotenv/config';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, PLAYER_LAYOUT } from '../src/config.js';
import { formatDate, loadObservationCsv, parseDate } from '../data/observations.js';
import { readJson, writeJsonArray } from '../data/io.js';
import { AggregationAutoencoder } from '../ml/autoencoder.js';
import { extractLatents } from '../ml/latents.js';

const __dirname = join(fileURLToPath(import.meta.url), '..');

async function main() {
  console.log('=== form-latents - Extract Latents ===\n');

  const config = loadConfig();
  const dataDir = resolve(__dirname, '..', config.DATA_DIR);

  let inputPath = join(dataDir, 'processed', 'player_stats.csv');
  let modelPath = join(dataDir, 'processed', 'autoencoder.json');
  let cutoff = new Date();
  let alpha = config.DECAY_ALPHA;

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--input' && args[i + 1]) {
      inputPath = resolve(args[++i]);
    } else if (args[i] === '--model' && args[i + 1]) {
      modelPath = resolve(args[++i]);
    } else if (args[i] === '--cutoff' && args[i + 1]) {
      cutoff = parseDate(args[++i]);
    } else if (args[i] === '--alpha' && args[i + 1]) {
      alpha = parseFloat(args[++i]);
    }
  }

  if (isNaN(cutoff.getTime())) {
    console.error('Invalid --cutoff date (expected YYYY-MM-DD)');
    process.exit(1);
  }

  const model = AggregationAutoencoder.fromJSON(await readJson(modelPath));
  if (model.columns.length === 0) {
    console.error(`Model ${modelPath} carries no column order; retrain it with scripts/train-autoencoder.ts`);
    process.exit(1);
  }

  console.log(`Model:  ${modelPath} (${model.inputDim} → ${model.latentDim})`);
  console.log(`Cutoff: ${formatDate(cutoff)}  alpha=${alpha}\n`);

  const table = await loadObservationCsv(inputPath, PLAYER_LAYOUT);
  const { latents, missing } = extractLatents(table, cutoff, model, {
    alpha,
    columns: model.columns,
  });

  const outputPath = join(dataDir, 'processed', `latents_${formatDate(cutoff)}.json`);
  await writeJsonArray(outputPath, latents);

  console.log(`\n✅ ${latents.length} latent vectors → ${outputPath}`);
  if (missing.length > 0) console.log(`   Without history: ${missing.join(', ')}`);
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
