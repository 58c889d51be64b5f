#!/usr/bin/env tsx
/**
 * Train the aggregation autoencoder on a saved training set.
 *
 * Usage:
 *   tsx scripts/train-autoencoder.ts --train data/processed/training_set_2024-03-10.json
 *   tsx scripts/train-autoencoder.ts --train a.json --validation b.json --epochs 100 --lr 0.0005
 */

import 'dotenv/config';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { ENCODER_CONFIG, loadConfig } from '../src/config.js';
import type { TrainingSet } from '../src/types/index.js';
import { readJson, writeJson } from '../data/io.js';
import { AggregationAutoencoder, type TrainingSample } from '../ml/autoencoder.js';
import { fromTrainingSetFile, reconcileTrainingSets } from '../ml/training-set.js';

const __dirname = join(fileURLToPath(import.meta.url), '..');

function toSamples(set: TrainingSet): TrainingSample[] {
  return set.pairs.map(p => ({ input: p.features, target: p.target }));
}

async function main() {
  console.log('=== form-latents - Train Autoencoder ===\n');

  const config = loadConfig();
  const dataDir = resolve(__dirname, '..', config.DATA_DIR);

  let trainPath: string | undefined;
  let validationPath: string | undefined;
  let modelPath = join(dataDir, 'processed', 'autoencoder.json');
  let epochs = ENCODER_CONFIG.epochs;
  let learningRate = ENCODER_CONFIG.learningRate;

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--train' && args[i + 1]) {
      trainPath = resolve(args[++i]);
    } else if (args[i] === '--validation' && args[i + 1]) {
      validationPath = resolve(args[++i]);
    } else if (args[i] === '--output' && args[i + 1]) {
      modelPath = resolve(args[++i]);
    } else if (args[i] === '--epochs' && args[i + 1]) {
      epochs = parseInt(args[++i], 10);
    } else if (args[i] === '--lr' && args[i + 1]) {
      learningRate = parseFloat(args[++i]);
    }
  }

  if (!trainPath) {
    console.error('Usage: tsx scripts/train-autoencoder.ts --train <training_set.json> [--validation <file>]');
    process.exit(1);
  }

  let train = fromTrainingSetFile(await readJson(trainPath));
  let validation: TrainingSet | undefined;
  if (validationPath) {
    [train, validation] = reconcileTrainingSets(train, fromTrainingSetFile(await readJson(validationPath)));
  }

  if (train.pairs.length === 0 || train.columns.length === 0) {
    console.error('Training set is empty; nothing to train on.');
    process.exit(1);
  }

  console.log(`Train:      ${trainPath} (${train.pairs.length} pairs)`);
  if (validation) console.log(`Validation: ${validationPath} (${validation.pairs.length} pairs)`);
  console.log(`Columns:    ${train.columns.length}`);
  console.log(`Layers:     ${train.columns.length} → ${ENCODER_CONFIG.encodingDims.join(' → ')}`);
  console.log(`Epochs:     ${epochs}  lr=${learningRate}\n`);

  const model = new AggregationAutoencoder(train.columns.length, ENCODER_CONFIG.encodingDims, {
    columns: train.columns,
  });
  const history = model.fit(toSamples(train), { epochs, learningRate });

  await writeJson(modelPath, model.toJSON());

  console.log('\n✅ Training completed');
  console.log(`   Final train loss: ${history[history.length - 1].toFixed(6)}`);
  if (validation && validation.pairs.length > 0) {
    console.log(`   Validation loss:  ${model.loss(toSamples(validation)).toFixed(6)}`);
  }
  console.log(`   Model: ${modelPath}`);
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
