#!/usr/bin/env tsx
/**
 * Turn raw player match-stat rows into a per-minute observation table.
 *
 * Usage:
 *   tsx scripts/preprocess-players.ts
 *   tsx scripts/preprocess-players.ts --input data/raw/players.csv --output data/processed/player_stats.csv
 */

import 'dotenv/config';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { loadConfig } from '../src/config.js';
import { preprocessPlayerStats } from '../data/preprocess-players.js';
import { writeCsv, writeJsonArray } from '../data/io.js';

const __dirname = join(fileURLToPath(import.meta.url), '..');

async function main() {
  console.log('=== form-latents - Preprocess Player Stats ===\n');

  const config = loadConfig();
  const dataDir = resolve(__dirname, '..', config.DATA_DIR);

  let inputPath = join(dataDir, 'raw', 'players.csv');
  let outputPath = join(dataDir, 'processed', 'player_stats.csv');

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--input' && args[i + 1]) {
      inputPath = resolve(args[++i]);
    }
    if (args[i] === '--output' && args[i + 1]) {
      outputPath = resolve(args[++i]);
    }
  }

  console.log(`Input:  ${inputPath}`);
  console.log(`Output: ${outputPath}\n`);

  const content = await readFile(inputPath, 'utf-8');
  const records: Record<string, string>[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (records.length === 0) {
    console.error('No player rows found.');
    process.exit(1);
  }

  const { rows, ratings } = preprocessPlayerStats(records);

  const headers: string[] = ['Player_ID', 'Date'];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }

  await writeCsv(outputPath, rows, headers);
  const ratingsPath = join(dataDir, 'processed', 'player_ratings.json');
  await writeJsonArray(ratingsPath, ratings);

  console.log(`\n✅ ${rows.length} rows, ${headers.length - 2} columns → ${outputPath}`);
  console.log(`   ${ratings.length} ratings → ${ratingsPath}`);
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
