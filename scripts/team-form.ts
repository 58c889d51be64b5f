#!/usr/bin/env tsx
/**
 * Scrape recent FBRef match logs and summarize each team's form.
 *
 * Usage:
 *   tsx scripts/team-form.ts --teams data/teams.json
 *   tsx scripts/team-form.ts --teams "Arsenal:18bb7c10,Chelsea:cff3d9bb" --matches 5 --date 2024-04-01
 *   tsx scripts/team-form.ts --teams data/teams.json --unweighted
 */

import 'dotenv/config';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadConfig } from '../src/config.js';
import { formatDate, parseDate } from '../data/observations.js';
import { readJson, writeCsv, writeJson, writeJsonArray } from '../data/io.js';
import { createFbrefClient, scrapeTeams, type SquadRef } from '../data/scrapers/fbref.js';
import { preprocessTeamStats } from '../data/preprocess-teams.js';
import { compileTeamRecentForm, summarizeTeamForm } from '../ml/team-form.js';

const __dirname = join(fileURLToPath(import.meta.url), '..');

const SquadListSchema = z.array(z.object({
  name: z.string().min(1),
  squadId: z.string().min(1),
}));

/** "Name:squadId,Name:squadId" or a path to a JSON array of { name, squadId } */
async function loadSquads(arg: string): Promise<SquadRef[]> {
  if (arg.endsWith('.json')) {
    return SquadListSchema.parse(await readJson(resolve(arg)));
  }
  return SquadListSchema.parse(
    arg.split(',').map(entry => {
      const [name, squadId] = entry.split(':').map(s => s.trim());
      return { name, squadId };
    }),
  );
}

async function main() {
  console.log('=== form-latents - Team Form ===\n');

  const config = loadConfig();
  const dataDir = resolve(__dirname, '..', config.DATA_DIR);

  let teamsArg: string | undefined;
  let window = config.FORM_WINDOW;
  let target = new Date();
  const weighted = !process.argv.includes('--unweighted');

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--teams' && args[i + 1]) {
      teamsArg = args[++i];
    } else if (args[i] === '--matches' && args[i + 1]) {
      window = parseInt(args[++i], 10);
    } else if (args[i] === '--date' && args[i + 1]) {
      target = parseDate(args[++i]);
    }
  }

  if (!teamsArg) {
    console.error('Usage: tsx scripts/team-form.ts --teams <teams.json | "Name:squadId,...">');
    process.exit(1);
  }
  if (isNaN(target.getTime())) {
    console.error('Invalid --date (expected YYYY-MM-DD)');
    process.exit(1);
  }
  if (!Number.isInteger(window) || window < 1) {
    console.error('--matches must be a positive integer');
    process.exit(1);
  }

  const squads = await loadSquads(teamsArg);
  console.log(`Teams:   ${squads.length}`);
  console.log(`Window:  ${window} matches before ${formatDate(target)}`);
  console.log(`Weights: ${weighted ? `exp(-${config.DECAY_ALPHA} * days)` : 'uniform'}\n`);

  const client = createFbrefClient(config);
  const raw = await scrapeTeams(client, squads, window, config.REQUEST_DELAY_MS, target);
  if (raw.length === 0) {
    console.error('No match data scraped.');
    process.exit(1);
  }

  const processedDir = join(dataDir, 'processed');
  await writeJsonArray(join(processedDir, 'team_matches.json'), raw);

  const matches = preprocessTeamStats(raw);
  const forms = compileTeamRecentForm(
    matches,
    squads.map(s => s.name),
    target,
    window,
    { weighted, alpha: config.DECAY_ALPHA },
  );

  const day = formatDate(target);
  const analysisPath = join(processedDir, `team_form_analysis_${day}.json`);
  const summaryPath = join(processedDir, `team_form_summary_${day}.csv`);

  await writeJson(analysisPath, forms.map(f => ({ ...f, formDate: day })));
  const summary = summarizeTeamForm(forms);
  await writeCsv(summaryPath, summary, [
    'team', 'points', 'wins', 'draws', 'losses', 'avg_gf', 'avg_ga', 'avg_sh', 'avg_sot',
  ]);

  console.log('\n--- Form table ---');
  for (const row of summary) {
    console.log(
      `  ${row.team.padEnd(24)} ${String(row.points).padStart(3)} pts  ` +
      `${row.wins}W ${row.draws}D ${row.losses}L  gf=${row.avg_gf} ga=${row.avg_ga}`,
    );
  }

  console.log(`\n✅ ${forms.length}/${squads.length} teams`);
  console.log(`   Analysis: ${analysisPath}`);
  console.log(`   Summary:  ${summaryPath}`);
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
