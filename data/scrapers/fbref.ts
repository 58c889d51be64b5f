/**
 * FBRef (Sports Reference) Team Match-Log Scraper
 *
 * Public data: https://fbref.com
 * Scrapes a squad's shooting match log (all competitions): goals for/against,
 * shots, shots on target, average shot distance, free-kick shots, penalties.
 *
 * The HTTP client is created per scraping session and passed in explicitly.
 */

import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import type { AppConfig } from '../../src/config.js';
import type { TeamMatchRecord } from '../../src/types/index.js';
import { DEFAULT_FORM_WINDOW } from '../../src/config.js';
import { parseDate } from '../observations.js';
import { isBeforeDay } from '../../ml/decay.js';

export interface SquadRef {
  name: string;     // team name used as entity id, e.g. "Arsenal"
  squadId: string;  // FBRef squad id, e.g. "18bb7c10"
}

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * HTTP session for one scraping run
 */
export function createFbrefClient(config: Pick<AppConfig, 'FBREF_BASE_URL' | 'HTTP_TIMEOUT_MS'>): AxiosInstance {
  return axios.create({
    baseURL: config.FBREF_BASE_URL,
    timeout: config.HTTP_TIMEOUT_MS,
    headers: { 'User-Agent': USER_AGENT },
    responseType: 'text',
  });
}

export function matchLogPath(squadId: string): string {
  return `/${squadId}/matchlogs/all_comps/shooting/`;
}

/**
 * Fetch with retry on DNS failures and 5xx responses
 */
export async function fetchWithRetry(
  client: AxiosInstance,
  url: string,
  maxAttempts = 3,
  baseDelayMs = 2000,
): Promise<string> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const response = await client.get<string>(url);
      return response.data;
    } catch (error) {
      const isLastAttempt = attempt === maxAttempts;
      if (!isLastAttempt && isTransient(error)) {
        const delay = baseDelayMs * Math.pow(2, attempt - 1);
        console.log(`    [retry ${attempt}/${maxAttempts}] waiting ${delay}ms...`);
        await sleep(delay);
        continue;
      }
      throw error;
    }
  }
  throw new Error('All retries failed');
}

function isTransient(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (error.code === 'ENOTFOUND' || error.code === 'ECONNRESET' || error.code === 'ECONNABORTED') return true;
  return (error.response?.status ?? 0) >= 500;
}

/**
 * Parse the "matchlogs_for" table. Fixtures without a result are skipped.
 */
export function parseMatchLogs(
  html: string,
  team: string,
  scrapeDate: Date = new Date(),
): TeamMatchRecord[] {
  const $ = cheerio.load(html);
  const rows = $('#matchlogs_for tbody tr');
  const records: TeamMatchRecord[] = [];

  if (rows.length === 0) {
    console.log(`    [warn] No match log table for ${team}`);
    return [];
  }

  rows.each((_, row) => {
    const $row = $(row);
    if ($row.hasClass('thead') || $row.hasClass('spacer')) return;

    const cell = (stat: string) => $row.find(`[data-stat="${stat}"]`).first().text().trim();

    const date = parseDate(cell('date'));
    const gf = parseInt(cell('goals_for'), 10);
    const ga = parseInt(cell('goals_against'), 10);
    if (isNaN(date.getTime()) || isNaN(gf) || isNaN(ga)) return;

    const opponent = cell('opponent');
    const leagueName = cell('comp') || 'Unknown';
    const day = date.toISOString().slice(0, 10).replace(/-/g, '');

    records.push({
      matchId: `${day}_${team}_${opponent}`,
      date,
      team,
      opponent,
      gf,
      ga,
      sh: optionalNum(cell('shots')),
      sot: optionalNum(cell('shots_on_target')),
      dist: optionalNum(cell('average_shot_distance')),
      fk: optionalNum(cell('shots_free_kicks')),
      pk: optionalNum(cell('pens_made')),
      pkatt: optionalNum(cell('pens_att')),
      leagueId: leagueName.toLowerCase().replace(/\s+/g, '_'),
      leagueName,
      scrapeDate,
    });
  });

  return records;
}

/**
 * The `window` most recent matches played strictly before `target`, newest first
 */
export function recentMatchesBefore(
  records: readonly TeamMatchRecord[],
  target: Date,
  window: number = DEFAULT_FORM_WINDOW,
): TeamMatchRecord[] {
  return records
    .filter(m => isBeforeDay(m.date, target))
    .sort((a, b) => b.date.getTime() - a.date.getTime())
    .slice(0, Math.max(0, window));
}

/**
 * Most recent `window` completed matches of one squad before `target`
 */
export async function fetchTeamMatchLogs(
  client: AxiosInstance,
  squad: SquadRef,
  window: number = DEFAULT_FORM_WINDOW,
  target: Date = new Date(),
): Promise<TeamMatchRecord[]> {
  console.log(`  [scrape] ${squad.name} (${squad.squadId})`);
  const html = await fetchWithRetry(client, matchLogPath(squad.squadId));
  const matches = recentMatchesBefore(parseMatchLogs(html, squad.name), target, window);
  console.log(`  [ok] ${squad.name}: ${matches.length} matches`);
  return matches;
}

/**
 * Scrape several squads; a failure on one squad is logged and skipped
 */
export async function scrapeTeams(
  client: AxiosInstance,
  squads: readonly SquadRef[],
  window: number = DEFAULT_FORM_WINDOW,
  delayMs = 2000,
  target: Date = new Date(),
): Promise<TeamMatchRecord[]> {
  const all: TeamMatchRecord[] = [];

  for (let i = 0; i < squads.length; i++) {
    const squad = squads[i];
    console.log(`[${i + 1}/${squads.length}] Scraping data for ${squad.name}...`);

    try {
      all.push(...await fetchTeamMatchLogs(client, squad, window, target));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`  [error] ${squad.name}: ${message}`);
    }

    // Rate limit: be respectful
    if (i < squads.length - 1 && delayMs > 0) await sleep(delayMs);
  }

  console.log(`\nTotal: ${all.length} team matches`);
  return all;
}

function optionalNum(v: string): number | undefined {
  if (v === '') return undefined;
  const n = Number(v);
  return isNaN(n) ? undefined : n;
}

function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}
