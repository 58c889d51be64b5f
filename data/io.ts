/**
 * File helpers shared by the scripts
 */

import { createWriteStream } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';

export async function readJson(filepath: string): Promise<unknown> {
  const content = await readFile(filepath, 'utf-8');
  return JSON.parse(content);
}

/**
 * Write an array as JSON one element per line (streamed, so large datasets
 * do not hit the string length limit)
 */
export async function writeJsonArray(filepath: string, items: readonly unknown[]): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });
  await new Promise<void>((resolve, reject) => {
    const stream = createWriteStream(filepath, { encoding: 'utf-8' });
    stream.on('error', reject);
    stream.write('[\n');
    for (let i = 0; i < items.length; i++) {
      const json = JSON.stringify(items[i]);
      stream.write(i === 0 ? json : ',\n' + json);
    }
    stream.write('\n]');
    stream.end(() => resolve());
  });
}

export async function writeJson(filepath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });
  await writeFile(filepath, JSON.stringify(value, null, 2), 'utf-8');
}

/**
 * Render rows as CSV with the given header order
 */
export function toCsv(rows: readonly Record<string, unknown>[], headers: readonly string[]): string {
  const lines = [headers.join(',')];
  for (const row of rows) {
    lines.push(headers.map(h => csvCell(row[h])).join(','));
  }
  return lines.join('\n');
}

export async function writeCsv(
  filepath: string,
  rows: readonly Record<string, unknown>[],
  headers: readonly string[],
): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });
  await writeFile(filepath, toCsv(rows, headers), 'utf-8');
}

function csvCell(val: unknown): string {
  if (val === null || val === undefined) return '';
  if (typeof val === 'number') return Number.isFinite(val) ? String(val) : '';
  if (val instanceof Date) return val.toISOString().slice(0, 10);
  if (typeof val === 'object') return `"${JSON.stringify(val).replace(/"/g, '""')}"`;
  const s = String(val);
  if (s.includes(',') || s.includes('"') || s.includes('\n')) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}
