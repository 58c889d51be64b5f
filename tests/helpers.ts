import type { ObservationRow } from '../src/types/index.js';
import { parseDate } from '../data/observations.js';

export function row(entityId: string, date: string, values: Record<string, number>): ObservationRow {
  return { entityId, date: parseDate(date), values };
}

export function day(date: string): Date {
  return parseDate(date);
}
