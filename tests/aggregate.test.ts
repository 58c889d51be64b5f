import { describe, it, expect } from 'vitest';
import { aggregate, featureColumns } from '../ml/aggregate.js';
import { day, row } from './helpers.js';

describe('aggregate', () => {
  const history = [
    row('E', '2024-01-01', { goals: 1.0 }),
    row('E', '2024-01-08', { goals: 3.0 }),
  ];

  it('computes the decayed weighted mean', () => {
    const result = aggregate(history, day('2024-01-15'), { alpha: 0.1 });

    // (e^-1.4 * 1 + e^-0.7 * 3) / (e^-1.4 + e^-0.7)
    expect(result?.features['goals']).toBeCloseTo(2.33638, 5);
    expect(result?.totalWeight).toBeCloseTo(Math.exp(-1.4) + Math.exp(-0.7), 12);
    expect(result?.rowsUsed).toBe(2);
    expect(result?.entityId).toBe('E');
    expect(result?.columns).toEqual(['goals']);
  });

  it('reproduces a single history row exactly, whatever its weight', () => {
    const single = [row('P', '2023-06-01', { goals: 0.1234567, xg: 0.3 })];
    const result = aggregate(single, day('2024-01-15'), { alpha: 0.1 });

    expect(result?.features).toEqual({ goals: 0.1234567, xg: 0.3 });
  });

  it('ignores rows on or after the cutoff day', () => {
    const cutoff = day('2024-01-15');
    const leaked = [
      ...history,
      row('E', '2024-01-15', { goals: 100 }),
      row('E', '2024-02-01', { goals: -50 }),
    ];

    expect(aggregate(leaked, cutoff)).toEqual(aggregate(history, cutoff));
  });

  it('returns null when nothing precedes the cutoff', () => {
    expect(aggregate([], day('2024-01-15'))).toBeNull();
    expect(aggregate([row('F', '2024-01-15', { goals: 2 })], day('2024-01-15'))).toBeNull();
  });

  it('is a pure function of its inputs', () => {
    const cutoff = day('2024-01-15');
    const frozen = history.map(r => Object.freeze({ ...r, values: Object.freeze({ ...r.values }) }));
    const first = aggregate(frozen, cutoff);
    const second = aggregate(frozen, cutoff);

    expect(second).toEqual(first);
    expect(frozen.map(r => Object.keys(r.values))).toEqual([['goals'], ['goals']]);
  });

  it('never treats reserved bookkeeping names as features', () => {
    const rows = [row('P', '2024-01-10', { age: 24, weight: 71, goals: 1 })];
    const result = aggregate(rows, day('2024-01-15'));

    expect(result?.columns).toEqual(['goals']);
    expect(featureColumns(rows)).toEqual(['goals']);
  });

  it('keeps the requested column order and omits columns without data', () => {
    const rows = [row('P', '2024-01-10', { goals: 1, xg: 0.5 })];
    const result = aggregate(rows, day('2024-01-15'), { columns: ['xg', 'dist', 'goals'] });

    expect(result?.columns).toEqual(['xg', 'goals']);
    expect(result?.features).toEqual({ xg: 0.5, goals: 1 });
  });

  describe('missing-value policies', () => {
    const rows = [
      row('P', '2024-01-14', { goals: 2, xg: NaN }),
      row('P', '2024-01-13', { goals: 4, xg: 1 }),
    ];
    const cutoff = day('2024-01-15');

    it('drop-cell excludes only the bad cell', () => {
      const result = aggregate(rows, cutoff, { alpha: 0.1, missing: 'drop-cell' });

      expect(result?.features['xg']).toBe(1);
      expect(result?.features['goals']).toBeCloseTo(2.950042, 6);
      expect(result?.rowsUsed).toBe(2);
    });

    it('drop-row excludes the whole row', () => {
      const result = aggregate(rows, cutoff, { alpha: 0.1, missing: 'drop-row' });

      expect(result?.features).toEqual({ goals: 4, xg: 1 });
      expect(result?.rowsUsed).toBe(1);
    });

    it('fill-zero counts the bad cell as 0', () => {
      const result = aggregate(rows, cutoff, { alpha: 0.1, missing: 'fill-zero' });

      expect(result?.features['xg']).toBeCloseTo(0.475021, 6);
    });

    it('drop-row returns null when every row has a bad cell', () => {
      const bad = [row('P', '2024-01-14', { goals: Infinity })];
      expect(aggregate(bad, cutoff, { missing: 'drop-row' })).toBeNull();
    });
  });

  it('returns null when no history row has a finite requested cell', () => {
    const unusable = [row('P', '2024-01-10', { goals: NaN, xg: Infinity })];

    expect(aggregate(unusable, day('2024-01-15'))).toBeNull();
    expect(aggregate(unusable, day('2024-01-15'), { missing: 'fill-zero' })).toBeNull();
  });

  it('returns null when the history has none of the requested columns', () => {
    const rows = [row('P', '2024-01-10', { goals: 1 })];
    expect(aggregate(rows, day('2024-01-15'), { columns: ['xg', 'dist'] })).toBeNull();
  });

  it('counts only rows with a usable cell', () => {
    const rows = [
      row('P', '2024-01-14', { goals: NaN }),
      row('P', '2024-01-13', { goals: 4 }),
    ];
    const result = aggregate(rows, day('2024-01-15'), { alpha: 0.1 });

    expect(result?.rowsUsed).toBe(1);
    expect(result?.totalWeight).toBe(Math.exp(-0.2));
    expect(result?.features).toEqual({ goals: 4 });
  });

  it('returns null when every weight underflows to zero', () => {
    const ancient = [row('P', '1900-01-01', { goals: 1 })];
    expect(aggregate(ancient, day('2024-01-15'), { alpha: 50 })).toBeNull();
  });

  it('rejects rows from several entities', () => {
    const mixed = [row('A', '2024-01-01', { goals: 1 }), row('B', '2024-01-02', { goals: 2 })];
    expect(() => aggregate(mixed, day('2024-01-15'))).toThrow(/single entity/);
  });

  it('rejects an invalid alpha or cutoff', () => {
    expect(() => aggregate(history, day('2024-01-15'), { alpha: 0 })).toThrow(RangeError);
    expect(() => aggregate(history, new Date(NaN))).toThrow(RangeError);
  });
});
