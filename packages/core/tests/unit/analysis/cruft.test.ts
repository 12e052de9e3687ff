import { describe, expect, it } from 'vitest';
import { cruftEntry, cruftRank, formatPercentage, score } from '../../../src/analysis/cruft.js';

describe('score', () => {
  it('is zero for an empty population', () => {
    expect(score(0, 0)).toBe(0);
    expect(score({ size: 0 }, { size: 0 })).toBe(0);
  });

  it('is the subset share of the population', () => {
    expect(score(1, 4)).toBe(0.25);
    expect(score(4, 4)).toBe(1);
  });

  it('clamps to the unit interval', () => {
    expect(score(5, 4)).toBe(1);
  });
});

describe('cruftRank', () => {
  it('maps ratios to deciles', () => {
    expect(cruftRank(0)).toEqual({ index: 0, range: '0-9%', label: 'Pristine' });
    expect(cruftRank(2 / 3)).toEqual({ index: 6, range: '60-69%', label: 'Grimy' });
    expect(cruftRank(0.999)).toEqual({ index: 9, range: '90-99%', label: 'Derelict' });
  });

  it('reserves the last rank for a ratio of one', () => {
    expect(cruftRank(1)).toEqual({ index: 10, range: '100%', label: 'Total cruft' });
  });
});

describe('cruftEntry', () => {
  it('records counts alongside the score', () => {
    expect(cruftEntry(2, 3)).toEqual({
      kind: 'cruft',
      score: { ratio: 2 / 3, rank: { index: 6, range: '60-69%', label: 'Grimy' } },
      count: 2,
      population: 3,
    });
  });
});

describe('formatPercentage', () => {
  it('rounds to two decimals', () => {
    expect(formatPercentage(2 / 3)).toBe('66.67%');
    expect(formatPercentage(0)).toBe('0.00%');
    expect(formatPercentage(1)).toBe('100.00%');
  });
});
