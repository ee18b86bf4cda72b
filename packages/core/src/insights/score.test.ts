import { describe, it, expect } from 'vitest';
import { crapScore, riskBand } from './score.js';

describe('crapScore', () => {
  it('equals complexity at full coverage', () => {
    expect(crapScore(1, 1)).toBe(1);
    expect(crapScore(12, 1)).toBe(12);
  });

  it('equals complexity squared plus complexity at zero coverage', () => {
    expect(crapScore(10, 0)).toBe(110);
    expect(crapScore(1, 0)).toBe(2);
  });

  it('cubes the uncovered fraction', () => {
    // 4² × 0.5³ + 4
    expect(crapScore(4, 0.5)).toBe(6);
  });

  it('never increases as coverage rises', () => {
    for (const complexity of [1, 3, 8, 25]) {
      let previous = Infinity;
      for (let step = 0; step <= 20; step++) {
        const score = crapScore(complexity, step / 20);
        expect(score).toBeLessThanOrEqual(previous);
        expect(score).toBeGreaterThanOrEqual(complexity);
        previous = score;
      }
    }
  });
});

describe('riskBand', () => {
  it('uses strict upper bounds at 30 and 15', () => {
    expect(riskBand(30.01)).toBe('high');
    expect(riskBand(30)).toBe('moderate');
    expect(riskBand(15.5)).toBe('moderate');
    expect(riskBand(15)).toBe('low');
    expect(riskBand(1)).toBe('low');
  });
});
