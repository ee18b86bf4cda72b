import { RISK_BAND_HIGH, RISK_BAND_MODERATE } from '../constants.js';

export type RiskBand = 'high' | 'moderate' | 'low';

/**
 * CRAP = cc² × (1 − cov)³ + cc
 *
 * Equals `complexity` at full coverage and `complexity² + complexity` at none.
 *
 * @param complexity - cyclomatic complexity, ≥ 1
 * @param coverageRatio - fraction of executable lines that ran, in [0, 1]
 */
export function crapScore(complexity: number, coverageRatio: number): number {
  const uncovered = 1 - coverageRatio;
  return complexity * complexity * uncovered * uncovered * uncovered + complexity;
}

/**
 * Display band for a score: above 30 is high, above 15 moderate.
 */
export function riskBand(score: number): RiskBand {
  if (score > RISK_BAND_HIGH) return 'high';
  if (score > RISK_BAND_MODERATE) return 'moderate';
  return 'low';
}
