import type { AnalysisResult } from '../../types.js';

/**
 * Machine-readable report: the whole result, pretty-printed.
 */
export function formatJsonReport(result: AnalysisResult): string {
  return JSON.stringify(result, null, 2);
}
