import type { AnalysisResult } from '../../types.js';
import { formatTextReport } from './text.js';
import { formatJsonReport } from './json.js';

export const OUTPUT_FORMATS = ['text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Format an analysis result in the specified format
 */
export function formatReport(result: AnalysisResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJsonReport(result);
    case 'text':
    default:
      return formatTextReport(result);
  }
}

export { formatTextReport, formatJsonReport };
