import type { CoverageStatus } from '../types.js';
import type { FileCoverage } from './types.js';

export interface LineSpan {
  lineStart: number;
  lineEnd: number;
}

export interface CoverageCorrelation {
  ratio: number;
  status: CoverageStatus;
}

/**
 * A file entry counts as data only if it lists at least one line.
 * An empty entry means the file was registered but never measured.
 */
export function hasCoverageData(coverage: FileCoverage | undefined): coverage is FileCoverage {
  return coverage !== undefined && (coverage.executedLines.size > 0 || coverage.missedLines.size > 0);
}

/**
 * Fraction of the span's executable lines that ran.
 *
 * Lines outside executed ∪ missed are ignored. A span with no executable
 * lines is fully covered; a file without data is not covered at all.
 */
export function correlateCoverage(span: LineSpan, coverage: FileCoverage | undefined): CoverageCorrelation {
  if (!hasCoverageData(coverage)) {
    return { ratio: 0, status: 'no-data' };
  }

  let executed = 0;
  let executable = 0;
  for (let line = span.lineStart; line <= span.lineEnd; line++) {
    if (coverage.executedLines.has(line)) {
      executed++;
      executable++;
    } else if (coverage.missedLines.has(line)) {
      executable++;
    }
  }

  if (executable === 0) {
    return { ratio: 1, status: 'no-executable-lines' };
  }
  return { ratio: executed / executable, status: 'measured' };
}
