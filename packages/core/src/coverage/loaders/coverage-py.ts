import { z } from 'zod';
import type { LineCoverageEntry } from '../types.js';

/**
 * Shape of `coverage json` output. Only the per-file line lists are read;
 * `meta`, `totals` and per-file `summary` blocks are ignored.
 */
const coveragePyFileSchema = z.object({
  executed_lines: z.array(z.number().int().positive()),
  missing_lines: z.array(z.number().int().positive()),
});

export const coveragePyReportSchema = z.object({
  files: z.record(z.string(), coveragePyFileSchema),
});

export type CoveragePyReport = z.infer<typeof coveragePyReportSchema>;

export function coveragePyEntries(report: CoveragePyReport): Array<[string, LineCoverageEntry]> {
  return Object.entries(report.files).map(([filePath, file]) => [
    filePath,
    { executedLines: file.executed_lines, missedLines: file.missing_lines },
  ]);
}
