import { z } from 'zod';
import type { LineCoverageEntry } from '../types.js';

const positionSchema = z.object({
  line: z.number().int().positive(),
  column: z.number().int().nullable().optional(),
});

const istanbulFileSchema = z.object({
  path: z.string().optional(),
  statementMap: z.record(
    z.string(),
    z.object({ start: positionSchema, end: positionSchema }),
  ),
  s: z.record(z.string(), z.number()),
});

/** `coverage-final.json`: one entry per file, keyed by (usually absolute) path */
export const istanbulReportSchema = z.record(z.string(), istanbulFileSchema);

export type IstanbulReport = z.infer<typeof istanbulReportSchema>;
type IstanbulFile = z.infer<typeof istanbulFileSchema>;

/**
 * Collapse statement hit counts to lines. A line is executed if any statement
 * starting on it ran, missed if statements start there and none ran.
 */
function toLineCoverage(file: IstanbulFile): LineCoverageEntry {
  const ranByLine = new Map<number, boolean>();

  for (const [id, location] of Object.entries(file.statementMap)) {
    const line = location.start.line;
    const ran = (file.s[id] ?? 0) > 0;
    ranByLine.set(line, (ranByLine.get(line) ?? false) || ran);
  }

  const executedLines: number[] = [];
  const missedLines: number[] = [];
  for (const [line, ran] of ranByLine) {
    (ran ? executedLines : missedLines).push(line);
  }

  return {
    executedLines: executedLines.sort((a, b) => a - b),
    missedLines: missedLines.sort((a, b) => a - b),
  };
}

export function istanbulEntries(report: IstanbulReport): Array<[string, LineCoverageEntry]> {
  return Object.entries(report).map(([key, file]) => [file.path ?? key, toLineCoverage(file)]);
}
