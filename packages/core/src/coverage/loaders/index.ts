import fs from 'fs/promises';
import path from 'path';
import { CoverageReportError, getErrorMessage } from '../../errors/index.js';
import { CrapScoreErrorCode } from '../../errors/codes.js';
import { InMemoryCoverageDataset } from '../dataset.js';
import type { LineCoverageEntry } from '../types.js';
import { coveragePyEntries, coveragePyReportSchema } from './coverage-py.js';
import { istanbulEntries, istanbulReportSchema } from './istanbul.js';

export type CoverageFormat = 'coverage-py' | 'istanbul';

export interface ParsedCoverageReport {
  format: CoverageFormat;
  entries: Array<[string, LineCoverageEntry]>;
}

export interface LoadedCoverage {
  format: CoverageFormat;
  reportPath: string;
  dataset: InMemoryCoverageDataset;
}

/**
 * Detect the report format from the document's shape and extract per-file
 * line lists. Returns null when the document matches no known format.
 */
export function parseCoverageDocument(document: unknown): ParsedCoverageReport | null {
  const coveragePy = coveragePyReportSchema.safeParse(document);
  if (coveragePy.success) {
    return { format: 'coverage-py', entries: coveragePyEntries(coveragePy.data) };
  }

  const istanbul = istanbulReportSchema.safeParse(document);
  if (istanbul.success) {
    return { format: 'istanbul', entries: istanbulEntries(istanbul.data) };
  }

  return null;
}

async function readReport(reportPath: string): Promise<string> {
  try {
    return await fs.readFile(reportPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new CoverageReportError(
        `Coverage report not found: ${reportPath}`,
        CrapScoreErrorCode.COVERAGE_NOT_FOUND,
        reportPath,
      );
    }
    throw new CoverageReportError(
      `Failed to read coverage report ${reportPath}: ${getErrorMessage(error)}`,
      CrapScoreErrorCode.COVERAGE_INVALID,
      reportPath,
    );
  }
}

/**
 * Load a coverage.py JSON or Istanbul `coverage-final.json` report.
 *
 * `reportPath` is resolved against `rootDir`; file keys in the report are
 * normalized against `rootDir` so they match scanned source paths.
 *
 * @throws CoverageReportError with COVERAGE_NOT_FOUND or COVERAGE_INVALID
 */
export async function loadCoverageReport(reportPath: string, rootDir: string): Promise<LoadedCoverage> {
  const absoluteRoot = path.resolve(rootDir);
  const absolutePath = path.resolve(absoluteRoot, reportPath);
  const raw = await readReport(absolutePath);

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new CoverageReportError(
      `Coverage report is not valid JSON: ${absolutePath}`,
      CrapScoreErrorCode.COVERAGE_INVALID,
      absolutePath,
      { cause: getErrorMessage(error) },
    );
  }

  const parsed = parseCoverageDocument(document);
  if (!parsed) {
    throw new CoverageReportError(
      `Unrecognized coverage report format: ${absolutePath} (expected coverage.py JSON or Istanbul coverage-final.json)`,
      CrapScoreErrorCode.COVERAGE_INVALID,
      absolutePath,
    );
  }

  return {
    format: parsed.format,
    reportPath: absolutePath,
    dataset: new InMemoryCoverageDataset(parsed.entries, absoluteRoot),
  };
}
