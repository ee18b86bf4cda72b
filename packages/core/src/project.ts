import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import { scanSourceFiles } from '@crapscore/parser';
import { analyze } from './analyze.js';
import { resolveConfig } from './config/loader.js';
import type { ConfigOverrides } from './config/schema.js';
import { EMPTY_COVERAGE } from './coverage/dataset.js';
import { loadCoverageReport } from './coverage/loaders/index.js';
import type { CoverageSource } from './coverage/types.js';
import { CoverageReportError, getErrorMessage, wrapError } from './errors/index.js';
import { CrapScoreErrorCode } from './errors/codes.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { AnalysisResult, ReadFailureDiagnostic, SourceFile } from './types.js';

export interface AnalyzeProjectOptions extends ConfigOverrides {
  logger?: Logger;
  /** Fail when the coverage report is missing instead of scoring everything at 0% */
  requireCoverage?: boolean;
}

export interface ReadSourcesResult {
  sources: SourceFile[];
  failures: ReadFailureDiagnostic[];
}

/**
 * Read root-relative paths with bounded concurrency.
 * Files that fail to read (deleted, permission denied) become diagnostics.
 */
export async function readSourceFiles(
  rootDir: string,
  relativePaths: readonly string[],
  concurrency: number,
): Promise<ReadSourcesResult> {
  const limit = pLimit(concurrency);

  const results = await Promise.all(
    relativePaths.map(relativePath =>
      limit(async (): Promise<SourceFile | ReadFailureDiagnostic> => {
        try {
          const content = await fs.readFile(path.join(rootDir, relativePath), 'utf-8');
          return { path: relativePath, content };
        } catch (error) {
          return { kind: 'read-failure', filePath: relativePath, message: getErrorMessage(error) };
        }
      }),
    ),
  );

  const sources: SourceFile[] = [];
  const failures: ReadFailureDiagnostic[] = [];
  for (const result of results) {
    if ('kind' in result) {
      failures.push(result);
    } else {
      sources.push(result);
    }
  }
  return { sources, failures };
}

async function loadCoverage(
  reportPath: string,
  rootDir: string,
  sources: readonly SourceFile[],
  requireCoverage: boolean,
  logger: Logger,
): Promise<CoverageSource> {
  try {
    const { format, reportPath: loadedPath, dataset } = await loadCoverageReport(reportPath, rootDir);
    logger.debug(`Loaded ${format} coverage for ${dataset.size} files from ${loadedPath}`);
    if (dataset.size > 0 && !sources.some(source => dataset.lookup(source.path) !== undefined)) {
      logger.warning(
        `No entry in ${loadedPath} matches a file under ${rootDir}; ` +
          'report paths must be absolute or relative to the analysis root',
      );
    }
    return dataset;
  } catch (error) {
    if (
      !requireCoverage &&
      error instanceof CoverageReportError &&
      error.code === CrapScoreErrorCode.COVERAGE_NOT_FOUND
    ) {
      logger.warning(`${error.message}; every function is scored as uncovered`);
      return EMPTY_COVERAGE;
    }
    throw error;
  }
}

/**
 * Analyze a source tree on disk.
 *
 * Loads `.crapscore.yml` (overridden by `options`), discovers files, reads
 * them concurrently, loads the coverage report and runs `analyze`.
 *
 * @throws InvalidConfigurationError for invalid config or overrides
 * @throws CoverageReportError for an unreadable or unrecognized report
 */
export async function analyzeProject(
  rootDir: string,
  options: AnalyzeProjectOptions = {},
): Promise<AnalysisResult> {
  const { logger = silentLogger, requireCoverage = false, ...overrides } = options;
  const root = path.resolve(rootDir);
  const config = await resolveConfig(root, overrides);

  const files = await scanSourceFiles({
    rootDir: root,
    includePatterns: config.include,
    excludePatterns: config.exclude,
  }).catch((error: unknown) => {
    throw wrapError(error, `Failed to scan ${root}`, { rootDir: root });
  });
  logger.debug(`Discovered ${files.length} source files under ${root}`);

  const { sources, failures } = await readSourceFiles(root, files, config.concurrency);
  for (const failure of failures) {
    logger.warning(`Could not read ${failure.filePath}: ${failure.message}`);
  }

  const coverage = await loadCoverage(config.coverage, root, sources, requireCoverage, logger);

  const result = analyze(sources, coverage, { threshold: config.threshold, topN: config.topN }, failures);

  for (const diagnostic of result.diagnostics) {
    if (diagnostic.kind === 'parse-failure') {
      logger.warning(`Skipped ${diagnostic.filePath}: ${diagnostic.message}`);
    } else if (diagnostic.kind === 'missing-coverage') {
      logger.debug(`No coverage data for ${diagnostic.filePath}`);
    }
  }

  return result;
}
