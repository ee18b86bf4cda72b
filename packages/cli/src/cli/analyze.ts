import chalk from 'chalk';
import path from 'path';
import { analyzeProject, createConsoleLogger, formatReport, OUTPUT_FORMATS } from '@crapscore/core';
import type { OutputFormat } from '@crapscore/core';
import { TaskSpinner, formatDuration, formatFileCount, handleCommandError } from './utils.js';

export interface AnalyzeCommandOptions {
  coverage?: string;
  threshold?: number;
  topN?: number;
  format: string;
  include?: string[];
  exclude?: string[];
  concurrency?: number;
  failOnThreshold?: boolean;
  verbose?: boolean;
}

/** Exit code when --fail-on-threshold trips */
export const EXIT_THRESHOLD_EXCEEDED = 1;
/** Exit code for invalid input or a failed run */
export const EXIT_ERROR = 2;

function isOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some(known => known === format);
}

/**
 * Score every function under `root` and print the rankings.
 */
export async function analyzeCommand(root: string | undefined, options: AnalyzeCommandOptions): Promise<void> {
  const rootDir = path.resolve(root ?? process.cwd());
  const verbose = options.verbose ?? false;

  if (!isOutputFormat(options.format)) {
    console.error(
      chalk.red(`Error: Invalid --format value "${options.format}". Must be one of: ${OUTPUT_FORMATS.join(', ')}`),
    );
    process.exitCode = EXIT_ERROR;
    return;
  }
  const format = options.format;

  const spinner = new TaskSpinner(`Analyzing ${rootDir}`);
  const startedAt = Date.now();

  try {
    const result = await analyzeProject(rootDir, {
      coverage: options.coverage,
      threshold: options.threshold,
      topN: options.topN,
      include: options.include,
      exclude: options.exclude,
      concurrency: options.concurrency,
      requireCoverage: options.coverage !== undefined,
      logger: createConsoleLogger({ verbose }),
    });

    spinner.succeed(
      `Analyzed ${formatFileCount(result.summary.filesAnalyzed)} in ${formatDuration(Date.now() - startedAt)}`,
    );
    console.log(formatReport(result, format));

    // Exit code for CI integration
    if (options.failOnThreshold && result.summary.functionsAboveThreshold > 0) {
      process.exitCode = EXIT_THRESHOLD_EXCEEDED;
    }
  } catch (error) {
    spinner.fail('Analysis failed');
    handleCommandError(error, verbose);
    process.exitCode = EXIT_ERROR;
  }
}
