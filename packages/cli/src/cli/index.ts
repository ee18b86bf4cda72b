import { Command, Option } from 'commander';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { DEFAULT_CONCURRENCY, DEFAULT_COVERAGE_REPORT, DEFAULT_THRESHOLD, DEFAULT_TOP_N, OUTPUT_FORMATS } from '@crapscore/core';
import { analyzeCommand } from './analyze.js';
import type { AnalyzeCommandOptions } from './analyze.js';
import { collect, parseNonNegativeInteger, parseNonNegativeNumber, parsePositiveInteger } from './utils.js';

// Get version from package.json dynamically
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const require = createRequire(import.meta.url);

function readVersion(): string {
  // src/cli/ in development, dist/cli/ once built
  for (const candidate of ['../../package.json', '../package.json']) {
    try {
      const packageJson: unknown = require(join(__dirname, candidate));
      if (
        packageJson &&
        typeof packageJson === 'object' &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

export const program = new Command();

program
  .name('crapscore')
  .description('Rank functions by CRAP score: complexity weighed against test coverage')
  .version(readVersion());

program
  .command('analyze')
  .description('Score every function under a source tree')
  .argument('[root]', 'Root directory to analyze (defaults to current directory)')
  .option('-c, --coverage <file>', `Coverage report, relative to root (default: ${DEFAULT_COVERAGE_REPORT})`)
  .option('-t, --threshold <n>', `Score counted as risky (default: ${DEFAULT_THRESHOLD})`, parseNonNegativeNumber)
  .option('-n, --top-n <n>', `Rows per table, 0 for all (default: ${DEFAULT_TOP_N})`, parseNonNegativeInteger)
  .addOption(new Option('-f, --format <type>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
  .option('--include <glob>', 'Only analyze files matching this glob (repeatable)', collect)
  .option('--exclude <glob>', 'Skip files matching this glob (repeatable)', collect)
  .option('--concurrency <n>', `Files read in parallel (default: ${DEFAULT_CONCURRENCY})`, parsePositiveInteger)
  .option('--fail-on-threshold', 'Exit 1 if any function scores at or above the threshold')
  .option('-v, --verbose', 'Show debug logging and error details')
  .action((root: string | undefined, options: AnalyzeCommandOptions) => analyzeCommand(root, options));
