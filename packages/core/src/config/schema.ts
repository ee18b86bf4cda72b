import { z } from 'zod';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_COVERAGE_REPORT,
  DEFAULT_THRESHOLD,
  DEFAULT_TOP_N,
} from '../constants.js';

/**
 * Options `analyze` needs. Validated before any file is touched.
 */
export const analyzeOptionsSchema = z.object({
  threshold: z.number().finite().nonnegative(),
  topN: z.number().int().nonnegative(),
});

/**
 * `.crapscore.yml`
 *
 * ```yaml
 * threshold: 25
 * topN: 10
 * coverage: reports/coverage.json
 * include:
 *   - "src/**\/*.py"
 * exclude:
 *   - "src/legacy/**"
 * ```
 */
export const crapScoreConfigSchema = z
  .object({
    threshold: analyzeOptionsSchema.shape.threshold.default(DEFAULT_THRESHOLD),
    topN: analyzeOptionsSchema.shape.topN.default(DEFAULT_TOP_N),
    concurrency: z.number().int().min(1).default(DEFAULT_CONCURRENCY),
    coverage: z.string().min(1).default(DEFAULT_COVERAGE_REPORT),
    include: z.array(z.string()).default([]),
    exclude: z.array(z.string()).default([]),
  })
  .strict();

export type CrapScoreConfig = z.infer<typeof crapScoreConfigSchema>;

/** Values a caller (the CLI) may set on top of the file */
export type ConfigOverrides = Partial<CrapScoreConfig>;

export const defaultConfig: CrapScoreConfig = crapScoreConfigSchema.parse({});

/**
 * Flatten zod issues to `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}
