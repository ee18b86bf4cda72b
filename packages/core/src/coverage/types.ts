/**
 * Line-level coverage facts for one file.
 *
 * Lines in neither set are not executable (blank lines, comments,
 * declarations the measuring tool does not count).
 */
export interface FileCoverage {
  readonly executedLines: ReadonlySet<number>;
  readonly missedLines: ReadonlySet<number>;
}

/**
 * Read-only view of a coverage dataset, keyed by root-relative path.
 */
export interface CoverageSource {
  lookup(filePath: string): FileCoverage | undefined;
}

/** Raw per-file line lists, as loaders produce them */
export interface LineCoverageEntry {
  executedLines: Iterable<number>;
  missedLines: Iterable<number>;
}
