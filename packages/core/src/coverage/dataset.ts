import { normalizeRelativePath } from '@crapscore/parser';
import type { CoverageSource, FileCoverage, LineCoverageEntry } from './types.js';

/**
 * CoverageSource backed by a map built once from loader output.
 *
 * Keys are normalized against `rootDir` on the way in and on lookup, so a
 * report that lists `./src/app.py` or an absolute path under the root
 * matches the source file `src/app.py`. Entries that normalize to the same
 * path are merged; a line executed in any of them counts as executed.
 */
export class InMemoryCoverageDataset implements CoverageSource {
  private readonly files = new Map<string, FileCoverage>();

  constructor(
    entries: Iterable<readonly [string, LineCoverageEntry]> = [],
    private readonly rootDir: string = '',
  ) {
    for (const [filePath, entry] of entries) {
      this.add(filePath, entry);
    }
  }

  static fromRecord(record: Record<string, LineCoverageEntry>, rootDir = ''): InMemoryCoverageDataset {
    return new InMemoryCoverageDataset(Object.entries(record), rootDir);
  }

  private add(filePath: string, entry: LineCoverageEntry): void {
    const key = normalizeRelativePath(filePath, this.rootDir);
    const previous = this.files.get(key);

    const executed = new Set<number>(previous?.executedLines ?? []);
    for (const line of entry.executedLines) executed.add(line);

    const missed = new Set<number>(previous?.missedLines ?? []);
    for (const line of entry.missedLines) missed.add(line);
    for (const line of executed) missed.delete(line);

    this.files.set(key, { executedLines: executed, missedLines: missed });
  }

  lookup(filePath: string): FileCoverage | undefined {
    return this.files.get(normalizeRelativePath(filePath, this.rootDir));
  }

  get size(): number {
    return this.files.size;
  }

  filePaths(): string[] {
    return [...this.files.keys()].sort();
  }
}

/** Dataset with no entries: every function scores with coverage 0.0 */
export const EMPTY_COVERAGE: CoverageSource = new InMemoryCoverageDataset();
