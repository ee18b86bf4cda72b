import { glob } from 'glob';
import ignore from 'ignore';
import fs from 'fs/promises';
import path from 'path';
import type { ScanOptions } from './types.js';
import { ALWAYS_IGNORE_PATTERNS } from './constants.js';
import { getSupportedExtensions } from './ast/languages/registry.js';
import { normalizeRelativePath } from './utils/path-matching.js';

/**
 * Load .gitignore from the given paths (first match wins) and return an ignore instance.
 */
async function loadGitignore(...dirs: string[]): Promise<ReturnType<typeof ignore>> {
  for (const dir of dirs) {
    try {
      const content = await fs.readFile(path.join(dir, '.gitignore'), 'utf-8');
      return ignore().add(content);
    } catch {
      // Try next path
    }
  }
  return ignore();
}

/**
 * Glob matching every extension in the language registry.
 */
export function defaultIncludePattern(): string {
  return `**/*.{${getSupportedExtensions().join(',')}}`;
}

/**
 * Scan a source tree for analyzable files.
 *
 * Honours the root .gitignore and the always-ignored directories.
 *
 * @returns Paths relative to `rootDir`, `/`-separated, sorted
 */
export async function scanSourceFiles(options: ScanOptions): Promise<string[]> {
  const { rootDir, includePatterns = [], excludePatterns = [] } = options;

  const ig = await loadGitignore(rootDir);
  ig.add([...ALWAYS_IGNORE_PATTERNS, ...excludePatterns]);

  const patterns = includePatterns.length > 0 ? includePatterns : [defaultIncludePattern()];
  const globIgnorePatterns = [...ALWAYS_IGNORE_PATTERNS, ...excludePatterns];

  const allFiles: string[] = [];
  for (const pattern of patterns) {
    const files = await glob(pattern, {
      cwd: rootDir,
      nodir: true,
      dot: false,
      ignore: globIgnorePatterns,
    });
    allFiles.push(...files);
  }

  const uniqueFiles = Array.from(new Set(allFiles.map(file => normalizeRelativePath(file, rootDir))));

  return uniqueFiles
    .filter(file => !ig.ignores(file))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
