/**
 * Shared path normalization utilities.
 *
 * Source files, coverage reports and rollups all refer to files by path.
 * These helpers put every path in one form: relative to the analysis root,
 * `/`-separated, without a leading `./`.
 */

import path from 'path';

/**
 * Convert backslashes to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Normalizes a file path for comparison.
 *
 * - Converts backslashes to forward slashes
 * - Converts absolute paths to relative (if within the root)
 * - Removes leading `./` segments and collapses `..`/`.` segments
 *
 * Absolute paths outside the root are returned in posix form unchanged.
 *
 * @param filePath - The path to normalize
 * @param rootDir - The analysis root directory
 * @returns Normalized path
 */
export function normalizeRelativePath(filePath: string, rootDir: string): string {
  const posixPath = toPosixPath(filePath);
  const posixRoot = toPosixPath(rootDir).replace(/\/+$/, '');

  if (path.posix.isAbsolute(posixPath) || /^[A-Za-z]:\//.test(posixPath)) {
    if (posixRoot && posixPath.startsWith(posixRoot + '/')) {
      return path.posix.normalize(posixPath.slice(posixRoot.length + 1));
    }
    return path.posix.normalize(posixPath);
  }

  return path.posix.normalize(posixPath).replace(/^(\.\/)+/, '');
}

/**
 * Directory part of a normalized relative path; `.` for top-level files.
 */
export function parentFolder(relativePath: string): string {
  return path.posix.dirname(relativePath);
}
