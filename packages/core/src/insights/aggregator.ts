import { parentFolder } from '@crapscore/parser';
import type { FileRecord, FolderRecord, FunctionRecord, Rankings } from '../types.js';

export interface AggregateOptions {
  threshold: number;
  /** 0 keeps every row */
  topN: number;
}

/** Code-unit ordering; locale collation would make output host-dependent */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareFunctions(a: FunctionRecord, b: FunctionRecord): number {
  return (
    b.score - a.score ||
    b.complexity - a.complexity ||
    compareStrings(a.qualifiedName, b.qualifiedName) ||
    compareStrings(a.filePath, b.filePath) ||
    a.lineStart - b.lineStart
  );
}

export function compareFiles(a: FileRecord, b: FileRecord): number {
  return (
    b.maxScore - a.maxScore ||
    b.countAboveThreshold - a.countAboveThreshold ||
    compareStrings(a.filePath, b.filePath)
  );
}

export function compareFolders(a: FolderRecord, b: FolderRecord): number {
  return (
    b.maxScore - a.maxScore ||
    b.countAboveThreshold - a.countAboveThreshold ||
    compareStrings(a.folderPath, b.folderPath)
  );
}

export function truncate<T>(rows: readonly T[], topN: number): T[] {
  return topN > 0 ? rows.slice(0, topN) : [...rows];
}

/**
 * Every directory a file sits beneath, nearest first, ending with the root.
 *
 * `src/api/routes.py` → `['src/api', 'src', '.']`; `setup.py` → `['.']`.
 */
export function ancestorFolders(filePath: string): string[] {
  const folders: string[] = [];
  let dir = parentFolder(filePath);
  while (dir !== '.' && dir !== '/' && dir !== '') {
    folders.push(dir);
    dir = parentFolder(dir);
  }
  folders.push('.');
  return folders;
}

/**
 * Fold function records into per-file rollups (untruncated, unsorted).
 */
export function rollUpFiles(records: readonly FunctionRecord[], threshold: number): FileRecord[] {
  const byFile = new Map<string, { maxScore: number; countAboveThreshold: number; functionCount: number }>();

  for (const record of records) {
    const acc = byFile.get(record.filePath) ?? { maxScore: -Infinity, countAboveThreshold: 0, functionCount: 0 };
    acc.maxScore = Math.max(acc.maxScore, record.score);
    if (record.score >= threshold) acc.countAboveThreshold++;
    acc.functionCount++;
    byFile.set(record.filePath, acc);
  }

  return [...byFile].map(([filePath, acc]) => Object.freeze({ filePath, ...acc }));
}

/**
 * Fold file rollups into every ancestor folder (untruncated, unsorted).
 */
export function rollUpFolders(files: readonly FileRecord[]): FolderRecord[] {
  const byFolder = new Map<string, { maxScore: number; countAboveThreshold: number; fileCount: number }>();

  for (const file of files) {
    for (const folderPath of ancestorFolders(file.filePath)) {
      const acc = byFolder.get(folderPath) ?? { maxScore: -Infinity, countAboveThreshold: 0, fileCount: 0 };
      acc.maxScore = Math.max(acc.maxScore, file.maxScore);
      acc.countAboveThreshold += file.countAboveThreshold;
      acc.fileCount++;
      byFolder.set(folderPath, acc);
    }
  }

  return [...byFolder].map(([folderPath, acc]) => Object.freeze({ folderPath, ...acc }));
}

/**
 * Rank functions, files and folders.
 *
 * Rollups are computed from the full record set; each ranking is sorted
 * and then truncated on its own, so a file outside the top functions can
 * still lead the file ranking. Input order never affects the result.
 */
export function aggregate(records: readonly FunctionRecord[], options: AggregateOptions): Rankings {
  const { threshold, topN } = options;

  const files = rollUpFiles(records, threshold);
  const folders = rollUpFolders(files);

  return {
    functions: truncate([...records].sort(compareFunctions), topN),
    files: truncate(files.sort(compareFiles), topN),
    folders: truncate(folders.sort(compareFolders), topN),
  };
}
