import type { FunctionKind } from '@crapscore/parser';

/**
 * One file handed to the analysis: its path relative to the analysis root
 * and its source text.
 */
export interface SourceFile {
  path: string;
  content: string;
}

/**
 * How a function's coverage ratio was obtained.
 * - measured: the span contains executable lines
 * - no-executable-lines: the file was measured but the span has nothing to run (ratio 1.0)
 * - no-data: the file has no coverage entry, or an empty one (ratio 0.0)
 */
export type CoverageStatus = 'measured' | 'no-executable-lines' | 'no-data';

/**
 * One scored function. Identity is (filePath, qualifiedName, lineStart).
 */
export interface FunctionRecord {
  readonly qualifiedName: string;
  readonly name: string;
  readonly kind: FunctionKind;
  readonly filePath: string;
  readonly lineStart: number;
  readonly lineEnd: number;
  readonly complexity: number;
  readonly coverageRatio: number;
  readonly coverageStatus: CoverageStatus;
  readonly score: number;
}

export interface FileRecord {
  readonly filePath: string;
  readonly maxScore: number;
  readonly countAboveThreshold: number;
  readonly functionCount: number;
}

export interface FolderRecord {
  readonly folderPath: string;
  /** Max over every file beneath this folder, at any depth */
  readonly maxScore: number;
  readonly countAboveThreshold: number;
  readonly fileCount: number;
}

export interface Rankings {
  readonly functions: readonly FunctionRecord[];
  readonly files: readonly FileRecord[];
  readonly folders: readonly FolderRecord[];
}

export interface ParseFailureDiagnostic {
  readonly kind: 'parse-failure';
  readonly filePath: string;
  readonly message: string;
  readonly line?: number;
  readonly column?: number;
}

export interface ReadFailureDiagnostic {
  readonly kind: 'read-failure';
  readonly filePath: string;
  readonly message: string;
}

/**
 * Not an error: the file's functions were scored with coverage 0.0.
 * Separates "never executed" from "executed with zero coverage".
 */
export interface MissingCoverageDiagnostic {
  readonly kind: 'missing-coverage';
  readonly filePath: string;
  readonly message: string;
}

export type AnalysisDiagnostic =
  | ParseFailureDiagnostic
  | ReadFailureDiagnostic
  | MissingCoverageDiagnostic;

export interface AnalyzeOptions {
  /** Score at or above which a function counts as risky */
  threshold: number;
  /** Rows kept per ranking; 0 keeps everything */
  topN: number;
}

export interface AnalysisSummary {
  readonly filesAnalyzed: number;
  readonly functionsAnalyzed: number;
  /** Counted before truncation */
  readonly functionsAboveThreshold: number;
  readonly threshold: number;
  readonly topN: number;
}

export interface AnalysisResult extends Rankings {
  readonly diagnostics: readonly AnalysisDiagnostic[];
  readonly summary: AnalysisSummary;
}
