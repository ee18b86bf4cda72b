/**
 * Kind of analyzable unit.
 * - method: defined directly inside a class body
 * - lambda: a Python `lambda` expression
 * - function: everything else (declarations, closures, arrow functions)
 */
export type FunctionKind = 'function' | 'method' | 'lambda';

/**
 * Structural facts about one function, before coverage is known.
 */
export interface FunctionSkeleton {
  /** Dotted path through enclosing classes and functions, e.g. `Cart.total.<lambda>` */
  qualifiedName: string;
  /** Bare name of the unit itself */
  name: string;
  kind: FunctionKind;
  /** 1-indexed, inclusive */
  lineStart: number;
  /** 1-indexed, inclusive */
  lineEnd: number;
  /** 1 + decision points in the unit's own body */
  complexity: number;
}

/**
 * A file whose source could not be structurally analyzed.
 */
export interface ParseFailure {
  filePath: string;
  message: string;
  /** 1-indexed line of the first syntax error, when one was located */
  line?: number;
  /** 1-indexed column of the first syntax error, when one was located */
  column?: number;
}

export interface ScanOptions {
  rootDir: string;
  includePatterns?: string[];
  excludePatterns?: string[];
}
