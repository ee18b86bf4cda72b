import type Parser from 'tree-sitter';
import type { FunctionTraverser } from '../traversers/types.js';

/**
 * Tree-sitter language grammar type.
 * Using any due to type incompatibility between parser packages and tree-sitter core.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type TreeSitterLanguage = any;

export type SupportedLanguage = 'python' | 'typescript' | 'tsx' | 'javascript';

/**
 * Complete definition for a language supported by complexity extraction.
 *
 * Each supported language has a single definition file that assembles
 * the grammar, the scope traverser and the decision point table.
 */
export interface LanguageDefinition {
  /** Language identifier (e.g., 'typescript', 'python') */
  id: SupportedLanguage;

  /** File extensions without dots (e.g., ['ts', 'mts']) */
  extensions: string[];

  /** Tree-sitter grammar object for parsing */
  grammar: TreeSitterLanguage;

  /** Finds function-like and class-like scopes and names them */
  traverser: FunctionTraverser;

  /** Cyclomatic complexity configuration */
  complexity: {
    /** Node types that always add one path */
    decisionPoints: string[];

    /** Boolean node types that add one path only for short-circuit operators */
    booleanOperatorTypes: string[];

    /** Operator tokens that short-circuit (e.g., '&&', 'or') */
    shortCircuitOperators: string[];

    /** Case arms listed in decisionPoints that match anything (Python `case _:`) */
    isCatchAllArm?: (node: Parser.SyntaxNode) => boolean;
  };
}
