import type Parser from 'tree-sitter';
import type { FunctionKind } from '../../types.js';

/**
 * Language-specific scope detection.
 *
 * Each language has different AST node types for functions and classes.
 * The extractor walks the tree generically and asks the traverser which
 * nodes open a new scope and what to call them.
 *
 * @example Python
 * ```typescript
 * functionTypes: ['function_definition', 'lambda']
 * classTypes: ['class_definition']
 * ```
 */
export interface FunctionTraverser {
  /** Node types that open a function scope (a record is emitted for each) */
  functionTypes: string[];

  /** Node types that only qualify names (no record is emitted) */
  classTypes: string[];

  /**
   * Name of a function-like node. Falls back to what the node is assigned
   * to, or a placeholder for anonymous units.
   */
  getFunctionName(node: Parser.SyntaxNode): string;

  /** Name of a class-like node */
  getClassName(node: Parser.SyntaxNode): string;

  /**
   * Kind of a function-like node, given whether its nearest enclosing
   * named scope is a class.
   */
  getFunctionKind(node: Parser.SyntaxNode, insideClass: boolean): FunctionKind;
}
