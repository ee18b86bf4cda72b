import path from 'path';
import type Parser from 'tree-sitter';
import type { FunctionSkeleton, ParseFailure } from '../types.js';
import type { LanguageDefinition } from './languages/types.js';
import { detectLanguage, getLanguage } from './languages/registry.js';
import { isDecisionPoint } from './complexity/cyclomatic.js';
import { parseAST } from './parser.js';
import { Ok, Err, type Result } from '../utils/result.js';

interface NameSegment {
  name: string;
  isClass: boolean;
}

/**
 * Decision points collected for one function while its body is walked.
 */
interface ScopeAccumulator {
  decisionPoints: number;
}

/**
 * Inclusive 1-indexed line span of a node. A node that ends at column 0
 * stops at the end of the previous line.
 */
function toLineSpan(node: Parser.SyntaxNode): { lineStart: number; lineEnd: number } {
  const lineStart = node.startPosition.row + 1;
  const { row, column } = node.endPosition;
  const lineEnd = column === 0 && row > node.startPosition.row ? row : row + 1;
  return { lineStart, lineEnd };
}

/**
 * Recursive visitor that attributes every decision point to the innermost
 * enclosing function.
 *
 * Entering a function pushes a fresh accumulator and leaving it pops one,
 * so branches inside closures never leak into their parent. Class nodes
 * only extend the qualified name.
 */
export class ComplexityVisitor {
  private readonly functions: FunctionSkeleton[] = [];
  private readonly names: NameSegment[] = [];
  private readonly scopes: ScopeAccumulator[] = [];

  constructor(private readonly language: LanguageDefinition) {}

  /**
   * Walk a tree and return one skeleton per function, ordered by start line
   * (an enclosing function before the functions nested in it).
   */
  collect(root: Parser.SyntaxNode): FunctionSkeleton[] {
    this.visit(root);
    return [...this.functions].sort(
      (a, b) => a.lineStart - b.lineStart || b.lineEnd - a.lineEnd || compareText(a.qualifiedName, b.qualifiedName),
    );
  }

  private visit(node: Parser.SyntaxNode): void {
    const { traverser } = this.language;

    if (traverser.classTypes.includes(node.type)) {
      this.names.push({ name: traverser.getClassName(node), isClass: true });
      this.visitChildren(node);
      this.names.pop();
      return;
    }

    if (traverser.functionTypes.includes(node.type)) {
      this.visitFunction(node);
      return;
    }

    const scope = this.scopes[this.scopes.length - 1];
    if (scope && isDecisionPoint(node, this.language)) {
      scope.decisionPoints++;
    }

    this.visitChildren(node);
  }

  private visitFunction(node: Parser.SyntaxNode): void {
    const { traverser } = this.language;
    const name = traverser.getFunctionName(node);
    const enclosing = this.names[this.names.length - 1];
    const kind = traverser.getFunctionKind(node, enclosing?.isClass ?? false);
    const qualifiedName = [...this.names.map(segment => segment.name), name].join('.');

    const scope: ScopeAccumulator = { decisionPoints: 0 };
    this.names.push({ name, isClass: false });
    this.scopes.push(scope);
    this.visitChildren(node);
    this.scopes.pop();
    this.names.pop();

    this.functions.push({
      qualifiedName,
      name,
      kind,
      ...toLineSpan(node),
      complexity: 1 + scope.decisionPoints,
    });
  }

  private visitChildren(node: Parser.SyntaxNode): void {
    for (const child of node.namedChildren) {
      this.visit(child);
    }
  }
}

/**
 * Code-unit comparison, independent of the host locale.
 */
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Extract per-function cyclomatic complexity and line spans from one file.
 *
 * A file that cannot be parsed yields a ParseFailure value instead of
 * throwing, so callers can keep processing the rest of a tree.
 *
 * @param filePath - Path used for language detection and diagnostics
 * @param content - Source text of the file
 */
export function extractFunctions(
  filePath: string,
  content: string,
): Result<FunctionSkeleton[], ParseFailure> {
  const languageId = detectLanguage(filePath);
  if (!languageId) {
    return Err({
      filePath,
      message: `Unsupported file type: ${path.extname(filePath) || path.basename(filePath)}`,
    });
  }

  const parsed = parseAST(content, languageId);
  if (!parsed.tree || parsed.error) {
    return Err({
      filePath,
      message: parsed.error ?? 'Parse failed',
      line: parsed.errorLine,
      column: parsed.errorColumn,
    });
  }

  const visitor = new ComplexityVisitor(getLanguage(languageId));
  return Ok(visitor.collect(parsed.tree.rootNode));
}
