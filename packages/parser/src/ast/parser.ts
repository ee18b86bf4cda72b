import Parser from 'tree-sitter';
import { getLanguage } from './languages/registry.js';
import type { SupportedLanguage } from './languages/registry.js';

/**
 * Result of parsing one file. `error` is set when the tree could not be
 * built or contains syntax errors.
 */
export interface ASTParseResult {
  tree: Parser.Tree | null;
  error?: string;
  /** 1-indexed location of the first syntax error */
  errorLine?: number;
  errorColumn?: number;
}

// tree-sitter's default input buffer; larger sources need an explicit size
const DEFAULT_BUFFER_SIZE = 32 * 1024;

/**
 * Cache for parser instances to avoid recreating them
 */
const parserCache = new Map<SupportedLanguage, Parser>();

/**
 * Get or create a cached parser instance for a language
 */
function getParser(language: SupportedLanguage): Parser {
  const cached = parserCache.get(language);
  if (cached) return cached;

  const parser = new Parser();
  parser.setLanguage(getLanguage(language).grammar);
  parserCache.set(language, parser);
  return parser;
}

/**
 * Walk down the branch that carries the error flag until reaching an
 * ERROR node or the deepest node flagged with an error.
 */
export function locateSyntaxError(root: Parser.SyntaxNode): Parser.SyntaxNode {
  let current = root;
  for (;;) {
    if (current.type === 'ERROR') return current;
    const next = current.children.find(child => child.hasError);
    if (!next) return current;
    current = next;
  }
}

/**
 * Parse source code into an AST using Tree-sitter
 *
 * Tree-sitter recovers from syntax errors and still returns a tree, so a
 * tree with `hasError` set is reported as a failure along with the
 * position of the first error.
 *
 * @param content - Source code to parse
 * @param language - Programming language
 * @returns Parse result with tree or error
 */
export function parseAST(content: string, language: SupportedLanguage): ASTParseResult {
  try {
    const parser = getParser(language);
    const tree = parser.parse(content, undefined, {
      bufferSize: Math.max(DEFAULT_BUFFER_SIZE, content.length + 1),
    });

    // hasError is a property, not a method
    if (tree.rootNode.hasError) {
      const errorNode = locateSyntaxError(tree.rootNode);
      const line = errorNode.startPosition.row + 1;
      const column = errorNode.startPosition.column + 1;
      return {
        tree,
        error: `Syntax error at line ${line}, column ${column}`,
        errorLine: line,
        errorColumn: column,
      };
    }

    return { tree };
  } catch (error) {
    return {
      tree: null,
      error: error instanceof Error ? error.message : 'Unknown parse error',
    };
  }
}

/**
 * Clear parser cache (useful for testing)
 */
export function clearParserCache(): void {
  parserCache.clear();
}
