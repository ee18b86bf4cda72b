// =============================================================================
// TYPES
// =============================================================================

export type { FunctionKind, FunctionSkeleton, ParseFailure, ScanOptions } from './types.js';
export type { LanguageDefinition } from './ast/languages/types.js';
export type { FunctionTraverser } from './ast/traversers/types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export { ALWAYS_IGNORE_PATTERNS, LAMBDA_NAME, ANONYMOUS_NAME } from './constants.js';

// =============================================================================
// UTILITIES
// =============================================================================

export { normalizeRelativePath, parentFolder, toPosixPath } from './utils/path-matching.js';
export { Ok, Err } from './utils/result.js';
export type { Result } from './utils/result.js';

// =============================================================================
// AST
// =============================================================================

export { parseAST, clearParserCache } from './ast/parser.js';
export type { ASTParseResult } from './ast/parser.js';
export { extractFunctions, ComplexityVisitor } from './ast/extractor.js';
export { isDecisionPoint } from './ast/complexity/cyclomatic.js';

// AST Language Registry
export { detectLanguage, getSupportedExtensions, getLanguage } from './ast/languages/registry.js';
export type { SupportedLanguage } from './ast/languages/registry.js';

// =============================================================================
// SCANNING
// =============================================================================

export { scanSourceFiles, defaultIncludePattern } from './scanner.js';
