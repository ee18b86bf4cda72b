/**
 * Constants used by the parser layer.
 */

/**
 * Patterns that are always excluded from source discovery, regardless of
 * user configuration or .gitignore contents.
 */
export const ALWAYS_IGNORE_PATTERNS = [
  'node_modules/**',
  '**/node_modules/**',
  '.git/**',
  '**/.git/**',
  'dist/**',
  '**/dist/**',
  'build/**',
  '**/build/**',
  'coverage/**',
  '**/coverage/**',
  '.venv/**',
  '**/.venv/**',
  'venv/**',
  '**/venv/**',
  '**/__pycache__/**',
  '.tox/**',
  '**/*.min.js',
  '**/*.d.ts',
];

/** Name given to Python lambdas, which have no identifier of their own. */
export const LAMBDA_NAME = '<lambda>';

/** Name given to JS/TS functions that are neither named nor assigned. */
export const ANONYMOUS_NAME = '<anonymous>';
