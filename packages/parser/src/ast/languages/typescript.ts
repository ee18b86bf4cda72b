import TypeScript from 'tree-sitter-typescript';
import type { LanguageDefinition } from './types.js';
import { TypeScriptTraverser, javascriptFamilyComplexity } from './javascript.js';

export const typescriptDefinition: LanguageDefinition = {
  id: 'typescript',
  extensions: ['ts', 'mts', 'cts'],
  grammar: TypeScript.typescript,
  traverser: new TypeScriptTraverser(),
  complexity: javascriptFamilyComplexity,
};

/**
 * TSX needs its own grammar: the plain TypeScript grammar reads `<div>` as a
 * type assertion and fails on JSX.
 */
export const tsxDefinition: LanguageDefinition = {
  id: 'tsx',
  extensions: ['tsx'],
  grammar: TypeScript.tsx,
  traverser: new TypeScriptTraverser(),
  complexity: javascriptFamilyComplexity,
};
