import { describe, it, expect, afterEach } from 'vitest';
import { parseAST, clearParserCache, locateSyntaxError } from './parser.js';

describe('parseAST', () => {
  afterEach(() => {
    clearParserCache();
  });

  it('returns a tree without error for valid source', () => {
    const result = parseAST('def ok():\n    return 1\n', 'python');

    expect(result.error).toBeUndefined();
    expect(result.tree?.rootNode.type).toBe('module');
  });

  it('keeps the tree and reports the first error position', () => {
    const result = parseAST('x = 1\ndef broken(:\n    return 1\n', 'python');

    expect(result.tree).not.toBeNull();
    expect(result.errorLine).toBeGreaterThanOrEqual(1);
    expect(result.error).toBe(`Syntax error at line ${result.errorLine}, column ${result.errorColumn}`);
  });

  it('reuses parsers across calls and languages', () => {
    const first = parseAST('const a = 1;', 'typescript');
    const second = parseAST('a = 1', 'python');
    const third = parseAST('const b = 2;', 'typescript');

    expect(first.tree?.rootNode.type).toBe('program');
    expect(second.tree?.rootNode.type).toBe('module');
    expect(third.error).toBeUndefined();
  });
});

describe('locateSyntaxError', () => {
  it('returns the root when the tree has no error', () => {
    const { tree } = parseAST('const a = 1;', 'javascript');
    if (!tree) throw new Error('expected a tree');

    const root = tree.rootNode;
    expect(locateSyntaxError(root)).toBe(root);
  });
});
