import { describe, it, expect } from 'vitest';
import { extractFunctions } from './extractor.js';
import type { FunctionSkeleton } from '../types.js';

function lines(...source: string[]): string {
  return source.join('\n') + '\n';
}

function extractOk(filePath: string, content: string): FunctionSkeleton[] {
  const result = extractFunctions(filePath, content);
  if (!result.ok) {
    throw new Error(`expected ${filePath} to parse: ${result.error.message}`);
  }
  return result.value;
}

function byName(functions: FunctionSkeleton[], qualifiedName: string): FunctionSkeleton {
  const found = functions.find(f => f.qualifiedName === qualifiedName);
  if (!found) {
    throw new Error(`no function named ${qualifiedName} in ${functions.map(f => f.qualifiedName).join(', ')}`);
  }
  return found;
}

describe('extractFunctions (Python)', () => {
  it('gives a branchless function complexity 1', () => {
    const functions = extractOk(
      'plain.py',
      lines(
        'def plain(values):',
        '    total = sum(values)',
        '    print(total)',
        '    return total',
      ),
    );

    expect(functions).toEqual([
      { qualifiedName: 'plain', name: 'plain', kind: 'function', lineStart: 1, lineEnd: 4, complexity: 1 },
    ]);
  });

  it('counts if, for and except, and leaves the nested function its own branches', () => {
    const functions = extractOk(
      'handler.py',
      lines(
        'def handler(items):',
        '    if not items:',
        '        return None',
        '    for item in items:',
        '        try:',
        '            process(item)',
        '        except ValueError:',
        '            log(item)',
        '',
        '    def inner(x):',
        '        if x and x > 1:',
        '            return 1',
        '        return 0',
        '',
        '    return inner',
      ),
    );

    expect(functions.map(f => f.qualifiedName)).toEqual(['handler', 'handler.inner']);
    expect(byName(functions, 'handler')).toMatchObject({ complexity: 4, lineStart: 1, lineEnd: 15 });
    expect(byName(functions, 'handler.inner')).toMatchObject({
      complexity: 3,
      lineStart: 10,
      lineEnd: 13,
      kind: 'function',
    });
  });

  it('counts elif, while, conditional expressions and each boolean operator', () => {
    const functions = extractOk(
      'grade.py',
      lines(
        'def grade(score, bonus, strict):',
        '    while score > 100:',
        '        score -= 1',
        '    if score > 90 and bonus or strict:',
        '        return "A"',
        '    elif score > 80:',
        '        return "B"',
        '    return "C" if score > 70 else "D"',
      ),
    );

    // 1 + while + if + and + or + elif + conditional expression
    expect(byName(functions, 'grade').complexity).toBe(7);
  });

  it('qualifies methods by class and starts decorated methods at the def line', () => {
    const functions = extractOk(
      'greeter.py',
      lines(
        'class Greeter:',
        '    @staticmethod',
        '    def greet(name):',
        '        return "hi " + name if name else "hi"',
        '',
        '    async def odd(self):',
        '        return [x for x in range(3) if x % 2]',
      ),
    );

    expect(functions).toEqual([
      { qualifiedName: 'Greeter.greet', name: 'greet', kind: 'method', lineStart: 3, lineEnd: 4, complexity: 2 },
      { qualifiedName: 'Greeter.odd', name: 'odd', kind: 'method', lineStart: 6, lineEnd: 7, complexity: 2 },
    ]);
  });

  it('emits lambdas as separate records', () => {
    const functions = extractOk(
      'sorting.py',
      lines(
        'def build(items):',
        '    key = lambda item: item.score if item else 0',
        '    return sorted(items, key=key)',
      ),
    );

    expect(byName(functions, 'build').complexity).toBe(1);
    expect(byName(functions, 'build.<lambda>')).toMatchObject({
      kind: 'lambda',
      name: '<lambda>',
      lineStart: 2,
      lineEnd: 2,
      complexity: 2,
    });
  });

  it('produces no record for the class itself or module-level branches', () => {
    const functions = extractOk(
      'module.py',
      lines(
        'import os',
        '',
        'if os.environ.get("DEBUG"):',
        '    LEVEL = 1',
        '',
        'class Empty:',
        '    pass',
      ),
    );

    expect(functions).toEqual([]);
  });

  it('keeps same-named functions at different depths distinct', () => {
    const functions = extractOk(
      'shadow.py',
      lines(
        'def run():',
        '    def run():',
        '        return 1',
        '    return run()',
      ),
    );

    expect(functions.map(f => [f.qualifiedName, f.lineStart])).toEqual([
      ['run', 1],
      ['run.run', 2],
    ]);
  });

  it('qualifies classes nested in functions', () => {
    const functions = extractOk(
      'factory.py',
      lines(
        'def make():',
        '    class Local:',
        '        def get(self):',
        '            return 1',
        '    return Local',
      ),
    );

    expect(byName(functions, 'make.Local.get').kind).toBe('method');
  });

  it('counts each match arm except the bare wildcard', () => {
    const functions = extractOk(
      'dispatch.py',
      lines(
        'def dispatch(command):',
        '    match command:',
        '        case "start":',
        '            return 1',
        '        case "stop" | "halt":',
        '            return 2',
        '        case _:',
        '            return 0',
      ),
    );

    expect(functions).toEqual([
      { qualifiedName: 'dispatch', name: 'dispatch', kind: 'function', lineStart: 1, lineEnd: 8, complexity: 3 },
    ]);
  });

  it('reports a syntax error as a ParseFailure', () => {
    const result = extractFunctions('broken.py', lines('def broken(:', '    return 1'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.filePath).toBe('broken.py');
      expect(result.error.message).toMatch(/^Syntax error at line \d+, column \d+$/);
      expect(result.error.line).toBeGreaterThanOrEqual(1);
    }
  });

  it('reports an unsupported extension as a ParseFailure', () => {
    const result = extractFunctions('notes.txt', 'hello');

    expect(result).toEqual({
      ok: false,
      error: { filePath: 'notes.txt', message: 'Unsupported file type: .txt' },
    });
  });

  it('returns an empty list for an empty file', () => {
    expect(extractOk('empty.py', '')).toEqual([]);
  });
});
