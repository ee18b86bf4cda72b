import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';

vi.mock('ora', () => {
  const mockOra = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    warn: vi.fn().mockReturnThis(),
    text: '',
  };
  return { default: vi.fn(() => mockOra) };
});

import { analyzeCommand, EXIT_ERROR, EXIT_THRESHOLD_EXCEEDED } from './analyze.js';

describe('analyzeCommand', () => {
  let testDir: string;

  beforeEach(async () => {
    process.exitCode = undefined;
    const tmpBase = path.join(os.tmpdir(), 'crapscore-test');
    await fs.mkdir(tmpBase, { recursive: true });
    testDir = await fs.mkdtemp(path.join(tmpBase, 'cli-'));
    await fs.writeFile(
      path.join(testDir, 'rules.py'),
      [
        'def decide(a, b, c):',
        '    if a and b:',
        '        return 1',
        '    elif c or a:',
        '        return 2',
        '    return 3',
        '',
      ].join('\n'),
    );

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(testDir, { recursive: true, force: true });
  });

  function stdout(): string {
    return vi.mocked(console.log).mock.calls.map(call => call.map(String).join(' ')).join('\n');
  }

  it('prints a JSON report to stdout', async () => {
    await analyzeCommand(testDir, { format: 'json' });

    const report: unknown = JSON.parse(stdout());
    expect(report).toMatchObject({
      functions: [{ qualifiedName: 'decide', complexity: 5, coverageRatio: 0, score: 30 }],
      summary: { filesAnalyzed: 1, functionsAnalyzed: 1, functionsAboveThreshold: 1 },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('sets the threshold exit code with --fail-on-threshold', async () => {
    await analyzeCommand(testDir, { format: 'json', failOnThreshold: true });

    expect(process.exitCode).toBe(EXIT_THRESHOLD_EXCEEDED);
  });

  it('passes when every function is under the threshold', async () => {
    await analyzeCommand(testDir, { format: 'json', failOnThreshold: true, threshold: 31 });

    expect(process.exitCode).toBeUndefined();
  });

  it('rejects an unknown format before analyzing', async () => {
    await analyzeCommand(testDir, { format: 'sarif' });

    expect(process.exitCode).toBe(EXIT_ERROR);
    expect(console.log).not.toHaveBeenCalled();
  });

  it('fails when an explicitly named coverage report is missing', async () => {
    await analyzeCommand(testDir, { format: 'text', coverage: 'reports/missing.json' });

    expect(process.exitCode).toBe(EXIT_ERROR);
    expect(console.log).not.toHaveBeenCalled();
  });
});
