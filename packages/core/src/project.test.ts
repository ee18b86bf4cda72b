import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { analyzeProject, readSourceFiles } from './project.js';
import { CoverageReportError } from './errors/index.js';
import type { Logger } from './logger.js';

async function writeFile(root: string, relativePath: string, content: string): Promise<void> {
  const absolute = path.join(root, relativePath);
  await fs.mkdir(path.dirname(absolute), { recursive: true });
  await fs.writeFile(absolute, content);
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: vi.fn(),
    warning: (message: string) => warnings.push(message),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe('analyzeProject', () => {
  let testDir: string;

  beforeEach(async () => {
    const tmpBase = path.join(os.tmpdir(), 'crapscore-test');
    await fs.mkdir(tmpBase, { recursive: true });
    testDir = await fs.mkdtemp(path.join(tmpBase, 'project-'));

    await writeFile(
      testDir,
      'pkg/orders.py',
      ['def total(items):', '    if items:', '        return sum(items)', '    return 0', ''].join('\n'),
    );
    await writeFile(testDir, 'web/format.ts', ['export function label(x: number) {', '  return x > 1 ? "many" : "one";', '}', ''].join('\n'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('scans, reads and scores the tree against the coverage report', async () => {
    await writeFile(
      testDir,
      'coverage.json',
      JSON.stringify({ files: { 'pkg/orders.py': { executed_lines: [1, 2, 3, 4], missing_lines: [] } } }),
    );

    const result = await analyzeProject(testDir);

    expect(result.functions.map(f => [f.filePath, f.qualifiedName, f.score])).toEqual([
      ['web/format.ts', 'label', 6],
      ['pkg/orders.py', 'total', 2],
    ]);
    expect(result.diagnostics).toEqual([
      { kind: 'missing-coverage', filePath: 'web/format.ts', message: 'No coverage data; scored as 0% covered' },
    ]);
    expect(result.summary.filesAnalyzed).toBe(2);
  });

  it('scores everything as uncovered when the default report is absent', async () => {
    const logger = recordingLogger();

    const result = await analyzeProject(testDir, { logger });

    expect(result.functions.map(f => f.coverageStatus)).toEqual(['no-data', 'no-data']);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(/^Coverage report not found: .*coverage\.json; every function is scored as uncovered$/);
  });

  it('warns when no report entry matches a scanned file', async () => {
    await writeFile(
      testDir,
      'coverage.json',
      JSON.stringify({ files: { 'service/pkg/orders.py': { executed_lines: [1, 2, 3, 4], missing_lines: [] } } }),
    );
    const logger = recordingLogger();

    const result = await analyzeProject(testDir, { logger });

    expect(result.functions.map(f => f.coverageStatus)).toEqual(['no-data', 'no-data']);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(
      /^No entry in .*coverage\.json matches a file under .*; report paths must be absolute or relative to the analysis root$/,
    );
  });

  it('fails on a missing report when coverage is required', async () => {
    await expect(analyzeProject(testDir, { requireCoverage: true })).rejects.toBeInstanceOf(CoverageReportError);
  });

  it('applies the config file and overrides', async () => {
    await writeFile(testDir, '.crapscore.yml', 'exclude:\n  - "web/**"\ntopN: 1\n');

    const result = await analyzeProject(testDir, { threshold: 1 });

    expect(result.functions.map(f => f.filePath)).toEqual(['pkg/orders.py']);
    expect(result.summary).toMatchObject({ threshold: 1, topN: 1, filesAnalyzed: 1 });
  });
});

describe('readSourceFiles', () => {
  it('reports unreadable files as read failures', async () => {
    const tmpBase = path.join(os.tmpdir(), 'crapscore-test');
    await fs.mkdir(tmpBase, { recursive: true });
    const dir = await fs.mkdtemp(path.join(tmpBase, 'read-'));
    try {
      await fs.writeFile(path.join(dir, 'present.py'), 'x = 1\n');

      const { sources, failures } = await readSourceFiles(dir, ['present.py', 'gone.py'], 2);

      expect(sources).toEqual([{ path: 'present.py', content: 'x = 1\n' }]);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatchObject({ kind: 'read-failure', filePath: 'gone.py' });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
