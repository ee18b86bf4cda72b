import { extractFunctions, normalizeRelativePath } from '@crapscore/parser';
import type { FunctionSkeleton } from '@crapscore/parser';
import { analyzeOptionsSchema, formatIssues } from './config/schema.js';
import { InvalidConfigurationError } from './errors/index.js';
import { correlateCoverage, hasCoverageData } from './coverage/correlator.js';
import type { CoverageSource, FileCoverage } from './coverage/types.js';
import { crapScore } from './insights/score.js';
import { aggregate, compareStrings } from './insights/aggregator.js';
import type {
  AnalysisDiagnostic,
  AnalysisResult,
  AnalyzeOptions,
  FunctionRecord,
  SourceFile,
} from './types.js';

export interface FileAnalysis {
  records: FunctionRecord[];
  diagnostics: AnalysisDiagnostic[];
}

/**
 * @throws InvalidConfigurationError for a negative or non-finite threshold,
 * or a topN that is negative or not an integer
 */
export function validateAnalyzeOptions(options: AnalyzeOptions): AnalyzeOptions {
  const result = analyzeOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidConfigurationError(`Invalid analysis options: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

function toRecord(filePath: string, skeleton: FunctionSkeleton, coverage: FileCoverage | undefined): FunctionRecord {
  const { ratio, status } = correlateCoverage(skeleton, coverage);
  return Object.freeze({
    qualifiedName: skeleton.qualifiedName,
    name: skeleton.name,
    kind: skeleton.kind,
    filePath,
    lineStart: skeleton.lineStart,
    lineEnd: skeleton.lineEnd,
    complexity: skeleton.complexity,
    coverageRatio: ratio,
    coverageStatus: status,
    score: crapScore(skeleton.complexity, ratio),
  });
}

/**
 * Extract, correlate and score one file.
 *
 * A file that does not parse yields a diagnostic and no records. A file
 * without coverage data still yields records (coverage 0.0) plus one
 * `missing-coverage` diagnostic. Records and diagnostics carry the path in
 * normalized form (`./src/a.py` → `src/a.py`).
 */
export function analyzeFile(source: SourceFile, coverage: CoverageSource): FileAnalysis {
  const sourcePath = normalizeRelativePath(source.path, '');
  const extracted = extractFunctions(sourcePath, source.content);
  if (!extracted.ok) {
    const { filePath, message, line, column } = extracted.error;
    return {
      records: [],
      diagnostics: [
        {
          kind: 'parse-failure',
          filePath,
          message,
          ...(line !== undefined ? { line } : {}),
          ...(column !== undefined ? { column } : {}),
        },
      ],
    };
  }

  const fileCoverage = coverage.lookup(sourcePath);
  const records = extracted.value.map(skeleton => toRecord(sourcePath, skeleton, fileCoverage));

  const diagnostics: AnalysisDiagnostic[] = [];
  if (records.length > 0 && !hasCoverageData(fileCoverage)) {
    diagnostics.push({
      kind: 'missing-coverage',
      filePath: sourcePath,
      message: 'No coverage data; scored as 0% covered',
    });
  }

  return { records, diagnostics };
}

const DIAGNOSTIC_ORDER: Record<AnalysisDiagnostic['kind'], number> = {
  'read-failure': 0,
  'parse-failure': 1,
  'missing-coverage': 2,
};

export function compareDiagnostics(a: AnalysisDiagnostic, b: AnalysisDiagnostic): number {
  return compareStrings(a.filePath, b.filePath) || DIAGNOSTIC_ORDER[a.kind] - DIAGNOSTIC_ORDER[b.kind];
}

/**
 * Score every function in `sources` and rank functions, files and folders.
 *
 * Per-file failures become diagnostics; only invalid options throw, and
 * they throw before any file is parsed.
 */
export function analyze(
  sources: readonly SourceFile[],
  coverage: CoverageSource,
  options: AnalyzeOptions,
  extraDiagnostics: readonly AnalysisDiagnostic[] = [],
): AnalysisResult {
  const { threshold, topN } = validateAnalyzeOptions(options);

  const records: FunctionRecord[] = [];
  const diagnostics: AnalysisDiagnostic[] = [...extraDiagnostics];

  for (const source of sources) {
    const analysis = analyzeFile(source, coverage);
    records.push(...analysis.records);
    diagnostics.push(...analysis.diagnostics);
  }

  const rankings = aggregate(records, { threshold, topN });

  return {
    ...rankings,
    diagnostics: diagnostics.sort(compareDiagnostics),
    summary: {
      filesAnalyzed: sources.length,
      functionsAnalyzed: records.length,
      functionsAboveThreshold: records.filter(record => record.score >= threshold).length,
      threshold,
      topN,
    },
  };
}
