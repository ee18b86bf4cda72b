// =============================================================================
// TYPES
// =============================================================================

export type {
  SourceFile,
  CoverageStatus,
  FunctionRecord,
  FileRecord,
  FolderRecord,
  Rankings,
  AnalysisDiagnostic,
  ParseFailureDiagnostic,
  ReadFailureDiagnostic,
  MissingCoverageDiagnostic,
  AnalyzeOptions,
  AnalysisSummary,
  AnalysisResult,
} from './types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export {
  DEFAULT_THRESHOLD,
  DEFAULT_TOP_N,
  DEFAULT_CONCURRENCY,
  DEFAULT_COVERAGE_REPORT,
  CONFIG_FILENAME,
  RISK_BAND_HIGH,
  RISK_BAND_MODERATE,
} from './constants.js';

// =============================================================================
// ERRORS
// =============================================================================

export {
  CrapScoreError,
  InvalidConfigurationError,
  CoverageReportError,
  CrapScoreErrorCode,
  wrapError,
  isCrapScoreError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';

// =============================================================================
// LOGGING
// =============================================================================

export { silentLogger, createConsoleLogger } from './logger.js';
export type { Logger } from './logger.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export {
  crapScoreConfigSchema,
  analyzeOptionsSchema,
  defaultConfig,
} from './config/schema.js';
export type { CrapScoreConfig, ConfigOverrides } from './config/schema.js';
export { loadConfig, parseConfig, mergeConfig, resolveConfig } from './config/loader.js';

// =============================================================================
// COVERAGE
// =============================================================================

export type { CoverageSource, FileCoverage, LineCoverageEntry } from './coverage/types.js';
export { InMemoryCoverageDataset, EMPTY_COVERAGE } from './coverage/dataset.js';
export { correlateCoverage, hasCoverageData } from './coverage/correlator.js';
export type { CoverageCorrelation, LineSpan } from './coverage/correlator.js';
export { loadCoverageReport, parseCoverageDocument } from './coverage/loaders/index.js';
export type { CoverageFormat, LoadedCoverage, ParsedCoverageReport } from './coverage/loaders/index.js';

// =============================================================================
// INSIGHTS
// =============================================================================

export { crapScore, riskBand } from './insights/score.js';
export type { RiskBand } from './insights/score.js';
export {
  aggregate,
  ancestorFolders,
  compareFunctions,
  compareFiles,
  compareFolders,
} from './insights/aggregator.js';
export type { AggregateOptions } from './insights/aggregator.js';
export { formatReport, formatTextReport, formatJsonReport, OUTPUT_FORMATS } from './insights/formatters/index.js';
export type { OutputFormat } from './insights/formatters/index.js';

// =============================================================================
// ANALYSIS
// =============================================================================

export { analyze, analyzeFile, validateAnalyzeOptions } from './analyze.js';
export type { FileAnalysis } from './analyze.js';
export { analyzeProject, readSourceFiles } from './project.js';
export type { AnalyzeProjectOptions, ReadSourcesResult } from './project.js';
