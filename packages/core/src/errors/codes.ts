/**
 * Error codes for all crapscore errors.
 * Used to identify error types programmatically.
 */
export enum CrapScoreErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Coverage reports
  COVERAGE_NOT_FOUND = 'COVERAGE_NOT_FOUND',
  COVERAGE_INVALID = 'COVERAGE_INVALID',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
