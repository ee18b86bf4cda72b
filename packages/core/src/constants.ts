/**
 * Centralized constants for @crapscore/core.
 */

// Functions scoring at or above this are counted as risky in rollups
export const DEFAULT_THRESHOLD = 30;

// Rows shown per ranking; 0 means unlimited
export const DEFAULT_TOP_N = 20;

// Files read in parallel by analyzeProject
export const DEFAULT_CONCURRENCY = 4;

// Coverage report looked up relative to the analysis root
export const DEFAULT_COVERAGE_REPORT = 'coverage.json';

// Optional per-project config file at the analysis root
export const CONFIG_FILENAME = '.crapscore.yml';

// Risk bands for display: above HIGH is high risk, above MODERATE is moderate
export const RISK_BAND_HIGH = 30;
export const RISK_BAND_MODERATE = 15;
