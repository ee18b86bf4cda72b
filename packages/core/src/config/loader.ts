import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_FILENAME } from '../constants.js';
import { InvalidConfigurationError, getErrorMessage } from '../errors/index.js';
import { crapScoreConfigSchema, defaultConfig, formatIssues } from './schema.js';
import type { ConfigOverrides, CrapScoreConfig } from './schema.js';

/**
 * Interpolate environment variables in strings.
 * Supports ${VAR_NAME} syntax; unset variables become empty strings.
 */
function interpolateEnvVars(value: string): string {
  return value.replace(/\$\{(\w+)\}/g, (_, varName: string) => process.env[varName] ?? '');
}

/**
 * Deep-interpolate environment variables in a parsed document.
 */
function interpolateConfig(value: unknown): unknown {
  if (typeof value === 'string') {
    return interpolateEnvVars(value);
  }
  if (Array.isArray(value)) {
    return value.map(interpolateConfig);
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateConfig(entry);
    }
    return result;
  }
  return value;
}

/**
 * Validate a raw config object (defaults filled in).
 *
 * @throws InvalidConfigurationError listing every issue
 */
export function parseConfig(raw: unknown, source = 'config'): CrapScoreConfig {
  const result = crapScoreConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidConfigurationError(
      `Invalid config in ${source}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`,
      issues,
      { source },
    );
  }
  return result.data;
}

/**
 * Load `.crapscore.yml` from the analysis root.
 * Returns defaults when no config file exists or it is empty.
 */
export async function loadConfig(rootDir: string = process.cwd()): Promise<CrapScoreConfig> {
  const configPath = path.join(rootDir, CONFIG_FILENAME);

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return defaultConfig;
    }
    throw new InvalidConfigurationError(`Failed to read ${configPath}: ${getErrorMessage(error)}`, [], {
      configPath,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new InvalidConfigurationError(`Failed to parse ${configPath}: ${getErrorMessage(error)}`, [], {
      configPath,
    });
  }

  if (parsed === null || parsed === undefined) {
    return defaultConfig;
  }

  return parseConfig(interpolateConfig(parsed), configPath);
}

/**
 * Apply caller overrides on top of a loaded config and re-validate.
 * Undefined override values leave the config value in place.
 */
export function mergeConfig(config: CrapScoreConfig, overrides: ConfigOverrides): CrapScoreConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  return parseConfig({ ...config, ...defined }, 'command-line options');
}

/**
 * Load the root's config file and apply overrides.
 */
export async function resolveConfig(rootDir: string, overrides: ConfigOverrides = {}): Promise<CrapScoreConfig> {
  return mergeConfig(await loadConfig(rootDir), overrides);
}
