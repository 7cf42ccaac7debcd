import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import type { IssueType, LogLevel, ScanConfiguration } from '@graphlint/types';
import { ALL_ISSUE_TYPES, ISSUE_TYPE, isIssueType } from '@graphlint/types';
import { ConfigError } from '../errors/LintError.js';
import { isLogLevel } from '../logging/Logger.js';
import { LINT_VERSION, getSchemaVersion } from '../version.js';

/**
 * graphlint configuration schema.
 *
 * Location: .graphlint/config.yaml (preferred) or .graphlint/config.json
 *
 * Example config.yaml:
 *
 * ```yaml
 * rootPath: /Game
 * include:
 *   - /Game/Characters
 * exclude:
 *   - /Game/Developers
 *   - "**\/Test_*"
 * checks:
 *   - DeadNode
 *   - OrphanNode
 *   - UnusedFunction
 * useConcurrency: true
 * maxConcurrentTasks: 4
 * ```
 */
export interface LintConfig {
  /**
   * Config schema version (major.minor.patch).
   * If omitted, no version check is performed.
   */
  version?: string;

  /** Root of project content; programs outside it are engine content */
  rootPath: string;

  /**
   * Path patterns a program must match (substring, or glob when the
   * pattern contains glob characters). Empty means everything.
   */
  include: string[];

  /** Path patterns that exclude a program. Checked before include. */
  exclude: string[];

  checks: IssueType[];

  useConcurrency: boolean;
  maxConcurrentTasks: number;

  /** Milliseconds between cancellation checks while waiting on the coordinator */
  waitSliceMs: number;

  logLevel?: LogLevel;
}

/**
 * Unused-function detection walks the whole corpus, so it is opt-in.
 */
export const DEFAULT_CONFIG: LintConfig = {
  version: getSchemaVersion(LINT_VERSION),
  rootPath: '/Game',
  include: [],
  exclude: [],
  checks: [
    ISSUE_TYPE.DEAD_NODE,
    ISSUE_TYPE.ORPHAN_NODE,
    ISSUE_TYPE.CAST_ABUSE,
    ISSUE_TYPE.TICK_ABUSE,
  ],
  useConcurrency: true,
  maxConcurrentTasks: 4,
  waitSliceMs: 10,
};

/**
 * Load config from project directory.
 *
 * Priority:
 * 1. config.yaml
 * 2. config.json
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * Unparseable files are reported through `logger.warn` and yield defaults.
 * Parseable files with invalid values throw ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): LintConfig {
  const configDir = join(projectPath, '.graphlint');
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  let raw: unknown;
  let source: string;

  if (existsSync(yamlPath)) {
    source = yamlPath;
    try {
      raw = parseYAML(readFileSync(yamlPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.yaml: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else if (existsSync(jsonPath)) {
    source = jsonPath;
    try {
      raw = JSON.parse(readFileSync(jsonPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.json: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else {
    return DEFAULT_CONFIG;
  }

  // Empty or comment-only YAML parses to null
  if (raw === null || raw === undefined) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Config error: expected a mapping at top level, got ${describe(raw)}`, 'ERR_CONFIG_INVALID', { filePath: source });
  }

  validateVersion(raw.version);
  validatePatterns(raw.include, raw.exclude, logger);
  validateChecks(raw.checks);
  validateConcurrency(raw);

  return mergeConfig(DEFAULT_CONFIG, raw);
}

/**
 * Config version must match the running version (major.minor.patch).
 * Missing version is accepted.
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${describe(configVersion)}`);
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty');
  }

  const current = currentVersion ?? LINT_VERSION;
  const currentSchema = getSchemaVersion(current);

  if (getSchemaVersion(configVersion) !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with ` +
      `graphlint ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_VERSION',
      {},
      `Set version: "${currentSchema}" in .graphlint/config.yaml`
    );
  }
}

export function validatePatterns(
  include: unknown,
  exclude: unknown,
  logger: { warn: (msg: string) => void }
): void {
  const includeList = validateStringList('include', include);
  if (includeList && includeList.length === 0) {
    logger.warn('Warning: include is an empty array - every program under the root is scanned');
  }
  validateStringList('exclude', exclude);
}

export function validateChecks(checks: unknown): void {
  const list = validateStringList('checks', checks);
  if (!list) return;

  for (let i = 0; i < list.length; i++) {
    if (!isIssueType(list[i])) {
      throw new ConfigError(
        `Config error: checks[${i}] "${list[i]}" is not a known check`,
        'ERR_CONFIG_INVALID',
        {},
        `Known checks: ${ALL_ISSUE_TYPES.join(', ')}`
      );
    }
  }
}

export function validateConcurrency(raw: Record<string, unknown>): void {
  if (raw.useConcurrency !== undefined && typeof raw.useConcurrency !== 'boolean') {
    throw new ConfigError(`Config error: useConcurrency must be a boolean, got ${describe(raw.useConcurrency)}`);
  }

  for (const key of ['maxConcurrentTasks', 'waitSliceMs'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new ConfigError(`Config error: ${key} must be a positive integer, got ${String(value)}`);
    }
  }

  if (raw.rootPath !== undefined && (typeof raw.rootPath !== 'string' || !raw.rootPath.startsWith('/'))) {
    throw new ConfigError(`Config error: rootPath must be an absolute content path like "/Game", got ${String(raw.rootPath)}`);
  }

  if (raw.logLevel !== undefined && !isLogLevel(raw.logLevel)) {
    throw new ConfigError(`Config error: logLevel "${String(raw.logLevel)}" is not a log level`);
  }
}

/**
 * Immutable per-scan configuration
 */
export function toScanConfiguration(config: LintConfig): ScanConfiguration {
  return Object.freeze({
    rootPath: config.rootPath,
    includePaths: Object.freeze([...config.include]),
    excludePaths: Object.freeze([...config.exclude]),
    enabledChecks: new Set(config.checks),
    useConcurrency: config.useConcurrency,
    maxConcurrentTasks: config.maxConcurrentTasks,
    waitSliceMs: config.waitSliceMs,
  });
}

/**
 * Scan configuration from defaults plus overrides
 */
export function createScanConfiguration(overrides: Partial<LintConfig> = {}): ScanConfiguration {
  return toScanConfiguration({ ...DEFAULT_CONFIG, ...overrides });
}

function validateStringList(key: string, value: unknown): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`Config error: ${key} must be an array, got ${describe(value)}`);
  }
  const result: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    if (typeof item !== 'string') {
      throw new ConfigError(`Config error: ${key}[${i}] must be a string, got ${describe(item)}`);
    }
    if (!item.trim()) {
      throw new ConfigError(`Config error: ${key}[${i}] cannot be empty or whitespace-only`);
    }
    result.push(item);
  }
  return result;
}

/**
 * Merge validated user config with defaults
 */
function mergeConfig(defaults: LintConfig, user: Record<string, unknown>): LintConfig {
  return {
    version: typeof user.version === 'string' ? user.version : defaults.version,
    rootPath: typeof user.rootPath === 'string' ? user.rootPath : defaults.rootPath,
    include: validateStringList('include', user.include) ?? defaults.include,
    exclude: validateStringList('exclude', user.exclude) ?? defaults.exclude,
    checks: (validateStringList('checks', user.checks) ?? defaults.checks).filter(isIssueType),
    useConcurrency: typeof user.useConcurrency === 'boolean' ? user.useConcurrency : defaults.useConcurrency,
    maxConcurrentTasks: typeof user.maxConcurrentTasks === 'number' ? user.maxConcurrentTasks : defaults.maxConcurrentTasks,
    waitSliceMs: typeof user.waitSliceMs === 'number' ? user.waitSliceMs : defaults.waitSliceMs,
    logLevel: isLogLevel(user.logLevel) ? user.logLevel : defaults.logLevel,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
