/**
 * ConfigLoader Tests
 *
 * Tests:
 * - YAML config loading (valid, partial, invalid)
 * - JSON fallback and YAML precedence
 * - No config and empty files return defaults
 * - Invalid values throw ConfigError
 * - Version compatibility
 * - Conversion to a frozen ScanConfiguration
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import {
  ConfigError,
  DEFAULT_CONFIG,
  ISSUE_TYPE,
  LINT_VERSION,
  createScanConfiguration,
  getSchemaVersion,
  loadConfig,
  toScanConfiguration,
  validateVersion,
} from '@graphlint/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (msg: string) => warnings.push(msg),
  };
}

// =============================================================================
// TESTS: loadConfig
// =============================================================================

describe('ConfigLoader', () => {
  let projectDir: string;
  let configDir: string;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'graphlint-config-'));
    configDir = join(projectDir, '.graphlint');
    mkdirSync(configDir);
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  describe('defaults', () => {
    it('should return defaults when no config exists', () => {
      assert.deepStrictEqual(loadConfig(projectDir, createLoggerMock()), DEFAULT_CONFIG);
    });

    it('should leave UnusedFunction out of the default checks', () => {
      assert.deepStrictEqual(DEFAULT_CONFIG.checks, ['DeadNode', 'OrphanNode', 'CastAbuse', 'TickAbuse']);
      assert.strictEqual(DEFAULT_CONFIG.rootPath, '/Game');
      assert.strictEqual(DEFAULT_CONFIG.maxConcurrentTasks, 4);
    });

    it('should return defaults for a comment-only YAML file', () => {
      writeFileSync(join(configDir, 'config.yaml'), '# nothing yet\n');
      assert.deepStrictEqual(loadConfig(projectDir, createLoggerMock()), DEFAULT_CONFIG);
    });
  });

  describe('YAML config', () => {
    it('should merge a partial config over defaults', () => {
      writeFileSync(join(configDir, 'config.yaml'), [
        'exclude:',
        '  - /Game/Developers',
        'checks:',
        '  - UnusedFunction',
        'maxConcurrentTasks: 2',
      ].join('\n'));

      const config = loadConfig(projectDir, createLoggerMock());

      assert.deepStrictEqual(config.exclude, ['/Game/Developers']);
      assert.deepStrictEqual(config.checks, ['UnusedFunction']);
      assert.strictEqual(config.maxConcurrentTasks, 2);
      assert.strictEqual(config.useConcurrency, true);
      assert.deepStrictEqual(config.include, []);
    });

    it('should warn and fall back to defaults on unparseable YAML', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'checks: [DeadNode, OrphanNode\n');
      const logger = createLoggerMock();

      const config = loadConfig(projectDir, logger);

      assert.deepStrictEqual(config, DEFAULT_CONFIG);
      assert.strictEqual(logger.warnings.length, 2);
      assert.ok(logger.warnings[0].startsWith('Failed to parse config.yaml: '));
      assert.strictEqual(logger.warnings[1], 'Using default configuration');
    });

    it('should warn about an empty include list', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'include: []\n');
      const logger = createLoggerMock();

      loadConfig(projectDir, logger);

      assert.deepStrictEqual(logger.warnings, [
        'Warning: include is an empty array - every program under the root is scanned',
      ]);
    });

    it('should prefer YAML over JSON', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'rootPath: /Project\n');
      writeFileSync(join(configDir, 'config.json'), JSON.stringify({ rootPath: '/Other' }));

      assert.strictEqual(loadConfig(projectDir, createLoggerMock()).rootPath, '/Project');
    });
  });

  describe('JSON config', () => {
    it('should load config.json when no YAML exists', () => {
      writeFileSync(join(configDir, 'config.json'), JSON.stringify({ useConcurrency: false }));

      assert.strictEqual(loadConfig(projectDir, createLoggerMock()).useConcurrency, false);
    });
  });

  describe('validation', () => {
    it('should reject unknown checks', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'checks:\n  - DeadNode\n  - SlowNode\n');

      assert.throws(
        () => loadConfig(projectDir, createLoggerMock()),
        (error: unknown) => error instanceof ConfigError
          && error.message === 'Config error: checks[1] "SlowNode" is not a known check'
      );
    });

    it('should reject non-positive task counts', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'maxConcurrentTasks: 0\n');

      assert.throws(
        () => loadConfig(projectDir, createLoggerMock()),
        { message: 'Config error: maxConcurrentTasks must be a positive integer, got 0' }
      );
    });

    it('should reject a relative root path', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'rootPath: Game\n');

      assert.throws(() => loadConfig(projectDir, createLoggerMock()), ConfigError);
    });

    it('should reject a non-mapping document', () => {
      writeFileSync(join(configDir, 'config.yaml'), '- DeadNode\n');

      assert.throws(
        () => loadConfig(projectDir, createLoggerMock()),
        { message: 'Config error: expected a mapping at top level, got array' }
      );
    });

    it('should reject non-string pattern entries', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'exclude:\n  - 42\n');

      assert.throws(
        () => loadConfig(projectDir, createLoggerMock()),
        { message: 'Config error: exclude[0] must be a string, got number' }
      );
    });
  });
});

// =============================================================================
// TESTS: validateVersion
// =============================================================================

describe('validateVersion', () => {
  it('should accept a missing version', () => {
    assert.doesNotThrow(() => validateVersion(undefined));
  });

  it('should accept the running schema version', () => {
    assert.doesNotThrow(() => validateVersion(getSchemaVersion(LINT_VERSION)));
    assert.doesNotThrow(() => validateVersion('1.2.0-beta', '1.2.0'));
  });

  it('should reject a different version with its own code', () => {
    assert.throws(
      () => validateVersion('0.9.0', '1.2.0'),
      (error: unknown) => error instanceof ConfigError
        && error.code === 'ERR_CONFIG_VERSION'
        && error.suggestion === 'Set version: "1.2.0" in .graphlint/config.yaml'
    );
  });

  it('should reject empty and non-string versions', () => {
    assert.throws(() => validateVersion('  '), { message: 'Config error: version cannot be empty' });
    assert.throws(() => validateVersion(1), { message: 'Config error: version must be a string, got number' });
  });
});

// =============================================================================
// TESTS: ScanConfiguration
// =============================================================================

describe('toScanConfiguration', () => {
  it('should produce a frozen configuration with a check set', () => {
    const scan = toScanConfiguration({ ...DEFAULT_CONFIG, include: ['/Game/UI'] });

    assert.strictEqual(Object.isFrozen(scan), true);
    assert.deepStrictEqual(scan.includePaths, ['/Game/UI']);
    assert.strictEqual(scan.enabledChecks.has(ISSUE_TYPE.DEAD_NODE), true);
    assert.strictEqual(scan.enabledChecks.has(ISSUE_TYPE.UNUSED_FUNCTION), false);
  });

  it('should apply overrides over defaults', () => {
    const scan = createScanConfiguration({ useConcurrency: false, waitSliceMs: 2 });

    assert.strictEqual(scan.useConcurrency, false);
    assert.strictEqual(scan.waitSliceMs, 2);
    assert.strictEqual(scan.rootPath, '/Game');
  });
});
