/**
 * Logger Tests
 *
 * Tests:
 * - Respects logLevel threshold (silent, errors, warnings, info, debug)
 * - Each method prints with its tag and context
 * - Circular context is serialized safely
 * - FileLogger writes timestamped lines and rejects directories
 * - createLogger() combines console and file output
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join, resolve } from 'path';
import { tmpdir } from 'os';

import {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  formatMessage,
  isLogLevel,
  safeStringify,
} from '@graphlint/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface ConsoleCapture {
  lines: { method: string; text: string }[];
  restore: () => void;
}

function captureConsole(): ConsoleCapture {
  const original = {
    error: console.error,
    warn: console.warn,
    info: console.info,
    debug: console.debug,
  };
  const capture: ConsoleCapture = {
    lines: [],
    restore: () => {
      console.error = original.error;
      console.warn = original.warn;
      console.info = original.info;
      console.debug = original.debug;
    },
  };
  const record = (method: string) => (...args: unknown[]) => {
    capture.lines.push({ method, text: args.map(String).join(' ') });
  };
  console.error = record('error');
  console.warn = record('warn');
  console.info = record('info');
  console.debug = record('debug');
  return capture;
}

// =============================================================================
// TESTS: ConsoleLogger
// =============================================================================

describe('ConsoleLogger', () => {
  let capture: ConsoleCapture;

  beforeEach(() => {
    capture = captureConsole();
  });

  afterEach(() => {
    capture.restore();
  });

  it('should print methods at or above the threshold', () => {
    const logger = new ConsoleLogger('warnings');

    logger.error('Load failed', { program: '/Game/BP_A.BP_A' });
    logger.warn('Slow program');
    logger.info('Scan started');
    logger.debug('Detail');

    assert.deepStrictEqual(capture.lines, [
      { method: 'error', text: '[ERROR] Load failed {"program":"/Game/BP_A.BP_A"}' },
      { method: 'warn', text: '[WARN] Slow program' },
    ]);
  });

  it('should print nothing when silent', () => {
    const logger = new ConsoleLogger('silent');

    logger.error('Load failed');
    logger.warn('Slow program');

    assert.deepStrictEqual(capture.lines, []);
  });

  it('should route trace to debug output at debug level', () => {
    const logger = new ConsoleLogger('debug');

    logger.trace('Visiting node', { id: 'n1' });

    assert.deepStrictEqual(capture.lines, [
      { method: 'debug', text: '[TRACE] Visiting node {"id":"n1"}' },
    ]);
  });
});

// =============================================================================
// TESTS: helpers
// =============================================================================

describe('formatting helpers', () => {
  it('should replace circular references', () => {
    const node: Record<string, unknown> = { id: 'n1' };
    node.self = node;

    assert.strictEqual(safeStringify(node), '{"id":"n1","self":"[Circular]"}');
  });

  it('should omit empty context', () => {
    assert.strictEqual(formatMessage('Done', {}), 'Done');
    assert.strictEqual(formatMessage('Done', { issues: 3 }), 'Done {"issues":3}');
  });

  it('should recognize log levels', () => {
    assert.strictEqual(isLogLevel('warnings'), true);
    assert.strictEqual(isLogLevel('verbose'), false);
    assert.strictEqual(isLogLevel(3), false);
  });
});

// =============================================================================
// TESTS: FileLogger
// =============================================================================

describe('FileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'graphlint-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write timestamped lines at or above its level', async () => {
    const file = join(dir, 'logs', 'scan.log');
    const logger = new FileLogger('info', file);

    logger.info('Scan started', { assets: 2 });
    logger.debug('Detail');
    await logger.close();

    const lines = readFileSync(file, 'utf-8').trimEnd().split('\n');
    assert.strictEqual(lines.length, 1);
    assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] Scan started \{"assets":2\}$/);
  });

  it('should refuse a directory path', () => {
    assert.throws(
      () => new FileLogger('info', dir),
      { message: `Cannot write log file: '${resolve(dir)}' is a directory` }
    );
  });
});

// =============================================================================
// TESTS: createLogger
// =============================================================================

describe('createLogger', () => {
  it('should return a console logger without a log file', () => {
    assert.ok(createLogger('info') instanceof ConsoleLogger);
  });

  it('should also log everything to the file when given one', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'graphlint-log-'));
    const capture = captureConsole();
    try {
      const file = join(dir, 'scan.log');
      const logger = createLogger('errors', { logFile: file });
      assert.ok(logger instanceof MultiLogger);

      logger.debug('Corpus loaded');
      await logger.close();

      assert.deepStrictEqual(capture.lines, []);
      assert.match(readFileSync(file, 'utf-8'), /\[DEBUG\] Corpus loaded\n$/);
    } finally {
      capture.restore();
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
