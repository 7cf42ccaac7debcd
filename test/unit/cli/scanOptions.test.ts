/**
 * Scan command option parsing tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { DEFAULT_CONFIG } from '@graphlint/core';
import type { LintIssue } from '@graphlint/core';
import {
  applyOverrides,
  parseChecks,
  parseLogLevel,
  parseSeverity,
  reachesSeverity,
} from '../../../packages/cli/src/utils/scanOptions.js';

function issueOf(severity: LintIssue['severity']): LintIssue {
  return { type: 'OrphanNode', programPath: '/Game/A.A', nodeName: 'Print', description: 'orphan', severity };
}

describe('parseChecks', () => {
  it('should parse a comma-separated list without duplicates', () => {
    assert.deepStrictEqual(parseChecks('DeadNode, CastAbuse,DeadNode'), ['DeadNode', 'CastAbuse']);
  });

  it('should expand "all"', () => {
    assert.deepStrictEqual(parseChecks('all'), ['DeadNode', 'OrphanNode', 'CastAbuse', 'TickAbuse', 'UnusedFunction']);
  });

  it('should reject unknown and empty selections', () => {
    assert.throws(() => parseChecks('DeadNode,Slow'), /Unknown check "Slow"/);
    assert.throws(() => parseChecks(' , '), { message: 'No checks selected' });
  });
});

describe('parseLogLevel and parseSeverity', () => {
  it('should accept known values', () => {
    assert.strictEqual(parseLogLevel('debug'), 'debug');
    assert.strictEqual(parseSeverity('high'), 'high');
  });

  it('should reject unknown values', () => {
    assert.throws(() => parseLogLevel('loud'), /Invalid log level "loud"/);
    assert.throws(() => parseSeverity('urgent'), /Invalid severity "urgent"/);
  });
});

describe('applyOverrides', () => {
  it('should replace only what the command line sets', () => {
    const config = applyOverrides(DEFAULT_CONFIG, {
      project: '.',
      checks: 'UnusedFunction',
      exclude: ['/Developers/'],
      concurrency: false,
      logLevel: 'warnings',
    });

    assert.deepStrictEqual(config.checks, ['UnusedFunction']);
    assert.deepStrictEqual(config.exclude, ['/Developers/']);
    assert.deepStrictEqual(config.include, []);
    assert.strictEqual(config.useConcurrency, false);
    assert.strictEqual(config.rootPath, '/Game');
  });
});

describe('reachesSeverity', () => {
  it('should compare against the threshold inclusively', () => {
    const issues = [issueOf('low'), issueOf('high')];

    assert.strictEqual(reachesSeverity(issues, 'high'), true);
    assert.strictEqual(reachesSeverity(issues, 'critical'), false);
    assert.strictEqual(reachesSeverity([], 'low'), false);
  });
});
