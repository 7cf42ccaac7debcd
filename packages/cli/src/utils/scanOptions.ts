/**
 * Option parsing for the scan command
 */

import type { IssueType, LintConfig, LintIssue, LogLevel, Severity } from '@graphlint/core';
import { ALL_ISSUE_TYPES, SEVERITY, isIssueType, isLogLevel } from '@graphlint/core';
import { SEVERITY_ORDER, severityRank } from './formatIssue.js';

export interface ScanCommandOptions {
  project: string;
  checks?: string;
  include?: string[];
  exclude?: string[];
  folder?: string[];
  concurrency: boolean;
  json?: boolean;
  quiet?: boolean;
  logLevel: string;
  logFile?: string;
  failOn?: string;
}

/**
 * "DeadNode,CastAbuse" or "all"
 */
export function parseChecks(value: string): IssueType[] {
  if (value.trim() === 'all') {
    return [...ALL_ISSUE_TYPES];
  }
  const checks: IssueType[] = [];
  for (const part of value.split(',')) {
    const name = part.trim();
    if (!name) continue;
    if (!isIssueType(name)) {
      throw new Error(`Unknown check "${name}". Known checks: ${ALL_ISSUE_TYPES.join(', ')}`);
    }
    if (!checks.includes(name)) {
      checks.push(name);
    }
  }
  if (checks.length === 0) {
    throw new Error('No checks selected');
  }
  return checks;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(`Invalid log level "${value}". Use one of: silent, errors, warnings, info, debug`);
  }
  return value;
}

export function parseSeverity(value: string): Severity {
  const found = SEVERITY_ORDER.find(severity => severity === value);
  if (!found) {
    throw new Error(`Invalid severity "${value}". Use one of: ${SEVERITY_ORDER.join(', ')}`);
  }
  return found;
}

/**
 * Command-line overrides on top of the project config
 */
export function applyOverrides(config: LintConfig, options: ScanCommandOptions): LintConfig {
  return {
    ...config,
    checks: options.checks ? parseChecks(options.checks) : config.checks,
    include: options.include ?? config.include,
    exclude: options.exclude ?? config.exclude,
    useConcurrency: options.concurrency && config.useConcurrency,
  };
}

/**
 * True when any issue is at or above `threshold`
 */
export function reachesSeverity(issues: readonly LintIssue[], threshold: Severity = SEVERITY.CRITICAL): boolean {
  const min = severityRank(threshold);
  return issues.some(issue => severityRank(issue.severity) >= min);
}
