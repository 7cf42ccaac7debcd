/**
 * Text rendering of scan results
 */

import type { LintIssue, Severity } from '@graphlint/core';
import { SEVERITY } from '@graphlint/core';

/** Most severe first */
export const SEVERITY_ORDER: readonly Severity[] = [
  SEVERITY.CRITICAL,
  SEVERITY.HIGH,
  SEVERITY.MEDIUM,
  SEVERITY.LOW,
];

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.length - SEVERITY_ORDER.indexOf(severity);
}

/**
 * Two lines per issue:
 *   [CastAbuse] /Game/BP_Hero.BP_Hero > EventGraph > Cast To Pawn
 *     Cast node 'Cast To Pawn' may cause performance issues in loop context
 */
export function formatIssue(issue: LintIssue): string {
  const location = [issue.programPath, issue.graphName, issue.nodeName]
    .filter((part): part is string => Boolean(part))
    .join(' > ');
  return `[${issue.type}] ${location}\n    ${issue.description}`;
}

/**
 * Issues grouped under severity headings, most severe first.
 * Insertion order is kept inside each group.
 */
export function formatIssueReport(issues: readonly LintIssue[]): string {
  if (issues.length === 0) {
    return 'No issues found';
  }

  const sections: string[] = [];
  for (const severity of SEVERITY_ORDER) {
    const group = issues.filter(issue => issue.severity === severity);
    if (group.length === 0) continue;
    const lines = group.map(issue => `  ${formatIssue(issue)}`);
    sections.push(`${severity.toUpperCase()} (${group.length})\n${lines.join('\n')}`);
  }
  return sections.join('\n\n');
}

/**
 * Counts per severity, e.g. "1 critical, 2 medium"
 */
export function formatSummary(issues: readonly LintIssue[]): string {
  const parts: string[] = [];
  for (const severity of SEVERITY_ORDER) {
    const count = issues.filter(issue => issue.severity === severity).length;
    if (count > 0) {
      parts.push(`${count} ${severity}`);
    }
  }
  return parts.length > 0 ? parts.join(', ') : 'no issues';
}
