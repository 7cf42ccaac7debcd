/**
 * Issue Types - findings emitted by detectors
 */

export const ISSUE_TYPE = {
  DEAD_NODE: 'DeadNode',
  ORPHAN_NODE: 'OrphanNode',
  CAST_ABUSE: 'CastAbuse',
  TICK_ABUSE: 'TickAbuse',
  UNUSED_FUNCTION: 'UnusedFunction',
} as const;

export type IssueType = typeof ISSUE_TYPE[keyof typeof ISSUE_TYPE];

export const ALL_ISSUE_TYPES: readonly IssueType[] = Object.values(ISSUE_TYPE);

export const SEVERITY = {
  LOW: 'low',
  MEDIUM: 'medium',
  HIGH: 'high',
  CRITICAL: 'critical',
} as const;

export type Severity = typeof SEVERITY[keyof typeof SEVERITY];

export interface LintIssue {
  readonly type: IssueType;
  /** Path of the program the issue was found in */
  readonly programPath: string;
  readonly nodeName: string;
  readonly description: string;
  readonly severity: Severity;
  readonly nodeId?: string;
  readonly graphName?: string;
}

export function isIssueType(value: unknown): value is IssueType {
  return typeof value === 'string' && ALL_ISSUE_TYPES.some(t => t === value);
}
