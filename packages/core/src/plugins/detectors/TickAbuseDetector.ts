/**
 * TickAbuseDetector - measures how much work hangs off per-frame events
 */

import type { LintIssue, Severity } from '@graphlint/types';
import { ISSUE_TYPE, SEVERITY } from '@graphlint/types';
import { Detector } from '../Detector.js';
import type { DetectorContext, DetectorMetadata } from '../Detector.js';
import { countConnectedNodes } from '../../graph/traversal.js';
import { isTickEvent } from '../../graph/conventions.js';

/** Reachable node count above which a tick event is reported */
export const TICK_COMPLEXITY_THRESHOLD = 10;

export function tickSeverity(count: number): Severity {
  if (count > 50) return SEVERITY.CRITICAL;
  if (count > 25) return SEVERITY.HIGH;
  if (count > 10) return SEVERITY.MEDIUM;
  return SEVERITY.LOW;
}

export class TickAbuseDetector extends Detector {
  get metadata(): DetectorMetadata {
    return {
      name: 'TickAbuseDetector',
      issueType: ISSUE_TYPE.TICK_ABUSE,
      description: 'Tick events driving large execution chains',
    };
  }

  detect(context: DetectorContext): LintIssue[] {
    const issues: LintIssue[] = [];

    for (const view of context.graphs) {
      if (view.category !== 'event') continue;

      for (const node of view.nodes) {
        if (!isTickEvent(node)) continue;

        const count = countConnectedNodes(view, node, new Set());
        if (count <= TICK_COMPLEXITY_THRESHOLD) continue;

        issues.push(this.issue(context, {
          nodeName: 'Event Tick',
          description: `Tick event has high complexity (${count} connected nodes)`,
          severity: tickSeverity(count),
          nodeId: node.id,
          graphName: view.name,
        }));
      }
    }

    return issues;
  }
}
