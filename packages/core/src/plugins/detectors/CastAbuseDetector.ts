/**
 * CastAbuseDetector - flags dynamic casts in hot execution paths
 *
 * Context precedence: per-frame tick, then loop body, then a function
 * whose name suggests frequent calls. The last one is a naming heuristic
 * only. Casts outside these contexts are not reported. Casting to an
 * actor or component class (a hard reference) raises any hit to High.
 */

import type { DynamicCastNode, LintIssue, Severity } from '@graphlint/types';
import { ISSUE_TYPE, SEVERITY } from '@graphlint/types';
import { Detector } from '../Detector.js';
import type { DetectorContext, DetectorMetadata } from '../Detector.js';
import type { GraphView } from '../../graph/GraphView.js';
import { isNodeInContext } from '../../graph/traversal.js';
import {
  FREQUENT_FUNCTION_PATTERNS,
  isHardReferenceTarget,
  isLoopNode,
  isTickEvent,
} from '../../graph/conventions.js';

export type CastContext = 'tick' | 'loop' | 'frequent-function';

const CONTEXT_SEVERITY: Record<CastContext, Severity> = {
  'tick': SEVERITY.HIGH,
  'loop': SEVERITY.MEDIUM,
  'frequent-function': SEVERITY.MEDIUM,
};

const CONTEXT_PHRASE: Record<CastContext, string> = {
  'tick': 'in Tick event context',
  'loop': 'in loop context',
  'frequent-function': 'in frequently called function',
};

export class CastAbuseDetector extends Detector {
  get metadata(): DetectorMetadata {
    return {
      name: 'CastAbuseDetector',
      issueType: ISSUE_TYPE.CAST_ABUSE,
      description: 'Dynamic casts in tick, loop or frequently called code',
    };
  }

  detect(context: DetectorContext): LintIssue[] {
    const issues: LintIssue[] = [];

    for (const view of context.graphs) {
      for (const node of view.nodes) {
        if (node.kind !== 'DynamicCast') continue;

        const castContext = classifyCastContext(view, node);
        if (!castContext) continue;

        const hardReference = isHardReferenceTarget(node.targetType);
        const severity = hardReference ? SEVERITY.HIGH : CONTEXT_SEVERITY[castContext];
        const description = [
          `Cast node '${node.title}'`,
          hardReference ? '(hard reference)' : null,
          'may cause performance issues',
          CONTEXT_PHRASE[castContext],
        ].filter((part): part is string => part !== null).join(' ');

        issues.push(this.issue(context, {
          nodeName: node.title,
          description,
          severity,
          nodeId: node.id,
          graphName: view.name,
        }));
      }
    }

    return issues;
  }
}

/**
 * First matching context, each check walking with its own visited set
 */
export function classifyCastContext(view: GraphView, node: DynamicCastNode): CastContext | null {
  if (isNodeInContext(view, node, isTickEvent, new Set())) {
    return 'tick';
  }
  if (isNodeInContext(view, node, isLoopNode, new Set())) {
    return 'loop';
  }
  if (FREQUENT_FUNCTION_PATTERNS.some(pattern => view.name.includes(pattern))) {
    return 'frequent-function';
  }
  return null;
}
