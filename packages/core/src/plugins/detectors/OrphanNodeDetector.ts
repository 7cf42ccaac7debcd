/**
 * OrphanNodeDetector - finds nodes cut off from the rest of their graph
 *
 * Pure nodes are orphans when no data output is wired. Impure nodes are
 * orphans when they have exec pins and none of them is connected, in
 * either direction. Entry points (events, function entries), macro
 * instances and tunnels are never orphans.
 */

import type { GraphNode, LintIssue } from '@graphlint/types';
import { ISSUE_TYPE, SEVERITY, isEntryEvent } from '@graphlint/types';
import { Detector } from '../Detector.js';
import type { DetectorContext, DetectorMetadata } from '../Detector.js';
import type { GraphView } from '../../graph/GraphView.js';
import { pinsOf } from '../../graph/GraphView.js';
import {
  CONSTRUCTION_SCRIPT_TITLE,
  PURE_NODE_CLASS_DENYLIST,
  PURE_NODE_TITLE_DENYLIST,
  isInputBindingNode,
  isInterfaceProgram,
  isPureNode,
} from '../../graph/conventions.js';

export class OrphanNodeDetector extends Detector {
  get metadata(): DetectorMetadata {
    return {
      name: 'OrphanNodeDetector',
      issueType: ISSUE_TYPE.ORPHAN_NODE,
      description: 'Nodes disconnected from execution or data flow',
    };
  }

  detect(context: DetectorContext): LintIssue[] {
    // Interface functions are stubs, wiring happens in implementers
    if (isInterfaceProgram(context.program)) {
      return [];
    }

    const issues: LintIssue[] = [];
    for (const view of context.graphs) {
      for (const node of view.nodes) {
        const issue = this.checkNode(context, view, node);
        if (issue) issues.push(issue);
      }
    }
    return issues;
  }

  private checkNode(context: DetectorContext, view: GraphView, node: GraphNode): LintIssue | null {
    if (isEntryEvent(node) || node.kind === 'MacroInstance' || node.kind === 'Tunnel') {
      return null;
    }

    if (isPureNode(node)) {
      if (isDeniedPureNode(node)) return null;

      const wired = pinsOf(node, 'data', 'output').some(p => p.links.length > 0);
      if (wired) return null;

      return this.issue(context, {
        nodeName: node.title,
        description: `Pure node '${node.title}' has no output connections`,
        severity: SEVERITY.LOW,
        nodeId: node.id,
        graphName: view.name,
      });
    }

    if (node.kind === 'FunctionEntry') return null;
    if (node.title === CONSTRUCTION_SCRIPT_TITLE) return null;
    if (isInputBindingNode(node)) return null;

    const execPins = pinsOf(node, 'exec');
    if (execPins.length === 0 || execPins.some(p => p.links.length > 0)) {
      return null;
    }

    return this.issue(context, {
      nodeName: node.title,
      description: `Execution node '${node.title}' is not connected to any execution flow (orphan node)`,
      severity: SEVERITY.HIGH,
      nodeId: node.id,
      graphName: view.name,
    });
  }
}

/**
 * Return values, literals and builder utilities
 */
function isDeniedPureNode(node: GraphNode): boolean {
  const nodeClass = node.nodeClass ?? '';
  return PURE_NODE_TITLE_DENYLIST.some(marker => node.title.includes(marker))
    || PURE_NODE_CLASS_DENYLIST.some(marker => nodeClass.includes(marker));
}
