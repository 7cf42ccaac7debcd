/**
 * DeadNodeDetector - finds declarations and reads that nothing uses
 *
 * Pass 1 collects what the program references:
 * - variable reads whose output is wired somewhere, every variable write
 * - call targets (also recorded in the scan's reference registry)
 * - delegates touched by bind/assign/unbind/clear/call nodes
 * - custom events bound to a delegate
 *
 * Pass 2 reports:
 * - variable reads with no connections at all
 * - events nobody calls or binds (lifecycle hooks, interface events and
 *   component-bound events excluded)
 * - declared variables never read or written
 * - event dispatchers never bound or called
 */

import type { GraphNode, LintIssue } from '@graphlint/types';
import { ISSUE_TYPE, SEVERITY, isDelegateNode } from '@graphlint/types';
import { Detector } from '../Detector.js';
import type { DetectorContext, DetectorMetadata } from '../Detector.js';
import type { GraphView } from '../../graph/GraphView.js';
import { hasAnyLink } from '../../graph/GraphView.js';
import { LIFECYCLE_PREFIX } from '../../graph/conventions.js';
import { boundCustomEvents } from '../../references/ReferenceRegistry.js';
import type { ReferenceRegistry } from '../../references/ReferenceRegistry.js';

/**
 * Names and ids a program references, built by pass 1
 */
interface LocalReferences {
  variables: Set<string>;
  functions: Set<string>;
  boundEventIds: Set<string>;
}

export class DeadNodeDetector extends Detector {
  get metadata(): DetectorMetadata {
    return {
      name: 'DeadNodeDetector',
      issueType: ISSUE_TYPE.DEAD_NODE,
      description: 'Unused variables, events and event dispatchers',
    };
  }

  detect(context: DetectorContext): LintIssue[] {
    const { program, graphs } = context;
    const registry = this.references(context);

    const local: LocalReferences = {
      variables: new Set(),
      functions: new Set(),
      boundEventIds: new Set(),
    };

    for (const view of graphs) {
      for (const node of view.nodes) {
        this.collect(view, node, local, registry);
      }
    }

    const issues: LintIssue[] = [];

    for (const view of graphs) {
      for (const node of view.nodes) {
        const issue = this.checkNode(context, view, node, local, registry);
        if (issue) issues.push(issue);
      }
    }

    for (const variable of program.variables) {
      if (variable.isMulticastDelegate) {
        if (!local.functions.has(variable.name) && !registry.isReferenced(variable.name)) {
          issues.push(this.issue(context, {
            nodeName: variable.name,
            description: `Event Dispatcher '${variable.name}' is declared but never used`,
            severity: SEVERITY.LOW,
          }));
        }
      } else if (!local.variables.has(variable.name)) {
        issues.push(this.issue(context, {
          nodeName: variable.name,
          description: `Blueprint variable '${variable.name}' is declared but never used`,
          severity: SEVERITY.LOW,
        }));
      }
    }

    this.log(context).debug('Dead node check finished', {
      program: program.path,
      issues: issues.length,
    });

    return issues;
  }

  private collect(
    view: GraphView,
    node: GraphNode,
    local: LocalReferences,
    registry: ReferenceRegistry
  ): void {
    if (isDelegateNode(node)) {
      local.functions.add(node.delegateName);
      registry.recordReference(node.delegateName);

      if (node.kind === 'DelegateBind' || node.kind === 'DelegateAssign') {
        for (const handler of boundCustomEvents(view, node)) {
          local.functions.add(handler.functionName);
          local.boundEventIds.add(handler.id);
          registry.recordReference(handler.functionName);
        }
      }
      return;
    }

    switch (node.kind) {
      case 'VariableGet':
        if (node.pins.some(p => p.direction === 'output' && p.links.length > 0)) {
          local.variables.add(node.variableName);
        }
        break;
      case 'VariableSet':
        local.variables.add(node.variableName);
        break;
      case 'CallFunction':
        local.functions.add(node.functionName);
        registry.recordCall(node.functionName);
        break;
      default:
        break;
    }
  }

  private checkNode(
    context: DetectorContext,
    view: GraphView,
    node: GraphNode,
    local: LocalReferences,
    registry: ReferenceRegistry
  ): LintIssue | null {
    switch (node.kind) {
      case 'VariableGet':
        if (hasAnyLink(node)) return null;
        return this.issue(context, {
          nodeName: node.variableName,
          description: `Variable '${node.variableName}' is retrieved but never used`,
          severity: SEVERITY.LOW,
          nodeId: node.id,
          graphName: view.name,
        });

      case 'Event':
      case 'CustomEvent': {
        const name = node.functionName;
        if (name.startsWith(LIFECYCLE_PREFIX)) return null;
        if (node.kind === 'Event' && node.fromInterface) return null;

        const referenced = local.functions.has(name)
          || registry.isReferenced(name)
          || local.boundEventIds.has(node.id);
        if (referenced) return null;

        return this.issue(context, {
          nodeName: name,
          description: `Custom event '${name}' is defined but never called`,
          severity: SEVERITY.LOW,
          nodeId: node.id,
          graphName: view.name,
        });
      }

      // ComponentBoundEvent fires from component callbacks (overlap, hit, ...)
      default:
        return null;
    }
  }
}
