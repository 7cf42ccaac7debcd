/**
 * ReferenceRegistry - corpus-wide record of referenced functions,
 * delegates and macros.
 *
 * Lives in the scan's ResourceRegistry, so every scan starts empty.
 * It only grows: a program walked twice within one scan counts its
 * calls twice, which makes call counts approximate.
 */

import type { CustomEventNode, GraphNode, Program, Resource } from '@graphlint/types';
import { isDelegateNode } from '@graphlint/types';
import { GraphView, findPin } from '../graph/GraphView.js';
import { TIMER_FUNCTION_PIN, TIMER_FUNCTION_PREFIXES } from '../graph/conventions.js';

export const REFERENCE_REGISTRY_ID = 'lint:references';

export class ReferenceRegistry implements Resource {
  readonly id = REFERENCE_REGISTRY_ID;

  private readonly referenced = new Set<string>();
  private readonly callCounts = new Map<string, number>();
  private readonly usedMacros = new Set<string>();
  private corpusCollected = false;

  recordCall(name: string): void {
    this.referenced.add(name);
    this.callCounts.set(name, (this.callCounts.get(name) ?? 0) + 1);
  }

  recordReference(name: string): void {
    this.referenced.add(name);
  }

  recordMacroUse(name: string): void {
    this.usedMacros.add(name);
  }

  isReferenced(name: string): boolean {
    return this.referenced.has(name);
  }

  getCallCount(name: string): number {
    return this.callCounts.get(name) ?? 0;
  }

  isMacroUsed(name: string): boolean {
    return this.usedMacros.has(name);
  }

  get size(): number {
    return this.referenced.size;
  }

  /** True once a full corpus pass has run in this scan */
  get isCorpusCollected(): boolean {
    return this.corpusCollected;
  }

  /**
   * Record every reference in the corpus. Later calls are no-ops.
   */
  collectCorpus(programs: Iterable<Program>): void {
    if (this.corpusCollected) {
      return;
    }
    for (const program of programs) {
      this.collectProgram(program);
    }
    this.corpusCollected = true;
  }

  collectProgram(program: Program): void {
    for (const graph of program.graphs) {
      const view = new GraphView(graph);
      for (const node of graph.nodes) {
        this.collectNode(view, node);
      }
    }
  }

  private collectNode(view: GraphView, node: GraphNode): void {
    switch (node.kind) {
      case 'CallFunction': {
        this.recordCall(node.functionName);
        if (node.ownerClass) {
          this.recordReference(`${node.ownerClass}.${node.functionName}`);
        }
        const timerTarget = timerFunctionName(node);
        if (timerTarget) {
          this.recordReference(timerTarget);
        }
        break;
      }
      case 'MacroInstance':
        this.recordMacroUse(node.macroName);
        break;
      case 'DelegateBind':
      case 'DelegateAssign':
        this.recordReference(node.delegateName);
        for (const handler of boundCustomEvents(view, node)) {
          this.recordReference(handler.functionName);
        }
        break;
      default:
        break;
    }
  }
}

/**
 * Function name a timer call binds by name, if the pin holds a literal
 */
export function timerFunctionName(node: GraphNode): string | undefined {
  if (node.kind !== 'CallFunction') {
    return undefined;
  }
  if (!TIMER_FUNCTION_PREFIXES.some(prefix => node.functionName.startsWith(prefix))) {
    return undefined;
  }
  const pin = findPin(node, TIMER_FUNCTION_PIN);
  if (!pin || pin.links.length > 0 || !pin.defaultValue) {
    return undefined;
  }
  return pin.defaultValue;
}

/**
 * Custom events wired into a delegate node's binding pin
 */
export function boundCustomEvents(view: GraphView, node: GraphNode): CustomEventNode[] {
  if (!isDelegateNode(node)) {
    return [];
  }
  const handlers: CustomEventNode[] = [];
  for (const pin of node.pins) {
    if (pin.kind !== 'delegate') continue;
    for (const linked of view.linkedNodes(pin)) {
      if (linked.kind === 'CustomEvent') {
        handlers.push(linked);
      }
    }
  }
  return handlers;
}
