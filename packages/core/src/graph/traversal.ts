/**
 * Graph traversal primitives
 *
 * Both walks follow exec pins only and never revisit a node, so they
 * terminate on cyclic graphs (loops, recursive macro expansion).
 */

import type { GraphNode } from '@graphlint/types';
import { GraphView, pinsOf } from './GraphView.js';

export type NodePredicate = (node: GraphNode) => boolean;

/**
 * Depth-first walk along output exec links from `start`.
 * Returns the number of newly reached nodes, `start` included.
 */
export function countConnectedNodes(
  view: GraphView,
  start: GraphNode,
  visited: Set<string> = new Set()
): number {
  if (visited.has(start.id)) {
    return 0;
  }
  visited.add(start.id);

  let count = 1;
  for (const pin of pinsOf(start, 'exec', 'output')) {
    for (const next of view.linkedNodes(pin)) {
      count += countConnectedNodes(view, next, visited);
    }
  }
  return count;
}

/**
 * Walks backward along input exec links from `node`, testing `predicate`
 * on every node reached (`node` itself included).
 *
 * Pass a fresh `visited` set per top-level question; sharing one between
 * unrelated checks hides nodes the first check already walked.
 */
export function isNodeInContext(
  view: GraphView,
  node: GraphNode,
  predicate: NodePredicate,
  visited: Set<string> = new Set()
): boolean {
  if (visited.has(node.id)) {
    return false;
  }
  visited.add(node.id);

  if (predicate(node)) {
    return true;
  }

  for (const pin of pinsOf(node, 'exec', 'input')) {
    for (const prev of view.linkedNodes(pin)) {
      if (isNodeInContext(view, prev, predicate, visited)) {
        return true;
      }
    }
  }
  return false;
}
