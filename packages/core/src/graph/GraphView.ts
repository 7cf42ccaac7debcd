/**
 * GraphView - indexed read-only view over one graph
 *
 * Pin links only carry node ids, so traversal needs an id index.
 */

import type { Graph, GraphNode, Pin, PinDirection, PinKind } from '@graphlint/types';

export class GraphView {
  readonly graph: Graph;
  private readonly byId: Map<string, GraphNode>;

  constructor(graph: Graph) {
    this.graph = graph;
    this.byId = new Map(graph.nodes.map(node => [node.id, node]));
  }

  get name(): string {
    return this.graph.name;
  }

  get category(): Graph['category'] {
    return this.graph.category;
  }

  get nodes(): readonly GraphNode[] {
    return this.graph.nodes;
  }

  getNode(id: string): GraphNode | undefined {
    return this.byId.get(id);
  }

  /**
   * Nodes on the other side of a pin's links. Links to nodes outside
   * this graph are dropped.
   */
  linkedNodes(pin: Pin): GraphNode[] {
    const result: GraphNode[] = [];
    for (const link of pin.links) {
      const node = this.byId.get(link.nodeId);
      if (node) result.push(node);
    }
    return result;
  }
}

export function pinsOf(node: GraphNode, kind: PinKind, direction?: PinDirection): Pin[] {
  return node.pins.filter(p => p.kind === kind && (direction === undefined || p.direction === direction));
}

export function hasAnyLink(node: GraphNode): boolean {
  return node.pins.some(p => p.links.length > 0);
}

export function findPin(node: GraphNode, name: string): Pin | undefined {
  return node.pins.find(p => p.name === name);
}
