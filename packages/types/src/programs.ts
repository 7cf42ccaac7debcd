/**
 * Program Types - analyzable units and their graphs
 */

import type { ClassInfo, GraphNode, InterfaceInfo } from './nodes.js';

/**
 * event - the program's event graph(s), function - one callable per graph,
 * macro - reusable node collapses instantiated by MacroInstance nodes
 */
export type GraphCategory = 'event' | 'function' | 'macro';

export interface Graph {
  /** Graph name; function graphs carry the function name */
  name: string;
  category: GraphCategory;
  nodes: GraphNode[];
}

export interface VariableDecl {
  name: string;
  typeTag: string;
  isMulticastDelegate?: boolean;
}

/**
 * Program identifier, the full object path
 * (e.g. "/Game/Characters/BP_Hero.BP_Hero")
 */
export type ProgramId = string;

export interface Program {
  path: ProgramId;
  name: string;
  parent?: ClassInfo;
  interfaces: InterfaceInfo[];
  variables: VariableDecl[];
  graphs: Graph[];
  /** Interface-defining program */
  isInterface?: boolean;
}

/**
 * Lightweight listing entry returned by an asset source before loading
 */
export interface ProgramDescriptor {
  id: ProgramId;
  name: string;
  /** Parent class chain, when the source knows it without loading */
  parent?: ClassInfo;
}
