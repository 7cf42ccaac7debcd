/**
 * parseCorpus - validate an exported corpus document into programs
 *
 * Document shape:
 * ```json
 * { "programs": [ { "path": "/Game/BP_Hero.BP_Hero", "name": "BP_Hero", "graphs": [...] } ] }
 * ```
 * A bare array of programs is accepted as well. Every field is checked;
 * the first mismatch throws CorpusFormatError naming its location.
 */

import type {
  BaseGraphNode,
  ClassInfo,
  Graph,
  GraphCategory,
  GraphNode,
  InterfaceInfo,
  Pin,
  PinDirection,
  PinKind,
  PinLink,
  Program,
  VariableDecl,
} from '@graphlint/types';
import { CorpusFormatError } from '../errors/LintError.js';

type JsonObject = Record<string, unknown>;

const GRAPH_CATEGORIES: readonly GraphCategory[] = ['event', 'function', 'macro'];
const PIN_DIRECTIONS: readonly PinDirection[] = ['input', 'output'];
const PIN_KINDS: readonly PinKind[] = ['exec', 'data', 'delegate'];

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(where: string, message: string): never {
  throw new CorpusFormatError(`Invalid corpus: ${where} ${message}`, { location: where });
}

function object(value: unknown, where: string): JsonObject {
  if (!isObject(value)) fail(where, 'must be an object');
  return value;
}

function array(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) fail(where, 'must be an array');
  return value;
}

function optionalArray(value: unknown, where: string): unknown[] {
  return value === undefined ? [] : array(value, where);
}

function string(value: unknown, where: string): string {
  if (typeof value !== 'string') fail(where, 'must be a string');
  return value;
}

function optionalString(value: unknown, where: string): string | undefined {
  return value === undefined ? undefined : string(value, where);
}

function optionalBoolean(value: unknown, where: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') fail(where, 'must be a boolean');
  return value;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], where: string): T {
  const found = allowed.find(candidate => candidate === value);
  if (found === undefined) fail(where, `must be one of ${allowed.join(', ')}`);
  return found;
}

function strings(value: unknown, where: string): string[] {
  return optionalArray(value, where).map((item, i) => string(item, `${where}[${i}]`));
}

function parseInterface(value: unknown, where: string): InterfaceInfo {
  const raw = object(value, where);
  return {
    name: string(raw.name, `${where}.name`),
    functions: strings(raw.functions, `${where}.functions`),
  };
}

function parseInterfaces(value: unknown, where: string): InterfaceInfo[] {
  return optionalArray(value, where).map((item, i) => parseInterface(item, `${where}[${i}]`));
}

function parseClass(value: unknown, where: string): ClassInfo {
  const raw = object(value, where);
  return {
    name: string(raw.name, `${where}.name`),
    parent: raw.parent === undefined ? undefined : parseClass(raw.parent, `${where}.parent`),
    functions: strings(raw.functions, `${where}.functions`),
    interfaces: parseInterfaces(raw.interfaces, `${where}.interfaces`),
    isInterface: optionalBoolean(raw.isInterface, `${where}.isInterface`),
  };
}

function parseLink(value: unknown, where: string): PinLink {
  const raw = object(value, where);
  return {
    nodeId: string(raw.nodeId, `${where}.nodeId`),
    pinId: string(raw.pinId, `${where}.pinId`),
  };
}

function parsePin(value: unknown, where: string): Pin {
  const raw = object(value, where);
  return {
    id: string(raw.id, `${where}.id`),
    name: string(raw.name, `${where}.name`),
    direction: oneOf(raw.direction, PIN_DIRECTIONS, `${where}.direction`),
    kind: oneOf(raw.kind, PIN_KINDS, `${where}.kind`),
    links: optionalArray(raw.links, `${where}.links`).map((link, i) => parseLink(link, `${where}.links[${i}]`)),
    defaultValue: optionalString(raw.defaultValue, `${where}.defaultValue`),
  };
}

function parseNode(value: unknown, where: string): GraphNode {
  const raw = object(value, where);
  const base: Omit<BaseGraphNode, 'kind'> = {
    id: string(raw.id, `${where}.id`),
    title: optionalString(raw.title, `${where}.title`) ?? '',
    nodeClass: optionalString(raw.nodeClass, `${where}.nodeClass`),
    pure: optionalBoolean(raw.pure, `${where}.pure`),
    pins: optionalArray(raw.pins, `${where}.pins`).map((pin, i) => parsePin(pin, `${where}.pins[${i}]`)),
  };
  const functionName = (): string => string(raw.functionName, `${where}.functionName`);
  const variableName = (): string => string(raw.variableName, `${where}.variableName`);
  const delegateName = (): string => string(raw.delegateName, `${where}.delegateName`);

  const kind = string(raw.kind, `${where}.kind`);
  switch (kind) {
    case 'Event':
      return {
        ...base,
        kind,
        functionName: functionName(),
        fromInterface: optionalBoolean(raw.fromInterface, `${where}.fromInterface`),
      };
    case 'CustomEvent':
    case 'FunctionEntry':
      return { ...base, kind, functionName: functionName() };
    case 'ComponentBoundEvent':
      return {
        ...base,
        kind,
        functionName: functionName(),
        componentName: string(raw.componentName, `${where}.componentName`),
      };
    case 'CallFunction':
      return {
        ...base,
        kind,
        functionName: functionName(),
        ownerClass: optionalString(raw.ownerClass, `${where}.ownerClass`),
      };
    case 'VariableGet':
    case 'VariableSet':
      return { ...base, kind, variableName: variableName() };
    case 'DynamicCast':
      return {
        ...base,
        kind,
        targetType: raw.targetType === undefined ? undefined : parseClass(raw.targetType, `${where}.targetType`),
      };
    case 'MacroInstance':
      return { ...base, kind, macroName: string(raw.macroName, `${where}.macroName`) };
    case 'DelegateBind':
    case 'DelegateAssign':
    case 'DelegateUnbind':
    case 'DelegateClear':
    case 'DelegateCall':
      return { ...base, kind, delegateName: delegateName() };
    case 'FunctionResult':
    case 'Loop':
    case 'Branch':
    case 'Tunnel':
    case 'Generic':
      return { ...base, kind };
    default:
      return fail(`${where}.kind`, `has unknown value "${kind}"`);
  }
}

function parseGraph(value: unknown, where: string): Graph {
  const raw = object(value, where);
  return {
    name: string(raw.name, `${where}.name`),
    category: oneOf(raw.category, GRAPH_CATEGORIES, `${where}.category`),
    nodes: optionalArray(raw.nodes, `${where}.nodes`).map((node, i) => parseNode(node, `${where}.nodes[${i}]`)),
  };
}

function parseVariable(value: unknown, where: string): VariableDecl {
  const raw = object(value, where);
  return {
    name: string(raw.name, `${where}.name`),
    typeTag: optionalString(raw.typeTag, `${where}.typeTag`) ?? '',
    isMulticastDelegate: optionalBoolean(raw.isMulticastDelegate, `${where}.isMulticastDelegate`),
  };
}

export function parseProgram(value: unknown, where = 'program'): Program {
  const raw = object(value, where);
  return {
    path: string(raw.path, `${where}.path`),
    name: string(raw.name, `${where}.name`),
    parent: raw.parent === undefined ? undefined : parseClass(raw.parent, `${where}.parent`),
    interfaces: parseInterfaces(raw.interfaces, `${where}.interfaces`),
    variables: optionalArray(raw.variables, `${where}.variables`).map((v, i) => parseVariable(v, `${where}.variables[${i}]`)),
    graphs: optionalArray(raw.graphs, `${where}.graphs`).map((g, i) => parseGraph(g, `${where}.graphs[${i}]`)),
    isInterface: optionalBoolean(raw.isInterface, `${where}.isInterface`),
  };
}

export function parseCorpus(document: unknown): Program[] {
  const list: unknown[] = Array.isArray(document)
    ? document
    : array(object(document, 'document').programs, 'programs');
  return list.map((item, i) => parseProgram(item, `programs[${i}]`));
}
