/**
 * Naming conventions and node classification shared by the detectors.
 *
 * All name checks are substring or prefix heuristics over host names.
 */

import type { ClassInfo, GraphNode, InterfaceInfo, Program } from '@graphlint/types';

// === EVENTS ===

export const TICK_EVENT_NAMES = ['ReceiveTick', 'Tick'];

/** Built-in lifecycle hooks ("ReceiveBeginPlay", "ReceiveTick", ...) */
export const LIFECYCLE_PREFIX = 'Receive';

export function isTickEvent(node: GraphNode): boolean {
  return node.kind === 'Event' && TICK_EVENT_NAMES.includes(node.functionName);
}

// === LOOPS ===

export const LOOP_MARKERS = ['ForLoop', 'WhileLoop', 'ForEach'];

export function isLoopNode(node: GraphNode): boolean {
  if (node.kind === 'Loop') {
    return true;
  }
  const names = [node.nodeClass ?? ''];
  if (node.kind === 'MacroInstance') {
    names.push(node.macroName);
  }
  return names.some(name => LOOP_MARKERS.some(marker => name.includes(marker)));
}

// === FUNCTIONS ===

/** Graph-name fragments suggesting a function runs often */
export const FREQUENT_FUNCTION_PATTERNS = [
  'Update', 'Process', 'Calculate', 'Check', 'Validate', 'GetCurrent', 'IsValid',
];

export const ENGINE_FUNCTION_PATTERNS = [
  'GetPlayerState', 'GetController', 'GetPawn', 'GetCharacter', 'GetOwner',
  'GetGameInstance', 'GetWorld', 'GetLevel', 'GetParent', 'IsA', 'IsValid',
  'K2_', 'Execute', 'Ubergraph', 'UserConstructionScript', 'ConstructionScript',
  'HasAuthority', 'GetNetConnection', 'GetNetMode', 'IsNetMode',
];

/** Timer calls that reference a function by name through their FunctionName pin */
export const TIMER_FUNCTION_PREFIXES = [
  'K2_SetTimer', 'K2_ClearTimer', 'K2_PauseTimer', 'K2_UnPauseTimer',
  'K2_IsTimer', 'K2_GetTimer', 'K2_DoesTimer',
];

export const TIMER_FUNCTION_PIN = 'FunctionName';

/** Macro names owned by the engine's standard macro library */
export const ENGINE_MACRO_PREFIXES = ['K2_', 'Default__'];

export const ENGINE_ROOT = '/Engine/';

// === NODES ===

export const CONSTRUCTION_SCRIPT_TITLE = 'Construction Script';

export const PURE_NODE_TITLE_DENYLIST = ['Reroute', 'Return', 'Make', 'Select', 'Append'];
export const PURE_NODE_CLASS_DENYLIST = ['Literal', 'Constant'];

export const INPUT_BINDING_TITLES = [
  'Thumbstick', 'Touch', 'Input Action', 'Input Axis', 'Enhanced Input',
  'IA_', 'IM_', 'Pressed', 'Released', 'Key',
];
export const INPUT_BINDING_CLASS_MARKER = 'Input';

export function hasExecPins(node: GraphNode): boolean {
  return node.pins.some(p => p.kind === 'exec');
}

/**
 * Nodes without an explicit flag count as pure when they have no exec pins.
 */
export function isPureNode(node: GraphNode): boolean {
  return node.pure ?? !hasExecPins(node);
}

export function isInputBindingNode(node: GraphNode): boolean {
  return INPUT_BINDING_TITLES.some(marker => node.title.includes(marker))
    || (node.nodeClass ?? '').includes(INPUT_BINDING_CLASS_MARKER);
}

// === CLASSES ===

export const ENTRY_POINT_BASE = 'GameInstance';
export const HARD_REFERENCE_BASES = ['Actor', 'ActorComponent'];
export const INTERFACE_PROGRAM_PREFIX = 'BPI_';

/**
 * The class and all of its ancestors, nearest first
 */
export function classChain(cls: ClassInfo | undefined): ClassInfo[] {
  const chain: ClassInfo[] = [];
  const seen = new Set<ClassInfo>();
  for (let current = cls; current && !seen.has(current); current = current.parent) {
    seen.add(current);
    chain.push(current);
  }
  return chain;
}

export function isChildOf(cls: ClassInfo | undefined, baseName: string): boolean {
  return classChain(cls).some(c => c.name === baseName);
}

export function isEntryPointClass(parent: ClassInfo | undefined): boolean {
  return isChildOf(parent, ENTRY_POINT_BASE);
}

export function isInterfaceProgram(program: Program): boolean {
  return program.isInterface === true || program.name.startsWith(INTERFACE_PROGRAM_PREFIX);
}

/**
 * Interfaces the program implements directly or through any ancestor
 */
export function allInterfaces(program: Program): InterfaceInfo[] {
  const result = [...program.interfaces];
  for (const cls of classChain(program.parent)) {
    result.push(...cls.interfaces);
  }
  return result;
}

/**
 * A function declared anywhere up the parent chain is an override
 */
export function overridesParentFunction(program: Program, functionName: string): boolean {
  return classChain(program.parent).some(cls => cls.functions.includes(functionName));
}

/**
 * Casting to an actor or component class pulls the whole class into memory
 */
export function isHardReferenceTarget(target: ClassInfo | undefined): boolean {
  if (!target || target.isInterface) {
    return false;
  }
  return HARD_REFERENCE_BASES.some(base => isChildOf(target, base));
}
