/**
 * Node Types - visual graph node definitions
 *
 * Nodes form a closed union discriminated by `kind`. Host-specific
 * details that the detectors only inspect by substring (class names,
 * titles) stay as plain strings.
 */

// === NODE KINDS ===
export const NODE_KIND = {
  // Entry points
  EVENT: 'Event',
  CUSTOM_EVENT: 'CustomEvent',
  COMPONENT_BOUND_EVENT: 'ComponentBoundEvent',
  FUNCTION_ENTRY: 'FunctionEntry',
  FUNCTION_RESULT: 'FunctionResult',

  // Calls and data access
  CALL_FUNCTION: 'CallFunction',
  VARIABLE_GET: 'VariableGet',
  VARIABLE_SET: 'VariableSet',
  DYNAMIC_CAST: 'DynamicCast',

  // Flow control
  MACRO_INSTANCE: 'MacroInstance',
  LOOP: 'Loop',
  BRANCH: 'Branch',
  TUNNEL: 'Tunnel',

  // Multicast delegates
  DELEGATE_BIND: 'DelegateBind',
  DELEGATE_ASSIGN: 'DelegateAssign',
  DELEGATE_UNBIND: 'DelegateUnbind',
  DELEGATE_CLEAR: 'DelegateClear',
  DELEGATE_CALL: 'DelegateCall',

  // Anything else the host exposes
  GENERIC: 'Generic',
} as const;

export type NodeKind = typeof NODE_KIND[keyof typeof NODE_KIND];

// === PINS ===
export type PinDirection = 'input' | 'output';

/**
 * exec - control flow, data - values, delegate - event binding
 */
export type PinKind = 'exec' | 'data' | 'delegate';

/**
 * Reference to a pin on another node of the same graph
 */
export interface PinLink {
  nodeId: string;
  pinId: string;
}

export interface Pin {
  id: string;
  name: string;
  direction: PinDirection;
  kind: PinKind;
  links: PinLink[];
  /** Literal typed into an unlinked input pin */
  defaultValue?: string;
}

// === CLASS HIERARCHY ===
export interface InterfaceInfo {
  name: string;
  /** Function names the interface declares */
  functions: string[];
}

/**
 * A class in a program's inheritance chain (single inheritance)
 */
export interface ClassInfo {
  name: string;
  parent?: ClassInfo;
  /** Functions the class declares, overridable by subclasses */
  functions: string[];
  interfaces: InterfaceInfo[];
  isInterface?: boolean;
}

// === NODE RECORDS ===
export interface BaseGraphNode {
  id: string;
  kind: NodeKind;
  title: string;
  /** Host class name, e.g. "K2Node_CallFunction" */
  nodeClass?: string;
  /** Side-effect free node without exec pins */
  pure?: boolean;
  pins: Pin[];
}

export interface EventNode extends BaseGraphNode {
  kind: 'Event';
  functionName: string;
  /** Event mandated by an implemented interface */
  fromInterface?: boolean;
}

export interface CustomEventNode extends BaseGraphNode {
  kind: 'CustomEvent';
  functionName: string;
}

export interface ComponentBoundEventNode extends BaseGraphNode {
  kind: 'ComponentBoundEvent';
  functionName: string;
  componentName: string;
}

export interface FunctionEntryNode extends BaseGraphNode {
  kind: 'FunctionEntry';
  functionName: string;
}

export interface FunctionResultNode extends BaseGraphNode {
  kind: 'FunctionResult';
}

export interface CallFunctionNode extends BaseGraphNode {
  kind: 'CallFunction';
  functionName: string;
  /** Class owning the called function, when known */
  ownerClass?: string;
}

export interface VariableGetNode extends BaseGraphNode {
  kind: 'VariableGet';
  variableName: string;
}

export interface VariableSetNode extends BaseGraphNode {
  kind: 'VariableSet';
  variableName: string;
}

export interface DynamicCastNode extends BaseGraphNode {
  kind: 'DynamicCast';
  targetType?: ClassInfo;
}

export interface MacroInstanceNode extends BaseGraphNode {
  kind: 'MacroInstance';
  /** Name of the instantiated macro graph */
  macroName: string;
}

export interface LoopNode extends BaseGraphNode {
  kind: 'Loop';
}

export interface BranchNode extends BaseGraphNode {
  kind: 'Branch';
}

export interface TunnelNode extends BaseGraphNode {
  kind: 'Tunnel';
}

export interface DelegateNode extends BaseGraphNode {
  kind: 'DelegateBind' | 'DelegateAssign' | 'DelegateUnbind' | 'DelegateClear' | 'DelegateCall';
  delegateName: string;
}

export interface GenericNode extends BaseGraphNode {
  kind: 'Generic';
}

export type GraphNode =
  | EventNode
  | CustomEventNode
  | ComponentBoundEventNode
  | FunctionEntryNode
  | FunctionResultNode
  | CallFunctionNode
  | VariableGetNode
  | VariableSetNode
  | DynamicCastNode
  | MacroInstanceNode
  | LoopNode
  | BranchNode
  | TunnelNode
  | DelegateNode
  | GenericNode;

export function isDelegateNode(node: GraphNode): node is DelegateNode {
  return node.kind === 'DelegateBind'
    || node.kind === 'DelegateAssign'
    || node.kind === 'DelegateUnbind'
    || node.kind === 'DelegateClear'
    || node.kind === 'DelegateCall';
}

export function isEntryEvent(node: GraphNode): node is EventNode | CustomEventNode | ComponentBoundEventNode {
  return node.kind === 'Event' || node.kind === 'CustomEvent' || node.kind === 'ComponentBoundEvent';
}
