// Netlist types for the word-level signal graph
// Nodes live in an arena and refer to their operands by index

export type NodeId = number;

// An operator realised by an external IP core, referenced only by name
export interface ExternalOperator {
  name: string;         // Module name emitted by the backends
  width: number;        // Result width
  evaluate(args: readonly bigint[]): bigint;
}

interface NodeBase {
  id: NodeId;
  width: number;
}

export interface InputNode extends NodeBase {
  kind: 'input';
  name: string;
}

export interface OutputNode extends NodeBase {
  kind: 'output';
  name: string;
  input: NodeId;
}

export interface ConstNode extends NodeBase {
  kind: 'const';
  value: bigint;        // Always masked to width
}

export interface LogicNode extends NodeBase {
  kind: 'and' | 'or' | 'xor';
  terms: NodeId[];      // At least two, sorted
}

export interface NotNode extends NodeBase {
  kind: 'not';
  input: NodeId;
}

export interface ArithmeticNode extends NodeBase {
  kind: 'plus' | 'minus';
  lhs: NodeId;
  rhs: NodeId;
}

export interface TimesNode extends NodeBase {
  kind: 'times';
  lhs: NodeId;
  rhs: NodeId;
  signed: boolean;
  fractionalBits: number; // Product is shifted right by this amount
}

export interface ConcatNode extends NodeBase {
  kind: 'concat';
  terms: NodeId[];      // Most significant first
}

export interface TapNode extends NodeBase {
  kind: 'tap';
  input: NodeId;
  start: number;        // Least significant bit taken
}

export interface RegisterNode extends NodeBase {
  kind: 'register';
  input: NodeId | null; // Null until a feedback register is connected
  init: bigint;         // Value after reset
}

export interface MuxNode extends NodeBase {
  kind: 'mux';
  address: NodeId;
  inputs: NodeId[];
  fallback: NodeId | null; // Selected for addresses past the end of inputs
}

export interface MemoryNode extends NodeBase {
  kind: 'memory';
  addressWidth: number;
  data: NodeId;
  writeAddress: NodeId;
  writeEnable: NodeId;
}

export interface MemoryReadNode extends NodeBase {
  kind: 'memoryRead';
  memory: NodeId;
  address: NodeId;
}

export interface ExternNode extends NodeBase {
  kind: 'extern';
  operator: ExternalOperator;
  inputs: NodeId[];
}

export type SignalNode =
  | InputNode
  | OutputNode
  | ConstNode
  | LogicNode
  | NotNode
  | ArithmeticNode
  | TimesNode
  | ConcatNode
  | TapNode
  | RegisterNode
  | MuxNode
  | MemoryNode
  | MemoryReadNode
  | ExternNode;

export type NodeKind = SignalNode['kind'];

// The complete signal graph
export interface SignalGraph {
  name: string;
  nodes: SignalNode[];
  inputs: NodeId[];
  outputs: NodeId[];
}

// Helper to create an empty graph
export function createGraph(name: string): SignalGraph {
  return {
    name,
    nodes: [],
    inputs: [],
    outputs: [],
  };
}

/** Operands read combinationally within the cycle (register and memory state excluded). */
export function combinationalOperands(node: SignalNode): NodeId[] {
  switch (node.kind) {
    case 'input':
    case 'const':
    case 'register':
    case 'memory':
      return [];
    case 'output':
    case 'not':
    case 'tap':
      return [node.input];
    case 'and':
    case 'or':
    case 'xor':
    case 'concat':
      return node.terms;
    case 'plus':
    case 'minus':
    case 'times':
      return [node.lhs, node.rhs];
    case 'mux':
      return node.fallback === null ? [node.address, ...node.inputs] : [node.address, ...node.inputs, node.fallback];
    case 'memoryRead':
      return [node.address];
    case 'extern':
      return node.inputs;
  }
}
