// Lowering: signal-graph nodes as backend-neutral primitive statements

import type { NodeId, SignalGraph, SignalNode } from '../types/netlist.js';

export type Expression =
  | { op: 'const'; value: bigint }
  | { op: 'and' | 'or' | 'xor' | 'concat'; operands: NodeId[] }
  | { op: 'not'; operand: NodeId }
  | { op: 'plus' | 'minus'; lhs: NodeId; rhs: NodeId }
  | { op: 'slice'; operand: NodeId; low: number; high: number }
  | { op: 'mux'; address: NodeId; cases: NodeId[]; fallback: NodeId | null }
  | { op: 'read'; memory: NodeId; address: NodeId };

export type Statement =
  | { kind: 'input'; target: NodeId; width: number; name: string }
  | { kind: 'output'; width: number; name: string; source: NodeId }
  | { kind: 'assign'; target: NodeId; width: number; expression: Expression }
  | { kind: 'multiply'; target: NodeId; width: number; lhs: NodeId; rhs: NodeId; signed: boolean; shift: number }
  | { kind: 'register'; target: NodeId; width: number; input: NodeId; init: bigint }
  | { kind: 'memory'; target: NodeId; width: number; depth: number; data: NodeId; address: NodeId; enable: NodeId }
  | { kind: 'instance'; target: NodeId; width: number; module: string; inputs: NodeId[] };

/** The primitive statements realising one node. */
export function lowerNode(node: SignalNode): Statement[] {
  const { id: target, width } = node;
  switch (node.kind) {
    case 'input':
      return [{ kind: 'input', target, width, name: node.name }];
    case 'output':
      return [{ kind: 'output', width, name: node.name, source: node.input }];
    case 'const':
      return [{ kind: 'assign', target, width, expression: { op: 'const', value: node.value } }];
    case 'and':
    case 'or':
    case 'xor':
      return [{ kind: 'assign', target, width, expression: { op: node.kind, operands: node.terms } }];
    case 'concat':
      return [{ kind: 'assign', target, width, expression: { op: 'concat', operands: node.terms } }];
    case 'not':
      return [{ kind: 'assign', target, width, expression: { op: 'not', operand: node.input } }];
    case 'plus':
    case 'minus':
      return [{ kind: 'assign', target, width, expression: { op: node.kind, lhs: node.lhs, rhs: node.rhs } }];
    case 'times':
      return [{
        kind: 'multiply', target, width, lhs: node.lhs, rhs: node.rhs,
        signed: node.signed, shift: node.fractionalBits,
      }];
    case 'tap':
      return [{
        kind: 'assign', target, width,
        expression: { op: 'slice', operand: node.input, low: node.start, high: node.start + width - 1 },
      }];
    case 'register':
      if (node.input === null) throw new Error(`Unconnected feedback register: ${target}`);
      return [{ kind: 'register', target, width, input: node.input, init: node.init }];
    case 'mux':
      return [{
        kind: 'assign', target, width,
        expression: { op: 'mux', address: node.address, cases: node.inputs, fallback: node.fallback },
      }];
    case 'memory':
      return [{
        kind: 'memory', target, width, depth: 2 ** node.addressWidth,
        data: node.data, address: node.writeAddress, enable: node.writeEnable,
      }];
    case 'memoryRead':
      return [{ kind: 'assign', target, width, expression: { op: 'read', memory: node.memory, address: node.address } }];
    case 'extern':
      return [{ kind: 'instance', target, width, module: node.operator.name, inputs: node.inputs }];
  }
}

export function lowerGraph(graph: SignalGraph): Statement[] {
  return graph.nodes.flatMap(lowerNode);
}
