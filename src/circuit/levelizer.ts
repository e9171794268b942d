// Levelizer: topological ordering and level assignment for cycle simulation

import { combinationalOperands } from '../types/netlist.js';
import type { NodeId, SignalGraph } from '../types/netlist.js';

export interface LevelizedGraph {
  graph: SignalGraph;
  order: NodeId[];      // Every node after its combinational operands
  levels: number[];     // Indexed by node id
  maxLevel: number;
}

/**
 * Levelize a signal graph.
 *
 * Level 0 holds inputs, constants and state (registers, memories); every other
 * node sits one level above its deepest combinational operand. Passes run in
 * id order, which is already topological for graphs built by the builder,
 * so one pass usually suffices.
 */
export function levelize(graph: SignalGraph): LevelizedGraph {
  for (const node of graph.nodes) {
    if (node.kind === 'register' && node.input === null) {
      throw new Error(`Unconnected feedback register: ${node.id}`);
    }
  }

  const levels = new Array<number>(graph.nodes.length).fill(-1);
  let remaining = graph.nodes.length;
  while (remaining > 0) {
    let progress = false;
    for (const node of graph.nodes) {
      if (levels[node.id] >= 0) continue;
      let level = 0;
      let ready = true;
      for (const operand of combinationalOperands(node)) {
        const operandLevel = levels[operand];
        if (operandLevel === undefined || operandLevel < 0) {
          ready = false;
          break;
        }
        level = Math.max(level, operandLevel + 1);
      }
      if (!ready) continue;
      levels[node.id] = level;
      remaining--;
      progress = true;
    }
    if (!progress) {
      throw new Error('Levelization failed: possible combinational loop detected');
    }
  }

  const maxLevel = levels.reduce((max, level) => Math.max(max, level), 0);
  const buckets: NodeId[][] = Array.from({ length: maxLevel + 1 }, () => []);
  levels.forEach((level, id) => buckets[level].push(id));
  return { graph, order: buckets.flat(), levels, maxLevel };
}

/** Node count per kind and per level, for reports. */
export function getStats(levelized: LevelizedGraph): {
  totalNodes: number;
  registers: number;
  memories: number;
  maxLevel: number;
  nodesPerLevel: number[];
} {
  const nodes = levelized.graph.nodes;
  const nodesPerLevel = new Array<number>(levelized.maxLevel + 1).fill(0);
  for (const level of levelized.levels) nodesPerLevel[level]++;
  return {
    totalNodes: nodes.length,
    registers: nodes.filter((n) => n.kind === 'register').length,
    memories: nodes.filter((n) => n.kind === 'memory').length,
    maxLevel: levelized.maxLevel,
    nodesPerLevel,
  };
}
