// Design elaboration: wraps a streaming module in top-level ports and control

import { GraphBuilder } from '../graph/builder.js';
import type { HW } from '../hardware/types.js';
import type { SPL } from '../spl/terms.js';
import { createTracer } from '../trace.js';
import type { TraceOptions } from '../trace.js';
import type { NodeId, SignalGraph } from '../types/netlist.js';
import { ControlUnit } from './control.js';
import { implement } from './implement.js';
import { cyclesPerDataset } from './module.js';
import type { StreamingModule } from './module.js';

export const NEXT_PORT = 'next';
export const RESET_PORT = 'reset';
export const NEXT_OUT_PORT = 'next_out';

export interface ElaborateOptions extends TraceOptions {
  name: string;
}

const DEFAULT_OPTIONS: ElaborateOptions = {
  name: 'stream',
  verbose: false,
};

/**
 * An elaborated streaming design. Datasets enter one word per lane per cycle
 * on `inputs` starting the cycle after `next` is high, and leave on
 * `outputs` `latency` cycles later, announced by `next_out`.
 */
export interface Design<T> {
  name: string;
  graph: SignalGraph;
  module: StreamingModule<T>;
  hw: HW<T>;
  spl: SPL;
  inputs: string[];
  outputs: string[];
  latency: number;
  T: number;
  minGap: number;
  nodeCount: number;
}

export function inputPort(lane: number): string {
  return `i${lane}`;
}

export function outputPort(lane: number): string {
  return `o${lane}`;
}

export function elaborate<T>(module: StreamingModule<T>, options: Partial<ElaborateOptions> = {}): Design<T> {
  const opts: ElaborateOptions = { ...DEFAULT_OPTIONS, ...options };
  const trace = createTracer(opts);
  const b = new GraphBuilder(opts.name);
  const controls = new ControlUnit(b);
  const lanes = 2 ** module.k;

  const next = b.input(NEXT_PORT, 1);
  b.input(RESET_PORT, 1);
  const data: NodeId[] = [];
  for (let lane = 0; lane < lanes; lane++) data.push(b.input(inputPort(lane), module.hw.size));

  const results = implement(controls, module, data, { next, first: b.zeros(1) });
  results.forEach((result, lane) => b.output(outputPort(lane), result));
  b.output(NEXT_OUT_PORT, controls.delay(next, module.latency));

  trace(`elaborated ${opts.name}: ${b.size} nodes, latency ${module.latency}, minGap ${module.minGap}`);
  return {
    name: opts.name,
    graph: b.graph,
    module,
    hw: module.hw,
    spl: module.spl,
    inputs: data.map((_, lane) => inputPort(lane)),
    outputs: results.map((_, lane) => outputPort(lane)),
    latency: module.latency,
    T: cyclesPerDataset(module),
    minGap: module.minGap,
    nodeCount: b.size,
  };
}
