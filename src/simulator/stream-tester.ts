// Stream tester: drives datasets through an elaborated design and checks them against the term

import { evaluate } from '../spl/eval.js';
import { elaborate, NEXT_OUT_PORT, NEXT_PORT, RESET_PORT } from '../streaming/design.js';
import type { Design } from '../streaming/design.js';
import { defaultGap } from '../streaming/module.js';
import type { StreamingModule } from '../streaming/module.js';
import { createTracer } from '../trace.js';
import type { TraceOptions } from '../trace.js';
import { createRandom } from './random.js';
import type { Random } from './random.js';
import { Simulator } from './simulator.js';

export interface StreamOptions {
  gap: number | null;   // Idle cycles between datasets; null picks the smallest the design accepts
  random: Random;       // Source of the garbage driven outside dataset windows
}

/** Port values of one cycle; `outputs` only inside a dataset's output window. */
export interface CycleRecord {
  next: bigint;
  inputs: bigint[];
  outputs: bigint[] | null;
}

export interface StreamResult<T> {
  outputs: T[][];
  cycles: CycleRecord[];
  starts: number[];     // Cycle of the first word of every dataset
  nextOut: number[];    // Cycles in which next_out was high
}

export interface TestOptions extends TraceOptions {
  datasets: number;
  gap: number | null;
  seed: number;
}

const DEFAULT_TEST_OPTIONS: TestOptions = {
  datasets: 3,
  gap: null,
  seed: 1,
  verbose: false,
};

/**
 * Streams `datasets` through `design`. The first `next` pulse is in cycle 0,
 * so dataset d starts in cycle 1 + d (T + gap); its outputs are collected
 * `latency` cycles after its inputs.
 */
export function simulate<T>(
  design: Design<T>,
  datasets: readonly (readonly T[])[],
  options: Partial<StreamOptions> = {}
): StreamResult<T> {
  const { hw, T, latency } = design;
  const gap = options.gap ?? defaultGap(design.module);
  const random = options.random ?? createRandom(1);
  const lanes = design.inputs.length;
  const period = T + gap;
  const starts = datasets.map((_, d) => 1 + d * period);
  const outputs = datasets.map(() => new Array<T>(T * lanes));
  const nextOut: number[] = [];
  const cycles: CycleRecord[] = [];

  // Dataset and word index of the word streamed in cycle x, if any
  const slot = (x: number): { d: number; c: number } | null => {
    if (x < 1) return null;
    const d = Math.floor((x - 1) / period);
    const c = x - 1 - d * period;
    return d < datasets.length && c < T ? { d, c } : null;
  };

  const simulator = new Simulator(design.graph, { resetPort: RESET_PORT });
  simulator.setInput(RESET_PORT, 0n);
  const end = starts.length === 0 ? 0 : starts[starts.length - 1] + latency + T;
  for (let x = 0; x < end; x++) {
    const input = slot(x);
    const record: CycleRecord = { next: slot(x + 1)?.c === 0 ? 1n : 0n, inputs: [], outputs: null };
    simulator.setInput(NEXT_PORT, record.next);
    design.inputs.forEach((port, lane) => {
      const value = input === null ? hw.sample(random) : datasets[input.d][input.c * lanes + lane];
      const bits = hw.bitsOf(value);
      record.inputs.push(bits);
      simulator.setInput(port, bits);
    });

    const output = slot(x - latency);
    if (output !== null) {
      const bits = design.outputs.map((port) => simulator.getOutput(port));
      bits.forEach((value, lane) => {
        outputs[output.d][output.c * lanes + lane] = hw.valueOf(value);
      });
      record.outputs = bits;
    }
    if (simulator.getOutput(NEXT_OUT_PORT) === 1n) nextOut.push(x);
    cycles.push(record);
    simulator.step();
  }
  return { outputs, cycles, starts, nextOut };
}

/**
 * Elaborates `module`, streams random datasets through it and returns the
 * largest error relative to the term's evaluation. Throws when `next_out`
 * does not announce every dataset.
 */
export function testModule<T>(module: StreamingModule<T>, options: Partial<TestOptions> = {}): number {
  const opts: TestOptions = { ...DEFAULT_TEST_OPTIONS, ...options };
  const trace = createTracer(opts);
  const random = createRandom(opts.seed);
  const { hw } = module;
  const design = elaborate(module, { verbose: opts.verbose, trace: opts.trace });
  const size = 2 ** module.n;
  const datasets = Array.from({ length: opts.datasets }, () =>
    Array.from({ length: size }, () => hw.valueOf(hw.bitsOf(hw.sample(random)))));

  const result = simulate(design, datasets, { gap: opts.gap, random });
  const expectedNextOut = result.starts.map((s) => s + design.latency - 1);
  if (result.nextOut.join() !== expectedNextOut.join()) {
    throw new Error(`next_out high in cycles [${result.nextOut.join(', ')}], expected [${expectedNextOut.join(', ')}]`);
  }

  let worst = 0;
  datasets.forEach((inputs, d) => {
    const expected = evaluate(module.spl, hw.software, inputs, d).map((v) => hw.toComplex(v));
    const actual = result.outputs[d].map((v) => hw.toComplex(v));
    const error = relativeError(actual.map((v, i) => v.minus(expected[i]).abs()), expected.map((v) => v.abs()));
    trace(`dataset ${d}: error ${error}`);
    worst = Math.max(worst, error);
  });
  return worst;
}

function norm(values: number[]): number {
  return Math.sqrt(values.reduce((sum, v) => sum + v * v, 0));
}

function relativeError(differences: number[], reference: number[]): number {
  const scale = norm(reference);
  const difference = norm(differences);
  return scale === 0 ? difference : difference / scale;
}
