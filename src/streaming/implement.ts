// Implementation: instantiates streaming modules as signal-graph nodes

import { DomainError } from '../errors.js';
import type { GraphBuilder } from '../graph/builder.js';
import { GF2 } from '../linalg/field.js';
import { Matrix, Vec } from '../linalg/matrix.js';
import { applyToIndex } from '../linalg/permutation.js';
import { evaluate, evaluateButterfly } from '../spl/eval.js';
import type { Ring } from '../spl/ring.js';
import type { Butterfly } from '../spl/terms.js';
import { radix2 } from '../transforms/radix2.js';
import type { NodeId } from '../types/netlist.js';
import { bitsFor } from './control.js';
import type { Control, ControlUnit } from './control.js';
import type {
  AcyclicModule,
  DiagonalModule,
  ItProductModule,
  SpatialModule,
  StreamingModule,
  TemporalModule,
} from './module.js';

// Affine map c -> A c + v over GF(2)
interface AffineMap {
  A: Matrix;
  v: number;
}

const MAX_ADDRESS_PERIOD = 4096;

/** A butterfly as a network of radix-2 butterflies, twiddle multipliers and wires. */
export function butterflyNetwork<T>(base: Butterfly, ring: Ring<T>, inputs: readonly T[]): T[] {
  if (base.n === 1) return evaluateButterfly(base, ring, inputs);
  return evaluate(radix2(base), ring, inputs, 0);
}

/**
 * Builds the hardware of `module` on `inputs` (one signal per lane) and
 * returns the output lanes. Outputs of a dataset appear `module.latency`
 * cycles after its inputs.
 */
export function implement<T>(
  controls: ControlUnit,
  module: StreamingModule<T>,
  inputs: NodeId[],
  control: Control
): NodeId[] {
  if (inputs.length !== 2 ** module.k) {
    throw new DomainError(`module with ${2 ** module.k} lanes given ${inputs.length} inputs`);
  }
  switch (module.kind) {
    case 'wire':
      return inputs;
    case 'acyclic':
      return implementAcyclic(controls.b, module, inputs);
    case 'product': {
      let values = inputs;
      let ctl = control;
      for (let i = module.factors.length - 1; i >= 0; i--) {
        const factor = module.factors[i];
        values = implement(controls, factor, values, ctl);
        ctl = controls.delayControl(ctl, factor.latency);
      }
      return values;
    }
    case 'spatial':
      return implementSpatial(controls, module, inputs, control);
    case 'temporal':
      return implementTemporal(controls, module, inputs, control);
    case 'diagonal':
      return implementDiagonal(controls, module, inputs, control);
    case 'itProduct':
      return implementItProduct(controls, module, inputs, control);
  }
}

function implementAcyclic<T>(b: GraphBuilder, module: AcyclicModule<T>, inputs: NodeId[]): NodeId[] {
  const ring = module.hw.ring(b);
  const size = 2 ** module.base.n;
  const outputs: NodeId[] = [];
  for (let start = 0; start < inputs.length; start += size) {
    outputs.push(...butterflyNetwork(module.base, ring, inputs.slice(start, start + size)));
  }
  return outputs.map((output) => b.register(output));
}

function implementSpatial<T>(
  controls: ControlUnit,
  module: SpatialModule<T>,
  inputs: NodeId[],
  control: Control
): NodeId[] {
  const b = controls.b;
  const { k } = module;
  const t = module.n - k;
  const lanes = 2 ** k;
  const sets = module.P1.length;
  const inverses = module.P1.map((p1) => p1.inverse());
  // Lane j' reads lane P1^-1 j' + P1^-1 P2 c
  const offsets = inverses.map((inverse, s) => inverse.multiply(module.P2[s]));

  if (!module.registered) {
    return inputs.map((_, lane) => inputs[applyToIndex(inverses[0], lane)]);
  }

  const set = sets > 1 ? controls.setCounter(control, sets) : null;
  const needsOffset = t > 0 && offsets.some((o) => !o.isZero());
  let address: NodeId[] = set === null ? [] : [set];
  if (needsOffset) {
    const cycle = controls.counter(control.next, t);
    address = [...address, controls.select(set, offsets.map((o) => controls.linearMap(o, cycle)))];
  }
  const offsetCount = needsOffset ? lanes : 1;
  const select = b.concat(address);

  return inputs.map((_, lane) => {
    const table: NodeId[] = [];
    for (let s = 0; s < sets; s++) {
      for (let offset = 0; offset < offsetCount; offset++) {
        table.push(inputs[applyToIndex(inverses[s], lane) ^ offset]);
      }
    }
    return b.register(b.mux(select, table, inputs[0]));
  });
}

function implementTemporal<T>(
  controls: ControlUnit,
  module: TemporalModule<T>,
  inputs: NodeId[],
  control: Control
): NodeId[] {
  const b = controls.b;
  const t = module.n - module.k;
  const T = 2 ** t;
  // Output word c' of lane j is input word P4^-1 (c' + P3 j)
  const reads: AffineMap[][] = module.P4.map((p4, s) => {
    const A = p4.inverse();
    const coupling = A.multiply(module.P3[s]);
    return inputs.map((_, lane) => ({ A, v: coupling.apply(Vec.fromInt(module.k, lane)).toInt() }));
  });
  const one = b.constant(1n, 1);

  switch (module.control) {
    case 'dual': {
      const write = controls.pingPong(control.next, t, false);
      const enable = controls.window(control.next, b.tap(write, 0, t));
      const late = controls.delayControl(control, T);
      const read = controls.pingPong(late.next, t, false);
      const readCycle = b.tap(read, 0, t);
      const readBuffer = b.tap(read, t, 1);
      const set = reads.length > 1 ? controls.setCounter(late, reads.length) : null;
      return inputs.map((input, lane) => {
        const memory = b.memory(t + 1, input, write, enable);
        const low = controls.select(set, reads.map((maps) => controls.affineMap(maps[lane].A, maps[lane].v, readCycle)));
        return b.register(b.memoryRead(memory, b.concat([readBuffer, low])));
      });
    }
    case 'single': {
      const count = controls.pingPong(control.next, t, true);
      const cycle = b.tap(count, 0, t);
      const readBuffer = b.not(b.tap(count, t, 1));
      const late = controls.delayControl(control, T);
      const set = reads.length > 1 ? controls.setCounter(late, reads.length) : null;
      return inputs.map((input, lane) => {
        const memory = b.memory(t + 1, input, count, one);
        const low = controls.select(set, reads.map((maps) => controls.affineMap(maps[lane].A, maps[lane].v, cycle)));
        return b.register(b.memoryRead(memory, b.concat([readBuffer, low])));
      });
    }
    case 'singlePorted': {
      const cycle = controls.counter(control.next, t);
      const step = b.or(control.next, b.allOnes(cycle));
      const maps = addressMaps(reads[0], t);
      const phase = maps.length > 1 ? controls.modCounter(step, maps.length) : null;
      return inputs.map((input, lane) => {
        const address = controls.select(phase, maps.map((perLane) => controls.affineMap(perLane[lane].A, perLane[lane].v, cycle)));
        const memory = b.memory(t, input, address, one);
        return b.register(b.memoryRead(memory, address));
      });
    }
  }
}

/**
 * In-place addressing: period x uses a_x with a_0 = id and a_{x+1} = a_x . g,
 * so the word written at a_x(c) is read back in period x + 1 at the cycle c'
 * with g(c') = c. Returns the maps of one full cycle, indexed [x][lane].
 */
function addressMaps(reads: AffineMap[], t: number): AffineMap[][] {
  const identity: AffineMap = { A: Matrix.identity(GF2, t), v: 0 };
  const maps: AffineMap[][] = [reads.map(() => identity)];
  for (;;) {
    const last = maps[maps.length - 1];
    const next = last.map((a, lane) => {
      const g = reads[lane];
      return { A: a.A.multiply(g.A), v: a.A.apply(Vec.fromInt(t, g.v)).toInt() ^ a.v };
    });
    if (next.every((a) => a.v === 0 && a.A.isIdentity())) return maps;
    if (maps.length >= MAX_ADDRESS_PERIOD) {
      throw new DomainError(`in-place address sequence does not repeat within ${MAX_ADDRESS_PERIOD} datasets`);
    }
    maps.push(next);
  }
}

function implementDiagonal<T>(
  controls: ControlUnit,
  module: DiagonalModule<T>,
  inputs: NodeId[],
  control: Control
): NodeId[] {
  const b = controls.b;
  const { hw, coefficients } = module;
  const t = module.n - module.k;
  const lanes = inputs.length;
  const cycles = 2 ** t;
  const set = coefficients.length > 1 ? controls.setCounter(control, coefficients.length) : null;
  const cycle = t > 0 ? controls.counter(control.next, t) : null;
  const address: NodeId[] = [];
  if (set !== null) address.push(set);
  if (cycle !== null) address.push(cycle);

  return inputs.map((input, lane) => {
    const values = coefficients.flatMap((vector) =>
      Array.from({ length: cycles }, (_, c) => vector[c * lanes + lane]));
    if (address.length === 0 || values.every((v) => v.equals(values[0]))) {
      return b.register(hw.times(b, input, hw.constant(b, values[0])));
    }
    const table = values.map((v) => hw.constant(b, v));
    return b.register(hw.times(b, input, b.mux(b.concat(address), table, table[0])));
  });
}

/**
 * The loop: the body reads the external inputs on the first pass and its own
 * delayed output afterwards. Passes start `period` cycles apart; the last
 * pass leaves through the factor's outputs.
 */
function implementItProduct<T>(
  controls: ControlUnit,
  module: ItProductModule<T>,
  inputs: NodeId[],
  control: Control
): NodeId[] {
  const b = controls.b;
  const { r, factor, endLoop, period } = module;
  const bodyLatency = factor.latency + (endLoop === null ? 0 : endLoop.latency);
  const width = module.hw.size;

  const feedback = inputs.map(() => b.feedback(width));
  const loopBack = b.feedback(1);
  const passWidth = bitsFor(r + 1);
  const pass = b.feedback(passWidth);
  const selected = b.feedback(1);

  const loopNext = b.and(loopBack, b.not(b.equalsConst(pass, BigInt(r - 1))));
  const passNext = b.or(control.next, loopNext);
  b.connect(pass, b.mux(control.next, [
    b.mux(loopBack, [pass, b.plus(pass, b.constant(1n, passWidth))]),
    b.zeros(passWidth),
  ]));
  b.connect(selected, b.mux(control.next, [b.or(selected, loopNext), b.zeros(1)]));

  const bodyInputs = inputs.map((input, lane) => b.mux(selected, [input, feedback[lane]]));
  const bodyControl: Control = { next: passNext, first: control.next };
  const factorOutputs = implement(controls, factor, bodyInputs, bodyControl);
  const endOutputs = endLoop === null
    ? factorOutputs
    : implement(controls, endLoop, factorOutputs, controls.delayControl(bodyControl, factor.latency));

  endOutputs.forEach((output, lane) => b.connect(feedback[lane], controls.delay(output, period - bodyLatency - 1)));
  b.connect(loopBack, controls.delay(passNext, period - 1));
  return factorOutputs;
}
