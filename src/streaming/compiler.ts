// Streaming compiler: lowers SPL terms to streaming modules at a fixed streaming width

import { ConfigurationError, DomainError } from '../errors.js';
import type { HW } from '../hardware/types.js';
import type { Complex } from '../linalg/complex.js';
import { GF2 } from '../linalg/field.js';
import { Matrix } from '../linalg/matrix.js';
import { diagonal, itensor, itProduct, linearPerm, product, tensor } from '../spl/terms.js';
import type { Butterfly, LinearPerm, SPL } from '../spl/terms.js';
import { createTracer } from '../trace.js';
import type { TraceOptions, Tracer } from '../trace.js';
import { radix2 } from '../transforms/radix2.js';
import {
  decompose,
  isSpatialIdentity,
  isTemporalIdentity,
  spatialMatrix,
  temporalMatrix,
} from './decompose.js';
import { cyclesPerDataset } from './module.js';
import type {
  AcyclicModule,
  DiagonalModule,
  ItProductModule,
  RAMControl,
  SpatialModule,
  StreamingModule,
  TemporalModule,
  WireModule,
} from './module.js';

export type CompileOptions = TraceOptions;

const DEFAULT_OPTIONS: CompileOptions = {
  verbose: false,
};

// ---------------------------------------------------------------------------
// Module constructors
// ---------------------------------------------------------------------------

/** log2 of the fewest lanes a butterfly network can stream on. */
export const MIN_BUTTERFLY_WIDTH = 1;

function checkWidth(n: number, k: number): void {
  if (!Number.isInteger(k) || k < 0 || k > n) {
    throw new DomainError(`streaming width 2^${k} does not fit a transform of size 2^${n}`);
  }
}

export function wireModule<T>(spl: SPL, k: number, hw: HW<T>): WireModule<T> {
  checkWidth(spl.n, k);
  return { kind: 'wire', n: spl.n, k, latency: 0, minGap: 0, acceptsBackToBack: true, spl, hw };
}

export function acyclicModule<T>(base: Butterfly, n: number, k: number, hw: HW<T>): AcyclicModule<T> {
  checkWidth(n, k);
  if (k < base.n) {
    throw new DomainError(`a ${2 ** base.n}-point butterfly needs at least ${2 ** base.n} lanes, got ${2 ** k}`);
  }
  return {
    kind: 'acyclic', n, k, latency: 1, minGap: 0, acceptsBackToBack: true,
    spl: itensor(n - base.n, base), hw, base,
  };
}

/** Sequential composition; `factors` are listed in product order, the last one sees the input first. */
export function productModule<T>(spl: SPL, k: number, hw: HW<T>, factors: StreamingModule<T>[]): StreamingModule<T> {
  const kept = factors.filter((f) => f.kind !== 'wire');
  for (const factor of kept) {
    if (factor.n !== spl.n || factor.k !== k) {
      throw new DomainError(`cannot chain a module of size 2^${factor.n} at width 2^${factor.k} into 2^${spl.n} at 2^${k}`);
    }
  }
  if (kept.length === 0) return wireModule(spl, k, hw);
  if (kept.length === 1) return kept[0];
  return {
    kind: 'product',
    n: spl.n,
    k,
    latency: kept.reduce((sum, f) => sum + f.latency, 0),
    minGap: Math.max(...kept.map((f) => f.minGap)),
    acceptsBackToBack: kept.every((f) => f.acceptsBackToBack),
    spl,
    hw,
    factors: kept,
  };
}

export function spatialModule<T>(P1: Matrix[], P2: Matrix[], n: number, k: number, hw: HW<T>): SpatialModule<T> {
  checkWidth(n, k);
  const registered = P1.length > 1 || !P2[0].isZero();
  return {
    kind: 'spatial', n, k, latency: registered ? 1 : 0, minGap: 0, acceptsBackToBack: true,
    spl: linearPerm(P1.map((p1, s) => spatialMatrix(p1, P2[s]))), hw, P1, P2, registered,
  };
}

export function temporalModule<T>(
  P3: Matrix[],
  P4: Matrix[],
  n: number,
  k: number,
  control: RAMControl,
  hw: HW<T>
): TemporalModule<T> {
  checkWidth(n, k);
  if (control === 'singlePorted' && P3.length > 1) {
    throw new ConfigurationError('single-ported RAM control cannot realise per-dataset temporal permutations');
  }
  const T = 2 ** (n - k);
  return {
    kind: 'temporal', n, k, latency: T + 1, minGap: control === 'dual' ? 0 : T, acceptsBackToBack: true,
    spl: linearPerm(P3.map((p3, s) => temporalMatrix(p3, P4[s]))), hw, P3, P4, control,
  };
}

export function diagonalModule<T>(coefficients: (readonly Complex[])[], k: number, hw: HW<T>): DiagonalModule<T> {
  const spl = diagonal(coefficients);
  checkWidth(spl.n, k);
  return { kind: 'diagonal', n: spl.n, k, latency: 1, minGap: 0, acceptsBackToBack: true, spl, hw, coefficients };
}

function acceptsGap(module: StreamingModule<unknown>, gap: number): boolean {
  return gap >= module.minGap || (gap === 0 && module.acceptsBackToBack);
}

/**
 * Loop around `factor` (and `endLoop`). A pass enters the loop every
 * `period` cycles; the period covers the body latency plus the feedback
 * register and is at least one dataset long.
 */
export function itProductModule<T>(
  r: number,
  factor: StreamingModule<T>,
  endLoop: StreamingModule<T> | null
): ItProductModule<T> {
  const T = cyclesPerDataset(factor);
  const body = endLoop === null ? [factor] : [factor, endLoop];
  const bodyLatency = body.reduce((sum, m) => sum + m.latency, 0);
  let period = Math.max(bodyLatency + 1, T);
  if (!body.every((m) => acceptsGap(m, period - T))) {
    period = Math.max(period, T + Math.max(...body.map((m) => m.minGap)));
  }
  const minGap = r * period - T;
  return {
    kind: 'itProduct',
    n: factor.n,
    k: factor.k,
    latency: (r - 1) * period + factor.latency,
    minGap,
    acceptsBackToBack: minGap === 0,
    spl: itProduct(r, factor.spl, endLoop === null ? undefined : endLoop.spl),
    hw: factor.hw,
    r,
    factor,
    endLoop,
    period,
  };
}

// ---------------------------------------------------------------------------
// Compiler
// ---------------------------------------------------------------------------

// Keeps a single entry when every dataset uses the same matrices
function distinct(pairs: [Matrix, Matrix][]): [Matrix, Matrix][] {
  const [a, b] = pairs[0];
  return pairs.every(([x, y]) => x.equals(a) && y.equals(b)) ? [pairs[0]] : pairs;
}

class StreamingCompiler<T> {
  private modules = new Map<SPL, StreamingModule<T>>();
  private dependencies = new Map<SPL, SPL[]>();

  constructor(
    private readonly k: number,
    private readonly control: RAMControl,
    private readonly hw: HW<T>,
    private readonly trace: Tracer
  ) {}

  /** Post-order walk with an explicit stack; each term object is compiled once. */
  run(root: SPL): StreamingModule<T> {
    const stack: { term: SPL; expanded: boolean }[] = [{ term: root, expanded: false }];
    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined || this.modules.has(frame.term)) continue;
      const deps = this.dependenciesOf(frame.term);
      const pending = deps.filter((dep) => !this.modules.has(dep));
      if (pending.length > 0 && !frame.expanded) {
        stack.push({ term: frame.term, expanded: true });
        for (const dep of pending) stack.push({ term: dep, expanded: false });
        continue;
      }
      const module = this.build(frame.term, deps.map((dep) => this.lookup(dep)));
      this.trace(`${module.kind} n=${module.n} k=${module.k} latency=${module.latency} minGap=${module.minGap}`);
      this.modules.set(frame.term, module);
    }
    return this.lookup(root);
  }

  private lookup(term: SPL): StreamingModule<T> {
    const module = this.modules.get(term);
    if (module === undefined) throw new Error('Sub-term was not compiled before its parent');
    return module;
  }

  // Every butterfly needs both of its inputs in the same cycle
  private checkButterflyWidth(): void {
    if (this.k < MIN_BUTTERFLY_WIDTH) {
      throw new DomainError(
        `butterflies need a streaming width of at least 2^${MIN_BUTTERFLY_WIDTH}, got 2^${this.k}`);
    }
  }

  private dependenciesOf(term: SPL): SPL[] {
    const cached = this.dependencies.get(term);
    if (cached !== undefined) return cached;
    let deps: SPL[] = [];
    switch (term.kind) {
      case 'product':
        deps = [...term.factors];
        break;
      case 'butterfly':
        this.checkButterflyWidth();
        if (this.k < term.n) deps = [radix2(term)];
        break;
      case 'itensor':
        this.checkButterflyWidth();
        if (this.k < term.factor.n) deps = [tensor(term.r, radix2(term.factor))];
        break;
      case 'itProduct':
        if (this.control !== 'dual') {
          throw new ConfigurationError(`ItProduct requires dual RAM control, got ${this.control}`);
        }
        deps = term.endLoop === null ? [term.factor] : [term.factor, term.endLoop];
        break;
      default:
        break;
    }
    this.dependencies.set(term, deps);
    return deps;
  }

  private build(term: SPL, deps: StreamingModule<T>[]): StreamingModule<T> {
    const { k, hw } = this;
    switch (term.kind) {
      case 'identity':
        return wireModule(term, k, hw);
      case 'butterfly':
        return deps.length > 0 ? deps[0] : acyclicModule(term, term.n, k, hw);
      case 'itensor':
        return deps.length > 0 ? deps[0] : acyclicModule(term.factor, term.n, k, hw);
      case 'product':
        return productModule(term, k, hw, deps);
      case 'linearPerm':
        return this.permutation(term);
      case 'diagonal':
        return diagonalModule(term.coefficients.map((v) => [...v]), k, hw);
      case 'itProduct':
        return itProductModule(term.r, deps[0], deps.length > 1 ? deps[1] : null);
    }
  }

  /** Spatial(L1, L2) * Temporal(C3, C4) * Spatial(I, R2), dropping identity stages. */
  private permutation(term: LinearPerm): StreamingModule<T> {
    const { k, hw } = this;
    const n = term.n;
    const t = n - k;
    const stages: StreamingModule<T>[] = [];
    const addSpatial = (pairs: [Matrix, Matrix][]) => {
      if (pairs.every(([p1, p2]) => isSpatialIdentity(p1, p2))) return;
      const sets = distinct(pairs);
      stages.push(spatialModule(sets.map((p) => p[0]), sets.map((p) => p[1]), n, k, hw));
    };
    const addTemporal = (pairs: [Matrix, Matrix][]) => {
      if (pairs.every(([p3, p4]) => isTemporalIdentity(p3, p4))) return;
      const sets = distinct(pairs);
      stages.push(temporalModule(sets.map((p) => p[0]), sets.map((p) => p[1]), n, k, this.control, hw));
    };

    if (t === 0) {
      addSpatial(term.matrices.map((m) => [m, Matrix.zeros(GF2, k, 0)]));
    } else if (k === 0) {
      addTemporal(term.matrices.map((m) => [Matrix.zeros(GF2, t, 0), m]));
    } else {
      const parts = term.matrices.map((m) => decompose(m, t));
      addSpatial(parts.map((p) => [p.L1, p.L2]));
      addTemporal(parts.map((p) => [p.C3, p.C4]));
      addSpatial(parts.map((p) => [Matrix.identity(GF2, k), p.R2]));
    }
    this.trace(`linear permutation n=${n} k=${k}: ${stages.length} stage(s)`);
    return productModule(term, k, hw, stages);
  }
}

export function compile<T>(
  term: SPL,
  k: number,
  control: RAMControl,
  hw: HW<T>,
  options: Partial<CompileOptions> = {}
): StreamingModule<T> {
  const opts: CompileOptions = { ...DEFAULT_OPTIONS, ...options };
  checkWidth(term.n, k);
  const trace = createTracer(opts);
  trace(`compiling n=${term.n} at k=${k} with ${control} RAM control for ${hw.toString()}`);
  return new StreamingCompiler(k, control, hw, trace).run(term);
}

/** Product of modules whose reference term is the product of their terms. */
export function chain<T>(factors: StreamingModule<T>[]): StreamingModule<T> {
  if (factors.length === 0) throw new DomainError('cannot chain an empty list of modules');
  const { k, hw } = factors[0];
  return productModule(product(factors.map((f) => f.spl)), k, hw, factors);
}
