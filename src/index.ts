// streamgen - compiles SPL descriptions of linear transforms into streaming hardware

// Errors and tracing
export { DomainError, ConfigurationError, SignalWidthError } from './errors.js';
export { createTracer, type Tracer, type TraceOptions } from './trace.js';

// Finite fields and matrices
export { GF2, GF4, GF8, GF16, type Field } from './linalg/field.js';
export { Matrix, Vec } from './linalg/matrix.js';
export { Complex, omega } from './linalg/complex.js';
export { Cmat, Lmat, Rmat, applyToIndex, permute } from './linalg/permutation.js';

// Signal graph
export {
  type NodeId,
  type SignalNode,
  type NodeKind,
  type SignalGraph,
  type ExternalOperator,
  createGraph,
  combinationalOperands,
} from './types/netlist.js';
export { GraphBuilder, mask, toSigned, timesValue } from './graph/builder.js';

// Hardware representations
export { HW, Unsigned, FixedPoint, IEEE754, ComplexHW } from './hardware/types.js';

// SPL terms
export {
  type SPL,
  type Transform,
  type Butterfly,
  type Repeatable,
  butterfly,
  identity,
  itensor,
  linearPerm,
  diagonal,
  itProduct,
  product,
  tensor,
  isIdentity,
  isRepeatable,
  describe,
  MAX_BUTTERFLY_SIZE,
} from './spl/terms.js';
export { evaluate, evaluateButterfly } from './spl/eval.js';
export { realRing, complexRing, type Ring } from './spl/ring.js';

// Transforms
export { CTDFT, Pease, ItPease, ItPeaseFused, radixDigits, twiddles, peaseTwiddles } from './transforms/dft.js';
export { WHT, WHTPease, WHTItPease } from './transforms/wht.js';
export { radix2 } from './transforms/radix2.js';

// Streaming compiler
export {
  type RAMControl,
  type StreamingModule,
  RAM_CONTROLS,
  cyclesPerDataset,
  defaultGap,
  moduleSize,
} from './streaming/module.js';
export {
  compile,
  chain,
  wireModule,
  acyclicModule,
  productModule,
  spatialModule,
  temporalModule,
  diagonalModule,
  itProductModule,
  type CompileOptions,
} from './streaming/compiler.js';
export { decompose, recompose, spatialMatrix, temporalMatrix, type PermutationStages } from './streaming/decompose.js';
export { ControlUnit, type Control } from './streaming/control.js';
export { implement, butterflyNetwork } from './streaming/implement.js';
export { elaborate, type Design, type ElaborateOptions } from './streaming/design.js';
export { shrink, minimize } from './streaming/shrink.js';

// Simulation
export { levelize, getStats, type LevelizedGraph } from './circuit/levelizer.js';
export { Simulator, type SimulatorOptions } from './simulator/simulator.js';
export { simulate, testModule, type StreamResult, type TestOptions } from './simulator/stream-tester.js';
export { createRandom, type Random } from './simulator/random.js';

// Backends
export { lowerNode, lowerGraph, type Statement } from './backends/lower.js';
export { toVerilog, toTestbench } from './backends/verilog.js';

// Configuration
export { generate, buildTerm, DEFAULT_CONFIG, type GeneratorConfig, type HardwareDescriptor } from './config.js';
