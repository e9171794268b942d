// Tracing: diagnostics are reported through an injected observer, or the console when verbose

export type Tracer = (message: string) => void;

export interface TraceOptions {
  verbose: boolean;
  trace?: Tracer;
}

export function createTracer(options: TraceOptions): Tracer {
  if (options.trace !== undefined) return options.trace;
  if (options.verbose) return (message) => console.log(message);
  return () => undefined;
}
