// Errors: failure taxonomy shared by the algebra, the graph builder and the compiler

/** Invalid mathematical input: bad radix, singular or mis-sized matrix, k out of range. */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

/** A valid term needs a capability the chosen compilation settings do not provide. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Operand widths of a signal-graph operator disagree. */
export class SignalWidthError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = 'SignalWidthError';
  }
}
