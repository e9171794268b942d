// Complex: immutable complex numbers and exact roots of unity

export class Complex {
  static readonly ZERO = new Complex(0, 0);
  static readonly ONE = new Complex(1, 0);

  constructor(readonly re: number, readonly im: number) {}

  plus(other: Complex): Complex {
    return new Complex(this.re + other.re, this.im + other.im);
  }

  minus(other: Complex): Complex {
    return new Complex(this.re - other.re, this.im - other.im);
  }

  times(other: Complex): Complex {
    return new Complex(
      this.re * other.re - this.im * other.im,
      this.re * other.im + this.im * other.re
    );
  }

  abs(): number {
    return Math.hypot(this.re, this.im);
  }

  equals(other: Complex): boolean {
    return this.re === other.re && this.im === other.im;
  }

  toString(): string {
    const sign = this.im < 0 ? '-' : '+';
    return `${this.re}${sign}${Math.abs(this.im)}i`;
  }
}

/**
 * Root of unity e^(-2 pi i power / 2^n). Quarter turns are returned exactly
 * so that trivial twiddles fold away in hardware.
 */
export function omega(n: number, power: number): Complex {
  const size = 2 ** n;
  const p = ((power % size) + size) % size;
  if ((4 * p) % size === 0) {
    switch ((4 * p) / size) {
      case 0: return Complex.ONE;
      case 1: return new Complex(0, -1);
      case 2: return new Complex(-1, 0);
      default: return new Complex(0, 1);
    }
  }
  const angle = (-2 * Math.PI * p) / size;
  return new Complex(Math.cos(angle), Math.sin(angle));
}
