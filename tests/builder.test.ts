import { describe, it, expect } from 'vitest';
import { GraphBuilder, toSigned, timesValue } from '../src/graph/builder.js';
import { SignalWidthError } from '../src/errors.js';
import { Simulator } from '../src/simulator/simulator.js';

function setup() {
  const b = new GraphBuilder('test');
  const x = b.input('x', 8);
  const y = b.input('y', 8);
  return { b, x, y };
}

describe('GraphBuilder', () => {
  describe('common subexpressions', () => {
    it('shares structurally equal nodes', () => {
      const { b, x, y } = setup();
      expect(b.and(x, y)).toBe(b.and(y, x));
      expect(b.plus(x, y)).toBe(b.plus(y, x));
      expect(b.register(x)).toBe(b.register(x));
      expect(b.register(x, 1n)).not.toBe(b.register(x));
    });

    it('keeps feedback registers distinct', () => {
      const { b } = setup();
      expect(b.feedback(4)).not.toBe(b.feedback(4));
    });
  });

  describe('folding', () => {
    it('folds constant logic', () => {
      const { b, x, y } = setup();
      expect(b.constValue(b.and(x, b.zeros(8)))).toBe(0n);
      expect(b.and(x, b.constant(0xffn, 8))).toBe(x);
      expect(b.or(x, b.zeros(8))).toBe(x);
      expect(b.constValue(b.xor(x, x))).toBe(0n);
      expect(b.xor(x, y, x)).toBe(y);
      expect(b.not(b.not(x))).toBe(x);
      expect(b.constValue(b.not(b.constant(0x0fn, 8)))).toBe(0xf0n);
    });

    it('builds per-bit logic for partial constants', () => {
      const { b, x } = setup();
      const masked = b.and(x, b.constant(0x0fn, 8));
      expect(b.node(masked).kind).toBe('concat');
      expect(b.widthOf(masked)).toBe(8);
    });

    it('folds arithmetic identities', () => {
      const { b, x } = setup();
      expect(b.plus(x, b.zeros(8))).toBe(x);
      expect(b.minus(x, b.zeros(8))).toBe(x);
      expect(b.constValue(b.minus(x, x))).toBe(0n);
      expect(b.constValue(b.plus(b.constant(250n, 8), b.constant(10n, 8)))).toBe(4n);
    });

    it('folds multiplication by zero and one', () => {
      const { b, x } = setup();
      expect(b.constValue(b.times(x, b.zeros(8), true, 4))).toBe(0n);
      expect(b.times(x, b.constant(16n, 8), true, 4)).toBe(x);
      expect(b.times(b.constant(16n, 8), x, true, 4)).toBe(x);
      expect(b.times(x, b.constant(0xf0n, 8), true, 4)).toBe(b.minus(b.zeros(8), x));
    });

    it('keeps a signed product whose constant sits on the sign bit', () => {
      const { b, x } = setup();
      const product = b.times(x, b.constant(0x80n, 8), true, 7);
      expect(product).not.toBe(x);
      expect(b.node(product).kind).toBe('times');
      b.output('p', product);
      const sim = new Simulator(b.graph);
      sim.setInput('x', 0x20n);
      expect(sim.getOutput('p')).toBe(0xe0n);
    });

    it('folds the unsigned product by one at the top fractional bit', () => {
      const { b, x } = setup();
      expect(b.times(x, b.constant(0x80n, 8), false, 7)).toBe(x);
    });

    it('merges adjacent taps and constants in concatenations', () => {
      const { b, x } = setup();
      expect(b.concat([b.tap(x, 4, 4), b.tap(x, 0, 4)])).toBe(x);
      expect(b.constValue(b.concat([b.constant(0xan, 4), b.constant(0x5n, 4)]))).toBe(0xa5n);
    });

    it('taps through concatenations', () => {
      const b = new GraphBuilder('test');
      const lhs = b.input('a', 4);
      const rhs = b.input('b', 4);
      const both = b.concat([lhs, rhs]);
      expect(b.tap(both, 0, 4)).toBe(rhs);
      expect(b.tap(both, 4, 4)).toBe(lhs);
      expect(b.tap(b.tap(both, 2, 4), 2, 2)).toBe(b.tap(lhs, 0, 2));
    });

    it('compares with constants', () => {
      const b = new GraphBuilder('test');
      const five = b.constant(5n, 3);
      expect(b.constValue(b.equalsConst(five, 5n))).toBe(1n);
      expect(b.constValue(b.equalsConst(five, 4n))).toBe(0n);
    });

    it('selects constant mux addresses', () => {
      const { b, x, y } = setup();
      expect(b.mux(b.constant(1n, 1), [x, y])).toBe(y);
      expect(b.mux(b.input('s', 1), [x, x])).toBe(x);
      expect(b.mux(b.constant(3n, 2), [x, y], x)).toBe(x);
    });

    it('drops registers of their own init value', () => {
      const { b } = setup();
      const one = b.constant(1n, 1);
      expect(b.register(one, 1n)).toBe(one);
      expect(b.register(one, 0n)).not.toBe(one);
    });
  });

  describe('errors', () => {
    it('rejects operands of different widths', () => {
      const { b, x } = setup();
      const narrow = b.input('z', 4);
      expect(() => b.and(x, narrow)).toThrow(SignalWidthError);
      expect(() => b.plus(x, narrow)).toThrow(SignalWidthError);
    });

    it('rejects taps outside the signal', () => {
      const { b, x } = setup();
      expect(() => b.tap(x, 6, 4)).toThrow(SignalWidthError);
      expect(() => b.tap(x, 0, 0)).toThrow(SignalWidthError);
    });

    it('rejects muxes with too many or too few inputs', () => {
      const { b, x, y } = setup();
      const address = b.input('s', 1);
      expect(() => b.mux(address, [x, y, x])).toThrow(SignalWidthError);
      expect(() => b.mux(b.input('t', 2), [x, y, x])).toThrow(SignalWidthError);
    });

    it('rejects duplicate inputs', () => {
      const { b } = setup();
      expect(() => b.input('x', 8)).toThrow('Duplicate input: x');
    });

    it('connects feedback registers once', () => {
      const { b, x } = setup();
      const r = b.feedback(8);
      b.connect(r, x);
      expect(() => b.connect(r, x)).toThrow(`Node ${r} is not an unconnected feedback register`);
      expect(() => b.connect(b.feedback(4), x)).toThrow(SignalWidthError);
    });
  });
});

describe('fixed-point helpers', () => {
  it('reinterprets two\'s complement patterns', () => {
    expect(toSigned(0xffn, 8)).toBe(-1n);
    expect(toSigned(0x7fn, 8)).toBe(127n);
  });

  it('multiplies and truncates', () => {
    expect(timesValue(0xffn, 2n, 8, true, 0)).toBe(0xfen);
    expect(timesValue(0x18n, 0x20n, 8, true, 4)).toBe(0x30n);
    expect(timesValue(0xffn, 2n, 8, false, 0)).toBe(0xfen);
  });
});
