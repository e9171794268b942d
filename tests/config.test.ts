import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import { buildTerm, generate } from '../src/config.js';

describe('buildTerm', () => {
  it('has no fused iterative WHT', () => {
    expect(() => buildTerm('wht', 'itpeasefused', 3, 1)).toThrow(ConfigurationError);
  });

  it('builds a loop for the iterative algorithms', () => {
    expect(buildTerm('wht', 'itpease', 3, 1).kind).toBe('itProduct');
    expect(buildTerm('dft', 'itpeasefused', 4, 2).kind).toBe('itProduct');
  });
});

describe('generate', () => {
  it('elaborates the default radix-2 DFT', () => {
    const design = generate();
    expect(design.name).toBe('stream');
    expect(design.T).toBe(4);
    expect(design.inputs).toEqual(['i0', 'i1']);
    expect(design.outputs).toEqual(['o0', 'o1']);
    expect(design.hw.toString()).toBe('Complex(FixedPoint(8, 8))');
  });

  it('keeps the WHT on real lanes', () => {
    const design = generate({
      transform: 'wht',
      algorithm: 'pease',
      hardware: { kind: 'unsigned', width: 8 },
    });
    expect(design.hw.toString()).toBe('Unsigned(8)');
  });

  it('rejects a DFT on real lanes', () => {
    expect(() => generate({ hardware: { kind: 'fixed', magnitude: 8, fractional: 8, complex: false } }))
      .toThrow(ConfigurationError);
  });

  it('rejects loops under single RAM control', () => {
    expect(() => generate({ algorithm: 'itpease', control: 'single' })).toThrow(ConfigurationError);
  });

  it('reports progress through the injected tracer', () => {
    const messages: string[] = [];
    generate({ name: 'fft8', trace: (message) => messages.push(message) });
    expect(messages[0]).toBe('compiling n=3 at k=1 with dual RAM control for Complex(FixedPoint(8, 8))');
    expect(messages[messages.length - 1]).toMatch(/^elaborated fft8: \d+ nodes, latency \d+, minGap 0$/);
  });
});
