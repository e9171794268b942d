// Verilog backend: renders lowered statements as a synthesizable module and a self-checking testbench

import { simulate } from '../simulator/stream-tester.js';
import type { StreamOptions } from '../simulator/stream-tester.js';
import { NEXT_OUT_PORT, NEXT_PORT, RESET_PORT } from '../streaming/design.js';
import type { Design } from '../streaming/design.js';
import type { NodeId, SignalGraph } from '../types/netlist.js';
import { lowerGraph } from './lower.js';
import type { Expression } from './lower.js';

export interface VerilogOptions {
  clock: string;
}

const DEFAULT_OPTIONS: VerilogOptions = {
  clock: 'clk',
};

function range(width: number): string {
  return width === 1 ? '' : `[${width - 1}:0] `;
}

function literal(value: bigint, width: number): string {
  return `${width}'h${value.toString(16)}`;
}

export function toVerilog(graph: SignalGraph, options: Partial<VerilogOptions> = {}): string {
  const opts: VerilogOptions = { ...DEFAULT_OPTIONS, ...options };
  const statements = lowerGraph(graph);
  const names = new Map<NodeId, string>();
  for (const statement of statements) {
    if (statement.kind === 'input') names.set(statement.target, statement.name);
  }
  const name = (id: NodeId): string => names.get(id) ?? `s${id}`;

  const expression = (e: Expression, width: number): string => {
    switch (e.op) {
      case 'const':
        return literal(e.value, width);
      case 'and':
        return e.operands.map(name).join(' & ');
      case 'or':
        return e.operands.map(name).join(' | ');
      case 'xor':
        return e.operands.map(name).join(' ^ ');
      case 'concat':
        return `{${e.operands.map(name).join(', ')}}`;
      case 'not':
        return `~${name(e.operand)}`;
      case 'plus':
        return `${name(e.lhs)} + ${name(e.rhs)}`;
      case 'minus':
        return `${name(e.lhs)} - ${name(e.rhs)}`;
      case 'slice':
        return e.low === e.high ? `${name(e.operand)}[${e.low}]` : `${name(e.operand)}[${e.high}:${e.low}]`;
      case 'mux': {
        const address = name(e.address);
        const last = e.fallback ?? e.cases[e.cases.length - 1];
        const choices = e.fallback === null ? e.cases.slice(0, -1) : e.cases;
        return [...choices.map((c, i) => `${address} == ${i} ? ${name(c)} : `), name(last)].join('');
      }
      case 'read':
        return `m${e.memory}[${name(e.address)}]`;
    }
  };

  const ports: string[] = [`  input ${opts.clock}`];
  const body: string[] = [];
  const resets: string[] = [];
  const updates: string[] = [];
  const writes: string[] = [];

  for (const s of statements) {
    switch (s.kind) {
      case 'input':
        ports.push(`  input ${range(s.width)}${s.name}`);
        break;
      case 'output':
        ports.push(`  output ${range(s.width)}${s.name}`);
        body.push(`  assign ${s.name} = ${name(s.source)};`);
        break;
      case 'assign':
        body.push(`  wire ${range(s.width)}${name(s.target)} = ${expression(s.expression, s.width)};`);
        break;
      case 'multiply': {
        const product = `p${s.target}`;
        const operands = s.signed
          ? `$signed(${name(s.lhs)}) * $signed(${name(s.rhs)})`
          : `${name(s.lhs)} * ${name(s.rhs)}`;
        body.push(`  wire ${s.signed ? 'signed ' : ''}[${2 * s.width - 1}:0] ${product} = ${operands};`);
        body.push(`  wire ${range(s.width)}${name(s.target)} = ${product}[${s.shift + s.width - 1}:${s.shift}];`);
        break;
      }
      case 'register':
        body.push(`  reg ${range(s.width)}${name(s.target)} = ${literal(s.init, s.width)};`);
        resets.push(`      ${name(s.target)} <= ${literal(s.init, s.width)};`);
        updates.push(`      ${name(s.target)} <= ${name(s.input)};`);
        break;
      case 'memory':
        body.push(`  reg ${range(s.width)}m${s.target} [0:${s.depth - 1}];`);
        writes.push(`    if (${name(s.enable)}) m${s.target}[${name(s.address)}] <= ${name(s.data)};`);
        break;
      case 'instance':
        body.push(`  wire ${range(s.width)}${name(s.target)};`);
        body.push(`  ${s.module} u${s.target} (${[
          `.result(${name(s.target)})`,
          ...s.inputs.map((input, i) => `.in${i}(${name(input)})`),
        ].join(', ')});`);
        break;
    }
  }

  const lines = [`module ${graph.name} (`, ports.join(',\n'), ');', ...body];
  if (updates.length > 0) {
    if (![...names.values()].includes(RESET_PORT)) {
      throw new Error(`Registers need a '${RESET_PORT}' input in module ${graph.name}`);
    }
    lines.push(`  always @(posedge ${opts.clock}) begin`);
    lines.push(`    if (${RESET_PORT}) begin`, ...resets, '    end else begin', ...updates, '    end');
    lines.push('  end');
  }
  if (writes.length > 0) {
    lines.push(`  always @(posedge ${opts.clock}) begin`, ...writes, '  end');
  }
  lines.push('endmodule', '');
  return lines.join('\n');
}

/**
 * A testbench streaming `datasets` through the design and comparing every
 * output word with the value computed by the cycle simulator.
 */
export function toTestbench<T>(
  design: Design<T>,
  datasets: readonly (readonly T[])[],
  options: Partial<StreamOptions & VerilogOptions> = {}
): string {
  const opts: VerilogOptions = { ...DEFAULT_OPTIONS, ...options };
  const width = design.hw.size;
  const result = simulate(design, datasets, options);
  const lines = [
    '`timescale 1ns / 1ps',
    `module ${design.name}_tb;`,
    `  reg ${opts.clock} = 0;`,
    `  reg ${RESET_PORT} = 1;`,
    `  reg ${NEXT_PORT} = 0;`,
    ...design.inputs.map((port) => `  reg ${range(width)}${port} = 0;`),
    ...design.outputs.map((port) => `  wire ${range(width)}${port};`),
    `  wire ${NEXT_OUT_PORT};`,
    '  integer errors = 0;',
    `  ${design.name} dut (${[opts.clock, RESET_PORT, NEXT_PORT, ...design.inputs, ...design.outputs, NEXT_OUT_PORT]
      .map((port) => `.${port}(${port})`).join(', ')});`,
    `  always #5 ${opts.clock} = ~${opts.clock};`,
    '  initial begin',
    `    @(negedge ${opts.clock});`,
    `    ${RESET_PORT} = 0;`,
  ];
  result.cycles.forEach((cycle, x) => {
    lines.push(`    // cycle ${x}`);
    lines.push(`    ${NEXT_PORT} = ${cycle.next};`);
    design.inputs.forEach((port, lane) => lines.push(`    ${port} = ${literal(cycle.inputs[lane], width)};`));
    const expected = cycle.outputs;
    if (expected !== null) {
      lines.push('    #1;');
      design.outputs.forEach((port, lane) => {
        const value = literal(expected[lane], width);
        lines.push(`    if (${port} !== ${value}) begin`);
        lines.push(`      errors = errors + 1;`);
        lines.push(`      $display("cycle ${x}: ${port} = %h, expected ${value}", ${port});`);
        lines.push('    end');
      });
    }
    lines.push(`    @(negedge ${opts.clock});`);
  });
  lines.push('    $display("%0d errors", errors);', '    $finish;', '  end', 'endmodule', '');
  return lines.join('\n');
}
