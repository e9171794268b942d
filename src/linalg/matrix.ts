// Matrix: immutable dense matrices and vectors over a finite field

import { DomainError } from '../errors.js';
import { GF2 } from './field.js';
import type { Field } from './field.js';

export class Vec {
  private constructor(
    readonly field: Field,
    private readonly values: readonly number[]
  ) {}

  static of(field: Field, values: readonly number[]): Vec {
    for (const value of values) {
      if (!field.contains(value)) {
        throw new DomainError(`${value} is not an element of ${field.name}`);
      }
    }
    return new Vec(field, [...values]);
  }

  static zeros(field: Field, size: number): Vec {
    return new Vec(field, new Array<number>(size).fill(0));
  }

  /** GF(2) vector of `size` bits holding `value`; element 0 is the most significant bit. */
  static fromInt(size: number, value: number): Vec {
    const bits: number[] = [];
    for (let i = 0; i < size; i++) {
      bits.push((value >> (size - 1 - i)) & 1);
    }
    return new Vec(GF2, bits);
  }

  get size(): number {
    return this.values.length;
  }

  get(index: number): number {
    if (index < 0 || index >= this.values.length) {
      throw new DomainError(`index ${index} outside vector of size ${this.values.length}`);
    }
    return this.values[index];
  }

  toArray(): number[] {
    return [...this.values];
  }

  toInt(): number {
    let value = 0;
    for (const bit of this.values) {
      value = value * this.field.order + bit;
    }
    return value;
  }

  plus(other: Vec): Vec {
    this.checkSize(other);
    return new Vec(this.field, this.values.map((v, i) => this.field.plus(v, other.values[i])));
  }

  scalar(other: Vec): number {
    this.checkSize(other);
    let sum = 0;
    for (let i = 0; i < this.values.length; i++) {
      sum = this.field.plus(sum, this.field.times(this.values[i], other.values[i]));
    }
    return sum;
  }

  isZero(): boolean {
    return this.values.every((v) => v === 0);
  }

  equals(other: Vec): boolean {
    return this.field === other.field && this.size === other.size &&
      this.values.every((v, i) => v === other.values[i]);
  }

  toString(): string {
    return `[${this.values.join(' ')}]`;
  }

  private checkSize(other: Vec): void {
    if (other.size !== this.size || other.field !== this.field) {
      throw new DomainError(`vector sizes differ: ${this.size} and ${other.size}`);
    }
  }
}

export class Matrix {
  private constructor(
    readonly field: Field,
    readonly rows: number,
    readonly cols: number,
    private readonly entries: readonly number[]
  ) {}

  static tabulate(field: Field, rows: number, cols: number, f: (i: number, j: number) => number): Matrix {
    const entries: number[] = [];
    for (let i = 0; i < rows; i++) {
      for (let j = 0; j < cols; j++) {
        const value = f(i, j);
        if (!field.contains(value)) {
          throw new DomainError(`${value} is not an element of ${field.name}`);
        }
        entries.push(value);
      }
    }
    return new Matrix(field, rows, cols, entries);
  }

  static fromRows(field: Field, rows: readonly (readonly number[])[]): Matrix {
    const cols = rows.length === 0 ? 0 : rows[0].length;
    for (const row of rows) {
      if (row.length !== cols) {
        throw new DomainError('matrix rows have different lengths');
      }
    }
    return Matrix.tabulate(field, rows.length, cols, (i, j) => rows[i][j]);
  }

  static identity(field: Field, size: number): Matrix {
    return Matrix.tabulate(field, size, size, (i, j) => (i === j ? 1 : 0));
  }

  static zeros(field: Field, rows: number, cols: number): Matrix {
    return Matrix.tabulate(field, rows, cols, () => 0);
  }

  get(i: number, j: number): number {
    if (i < 0 || i >= this.rows || j < 0 || j >= this.cols) {
      throw new DomainError(`entry (${i}, ${j}) outside ${this.rows}x${this.cols} matrix`);
    }
    return this.entries[i * this.cols + j];
  }

  row(i: number): Vec {
    return Vec.of(this.field, this.entries.slice(i * this.cols, (i + 1) * this.cols));
  }

  get isSquare(): boolean {
    return this.rows === this.cols;
  }

  plus(other: Matrix): Matrix {
    if (other.rows !== this.rows || other.cols !== this.cols) {
      throw new DomainError(`cannot add ${this.shape()} and ${other.shape()} matrices`);
    }
    return Matrix.tabulate(this.field, this.rows, this.cols, (i, j) =>
      this.field.plus(this.get(i, j), other.get(i, j))
    );
  }

  multiply(other: Matrix): Matrix {
    if (this.cols !== other.rows) {
      throw new DomainError(`cannot multiply ${this.shape()} by ${other.shape()}`);
    }
    const f = this.field;
    return Matrix.tabulate(f, this.rows, other.cols, (i, j) => {
      let sum = 0;
      for (let x = 0; x < this.cols; x++) {
        sum = f.plus(sum, f.times(this.get(i, x), other.get(x, j)));
      }
      return sum;
    });
  }

  apply(vector: Vec): Vec {
    if (vector.size !== this.cols) {
      throw new DomainError(`cannot apply ${this.shape()} matrix to vector of size ${vector.size}`);
    }
    const values: number[] = [];
    for (let i = 0; i < this.rows; i++) {
      values.push(this.row(i).scalar(vector));
    }
    return Vec.of(this.field, values);
  }

  transpose(): Matrix {
    return Matrix.tabulate(this.field, this.cols, this.rows, (i, j) => this.get(j, i));
  }

  /** Block-diagonal combination with `this` in the top-left corner. */
  directSum(other: Matrix): Matrix {
    return Matrix.tabulate(this.field, this.rows + other.rows, this.cols + other.cols, (i, j) => {
      if (i < this.rows && j < this.cols) return this.get(i, j);
      if (i >= this.rows && j >= this.cols) return other.get(i - this.rows, j - this.cols);
      return 0;
    });
  }

  /** Rows [rowStart, rowEnd) and columns [colStart, colEnd). */
  slice(rowStart: number, rowEnd: number, colStart: number, colEnd: number): Matrix {
    if (rowStart < 0 || rowEnd > this.rows || colStart < 0 || colEnd > this.cols ||
        rowStart > rowEnd || colStart > colEnd) {
      throw new DomainError(`slice [${rowStart}:${rowEnd}, ${colStart}:${colEnd}] outside ${this.shape()} matrix`);
    }
    return Matrix.tabulate(this.field, rowEnd - rowStart, colEnd - colStart, (i, j) =>
      this.get(rowStart + i, colStart + j)
    );
  }

  /** `this` on top of `other`. */
  stack(other: Matrix): Matrix {
    if (other.cols !== this.cols) {
      throw new DomainError(`cannot stack ${this.shape()} on ${other.shape()}`);
    }
    return Matrix.tabulate(this.field, this.rows + other.rows, this.cols, (i, j) =>
      i < this.rows ? this.get(i, j) : other.get(i - this.rows, j)
    );
  }

  /** `this` left of `other`. */
  beside(other: Matrix): Matrix {
    if (other.rows !== this.rows) {
      throw new DomainError(`cannot place ${this.shape()} beside ${other.shape()}`);
    }
    return Matrix.tabulate(this.field, this.rows, this.cols + other.cols, (i, j) =>
      j < this.cols ? this.get(i, j) : other.get(i, j - this.cols)
    );
  }

  power(exponent: number): Matrix {
    if (!this.isSquare) throw new DomainError(`cannot raise ${this.shape()} matrix to a power`);
    if (exponent < 0) return this.inverse().power(-exponent);
    let result = Matrix.identity(this.field, this.rows);
    for (let i = 0; i < exponent; i++) {
      result = result.multiply(this);
    }
    return result;
  }

  rank(): number {
    return this.reduce(Matrix.zeros(this.field, this.rows, 0)).rank;
  }

  isInvertible(): boolean {
    return this.isSquare && this.rank() === this.rows;
  }

  /** Gauss-Jordan elimination; throws DomainError when the matrix is singular. */
  inverse(): Matrix {
    if (!this.isSquare) {
      throw new DomainError(`cannot invert non-square ${this.shape()} matrix`);
    }
    const { rank, augmented } = this.reduce(Matrix.identity(this.field, this.rows));
    if (rank !== this.rows) {
      throw new DomainError(`matrix is singular (rank ${rank} of ${this.rows})`);
    }
    return augmented;
  }

  isIdentity(): boolean {
    return this.equals(Matrix.identity(this.field, this.rows));
  }

  isZero(): boolean {
    return this.entries.every((v) => v === 0);
  }

  equals(other: Matrix): boolean {
    return this.field === other.field && this.rows === other.rows && this.cols === other.cols &&
      this.entries.every((v, i) => v === other.entries[i]);
  }

  toString(): string {
    const lines: string[] = [];
    for (let i = 0; i < this.rows; i++) {
      lines.push(this.entries.slice(i * this.cols, (i + 1) * this.cols).join(' '));
    }
    return lines.join('\n');
  }

  private shape(): string {
    return `${this.rows}x${this.cols}`;
  }

  /**
   * Row-reduces `this` while applying the same row operations to `companion`.
   * Returns the rank and the transformed companion.
   */
  private reduce(companion: Matrix): { rank: number; augmented: Matrix } {
    const f = this.field;
    const a = Array.from({ length: this.rows }, (_, i) => this.row(i).toArray());
    const b = Array.from({ length: this.rows }, (_, i) => companion.row(i).toArray());
    let rank = 0;
    for (let col = 0; col < this.cols && rank < this.rows; col++) {
      let pivot = -1;
      for (let i = rank; i < this.rows; i++) {
        if (a[i][col] !== 0) {
          pivot = i;
          break;
        }
      }
      if (pivot < 0) continue;
      [a[rank], a[pivot]] = [a[pivot], a[rank]];
      [b[rank], b[pivot]] = [b[pivot], b[rank]];
      const scale = f.inverse(a[rank][col]);
      a[rank] = a[rank].map((v) => f.times(v, scale));
      b[rank] = b[rank].map((v) => f.times(v, scale));
      for (let i = 0; i < this.rows; i++) {
        const factor = a[i][col];
        if (i === rank || factor === 0) continue;
        a[i] = a[i].map((v, j) => f.minus(v, f.times(factor, a[rank][j])));
        b[i] = b[i].map((v, j) => f.minus(v, f.times(factor, b[rank][j])));
      }
      rank++;
    }
    return { rank, augmented: Matrix.fromRows(f, b) };
  }
}
