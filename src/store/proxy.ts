/**
 * Array Proxy
 *
 * Lazy handle on a stored array leaf. Reads and writes go straight to the
 * leaf's data file; nothing is held in memory between calls. Only the
 * leading axis can grow, by writing past its end, `append` or `resize`.
 */

import { NDArray, allocate, shapeSize, stridesOf, typedArrayFor, type DType, type TypedArray } from '../arrays/ndarray.js';
import { StorageShapeError } from '../errors.js';
import type { DatasetMetadata } from '../registry/index.js';
import { DATASET_KEY } from '../serialize/keys.js';
import { decodeAttribute, encodeAttribute } from './attributes.js';
import type { ArrayLeaf, StoreFile } from './file.js';

export interface Slice {
  readonly start?: number;
  readonly stop?: number;
  /** Positive. Defaults to 1. */
  readonly step?: number;
}

/** An integer index drops its axis from the result; a slice keeps it. */
export type Selector = number | Slice;

export function slice(start?: number, stop?: number, step?: number): Slice {
  return { start, stop, step };
}

interface AxisPlan {
  indices: number[];
  keep: boolean;
}

function isSelectorList(selection: Selector | readonly Selector[]): selection is readonly Selector[] {
  return Array.isArray(selection);
}

function resolveAxis(selector: Selector, length: number, axis: number, operation: string): AxisPlan {
  if (typeof selector === 'number') {
    const index = selector < 0 ? selector + length : selector;
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new StorageShapeError(
        operation,
        `index ${selector} is out of range for axis ${axis} with length ${length}`,
      );
    }
    return { indices: [index], keep: false };
  }

  const step = selector.step ?? 1;
  if (!Number.isInteger(step) || step <= 0) {
    throw new StorageShapeError(operation, `slice step must be a positive integer, got ${step}`);
  }
  const clamp = (value: number): number => Math.min(Math.max(value < 0 ? value + length : value, 0), length);
  const start = clamp(selector.start ?? 0);
  const stop = clamp(selector.stop ?? length);
  const indices: number[] = [];
  for (let i = start; i < stop; i += step) indices.push(i);
  return { indices, keep: true };
}

/** Consecutive indices merged into [first, count] runs. */
function toRuns(indices: readonly number[]): Array<[number, number]> {
  const runs: Array<[number, number]> = [];
  for (const index of indices) {
    const last = runs[runs.length - 1];
    if (last && last[0] + last[1] === index) last[1]++;
    else runs.push([index, 1]);
  }
  return runs;
}

/**
 * Visit every contiguous run of selected elements, in row-major order.
 * `offset` is in elements from the start of the leaf, `position` is the
 * index of the run's first element in the selection.
 */
function forEachRun(
  axes: readonly AxisPlan[],
  shape: readonly number[],
  visit: (offset: number, count: number, position: number) => void,
): void {
  if (axes.length === 0) {
    visit(0, 1, 0);
    return;
  }
  const strides = stridesOf(shape);
  const last = axes.length - 1;
  const runs = toRuns(axes[last].indices);
  let position = 0;
  const walk = (axis: number, base: number): void => {
    if (axis === last) {
      for (const [first, count] of runs) {
        visit(base + first, count, position);
        position += count;
      }
      return;
    }
    for (const index of axes[axis].indices) walk(axis + 1, base + index * strides[axis]);
  };
  walk(0, 0);
}

function asBytes(data: TypedArray): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

export class ArrayProxy {
  constructor(private leaf: ArrayLeaf) {}

  /** Absolute path of the leaf this proxy reads. */
  get location(): string {
    return this.leaf.path;
  }

  get dtype(): DType {
    return this.leaf.dtype;
  }

  get shape(): readonly number[] {
    return [...this.leaf.shape];
  }

  get ndim(): number {
    return this.leaf.shape.length;
  }

  get size(): number {
    return this.leaf.size;
  }

  get nbytes(): number {
    return this.leaf.nbytes;
  }

  get length(): number {
    if (this.ndim === 0) throw new StorageShapeError('length', `${this.location} is 0-dimensional`);
    return this.leaf.shape[0];
  }

  get writable(): boolean {
    return this.leaf.store.writable;
  }

  /** Decoded leaf attributes, without the dataset tag. */
  get attributes(): DatasetMetadata {
    const out: DatasetMetadata = {};
    for (const [name, raw] of this.leaf.attributes()) {
      if (name === DATASET_KEY) continue;
      const value = decodeAttribute(raw);
      if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        out[name] = value;
      }
    }
    return out;
  }

  setAttribute(name: string, value: string | number | boolean | null): void {
    this.leaf.setAttribute(name, encodeAttribute(value));
  }

  belongsTo(file: StoreFile): boolean {
    return this.leaf.store === file;
  }

  /** @internal Follow the data to the leaf it was rewritten to. */
  rebind(leaf: ArrayLeaf): void {
    this.leaf = leaf;
  }

  get(...index: number[]): number {
    if (index.length !== this.ndim) {
      throw new StorageShapeError('get', `expected ${this.ndim} indices, got ${index.length}`);
    }
    return this.read(...index).data[0];
  }

  set(index: readonly number[], value: number): void {
    if (index.length !== this.ndim) {
      throw new StorageShapeError('set', `expected ${this.ndim} indices, got ${index.length}`);
    }
    this.write(index, value);
  }

  /**
   * Read a selection. Missing trailing selectors select the whole axis, so
   * `read()` returns the entire array.
   */
  read(...selection: Selector[]): NDArray {
    const shape = this.leaf.shape;
    if (selection.length > shape.length) {
      throw new StorageShapeError('read', `too many indices (${selection.length}) for a ${shape.length}-d array`);
    }
    const axes = shape.map((length, axis) => resolveAxis(selection[axis] ?? {}, length, axis, 'read'));
    const out = allocate(this.dtype, shapeSize(axes.map((plan) => plan.indices.length)));
    const Ctor = typedArrayFor(this.dtype);
    const width = this.leaf.itemSize;

    forEachRun(axes, shape, (offset, count, position) => {
      const bytes = this.leaf.readBytes(offset * width, count * width);
      out.set(new Ctor(bytes.buffer, bytes.byteOffset, count), position);
    });
    return new NDArray(
      out,
      axes.filter((plan) => plan.keep).map((plan) => plan.indices.length),
    );
  }

  /**
   * Write values into a selection. A scalar fills the selection; otherwise
   * the value count must match the selection size. A leading-axis index or
   * slice stop past the current extent grows the array first.
   */
  write(selection: Selector | readonly Selector[], values: number | ArrayLike<number> | NDArray): void {
    this.assertWritable('write');
    const selectors: readonly Selector[] = isSelectorList(selection) ? selection : [selection];
    const current = this.leaf.shape;
    if (selectors.length > current.length) {
      throw new StorageShapeError('write', `too many indices (${selectors.length}) for a ${current.length}-d array`);
    }

    const shape = [...current];
    if (shape.length > 0 && selectors.length > 0) {
      shape[0] = Math.max(shape[0], requiredExtent(selectors[0]));
    }
    const axes = shape.map((length, axis) => {
      const selector = selectors[axis] ?? {};
      if (axis > 0 && typeof selector !== 'number' && selector.stop !== undefined && selector.stop > length) {
        throw new StorageShapeError(
          'write',
          `stop ${selector.stop} exceeds length ${length} of axis ${axis}; only the leading axis can grow`,
        );
      }
      return resolveAxis(selector, length, axis, 'write');
    });

    const count = shapeSize(axes.map((plan) => plan.indices.length));
    let flat: TypedArray;
    if (typeof values === 'number') {
      flat = allocate(this.dtype, count).fill(values);
    } else {
      const Ctor = typedArrayFor(this.dtype);
      flat = new Ctor(values instanceof NDArray ? values.data : values);
      if (flat.length !== count) {
        throw new StorageShapeError('write', `expected ${count} values for the selection, got ${flat.length}`);
      }
    }

    if (shape.length > 0 && shape[0] > current[0]) this.leaf.resizeLeading(shape[0]);
    const width = this.leaf.itemSize;
    forEachRun(axes, shape, (offset, runLength, position) => {
      this.leaf.writeBytes(offset * width, asBytes(flat.subarray(position, position + runLength)));
    });
  }

  /**
   * Add rows at the end of the leading axis. Accepts an array whose
   * trailing dimensions match the leaf, a single row, or flat values whose
   * count is a multiple of the row size.
   */
  append(values: ArrayLike<number> | NDArray): void {
    this.assertWritable('append');
    this.assertResizable('append');
    const shape = this.leaf.shape;
    const trailing = shape.slice(1);
    const rowSize = shapeSize(trailing);

    let rows: number;
    if (values instanceof NDArray && shape.length > 1) {
      if (values.ndim === shape.length && sameDims(values.shape.slice(1), trailing)) {
        rows = values.shape[0];
      } else if (values.ndim === trailing.length && sameDims(values.shape, trailing)) {
        rows = 1;
      } else {
        throw new StorageShapeError(
          'append',
          `shape [${values.shape.join(', ')}] does not match trailing dimensions [${trailing.join(', ')}]`,
        );
      }
    } else {
      const count = values instanceof NDArray ? values.size : values.length;
      if (rowSize === 0 || count % rowSize !== 0) {
        throw new StorageShapeError('append', `${count} values do not fill whole rows of ${rowSize}`);
      }
      rows = count / rowSize;
    }
    if (rows === 0) return;

    const start = shape[0];
    this.write([slice(start, start + rows)], values);
  }

  /**
   * Grow the leading axis to `length`. New rows read as zero.
   */
  resize(length: number): void {
    this.assertWritable('resize');
    this.assertResizable('resize');
    const current = this.leaf.shape[0];
    if (!Number.isInteger(length) || length < 0) {
      throw new StorageShapeError('resize', `invalid length ${length}`);
    }
    if (length < current) {
      throw new StorageShapeError('resize', `cannot shrink ${this.location} from ${current} to ${length}`);
    }
    if (length > current) this.leaf.resizeLeading(length);
  }

  /** Write the leaf's pending header changes. */
  flush(): void {
    this.leaf.flush();
  }

  /** Flush and release the data file handle. The proxy stays usable. */
  close(): void {
    this.leaf.flush();
    this.leaf.release();
  }

  private assertWritable(operation: string): void {
    this.leaf.store.assertWritable(this.location, operation);
  }

  private assertResizable(operation: string): void {
    if (this.ndim === 0) {
      throw new StorageShapeError(operation, `${this.location} is 0-dimensional and cannot be resized`);
    }
  }
}

function requiredExtent(selector: Selector): number {
  if (typeof selector === 'number') return selector >= 0 ? selector + 1 : 0;
  return selector.stop !== undefined && selector.stop > 0 ? selector.stop : 0;
}

function sameDims(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((dim, axis) => dim === b[axis]);
}
