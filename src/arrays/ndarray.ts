/**
 * Dense N-dimensional numeric arrays
 *
 * Row-major (C order) storage over a typed array. This is the in-memory
 * counterpart of a store array leaf and the payload of every dataset value.
 */

export const DTYPE_NAMES = [
  'float64',
  'float32',
  'int8',
  'int16',
  'int32',
  'uint8',
  'uint16',
  'uint32',
] as const;

export type DType = (typeof DTYPE_NAMES)[number];

export type TypedArray =
  | Float64Array
  | Float32Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint16Array
  | Uint32Array;

export interface TypedArrayConstructor {
  new (length: number): TypedArray;
  new (values: ArrayLike<number>): TypedArray;
  new (buffer: ArrayBufferLike, byteOffset?: number, length?: number): TypedArray;
  readonly BYTES_PER_ELEMENT: number;
}

const CONSTRUCTORS: Record<DType, TypedArrayConstructor> = {
  float64: Float64Array,
  float32: Float32Array,
  int8: Int8Array,
  int16: Int16Array,
  int32: Int32Array,
  uint8: Uint8Array,
  uint16: Uint16Array,
  uint32: Uint32Array,
};

export function isDType(value: unknown): value is DType {
  return DTYPE_NAMES.some((name) => name === value);
}

export function typedArrayFor(dtype: DType): TypedArrayConstructor {
  return CONSTRUCTORS[dtype];
}

export function itemSize(dtype: DType): number {
  return CONSTRUCTORS[dtype].BYTES_PER_ELEMENT;
}

export function allocate(dtype: DType, length: number): TypedArray {
  return new CONSTRUCTORS[dtype](length);
}

export function dtypeOf(data: TypedArray): DType {
  if (data instanceof Float64Array) return 'float64';
  if (data instanceof Float32Array) return 'float32';
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof Uint8Array) return 'uint8';
  if (data instanceof Uint16Array) return 'uint16';
  return 'uint32';
}

export function shapeSize(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

/**
 * Row-major strides, in elements.
 */
export function stridesOf(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let step = 1;
  for (let axis = shape.length - 1; axis >= 0; axis--) {
    strides[axis] = step;
    step *= shape[axis];
  }
  return strides;
}

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export class NDArray {
  readonly dtype: DType;
  readonly shape: readonly number[];

  constructor(readonly data: TypedArray, shape?: readonly number[]) {
    this.dtype = dtypeOf(data);
    this.shape = Object.freeze([...(shape ?? [data.length])]);
    for (const dim of this.shape) {
      if (!Number.isInteger(dim) || dim < 0) {
        throw new RangeError(`Invalid array shape [${this.shape.join(', ')}]`);
      }
    }
    if (shapeSize(this.shape) !== data.length) {
      throw new RangeError(
        `Shape [${this.shape.join(', ')}] does not match ${data.length} elements`,
      );
    }
  }

  static from(
    values: ArrayLike<number>,
    options: { dtype?: DType; shape?: readonly number[] } = {},
  ): NDArray {
    return new NDArray(new CONSTRUCTORS[options.dtype ?? 'float64'](values), options.shape);
  }

  static zeros(shape: readonly number[], dtype: DType = 'float64'): NDArray {
    return new NDArray(allocate(dtype, shapeSize(shape)), shape);
  }

  /** A 0-dimensional array holding one value. */
  static scalar(value: number, dtype: DType = 'float64'): NDArray {
    return new NDArray(new CONSTRUCTORS[dtype]([value]), []);
  }

  get ndim(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.data.length;
  }

  get nbytes(): number {
    return this.data.byteLength;
  }

  get(...index: number[]): number {
    return this.data[this.offsetOf(index)];
  }

  set(index: readonly number[], value: number): void {
    this.data[this.offsetOf(index)] = value;
  }

  /**
   * Nested plain arrays (or a bare number for 0-d arrays).
   */
  toList(): unknown {
    if (this.ndim === 0) return this.data[0];
    const build = (axis: number, offset: number): unknown[] => {
      const strides = stridesOf(this.shape);
      const out: unknown[] = [];
      for (let i = 0; i < this.shape[axis]; i++) {
        const at = offset + i * strides[axis];
        out.push(axis === this.ndim - 1 ? this.data[at] : build(axis + 1, at));
      }
      return out;
    };
    return build(0, 0);
  }

  equals(other: NDArray): boolean {
    if (this.dtype !== other.dtype || this.ndim !== other.ndim) return false;
    if (this.shape.some((dim, axis) => dim !== other.shape[axis])) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (!sameNumber(this.data[i], other.data[i])) return false;
    }
    return true;
  }

  private offsetOf(index: readonly number[]): number {
    if (index.length !== this.ndim) {
      throw new RangeError(`Expected ${this.ndim} indices, got ${index.length}`);
    }
    const strides = stridesOf(this.shape);
    let offset = 0;
    index.forEach((raw, axis) => {
      const i = raw < 0 ? raw + this.shape[axis] : raw;
      if (!Number.isInteger(i) || i < 0 || i >= this.shape[axis]) {
        throw new RangeError(`Index ${raw} out of range for axis ${axis} with length ${this.shape[axis]}`);
      }
      offset += i * strides[axis];
    });
    return offset;
  }
}
