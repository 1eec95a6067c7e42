/**
 * Nested serialized structure
 *
 * Composites appear as records tagged with `__type__`; dataset values as
 * `{ __dataset__, data, metadata }` records. Containers keep their shape.
 */

import type { NDArray } from '../arrays/ndarray.js';
import { isPlainObject } from '../registry/classify.js';
import type { PrimitiveInstance } from '../registry/index.js';
import type { ArrayProxy } from '../store/proxy.js';

export type NestedScalar = null | string | number | boolean | bigint;

export type Nested =
  | NestedScalar
  | PrimitiveInstance
  | NDArray
  | ArrayProxy
  | Nested[]
  | Set<Nested>
  | Map<Nested, Nested>
  | NestedRecord;

export interface NestedRecord {
  [key: string]: Nested;
}

export function isScalar(value: unknown): value is string | number | boolean | bigint {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return true;
    default:
      return false;
  }
}

export function isNestedRecord(value: unknown): value is NestedRecord {
  return isPlainObject(value);
}
