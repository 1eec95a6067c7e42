/**
 * Structural equality over runtime graphs.
 *
 * Composites are equal when they share a type and every copiable slot is
 * deep-equal. Containers compare element-wise; sets and maps ignore order.
 * `null` and `undefined` are the same absent value.
 */

import { NDArray } from '../arrays/ndarray.js';
import { datasetEntryFor, isPlainObject, primitiveEntryFor } from '../registry/index.js';
import { Composite, compositeClassOf, slotTable } from '../slots/composite.js';
import { ArrayProxy } from '../store/proxy.js';

export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === null || a === undefined) return b === null || b === undefined;
  if (b === null || b === undefined) return false;
  if (a === b) return true;

  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  const left = a instanceof ArrayProxy ? a.read() : a;
  const right = b instanceof ArrayProxy ? b.read() : b;
  if (left instanceof NDArray || right instanceof NDArray) {
    return left instanceof NDArray && right instanceof NDArray && left.equals(right);
  }

  const primitive = primitiveEntryFor(left);
  if (primitive) {
    if (primitiveEntryFor(right) !== primitive) return false;
    return primitive.codec ? primitive.codec.encode(left) === primitive.codec.encode(right) : String(left) === String(right);
  }

  const dataset = datasetEntryFor(left);
  if (dataset) {
    if (datasetEntryFor(right) !== dataset) return false;
    const x = dataset.disassemble(left);
    const y = dataset.disassemble(right);
    return x.data.equals(y.data) && deepEqual(x.metadata, y.metadata);
  }

  if (Array.isArray(left)) {
    return Array.isArray(right) && left.length === right.length && left.every((item, i) => deepEqual(item, right[i]));
  }
  if (left instanceof Set) {
    if (!(right instanceof Set) || left.size !== right.size) return false;
    const pool = [...right];
    return [...left].every((item) => {
      const match = pool.findIndex((candidate) => deepEqual(item, candidate));
      if (match < 0) return false;
      pool.splice(match, 1);
      return true;
    });
  }
  if (left instanceof Map) {
    if (!(right instanceof Map) || left.size !== right.size) return false;
    const pool = [...right];
    return [...left].every(([key, item]) => {
      const match = pool.findIndex(([k, v]) => deepEqual(key, k) && deepEqual(item, v));
      if (match < 0) return false;
      pool.splice(match, 1);
      return true;
    });
  }
  if (isPlainObject(left)) {
    if (!isPlainObject(right)) return false;
    const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
    return [...keys].every((key) => deepEqual(left[key], right[key]));
  }
  if (left instanceof Composite) {
    return compositeEquals(left, right);
  }
  return false;
}

export function compositeEquals(a: Composite, b: unknown): boolean {
  if (a === b) return true;
  if (!(b instanceof Composite) || a.constructor !== b.constructor) return false;
  for (const [name, declared] of slotTable(compositeClassOf(a))) {
    if (!declared.copiable) continue;
    if (!deepEqual(declared.read(a, name), declared.read(b, name))) return false;
  }
  return true;
}
