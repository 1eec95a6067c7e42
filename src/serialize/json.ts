/**
 * JSON view of a nested structure.
 *
 * Sets, maps, arrays and the scalars JSON cannot carry are wrapped in
 * tagged objects so the view converts back without loss.
 */

import { NDArray, isDType } from '../arrays/ndarray.js';
import { ClassificationError, describeType } from '../errors.js';
import { isPrimitiveInstance, primitiveEntryByName, primitiveEntryFor } from '../registry/index.js';
import { ArrayProxy } from '../store/proxy.js';
import { CONTAINER_KEY, NDARRAY_KEY, PRIMITIVE_KEY } from './keys.js';
import { isNestedRecord, type Nested, type NestedRecord } from './types.js';

export type JsonValue = null | string | number | boolean | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function toJSONValue(value: Nested): JsonValue {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : { [PRIMITIVE_KEY]: 'float', value: String(value) };
    case 'bigint':
      return { [PRIMITIVE_KEY]: 'bigint', value: value.toString() };
    default:
      break;
  }

  if (value instanceof ArrayProxy) return toJSONValue(value.read());
  if (value instanceof NDArray) {
    return {
      [NDARRAY_KEY]: {
        dtype: value.dtype,
        shape: [...value.shape],
        data: Array.from(value.data, (item) => (Number.isFinite(item) ? item : String(item))),
      },
    };
  }
  if (Array.isArray(value)) return value.map(toJSONValue);
  if (value instanceof Set) {
    return { [CONTAINER_KEY]: 'set', items: Array.from(value, toJSONValue) };
  }
  if (value instanceof Map) {
    return {
      [CONTAINER_KEY]: 'map',
      items: Array.from(value, ([key, item]) => [toJSONValue(key), toJSONValue(item)]),
    };
  }
  if (isPrimitiveInstance(value)) {
    const entry = primitiveEntryFor(value);
    const payload = entry?.codec ? entry.codec.encode(value) : String(value);
    return { [PRIMITIVE_KEY]: entry?.name ?? describeType(value), value: payload };
  }
  if (isNestedRecord(value)) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toJSONValue(item);
    }
    return out;
  }
  throw new ClassificationError(describeType(value));
}

export function fromJSONValue(json: JsonValue): Nested {
  if (json === null || typeof json !== 'object') return json;
  if (Array.isArray(json)) return json.map(fromJSONValue);

  const primitiveKind = json[PRIMITIVE_KEY];
  if (typeof primitiveKind === 'string') {
    return decodePrimitive(primitiveKind, String(json.value));
  }

  const ndarray = json[NDARRAY_KEY];
  if (ndarray !== undefined) {
    return decodeNDArray(ndarray);
  }

  const container = json[CONTAINER_KEY];
  const items = json.items;
  if (container === 'set' && Array.isArray(items)) {
    return new Set(items.map(fromJSONValue));
  }
  if (container === 'map' && Array.isArray(items)) {
    return new Map(
      items.map((pair): [Nested, Nested] => {
        if (!Array.isArray(pair) || pair.length !== 2) {
          throw new ClassificationError('Map', 'map entries must be [key, value] pairs');
        }
        return [fromJSONValue(pair[0]), fromJSONValue(pair[1])];
      }),
    );
  }

  const out: NestedRecord = {};
  for (const [key, item] of Object.entries(json)) {
    out[key] = fromJSONValue(item);
  }
  return out;
}

function decodePrimitive(kind: string, payload: string): Nested {
  if (kind === 'float') return Number(payload);
  if (kind === 'bigint') return BigInt(payload);
  const entry = primitiveEntryByName(kind);
  if (!entry?.codec) {
    throw new ClassificationError(kind, 'no codec is registered for this primitive');
  }
  const value = entry.codec.decode(payload);
  if (!isPrimitiveInstance(value)) {
    throw new ClassificationError(kind, 'codec returned an unregistered value');
  }
  return value;
}

function decodeNDArray(json: JsonValue): NDArray {
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new ClassificationError('NDArray', 'malformed array payload');
  }
  const { dtype, shape, data } = json;
  if (!isDType(dtype) || !Array.isArray(shape) || !Array.isArray(data)) {
    throw new ClassificationError('NDArray', 'malformed array payload');
  }
  return NDArray.from(
    data.map((item) => Number(item)),
    { dtype, shape: shape.map((dim) => Number(dim)) },
  );
}
