export { serialize, serializeGraph, deserialize, copy } from './serializer.js';
export type { SerializeOptions } from './serializer.js';
export { deepEqual, compositeEquals } from './equality.js';
export { toJSONValue, fromJSONValue } from './json.js';
export type { JsonValue, JsonObject } from './json.js';
export {
  TYPE_KEY,
  DATASET_KEY,
  CONTAINER_KEY,
  VALUE_KEY,
  PRIMITIVE_KEY,
  NDARRAY_KEY,
  RESERVED_KEYS,
  isReservedKey,
} from './keys.js';
export { isScalar, isNestedRecord } from './types.js';
export type { Nested, NestedRecord, NestedScalar } from './types.js';
