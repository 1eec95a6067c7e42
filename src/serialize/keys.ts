/**
 * Reserved keys of the nested structure and of store attributes.
 */

/** Qualified name of a composite. */
export const TYPE_KEY = '__type__';
/** Qualified name of a dataset type. */
export const DATASET_KEY = '__dataset__';
/** Container kind of a store group, and of set/map nodes in the JSON view. */
export const CONTAINER_KEY = '__container__';
/** Root value of a store that holds neither a composite nor a container. */
export const VALUE_KEY = '__value__';
export const PRIMITIVE_KEY = '__primitive__';
export const NDARRAY_KEY = '__ndarray__';

export const RESERVED_KEYS: readonly string[] = [
  TYPE_KEY,
  DATASET_KEY,
  CONTAINER_KEY,
  VALUE_KEY,
  PRIMITIVE_KEY,
  NDARRAY_KEY,
];

export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.includes(key);
}
