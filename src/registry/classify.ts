/**
 * Value Classifier
 *
 * Decides how a runtime value is serialized. The checks run in a fixed
 * order: null, primitives, datasets, containers, composites.
 */

import { ClassificationError, describeType } from '../errors.js';
import { compositeTypeOf } from './composite.js';
import { datasetEntryFor } from './dataset.js';
import { primitiveEntryFor } from './primitive.js';

export type ValueCategory = 'primitive' | 'dataset' | 'container' | 'composite';

export type ContainerKind = 'sequence' | 'set' | 'map' | 'mapping';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function containerKind(value: unknown): ContainerKind | undefined {
  if (Array.isArray(value)) return 'sequence';
  if (value instanceof Set) return 'set';
  if (value instanceof Map) return 'map';
  if (isPlainObject(value)) return 'mapping';
  return undefined;
}

/**
 * Serialization category of a value. Throws a ClassificationError naming the
 * runtime type when the value fits no category.
 */
export function classify(value: unknown): ValueCategory {
  if (value === null || value === undefined) return 'primitive';
  if (primitiveEntryFor(value)) return 'primitive';
  if (datasetEntryFor(value)) return 'dataset';
  if (containerKind(value)) return 'container';
  if (compositeTypeOf(value)) return 'composite';
  throw new ClassificationError(
    describeType(value),
    typeof value === 'object' ? 'not a registered primitive, dataset or composite type' : undefined,
  );
}
