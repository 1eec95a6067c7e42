/**
 * Graph Serializer / Deserializer
 *
 * serialize: runtime value → nested structure (fresh on every call).
 * deserialize: nested structure → runtime value, resolving composite and
 * dataset tags through the Type Registry.
 *
 * Cyclic object graphs are not supported and recurse without bound.
 */

import { NDArray } from '../arrays/ndarray.js';
import { ClassificationError, ResolutionError, describeType } from '../errors.js';
import {
  NDARRAY_DATASET,
  classify,
  compositeNameOf,
  compositeTypeOf,
  datasetEntryFor,
  isPlainObject,
  isPrimitiveInstance,
  lookupComposite,
  lookupDataset,
  primitiveEntryFor,
  type DatasetMetadata,
} from '../registry/index.js';
import { Composite, slotTable } from '../slots/composite.js';
import { ArrayProxy } from '../store/proxy.js';
import { DATASET_KEY, TYPE_KEY, isReservedKey } from './keys.js';
import { isNestedRecord, isScalar, type Nested, type NestedRecord } from './types.js';

export interface SerializeOptions {
  /** Only copiable slots are written. */
  isCopy?: boolean;
  /** Array proxies are kept as-is instead of being read into memory. */
  keepLazy?: boolean;
}

export function serialize(value: unknown, isCopy = false): Nested {
  return serializeValue(value, { isCopy, keepLazy: false });
}

export function serializeGraph(value: unknown, options: SerializeOptions = {}): Nested {
  return serializeValue(value, { isCopy: options.isCopy ?? false, keepLazy: options.keepLazy ?? false });
}

function serializeValue(value: unknown, options: Required<SerializeOptions>): Nested {
  if (value instanceof ArrayProxy) {
    return options.keepLazy ? value : datasetRecord(NDARRAY_DATASET, value.read(), value.attributes);
  }

  switch (classify(value)) {
    case 'primitive':
      return serializePrimitive(value);
    case 'dataset':
      return serializeDataset(value);
    case 'container':
      return serializeContainer(value, options);
    case 'composite':
      return serializeComposite(value, options);
  }
}

function serializePrimitive(value: unknown): Nested {
  if (value === null || value === undefined) return null;
  if (isScalar(value)) return value;
  if (!isPrimitiveInstance(value)) throw new ClassificationError(describeType(value));

  // Constructor primitives may be mutable: hand out a fresh instance.
  const codec = primitiveEntryFor(value)?.codec;
  if (!codec) return value;
  const fresh = codec.decode(codec.encode(value));
  if (!isPrimitiveInstance(fresh)) {
    throw new ClassificationError(describeType(value), 'codec returned an unregistered value');
  }
  return fresh;
}

function serializeDataset(value: unknown): Nested {
  const dataset = datasetEntryFor(value);
  if (!dataset || typeof value !== 'object' || value === null) {
    throw new ClassificationError(describeType(value));
  }
  const parts = dataset.disassemble(value);
  return datasetRecord(dataset.name, new NDArray(parts.data.data.slice(), parts.data.shape), parts.metadata);
}

function serializeContainer(value: unknown, options: Required<SerializeOptions>): Nested {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => serializeValue(item, options));
  }
  if (value instanceof Set) {
    return new Set(Array.from(value, (item: unknown) => serializeValue(item, options)));
  }
  if (value instanceof Map) {
    return new Map(
      Array.from(value, ([key, item]: [unknown, unknown]): [Nested, Nested] => [
        serializeValue(key, options),
        serializeValue(item, options),
      ]),
    );
  }
  if (isPlainObject(value)) {
    const out: NestedRecord = {};
    for (const [key, item] of Object.entries(value)) {
      if (isReservedKey(key)) {
        throw new ClassificationError('Object', `mapping key "${key}" is reserved`);
      }
      out[key] = serializeValue(item, options);
    }
    return out;
  }
  throw new ClassificationError(describeType(value));
}

function serializeComposite(value: unknown, options: Required<SerializeOptions>): Nested {
  const type = compositeTypeOf(value);
  if (!type || !(value instanceof Composite)) {
    throw new ClassificationError(describeType(value), 'composite type is not registered');
  }
  const out: NestedRecord = { [TYPE_KEY]: compositeNameOf(type) ?? type.name };
  for (const [name, declared] of slotTable(type)) {
    if (options.isCopy && !declared.copiable) continue;
    const slotValue = declared.read(value, name);
    // Never stored and no default: left out so the default applies on load.
    if (slotValue === undefined) continue;
    out[name] = serializeValue(slotValue, options);
  }
  return out;
}

function datasetRecord(name: string, data: NDArray, metadata: DatasetMetadata): NestedRecord {
  return { [DATASET_KEY]: name, data, metadata: { ...metadata } };
}

export function deserialize(structure: unknown): unknown {
  if (structure === null || structure === undefined) return null;
  if (isScalar(structure)) return structure;
  if (typeof structure !== 'object') {
    throw new ClassificationError(describeType(structure));
  }
  if (isPrimitiveInstance(structure)) return structure;
  if (structure instanceof NDArray || structure instanceof ArrayProxy) return structure;

  if (Array.isArray(structure)) {
    return structure.map((item: unknown) => deserialize(item));
  }
  if (structure instanceof Set) {
    return new Set(Array.from(structure, (item: unknown) => deserialize(item)));
  }
  if (structure instanceof Map) {
    return new Map(
      Array.from(structure, ([key, item]: [unknown, unknown]): [unknown, unknown] => [
        deserialize(key),
        deserialize(item),
      ]),
    );
  }
  if (isNestedRecord(structure)) {
    const typeTag = structure[TYPE_KEY];
    if (typeof typeTag === 'string') return deserializeComposite(typeTag, structure);
    const datasetTag = structure[DATASET_KEY];
    if (typeof datasetTag === 'string') return deserializeDataset(datasetTag, structure);

    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(structure)) {
      out[key] = deserialize(item);
    }
    return out;
  }

  throw new ClassificationError(describeType(structure));
}

function deserializeComposite(tag: string, structure: NestedRecord): Composite {
  const type = lookupComposite(tag);
  const table = slotTable(type);
  // Constructor side effects are not replayed; slots are assigned one by one.
  const instance: Composite = Object.create(type.prototype);

  for (const [name, raw] of Object.entries(structure)) {
    if (name === TYPE_KEY) continue;
    const declared = table.get(name);
    if (!declared) {
      throw new ResolutionError(tag, `no slot named "${name}"`);
    }
    declared.write(instance, name, deserialize(raw));
  }
  return instance;
}

function deserializeDataset(tag: string, structure: NestedRecord): unknown {
  const entry = lookupDataset(tag);
  const metadata = toMetadata(structure.metadata);
  const data = structure.data;

  if (data instanceof ArrayProxy) {
    return entry.name === NDARRAY_DATASET ? data : entry.assemble(data.read(), metadata);
  }
  if (!(data instanceof NDArray)) {
    throw new ResolutionError(tag, 'dataset structure has no array data');
  }
  return entry.assemble(data, metadata);
}

function toMetadata(value: Nested | undefined): DatasetMetadata {
  const metadata: DatasetMetadata = {};
  if (!isNestedRecord(value)) return metadata;
  for (const [key, item] of Object.entries(value)) {
    if (item === null || typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      metadata[key] = item;
    }
  }
  return metadata;
}

/**
 * Independent copy built from the copiable slots of every composite in the
 * graph.
 */
export function copy(value: unknown): unknown {
  return deserialize(serialize(value, true));
}
