/**
 * Dataset Registry
 *
 * Types that are stored as a flat numeric array plus side metadata. Each
 * entry pairs a `disassemble` callback (value → array + metadata) with an
 * `assemble` callback (array + metadata → value).
 */

import { RegistrationError, ResolutionError } from '../errors.js';
import type { NDArray } from '../arrays/ndarray.js';
import { isPrimitive, type Constructor } from './primitive.js';

export type MetadataValue = string | number | boolean | null;

export type DatasetMetadata = Record<string, MetadataValue>;

export interface DatasetParts {
  data: NDArray;
  metadata: DatasetMetadata;
}

export interface DatasetEntry<T extends object = object> {
  name: string;
  type: Constructor<T>;
  disassemble(value: T): DatasetParts;
  assemble(data: NDArray, metadata: DatasetMetadata): T;
}

const datasets = new Map<Constructor, DatasetEntry>();
const byName = new Map<string, DatasetEntry>();

/**
 * Register a dataset type. The qualified name defaults to the class name and
 * is what the serializer writes as the dataset tag.
 */
export function registerDataset<T extends object>(
  type: Constructor<T>,
  disassemble: (value: T) => DatasetParts,
  assemble: (data: NDArray, metadata: DatasetMetadata) => T,
  name: string = type.name,
): void {
  if (isPrimitive(type)) {
    throw new RegistrationError(
      `Cannot register "${type.name}" as a dataset: it is already a primitive type`,
    );
  }
  const previous = datasets.get(type);
  if (previous) byName.delete(previous.name);

  const entry: DatasetEntry<T> = {
    name,
    type,
    disassemble: (value) => disassemble(value),
    assemble: (data, metadata) => assemble(data, metadata),
  };
  datasets.set(type, entry);
  byName.set(name, entry);
}

/**
 * Remove a dataset type. Returns false if it was not registered.
 */
export function removeDataset(type: Constructor): boolean {
  const entry = datasets.get(type);
  if (!entry) return false;
  datasets.delete(type);
  byName.delete(entry.name);
  return true;
}

export function isDataset(type: Constructor): boolean {
  return datasets.has(type);
}

export function lookupDataset(name: string): DatasetEntry {
  const entry = byName.get(name);
  if (!entry) {
    throw new ResolutionError(name, 'no dataset type is registered under this name');
  }
  return entry;
}

export function listDatasets(): DatasetEntry[] {
  return [...datasets.values()];
}

/**
 * Registry entry matching a runtime value: the exact class first, then the
 * most recently registered base class.
 */
export function datasetEntryFor(value: unknown): DatasetEntry | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const exact = datasets.get(Reflect.get(value, 'constructor'));
  if (exact) return exact;
  return [...datasets.values()].reverse().find((entry) => value instanceof entry.type);
}
