/**
 * Type Registry re-exports
 *
 * Importing this module installs the built-in primitive and dataset types.
 */

export {
  registerComposite,
  lookupComposite,
  isRegistered,
  listComposites,
  compositeNameOf,
  compositeTypeOf,
} from './composite.js';
export {
  registerPrimitive,
  removePrimitive,
  isPrimitive,
  listPrimitives,
  primitiveEntryFor,
  primitiveEntryByName,
  isPrimitiveInstance,
} from './primitive.js';
export type {
  PrimitiveKind,
  PrimitiveType,
  PrimitiveCodec,
  PrimitiveEntry,
  PrimitiveInstance,
  Constructor,
} from './primitive.js';
export {
  registerDataset,
  removeDataset,
  isDataset,
  lookupDataset,
  listDatasets,
  datasetEntryFor,
} from './dataset.js';
export type { DatasetEntry, DatasetParts, DatasetMetadata, MetadataValue } from './dataset.js';
export { classify, containerKind, isPlainObject } from './classify.js';
export type { ValueCategory, ContainerKind } from './classify.js';
export { NDARRAY_DATASET, TIMESTAMP_DATASET, TIMESTAMP_INDEX_DATASET } from './builtins.js';
