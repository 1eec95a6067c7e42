/**
 * slotgraph — object-graph serialization and persistence
 *
 * Public API for programmatic usage.
 */

// Errors
export {
  SlotGraphError,
  ResolutionError,
  ClassificationError,
  RegistrationError,
  ValidationError,
  ImmutableSlotError,
  StorageShapeError,
  StoreError,
  ReadOnlyStoreError,
  describeType,
} from './errors.js';
export type { SlotGraphErrorCode } from './errors.js';

// Type Registry & Value Classifier
export {
  registerComposite,
  lookupComposite,
  isRegistered,
  listComposites,
  compositeNameOf,
  compositeTypeOf,
  registerPrimitive,
  removePrimitive,
  isPrimitive,
  listPrimitives,
  primitiveEntryFor,
  primitiveEntryByName,
  isPrimitiveInstance,
  registerDataset,
  removeDataset,
  isDataset,
  lookupDataset,
  listDatasets,
  datasetEntryFor,
  classify,
  containerKind,
  isPlainObject,
  NDARRAY_DATASET,
  TIMESTAMP_DATASET,
  TIMESTAMP_INDEX_DATASET,
} from './registry/index.js';
export type {
  PrimitiveKind,
  PrimitiveType,
  PrimitiveCodec,
  PrimitiveEntry,
  PrimitiveInstance,
  Constructor,
  DatasetEntry,
  DatasetParts,
  DatasetMetadata,
  MetadataValue,
  ValueCategory,
  ContainerKind,
} from './registry/index.js';

// Arrays
export { NDArray, TimestampIndex, UTC, DTYPE_NAMES, isDType } from './arrays/index.js';
export type { DType, TypedArray } from './arrays/index.js';

// Slots & composites
export { Slot, slot, Composite, defineComposite, slotTable } from './slots/index.js';
export type {
  SlotObserver,
  SlotOptions,
  SlotLike,
  CompositeClass,
  CompositeInit,
  SlotTable,
  DefineCompositeOptions,
} from './slots/index.js';

// Serializer
export {
  serialize,
  serializeGraph,
  deserialize,
  copy,
  deepEqual,
  toJSONValue,
  fromJSONValue,
  TYPE_KEY,
  DATASET_KEY,
  CONTAINER_KEY,
  VALUE_KEY,
} from './serialize/index.js';
export type { Nested, NestedRecord, SerializeOptions, JsonValue } from './serialize/index.js';

// Store
export {
  save,
  load,
  openLazy,
  withSession,
  LazySession,
  ArrayProxy,
  slice,
  StoreFile,
  GroupNode,
  ArrayLeaf,
  encodeAttribute,
  decodeAttribute,
} from './store/index.js';
export type { OpenMode, StoreOptions, Slice, Selector, AttributeValue } from './store/index.js';

// Config
export { loadConfig, saveConfig, defaultConfig, parseConfig, ConfigSchema } from './config.js';
export type { SlotGraphConfig } from './config.js';
