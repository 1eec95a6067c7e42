/**
 * Hierarchical Store Mapper
 *
 * Maps nested structures onto a store and back:
 *
 *   composite / mapping / sequence / set / map → group
 *     (`__type__` or `__container__` attribute marks which)
 *   dataset value or NDArray                  → array leaf (`__dataset__` attribute)
 *   primitive                                 → attribute of the parent group
 *
 * Sequence and set members are named by position. Map keys are encoded
 * with `encodeKey`. A root that is not group-shaped is stored under
 * `__value__`.
 *
 * Writing happens in two passes: the structure is first planned into a tree
 * of store operations (which encodes every attribute and reads every proxy
 * that has to move), then applied. Encoding failures therefore leave the
 * store untouched.
 */

import { join } from 'node:path';
import { NDArray } from '../arrays/ndarray.js';
import { ClassificationError, StoreError, describeType } from '../errors.js';
import { NDARRAY_DATASET, type DatasetMetadata } from '../registry/index.js';
import { CONTAINER_KEY, DATASET_KEY, TYPE_KEY, VALUE_KEY } from '../serialize/keys.js';
import { deserialize, serializeGraph } from '../serialize/serializer.js';
import { isNestedRecord, type Nested, type NestedRecord } from '../serialize/types.js';
import { decodeAttribute, decodeKey, encodeAttribute, encodeKey, type AttributeValue } from './attributes.js';
import { ArrayProxy } from './proxy.js';
import { StoreFile, childDirName, type ArrayLeaf, type GroupNode, type OpenMode, type StoreOptions } from './file.js';

// ─── Plan ────────────────────────────────────────────────────

type GroupMarker = readonly [typeof TYPE_KEY | typeof CONTAINER_KEY, string];

interface GroupPlan {
  kind: 'group';
  marker?: GroupMarker;
  entries: Array<[string, NodePlan]>;
}

interface ArrayPlan {
  kind: 'array';
  /** A proxy already stored at the target path is left untouched. */
  data: NDArray | ArrayProxy;
  attributes: Record<string, AttributeValue>;
  /** Proxy of this file whose data moves here; rebound once written. */
  moved?: ArrayProxy;
}

interface AttributePlan {
  kind: 'attribute';
  value: AttributeValue;
}

type NodePlan = GroupPlan | ArrayPlan | AttributePlan;

interface GroupShape {
  marker: GroupMarker;
  entries: Array<[string, Nested]>;
}

function groupShape(value: Nested): GroupShape | undefined {
  if (Array.isArray(value)) {
    return { marker: [CONTAINER_KEY, 'sequence'], entries: value.map((item, i): [string, Nested] => [String(i), item]) };
  }
  if (value instanceof Set) {
    return { marker: [CONTAINER_KEY, 'set'], entries: Array.from(value, (item, i): [string, Nested] => [String(i), item]) };
  }
  if (value instanceof Map) {
    const entries: Array<[string, Nested]> = [];
    const seen = new Set<string>();
    for (const [key, item] of value) {
      const name = encodeKey(key);
      if (seen.has(name)) {
        throw new ClassificationError('Map', `keys collide when stored as "${name}"`);
      }
      seen.add(name);
      entries.push([name, item]);
    }
    return { marker: [CONTAINER_KEY, 'map'], entries };
  }
  if (!isNestedRecord(value) || typeof value[DATASET_KEY] === 'string') return undefined;

  const tag = value[TYPE_KEY];
  if (typeof tag === 'string') {
    return {
      marker: [TYPE_KEY, tag],
      entries: Object.entries(value).filter(([key]) => key !== TYPE_KEY),
    };
  }
  return { marker: [CONTAINER_KEY, 'mapping'], entries: Object.entries(value) };
}

function planNode(value: Nested, target: string, file: StoreFile): NodePlan {
  const shape = groupShape(value);
  if (shape) return planGroup(shape, target, file);

  if (value instanceof ArrayProxy) {
    return planArray(value, NDARRAY_DATASET, value.attributes, target, file);
  }
  if (value instanceof NDArray) {
    return { kind: 'array', data: value, attributes: { [DATASET_KEY]: NDARRAY_DATASET } };
  }
  if (isNestedRecord(value)) {
    const tag = value[DATASET_KEY];
    const data = value.data;
    if (typeof tag === 'string' && (data instanceof NDArray || data instanceof ArrayProxy)) {
      return planArray(data, tag, metadataOf(value.metadata), target, file);
    }
    throw new ClassificationError(describeType(value), 'dataset record has no array data');
  }
  return { kind: 'attribute', value: encodeAttribute(value) };
}

function planGroup(shape: GroupShape, target: string, file: StoreFile): GroupPlan {
  return {
    kind: 'group',
    marker: shape.marker,
    entries: shape.entries.map(([name, item]): [string, NodePlan] => [
      name,
      planNode(item, join(target, childDirName(name)), file),
    ]),
  };
}

function planArray(
  data: NDArray | ArrayProxy,
  tag: string,
  metadata: DatasetMetadata,
  target: string,
  file: StoreFile,
): ArrayPlan {
  const attributes: Record<string, AttributeValue> = { [DATASET_KEY]: tag };
  for (const [key, item] of Object.entries(metadata)) {
    attributes[key] = encodeAttribute(item);
  }
  if (data instanceof ArrayProxy && data.belongsTo(file) && data.location === target) {
    return { kind: 'array', data, attributes };
  }
  if (data instanceof ArrayProxy) {
    // Read now: the source leaf may be overwritten before this entry is written.
    return { kind: 'array', data: data.read(), attributes, moved: data.belongsTo(file) ? data : undefined };
  }
  return { kind: 'array', data, attributes };
}

function metadataOf(value: Nested | undefined): DatasetMetadata {
  const metadata: DatasetMetadata = {};
  if (!isNestedRecord(value)) return metadata;
  for (const [key, item] of Object.entries(value)) {
    if (item === null || typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      metadata[key] = item;
    }
  }
  return metadata;
}

function planRoot(value: Nested, file: StoreFile): GroupPlan {
  const shape = groupShape(value);
  if (shape) return planGroup(shape, file.path, file);
  return {
    kind: 'group',
    entries: [[VALUE_KEY, planNode(value, join(file.path, childDirName(VALUE_KEY)), file)]],
  };
}

// ─── Apply ───────────────────────────────────────────────────

function applyGroup(group: GroupNode, plan: GroupPlan): void {
  group.clearAttributes();
  if (plan.marker) group.setAttribute(plan.marker[0], plan.marker[1]);

  const written = new Set<string>();
  for (const [name, node] of plan.entries) {
    applyNode(group, name, node);
    written.add(name);
  }
  for (const name of group.keys()) {
    if (!written.has(name)) group.delete(name);
  }
}

function applyNode(group: GroupNode, name: string, plan: NodePlan): void {
  switch (plan.kind) {
    case 'group':
      applyGroup(group.requireGroup(name), plan);
      return;
    case 'array':
      if (plan.data instanceof ArrayProxy) {
        syncAttributes(group.array(name), plan.attributes);
      } else {
        const leaf = group.createArray(name, plan.data, plan.attributes);
        plan.moved?.rebind(leaf);
      }
      return;
    case 'attribute':
      group.delete(name);
      group.setAttribute(name, plan.value);
      return;
  }
}

function syncAttributes(leaf: ArrayLeaf, attributes: Record<string, AttributeValue>): void {
  for (const name of [...leaf.attributes().keys()]) {
    if (!(name in attributes)) leaf.deleteAttribute(name);
  }
  for (const [name, value] of Object.entries(attributes)) {
    if (leaf.getAttribute(name) !== value) leaf.setAttribute(name, value);
  }
}

/**
 * Write a nested structure over the whole store.
 */
export function writeStructure(file: StoreFile, structure: Nested): void {
  file.assertWritable(file.path, 'write');
  applyGroup(file.root, planRoot(structure, file));
}

// ─── Read ────────────────────────────────────────────────────

function readEntries(group: GroupNode, lazy: boolean): Array<[string, Nested]> {
  const entries: Array<[string, Nested]> = [];
  for (const [name, raw] of group.attributes()) {
    if (name === TYPE_KEY || name === CONTAINER_KEY) continue;
    entries.push([name, decodeAttribute(raw)]);
  }
  for (const name of group.keys()) {
    const item = group.kindOf(name) === 'group' ? readGroup(group.group(name), lazy) : readArray(group.array(name), lazy);
    entries.push([name, item]);
  }
  return entries;
}

function byPosition(entries: Array<[string, Nested]>): Nested[] {
  return entries
    .map(([name, item]): [number, Nested] => [Number(name), item])
    .sort((a, b) => a[0] - b[0])
    .map(([, item]) => item);
}

function readGroup(group: GroupNode, lazy: boolean): Nested {
  const tag = group.getAttribute(TYPE_KEY);
  const container = group.getAttribute(CONTAINER_KEY);
  const entries = readEntries(group, lazy);

  if (typeof tag === 'string') {
    const record: NestedRecord = { [TYPE_KEY]: tag };
    for (const [name, item] of entries) record[name] = item;
    return record;
  }
  switch (container) {
    case 'sequence':
      return byPosition(entries);
    case 'set':
      return new Set(byPosition(entries));
    case 'map':
      return new Map(entries.map(([name, item]): [Nested, Nested] => [decodeKey(name), item]));
    case 'mapping':
    case undefined:
      break;
    default:
      throw new StoreError(group.path, `unknown container kind "${String(container)}"`);
  }
  if (container === undefined && group.path === group.store.path) {
    const root = entries.find(([name]) => name === VALUE_KEY);
    if (root) return root[1];
    if (entries.length === 0) return null;
  }
  return Object.fromEntries(entries);
}

function readArray(leaf: ArrayLeaf, lazy: boolean): Nested {
  const raw = leaf.getAttribute(DATASET_KEY);
  const tag = typeof raw === 'string' ? raw : NDARRAY_DATASET;
  const metadata: NestedRecord = {};
  for (const [name, value] of leaf.attributes()) {
    if (name !== DATASET_KEY) metadata[name] = decodeAttribute(value);
  }
  const data = lazy && tag === NDARRAY_DATASET ? new ArrayProxy(leaf) : leaf.readAll();
  return { [DATASET_KEY]: tag, data, metadata };
}

/**
 * The nested structure stored in a file. In lazy mode NDArray leaves
 * become `ArrayProxy` handles bound to the open file.
 */
export function readStructure(file: StoreFile, lazy = false): Nested {
  return readGroup(file.root, lazy);
}

// ─── Public API ──────────────────────────────────────────────

/**
 * Serialize a runtime graph into the store at `destination`.
 */
export function save(value: unknown, destination: string, mode: OpenMode = 'w', options: StoreOptions = {}): void {
  const file = StoreFile.open(destination, mode, options);
  try {
    writeStructure(file, serializeGraph(value));
  } finally {
    file.close();
  }
}

/**
 * Read the whole graph stored at `source` into memory.
 */
export function load(source: string, options: StoreOptions = {}): unknown {
  const file = StoreFile.open(source, 'r', options);
  try {
    return deserialize(readStructure(file));
  } finally {
    file.close();
  }
}

/**
 * A graph loaded with lazy array leaves. The file stays open until
 * `close()`; in writable modes closing writes `value` back first.
 */
export class LazySession {
  private constructor(
    private readonly file: StoreFile,
    public value: unknown,
  ) {}

  static open(source: string, mode: OpenMode = 'r', options: StoreOptions = {}): LazySession {
    const file = StoreFile.open(source, mode, options);
    try {
      return new LazySession(file, deserialize(readStructure(file, true)));
    } catch (err) {
      file.close();
      throw err;
    }
  }

  get path(): string {
    return this.file.path;
  }

  /** Root group, for direct attribute access. */
  get root(): GroupNode {
    return this.file.root;
  }

  get mode(): OpenMode {
    return this.file.mode;
  }

  get writable(): boolean {
    return this.file.writable;
  }

  get closed(): boolean {
    return this.file.isClosed;
  }

  /**
   * Write the current graph back. Proxies still at their own path are left
   * in place; any other value under the root is rewritten.
   */
  flush(): void {
    this.file.assertWritable(this.file.path, 'write back');
    writeStructure(this.file, serializeGraph(this.value, { keepLazy: true }));
    this.file.flush();
  }

  close(): void {
    if (this.file.isClosed) return;
    try {
      if (this.file.writable) this.flush();
    } finally {
      this.file.close();
    }
  }
}

export function openLazy(source: string, mode: OpenMode = 'r', options: StoreOptions = {}): LazySession {
  return LazySession.open(source, mode, options);
}

/**
 * Run `fn` with a lazy session that is closed (and, when writable, written
 * back) afterwards, whether `fn` returns or throws.
 */
export function withSession<T>(
  source: string,
  mode: OpenMode,
  fn: (session: LazySession) => T,
  options: StoreOptions = {},
): T {
  const session = openLazy(source, mode, options);
  try {
    return fn(session);
  } finally {
    session.close();
  }
}
