/**
 * Hierarchical store on the local filesystem
 *
 * A store is a directory tree. Every group is a directory holding a
 * `.group.json` header with its attributes; every array leaf is a directory
 * holding an `.array.json` header (dtype, shape, attributes) and a `data.bin`
 * file with the elements in row-major, little-endian order. Child names are
 * URI-encoded and prefixed with `_` so they never collide with headers.
 *
 * Header changes are buffered and written on `flush()` / `close()`; element
 * data is read and written in place.
 */

import {
  closeSync,
  existsSync,
  ftruncateSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  readdirSync,
  rmSync,
  statSync,
  writeFileSync,
  writeSync,
} from 'node:fs';
import { basename, join, resolve, sep } from 'node:path';
import { z } from 'zod';
import { DTYPE_NAMES, NDArray, itemSize, shapeSize, typedArrayFor, type DType } from '../arrays/ndarray.js';
import { ReadOnlyStoreError, StoreError } from '../errors.js';
import type { AttributeValue } from './attributes.js';

export type OpenMode = 'r' | 'r+' | 'w' | 'a';

export const OPEN_MODES: readonly OpenMode[] = ['r', 'r+', 'w', 'a'];

export interface StoreOptions {
  /** JSON indentation of header files. */
  indent?: number;
}

export type NodeKind = 'group' | 'array';

const GROUP_HEADER = '.group.json';
const ARRAY_HEADER = '.array.json';
const ARRAY_DATA = 'data.bin';

const AttributeSchema = z.union([z.string(), z.number(), z.boolean()]);

const GroupHeaderSchema = z.object({
  attributes: z.record(z.string(), AttributeSchema).default({}),
});

const ArrayHeaderSchema = z.object({
  dtype: z.enum(DTYPE_NAMES),
  shape: z.array(z.number().int().nonnegative()),
  byteOrder: z.literal('little').default('little'),
  attributes: z.record(z.string(), AttributeSchema).default({}),
});

export function isOpenMode(value: unknown): value is OpenMode {
  return OPEN_MODES.some((mode) => mode === value);
}

export function childDirName(name: string): string {
  return `_${encodeURIComponent(name)}`;
}

function childName(dirName: string): string | undefined {
  return dirName.startsWith('_') ? decodeURIComponent(dirName.slice(1)) : undefined;
}

function kindAt(path: string): NodeKind | undefined {
  if (existsSync(join(path, GROUP_HEADER))) return 'group';
  if (existsSync(join(path, ARRAY_HEADER))) return 'array';
  return undefined;
}

function readHeader<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new StoreError(path, `unreadable header: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StoreError(path, `invalid header: ${issue.path.join('.') || 'root'}: ${issue.message}`);
  }
  return parsed.data;
}

function writeJson(path: string, value: unknown, indent: number): void {
  writeFileSync(path, JSON.stringify(value, null, indent) + '\n', 'utf-8');
}

export class StoreFile {
  private readonly nodes = new Map<string, GroupNode | ArrayLeaf>();
  private closed = false;

  private constructor(
    readonly path: string,
    readonly mode: OpenMode,
    private readonly indent: number,
  ) {}

  /**
   * Open a store directory.
   *
   * - `r`  read-only; the store must exist
   * - `r+` read/write; the store must exist
   * - `w`  create, replacing an existing store
   * - `a`  read/write, creating the store if missing
   */
  static open(path: string, mode: OpenMode = 'r', options: StoreOptions = {}): StoreFile {
    const absolute = resolve(path);
    const kind = kindAt(absolute);
    if (kind === 'array') {
      throw new StoreError(absolute, 'path is an array leaf, not a store root');
    }

    switch (mode) {
      case 'r':
      case 'r+':
        if (!kind) throw new StoreError(absolute, 'no store found');
        break;
      case 'w':
        if (!kind && existsSync(absolute) && !isEmptyDirectory(absolute)) {
          throw new StoreError(absolute, 'refusing to replace a path that is not a store');
        }
        rmSync(absolute, { recursive: true, force: true });
        initGroup(absolute, options.indent ?? 2);
        break;
      case 'a':
        if (!kind) {
          if (existsSync(absolute) && !isEmptyDirectory(absolute)) {
            throw new StoreError(absolute, 'path exists and is not a store');
          }
          initGroup(absolute, options.indent ?? 2);
        }
        break;
    }
    return new StoreFile(absolute, mode, options.indent ?? 2);
  }

  get writable(): boolean {
    return this.mode !== 'r';
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get root(): GroupNode {
    return this.groupAt(this.path);
  }

  assertOpen(path: string = this.path): void {
    if (this.closed) throw new StoreError(path, 'store is closed');
  }

  assertWritable(path: string, operation: string): void {
    this.assertOpen(path);
    if (!this.writable) throw new ReadOnlyStoreError(path, operation);
  }

  /** @internal */
  groupAt(path: string): GroupNode {
    this.assertOpen(path);
    const cached = this.nodes.get(path);
    if (cached instanceof GroupNode) return cached;
    const node = new GroupNode(this, path);
    this.nodes.set(path, node);
    return node;
  }

  /** @internal */
  leafAt(path: string): ArrayLeaf {
    this.assertOpen(path);
    const cached = this.nodes.get(path);
    if (cached instanceof ArrayLeaf) return cached;
    const leaf = new ArrayLeaf(this, path);
    this.nodes.set(path, leaf);
    return leaf;
  }

  /** @internal Drop cached nodes at or below a removed path. */
  evict(path: string): void {
    for (const [key, node] of this.nodes) {
      if (key === path || key.startsWith(path + sep)) {
        node.detach();
        this.nodes.delete(key);
      }
    }
  }

  /** @internal */
  writeHeader(path: string, header: unknown): void {
    writeJson(path, header, this.indent);
  }

  /**
   * Write buffered header changes to disk.
   */
  flush(): void {
    this.assertOpen();
    if (!this.writable) return;
    for (const node of this.nodes.values()) {
      node.flush();
    }
  }

  /**
   * Flush pending changes (in writable modes) and release file handles.
   * Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) return;
    try {
      this.flush();
    } finally {
      for (const node of this.nodes.values()) {
        node.detach();
      }
      this.nodes.clear();
      this.closed = true;
    }
  }
}

function isEmptyDirectory(path: string): boolean {
  return statSync(path).isDirectory() && readdirSync(path).length === 0;
}

function initGroup(path: string, indent: number): void {
  mkdirSync(path, { recursive: true });
  writeJson(join(path, GROUP_HEADER), { attributes: {} }, indent);
}

export class GroupNode {
  private readonly attrs: Map<string, AttributeValue>;
  private dirty = false;
  private detached = false;

  constructor(
    private readonly file: StoreFile,
    readonly path: string,
  ) {
    const header = readHeader(join(path, GROUP_HEADER), GroupHeaderSchema);
    this.attrs = new Map(Object.entries(header.attributes));
  }

  get name(): string {
    return this.path === this.file.path ? '' : (childName(basename(this.path)) ?? basename(this.path));
  }

  get store(): StoreFile {
    return this.file;
  }

  // ─── Attributes ────────────────────────────────────────────

  attributes(): ReadonlyMap<string, AttributeValue> {
    this.assertAttached();
    return this.attrs;
  }

  getAttribute(name: string): AttributeValue | undefined {
    this.assertAttached();
    return this.attrs.get(name);
  }

  setAttribute(name: string, value: AttributeValue): void {
    this.assertMutable('set an attribute on');
    this.attrs.set(name, value);
    this.dirty = true;
  }

  deleteAttribute(name: string): boolean {
    this.assertMutable('delete an attribute from');
    const removed = this.attrs.delete(name);
    this.dirty ||= removed;
    return removed;
  }

  clearAttributes(): void {
    this.assertMutable('clear attributes of');
    if (this.attrs.size === 0) return;
    this.attrs.clear();
    this.dirty = true;
  }

  // ─── Children ──────────────────────────────────────────────

  /** Names of child groups and array leaves. */
  keys(): string[] {
    this.assertAttached();
    const names: string[] = [];
    for (const entry of readdirSync(this.path, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const name = childName(entry.name);
      if (name !== undefined && kindAt(join(this.path, entry.name))) names.push(name);
    }
    return names.sort();
  }

  childPath(name: string): string {
    return join(this.path, childDirName(name));
  }

  kindOf(name: string): NodeKind | undefined {
    this.assertAttached();
    return kindAt(this.childPath(name));
  }

  has(name: string): boolean {
    return this.kindOf(name) !== undefined;
  }

  group(name: string): GroupNode {
    if (this.kindOf(name) !== 'group') {
      throw new StoreError(this.childPath(name), 'no group at this path');
    }
    return this.file.groupAt(this.childPath(name));
  }

  array(name: string): ArrayLeaf {
    if (this.kindOf(name) !== 'array') {
      throw new StoreError(this.childPath(name), 'no array at this path');
    }
    return this.file.leafAt(this.childPath(name));
  }

  /** Create an empty group, replacing any existing child of that name. */
  createGroup(name: string): GroupNode {
    this.assertMutable('create a group in');
    this.delete(name);
    const path = this.childPath(name);
    mkdirSync(path, { recursive: true });
    this.file.writeHeader(join(path, GROUP_HEADER), { attributes: {} });
    return this.file.groupAt(path);
  }

  /** The existing child group, or a new one if the child is missing or an array. */
  requireGroup(name: string): GroupNode {
    return this.kindOf(name) === 'group' ? this.group(name) : this.createGroup(name);
  }

  /** Write an array leaf, replacing any existing child of that name. */
  createArray(name: string, data: NDArray, attributes: Readonly<Record<string, AttributeValue>> = {}): ArrayLeaf {
    this.assertMutable('create an array in');
    this.delete(name);
    const path = this.childPath(name);
    mkdirSync(path, { recursive: true });
    const bytes = new Uint8Array(data.data.buffer, data.data.byteOffset, data.data.byteLength);
    writeFileSync(join(path, ARRAY_DATA), bytes);
    this.file.writeHeader(join(path, ARRAY_HEADER), {
      dtype: data.dtype,
      shape: [...data.shape],
      byteOrder: 'little',
      attributes: { ...attributes },
    });
    return this.file.leafAt(path);
  }

  delete(name: string): boolean {
    this.assertMutable('delete from');
    const path = this.childPath(name);
    if (!existsSync(path)) return false;
    this.file.evict(path);
    rmSync(path, { recursive: true, force: true });
    return true;
  }

  flush(): void {
    if (!this.dirty || this.detached) return;
    this.file.writeHeader(join(this.path, GROUP_HEADER), { attributes: Object.fromEntries(this.attrs) });
    this.dirty = false;
  }

  /** @internal */
  detach(): void {
    this.detached = true;
  }

  private assertAttached(): void {
    this.file.assertOpen(this.path);
    if (this.detached) throw new StoreError(this.path, 'group was removed from the store');
  }

  private assertMutable(operation: string): void {
    this.assertAttached();
    this.file.assertWritable(this.path, operation);
  }
}

export class ArrayLeaf {
  readonly dtype: DType;
  private currentShape: number[];
  private readonly attrs: Map<string, AttributeValue>;
  private dirty = false;
  private detached = false;
  private fd: number | undefined;

  constructor(
    private readonly file: StoreFile,
    readonly path: string,
  ) {
    const header = readHeader(join(path, ARRAY_HEADER), ArrayHeaderSchema);
    this.dtype = header.dtype;
    this.currentShape = header.shape;
    this.attrs = new Map(Object.entries(header.attributes));
  }

  get name(): string {
    return childName(basename(this.path)) ?? basename(this.path);
  }

  get store(): StoreFile {
    return this.file;
  }

  get shape(): readonly number[] {
    return this.currentShape;
  }

  get itemSize(): number {
    return itemSize(this.dtype);
  }

  get size(): number {
    return shapeSize(this.currentShape);
  }

  get nbytes(): number {
    return this.size * this.itemSize;
  }

  attributes(): ReadonlyMap<string, AttributeValue> {
    this.assertAttached();
    return this.attrs;
  }

  getAttribute(name: string): AttributeValue | undefined {
    this.assertAttached();
    return this.attrs.get(name);
  }

  setAttribute(name: string, value: AttributeValue): void {
    this.assertMutable('set an attribute on');
    this.attrs.set(name, value);
    this.dirty = true;
  }

  deleteAttribute(name: string): boolean {
    this.assertMutable('delete an attribute from');
    const removed = this.attrs.delete(name);
    this.dirty ||= removed;
    return removed;
  }

  // ─── Element data ──────────────────────────────────────────

  /**
   * Bytes at `offset`. Bytes past the end of the data file read as zero.
   */
  readBytes(offset: number, length: number): Uint8Array {
    this.assertAttached();
    const buffer = new Uint8Array(length);
    let done = 0;
    while (done < length) {
      const count = readSync(this.descriptor(), buffer, done, length - done, offset + done);
      if (count === 0) break;
      done += count;
    }
    return buffer;
  }

  writeBytes(offset: number, bytes: Uint8Array): void {
    this.assertMutable('write to');
    let done = 0;
    while (done < bytes.byteLength) {
      done += writeSync(this.descriptor(), bytes, done, bytes.byteLength - done, offset + done);
    }
  }

  readAll(): NDArray {
    const bytes = this.readBytes(0, this.nbytes);
    const Ctor = typedArrayFor(this.dtype);
    return new NDArray(new Ctor(bytes.buffer, bytes.byteOffset, this.size), this.currentShape);
  }

  /**
   * Set the extent of the leading axis. New elements read as zero.
   */
  resizeLeading(length: number): void {
    this.assertMutable('resize');
    const shape = [length, ...this.currentShape.slice(1)];
    ftruncateSync(this.descriptor(), shapeSize(shape) * this.itemSize);
    this.currentShape = shape;
    this.dirty = true;
  }

  flush(): void {
    if (!this.dirty || this.detached) return;
    this.file.writeHeader(join(this.path, ARRAY_HEADER), {
      dtype: this.dtype,
      shape: this.currentShape,
      byteOrder: 'little',
      attributes: Object.fromEntries(this.attrs),
    });
    this.dirty = false;
  }

  /** Close the data file handle; the next access reopens it. */
  release(): void {
    if (this.fd !== undefined) {
      closeSync(this.fd);
      this.fd = undefined;
    }
  }

  /** @internal */
  detach(): void {
    this.release();
    this.detached = true;
  }

  private descriptor(): number {
    if (this.fd === undefined) {
      this.fd = openSync(join(this.path, ARRAY_DATA), this.file.writable ? 'r+' : 'r');
    }
    return this.fd;
  }

  private assertAttached(): void {
    this.file.assertOpen(this.path);
    if (this.detached) throw new StoreError(this.path, 'array was removed from the store');
  }

  private assertMutable(operation: string): void {
    this.assertAttached();
    this.file.assertWritable(this.path, operation);
  }
}
