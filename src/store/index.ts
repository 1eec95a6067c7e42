/**
 * Store re-exports
 */

export { save, load, openLazy, withSession, LazySession, readStructure, writeStructure } from './mapper.js';
export { ArrayProxy, slice } from './proxy.js';
export type { Slice, Selector } from './proxy.js';
export { StoreFile, GroupNode, ArrayLeaf, OPEN_MODES, isOpenMode, childDirName } from './file.js';
export type { OpenMode, StoreOptions, NodeKind } from './file.js';
export { encodeAttribute, decodeAttribute, encodeKey, decodeKey, NULL_ATTRIBUTE } from './attributes.js';
export type { AttributeValue } from './attributes.js';
