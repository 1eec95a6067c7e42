/**
 * Attribute encoding
 *
 * Store attributes hold strings, finite numbers and booleans. Everything
 * else a primitive slot can carry is written as a tagged string,
 * `<Kind>:<payload>`:
 *
 *   null              → "NoneType:None"
 *   file: URL         → "Path:/abs/path"
 *   other URL         → "URL:https://…"
 *   NaN / ±Infinity   → "float:NaN"
 *   bigint            → "bigint:123"
 *   custom primitive  → "<registered name>:<codec payload>"
 *
 * A plain string that happens to start with a known tag is written as
 * "str:<string>".
 */

import { fileURLToPath, pathToFileURL } from 'node:url';
import { ClassificationError, describeType } from '../errors.js';
import { isPrimitiveInstance, primitiveEntryByName, primitiveEntryFor } from '../registry/index.js';
import type { Nested } from '../serialize/types.js';

export type AttributeValue = string | number | boolean;

export const NULL_ATTRIBUTE = 'NoneType:None';

const BUILTIN_TAGS = new Set(['NoneType', 'Path', 'URL', 'float', 'bigint', 'number', 'boolean', 'str']);

const TAG_PATTERN = /^([A-Za-z_][\w.]*):/;

function isKnownTag(tag: string): boolean {
  if (BUILTIN_TAGS.has(tag)) return true;
  const entry = primitiveEntryByName(tag);
  return entry !== undefined && typeof entry.type !== 'string';
}

function escapeString(value: string): string {
  const match = TAG_PATTERN.exec(value);
  return match && isKnownTag(match[1]) ? `str:${value}` : value;
}

export function encodeAttribute(value: unknown): AttributeValue {
  if (value === null || value === undefined) return NULL_ATTRIBUTE;
  switch (typeof value) {
    case 'string':
      return escapeString(value);
    case 'number':
      return Number.isFinite(value) ? value : `float:${value}`;
    case 'boolean':
      return value;
    case 'bigint':
      return `bigint:${value}`;
    case 'object':
      break;
    default:
      throw new ClassificationError(describeType(value), 'cannot be stored as an attribute');
  }

  if (value instanceof URL) {
    return value.protocol === 'file:' ? `Path:${fileURLToPath(value)}` : `URL:${value.href}`;
  }
  const entry = primitiveEntryFor(value);
  if (!entry || typeof entry.type === 'string') {
    throw new ClassificationError(describeType(value), 'cannot be stored as an attribute');
  }
  const payload = entry.codec ? entry.codec.encode(value) : String(value);
  return `${entry.name}:${payload}`;
}

export function decodeAttribute(raw: AttributeValue): Nested {
  if (typeof raw !== 'string') return raw;
  const match = TAG_PATTERN.exec(raw);
  if (!match) return raw;

  const tag = match[1];
  const payload = raw.slice(tag.length + 1);
  switch (tag) {
    case 'NoneType':
      return payload === 'None' ? null : raw;
    case 'str':
      return payload;
    case 'float':
    case 'number':
      return Number(payload);
    case 'boolean':
      return payload === 'true';
    case 'bigint':
      return BigInt(payload);
    case 'Path':
      return asPrimitive(tag, pathToFileURL(payload));
    case 'URL':
      return asPrimitive(tag, new URL(payload));
    default:
      break;
  }

  const entry = primitiveEntryByName(tag);
  if (!entry || typeof entry.type === 'string') return raw;
  if (!entry.codec) {
    throw new ClassificationError(tag, 'no codec is registered to decode this attribute');
  }
  return asPrimitive(tag, entry.codec.decode(payload));
}

function asPrimitive(tag: string, value: unknown): Nested {
  if (!isPrimitiveInstance(value)) {
    throw new ClassificationError(tag, 'decoded value is not a registered primitive');
  }
  return value;
}

/**
 * Map keys become child names, so they are always strings. Non-string keys
 * keep their kind through a tag.
 */
export function encodeKey(key: Nested): string {
  switch (typeof key) {
    case 'string':
      return escapeString(key);
    case 'number':
      return `number:${key}`;
    case 'boolean':
      return `boolean:${key}`;
    default: {
      const encoded = encodeAttribute(key);
      if (typeof encoded !== 'string') {
        throw new ClassificationError(describeType(key), 'cannot be stored as a map key');
      }
      return encoded;
    }
  }
}

export function decodeKey(name: string): Nested {
  return decodeAttribute(name);
}
