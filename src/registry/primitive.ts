/**
 * Primitive Registry
 *
 * Types whose values are stored verbatim. Built-in kinds are matched by
 * `typeof`; extension types by constructor. A string codec lets the store
 * write an extension value as an encoded attribute.
 */

import { RegistrationError } from '../errors.js';
import { isDataset } from './dataset.js';

export type PrimitiveKind = 'string' | 'number' | 'boolean' | 'bigint';

export type Constructor<T extends object = object> = new (...args: never[]) => T;

export type PrimitiveType = PrimitiveKind | Constructor;

/**
 * Encodes an extension primitive as a string payload for store attributes.
 */
export interface PrimitiveCodec<T extends object = object> {
  encode(value: T): string;
  decode(payload: string): T;
}

export interface PrimitiveEntry {
  type: PrimitiveType;
  name: string;
  codec?: PrimitiveCodec;
}

declare const primitiveBrand: unique symbol;

/**
 * An instance of a registered extension primitive (a URL, or a class added
 * with `registerPrimitive`). Obtained by narrowing with `isPrimitiveInstance`.
 */
export interface PrimitiveInstance {
  readonly [primitiveBrand]: true;
}

const primitives = new Map<PrimitiveType, PrimitiveEntry>();

function nameOf(type: PrimitiveType): string {
  return typeof type === 'string' ? type : type.name;
}

/**
 * Register a primitive type. Registering an already-registered type is a
 * no-op unless a codec is supplied, which replaces the previous one.
 */
export function registerPrimitive<T extends object>(
  type: PrimitiveKind | Constructor<T>,
  codec?: PrimitiveCodec<T>,
): void {
  if (typeof type !== 'string' && isDataset(type)) {
    throw new RegistrationError(
      `Cannot register "${type.name}" as a primitive: it is already a dataset type`,
    );
  }
  const existing = primitives.get(type);
  if (existing && !codec) return;
  primitives.set(type, { type, name: nameOf(type), codec });
}

/**
 * Remove a primitive type. Returns false if it was not registered.
 */
export function removePrimitive(type: PrimitiveType): boolean {
  return primitives.delete(type);
}

export function isPrimitive(type: PrimitiveType): boolean {
  return primitives.has(type);
}

export function listPrimitives(): PrimitiveEntry[] {
  return [...primitives.values()];
}

/**
 * Registry entry matching a runtime value, if any. Constructor matches
 * prefer the exact class, then the most recently registered base class.
 */
export function primitiveEntryFor(value: unknown): PrimitiveEntry | undefined {
  switch (typeof value) {
    case 'string':
      return primitives.get('string');
    case 'number':
      return primitives.get('number');
    case 'boolean':
      return primitives.get('boolean');
    case 'bigint':
      return primitives.get('bigint');
    case 'object': {
      if (value === null) return undefined;
      const exact = Reflect.get(value, 'constructor');
      for (const entry of primitives.values()) {
        if (entry.type === exact) return entry;
      }
      const entries = [...primitives.values()].reverse();
      return entries.find((entry) => typeof entry.type !== 'string' && value instanceof entry.type);
    }
    default:
      return undefined;
  }
}

export function primitiveEntryByName(name: string): PrimitiveEntry | undefined {
  for (const entry of primitives.values()) {
    if (entry.name === name) return entry;
  }
  return undefined;
}

export function isPrimitiveInstance(value: unknown): value is PrimitiveInstance {
  return typeof value === 'object' && value !== null && primitiveEntryFor(value) !== undefined;
}
