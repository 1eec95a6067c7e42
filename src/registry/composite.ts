/**
 * Composite Registry
 *
 * Serializable composite types keyed by qualified name. Registering a name
 * twice keeps the last definition.
 */

import { ResolutionError } from '../errors.js';
import type { CompositeClass } from '../slots/composite.js';

const composites = new Map<string, CompositeClass>();
const names = new WeakMap<object, string>();

export function registerComposite(name: string, type: CompositeClass): void {
  composites.set(name, type);
  names.set(type, name);
}

export function lookupComposite(name: string): CompositeClass {
  const type = composites.get(name);
  if (!type) {
    throw new ResolutionError(name);
  }
  return type;
}

export function isRegistered(name: string): boolean {
  return composites.has(name);
}

export function listComposites(): Array<{ name: string; type: CompositeClass }> {
  return [...composites.entries()].map(([name, type]) => ({ name, type }));
}

/**
 * Qualified name a composite type was registered under, if any.
 */
export function compositeNameOf(type: object): string | undefined {
  return names.get(type);
}

/**
 * Registered composite type of a runtime value, matched on its exact class.
 */
export function compositeTypeOf(value: unknown): CompositeClass | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const ctor: unknown = Reflect.get(value, 'constructor');
  if (typeof ctor !== 'function') return undefined;
  const name = names.get(ctor);
  if (name === undefined) return undefined;
  const type = composites.get(name);
  return type === ctor ? type : undefined;
}
