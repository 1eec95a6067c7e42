/**
 * Composite types
 *
 * A composite is a class extending `Composite` that declares its slots in a
 * static `slots` table. `defineComposite` installs an accessor per slot and
 * registers the class under its qualified name, so it must run once, right
 * after the class declaration.
 *
 * Subclasses declare slot properties with `declare` so that no class field
 * shadows the installed accessor:
 *
 * @example
 * class Sample extends Composite {
 *   static slots = { name: slot({ default: '' }), value: slot({ default: 0 }) };
 *   declare name: string;
 *   declare value: number;
 * }
 * defineComposite(Sample, { scope: 'lab' }); // registered as "lab.Sample"
 *
 * A class that others extend annotates its table as `SlotTable`, so a
 * subclass can declare a table with different keys.
 */

import { RegistrationError, ResolutionError } from '../errors.js';
import { compositeNameOf, registerComposite } from '../registry/index.js';
import { RESERVED_KEYS } from '../serialize/keys.js';
import { compositeEquals } from '../serialize/equality.js';
import { deserialize, serialize } from '../serialize/serializer.js';
import { isPlainObject } from '../registry/classify.js';
import type { NestedRecord } from '../serialize/types.js';
import type { SlotLike } from './slot.js';

export type SlotTable = Readonly<Record<string, SlotLike>>;

export type CompositeInit = Readonly<Record<string, unknown>>;

export type CompositeClass<T extends Composite = Composite> = (abstract new (
  ...args: never[]
) => T) & {
  readonly slots: SlotTable;
  readonly name: string;
  readonly prototype: T;
};

export interface DefineCompositeOptions {
  /** Defining scope, prefixed to the class name with a dot. */
  scope?: string;
  /** Full qualified name; overrides `scope`. */
  name?: string;
}

const tables = new WeakMap<object, ReadonlyMap<string, SlotLike>>();

export abstract class Composite {
  static readonly slots: SlotTable = {};

  constructor(init: CompositeInit = {}) {
    const table = slotTable(new.target);
    for (const [name, value] of Object.entries(init)) {
      const declared = table.get(name);
      if (!declared) {
        throw new ResolutionError(compositeNameOf(new.target) ?? new.target.name, `no slot named "${name}"`);
      }
      declared.write(this, name, value);
    }
  }

  /**
   * Build an instance from a nested structure produced by `toStructure`.
   */
  static fromStructure<T extends Composite>(this: CompositeClass<T>, structure: unknown): T {
    const value = deserialize(structure);
    if (!(value instanceof this)) {
      throw new ResolutionError(
        compositeNameOf(this) ?? this.name,
        'structure describes a different type',
      );
    }
    return value;
  }

  get qualifiedName(): string {
    return compositeNameOf(this.constructor) ?? this.constructor.name;
  }

  getSlot(name: string): unknown {
    return this.slotFor(name).read(this, name);
  }

  setSlot(name: string, value: unknown): void {
    this.slotFor(name).write(this, name, value);
  }

  toStructure(isCopy = false): NestedRecord {
    const structure = serialize(this, isCopy);
    if (!isPlainObject(structure)) {
      throw new ResolutionError(this.qualifiedName, 'composite did not serialize to a mapping');
    }
    return structure;
  }

  /**
   * Independent instance built from the copiable slots.
   */
  copy<T extends Composite>(this: T): T {
    const result = deserialize(serialize(this, true));
    if (!sameType(result, this)) {
      throw new ResolutionError(this.qualifiedName, 'copy resolved to a different type');
    }
    return result;
  }

  /**
   * Same composite type and equal values for every copiable slot.
   */
  equals(other: unknown): boolean {
    return compositeEquals(this, other);
  }

  private slotFor(name: string): SlotLike {
    const found = slotTable(compositeClassOf(this)).get(name);
    if (!found) {
      throw new ResolutionError(this.qualifiedName, `no slot named "${name}"`);
    }
    return found;
  }
}

const RESERVED_SLOT_NAMES = new Set<string>([
  ...RESERVED_KEYS,
  'constructor',
  'qualifiedName',
  'getSlot',
  'setSlot',
  'toStructure',
  'copy',
  'equals',
]);

function sameType<T extends Composite>(value: unknown, like: T): value is T {
  return value instanceof Composite && value.constructor === like.constructor;
}

export function isCompositeClass(value: unknown): value is CompositeClass {
  return typeof value === 'function' && (value === Composite || value.prototype instanceof Composite);
}

export function compositeClassOf(instance: Composite): CompositeClass {
  const ctor: unknown = instance.constructor;
  if (!isCompositeClass(ctor)) {
    throw new ResolutionError(String(ctor), 'not a composite class');
  }
  return ctor;
}

/**
 * Declared slots of a composite class, inherited ones first. A subclass
 * redeclaring a name replaces the inherited slot.
 */
export function slotTable(type: CompositeClass): ReadonlyMap<string, SlotLike> {
  const cached = tables.get(type);
  if (cached) return cached;

  const chain: CompositeClass[] = [];
  for (let current: unknown = type; isCompositeClass(current); current = Object.getPrototypeOf(current)) {
    chain.unshift(current);
  }
  const table = new Map<string, SlotLike>();
  for (const link of chain) {
    if (!Object.hasOwn(link, 'slots')) continue;
    for (const [name, declared] of Object.entries(link.slots)) {
      table.set(name, declared);
    }
  }
  tables.set(type, table);
  return table;
}

/**
 * Install slot accessors on a composite class and register it. Returns the
 * class so the call can wrap the declaration.
 */
export function defineComposite<C extends CompositeClass>(type: C, options: DefineCompositeOptions = {}): C {
  const table = slotTable(type);
  for (const [name, declared] of table) {
    if (RESERVED_SLOT_NAMES.has(name)) {
      throw new RegistrationError(`Slot name "${name}" on ${type.name} is reserved`);
    }
    Object.defineProperty(type.prototype, name, {
      configurable: true,
      enumerable: true,
      get(this: Composite) {
        return declared.read(this, name);
      },
      set(this: Composite, value: unknown) {
        declared.write(this, name, value);
      },
    });
  }

  const name = options.name ?? (options.scope ? `${options.scope}.${type.name}` : type.name);
  registerComposite(name, type);
  return type;
}
