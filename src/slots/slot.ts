/**
 * Attribute Slots
 *
 * A slot is an immutable definition shared by every instance of the type
 * that declares it (and its subtypes). Builder methods return a new slot, so
 * a base definition can serve as a template. Per-instance state lives in a
 * side table keyed by the owning instance and the slot name.
 */

import { ImmutableSlotError, describeType } from '../errors.js';
import type { Composite } from './composite.js';

export type SlotObserver<T, O extends Composite = Composite> = (
  owner: O,
  previous: T | undefined,
  next: T,
) => void;

export interface SlotOptions<T, O extends Composite = Composite> {
  /** Static default, returned while nothing has been stored. */
  default?: T;
  /** Per-instance default; called at most once per instance. */
  factory?: (owner: O) => T;
  /** Validates or converts every assigned value. */
  parse?: (owner: O, raw: unknown) => T;
  observers?: ReadonlyArray<SlotObserver<T, O>>;
  writeOnce?: boolean;
  /** Whether copy and copy-serialization include this slot. Defaults to true. */
  copiable?: boolean;
  /** Runs once, on the first read of a slot that has never been stored. */
  postInit?: (owner: O) => void;
}

/**
 * The part of a slot the serializer and composite machinery rely on.
 */
export interface SlotLike {
  readonly copiable: boolean;
  readonly writeOnce: boolean;
  read(owner: Composite, name: string): unknown;
  write(owner: Composite, name: string, raw: unknown): void;
  isAssigned(owner: Composite, name: string): boolean;
}

interface SlotState<T> {
  value?: T;
  hasValue: boolean;
  assigned: boolean;
  postInitDone: boolean;
}

export class Slot<T, O extends Composite = Composite> implements SlotLike {
  private readonly states = new WeakMap<O, Map<string, SlotState<T>>>();

  constructor(private readonly options: SlotOptions<T, O> = {}) {}

  get copiable(): boolean {
    return this.options.copiable ?? true;
  }

  get writeOnce(): boolean {
    return this.options.writeOnce ?? false;
  }

  get defaultValue(): T | undefined {
    return this.options.default;
  }

  get observerCount(): number {
    return this.options.observers?.length ?? 0;
  }

  read(owner: O, name: string): T | undefined {
    const state = this.stateOf(owner, name);
    const { postInit, factory } = this.options;

    if (!state.hasValue && postInit && !state.postInitDone) {
      state.postInitDone = true;
      postInit(owner);
    }
    if (!state.hasValue && factory) {
      state.value = factory(owner);
      state.hasValue = true;
    }
    return state.hasValue ? state.value : this.options.default;
  }

  write(owner: O, name: string, raw: unknown): void {
    // Without a parser the value is taken as given.
    const next = this.options.parse ? this.options.parse(owner, raw) : (raw as T);
    const state = this.stateOf(owner, name);
    if (this.writeOnce && state.assigned) {
      throw new ImmutableSlotError(describeType(owner), name);
    }

    const previous = state.hasValue ? state.value : this.options.default;
    state.value = next;
    state.hasValue = true;
    state.assigned = true;

    for (const observer of this.options.observers ?? []) {
      observer(owner, previous, next);
    }
  }

  isAssigned(owner: O, name: string): boolean {
    return this.stateOf(owner, name).assigned;
  }

  // ─── Builders ──────────────────────────────────────────────

  withDefault(value: T): Slot<T, O> {
    return new Slot<T, O>({ ...this.options, default: value, factory: undefined });
  }

  withFactory(factory: (owner: O) => T): Slot<T, O> {
    return new Slot<T, O>({ ...this.options, factory });
  }

  withParser(parse: (owner: O, raw: unknown) => T): Slot<T, O> {
    return new Slot<T, O>({ ...this.options, parse });
  }

  observe(observer: SlotObserver<T, O>): Slot<T, O> {
    return new Slot<T, O>({ ...this.options, observers: [...(this.options.observers ?? []), observer] });
  }

  unobserve(observer: SlotObserver<T, O>): Slot<T, O> {
    return new Slot<T, O>({
      ...this.options,
      observers: (this.options.observers ?? []).filter((existing) => existing !== observer),
    });
  }

  asWriteOnce(writeOnce = true): Slot<T, O> {
    return new Slot<T, O>({ ...this.options, writeOnce });
  }

  asCopiable(copiable = true): Slot<T, O> {
    return new Slot<T, O>({ ...this.options, copiable });
  }

  withPostInit(postInit: (owner: O) => void): Slot<T, O> {
    return new Slot<T, O>({ ...this.options, postInit });
  }

  private stateOf(owner: O, name: string): SlotState<T> {
    let byName = this.states.get(owner);
    if (!byName) {
      byName = new Map();
      this.states.set(owner, byName);
    }
    let state = byName.get(name);
    if (!state) {
      state = { hasValue: false, assigned: false, postInitDone: false };
      byName.set(name, state);
    }
    return state;
  }
}

/**
 * Declare a slot.
 *
 * @example
 * static slots = {
 *   name: slot({ default: '' }),
 *   tags: slot<string[]>({ factory: () => [] }),
 * };
 */
export function slot<T, O extends Composite = Composite>(options: SlotOptions<T, O> = {}): Slot<T, O> {
  return new Slot(options);
}
