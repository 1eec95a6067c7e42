/**
 * Error taxonomy
 *
 * Every failure in the core is synchronous and carries enough context
 * (qualified type name, slot name or operation) to diagnose it without
 * inspecting internals.
 */

export type SlotGraphErrorCode =
  | 'RESOLUTION'
  | 'CLASSIFICATION'
  | 'REGISTRATION'
  | 'VALIDATION'
  | 'IMMUTABLE_SLOT'
  | 'STORAGE_SHAPE'
  | 'STORE'
  | 'READ_ONLY';

/**
 * Base class for all errors raised by slotgraph.
 */
export class SlotGraphError extends Error {
  constructor(message: string, public readonly code: SlotGraphErrorCode) {
    super(message);
    this.name = 'SlotGraphError';
  }
}

/**
 * A type tag (or a slot name under it) could not be resolved.
 */
export class ResolutionError extends SlotGraphError {
  constructor(public readonly typeName: string, detail?: string) {
    super(
      detail
        ? `Cannot resolve "${typeName}": ${detail}`
        : `Type "${typeName}" is not registered`,
      'RESOLUTION',
    );
    this.name = 'ResolutionError';
  }
}

/**
 * A value matches none of the known serialization categories.
 */
export class ClassificationError extends SlotGraphError {
  constructor(public readonly typeName: string, detail?: string) {
    super(
      `Unsupported value of type "${typeName}"${detail ? `: ${detail}` : ''}`,
      'CLASSIFICATION',
    );
    this.name = 'ClassificationError';
  }
}

/**
 * A registry call would leave a type in two incompatible catalogs.
 */
export class RegistrationError extends SlotGraphError {
  constructor(message: string) {
    super(message, 'REGISTRATION');
    this.name = 'RegistrationError';
  }
}

/**
 * Raised by slot parsers that reject a value.
 */
export class ValidationError extends SlotGraphError {
  constructor(public readonly slotName: string, message: string) {
    super(`Invalid value for slot "${slotName}": ${message}`, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export class ImmutableSlotError extends SlotGraphError {
  constructor(public readonly typeName: string, public readonly slotName: string) {
    super(`Slot "${typeName}.${slotName}" is write-once and has already been assigned`, 'IMMUTABLE_SLOT');
    this.name = 'ImmutableSlotError';
  }
}

/**
 * An array leaf was asked to change shape in a way the store cannot express.
 */
export class StorageShapeError extends SlotGraphError {
  constructor(public readonly operation: string, message: string) {
    super(`${operation} failed: ${message}`, 'STORAGE_SHAPE');
    this.name = 'StorageShapeError';
  }
}

export class StoreError extends SlotGraphError {
  constructor(public readonly path: string, message: string) {
    super(`Store error at ${path}: ${message}`, 'STORE');
    this.name = 'StoreError';
  }
}

export class ReadOnlyStoreError extends SlotGraphError {
  constructor(public readonly path: string, public readonly operation: string) {
    super(`Cannot ${operation} ${path}: store is open read-only`, 'READ_ONLY');
    this.name = 'ReadOnlyStoreError';
  }
}

/**
 * Best-effort qualified name of a runtime value's type, for error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object' && typeof value !== 'function') return typeof value;
  const ctor: unknown = Reflect.get(value, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}
