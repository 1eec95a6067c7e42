/**
 * Timestamp values stored as epoch-millisecond arrays.
 *
 * A JS `Date` is a single instant with no zone of its own, so it is always
 * written with `timezone: "UTC"`. A `TimestampIndex` keeps the zone it was
 * built with; the zone is carried as metadata and never applied to the
 * stored instants.
 */

export const UTC = 'UTC';

export class TimestampIndex {
  readonly values: Float64Array;

  constructor(values: ArrayLike<number | Date>, readonly timezone: string = UTC) {
    this.values = Float64Array.from(Array.from(values, toEpochMillis));
  }

  get length(): number {
    return this.values.length;
  }

  at(index: number): Date | undefined {
    const value = this.values.at(index);
    return value === undefined ? undefined : new Date(value);
  }

  toArray(): Date[] {
    return Array.from(this.values, (value) => new Date(value));
  }

  equals(other: TimestampIndex): boolean {
    if (this.timezone !== other.timezone || this.length !== other.length) return false;
    return this.values.every((value, i) => Object.is(value, other.values[i]));
  }
}

function toEpochMillis(value: number | Date): number {
  return value instanceof Date ? value.getTime() : value;
}
