import { afterAll, describe, expect, it } from 'vitest';
import { NDArray } from '../../arrays/ndarray.js';
import { TimestampIndex } from '../../arrays/timestamp.js';
import { ClassificationError, ResolutionError } from '../../errors.js';
import {
  classify,
  registerDataset,
  registerPrimitive,
  removeDataset,
  removePrimitive,
} from '../../registry/index.js';
import { Composite, defineComposite } from '../../slots/composite.js';
import { slot } from '../../slots/slot.js';
import { deepEqual } from '../equality.js';
import { DATASET_KEY, TYPE_KEY } from '../keys.js';
import { copy, deserialize, serialize } from '../serializer.js';

class Sample extends Composite {
  static slots = {
    name: slot({ default: '' }),
    value: slot({ default: 0 }),
  };
  declare name: string;
  declare value: number;
}
defineComposite(Sample, { scope: 'test' });

class Cached extends Composite {
  static slots = {
    source: slot({ default: '' }),
    memo: slot({ default: -1, copiable: false }),
  };
  declare source: string;
  declare memo: number;
}
defineComposite(Cached, { scope: 'test' });

class Bag extends Composite {
  static slots = {
    items: slot<number[]>({ factory: () => [] }),
    meta: slot<Record<string, number>>({ factory: () => ({}) }),
    child: slot<Sample | null>({ default: null }),
  };
  declare items: number[];
  declare meta: Record<string, number>;
  declare child: Sample | null;
}
defineComposite(Bag, { scope: 'test' });

class Sized extends Composite {
  static slots = {
    size: slot<number>({ default: 0 }).withParser((_owner, raw) => Number(raw)),
    label: slot<string>(),
  };
  declare size: number;
  declare label: string | undefined;
}
defineComposite(Sized, { scope: 'test' });

class Located extends Composite {
  static slots = {
    where: slot<URL | null>({ default: null }),
  };
  declare where: URL | null;
}
defineComposite(Located, { scope: 'test' });

class Track {
  constructor(readonly points: Float64Array) {}
}
registerDataset(
  Track,
  (track) => ({ data: new NDArray(track.points), metadata: { unit: 'm' } }),
  (data) => new Track(Float64Array.from(data.data)),
  'test.Track',
);

class Celsius {
  constructor(readonly degrees: number) {}
}

afterAll(() => {
  removeDataset(Track);
});

describe('serialize / deserialize', () => {
  it('maps a composite to a tagged record and back', () => {
    const sample = new Sample({ name: 'x', value: 5 });
    const structure = serialize(sample);
    expect(structure).toEqual({ [TYPE_KEY]: 'test.Sample', name: 'x', value: 5 });

    const restored = deserialize(structure);
    expect(restored).toBeInstanceOf(Sample);
    if (!(restored instanceof Sample)) return;
    expect(restored.name).toBe('x');
    expect(restored.value).toBe(5);
  });

  it('writes every declared slot, defaults included', () => {
    expect(serialize(new Sample())).toEqual({ [TYPE_KEY]: 'test.Sample', name: '', value: 0 });
  });

  it('leaves out slots that have neither a value nor a default', () => {
    expect(serialize(new Sized({ size: 2 }))).toEqual({ [TYPE_KEY]: 'test.Sized', size: 2 });
  });

  it('disassembles a registered dataset and assembles it back', () => {
    const track = new Track(Float64Array.from([1, 2.5, 4]));
    const structure = serialize(track);
    expect(structure).toEqual({
      [DATASET_KEY]: 'test.Track',
      data: NDArray.from([1, 2.5, 4]),
      metadata: { unit: 'm' },
    });

    const restored = deserialize(structure);
    expect(restored).toBeInstanceOf(Track);
    expect(deepEqual(restored, track)).toBe(true);
  });

  it('copies dataset data rather than sharing it', () => {
    const array = NDArray.from([1, 2, 3]);
    const restored = deserialize(serialize(array));
    array.set([0], 10);
    expect(restored).toBeInstanceOf(NDArray);
    if (!(restored instanceof NDArray)) return;
    expect(restored.get(0)).toBe(1);
  });

  it('round-trips containers, scalars, primitives and built-in datasets', () => {
    const value = {
      list: [1, 'a', null, true],
      set: new Set([1, 2]),
      map: new Map<unknown, unknown>([
        [1, 'one'],
        ['k', [2]],
      ]),
      nested: { deep: new Sample({ name: 'inner', value: 2 }) },
      big: 12n,
      url: new URL('https://example.com/x'),
      when: new Date(1_700_000_000_000),
      index: new TimestampIndex([0, 1000], 'Europe/Paris'),
      grid: NDArray.from([1, 2, 3, 4], { dtype: 'int32', shape: [2, 2] }),
    };
    const restored = deserialize(serialize(value));
    expect(deepEqual(restored, value)).toBe(true);
  });

  it('runs slot parsers on deserialize', () => {
    const restored = deserialize({ [TYPE_KEY]: 'test.Sized', size: '3' });
    expect(restored).toBeInstanceOf(Sized);
    if (!(restored instanceof Sized)) return;
    expect(restored.size).toBe(3);
  });

  it('fails on unknown type tags and undeclared slots', () => {
    expect(() => deserialize({ [TYPE_KEY]: 'test.Nope' })).toThrow(ResolutionError);
    expect(() => deserialize({ [TYPE_KEY]: 'test.Sample', colour: 'red' })).toThrow(
      'Cannot resolve "test.Sample": no slot named "colour"',
    );
    expect(() => deserialize({ [DATASET_KEY]: 'test.Unknown', data: NDArray.from([1]) })).toThrow(ResolutionError);
  });

  it('rejects values outside every category', () => {
    expect(() => serialize(new Celsius(2))).toThrow(ClassificationError);
    expect(() => serialize([Symbol('s')])).toThrow(ClassificationError);
    expect(() => serialize({ [TYPE_KEY]: 'spoofed' })).toThrow('mapping key "__type__" is reserved');
  });
});

describe('classification', () => {
  it('follows the classifier when a primitive kind is unregistered', () => {
    removePrimitive('bigint');
    try {
      expect(() => classify(1n)).toThrow('Unsupported value of type "bigint"');
      expect(() => serialize({ n: 1n })).toThrow('Unsupported value of type "bigint"');
    } finally {
      registerPrimitive('bigint');
    }
    expect(serialize({ n: 1n })).toEqual({ n: 1n });
  });
});

describe('copy', () => {
  it('keeps only copiable slots when serializing as a copy', () => {
    const cached = new Cached({ source: 'a', memo: 42 });
    expect(serialize(cached, true)).toEqual({ [TYPE_KEY]: 'test.Cached', source: 'a' });

    const restored = deserialize(serialize(cached, true));
    expect(restored).toBeInstanceOf(Cached);
    if (!(restored instanceof Cached)) return;
    expect(restored.memo).toBe(-1);
  });

  it('produces an independent instance', () => {
    const bag = new Bag({ items: [1, 2], meta: { a: 1 }, child: new Sample({ name: 'c' }) });
    const clone = bag.copy();
    clone.items.push(3);
    clone.meta.a = 9;
    if (clone.child) clone.child.name = 'changed';

    expect(clone).not.toBe(bag);
    expect(bag.items).toEqual([1, 2]);
    expect(bag.meta).toEqual({ a: 1 });
    expect(bag.child?.name).toBe('c');
  });

  it('gives the copy its own path and URL values', () => {
    const located = new Located({ where: new URL('file:///tmp/a') });
    const clone = located.copy();
    expect(clone.where).not.toBe(located.where);
    if (clone.where) clone.where.pathname = '/changed';

    expect(located.where?.href).toBe('file:///tmp/a');
    expect(clone.where?.href).toBe('file:///changed');
  });

  it('copies any graph through the free function', () => {
    const graph = { samples: [new Sample({ name: 'a' }), new Sample({ name: 'b' })] };
    const cloned = copy(graph);
    expect(cloned).not.toBe(graph);
    expect(deepEqual(cloned, graph)).toBe(true);
  });
});

describe('equality', () => {
  it('compares composites on copiable slots only', () => {
    expect(new Cached({ source: 'a', memo: 1 }).equals(new Cached({ source: 'a', memo: 2 }))).toBe(true);
    expect(new Cached({ source: 'a' }).equals(new Cached({ source: 'b' }))).toBe(false);
    expect(new Sample().equals(new Cached())).toBe(false);
  });

  it('ignores order in sets and maps', () => {
    expect(deepEqual(new Set([1, 2]), new Set([2, 1]))).toBe(true);
    expect(
      deepEqual(
        new Map([
          ['a', 1],
          ['b', 2],
        ]),
        new Map([
          ['b', 2],
          ['a', 1],
        ]),
      ),
    ).toBe(true);
    expect(deepEqual(new Set([1, 2]), new Set([1, 3]))).toBe(false);
  });

  it('treats null and undefined as the same absent value and NaN as equal to itself', () => {
    expect(deepEqual(null, undefined)).toBe(true);
    expect(deepEqual({ a: 1 }, { a: 1, b: undefined })).toBe(true);
    expect(deepEqual(NaN, NaN)).toBe(true);
    expect(deepEqual([1], [1, 2])).toBe(false);
    expect(deepEqual(NDArray.from([1, 2]), NDArray.from([1, 2], { dtype: 'int32' }))).toBe(false);
  });

  it('builds composites from structures with fromStructure', () => {
    const structure = new Sample({ name: 'y', value: 1 }).toStructure();
    expect(Sample.fromStructure(structure).name).toBe('y');
    expect(() => Cached.fromStructure(structure)).toThrow(ResolutionError);
  });
});
