import { describe, expect, it } from 'vitest';
import { NDArray } from '../../arrays/ndarray.js';
import { Composite, defineComposite } from '../../slots/composite.js';
import { slot } from '../../slots/slot.js';
import { deepEqual } from '../equality.js';
import { fromJSONValue, toJSONValue } from '../json.js';
import { deserialize, serialize } from '../serializer.js';

class Point extends Composite {
  static slots = { x: slot({ default: 0 }), y: slot({ default: 0 }) };
  declare x: number;
  declare y: number;
}
defineComposite(Point, { scope: 'json' });

describe('JSON view', () => {
  it('wraps values JSON cannot carry in tagged objects', () => {
    const structure = serialize({
      s: new Set(['a']),
      m: new Map([[2, 'two']]),
      n: Number.NaN,
      b: 5n,
      u: new URL('https://example.com/'),
      arr: NDArray.from([1, Infinity]),
    });
    expect(toJSONValue(structure)).toEqual({
      s: { __container__: 'set', items: ['a'] },
      m: { __container__: 'map', items: [[2, 'two']] },
      n: { __primitive__: 'float', value: 'NaN' },
      b: { __primitive__: 'bigint', value: '5' },
      u: { __primitive__: 'URL', value: 'https://example.com/' },
      arr: {
        __dataset__: 'arrays.NDArray',
        data: { __ndarray__: { dtype: 'float64', shape: [2], data: [1, 'Infinity'] } },
        metadata: {},
      },
    });
  });

  it('survives a JSON text round trip', () => {
    const graph = {
      points: [new Point({ x: 1, y: 2 }), new Point({ x: -1 })],
      tags: new Set(['a', 'b']),
      grid: NDArray.from([1, 2, 3, 4, 5, 6], { dtype: 'uint8', shape: [2, 3] }),
      missing: null,
    };
    const text = JSON.stringify(toJSONValue(serialize(graph)));
    const restored = deserialize(fromJSONValue(JSON.parse(text)));
    expect(deepEqual(restored, graph)).toBe(true);
  });

  it('keeps plain JSON values as they are', () => {
    expect(toJSONValue({ a: [1, 'x', true, null] })).toEqual({ a: [1, 'x', true, null] });
    expect(fromJSONValue({ a: [1, 'x', true, null] })).toEqual({ a: [1, 'x', true, null] });
  });
});
