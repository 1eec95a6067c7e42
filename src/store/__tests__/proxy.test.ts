import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NDArray } from '../../arrays/ndarray.js';
import { ReadOnlyStoreError, StorageShapeError } from '../../errors.js';
import { StoreFile } from '../file.js';
import { ArrayProxy, slice } from '../proxy.js';

describe('ArrayProxy', () => {
  let tmp: string;
  let dir: string;
  let file: StoreFile;

  function openGrid(): ArrayProxy {
    return new ArrayProxy(file.root.array('grid'));
  }

  beforeEach(async () => {
    tmp = await mkdtemp(join(tmpdir(), 'slotgraph-proxy-'));
    dir = join(tmp, 'store');
    file = StoreFile.open(dir, 'w');
    file.root.createArray('grid', NDArray.from([0, 1, 2, 3, 4, 5], { shape: [2, 3] }), {
      __dataset__: 'arrays.NDArray',
      unit: 'm',
    });
  });

  afterEach(async () => {
    file.close();
    await rm(tmp, { recursive: true, force: true });
  });

  describe('reading', () => {
    it('describes the stored leaf', () => {
      const grid = openGrid();
      expect(grid.dtype).toBe('float64');
      expect(grid.shape).toEqual([2, 3]);
      expect(grid.ndim).toBe(2);
      expect(grid.size).toBe(6);
      expect(grid.nbytes).toBe(48);
      expect(grid.length).toBe(2);
      expect(grid.attributes).toEqual({ unit: 'm' });
    });

    it('reads whole arrays, rows, columns and strided slices', () => {
      const grid = openGrid();
      expect(grid.read().toList()).toEqual([
        [0, 1, 2],
        [3, 4, 5],
      ]);
      expect(grid.read(1).toList()).toEqual([3, 4, 5]);
      expect(grid.read(slice(), 1).toList()).toEqual([1, 4]);
      expect(grid.read(slice(0, 2), slice(0, 3, 2)).toList()).toEqual([
        [0, 2],
        [3, 5],
      ]);
    });

    it('resolves negative indices from the end', () => {
      const grid = openGrid();
      expect(grid.get(-1, -1)).toBe(5);
      expect(grid.read(-1, -1).shape).toEqual([]);
      expect(grid.read(slice(-1)).toList()).toEqual([[3, 4, 5]]);
    });

    it('rejects out-of-range indices and bad steps', () => {
      const grid = openGrid();
      expect(() => grid.read(2)).toThrow(StorageShapeError);
      expect(() => grid.read(2)).toThrow('read failed: index 2 is out of range for axis 0 with length 2');
      expect(() => grid.read(slice(0, 2, 0))).toThrow('slice step must be a positive integer, got 0');
      expect(() => grid.read(0, 0, 0)).toThrow('too many indices (3) for a 2-d array');
    });
  });

  describe('writing', () => {
    it('writes in place and fills a selection from a scalar', () => {
      const grid = openGrid();
      grid.set([0, 1], 10);
      grid.write([slice(), 0], 9);
      expect(grid.read().toList()).toEqual([
        [9, 10, 2],
        [9, 4, 5],
      ]);
    });

    it('grows the leading axis and zero-fills skipped rows', () => {
      const grid = openGrid();
      grid.write(3, [6, 7, 8]);
      expect(grid.shape).toEqual([4, 3]);
      expect(grid.read().toList()).toEqual([
        [0, 1, 2],
        [3, 4, 5],
        [0, 0, 0],
        [6, 7, 8],
      ]);
    });

    it('refuses to grow any other axis', () => {
      const grid = openGrid();
      expect(() => grid.write([0, slice(0, 4)], [1, 2, 3, 4])).toThrow(
        'write failed: stop 4 exceeds length 3 of axis 1; only the leading axis can grow',
      );
      expect(grid.shape).toEqual([2, 3]);
    });

    it('checks the value count before growing', () => {
      const grid = openGrid();
      expect(() => grid.write(slice(0, 5), [1, 2])).toThrow('write failed: expected 15 values for the selection, got 2');
      expect(grid.shape).toEqual([2, 3]);
    });

    it('appends rows that match the trailing dimensions', () => {
      const grid = openGrid();
      grid.append(NDArray.from([6, 7, 8]));
      grid.append(NDArray.from([9, 10, 11, 12, 13, 14], { shape: [2, 3] }));
      grid.append([15, 16, 17]);
      expect(grid.shape).toEqual([6, 3]);
      expect(grid.read(slice(2)).toList()).toEqual([
        [6, 7, 8],
        [9, 10, 11],
        [12, 13, 14],
        [15, 16, 17],
      ]);

      expect(() => grid.append([1, 2])).toThrow('append failed: 2 values do not fill whole rows of 3');
      expect(() => grid.append(NDArray.from([1, 2, 3, 4], { shape: [2, 2] }))).toThrow(
        'append failed: shape [2, 2] does not match trailing dimensions [3]',
      );
    });

    it('resizes the leading axis but never shrinks it', () => {
      const grid = openGrid();
      grid.resize(4);
      expect(grid.shape).toEqual([4, 3]);
      expect(grid.read(3).toList()).toEqual([0, 0, 0]);
      expect(() => grid.resize(1)).toThrow(`resize failed: cannot shrink ${grid.location} from 4 to 1`);
      expect(() => grid.resize(2.5)).toThrow('resize failed: invalid length 2.5');
    });

    it('keeps integer dtypes', () => {
      const leaf = file.root.createArray('counts', NDArray.from([1, 2], { dtype: 'int16' }));
      const counts = new ArrayProxy(leaf);
      counts.append([-3, 400]);
      expect(counts.dtype).toBe('int16');
      expect(counts.read().toList()).toEqual([1, 2, -3, 400]);
    });

    it('persists shape and attribute changes on flush', () => {
      const grid = openGrid();
      grid.append([6, 7, 8]);
      grid.setAttribute('scale', 2);
      grid.close();
      file.close();

      file = StoreFile.open(dir, 'r');
      const reopened = openGrid();
      expect(reopened.shape).toEqual([3, 3]);
      expect(reopened.attributes).toEqual({ unit: 'm', scale: 2 });
      expect(reopened.read(2).toList()).toEqual([6, 7, 8]);
    });
  });

  describe('0-dimensional leaves', () => {
    it('reads the single value and cannot be resized', () => {
      const scalar = new ArrayProxy(file.root.createArray('scalar', NDArray.scalar(4)));
      expect(scalar.get()).toBe(4);
      expect(scalar.read().shape).toEqual([]);
      expect(() => scalar.length).toThrow('is 0-dimensional');
      expect(() => scalar.resize(2)).toThrow('0-dimensional and cannot be resized');
      expect(() => scalar.append([1])).toThrow('0-dimensional and cannot be resized');
    });
  });

  describe('read-only stores', () => {
    it('rejects every mutation', () => {
      file.close();
      file = StoreFile.open(dir, 'r');
      const grid = openGrid();
      expect(grid.writable).toBe(false);
      expect(() => grid.write(0, 1)).toThrow(ReadOnlyStoreError);
      expect(() => grid.append([1, 2, 3])).toThrow(ReadOnlyStoreError);
      expect(() => grid.resize(5)).toThrow(ReadOnlyStoreError);
      expect(() => grid.setAttribute('scale', 2)).toThrow(ReadOnlyStoreError);
      expect(grid.read(0).toList()).toEqual([0, 1, 2]);
    });
  });
});
