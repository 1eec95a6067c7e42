/**
 * Built-in primitive and dataset registrations.
 */

import { NDArray } from '../arrays/ndarray.js';
import { TimestampIndex, UTC } from '../arrays/timestamp.js';
import { registerDataset } from './dataset.js';
import { registerPrimitive } from './primitive.js';

export const NDARRAY_DATASET = 'arrays.NDArray';
export const TIMESTAMP_DATASET = 'arrays.Timestamp';
export const TIMESTAMP_INDEX_DATASET = 'arrays.TimestampIndex';

registerPrimitive('string');
registerPrimitive('number');
registerPrimitive('boolean');
registerPrimitive('bigint');

// A `file:` URL is the filesystem-path primitive.
registerPrimitive(URL, {
  encode: (value) => value.href,
  decode: (payload) => new URL(payload),
});

registerDataset(
  NDArray,
  (value) => ({ data: value, metadata: {} }),
  (data) => data,
  NDARRAY_DATASET,
);

registerDataset(
  Date,
  (value) => ({ data: NDArray.from([value.getTime()], { dtype: 'float64' }), metadata: { timezone: UTC } }),
  (data) => new Date(data.data[0]),
  TIMESTAMP_DATASET,
);

registerDataset(
  TimestampIndex,
  (value) => ({ data: new NDArray(Float64Array.from(value.values)), metadata: { timezone: value.timezone } }),
  (data, metadata) =>
    new TimestampIndex(data.data, typeof metadata.timezone === 'string' ? metadata.timezone : UTC),
  TIMESTAMP_INDEX_DATASET,
);
