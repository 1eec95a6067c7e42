export {
  NDArray,
  DTYPE_NAMES,
  isDType,
  typedArrayFor,
  itemSize,
  allocate,
  dtypeOf,
  shapeSize,
  stridesOf,
} from './ndarray.js';
export type { DType, TypedArray, TypedArrayConstructor } from './ndarray.js';
export { TimestampIndex, UTC } from './timestamp.js';
