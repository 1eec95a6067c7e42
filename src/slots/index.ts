export { Slot, slot } from './slot.js';
export type { SlotObserver, SlotOptions, SlotLike } from './slot.js';
export {
  Composite,
  defineComposite,
  slotTable,
  isCompositeClass,
  compositeClassOf,
} from './composite.js';
export type { CompositeClass, CompositeInit, SlotTable, DefineCompositeOptions } from './composite.js';
