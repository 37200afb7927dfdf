/**
 * Container exports for contig.
 */

// Container
export { DynamicArray, createDynamicArray } from './features/dynamic-array.ts';

// Cursors
export { SlotCursor } from './features/cursor.ts';
export type { CursorHost } from './features/cursor.ts';

// Comparison
export {
  equal,
  notEqual,
  lessThan,
  greaterThan,
  lessOrEqual,
  greaterOrEqual,
  compareArrays,
} from './features/compare.ts';

// Storage
export { Buffer } from './core/buffer.ts';

// Reserve intent
export { reserve, isReserveIntent } from './core/reserve.ts';

// Element traits
export {
  defineTraits,
  structuredTraits,
  numberTraits,
  stringTraits,
  bigintTraits,
  booleanTraits,
} from './core/traits.ts';

// Configuration
export { DEFAULT_CONFIG, resolveConfig } from './core/config.ts';

// Errors
export {
  ContainerError,
  OutOfRangeError,
  ContractViolationError,
  CursorInvalidatedError,
  AllocationError,
  MissingCapabilityError,
  isContainerError,
} from './core/errors.ts';
export type { ContainerErrorCode } from './core/errors.ts';
