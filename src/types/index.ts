/**
 * Type exports for the contig container.
 */

// Container types
export type {
  ElementTraits,
  ElementTraitsInit,
  ContractMode,
  DynamicArrayConfig,
  ResolvedDynamicArrayConfig,
  ReserveIntent,
  DynamicArrayInit,
  ReadonlyCursor,
  Cursor,
  Position,
} from './vector.ts';

// Branded slot types
export type { SlotIndex, SlotCount } from './branded.ts';

export {
  slotIndex,
  slotCount,
  isValidIndex,
  isValidCount,
  addIndex,
  diffIndex,
  doubleCount,
  compareIndices,
  clampIndex,
  ZERO_INDEX,
  ZERO_COUNT,
} from './branded.ts';
