/**
 * Precondition checks for the unchecked fast paths.
 *
 * A broken precondition throws in 'assert' mode. In 'warn' and 'off' modes
 * the check only reports, and the caller falls back to clamped behavior.
 */

import type { ContractMode } from '../../types/vector.ts';
import { ContractViolationError, CursorInvalidatedError } from './errors.ts';

/**
 * Check a precondition.
 * Returns true when it holds; false when it is broken and the mode lets the
 * caller continue.
 */
export function expectContract(
  mode: ContractMode,
  holds: boolean,
  op: string,
  message: string
): boolean {
  if (holds) return true;
  switch (mode) {
    case 'assert':
      throw new ContractViolationError(op, message);
    case 'warn':
      console.warn(`[contig] ${op}: ${message}`);
      return false;
    case 'off':
      return false;
  }
}

/**
 * Check that a cursor still belongs to its owner's current storage.
 */
export function expectLiveCursor(
  mode: ContractMode,
  live: boolean,
  op: string
): boolean {
  if (live) return true;
  switch (mode) {
    case 'assert':
      throw new CursorInvalidatedError(op, 'cursor was invalidated by a reallocation, shift or swap');
    case 'warn':
      console.warn(`[contig] ${op}: stale cursor`);
      return false;
    case 'off':
      return false;
  }
}
