/**
 * Error types raised by the container.
 *
 * Every error carries a machine-readable `code` and the name of the
 * operation that raised it.
 */

/**
 * Error codes.
 */
export type ContainerErrorCode =
  | 'OUT_OF_RANGE'
  | 'CONTRACT_VIOLATION'
  | 'CURSOR_INVALIDATED'
  | 'ALLOCATION_FAILED'
  | 'MISSING_CAPABILITY';

/**
 * Base class for container errors.
 */
export class ContainerError extends Error {
  readonly code: ContainerErrorCode;
  readonly op: string;

  constructor(code: ContainerErrorCode, op: string, message: string, options?: ErrorOptions) {
    super(`${op}: ${message}`, options);
    this.name = 'ContainerError';
    this.code = code;
    this.op = op;
  }
}

/**
 * Checked access (`at`, `setAt`) with an index outside [0, size).
 */
export class OutOfRangeError extends ContainerError {
  constructor(op: string, index: number, size: number) {
    super('OUT_OF_RANGE', op, `index ${index} out of range for size ${size}`);
    this.name = 'OutOfRangeError';
  }
}

/**
 * A precondition was broken while contracts are asserted.
 */
export class ContractViolationError extends ContainerError {
  constructor(op: string, message: string) {
    super('CONTRACT_VIOLATION', op, message);
    this.name = 'ContractViolationError';
  }
}

/**
 * A cursor was used after its owner reallocated, shifted or swapped storage.
 */
export class CursorInvalidatedError extends ContainerError {
  constructor(op: string, message: string) {
    super('CURSOR_INVALIDATED', op, message);
    this.name = 'CursorInvalidatedError';
  }
}

/**
 * Storage for the requested capacity could not be allocated.
 */
export class AllocationError extends ContainerError {
  readonly capacity: number;

  constructor(op: string, capacity: number, options?: ErrorOptions) {
    super('ALLOCATION_FAILED', op, `cannot allocate ${capacity} slots`, options);
    this.name = 'AllocationError';
    this.capacity = capacity;
  }
}

/**
 * An operation needs an element capability the traits do not provide.
 */
export class MissingCapabilityError extends ContainerError {
  constructor(op: string, capability: string) {
    super('MISSING_CAPABILITY', op, `element traits provide no '${capability}'`);
    this.name = 'MissingCapabilityError';
  }
}

/**
 * Type guard for container errors.
 */
export function isContainerError(value: unknown): value is ContainerError {
  return value instanceof ContainerError;
}
