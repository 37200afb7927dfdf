/**
 * Tests for reserve intents.
 */

import { describe, it, expect } from 'vitest';
import { reserve, isReserveIntent } from './reserve.ts';
import { AllocationError } from './errors.ts';

describe('reserve', () => {
  it('should wrap the requested capacity', () => {
    expect(reserve(10)).toEqual({ kind: 'reserve-intent', capacity: 10 });
  });

  it('should accept capacity 0', () => {
    expect(reserve(0).capacity).toBe(0);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(reserve(4))).toBe(true);
  });

  it('should reject invalid capacities', () => {
    expect(() => reserve(-1)).toThrow(AllocationError);
    expect(() => reserve(1.5)).toThrow(AllocationError);
  });
});

describe('isReserveIntent', () => {
  it('should recognise intents', () => {
    expect(isReserveIntent(reserve(3))).toBe(true);
    expect(isReserveIntent({ kind: 'reserve-intent', capacity: 3 })).toBe(true);
  });

  it('should reject plain counts and look-alikes', () => {
    expect(isReserveIntent(3)).toBe(false);
    expect(isReserveIntent(null)).toBe(false);
    expect(isReserveIntent([3])).toBe(false);
    expect(isReserveIntent({ capacity: 3 })).toBe(false);
    expect(isReserveIntent({ kind: 'reserve-intent', capacity: -1 })).toBe(false);
    expect(isReserveIntent({ kind: 'reserve-intent', capacity: '3' })).toBe(false);
  });
});
