import fc from 'fast-check';
import { describe, expect, it, vi } from 'vitest';
import { DynamicArray } from './dynamic-array.ts';
import { numberTraits } from '../core/traits.ts';
import { OutOfRangeError } from '../core/errors.ts';

const numbers = { traits: numberTraits };
const items = fc.array(fc.integer(), { maxLength: 40 });

type Operation =
  | { kind: 'push'; value: number }
  | { kind: 'pop' }
  | { kind: 'insert'; at: number; value: number }
  | { kind: 'erase'; at: number }
  | { kind: 'resize'; size: number }
  | { kind: 'reserve'; capacity: number }
  | { kind: 'clear' };

const operation: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({ kind: fc.constant('push' as const), value: fc.integer() }),
  fc.record({ kind: fc.constant('pop' as const) }),
  fc.record({ kind: fc.constant('insert' as const), at: fc.nat(), value: fc.integer() }),
  fc.record({ kind: fc.constant('erase' as const), at: fc.nat() }),
  fc.record({ kind: fc.constant('resize' as const), size: fc.nat(30) }),
  fc.record({ kind: fc.constant('reserve' as const), capacity: fc.nat(60) }),
  fc.record({ kind: fc.constant('clear' as const) })
);

describe('DynamicArray property tests', () => {
  it('literal-list construction has size == capacity == list length, in order', () => {
    fc.assert(
      fc.property(items, (list) => {
        const array = DynamicArray.fromList(list, numbers);
        expect(array.size).toBe(list.length);
        expect(array.capacity).toBe(list.length);
        expect(array.toArray()).toEqual(list);
      })
    );
  });

  it('resize(N) then resize(M <= N) keeps the first M elements and capacity >= N', () => {
    fc.assert(
      fc.property(items, fc.nat(60), fc.nat(60), (list, a, b) => {
        const n = Math.max(a, b);
        const m = Math.min(a, b);
        const array = DynamicArray.fromList(list, numbers);

        array.resize(n);
        const grown = array.toArray();
        const capacity = array.capacity;
        array.resize(m);

        expect(array.toArray()).toEqual(grown.slice(0, m));
        expect(array.capacity).toBe(capacity);
        expect(array.capacity).toBeGreaterThanOrEqual(n);
      })
    );
  });

  it('N pushes from empty relocate 2^ceil(log2 N) - 1 elements, fewer than 2N', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 600 }), (n) => {
        const move = vi.fn((value: number) => value);
        const array = DynamicArray.empty({ traits: { ...numberTraits, move } });

        for (let i = 0; i < n; i++) {
          array.pushBack(i);
        }

        let capacity = 1;
        while (capacity < n) capacity *= 2;
        expect(array.capacity).toBe(capacity);
        expect(move).toHaveBeenCalledTimes(capacity - 1);
        expect(move.mock.calls.length).toBeLessThan(2 * n);
      }),
      { numRuns: 50 }
    );
  });

  it('insert at k followed by erase at k restores the original', () => {
    fc.assert(
      fc.property(items, fc.nat(), fc.integer(), (list, seed, value) => {
        const k = seed % (list.length + 1);
        const original = DynamicArray.fromList(list, numbers);
        const array = DynamicArray.copyOf(original);

        array.insert(k, value);
        expect(array.get(k)).toBe(value);
        array.erase(k);

        expect(array.equals(original)).toBe(true);
      })
    );
  });

  it('at(index) throws iff index >= size, and agrees with get() otherwise', () => {
    fc.assert(
      fc.property(items, fc.nat(60), (list, index) => {
        const array = DynamicArray.fromList(list, numbers);
        if (index < list.length) {
          expect(array.at(index)).toBe(array.get(index));
          expect(array.at(index)).toBe(list[index]);
        } else {
          expect(() => array.at(index)).toThrow(OutOfRangeError);
        }
      })
    );
  });

  it('behaves like a plain array model under random operations', () => {
    fc.assert(
      fc.property(fc.array(operation, { maxLength: 60 }), (operations) => {
        const array = DynamicArray.empty(numbers);
        const model: number[] = [];

        for (const op of operations) {
          switch (op.kind) {
            case 'push':
              array.pushBack(op.value);
              model.push(op.value);
              break;
            case 'pop':
              if (model.length === 0) break;
              array.popBack();
              model.pop();
              break;
            case 'insert': {
              const at = op.at % (model.length + 1);
              array.insert(at, op.value);
              model.splice(at, 0, op.value);
              break;
            }
            case 'erase': {
              if (model.length === 0) break;
              const at = op.at % model.length;
              array.erase(at);
              model.splice(at, 1);
              break;
            }
            case 'resize':
              array.resize(op.size);
              while (model.length < op.size) model.push(0);
              model.length = op.size;
              break;
            case 'reserve':
              array.reserve(op.capacity);
              break;
            case 'clear':
              array.clear();
              model.length = 0;
              break;
          }
          expect(array.size).toBe(model.length);
          expect(array.capacity).toBeGreaterThanOrEqual(array.size);
        }

        expect(array.toArray()).toEqual(model);
      })
    );
  });
});
