/**
 * Positional cursors into a container.
 *
 * A cursor is an immutable (owner, offset, generation) triple. The owner
 * bumps its generation whenever it reallocates, shifts elements or trades
 * its buffer; a cursor captured before that no longer matches and is
 * treated as dangling.
 */

import type { ContractMode, Cursor, ReadonlyCursor } from '../../types/vector.ts';
import type { SlotIndex } from '../../types/branded.ts';
import { addIndex, diffIndex } from '../../types/branded.ts';
import { expectContract, expectLiveCursor } from '../core/contracts.ts';

/**
 * What a cursor needs from the container it points into.
 */
export interface CursorHost<T> {
  readonly size: number;
  readonly generation: number;
  readonly contracts: ContractMode;
  get(index: number): T;
  set(index: number, value: T): void;
}

export class SlotCursor<T> implements Cursor<T> {
  readonly offset: SlotIndex;
  readonly generation: number;
  private readonly host: CursorHost<T>;

  constructor(host: CursorHost<T>, offset: SlotIndex, generation: number = host.generation) {
    this.host = host;
    this.offset = offset;
    this.generation = generation;
  }

  isValid(): boolean {
    return (
      this.generation === this.host.generation &&
      this.offset >= 0 &&
      this.offset <= this.host.size
    );
  }

  belongsTo(owner: object): boolean {
    return this.host === owner;
  }

  get value(): T {
    this.expectDereferenceable('Cursor.value');
    return this.host.get(this.offset);
  }

  set(value: T): void {
    if (!this.expectDereferenceable('Cursor.set')) return;
    this.host.set(this.offset, value);
  }

  next(): SlotCursor<T> {
    return this.advance(1);
  }

  prev(): SlotCursor<T> {
    return this.advance(-1);
  }

  advance(delta: number): SlotCursor<T> {
    return new SlotCursor(this.host, addIndex(this.offset, delta), this.generation);
  }

  distanceTo(other: ReadonlyCursor<T>): number {
    return diffIndex(other.offset, this.offset);
  }

  equals(other: ReadonlyCursor<T>): boolean {
    return (
      other.belongsTo(this.host) &&
      other.generation === this.generation &&
      other.offset === this.offset
    );
  }

  private expectDereferenceable(op: string): boolean {
    const mode = this.host.contracts;
    if (!expectLiveCursor(mode, this.generation === this.host.generation, op)) {
      return false;
    }
    return expectContract(
      mode,
      this.offset >= 0 && this.offset < this.host.size,
      op,
      `cursor offset ${this.offset} is not dereferenceable for size ${this.host.size}`
    );
  }
}
