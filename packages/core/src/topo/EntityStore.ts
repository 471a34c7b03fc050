/**
 * Generational arena for one entity type
 *
 * Records live in slots. A handle names a slot together with the generation
 * the slot had when the record was allocated; freeing a slot bumps its
 * generation and puts it on a freelist, so a handle kept past `free` fails
 * with `DanglingHandle` instead of resolving to whatever reuses the slot.
 */

import { type EntityKind, INDEX_SPAN, MAX_GENERATION, packHandle, handleIndex, handleGeneration } from './handles.js';
import { MeshInvariantError } from './errors.js';

export class EntityStore<H extends number, R> {
  private _records: (R | undefined)[] = [];
  private _generations: number[] = [];
  private _free: number[] = [];
  private _liveCount = 0;

  constructor(
    readonly kind: EntityKind,
    private readonly _brand: (raw: number) => H
  ) {}

  /** Number of live records */
  get liveCount(): number {
    return this._liveCount;
  }

  /** Number of slots ever created (live or free) */
  get capacity(): number {
    return this._records.length;
  }

  /**
   * Store a record and return its handle
   */
  allocate(record: R): H {
    return this.allocateWith(() => record);
  }

  /**
   * Allocate a slot and build the record with its own handle in hand, so link
   * fields can start out self-referential and be patched later.
   */
  allocateWith(init: (handle: H) => R): H {
    let index: number;
    const reused = this._free.pop();
    if (reused !== undefined) {
      index = reused;
    } else {
      index = this._records.length;
      if (index >= INDEX_SPAN) {
        throw new RangeError(`${this.kind} store is full (${INDEX_SPAN} slots)`);
      }
      this._records.push(undefined);
      this._generations.push(0);
    }
    const handle = this._brand(packHandle(index, this._generations[index]));
    this._records[index] = init(handle);
    this._liveCount++;
    return handle;
  }

  /**
   * Resolve a handle, throwing `DanglingHandle` if it is stale or unknown
   */
  get(handle: H): R {
    const record = this.tryGet(handle);
    if (record === undefined) {
      throw new MeshInvariantError(`DanglingHandle`, `${this.kind} handle ${handle} does not resolve`, {
        kind: this.kind,
        handle,
      });
    }
    return record;
  }

  tryGet(handle: H): R | undefined {
    const index = handleIndex(handle);
    if (!Number.isInteger(handle) || handle < 0 || index >= this._records.length) {
      return undefined;
    }
    if (this._generations[index] !== handleGeneration(handle)) {
      return undefined;
    }
    return this._records[index];
  }

  has(handle: H): boolean {
    return this.tryGet(handle) !== undefined;
  }

  /**
   * Release a record. Its handle (and any copy of it) stops resolving.
   * A slot that has run out of generations is never handed out again.
   */
  free(handle: H): void {
    this.get(handle);
    const index = handleIndex(handle);
    this._records[index] = undefined;
    this._generations[index]++;
    if (this._generations[index] <= MAX_GENERATION) {
      this._free.push(index);
    }
    this._liveCount--;
  }

  /**
   * Live handles in slot order
   */
  *handles(): Generator<H> {
    for (let i = 0; i < this._records.length; i++) {
      if (this._records[i] !== undefined) {
        yield this._brand(packHandle(i, this._generations[i]));
      }
    }
  }
}
