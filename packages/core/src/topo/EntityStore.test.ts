import { describe, it, expect } from 'vitest';
import { EntityStore } from './EntityStore.js';
import {
  type VertexHandle,
  asVertexHandle,
  packHandle,
  handleIndex,
  handleGeneration,
  INDEX_SPAN,
  MAX_GENERATION,
} from './handles.js';
import { isMeshInvariantError } from './errors.js';

interface Payload {
  label: string;
}

function createStore(): EntityStore<VertexHandle, Payload> {
  return new EntityStore<VertexHandle, Payload>('vertex', asVertexHandle);
}

describe('EntityStore', () => {
  it('should allocate handles in slot order', () => {
    const store = createStore();
    const a = store.allocate({ label: 'a' });
    const b = store.allocate({ label: 'b' });

    expect(a).toBe(0);
    expect(b).toBe(1);
    expect(store.get(b).label).toBe('b');
    expect(store.liveCount).toBe(2);
    expect(store.capacity).toBe(2);
  });

  it('should hand the new handle to allocateWith', () => {
    const store = createStore();
    store.allocate({ label: 'first' });
    const h = store.allocateWith((self) => ({ label: `slot ${self}` }));
    expect(store.get(h).label).toBe('slot 1');
  });

  it('should hand out records that are written through get', () => {
    const store = createStore();
    const h = store.allocate({ label: 'before' });
    store.get(h).label = 'after';
    expect(store.get(h).label).toBe('after');
  });

  it('should reuse freed slots with a bumped generation', () => {
    const store = createStore();
    store.allocate({ label: 'a' });
    const b = store.allocate({ label: 'b' });
    store.free(b);
    const c = store.allocate({ label: 'c' });

    expect(handleIndex(c)).toBe(1);
    expect(handleGeneration(c)).toBe(1);
    expect(c).toBe(1 + INDEX_SPAN);
    expect(store.capacity).toBe(2);
    expect(store.liveCount).toBe(2);
  });

  it('should pack slot indices past 2^24 without touching the generation', () => {
    const handle = packHandle(0x1000005, 3);

    expect(handleIndex(handle)).toBe(0x1000005);
    expect(handleGeneration(handle)).toBe(3);
    expect(Number.isSafeInteger(packHandle(INDEX_SPAN - 1, MAX_GENERATION))).toBe(true);
  });

  it('should retire a slot once its generations run out', () => {
    const store = createStore();
    let last = store.allocate({ label: 'gen 0' });
    for (let i = 0; i < MAX_GENERATION; i++) {
      store.free(last);
      last = store.allocate({ label: 'again' });
    }

    expect(handleIndex(last)).toBe(0);
    expect(handleGeneration(last)).toBe(MAX_GENERATION);
    store.free(last);

    const fresh = store.allocate({ label: 'fresh' });
    expect(fresh).toBe(1);
    expect(store.capacity).toBe(2);
    expect(store.has(last)).toBe(false);
  });

  it('should reject a stale handle with DanglingHandle', () => {
    const store = createStore();
    const a = store.allocate({ label: 'a' });
    store.free(a);
    store.allocate({ label: 'reused' });

    expect(store.has(a)).toBe(false);
    expect(store.tryGet(a)).toBeUndefined();
    try {
      store.get(a);
      expect.unreachable('stale handle resolved');
    } catch (err) {
      expect(isMeshInvariantError(err)).toBe(true);
      if (isMeshInvariantError(err)) {
        expect(err.kind).toBe('DanglingHandle');
        expect(err.message).toBe('DanglingHandle: vertex handle 0 does not resolve');
      }
    }
  });

  it('should reject unknown and malformed handles', () => {
    const store = createStore();
    store.allocate({ label: 'a' });
    expect(store.has(asVertexHandle(5))).toBe(false);
    expect(store.has(asVertexHandle(-1))).toBe(false);
    expect(store.has(asVertexHandle(0.5))).toBe(false);
  });

  it('should not free the same handle twice', () => {
    const store = createStore();
    const a = store.allocate({ label: 'a' });
    store.free(a);
    expect(() => store.free(a)).toThrow('DanglingHandle');
    expect(store.liveCount).toBe(0);
  });

  it('should list live handles in slot order', () => {
    const store = createStore();
    const a = store.allocate({ label: 'a' });
    const b = store.allocate({ label: 'b' });
    const c = store.allocate({ label: 'c' });
    store.free(b);
    expect([...store.handles()]).toEqual([a, c]);
  });
});
