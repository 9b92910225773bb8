/**
 * Key-Value Store
 *
 * Byte-keyed storage interface used by every oracle operation, plus an
 * in-memory implementation for tests and ephemeral runs.
 *
 * Writes made inside transaction() become visible to later reads of the same
 * transaction and are committed only when the callback returns; a throw
 * discards all of them.
 */

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Read-only view of a store (what queries receive)
 */
export interface IReadonlyKeyValueStore {
  get(key: Uint8Array): Uint8Array | undefined;
}

/**
 * Read-write store (what commands receive)
 */
export interface IKeyValueStore extends IReadonlyKeyValueStore {
  set(key: Uint8Array, value: Uint8Array): void;
  /**
   * Run fn atomically. A nested call that throws undoes only its own writes.
   */
  transaction<T>(fn: () => T): T;
}

// ============================================================================
// MemoryKeyValueStore Implementation
// ============================================================================

function toMapKey(key: Uint8Array): string {
  return Buffer.from(key).toString('hex');
}

/**
 * In-memory store. Values are copied on the way in and out so callers can
 * never alias stored bytes.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
  private readonly data = new Map<string, Uint8Array>();
  /** Staged writes of the open transaction */
  private pending: Map<string, Uint8Array> | null = null;

  get(key: Uint8Array): Uint8Array | undefined {
    const mapKey = toMapKey(key);

    const value = this.pending?.get(mapKey) ?? this.data.get(mapKey);
    return value ? new Uint8Array(value) : undefined;
  }

  set(key: Uint8Array, value: Uint8Array): void {
    const copy = new Uint8Array(value);
    if (this.pending) {
      this.pending.set(toMapKey(key), copy);
    } else {
      this.data.set(toMapKey(key), copy);
    }
  }

  transaction<T>(fn: () => T): T {
    if (this.pending) {
      // Nested: behave like a savepoint
      const savepoint = new Map(this.pending);
      try {
        return fn();
      } catch (error) {
        this.pending = savepoint;
        throw error;
      }
    }

    this.pending = new Map<string, Uint8Array>();
    try {
      const result = fn();
      for (const [mapKey, value] of this.pending) {
        this.data.set(mapKey, value);
      }
      return result;
    } finally {
      this.pending = null;
    }
  }

  /** Number of committed entries */
  get size(): number {
    return this.data.size;
  }
}
