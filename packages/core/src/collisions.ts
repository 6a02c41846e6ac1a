/**
 * Opt-in hash collision registry.
 *
 * Remembers the first literal seen for every hash value. A registry can be
 * shared by many preprocessing calls to catch collisions across a whole
 * source tree; callers decide when an entry is committed.
 *
 * @example
 * ```typescript
 * const registry = createCollisionRegistry();
 * registry.record({ hash: 0x0f923099, literal: "hello", fileName: "a.c", offset: 4 });
 * registry.check(0x0f923099, "hello"); // undefined, same literal
 * ```
 */

export interface CollisionEntry {
  hash: number;
  /** Raw literal content, escapes included */
  literal: string;
  fileName: string;
  /** Byte offset of the invocation in its file */
  offset: number;
}

export interface CollisionRegistry extends Iterable<CollisionEntry> {
  /**
   * Find an entry with the same hash but a different literal.
   */
  check(hash: number, literal: string): CollisionEntry | undefined;

  /**
   * Store an entry. An existing entry for the same hash is kept, so the
   * first occurrence is the one reported.
   */
  record(entry: CollisionEntry): void;

  get(hash: number): CollisionEntry | undefined;

  readonly size: number;

  clear(): void;
}

class CollisionRegistryImpl implements CollisionRegistry {
  private store = new Map<number, CollisionEntry>();

  check(hash: number, literal: string): CollisionEntry | undefined {
    const existing = this.store.get(hash);
    if (existing !== undefined && existing.literal !== literal) {
      return existing;
    }
    return undefined;
  }

  record(entry: CollisionEntry): void {
    if (!this.store.has(entry.hash)) {
      this.store.set(entry.hash, entry);
    }
  }

  get(hash: number): CollisionEntry | undefined {
    return this.store.get(hash);
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }

  [Symbol.iterator](): IterableIterator<CollisionEntry> {
    return this.store.values();
  }
}

export function createCollisionRegistry(): CollisionRegistry {
  return new CollisionRegistryImpl();
}

/**
 * A registry layered over `base`. Checks see entries from both layers,
 * while new entries stay in the upper layer until `commit()` copies them
 * into `base`. `clear()` drops the uncommitted entries only.
 */
export interface StagedCollisionRegistry extends CollisionRegistry {
  commit(): void;
}

class StagedCollisionRegistryImpl implements StagedCollisionRegistry {
  private pending = new CollisionRegistryImpl();

  constructor(private readonly base: CollisionRegistry) {}

  check(hash: number, literal: string): CollisionEntry | undefined {
    return this.base.check(hash, literal) ?? this.pending.check(hash, literal);
  }

  record(entry: CollisionEntry): void {
    if (this.base.get(entry.hash) === undefined) {
      this.pending.record(entry);
    }
  }

  get(hash: number): CollisionEntry | undefined {
    return this.base.get(hash) ?? this.pending.get(hash);
  }

  get size(): number {
    return this.base.size + this.pending.size;
  }

  clear(): void {
    this.pending.clear();
  }

  commit(): void {
    for (const entry of this.pending) {
      this.base.record(entry);
    }
    this.pending.clear();
  }

  *[Symbol.iterator](): IterableIterator<CollisionEntry> {
    yield* this.base;
    yield* this.pending;
  }
}

export function stageCollisionRegistry(base: CollisionRegistry): StagedCollisionRegistry {
  return new StagedCollisionRegistryImpl(base);
}
