/**
 * Pool
 *
 * Arena of reusable engine objects. Each slot owns one object for the life
 * of the pool; acquiring an object hands out a {@link PoolHandle} stamped with
 * the slot's generation, and freeing it bumps that generation. A handle kept
 * across a free therefore stops validating, and freeing the same object twice
 * is reported instead of corrupting the free list.
 *
 * @module core/Pool
 */

import { StaleHandleError } from './errors';
import { createLogger } from '@/services/logger';

const logger = createLogger('Pool');

// =============================================================================
// Types
// =============================================================================

export interface PoolHandle {
  readonly slot: number;
  readonly generation: number;
}

/**
 * Objects managed by a {@link Pool}. The pool writes `poolHandle` on
 * acquisition and clears it on release.
 */
export interface Poolable {
  poolHandle: PoolHandle | null;
}

export interface PoolHooks<T> {
  /** Allocate a fresh object for a new slot */
  create: () => T;
  /** Called when the object goes back to the pool */
  onPool?: (item: T) => void;
  /** Called when the object is handed out */
  onUnpool?: (item: T) => void;
}

interface Slot<T> {
  readonly item: T;
  generation: number;
  inUse: boolean;
}

// =============================================================================
// Pool Class
// =============================================================================

export class Pool<T extends Poolable> {
  private readonly slots: Slot<T>[] = [];
  /** Indices of idle slots, most recently freed last */
  private readonly idle: number[] = [];

  constructor(
    readonly name: string,
    private readonly hooks: PoolHooks<T>
  ) {}

  /**
   * Hand out an idle object, allocating a new slot when none is idle.
   */
  get(): T {
    const index = this.idle.pop() ?? this.allocate();
    const slot = this.slots[index];

    slot.inUse = true;
    slot.item.poolHandle = { slot: index, generation: slot.generation };
    this.hooks.onUnpool?.(slot.item);
    return slot.item;
  }

  /**
   * Return an object to the pool.
   *
   * @throws StaleHandleError if the object is not currently checked out of
   *   this pool (already freed, never pooled, or owned by another pool)
   */
  free(item: T): void {
    const handle = item.poolHandle;
    const slot = handle ? this.slots[handle.slot] : undefined;

    if (!handle || !slot || slot.item !== item || !this.isValid(handle)) {
      throw new StaleHandleError(`Object is not checked out of the '${this.name}' pool`);
    }

    slot.generation += 1;
    slot.inUse = false;
    item.poolHandle = null;
    this.hooks.onPool?.(item);
    this.idle.push(handle.slot);
  }

  /**
   * Whether `handle` still designates a checked-out object.
   */
  isValid(handle: PoolHandle): boolean {
    const slot = this.slots[handle.slot];
    return slot !== undefined && slot.inUse && slot.generation === handle.generation;
  }

  /**
   * Number of idle objects waiting to be reused.
   */
  size(): number {
    return this.idle.length;
  }

  /**
   * Number of objects currently checked out.
   */
  inUse(): number {
    return this.slots.length - this.idle.length;
  }

  /**
   * Pre-allocate idle objects until at least `minCapacity` are waiting.
   */
  ensureCapacity(minCapacity: number): void {
    const missing = minCapacity - this.idle.length;
    if (missing <= 0) return;

    for (let i = 0; i < missing; i++) {
      this.idle.push(this.allocate());
    }
    logger.debug('Pool grown', { pool: this.name, idle: this.idle.length, slots: this.slots.length });
  }

  private allocate(): number {
    this.slots.push({ item: this.hooks.create(), generation: 0, inUse: false });
    return this.slots.length - 1;
  }
}
