/**
 * TweenManager
 *
 * Owns a set of root tweens and timelines and drives them from a single
 * frame delta. Finished and killed units are removed and freed on the next
 * update, so callers never have to release what they started.
 *
 * @example
 * ```typescript
 * const manager = new TweenManager();
 * Tween.to(sprite, OPACITY, 500).target(1).start(manager);
 *
 * // in the frame loop
 * manager.update(deltaMillis);
 * ```
 *
 * @module core/TweenManager
 */

import { nanoid } from 'nanoid';
import type { BaseTween } from './BaseTween';
import { InvalidChildError } from './errors';
import { Timeline, type UnitCounts } from './Timeline';
import { createManagerStore, type ManagerStats, type ManagerStoreApi } from '@/stores/managerStore';
import { createLogger } from '@/services/logger';

const logger = createLogger('TweenManager');

// =============================================================================
// Types
// =============================================================================

export interface TweenManagerOptions {
  /** Free units once they finish (killed units are always freed) */
  autoRemove: boolean;
  /** Start units that are added before being started */
  autoStart: boolean;
}

export const DEFAULT_MANAGER_OPTIONS: TweenManagerOptions = {
  autoRemove: true,
  autoStart: true,
};

// =============================================================================
// TweenManager Class
// =============================================================================

export class TweenManager {
  readonly id: string;

  private readonly objects: BaseTween[] = [];
  private readonly options: TweenManagerOptions;
  private readonly store: ManagerStoreApi;
  private _isPaused: boolean = false;

  constructor(options: Partial<TweenManagerOptions> = {}) {
    this.id = nanoid();
    this.options = { ...DEFAULT_MANAGER_OPTIONS, ...options };
    this.store = createManagerStore(this.id);
  }

  // ===========================================================================
  // Management
  // ===========================================================================

  /**
   * Manage `unit`, starting it unless auto-start is disabled. Adding a unit
   * twice has no effect.
   *
   * @throws InvalidChildError if the unit belongs to a timeline
   * @throws UnclosedNestedTreeError or InfiniteRepeatInCompositeError if a
   *   timeline cannot be built; the manager is left unchanged
   */
  add(unit: BaseTween): this {
    if (unit.isAttached()) {
      throw new InvalidChildError('A unit inside a timeline is updated by its timeline');
    }
    if (this.objects.includes(unit)) return this;

    // Build or start first so a rejected tree is never managed
    if (this.options.autoStart && !unit.isStarted()) {
      unit.start();
    } else {
      unit.build();
    }
    this.objects.push(unit);

    this.publishStats();
    return this;
  }

  /**
   * Whether a managed unit (or one of its descendants) animates `target`.
   */
  containsTarget(target: object, tweenType?: number): boolean {
    return this.objects.some((unit) => unit.containsTarget(target, tweenType));
  }

  /**
   * Kill every managed unit; they are freed on the next update.
   */
  killAll(): void {
    for (const unit of this.objects) {
      unit.kill();
    }
    logger.debug('Killed all units', { managerId: this.id, count: this.objects.length });
  }

  /**
   * Kill every managed unit animating `target` (and `tweenType` when given).
   */
  killTarget(target: object, tweenType?: number): void {
    for (const unit of this.objects) {
      unit.killTarget(target, tweenType);
    }
  }

  pause(): void {
    this._isPaused = true;
    this.store.getState().setPaused(true);
  }

  resume(): void {
    this._isPaused = false;
    this.store.getState().setPaused(false);
  }

  isPaused(): boolean {
    return this._isPaused;
  }

  // ===========================================================================
  // Update
  // ===========================================================================

  /**
   * Free finished and killed units, then move every remaining unit by
   * `delta` milliseconds. A negative delta plays the units backward, last
   * added first.
   */
  update(delta: number): void {
    this.sweep();

    if (this._isPaused) {
      this.publishStats();
      return;
    }

    if (delta >= 0) {
      for (let i = 0; i < this.objects.length; i++) {
        this.objects[i].update(delta);
      }
    } else {
      for (let i = this.objects.length - 1; i >= 0; i--) {
        this.objects[i].update(delta);
      }
    }

    this.store.getState().recordTick(delta, this.collectStats());
  }

  private sweep(): void {
    let removed = 0;

    for (let i = this.objects.length - 1; i >= 0; i--) {
      const unit = this.objects[i];
      if (unit.isKilled() || (this.options.autoRemove && unit.isFinished())) {
        this.objects.splice(i, 1);
        unit.free();
        removed += 1;
      }
    }

    if (removed > 0) {
      logger.debug('Removed finished units', { managerId: this.id, removed, remaining: this.objects.length });
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Number of managed root units.
   */
  size(): number {
    return this.objects.length;
  }

  /**
   * Number of tweens managed, directly or inside timelines.
   */
  getRunningTweensCount(): number {
    return this.collectStats().tweenCount;
  }

  /**
   * Number of timelines managed, nested ones included.
   */
  getRunningTimelinesCount(): number {
    return this.collectStats().timelineCount;
  }

  /**
   * Snapshot of the managed root units.
   */
  getObjects(): readonly BaseTween[] {
    return [...this.objects];
  }

  /**
   * Observable state of this manager.
   */
  getStore(): ManagerStoreApi {
    return this.store;
  }

  private collectStats(): ManagerStats {
    const counts: UnitCounts = { tweens: 0, timelines: 0 };
    for (const unit of this.objects) {
      if (unit instanceof Timeline) {
        counts.timelines += 1;
        unit.countDescendants(counts);
      } else {
        counts.tweens += 1;
      }
    }
    return {
      objectCount: this.objects.length,
      tweenCount: counts.tweens,
      timelineCount: counts.timelines,
    };
  }

  private publishStats(): void {
    this.store.getState().setStats(this.collectStats());
  }
}
