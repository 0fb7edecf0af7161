/**
 * Timeline
 *
 * Composite timed unit: an ordered group of tweens and nested timelines
 * played either one after the other (sequence) or all together (parallel).
 *
 * The builder API assembles the tree; `build()` turns each child's relative
 * timing into an absolute delay inside its parent; `update()` fans time out
 * to the children, honoring repeat and yoyo of the timeline itself.
 *
 * @example
 * ```typescript
 * Timeline.createSequence()
 *   .push(Tween.set(sprite, OPACITY).target(0))
 *   .beginParallel()
 *     .push(Tween.to(sprite, OPACITY, 500).target(1))
 *     .push(Tween.to(sprite, SCALE, 500).target(1, 1))
 *   .end()
 *   .pushPause(1000)
 *   .push(Tween.to(sprite, ROTATION, 500).target(360))
 *   .repeat(5, 500)
 *   .start(manager);
 * ```
 *
 * @module core/Timeline
 */

import { BaseTween } from './BaseTween';
import {
  DanglingOpenGroupError,
  InfiniteRepeatInCompositeError,
  InvalidChildError,
  StructuralMutationAfterBuildError,
  UnclosedNestedTreeError,
} from './errors';
import { Pool } from './Pool';
import { Tween } from './Tween';
import type { TweenManager } from './TweenManager';
import { isPoolingEnabled } from '@/config/engineConfig';
import { TimeOffsetMs, parseParameter } from '@/schemas/engineSchemas';
import { createLogger } from '@/services/logger';

const logger = createLogger('Timeline');

// =============================================================================
// Types
// =============================================================================

export type TimelineMode = 'sequence' | 'parallel';

/** Running totals filled by {@link Timeline.countDescendants} */
export interface UnitCounts {
  tweens: number;
  timelines: number;
}

// =============================================================================
// Timeline Class
// =============================================================================

export class Timeline extends BaseTween {
  // ---------------------------------------------------------------------------
  // Pool
  // ---------------------------------------------------------------------------

  private static readonly pool = new Pool<Timeline>('Timeline', {
    create: () => new Timeline(),
    onPool: (timeline) => timeline.reset(),
    onUnpool: (timeline) => {
      timeline._isPooled = true;
    },
  });

  /**
   * Number of idle timelines waiting in the pool.
   */
  static getPoolSize(): number {
    return Timeline.pool.size();
  }

  static ensurePoolCapacity(minCapacity: number): void {
    Timeline.pool.ensureCapacity(minCapacity);
  }

  // ---------------------------------------------------------------------------
  // Factories
  // ---------------------------------------------------------------------------

  /**
   * Timeline whose children play one after the other.
   */
  static createSequence(): Timeline {
    return Timeline.acquire('sequence');
  }

  /**
   * Timeline whose children all start together.
   */
  static createParallel(): Timeline {
    return Timeline.acquire('parallel');
  }

  private static acquire(mode: TimelineMode): Timeline {
    const timeline = isPoolingEnabled() ? Timeline.pool.get() : new Timeline();
    timeline._mode = mode;
    return timeline;
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private _mode: TimelineMode = 'sequence';
  private readonly _children: BaseTween[] = [];
  /** Nested groups opened by the builder and not yet closed, innermost last */
  private _openGroups: Timeline[] = [];
  private _isBuilt: boolean = false;

  private constructor() {
    super();
  }

  protected reset(): void {
    super.reset();
    this._mode = 'sequence';
    this._children.length = 0;
    this._openGroups = [];
    this._isBuilt = false;
  }

  // ===========================================================================
  // Builder
  // ===========================================================================

  /**
   * Append a tween or a fully closed timeline to the current group.
   */
  push(unit: BaseTween): this {
    this.assertNotBuilt('push');

    if (unit === this) {
      throw new InvalidChildError('A timeline cannot contain itself');
    }
    if (unit.isAttached()) {
      throw new InvalidChildError('The unit already belongs to a timeline');
    }
    if (unit.isStarted()) {
      throw new InvalidChildError('A started unit cannot be added to a timeline');
    }
    if (unit instanceof Timeline && unit._openGroups.length > 0) {
      throw new UnclosedNestedTreeError(unit._openGroups.length);
    }

    this.adopt(unit);
    return this;
  }

  /**
   * Append a pause. A negative pause makes the following child overlap the
   * preceding one.
   */
  pushPause(durationMillis: number): this {
    this.assertNotBuilt('pushPause');
    const pause = parseParameter(TimeOffsetMs, durationMillis, 'pause');
    this.adopt(Tween.mark().delay(pause));
    return this;
  }

  /**
   * Open a nested sequence; close it with {@link end}.
   */
  beginSequence(): this {
    return this.beginGroup('sequence');
  }

  /**
   * Open a nested parallel group; close it with {@link end}.
   */
  beginParallel(): this {
    return this.beginGroup('parallel');
  }

  /**
   * Close the innermost open group.
   */
  end(): this {
    this.assertNotBuilt('end');
    if (this._openGroups.length === 0) {
      throw new DanglingOpenGroupError();
    }
    this._openGroups.pop();
    return this;
  }

  /**
   * Children of the group currently open for insertion (the timeline itself
   * when no group is open). Frozen once the timeline is built.
   */
  getChildren(): readonly BaseTween[] {
    const children = this.currentGroup()._children;
    return this._isBuilt ? Object.freeze([...children]) : children;
  }

  getMode(): TimelineMode {
    return this._mode;
  }

  isBuilt(): boolean {
    return this._isBuilt;
  }

  private currentGroup(): Timeline {
    return this._openGroups[this._openGroups.length - 1] ?? this;
  }

  private beginGroup(mode: TimelineMode): this {
    this.assertNotBuilt(mode === 'sequence' ? 'beginSequence' : 'beginParallel');
    const group = Timeline.acquire(mode);
    this.adopt(group);
    this._openGroups.push(group);
    return this;
  }

  private adopt(unit: BaseTween): void {
    unit.attach();
    this.currentGroup()._children.push(unit);
  }

  private assertNotBuilt(operation: string): void {
    if (this._isBuilt) {
      throw new StructuralMutationAfterBuildError(operation);
    }
  }

  // ===========================================================================
  // Build
  // ===========================================================================

  /**
   * Give every child its absolute start inside this timeline and compute the
   * timeline's duration. Runs once; later calls do nothing.
   *
   * @throws UnclosedNestedTreeError if a nested group is still open
   * @throws InfiniteRepeatInCompositeError if any descendant repeats forever;
   *   no delay is modified in that case
   */
  build(): this {
    if (this._isBuilt) return this;

    if (this._openGroups.length > 0) {
      throw new UnclosedNestedTreeError(this._openGroups.length);
    }
    this.assertFiniteChildren();

    let total = 0;
    for (const child of this._children) {
      child.build();

      if (this._mode === 'sequence') {
        const offset = total;
        total += child.getFullDuration();
        child.offsetDelay(offset);
      } else {
        total = Math.max(total, child.getFullDuration());
      }
    }

    this._duration = total;
    this._isBuilt = true;

    logger.debug('Timeline built', {
      mode: this._mode,
      duration: total,
      children: this._children.length,
    });
    return this;
  }

  private assertFiniteChildren(): void {
    for (const child of this._children) {
      if (child.getRepeatCount() < 0) {
        throw new InfiniteRepeatInCompositeError();
      }
      if (child instanceof Timeline && !child._isBuilt) {
        child.assertFiniteChildren();
      }
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  start(manager?: TweenManager): this {
    if (manager) {
      manager.add(this);
      return this;
    }

    super.start();
    for (const child of this._children) {
      child.start();
    }
    return this;
  }

  /**
   * Free the children, most recent first, then return to the pool.
   */
  free(): void {
    logger.debug('Freeing timeline', { mode: this._mode, descendants: this.getChildrenCount() });

    let child = this._children.pop();
    while (child) {
      child.free();
      child = this._children.pop();
    }
    this._openGroups = [];

    if (this._isPooled) {
      Timeline.pool.free(this);
    }
  }

  // ===========================================================================
  // Target Queries
  // ===========================================================================

  getChildrenCount(): number {
    let count = 0;
    for (const child of this._children) {
      count += 1 + child.getChildrenCount();
    }
    return count;
  }

  /**
   * Add every descendant tween and timeline to `counts`, whether or not a
   * group is still open.
   */
  countDescendants(counts: UnitCounts): void {
    for (const child of this._children) {
      if (child instanceof Timeline) {
        counts.timelines += 1;
        child.countDescendants(counts);
      } else {
        counts.tweens += 1;
      }
    }
  }

  containsTarget(target: object, tweenType?: number): boolean {
    return this._children.some((child) => child.containsTarget(target, tweenType));
  }

  // ===========================================================================
  // Update
  // ===========================================================================

  protected initializeOverride(): void {}

  protected computeOverride(iteration: number, lastIteration: number, delta: number): void {
    const yoyo = this.isIterationYoyo(iteration);
    let millis: number;

    if (iteration > lastIteration) {
      this.forceStartValues(iteration);
      millis = yoyo ? -this._currentTime : this._currentTime;
    } else if (iteration < lastIteration) {
      this.forceEndValues(iteration);
      millis = yoyo ? this._duration - this._currentTime : this._currentTime - this._duration;
    } else {
      millis = yoyo ? -delta : delta;
    }

    if (delta >= 0) {
      for (let i = 0; i < this._children.length; i++) {
        this._children[i].update(millis);
      }
    } else {
      for (let i = this._children.length - 1; i >= 0; i--) {
        this._children[i].update(millis);
      }
    }
  }

  protected forceStartValues(iteration: number): void {
    const reversed = this.isIterationYoyo(iteration);
    for (const child of this._children) {
      if (reversed) child.forceToEnd(this._duration);
      else child.forceToStart();
    }
  }

  protected forceEndValues(iteration: number): void {
    const reversed = this.isIterationYoyo(iteration);
    for (const child of this._children) {
      if (reversed) child.forceToStart();
      else child.forceToEnd(this._duration);
    }
  }
}
