/**
 * BaseTween
 *
 * Timing and lifecycle contract shared by every timed unit of the engine:
 * leaf {@link Tween}s and composite {@link Timeline}s.
 *
 * A unit keeps a single `position`: the time elapsed since `start()`,
 * delay included. It is never clamped, so a child can sit past its own end
 * while its parent keeps running, and rewinding by the same amount brings it
 * back exactly where it was. Everything else (iteration, time inside the
 * iteration, begun/finished state, callbacks) is derived from the position:
 *
 * ```
 *  delay        iteration 0      repeat delay   iteration 1
 * |-------|=====================|............|=====================|
 *         s0                    e0           s1                    e1
 * ```
 *
 * Position 0 is the state `start()` leaves the unit in, before any motion.
 * Past it, a position exactly on a boundary belongs to the iteration that
 * just ended, a position exactly on `s0` is still "before" the unit, and a
 * zero-length iteration counts as played as soon as its start is reached.
 *
 * @module core/BaseTween
 */

import { TweenEvent, type CallbackRegistration, type TweenCallback, type TweenEventType } from './callbacks';
import { StructuralMutationAfterBuildError } from './errors';
import type { PoolHandle, Poolable } from './Pool';
import type { TweenManager } from './TweenManager';
import { DurationMs, RepeatCount, TimeOffsetMs, parseParameter } from '@/schemas/engineSchemas';
import { createLogger, serializeError } from '@/services/logger';

const logger = createLogger('BaseTween');

// =============================================================================
// Types
// =============================================================================

/** Where a position falls relative to the unit's active span */
export type TweenRegion = 'before' | 'running' | 'after';

export interface TweenLocation {
  readonly region: TweenRegion;
  /** Iteration index, clamped to `[0, repeatCount]` for finite repeats */
  readonly iteration: number;
  /** Time elapsed inside the iteration, in `[0, duration]` */
  readonly within: number;
}

function sameLocation(a: TweenLocation, b: TweenLocation): boolean {
  return a.region === b.region && a.iteration === b.iteration && a.within === b.within;
}

// =============================================================================
// BaseTween Class
// =============================================================================

export abstract class BaseTween implements Poolable {
  // ---------------------------------------------------------------------------
  // Timing
  // ---------------------------------------------------------------------------

  protected _delay: number = 0;
  protected _duration: number = 0;
  protected _repeatCount: number = 0;
  protected _repeatDelay: number = 0;
  protected _isYoyo: boolean = false;

  // ---------------------------------------------------------------------------
  // Playback State
  // ---------------------------------------------------------------------------

  protected _position: number = 0;
  protected _currentTime: number = 0;
  protected _iteration: number = 0;
  protected _region: TweenRegion = 'before';
  protected _isStarted: boolean = false;
  protected _isInitialized: boolean = false;
  protected _isFinished: boolean = false;
  private _isKilled: boolean = false;
  private _isPaused: boolean = false;
  private _hasBegun: boolean = false;
  private _hasBackBegun: boolean = false;

  // ---------------------------------------------------------------------------
  // Misc
  // ---------------------------------------------------------------------------

  private _callbacks: CallbackRegistration[] = [];
  private _userData: unknown = null;
  private _isAttached: boolean = false;
  protected _isPooled: boolean = false;

  poolHandle: PoolHandle | null = null;

  // ===========================================================================
  // Reset
  // ===========================================================================

  /**
   * Clear every field back to a fresh state. Called when a unit returns to
   * its pool.
   */
  protected reset(): void {
    this._delay = 0;
    this._duration = 0;
    this._repeatCount = 0;
    this._repeatDelay = 0;
    this._isYoyo = false;

    this._position = 0;
    this._currentTime = 0;
    this._iteration = 0;
    this._region = 'before';
    this._isStarted = false;
    this._isInitialized = false;
    this._isFinished = false;
    this._isKilled = false;
    this._isPaused = false;
    this._hasBegun = false;
    this._hasBackBegun = false;

    this._callbacks = [];
    this._userData = null;
    this._isAttached = false;
    this._isPooled = false;
  }

  // ===========================================================================
  // Fluent Setup
  // ===========================================================================

  /**
   * Delay before the first iteration, in milliseconds. May be negative.
   */
  delay(millis: number): this {
    this.assertNotStarted('delay');
    this._delay += parseParameter(TimeOffsetMs, millis, 'delay');
    return this;
  }

  /**
   * Repeat the unit `count` more times (`-1` for ever), waiting `delayMillis`
   * between iterations.
   */
  repeat(count: number, delayMillis: number = 0): this {
    this.assertNotStarted('repeat');
    this._repeatCount = parseParameter(RepeatCount, count, 'repeat count');
    this._repeatDelay = parseParameter(DurationMs, delayMillis, 'repeat delay');
    this._isYoyo = false;
    return this;
  }

  /**
   * Like {@link repeat}, but every odd iteration plays backward.
   */
  repeatYoyo(count: number, delayMillis: number = 0): this {
    this.repeat(count, delayMillis);
    this._isYoyo = true;
    return this;
  }

  /**
   * Register `callback` for every event type set in `triggers`.
   */
  addCallback(triggers: number, callback: TweenCallback): this {
    this._callbacks.push({ triggers, callback });
    return this;
  }

  clearCallbacks(): this {
    this._callbacks = [];
    return this;
  }

  setUserData(data: unknown): this {
    this._userData = data;
    return this;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Compute derived timings. Leaves have nothing to compute.
   */
  build(): this {
    return this;
  }

  /**
   * Start the unit standalone (`start()`), or hand it to a manager that will
   * start and update it (`start(manager)`).
   */
  start(manager?: TweenManager): this {
    if (manager) {
      manager.add(this);
      return this;
    }

    this.build();
    this._position = 0;
    this.applyLocation(this.locate(0));
    this._isStarted = true;
    this._isInitialized = false;
    this._isFinished = false;
    this._hasBegun = false;
    this._hasBackBegun = false;
    return this;
  }

  /**
   * Stop the unit; its manager removes it on the next update.
   */
  kill(): void {
    this._isKilled = true;
    logger.debug('Unit killed', { children: this.getChildrenCount() });
  }

  pause(): void {
    this._isPaused = true;
  }

  resume(): void {
    this._isPaused = false;
  }

  /**
   * Release the unit (and, for composites, its children) to the pool.
   */
  abstract free(): void;

  // ===========================================================================
  // Update
  // ===========================================================================

  /**
   * Move the unit by `delta` milliseconds (negative to rewind).
   */
  update(delta: number): void {
    if (!this._isStarted || this._isPaused || this._isKilled) return;

    const from = this._position;
    const previous = this.locate(from);
    this._position = from + delta;
    const next = this.locate(this._position);

    if (!this._isInitialized && next.region !== 'before') {
      this.initialize();
    }

    if (this._isInitialized && !sameLocation(previous, next)) {
      this.applyLocation(next);
      const innerDelta = previous.iteration === next.iteration ? next.within - previous.within : delta;
      this.computeOverride(next.iteration, previous.iteration, innerDelta);
    } else {
      this.applyLocation(next);
    }

    this._isFinished = next.region === 'after';

    if (delta !== 0) {
      this.dispatchCrossings(from, this._position);
    }
  }

  /**
   * Snap to the state before any motion.
   */
  forceToStart(): void {
    this._position = 0;
    this.applyLocation(this.locate(0));
    this._isFinished = false;
    this.forceStartValues(0);
  }

  /**
   * Snap to the end of the last iteration, placing the unit at `time`
   * (its parent's duration) so that later relative updates stay aligned.
   */
  forceToEnd(time: number): void {
    if (!this._isInitialized) {
      this.initialize();
    }
    this._position = time;
    const location = this.locate(time);
    this.applyLocation(location);
    this._isFinished = location.region === 'after';
    this.forceEndValues(Math.max(this._repeatCount, 0));
  }

  // ===========================================================================
  // Hooks For Subclasses
  // ===========================================================================

  /** Called once, when the unit first leaves its delay */
  protected abstract initializeOverride(): void;

  /**
   * Apply the state reached by the last update.
   *
   * @param iteration - iteration the unit is in now
   * @param lastIteration - iteration before the update
   * @param delta - time elapsed inside the iteration when the iteration did
   *   not change; otherwise the raw frame delta, whose sign gives the
   *   direction
   */
  protected abstract computeOverride(iteration: number, lastIteration: number, delta: number): void;

  protected abstract forceStartValues(iteration: number): void;

  protected abstract forceEndValues(iteration: number): void;

  /**
   * Whether this unit (or any of its descendants) animates `target`, and
   * `tweenType` when given.
   */
  abstract containsTarget(target: object, tweenType?: number): boolean;

  /**
   * Kill the unit if it animates `target` (and `tweenType` when given).
   */
  killTarget(target: object, tweenType?: number): void {
    if (this.containsTarget(target, tweenType)) {
      this.kill();
    }
  }

  /**
   * Number of descendant units.
   */
  getChildrenCount(): number {
    return 0;
  }

  // ===========================================================================
  // Parent Contract
  // ===========================================================================

  /**
   * Shift the unit's start. Reserved to the composite that owns the unit.
   *
   * @internal
   */
  offsetDelay(millis: number): void {
    this._delay += millis;
  }

  /**
   * Mark the unit as owned by a composite.
   *
   * @internal
   */
  attach(): void {
    this._isAttached = true;
  }

  isAttached(): boolean {
    return this._isAttached;
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  getDelay(): number {
    return this._delay;
  }

  /** Duration of one iteration */
  getDuration(): number {
    return this._duration;
  }

  getRepeatCount(): number {
    return this._repeatCount;
  }

  getRepeatDelay(): number {
    return this._repeatDelay;
  }

  /**
   * Delay plus every iteration and every repeat delay; `Infinity` for
   * infinite repetitions.
   */
  getFullDuration(): number {
    if (this._repeatCount < 0) return Infinity;
    return this._delay + this._duration * (this._repeatCount + 1) + this._repeatDelay * this._repeatCount;
  }

  /** Time elapsed inside the current iteration */
  getCurrentTime(): number {
    return this._currentTime;
  }

  /** Time elapsed since start, delay included */
  getPosition(): number {
    return this._position;
  }

  getIteration(): number {
    return this._iteration;
  }

  getUserData(): unknown {
    return this._userData;
  }

  isStarted(): boolean {
    return this._isStarted;
  }

  isInitialized(): boolean {
    return this._isInitialized;
  }

  isFinished(): boolean {
    return this._isFinished;
  }

  isKilled(): boolean {
    return this._isKilled;
  }

  isPaused(): boolean {
    return this._isPaused;
  }

  isYoyo(): boolean {
    return this._isYoyo;
  }

  isPooled(): boolean {
    return this._isPooled;
  }

  /**
   * Whether `iteration` plays backward (odd iterations of a yoyo unit).
   */
  isIterationYoyo(iteration: number): boolean {
    return this._isYoyo && Math.abs(iteration % 2) === 1;
  }

  // ===========================================================================
  // Location
  // ===========================================================================

  /**
   * Resolve a position (time since start) into region, iteration and time
   * inside the iteration.
   */
  locate(position: number): TweenLocation {
    const local = position - this._delay;

    if (position === 0 || local < 0 || (local === 0 && this._duration > 0)) {
      return { region: 'before', iteration: 0, within: 0 };
    }

    if (local >= this.getActiveDuration()) {
      return { region: 'after', iteration: this._repeatCount, within: this._duration };
    }

    const period = this._duration + this._repeatDelay;
    let iteration = period > 0 ? Math.ceil(local / period) - 1 : 0;
    if (this._repeatCount >= 0) {
      iteration = Math.min(Math.max(iteration, 0), this._repeatCount);
    }
    const within = Math.min(local - iteration * period, this._duration);

    return { region: 'running', iteration, within };
  }

  protected assertNotStarted(operation: string): void {
    if (this._isStarted) {
      throw new StructuralMutationAfterBuildError(operation);
    }
  }

  private getActiveDuration(): number {
    if (this._repeatCount < 0) return Infinity;
    return this._duration * (this._repeatCount + 1) + this._repeatDelay * this._repeatCount;
  }

  private applyLocation(location: TweenLocation): void {
    this._region = location.region;
    this._iteration = location.iteration;
    this._currentTime = location.within;
  }

  private initialize(): void {
    this._isInitialized = true;
    this.initializeOverride();
  }

  // ===========================================================================
  // Callbacks
  // ===========================================================================

  private hasPassedStart(position: number, mark: number): boolean {
    if (position === 0) return false;
    const local = position - this._delay;
    return this._duration > 0 ? local > mark : local >= mark;
  }

  private hasPassedEnd(position: number, mark: number): boolean {
    return position !== 0 && position - this._delay >= mark;
  }

  /**
   * Emit the events for every iteration boundary crossed between two
   * positions, in the order they were crossed.
   */
  private dispatchCrossings(fromPosition: number, toPosition: number): void {
    if (this._callbacks.length === 0) return;

    const from = fromPosition - this._delay;
    const to = toPosition - this._delay;

    const period = this._duration + this._repeatDelay;
    const last = this._repeatCount;
    let lowest = 0;
    let highest: number;

    if (period > 0) {
      lowest = Math.max(0, Math.floor(Math.min(from, to) / period) - 1);
      highest = Math.ceil(Math.max(from, to) / period) + 1;
      if (last >= 0) highest = Math.min(highest, last);
    } else {
      highest = Math.max(last, 0);
    }

    if (toPosition > fromPosition) {
      for (let i = lowest; i <= highest; i++) {
        const start = i * period;
        const end = start + this._duration;

        if (!this.hasPassedStart(fromPosition, start) && this.hasPassedStart(toPosition, start)) {
          if (!this._hasBegun) {
            this._hasBegun = true;
            this.emit(TweenEvent.BEGIN);
          }
          this.emit(TweenEvent.START);
        }
        if (!this.hasPassedEnd(fromPosition, end) && this.hasPassedEnd(toPosition, end)) {
          this.emit(TweenEvent.END);
          if (i === last) this.emit(TweenEvent.COMPLETE);
        }
      }
      return;
    }

    for (let i = highest; i >= lowest; i--) {
      const start = i * period;
      const end = start + this._duration;

      if (this.hasPassedEnd(fromPosition, end) && !this.hasPassedEnd(toPosition, end)) {
        if (i === last && !this._hasBackBegun) {
          this._hasBackBegun = true;
          this.emit(TweenEvent.BACK_BEGIN);
        }
        this.emit(TweenEvent.BACK_START);
      }
      if (this.hasPassedStart(fromPosition, start) && !this.hasPassedStart(toPosition, start)) {
        this.emit(TweenEvent.BACK_END);
        if (i === 0) this.emit(TweenEvent.BACK_COMPLETE);
      }
    }
  }

  private emit(type: TweenEventType): void {
    for (const registration of this._callbacks) {
      if ((registration.triggers & type) === 0) continue;

      try {
        registration.callback(type, this);
      } catch (error) {
        logger.error('Tween callback threw', { eventType: type, error: serializeError(error) });
        throw error;
      }
    }
  }
}
