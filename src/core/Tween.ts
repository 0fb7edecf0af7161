/**
 * Tween
 *
 * Leaf timed unit: interpolates one or more numeric attributes of a target
 * object, read and written through a {@link TweenAccessor}. Tweens are
 * created with the static factories and recycled through a pool.
 *
 * @example
 * ```typescript
 * Tween.registerAccessor(Sprite, spriteAccessor);
 *
 * Tween.to(sprite, SpriteAttr.POSITION_XY, 500)
 *   .target(100, 200)
 *   .ease('quad_in_out')
 *   .repeatYoyo(1, 100)
 *   .start(manager);
 * ```
 *
 * @module core/Tween
 */

import { BaseTween } from './BaseTween';
import { TweenEvent, type TweenCallback } from './callbacks';
import { AttributeLimitError, MissingAccessorError } from './errors';
import { Pool } from './Pool';
import { getEngineConfig, isPoolingEnabled } from '@/config/engineConfig';
import { AttributeValue, DurationMs, parseParameter } from '@/schemas/engineSchemas';
import { resolveEasing, type Easing, type EasingFunction } from '@/utils/easing';

// =============================================================================
// Accessors
// =============================================================================

/**
 * Reads and writes the tweened attributes of one kind of target.
 * `tweenType` selects which attribute group is meant.
 */
export interface TweenAccessor<T extends object> {
  /**
   * Write the current values into `returnValues` and return how many there are.
   */
  getValues(target: T, tweenType: number, returnValues: number[]): number;
  setValues(target: T, tweenType: number, newValues: readonly number[]): void;
}

/** Any class whose instances can be tweened */
export type TweenTargetClass<T extends object> = abstract new (...args: never[]) => T;

const accessors: Map<unknown, TweenAccessor<object>> = new Map();

/**
 * Find the accessor registered for the target's class or the nearest
 * registered ancestor class.
 */
function findAccessor(target: object): TweenAccessor<object> | null {
  let prototype: unknown = Object.getPrototypeOf(target);

  while (typeof prototype === 'object' && prototype !== null) {
    const accessor = 'constructor' in prototype ? accessors.get(prototype.constructor) : undefined;
    if (accessor) return accessor;
    prototype = Object.getPrototypeOf(prototype);
  }

  return null;
}

function describeTarget(target: object): string {
  const prototype: unknown = Object.getPrototypeOf(target);
  if (typeof prototype === 'object' && prototype !== null && 'constructor' in prototype) {
    const ctor = prototype.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
  }
  return 'Object';
}

// =============================================================================
// Tween Class
// =============================================================================

export class Tween extends BaseTween {
  // ---------------------------------------------------------------------------
  // Pool
  // ---------------------------------------------------------------------------

  private static readonly pool = new Pool<Tween>('Tween', {
    create: () => new Tween(),
    onPool: (tween) => tween.reset(),
    onUnpool: (tween) => {
      tween._isPooled = true;
    },
  });

  /**
   * Number of idle tweens waiting in the pool.
   */
  static getPoolSize(): number {
    return Tween.pool.size();
  }

  static ensurePoolCapacity(minCapacity: number): void {
    Tween.pool.ensureCapacity(minCapacity);
  }

  // ---------------------------------------------------------------------------
  // Accessor Registry
  // ---------------------------------------------------------------------------

  /**
   * Register the accessor used for every instance of `targetClass` (and of
   * its subclasses that have no accessor of their own).
   */
  static registerAccessor<T extends object>(targetClass: TweenTargetClass<T>, accessor: TweenAccessor<T>): void {
    accessors.set(targetClass, accessor);
  }

  static getRegisteredAccessor<T extends object>(targetClass: TweenTargetClass<T>): TweenAccessor<object> | null {
    return accessors.get(targetClass) ?? null;
  }

  static unregisterAccessor<T extends object>(targetClass: TweenTargetClass<T>): void {
    accessors.delete(targetClass);
  }

  // ---------------------------------------------------------------------------
  // Factories
  // ---------------------------------------------------------------------------

  /**
   * Animate attributes from their current values to the given targets.
   */
  static to<T extends object>(target: T, tweenType: number, duration: number, accessor?: TweenAccessor<T>): Tween {
    return Tween.create(target, tweenType, duration, accessor);
  }

  /**
   * Animate attributes from the given values to their current values.
   */
  static from<T extends object>(target: T, tweenType: number, duration: number, accessor?: TweenAccessor<T>): Tween {
    const tween = Tween.create(target, tweenType, duration, accessor);
    tween._isFrom = true;
    return tween;
  }

  /**
   * Set attributes instantly when reached.
   */
  static set<T extends object>(target: T, tweenType: number, accessor?: TweenAccessor<T>): Tween {
    return Tween.create(target, tweenType, 0, accessor);
  }

  /**
   * Invoke `callback` when reached.
   */
  static call(callback: TweenCallback): Tween {
    return Tween.mark().addCallback(TweenEvent.START, callback);
  }

  /**
   * Empty unit, used for pauses and as a callback anchor.
   */
  static mark(): Tween {
    return Tween.acquire();
  }

  private static create<T extends object>(
    target: T,
    tweenType: number,
    duration: number,
    explicitAccessor?: TweenAccessor<T>
  ): Tween {
    const validDuration = parseParameter(DurationMs, duration, 'duration');
    const accessor: TweenAccessor<object> | null = explicitAccessor ?? findAccessor(target);
    if (!accessor) {
      throw new MissingAccessorError(describeTarget(target));
    }

    const buffer: number[] = [];
    const count = accessor.getValues(target, tweenType, buffer);
    const limit = getEngineConfig().combinedAttributesLimit;
    if (count > limit) {
      throw new AttributeLimitError(count, limit);
    }

    const tween = Tween.acquire();
    tween._target = target;
    tween._tweenType = tweenType;
    tween._accessor = accessor;
    tween._attributeCount = count;
    tween._duration = validDuration;
    return tween;
  }

  private static acquire(): Tween {
    return isPoolingEnabled() ? Tween.pool.get() : new Tween();
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private _target: object | null = null;
  private _tweenType: number = -1;
  private _accessor: TweenAccessor<object> | null = null;
  private _easing: EasingFunction = resolveEasing('quad_in_out');
  private _isFrom: boolean = false;
  private _isRelative: boolean = false;
  private _attributeCount: number = 0;
  private _startValues: number[] = [];
  private _targetValues: number[] = [];
  private readonly _buffer: number[] = [];

  private constructor() {
    super();
  }

  protected reset(): void {
    super.reset();
    this._target = null;
    this._tweenType = -1;
    this._accessor = null;
    this._easing = resolveEasing('quad_in_out');
    this._isFrom = false;
    this._isRelative = false;
    this._attributeCount = 0;
    this._startValues = [];
    this._targetValues = [];
    this._buffer.length = 0;
  }

  // ===========================================================================
  // Fluent Setup
  // ===========================================================================

  /**
   * Values the attributes should reach (or start from, for `Tween.from`).
   */
  target(...values: number[]): this {
    this.assertNotStarted('target');
    this.assertAttributeCount(values.length);
    this._targetValues = values.map((value, i) => parseParameter(AttributeValue, value, `target value #${i}`));
    this._isRelative = false;
    return this;
  }

  /**
   * Values added to the attributes' values when the tween begins.
   */
  targetRelative(...values: number[]): this {
    this.target(...values);
    this._isRelative = true;
    return this;
  }

  ease(easing: Easing | EasingFunction): this {
    this._easing = resolveEasing(easing);
    return this;
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  getTarget(): object | null {
    return this._target;
  }

  getType(): number {
    return this._tweenType;
  }

  getTargetValues(): readonly number[] {
    return this._targetValues;
  }

  getCombinedAttributesCount(): number {
    return this._attributeCount;
  }

  // ===========================================================================
  // BaseTween Implementation
  // ===========================================================================

  free(): void {
    if (this._isPooled) {
      Tween.pool.free(this);
    }
  }

  containsTarget(target: object, tweenType?: number): boolean {
    return this._target === target && (tweenType === undefined || tweenType === this._tweenType);
  }

  protected initializeOverride(): void {
    if (!this._target || !this._accessor) return;

    const current: number[] = [];
    this._accessor.getValues(this._target, this._tweenType, current);

    const goal = current.map((value, i) => {
      const targetValue = this._targetValues[i] ?? value;
      return this._isRelative ? value + targetValue : targetValue;
    });

    if (this._isFrom) {
      this._startValues = goal;
      this._targetValues = current;
    } else {
      this._startValues = current;
      this._targetValues = goal;
    }
  }

  protected computeOverride(iteration: number): void {
    if (!this._target || !this._accessor) return;

    let progress: number;
    if (this._duration > 0) {
      progress = this._currentTime / this._duration;
    } else {
      progress = this._region === 'before' ? 0 : 1;
    }
    if (this.isIterationYoyo(iteration)) {
      progress = 1 - progress;
    }

    const eased = this._easing(progress);
    this._buffer.length = this._startValues.length;
    for (let i = 0; i < this._startValues.length; i++) {
      const start = this._startValues[i];
      this._buffer[i] = start + (this._targetValues[i] - start) * eased;
    }
    this._accessor.setValues(this._target, this._tweenType, this._buffer);
  }

  protected forceStartValues(): void {
    if (!this._target || !this._accessor || !this._isInitialized) return;
    this._accessor.setValues(this._target, this._tweenType, this._startValues);
  }

  protected forceEndValues(iteration: number): void {
    if (!this._target || !this._accessor) return;
    const values = this.isIterationYoyo(iteration) ? this._startValues : this._targetValues;
    this._accessor.setValues(this._target, this._tweenType, values);
  }

  private assertAttributeCount(count: number): void {
    const limit = getEngineConfig().combinedAttributesLimit;
    if (count > limit) {
      throw new AttributeLimitError(count, limit);
    }
  }
}
