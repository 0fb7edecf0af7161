/**
 * Core Module Index
 *
 * Exports the timed units, their manager, pools and errors.
 */

export { BaseTween, type TweenLocation, type TweenRegion } from './BaseTween';
export { Tween, type TweenAccessor, type TweenTargetClass } from './Tween';
export { Timeline, type TimelineMode, type UnitCounts } from './Timeline';
export { TweenManager, DEFAULT_MANAGER_OPTIONS, type TweenManagerOptions } from './TweenManager';
export { Pool, type PoolHandle, type PoolHooks, type Poolable } from './Pool';
export {
  TweenEvent,
  TweenEventMask,
  getTweenEventName,
  type TweenCallback,
  type TweenEventType,
  type CallbackRegistration,
} from './callbacks';
export {
  TweenEngineError,
  StructuralMutationAfterBuildError,
  DanglingOpenGroupError,
  UnclosedNestedTreeError,
  InfiniteRepeatInCompositeError,
  InvalidChildError,
  MissingAccessorError,
  AttributeLimitError,
  InvalidParameterError,
  StaleHandleError,
  ConfigurationError,
  isTweenEngineError,
} from './errors';
