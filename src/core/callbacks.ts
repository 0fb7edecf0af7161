/**
 * Tween Callbacks
 *
 * Lifecycle notifications emitted by every timed unit. Event types are bit
 * flags so one callback can subscribe to several of them through a mask.
 *
 * Forward playback of a unit repeated twice emits:
 *
 * ```
 * BEGIN START END START END COMPLETE
 * ```
 *
 * and playing it back to the beginning emits the mirrored sequence:
 *
 * ```
 * BACK_BEGIN BACK_START BACK_END BACK_START BACK_END BACK_COMPLETE
 * ```
 */

import type { BaseTween } from './BaseTween';

// =============================================================================
// Event Types
// =============================================================================

export const TweenEvent = {
  /** Right after the delay, the first time the unit starts playing */
  BEGIN: 0x01,
  /** At the beginning of each iteration */
  START: 0x02,
  /** At the end of each iteration, before the repeat delay */
  END: 0x04,
  /** At the end of the last iteration */
  COMPLETE: 0x08,
  /** The first time the unit is played backward from its end */
  BACK_BEGIN: 0x10,
  /** At the end of each iteration, when entering it backward */
  BACK_START: 0x20,
  /** At the beginning of each iteration, when leaving it backward */
  BACK_END: 0x40,
  /** When the start of the first iteration is reached backward */
  BACK_COMPLETE: 0x80,
} as const;

export type TweenEventType = (typeof TweenEvent)[keyof typeof TweenEvent];

export const TweenEventMask = {
  ANY_FORWARD: 0x0f,
  ANY_BACKWARD: 0xf0,
  ANY: 0xff,
} as const;

const EVENT_NAMES: Record<TweenEventType, string> = {
  [TweenEvent.BEGIN]: 'BEGIN',
  [TweenEvent.START]: 'START',
  [TweenEvent.END]: 'END',
  [TweenEvent.COMPLETE]: 'COMPLETE',
  [TweenEvent.BACK_BEGIN]: 'BACK_BEGIN',
  [TweenEvent.BACK_START]: 'BACK_START',
  [TweenEvent.BACK_END]: 'BACK_END',
  [TweenEvent.BACK_COMPLETE]: 'BACK_COMPLETE',
};

/**
 * Readable name of an event type, for logs and assertions.
 */
export function getTweenEventName(type: TweenEventType): string {
  return EVENT_NAMES[type];
}

// =============================================================================
// Callback
// =============================================================================

export type TweenCallback = (type: TweenEventType, source: BaseTween) => void;

export interface CallbackRegistration {
  readonly callback: TweenCallback;
  /** Bitwise OR of {@link TweenEvent} flags */
  readonly triggers: number;
}
