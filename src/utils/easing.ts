/**
 * Easing Curves
 *
 * Normalized easing functions for tween interpolation. Each takes progress
 * in [0, 1] and returns eased progress, with f(0) = 0 and f(1) = 1 for
 * every curve except `hold`.
 */

// =============================================================================
// Types
// =============================================================================

export type EasingFunction = (t: number) => number;

export type Easing =
  | 'linear'
  | 'quad_in'
  | 'quad_out'
  | 'quad_in_out'
  | 'cubic_in'
  | 'cubic_out'
  | 'cubic_in_out'
  | 'sine_in_out'
  | 'step'
  | 'hold';

// =============================================================================
// Easing Functions
// =============================================================================

export const easingFunctions: Record<Easing, EasingFunction> = {
  linear: (t) => t,

  quad_in: (t) => t * t,

  quad_out: (t) => 1 - (1 - t) * (1 - t),

  quad_in_out: (t) => (t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2),

  cubic_in: (t) => t * t * t,

  cubic_out: (t) => 1 - Math.pow(1 - t, 3),

  cubic_in_out: (t) => (t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2),

  sine_in_out: (t) => -(Math.cos(Math.PI * t) - 1) / 2,

  /**
   * Holds 0 until the very end, then jumps to 1
   */
  step: (t) => (t >= 1 ? 1 : 0),

  /**
   * Always 0: the start value is kept for the whole iteration
   */
  hold: () => 0,
};

/**
 * Resolve an easing name or pass a custom function through.
 */
export function resolveEasing(easing: Easing | EasingFunction): EasingFunction {
  return typeof easing === 'function' ? easing : easingFunctions[easing];
}
