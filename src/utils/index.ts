/**
 * Utilities Index
 */

export { easingFunctions, resolveEasing, type Easing, type EasingFunction } from './easing';
