/**
 * Tween Engine
 *
 * Public entry point: timed units (tweens and composite timelines), the
 * manager that drives them, and the engine's configuration and logging.
 */

export * from './core';
export * from './config';
export * from './schemas';
export * from './services';
export * from './stores';
export * from './utils';
