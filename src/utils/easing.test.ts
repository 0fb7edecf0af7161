import { describe, it, expect } from 'vitest';
import { easingFunctions, resolveEasing, type Easing } from './easing';

describe('easing', () => {
  const bounded: Easing[] = [
    'linear',
    'quad_in',
    'quad_out',
    'quad_in_out',
    'cubic_in',
    'cubic_out',
    'cubic_in_out',
    'sine_in_out',
    'step',
  ];

  it.each(bounded)('should map 0 to 0 and 1 to 1 for %s', (name) => {
    const fn = easingFunctions[name];
    expect(fn(0)).toBeCloseTo(0, 10);
    expect(fn(1)).toBeCloseTo(1, 10);
  });

  it('should compute intermediate values', () => {
    expect(easingFunctions.linear(0.25)).toBe(0.25);
    expect(easingFunctions.quad_in(0.5)).toBe(0.25);
    expect(easingFunctions.quad_out(0.5)).toBe(0.75);
    expect(easingFunctions.quad_in_out(0.25)).toBe(0.125);
    expect(easingFunctions.quad_in_out(0.75)).toBe(0.875);
    expect(easingFunctions.cubic_in(0.5)).toBe(0.125);
    expect(easingFunctions.sine_in_out(0.5)).toBeCloseTo(0.5, 10);
  });

  it('should jump only at the end for step', () => {
    expect(easingFunctions.step(0.99)).toBe(0);
  });

  it('should always return 0 for hold', () => {
    expect(easingFunctions.hold(1)).toBe(0);
  });

  describe('resolveEasing', () => {
    it('should resolve a name', () => {
      expect(resolveEasing('cubic_in')).toBe(easingFunctions.cubic_in);
    });

    it('should pass a custom function through', () => {
      const custom = (t: number) => t / 2;
      expect(resolveEasing(custom)).toBe(custom);
    });
  });
});
