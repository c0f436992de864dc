/**
 * @file    test/easing.test.ts
 * @purpose Unit tests for the easing library.
 * @owner   Cursor Zoom Core
 */

import {
  EASING_FUNCTIONS,
  EASING_NAMES,
  OVERSHOOT_EASINGS,
  bounceOut,
  clamp,
  easeInOutCubic,
  easeInQuad,
  easeOutBack,
  easeOutQuad,
  elastic,
  getEasing,
  isEasingName,
  lerp,
  linear,
} from '../src/zoom/easing';
import { EasingName } from '../src/shared/types/zoom';

describe('Easing', () => {
  // ─── Endpoints ───────────────────────────

  describe('Endpoints', () => {
    it.each(EASING_NAMES)('should map 0 to 0 and 1 to 1 for %s', (name) => {
      const fn = getEasing(name);
      expect(fn(0)).toBeCloseTo(0, 10);
      expect(fn(1)).toBeCloseTo(1, 10);
    });

    it('should expose 36 named functions', () => {
      expect(EASING_NAMES).toHaveLength(36);
    });
  });

  // ─── Known values ────────────────────────

  describe('Known values', () => {
    it('should compute polynomial midpoints', () => {
      expect(linear(0.25)).toBe(0.25);
      expect(easeInQuad(0.5)).toBe(0.25);
      expect(easeOutQuad(0.5)).toBe(0.75);
      expect(easeInOutCubic(0.25)).toBe(0.0625);
      expect(easeInOutCubic(0.5)).toBe(0.5);
    });

    it('should resolve short aliases to their full forms', () => {
      expect(EASING_FUNCTIONS.ease_in).toBe(EASING_FUNCTIONS.ease_in_quad);
      expect(EASING_FUNCTIONS.ease_out).toBe(EASING_FUNCTIONS.ease_out_quad);
      expect(EASING_FUNCTIONS.ease_in_out).toBe(EASING_FUNCTIONS.ease_in_out_cubic);
      expect(EASING_FUNCTIONS.bounce).toBe(bounceOut);
      expect(EASING_FUNCTIONS.ease_out_elastic).toBe(elastic);
    });

    it('should overshoot past 1 with back easing', () => {
      expect(easeOutBack(0.5)).toBeGreaterThan(1);
    });

    it('should reach 1 before the end with bounce easing', () => {
      // Last bounce segment touches 1 between the endpoints
      expect(bounceOut(1 / 2.75)).toBeCloseTo(1, 10);
    });
  });

  // ─── Monotonicity ────────────────────────

  describe('Monotonicity', () => {
    const monotonic = EASING_NAMES.filter(
      (name) => isEasingName(name) && !OVERSHOOT_EASINGS.has(name),
    );

    it.each(monotonic)('should never decrease for %s', (name) => {
      const fn = getEasing(name);
      let previous = fn(0);
      for (let i = 1; i <= 100; i++) {
        const value = fn(i / 100);
        expect(value).toBeGreaterThanOrEqual(previous - 1e-12);
        previous = value;
      }
    });
  });

  // ─── Lookup ──────────────────────────────

  describe('Lookup', () => {
    it('should recognise registered names only', () => {
      expect(isEasingName('ease_in_out_sine')).toBe(true);
      expect(isEasingName('ease_sideways')).toBe(false);
      expect(isEasingName('toString')).toBe(false);
    });

    it('should fall back to linear for unknown names', () => {
      expect(getEasing('ease_sideways')).toBe(linear);
    });

    it('should flag every overshooting easing as a registered name', () => {
      const names: EasingName[] = Array.from(OVERSHOOT_EASINGS);
      for (const name of names) {
        expect(EASING_NAMES).toContain(name);
      }
    });
  });

  // ─── Helpers ─────────────────────────────

  describe('Helpers', () => {
    it('should interpolate and extrapolate linearly', () => {
      expect(lerp(10, 20, 0.5)).toBe(15);
      expect(lerp(10, 20, 1.5)).toBe(25);
    });

    it('should clamp into range', () => {
      expect(clamp(-1, 0, 5)).toBe(0);
      expect(clamp(7, 0, 5)).toBe(5);
      expect(clamp(3, 0, 5)).toBe(3);
    });
  });
});
