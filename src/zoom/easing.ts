/**
 * @file    zoom/easing.ts
 * @purpose Easing functions for zoom and follow animations.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts
 *
 * Every function maps progress t ∈ [0, 1] to eased progress with f(0) = 0 and
 * f(1) = 1. Back, elastic and bounce variants leave [0, 1] (or turn back)
 * between the endpoints. Input is not clamped.
 */

import { EasingName } from '../shared/types/zoom';

export type EasingFunction = (t: number) => number;

const BACK_C1 = 1.70158;
const BACK_C2 = BACK_C1 * 1.525;
const BACK_C3 = BACK_C1 + 1;
const ELASTIC_C4 = (2 * Math.PI) / 3;
const ELASTIC_C5 = (2 * Math.PI) / 4.5;
const BOUNCE_N1 = 7.5625;
const BOUNCE_D1 = 2.75;

// ─── Polynomial ────────────────────────────

export function linear(t: number): number {
  return t;
}

export function easeInQuad(t: number): number {
  return t * t;
}

export function easeOutQuad(t: number): number {
  return t * (2 - t);
}

export function easeInOutQuad(t: number): number {
  return t < 0.5 ? 2 * t * t : -1 + (4 - 2 * t) * t;
}

export function easeInCubic(t: number): number {
  return t * t * t;
}

export function easeOutCubic(t: number): number {
  return 1 - Math.pow(1 - t, 3);
}

export function easeInOutCubic(t: number): number {
  return t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;
}

export function easeInQuart(t: number): number {
  return t * t * t * t;
}

export function easeOutQuart(t: number): number {
  return 1 - Math.pow(1 - t, 4);
}

export function easeInOutQuart(t: number): number {
  return t < 0.5 ? 8 * Math.pow(t, 4) : 1 - Math.pow(-2 * t + 2, 4) / 2;
}

export function easeInQuint(t: number): number {
  return Math.pow(t, 5);
}

export function easeOutQuint(t: number): number {
  return 1 - Math.pow(1 - t, 5);
}

export function easeInOutQuint(t: number): number {
  return t < 0.5 ? 16 * Math.pow(t, 5) : 1 - Math.pow(-2 * t + 2, 5) / 2;
}

// ─── Sine / Expo / Circ ────────────────────

export function easeInSine(t: number): number {
  return 1 - Math.cos((t * Math.PI) / 2);
}

export function easeOutSine(t: number): number {
  return Math.sin((t * Math.PI) / 2);
}

export function easeInOutSine(t: number): number {
  return -(Math.cos(Math.PI * t) - 1) / 2;
}

export function easeInExpo(t: number): number {
  return t === 0 ? 0 : Math.pow(2, 10 * t - 10);
}

export function easeOutExpo(t: number): number {
  return t === 1 ? 1 : 1 - Math.pow(2, -10 * t);
}

export function easeInOutExpo(t: number): number {
  if (t === 0 || t === 1) return t;
  return t < 0.5
    ? Math.pow(2, 20 * t - 10) / 2
    : (2 - Math.pow(2, -20 * t + 10)) / 2;
}

export function easeInCirc(t: number): number {
  return 1 - Math.sqrt(1 - t * t);
}

export function easeOutCirc(t: number): number {
  return Math.sqrt(1 - Math.pow(t - 1, 2));
}

export function easeInOutCirc(t: number): number {
  return t < 0.5
    ? (1 - Math.sqrt(1 - Math.pow(2 * t, 2))) / 2
    : (Math.sqrt(1 - Math.pow(-2 * t + 2, 2)) + 1) / 2;
}

// ─── Overshoot ─────────────────────────────

export function easeInBack(t: number): number {
  return BACK_C3 * t * t * t - BACK_C1 * t * t;
}

export function easeOutBack(t: number): number {
  return 1 + BACK_C3 * Math.pow(t - 1, 3) + BACK_C1 * Math.pow(t - 1, 2);
}

export function easeInOutBack(t: number): number {
  return t < 0.5
    ? (Math.pow(2 * t, 2) * ((BACK_C2 + 1) * 2 * t - BACK_C2)) / 2
    : (Math.pow(2 * t - 2, 2) * ((BACK_C2 + 1) * (t * 2 - 2) + BACK_C2) + 2) / 2;
}

/** Elastic ease-out */
export function elastic(t: number): number {
  if (t === 0 || t === 1) return t;
  return Math.pow(2, -10 * t) * Math.sin((t * 10 - 0.75) * ELASTIC_C4) + 1;
}

export function easeInElastic(t: number): number {
  if (t === 0 || t === 1) return t;
  return -Math.pow(2, 10 * t - 10) * Math.sin((t * 10 - 10.75) * ELASTIC_C4);
}

export function easeInOutElastic(t: number): number {
  if (t === 0 || t === 1) return t;
  return t < 0.5
    ? -(Math.pow(2, 20 * t - 10) * Math.sin((20 * t - 11.125) * ELASTIC_C5)) / 2
    : (Math.pow(2, -20 * t + 10) * Math.sin((20 * t - 11.125) * ELASTIC_C5)) / 2 + 1;
}

/** Bounce ease-out */
export function bounceOut(t: number): number {
  if (t < 1 / BOUNCE_D1) {
    return BOUNCE_N1 * t * t;
  }
  if (t < 2 / BOUNCE_D1) {
    const u = t - 1.5 / BOUNCE_D1;
    return BOUNCE_N1 * u * u + 0.75;
  }
  if (t < 2.5 / BOUNCE_D1) {
    const u = t - 2.25 / BOUNCE_D1;
    return BOUNCE_N1 * u * u + 0.9375;
  }
  const u = t - 2.625 / BOUNCE_D1;
  return BOUNCE_N1 * u * u + 0.984375;
}

export function bounceIn(t: number): number {
  return 1 - bounceOut(1 - t);
}

export function easeInOutBounce(t: number): number {
  return t < 0.5
    ? (1 - bounceOut(1 - 2 * t)) / 2
    : (1 + bounceOut(2 * t - 1)) / 2;
}

// ─────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────

export const EASING_FUNCTIONS: Readonly<Record<EasingName, EasingFunction>> = {
  linear,
  ease_in: easeInQuad,
  ease_out: easeOutQuad,
  ease_in_out: easeInOutCubic,
  ease_in_quad: easeInQuad,
  ease_out_quad: easeOutQuad,
  ease_in_out_quad: easeInOutQuad,
  ease_in_cubic: easeInCubic,
  ease_out_cubic: easeOutCubic,
  ease_in_out_cubic: easeInOutCubic,
  ease_in_quart: easeInQuart,
  ease_out_quart: easeOutQuart,
  ease_in_out_quart: easeInOutQuart,
  ease_in_quint: easeInQuint,
  ease_out_quint: easeOutQuint,
  ease_in_out_quint: easeInOutQuint,
  ease_in_sine: easeInSine,
  ease_out_sine: easeOutSine,
  ease_in_out_sine: easeInOutSine,
  ease_in_expo: easeInExpo,
  ease_out_expo: easeOutExpo,
  ease_in_out_expo: easeInOutExpo,
  ease_in_circ: easeInCirc,
  ease_out_circ: easeOutCirc,
  ease_in_out_circ: easeInOutCirc,
  ease_in_back: easeInBack,
  ease_out_back: easeOutBack,
  ease_in_out_back: easeInOutBack,
  elastic,
  ease_in_elastic: easeInElastic,
  ease_out_elastic: elastic,
  ease_in_out_elastic: easeInOutElastic,
  bounce: bounceOut,
  bounce_in: bounceIn,
  bounce_out: bounceOut,
  ease_in_out_bounce: easeInOutBounce,
};

export const EASING_NAMES: readonly string[] = Object.keys(EASING_FUNCTIONS);

/** Easings whose output leaves [0, 1] or turns back between the endpoints */
export const OVERSHOOT_EASINGS: ReadonlySet<EasingName> = new Set<EasingName>([
  'ease_in_back',
  'ease_out_back',
  'ease_in_out_back',
  'elastic',
  'ease_in_elastic',
  'ease_out_elastic',
  'ease_in_out_elastic',
  'bounce',
  'bounce_in',
  'bounce_out',
  'ease_in_out_bounce',
]);

export function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(EASING_FUNCTIONS, name);
}

/** Look up an easing by name; unknown names fall back to linear */
export function getEasing(name: string): EasingFunction {
  return isEasingName(name) ? EASING_FUNCTIONS[name] : linear;
}

// ─────────────────────────────────────────────
// Interpolation helpers
// ─────────────────────────────────────────────

export function lerp(start: number, end: number, t: number): number {
  return start + (end - start) * t;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
