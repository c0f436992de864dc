/**
 * @file    display/coordinate-classifier.ts
 * @purpose Decide whether a display's reported size is in points or pixels and
 *          derive its per-axis pixel scale; build immutable DisplayRecords.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts
 *
 * Decision order:
 *   1. manual override → explicit scale, nothing inferred
 *   2. ratio = mean(pixel / logical) within tolerance of a hint > 1 → points
 *   3. ratio within tolerance of 1 → already pixels
 *   4. otherwise round each axis to the nearest 0.5 and keep the closer fit
 *   5. no hint and no pixel size → points at scale 1
 */

import {
  DisplayDescriptor,
  DisplayOverride,
  DisplayRecord,
  OriginConvention,
  Point,
  Scale,
  Size,
  SizeClassification,
} from '../shared/types/zoom';

// ─────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────

export interface ClassifierInput {
  /** Size reported by display enumeration */
  readonly logicalSize: Size;
  /** Size reported by the capture source */
  readonly pixelSize?: Size;
  readonly backingScaleHint?: number;
  /** Bypasses inference entirely */
  readonly manualScale?: Scale;
}

interface ClassifiedBase {
  readonly scale: Scale;
  /** Size in points after the classification is applied */
  readonly logicalSize: Size;
}

export type Classification =
  | (ClassifiedBase & { readonly kind: 'points' })
  | (ClassifiedBase & { readonly kind: 'pixels' })
  | (ClassifiedBase & { readonly kind: 'derived'; readonly interpretation: 'points' | 'pixels' })
  | (ClassifiedBase & { readonly kind: 'manual' })
  | { readonly kind: 'degenerate'; readonly reason: string };

export interface ClassifierConfig {
  /** Relative tolerance when comparing ratios */
  tolerance: number;
  /** Rounding step for derived scales */
  roundingStep: number;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  tolerance: 0.05,
  roundingStep: 0.5,
};

// ─────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────

/** Finite and strictly positive on both axes */
export function isValidSize(size: Size | undefined): boolean {
  return (
    size !== undefined &&
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width > 0 &&
    size.height > 0
  );
}

function isValidScale(scale: Scale): boolean {
  return Number.isFinite(scale.sx) && Number.isFinite(scale.sy) && scale.sx > 0 && scale.sy > 0;
}

function uniform(value: number): Scale {
  return { sx: value, sy: value };
}

function divide(size: Size, scale: Scale): Size {
  return { width: size.width / scale.sx, height: size.height / scale.sy };
}

function withinTolerance(value: number, reference: number, tolerance: number): boolean {
  return Math.abs(value - reference) <= Math.abs(reference) * tolerance;
}

/** Classify one display/source pairing. Pure. */
export function classifyDisplaySize(
  input: ClassifierInput,
  config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG,
): Classification {
  const { logicalSize, pixelSize, manualScale } = input;

  if (!isValidSize(logicalSize)) {
    return { kind: 'degenerate', reason: `logical size ${logicalSize.width}x${logicalSize.height}` };
  }
  if (pixelSize !== undefined && !isValidSize(pixelSize)) {
    return { kind: 'degenerate', reason: `pixel size ${pixelSize.width}x${pixelSize.height}` };
  }

  if (manualScale) {
    if (!isValidScale(manualScale)) {
      return { kind: 'degenerate', reason: `manual scale ${manualScale.sx}x${manualScale.sy}` };
    }
    return { kind: 'manual', scale: manualScale, logicalSize };
  }

  const hint =
    input.backingScaleHint !== undefined &&
    Number.isFinite(input.backingScaleHint) &&
    input.backingScaleHint > 0
      ? input.backingScaleHint
      : undefined;

  if (pixelSize === undefined) {
    // Nothing to compare against: trust a hint, never assume hidden scaling
    const scale = hint !== undefined && hint > 1 ? hint : 1;
    return { kind: 'points', scale: uniform(scale), logicalSize };
  }

  const ratioX = pixelSize.width / logicalSize.width;
  const ratioY = pixelSize.height / logicalSize.height;
  const ratio = (ratioX + ratioY) / 2;

  if (hint !== undefined && hint > 1 && withinTolerance(ratio, hint, config.tolerance)) {
    return { kind: 'points', scale: uniform(hint), logicalSize };
  }

  if (withinTolerance(ratio, 1, config.tolerance)) {
    const scale = uniform(hint !== undefined && hint > 1 ? hint : 1);
    return { kind: 'pixels', scale, logicalSize: divide(logicalSize, scale) };
  }

  const step = config.roundingStep;
  const derived: Scale = {
    sx: Math.max(step, Math.round(ratioX / step) * step),
    sy: Math.max(step, Math.round(ratioY / step) * step),
  };

  const pointsError =
    Math.abs(pixelSize.width - logicalSize.width * derived.sx) +
    Math.abs(pixelSize.height - logicalSize.height * derived.sy);
  const pixelsError =
    Math.abs(pixelSize.width - logicalSize.width) +
    Math.abs(pixelSize.height - logicalSize.height);

  if (pointsError < pixelsError) {
    return { kind: 'derived', interpretation: 'points', scale: derived, logicalSize };
  }
  return { kind: 'derived', interpretation: 'pixels', scale: uniform(1), logicalSize };
}

// ─────────────────────────────────────────────
// Record construction
// ─────────────────────────────────────────────

export interface CreateRecordOptions {
  /** Capture-source pixel size; falls back to the descriptor's own */
  readonly sourcePixelSize?: Size;
  readonly override?: DisplayOverride;
  /** Logical height of the primary display, for bottom-left origins */
  readonly primaryLogicalHeight?: number;
  readonly classifierConfig?: ClassifierConfig;
}

export type CreateRecordResult =
  | { readonly ok: true; readonly record: DisplayRecord; readonly classification: Classification }
  | { readonly ok: false; readonly reason: string };

const CLASSIFICATION_BY_KIND = {
  points: SizeClassification.Points,
  pixels: SizeClassification.Pixels,
  derived: SizeClassification.Derived,
  manual: SizeClassification.Manual,
} as const;

function overrideScale(override: DisplayOverride | undefined): Scale | undefined {
  if (!override || (override.scaleX === undefined && override.scaleY === undefined)) {
    return undefined;
  }
  const sx = override.scaleX ?? override.scaleY ?? 1;
  const sy = override.scaleY ?? override.scaleX ?? 1;
  return { sx, sy };
}

function overridePixelSize(
  override: DisplayOverride | undefined,
  fallback: Size | undefined,
): Size | undefined {
  if (!override || (override.pixelWidth === undefined && override.pixelHeight === undefined)) {
    return fallback;
  }
  return {
    width: override.pixelWidth ?? fallback?.width ?? 0,
    height: override.pixelHeight ?? fallback?.height ?? 0,
  };
}

/** Convert a bottom-left-up origin into top-left-down global space */
export function normalizeOrigin(
  origin: Point,
  height: number,
  convention: OriginConvention,
  primaryLogicalHeight: number | undefined,
): Point {
  if (convention !== OriginConvention.BottomLeftUp || primaryLogicalHeight === undefined) {
    return origin;
  }
  return { x: origin.x, y: primaryLogicalHeight - (origin.y + height) };
}

/**
 * Classify a descriptor and produce a frozen DisplayRecord.
 * Never mutates or patches an existing record.
 */
export function createDisplayRecord(
  descriptor: DisplayDescriptor,
  options: CreateRecordOptions = {},
): CreateRecordResult {
  const pixelInput = overridePixelSize(
    options.override,
    options.sourcePixelSize ?? descriptor.pixelSize,
  );

  const classification = classifyDisplaySize(
    {
      logicalSize: descriptor.logicalSize,
      pixelSize: pixelInput,
      backingScaleHint: descriptor.backingScaleHint,
      manualScale: overrideScale(options.override),
    },
    options.classifierConfig,
  );

  if (classification.kind === 'degenerate') {
    return { ok: false, reason: `${descriptor.id}: ${classification.reason}` };
  }

  const { scale, logicalSize } = classification;
  const pixelSize: Size = pixelInput ?? {
    width: Math.round(logicalSize.width * scale.sx),
    height: Math.round(logicalSize.height * scale.sy),
  };

  const origin = normalizeOrigin(
    descriptor.origin,
    logicalSize.height,
    descriptor.originConvention ?? OriginConvention.TopLeftDown,
    options.primaryLogicalHeight,
  );

  const record: DisplayRecord = Object.freeze({
    id: descriptor.id,
    label: descriptor.label,
    origin: Object.freeze({ ...origin }),
    logicalSize: Object.freeze({ ...logicalSize }),
    pixelSize: Object.freeze({ ...pixelSize }),
    scale: Object.freeze({ ...scale }),
    classification: CLASSIFICATION_BY_KIND[classification.kind],
    isPrimary: descriptor.isPrimary,
  });

  return { ok: true, record, classification };
}
