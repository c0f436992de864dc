/**
 * @file    display/coordinate-mapper.ts
 * @purpose Convert a raw cursor sample into capture-source pixel coordinates.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts, display/display-registry.ts
 *
 * Pipeline (fixed order):
 *   1. origin normalization (bottom-left-up → top-left-down, logical units)
 *   2. display resolution (fixed source display, or containment lookup)
 *   3. global → local offset
 *   4. logical → pixel scale
 *   5. clip to [0, pixelSize)
 */

import {
  CursorSample,
  DiagnosticKind,
  DisplayId,
  DisplayRecord,
  MappedPoint,
  OriginConvention,
  Point,
  Size,
  SourceCrop,
  ZoomDiagnostic,
} from '../shared/types/zoom';
import { DisplayRegistry } from './display-registry';

// ─────────────────────────────────────────────
// Pure steps
// ─────────────────────────────────────────────

/** Bring a native sample into top-left-down global logical space */
export function normalizeSample(
  sample: CursorSample,
  primary: DisplayRecord | undefined,
): Point {
  if (sample.originConvention === OriginConvention.BottomLeftUp && primary) {
    const primaryLogicalHeight = primary.pixelSize.height / primary.scale.sy;
    return { x: sample.rawX, y: primaryLogicalHeight - sample.rawY };
  }
  return { x: sample.rawX, y: sample.rawY };
}

/**
 * Clip one axis into [0, size). Values past the far edge land on the last
 * whole pixel.
 */
function clipAxis(value: number, size: number): { value: number; clipped: boolean } {
  if (value < 0) return { value: 0, clipped: true };
  if (value >= size) return { value: Math.max(0, size - 1), clipped: true };
  return { value, clipped: false };
}

/** Global logical point → pixel point relative to the display, with clamping */
export function toDisplayPixels(point: Point, display: DisplayRecord): MappedPoint {
  const localX = point.x - display.origin.x;
  const localY = point.y - display.origin.y;

  const x = clipAxis(localX * display.scale.sx, display.pixelSize.width);
  const y = clipAxis(localY * display.scale.sy, display.pixelSize.height);

  return {
    displayId: display.id,
    px: x.value,
    py: y.value,
    clamped: x.clipped || y.clipped,
  };
}

/**
 * Shift a display-relative point into a capture source that already crops
 * the display by `crop`, clipping to the cropped size.
 */
export function applySourceCrop(mapped: MappedPoint, crop: SourceCrop, sourceSize: Size): MappedPoint {
  if (crop.left === 0 && crop.top === 0 && crop.right === 0 && crop.bottom === 0) {
    return mapped;
  }
  const x = clipAxis(mapped.px - crop.left, sourceSize.width);
  const y = clipAxis(mapped.py - crop.top, sourceSize.height);
  return {
    displayId: mapped.displayId,
    px: x.value,
    py: y.value,
    clamped: mapped.clamped || x.clipped || y.clipped,
  };
}

// ─────────────────────────────────────────────
// Mapper
// ─────────────────────────────────────────────

export class CoordinateMapper {
  private registry: DisplayRegistry;
  private lastDisplayId: DisplayId | null = null;

  private onDiagnostic: ((diagnostic: ZoomDiagnostic) => void) | null = null;

  constructor(registry: DisplayRegistry) {
    this.registry = registry;
  }

  setOnDiagnostic(cb: (diagnostic: ZoomDiagnostic) => void): void {
    this.onDiagnostic = cb;
  }

  /** Display used by the most recent successful mapping */
  getLastDisplayId(): DisplayId | null {
    return this.lastDisplayId;
  }

  /** Forget the fallback display (e.g., after the display set changed) */
  reset(): void {
    this.lastDisplayId = null;
  }

  /**
   * Map a sample into pixel space.
   *
   * With `activeDisplayId` the point is always expressed relative to that
   * display (clamped when the cursor is elsewhere). Without it the display is
   * found by containment; a miss reuses the last display that resolved.
   * Returns null only when no display has ever resolved.
   */
  map(sample: CursorSample, activeDisplayId?: DisplayId | null): MappedPoint | null {
    const point = normalizeSample(sample, this.registry.primary());
    const display = this.resolveDisplay(point, activeDisplayId ?? null, sample.timestampMs);
    if (!display) {
      return null;
    }

    this.lastDisplayId = display.id;
    return toDisplayPixels(point, display);
  }

  // ─── Private ─────────────────────────────

  private resolveDisplay(
    point: Point,
    activeDisplayId: DisplayId | null,
    timestampMs: number,
  ): DisplayRecord | undefined {
    if (activeDisplayId !== null) {
      const active = this.registry.get(activeDisplayId);
      if (active) return active;
      this.report(
        `Source display ${activeDisplayId} is not registered`,
        timestampMs,
        activeDisplayId,
      );
    } else {
      const containing = this.registry.findContaining(point);
      if (containing) return containing;
    }

    const fallback = this.lastDisplayId !== null ? this.registry.get(this.lastDisplayId) : undefined;
    this.report(
      fallback
        ? `No display contains (${point.x}, ${point.y}); reusing ${fallback.id}`
        : `No display contains (${point.x}, ${point.y}) and none resolved before`,
      timestampMs,
      fallback?.id,
    );
    return fallback;
  }

  private report(message: string, timestampMs: number, displayId?: DisplayId): void {
    this.onDiagnostic?.({
      kind: DiagnosticKind.DisplayNotFound,
      message,
      displayId,
      timestampMs,
    });
  }
}
