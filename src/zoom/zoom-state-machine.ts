/**
 * @file    zoom/zoom-state-machine.ts
 * @purpose Zoom/follow state machine producing one crop rectangle per tick.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts, zoom/easing.ts
 *
 * Modes: Idle → ZoomingIn → Zoomed → ZoomingOut → Idle.
 *
 * Key invariants:
 *   - Every leg eases from the rectangle current when it started, so toggles
 *     and profile switches never make the output jump
 *   - A leg keeps the speed, easing and zoom factor it started with; a new
 *     profile applies from the next leg
 *   - advance(0, …) never moves the current rectangle
 *   - The emitted rectangle is always inside the source with positive size;
 *     the interpolated state itself may overshoot
 *   - Not reentrant: one caller drives advance() and the command methods
 */

import {
  CropRect,
  MappedPoint,
  Point,
  Size,
  ZoomMode,
  ZoomProfile,
  ZoomStateSnapshot,
} from '../shared/types/zoom';
import { clamp, getEasing, lerp } from './easing';

// ─────────────────────────────────────────────
// Internal state
// ─────────────────────────────────────────────

interface ZoomMachineState {
  mode: ZoomMode;
  followEnabled: boolean;

  currentCenter: Point;
  currentExtent: Size;
  targetCenter: Point;
  targetExtent: Size;

  manualOverride: Point | null;
  /** Centre held while not following */
  frozenCenter: Point;
  /** Latest live cursor target, clamped to the source */
  lastLivePoint: Point | null;
  /** The mapper clipped the latest live point (cursor off the source) */
  lastLiveClamped: boolean;

  // Zoom leg (extent + centre while ZoomingIn / ZoomingOut)
  zoomProgress: number;
  zoomStartCenter: Point;
  zoomStartExtent: Size;
  zoomLegProfile: ZoomProfile;

  // Follow leg (centre only, while Zoomed)
  followActive: boolean;
  followProgress: number;
  followStartCenter: Point;
  followLegProfile: ZoomProfile;
  /** Target minus centre when the leg started */
  followHeading: Point;
  /** Target seen on the previous follow step */
  followLastTarget: Point;
}

function lerpPoint(from: Point, to: Point, t: number): Point {
  return { x: lerp(from.x, to.x, t), y: lerp(from.y, to.y, t) };
}

function lerpSize(from: Size, to: Size, t: number): Size {
  return { width: lerp(from.width, to.width, t), height: lerp(from.height, to.height, t) };
}

// ─────────────────────────────────────────────
// State machine
// ─────────────────────────────────────────────

export class ZoomStateMachine {
  private state: ZoomMachineState;
  private profile: ZoomProfile;
  private sourceSize: Size;

  private onModeChange: ((mode: ZoomMode, previous: ZoomMode) => void) | null = null;

  constructor(sourceSize: Size, profile: ZoomProfile) {
    this.sourceSize = { ...sourceSize };
    this.profile = profile;

    const center = this.sourceCenter();
    const full = this.fullExtent();
    this.state = {
      mode: ZoomMode.Idle,
      followEnabled: false,
      currentCenter: center,
      currentExtent: full,
      targetCenter: center,
      targetExtent: full,
      manualOverride: null,
      frozenCenter: center,
      lastLivePoint: null,
      lastLiveClamped: false,
      zoomProgress: 0,
      zoomStartCenter: center,
      zoomStartExtent: full,
      zoomLegProfile: profile,
      followActive: false,
      followProgress: 0,
      followStartCenter: center,
      followLegProfile: profile,
      followHeading: { x: 0, y: 0 },
      followLastTarget: center,
    };
  }

  // ─── Public API ──────────────────────────

  setOnModeChange(cb: (mode: ZoomMode, previous: ZoomMode) => void): void {
    this.onModeChange = cb;
  }

  getMode(): ZoomMode {
    return this.state.mode;
  }

  getProfile(): ZoomProfile {
    return this.profile;
  }

  getSourceSize(): Size {
    return { ...this.sourceSize };
  }

  /** Idle → ZoomingIn; ZoomingIn / Zoomed → ZoomingOut; ZoomingOut → ZoomingIn */
  toggleZoom(): void {
    switch (this.state.mode) {
      case ZoomMode.Idle:
        this.state.frozenCenter =
          this.state.manualOverride ?? this.state.lastLivePoint ?? this.sourceCenter();
        this.state.targetCenter = this.state.frozenCenter;
        this.startZoomLeg(ZoomMode.ZoomingIn);
        break;

      case ZoomMode.ZoomingOut:
        // Reverse from wherever the zoom-out got to
        this.state.frozenCenter = this.state.lastLivePoint ?? this.state.frozenCenter;
        this.startZoomLeg(ZoomMode.ZoomingIn);
        break;

      case ZoomMode.ZoomingIn:
      case ZoomMode.Zoomed:
        this.state.frozenCenter = this.state.currentCenter;
        this.startZoomLeg(ZoomMode.ZoomingOut);
        break;
    }
  }

  /** Flip following; an in-flight follow leg stops where it is */
  toggleFollow(): void {
    this.state.followEnabled = !this.state.followEnabled;
    if (!this.state.followEnabled) {
      this.state.followActive = false;
      this.state.followProgress = 0;
      this.state.frozenCenter = this.state.currentCenter;
    }
  }

  /**
   * Swap the profile. Legs in flight finish with the profile they started
   * with; the current rectangle and mode are left alone.
   */
  setProfile(profile: ZoomProfile): void {
    this.profile = profile;
  }

  /** A follow leg in flight restarts from where it is toward the new point */
  setMouseOverride(point: Point): void {
    this.state.manualOverride = this.clampToSource(point);
    this.restartFollowLeg();
  }

  clearMouseOverride(): void {
    if (this.state.manualOverride === null) return;
    this.state.manualOverride = null;
    this.restartFollowLeg();
  }

  /** Back to Idle at full frame, keeping profile and follow flag */
  reset(): void {
    const previous = this.state.mode;
    const center = this.sourceCenter();
    const full = this.fullExtent();
    this.state.currentCenter = center;
    this.state.currentExtent = full;
    this.state.targetCenter = center;
    this.state.targetExtent = full;
    this.state.frozenCenter = center;
    this.state.zoomProgress = 0;
    this.state.followActive = false;
    this.state.followProgress = 0;
    this.setMode(ZoomMode.Idle, previous);
  }

  /** Source geometry changed: rescale the state into the new pixel space */
  setSourceSize(size: Size): void {
    if (size.width <= 0 || size.height <= 0) return;
    if (size.width === this.sourceSize.width && size.height === this.sourceSize.height) return;

    const fx = size.width / this.sourceSize.width;
    const fy = size.height / this.sourceSize.height;
    const scalePoint = (p: Point): Point => ({ x: p.x * fx, y: p.y * fy });
    const scaleSize = (s: Size): Size => ({ width: s.width * fx, height: s.height * fy });

    this.sourceSize = { ...size };
    const s = this.state;
    s.currentCenter = scalePoint(s.currentCenter);
    s.currentExtent = scaleSize(s.currentExtent);
    s.targetCenter = scalePoint(s.targetCenter);
    s.targetExtent = scaleSize(s.targetExtent);
    s.frozenCenter = scalePoint(s.frozenCenter);
    s.zoomStartCenter = scalePoint(s.zoomStartCenter);
    s.zoomStartExtent = scaleSize(s.zoomStartExtent);
    s.followStartCenter = scalePoint(s.followStartCenter);
    s.followLastTarget = scalePoint(s.followLastTarget);
    s.followHeading = scalePoint(s.followHeading);
    s.lastLivePoint = s.lastLivePoint ? this.clampToSource(scalePoint(s.lastLivePoint)) : null;
    s.manualOverride = s.manualOverride ? this.clampToSource(scalePoint(s.manualOverride)) : null;
  }

  /**
   * Advance the animation by `dtSeconds` and return this tick's crop.
   * `mapped` is the cursor in source pixels, or null when it could not be
   * mapped (the last known position is reused).
   */
  advance(dtSeconds: number, mapped: MappedPoint | null): CropRect {
    if (mapped) {
      this.state.lastLivePoint = this.clampToSource({ x: mapped.px, y: mapped.py });
      this.state.lastLiveClamped = mapped.clamped;
    }

    this.state.targetCenter = this.resolveTargetCenter();
    this.state.targetExtent = this.resolveTargetExtent();

    if (!(dtSeconds > 0) || this.state.mode === ZoomMode.Idle) {
      return this.getCropRect();
    }

    switch (this.state.mode) {
      case ZoomMode.ZoomingIn:
      case ZoomMode.ZoomingOut:
        this.advanceZoomLeg(dtSeconds);
        break;
      case ZoomMode.Zoomed:
        this.advanceFollow(dtSeconds);
        break;
    }

    return this.getCropRect();
  }

  /** Current rectangle clamped into the source */
  getCropRect(): CropRect {
    const { width: sw, height: sh } = this.sourceSize;
    const { currentCenter, currentExtent } = this.state;

    const width = clamp(currentExtent.width, Math.min(1, sw), sw);
    const height = clamp(currentExtent.height, Math.min(1, sh), sh);
    const x = clamp(currentCenter.x - width / 2, 0, sw - width);
    const y = clamp(currentCenter.y - height / 2, 0, sh - height);

    return { x, y, width, height };
  }

  getState(): ZoomStateSnapshot {
    const s = this.state;
    return {
      mode: s.mode,
      followEnabled: s.followEnabled,
      following: s.followActive,
      currentCenter: { ...s.currentCenter },
      currentExtent: { ...s.currentExtent },
      targetCenter: { ...s.targetCenter },
      targetExtent: { ...s.targetExtent },
      manualOverride: s.manualOverride ? { ...s.manualOverride } : null,
      profileName: this.profile.name,
      zoomProgress: s.zoomProgress,
      followProgress: s.followProgress,
      crop: this.getCropRect(),
    };
  }

  // ─── Private: Targets ────────────────────

  private resolveTargetCenter(): Point {
    const { mode, manualOverride, lastLivePoint, followEnabled, frozenCenter } = this.state;

    if (manualOverride) {
      return manualOverride;
    }
    const tracking =
      mode === ZoomMode.ZoomingIn || (mode === ZoomMode.Zoomed && followEnabled);
    if (tracking && lastLivePoint) {
      return lastLivePoint;
    }
    return frozenCenter;
  }

  private resolveTargetExtent(): Size {
    const { mode, currentExtent } = this.state;
    switch (mode) {
      case ZoomMode.Idle:
      case ZoomMode.ZoomingOut:
        return this.fullExtent();
      case ZoomMode.ZoomingIn:
        return this.zoomedExtent(this.state.zoomLegProfile);
      case ZoomMode.Zoomed:
        // A new zoom factor applies from the next zoom-in
        return { ...currentExtent };
    }
  }

  private isLiveTarget(): boolean {
    return (
      this.state.manualOverride === null &&
      this.state.followEnabled &&
      this.state.lastLivePoint !== null
    );
  }

  // ─── Private: Legs ───────────────────────

  private startZoomLeg(mode: ZoomMode.ZoomingIn | ZoomMode.ZoomingOut): void {
    const previous = this.state.mode;
    this.state.zoomStartCenter = this.state.currentCenter;
    this.state.zoomStartExtent = this.state.currentExtent;
    this.state.zoomProgress = 0;
    this.state.zoomLegProfile = this.profile;
    this.state.followActive = false;
    this.state.followProgress = 0;
    this.setMode(mode, previous);
  }

  private advanceZoomLeg(dt: number): void {
    const s = this.state;
    const leg = s.zoomLegProfile;
    s.zoomProgress = Math.min(1, s.zoomProgress + dt * leg.zoomSpeed);
    const e = getEasing(leg.easing)(s.zoomProgress);

    s.currentExtent = lerpSize(s.zoomStartExtent, s.targetExtent, e);
    s.currentCenter = lerpPoint(s.zoomStartCenter, s.targetCenter, e);

    if (s.zoomProgress < 1) return;

    const previous = s.mode;
    s.currentExtent = { ...s.targetExtent };
    s.currentCenter = { ...s.targetCenter };

    if (previous === ZoomMode.ZoomingIn) {
      s.frozenCenter = s.currentCenter;
      if (this.profile.autoFollow) {
        s.followEnabled = true;
      }
      this.setMode(ZoomMode.Zoomed, previous);
    } else {
      const center = this.sourceCenter();
      s.currentCenter = center;
      s.currentExtent = this.fullExtent();
      s.targetCenter = center;
      s.frozenCenter = center;
      this.setMode(ZoomMode.Idle, previous);
    }
  }

  /**
   * Ease the centre toward the target in legs. A live cursor target only
   * starts a leg once it leaves the follow border around the current centre.
   *
   * For a live target the profile may also end a leg early, leaving the
   * centre where it is: when the cursor is off the source and
   * followOutsideBounds is off, once the centre is within
   * followSafezoneSensitivity of the cursor, or when the cursor turns back
   * against the leg's heading with autoLockOnReverse.
   */
  private advanceFollow(dt: number): void {
    const s = this.state;
    const target = s.targetCenter;
    const live = this.isLiveTarget();

    if (live && s.lastLiveClamped && !(this.profile.followOutsideBounds ?? true)) {
      this.restartFollowLeg();
      return;
    }

    if (!s.followActive) {
      const dx = Math.abs(target.x - s.currentCenter.x);
      const dy = Math.abs(target.y - s.currentCenter.y);
      const border = live ? Math.max(0, this.profile.followBorder) : 0;
      if (dx <= border && dy <= border) {
        return;
      }
      s.followActive = true;
      s.followProgress = 0;
      s.followStartCenter = s.currentCenter;
      s.followLegProfile = this.profile;
      s.followHeading = { x: target.x - s.currentCenter.x, y: target.y - s.currentCenter.y };
    } else if (live && this.profile.autoLockOnReverse && this.turnedBack(target)) {
      this.restartFollowLeg();
      return;
    }
    s.followLastTarget = target;

    const leg = s.followLegProfile;
    s.followProgress = Math.min(1, s.followProgress + dt * leg.followSpeed);
    const e = getEasing(leg.easing)(s.followProgress);
    s.currentCenter = lerpPoint(s.followStartCenter, target, e);

    if (s.followProgress >= 1) {
      s.currentCenter = { ...target };
      s.followActive = false;
      s.followProgress = 0;
      if (!live) {
        s.frozenCenter = s.currentCenter;
      }
      return;
    }

    const sensitivity = this.profile.followSafezoneSensitivity ?? 0;
    if (
      live &&
      sensitivity > 0 &&
      Math.abs(target.x - s.currentCenter.x) <= sensitivity &&
      Math.abs(target.y - s.currentCenter.y) <= sensitivity
    ) {
      this.restartFollowLeg();
    }
  }

  /** Cursor moved against the leg's heading along its dominant axis */
  private turnedBack(target: Point): boolean {
    const { followHeading: heading, followLastTarget: last } = this.state;
    if (Math.abs(heading.x) >= Math.abs(heading.y)) {
      const moved = target.x - last.x;
      return moved !== 0 && Math.sign(moved) !== Math.sign(heading.x);
    }
    const moved = target.y - last.y;
    return moved !== 0 && Math.sign(moved) !== Math.sign(heading.y);
  }

  /** Drop the follow leg in flight; the centre stays where it is */
  private restartFollowLeg(): void {
    this.state.followActive = false;
    this.state.followProgress = 0;
  }

  // ─── Private: Geometry ───────────────────

  private setMode(mode: ZoomMode, previous: ZoomMode): void {
    this.state.mode = mode;
    if (mode !== previous) {
      this.onModeChange?.(mode, previous);
    }
  }

  private sourceCenter(): Point {
    return { x: this.sourceSize.width / 2, y: this.sourceSize.height / 2 };
  }

  private fullExtent(): Size {
    return { width: this.sourceSize.width, height: this.sourceSize.height };
  }

  private zoomedExtent(profile: ZoomProfile): Size {
    // Factors below 1 would ask for more than the source has
    const factor = Math.max(1, profile.zoomFactor);
    return {
      width: this.sourceSize.width / factor,
      height: this.sourceSize.height / factor,
    };
  }

  private clampToSource(point: Point): Point {
    return {
      x: clamp(point.x, 0, this.sourceSize.width),
      y: clamp(point.y, 0, this.sourceSize.height),
    };
  }
}
