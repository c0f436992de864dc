/**
 * @file    test/zoom-state-machine.test.ts
 * @purpose Unit tests for the zoom/follow state machine.
 * @owner   Cursor Zoom Core
 *
 * Test plan:
 *   - advance(0, …) never moves the rectangle
 *   - zoom legs interpolate from the rectangle current at the toggle
 *   - non-overshoot easings approach the target monotonically
 *   - manual override beats the live cursor until cleared
 *   - follow border dead zone and follow legs
 *   - follow tuning: outside-bounds hold, safe zone, lock on reverse
 *   - profile switches and override changes never jump a leg in flight
 *   - the emitted rectangle stays inside the source during overshoot
 */

import { ZoomStateMachine } from '../src/zoom/zoom-state-machine';
import { EASING_NAMES, OVERSHOOT_EASINGS, isEasingName } from '../src/zoom/easing';
import {
  DEFAULT_ZOOM_PROFILE,
  EasingName,
  MappedPoint,
  Size,
  ZoomMode,
  ZoomProfile,
} from '../src/shared/types/zoom';

// ═══════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════

const SOURCE: Size = { width: 1920, height: 1080 };

function makeProfile(overrides: Partial<ZoomProfile> = {}): ZoomProfile {
  return {
    ...DEFAULT_ZOOM_PROFILE,
    name: 'test',
    zoomFactor: 2,
    zoomSpeed: 1,
    followSpeed: 4,
    followBorder: 8,
    easing: 'linear',
    autoFollow: true,
    followOutsideBounds: true,
    followSafezoneSensitivity: 0,
    autoLockOnReverse: false,
    ...overrides,
  };
}

function at(px: number, py: number): MappedPoint {
  return { displayId: 'd', px, py, clamped: false };
}

/** Cursor off the source, clipped onto its edge by the mapper */
function clippedAt(px: number, py: number): MappedPoint {
  return { displayId: 'd', px, py, clamped: true };
}

/** Machine already zoomed in and centred on `center` */
function zoomedAt(center: MappedPoint, overrides: Partial<ZoomProfile> = {}): ZoomStateMachine {
  const machine = new ZoomStateMachine(SOURCE, makeProfile(overrides));
  machine.toggleZoom();
  machine.advance(1, center);
  return machine;
}

// ═══════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════

describe('ZoomStateMachine', () => {
  // ─── Initial state ───────────────────────

  describe('Initial state', () => {
    it('should start idle at full frame', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());

      expect(machine.getMode()).toBe(ZoomMode.Idle);
      expect(machine.advance(0.016, at(100, 100))).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });
      expect(machine.getState().followEnabled).toBe(false);
    });
  });

  // ─── Idempotence ─────────────────────────

  describe('Idempotence', () => {
    it('should not move the rectangle on advance(0) in any mode', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      const check = (): void => {
        const before = machine.getState();
        machine.advance(0, at(1500, 900));
        const after = machine.getState();
        expect(after.currentCenter).toEqual(before.currentCenter);
        expect(after.currentExtent).toEqual(before.currentExtent);
      };

      check();
      machine.toggleZoom();
      machine.advance(0.25, at(300, 200));
      check();
      machine.advance(1, at(300, 200));
      expect(machine.getMode()).toBe(ZoomMode.Zoomed);
      check();
      machine.toggleZoom();
      machine.advance(0.25, at(300, 200));
      check();
    });
  });

  // ─── Zoom legs ───────────────────────────

  describe('Zoom legs', () => {
    it('should be halfway through the extent after half the leg', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      machine.toggleZoom();
      machine.advance(0.5, at(960, 540));

      const state = machine.getState();
      expect(state.mode).toBe(ZoomMode.ZoomingIn);
      expect(state.currentExtent).toEqual({ width: 1440, height: 810 });
      expect(state.zoomProgress).toBe(0.5);
    });

    it('should settle on the zoomed extent and report each mode change', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      const changes: Array<[ZoomMode, ZoomMode]> = [];
      machine.setOnModeChange((mode, previous) => changes.push([mode, previous]));

      machine.toggleZoom();
      machine.advance(0.5, at(960, 540));
      machine.advance(0.5, at(960, 540));

      expect(machine.getState().currentExtent).toEqual({ width: 960, height: 540 });
      expect(changes).toEqual([
        [ZoomMode.ZoomingIn, ZoomMode.Idle],
        [ZoomMode.Zoomed, ZoomMode.ZoomingIn],
      ]);
    });

    it('should zoom toward the cursor', () => {
      const machine = zoomedAt(at(500, 400));
      expect(machine.getState().currentCenter).toEqual({ x: 500, y: 400 });
      expect(machine.getCropRect()).toEqual({ x: 20, y: 130, width: 960, height: 540 });
    });

    it('should zoom into the source centre when the cursor was never mapped', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      machine.toggleZoom();
      machine.advance(1, null);
      expect(machine.getCropRect()).toEqual({ x: 480, y: 270, width: 960, height: 540 });
    });

    it('should return to idle at full frame after zooming out', () => {
      const machine = zoomedAt(at(500, 400));
      machine.toggleZoom();
      expect(machine.getMode()).toBe(ZoomMode.ZoomingOut);

      machine.advance(1, at(500, 400));

      expect(machine.getMode()).toBe(ZoomMode.Idle);
      expect(machine.getState().currentCenter).toEqual({ x: 960, y: 540 });
      expect(machine.getCropRect()).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });
    });

    it('should reverse a zoom-out from where it got to', () => {
      const machine = zoomedAt(at(960, 540));
      machine.toggleZoom();
      machine.advance(0.5, null);
      expect(machine.getState().currentExtent).toEqual({ width: 1440, height: 810 });

      machine.toggleZoom();
      expect(machine.getMode()).toBe(ZoomMode.ZoomingIn);
      expect(machine.getState().currentExtent).toEqual({ width: 1440, height: 810 });

      machine.advance(0.5, null);
      expect(machine.getState().currentExtent).toEqual({ width: 1200, height: 675 });
    });

    it('should treat zoom factors below 1 as 1', () => {
      const machine = zoomedAt(at(960, 540), { zoomFactor: 0.5 });
      expect(machine.getCropRect()).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });
    });

    it('should change mode on progress, not on the eased value', () => {
      // bounce reaches 1 at progress 1/2.75
      const machine = new ZoomStateMachine(SOURCE, makeProfile({ easing: 'bounce' }));
      machine.toggleZoom();
      machine.advance(0.5, at(960, 540));
      expect(machine.getMode()).toBe(ZoomMode.ZoomingIn);
    });
  });

  // ─── Monotonicity ────────────────────────

  describe('Monotonicity', () => {
    const monotonic = EASING_NAMES.filter(
      (name): name is EasingName => isEasingName(name) && !OVERSHOOT_EASINGS.has(name),
    );

    it.each(monotonic)('should approach a fixed target strictly with %s', (easing) => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile({ easing }));
      const target = at(400, 300);
      machine.advance(0, target);
      machine.toggleZoom();

      let previousWidth = machine.getState().currentExtent.width;
      let previousDistance = Math.hypot(960 - 400, 540 - 300);

      for (let i = 0; i < 8; i++) {
        machine.advance(0.125, target);
        const { currentExtent, currentCenter } = machine.getState();
        const distance = Math.hypot(currentCenter.x - 400, currentCenter.y - 300);

        expect(currentExtent.width).toBeLessThan(previousWidth);
        expect(distance).toBeLessThan(previousDistance);
        previousWidth = currentExtent.width;
        previousDistance = distance;
      }

      expect(machine.getMode()).toBe(ZoomMode.Zoomed);
      expect(machine.getState().currentExtent).toEqual({ width: 960, height: 540 });
    });
  });

  // ─── Overshoot ───────────────────────────

  describe('Overshoot', () => {
    it('should let the state overshoot while the crop stays inside the source', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile({ easing: 'ease_out_back' }));
      machine.advance(0, at(1900, 1060));
      machine.toggleZoom();
      const crop = machine.advance(0.5, at(1900, 1060));

      const state = machine.getState();
      expect(state.currentCenter.x).toBeGreaterThan(1900);
      expect(state.currentExtent.width).toBeLessThan(960);
      expect(crop.x).toBeGreaterThanOrEqual(0);
      expect(crop.x + crop.width).toBeCloseTo(1920, 9);
      expect(crop.y + crop.height).toBeCloseTo(1080, 9);
    });
  });

  // ─── Manual override ─────────────────────

  describe('Manual override', () => {
    it('should target the override instead of the live cursor until cleared', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      machine.setMouseOverride({ x: 100, y: 200 });

      machine.advance(0.1, at(900, 900));
      expect(machine.getState().targetCenter).toEqual({ x: 100, y: 200 });

      machine.toggleZoom();
      machine.advance(1, at(900, 900));
      expect(machine.getState().targetCenter).toEqual({ x: 100, y: 200 });
      expect(machine.getState().currentCenter).toEqual({ x: 100, y: 200 });

      machine.advance(0.1, at(950, 950));
      expect(machine.getState().targetCenter).toEqual({ x: 100, y: 200 });

      machine.clearMouseOverride();
      machine.advance(0, at(950, 950));
      expect(machine.getState().targetCenter).toEqual({ x: 950, y: 950 });
    });

    it('should clamp the override into the source', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      machine.setMouseOverride({ x: -20, y: 5000 });
      expect(machine.getState().manualOverride).toEqual({ x: 0, y: 1080 });
    });
  });

  // ─── Follow ──────────────────────────────

  describe('Follow', () => {
    it('should enable following when a zoom-in completes with autoFollow', () => {
      expect(zoomedAt(at(500, 500)).getState().followEnabled).toBe(true);
      expect(zoomedAt(at(500, 500), { autoFollow: false }).getState().followEnabled).toBe(false);
    });

    it('should ignore movement inside the follow border', () => {
      const machine = zoomedAt(at(500, 500));
      machine.advance(0.1, at(505, 505));

      expect(machine.getState().currentCenter).toEqual({ x: 500, y: 500 });
      expect(machine.getState().following).toBe(false);
    });

    it('should start easing once the cursor leaves the border', () => {
      const machine = zoomedAt(at(500, 500));
      machine.advance(0.1, at(505, 505));
      machine.advance(0.1, at(520, 520));

      const state = machine.getState();
      expect(state.following).toBe(true);
      expect(state.currentCenter.x).toBeCloseTo(508, 9);
      expect(state.currentCenter.y).toBeCloseTo(508, 9);
    });

    it('should reach the cursor at the end of the leg', () => {
      const machine = zoomedAt(at(500, 500));
      machine.advance(0.1, at(520, 520));
      machine.advance(0.2, at(520, 520));

      const state = machine.getState();
      expect(state.currentCenter).toEqual({ x: 520, y: 520 });
      expect(state.following).toBe(false);
    });

    it('should freeze immediately when following is turned off mid-leg', () => {
      const machine = zoomedAt(at(500, 500));
      machine.advance(0.1, at(520, 520));
      machine.toggleFollow();

      const frozen = machine.getState().currentCenter;
      machine.advance(0.1, at(900, 900));

      expect(machine.getState().followEnabled).toBe(false);
      expect(machine.getState().following).toBe(false);
      expect(machine.getState().currentCenter).toEqual(frozen);
    });

    it('should not follow the cursor while following is off', () => {
      const machine = zoomedAt(at(500, 500), { autoFollow: false });
      machine.advance(0.5, at(900, 700));
      expect(machine.getState().currentCenter).toEqual({ x: 500, y: 500 });
    });

    it('should restart a leg from where it is when the override changes', () => {
      const machine = zoomedAt(at(500, 500));
      machine.advance(0.1, at(520, 520));
      expect(machine.getState().currentCenter.x).toBeCloseTo(508, 9);

      machine.setMouseOverride({ x: 900, y: 700 });
      expect(machine.getState().following).toBe(false);

      machine.advance(0.1, at(520, 520));
      const { currentCenter } = machine.getState();
      expect(currentCenter.x).toBeCloseTo(664.8, 9);
      expect(currentCenter.y).toBeCloseTo(584.8, 9);
    });

    it('should restart a leg when the override is cleared', () => {
      const machine = zoomedAt(at(500, 500));
      machine.setMouseOverride({ x: 600, y: 500 });
      machine.advance(0.1, at(500, 500));
      expect(machine.getState().currentCenter.x).toBeCloseTo(540, 9);

      machine.clearMouseOverride();
      machine.advance(0.1, at(440, 500));
      // New leg from 540 toward the live cursor at 440
      expect(machine.getState().currentCenter.x).toBeCloseTo(500, 9);
    });
  });

  // ─── Follow tuning ───────────────────────

  describe('Follow tuning', () => {
    it('should hold while the cursor is off the source unless followOutsideBounds is set', () => {
      const held = zoomedAt(at(500, 500), { followOutsideBounds: false });
      held.advance(0.1, clippedAt(1920, 500));
      expect(held.getState().currentCenter).toEqual({ x: 500, y: 500 });
      expect(held.getState().following).toBe(false);

      const followed = zoomedAt(at(500, 500), { followOutsideBounds: true });
      followed.advance(0.1, clippedAt(1920, 500));
      expect(followed.getState().currentCenter.x).toBeCloseTo(1068, 9);
    });

    it('should stop a leg where it is when the cursor leaves the source', () => {
      const machine = zoomedAt(at(500, 500), { followOutsideBounds: false });
      machine.advance(0.1, at(600, 500));
      expect(machine.getState().currentCenter.x).toBeCloseTo(540, 9);

      machine.advance(0.1, clippedAt(1920, 500));
      expect(machine.getState().currentCenter.x).toBeCloseTo(540, 9);
      expect(machine.getState().following).toBe(false);

      machine.advance(0.1, at(600, 500));
      // Back on the source: a fresh leg from 540
      expect(machine.getState().currentCenter.x).toBeCloseTo(564, 9);
    });

    it('should end a leg inside the safe zone', () => {
      const locked = zoomedAt(at(500, 500), { followSafezoneSensitivity: 10 });
      locked.advance(0.2, at(540, 500));
      expect(locked.getState().currentCenter.x).toBeCloseTo(532, 9);
      expect(locked.getState().following).toBe(false);

      const running = zoomedAt(at(500, 500));
      running.advance(0.2, at(540, 500));
      expect(running.getState().following).toBe(true);
    });

    it('should lock where it is when the cursor turns back', () => {
      const locked = zoomedAt(at(500, 500), { autoLockOnReverse: true });
      locked.advance(0.1, at(600, 500));
      locked.advance(0.1, at(580, 500));
      expect(locked.getState().currentCenter.x).toBeCloseTo(540, 9);
      expect(locked.getState().following).toBe(false);

      const running = zoomedAt(at(500, 500));
      running.advance(0.1, at(600, 500));
      running.advance(0.1, at(580, 500));
      expect(running.getState().currentCenter.x).toBeCloseTo(564, 9);
    });

    it('should keep following while the cursor moves on in the same direction', () => {
      const machine = zoomedAt(at(500, 500), { autoLockOnReverse: true });
      machine.advance(0.1, at(600, 500));
      machine.advance(0.1, at(620, 500));
      expect(machine.getState().following).toBe(true);
      expect(machine.getState().currentCenter.x).toBeCloseTo(596, 9);
    });
  });

  // ─── Profiles & geometry ─────────────────

  describe('Profiles and geometry', () => {
    it('should finish a zoom-in with the easing it started with', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      machine.toggleZoom();
      machine.advance(0.5, at(960, 540));
      expect(machine.getState().currentExtent.width).toBe(1440);

      machine.setProfile(makeProfile({ name: 'eased', easing: 'ease_in' }));
      machine.advance(0.05, at(960, 540));
      expect(machine.getState().currentExtent.width).toBeCloseTo(1392, 6);
    });

    it('should finish a zoom-in toward the factor and speed it started with', () => {
      const machine = new ZoomStateMachine(SOURCE, makeProfile());
      machine.toggleZoom();
      machine.advance(0.5, at(960, 540));

      machine.setProfile(makeProfile({ name: 'closer', zoomFactor: 4, zoomSpeed: 10 }));
      machine.advance(0.01, at(960, 540));
      expect(machine.getState().currentExtent.width).toBeCloseTo(1430.4, 6);
      expect(machine.getState().targetExtent).toEqual({ width: 960, height: 540 });

      machine.advance(1, at(960, 540));
      expect(machine.getMode()).toBe(ZoomMode.Zoomed);
      expect(machine.getState().currentExtent).toEqual({ width: 960, height: 540 });
    });

    it('should finish a zoom-out with the speed and easing it started with', () => {
      const machine = zoomedAt(at(960, 540));
      machine.toggleZoom();
      machine.advance(0.5, at(960, 540));

      machine.setProfile(makeProfile({ name: 'snappy', zoomSpeed: 10, easing: 'ease_in' }));
      machine.advance(0.25, at(960, 540));

      expect(machine.getMode()).toBe(ZoomMode.ZoomingOut);
      expect(machine.getState().currentExtent).toEqual({ width: 1680, height: 945 });
    });

    it('should keep the zoomed extent when the profile changes', () => {
      const machine = zoomedAt(at(960, 540));
      machine.setProfile(makeProfile({ name: 'closer', zoomFactor: 4 }));
      machine.advance(0.1, at(960, 540));
      expect(machine.getState().currentExtent).toEqual({ width: 960, height: 540 });
      expect(machine.getState().profileName).toBe('closer');

      machine.toggleZoom();
      machine.advance(1, at(960, 540));
      machine.toggleZoom();
      machine.advance(1, at(960, 540));
      expect(machine.getState().currentExtent).toEqual({ width: 480, height: 270 });
    });

    it('should rescale the state when the source size changes', () => {
      const machine = zoomedAt(at(500, 400));
      machine.setSourceSize({ width: 3840, height: 2160 });

      expect(machine.getState().currentCenter).toEqual({ x: 1000, y: 800 });
      expect(machine.getState().currentExtent).toEqual({ width: 1920, height: 1080 });
      expect(machine.getSourceSize()).toEqual({ width: 3840, height: 2160 });
    });

    it('should ignore a degenerate source size', () => {
      const machine = zoomedAt(at(500, 400));
      machine.setSourceSize({ width: 0, height: 2160 });
      expect(machine.getSourceSize()).toEqual(SOURCE);
    });

    it('should reset to idle at full frame', () => {
      const machine = zoomedAt(at(500, 400));
      const changes: ZoomMode[] = [];
      machine.setOnModeChange((mode) => changes.push(mode));

      machine.reset();

      expect(changes).toEqual([ZoomMode.Idle]);
      expect(machine.getCropRect()).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });
    });
  });
});
