/**
 * @file    types/zoom.ts
 * @purpose Core domain types for the cursor-zoom crop engine.
 * @owner   Cursor Zoom Core
 * @depends None (leaf module)
 *
 * Coordinate spaces used throughout:
 *   - global logical space: points, top-left origin, Y downward, spanning all displays
 *   - source pixel space: pixels of one capture source, origin at its top-left
 */

// ─────────────────────────────────────────────
// Geometry
// ─────────────────────────────────────────────

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

/** Per-axis logical → pixel multiplier */
export interface Scale {
  readonly sx: number;
  readonly sy: number;
}

/** Crop region in source pixel space */
export interface CropRect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Pixels a capture source already trims from each edge of its display */
export interface SourceCrop {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

export const NO_SOURCE_CROP: SourceCrop = { left: 0, top: 0, right: 0, bottom: 0 };

// ─────────────────────────────────────────────
// Displays
// ─────────────────────────────────────────────

/** Stable opaque display identifier (e.g., "main", "69733378") */
export type DisplayId = string;

/** Where a platform puts (0,0) and which way Y grows */
export enum OriginConvention {
  TopLeftDown  = 'top_left_down',
  BottomLeftUp = 'bottom_left_up',
}

/** How a display's reported size relates to its capture pixels */
export enum SizeClassification {
  Points  = 'points',
  Pixels  = 'pixels',
  Derived = 'derived',
  Manual  = 'manual',
}

/** Raw display description as supplied by a display enumerator */
export interface DisplayDescriptor {
  readonly id: DisplayId;
  readonly label: string;
  /** Top-left corner in the enumerator's own global space (points) */
  readonly origin: Point;
  readonly logicalSize: Size;
  /** Capture-source pixel size, when a source for this display is known */
  readonly pixelSize?: Size;
  /** OS-reported backing scale; may be missing or wrong */
  readonly backingScaleHint?: number;
  readonly isPrimary: boolean;
  /** Convention of `origin`; defaults to top-left-down */
  readonly originConvention?: OriginConvention;
}

/** Manual per-display geometry override from configuration */
export interface DisplayOverride {
  readonly scaleX?: number;
  readonly scaleY?: number;
  readonly pixelWidth?: number;
  readonly pixelHeight?: number;
}

/**
 * One classified display. Frozen on creation; a geometry or scale change
 * produces a new record that replaces this one in the registry.
 */
export interface DisplayRecord {
  readonly id: DisplayId;
  readonly label: string;
  /** Top-left corner in global logical space */
  readonly origin: Point;
  readonly logicalSize: Size;
  /** Authoritative for cropping */
  readonly pixelSize: Size;
  readonly scale: Scale;
  readonly classification: SizeClassification;
  readonly isPrimary: boolean;
}

// ─────────────────────────────────────────────
// Cursor
// ─────────────────────────────────────────────

/** One instantaneous cursor reading in the producing OS's native space */
export interface CursorSample {
  readonly rawX: number;
  readonly rawY: number;
  readonly timestampMs: number;
  readonly originConvention: OriginConvention;
}

/** Cursor resolved into one display's pixel space */
export interface MappedPoint {
  readonly displayId: DisplayId;
  readonly px: number;
  readonly py: number;
  /** True when the point fell outside the display and was clipped */
  readonly clamped: boolean;
}

// ─────────────────────────────────────────────
// Zoom profiles
// ─────────────────────────────────────────────

export type EasingName =
  | 'linear'
  | 'ease_in'
  | 'ease_out'
  | 'ease_in_out'
  | 'ease_in_quad'
  | 'ease_out_quad'
  | 'ease_in_out_quad'
  | 'ease_in_cubic'
  | 'ease_out_cubic'
  | 'ease_in_out_cubic'
  | 'ease_in_quart'
  | 'ease_out_quart'
  | 'ease_in_out_quart'
  | 'ease_in_quint'
  | 'ease_out_quint'
  | 'ease_in_out_quint'
  | 'ease_in_sine'
  | 'ease_out_sine'
  | 'ease_in_out_sine'
  | 'ease_in_expo'
  | 'ease_out_expo'
  | 'ease_in_out_expo'
  | 'ease_in_circ'
  | 'ease_out_circ'
  | 'ease_in_out_circ'
  | 'ease_in_back'
  | 'ease_out_back'
  | 'ease_in_out_back'
  | 'elastic'
  | 'ease_in_elastic'
  | 'ease_out_elastic'
  | 'ease_in_out_elastic'
  | 'bounce'
  | 'bounce_in'
  | 'bounce_out'
  | 'ease_in_out_bounce';

/** Profile values as stored in configuration (name is the map key) */
export interface ZoomProfileSettings {
  /** Source size / crop size; values below 1 behave as 1 */
  readonly zoomFactor: number;
  /** Zoom animation progress per second */
  readonly zoomSpeed: number;
  /** Follow animation progress per second */
  readonly followSpeed: number;
  /** Dead-zone half-width around the crop centre, in source pixels */
  readonly followBorder: number;
  readonly easing: EasingName;
  /** Enable following when a zoom-in completes */
  readonly autoFollow: boolean;
  /** Keep following while the cursor is outside the crop (default true) */
  readonly followOutsideBounds?: boolean;
  /**
   * End a follow leg early, where it is, once the centre is this many
   * pixels from the cursor on both axes (default 0: run the leg out)
   */
  readonly followSafezoneSensitivity?: number;
  /** End a follow leg where it is when the cursor turns back (default false) */
  readonly autoLockOnReverse?: boolean;
}

/** Immutable named profile snapshot */
export interface ZoomProfile extends ZoomProfileSettings {
  readonly name: string;
}

export const DEFAULT_PROFILE_NAME = 'standard';

export const DEFAULT_ZOOM_PROFILE: ZoomProfile = {
  name: DEFAULT_PROFILE_NAME,
  zoomFactor: 2.0,
  zoomSpeed: 3.0,      // ~330ms zoom
  followSpeed: 4.0,
  followBorder: 8,
  easing: 'ease_in_out',
  autoFollow: true,
  followOutsideBounds: false,
  followSafezoneSensitivity: 4,
  autoLockOnReverse: false,
};

export const BUILTIN_PROFILES: Readonly<Record<string, ZoomProfileSettings>> = {
  standard: {
    zoomFactor: 2.0,
    zoomSpeed: 3.0,
    followSpeed: 4.0,
    followBorder: 8,
    easing: 'ease_in_out',
    autoFollow: true,
    followOutsideBounds: false,
    followSafezoneSensitivity: 4,
    autoLockOnReverse: false,
  },
  presentation: {
    zoomFactor: 3.0,
    zoomSpeed: 5.0,
    followSpeed: 5.0,
    followBorder: 15,
    easing: 'ease_in_out',
    autoFollow: true,
    followOutsideBounds: false,
    followSafezoneSensitivity: 4,
    autoLockOnReverse: false,
  },
  quick: {
    zoomFactor: 2.5,
    zoomSpeed: 8.0,
    followSpeed: 7.0,
    followBorder: 10,
    easing: 'ease_out',
    autoFollow: true,
    followOutsideBounds: true,
    followSafezoneSensitivity: 4,
    autoLockOnReverse: false,
  },
};

// ─────────────────────────────────────────────
// Zoom state machine
// ─────────────────────────────────────────────

export enum ZoomMode {
  Idle       = 'idle',
  ZoomingIn  = 'zooming_in',
  Zoomed     = 'zoomed',
  ZoomingOut = 'zooming_out',
}

/** Read-only view of a state machine, for status reporting and remote clients */
export interface ZoomStateSnapshot {
  readonly mode: ZoomMode;
  readonly followEnabled: boolean;
  /** A follow leg is currently easing the centre */
  readonly following: boolean;
  readonly currentCenter: Point;
  readonly currentExtent: Size;
  readonly targetCenter: Point;
  readonly targetExtent: Size;
  readonly manualOverride: Point | null;
  readonly profileName: string;
  readonly zoomProgress: number;
  readonly followProgress: number;
  readonly crop: CropRect;
}

// ─────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────

export enum ZoomCommandType {
  ToggleZoom         = 'toggle_zoom',
  ToggleFollow       = 'toggle_follow',
  SetProfile         = 'set_profile',
  SetMouseOverride   = 'set_mouse_override',
  ClearMouseOverride = 'clear_mouse_override',
}

export type ZoomCommand =
  | { readonly type: ZoomCommandType.ToggleZoom }
  | { readonly type: ZoomCommandType.ToggleFollow }
  | { readonly type: ZoomCommandType.SetProfile; readonly name: string }
  | { readonly type: ZoomCommandType.SetMouseOverride; readonly x: number; readonly y: number }
  | { readonly type: ZoomCommandType.ClearMouseOverride };

/** A command tagged with its arrival order */
export interface QueuedCommand {
  readonly command: ZoomCommand;
  readonly sequence: number;
  readonly receivedAtMs: number;
}

// ─────────────────────────────────────────────
// Diagnostics
// ─────────────────────────────────────────────

/** Non-fatal conditions; none of them stops the tick loop */
export enum DiagnosticKind {
  ClassificationAmbiguous = 'classification_ambiguous',
  DisplayNotFound         = 'display_not_found',
  InvalidProfile          = 'invalid_profile',
  DegenerateGeometry      = 'degenerate_geometry',
  CommandDropped          = 'command_dropped',
}

export interface ZoomDiagnostic {
  readonly kind: DiagnosticKind;
  readonly message: string;
  readonly displayId?: DisplayId;
  readonly timestampMs: number;
}

// ─────────────────────────────────────────────
// Collaborators
// ─────────────────────────────────────────────

/** Pull-based cursor source; called once per tick */
export interface CursorSampler {
  sample(): CursorSample;
}

/** Receives the per-tick crop rectangle */
export type CropSink = (rect: CropRect, sourceId: string) => void;

/** Supplies display descriptors at startup and on display-change notifications */
export interface DisplayEnumerator {
  enumerate(): DisplayDescriptor[];
}
