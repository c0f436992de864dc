/**
 * @file    zoom/zoom-session.ts
 * @purpose Drive one capture source's zoom: drain commands, sample the cursor,
 *          map it, advance the state machine and hand the crop to the sink.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts, zoom/*, display/*, config/profile-store.ts
 *
 * One session per active capture source. Ticks come from a single timer (or
 * an external render loop calling tick()) and never overlap. Commands that
 * arrive between ticks are applied, in arrival order, at the start of the
 * next one.
 *
 * Events:
 *   'crop'       (rect: CropRect)
 *   'mode'       (mode: ZoomMode, previous: ZoomMode)
 *   'diagnostic' (diagnostic: ZoomDiagnostic)
 *   'started' / 'stopped'
 */

import { EventEmitter } from 'events';
import {
  CropRect,
  CropSink,
  CursorSampler,
  DiagnosticKind,
  DisplayId,
  NO_SOURCE_CROP,
  QueuedCommand,
  Size,
  SourceCrop,
  ZoomCommand,
  ZoomCommandType,
  ZoomDiagnostic,
  ZoomStateSnapshot,
} from '../shared/types/zoom';
import { CoordinateMapper, applySourceCrop } from '../display/coordinate-mapper';
import { DisplayRegistry } from '../display/display-registry';
import { ProfileStore } from '../config/profile-store';
import { CommandQueue, DEFAULT_COMMAND_QUEUE_CAPACITY } from './command-queue';
import { ZoomStateMachine } from './zoom-state-machine';

// ─────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────

export interface ZoomSessionConfig {
  /** Display shown by the capture source; null follows the cursor's display */
  sourceDisplayId: DisplayId | null;
  /** Timer period when started with start() (ms) */
  tickIntervalMs: number;
  commandQueueCapacity: number;
  /** Initial profile name; unknown names fall back to the store default */
  profileName: string | null;
  /** Pixels the capture source already trims from its display */
  sourceCrop: SourceCrop;
  /** Log every crop and mapping note via console.debug */
  debugLogging: boolean;
}

export const DEFAULT_SESSION_CONFIG: ZoomSessionConfig = {
  sourceDisplayId: null,
  tickIntervalMs: 16,   // ~60 Hz
  commandQueueCapacity: DEFAULT_COMMAND_QUEUE_CAPACITY,
  profileName: null,
  sourceCrop: NO_SOURCE_CROP,
  debugLogging: false,
};

/** Used until any display has been seen */
const FALLBACK_SOURCE_SIZE: Size = { width: 1920, height: 1080 };

// ─────────────────────────────────────────────
// Zoom Session
// ─────────────────────────────────────────────

export class ZoomSession extends EventEmitter {
  readonly sourceId: string;

  private config: ZoomSessionConfig;
  private registry: DisplayRegistry;
  private profiles: ProfileStore;
  private sampler: CursorSampler;
  private sink: CropSink;

  private mapper: CoordinateMapper;
  private machine: ZoomStateMachine;
  private queue: CommandQueue;

  private running: boolean = false;
  private ticking: boolean = false;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private lastTickMs: number | null = null;
  private sourceDisplayId: DisplayId | null = null;

  constructor(
    sourceId: string,
    registry: DisplayRegistry,
    profiles: ProfileStore,
    sampler: CursorSampler,
    sink: CropSink,
    config: Partial<ZoomSessionConfig> = {},
  ) {
    super();
    this.sourceId = sourceId;
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
    this.registry = registry;
    this.profiles = profiles;
    this.sampler = sampler;
    this.sink = sink;

    this.queue = new CommandQueue(this.config.commandQueueCapacity);
    this.mapper = new CoordinateMapper(registry);
    this.mapper.setOnDiagnostic((d) => this.reportDiagnostic(d));

    const requested =
      this.config.profileName !== null ? profiles.get(this.config.profileName) : undefined;
    if (this.config.profileName !== null && !requested) {
      this.reportDiagnostic({
        kind: DiagnosticKind.InvalidProfile,
        message: `Unknown profile "${this.config.profileName}", using default`,
        timestampMs: Date.now(),
      });
    }

    this.sourceDisplayId = this.config.sourceDisplayId;
    this.machine = new ZoomStateMachine(
      this.resolveSourceSize(),
      requested ?? profiles.defaultProfile(),
    );
    this.machine.setOnModeChange((mode, previous) => {
      this.emit('mode', mode, previous);
    });
  }

  // ─── Lifecycle ───────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastTickMs = null;

    this.tickTimer = setInterval(() => {
      this.tick(Date.now());
    }, this.config.tickIntervalMs);

    this.emit('started');
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }

    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─── Commands ────────────────────────────

  /** Queue a command for the next tick; false when the queue is full */
  enqueue(command: ZoomCommand, receivedAtMs: number = Date.now()): boolean {
    const queued = this.queue.enqueue(command, receivedAtMs);
    if (!queued) {
      this.reportDiagnostic({
        kind: DiagnosticKind.CommandDropped,
        message: `Command queue full, dropped ${command.type}`,
        timestampMs: receivedAtMs,
      });
      return false;
    }
    return true;
  }

  pendingCommands(): number {
    return this.queue.length;
  }

  // ─── Tick ────────────────────────────────

  /**
   * Run one frame. `nowMs` is a monotonic timestamp; the first tick after
   * start (or construction) advances by zero.
   */
  tick(nowMs: number): CropRect {
    if (this.ticking) {
      // Re-entered from a listener; keep the frame we are already producing
      return this.machine.getCropRect();
    }
    this.ticking = true;

    try {
      const dtSeconds = this.lastTickMs === null ? 0 : Math.max(0, nowMs - this.lastTickMs) / 1000;
      this.lastTickMs = nowMs;

      for (const queued of this.queue.drain()) {
        this.applyCommand(queued);
      }

      const sample = this.sampler.sample();
      const onDisplay = this.mapper.map(sample, this.config.sourceDisplayId);

      if (onDisplay && this.config.sourceDisplayId === null) {
        // Auto mode: the cropped source follows the cursor's display
        this.setSourceDisplay(onDisplay.displayId);
      }
      const mapped = onDisplay
        ? applySourceCrop(onDisplay, this.config.sourceCrop, this.machine.getSourceSize())
        : null;

      const rect = this.machine.advance(dtSeconds, mapped);
      const output = mapped ? rect : this.fullFrame();

      if (this.config.debugLogging) {
        console.debug(
          `[ZoomSession] ${this.sourceId} ${this.machine.getMode()} crop=` +
          `${output.x.toFixed(1)},${output.y.toFixed(1)} ${output.width.toFixed(1)}x${output.height.toFixed(1)}`,
        );
      }

      this.sink(output, this.sourceId);
      this.emit('crop', output);
      return output;
    } finally {
      this.ticking = false;
    }
  }

  // ─── Geometry ────────────────────────────

  /**
   * Re-read the source display after the registry swapped records
   * (display plugged, unplugged, or re-classified).
   */
  refreshGeometry(): void {
    if (this.sourceDisplayId !== null && !this.registry.get(this.sourceDisplayId)) {
      if (this.config.sourceDisplayId === null) {
        this.sourceDisplayId = null;
      }
      this.mapper.reset();
    }
    this.machine.setSourceSize(this.resolveSourceSize());
  }

  getState(): ZoomStateSnapshot {
    return this.machine.getState();
  }

  getSourceDisplayId(): DisplayId | null {
    return this.sourceDisplayId;
  }

  // ─── Private ─────────────────────────────

  private applyCommand(queued: QueuedCommand): void {
    const { command } = queued;

    switch (command.type) {
      case ZoomCommandType.ToggleZoom:
        this.machine.toggleZoom();
        break;

      case ZoomCommandType.ToggleFollow:
        this.machine.toggleFollow();
        break;

      case ZoomCommandType.SetProfile: {
        const profile = this.profiles.get(command.name);
        if (!profile) {
          this.reportDiagnostic({
            kind: DiagnosticKind.InvalidProfile,
            message: `Unknown profile "${command.name}"; keeping "${this.machine.getProfile().name}"`,
            timestampMs: queued.receivedAtMs,
          });
          break;
        }
        this.machine.setProfile(profile);
        console.log(`[ZoomSession] ${this.sourceId} profile → ${profile.name}`);
        break;
      }

      case ZoomCommandType.SetMouseOverride:
        this.machine.setMouseOverride({ x: command.x, y: command.y });
        break;

      case ZoomCommandType.ClearMouseOverride:
        this.machine.clearMouseOverride();
        break;
    }
  }

  private setSourceDisplay(displayId: DisplayId): void {
    if (displayId === this.sourceDisplayId) return;
    this.sourceDisplayId = displayId;
    this.machine.setSourceSize(this.resolveSourceSize());
  }

  private resolveSourceSize(): Size {
    const display =
      (this.sourceDisplayId !== null ? this.registry.get(this.sourceDisplayId) : undefined) ??
      this.registry.primary();
    if (!display) {
      return { ...FALLBACK_SOURCE_SIZE };
    }
    const { left, top, right, bottom } = this.config.sourceCrop;
    return {
      width: Math.max(1, display.pixelSize.width - left - right),
      height: Math.max(1, display.pixelSize.height - top - bottom),
    };
  }

  private fullFrame(): CropRect {
    const size = this.machine.getSourceSize();
    return { x: 0, y: 0, width: size.width, height: size.height };
  }

  private reportDiagnostic(diagnostic: ZoomDiagnostic): void {
    if (diagnostic.kind === DiagnosticKind.DisplayNotFound) {
      if (this.config.debugLogging) {
        console.debug(`[ZoomSession] ${diagnostic.message}`);
      }
    } else {
      console.warn(`[ZoomSession] ${diagnostic.kind}: ${diagnostic.message}`);
    }
    this.emit('diagnostic', diagnostic);
  }
}
