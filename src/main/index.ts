#!/usr/bin/env node
/**
 * @file    main/index.ts
 * @purpose Headless entry point: load configuration, classify displays,
 *          run one zoom session and (optionally) the remote-control server.
 * @owner   Cursor Zoom Core
 * @depends config/*, display/*, zoom/*, remote/server.ts
 *
 * Embedding hosts use createCursorZoomApp() and push cursor positions into
 * `app.sampler`; run directly, remote clients drive the session through
 * mouse_position overrides.
 */

import {
  CropRect,
  CropSink,
  DiagnosticKind,
  ZoomDiagnostic,
} from '../shared/types/zoom';
import {
  ConfigManager,
  CursorZoomConfig,
  DEFAULT_CONFIG_FILENAME,
} from '../config/config-manager';
import { ProfileStore } from '../config/profile-store';
import { DisplayRegistry } from '../display/display-registry';
import { StaticDisplayEnumerator, refreshRegistry } from '../display/display-enumerator';
import { LatestCursorSampler } from '../zoom/cursor-sampler';
import { ZoomSession } from '../zoom/zoom-session';
import { RemoteControlServer } from '../remote/server';

export interface CursorZoomApp {
  readonly session: ZoomSession;
  readonly registry: DisplayRegistry;
  readonly sampler: LatestCursorSampler;
  readonly remote: RemoteControlServer | null;
  /** Re-enumerate displays and refresh the session geometry */
  refreshDisplays(): void;
  getLastCrop(): CropRect | null;
  start(): void;
  stop(): void;
}

export interface CreateAppOptions {
  sourceId?: string;
  /** Receives every crop; the default only records the latest one */
  sink?: CropSink;
}

export function createCursorZoomApp(
  config: Readonly<CursorZoomConfig>,
  profiles: ProfileStore,
  options: CreateAppOptions = {},
): CursorZoomApp {
  const registry = new DisplayRegistry();
  const enumerator = new StaticDisplayEnumerator(config.displays);
  const sampler = new LatestCursorSampler();

  const logDisplayDiagnostics = (diagnostics: ZoomDiagnostic[]): void => {
    for (const d of diagnostics) {
      if (d.kind === DiagnosticKind.ClassificationAmbiguous) {
        if (config.debugLogging) console.debug(`[Main] ${d.message}`);
      } else {
        console.warn(`[Main] ${d.kind}: ${d.message}`);
      }
    }
  };

  logDisplayDiagnostics(refreshRegistry(registry, enumerator, { overrides: config.displayOverrides }));
  if (registry.size === 0) {
    console.warn('[Main] No usable displays configured; crops will cover the full frame');
  }

  let lastCrop: CropRect | null = null;
  const sink: CropSink = (rect, sourceId) => {
    lastCrop = rect;
    options.sink?.(rect, sourceId);
  };

  const session = new ZoomSession(
    options.sourceId ?? 'main',
    registry,
    profiles,
    sampler,
    sink,
    {
      sourceDisplayId: config.session.sourceDisplayId,
      tickIntervalMs: config.session.tickIntervalMs,
      commandQueueCapacity: config.session.commandQueueCapacity,
      sourceCrop: config.session.sourceCrop,
      profileName: config.defaultProfile,
      debugLogging: config.debugLogging,
    },
  );

  let remote: RemoteControlServer | null = null;
  if (config.remote.enabled) {
    const server = new RemoteControlServer({ host: config.remote.host, port: config.remote.port });
    server.setStateProvider(() => session.getState());
    server.setOnCommand((command) => {
      session.enqueue(command);
    });
    session.on('mode', () => {
      server.broadcastState(session.getState());
    });
    remote = server;
  }

  return {
    session,
    registry,
    sampler,
    remote,
    refreshDisplays(): void {
      logDisplayDiagnostics(
        refreshRegistry(registry, enumerator, { overrides: config.displayOverrides }),
      );
      session.refreshGeometry();
    },
    getLastCrop(): CropRect | null {
      return lastCrop;
    },
    start(): void {
      session.start();
      remote?.start();
      console.log(
        `[Main] Running with ${registry.size} display(s), profile "${session.getState().profileName}"`,
      );
    },
    stop(): void {
      remote?.stop();
      session.stop();
    },
  };
}

/** Apply CURSOR_ZOOM_PORT / CURSOR_ZOOM_HOST on top of the loaded file */
export function applyEnvironment(
  config: Readonly<CursorZoomConfig>,
  env: NodeJS.ProcessEnv = process.env,
): CursorZoomConfig {
  const port = parseInt(env.CURSOR_ZOOM_PORT || '', 10);
  const host = env.CURSOR_ZOOM_HOST;
  return {
    ...config,
    remote: {
      ...config.remote,
      port: Number.isInteger(port) && port >= 0 && port <= 65535 ? port : config.remote.port,
      host: host && host.length > 0 ? host : config.remote.host,
    },
  };
}

// ─────────────────────────────────────────────
// Entry point: run as standalone
// ─────────────────────────────────────────────

if (require.main === module) {
  const manager = new ConfigManager(process.env.CURSOR_ZOOM_CONFIG || DEFAULT_CONFIG_FILENAME);
  const config = applyEnvironment(manager.load());
  const app = createCursorZoomApp(config, manager.profileStore());
  app.start();

  if (app.remote) {
    console.log(`[Main] Remote control on ws://${config.remote.host}:${config.remote.port}`);
  }

  process.on('SIGINT', () => {
    app.stop();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    app.stop();
    process.exit(0);
  });
}
