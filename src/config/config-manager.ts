/**
 * @file    config/config-manager.ts
 * @purpose Load, validate and persist the JSON configuration file.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts, zoom/easing.ts, config/profile-store.ts
 *
 * The file is validated with zod on every load. A missing file is created
 * with defaults; an unreadable or invalid one is logged and replaced in
 * memory by defaults (the file on disk is left alone).
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  BUILTIN_PROFILES,
  DEFAULT_PROFILE_NAME,
  DisplayId,
  DisplayOverride,
  EasingName,
  NO_SOURCE_CROP,
  OriginConvention,
  ZoomProfile,
  ZoomProfileSettings,
} from '../shared/types/zoom';
import { EASING_NAMES, isEasingName } from '../zoom/easing';
import { DEFAULT_COMMAND_QUEUE_CAPACITY } from '../zoom/command-queue';
import { ProfileStore } from './profile-store';

export const CONFIG_VERSION = '1.0.0';
export const DEFAULT_CONFIG_FILENAME = 'cursor-zoom.json';

// ─────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────

const PointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const SizeSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
});

export const ProfileSettingsSchema = z.object({
  zoomFactor: z.number().min(1),
  zoomSpeed: z.number().positive(),
  followSpeed: z.number().positive(),
  followBorder: z.number().nonnegative(),
  easing: z.custom<EasingName>(
    (value) => typeof value === 'string' && isEasingName(value),
    { message: `easing must be one of: ${EASING_NAMES.join(', ')}` },
  ),
  autoFollow: z.boolean(),
  followOutsideBounds: z.boolean().optional(),
  followSafezoneSensitivity: z.number().nonnegative().optional(),
  autoLockOnReverse: z.boolean().optional(),
});

const DisplayOverrideSchema = z.object({
  scaleX: z.number().positive().optional(),
  scaleY: z.number().positive().optional(),
  pixelWidth: z.number().int().positive().optional(),
  pixelHeight: z.number().int().positive().optional(),
});

const DisplayDescriptorSchema = z.object({
  id: z.string().min(1),
  label: z.string().default(''),
  origin: PointSchema,
  logicalSize: SizeSchema,
  pixelSize: SizeSchema.optional(),
  backingScaleHint: z.number().positive().optional(),
  isPrimary: z.boolean().default(false),
  originConvention: z.nativeEnum(OriginConvention).optional(),
});

const RemoteSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(8765),
});

const SourceCropSchema = z.object({
  left: z.number().int().nonnegative().default(0),
  top: z.number().int().nonnegative().default(0),
  right: z.number().int().nonnegative().default(0),
  bottom: z.number().int().nonnegative().default(0),
});

const SessionSettingsSchema = z.object({
  sourceDisplayId: z.string().min(1).nullable().default(null),
  tickIntervalMs: z.number().int().positive().default(16),
  commandQueueCapacity: z.number().int().positive().default(DEFAULT_COMMAND_QUEUE_CAPACITY),
  sourceCrop: SourceCropSchema.default({}),
});

export const CursorZoomConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION),
  defaultProfile: z.string().min(1).default(DEFAULT_PROFILE_NAME),
  profiles: z
    .record(ProfileSettingsSchema)
    .default(() => cloneProfiles(BUILTIN_PROFILES))
    .refine((profiles) => Object.keys(profiles).length > 0, {
      message: 'at least one profile is required',
    }),
  remote: RemoteSettingsSchema.default({}),
  displayOverrides: z.record(DisplayOverrideSchema).default({}),
  displays: z.array(DisplayDescriptorSchema).default([]),
  session: SessionSettingsSchema.default({}),
  debugLogging: z.boolean().default(false),
});

export type CursorZoomConfig = z.infer<typeof CursorZoomConfigSchema>;
export type RemoteSettings = z.infer<typeof RemoteSettingsSchema>;
export type SessionSettings = z.infer<typeof SessionSettingsSchema>;

// ─────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function cloneProfiles(
  profiles: Readonly<Record<string, ZoomProfileSettings>>,
): Record<string, ZoomProfileSettings> {
  return Object.fromEntries(
    Object.entries(profiles).map(([name, settings]) => [name, { ...settings }]),
  );
}

export function createDefaultConfig(): CursorZoomConfig {
  return {
    version: CONFIG_VERSION,
    defaultProfile: DEFAULT_PROFILE_NAME,
    profiles: cloneProfiles(BUILTIN_PROFILES),
    remote: { enabled: false, host: '0.0.0.0', port: 8765 },
    displayOverrides: {},
    displays: [],
    session: {
      sourceDisplayId: null,
      tickIntervalMs: 16,
      commandQueueCapacity: DEFAULT_COMMAND_QUEUE_CAPACITY,
      sourceCrop: { ...NO_SOURCE_CROP },
    },
    debugLogging: false,
  };
}

/** Validate an already-decoded JSON value; throws ConfigError */
export function parseConfig(raw: unknown): CursorZoomConfig {
  const result = CursorZoomConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration (${issues.length} issue(s))`, issues);
  }
  return result.data;
}

// ─────────────────────────────────────────────
// Config Manager
// ─────────────────────────────────────────────

export class ConfigManager {
  readonly filePath: string;
  private current: CursorZoomConfig = createDefaultConfig();

  constructor(filePath: string = DEFAULT_CONFIG_FILENAME) {
    this.filePath = path.resolve(filePath);
  }

  get config(): Readonly<CursorZoomConfig> {
    return this.current;
  }

  load(): CursorZoomConfig {
    if (!fs.existsSync(this.filePath)) {
      console.log(`[Config] ${this.filePath} not found, writing defaults`);
      this.current = createDefaultConfig();
      try {
        this.save();
      } catch (err) {
        console.warn(`[Config] Could not write defaults: ${describeError(err)}`);
      }
      return this.current;
    }

    try {
      const text = fs.readFileSync(this.filePath, 'utf8');
      this.current = parseConfig(JSON.parse(text));
    } catch (err) {
      console.error(`[Config] Failed to load ${this.filePath}: ${describeError(err)}`);
      if (err instanceof ConfigError) {
        for (const issue of err.issues) console.error(`[Config]   ${issue}`);
      }
      console.error('[Config] Continuing with defaults');
      this.current = createDefaultConfig();
      return this.current;
    }

    if (!(this.current.defaultProfile in this.current.profiles)) {
      console.warn(
        `[Config] defaultProfile "${this.current.defaultProfile}" is not defined; ` +
        'the first profile will be used',
      );
    }
    console.log(
      `[Config] Loaded ${Object.keys(this.current.profiles).length} profile(s) from ${this.filePath}`,
    );
    return this.current;
  }

  save(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.current, null, 2) + '\n', 'utf8');
  }

  profileStore(): ProfileStore {
    return new ProfileStore(this.current.profiles, this.current.defaultProfile);
  }

  // ─── Mutators (call save() to persist) ───

  setDefaultProfile(name: string): boolean {
    if (!(name in this.current.profiles)) {
      console.warn(`[Config] Cannot make unknown profile "${name}" the default`);
      return false;
    }
    this.current = { ...this.current, defaultProfile: name };
    return true;
  }

  /** Add or replace a profile; invalid settings are rejected */
  upsertProfile(profile: ZoomProfile): boolean {
    const { name, ...settings } = profile;
    const result = ProfileSettingsSchema.safeParse(settings);
    if (name.length === 0 || !result.success) {
      console.warn(`[Config] Rejected profile "${name}"`);
      return false;
    }
    this.current = {
      ...this.current,
      profiles: { ...this.current.profiles, [name]: result.data },
    };
    return true;
  }

  /** The last remaining profile is never removed */
  removeProfile(name: string): boolean {
    const names = Object.keys(this.current.profiles);
    if (!names.includes(name) || names.length <= 1) {
      return false;
    }

    const profiles = { ...this.current.profiles };
    delete profiles[name];

    let defaultProfile = this.current.defaultProfile;
    if (defaultProfile === name) {
      defaultProfile = Object.keys(profiles)[0] ?? DEFAULT_PROFILE_NAME;
    }

    this.current = { ...this.current, profiles, defaultProfile };
    return true;
  }

  /** Pass null to drop an override */
  setDisplayOverride(displayId: DisplayId, override: DisplayOverride | null): void {
    const displayOverrides = { ...this.current.displayOverrides };
    if (override === null) {
      delete displayOverrides[displayId];
    } else {
      displayOverrides[displayId] = { ...override };
    }
    this.current = { ...this.current, displayOverrides };
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
