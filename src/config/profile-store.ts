/**
 * @file    config/profile-store.ts
 * @purpose Read-only lookup of named zoom profiles.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts
 */

import {
  DEFAULT_PROFILE_NAME,
  DEFAULT_ZOOM_PROFILE,
  ZoomProfile,
  ZoomProfileSettings,
} from '../shared/types/zoom';

export class ProfileStore {
  private readonly profiles: ReadonlyMap<string, ZoomProfile>;
  private readonly defaultName: string;

  constructor(
    profiles: Readonly<Record<string, ZoomProfileSettings>>,
    defaultName: string = DEFAULT_PROFILE_NAME,
  ) {
    this.profiles = new Map(
      Object.entries(profiles).map(([name, settings]) => [
        name,
        Object.freeze({ ...settings, name }),
      ]),
    );
    this.defaultName = defaultName;
  }

  get(name: string): ZoomProfile | undefined {
    return this.profiles.get(name);
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  names(): string[] {
    return Array.from(this.profiles.keys());
  }

  /** Always resolves: configured default, else first profile, else built-in */
  defaultProfile(): ZoomProfile {
    const configured = this.profiles.get(this.defaultName);
    if (configured) return configured;

    for (const profile of this.profiles.values()) {
      return profile;
    }
    return DEFAULT_ZOOM_PROFILE;
  }
}
