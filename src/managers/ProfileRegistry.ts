/**
 * @fileoverview Read-only registry of named slicer and driver profiles.
 *
 * Built once from the validated configuration:
 * - One built-in profile per backend section, named by that section's `defaultProfile`
 * - Explicit `slicerProfiles` / `driverProfiles` entries, layered over the backend section
 *   settings and the client-side slicing defaults; an explicit entry replaces a built-in
 *   profile of the same name
 *
 * Lookups are pure; an unknown name raises PROFILE_NOT_FOUND, which is always a client
 * input error.
 */

import type { ConveyorConfig, DriverProfileConfig, SlicerProfileConfig } from '../types/config';
import type {
  DriverProfile,
  ProfileKind,
  ProfileListing,
  SlicerProfile
} from '../types/profiles';
import { profileNotFoundError } from '../utils/error.utils';

export const DEFAULT_START_SEQUENCE: readonly string[] = [
  'M73 P0 (enable build progress)',
  'G21 (set units to mm)',
  'G90 (set positioning to absolute)'
];

export const DEFAULT_END_SEQUENCE: readonly string[] = [
  'M73 P100 (end build progress)',
  'M104 S0 T0 (cool extruder)',
  'M109 S0 T0 (cool platform)',
  'M18 (disable steppers)'
];

export const DEFAULT_ABORT_SEQUENCE: readonly string[] = [
  'M104 S0 T0 (cool extruder)',
  'M109 S0 T0 (cool platform)',
  'G162 Z F1000 (home platform down)',
  'M18 (disable steppers)'
];

export class ProfileRegistry {
  private readonly slicers: ReadonlyMap<string, SlicerProfile>;
  private readonly drivers: ReadonlyMap<string, DriverProfile>;
  private readonly defaultSlicer: string;
  private readonly defaultDriver: string;

  constructor(config: ConveyorConfig) {
    this.slicers = buildSlicerProfiles(config);
    this.drivers = buildDriverProfiles(config);
    this.defaultSlicer = config.common.slicer === 'skeinforge'
      ? config.skeinforge.defaultProfile
      : config.miracleGrue.defaultProfile;
    this.defaultDriver = config.makerbotDriver.defaultProfile;
  }

  public resolve(kind: 'slicer', name?: string): SlicerProfile;
  public resolve(kind: 'driver', name?: string): DriverProfile;
  public resolve(kind: ProfileKind, name?: string): SlicerProfile | DriverProfile {
    return kind === 'slicer' ? this.resolveSlicer(name) : this.resolveDriver(name);
  }

  public resolveSlicer(name: string = this.defaultSlicer): SlicerProfile {
    const profile = this.slicers.get(name);
    if (!profile) {
      throw profileNotFoundError('slicer', name);
    }
    return profile;
  }

  public resolveDriver(name: string = this.defaultDriver): DriverProfile {
    const profile = this.drivers.get(name);
    if (!profile) {
      throw profileNotFoundError('driver', name);
    }
    return profile;
  }

  public has(kind: ProfileKind, name: string): boolean {
    return kind === 'slicer' ? this.slicers.has(name) : this.drivers.has(name);
  }

  public list(): ProfileListing {
    return {
      slicers: [...this.slicers.values()],
      drivers: [...this.drivers.values()],
      defaultSlicer: this.defaultSlicer,
      defaultDriver: this.defaultDriver
    };
  }
}

function buildSlicerProfiles(config: ConveyorConfig): ReadonlyMap<string, SlicerProfile> {
  const profiles = new Map<string, SlicerProfile>();

  const builtIns: SlicerProfileConfig[] = [
    { name: config.miracleGrue.defaultProfile, kind: 'miracle-grue' },
    { name: config.skeinforge.defaultProfile, kind: 'skeinforge' }
  ];

  for (const entry of [...builtIns, ...config.slicerProfiles]) {
    profiles.set(entry.name, Object.freeze(toSlicerProfile(entry, config)));
  }

  return profiles;
}

function toSlicerProfile(entry: SlicerProfileConfig, config: ConveyorConfig): SlicerProfile {
  const slicing = { ...config.client.slicing, ...entry.slicing };

  switch (entry.kind) {
    case 'miracle-grue':
      return {
        name: entry.name,
        kind: 'miracle-grue',
        executable: entry.executable ?? config.miracleGrue.executable,
        configPath: entry.configPath ?? config.miracleGrue.configPath,
        slicing,
        startSequence: entry.startSequence ?? [],
        endSequence: entry.endSequence ?? []
      };
    case 'skeinforge':
      return {
        name: entry.name,
        kind: 'skeinforge',
        executable: entry.executable ?? config.skeinforge.executable,
        python: entry.python ?? config.skeinforge.python,
        profileDir: entry.profileDir ?? config.skeinforge.profileDir,
        slicing
      };
    default: {
      const _exhaustive: never = entry.kind;
      throw new Error(`Unknown slicer kind: ${String(_exhaustive)}`);
    }
  }
}

function buildDriverProfiles(config: ConveyorConfig): ReadonlyMap<string, DriverProfile> {
  const profiles = new Map<string, DriverProfile>();

  const builtIns: DriverProfileConfig[] = [
    { name: config.makerbotDriver.defaultProfile, kind: 'makerbot' },
    { name: config.fileDriver.defaultProfile, kind: 'file' }
  ];

  for (const entry of [...builtIns, ...config.driverProfiles]) {
    profiles.set(entry.name, Object.freeze(toDriverProfile(entry, config)));
  }

  return profiles;
}

function toDriverProfile(entry: DriverProfileConfig, config: ConveyorConfig): DriverProfile {
  switch (entry.kind) {
    case 'makerbot':
      return {
        name: entry.name,
        kind: 'makerbot',
        machineProfile: entry.machineProfile ?? config.makerbotDriver.machineProfile,
        pollIntervalMs: entry.pollIntervalMs ?? config.makerbotDriver.pollIntervalMs,
        skipStartEnd: entry.skipStartEnd ?? false,
        startSequence: entry.startSequence ?? DEFAULT_START_SEQUENCE,
        endSequence: entry.endSequence ?? DEFAULT_END_SEQUENCE,
        abortSequence: entry.abortSequence ?? DEFAULT_ABORT_SEQUENCE
      };
    case 'file':
      return {
        name: entry.name,
        kind: 'file',
        outputDir: entry.outputDir ?? config.fileDriver.outputDir,
        pollIntervalMs: entry.pollIntervalMs ?? 1000,
        skipStartEnd: entry.skipStartEnd ?? false,
        startSequence: entry.startSequence ?? DEFAULT_START_SEQUENCE,
        endSequence: entry.endSequence ?? DEFAULT_END_SEQUENCE
      };
    default: {
      const _exhaustive: never = entry.kind;
      throw new Error(`Unknown driver kind: ${String(_exhaustive)}`);
    }
  }
}
