/**
 * @fileoverview Slicer and driver profile value objects.
 *
 * Profiles are closed unions tagged by `kind`; the backend factories switch on the tag,
 * so adding a backend means adding a variant here and a case in the factory.
 *
 * @module types/profiles
 */

export type SlicerKind = 'miracle-grue' | 'skeinforge';
export type DriverKind = 'makerbot' | 'file';
export type ProfileKind = 'slicer' | 'driver';

/**
 * Slicing parameters shared by every slicer backend
 */
export interface SlicingSettings {
  readonly raft: boolean;
  readonly support: boolean;
  /** Infill ratio in [0, 1] */
  readonly infillDensity: number;
  /** Millimetres */
  readonly layerHeight: number;
  readonly shells: number;
  /** Degrees Celsius */
  readonly extruderTemperature: number;
  readonly platformTemperature: number;
  /** Millimetres per second */
  readonly printSpeed: number;
  readonly travelSpeed: number;
}

export interface MiracleGrueProfile {
  readonly name: string;
  readonly kind: 'miracle-grue';
  readonly executable: string;
  readonly configPath?: string;
  readonly slicing: SlicingSettings;
  readonly startSequence: readonly string[];
  readonly endSequence: readonly string[];
}

export interface SkeinforgeProfile {
  readonly name: string;
  readonly kind: 'skeinforge';
  readonly executable: string;
  readonly python: string;
  readonly profileDir: string;
  readonly slicing: SlicingSettings;
}

export type SlicerProfile = MiracleGrueProfile | SkeinforgeProfile;

export interface MakerBotDriverProfile {
  readonly name: string;
  readonly kind: 'makerbot';
  readonly machineProfile: string;
  readonly pollIntervalMs: number;
  readonly skipStartEnd: boolean;
  readonly startSequence: readonly string[];
  readonly endSequence: readonly string[];
  /** Lines sent on mid-print cancellation to leave the machine in a safe state */
  readonly abortSequence: readonly string[];
}

export interface FileDriverProfile {
  readonly name: string;
  readonly kind: 'file';
  readonly outputDir: string;
  readonly pollIntervalMs: number;
  readonly skipStartEnd: boolean;
  readonly startSequence: readonly string[];
  readonly endSequence: readonly string[];
}

export type DriverProfile = MakerBotDriverProfile | FileDriverProfile;

export interface ProfileListing {
  readonly slicers: readonly SlicerProfile[];
  readonly drivers: readonly DriverProfile[];
  readonly defaultSlicer: string;
  readonly defaultDriver: string;
}
