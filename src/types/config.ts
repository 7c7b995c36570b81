/**
 * @fileoverview Daemon configuration type definitions
 *
 * Mirrors the sections of the configuration document: common settings, one section per
 * slicer/driver backend, service-side settings, client-side settings, and the explicit
 * profile and device lists. Every property is readonly; the validated object is shared by
 * the Profile Registry, Device Manager, Orchestrator and Gateway after startup.
 *
 * @module types/config
 */

import type { SlicerKind, DriverKind, SlicingSettings } from './profiles';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  readonly enabled: boolean;
  readonly level: LogLevel;
  readonly file?: string;
}

export interface CommonConfig {
  /** Service address in `tcp:host:port` or `pipe:path` form */
  readonly address: string;
  readonly pidFile: string;
  /** Directory for generated toolpaths; defaults to the OS temp directory */
  readonly workDir?: string;
  /** Backend whose default profile is used when a request names no slicer profile */
  readonly slicer: SlicerKind;
}

export interface MiracleGrueConfig {
  readonly executable: string;
  readonly configPath?: string;
  readonly defaultProfile: string;
}

export interface SkeinforgeConfig {
  readonly executable: string;
  readonly python: string;
  readonly profileDir: string;
  readonly defaultProfile: string;
}

export interface MakerBotDriverConfig {
  readonly machineProfile: string;
  readonly pollIntervalMs: number;
  readonly baudRate: number;
  readonly defaultProfile: string;
}

export interface FileDriverConfig {
  readonly outputDir: string;
  readonly defaultProfile: string;
}

export interface ServerConfig {
  /** Size of the pool running slicer invocations and print streams */
  readonly eventThreads: number;
  /** Size of the pool handling client requests */
  readonly requestThreads: number;
  readonly chdir: boolean;
  readonly cancelGracePeriodMs: number;
  /** Serial port polling interval; 0 disables detection */
  readonly detectIntervalMs: number;
  /** How long a port that lost its connection is ignored by detection */
  readonly blacklistMs: number;
  readonly logging: LoggingConfig;
}

export interface ClientConfig {
  readonly eventThreads: number;
  readonly logging: LoggingConfig;
  readonly slicing: SlicingSettings;
}

export interface SlicerProfileConfig {
  readonly name: string;
  readonly kind: SlicerKind;
  readonly executable?: string;
  readonly configPath?: string;
  readonly python?: string;
  readonly profileDir?: string;
  readonly slicing?: Partial<SlicingSettings>;
  readonly startSequence?: readonly string[];
  readonly endSequence?: readonly string[];
}

export interface DriverProfileConfig {
  readonly name: string;
  readonly kind: DriverKind;
  readonly machineProfile?: string;
  readonly outputDir?: string;
  readonly pollIntervalMs?: number;
  readonly skipStartEnd?: boolean;
  readonly startSequence?: readonly string[];
  readonly endSequence?: readonly string[];
  readonly abortSequence?: readonly string[];
}

export interface DeviceConfig {
  readonly id: string;
  readonly port: string;
  readonly baudRate?: number;
}

/**
 * Complete validated configuration
 */
export interface ConveyorConfig {
  readonly common: CommonConfig;
  readonly miracleGrue: MiracleGrueConfig;
  readonly skeinforge: SkeinforgeConfig;
  readonly makerbotDriver: MakerBotDriverConfig;
  readonly fileDriver: FileDriverConfig;
  readonly server: ServerConfig;
  readonly client: ClientConfig;
  readonly slicerProfiles: readonly SlicerProfileConfig[];
  readonly driverProfiles: readonly DriverProfileConfig[];
  readonly devices: readonly DeviceConfig[];
}

/**
 * Overrides accepted from the command line
 */
export interface ConfigOverrides {
  readonly address?: string;
  readonly eventThreads?: number;
  readonly logLevel?: LogLevel;
}
