/**
 * @fileoverview Loads and validates the daemon configuration document.
 *
 * The configuration is read once at startup:
 * - Missing file: every setting falls back to its default
 * - Unreadable file or malformed JSON: CONFIG_LOAD_FAILED
 * - Schema violations: CONFIG_INVALID with the zod issues attached
 * - Command-line overrides are applied on top of the validated document
 *
 * The resulting object is frozen and handed explicitly to the components that need it;
 * nothing reads configuration through a global.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import type { ConfigOverrides, ConveyorConfig } from '../types/config';
import { ConveyorConfigSchema } from '../schemas/config.schemas';
import { AppError, ErrorCode, fromZodError } from '../utils/error.utils';

export const DEFAULT_CONFIG_FILE = 'conveyor.json';

/**
 * Parse an already-decoded configuration document
 */
export function parseConfig(data: unknown): ConveyorConfig {
  const result = ConveyorConfigSchema.safeParse(data);
  if (!result.success) {
    throw fromZodError(result.error, ErrorCode.CONFIG_INVALID);
  }
  return result.data;
}

/**
 * Return a copy of `config` with command-line overrides applied
 */
export function applyConfigOverrides(config: ConveyorConfig, overrides: ConfigOverrides): ConveyorConfig {
  return {
    ...config,
    common: {
      ...config.common,
      address: overrides.address ?? config.common.address
    },
    server: {
      ...config.server,
      eventThreads: overrides.eventThreads ?? config.server.eventThreads,
      logging: {
        ...config.server.logging,
        level: overrides.logLevel ?? config.server.logging.level
      }
    }
  };
}

export class ConfigManager extends EventEmitter {
  private readonly configPath: string;
  private currentConfig: ConveyorConfig | null = null;

  constructor(configPath: string = path.join(process.cwd(), DEFAULT_CONFIG_FILE)) {
    super();
    this.configPath = path.resolve(configPath);
  }

  /**
   * Gets the path to the configuration file
   */
  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Checks if configuration has been loaded from file
   */
  public isConfigLoaded(): boolean {
    return this.currentConfig !== null;
  }

  /**
   * Gets the loaded configuration; throws if load() has not completed
   */
  public getConfig(): ConveyorConfig {
    if (!this.currentConfig) {
      throw new AppError('Configuration has not been loaded', ErrorCode.CONFIG_LOAD_FAILED, {
        configPath: this.configPath
      });
    }
    return this.currentConfig;
  }

  /**
   * Reads, validates and freezes the configuration
   */
  public async load(overrides: ConfigOverrides = {}): Promise<ConveyorConfig> {
    const raw = await this.readConfigFile();
    const config = applyConfigOverrides(parseConfig(raw), overrides);

    this.currentConfig = Object.freeze(config);
    this.emit('config-loaded', this.currentConfig);
    return this.currentConfig;
  }

  private async readConfigFile(): Promise<unknown> {
    if (!fs.existsSync(this.configPath)) {
      console.warn(`[Config] ${this.configPath} not found, using defaults`);
      return {};
    }

    let content: string;
    try {
      content = await fs.promises.readFile(this.configPath, 'utf8');
    } catch (error) {
      throw new AppError(
        `Failed to read configuration file ${this.configPath}`,
        ErrorCode.CONFIG_LOAD_FAILED,
        { configPath: this.configPath },
        error instanceof Error ? error : undefined
      );
    }

    try {
      const loadedData: unknown = JSON.parse(content);
      return loadedData;
    } catch (error) {
      throw new AppError(
        `Configuration file ${this.configPath} is not valid JSON`,
        ErrorCode.CONFIG_LOAD_FAILED,
        { configPath: this.configPath },
        error instanceof Error ? error : undefined
      );
    }
  }
}
