/**
 * @fileoverview CLI argument parser for the conveyor daemon
 *
 * Examples:
 *   node dist/index.js
 *   node dist/index.js --config=/etc/conveyor/conveyor.json
 *   node dist/index.js --address=pipe:/run/conveyor.sock --event-threads=2 --log-level=debug
 */

import type { ConfigOverrides, LogLevel } from '../types/config';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Configuration parsed from CLI arguments
 */
export interface DaemonArguments {
  configPath?: string;
  overrides: ConfigOverrides;
  /** Arguments that were not recognized, reported by validation */
  unknown: string[];
  /** Raw values that failed to parse, keyed by flag */
  invalid: Record<string, string>;
}

/**
 * Validation result for parsed arguments
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Parse command-line arguments; `args` excludes the node binary and script path
 */
export function parseDaemonArguments(args: readonly string[] = process.argv.slice(2)): DaemonArguments {
  const parsed: DaemonArguments = { overrides: {}, unknown: [], invalid: {} };
  let address: string | undefined;
  let eventThreads: number | undefined;
  let logLevel: LogLevel | undefined;

  for (const arg of args) {
    const [flag, rawValue] = splitFlag(arg);
    const value = rawValue === undefined ? undefined : stripQuotes(rawValue);

    switch (flag) {
      case '--config':
        parsed.configPath = value;
        break;
      case '--address':
        address = value;
        break;
      case '--event-threads': {
        const threads = value === undefined ? NaN : Number(value);
        if (Number.isInteger(threads)) {
          eventThreads = threads;
        } else {
          parsed.invalid[flag] = value ?? '';
        }
        break;
      }
      case '--log-level': {
        const level = LOG_LEVELS.find(candidate => candidate === value);
        if (level) {
          logLevel = level;
        } else {
          parsed.invalid[flag] = value ?? '';
        }
        break;
      }
      default:
        parsed.unknown.push(arg);
    }
  }

  parsed.overrides = { address, eventThreads, logLevel };
  return parsed;
}

/**
 * Validate parsed arguments
 */
export function validateDaemonArguments(parsed: DaemonArguments): ValidationResult {
  const errors: string[] = [];

  parsed.unknown.forEach(arg => errors.push(`Unknown argument: ${arg}`));

  for (const [flag, value] of Object.entries(parsed.invalid)) {
    errors.push(flag === '--log-level'
      ? `${flag} must be one of ${LOG_LEVELS.join(', ')} (got "${value}")`
      : `${flag} must be an integer (got "${value}")`);
  }

  if (parsed.configPath !== undefined && parsed.configPath.length === 0) {
    errors.push('--config requires a path');
  }
  if (parsed.overrides.address !== undefined && parsed.overrides.address.length === 0) {
    errors.push('--address requires a value');
  }
  if (parsed.overrides.eventThreads !== undefined && parsed.overrides.eventThreads < 1) {
    errors.push('--event-threads must be at least 1');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

function splitFlag(arg: string): [string, string | undefined] {
  const separator = arg.indexOf('=');
  return separator === -1 ? [arg, undefined] : [arg.slice(0, separator), arg.slice(separator + 1)];
}

function stripQuotes(value: string): string {
  return value.replace(/^["']|["']$/g, '');
}
