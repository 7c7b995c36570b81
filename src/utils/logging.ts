/**
 * @fileoverview Namespaced logging for the daemon.
 *
 * Loggers are plain objects constructed from the `logging` configuration section and
 * passed to each component; `child()` derives a sub-namespace that shares the same
 * level and sinks. Output goes to the console as `[Namespace] message` and, when a log
 * file is configured, is appended to that file as well.
 */

import * as fs from 'fs';
import * as path from 'path';
import { format } from 'util';
import type { LoggingConfig, LogLevel } from '../types/config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/**
 * Destination for formatted log lines besides the console
 */
export interface LogSink {
  write(line: string): void;
}

/**
 * Append-only file sink opened once per daemon run
 */
export function createFileSink(filePath: string): LogSink & { close(): void } {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: 'a' });
  stream.on('error', (error) => {
    console.error(`[Logging] Failed to write log file ${filePath}:`, error);
  });

  return {
    write: (line: string) => {
      stream.write(`${line}\n`);
    },
    close: () => {
      stream.end();
    }
  };
}

export class Logger {
  private readonly minLevel: number;

  constructor(
    private readonly namespace: string,
    private readonly options: Pick<LoggingConfig, 'enabled' | 'level'>,
    private readonly sink: LogSink | null = null
  ) {
    this.minLevel = LEVEL_ORDER[options.level];
  }

  /**
   * Create a logger for a sub-component, e.g. `Orchestrator:Slicer`
   */
  public child(namespace: string): Logger {
    return new Logger(`${this.namespace}:${namespace}`, this.options, this.sink);
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return this.options.enabled && LEVEL_ORDER[level] >= this.minLevel;
  }

  public debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const prefix = `[${this.namespace}]`;
    switch (level) {
      case 'debug':
        console.debug(prefix, message, ...args);
        break;
      case 'info':
        console.info(prefix, message, ...args);
        break;
      case 'warn':
        console.warn(prefix, message, ...args);
        break;
      case 'error':
        console.error(prefix, message, ...args);
        break;
    }

    if (this.sink) {
      const line = format(message, ...args);
      this.sink.write(`${new Date().toISOString()} ${level.toUpperCase()} ${prefix} ${line}`);
    }
  }
}

/**
 * Build the root logger for a configuration section
 */
export function createLogger(namespace: string, config: LoggingConfig, sink?: LogSink | null): Logger {
  return new Logger(namespace, config, sink ?? null);
}

/**
 * Logger that drops everything, used as the default in tests and library use
 */
export function createSilentLogger(): Logger {
  return new Logger('silent', { enabled: false, level: 'error' });
}
