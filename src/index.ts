/**
 * @fileoverview Main entry point for the conveyor print job daemon
 *
 * Key responsibilities:
 * - Parse command-line arguments and load the configuration file
 * - Build the profile registry, device manager, backends and worker pools
 * - Start the gateway (REST + WebSocket) on the configured address
 * - Write and remove the pid file
 * - Handle graceful shutdown on SIGINT/SIGTERM, bounded by a hard deadline
 */

import * as os from 'os';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigManager } from './managers/ConfigManager';
import { DeviceManager } from './managers/DeviceManager';
import { JobOrchestrator } from './managers/JobOrchestrator';
import { ProfileRegistry } from './managers/ProfileRegistry';
import { WorkerPool } from './services/WorkerPool';
import { createSlicerBackends } from './slicer-backends';
import { createDriverBackends } from './driver-backends';
import { openSerialConnection } from './devices/SerialDeviceConnection';
import { DeviceDetector } from './devices/DeviceDetector';
import { GatewayServer } from './gateway/server/GatewayServer';
import { parseAddress } from './utils/address';
import { parseDaemonArguments, validateDaemonArguments } from './utils/DaemonArguments';
import { createHardDeadline, withTimeout } from './utils/ShutdownTimeout';
import { createFileSink, createLogger, Logger } from './utils/logging';
import { toAppError } from './utils/error.utils';

const SHUTDOWN_TIMEOUT_MS = 10000;
const HARD_DEADLINE_MS = 15000;

interface Daemon {
  readonly logger: Logger;
  readonly orchestrator: JobOrchestrator;
  readonly gateway: GatewayServer;
  readonly detector: DeviceDetector;
  readonly pidFile: string;
  readonly closeLog: () => void;
}

let daemon: Daemon | null = null;
let shuttingDown = false;

/**
 * Setup signal handlers for graceful shutdown
 */
function setupSignalHandlers(): void {
  const handle = (signal: NodeJS.Signals) => {
    daemon?.logger.info(`Received ${signal}`);
    shutdown().then(() => {
      process.exit(0);
    }).catch((error: unknown) => {
      console.error('[Shutdown] Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', handle);
  process.on('SIGTERM', handle);
}

/**
 * Gracefully shutdown the daemon
 */
async function shutdown(): Promise<void> {
  if (!daemon || shuttingDown) {
    return;
  }
  shuttingDown = true;
  const { logger, orchestrator, gateway, detector, pidFile, closeLog } = daemon;
  const deadline = createHardDeadline(HARD_DEADLINE_MS);

  logger.info('Stopping services...');
  try {
    await detector.stop();
    await withTimeout(gateway.stop(), { timeoutMs: SHUTDOWN_TIMEOUT_MS, operation: 'gateway.stop' });
    await withTimeout(orchestrator.shutdown(), { timeoutMs: SHUTDOWN_TIMEOUT_MS, operation: 'orchestrator.shutdown' });
    logger.info('Graceful shutdown complete');
  } catch (error) {
    logger.error('Shutdown did not complete cleanly:', toAppError(error).message);
  } finally {
    fs.rmSync(pidFile, { force: true });
    clearTimeout(deadline);
    closeLog();
  }
}

function writePidFile(pidFile: string): void {
  fs.mkdirSync(path.dirname(pidFile), { recursive: true });
  fs.writeFileSync(pidFile, `${process.pid}\n`);
}

/**
 * Main daemon initialization
 */
async function main(): Promise<void> {
  try {
    // 1. Parse CLI arguments
    const args = parseDaemonArguments();
    const validation = validateDaemonArguments(args);
    if (!validation.valid) {
      console.error('[Init] Invalid arguments:');
      validation.errors.forEach((error) => console.error(`  - ${error}`));
      process.exit(1);
    }

    // 2. Load configuration
    const configManager = new ConfigManager(args.configPath);
    const config = await configManager.load(args.overrides);
    if (config.server.chdir) {
      process.chdir(path.dirname(configManager.getConfigPath()));
    }

    // 3. Logging
    const fileSink = config.server.logging.file ? createFileSink(path.resolve(config.server.logging.file)) : null;
    const logger = createLogger('conveyord', config.server.logging, fileSink);
    logger.info(`Configuration loaded from ${configManager.getConfigPath()}`);

    // 4. Core components
    const address = parseAddress(config.common.address);
    const registry = new ProfileRegistry(config);
    const devices = new DeviceManager(DeviceManager.descriptorsFromConfig(config), openSerialConnection, logger);
    const workDir = path.resolve(config.common.workDir ?? path.join(os.tmpdir(), 'conveyor'));
    const orchestrator = new JobOrchestrator({
      registry,
      devices,
      slicers: createSlicerBackends({ cancelGracePeriodMs: config.server.cancelGracePeriodMs, logger }),
      drivers: createDriverBackends({ logger }),
      pool: new WorkerPool('jobs', config.server.eventThreads),
      workDir,
      logger
    });
    logger.info(`${devices.list().length} device(s), ${registry.list().slicers.length} slicer profile(s), ${registry.list().drivers.length} driver profile(s)`);

    // 5. Gateway
    const gateway = new GatewayServer({
      orchestrator,
      requestPool: new WorkerPool('requests', config.server.requestThreads),
      logger,
      address
    });
    await gateway.start();

    const detector = new DeviceDetector(devices, {
      intervalMs: config.server.detectIntervalMs,
      blacklistMs: config.server.blacklistMs,
      logger
    });
    detector.start();

    const pidFile = path.resolve(config.common.pidFile);
    writePidFile(pidFile);

    daemon = {
      logger,
      orchestrator,
      gateway,
      detector,
      pidFile,
      closeLog: () => fileSink?.close()
    };

    // 6. Signal handlers
    setupSignalHandlers();
    logger.info(`Ready on ${gateway.getStatus().address} (pid ${process.pid})`);
  } catch (error) {
    console.error('[Fatal] Initialization failed:', toAppError(error).message);
    process.exit(1);
  }
}

// Start the daemon
void main();
