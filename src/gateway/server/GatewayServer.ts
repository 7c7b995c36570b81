/**
 * @fileoverview Gateway server coordinator managing the Express HTTP server and WebSocket
 * lifecycle.
 *
 * Builds the Express application (request logging, JSON bodies, `/api` routes, error
 * handling), attaches the WebSocket manager at `/ws`, and listens on the configured
 * service address: a TCP host/port or a Unix domain socket path. A stale socket file left
 * by a previous run is removed before listening.
 *
 * Key exports:
 * - GatewayServer class: start, stop, getStatus, getExpressApp, getListeningAddress
 */

import * as fs from 'fs';
import * as http from 'http';
import express from 'express';
import { AppError, ErrorCode } from '../../utils/error.utils';
import { formatAddress, type ServiceAddress } from '../../utils/address';
import type { Logger } from '../../utils/logging';
import { createAPIRoutes } from './api-routes';
import type { GatewayDependencies } from './job-operations';
import { createErrorMiddleware, createNotFoundHandler, createRequestLogger } from './middleware';
import { WebSocketManager } from './WebSocketManager';

export interface GatewayServerOptions extends GatewayDependencies {
  readonly address: ServiceAddress;
}

/**
 * Server status information
 */
export interface GatewayServerStatus {
  readonly isRunning: boolean;
  readonly address: string;
  readonly clientCount: number;
}

export class GatewayServer {
  private readonly expressApp: express.Application;
  private readonly webSocketManager: WebSocketManager;
  private readonly logger: Logger;
  private readonly address: ServiceAddress;
  private httpServer: http.Server | null = null;
  private isRunning = false;

  constructor(options: GatewayServerOptions) {
    this.address = options.address;
    this.logger = options.logger.child('Gateway');

    const deps: GatewayDependencies = {
      orchestrator: options.orchestrator,
      requestPool: options.requestPool,
      logger: this.logger
    };
    this.expressApp = this.createApp(deps);
    this.webSocketManager = new WebSocketManager(deps);
  }

  private createApp(deps: GatewayDependencies): express.Application {
    const app = express();

    app.use(createRequestLogger(this.logger));
    app.use(express.json());
    app.use('/api', createAPIRoutes(deps));
    app.use(createNotFoundHandler());

    // Error handling (must be last)
    app.use(createErrorMiddleware(this.logger));
    return app;
  }

  public async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Gateway server is already running');
      return;
    }

    const server = http.createServer(this.expressApp);
    this.httpServer = server;
    this.webSocketManager.initialize(server);

    try {
      await this.startListening(server);
    } catch (error) {
      this.webSocketManager.shutdown();
      this.httpServer = null;
      throw error;
    }

    this.isRunning = true;
    const listening = formatAddress(this.getListeningAddress());
    this.logger.info(`Gateway listening on ${listening}`);
  }

  public async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;

    this.webSocketManager.shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });

    this.httpServer = null;
    this.isRunning = false;
    this.logger.info('Gateway server stopped');
  }

  /**
   * Address actually bound; resolves port 0 to the assigned port
   */
  public getListeningAddress(): ServiceAddress {
    const bound = this.httpServer?.address();
    if (this.address.kind === 'tcp' && bound && typeof bound === 'object') {
      return { kind: 'tcp', host: this.address.host, port: bound.port };
    }
    return this.address;
  }

  public getExpressApp(): express.Application {
    return this.expressApp;
  }

  public getStatus(): GatewayServerStatus {
    return {
      isRunning: this.isRunning,
      address: formatAddress(this.getListeningAddress()),
      clientCount: this.webSocketManager.getClientCount()
    };
  }

  private startListening(server: http.Server): Promise<void> {
    const label = formatAddress(this.address);
    if (this.address.kind === 'pipe') {
      removeStaleSocket(this.address.path);
    }

    return new Promise((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          reject(new AppError(`Address ${label} is already in use`, ErrorCode.NETWORK, { address: label }, err));
        } else if (err.code === 'EACCES') {
          reject(new AppError(`Access denied to address ${label}`, ErrorCode.NETWORK, { address: label }, err));
        } else {
          reject(err);
        }
      };

      server.once('error', onError);
      const onListening = () => {
        server.removeListener('error', onError);
        resolve();
      };

      if (this.address.kind === 'tcp') {
        server.listen(this.address.port, this.address.host, onListening);
      } else {
        server.listen(this.address.path, onListening);
      }
    });
  }
}

function removeStaleSocket(socketPath: string): void {
  if (fs.existsSync(socketPath) && fs.statSync(socketPath).isSocket()) {
    fs.unlinkSync(socketPath);
  }
}
