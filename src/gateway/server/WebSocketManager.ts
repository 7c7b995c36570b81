/**
 * @fileoverview WebSocket server manager for the gateway event stream and RPC commands.
 *
 * Each connection gets a client id (sent in WELCOME) and its own subscription set. Clients
 * subscribe to every job or to specific job ids and then receive JOB_EVENT and JOB_PROGRESS
 * messages in the order the orchestrator generated them. DEVICE_CHANGED goes to every
 * client. Commands are zod-validated and answered with RESPONSE (or PONG); all of them
 * except PING run through the request pool. Closing a connection drops its subscriptions
 * and never touches jobs.
 *
 * Key exports:
 * - WebSocketManager class: initialize, shutdown, getClientCount
 * - Message types: WELCOME, RESPONSE, PONG, JOB_EVENT, JOB_PROGRESS, DEVICE_CHANGED, ERROR
 */

import { WebSocketServer, WebSocket, RawData } from 'ws';
import * as http from 'http';
import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import type { DeviceChangedEvent } from '../../types/devices';
import type { JobEvent, JobProgressEvent } from '../../types/job';
import { createErrorResult, fromZodError, toAppError } from '../../utils/error.utils';
import type { Logger } from '../../utils/logging';
import { WebSocketCommandSchema, type WebSocketCommand } from '../schemas/gateway.schemas';
import type { WebSocketMessage } from '../types/gateway.types';
import { cancelJob, requireJob, type GatewayDependencies } from './job-operations';

const PING_INTERVAL_MS = 30000;

/**
 * Client information stored for each WebSocket connection
 */
interface ClientInfo {
  readonly clientId: string;
  readonly connectedAt: Date;
  lastActivity: Date;
  subscribeAll: boolean;
  readonly jobIds: Set<string>;
  readonly pingInterval: NodeJS.Timeout;
}

export class WebSocketManager extends EventEmitter {
  private wss: WebSocketServer | null = null;
  private readonly clients: Map<WebSocket, ClientInfo> = new Map();
  private readonly logger: Logger;

  private readonly onJobEvent = (event: JobEvent): void => {
    this.broadcastForJob(event.jobId, { type: 'JOB_EVENT', timestamp: event.timestamp, event });
  };

  private readonly onJobProgress = (progress: JobProgressEvent): void => {
    this.broadcastForJob(progress.jobId, { type: 'JOB_PROGRESS', timestamp: progress.timestamp, progress });
  };

  private readonly onDeviceChanged = (device: DeviceChangedEvent): void => {
    this.broadcast({ type: 'DEVICE_CHANGED', timestamp: new Date().toISOString(), device });
  };

  constructor(private readonly deps: GatewayDependencies) {
    super();
    this.logger = deps.logger.child('WebSocket');
  }

  /**
   * Initialize WebSocket server with HTTP server
   */
  public initialize(httpServer: http.Server): void {
    if (this.wss) {
      this.logger.warn('WebSocket server already initialized');
      return;
    }

    this.wss = new WebSocketServer({ server: httpServer, path: '/ws' });
    this.wss.on('connection', (ws: WebSocket) => this.handleConnection(ws));

    this.deps.orchestrator.on('job-event', this.onJobEvent);
    this.deps.orchestrator.on('job-progress', this.onJobProgress);
    this.deps.orchestrator.on('device-changed', this.onDeviceChanged);

    this.logger.info('WebSocket server initialized');
  }

  public getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Close every client connection and detach from the orchestrator
   */
  public shutdown(): void {
    if (!this.wss) return;

    this.deps.orchestrator.off('job-event', this.onJobEvent);
    this.deps.orchestrator.off('job-progress', this.onJobProgress);
    this.deps.orchestrator.off('device-changed', this.onDeviceChanged);

    for (const [ws, client] of this.clients) {
      clearInterval(client.pingInterval);
      ws.close(1001, 'Server shutting down');
    }
    this.clients.clear();

    this.wss.close();
    this.wss = null;
    this.logger.info('WebSocket server shut down');
  }

  private handleConnection(ws: WebSocket): void {
    const clientId = `client-${randomUUID()}`;
    const client: ClientInfo = {
      clientId,
      connectedAt: new Date(),
      lastActivity: new Date(),
      subscribeAll: false,
      jobIds: new Set(),
      pingInterval: setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.ping();
        }
      }, PING_INTERVAL_MS)
    };
    this.clients.set(ws, client);
    this.logger.debug(`Client connected: ${clientId} - Total clients: ${this.clients.size}`);

    this.sendToClient(ws, { type: 'WELCOME', timestamp: new Date().toISOString(), clientId });

    ws.on('message', (data: RawData) => {
      this.handleMessage(ws, data).catch((error: unknown) => {
        this.logger.error('Error handling WebSocket message:', toAppError(error).message);
      });
    });
    ws.on('close', () => this.handleDisconnect(ws));
    ws.on('error', (error: Error) => {
      this.logger.warn(`Client ${clientId} error: ${error.message}`);
      ws.close();
    });
    ws.on('pong', () => {
      client.lastActivity = new Date();
    });
  }

  private handleDisconnect(ws: WebSocket): void {
    const client = this.clients.get(ws);
    if (!client) return;

    clearInterval(client.pingInterval);
    this.clients.delete(ws);
    this.logger.debug(`Client disconnected: ${client.clientId}`);
  }

  private async handleMessage(ws: WebSocket, data: RawData): Promise<void> {
    const client = this.clients.get(ws);
    if (!client) return;
    client.lastActivity = new Date();

    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString());
    } catch (parseError) {
      this.logger.debug(`Client ${client.clientId} sent invalid JSON: ${toAppError(parseError).message}`);
      this.sendToClient(ws, { type: 'ERROR', timestamp: new Date().toISOString(), error: 'Invalid JSON format' });
      return;
    }

    const validation = WebSocketCommandSchema.safeParse(parsed);
    if (!validation.success) {
      const appError = fromZodError(validation.error);
      this.sendToClient(ws, {
        type: 'ERROR',
        timestamp: new Date().toISOString(),
        error: appError.message,
        details: appError.context?.issues
      });
      return;
    }

    const command = validation.data;
    const requestId = command.requestId ?? null;

    if (command.command === 'PING') {
      this.sendToClient(ws, { type: 'PONG', timestamp: new Date().toISOString(), requestId });
      return;
    }

    try {
      const result = await this.deps.requestPool.run(async () => this.executeCommand(client, command));
      this.sendToClient(ws, { type: 'RESPONSE', timestamp: new Date().toISOString(), requestId, success: true, data: result });
    } catch (error) {
      const { error: message, code } = createErrorResult(error);
      this.sendToClient(ws, { type: 'RESPONSE', timestamp: new Date().toISOString(), requestId, success: false, error: message, code });
    }
  }

  private executeCommand(client: ClientInfo, command: WebSocketCommand): unknown {
    const { orchestrator } = this.deps;

    switch (command.command) {
      case 'SUBSCRIBE':
        if (command.jobIds) {
          command.jobIds.forEach(jobId => client.jobIds.add(jobId));
        } else {
          client.subscribeAll = true;
        }
        return this.describeSubscription(client);

      case 'UNSUBSCRIBE':
        if (command.jobIds) {
          command.jobIds.forEach(jobId => client.jobIds.delete(jobId));
        } else {
          client.subscribeAll = false;
          client.jobIds.clear();
        }
        return this.describeSubscription(client);

      case 'SUBMIT': {
        const jobId = orchestrator.submit(command.job);
        return { jobId };
      }

      case 'CANCEL':
        return cancelJob(orchestrator, command.jobId);

      case 'STATUS':
        return { job: requireJob(orchestrator, command.jobId) };

      case 'LIST':
        return { jobs: orchestrator.list(command.filter) };

      case 'LIST_PROFILES':
        return { profiles: orchestrator.listProfiles() };

      case 'LIST_DEVICES':
        return { devices: orchestrator.listDevices() };

      case 'PING':
        return { pong: true };

      default: {
        const _exhaustive: never = command;
        return _exhaustive;
      }
    }
  }

  private describeSubscription(client: ClientInfo): { all: boolean; jobIds: string[] } {
    return { all: client.subscribeAll, jobIds: [...client.jobIds] };
  }

  private broadcastForJob(jobId: string, message: WebSocketMessage): void {
    const messageStr = JSON.stringify(message);
    for (const [ws, client] of this.clients) {
      if (client.subscribeAll || client.jobIds.has(jobId)) {
        this.sendRaw(ws, messageStr);
      }
    }
  }

  private broadcast(message: WebSocketMessage): void {
    const messageStr = JSON.stringify(message);
    for (const [ws] of this.clients) {
      this.sendRaw(ws, messageStr);
    }
  }

  private sendToClient(ws: WebSocket, message: WebSocketMessage): void {
    this.sendRaw(ws, JSON.stringify(message));
  }

  private sendRaw(ws: WebSocket, messageStr: string): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(messageStr);
    }
  }
}
