/**
 * @fileoverview Tests for WebSocketManager
 * Tests the welcome message, command responses, per-connection subscriptions and event
 * fan-out over an in-process server bound to an ephemeral port
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { WebSocket, RawData } from 'ws';
import { GatewayServer } from './GatewayServer';
import { WorkerPool } from '../../services/WorkerPool';
import { createOrchestratorFixture, waitFor, type OrchestratorFixture } from '../../__tests__/helpers';
import type {
  DeviceChangedMessage,
  JobEventMessage,
  JobProgressMessage,
  ResponseMessage,
  WebSocketMessage
} from '../types/gateway.types';
import { deviceDisconnectedError, ErrorCode } from '../../utils/error.utils';
import { createSilentLogger } from '../../utils/logging';

interface TestClient {
  readonly socket: WebSocket;
  readonly messages: WebSocketMessage[];
  send(command: object): void;
}

describe('WebSocketManager', () => {
  let fixture: OrchestratorFixture;
  let gateway: GatewayServer;
  let port: number;
  let clients: TestClient[];

  async function connect(): Promise<TestClient> {
    const socket = new WebSocket(`ws://127.0.0.1:${port}/ws`);
    const messages: WebSocketMessage[] = [];
    socket.on('message', (data: RawData) => {
      messages.push(JSON.parse(data.toString()));
    });
    await new Promise<void>((resolve, reject) => {
      socket.once('open', () => resolve());
      socket.once('error', reject);
    });
    const client: TestClient = {
      socket,
      messages,
      send: (command) => socket.send(JSON.stringify(command))
    };
    clients.push(client);
    await waitFor(() => messages.length > 0);
    return client;
  }

  async function responseTo(client: TestClient, requestId: string): Promise<ResponseMessage> {
    const find = () => client.messages.find(
      (message): message is ResponseMessage => message.type === 'RESPONSE' && message.requestId === requestId
    );
    await waitFor(() => find() !== undefined);
    const response = find();
    if (!response) {
      throw new Error(`no response to ${requestId}`);
    }
    return response;
  }

  function jobStates(client: TestClient, jobId?: string): string[] {
    return client.messages
      .filter((message): message is JobEventMessage => message.type === 'JOB_EVENT')
      .filter(message => jobId === undefined || message.event.jobId === jobId)
      .map(message => message.event.newState);
  }

  beforeEach(async () => {
    fixture = createOrchestratorFixture();
    gateway = new GatewayServer({
      orchestrator: fixture.orchestrator,
      requestPool: new WorkerPool('requests', 2),
      logger: createSilentLogger(),
      address: { kind: 'tcp', host: '127.0.0.1', port: 0 }
    });
    await gateway.start();
    const bound = gateway.getListeningAddress();
    if (bound.kind !== 'tcp') {
      throw new Error('expected a tcp listener');
    }
    port = bound.port;
    clients = [];
  });

  afterEach(async () => {
    await Promise.all(clients.map(client => new Promise<void>(resolve => {
      if (client.socket.readyState === WebSocket.CLOSED) {
        resolve();
        return;
      }
      client.socket.once('close', () => resolve());
      client.socket.close();
    })));
    await gateway.stop();
    await fixture.cleanup();
  });

  it('should greet each connection with a client id', async () => {
    const client = await connect();

    expect(client.messages[0]).toMatchObject({ type: 'WELCOME' });
    expect(client.messages[0].type === 'WELCOME' && client.messages[0].clientId).toMatch(/^client-/);
    expect(gateway.getStatus().clientCount).toBe(1);
  });

  it('should answer PING with PONG', async () => {
    const client = await connect();

    client.send({ command: 'PING', requestId: 'p1' });

    await waitFor(() => client.messages.some(message => message.type === 'PONG'));
    expect(client.messages[1]).toMatchObject({ type: 'PONG', requestId: 'p1' });
  });

  it('should report malformed and invalid commands', async () => {
    const client = await connect();

    client.socket.send('not json');
    await waitFor(() => client.messages.length === 2);
    client.send({ command: 'LAUNCH' });
    await waitFor(() => client.messages.length === 3);

    expect(client.messages[1]).toMatchObject({ type: 'ERROR', error: 'Invalid JSON format' });
    expect(client.messages[2]).toMatchObject({ type: 'ERROR', error: 'Validation failed' });
  });

  it('should stream job events and progress to a client subscribed to everything', async () => {
    const client = await connect();
    client.send({ command: 'SUBSCRIBE', requestId: 'sub' });
    expect(await responseTo(client, 'sub')).toMatchObject({ success: true, data: { all: true, jobIds: [] } });

    client.send({ command: 'SUBMIT', requestId: 'go', job: { modelPath: fixture.modelFile, deviceId: 'bot-1' } });
    expect(await responseTo(client, 'go')).toMatchObject({ success: true, data: { jobId: '1' } });

    await waitFor(() => fixture.driver.isPrinting('1'));
    await waitFor(() => client.messages.some(message => message.type === 'JOB_PROGRESS'));
    fixture.driver.finish('1');
    await waitFor(() => jobStates(client).includes('completed'));

    expect(jobStates(client)).toEqual(['created', 'slicing', 'queued', 'printing', 'completed']);
    const progress = client.messages
      .filter((message): message is JobProgressMessage => message.type === 'JOB_PROGRESS')
      .map(message => message.progress.fraction);
    expect(progress).toEqual([0.5, 1]);
  });

  it('should deliver events only for subscribed job ids', async () => {
    const watcher = await connect();
    watcher.send({ command: 'SUBSCRIBE', requestId: 'sub', jobIds: ['2'] });
    await responseTo(watcher, 'sub');

    fixture.orchestrator.submit({ modelPath: fixture.modelFile, deviceId: 'bot-1' });
    fixture.orchestrator.submit({ modelPath: fixture.modelFile, deviceId: 'bot-1' });
    await waitFor(() => jobStates(watcher).includes('queued'));

    expect(jobStates(watcher, '1')).toEqual([]);
    expect(jobStates(watcher, '2')).toEqual(['created', 'slicing', 'queued']);

    watcher.send({ command: 'UNSUBSCRIBE', requestId: 'unsub' });
    expect(await responseTo(watcher, 'unsub')).toMatchObject({ success: true, data: { all: false, jobIds: [] } });
    fixture.orchestrator.cancel('2');
    const ping = { command: 'PING', requestId: 'after' };
    watcher.send(ping);
    await waitFor(() => watcher.messages.some(message => message.type === 'PONG'));
    expect(jobStates(watcher, '2')).toEqual(['created', 'slicing', 'queued']);
  });

  it('should answer request commands and report their errors', async () => {
    const client = await connect();
    const jobId = fixture.orchestrator.submit({ modelPath: fixture.modelFile, deviceId: 'bot-1' });

    client.send({ command: 'STATUS', requestId: 'status', jobId });
    client.send({ command: 'LIST', requestId: 'list', filter: { deviceId: 'bot-1' } });
    client.send({ command: 'LIST_PROFILES', requestId: 'profiles' });
    client.send({ command: 'LIST_DEVICES', requestId: 'devices' });
    client.send({ command: 'CANCEL', requestId: 'missing', jobId: '99' });

    expect(await responseTo(client, 'status')).toMatchObject({ success: true, data: { job: { id: jobId } } });
    expect(await responseTo(client, 'list')).toMatchObject({ success: true, data: { jobs: [{ id: jobId }] } });
    expect(await responseTo(client, 'profiles')).toMatchObject({
      success: true,
      data: { profiles: { defaultSlicer: 'MiracleGrue' } }
    });
    expect(await responseTo(client, 'devices')).toMatchObject({ success: true, data: { devices: [{ id: 'bot-1' }] } });
    expect(await responseTo(client, 'missing')).toMatchObject({
      success: false,
      error: 'Job 99 not found',
      code: ErrorCode.JOB_NOT_FOUND
    });
  });

  it('should tell every client about device changes', async () => {
    const client = await connect();
    const jobId = fixture.orchestrator.submit({ modelPath: fixture.modelFile, deviceId: 'bot-1' });
    await waitFor(() => fixture.driver.isPrinting(jobId));

    fixture.driver.fail(jobId, deviceDisconnectedError('bot-1', 'cable unplugged'));
    await waitFor(() => client.messages.some(message => message.type === 'DEVICE_CHANGED'));

    const change = client.messages.find(
      (message): message is DeviceChangedMessage => message.type === 'DEVICE_CHANGED'
    );
    expect(change?.device).toEqual({
      deviceId: 'bot-1',
      available: false,
      reason: 'Device bot-1 disconnected: cable unplugged'
    });
  });

  it('should drop the client on disconnect without touching jobs', async () => {
    const client = await connect();
    client.send({ command: 'SUBSCRIBE', requestId: 'sub' });
    await responseTo(client, 'sub');
    const jobId = fixture.orchestrator.submit({ modelPath: fixture.modelFile, deviceId: 'bot-1' });

    client.socket.close();
    await waitFor(() => gateway.getStatus().clientCount === 0);

    await waitFor(() => fixture.driver.isPrinting(jobId));
    expect(fixture.orchestrator.status(jobId)?.state).toBe('printing');
  });
});
