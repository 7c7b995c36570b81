/**
 * @fileoverview Wire types for the gateway: REST response envelopes and the WebSocket
 * message protocol.
 *
 * Every server message carries `type` and an ISO `timestamp`. Client commands are defined
 * by the zod schemas in gateway.schemas.ts and inferred from there.
 *
 * Key exports:
 * - StandardAPIResponse: `{ success, ...payload }` / `{ success: false, error, code }`
 * - WebSocketMessage: discriminated union of everything the server sends
 */

import type { DeviceChangedEvent } from '../../types/devices';
import type { JobEvent, JobProgressEvent } from '../../types/job';
import type { ErrorCode } from '../../utils/error.utils';

export interface StandardAPIResponse {
  readonly success: boolean;
  readonly message?: string;
  readonly error?: string;
  readonly code?: ErrorCode;
  readonly details?: unknown;
}

export type WebSocketMessageType =
  | 'WELCOME'
  | 'RESPONSE'
  | 'PONG'
  | 'JOB_EVENT'
  | 'JOB_PROGRESS'
  | 'DEVICE_CHANGED'
  | 'ERROR';

interface MessageBase {
  readonly type: WebSocketMessageType;
  readonly timestamp: string;
}

export interface WelcomeMessage extends MessageBase {
  readonly type: 'WELCOME';
  readonly clientId: string;
}

export type ResponseMessage = MessageBase & {
  readonly type: 'RESPONSE';
  readonly requestId: string | null;
} & (
  | { readonly success: true; readonly data: unknown }
  | { readonly success: false; readonly error: string; readonly code: ErrorCode }
);

export interface PongMessage extends MessageBase {
  readonly type: 'PONG';
  readonly requestId: string | null;
}

export interface JobEventMessage extends MessageBase {
  readonly type: 'JOB_EVENT';
  readonly event: JobEvent;
}

export interface JobProgressMessage extends MessageBase {
  readonly type: 'JOB_PROGRESS';
  readonly progress: JobProgressEvent;
}

export interface DeviceChangedMessage extends MessageBase {
  readonly type: 'DEVICE_CHANGED';
  readonly device: DeviceChangedEvent;
}

/**
 * Protocol-level failure (unparseable or invalid command)
 */
export interface ErrorMessage extends MessageBase {
  readonly type: 'ERROR';
  readonly error: string;
  readonly details?: unknown;
}

export type WebSocketMessage =
  | WelcomeMessage
  | ResponseMessage
  | PongMessage
  | JobEventMessage
  | JobProgressMessage
  | DeviceChangedMessage
  | ErrorMessage;
