/**
 * @fileoverview Service address parsing for the gateway listener.
 *
 * Accepted forms:
 *   tcp:127.0.0.1:9999   TCP host and port
 *   pipe:/tmp/conveyor   Unix domain socket (named pipe path on Windows)
 */

import { AppError, ErrorCode } from './error.utils';

export type ServiceAddress =
  | { readonly kind: 'tcp'; readonly host: string; readonly port: number }
  | { readonly kind: 'pipe'; readonly path: string };

export type AddressErrorReason =
  | 'unknown-protocol'
  | 'missing-host'
  | 'missing-port'
  | 'invalid-port'
  | 'missing-path';

function addressError(value: string, reason: AddressErrorReason, message: string): AppError {
  return new AppError(message, ErrorCode.ADDRESS_INVALID, { value, reason });
}

export function parseAddress(value: string): ServiceAddress {
  const separator = value.indexOf(':');
  const protocol = separator === -1 ? value : value.slice(0, separator);
  const rest = separator === -1 ? null : value.slice(separator + 1);

  switch (protocol) {
    case 'tcp':
      return parseTcpAddress(value, rest);
    case 'pipe':
      if (!rest) {
        throw addressError(value, 'missing-path', `Missing pipe path in address "${value}"`);
      }
      return { kind: 'pipe', path: rest };
    default:
      throw addressError(value, 'unknown-protocol', `Unknown protocol "${protocol}" in address "${value}"`);
  }
}

function parseTcpAddress(value: string, rest: string | null): ServiceAddress {
  if (rest === null) {
    throw addressError(value, 'missing-host', `Missing host in address "${value}"`);
  }

  const separator = rest.lastIndexOf(':');
  if (separator === -1) {
    throw addressError(value, 'missing-port', `Missing port in address "${value}"`);
  }

  const host = rest.slice(0, separator);
  const portText = rest.slice(separator + 1);
  if (host.length === 0) {
    throw addressError(value, 'missing-host', `Missing host in address "${value}"`);
  }

  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw addressError(value, 'invalid-port', `Invalid port "${portText}" in address "${value}"`);
  }

  return { kind: 'tcp', host, port };
}

export function formatAddress(address: ServiceAddress): string {
  return address.kind === 'tcp' ? `tcp:${address.host}:${address.port}` : `pipe:${address.path}`;
}
