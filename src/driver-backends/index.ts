/**
 * @fileoverview Driver backend factory.
 */

import type { DriverKind } from '../types/profiles';
import type { DriverBackend } from '../types/backends';
import type { DriverBackendOptions } from './BaseDriverBackend';
import { FileDriverBackend } from './FileDriverBackend';
import { MakerBotDriverBackend } from './MakerBotDriverBackend';

export { BaseDriverBackend, assembleToolpath } from './BaseDriverBackend';
export type { DriverBackendOptions, PrintSink, ToolpathLines } from './BaseDriverBackend';
export { FileDriverBackend, outputPathFor } from './FileDriverBackend';
export { MakerBotDriverBackend } from './MakerBotDriverBackend';

export function createDriverBackend(kind: DriverKind, options: DriverBackendOptions = {}): DriverBackend {
  switch (kind) {
    case 'makerbot':
      return new MakerBotDriverBackend(options);
    case 'file':
      return new FileDriverBackend(options);
    default: {
      const _exhaustive: never = kind;
      throw new Error(`Unknown driver kind: ${String(_exhaustive)}`);
    }
  }
}

/**
 * One backend instance per driver kind
 */
export function createDriverBackends(options: DriverBackendOptions = {}): ReadonlyMap<DriverKind, DriverBackend> {
  const kinds: DriverKind[] = ['makerbot', 'file'];
  return new Map(kinds.map((kind): [DriverKind, DriverBackend] => [kind, createDriverBackend(kind, options)]));
}
