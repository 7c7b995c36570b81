/**
 * @fileoverview Slicer backend factory.
 */

import type { SlicerKind } from '../types/profiles';
import type { SlicerBackend } from '../types/backends';
import type { SlicerBackendOptions } from './BaseSlicerBackend';
import { MiracleGrueBackend } from './MiracleGrueBackend';
import { SkeinforgeBackend } from './SkeinforgeBackend';

export { BaseSlicerBackend, DiagnosticBuffer, DIAGNOSTIC_LINE_LIMIT } from './BaseSlicerBackend';
export type { SlicerBackendOptions, SlicerInvocation } from './BaseSlicerBackend';
export { MiracleGrueBackend } from './MiracleGrueBackend';
export { SkeinforgeBackend } from './SkeinforgeBackend';

export function createSlicerBackend(kind: SlicerKind, options: SlicerBackendOptions): SlicerBackend {
  switch (kind) {
    case 'miracle-grue':
      return new MiracleGrueBackend(options);
    case 'skeinforge':
      return new SkeinforgeBackend(options);
    default: {
      const _exhaustive: never = kind;
      throw new Error(`Unknown slicer kind: ${String(_exhaustive)}`);
    }
  }
}

/**
 * One backend instance per slicer kind
 */
export function createSlicerBackends(options: SlicerBackendOptions): ReadonlyMap<SlicerKind, SlicerBackend> {
  const kinds: SlicerKind[] = ['miracle-grue', 'skeinforge'];
  return new Map(kinds.map((kind): [SlicerKind, SlicerBackend] => [kind, createSlicerBackend(kind, options)]));
}
