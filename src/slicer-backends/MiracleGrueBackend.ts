/**
 * @fileoverview Miracle Grue slicer backend.
 *
 * Invocation: `<exe> -c <config> -o <output> -s <start> -e <end> <input>`. The config is
 * generated per job: the profile's base config file (when set) overlaid with the
 * profile's slicing settings. Start and end sequences are written to scratch files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { MiracleGrueProfile, SlicerProfile, SlicingSettings } from '../types/profiles';
import type { SliceRequest } from '../types/backends';
import { AppError, ErrorCode } from '../utils/error.utils';
import {
  BaseSlicerBackend,
  SlicerInvocation,
  writeSequenceFile
} from './BaseSlicerBackend';

/**
 * Slicing settings expressed in Miracle Grue config keys
 */
export function toMiracleGrueSettings(settings: SlicingSettings): Record<string, number | boolean> {
  return {
    doRaft: settings.raft,
    doSupport: settings.support,
    infillDensity: settings.infillDensity,
    layerH: settings.layerHeight,
    nbOfShells: settings.shells,
    extruderTemp: settings.extruderTemperature,
    platformTemp: settings.platformTemperature,
    feedrate: settings.printSpeed,
    rapidMoveFeedRateXY: settings.travelSpeed
  };
}

export class MiracleGrueBackend extends BaseSlicerBackend<MiracleGrueProfile> {
  public readonly kind = 'miracle-grue';

  protected isProfile(profile: SlicerProfile): profile is MiracleGrueProfile {
    return profile.kind === 'miracle-grue';
  }

  protected async buildInvocation(
    request: SliceRequest<MiracleGrueProfile>,
    scratchDir: string
  ): Promise<SlicerInvocation> {
    const { profile } = request;

    const baseConfig = profile.configPath ? await readBaseConfig(profile.configPath) : {};
    const configPath = path.join(scratchDir, 'miracle.config');
    await fs.promises.writeFile(
      configPath,
      JSON.stringify({ ...baseConfig, ...toMiracleGrueSettings(profile.slicing) }, null, 2),
      'utf8'
    );

    const startPath = await writeSequenceFile(path.join(scratchDir, 'start.gcode'), profile.startSequence);
    const endPath = await writeSequenceFile(path.join(scratchDir, 'end.gcode'), profile.endSequence);

    return {
      command: profile.executable,
      args: ['-c', configPath, '-o', request.outputPath, '-s', startPath, '-e', endPath, request.modelPath],
      producedPath: request.outputPath
    };
  }
}

async function readBaseConfig(configPath: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(configPath, 'utf8'));
  } catch (error) {
    throw new AppError(
      `Cannot read Miracle Grue config ${configPath}`,
      ErrorCode.SLICE_FAILED,
      { configPath, diagnostics: '' },
      error instanceof Error ? error : undefined
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new AppError(`Miracle Grue config ${configPath} must be a JSON object`, ErrorCode.SLICE_FAILED, {
      configPath,
      diagnostics: ''
    });
  }
  return { ...parsed };
}
