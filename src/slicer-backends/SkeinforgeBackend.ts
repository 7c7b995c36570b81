/**
 * @fileoverview Skeinforge slicer backend.
 *
 * Invocation: `<python> <exe> -p <profileDir> --option <csv:key:value>... <input>`.
 * Skeinforge writes `<input-base>_export.gcode` beside its input, so the model is copied
 * into the scratch directory first and the export is moved to the requested output path.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SkeinforgeProfile, SlicerProfile, SlicingSettings } from '../types/profiles';
import type { SliceRequest } from '../types/backends';
import { BaseSlicerBackend, SlicerInvocation } from './BaseSlicerBackend';

function flag(value: boolean): string {
  return value ? 'True' : 'False';
}

/**
 * Slicing settings as Skeinforge `--option` values
 */
export function toSkeinforgeOptions(settings: SlicingSettings): string[] {
  return [
    `raft.csv:Add Raft, Elevate Nozzle, Orbit:${flag(settings.raft)}`,
    `raft.csv:None:${flag(!settings.support)}`,
    `raft.csv:Everywhere:${flag(settings.support)}`,
    `fill.csv:Infill Solidity (ratio):${settings.infillDensity}`,
    `carve.csv:Layer Height (mm):${settings.layerHeight}`,
    `inset.csv:Number of Shells (integer):${settings.shells}`,
    `temperature.csv:Object Next Layers Temperature (Celcius):${settings.extruderTemperature}`,
    `temperature.csv:Base Temperature (Celcius):${settings.platformTemperature}`,
    `speed.csv:Feed Rate (mm/s):${settings.printSpeed}`,
    `speed.csv:Travel Feed Rate (mm/s):${settings.travelSpeed}`
  ];
}

export class SkeinforgeBackend extends BaseSlicerBackend<SkeinforgeProfile> {
  public readonly kind = 'skeinforge';

  protected isProfile(profile: SlicerProfile): profile is SkeinforgeProfile {
    return profile.kind === 'skeinforge';
  }

  protected async buildInvocation(
    request: SliceRequest<SkeinforgeProfile>,
    scratchDir: string
  ): Promise<SlicerInvocation> {
    const { profile } = request;

    const inputPath = path.join(scratchDir, path.basename(request.modelPath));
    await fs.promises.copyFile(request.modelPath, inputPath);

    const parsed = path.parse(inputPath);
    const producedPath = path.join(parsed.dir, `${parsed.name}_export.gcode`);

    const optionArgs = toSkeinforgeOptions(profile.slicing).flatMap(option => ['--option', option]);

    return {
      command: profile.python,
      args: [profile.executable, '-p', profile.profileDir, ...optionArgs, inputPath],
      producedPath,
      cwd: scratchDir
    };
  }
}
