/**
 * @fileoverview Zod schema for the daemon configuration document.
 *
 * Every field carries a default, so `{}` parses into a complete configuration. Profile
 * and device entries are validated strictly so that typos surface as CONFIG_INVALID at
 * startup instead of as missing settings mid-job.
 */

import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LoggingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  level: LogLevelSchema.default('info'),
  file: z.string().min(1).optional()
});

export const SlicingSettingsSchema = z.object({
  raft: z.boolean().default(false),
  support: z.boolean().default(false),
  infillDensity: z.number().min(0).max(1).default(0.1),
  layerHeight: z.number().positive().default(0.27),
  shells: z.number().int().min(0).default(1),
  extruderTemperature: z.number().min(0).max(400).default(230),
  platformTemperature: z.number().min(0).max(200).default(110),
  printSpeed: z.number().positive().default(80),
  travelSpeed: z.number().positive().default(100)
});

const SequenceSchema = z.array(z.string());

const SlicerProfileConfigSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['miracle-grue', 'skeinforge']),
  executable: z.string().min(1).optional(),
  configPath: z.string().min(1).optional(),
  python: z.string().min(1).optional(),
  profileDir: z.string().min(1).optional(),
  slicing: SlicingSettingsSchema.partial().optional(),
  startSequence: SequenceSchema.optional(),
  endSequence: SequenceSchema.optional()
}).strict();

const DriverProfileConfigSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['makerbot', 'file']),
  machineProfile: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  pollIntervalMs: z.number().int().min(0).optional(),
  skipStartEnd: z.boolean().optional(),
  startSequence: SequenceSchema.optional(),
  endSequence: SequenceSchema.optional(),
  abortSequence: SequenceSchema.optional()
}).strict();

const DeviceConfigSchema = z.object({
  id: z.string().min(1),
  port: z.string().min(1),
  baudRate: z.number().int().positive().optional()
}).strict();

export const ConveyorConfigSchema = z.object({
  common: z.object({
    address: z.string().min(1).default('tcp:127.0.0.1:9999'),
    pidFile: z.string().min(1).default('conveyord.pid'),
    workDir: z.string().min(1).optional(),
    slicer: z.enum(['miracle-grue', 'skeinforge']).default('miracle-grue')
  }).default({}),
  miracleGrue: z.object({
    executable: z.string().min(1).default('miracle_grue'),
    configPath: z.string().min(1).optional(),
    defaultProfile: z.string().min(1).default('MiracleGrue')
  }).default({}),
  skeinforge: z.object({
    executable: z.string().min(1).default('skeinforge.py'),
    python: z.string().min(1).default('python'),
    profileDir: z.string().min(1).default('skeinforge/profiles'),
    defaultProfile: z.string().min(1).default('Skeinforge')
  }).default({}),
  makerbotDriver: z.object({
    machineProfile: z.string().min(1).default('Replicator2'),
    pollIntervalMs: z.number().int().min(0).default(5000),
    baudRate: z.number().int().positive().default(115200),
    defaultProfile: z.string().min(1).default('MakerBotDriver')
  }).default({}),
  fileDriver: z.object({
    outputDir: z.string().min(1).default('output'),
    defaultProfile: z.string().min(1).default('FileDriver')
  }).default({}),
  server: z.object({
    eventThreads: z.number().int().min(1).default(4),
    requestThreads: z.number().int().min(1).default(4),
    chdir: z.boolean().default(false),
    cancelGracePeriodMs: z.number().int().min(0).default(5000),
    detectIntervalMs: z.number().int().min(0).default(10000),
    blacklistMs: z.number().int().min(0).default(30000),
    logging: LoggingConfigSchema.default({})
  }).default({}),
  client: z.object({
    eventThreads: z.number().int().min(1).default(2),
    logging: LoggingConfigSchema.default({}),
    slicing: SlicingSettingsSchema.default({})
  }).default({}),
  slicerProfiles: z.array(SlicerProfileConfigSchema).default([]),
  driverProfiles: z.array(DriverProfileConfigSchema).default([]),
  devices: z.array(DeviceConfigSchema).default([])
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.devices.forEach((device, index) => {
    if (seen.has(device.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['devices', index, 'id'],
        message: `Duplicate device id "${device.id}"`
      });
    }
    seen.add(device.id);
  });
});

export type ConveyorConfigInput = z.input<typeof ConveyorConfigSchema>;
