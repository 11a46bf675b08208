import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);

/** `totals`, `irq-number`, `name` or a NUMA node id */
export const SortBySchema = z
  .string()
  .regex(/^(totals|irq-number|name|\d+)$/, {
    message: 'sort key must be "totals", "irq-number", "name" or a node id',
  });

export const MonitorConfigSchema = z.object({
  intervalMs: z.number().int().min(1).default(1000),
  // 0 runs until cancelled
  iterations: z.number().int().min(0).default(0),
  // 0 shows every row
  rows: z.number().int().min(0).default(0),
  sortBy: SortBySchema.default('totals'),
  hideZero: z.boolean().default(false),
  filters: z.array(z.string().min(1)).default([]),
  includeNonNumeric: z.boolean().default(false),
  // -1 starts in Totals mode
  startNode: z.number().int().min(-1).default(-1),
  overall: z.boolean().default(false),
  batch: z.boolean().default(false),
  sleepSliceMs: z.number().int().min(1).default(100),
});

export const SourcesObjectSchema = z.object({
  interruptsFile: z.string().min(1).optional(),
  compareFile: z.string().min(1).optional(),
  topologyFile: z.string().min(1).optional(),
  topologyCommand: z.string().min(1).default('numactl --hardware'),
});

export const SourcesConfigSchema = SourcesObjectSchema.refine(
  sources => sources.compareFile === undefined || sources.interruptsFile !== undefined,
  {
    message: 'a comparison file requires an interrupts file to compare against',
    path: ['compareFile'],
  }
);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('warn'),
  format: LogFormatSchema.default('simple'),
  console: z.boolean().default(true),
  dir: z.string().min(1).optional(),
  maxFiles: z.number().int().min(1).default(5),
  maxSize: z
    .string()
    .regex(/^\d+[bkmg]$/i, 'log file size must look like 512k, 10m or 1g')
    .default('10m'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  monitor: MonitorConfigSchema,
  sources: SourcesConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Shape of config/default.json: every section and key optional
 */
export const FileConfigSchema = z.object({
  monitor: MonitorConfigSchema.partial().optional(),
  sources: SourcesObjectSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;
export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Partial configuration accepted from files and the command line
 */
export type ConfigOverrides = {
  [K in keyof Config]?: Partial<Config[K]>;
};
