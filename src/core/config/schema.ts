import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** How CLI value arguments are read. */
export const InputConfigSchema = z.object({
  /** `text` keeps arguments as strings; `json` parses each one */
  format: z.enum(['text', 'json']).default('text'),
  /** Treat each argument as a path and use the file's contents */
  from_files: z.boolean().default(false),
});

export const OutputConfigSchema = z.object({
  /** Print an extra line break after the block */
  trailing_newline: z.boolean().default(false),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('warn'),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Template used by `render` when none is passed */
  default_template: z.string().optional(),
  input: withDefaults(InputConfigSchema),
  output: withDefaults(OutputConfigSchema),
  logging: withDefaults(LoggingConfigSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
