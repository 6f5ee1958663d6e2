/**
 * Logger settings. The same schema validates the `logger` section of toolcast.config.json.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export const LogFormatSchema = z.enum(["json", "pretty"]);

export const LoggerSettingsSchema = z
  .object({
    level: LogLevelSchema.default("info"),
    format: LogFormatSchema.default("pretty"),
    file: z
      .object({
        enabled: z.boolean().default(false),
        path: z.string().min(1).default("./logs/toolcast.log"),
      })
      .strict()
      .default({}),
  })
  .strict();

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type LoggerSettings = z.infer<typeof LoggerSettingsSchema>;
export type FileTransportConfig = LoggerSettings["file"];

export interface LoggerConfig extends LoggerSettings {
  /** Stamped on every line as `source` */
  source?: string;
}

export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  const { source, ...settings } = config;
  return { ...LoggerSettingsSchema.parse(settings), source };
}
