import { z } from "zod";

export const ServerConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(5000),
});

export const LoggingConfigSchema = z.object({
  verbose: z.boolean().default(false),
  logFile: z.string().optional(),
});

export const ConfigSchema = z.object({
  dataDirectory: z.string().default("~/.worklog"),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
