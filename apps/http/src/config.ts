// apps/http/src/config.ts
import { z } from 'zod';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .transform((v) => v === '1' || v === 'true');

const count = z.coerce.number().int().nonnegative();

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default('0.0.0.0'),
  QUERY_BACKEND: z.enum(['memory', 'mysql']).default('memory'),
  MYSQL_URI: z.string().url().optional(),
  SCHEMA_PATH: z.string().optional(),
  DATA_PATH: z.string().optional(),
  QUERY_DEFAULT_LIMIT: count.default(10),
  QUERY_MAX_LIMIT: count.default(200),
  QUERY_MAX_DEPTH: count.default(10),
  QUERY_USE_PERMISSIONS: flag.default('0'),
  // comma-separated; empty allows every origin
  CORS_ORIGIN: z.string().default(''),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse(env);
}
