/**
 * Environment configuration.
 * Read once at startup; the traffic logger's init parameters
 * (`whitePatterns`, `logResp`) come from TRAFFIC_LOG_* variables.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() === 'true' : v),
    z.boolean().default(fallback)
  );

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  SERVICE_NAME: z.string().min(1).default('traffic-log'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),

  // Semicolon-separated regular expressions matched against the request path
  TRAFFIC_LOG_WHITE_PATTERNS: z.string().optional(),
  TRAFFIC_LOG_RESP: booleanFlag(false),
  TRAFFIC_LOG_MAX_BODY_BYTES: z.coerce.number().int().positive().optional(),
  TRAFFIC_LOG_HIGHLIGHT_COST: booleanFlag(false),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  serviceName: string;
  logLevel: Env['LOG_LEVEL'];
  server: {
    port: number;
    host: string;
  };
  trafficLog: {
    whitePatterns: string | undefined;
    logResp: boolean;
    maxBodyBytes: number | undefined;
    highlightCost: boolean;
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    serviceName: parsed.SERVICE_NAME,
    logLevel: parsed.LOG_LEVEL,
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
    },
    trafficLog: {
      whitePatterns: parsed.TRAFFIC_LOG_WHITE_PATTERNS,
      logResp: parsed.TRAFFIC_LOG_RESP,
      maxBodyBytes: parsed.TRAFFIC_LOG_MAX_BODY_BYTES,
      highlightCost: parsed.TRAFFIC_LOG_HIGHLIGHT_COST,
    },
  };
}
