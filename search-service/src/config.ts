import { z } from 'zod';

/** Unset and empty variables both fall back to the default. */
function optionalVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

// Request bodies are validated recursively, so the depth limit stays well
// below what the validator can walk.
export const MAX_CRITERIA_DEPTH_LIMIT = 256;

const EnvSchema = z.object({
  PORT: optionalVar(z.coerce.number().int().min(0).max(65535).default(3000)),
  HOST: optionalVar(z.string().min(1).default('0.0.0.0')),
  LOG_LEVEL: optionalVar(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  QUERY_PREFIXED: optionalVar(z.enum(['true', 'false']).default('true')),
  MAX_CRITERIA_DEPTH: optionalVar(
    z.coerce.number().int().positive().max(MAX_CRITERIA_DEPTH_LIMIT).default(32),
  ),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface Config {
  port: number;
  host: string;
  logLevel: LogLevel;
  /** Default for requests that do not say whether to emit cts:/fn: prefixes. */
  prefixed: boolean;
  maxCriteriaDepth: number;
}

/** Reads the service configuration from the environment. Throws ZodError when invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    prefixed: parsed.QUERY_PREFIXED === 'true',
    maxCriteriaDepth: parsed.MAX_CRITERIA_DEPTH,
  };
}
