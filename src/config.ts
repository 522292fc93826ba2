/**
 * config.ts — Environment configuration for the objects API client.
 *
 * Values come from process.env; entry points import 'dotenv/config' first so a
 * local .env file is honoured. Every variable has a default that targets the
 * public API with the retry policy the suite was designed around.
 */

import { z } from 'zod';
import { ObjectsClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './client/ObjectsClient.js';
import { DEFAULT_RETRY_POLICY } from './client/retry.js';
import { ConfigError, type RetryPolicy } from './client/types.js';

const BooleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  OBJECTS_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  OBJECTS_API_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  OBJECTS_API_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_RETRY_POLICY.maxAttempts),
  OBJECTS_API_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.initialDelayMs),
  OBJECTS_API_LOG: BooleanFlag,
});

export interface ObjectsApiConfig {
  baseUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
  logging: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ObjectsApiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    baseUrl: vars.OBJECTS_API_BASE_URL,
    timeoutMs: vars.OBJECTS_API_TIMEOUT_MS,
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: vars.OBJECTS_API_RETRY_ATTEMPTS,
      initialDelayMs: vars.OBJECTS_API_RETRY_DELAY_MS,
    },
    logging: vars.OBJECTS_API_LOG,
  };
}

/**
 * createClientFromEnv — ObjectsClient wired from loadConfig(); logs to stderr when
 * OBJECTS_API_LOG is set.
 */
export function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): ObjectsClient {
  const config = loadConfig(env);
  return new ObjectsClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
    log: config.logging ? (line) => console.error(`[objects-api] ${line}`) : undefined,
  });
}
