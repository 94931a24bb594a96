import path from 'node:path';

import { z } from 'zod';

const positiveIntFromString = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, { message: 'Expected a positive integer' })
    .default(String(fallback))
    .transform((val: string) => parseInt(val, 10))
    .refine((val: number) => val > 0, { message: 'Expected a positive integer' });

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    XCM_INDEXER_ASSET_CACHE_TTL_MS: positiveIntFromString(10 * 60_000),
    XCM_INDEXER_RECONNECT_BASE_DELAY_MS: positiveIntFromString(1_000),
    XCM_INDEXER_RECONNECT_MAX_DELAY_MS: positiveIntFromString(60_000),
    XCM_INDEXER_RPC_TIMEOUT_MS: positiveIntFromString(30_000),
    XCM_INDEXER_RPC_URL: z
      .string()
      .trim()
      .url({ message: 'Invalid node URL' })
      .refine((val: string) => /^wss?:\/\//.test(val), { message: 'Node URL must use ws:// or wss://' })
      .default('wss://polkadot-asset-hub-rpc.polkadot.io'),
    XCM_INDEXER_SCHEMA_PATH: z.string().trim().min(1).default('artifacts/asset-hub-schema.json'),
  })
  .refine((env) => env.XCM_INDEXER_RECONNECT_BASE_DELAY_MS <= env.XCM_INDEXER_RECONNECT_MAX_DELAY_MS, {
    message: 'XCM_INDEXER_RECONNECT_BASE_DELAY_MS must not exceed XCM_INDEXER_RECONNECT_MAX_DELAY_MS',
    path: ['XCM_INDEXER_RECONNECT_BASE_DELAY_MS'],
  });

type ValidatedEnv = z.infer<typeof envSchema>;

export interface IndexerConfig {
  /** WebSocket endpoint of the Asset Hub node */
  rpcUrl: string;
  /** Absolute path of the schema fingerprint artifact */
  schemaPath: string;
  rpcTimeoutMs: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  assetCacheTtlMs: number;
}

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates an environment map.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access.
 * Caches the result for subsequent calls.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

export function toIndexerConfig(env: ValidatedEnv, cwd: string = process.cwd()): IndexerConfig {
  return {
    assetCacheTtlMs: env.XCM_INDEXER_ASSET_CACHE_TTL_MS,
    reconnectBaseDelayMs: env.XCM_INDEXER_RECONNECT_BASE_DELAY_MS,
    reconnectMaxDelayMs: env.XCM_INDEXER_RECONNECT_MAX_DELAY_MS,
    rpcTimeoutMs: env.XCM_INDEXER_RPC_TIMEOUT_MS,
    rpcUrl: env.XCM_INDEXER_RPC_URL,
    schemaPath: path.resolve(cwd, env.XCM_INDEXER_SCHEMA_PATH),
  };
}

/**
 * Indexer settings from the process environment.
 */
export function getIndexerConfig(): IndexerConfig {
  return toIndexerConfig(validateEnv());
}

/**
 * Get the current NODE_ENV value.
 * @returns 'development', 'production', or 'test'
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  const env = validateEnv();
  return env.NODE_ENV;
}

/**
 * Check if running in test environment.
 */
export function isTest(): boolean {
  return getNodeEnv() === 'test';
}
