/**
 * Cache configuration from code and environment.
 *
 * Priority: explicit options, then environment variables, then defaults.
 *
 * Optional env vars:
 * - TYPED_CACHE_DELETE_CORRUPTED: true | false | 1 | 0 (default: true)
 * - TYPED_CACHE_LOG_LEVEL: fatal | error | warn | info | debug | trace | silent (default: info)
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { CacheConfig, CacheConfigOptions, CacheEnv } from './types.js';

const DELETE_CORRUPTED_VAR = 'TYPED_CACHE_DELETE_CORRUPTED';
const LOG_LEVEL_VAR = 'TYPED_CACHE_LOG_LEVEL';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((flag) => flag === 'true' || flag === '1');

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const parseVar = <T>(
  env: CacheEnv,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined => {
  const raw = env[name];
  if (raw === undefined || raw.length === 0) {
    return undefined;
  }

  const parsed = schema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(`${name} has an invalid value "${raw}"`);
  }
  return parsed.data;
};

/**
 * Resolves cache settings.
 *
 * @param options - Explicit settings; these win over the environment
 * @param env - Environment to read (default: process.env)
 * @returns The resolved configuration
 * @throws Error naming the variable when an environment value is invalid
 */
export const resolveCacheConfig = (
  options: CacheConfigOptions = {},
  env: CacheEnv = process.env
): CacheConfig => ({
  deleteCorruptedEntries:
    options.deleteCorruptedEntries ?? parseVar(env, DELETE_CORRUPTED_VAR, booleanFlagSchema) ?? true,
  logLevel: options.logLevel ?? parseVar(env, LOG_LEVEL_VAR, logLevelSchema) ?? 'info',
});
