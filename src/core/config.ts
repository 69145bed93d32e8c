/**
 * Runtime configuration from environment variables and explicit overrides
 */

import { DEFAULT_DATA_DIR } from './store.js';
import { DEFAULT_CACHE_TTL_MS, DEFAULT_FETCH_TIMEOUT_MS } from './enrichment-cache.js';
import { DEFAULT_CONCURRENCY } from './scorer.js';

export interface PostureConfig {
  dataDir: string;
  profilesDir: string;
  enableExternalProviders: boolean;
  enrichTimeoutMs: number;
  cacheTtlMs: number;
  concurrency: number;
  nvdApiKey?: string;
}

const TRUTHY = ['1', 'true', 'yes', 'on'];

export function parseFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.includes(value.trim().toLowerCase());
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Defaults, then environment, then overrides (CLI options)
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<PostureConfig> = {}
): PostureConfig {
  return {
    dataDir: overrides.dataDir ?? (env.POSTURE_DATA_DIR || DEFAULT_DATA_DIR),
    profilesDir: overrides.profilesDir ?? (env.POSTURE_PROFILES_DIR || 'profiles'),
    enableExternalProviders: overrides.enableExternalProviders ?? parseFlag(env.POSTURE_EXTERNAL_PROVIDERS),
    enrichTimeoutMs: overrides.enrichTimeoutMs ?? parsePositiveInt(env.POSTURE_ENRICH_TIMEOUT_MS, DEFAULT_FETCH_TIMEOUT_MS),
    cacheTtlMs: overrides.cacheTtlMs ?? parsePositiveInt(env.POSTURE_CACHE_TTL_MS, DEFAULT_CACHE_TTL_MS),
    concurrency: overrides.concurrency ?? DEFAULT_CONCURRENCY,
    nvdApiKey: overrides.nvdApiKey ?? (env.NVD_API_KEY || undefined),
  };
}
