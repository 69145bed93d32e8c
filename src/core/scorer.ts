/**
 * Scoring orchestrator - match, enrich, score and summarize a batch of profiles
 */

import { matchProfile, isKnownProfile } from './matcher.js';
import { mergeRecord } from './store.js';
import { EnrichmentCache } from './enrichment-cache.js';
import { aggregateScore, roundHalfUp, unknownProfileScore } from './penalty.js';
import { InvalidInputError, errorMessage, isInvalidInputError } from './errors.js';
import type { VulnerabilityStore } from './store.js';
import type { EnrichmentLookup } from './enrichment-cache.js';
import type { ModifierRule } from './modifiers.js';
import type {
  EnrichmentFetcher,
  Profile,
  ProfileSecurityScore,
  SecurityScoreReport,
  SecurityScoreSummary,
  VulnerabilityRecord,
} from './types.js';

export const DEFAULT_CONCURRENCY = 4;

export interface ScoreOptions {
  store: VulnerabilityStore;
  /** Enrichment runs only when a fetcher is supplied */
  fetcher?: EnrichmentFetcher;
  cache?: EnrichmentCache;
  /** Bypass fresh cache entries (each id is refetched at most once per batch) */
  refresh?: boolean;
  concurrency?: number;
  now?: () => Date;
  rules?: readonly ModifierRule[];
  logger?: (message: string) => void;
  debug?: boolean;
}

type Enricher = (id: string) => Promise<EnrichmentLookup>;

interface ScoringContext {
  store: VulnerabilityStore;
  enrich: Enricher | null;
  now: Date;
  rules?: readonly ModifierRule[];
  logger: (message: string) => void;
  debug: boolean;
}

function createEnricher(cache: EnrichmentCache, fetcher: EnrichmentFetcher, refresh: boolean): Enricher {
  const refreshed = new Set<string>();

  return (id: string) => {
    const bypass = refresh && !refreshed.has(id);
    refreshed.add(id);
    return cache.fetchOrCached(id, fetcher, { bypass });
  };
}

async function enrichRecords(
  records: VulnerabilityRecord[],
  enrich: Enricher | null
): Promise<{ records: VulnerabilityRecord[]; notes: string[] }> {
  if (!enrich) {
    return { records, notes: [] };
  }

  const lookups = await Promise.all(records.map(record => enrich(record.id)));
  const notes: string[] = [];

  const merged = records.map((record, index) => {
    const lookup = lookups[index];
    if (lookup.source === 'unavailable') {
      notes.push(`${record.id}: external data unavailable (${lookup.error ?? 'unknown error'}), using local data`);
    }
    return mergeRecord(record, lookup.fragment);
  });

  return { records: merged, notes };
}

async function scoreWithContext(profile: Profile, context: ScoringContext): Promise<ProfileSecurityScore> {
  if (!isKnownProfile(profile)) {
    if (context.debug) {
      console.log(`  ${profile.name}: no platform/version, score unknown`);
    }
    return unknownProfileScore(profile);
  }

  const matched = matchProfile(context.store, profile);
  const enriched = await enrichRecords(matched, context.enrich);
  const result = aggregateScore(profile, enriched.records, { now: context.now, rules: context.rules });

  for (const note of result.notes) {
    context.logger(`[posture-score] ${profile.name}: ${note}`);
  }

  if (context.debug) {
    console.log(`  ${profile.name}: ${matched.length} matched, score ${result.score}`);
  }

  return { ...result, notes: [...enriched.notes, ...result.notes] };
}

function buildContext(options: ScoreOptions): ScoringContext {
  const { store, fetcher, refresh = false, logger = console.warn, debug = false } = options;

  let enrich: Enricher | null = null;
  if (fetcher) {
    const cache = options.cache ?? new EnrichmentCache({ logger });
    const evicted = cache.prune();
    if (debug && evicted > 0) {
      console.log(`Evicted ${evicted} expired enrichment entr${evicted === 1 ? 'y' : 'ies'}`);
    }
    enrich = createEnricher(cache, fetcher, refresh);
  }

  return {
    store,
    enrich,
    now: (options.now ?? (() => new Date()))(),
    rules: options.rules,
    logger,
    debug,
  };
}

/**
 * Score a single profile
 */
export function scoreProfile(profile: Profile, options: ScoreOptions): Promise<ProfileSecurityScore> {
  return scoreWithContext(profile, buildContext(options));
}

function assertUniqueNames(profiles: Profile[]): void {
  const seen = new Set<string>();
  for (const profile of profiles) {
    if (typeof profile.name !== 'string' || profile.name.length === 0) {
      throw new InvalidInputError('Every profile needs a non-empty name');
    }
    if (seen.has(profile.name)) {
      throw new InvalidInputError(`Duplicate profile name in batch: ${profile.name}`);
    }
    seen.add(profile.name);
  }
}

export function summarizeScores(results: ProfileSecurityScore[]): SecurityScoreSummary {
  const summary: SecurityScoreSummary = { excellent: 0, good: 0, fair: 0, poor: 0, critical: 0, unknown: 0 };

  for (const result of results) {
    switch (result.label) {
      case 'Excellent': summary.excellent++; break;
      case 'Good': summary.good++; break;
      case 'Fair': summary.fair++; break;
      case 'Poor': summary.poor++; break;
      case 'Critical': summary.critical++; break;
      case null: summary.unknown++; break;
    }
  }

  return summary;
}

/**
 * Score every profile, preserving input order. A fault in one profile turns
 * into a null score with a note; contract violations are rethrown.
 */
export async function scoreProfiles(profiles: Profile[], options: ScoreOptions): Promise<SecurityScoreReport> {
  assertUniqueNames(profiles);

  const context = buildContext(options);
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);

  if (context.debug) {
    console.log(`Scoring ${profiles.length} profile(s) against ${context.store.size} record(s)`);
  }

  const results: ProfileSecurityScore[] = new Array(profiles.length);
  const queue = profiles.map((_, index) => index);

  const processQueue = async (): Promise<void> => {
    while (queue.length > 0) {
      const index = queue.shift();
      if (index === undefined) break;

      const profile = profiles[index];
      try {
        results[index] = await scoreWithContext(profile, context);
      } catch (error) {
        if (isInvalidInputError(error)) {
          throw error;
        }
        const note = `scoring failed: ${errorMessage(error)}`;
        context.logger(`[posture-score] ${profile.name}: ${note}`);
        results[index] = unknownProfileScore(profile, [note]);
      }
    }
  };

  const workers = Array(Math.min(concurrency, profiles.length))
    .fill(null)
    .map(() => processQueue());

  await Promise.all(workers);

  const scores = results
    .map(result => result.score)
    .filter((score): score is number => score !== null);

  const diagnostics = results.flatMap(result => result.notes.map(note => `${result.profileName}: ${note}`));

  return {
    timestamp: context.now.toISOString(),
    profilesChecked: results.length,
    averageScore: scores.length > 0 ? roundHalfUp(scores.reduce((a, b) => a + b, 0) / scores.length, 1) : null,
    lowestScore: scores.length > 0 ? Math.min(...scores) : null,
    highestScore: scores.length > 0 ? Math.max(...scores) : null,
    summary: summarizeScores(results),
    results,
    diagnostics,
  };
}
