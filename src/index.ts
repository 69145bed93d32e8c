/**
 * posture-score
 * Security posture scores (0-100) for device profiles based on matched CVEs
 */

// Scoring
export { scoreProfile, scoreProfiles, summarizeScores, DEFAULT_CONCURRENCY } from './core/scorer.js';
export type { ScoreOptions } from './core/scorer.js';

// Store
export {
  VulnerabilityStore,
  loadVulnerabilityStore,
  parseVulnerabilityRecord,
  mergeRecord,
  DEFAULT_DATA_DIR,
} from './core/store.js';
export type { ParseResult, LoadStoreOptions } from './core/store.js';

// Matching
export { matchProfile, compareVersions, parseVersionParts, isVersionInRange, versionMatches, platformMatches } from './core/matcher.js';

// Severity, modifiers and penalties
export { classifyCvss, resolveSeverity } from './core/severity.js';
export { computeModifier, ageInDays, MODIFIER_RULES } from './core/modifiers.js';
export type { ModifierRule } from './core/modifiers.js';
export {
  aggregateScore,
  basePenalty,
  roundHalfUp,
  scoreLabel,
  labelColor,
  SEVERITY_PENALTIES,
  SCORE_THRESHOLDS,
} from './core/penalty.js';

// Enrichment
export { EnrichmentCache, DEFAULT_CACHE_TTL_MS, DEFAULT_FETCH_TIMEOUT_MS } from './core/enrichment-cache.js';
export type { EnrichmentLookup, EnrichmentStatus, EnrichmentCacheOptions } from './core/enrichment-cache.js';
export { createNvdFetcher, parseNvdResponse } from './core/providers/nvd.js';

// Analysis
export { analyzeVersion, checkProfiles, recommendUpgrade, summarizeSeverities } from './core/analysis.js';

// Profiles and configuration
export { loadProfiles, toProfile } from './core/profiles.js';
export { resolveConfig } from './core/config.js';
export type { PostureConfig } from './core/config.js';

// Errors
export { InvalidInputError, isInvalidInputError } from './core/errors.js';

// Formatters
export { formatScoreReport, formatVersionAnalysis, formatStatusReport } from './core/formatters/text.js';

// Types
export type {
  VulnerabilityRecord,
  VersionMatcher,
  EnrichmentFragment,
  EnrichmentFetcher,
  Profile,
  CveScoreBreakdown,
  ProfileSecurityScore,
  SecurityScoreReport,
  SecurityScoreSummary,
  SeverityClass,
  ScoreLabel,
  ModifierName,
  VersionAnalysis,
  ProfileVulnerabilityReport,
} from './core/types.js';
