/**
 * Vulnerability analysis for a platform/version pair and per-profile status checks
 */

import { compareVersions, isKnownProfile, matchProfile } from './matcher.js';
import { resolveSeverity } from './severity.js';
import type { VulnerabilityStore } from './store.js';
import type {
  Profile,
  ProfileVulnerabilityReport,
  ProfileVulnerabilityResult,
  SeverityClass,
  VersionAnalysis,
  VulnerabilityRecord,
  VulnerabilityStatus,
} from './types.js';

/**
 * Count scorable records per severity class
 */
export function summarizeSeverities(records: VulnerabilityRecord[]): Record<SeverityClass, number> {
  const counts: Record<SeverityClass, number> = { critical: 0, high: 0, medium: 0, low: 0 };

  for (const record of records) {
    const resolution = resolveSeverity(record);
    if (resolution.scorable) {
      counts[resolution.severity]++;
    }
  }

  return counts;
}

/**
 * Lowest fixed release among critical and high records, or null
 */
export function recommendUpgrade(records: VulnerabilityRecord[]): string | null {
  let best: string | null = null;

  for (const record of records) {
    const resolution = resolveSeverity(record);
    if (!resolution.scorable || !record.fixedIn) continue;
    if (resolution.severity !== 'critical' && resolution.severity !== 'high') continue;

    if (best === null) {
      best = record.fixedIn;
      continue;
    }

    const comparison = compareVersions(record.fixedIn, best);
    if (comparison !== null && comparison < 0) {
      best = record.fixedIn;
    }
  }

  return best;
}

function buildRecommendation(records: VulnerabilityRecord[], upgrade: string | null): string | null {
  if (records.length === 0) {
    return null;
  }

  const severities = summarizeSeverities(records);
  if (severities.critical + severities.high === 0) {
    return 'Only medium/low issues matched. Review the advisories and keep hardening the device.';
  }

  if (upgrade) {
    return `One or more critical/high issues affect this platform/version. Consider upgrading to at least ${upgrade}.`;
  }

  return 'One or more critical/high issues affect this platform/version. Review the workarounds and plan an upgrade.';
}

export function analyzeVersion(
  store: VulnerabilityStore,
  platform: string,
  version: string,
  now: Date = new Date()
): VersionAnalysis {
  const matched = matchProfile(store, { name: 'analysis', platform, version });
  const recommendedUpgrade = recommendUpgrade(matched);

  return {
    platform,
    version,
    matched,
    severities: summarizeSeverities(matched),
    recommendedUpgrade,
    recommendation: buildRecommendation(matched, recommendedUpgrade),
    timestamp: now.toISOString(),
  };
}

export function statusFromCvss(maxCvss: number | null): VulnerabilityStatus {
  if (maxCvss === null) return 'clean';
  if (maxCvss >= 9.0) return 'critical';
  if (maxCvss >= 7.0) return 'high';
  if (maxCvss >= 4.0) return 'medium';
  if (maxCvss > 0) return 'low';
  return 'clean';
}

/**
 * Vulnerability status of each profile from the highest CVSS among its matches
 */
export function checkProfiles(
  profiles: Profile[],
  store: VulnerabilityStore,
  now: Date = new Date()
): ProfileVulnerabilityReport {
  const summary: Record<VulnerabilityStatus, number> = {
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
    clean: 0,
    unknown: 0,
  };

  const results = profiles.map((profile): ProfileVulnerabilityResult => {
    const base = {
      profileName: profile.name,
      platform: profile.platform ?? null,
      version: profile.version ?? null,
    };

    if (!isKnownProfile(profile)) {
      summary.unknown++;
      return { ...base, status: 'unknown', cveCount: 0, maxCvss: null, cves: [] };
    }

    const matched = matchProfile(store, profile);
    let maxCvss: number | null = null;
    for (const record of matched) {
      if (record.cvssScore !== undefined && (maxCvss === null || record.cvssScore > maxCvss)) {
        maxCvss = record.cvssScore;
      }
    }

    const status = statusFromCvss(maxCvss);
    summary[status]++;

    return {
      ...base,
      status,
      cveCount: matched.length,
      maxCvss,
      cves: matched.map(record => record.id),
    };
  });

  return {
    timestamp: now.toISOString(),
    profilesChecked: results.length,
    summary,
    results,
  };
}
