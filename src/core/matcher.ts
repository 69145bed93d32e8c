/**
 * Matcher - selects the vulnerability records that apply to a device profile
 */

import type { Profile, VersionMatcher, VulnerabilityRecord } from './types.js';
import type { VulnerabilityStore } from './store.js';

const LEADING_VERSION = /^\d+(?:\.\d+)*/;

/**
 * Leading dotted numeric parts of a release string ("9.16.3.19" -> [9, 16, 3, 19],
 * "17.6.3a" -> [17, 6, 3]), or null when it does not start with a number
 */
export function parseVersionParts(version: string): number[] | null {
  const match = LEADING_VERSION.exec(version.trim());
  if (!match) {
    return null;
  }
  return match[0].split('.').map(part => parseInt(part, 10));
}

/**
 * Compare two dotted release strings numerically, at full length.
 * Trailing build letters are ignored ("17.6.3a" == "17.6.3"); missing parts are zero.
 * Returns null when either side has no numeric prefix.
 */
export function compareVersions(a: string, b: string): number | null {
  const left = parseVersionParts(a);
  const right = parseVersionParts(b);

  if (!left || !right) {
    return null;
  }

  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (i < left.length ? left[i] : 0) - (i < right.length ? right[i] : 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }

  return 0;
}

/**
 * Check a version against inclusive range bounds
 */
export function isVersionInRange(version: string, min: string, max: string): boolean {
  const lower = compareVersions(version, min);
  const upper = compareVersions(version, max);

  if (lower === null || upper === null) {
    return false;
  }

  return lower >= 0 && upper <= 0;
}

export function versionMatches(matcher: VersionMatcher, version: string): boolean {
  const candidate = version.trim();

  switch (matcher.kind) {
    case 'exact':
      return matcher.version.trim() === candidate;
    case 'list':
      return matcher.versions.some(v => v.trim() === candidate);
    case 'range':
      return isVersionInRange(candidate, matcher.min, matcher.max);
  }
}

export function normalizePlatform(platform: string): string {
  return platform.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function platformMatches(platform: string, recordPlatforms: string[]): boolean {
  const wanted = normalizePlatform(platform);
  if (!wanted) {
    return false;
  }
  return recordPlatforms.some(p => normalizePlatform(p) === wanted);
}

/**
 * A profile is known only when it carries both a platform and a version
 */
export function isKnownProfile(
  profile: Profile
): profile is Profile & { platform: string; version: string } {
  return (
    typeof profile.platform === 'string' &&
    profile.platform.trim().length > 0 &&
    typeof profile.version === 'string' &&
    profile.version.trim().length > 0
  );
}

export function compareRecordIds(a: VulnerabilityRecord, b: VulnerabilityRecord): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Match a profile against the store. Output is ordered by record id so that
 * breakdowns are reproducible across calls.
 */
export function matchProfile(store: VulnerabilityStore, profile: Profile): VulnerabilityRecord[] {
  if (!isKnownProfile(profile)) {
    return [];
  }

  return [...store.get(profile.platform, profile.version)].sort(compareRecordIds);
}
