import { describe, it, expect } from 'vitest';
import {
  analyzeVersion,
  checkProfiles,
  recommendUpgrade,
  statusFromCvss,
  summarizeSeverities,
} from '../../src/core/analysis.js';
import { VulnerabilityStore } from '../../src/core/store.js';
import type { VulnerabilityRecord } from '../../src/core/types.js';

const now = new Date('2026-01-15T00:00:00Z');

function record(id: string, overrides: Partial<VulnerabilityRecord> = {}): VulnerabilityRecord {
  return {
    id,
    title: id,
    platforms: ['ISR4451-X'],
    versions: [{ kind: 'exact', version: '17.9.3' }],
    tags: [],
    references: [],
    source: 'test',
    ...overrides,
  };
}

const records = [
  record('CVE-TEST-0001', { cvssScore: 9.8, fixedIn: '17.9.5' }),
  record('CVE-TEST-0002', { cvssScore: 7.5, fixedIn: '17.12.1' }),
  record('CVE-TEST-0003', { cvssScore: 5.0, fixedIn: '17.6.1' }),
  record('CVE-TEST-0004'),
];
const store = new VulnerabilityStore(records);

describe('summarizeSeverities', () => {
  it('should count scorable records per class', () => {
    expect(summarizeSeverities(records)).toEqual({ critical: 1, high: 1, medium: 1, low: 0 });
  });
});

describe('recommendUpgrade', () => {
  it('should pick the lowest fixed release among critical and high records', () => {
    expect(recommendUpgrade(records)).toBe('17.9.5');
  });

  it('should ignore medium and low records', () => {
    expect(recommendUpgrade([records[2]])).toBeNull();
  });

  it('should order four-part fixed releases by every part', () => {
    expect(recommendUpgrade([
      record('CVE-TEST-0101', { cvssScore: 9.8, fixedIn: '9.16.3.19' }),
      record('CVE-TEST-0102', { cvssScore: 8.1, fixedIn: '9.16.3.4' }),
    ])).toBe('9.16.3.4');
  });
});

describe('analyzeVersion', () => {
  it('should summarize the matched records with a recommendation', () => {
    const analysis = analyzeVersion(store, 'ISR4451-X', '17.9.3', now);

    expect(analysis.matched.map(r => r.id)).toEqual(['CVE-TEST-0001', 'CVE-TEST-0002', 'CVE-TEST-0003', 'CVE-TEST-0004']);
    expect(analysis.recommendedUpgrade).toBe('17.9.5');
    expect(analysis.recommendation).toBe(
      'One or more critical/high issues affect this platform/version. Consider upgrading to at least 17.9.5.'
    );
    expect(analysis.timestamp).toBe('2026-01-15T00:00:00.000Z');
  });

  it('should have no recommendation without matches', () => {
    const analysis = analyzeVersion(store, 'ISR4451-X', '17.12.1', now);

    expect(analysis.matched).toEqual([]);
    expect(analysis.recommendation).toBeNull();
    expect(analysis.severities).toEqual({ critical: 0, high: 0, medium: 0, low: 0 });
  });

  it('should suggest hardening when only lower classes match', () => {
    const mediumOnly = new VulnerabilityStore([records[2]]);
    expect(analyzeVersion(mediumOnly, 'ISR4451-X', '17.9.3', now).recommendation).toBe(
      'Only medium/low issues matched. Review the advisories and keep hardening the device.'
    );
  });
});

describe('checkProfiles', () => {
  it('should report the highest CVSS status per profile', () => {
    const report = checkProfiles([
      { name: 'router', platform: 'ISR4451-X', version: '17.9.3' },
      { name: 'spare' },
      { name: 'lab', platform: 'ISR4451-X', version: '17.12.1' },
    ], store, now);

    expect(report.results).toEqual([
      {
        profileName: 'router',
        platform: 'ISR4451-X',
        version: '17.9.3',
        status: 'critical',
        cveCount: 4,
        maxCvss: 9.8,
        cves: ['CVE-TEST-0001', 'CVE-TEST-0002', 'CVE-TEST-0003', 'CVE-TEST-0004'],
      },
      { profileName: 'spare', platform: null, version: null, status: 'unknown', cveCount: 0, maxCvss: null, cves: [] },
      { profileName: 'lab', platform: 'ISR4451-X', version: '17.12.1', status: 'clean', cveCount: 0, maxCvss: null, cves: [] },
    ]);
    expect(report.summary).toEqual({ critical: 1, high: 0, medium: 0, low: 0, clean: 1, unknown: 1 });
  });
});

describe('statusFromCvss', () => {
  it('should map scores to statuses', () => {
    expect(statusFromCvss(null)).toBe('clean');
    expect(statusFromCvss(0)).toBe('clean');
    expect(statusFromCvss(3.1)).toBe('low');
    expect(statusFromCvss(4.0)).toBe('medium');
    expect(statusFromCvss(7.0)).toBe('high');
    expect(statusFromCvss(9.0)).toBe('critical');
  });
});
