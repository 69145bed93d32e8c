import { describe, it, expect, vi } from 'vitest';
import { join } from 'node:path';
import { loadVulnerabilityStore } from '../../src/core/store.js';
import { loadProfiles } from '../../src/core/profiles.js';
import { scoreProfiles } from '../../src/core/scorer.js';
import { checkProfiles } from '../../src/core/analysis.js';
import { formatScoreReport } from '../../src/core/formatters/text.js';

const profilesDir = join(process.cwd(), 'examples', 'profiles');
const dataDir = join(process.cwd(), 'data', 'vulnerabilities');
const now = new Date('2026-01-15T00:00:00Z');

describe('Scoring the example profiles', () => {
  it('should load the bundled dataset and profiles', () => {
    const store = loadVulnerabilityStore(dataDir, { logger: vi.fn() });
    const profiles = loadProfiles(profilesDir);

    expect(store.size).toBe(5);
    expect(profiles.map(p => p.name)).toEqual(['branch-router', 'core-switch', 'lab-router', 'spare-device']);
  });

  it('should score every profile', async () => {
    const store = loadVulnerabilityStore(dataDir, { logger: vi.fn() });
    const logger = vi.fn();

    const report = await scoreProfiles(loadProfiles(profilesDir), { store, now: () => now, logger });

    expect(report.results.map(r => [r.profileName, r.score, r.label, r.cveCount])).toEqual([
      ['branch-router', 42, 'Poor', 3],
      ['core-switch', 47, 'Poor', 2],
      ['lab-router', 100, 'Excellent', 0],
      ['spare-device', null, null, 0],
    ]);
    expect(report.averageScore).toBe(63);
    expect(report.lowestScore).toBe(42);
    expect(report.highestScore).toBe(100);
    expect(report.summary).toEqual({ excellent: 1, good: 0, fair: 0, poor: 2, critical: 0, unknown: 1 });
    expect(report.diagnostics).toEqual(['branch-router: CVE-DEMO-0004: no numeric score, informational only']);
    expect(logger).toHaveBeenCalledWith('[posture-score] branch-router: CVE-DEMO-0004: no numeric score, informational only');
  });

  it('should break down the branch router penalties', async () => {
    const store = loadVulnerabilityStore(dataDir, { logger: vi.fn() });
    const report = await scoreProfiles(loadProfiles(profilesDir), { store, now: () => now, logger: vi.fn() });

    expect(report.results[0].cveBreakdown).toEqual([
      {
        cveId: 'CVE-DEMO-0001',
        cvssScore: 10,
        severity: 'critical',
        basePenalty: 25,
        modifiersApplied: ['exploited-in-wild', 'aged'],
        modifierValue: 1.8,
        finalPenalty: 45,
      },
      {
        cveId: 'CVE-DEMO-0002',
        cvssScore: 7.5,
        severity: 'high',
        basePenalty: 15,
        modifiersApplied: ['patch-available', 'aged'],
        modifierValue: 0.84,
        finalPenalty: 12.6,
      },
      {
        cveId: 'CVE-DEMO-0004',
        cvssScore: null,
        severity: 'unknown',
        basePenalty: 0,
        modifiersApplied: [],
        modifierValue: 1,
        finalPenalty: 0,
      },
    ]);
    expect(report.results[0].totalFinalPenalty).toBe(57.6);
  });

  it('should report vulnerability status per profile', () => {
    const store = loadVulnerabilityStore(dataDir, { logger: vi.fn() });
    const report = checkProfiles(loadProfiles(profilesDir), store, now);

    expect(report.results.map(r => [r.profileName, r.status, r.maxCvss])).toEqual([
      ['branch-router', 'critical', 10],
      ['core-switch', 'critical', 10],
      ['lab-router', 'clean', null],
      ['spare-device', 'unknown', null],
    ]);
  });

  it('should render a text report', async () => {
    const store = loadVulnerabilityStore(dataDir, { logger: vi.fn() });
    const report = await scoreProfiles(loadProfiles(profilesDir), { store, now: () => now, logger: vi.fn() });
    const lines = formatScoreReport(report).split('\n');

    expect(lines).toContain('[ 42] branch-router (Poor)');
    expect(lines).toContain('[100] lab-router (Excellent)');
    expect(lines).toContain('[N/A] spare-device (Unknown)');
  });
});
