/**
 * Penalty aggregation - turns matched records into a profile score
 *
 * Algorithm:
 * 1. Base penalty per record from its severity class (critical 25, high 15, medium 8, low 3)
 * 2. Final penalty = base penalty x modifier value
 * 3. Score = max(0, roundHalfUp(100 - sum of final penalties))
 * 4. Label from score bands: Excellent >= 90, Good >= 70, Fair >= 50, Poor >= 25, else Critical
 */

import { InvalidInputError } from './errors.js';
import { isSeverityClass, resolveSeverity } from './severity.js';
import { computeModifier, MODIFIER_RULES } from './modifiers.js';
import type { ModifierRule } from './modifiers.js';
import type {
  CveScoreBreakdown,
  Profile,
  ProfileSecurityScore,
  ScoreLabel,
  SeverityClass,
  VulnerabilityRecord,
} from './types.js';

export const SEVERITY_PENALTIES: Record<SeverityClass, number> = {
  critical: 25,
  high: 15,
  medium: 8,
  low: 3,
};

export const MAX_SCORE = 100;

export const SCORE_THRESHOLDS: ReadonlyArray<[ScoreLabel, number]> = [
  ['Excellent', 90],
  ['Good', 70],
  ['Fair', 50],
  ['Poor', 25],
  ['Critical', 0],
];

// Indicator colors for presentation layers
export const LABEL_COLORS: Record<ScoreLabel | 'Unknown', string> = {
  Excellent: '#22c55e',
  Good: '#84cc16',
  Fair: '#eab308',
  Poor: '#f97316',
  Critical: '#ef4444',
  Unknown: '#9ca3af',
};

/**
 * Round half away from zero for non-negative values (0.5 -> 1, 19.5 -> 20)
 */
export function roundHalfUp(value: number, digits = 0): number {
  const factor = 10 ** digits;
  return Math.floor(value * factor + 0.5) / factor;
}

export function basePenalty(severity: string): number {
  if (!isSeverityClass(severity)) {
    throw new InvalidInputError(`Unknown severity class "${severity}"`);
  }
  return SEVERITY_PENALTIES[severity];
}

export function scoreLabel(score: number | null): ScoreLabel | null {
  if (score === null) {
    return null;
  }
  for (const [label, threshold] of SCORE_THRESHOLDS) {
    if (score >= threshold) {
      return label;
    }
  }
  return 'Critical';
}

export function labelColor(label: ScoreLabel | null): string {
  return LABEL_COLORS[label ?? 'Unknown'];
}

export interface BreakdownOptions {
  now: Date;
  rules?: readonly ModifierRule[];
}

/**
 * Penalty breakdown for one record. Records that cannot be scored come back
 * with severity "unknown", zero penalty and a note explaining why; scorable
 * records with data warnings keep their penalty and carry the warnings as a note.
 */
export function breakdownRecord(
  record: VulnerabilityRecord,
  options: BreakdownOptions
): { breakdown: CveScoreBreakdown; note?: string } {
  const { now, rules = MODIFIER_RULES } = options;
  const modifier = computeModifier(record, now, rules);
  const resolution = resolveSeverity(record);

  const severity = resolution.scorable ? resolution.severity : 'unknown';
  const base = resolution.scorable ? basePenalty(resolution.severity) : 0;

  const breakdown: CveScoreBreakdown = {
    cveId: record.id,
    cvssScore: record.cvssScore ?? null,
    severity,
    basePenalty: base,
    modifiersApplied: modifier.applied.map(m => m.name),
    modifierValue: roundHalfUp(modifier.value, 2),
    finalPenalty: roundHalfUp(base * modifier.value, 2),
  };

  if (!resolution.scorable) {
    return { breakdown, note: resolution.reason };
  }
  return record.warnings
    ? { breakdown, note: `${record.id}: ${record.warnings.join('; ')}` }
    : { breakdown };
}

export function unknownProfileScore(profile: Profile, notes: string[] = []): ProfileSecurityScore {
  return {
    profileName: profile.name,
    platform: profile.platform ?? null,
    version: profile.version ?? null,
    score: null,
    label: null,
    cveCount: 0,
    cveBreakdown: [],
    totalBasePenalty: 0,
    totalFinalPenalty: 0,
    notes,
  };
}

/**
 * Score a profile from its (already matched and merged) records
 */
export function aggregateScore(
  profile: Profile,
  records: VulnerabilityRecord[],
  options: BreakdownOptions
): ProfileSecurityScore {
  const notes: string[] = [];
  const cveBreakdown: CveScoreBreakdown[] = [];

  for (const record of records) {
    const { breakdown, note } = breakdownRecord(record, options);
    cveBreakdown.push(breakdown);
    if (note) {
      notes.push(note);
    }
  }

  const totalBase = cveBreakdown.reduce((sum, b) => sum + b.basePenalty, 0);
  const totalFinal = roundHalfUp(cveBreakdown.reduce((sum, b) => sum + b.finalPenalty, 0), 2);

  const rawScore = MAX_SCORE - totalFinal;
  const score = Math.min(MAX_SCORE, Math.max(0, roundHalfUp(rawScore)));

  return {
    profileName: profile.name,
    platform: profile.platform ?? null,
    version: profile.version ?? null,
    score,
    label: scoreLabel(score),
    cveCount: records.length,
    cveBreakdown,
    totalBasePenalty: roundHalfUp(totalBase, 2),
    totalFinalPenalty: totalFinal,
    notes,
  };
}
