/**
 * Contextual risk modifiers applied to a record's base penalty
 */

import { InvalidInputError } from './errors.js';
import type { ModifierName, ModifierResult, VulnerabilityRecord } from './types.js';

export const MODIFIER_EXPLOITED = 1.5;
export const MODIFIER_PATCHED = 0.7;
export const MODIFIER_AGED = 1.2;
export const AGE_THRESHOLD_DAYS = 365;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ModifierRule {
  name: ModifierName;
  factor: number;
  applies: (record: VulnerabilityRecord, now: Date) => boolean;
}

/**
 * Whole days between publication and now, or null without a usable date
 */
export function ageInDays(published: string | undefined, now: Date): number | null {
  if (!published) {
    return null;
  }

  const publishedAt = Date.parse(published);
  if (Number.isNaN(publishedAt)) {
    return null;
  }

  return Math.floor((now.getTime() - publishedAt) / DAY_MS);
}

// Canonical order; the applied-name list is always reported in this order
export const MODIFIER_RULES: readonly ModifierRule[] = [
  {
    name: 'exploited-in-wild',
    factor: MODIFIER_EXPLOITED,
    applies: record => record.tags.includes('exploited-in-wild'),
  },
  {
    name: 'patch-available',
    factor: MODIFIER_PATCHED,
    applies: record => typeof record.fixedIn === 'string' && record.fixedIn.trim().length > 0,
  },
  {
    name: 'aged',
    factor: MODIFIER_AGED,
    applies: (record, now) => {
      const age = ageInDays(record.published, now);
      return age !== null && age > AGE_THRESHOLD_DAYS;
    },
  },
];

/**
 * Evaluate every rule against the record and multiply the matching factors.
 * No matching rule gives a value of exactly 1.0.
 */
export function computeModifier(
  record: VulnerabilityRecord,
  now: Date,
  rules: readonly ModifierRule[] = MODIFIER_RULES
): ModifierResult {
  for (const rule of rules) {
    if (!Number.isFinite(rule.factor) || rule.factor < 0) {
      throw new InvalidInputError(`Modifier "${rule.name}" has invalid factor ${rule.factor}`);
    }
  }

  const applied = rules
    .filter(rule => rule.applies(record, now))
    .map(rule => ({ name: rule.name, factor: rule.factor }));

  const value = applied.reduce((product, modifier) => product * modifier.factor, 1.0);

  return { value, applied };
}
