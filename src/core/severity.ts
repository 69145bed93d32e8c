/**
 * Severity classification from numeric CVSS scores
 */

import type { SeverityClass, VulnerabilityRecord } from './types.js';

export const SEVERITY_CLASSES: readonly SeverityClass[] = ['critical', 'high', 'medium', 'low'];

export function isSeverityClass(value: unknown): value is SeverityClass {
  return SEVERITY_CLASSES.some(severity => severity === value);
}

export function isValidCvss(score: unknown): score is number {
  return typeof score === 'number' && Number.isFinite(score) && score >= 0 && score <= 10;
}

/**
 * Map a CVSS score to its class. 0.0 (and anything out of range) has no class.
 */
export function classifyCvss(score: number): SeverityClass | undefined {
  if (!isValidCvss(score)) return undefined;
  if (score >= 9.0) return 'critical';
  if (score >= 7.0) return 'high';
  if (score >= 4.0) return 'medium';
  if (score >= 0.1) return 'low';
  return undefined;
}

export type SeverityResolution =
  | { scorable: true; severity: SeverityClass }
  | { scorable: false; reason: string };

/**
 * Decide whether a record can contribute a penalty, and with which class
 */
export function resolveSeverity(record: VulnerabilityRecord): SeverityResolution {
  if (record.defects && record.defects.length > 0) {
    return { scorable: false, reason: `${record.id}: ${record.defects.join('; ')}` };
  }

  if (record.cvssScore === undefined) {
    return { scorable: false, reason: `${record.id}: no numeric score, informational only` };
  }

  const derived = classifyCvss(record.cvssScore);
  if (!derived) {
    return { scorable: false, reason: `${record.id}: score ${record.cvssScore} has no severity class` };
  }

  if (record.severity && record.severity !== derived) {
    return {
      scorable: false,
      reason: `${record.id}: declared severity "${record.severity}" conflicts with score ${record.cvssScore} (${derived})`,
    };
  }

  return { scorable: true, severity: derived };
}
