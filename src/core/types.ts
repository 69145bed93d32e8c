/**
 * Core type definitions for posture-score
 */

export type SeverityClass = 'critical' | 'high' | 'medium' | 'low';

export type ModifierName = 'exploited-in-wild' | 'patch-available' | 'aged';

export type ScoreLabel = 'Excellent' | 'Good' | 'Fair' | 'Poor' | 'Critical';

export type VersionMatcher =
  | { kind: 'exact'; version: string }
  | { kind: 'list'; versions: string[] }
  | { kind: 'range'; min: string; max: string }; // inclusive bounds

export interface VulnerabilityRecord {
  id: string;
  title: string;
  cvssScore?: number;        // 0.0 - 10.0
  severity?: SeverityClass;  // declared by the curator, checked against cvssScore
  platforms: string[];
  versions: VersionMatcher[];
  tags: string[];
  fixedIn?: string;
  published?: string;        // ISO date
  references: string[];
  classification?: string;   // e.g. CWE-79
  description?: string;
  workaround?: string;
  advisoryUrl?: string;
  source: string;
  defects?: string[];        // data problems found while loading; excludes the record from scoring
  warnings?: string[];       // data problems that leave the record scorable
}

/**
 * Fields an external authority may contribute to a record
 */
export interface EnrichmentFragment {
  numericScore?: number;
  references?: string[];
  classification?: string;
}

export type EnrichmentFetcher = (
  id: string,
  signal: AbortSignal
) => Promise<EnrichmentFragment | null>;

export interface Profile {
  name: string;
  platform?: string | null;
  version?: string | null;
}

export interface AppliedModifier {
  name: ModifierName;
  factor: number;
}

export interface ModifierResult {
  value: number;
  applied: AppliedModifier[];
}

export interface CveScoreBreakdown {
  cveId: string;
  cvssScore: number | null;
  severity: SeverityClass | 'unknown';
  basePenalty: number;
  modifiersApplied: ModifierName[];
  modifierValue: number;
  finalPenalty: number;
}

export interface ProfileSecurityScore {
  profileName: string;
  platform: string | null;
  version: string | null;
  score: number | null;
  label: ScoreLabel | null;
  cveCount: number;
  cveBreakdown: CveScoreBreakdown[];
  totalBasePenalty: number;
  totalFinalPenalty: number;
  notes: string[];
}

export interface SecurityScoreSummary {
  excellent: number;
  good: number;
  fair: number;
  poor: number;
  critical: number;
  unknown: number;
}

export interface SecurityScoreReport {
  timestamp: string;
  profilesChecked: number;
  averageScore: number | null;
  lowestScore: number | null;
  highestScore: number | null;
  summary: SecurityScoreSummary;
  results: ProfileSecurityScore[];
  diagnostics: string[];
}

export type VulnerabilityStatus = 'critical' | 'high' | 'medium' | 'low' | 'clean' | 'unknown';

export interface ProfileVulnerabilityResult {
  profileName: string;
  platform: string | null;
  version: string | null;
  status: VulnerabilityStatus;
  cveCount: number;
  maxCvss: number | null;
  cves: string[];
}

export interface ProfileVulnerabilityReport {
  timestamp: string;
  profilesChecked: number;
  summary: Record<VulnerabilityStatus, number>;
  results: ProfileVulnerabilityResult[];
}

export interface VersionAnalysis {
  platform: string;
  version: string;
  matched: VulnerabilityRecord[];
  severities: Record<SeverityClass, number>;
  recommendedUpgrade: string | null;
  recommendation: string | null;
  timestamp: string;
}
