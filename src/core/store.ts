/**
 * Vulnerability record store and dataset loader
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, dirname, relative } from 'node:path';
import { fileURLToPath } from 'node:url';
import glob from 'fast-glob';
import yaml from 'js-yaml';
import { isSeverityClass, isValidCvss } from './severity.js';
import { platformMatches, versionMatches } from './matcher.js';
import { errorMessage } from './errors.js';
import { isObject } from './guards.js';
import type { EnrichmentFragment, VersionMatcher, VulnerabilityRecord } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Bundled curated dataset (relative to both src/core and dist/core)
export const DEFAULT_DATA_DIR = join(__dirname, '../../data/vulnerabilities');

export const DATASET_PATTERNS = ['**/*.json', '**/*.yaml', '**/*.yml'];

/**
 * In-memory view of the curated dataset, keyed by record id.
 * The store holds local records only; enrichment is merged per lookup with mergeRecord.
 */
export class VulnerabilityStore {
  private readonly records: Map<string, VulnerabilityRecord>;

  constructor(records: VulnerabilityRecord[] = []) {
    this.records = new Map();
    for (const record of records) {
      // Last occurrence wins
      this.records.set(record.id, record);
    }
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * All records whose platform list holds the platform and whose version matchers accept the version
   */
  get(platform: string, version: string): VulnerabilityRecord[] {
    const matched: VulnerabilityRecord[] = [];

    for (const record of this.records.values()) {
      if (!platformMatches(platform, record.platforms)) continue;
      if (!record.versions.some(matcher => versionMatches(matcher, version))) continue;
      matched.push(record);
    }

    return matched;
  }

  getById(id: string): VulnerabilityRecord | undefined {
    return this.records.get(id);
  }

  all(): VulnerabilityRecord[] {
    return [...this.records.values()];
  }
}

/**
 * Combine a curated record with an external fragment.
 * The local id, score, severity and fixed_in always win; gaps are filled from the fragment.
 */
export function mergeRecord(
  local: VulnerabilityRecord,
  external: EnrichmentFragment | null | undefined
): VulnerabilityRecord {
  if (!external) {
    return local;
  }

  const references = [...local.references];
  for (const ref of external.references ?? []) {
    if (!references.includes(ref)) {
      references.push(ref);
    }
  }

  return {
    ...local,
    cvssScore: local.cvssScore ?? external.numericScore,
    classification: local.classification ?? external.classification,
    references,
  };
}

export type ParseResult =
  | { ok: true; record: VulnerabilityRecord }
  | { ok: false; error: string };

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  // js-yaml turns unquoted dates into Date objects
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString();
  }
  return undefined;
}

function stringList(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value)) return [];
  return value
    .map(optionalString)
    .filter((item): item is string => item !== undefined);
}

function parseRange(value: unknown): VersionMatcher | null {
  if (!isObject(value)) return null;

  const min = optionalString(value.min);
  const max = optionalString(value.max);
  if (min && max) {
    return { kind: 'range', min, max };
  }

  const exact = optionalString(value.version);
  if (exact) {
    return { kind: 'exact', version: exact };
  }

  const versions = stringList(value.versions);
  if (versions.length > 0) {
    return { kind: 'list', versions };
  }

  return null;
}

function parseVersionMatchers(raw: Record<string, unknown>): VersionMatcher[] {
  const matchers: VersionMatcher[] = [];

  const exact = optionalString(raw.version);
  if (exact) {
    matchers.push({ kind: 'exact', version: exact });
  }

  const list = stringList(raw.versions);
  if (list.length > 0) {
    matchers.push({ kind: 'list', versions: list });
  }

  const affected = Array.isArray(raw.affected) ? raw.affected : [raw.affected];
  for (const entry of affected) {
    const matcher = parseRange(entry);
    if (matcher) {
      matchers.push(matcher);
    }
  }

  return matchers;
}

/**
 * Validate one raw dataset entry (snake_case, as curated on disk)
 */
export function parseVulnerabilityRecord(raw: unknown, defaultSource = 'local-json'): ParseResult {
  if (!isObject(raw)) {
    return { ok: false, error: 'entry is not an object' };
  }

  const id = optionalString(raw.cve_id) ?? optionalString(raw.id);
  if (!id) {
    return { ok: false, error: 'missing cve_id' };
  }

  const platforms = stringList(raw.platforms ?? raw.platform);
  if (platforms.length === 0) {
    return { ok: false, error: `${id}: no platforms` };
  }

  const versions = parseVersionMatchers(raw);
  if (versions.length === 0) {
    return { ok: false, error: `${id}: no version matcher (version, versions or affected)` };
  }

  const defects: string[] = [];

  let cvssScore: number | undefined;
  if (raw.cvss_score !== undefined && raw.cvss_score !== null) {
    if (isValidCvss(raw.cvss_score)) {
      cvssScore = raw.cvss_score;
    } else {
      defects.push(`malformed cvss_score ${JSON.stringify(raw.cvss_score)}`);
    }
  }

  let severity: VulnerabilityRecord['severity'];
  const declared = optionalString(raw.severity)?.toLowerCase();
  if (declared !== undefined) {
    if (isSeverityClass(declared)) {
      severity = declared;
    } else {
      defects.push(`unknown severity "${declared}"`);
    }
  }

  const warnings: string[] = [];

  const published = optionalString(raw.published);
  if (published && Number.isNaN(Date.parse(published))) {
    warnings.push(`unparseable published date "${published}", age not applied`);
  }

  const record: VulnerabilityRecord = {
    id,
    title: optionalString(raw.title) ?? id,
    cvssScore,
    severity,
    platforms,
    versions,
    tags: [...new Set(stringList(raw.tags))],
    fixedIn: optionalString(raw.fixed_in),
    published,
    references: [...new Set(stringList(raw.references))],
    classification: optionalString(raw.classification) ?? optionalString(raw.cwe),
    description: optionalString(raw.description),
    workaround: optionalString(raw.workaround),
    advisoryUrl: optionalString(raw.advisory_url),
    source: optionalString(raw.source) ?? defaultSource,
  };

  if (defects.length > 0) {
    record.defects = defects;
  }
  if (warnings.length > 0) {
    record.warnings = warnings;
  }

  return { ok: true, record };
}

export interface LoadStoreOptions {
  debug?: boolean;
  logger?: (message: string) => void;
}

function parseDatasetFile(path: string): unknown {
  const content = readFileSync(path, 'utf-8');
  return path.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
}

/**
 * Load every JSON/YAML file under a directory into a store.
 * A file may hold a single record or an array of records; invalid entries are skipped.
 */
export function loadVulnerabilityStore(
  dataDir: string = DEFAULT_DATA_DIR,
  options: LoadStoreOptions = {}
): VulnerabilityStore {
  const { debug = false, logger = console.warn } = options;

  if (!existsSync(dataDir)) {
    logger(`[posture-score] Vulnerability data directory not found: ${dataDir}`);
    return new VulnerabilityStore();
  }

  const files = glob
    .sync(DATASET_PATTERNS, { cwd: dataDir, absolute: true, onlyFiles: true })
    .sort();

  const records: VulnerabilityRecord[] = [];

  for (const file of files) {
    const label = relative(dataDir, file);
    let parsed: unknown;

    try {
      parsed = parseDatasetFile(file);
    } catch (error) {
      logger(`[posture-score] Skipping unreadable dataset file ${label}: ${errorMessage(error)}`);
      continue;
    }

    const entries = Array.isArray(parsed) ? parsed : [parsed];
    for (const entry of entries) {
      const result = parseVulnerabilityRecord(entry);
      if (!result.ok) {
        logger(`[posture-score] Skipping invalid record in ${label}: ${result.error}`);
        continue;
      }
      if (result.record.defects) {
        logger(`[posture-score] ${result.record.id} kept for display only: ${result.record.defects.join('; ')}`);
      }
      if (result.record.warnings) {
        logger(`[posture-score] ${result.record.id}: ${result.record.warnings.join('; ')}`);
      }
      records.push(result.record);
    }
  }

  if (debug) {
    console.log(`Loaded ${records.length} vulnerability record(s) from ${files.length} file(s) in ${dataDir}`);
  }

  return new VulnerabilityStore(records);
}
