/**
 * NVD (National Vulnerability Database) enrichment provider
 *
 * Queries the NVD CVE API 2.0 for a single CVE and extracts the base score,
 * references and weakness classification.
 *
 * API: https://services.nvd.nist.gov/rest/json/cves/2.0
 */

import { isObject } from '../guards.js';
import type { EnrichmentFetcher, EnrichmentFragment } from '../types.js';

export const NVD_API_BASE = 'https://services.nvd.nist.gov/rest/json/cves/2.0';

// Preferred metric first
const METRIC_KEYS = ['cvssMetricV31', 'cvssMetricV30', 'cvssMetricV2'];

export interface NvdFetcherOptions {
  baseUrl?: string;
  apiKey?: string;
  userAgent?: string;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function extractBaseScore(metrics: unknown): number | undefined {
  if (!isObject(metrics)) return undefined;

  for (const key of METRIC_KEYS) {
    for (const metric of asArray(metrics[key])) {
      if (!isObject(metric) || !isObject(metric.cvssData)) continue;
      const score = metric.cvssData.baseScore;
      if (typeof score === 'number') {
        return score;
      }
    }
  }

  return undefined;
}

function extractClassification(weaknesses: unknown): string | undefined {
  for (const weakness of asArray(weaknesses)) {
    if (!isObject(weakness)) continue;
    for (const description of asArray(weakness.description)) {
      if (isObject(description) && typeof description.value === 'string' && description.value.startsWith('CWE-')) {
        return description.value;
      }
    }
  }
  return undefined;
}

function extractReferences(references: unknown): string[] {
  const urls: string[] = [];
  for (const reference of asArray(references)) {
    if (isObject(reference) && typeof reference.url === 'string' && !urls.includes(reference.url)) {
      urls.push(reference.url);
    }
  }
  return urls;
}

/**
 * Extract an enrichment fragment for `id` from an NVD API response body.
 * Returns null when the CVE is not in the response.
 */
export function parseNvdResponse(payload: unknown, id: string): EnrichmentFragment | null {
  if (!isObject(payload)) {
    return null;
  }

  for (const item of asArray(payload.vulnerabilities)) {
    if (!isObject(item) || !isObject(item.cve) || item.cve.id !== id) continue;

    const fragment: EnrichmentFragment = {
      references: extractReferences(item.cve.references),
    };

    const numericScore = extractBaseScore(item.cve.metrics);
    if (numericScore !== undefined) {
      fragment.numericScore = numericScore;
    }

    const classification = extractClassification(item.cve.weaknesses);
    if (classification) {
      fragment.classification = classification;
    }

    return fragment;
  }

  return null;
}

/**
 * Build a fetcher for the enrichment cache. Non-success responses throw;
 * the cache turns any failure into local-only data.
 */
export function createNvdFetcher(options: NvdFetcherOptions = {}): EnrichmentFetcher {
  const { baseUrl = NVD_API_BASE, apiKey, userAgent = 'posture-score/0.4 (Security Score)' } = options;

  return async (id: string, signal: AbortSignal): Promise<EnrichmentFragment | null> => {
    const url = `${baseUrl}?cveId=${encodeURIComponent(id)}`;

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': userAgent,
    };
    if (apiKey) {
      headers['apiKey'] = apiKey;
    }

    const response = await fetch(url, { method: 'GET', headers, signal });

    if (response.status === 404) {
      return null;
    }

    if (!response.ok) {
      throw new Error(`NVD API returned ${response.status}`);
    }

    const payload: unknown = await response.json();
    return parseNvdResponse(payload, id);
  };
}
