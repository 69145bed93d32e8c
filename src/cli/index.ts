#!/usr/bin/env node

/**
 * posture-score CLI
 * Security posture scores for device profiles based on matched CVEs
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadVulnerabilityStore } from '../core/store.js';
import { loadProfiles } from '../core/profiles.js';
import { scoreProfiles } from '../core/scorer.js';
import { analyzeVersion, checkProfiles } from '../core/analysis.js';
import { EnrichmentCache } from '../core/enrichment-cache.js';
import { createNvdFetcher } from '../core/providers/nvd.js';
import { resolveConfig } from '../core/config.js';
import { errorMessage, isInvalidInputError } from '../core/errors.js';
import { formatScoreReport, formatStatusReport, formatVersionAnalysis } from '../core/formatters/text.js';
import type { PostureConfig } from '../core/config.js';
import type { SecurityScoreReport } from '../core/types.js';

const program = new Command();

// ANSI color codes
const colors = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  reset: '\x1b[0m',
  bold: '\x1b[1m',
};

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function fail(error: unknown): never {
  const prefix = isInvalidInputError(error) ? 'Invalid input' : 'Error';
  console.error(`${colors.red}✗${colors.reset} ${prefix}: ${errorMessage(error)}`);
  process.exit(2);
}

function requireDirectory(path: string, label: string): void {
  if (!existsSync(path)) {
    console.log(`${colors.red}✗${colors.reset} ${label} directory not found: ${path}`);
    process.exit(2);
  }
}

function printSummaryLine(report: SecurityScoreReport, failUnder: number | undefined): boolean {
  const below = failUnder === undefined
    ? []
    : report.results.filter(r => r.score !== null && r.score < failUnder);

  if (failUnder !== undefined && below.length > 0) {
    console.log(`${colors.red}${colors.bold}${below.length} profile(s) below ${failUnder}${colors.reset}: ${below.map(r => r.profileName).join(', ')}`);
    return false;
  }

  if (report.averageScore !== null) {
    console.log(`${colors.green}${colors.bold}Average score ${report.averageScore.toFixed(1)}${colors.reset}`);
  } else {
    console.log(`${colors.yellow}No profile could be scored (missing platform/version).${colors.reset}`);
  }
  return true;
}

function buildEnrichment(config: PostureConfig, enabled: boolean) {
  if (!enabled) {
    return {};
  }
  return {
    fetcher: createNvdFetcher({ apiKey: config.nvdApiKey }),
    cache: new EnrichmentCache({ ttlMs: config.cacheTtlMs, timeoutMs: config.enrichTimeoutMs }),
  };
}

program
  .name('posture-score')
  .description('Security posture scores (0-100) for device profiles based on matched CVEs')
  .version('0.4.0');

program
  .command('mcp-server')
  .description('Start the MCP (Model Context Protocol) server for AI assistant integration')
  .action(async () => {
    const { startServer } = await import('../mcp/server.js');
    startServer();
  });

program
  .command('match')
  .description('List the CVEs that affect a platform/version pair')
  .argument('<platform>', 'Device platform (e.g. "ISR4451-X")')
  .argument('<version>', 'Software version (e.g. 17.9.3)')
  .option('--data-dir <dir>', 'Directory with vulnerability records (JSON/YAML)')
  .option('--json', 'Output results as JSON')
  .option('--debug', 'Enable debug output')
  .action((platform: string, version: string, options: {
    dataDir?: string;
    json?: boolean;
    debug?: boolean;
  }) => {
    const config = resolveConfig(process.env, { dataDir: options.dataDir ? resolve(options.dataDir) : undefined });
    requireDirectory(config.dataDir, 'Vulnerability data');

    try {
      const store = loadVulnerabilityStore(config.dataDir, { debug: options.debug });
      const analysis = analyzeVersion(store, platform, version);

      if (options.json) {
        console.log(JSON.stringify(analysis, null, 2));
      } else {
        console.log(formatVersionAnalysis(analysis));
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('status')
  .description('Show the vulnerability status (highest CVSS) of every profile')
  .argument('[profiles]', 'Directory with device profiles (JSON/YAML)')
  .option('--data-dir <dir>', 'Directory with vulnerability records (JSON/YAML)')
  .option('--json', 'Output results as JSON')
  .option('--debug', 'Enable debug output')
  .action((profilesDir: string | undefined, options: {
    dataDir?: string;
    json?: boolean;
    debug?: boolean;
  }) => {
    const config = resolveConfig(process.env, {
      dataDir: options.dataDir ? resolve(options.dataDir) : undefined,
      profilesDir: profilesDir ? resolve(profilesDir) : undefined,
    });
    requireDirectory(config.dataDir, 'Vulnerability data');
    requireDirectory(config.profilesDir, 'Profiles');

    try {
      const store = loadVulnerabilityStore(config.dataDir, { debug: options.debug });
      const report = checkProfiles(loadProfiles(config.profilesDir), store);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(formatStatusReport(report));
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('score', { isDefault: true })
  .description('Calculate security scores (0-100) for every profile')
  .argument('[profiles]', 'Directory with device profiles (JSON/YAML)')
  .option('--data-dir <dir>', 'Directory with vulnerability records (JSON/YAML)')
  .option('--enrich', 'Enrich records from the NVD API')
  .option('--refresh', 'Bypass cached enrichment data')
  .option('--timeout <ms>', 'Enrichment request timeout in milliseconds')
  .option('--concurrency <n>', 'Number of profiles scored concurrently')
  .option('--fail-under <score>', 'Exit with code 1 when any profile scores below this value')
  .option('--json', 'Output results as JSON')
  .option('--verbose', 'Show the per-CVE penalty breakdown')
  .option('--debug', 'Enable debug output')
  .action(async (profilesDir: string | undefined, options: {
    dataDir?: string;
    enrich?: boolean;
    refresh?: boolean;
    timeout?: string;
    concurrency?: string;
    failUnder?: string;
    json?: boolean;
    verbose?: boolean;
    debug?: boolean;
  }) => {
    const config = resolveConfig(process.env, {
      dataDir: options.dataDir ? resolve(options.dataDir) : undefined,
      profilesDir: profilesDir ? resolve(profilesDir) : undefined,
      enrichTimeoutMs: parseInteger(options.timeout),
      concurrency: parseInteger(options.concurrency),
    });
    const failUnder = parseInteger(options.failUnder);
    requireDirectory(config.dataDir, 'Vulnerability data');
    requireDirectory(config.profilesDir, 'Profiles');

    if (options.debug) {
      console.log(`Data: ${config.dataDir}`);
      console.log(`Profiles: ${config.profilesDir}`);
    }

    let report: SecurityScoreReport;
    try {
      const store = loadVulnerabilityStore(config.dataDir, { debug: options.debug });
      const profiles = loadProfiles(config.profilesDir);

      report = await scoreProfiles(profiles, {
        store,
        ...buildEnrichment(config, options.enrich === true || config.enableExternalProviders),
        refresh: options.refresh,
        concurrency: config.concurrency,
        debug: options.debug,
      });
    } catch (error) {
      fail(error);
    }

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(formatScoreReport(report, options.verbose));
    }

    const passed = options.json
      ? failUnder === undefined || report.results.every(r => r.score === null || r.score >= failUnder)
      : printSummaryLine(report, failUnder);

    if (!passed) {
      process.exit(1);
    }
  });

program.parseAsync().catch(fail);
