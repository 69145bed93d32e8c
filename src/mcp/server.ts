#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) Server for posture-score
 * Allows AI assistants to score device profiles and look up CVEs for a platform/version
 */

import { createInterface } from 'node:readline';
import { resolve } from 'node:path';
import { loadVulnerabilityStore } from '../core/store.js';
import { loadProfiles, toProfile } from '../core/profiles.js';
import { scoreProfiles } from '../core/scorer.js';
import { analyzeVersion } from '../core/analysis.js';
import { EnrichmentCache } from '../core/enrichment-cache.js';
import { createNvdFetcher } from '../core/providers/nvd.js';
import { resolveConfig } from '../core/config.js';
import { errorMessage, isInvalidInputError } from '../core/errors.js';
import { isObject } from '../core/guards.js';
import type { PostureConfig } from '../core/config.js';
import type { Profile } from '../core/types.js';

// MCP Protocol Types
export interface MCPRequest {
  jsonrpc: '2.0';
  id: string | number;
  method: string;
  params?: Record<string, unknown>;
}

export interface MCPResponse {
  jsonrpc: '2.0';
  id: string | number;
  result?: unknown;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

interface MCPToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

// Server info
const SERVER_INFO = {
  name: 'posture-score',
  version: '0.4.0',
  description: 'Security posture scores for device profiles based on matched CVEs',
};

// Available tools
const TOOLS: MCPToolDefinition[] = [
  {
    name: 'score_profiles',
    description: 'Calculate security scores (0-100) for device profiles, given inline or as a directory of profile files',
    inputSchema: {
      type: 'object',
      properties: {
        profiles: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              platform: { type: 'string' },
              version: { type: 'string' },
            },
            required: ['name'],
          },
          description: 'Profiles to score',
        },
        profilesDir: {
          type: 'string',
          description: 'Directory with profile files (used when profiles is not given)',
        },
        dataDir: {
          type: 'string',
          description: 'Directory with vulnerability records',
        },
        refresh: {
          type: 'boolean',
          description: 'Bypass cached enrichment data',
        },
      },
    },
  },
  {
    name: 'analyze_version',
    description: 'List the CVEs affecting a platform/version pair with an upgrade recommendation',
    inputSchema: {
      type: 'object',
      properties: {
        platform: {
          type: 'string',
          description: 'Device platform (e.g. "ISR4451-X")',
        },
        version: {
          type: 'string',
          description: 'Software version (e.g. 17.9.3)',
        },
        dataDir: {
          type: 'string',
          description: 'Directory with vulnerability records',
        },
      },
      required: ['platform', 'version'],
    },
  },
];

export interface ServerOptions {
  config?: PostureConfig;
  // Shared across calls so enrichment stays cached for the server's lifetime
  cache?: EnrichmentCache;
}

class InvalidParamsError extends Error {}

function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function parseProfileArgs(value: unknown): Profile[] {
  if (!Array.isArray(value)) {
    throw new InvalidParamsError('profiles must be an array');
  }

  return value.map((item, index) => {
    if (!isObject(item) || typeof item.name !== 'string' || item.name.length === 0) {
      throw new InvalidParamsError(`profiles[${index}] needs a name`);
    }
    return toProfile(item.name, item);
  });
}

function textResult(id: string | number, value: unknown): MCPResponse {
  return {
    jsonrpc: '2.0',
    id,
    result: {
      content: [
        {
          type: 'text',
          text: JSON.stringify(value, null, 2),
        },
      ],
    },
  };
}

function errorResponse(id: string | number, code: number, message: string): MCPResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: { code, message },
  };
}

async function callTool(
  id: string | number,
  toolName: unknown,
  args: Record<string, unknown>,
  options: ServerOptions
): Promise<MCPResponse> {
  const config = options.config ?? resolveConfig();
  const dataArg = stringArg(args, 'dataDir');
  const dataDir = dataArg ? resolve(dataArg) : config.dataDir;

  if (toolName === 'analyze_version') {
    const platform = stringArg(args, 'platform');
    const version = stringArg(args, 'version');

    if (!platform || !version) {
      return errorResponse(id, -32602, 'Invalid params: platform and version are required');
    }

    const store = loadVulnerabilityStore(dataDir);
    return textResult(id, analyzeVersion(store, platform, version));
  }

  if (toolName === 'score_profiles') {
    const dirArg = stringArg(args, 'profilesDir');
    const profiles = args.profiles !== undefined
      ? parseProfileArgs(args.profiles)
      : loadProfiles(dirArg ? resolve(dirArg) : config.profilesDir);

    const store = loadVulnerabilityStore(dataDir);
    const enrichment = config.enableExternalProviders
      ? {
          fetcher: createNvdFetcher({ apiKey: config.nvdApiKey }),
          cache: options.cache ?? new EnrichmentCache({ ttlMs: config.cacheTtlMs, timeoutMs: config.enrichTimeoutMs }),
        }
      : {};

    const report = await scoreProfiles(profiles, {
      store,
      ...enrichment,
      refresh: args.refresh === true,
      concurrency: config.concurrency,
    });
    return textResult(id, report);
  }

  return errorResponse(id, -32601, `Unknown tool: ${String(toolName)}`);
}

// Handle MCP requests
export async function handleRequest(request: MCPRequest, options: ServerOptions = {}): Promise<MCPResponse> {
  const { id, method, params } = request;

  try {
    switch (method) {
      case 'initialize':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: '2024-11-05',
            serverInfo: SERVER_INFO,
            capabilities: {
              tools: {},
            },
          },
        };

      case 'tools/list':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            tools: TOOLS,
          },
        };

      case 'tools/call': {
        const rawArgs = params?.arguments;
        return await callTool(id, params?.name, isObject(rawArgs) ? rawArgs : {}, options);
      }

      case 'notifications/initialized':
        // Notification, no response needed
        return { jsonrpc: '2.0', id, result: null };

      default:
        return errorResponse(id, -32601, `Method not found: ${method}`);
    }
  } catch (error) {
    if (error instanceof InvalidParamsError || isInvalidInputError(error)) {
      return errorResponse(id, -32602, `Invalid params: ${errorMessage(error)}`);
    }
    return errorResponse(id, -32603, error instanceof Error ? error.message : 'Internal error');
  }
}

function parseRequest(line: string): MCPRequest | null {
  const parsed: unknown = JSON.parse(line);
  if (!isObject(parsed) || typeof parsed.method !== 'string') {
    return null;
  }

  const id = typeof parsed.id === 'string' || typeof parsed.id === 'number' ? parsed.id : 0;
  return {
    jsonrpc: '2.0',
    id,
    method: parsed.method,
    params: isObject(parsed.params) ? parsed.params : undefined,
  };
}

// Main server loop
function startServer(options: ServerOptions = {}): void {
  const config = options.config ?? resolveConfig();
  const serverOptions: ServerOptions = {
    config,
    cache: options.cache ?? new EnrichmentCache({ ttlMs: config.cacheTtlMs, timeoutMs: config.enrichTimeoutMs }),
  };

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });

  rl.on('line', (line) => {
    let request: MCPRequest | null;
    try {
      request = parseRequest(line);
    } catch {
      request = null;
    }

    if (!request) {
      console.log(JSON.stringify(errorResponse(0, -32700, 'Parse error')));
      return;
    }

    void handleRequest(request, serverOptions).then(response => {
      // Only send response if it's not a notification
      if (response.result !== null || response.error) {
        console.log(JSON.stringify(response));
      }
    });
  });

  rl.on('close', () => {
    process.exit(0);
  });
}

// Export for CLI integration
export { startServer };

// Auto-start if run directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  startServer();
}
