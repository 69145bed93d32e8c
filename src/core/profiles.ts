/**
 * Read-only profile source - device profiles stored as JSON/YAML files
 */

import { existsSync, readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import glob from 'fast-glob';
import yaml from 'js-yaml';
import { isObject } from './guards.js';
import { errorMessage } from './errors.js';
import type { Profile } from './types.js';

export const PROFILE_PATTERNS = ['*.json', '*.yaml', '*.yml'];

export interface LoadProfilesOptions {
  logger?: (message: string) => void;
}

function optionalField(value: unknown): string | null {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  // Unquoted YAML versions such as 17.9 arrive as numbers
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

/**
 * Convert a stored profile document into the fields the scorer needs.
 * The profile name is the file stem.
 */
export function toProfile(name: string, data: unknown, logger: (message: string) => void = console.warn): Profile {
  if (!isObject(data)) {
    return { name, platform: null, version: null };
  }

  if (typeof data.version === 'number') {
    logger(`[posture-score] Profile ${name}: version read as the number ${data.version}; quote it ("17.10", not 17.10) to keep the exact release`);
  }

  return {
    name,
    platform: optionalField(data.platform),
    version: optionalField(data.version),
  };
}

/**
 * Load every profile file in a directory, sorted by name
 */
export function loadProfiles(profilesDir: string, options: LoadProfilesOptions = {}): Profile[] {
  const { logger = console.warn } = options;

  if (!existsSync(profilesDir)) {
    logger(`[posture-score] Profiles directory not found: ${profilesDir}`);
    return [];
  }

  const files = glob.sync(PROFILE_PATTERNS, { cwd: profilesDir, absolute: true, onlyFiles: true });
  const profiles: Profile[] = [];

  for (const file of files) {
    const name = basename(file, extname(file));
    try {
      const content = readFileSync(file, 'utf-8');
      const data: unknown = file.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
      profiles.push(toProfile(name, data, logger));
    } catch (error) {
      logger(`[posture-score] Skipping unreadable profile ${name}: ${errorMessage(error)}`);
    }
  }

  return profiles.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
