import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'node:fs';
import { loadProfiles, toProfile } from '../../src/core/profiles.js';

const testDir = join(process.cwd(), 'test', 'fixtures', 'profiles-test');

describe('toProfile', () => {
  it('should keep platform and version', () => {
    expect(toProfile('router', { platform: ' ISR4451-X ', version: '17.9.3', location: 'HQ' })).toEqual({
      name: 'router',
      platform: 'ISR4451-X',
      version: '17.9.3',
    });
  });

  it('should turn blank or missing fields into null', () => {
    expect(toProfile('spare', { platform: '', version: '   ' })).toEqual({ name: 'spare', platform: null, version: null });
    expect(toProfile('empty', null)).toEqual({ name: 'empty', platform: null, version: null });
  });

  it('should stringify numeric versions with a warning', () => {
    const logger = vi.fn();
    expect(toProfile('switch', { platform: 'Catalyst 9300', version: 17.9 }, logger).version).toBe('17.9');
    expect(logger).toHaveBeenCalledWith(
      '[posture-score] Profile switch: version read as the number 17.9; quote it ("17.10", not 17.10) to keep the exact release'
    );
  });

  it('should not warn about quoted versions', () => {
    const logger = vi.fn();
    toProfile('router', { platform: 'ISR4451-X', version: '17.10' }, logger);
    expect(logger).not.toHaveBeenCalled();
  });
});

describe('loadProfiles', () => {
  beforeEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  it('should load JSON and YAML profiles sorted by name', () => {
    writeFileSync(join(testDir, 'switch.yaml'), 'platform: Catalyst 9300\nversion: 17.6.1\n');
    writeFileSync(join(testDir, 'router.json'), JSON.stringify({ platform: 'ISR4451-X', version: '17.9.3' }));
    writeFileSync(join(testDir, 'notes.txt'), 'ignored');

    expect(loadProfiles(testDir)).toEqual([
      { name: 'router', platform: 'ISR4451-X', version: '17.9.3' },
      { name: 'switch', platform: 'Catalyst 9300', version: '17.6.1' },
    ]);
  });

  it('should warn when an unquoted YAML version loses its trailing zero', () => {
    writeFileSync(join(testDir, 'edge.yaml'), 'platform: ISR4451-X\nversion: 17.10\n');

    const logger = vi.fn();
    const profiles = loadProfiles(testDir, { logger });

    expect(profiles).toEqual([{ name: 'edge', platform: 'ISR4451-X', version: '17.1' }]);
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith(
      '[posture-score] Profile edge: version read as the number 17.1; quote it ("17.10", not 17.10) to keep the exact release'
    );
  });

  it('should skip unreadable profiles with a warning', () => {
    writeFileSync(join(testDir, 'broken.json'), '{');
    writeFileSync(join(testDir, 'router.json'), JSON.stringify({ platform: 'ISR4451-X', version: '17.9.3' }));

    const logger = vi.fn();
    const profiles = loadProfiles(testDir, { logger });

    expect(profiles.map(p => p.name)).toEqual(['router']);
    expect(logger).toHaveBeenCalledTimes(1);
  });

  it('should return no profiles for a missing directory', () => {
    const logger = vi.fn();
    expect(loadProfiles(join(testDir, 'missing'), { logger })).toEqual([]);
    expect(logger).toHaveBeenCalledWith(`[posture-score] Profiles directory not found: ${join(testDir, 'missing')}`);
  });
});
