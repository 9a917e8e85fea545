/**
 * @fileoverview Tests for YAML configuration loading and validation.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigError,
  clearConfigCache,
  loadRefereeConfig,
  parseRefereeConfig,
} from '../src/config/refereeConfig.js';

const MINIMAL = {
  referee: { refereeId: 'REF001' },
  league: { leagueManagerEmail: 'league-manager@example.com' },
};

describe('parseRefereeConfig', () => {
  it('should apply defaults', () => {
    expect(parseRefereeConfig(MINIMAL)).toEqual({
      referee: {
        refereeId: 'REF001',
        refereeEmail: '',
        groupId: '',
        displayName: 'Q21 Referee',
      },
      league: {
        leagueId: '',
        seasonId: '',
        leagueManagerEmail: 'league-manager@example.com',
      },
      timing: { playerResponseTimeoutSeconds: 40, pollIntervalSeconds: 5 },
      callbacks: { mode: 'strict' },
      status: { enabled: false, port: 8080 },
      demo: {},
    });
  });

  it('should list every invalid key', () => {
    expect(() =>
      parseRefereeConfig({
        referee: { refereeId: '' },
        league: {},
        callbacks: { mode: 'lenient' },
      })
    ).toThrow(ConfigError);
    expect(() => parseRefereeConfig({ referee: { refereeId: '' }, league: {} })).toThrow(
      'Invalid referee configuration: referee.refereeId: String must contain at least 1 character(s); league.leagueManagerEmail: Required'
    );
  });

  it('should reject a non-positive timeout', () => {
    expect(() =>
      parseRefereeConfig({ ...MINIMAL, timing: { playerResponseTimeoutSeconds: 0 } })
    ).toThrow('timing.playerResponseTimeoutSeconds: Number must be greater than 0');
  });
});

describe('loadRefereeConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'referee-config-'));
    clearConfigCache();
  });

  afterEach(() => {
    clearConfigCache();
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(yaml: string): string {
    const path = join(dir, 'referee.yaml');
    writeFileSync(path, yaml);
    vi.stubEnv('CONFIG_PATH', path);
    return path;
  }

  it('should load the file named by CONFIG_PATH', () => {
    writeConfig(
      [
        'referee:',
        '  refereeId: REF009',
        '  groupId: GROUP_Z',
        'league:',
        '  leagueManagerEmail: lm@example.com',
        'callbacks:',
        '  mode: safe',
        'timing:',
        '  pollIntervalSeconds: 2',
      ].join('\n')
    );

    const config = loadRefereeConfig();

    expect(config.referee.refereeId).toBe('REF009');
    expect(config.referee.groupId).toBe('GROUP_Z');
    expect(config.callbacks.mode).toBe('safe');
    expect(config.timing).toEqual({ playerResponseTimeoutSeconds: 40, pollIntervalSeconds: 2 });
  });

  it('should cache the first load until cleared', () => {
    const path = writeConfig(
      'referee:\n  refereeId: REF001\nleague:\n  leagueManagerEmail: a@b.c\n'
    );
    expect(loadRefereeConfig().referee.refereeId).toBe('REF001');

    writeFileSync(path, 'referee:\n  refereeId: REF002\nleague:\n  leagueManagerEmail: a@b.c\n');
    expect(loadRefereeConfig().referee.refereeId).toBe('REF001');

    clearConfigCache();
    expect(loadRefereeConfig().referee.refereeId).toBe('REF002');
  });

  it('should reject a file without a referee id', () => {
    writeConfig('referee:\n  groupId: GROUP_A\nleague:\n  leagueManagerEmail: a@b.c\n');

    expect(() => loadRefereeConfig()).toThrow('referee.refereeId: Required');
  });
});
