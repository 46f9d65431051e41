import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { isLayerEnabled, loadConfig, readFlagFile, writeFlagFile } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { clearIdentity, loadIdentity, saveIdentity } from '../src/identity.js';
import { MINUTE_MS, makeTempDir, removeTempDir } from './helpers.js';

let home: string;

beforeEach(() => { home = makeTempDir(); });
afterEach(() => { removeTempDir(home); });

describe('loadConfig', () => {
  it('uses home-relative defaults and starts disabled', () => {
    const config = loadConfig({}, home);
    expect(config).toEqual({
      enabled: false,
      flagFile: path.join(home, '.agentdesk_enabled'),
      dbPath: path.join(home, '.agentdesk', 'agentdesk.db'),
      identityFile: path.join(home, '.agentdesk_instance'),
      activeWindowMs: 30 * MINUTE_MS,
      staleAfterMs: 120 * MINUTE_MS,
      messageTtlMs: 24 * 60 * MINUTE_MS,
      logRetentionMs: 90 * 24 * 60 * MINUTE_MS,
      inboxLimit: 50,
      debug: false,
    });
  });

  it('is enabled by the environment switch', () => {
    expect(loadConfig({ AGENTDESK_ENABLED: '1' }, home).enabled).toBe(true);
    expect(loadConfig({ AGENTDESK_ENABLED: '0' }, home).enabled).toBe(false);
  });

  it('is enabled by the flag file', () => {
    writeFlagFile(path.join(home, '.agentdesk_enabled'), true);
    expect(loadConfig({}, home).enabled).toBe(true);
  });

  it('reads overrides and ignores blank values', () => {
    const config = loadConfig({
      AGENTDESK_DB: '/data/hub.db',
      AGENTDESK_INBOX_LIMIT: '10',
      AGENTDESK_ACTIVE_WINDOW_MS: '60000',
      AGENTDESK_STALE_AFTER_MS: '  ',
      AGENTDESK_DEBUG: '1',
    }, home);
    expect(config.dbPath).toBe('/data/hub.db');
    expect(config.inboxLimit).toBe(10);
    expect(config.activeWindowMs).toBe(60_000);
    expect(config.staleAfterMs).toBe(120 * MINUTE_MS);
    expect(config.debug).toBe(true);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ AGENTDESK_INBOX_LIMIT: 'lots' }, home)).toThrow(ConfigError);
    expect(() => loadConfig({ AGENTDESK_INBOX_LIMIT: '0' }, home)).toThrow(/AGENTDESK_INBOX_LIMIT/);
  });

  it('rejects a stale threshold below the active window', () => {
    expect(() => loadConfig({
      AGENTDESK_ACTIVE_WINDOW_MS: '600000',
      AGENTDESK_STALE_AFTER_MS: '60000',
    }, home)).toThrow('Invalid configuration: AGENTDESK_STALE_AFTER_MS AGENTDESK_STALE_AFTER_MS must not be smaller than AGENTDESK_ACTIVE_WINDOW_MS');
  });
});

describe('isLayerEnabled', () => {
  it('does not validate the rest of the environment', () => {
    expect(isLayerEnabled({ AGENTDESK_INBOX_LIMIT: 'lots' }, home)).toBe(false);
    expect(isLayerEnabled({ AGENTDESK_ENABLED: '1', AGENTDESK_INBOX_LIMIT: 'lots' }, home)).toBe(true);
  });

  it('reads an unreadable flag file as off', () => {
    const flag = path.join(home, 'flag-dir');
    fs.mkdirSync(flag);
    expect(isLayerEnabled({ AGENTDESK_FLAG_FILE: flag }, home)).toBe(false);
  });
});

describe('flag file', () => {
  it('round-trips and treats anything but 1 as off', () => {
    const file = path.join(home, 'nested', 'flag');
    expect(readFlagFile(file)).toBe(false);
    writeFlagFile(file, true);
    expect(fs.readFileSync(file, 'utf8')).toBe('1');
    expect(readFlagFile(file)).toBe(true);
    writeFlagFile(file, false);
    expect(readFlagFile(file)).toBe(false);
    fs.writeFileSync(file, 'yes');
    expect(readFlagFile(file)).toBe(false);
  });
});

describe('identity store', () => {
  it('saves, loads and clears', () => {
    const file = path.join(home, 'instance');
    expect(loadIdentity(file)).toBeNull();
    saveIdentity(file, { instance_id: 'abc123def456', project: 'web' });
    expect(loadIdentity(file)).toEqual({ instance_id: 'abc123def456', project: 'web' });
    expect(clearIdentity(file)).toBe(true);
    expect(loadIdentity(file)).toBeNull();
    expect(clearIdentity(file)).toBe(false);
  });

  it('reads a malformed file as absent', () => {
    const file = path.join(home, 'instance');
    fs.writeFileSync(file, 'not json');
    expect(loadIdentity(file)).toBeNull();
    fs.writeFileSync(file, JSON.stringify({ instance_id: '' }));
    expect(loadIdentity(file)).toBeNull();
  });
});
