import fs from 'fs';
import os from 'os';
import path from 'path';
import type { HubConfig } from '../src/config.js';

export const MINUTE_MS = 60 * 1000;

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'agentdesk-test-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Config rooted in `dir`; the database path is only used by CLI tests. */
export function testConfig(dir: string, overrides: Partial<HubConfig> = {}): HubConfig {
  return {
    enabled: true,
    flagFile: path.join(dir, 'enabled'),
    dbPath: path.join(dir, 'agentdesk.db'),
    identityFile: path.join(dir, 'instance.json'),
    activeWindowMs: 30 * MINUTE_MS,
    staleAfterMs: 120 * MINUTE_MS,
    messageTtlMs: 24 * 60 * MINUTE_MS,
    logRetentionMs: 90 * 24 * 60 * MINUTE_MS,
    inboxLimit: 50,
    debug: false,
    ...overrides,
  };
}
