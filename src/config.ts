import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export interface HubConfig {
  enabled: boolean;
  flagFile: string;
  dbPath: string;
  identityFile: string;
  /** Heartbeat age below which an instance counts as active. */
  activeWindowMs: number;
  /** Heartbeat age beyond which cleanup removes an instance. */
  staleAfterMs: number;
  messageTtlMs: number;
  logRetentionMs: number;
  inboxLimit: number;
  debug: boolean;
}

const durationMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  AGENTDESK_ENABLED: z.string().optional(),
  AGENTDESK_FLAG_FILE: z.string().min(1).optional(),
  AGENTDESK_DB: z.string().min(1).optional(),
  AGENTDESK_INSTANCE_FILE: z.string().min(1).optional(),
  AGENTDESK_ACTIVE_WINDOW_MS: durationMs(30 * MINUTE_MS),
  AGENTDESK_STALE_AFTER_MS: durationMs(2 * HOUR_MS),
  AGENTDESK_MESSAGE_TTL_MS: durationMs(DAY_MS),
  AGENTDESK_LOG_RETENTION_MS: durationMs(90 * DAY_MS),
  AGENTDESK_INBOX_LIMIT: z.coerce.number().int().min(1).max(500).default(50),
  AGENTDESK_DEBUG: z.string().optional(),
}).refine((env) => env.AGENTDESK_STALE_AFTER_MS >= env.AGENTDESK_ACTIVE_WINDOW_MS, {
  message: 'AGENTDESK_STALE_AFTER_MS must not be smaller than AGENTDESK_ACTIVE_WINDOW_MS',
  path: ['AGENTDESK_STALE_AFTER_MS'],
});

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith('AGENTDESK_')) continue;
    cleaned[key] = value !== undefined && value.trim() !== '' ? value.trim() : undefined;
  }
  return cleaned;
}

export function readFlagFile(flagFile: string): boolean {
  if (!fs.existsSync(flagFile)) return false;
  return fs.readFileSync(flagFile, 'utf8').trim() === '1';
}

export function writeFlagFile(flagFile: string, enabled: boolean): void {
  fs.mkdirSync(path.dirname(flagFile), { recursive: true });
  fs.writeFileSync(flagFile, enabled ? '1' : '0');
}

function flagFilePath(env: NodeJS.ProcessEnv, homeDir: string): string {
  return env.AGENTDESK_FLAG_FILE?.trim() || path.join(homeDir, '.agentdesk_enabled');
}

// Read before the rest of the environment is validated, so a disabled layer
// stays silent even when other settings are broken. An unreadable flag file
// leaves the layer off.
export function isLayerEnabled(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): boolean {
  if (env.AGENTDESK_ENABLED?.trim() === '1') return true;
  try {
    return readFlagFile(flagFilePath(env, homeDir));
  } catch {
    return false;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): HubConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue.path.join('.') || 'env'} ${issue.message}`);
  }
  const values = parsed.data;

  return {
    enabled: isLayerEnabled(env, homeDir),
    flagFile: flagFilePath(env, homeDir),
    dbPath: values.AGENTDESK_DB ?? path.join(homeDir, '.agentdesk', 'agentdesk.db'),
    identityFile: values.AGENTDESK_INSTANCE_FILE ?? path.join(homeDir, '.agentdesk_instance'),
    activeWindowMs: values.AGENTDESK_ACTIVE_WINDOW_MS,
    staleAfterMs: values.AGENTDESK_STALE_AFTER_MS,
    messageTtlMs: values.AGENTDESK_MESSAGE_TTL_MS,
    logRetentionMs: values.AGENTDESK_LOG_RETENTION_MS,
    inboxLimit: values.AGENTDESK_INBOX_LIMIT,
    debug: values.AGENTDESK_DEBUG === '1',
  };
}
