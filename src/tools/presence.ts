import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { HubConfig } from '../config.js';
import {
  appendSessionLog,
  countUnread,
  deleteInstance,
  getInstance,
  listActiveInstances,
  listRecentActivity,
  listRecentMessages,
  runCleanup,
  touchInstance,
  upsertInstance,
} from '../db.js';
import { clearIdentity, saveIdentity } from '../identity.js';
import {
  BROADCAST_TARGET,
  INSTANCE_STATUSES,
  SESSION_ACTIONS,
  type ActiveInstance,
  type Identity,
  type Instance,
  type Message,
  type SessionLogEntry,
} from '../types.js';
import { failure, parseInput, type Failure } from '../utils.js';

const RECENT_MESSAGES_WINDOW_MS = 24 * 60 * 60 * 1000;
const RECENT_MESSAGES_LIMIT = 20;
const RECENT_ACTIVITY_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;
const RECENT_ACTIVITY_LIMIT = 10;
const INSTANCE_ID_LENGTH = 12;

const RegisterSchema = z.object({
  project: z.string().trim().min(1, 'project is required'),
  working_dir: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

const HeartbeatSchema = z.object({
  task: z.string().min(1).optional(),
  status: z.enum(INSTANCE_STATUSES).optional(),
});

const LogSchema = z.object({
  action: z.enum(SESSION_ACTIONS),
  summary: z.string().trim().min(1, 'summary is required'),
  files: z.array(z.string()).optional(),
});

export function generateInstanceId(): string {
  return randomUUID().slice(0, INSTANCE_ID_LENGTH);
}

export function handleRegister(config: HubConfig, args: {
  project: string;
  working_dir?: string;
  model?: string;
}): Failure | {
  success: true;
  instance: Instance;
  others: ActiveInstance[];
  unread_count: number;
} {
  const input = parseInput(RegisterSchema, args);
  if (!input.ok) return input.failure;

  const now = Date.now();
  const identity: Identity = { instance_id: generateInstanceId(), project: input.data.project };
  const instance = upsertInstance({
    instance_id: identity.instance_id,
    project: identity.project,
    working_dir: input.data.working_dir ?? process.cwd(),
    model: input.data.model ?? 'unknown',
  }, now);
  saveIdentity(config.identityFile, identity);
  appendSessionLog({
    instance_id: identity.instance_id,
    project: identity.project,
    action: 'started',
    summary: `Registered (model=${instance.model ?? 'unknown'})`,
  }, now);

  return {
    success: true,
    instance,
    others: listActiveInstances(now, config.activeWindowMs, { exclude: identity.instance_id }),
    unread_count: countUnread(identity, BROADCAST_TARGET, now),
  };
}

export function handleHeartbeat(identity: Identity, args: {
  task?: string;
  status?: string;
}): Failure | { success: true; instance: Instance } {
  const input = parseInput(HeartbeatSchema, args);
  if (!input.ok) return input.failure;

  const touched = touchInstance(identity.instance_id, {
    current_task: input.data.task,
    status: input.data.status,
  });
  const instance = touched ? getInstance(identity.instance_id) : null;
  if (!instance) {
    return failure('INSTANCE_NOT_FOUND', `Instance ${identity.instance_id} is no longer registered. Run 'agentdesk register' again.`);
  }
  return { success: true, instance };
}

export function handleStatus(config: HubConfig): {
  success: true;
  instances: ActiveInstance[];
  messages: Message[];
  activity: SessionLogEntry[];
} {
  const now = Date.now();
  return {
    success: true,
    instances: listActiveInstances(now, config.activeWindowMs),
    messages: listRecentMessages(now - RECENT_MESSAGES_WINDOW_MS, RECENT_MESSAGES_LIMIT),
    activity: listRecentActivity(now - RECENT_ACTIVITY_WINDOW_MS, { limit: RECENT_ACTIVITY_LIMIT }),
  };
}

export function handleLog(identity: Identity, args: {
  action: string;
  summary: string;
  files?: string[];
}): Failure | { success: true; entry: SessionLogEntry } {
  const input = parseInput(LogSchema, args);
  if (!input.ok) return input.failure;

  const entry = appendSessionLog({
    instance_id: identity.instance_id,
    project: identity.project,
    action: input.data.action,
    summary: input.data.summary,
    files_modified: input.data.files,
  });
  return { success: true, entry };
}

export function handleDeregister(config: HubConfig, identity: Identity): {
  success: true;
  instance_id: string;
  removed: boolean;
} {
  appendSessionLog({
    instance_id: identity.instance_id,
    project: identity.project,
    action: 'shutdown',
    summary: 'Session ended',
  });
  const removed = deleteInstance(identity.instance_id);
  clearIdentity(config.identityFile);
  return { success: true, instance_id: identity.instance_id, removed };
}

export function handleCleanup(config: HubConfig) {
  const summary = runCleanup(Date.now(), {
    staleAfterMs: config.staleAfterMs,
    logRetentionMs: config.logRetentionMs,
  });
  return { success: true as const, ...summary };
}
