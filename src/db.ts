import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DatabaseUnavailableError } from './errors.js';
import type {
  ActiveInstance,
  AgentRole,
  GlobalMemory,
  GlobalMemoryType,
  Instance,
  InstanceStatus,
  MemoryStatus,
  Message,
  MessageType,
  ProjectMemory,
  ProjectMemoryType,
  SessionAction,
  SessionLogEntry,
  Task,
  TaskStatus,
} from './types.js';

type SqlValue = string | number | null;

let db: Database.Database | undefined;
const BUSY_TIMEOUT_MS = 5_000;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error('Database is not open; call initDb() or connectDb() first');
  }
  return db;
}

function applyPragmas(d: Database.Database): void {
  d.pragma('journal_mode = WAL');
  d.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
}

export function initDb(dbPath: string = ':memory:'): Database.Database {
  closeDb();
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const d = new Database(dbPath);
  applyPragmas(d);
  initSchema(d);
  db = d;
  return d;
}

export function connectDb(dbPath: string): Database.Database {
  closeDb();
  let d: Database.Database | undefined;
  try {
    d = new Database(dbPath, { fileMustExist: true });
    applyPragmas(d);
    const schema = d.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'tasks'").get();
    if (!schema) {
      throw new Error('schema is not initialised');
    }
    db = d;
    return d;
  } catch (error) {
    d?.close();
    throw new DatabaseUnavailableError(dbPath, error);
  }
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}

function initSchema(d: Database.Database): void {
  d.exec(`
    CREATE TABLE IF NOT EXISTS instances (
      instance_id TEXT PRIMARY KEY,
      project TEXT NOT NULL,
      working_dir TEXT,
      model TEXT,
      status TEXT NOT NULL DEFAULT 'active'
        CHECK (status IN ('active', 'idle', 'busy', 'shutting_down')),
      current_task TEXT,
      started_at INTEGER NOT NULL,
      last_heartbeat INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      from_instance TEXT NOT NULL,
      from_project TEXT,
      to_target TEXT NOT NULL,
      message_type TEXT NOT NULL DEFAULT 'info'
        CHECK (message_type IN ('info', 'warning', 'blocker', 'request', 'done')),
      subject TEXT NOT NULL,
      body TEXT,
      is_read INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      expires_at INTEGER
    );

    CREATE TABLE IF NOT EXISTS project_memory (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project TEXT NOT NULL,
      memory_type TEXT NOT NULL
        CHECK (memory_type IN ('architecture', 'feature', 'issue', 'fix', 'decision', 'pattern', 'gotcha', 'update')),
      title TEXT NOT NULL,
      content TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'active'
        CHECK (status IN ('active', 'resolved', 'deprecated', 'superseded')),
      tags TEXT NOT NULL DEFAULT '[]',
      related_files TEXT NOT NULL DEFAULT '[]',
      created_by TEXT NOT NULL DEFAULT 'human',
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS global_memory (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      memory_type TEXT NOT NULL
        CHECK (memory_type IN ('infrastructure', 'convention', 'tool', 'preference', 'credential', 'lesson')),
      title TEXT NOT NULL,
      content TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'active'
        CHECK (status IN ('active', 'resolved', 'deprecated', 'superseded')),
      tags TEXT NOT NULL DEFAULT '[]',
      created_by TEXT NOT NULL DEFAULT 'human',
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS session_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      instance_id TEXT NOT NULL,
      project TEXT NOT NULL,
      action TEXT NOT NULL
        CHECK (action IN (
          'started', 'task_started', 'task_completed', 'issue_found',
          'issue_resolved', 'docker_operation', 'file_modified', 'shutdown'
        )),
      summary TEXT NOT NULL,
      files_modified TEXT NOT NULL DEFAULT '[]',
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      description TEXT,
      project TEXT NOT NULL,
      priority INTEGER NOT NULL DEFAULT 0,
      assigned_role TEXT,
      file_scope TEXT NOT NULL DEFAULT '[]',
      depends_on TEXT NOT NULL DEFAULT '[]',
      assigned_instance TEXT,
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'claimed', 'in_progress', 'done', 'failed')),
      result TEXT,
      created_by TEXT NOT NULL DEFAULT 'human',
      created_at INTEGER NOT NULL,
      claimed_at INTEGER,
      completed_at INTEGER
    );

    CREATE TABLE IF NOT EXISTS agent_roles (
      name TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      system_prompt TEXT NOT NULL,
      capabilities TEXT NOT NULL DEFAULT '[]',
      updated_at INTEGER NOT NULL
    );
  `);

  d.exec(`
    CREATE INDEX IF NOT EXISTS idx_instances_last_heartbeat ON instances(last_heartbeat);
    CREATE INDEX IF NOT EXISTS idx_messages_to_target_read ON messages(to_target, is_read);
    CREATE INDEX IF NOT EXISTS idx_messages_created_at ON messages(created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_project_memory_project_type ON project_memory(project, memory_type);
    CREATE INDEX IF NOT EXISTS idx_global_memory_type ON global_memory(memory_type);
    CREATE INDEX IF NOT EXISTS idx_session_log_project_created_at ON session_log(project, created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_session_log_instance_created_at ON session_log(instance_id, created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_tasks_status_priority ON tasks(status, priority DESC, created_at ASC);
    CREATE INDEX IF NOT EXISTS idx_tasks_project_status ON tasks(project, status);
  `);
}

// --- Encoding helpers ---

const StringListSchema = z.array(z.string());
const IdListSchema = z.array(z.number().int());

function encodeList(values: readonly (string | number)[] | undefined): string {
  return JSON.stringify(values ?? []);
}

function decodeStringList(raw: string): string[] {
  try {
    const parsed = StringListSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function decodeIdList(raw: string): number[] {
  try {
    const parsed = IdListSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

// Column names only ever come from the fixed `columns` list, never from the patch keys.
function buildAssignments<C extends string>(
  columns: readonly C[],
  patch: Partial<Record<C, SqlValue>>,
): { fields: string[]; params: SqlValue[] } {
  const fields: string[] = [];
  const params: SqlValue[] = [];
  for (const column of columns) {
    const value = patch[column];
    if (value === undefined) continue;
    fields.push(`${column} = ?`);
    params.push(value);
  }
  return { fields, params };
}

// --- Instances ---

export function upsertInstance(instance: {
  instance_id: string;
  project: string;
  working_dir: string | null;
  model: string | null;
}, now = Date.now()): Instance {
  const d = getDb();
  d.prepare(`
    INSERT INTO instances (instance_id, project, working_dir, model, status, current_task, started_at, last_heartbeat)
    VALUES (?, ?, ?, ?, 'active', NULL, ?, ?)
    ON CONFLICT(instance_id) DO UPDATE SET
      last_heartbeat = excluded.last_heartbeat,
      status = 'active'
  `).run(instance.instance_id, instance.project, instance.working_dir, instance.model, now, now);
  return d.prepare('SELECT * FROM instances WHERE instance_id = ?').get(instance.instance_id) as Instance;
}

export function getInstance(instanceId: string): Instance | null {
  const row = getDb().prepare('SELECT * FROM instances WHERE instance_id = ?').get(instanceId) as Instance | undefined;
  return row || null;
}

export interface InstancePatch {
  status?: InstanceStatus;
  current_task?: string | null;
}

const INSTANCE_PATCH_COLUMNS = ['status', 'current_task'] as const;

export function touchInstance(instanceId: string, patch: InstancePatch = {}, now = Date.now()): boolean {
  const { fields, params } = buildAssignments(INSTANCE_PATCH_COLUMNS, patch);
  fields.unshift('last_heartbeat = ?');
  params.unshift(now);
  const result = getDb()
    .prepare(`UPDATE instances SET ${fields.join(', ')} WHERE instance_id = ?`)
    .run(...params, instanceId);
  return result.changes === 1;
}

export function listActiveInstances(now: number, activeWindowMs: number, options: { exclude?: string } = {}): ActiveInstance[] {
  const cutoff = now - activeWindowMs;
  const rows = getDb().prepare(`
    SELECT *
    FROM instances
    WHERE last_heartbeat > ? AND instance_id != ?
    ORDER BY project ASC, started_at ASC, instance_id ASC
  `).all(cutoff, options.exclude ?? '') as Instance[];
  return rows.map((row) => ({
    ...row,
    seconds_since_heartbeat: Math.max(0, Math.floor((now - row.last_heartbeat) / 1000)),
  }));
}

export function deleteInstance(instanceId: string): boolean {
  return getDb().prepare('DELETE FROM instances WHERE instance_id = ?').run(instanceId).changes === 1;
}

export function cleanupStaleInstances(now: number, staleAfterMs: number): number {
  return getDb().prepare('DELETE FROM instances WHERE last_heartbeat < ?').run(now - staleAfterMs).changes;
}

// --- Messages ---

interface MessageRow extends Omit<Message, 'is_read'> {
  is_read: number;
}

function toMessage(row: MessageRow): Message {
  return { ...row, is_read: row.is_read === 1 };
}

export interface InboxAddress {
  instance_id: string;
  project: string;
}

export function insertMessage(message: {
  from_instance: string;
  from_project: string | null;
  to_target: string;
  message_type: MessageType;
  subject: string;
  body: string | null;
  expires_at: number | null;
}, now = Date.now()): Message {
  const row = getDb().prepare(`
    INSERT INTO messages (from_instance, from_project, to_target, message_type, subject, body, is_read, created_at, expires_at)
    VALUES (?, ?, ?, ?, ?, ?, 0, ?, ?)
    RETURNING *
  `).get(
    message.from_instance,
    message.from_project,
    message.to_target,
    message.message_type,
    message.subject,
    message.body,
    now,
    message.expires_at,
  ) as MessageRow;
  return toMessage(row);
}

export function listInbox(address: InboxAddress, broadcastTarget: string, options: {
  include_read?: boolean;
  limit: number;
  now?: number;
}): Message[] {
  const now = options.now ?? Date.now();
  let query = `
    SELECT *
    FROM messages
    WHERE to_target IN (?, ?, ?)
      AND (expires_at IS NULL OR expires_at > ?)
  `;
  const params: SqlValue[] = [address.instance_id, address.project, broadcastTarget, now];
  if (!options.include_read) {
    query += ' AND is_read = 0';
  }
  query += ' ORDER BY created_at DESC, id DESC LIMIT ?';
  params.push(Math.max(1, Math.floor(options.limit)));
  const rows = getDb().prepare(query).all(...params) as MessageRow[];
  return rows.map(toMessage);
}

export function countUnread(address: InboxAddress, broadcastTarget: string, now = Date.now()): number {
  const row = getDb().prepare(`
    SELECT COUNT(*) AS cnt
    FROM messages
    WHERE to_target IN (?, ?, ?)
      AND is_read = 0
      AND (expires_at IS NULL OR expires_at > ?)
  `).get(address.instance_id, address.project, broadcastTarget, now) as { cnt: number } | undefined;
  return row?.cnt || 0;
}

export function markMessageRead(messageId: number): Message | null {
  const row = getDb()
    .prepare('UPDATE messages SET is_read = 1 WHERE id = ? RETURNING *')
    .get(messageId) as MessageRow | undefined;
  return row ? toMessage(row) : null;
}

export function listRecentMessages(since: number, limit = 20): Message[] {
  const rows = getDb().prepare(`
    SELECT *
    FROM messages
    WHERE created_at > ?
    ORDER BY created_at DESC, id DESC
    LIMIT ?
  `).all(since, limit) as MessageRow[];
  return rows.map(toMessage);
}

export function cleanupExpiredMessages(now = Date.now()): number {
  return getDb().prepare('DELETE FROM messages WHERE expires_at IS NOT NULL AND expires_at <= ?').run(now).changes;
}

// --- Memory ---

interface ProjectMemoryRow extends Omit<ProjectMemory, 'tags' | 'related_files'> {
  tags: string;
  related_files: string;
}

interface GlobalMemoryRow extends Omit<GlobalMemory, 'tags'> {
  tags: string;
}

function toProjectMemory(row: ProjectMemoryRow): ProjectMemory {
  return { ...row, tags: decodeStringList(row.tags), related_files: decodeStringList(row.related_files) };
}

function toGlobalMemory(row: GlobalMemoryRow): GlobalMemory {
  return { ...row, tags: decodeStringList(row.tags) };
}

export function insertProjectMemory(entry: {
  project: string;
  memory_type: ProjectMemoryType;
  title: string;
  content: string;
  tags?: string[];
  related_files?: string[];
  created_by: string;
}, now = Date.now()): ProjectMemory {
  const row = getDb().prepare(`
    INSERT INTO project_memory (project, memory_type, title, content, status, tags, related_files, created_by, created_at, updated_at)
    VALUES (?, ?, ?, ?, 'active', ?, ?, ?, ?, ?)
    RETURNING *
  `).get(
    entry.project,
    entry.memory_type,
    entry.title,
    entry.content,
    encodeList(entry.tags),
    encodeList(entry.related_files),
    entry.created_by,
    now,
    now,
  ) as ProjectMemoryRow;
  return toProjectMemory(row);
}

export function insertGlobalMemory(entry: {
  memory_type: GlobalMemoryType;
  title: string;
  content: string;
  tags?: string[];
  created_by: string;
}, now = Date.now()): GlobalMemory {
  const row = getDb().prepare(`
    INSERT INTO global_memory (memory_type, title, content, status, tags, created_by, created_at, updated_at)
    VALUES (?, ?, ?, 'active', ?, ?, ?, ?)
    RETURNING *
  `).get(entry.memory_type, entry.title, entry.content, encodeList(entry.tags), entry.created_by, now, now) as GlobalMemoryRow;
  return toGlobalMemory(row);
}

export interface MemoryFilter {
  memory_type?: string;
  search?: string;
  include_inactive?: boolean;
  limit?: number;
}

function buildMemoryQuery(table: 'project_memory' | 'global_memory', filter: MemoryFilter, base: {
  where: string[];
  params: SqlValue[];
}): { sql: string; params: SqlValue[] } {
  const where = [...base.where];
  const params = [...base.params];
  if (!filter.include_inactive) {
    where.push("status = 'active'");
  }
  if (filter.memory_type) {
    where.push('memory_type = ?');
    params.push(filter.memory_type);
  }
  if (filter.search) {
    const pattern = `%${escapeLike(filter.search)}%`;
    where.push("(title LIKE ? ESCAPE '\\' OR content LIKE ? ESCAPE '\\')");
    params.push(pattern, pattern);
  }
  const limit = Number.isFinite(filter.limit) ? Math.max(1, Math.floor(Number(filter.limit))) : 20;
  params.push(limit);
  const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
  return {
    sql: `SELECT * FROM ${table} ${clause} ORDER BY updated_at DESC, id DESC LIMIT ?`,
    params,
  };
}

export function searchProjectMemory(project: string, filter: MemoryFilter = {}): ProjectMemory[] {
  const { sql, params } = buildMemoryQuery('project_memory', filter, { where: ['project = ?'], params: [project] });
  const rows = getDb().prepare(sql).all(...params) as ProjectMemoryRow[];
  return rows.map(toProjectMemory);
}

export function searchGlobalMemory(filter: MemoryFilter = {}): GlobalMemory[] {
  const { sql, params } = buildMemoryQuery('global_memory', filter, { where: [], params: [] });
  const rows = getDb().prepare(sql).all(...params) as GlobalMemoryRow[];
  return rows.map(toGlobalMemory);
}

export interface MemoryPatch {
  title?: string;
  content?: string;
  status?: MemoryStatus;
}

const MEMORY_PATCH_COLUMNS = ['title', 'content', 'status'] as const;

// Project scope without a project name matches by id alone.
export type MemoryTarget = { kind: 'global' } | { kind: 'project'; project?: string };

export function updateMemoryEntry(scope: MemoryTarget, memoryId: number, patch: MemoryPatch, now = Date.now()): boolean {
  const table = scope.kind === 'global' ? 'global_memory' : 'project_memory';
  const { fields, params } = buildAssignments(MEMORY_PATCH_COLUMNS, patch);
  fields.push('updated_at = ?');
  params.push(now);
  let sql = `UPDATE ${table} SET ${fields.join(', ')} WHERE id = ?`;
  params.push(memoryId);
  if (scope.kind === 'project' && scope.project) {
    sql += ' AND project = ?';
    params.push(scope.project);
  }
  return getDb().prepare(sql).run(...params).changes === 1;
}

// --- Session log ---

interface SessionLogRow extends Omit<SessionLogEntry, 'files_modified'> {
  files_modified: string;
}

function toSessionLogEntry(row: SessionLogRow): SessionLogEntry {
  return { ...row, files_modified: decodeStringList(row.files_modified) };
}

export function appendSessionLog(entry: {
  instance_id: string;
  project: string;
  action: SessionAction;
  summary: string;
  files_modified?: string[];
}, now = Date.now()): SessionLogEntry {
  const row = getDb().prepare(`
    INSERT INTO session_log (instance_id, project, action, summary, files_modified, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
    RETURNING *
  `).get(entry.instance_id, entry.project, entry.action, entry.summary, encodeList(entry.files_modified), now) as SessionLogRow;
  return toSessionLogEntry(row);
}

export function listRecentActivity(since: number, options: { project?: string; instance_id?: string; limit?: number } = {}): SessionLogEntry[] {
  let query = 'SELECT * FROM session_log WHERE created_at > ?';
  const params: SqlValue[] = [since];
  if (options.project) {
    query += ' AND project = ?';
    params.push(options.project);
  }
  if (options.instance_id) {
    query += ' AND instance_id = ?';
    params.push(options.instance_id);
  }
  query += ' ORDER BY created_at DESC, id DESC LIMIT ?';
  params.push(options.limit ?? 10);
  const rows = getDb().prepare(query).all(...params) as SessionLogRow[];
  return rows.map(toSessionLogEntry);
}

export function cleanupSessionLog(now: number, retentionMs: number): number {
  return getDb().prepare('DELETE FROM session_log WHERE created_at < ?').run(now - retentionMs).changes;
}

// --- Tasks ---

interface TaskRow extends Omit<Task, 'file_scope' | 'depends_on'> {
  file_scope: string;
  depends_on: string;
}

function toTask(row: TaskRow): Task {
  return { ...row, file_scope: decodeStringList(row.file_scope), depends_on: decodeIdList(row.depends_on) };
}

export function createTask(task: {
  title: string;
  project: string;
  description?: string | null;
  priority?: number;
  assigned_role?: string | null;
  file_scope?: string[];
  depends_on?: number[];
  created_by: string;
}, now = Date.now()): Task {
  const row = getDb().prepare(`
    INSERT INTO tasks (title, description, project, priority, assigned_role, file_scope, depends_on, status, created_by, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?)
    RETURNING *
  `).get(
    task.title,
    task.description ?? null,
    task.project,
    task.priority ?? 0,
    task.assigned_role ?? null,
    encodeList(task.file_scope),
    encodeList(task.depends_on),
    task.created_by,
    now,
  ) as TaskRow;
  return toTask(row);
}

export function getTaskById(id: number): Task | null {
  const row = getDb().prepare('SELECT * FROM tasks WHERE id = ?').get(id) as TaskRow | undefined;
  return row ? toTask(row) : null;
}

export function listTasks(options: {
  project?: string;
  status?: TaskStatus;
  assigned_role?: string;
  available_only?: boolean;
} = {}): Task[] {
  let query = 'SELECT * FROM tasks WHERE 1=1';
  const params: SqlValue[] = [];

  if (options.available_only) {
    query += " AND status = 'pending'";
  } else if (options.status) {
    query += ' AND status = ?';
    params.push(options.status);
  }
  if (options.project) {
    query += ' AND project = ?';
    params.push(options.project);
  }
  if (options.assigned_role) {
    query += ' AND assigned_role = ?';
    params.push(options.assigned_role);
  }
  query += ' ORDER BY priority DESC, created_at ASC, id ASC';

  const rows = getDb().prepare(query).all(...params) as TaskRow[];
  return rows.map(toTask);
}

// One conditional UPDATE: SQLite runs it under the database write lock, so
// among racing claimants exactly one sees a returned row.
export function claimTask(taskId: number, instanceId: string, now = Date.now(), d: Database.Database = getDb()): Task | null {
  const row = d.prepare(`
    UPDATE tasks
    SET status = 'claimed', assigned_instance = ?, claimed_at = ?
    WHERE id = ? AND status = 'pending'
    RETURNING *
  `).get(instanceId, now, taskId) as TaskRow | undefined;
  return row ? toTask(row) : null;
}

export function startTask(taskId: number, instanceId: string): Task | null {
  const row = getDb().prepare(`
    UPDATE tasks
    SET status = 'in_progress'
    WHERE id = ? AND assigned_instance = ? AND status = 'claimed'
    RETURNING *
  `).get(taskId, instanceId) as TaskRow | undefined;
  return row ? toTask(row) : null;
}

/**
 * Tries the claimant-scoped update first and falls back to an update by id
 * alone. Both paths only move tasks out of claimed/in_progress.
 */
export function completeTask(taskId: number, args: {
  result?: string | null;
  claimant?: string | null;
}, now = Date.now()): { task: Task; override: boolean } | null {
  const d = getDb();
  const result = args.result ?? null;
  const tx = d.transaction(() => {
    if (args.claimant) {
      const own = d.prepare(`
        UPDATE tasks
        SET status = 'done', result = ?, completed_at = ?
        WHERE id = ? AND assigned_instance = ? AND status IN ('claimed', 'in_progress')
        RETURNING *
      `).get(result, now, taskId, args.claimant) as TaskRow | undefined;
      if (own) return { task: toTask(own), override: false };
    }
    const fallback = d.prepare(`
      UPDATE tasks
      SET status = 'done', result = ?, completed_at = ?
      WHERE id = ? AND status IN ('claimed', 'in_progress')
      RETURNING *
    `).get(result, now, taskId) as TaskRow | undefined;
    return fallback ? { task: toTask(fallback), override: true } : null;
  });
  return tx();
}

export function failTask(taskId: number, result: string | null = null, now = Date.now()): Task | null {
  const row = getDb().prepare(`
    UPDATE tasks
    SET status = 'failed', result = ?, completed_at = ?
    WHERE id = ? AND status IN ('claimed', 'in_progress')
    RETURNING *
  `).get(result, now, taskId) as TaskRow | undefined;
  return row ? toTask(row) : null;
}

// --- Roles ---

interface RoleRow extends Omit<AgentRole, 'capabilities'> {
  capabilities: string;
}

function toRole(row: RoleRow): AgentRole {
  return { ...row, capabilities: decodeStringList(row.capabilities) };
}

export function upsertRole(role: {
  name: string;
  description: string;
  system_prompt: string;
  capabilities?: string[];
}, now = Date.now()): AgentRole {
  const row = getDb().prepare(`
    INSERT INTO agent_roles (name, description, system_prompt, capabilities, updated_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(name) DO UPDATE SET
      description = excluded.description,
      system_prompt = excluded.system_prompt,
      capabilities = excluded.capabilities,
      updated_at = excluded.updated_at
    RETURNING *
  `).get(role.name, role.description, role.system_prompt, encodeList(role.capabilities), now) as RoleRow;
  return toRole(row);
}

export function upsertRoles(roles: Array<Parameters<typeof upsertRole>[0]>, now = Date.now()): AgentRole[] {
  const tx = getDb().transaction(() => roles.map((role) => upsertRole(role, now)));
  return tx();
}

export function getRole(name: string): AgentRole | null {
  const row = getDb().prepare('SELECT * FROM agent_roles WHERE name = ?').get(name) as RoleRow | undefined;
  return row ? toRole(row) : null;
}

export function listRoles(): AgentRole[] {
  const rows = getDb().prepare('SELECT * FROM agent_roles ORDER BY name ASC').all() as RoleRow[];
  return rows.map(toRole);
}

// --- Maintenance ---

export function runCleanup(now: number, policy: { staleAfterMs: number; logRetentionMs: number }): {
  instances_removed: number;
  messages_removed: number;
  log_entries_removed: number;
} {
  const tx = getDb().transaction(() => ({
    instances_removed: cleanupStaleInstances(now, policy.staleAfterMs),
    messages_removed: cleanupExpiredMessages(now),
    log_entries_removed: cleanupSessionLog(now, policy.logRetentionMs),
  }));
  return tx();
}
