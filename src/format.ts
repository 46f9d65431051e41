import type { handleCleanup, handleDeregister, handleHeartbeat, handleLog, handleRegister, handleStatus } from './tools/presence.js';
import type { handleInbox, handleRead, handleSend } from './tools/messages.js';
import type { handleRecall, handleRemember, handleUpdateMemory } from './tools/memory.js';
import type {
  handleClaimTask,
  handleCompleteTask,
  handleCreateTask,
  handleFailTask,
  handleListTasks,
  handleStartTask,
} from './tools/tasks.js';
import type { handleCreateRole, handleGetRole, handleListRoles, handleSeedRoles } from './tools/roles.js';
import type { handleDisable, handleEnable, handleInit } from './tools/gate.js';
import type { Instance } from './types.js';
import { preview } from './utils.js';

type Ok<F extends (...args: never[]) => unknown> = Extract<ReturnType<F>, { success: true }>;

const SENDER_ID_CHARS = 8;
const INBOX_BODY_PREVIEW = 200;
const RECALL_CONTENT_PREVIEW = 300;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function shortTimestamp(ms: number): string {
  const date = new Date(ms);
  return `${pad2(date.getMonth() + 1)}/${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

function shortId(id: string | null): string {
  return id ? id.slice(0, SENDER_ID_CHARS) : '-';
}

function instanceLine(instance: Instance): string {
  return `[${instance.status}] ${instance.project} - ${instance.current_task ?? 'idle'} (${instance.instance_id})`;
}

function unreadMark(isRead: boolean): string {
  return isRead ? ' ' : '*';
}

// --- Gate ---

export function formatInit(result: Ok<typeof handleInit>): string[] {
  return [`INITIALIZED: schema ready at ${result.db_path}`];
}

export function formatEnable(result: Ok<typeof handleEnable>): string[] {
  return [
    'ENABLED: agentdesk is now active',
    `  Flag file: ${result.flag_file}`,
    '  Or set env: export AGENTDESK_ENABLED=1',
  ];
}

export function formatDisable(result: Ok<typeof handleDisable>): string[] {
  const lines = ['DISABLED: agentdesk is now inactive'];
  if (result.deregistered) lines.push(`  Deregistered: ${result.deregistered}`);
  lines.push('  All commands will silently no-op until re-enabled', '  Re-enable with: agentdesk enable');
  return lines;
}

// --- Presence ---

export function formatRegister(result: Ok<typeof handleRegister>): string[] {
  const lines = [`REGISTERED: ${result.instance.instance_id} on project '${result.instance.project}'`];
  if (result.others.length > 0) {
    lines.push('', 'ACTIVE INSTANCES:');
    for (const other of result.others) lines.push(`  ${instanceLine(other)}`);
  }
  if (result.unread_count > 0) {
    lines.push('', `${result.unread_count} UNREAD MESSAGE(S) - run 'agentdesk inbox'`);
  }
  return lines;
}

export function formatHeartbeat(result: Ok<typeof handleHeartbeat>): string[] {
  const task = result.instance.current_task ? ` task='${result.instance.current_task}'` : '';
  return [`HEARTBEAT: ${result.instance.instance_id}${task} [${result.instance.status}]`];
}

export function formatStatus(result: Ok<typeof handleStatus>): string[] {
  const lines = ['=== ACTIVE INSTANCES ==='];
  if (result.instances.length === 0) lines.push('  (none)');
  for (const instance of result.instances) {
    lines.push(`  [${instance.status}] ${instance.project} - ${instance.current_task ?? 'idle'} (heartbeat ${instance.seconds_since_heartbeat}s ago) ${instance.instance_id}`);
  }

  lines.push('', '=== RECENT MESSAGES (24h) ===');
  if (result.messages.length === 0) lines.push('  (none)');
  for (const m of result.messages) {
    lines.push(`  ${unreadMark(m.is_read)}[${m.id}] ${m.from_project ?? '?'} (${shortId(m.from_instance)}) -> ${m.to_target}: [${m.message_type}] ${m.subject}`);
  }

  lines.push('', '=== RECENT ACTIVITY ===');
  if (result.activity.length === 0) lines.push('  (none)');
  for (const entry of result.activity) {
    lines.push(`  ${shortTimestamp(entry.created_at)} [${entry.project}] ${entry.action} - ${entry.summary}`);
  }
  return lines;
}

export function formatLog(result: Ok<typeof handleLog>): string[] {
  return [`LOGGED: [${result.entry.action}] ${result.entry.summary}`];
}

export function formatDeregister(result: Ok<typeof handleDeregister>): string[] {
  return [`DEREGISTERED: ${result.instance_id}`];
}

export function formatCleanup(result: Ok<typeof handleCleanup>): string[] {
  return [
    `CLEANUP: removed ${result.instances_removed} stale instance(s), ${result.messages_removed} expired message(s), ${result.log_entries_removed} old log entr${result.log_entries_removed === 1 ? 'y' : 'ies'}`,
  ];
}

// --- Messages ---

export function formatSend(result: Ok<typeof handleSend>): string[] {
  const m = result.message;
  return [`SENT: [${m.message_type}] #${m.id} to ${m.to_target} - ${m.subject}`];
}

export function formatInbox(result: Ok<typeof handleInbox>): string[] {
  if (result.messages.length === 0) return ['INBOX: empty'];
  const lines = [`INBOX: ${result.messages.length} message(s)`];
  for (const m of result.messages) {
    lines.push(`  ${unreadMark(m.is_read)}#${m.id} [${m.message_type}] ${shortTimestamp(m.created_at)} from ${m.from_project ?? '?'} (${shortId(m.from_instance)}) - ${m.subject}`);
    if (m.body) lines.push(`    ${preview(m.body, INBOX_BODY_PREVIEW)}`);
  }
  return lines;
}

export function formatRead(result: Ok<typeof handleRead>): string[] {
  const m = result.message;
  const lines = [
    `MESSAGE #${m.id}`,
    `  From: ${m.from_project ?? '?'} (${m.from_instance})`,
    `  To: ${m.to_target}`,
    `  Type: ${m.message_type}`,
    `  Subject: ${m.subject}`,
    `  Date: ${new Date(m.created_at).toISOString()}`,
  ];
  if (m.body) lines.push(`  Body:\n${m.body}`);
  return lines;
}

// --- Memory ---

export function formatRemember(result: Ok<typeof handleRemember>): string[] {
  const where = 'project' in result.entry ? result.entry.project : 'global';
  return [`REMEMBERED: #${result.entry.id} [${result.entry.memory_type}] in ${where} - ${result.entry.title}`];
}

export function formatRecall(result: Ok<typeof handleRecall>): string[] {
  if (result.entries.length === 0) return ['RECALL: no results'];
  const first = result.entries[0];
  const label = first && 'project' in first ? first.project.toUpperCase() : 'GLOBAL';
  const lines = [`RECALL [${label}]: ${result.entries.length} result(s)`];
  for (const entry of result.entries) {
    const tags = entry.tags.map((tag) => `#${tag}`).join(' ');
    const status = entry.status === 'active' ? '' : ` (${entry.status})`;
    lines.push('', `  #${entry.id} [${entry.memory_type}]${status} ${entry.title}${tags ? ` ${tags}` : ''}`);
    lines.push(`    ${preview(entry.content, RECALL_CONTENT_PREVIEW)}`);
    if ('related_files' in entry && entry.related_files.length > 0) {
      lines.push(`    files: ${entry.related_files.join(', ')}`);
    }
  }
  return lines;
}

export function formatUpdateMemory(result: Ok<typeof handleUpdateMemory>): string[] {
  return [`UPDATED: memory #${result.memory_id} (${result.updated.join(', ')})`];
}

// --- Tasks ---

export function formatTaskCreate(result: Ok<typeof handleCreateTask>): string[] {
  const t = result.task;
  const role = t.assigned_role ? ` [${t.assigned_role}]` : '';
  return [`TASK #${t.id}: ${t.project}${role} - ${t.title}`];
}

export function formatTaskList(result: Ok<typeof handleListTasks>): string[] {
  if (result.tasks.length === 0) return ['TASKS: none found'];
  const lines = [`=== TASKS (${result.tasks.length}) ===`];
  for (const t of result.tasks) {
    const deps = t.depends_on.length > 0 ? ` deps:[${t.depends_on.join(',')}]` : '';
    lines.push(`  #${t.id} [${t.status}] p${t.priority} ${t.project} (${t.assigned_role ?? 'any'}) -> ${shortId(t.assigned_instance)}${deps} - ${t.title}`);
  }
  return lines;
}

export function formatClaim(result: Ok<typeof handleClaimTask>): string[] {
  const t = result.task;
  const lines = [`CLAIMED: #${t.id} - ${t.title}`];
  if (result.role) {
    lines.push('', `=== ROLE: ${result.role.name} ===`, result.role.system_prompt);
  }
  if (t.description) {
    lines.push('', '=== TASK ===', t.description);
  }
  if (t.file_scope.length > 0) {
    lines.push('', '=== FILE SCOPE ===', ...t.file_scope.map((file) => `  ${file}`));
  }
  if (t.depends_on.length > 0) {
    lines.push('', `=== DEPENDS ON === ${t.depends_on.map((id) => `#${id}`).join(' ')}`);
  }
  return lines;
}

export function formatStart(result: Ok<typeof handleStartTask>): string[] {
  return [`STARTED: #${result.task.id} - ${result.task.title}`];
}

export function formatDone(result: Ok<typeof handleCompleteTask>): string[] {
  const by = result.override ? ' (override)' : '';
  return [`DONE: Task #${result.task.id} completed${by}`];
}

export function formatFail(result: Ok<typeof handleFailTask>): string[] {
  return [`FAILED: Task #${result.task.id} - ${result.task.result ?? 'no reason given'}`];
}

// --- Roles ---

export function formatRoleList(result: Ok<typeof handleListRoles>): string[] {
  if (result.roles.length === 0) return ["ROLES: none defined. Run 'agentdesk role-seed' to create defaults."];
  return [
    '=== AGENT ROLES ===',
    ...result.roles.map((role) => `  [${role.name}] ${role.description}  (${role.capabilities.join(', ')})`),
  ];
}

export function formatRoleGet(result: Ok<typeof handleGetRole>): string[] {
  const role = result.role;
  return [
    `ROLE: ${role.name}`,
    `  Description: ${role.description}`,
    `  Capabilities: ${role.capabilities.join(', ')}`,
    `  System Prompt:\n${role.system_prompt}`,
  ];
}

export function formatRoleCreate(result: Ok<typeof handleCreateRole>): string[] {
  return [`ROLE: '${result.role.name}' saved`];
}

export function formatRoleSeed(result: Ok<typeof handleSeedRoles>): string[] {
  return [`SEEDED: ${result.roles.length} agent roles (${result.roles.map((role) => role.name).join(', ')})`];
}
