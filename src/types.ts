export const BROADCAST_TARGET = '@all';
export const HUMAN_CREATOR = 'human';

export const INSTANCE_STATUSES = ['active', 'idle', 'busy', 'shutting_down'] as const;
export type InstanceStatus = typeof INSTANCE_STATUSES[number];

export const MESSAGE_TYPES = ['info', 'warning', 'blocker', 'request', 'done'] as const;
export type MessageType = typeof MESSAGE_TYPES[number];

export const PROJECT_MEMORY_TYPES = [
  'architecture',
  'feature',
  'issue',
  'fix',
  'decision',
  'pattern',
  'gotcha',
  'update',
] as const;
export type ProjectMemoryType = typeof PROJECT_MEMORY_TYPES[number];

export const GLOBAL_MEMORY_TYPES = ['infrastructure', 'convention', 'tool', 'preference', 'credential', 'lesson'] as const;
export type GlobalMemoryType = typeof GLOBAL_MEMORY_TYPES[number];

export const MEMORY_STATUSES = ['active', 'resolved', 'deprecated', 'superseded'] as const;
export type MemoryStatus = typeof MEMORY_STATUSES[number];

export const SESSION_ACTIONS = [
  'started',
  'task_started',
  'task_completed',
  'issue_found',
  'issue_resolved',
  'docker_operation',
  'file_modified',
  'shutdown',
] as const;
export type SessionAction = typeof SESSION_ACTIONS[number];

export const TASK_STATUSES = ['pending', 'claimed', 'in_progress', 'done', 'failed'] as const;
export type TaskStatus = typeof TASK_STATUSES[number];

/** Statuses a task can be completed or failed from. */
export const ACTIVE_TASK_STATUSES = ['claimed', 'in_progress'] as const satisfies readonly TaskStatus[];

export interface Identity {
  instance_id: string;
  project: string;
}

export interface Instance {
  instance_id: string;
  project: string;
  working_dir: string | null;
  model: string | null;
  status: InstanceStatus;
  current_task: string | null;
  started_at: number;
  last_heartbeat: number;
}

export interface ActiveInstance extends Instance {
  seconds_since_heartbeat: number;
}

export interface Message {
  id: number;
  from_instance: string;
  from_project: string | null;
  to_target: string;
  message_type: MessageType;
  subject: string;
  body: string | null;
  is_read: boolean;
  created_at: number;
  expires_at: number | null;
}

export interface ProjectMemory {
  id: number;
  project: string;
  memory_type: ProjectMemoryType;
  title: string;
  content: string;
  status: MemoryStatus;
  tags: string[];
  related_files: string[];
  created_by: string;
  created_at: number;
  updated_at: number;
}

export interface GlobalMemory {
  id: number;
  memory_type: GlobalMemoryType;
  title: string;
  content: string;
  status: MemoryStatus;
  tags: string[];
  created_by: string;
  created_at: number;
  updated_at: number;
}

export type MemoryScope = { kind: 'project'; project: string } | { kind: 'global' };

export interface SessionLogEntry {
  id: number;
  instance_id: string;
  project: string;
  action: SessionAction;
  summary: string;
  files_modified: string[];
  created_at: number;
}

export interface Task {
  id: number;
  title: string;
  description: string | null;
  project: string;
  priority: number;
  assigned_role: string | null;
  file_scope: string[];
  depends_on: number[];
  assigned_instance: string | null;
  status: TaskStatus;
  result: string | null;
  created_by: string;
  created_at: number;
  claimed_at: number | null;
  completed_at: number | null;
}

export interface AgentRole {
  name: string;
  description: string;
  system_prompt: string;
  capabilities: string[];
  updated_at: number;
}
