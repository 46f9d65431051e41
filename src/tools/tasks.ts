import { z } from 'zod';
import {
  appendSessionLog,
  claimTask,
  completeTask,
  createTask,
  failTask,
  getRole,
  getTaskById,
  listTasks,
  startTask,
  touchInstance,
} from '../db.js';
import { ACTIVE_TASK_STATUSES, HUMAN_CREATOR, TASK_STATUSES, type AgentRole, type Identity, type Task } from '../types.js';
import { failure, parseInput, type Failure } from '../utils.js';

const TaskIdSchema = z.coerce.number().int().positive();

const CreateTaskSchema = z.object({
  title: z.string().trim().min(1, 'title is required'),
  project: z.string().trim().min(1, 'project is required'),
  description: z.string().optional(),
  role: z.string().trim().min(1).optional(),
  priority: z.coerce.number().int().default(0),
  file_scope: z.array(z.string()).default([]),
  depends_on: z.array(TaskIdSchema).default([]),
});

const ListTasksSchema = z.object({
  project: z.string().trim().min(1).optional(),
  status: z.enum(TASK_STATUSES).optional(),
  role: z.string().trim().min(1).optional(),
  available: z.boolean().default(false),
});

const TaskRefSchema = z.object({
  task_id: TaskIdSchema,
  result: z.string().optional(),
});

export function handleCreateTask(identity: Identity | null, args: {
  title: string;
  project?: string;
  description?: string;
  role?: string;
  priority?: number | string;
  file_scope?: string[];
  depends_on?: Array<number | string>;
}): Failure | { success: true; task: Task } {
  const input = parseInput(CreateTaskSchema, { ...args, project: args.project ?? identity?.project });
  if (!input.ok) return input.failure;

  const task = createTask({
    title: input.data.title,
    project: input.data.project,
    description: input.data.description ?? null,
    priority: input.data.priority,
    assigned_role: input.data.role ?? null,
    file_scope: input.data.file_scope,
    depends_on: input.data.depends_on,
    created_by: identity?.instance_id ?? HUMAN_CREATOR,
  });
  return { success: true, task };
}

export function handleListTasks(args: {
  project?: string;
  status?: string;
  role?: string;
  available?: boolean;
} = {}): Failure | { success: true; tasks: Task[] } {
  const input = parseInput(ListTasksSchema, args);
  if (!input.ok) return input.failure;

  const tasks = listTasks({
    project: input.data.project,
    status: input.data.status,
    assigned_role: input.data.role,
    available_only: input.data.available,
  });
  return { success: true, tasks };
}

export function handleClaimTask(identity: Identity, args: { task_id: number | string }): Failure | {
  success: true;
  task: Task;
  role: AgentRole | null;
} {
  const input = parseInput(TaskRefSchema, args);
  if (!input.ok) return input.failure;

  const now = Date.now();
  const task = claimTask(input.data.task_id, identity.instance_id, now);
  if (!task) {
    return failure('TASK_NOT_AVAILABLE', `Task #${input.data.task_id} not available (already claimed or doesn't exist)`);
  }

  const role = task.assigned_role ? getRole(task.assigned_role) : null;
  touchInstance(identity.instance_id, { status: 'busy', current_task: task.title }, now);
  appendSessionLog({
    instance_id: identity.instance_id,
    project: identity.project,
    action: 'task_started',
    summary: `Claimed task #${task.id}: ${task.title}`,
    files_modified: task.file_scope,
  }, now);
  return { success: true, task, role };
}

export function handleStartTask(identity: Identity, args: { task_id: number | string }): Failure | {
  success: true;
  task: Task;
} {
  const input = parseInput(TaskRefSchema, args);
  if (!input.ok) return input.failure;

  const task = startTask(input.data.task_id, identity.instance_id);
  if (!task) {
    return failure('TASK_NOT_CLAIMED_BY_CALLER', `Task #${input.data.task_id} is not claimed by ${identity.instance_id}`);
  }
  touchInstance(identity.instance_id, { status: 'busy', current_task: task.title });
  return { success: true, task };
}

function inactiveTaskFailure(taskId: number): Failure {
  const existing = getTaskById(taskId);
  if (!existing) {
    return failure('TASK_NOT_FOUND', `Task #${taskId} not found`);
  }
  return failure('TASK_NOT_ACTIVE', `Task #${taskId} is ${existing.status}; only ${ACTIVE_TASK_STATUSES.join(' or ')} tasks can be closed`);
}

function releaseCaller(identity: Identity | null, task: Task, summary: string, now: number): void {
  if (!identity) return;
  touchInstance(identity.instance_id, { status: 'active', current_task: null }, now);
  appendSessionLog({
    instance_id: identity.instance_id,
    project: identity.project,
    action: 'task_completed',
    summary,
    files_modified: task.file_scope,
  }, now);
}

/**
 * Completes a task as its claimant, or by id alone when the caller is someone
 * else (a human or another agent). `override` says which path applied.
 */
export function handleCompleteTask(identity: Identity | null, args: {
  task_id: number | string;
  result?: string;
}): Failure | { success: true; task: Task; override: boolean } {
  const input = parseInput(TaskRefSchema, args);
  if (!input.ok) return input.failure;

  const now = Date.now();
  const outcome = completeTask(input.data.task_id, {
    result: input.data.result ?? null,
    claimant: identity?.instance_id ?? null,
  }, now);
  if (!outcome) return inactiveTaskFailure(input.data.task_id);

  releaseCaller(identity, outcome.task, `Completed task #${outcome.task.id}: ${outcome.task.title}`, now);
  return { success: true, task: outcome.task, override: outcome.override };
}

export function handleFailTask(identity: Identity | null, args: {
  task_id: number | string;
  result?: string;
}): Failure | { success: true; task: Task } {
  const input = parseInput(TaskRefSchema, args);
  if (!input.ok) return input.failure;

  const now = Date.now();
  const task = failTask(input.data.task_id, input.data.result ?? null, now);
  if (!task) return inactiveTaskFailure(input.data.task_id);

  releaseCaller(identity, task, `Failed task #${task.id}: ${task.result ?? 'no reason given'}`, now);
  return { success: true, task };
}
