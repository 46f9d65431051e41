import { z } from 'zod';
import {
  insertGlobalMemory,
  insertProjectMemory,
  searchGlobalMemory,
  searchProjectMemory,
  updateMemoryEntry,
  type MemoryTarget,
} from '../db.js';
import {
  GLOBAL_MEMORY_TYPES,
  HUMAN_CREATOR,
  MEMORY_STATUSES,
  PROJECT_MEMORY_TYPES,
  type GlobalMemory,
  type Identity,
  type MemoryScope,
  type ProjectMemory,
} from '../types.js';
import { failure, isFailure, parseInput, type Failure } from '../utils.js';

const DEFAULT_RECALL_LIMIT = 20;

export interface ScopeArgs {
  project?: string;
  global?: boolean;
}

/** `--global` wins; otherwise an explicit project, then the registered one. */
export function resolveScope(args: ScopeArgs, identity: Identity | null): MemoryScope | Failure {
  if (args.global) return { kind: 'global' };
  const project = args.project?.trim() || identity?.project;
  if (!project) {
    return failure('INVALID_INPUT', 'project: pass --project <name> or --global');
  }
  return { kind: 'project', project };
}

const RememberBase = {
  title: z.string().trim().min(1, 'title is required'),
  content: z.string().trim().min(1, 'content is required'),
  tags: z.array(z.string()).default([]),
};

const ProjectRememberSchema = z.object({
  ...RememberBase,
  type: z.enum(PROJECT_MEMORY_TYPES),
  files: z.array(z.string()).default([]),
});

const GlobalRememberSchema = z.object({
  ...RememberBase,
  type: z.enum(GLOBAL_MEMORY_TYPES),
});

export function handleRemember(identity: Identity | null, args: ScopeArgs & {
  type: string;
  title: string;
  content: string;
  tags?: string[];
  files?: string[];
}): Failure | { success: true; scope: MemoryScope['kind']; entry: ProjectMemory | GlobalMemory } {
  const scope = resolveScope(args, identity);
  if (isFailure(scope)) return scope;
  const createdBy = identity?.instance_id ?? HUMAN_CREATOR;

  if (scope.kind === 'global') {
    const input = parseInput(GlobalRememberSchema, args);
    if (!input.ok) return input.failure;
    const entry = insertGlobalMemory({
      memory_type: input.data.type,
      title: input.data.title,
      content: input.data.content,
      tags: input.data.tags,
      created_by: createdBy,
    });
    return { success: true, scope: 'global', entry };
  }

  const input = parseInput(ProjectRememberSchema, args);
  if (!input.ok) return input.failure;
  const entry = insertProjectMemory({
    project: scope.project,
    memory_type: input.data.type,
    title: input.data.title,
    content: input.data.content,
    tags: input.data.tags,
    related_files: input.data.files,
    created_by: createdBy,
  });
  return { success: true, scope: 'project', entry };
}

const RecallSchema = z.object({
  type: z.string().trim().min(1).optional(),
  search: z.string().optional(),
  limit: z.coerce.number().int().positive().default(DEFAULT_RECALL_LIMIT),
  include_inactive: z.boolean().default(false),
});

export function handleRecall(identity: Identity | null, args: ScopeArgs & {
  type?: string;
  search?: string;
  limit?: number | string;
  include_inactive?: boolean;
}): Failure | { success: true; scope: MemoryScope['kind']; entries: Array<ProjectMemory | GlobalMemory> } {
  const scope = resolveScope(args, identity);
  if (isFailure(scope)) return scope;
  const input = parseInput(RecallSchema, args);
  if (!input.ok) return input.failure;

  const filter = {
    memory_type: input.data.type,
    search: input.data.search || undefined,
    include_inactive: input.data.include_inactive,
    limit: input.data.limit,
  };
  const entries = scope.kind === 'global'
    ? searchGlobalMemory(filter)
    : searchProjectMemory(scope.project, filter);
  return { success: true, scope: scope.kind, entries };
}

const UpdateMemorySchema = z.object({
  memory_id: z.coerce.number().int().positive(),
  title: z.string().trim().min(1).optional(),
  content: z.string().trim().min(1).optional(),
  status: z.enum(MEMORY_STATUSES).optional(),
});

export function handleUpdateMemory(args: ScopeArgs & {
  memory_id: number | string;
  title?: string;
  content?: string;
  status?: string;
}): Failure | { success: true; memory_id: number; updated: string[] } {
  const input = parseInput(UpdateMemorySchema, args);
  if (!input.ok) return input.failure;
  const scope: MemoryTarget = args.global
    ? { kind: 'global' }
    : { kind: 'project', project: args.project?.trim() || undefined };

  const { memory_id: memoryId, ...patch } = input.data;
  const updated = (['title', 'content', 'status'] as const).filter((key) => patch[key] !== undefined);
  if (updated.length === 0) {
    return failure('NOTHING_TO_UPDATE', 'Nothing to update: pass --title, --content or --status');
  }
  if (!updateMemoryEntry(scope, memoryId, patch)) {
    const where = scope.kind === 'global' ? ' in global memory' : scope.project ? ` in project ${scope.project}` : '';
    return failure('MEMORY_NOT_FOUND', `Memory ${memoryId} not found${where}`);
  }
  return { success: true, memory_id: memoryId, updated };
}
