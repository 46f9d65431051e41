import fs from 'fs';
import { z } from 'zod';
import { getRole, listRoles, upsertRole, upsertRoles } from '../db.js';
import type { AgentRole } from '../types.js';
import { failure, parseInput, type Failure } from '../utils.js';

export const DEFAULT_ROLES_FILE = new URL('../../data/default-roles.json', import.meta.url);

const RoleSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().trim().min(1, 'description is required'),
  system_prompt: z.string().trim().min(1, 'system prompt is required'),
  capabilities: z.array(z.string()).default([]),
});

const RoleFileSchema = z.array(RoleSchema).min(1);

export function loadDefaultRoles(file: URL | string = DEFAULT_ROLES_FILE): z.infer<typeof RoleFileSchema> {
  return RoleFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

export function handleListRoles(): { success: true; roles: AgentRole[] } {
  return { success: true, roles: listRoles() };
}

export function handleGetRole(args: { name: string }): Failure | { success: true; role: AgentRole } {
  const role = getRole(args.name);
  if (!role) {
    return failure('ROLE_NOT_FOUND', `Role '${args.name}' not found`);
  }
  return { success: true, role };
}

export function handleCreateRole(args: {
  name: string;
  description: string;
  system_prompt: string;
  capabilities?: string[];
}): Failure | { success: true; role: AgentRole } {
  const input = parseInput(RoleSchema, args);
  if (!input.ok) return input.failure;
  return { success: true, role: upsertRole(input.data) };
}

export function handleSeedRoles(file?: URL | string): { success: true; roles: AgentRole[] } {
  return { success: true, roles: upsertRoles(loadDefaultRoles(file)) };
}
