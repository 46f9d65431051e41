import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, closeDb, insertProjectMemory, searchProjectMemory } from '../src/db.js';
import { handleRecall, handleRemember, handleUpdateMemory, resolveScope } from '../src/tools/memory.js';
import type { Identity } from '../src/types.js';

const self: Identity = { instance_id: 'inst-mem', project: 'web' };

function rememberId(args: Parameters<typeof handleRemember>[1], identity: Identity | null = self): number {
  const result = handleRemember(identity, args);
  if (!result.success) throw new Error(result.error);
  return result.entry.id;
}

function recallTitles(args: Parameters<typeof handleRecall>[1]): string[] {
  const result = handleRecall(self, args);
  if (!result.success) throw new Error(result.error);
  return result.entries.map((entry) => entry.title);
}

beforeEach(() => { initDb(':memory:'); });
afterEach(() => { closeDb(); });

describe('resolveScope', () => {
  it('prefers --global, then an explicit project, then the identity', () => {
    expect(resolveScope({ global: true, project: 'web' }, self)).toEqual({ kind: 'global' });
    expect(resolveScope({ project: 'api' }, self)).toEqual({ kind: 'project', project: 'api' });
    expect(resolveScope({}, self)).toEqual({ kind: 'project', project: 'web' });
  });

  it('fails without any project', () => {
    const scope = resolveScope({}, null);
    expect(scope).toEqual({
      success: false,
      error_code: 'INVALID_INPUT',
      error: 'project: pass --project <name> or --global',
    });
  });
});

describe('remember', () => {
  it('stores project memory with tags and files', () => {
    const result = handleRemember(self, {
      type: 'decision',
      title: 'Use WAL',
      content: 'Concurrent readers need WAL mode',
      tags: ['db', 'sqlite'],
      files: ['src/db.ts'],
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.scope).toBe('project');
    expect(result.entry).toMatchObject({
      project: 'web',
      memory_type: 'decision',
      status: 'active',
      tags: ['db', 'sqlite'],
      related_files: ['src/db.ts'],
      created_by: 'inst-mem',
    });
  });

  it('stores global memory as human when unregistered', () => {
    const result = handleRemember(null, {
      global: true,
      type: 'convention',
      title: 'Commit style',
      content: 'Imperative subject lines',
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.scope).toBe('global');
    expect(result.entry.created_by).toBe('human');
    expect('project' in result.entry).toBe(false);
  });

  it('checks the type against the scope', () => {
    const projectTypeInGlobal = handleRemember(self, { global: true, type: 'decision', title: 't', content: 'c' });
    expect(projectTypeInGlobal.success).toBe(false);
    const globalTypeInProject = handleRemember(self, { type: 'tool', title: 't', content: 'c' });
    expect(globalTypeInProject.success).toBe(false);
    if (globalTypeInProject.success) return;
    expect(globalTypeInProject.error_code).toBe('INVALID_INPUT');
  });
});

describe('recall', () => {
  it('filters by type and case-insensitive search', () => {
    rememberId({ type: 'gotcha', title: 'Port clash', content: 'Dev server uses 3000' });
    rememberId({ type: 'decision', title: 'Ports', content: 'API moves to 4000' });
    rememberId({ type: 'gotcha', title: 'Timezones', content: 'Store UTC' });

    expect(recallTitles({ search: 'PORT' }).sort()).toEqual(['Port clash', 'Ports']);
    expect(recallTitles({ search: 'port', type: 'gotcha' })).toEqual(['Port clash']);
  });

  it('treats % and _ literally', () => {
    rememberId({ type: 'fix', title: 'Coverage 100%', content: 'done' });
    rememberId({ type: 'fix', title: 'Coverage 1000', content: 'typo' });
    rememberId({ type: 'fix', title: 'snake_case', content: 'names' });
    rememberId({ type: 'fix', title: 'snakeXcase', content: 'names' });

    expect(recallTitles({ search: '0%' })).toEqual(['Coverage 100%']);
    expect(recallTitles({ search: 'e_c' })).toEqual(['snake_case']);
  });

  it('orders by most recent update and applies the limit', () => {
    const now = Date.now();
    const base = { project: 'web', memory_type: 'update' as const, content: 'x', created_by: 'human' };
    insertProjectMemory({ ...base, title: 'oldest' }, now - 3000);
    insertProjectMemory({ ...base, title: 'newest' }, now - 1000);
    insertProjectMemory({ ...base, title: 'middle' }, now - 2000);

    expect(recallTitles({})).toEqual(['newest', 'middle', 'oldest']);
    expect(recallTitles({ limit: '2' })).toEqual(['newest', 'middle']);
  });

  it('skips inactive entries unless asked', () => {
    const id = rememberId({ type: 'issue', title: 'Flaky test', content: 'retry' });
    rememberId({ type: 'issue', title: 'Open bug', content: 'todo' });
    handleUpdateMemory({ memory_id: id, status: 'resolved' });

    expect(recallTitles({})).toEqual(['Open bug']);
    expect(recallTitles({ include_inactive: true }).sort()).toEqual(['Flaky test', 'Open bug']);
  });

  it('keeps projects apart', () => {
    rememberId({ type: 'feature', title: 'Web only', content: 'x' });
    rememberId({ project: 'api', type: 'feature', title: 'Api only', content: 'y' });

    expect(recallTitles({})).toEqual(['Web only']);
    expect(recallTitles({ project: 'api' })).toEqual(['Api only']);
  });

  it('searches global memory when asked', () => {
    rememberId({ global: true, type: 'lesson', title: 'Pin versions', content: 'Lock majors' });
    rememberId({ type: 'pattern', title: 'Pin in project', content: 'local' });

    expect(recallTitles({ global: true, search: 'pin' })).toEqual(['Pin versions']);
  });
});

describe('update-memory', () => {
  it('updates only the supplied fields and bumps updated_at', () => {
    const now = Date.now();
    const entry = insertProjectMemory({
      project: 'web',
      memory_type: 'architecture',
      title: 'Layers',
      content: 'Three layers',
      created_by: 'human',
    }, now - 10_000);

    const result = handleUpdateMemory({ memory_id: String(entry.id), content: 'Four layers' });
    expect(result).toEqual({ success: true, memory_id: entry.id, updated: ['content'] });

    const [row] = searchProjectMemory('web');
    expect(row.title).toBe('Layers');
    expect(row.content).toBe('Four layers');
    expect(row.status).toBe('active');
    expect(row.updated_at).toBeGreaterThan(entry.updated_at);
  });

  it('rejects an empty update', () => {
    const id = rememberId({ type: 'fix', title: 'A', content: 'B' });
    const result = handleUpdateMemory({ memory_id: id });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error_code).toBe('NOTHING_TO_UPDATE');
  });

  it('reports a missing entry', () => {
    const result = handleUpdateMemory({ memory_id: 41, title: 'x' });
    expect(result).toEqual({ success: false, error_code: 'MEMORY_NOT_FOUND', error: 'Memory 41 not found' });
  });

  it('does not cross between project and global tables', () => {
    const id = rememberId({ type: 'fix', title: 'Project entry', content: 'B' });
    const global = handleUpdateMemory({ memory_id: id, global: true, title: 'x' });
    expect(global).toEqual({
      success: false,
      error_code: 'MEMORY_NOT_FOUND',
      error: `Memory ${id} not found in global memory`,
    });
  });

  it('limits the match to a project when one is given', () => {
    const id = rememberId({ type: 'fix', title: 'Web entry', content: 'B' });
    const wrong = handleUpdateMemory({ memory_id: id, project: 'api', status: 'deprecated' });
    expect(wrong.success).toBe(false);
    const right = handleUpdateMemory({ memory_id: id, project: 'web', status: 'deprecated' });
    expect(right.success).toBe(true);
  });
});
