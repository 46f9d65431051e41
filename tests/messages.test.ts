import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, closeDb, getDb, insertMessage, listInbox } from '../src/db.js';
import { handleInbox, handleRead, handleSend } from '../src/tools/messages.js';
import type { Identity } from '../src/types.js';
import { testConfig } from './helpers.js';

const config = testConfig('/tmp/agentdesk-unused');
const webA: Identity = { instance_id: 'web-a', project: 'web' };
const webB: Identity = { instance_id: 'web-b', project: 'web' };
const apiA: Identity = { instance_id: 'api-a', project: 'api' };

function inboxSubjects(identity: Identity): string[] {
  return handleInbox(config, identity).messages.map((m) => m.subject);
}

beforeEach(() => { initDb(':memory:'); });
afterEach(() => { closeDb(); });

describe('send', () => {
  it('stores the sender, type and expiry', () => {
    const before = Date.now();
    const result = handleSend(config, webA, { to: 'api', subject: 'Schema changed', type: 'warning', body: 'See migration 12' });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.message.from_instance).toBe('web-a');
    expect(result.message.from_project).toBe('web');
    expect(result.message.to_target).toBe('api');
    expect(result.message.message_type).toBe('warning');
    expect(result.message.is_read).toBe(false);
    expect(result.message.expires_at).toBe(result.message.created_at + config.messageTtlMs);
    expect(result.message.created_at).toBeGreaterThanOrEqual(before);
  });

  it('defaults to info', () => {
    const result = handleSend(config, webA, { to: '@all', subject: 'hello' });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.message.message_type).toBe('info');
    expect(result.message.body).toBeNull();
  });

  it('rejects an unknown type', () => {
    const result = handleSend(config, webA, { to: '@all', subject: 'hello', type: 'shout' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error_code).toBe('INVALID_INPUT');
  });
});

describe('inbox targeting', () => {
  it('delivers broadcasts to everyone', () => {
    handleSend(config, webA, { to: '@all', subject: 'broadcast' });
    expect(inboxSubjects(webA)).toEqual(['broadcast']);
    expect(inboxSubjects(webB)).toEqual(['broadcast']);
    expect(inboxSubjects(apiA)).toEqual(['broadcast']);
  });

  it('delivers project messages to that project only', () => {
    handleSend(config, apiA, { to: 'web', subject: 'for web' });
    expect(inboxSubjects(webA)).toEqual(['for web']);
    expect(inboxSubjects(webB)).toEqual(['for web']);
    expect(inboxSubjects(apiA)).toEqual([]);
  });

  it('delivers direct messages to that instance only', () => {
    handleSend(config, apiA, { to: 'web-b', subject: 'direct' });
    expect(inboxSubjects(webA)).toEqual([]);
    expect(inboxSubjects(webB)).toEqual(['direct']);
  });

  it('orders newest first and hides expired messages', () => {
    const now = Date.now();
    const base = { from_instance: 'api-a', from_project: 'api', to_target: 'web', message_type: 'info' as const, body: null };
    insertMessage({ ...base, subject: 'old', expires_at: null }, now - 2000);
    insertMessage({ ...base, subject: 'new', expires_at: null }, now - 1000);
    insertMessage({ ...base, subject: 'expired', expires_at: now - 500 }, now - 1500);

    expect(inboxSubjects(webA)).toEqual(['new', 'old']);
  });

  it('caps the listing at the configured limit', () => {
    for (let i = 0; i < 4; i++) {
      handleSend(config, apiA, { to: 'web', subject: `m${i}` });
    }
    const limited = handleInbox({ ...config, inboxLimit: 3 }, webA);
    expect(limited.messages).toHaveLength(3);
  });

  it('hides read messages unless asked', () => {
    const sent = handleSend(config, apiA, { to: 'web-a', subject: 'read me' });
    expect(sent.success).toBe(true);
    if (!sent.success) return;
    handleRead({ message_id: sent.message.id });

    expect(inboxSubjects(webA)).toEqual([]);
    const all = handleInbox(config, webA, { include_read: true });
    expect(all.messages.map((m) => m.subject)).toEqual(['read me']);
    expect(all.messages[0].is_read).toBe(true);
  });
});

describe('read', () => {
  it('marks the message read and stays idempotent', () => {
    const sent = handleSend(config, webA, { to: 'web-b', subject: 'twice', body: 'full body' });
    expect(sent.success).toBe(true);
    if (!sent.success) return;

    const first = handleRead({ message_id: sent.message.id });
    const second = handleRead({ message_id: String(sent.message.id) });
    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    if (!second.success) return;
    expect(second.message.is_read).toBe(true);
    expect(second.message.body).toBe('full body');

    const row = getDb().prepare('SELECT is_read FROM messages WHERE id = ?').get(sent.message.id) as { is_read: number };
    expect(row.is_read).toBe(1);
  });

  it('reports unknown ids', () => {
    const result = handleRead({ message_id: 77 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error_code).toBe('MESSAGE_NOT_FOUND');
    expect(result.error).toBe('Message 77 not found');
  });

  it('rejects a non-numeric id', () => {
    const result = handleRead({ message_id: 'abc' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error_code).toBe('INVALID_INPUT');
  });
});

describe('listInbox', () => {
  it('uses the id as a tiebreak for equal timestamps', () => {
    const now = Date.now();
    const base = { from_instance: 'x', from_project: null, to_target: '@all', message_type: 'info' as const, body: null, expires_at: null };
    const first = insertMessage({ ...base, subject: 'first' }, now);
    const second = insertMessage({ ...base, subject: 'second' }, now);
    const rows = listInbox(webA, '@all', { limit: 10, now });
    expect(rows.map((m) => m.id)).toEqual([second.id, first.id]);
  });
});
