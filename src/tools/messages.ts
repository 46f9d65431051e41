import { z } from 'zod';
import type { HubConfig } from '../config.js';
import { insertMessage, listInbox, markMessageRead } from '../db.js';
import { BROADCAST_TARGET, MESSAGE_TYPES, type Identity, type Message } from '../types.js';
import { failure, parseInput, type Failure } from '../utils.js';

const SendSchema = z.object({
  to: z.string().trim().min(1, 'recipient is required'),
  subject: z.string().trim().min(1, 'subject is required'),
  type: z.enum(MESSAGE_TYPES).default('info'),
  body: z.string().optional(),
});

const ReadSchema = z.object({
  message_id: z.coerce.number().int().positive(),
});

export function handleSend(config: HubConfig, identity: Identity, args: {
  to: string;
  subject: string;
  type?: string;
  body?: string;
}): Failure | { success: true; message: Message } {
  const input = parseInput(SendSchema, args);
  if (!input.ok) return input.failure;

  const now = Date.now();
  const message = insertMessage({
    from_instance: identity.instance_id,
    from_project: identity.project,
    to_target: input.data.to,
    message_type: input.data.type,
    subject: input.data.subject,
    body: input.data.body ?? null,
    expires_at: now + config.messageTtlMs,
  }, now);
  return { success: true, message };
}

export function handleInbox(config: HubConfig, identity: Identity, args: { include_read?: boolean } = {}): {
  success: true;
  messages: Message[];
} {
  const messages = listInbox(identity, BROADCAST_TARGET, {
    include_read: args.include_read ?? false,
    limit: config.inboxLimit,
  });
  return { success: true, messages };
}

export function handleRead(args: { message_id: number | string }): Failure | { success: true; message: Message } {
  const input = parseInput(ReadSchema, args);
  if (!input.ok) return input.failure;

  const message = markMessageRead(input.data.message_id);
  if (!message) {
    return failure('MESSAGE_NOT_FOUND', `Message ${input.data.message_id} not found`);
  }
  return { success: true, message };
}
