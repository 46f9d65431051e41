import type { z } from 'zod';

export type ErrorCode =
  | 'NOT_REGISTERED'
  | 'INSTANCE_NOT_FOUND'
  | 'MESSAGE_NOT_FOUND'
  | 'TASK_NOT_AVAILABLE'
  | 'TASK_NOT_FOUND'
  | 'TASK_NOT_ACTIVE'
  | 'TASK_NOT_CLAIMED_BY_CALLER'
  | 'MEMORY_NOT_FOUND'
  | 'NOTHING_TO_UPDATE'
  | 'ROLE_NOT_FOUND'
  | 'INVALID_INPUT';

export interface Failure {
  success: false;
  error_code: ErrorCode;
  error: string;
}

export function failure(errorCode: ErrorCode, error: string): Failure {
  return { success: false, error_code: errorCode, error };
}

export function isFailure(value: object): value is Failure {
  return 'success' in value && value.success === false;
}

export function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function preview(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): { ok: true; data: z.infer<S> } | { ok: false; failure: Failure } {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { ok: false, failure: failure('INVALID_INPUT', `${field}${issue ? issue.message : 'invalid input'}`) };
}
