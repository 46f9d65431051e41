import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Identity } from './types.js';

const IdentitySchema = z.object({
  instance_id: z.string().min(1),
  project: z.string().min(1),
});

export function saveIdentity(identityFile: string, identity: Identity): void {
  fs.mkdirSync(path.dirname(identityFile), { recursive: true });
  fs.writeFileSync(identityFile, JSON.stringify(identity));
}

export function loadIdentity(identityFile: string): Identity | null {
  if (!fs.existsSync(identityFile)) return null;
  let decoded: unknown;
  try {
    decoded = JSON.parse(fs.readFileSync(identityFile, 'utf8'));
  } catch {
    return null;
  }
  const parsed = IdentitySchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

export function clearIdentity(identityFile: string): boolean {
  if (!fs.existsSync(identityFile)) return false;
  fs.unlinkSync(identityFile);
  return true;
}
