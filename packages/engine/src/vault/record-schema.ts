/**
 * Credential record schemas
 * Input validation at the engine boundary and shape checks on decrypted payloads.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/vault-errors';
import type { CredentialFields, CredentialRecord, CredentialUpdate, VaultPayload } from '../types';

const MAX_TAGS = 50;
const MAX_TAG_LENGTH = 100;

const TagSchema = z.string().trim().min(1).max(MAX_TAG_LENGTH);

export const CredentialFieldsSchema = z
  .object({
    serviceName: z.string().trim().min(1).max(256),
    username: z.string().max(256),
    secret: z.string().min(1).max(10_000),
    url: z.string().max(2048).nullable().optional(),
    notes: z.string().max(10_000).nullable().optional(),
    tags: z.array(TagSchema).max(MAX_TAGS).optional(),
  })
  .strict();

export const CredentialUpdateSchema = CredentialFieldsSchema.partial()
  .strict()
  .refine(update => Object.keys(update).length > 0, { message: 'Update must change at least one field' });

export const CredentialRecordSchema = z.object({
  id: z.string().min(1),
  serviceName: z.string(),
  username: z.string(),
  secret: z.string(),
  url: z.string().nullable(),
  notes: z.string().nullable(),
  tags: z.array(z.string()),
  createdAt: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
});

export const VaultPayloadSchema = z.object({
  version: z.literal(1),
  createdAt: z.number().int().nonnegative(),
  records: z.array(CredentialRecordSchema),
});

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/** Tags behave as a set: first occurrence wins */
export function normalizeTags(tags: readonly string[]): string[] {
  return Array.from(new Set(tags.map(tag => tag.trim())));
}

/**
 * @throws ValidationError
 */
export function parseCredentialFields(input: unknown): CredentialFields {
  const parsed = CredentialFieldsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid credential fields', issuesOf(parsed.error));
  }
  return parsed.data;
}

/**
 * @throws ValidationError
 */
export function parseCredentialUpdate(input: unknown): CredentialUpdate {
  const parsed = CredentialUpdateSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid credential update', issuesOf(parsed.error));
  }
  return parsed.data;
}

/**
 * Validate a decrypted payload. Returns null rather than throwing so callers
 * choose which error the caller gets to see.
 */
export function parseVaultPayload(input: unknown): VaultPayload | null {
  const parsed = VaultPayloadSchema.safeParse(input);
  return parsed.success ? parsed.data : null;
}

export function parseCredentialRecords(input: unknown): CredentialRecord[] | null {
  const parsed = z.array(CredentialRecordSchema).safeParse(input);
  return parsed.success ? parsed.data : null;
}
