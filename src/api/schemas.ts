/**
 * Zod schemas for everything that crosses a trust boundary: server response
 * bodies and rows read back from local storage.
 */

import { z } from 'zod';
import type {
  ActionKind,
  Application,
  ApplicationAuditEntry,
  AuthSession,
  JobCard,
  QueuedAction
} from '../types';

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

// Queued actions (local storage)
export const actionKindSchema: z.ZodType<ActionKind, z.ZodTypeDef, unknown> = z.discriminatedUnion(
  'type',
  [
    z.object({
      type: z.literal('swipe'),
      jobId: z.string().min(1),
      direction: z.enum(['left', 'right'])
    }),
    z.object({
      type: z.literal('save_job'),
      jobId: z.string().min(1),
      saved: z.boolean()
    })
  ]
);

export const queuedActionSchema: z.ZodType<QueuedAction, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  kind: actionKindSchema,
  createdAt: z.string()
});

// Auth
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: nullableString,
  token_type: z.string().optional()
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

// Jobs
export const jobCardSchema: z.ZodType<JobCard, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  title: z.string(),
  company: z.string(),
  location: nullableString,
  snippet: nullableString,
  score: z.number(),
  apply_url: nullableString
});

export const jobFeedSchema = z.array(jobCardSchema);

// Applications
export const applicationSchema: z.ZodType<Application, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  job_id: z.string(),
  status: z.string(),
  attempt_count: z.number().int(),
  last_error: nullableString,
  assigned_worker: nullableString,
  created_at: z.string(),
  updated_at: z.string()
});

export const applicationListSchema = z.array(applicationSchema);

export const applicationAuditEntrySchema: z.ZodType<ApplicationAuditEntry, z.ZodTypeDef, unknown> =
  z.object({
    id: z.string(),
    step: z.string(),
    payload: z.record(z.unknown()).default({}),
    artifacts: z.record(z.unknown()).default({}),
    timestamp: z.string()
  });

export const applicationAuditSchema = z.array(applicationAuditEntrySchema);

// Stored session (decrypted payload)
export const authSessionSchema: z.ZodType<AuthSession, z.ZodTypeDef, unknown> = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).nullable()
});
