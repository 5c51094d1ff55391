import path from 'node:path';
import { z } from 'zod';

/**
 * Account lifecycle configuration
 * Statuses, requester roles and deletion tuning knobs
 */

export const ACCOUNT_STATUSES = {
  ACTIVE: 'active',
  PENDING_DELETION: 'pending_deletion',
  DELETED: 'deleted',
} as const;

export const ACCOUNT_ROLES = {
  USER: 'user',
  ADMIN: 'admin',
} as const;

export const REQUESTER_ROLES = {
  ...ACCOUNT_ROLES,
  SERVICE: 'service',
} as const;

export type AccountStatus =
  (typeof ACCOUNT_STATUSES)[keyof typeof ACCOUNT_STATUSES];
export type AccountRole = (typeof ACCOUNT_ROLES)[keyof typeof ACCOUNT_ROLES];
export type RequesterRole =
  (typeof REQUESTER_ROLES)[keyof typeof REQUESTER_ROLES];

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const deletionEnvSchema = z.object({
  ACCOUNT_DELETION_LEASE_TTL_MS: positiveInt(5 * 60 * 1000),
  ACCOUNT_DELETION_RETRY_CRON: z.string().min(1).default('*/10 * * * *'),
  ACCOUNT_DELETION_STALE_MINUTES: positiveInt(15),
  ACCOUNT_DELETION_SWEEP_BATCH: positiveInt(50),
  UPLOADS_DIR: z.string().min(1).optional(),
  GRAPHS_DIR: z.string().min(1).optional(),
});

export type AccountDeletionConfig = {
  /** How long a deletion run may hold an account before others may take over */
  leaseTtlMs: number;
  retryCron: string;
  /** Pending deletions older than this are picked up by the retry sweeper */
  staleAfterMinutes: number;
  sweepBatchSize: number;
  uploadsDir: string;
  graphsDir: string;
};

export function loadAccountDeletionConfig(
  env: NodeJS.ProcessEnv = process.env
): AccountDeletionConfig {
  const parsed = deletionEnvSchema.parse(env);
  const dataDir = path.join(process.cwd(), 'data');

  return {
    leaseTtlMs: parsed.ACCOUNT_DELETION_LEASE_TTL_MS,
    retryCron: parsed.ACCOUNT_DELETION_RETRY_CRON,
    staleAfterMinutes: parsed.ACCOUNT_DELETION_STALE_MINUTES,
    sweepBatchSize: parsed.ACCOUNT_DELETION_SWEEP_BATCH,
    uploadsDir: path.resolve(parsed.UPLOADS_DIR ?? path.join(dataDir, 'uploads')),
    graphsDir: path.resolve(parsed.GRAPHS_DIR ?? path.join(dataDir, 'graphs')),
  };
}
