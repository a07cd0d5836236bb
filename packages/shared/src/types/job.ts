import { z } from 'zod';

// Job statuses as reported by the compute platform (both spellings occur)
export const JobStatus = {
  PENDING: 'PENDING',
  RUNNING: 'RUNNING',
  SUCCEEDED: 'SUCCEEDED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
  JOB_PENDING: 'job_pending',
  JOB_RUNNING: 'job_running',
  JOB_SUCCEEDED: 'job_succeeded',
  JOB_FAILED: 'job_failed',
  JOB_CANCELLED: 'job_cancelled',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

export const TERMINAL_JOB_STATUSES: readonly string[] = [
  JobStatus.SUCCEEDED,
  JobStatus.FAILED,
  JobStatus.CANCELLED,
  JobStatus.JOB_SUCCEEDED,
  JobStatus.JOB_FAILED,
  JobStatus.JOB_CANCELLED,
];

export function isTerminalJobStatus(status: string | null | undefined): boolean {
  return status != null && TERMINAL_JOB_STATUSES.includes(status);
}

/**
 * Expand a user-facing status filter to every spelling the platform may use.
 */
export function expandStatusAliases(statuses: readonly string[]): Set<string> {
  const expanded = new Set<string>();
  for (const raw of statuses) {
    const status = raw.trim();
    if (!status) continue;
    const upper = status.replace(/^job_/i, '').toUpperCase();
    expanded.add(status);
    expanded.add(upper);
    expanded.add(`job_${upper.toLowerCase()}`);
  }
  return expanded;
}

export const jobRecordSchema = z
  .object({
    name: z.string().default(''),
    resource: z.string().default(''),
    command: z.string().default(''),
    status: z.string().default(JobStatus.PENDING),
    created_at: z.string(),
    updated_at: z.string().optional(),
    log_path: z.string().optional(),
    log_byte_offset: z.number().int().min(0).optional(),
    log_cached_at: z.string().optional(),
  })
  .passthrough();

export type JobRecord = z.infer<typeof jobRecordSchema>;

export const jobCacheDocumentSchema = z.record(z.string(), jobRecordSchema);

export type JobCacheDocument = z.infer<typeof jobCacheDocumentSchema>;
