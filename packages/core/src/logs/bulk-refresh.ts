/**
 * Refresh cached logs for many jobs at once. One failing job does not stop
 * the batch; credential problems do.
 */

import { expandStatusAliases } from '@bridgeline/shared';
import { ForgeAuthError } from '../forge/errors.js';
import { createLogger } from '../utils/logger.js';
import type { JobCache } from './job-cache.js';
import type { LogSync } from './log-sync.js';

const log = createLogger('logs:bulk');

export interface BulkRefreshOptions {
  statuses?: readonly string[];
  /** Max jobs considered; 0 means all */
  limit?: number;
  refresh?: boolean;
  signal?: AbortSignal;
}

export interface BulkRefreshResult {
  updated: Array<{ jobId: string; cachePath: string; bytesAdded: number }>;
  errors: Array<{ jobId: string; error: string }>;
  skippedNoLogPath: string[];
  processed: number;
  statusFilter: string[];
}

export async function bulkRefreshLogs(
  jobCache: JobCache,
  logSync: LogSync,
  options: BulkRefreshOptions = {}
): Promise<BulkRefreshResult> {
  const statusFilter = expandStatusAliases(options.statuses ?? []);
  const jobs = await jobCache.listJobs({ limit: options.limit ?? 0, statuses: statusFilter });

  const result: BulkRefreshResult = {
    updated: [],
    errors: [],
    skippedNoLogPath: [],
    processed: jobs.length,
    statusFilter: [...statusFilter].sort(),
  };

  for (const job of jobs) {
    if (options.signal?.aborted) break;

    if (!job.log_path) {
      result.skippedNoLogPath.push(job.job_id);
      continue;
    }

    const syncOptions: { refresh: boolean; signal?: AbortSignal } = { refresh: options.refresh ?? false };
    if (options.signal) syncOptions.signal = options.signal;

    try {
      const synced = await logSync.sync(job.job_id, job.log_path, syncOptions);
      result.updated.push({ jobId: job.job_id, cachePath: synced.cachePath, bytesAdded: synced.bytesAdded });
    } catch (error) {
      if (error instanceof ForgeAuthError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ jobId: job.job_id, err: error }, 'Log refresh failed');
      result.errors.push({ jobId: job.job_id, error: message });
    }
  }

  return result;
}
