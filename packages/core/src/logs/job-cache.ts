/**
 * Job Cache
 *
 * Local record of submitted jobs and, per job, how many bytes of its log are
 * cached locally. The compute platform has no "list jobs" endpoint, so this
 * file is also the job list. Every mutation reads the whole document and
 * rewrites it; concurrent writers race and the last one wins.
 */

import { readFile } from 'node:fs/promises';
import {
  JobStatus,
  jobCacheDocumentSchema,
  type JobCacheDocument,
  type JobRecord,
} from '@bridgeline/shared';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('logs:job-cache');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CachedJob extends JobRecord {
  job_id: string;
}

export interface NewJob {
  jobId: string;
  name: string;
  resource: string;
  command: string;
  status?: string;
  logPath?: string;
}

export interface ListJobsOptions {
  limit?: number;
  status?: string;
  statuses?: ReadonlySet<string>;
  excludeStatuses?: ReadonlySet<string>;
}

export class JobCache {
  private readonly now: () => Date;

  constructor(
    readonly path: string,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async addJob(job: NewJob): Promise<void> {
    const jobs = await this.load();
    const timestamp = this.now().toISOString();
    const record: JobRecord = {
      name: job.name,
      resource: job.resource,
      command: job.command,
      status: job.status ?? JobStatus.PENDING,
      created_at: timestamp,
      updated_at: timestamp,
    };
    if (job.logPath !== undefined) {
      record.log_path = job.logPath;
    }
    jobs[job.jobId] = record;
    await this.save(jobs);
  }

  async getJob(jobId: string): Promise<CachedJob | null> {
    const jobs = await this.load();
    const record = jobs[jobId];
    return record ? { job_id: jobId, ...record } : null;
  }

  async updateStatus(jobId: string, status: string): Promise<void> {
    const jobs = await this.load();
    const record = jobs[jobId];
    if (!record) return;
    record.status = status;
    record.updated_at = this.now().toISOString();
    await this.save(jobs);
  }

  /**
   * Newest first. `limit <= 0` means no limit.
   */
  async listJobs(options: ListJobsOptions = {}): Promise<CachedJob[]> {
    const jobs = await this.load();
    let items: CachedJob[] = Object.entries(jobs).map(([jobId, record]) => ({
      job_id: jobId,
      ...record,
    }));

    if (options.status) {
      items = items.filter((job) => job.status === options.status);
    }
    const { statuses, excludeStatuses } = options;
    if (statuses && statuses.size > 0) {
      items = items.filter((job) => statuses.has(job.status));
    }
    if (excludeStatuses && excludeStatuses.size > 0) {
      items = items.filter((job) => !excludeStatuses.has(job.status));
    }

    items.sort((a, b) => b.created_at.localeCompare(a.created_at));

    const limit = options.limit ?? 10;
    return limit > 0 ? items.slice(0, limit) : items;
  }

  async removeJob(jobId: string): Promise<boolean> {
    const jobs = await this.load();
    if (!(jobId in jobs)) return false;
    delete jobs[jobId];
    await this.save(jobs);
    return true;
  }

  async clear(): Promise<void> {
    await this.save({});
  }

  /**
   * Drop jobs created more than `maxAgeDays` whole days ago.
   */
  async prune(maxAgeDays = 30): Promise<number> {
    const jobs = await this.load();
    const now = this.now().getTime();
    let removed = 0;

    for (const [jobId, record] of Object.entries(jobs)) {
      const created = Date.parse(record.created_at);
      if (Number.isNaN(created)) continue;
      if (Math.floor((now - created) / DAY_MS) > maxAgeDays) {
        delete jobs[jobId];
        removed++;
      }
    }

    if (removed > 0) {
      await this.save(jobs);
    }
    return removed;
  }

  async getOffset(jobId: string): Promise<number> {
    const jobs = await this.load();
    return jobs[jobId]?.log_byte_offset ?? 0;
  }

  /**
   * Record the number of log bytes cached. Unknown jobs get a bare record so
   * logs of jobs submitted elsewhere can still sync incrementally.
   */
  async setOffset(jobId: string, offset: number): Promise<void> {
    const jobs = await this.load();
    const timestamp = this.now().toISOString();
    const record = jobs[jobId] ?? this.bareRecord(timestamp);
    record.log_byte_offset = offset;
    record.log_cached_at = timestamp;
    jobs[jobId] = record;
    await this.save(jobs);
  }

  async resetOffset(jobId: string): Promise<void> {
    const jobs = await this.load();
    const record = jobs[jobId];
    if (!record) return;
    record.log_byte_offset = 0;
    delete record.log_cached_at;
    await this.save(jobs);
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private bareRecord(timestamp: string): JobRecord {
    return {
      name: '',
      resource: '',
      command: '',
      status: JobStatus.PENDING,
      created_at: timestamp,
      updated_at: timestamp,
    };
  }

  private async load(): Promise<JobCacheDocument> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch {
      return {};
    }

    try {
      const parsed = jobCacheDocumentSchema.safeParse(JSON.parse(text));
      if (parsed.success) return parsed.data;
      log.warn({ path: this.path, issues: parsed.error.issues }, 'Ignoring malformed job cache');
    } catch (error) {
      log.warn({ err: error, path: this.path }, 'Ignoring unreadable job cache');
    }
    return {};
  }

  private async save(jobs: JobCacheDocument): Promise<void> {
    await writeFileAtomic(this.path, `${JSON.stringify(jobs, null, 2)}\n`);
  }
}
