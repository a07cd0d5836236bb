/**
 * Job status sources
 *
 * The follow loops only need "what is this job's status right now". The
 * compute platform's API is out of reach here, so the CLI reads the job
 * cache that the submission side keeps current.
 */

import type { JobCache } from '../logs/job-cache.js';

export interface JobStatusSource {
  getStatus(jobId: string): Promise<string | null>;
}

export class CachedJobStatusSource implements JobStatusSource {
  constructor(private readonly jobCache: JobCache) {}

  async getStatus(jobId: string): Promise<string | null> {
    const job = await this.jobCache.getJob(jobId);
    return job?.status ?? null;
  }
}
