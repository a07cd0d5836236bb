/**
 * Log Sync
 *
 * Keeps `<cacheDir>/<jobId>.log` in step with a remote, still-growing log
 * using the mediated transport. The cached file is an append-only prefix of
 * the remote log; the stored byte offset always equals its size after a
 * successful fetch.
 */

import { appendFile, mkdir, readFile, readdir, rename, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { LogSyncMode, type LogSyncResult } from '@bridgeline/shared';
import type { ArtifactRetriever } from '../forge/artifacts.js';
import { newRequestId, type WorkflowDispatcher } from '../forge/dispatcher.js';
import { fileExists, fileSize } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import type { JobCache } from './job-cache.js';

const log = createLogger('logs:sync');

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Types
// ============================================================================

export interface LogSyncOptions {
  cacheDir: string;
  jobCache: JobCache;
  dispatcher: WorkflowDispatcher;
  artifacts: ArtifactRetriever;
  /** How long to wait for the log to be published */
  timeoutMs: number;
  pruneMaxAgeDays?: number;
  requestIdFactory?: () => string;
  pid?: number;
}

export interface SyncOptions {
  refresh?: boolean;
  signal?: AbortSignal;
}

// ============================================================================
// Pruning
// ============================================================================

/**
 * Delete cached `*.log` files not modified within the window. Never throws.
 */
export async function pruneOldLogs(
  cacheDir: string,
  maxAgeDays = 7,
  now: number = Date.now()
): Promise<number> {
  let names: string[];
  try {
    names = await readdir(cacheDir);
  } catch {
    return 0;
  }

  const maxAgeMs = maxAgeDays * DAY_MS;
  let removed = 0;
  for (const name of names) {
    if (!name.endsWith('.log')) continue;
    const path = join(cacheDir, name);
    try {
      const info = await stat(path);
      if (!info.isFile() || now - info.mtimeMs <= maxAgeMs) continue;
      await rm(path, { force: true });
      removed++;
    } catch (error) {
      log.warn({ err: error, path }, 'Failed to prune cached log');
    }
  }

  if (removed > 0) {
    log.debug({ cacheDir, removed }, 'Pruned old cached logs');
  }
  return removed;
}

// ============================================================================
// Log Sync
// ============================================================================

export class LogSync {
  private readonly cacheDir: string;
  private readonly jobCache: JobCache;
  private readonly dispatcher: WorkflowDispatcher;
  private readonly artifacts: ArtifactRetriever;
  private readonly timeoutMs: number;
  private readonly pruneMaxAgeDays: number;
  private readonly requestIdFactory: () => string;
  private readonly pid: number;

  constructor(options: LogSyncOptions) {
    this.cacheDir = options.cacheDir;
    this.jobCache = options.jobCache;
    this.dispatcher = options.dispatcher;
    this.artifacts = options.artifacts;
    this.timeoutMs = options.timeoutMs;
    this.pruneMaxAgeDays = options.pruneMaxAgeDays ?? 7;
    this.requestIdFactory = options.requestIdFactory ?? (() => newRequestId());
    this.pid = options.pid ?? process.pid;
  }

  /**
   * Cache path for a job, creating the cache directory. A file left under
   * the older `job-<id>.log` name is moved into place.
   */
  async cachePathFor(jobId: string): Promise<string> {
    await mkdir(this.cacheDir, { recursive: true });
    const path = join(this.cacheDir, `${jobId}.log`);
    const legacy = join(this.cacheDir, `job-${jobId}.log`);
    if (!(await fileExists(path)) && (await fileExists(legacy))) {
      try {
        await rename(legacy, path);
        log.debug({ jobId }, 'Migrated legacy cache file');
      } catch (error) {
        log.warn({ err: error, jobId }, 'Could not migrate legacy cache file');
        return legacy;
      }
    }
    return path;
  }

  /**
   * Bring the local cache up to date: incremental when a consistent prefix
   * is already cached, full otherwise.
   */
  async sync(jobId: string, remoteLogPath: string, options: SyncOptions = {}): Promise<LogSyncResult> {
    const cachePath = await this.cachePathFor(jobId);

    let offset = 0;
    if (options.refresh) {
      await this.jobCache.resetOffset(jobId);
    } else {
      offset = await this.jobCache.getOffset(jobId);
    }

    if (offset > 0) {
      const size = await fileSize(cachePath);
      if (size !== offset) {
        log.info({ jobId, offset, size }, 'Cache does not match stored offset, refetching');
        await this.jobCache.resetOffset(jobId);
        offset = 0;
      }
    }

    if (offset > 0) {
      return this.fetchIncremental(jobId, remoteLogPath, cachePath, offset, options.signal);
    }
    return this.fetchFull(jobId, remoteLogPath, cachePath, options.signal);
  }

  /**
   * Force the next sync to replace the cache.
   */
  async reset(jobId: string): Promise<void> {
    await this.jobCache.resetOffset(jobId);
  }

  async fetchFull(
    jobId: string,
    remoteLogPath: string,
    cachePath: string,
    signal?: AbortSignal
  ): Promise<LogSyncResult> {
    const bytes = await this.download(jobId, remoteLogPath, 0, cachePath, false, signal);
    const offset = await this.commit(jobId, cachePath);
    return {
      cachePath,
      mode: LogSyncMode.FULL,
      bytesAdded: bytes,
      offset,
      noNewContent: bytes === 0,
    };
  }

  async fetchIncremental(
    jobId: string,
    remoteLogPath: string,
    cachePath: string,
    startOffset: number,
    signal?: AbortSignal
  ): Promise<LogSyncResult> {
    const bytes = await this.download(jobId, remoteLogPath, startOffset, cachePath, true, signal);
    const offset = await this.commit(jobId, cachePath);
    if (bytes === 0) {
      log.debug({ jobId, offset }, 'No new log content');
    }
    return {
      cachePath,
      mode: LogSyncMode.INCREMENTAL,
      bytesAdded: bytes,
      offset,
      noNewContent: bytes === 0,
    };
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * Dispatch a retrieval from `startOffset` into a temp file, then append it
   * to (or replace) the cache. The temp file never outlives the call.
   */
  private async download(
    jobId: string,
    remoteLogPath: string,
    startOffset: number,
    cachePath: string,
    append: boolean,
    signal?: AbortSignal
  ): Promise<number> {
    const requestId = this.requestIdFactory();
    await this.dispatcher.triggerLogRetrieval({ jobId, remoteLogPath, requestId, startOffset });

    const tempPath = join(this.cacheDir, `${jobId}.tmp.${this.pid}`);
    try {
      await this.artifacts.waitForLogArtifact(jobId, requestId, tempPath, this.timeoutMs, signal);
      const bytes = (await fileSize(tempPath)) ?? 0;

      if (append && startOffset > 0 && (await fileExists(cachePath))) {
        if (bytes > 0) {
          await appendFile(cachePath, await readFile(tempPath));
        }
      } else if (bytes > 0 || (!append && !(await fileExists(cachePath)))) {
        // An empty fetch never replaces an existing cache
        await rename(tempPath, cachePath);
      }

      log.debug({ jobId, requestId, startOffset, bytes }, 'Log chunk fetched');
      return bytes;
    } finally {
      await rm(tempPath, { force: true });
    }
  }

  /**
   * Store the real cache size as the offset and prune stale logs.
   */
  private async commit(jobId: string, cachePath: string): Promise<number> {
    const size = (await fileSize(cachePath)) ?? 0;
    await this.jobCache.setOffset(jobId, size);
    await pruneOldLogs(this.cacheDir, this.pruneMaxAgeDays);
    return size;
  }
}
