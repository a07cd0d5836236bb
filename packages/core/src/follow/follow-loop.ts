/**
 * Follow Loop
 *
 * "tail -f" for a remote job log. The direct path streams over SSH. The
 * mediated path re-fetches the whole log every interval, since an
 * incremental fetch can miss data when the remote side rotates or rewrites
 * the file, and shows only the bytes the user has not seen yet.
 */

import { readFile } from 'node:fs/promises';
import { isTerminalJobStatus } from '@bridgeline/shared';
import type { JobStatusSource } from '../jobs/status.js';
import type { JobCache } from '../logs/job-cache.js';
import type { LogSync } from '../logs/log-sync.js';
import { TunnelError } from '../tunnel/errors.js';
import type { SshTunnelTransport } from '../tunnel/ssh-transport.js';
import { AbortError, delay, type SleepFn } from '../utils/delay.js';
import { fileExists } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('follow');

// ============================================================================
// Types
// ============================================================================

export type FollowEvent =
  | { type: 'initial_content'; text: string }
  | { type: 'new_content'; text: string; bytesAdded: number }
  | { type: 'final_content'; text: string }
  | { type: 'warning'; message: string }
  | { type: 'job_completed'; status: string };

export interface FollowLoopDeps {
  /** A provider is called on the first mediated follow only */
  logSync: LogSync | (() => LogSync);
  jobCache: JobCache;
  statusSource: JobStatusSource;
  sleep?: SleepFn;
}

export interface MediatedFollowOptions {
  jobId: string;
  remoteLogPath: string;
  refresh?: boolean;
  /** Between re-fetches (default: 30000) */
  intervalMs?: number;
  /** Wait after a terminal status before the last fetch (default: 5000) */
  graceMs?: number;
  signal?: AbortSignal;
  onEvent: (event: FollowEvent) => void;
}

export interface DirectFollowOptions {
  jobId: string;
  remoteLogPath: string;
  bridgeName?: string | undefined;
  tailLines?: number;
  /** How long to wait for the log file to appear; 0 skips the wait (default: 300000) */
  waitForFileMs?: number;
  signal?: AbortSignal;
  onEvent: (event: FollowEvent) => void;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Follow Loop
// ============================================================================

export class FollowLoop {
  private readonly logSyncSource: LogSync | (() => LogSync);
  private resolvedLogSync: LogSync | null = null;
  private readonly jobCache: JobCache;
  private readonly statusSource: JobStatusSource;
  private readonly sleep: SleepFn;

  constructor(deps: FollowLoopDeps) {
    this.logSyncSource = deps.logSync;
    this.jobCache = deps.jobCache;
    this.statusSource = deps.statusSource;
    this.sleep = deps.sleep ?? delay;
  }

  private get logSync(): LogSync {
    if (!this.resolvedLogSync) {
      const source = this.logSyncSource;
      this.resolvedLogSync = typeof source === 'function' ? source() : source;
    }
    return this.resolvedLogSync;
  }

  /**
   * Stream the log over SSH until the job ends or the caller aborts. A job
   * that has not started writing yet is waited for before the stream opens.
   */
  async followDirect(tunnel: SshTunnelTransport, options: DirectFollowOptions): Promise<string | null> {
    const waitForFileMs = options.waitForFileMs ?? 300000;
    if (waitForFileMs > 0) {
      const ready = await tunnel.waitForRemoteFile(options.remoteLogPath, waitForFileMs, {
        bridgeName: options.bridgeName,
        ...(options.signal ? { signal: options.signal } : {}),
      });
      if (!ready) {
        if (options.signal?.aborted) return null;
        throw new TunnelError(
          `Log file did not appear within ${Math.round(waitForFileMs / 1000)}s: ${options.remoteLogPath}`
        );
      }
    }

    const status = await tunnel.followRemoteFile(options.remoteLogPath, {
      bridgeName: options.bridgeName,
      jobId: options.jobId,
      statusSource: this.statusSource,
      onLine: (line) => options.onEvent({ type: 'new_content', text: `${line}\n`, bytesAdded: Buffer.byteLength(line) + 1 }),
      ...(options.tailLines === undefined ? {} : { tailLines: options.tailLines }),
      ...(options.signal ? { signal: options.signal } : {}),
    });
    if (status) {
      options.onEvent({ type: 'job_completed', status });
    }
    return status;
  }

  /**
   * Poll through workflows until the job ends. Per-iteration failures are
   * reported as warnings and the loop keeps going.
   *
   * @returns the terminal job status, or null when aborted
   */
  async followMediated(options: MediatedFollowOptions): Promise<string | null> {
    const { jobId, remoteLogPath, signal, onEvent } = options;
    const intervalMs = options.intervalMs ?? 30000;
    const graceMs = options.graceMs ?? 5000;

    try {
      const cachePath = await this.logSync.cachePathFor(jobId);
      if (options.refresh || !(await fileExists(cachePath))) {
        await this.logSync.fetchFull(jobId, remoteLogPath, cachePath, signal);
      }

      const initial = await readFile(cachePath);
      if (initial.length > 0) {
        onEvent({ type: 'initial_content', text: initial.toString('utf-8') });
      }
      let lastDisplayed = initial.length;
      await this.jobCache.setOffset(jobId, lastDisplayed);

      const emitDelta = async (type: 'new_content' | 'final_content'): Promise<void> => {
        const content = await readFile(cachePath);
        if (content.length < lastDisplayed) {
          onEvent({ type: 'warning', message: 'Remote log shrank; it may have been rotated' });
          lastDisplayed = content.length;
          return;
        }
        if (content.length === lastDisplayed) return;

        const text = content.subarray(lastDisplayed).toString('utf-8');
        const bytesAdded = content.length - lastDisplayed;
        lastDisplayed = content.length;
        onEvent(type === 'new_content' ? { type, text, bytesAdded } : { type, text });
      };

      for (;;) {
        await this.sleep(intervalMs, signal);

        try {
          await this.logSync.fetchFull(jobId, remoteLogPath, cachePath, signal);
          await emitDelta('new_content');
        } catch (error) {
          if (error instanceof AbortError) throw error;
          log.debug({ err: error, jobId }, 'Follow fetch failed');
          onEvent({ type: 'warning', message: `Fetch failed: ${describe(error)}` });
        }

        let status: string | null = null;
        try {
          status = await this.statusSource.getStatus(jobId);
        } catch (error) {
          onEvent({ type: 'warning', message: `Status check failed: ${describe(error)}` });
        }

        if (isTerminalJobStatus(status) && status) {
          await this.sleep(graceMs, signal);
          try {
            await this.logSync.fetchFull(jobId, remoteLogPath, cachePath, signal);
            await emitDelta('final_content');
          } catch (error) {
            if (error instanceof AbortError) throw error;
            onEvent({ type: 'warning', message: `Final fetch failed: ${describe(error)}` });
          }
          onEvent({ type: 'job_completed', status });
          return status;
        }
      }
    } catch (error) {
      if (error instanceof AbortError) {
        log.debug({ jobId }, 'Follow cancelled');
        return null;
      }
      throw error;
    }
  }
}
