/**
 * Run Poller
 *
 * Polls a dispatched workflow run until it reaches a terminal status.
 * Runs move PENDING -> queued | in_progress -> completed (success | failure);
 * some Gitea releases report `success`/`failure` directly as the status.
 */

import { isTerminalRunStatus, type RunResult, type WorkflowRun } from '@bridgeline/shared';
import { delay, throwIfAborted, type SleepFn } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';
import type { WorkflowDispatcher } from './dispatcher.js';
import { ForgeError, TimeoutError } from './errors.js';

const logger = createLogger('forge:run-poller');

// ============================================================================
// Types
// ============================================================================

export interface PollProgressEvent {
  runId: string | null;
  status: string | null;
  elapsedMs: number;
}

export interface RunPollerOptions {
  /** Fixed interval between polls (default: 3000) */
  pollIntervalMs?: number;
  /** Floor applied to every timeout (default: 5000) */
  minTimeoutMs?: number;
  now?: () => number;
  sleep?: SleepFn;
  onProgress?: (event: PollProgressEvent) => void;
}

export function toRunResult(run: WorkflowRun, fallbackRunId?: string): RunResult {
  const status = run.status ?? '';
  return {
    status,
    conclusion: run.conclusion || status,
    runId: fallbackRunId ?? String(run.id),
    htmlUrl: run.html_url ?? '',
  };
}

// ============================================================================
// Run Poller
// ============================================================================

export class RunPoller {
  private readonly pollIntervalMs: number;
  private readonly minTimeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly onProgress: ((event: PollProgressEvent) => void) | undefined;

  constructor(
    private readonly dispatcher: WorkflowDispatcher,
    options: RunPollerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 3000;
    this.minTimeoutMs = options.minTimeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
    this.onProgress = options.onProgress;
  }

  /**
   * Wait for a known run id. Returns on the first terminal observation.
   */
  async waitForCompletion(runId: string, timeoutMs: number, signal?: AbortSignal): Promise<RunResult> {
    const startTime = this.now();
    const budget = Math.max(this.minTimeoutMs, timeoutMs);

    for (;;) {
      throwIfAborted(signal);
      const elapsedMs = this.now() - startTime;
      if (elapsedMs > budget) {
        logger.warn({ runId, elapsedMs, timeoutMs: budget }, 'Workflow run timed out');
        throw new TimeoutError(
          `Workflow timed out after ${Math.round(budget / 1000)} seconds`,
          `workflow run ${runId}`,
          budget
        );
      }

      const run = await this.dispatcher.getRun(runId);
      this.onProgress?.({ runId, status: run.status ?? null, elapsedMs });

      if (isTerminalRunStatus(run.status)) {
        logger.debug({ runId, status: run.status, conclusion: run.conclusion }, 'Run completed');
        return toRunResult(run, runId);
      }

      await this.sleep(this.pollIntervalMs, signal);
    }
  }

  /**
   * Wait for the run carrying `request_id`. The run may not be listed yet,
   * and search errors only cost a tick.
   */
  async waitForRequest(requestId: string, timeoutMs: number, signal?: AbortSignal): Promise<RunResult> {
    const startTime = this.now();
    const budget = Math.max(this.minTimeoutMs, timeoutMs);

    for (;;) {
      throwIfAborted(signal);
      const elapsedMs = this.now() - startTime;
      if (elapsedMs > budget) {
        logger.warn({ requestId, elapsedMs, timeoutMs: budget }, 'Bridge action timed out');
        throw new TimeoutError(
          `Bridge action timed out after ${Math.round(budget / 1000)} seconds`,
          `request ${requestId}`,
          budget
        );
      }

      try {
        const run = await this.dispatcher.findRun({ request_id: requestId });
        this.onProgress?.({
          runId: run ? String(run.id) : null,
          status: run?.status ?? null,
          elapsedMs,
        });
        if (run && isTerminalRunStatus(run.status)) {
          logger.debug({ requestId, runId: run.id, status: run.status }, 'Request run completed');
          return toRunResult(run);
        }
      } catch (error) {
        if (!(error instanceof ForgeError)) throw error;
        logger.debug({ err: error, requestId }, 'Run search failed, will retry');
      }

      await this.sleep(this.pollIntervalMs, signal);
    }
  }
}
