/**
 * WorkflowDispatcher
 *
 * Triggers workflow_dispatch events and correlates them back to run ids.
 * Forges do not return a run id from a dispatch, so every dispatch carries
 * a unique input (request id or commit sha) and the run list is searched
 * for a run whose recorded inputs match.
 */

import {
  workflowRunListSchema,
  workflowRunSchema,
  type WorkflowInputs,
  type WorkflowRun,
  type WorkflowRunList,
} from '@bridgeline/shared';
import { z } from 'zod';
import { delay, type SleepFn } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';
import { ForgeError } from './errors.js';
import type { ForgeSession } from './session.js';

const log = createLogger('forge:dispatcher');

const eventPayloadSchema = z.object({
  inputs: z.record(z.string(), z.unknown()).default({}),
});

// ============================================================================
// Types
// ============================================================================

export interface DispatcherOptions {
  sleep?: SleepFn;
  /** Page size used when searching runs */
  pageSize?: number;
  /** Pause between a sync dispatch and the first correlation pass */
  settleDelayMs?: number;
}

export interface CorrelateOptions {
  attempts?: number;
  retryDelayMs?: number;
  limit?: number;
}

export interface LogRetrievalRequest {
  jobId: string;
  remoteLogPath: string;
  requestId: string;
  startOffset?: number;
}

export interface BridgeActionRequest {
  rawCommand: string;
  artifactPaths: string[];
  requestId: string;
  denylist?: string[];
  targetDir?: string | undefined;
}

export interface SyncRequest {
  branch: string;
  commitSha: string;
  force: boolean;
  targetDir?: string | undefined;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Request ids are `<unix seconds>-<pid>`: unique per invocation and visible
 * in the run's recorded inputs.
 */
export function newRequestId(now: number = Date.now(), pid: number = process.pid): string {
  return `${Math.floor(now / 1000)}-${pid}`;
}

export function extractTotalCount(response: WorkflowRunList): number | null {
  const total = response.total_count || response.total || response.count;
  return typeof total === 'number' && Number.isFinite(total) ? total : null;
}

export function runsOf(response: WorkflowRunList): WorkflowRun[] {
  return response.workflow_runs ?? response.runs ?? [];
}

/**
 * Dispatch inputs recorded on a run, read from its JSON event payload.
 */
export function parseEventInputs(run: WorkflowRun): Record<string, string> {
  if (!run.event_payload) return {};

  let payload: unknown;
  try {
    payload = JSON.parse(run.event_payload);
  } catch {
    return {};
  }

  const parsed = eventPayloadSchema.safeParse(payload);
  if (!parsed.success) return {};

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data.inputs)) {
    result[key] = value == null ? '' : String(value);
  }
  return result;
}

/**
 * Empty expected values are wildcards.
 */
export function matchesInputs(
  inputs: Record<string, string>,
  expected: Record<string, string>
): boolean {
  for (const [key, value] of Object.entries(expected)) {
    if (!value) continue;
    if ((inputs[key] ?? '') !== value) return false;
  }
  return true;
}

export function findRunByInputs(
  runs: readonly WorkflowRun[],
  expected: Record<string, string>
): WorkflowRun | null {
  for (const run of runs) {
    const inputs = parseEventInputs(run);
    if (Object.keys(inputs).length === 0) continue;
    if (matchesInputs(inputs, expected)) return run;
  }
  return null;
}

// ============================================================================
// Dispatcher
// ============================================================================

export class WorkflowDispatcher {
  private readonly sleep: SleepFn;
  private readonly pageSize: number;
  private readonly settleDelayMs: number;

  constructor(
    private readonly session: ForgeSession,
    options: DispatcherOptions = {}
  ) {
    this.sleep = options.sleep ?? delay;
    this.pageSize = options.pageSize ?? 20;
    this.settleDelayMs = options.settleDelayMs ?? 2000;
  }

  async trigger(workflowFile: string, inputs: WorkflowInputs, ref = 'main'): Promise<void> {
    const url = `${this.session.apiBase}/workflows/${workflowFile}/dispatches`;
    log.debug({ workflowFile, inputs }, 'Dispatching workflow');

    try {
      await this.session.client.requestJSON('POST', url, { ref, inputs });
    } catch (error) {
      if (error instanceof ForgeError) {
        throw new ForgeError(`Failed to trigger workflow: ${error.message}`, {
          url,
          cause: error,
          ...(error.statusCode === undefined ? {} : { statusCode: error.statusCode }),
        });
      }
      throw error;
    }
  }

  async listRunsPage(limit: number, page: number): Promise<WorkflowRunList> {
    const body = await this.session.client.requestJSON('GET', this.session.runsUrl(limit, page));
    const parsed = workflowRunListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ForgeError(`Unexpected run list response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async listRuns(limit = this.pageSize): Promise<WorkflowRun[]> {
    try {
      return runsOf(await this.listRunsPage(limit, 1));
    } catch (error) {
      if (error instanceof ForgeError) {
        throw new ForgeError(`Failed to get workflow runs: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  async getRun(runId: string): Promise<WorkflowRun> {
    const url = `${this.session.apiBase}/runs/${runId}`;
    let body: unknown;
    try {
      body = await this.session.client.requestJSON('GET', url);
    } catch (error) {
      if (error instanceof ForgeError) {
        throw new ForgeError(`Failed to get workflow run: ${error.message}`, {
          url,
          cause: error,
          ...(error.statusCode === undefined ? {} : { statusCode: error.statusCode }),
        });
      }
      throw error;
    }

    const parsed = workflowRunSchema.safeParse(body);
    if (!parsed.success) {
      throw new ForgeError(`Unexpected run response for ${runId}: ${parsed.error.message}`, { url });
    }
    return parsed.data;
  }

  /**
   * One search pass: the first page, then the last page when the run count
   * exceeds one page (some forges list oldest first).
   */
  async findRun(expected: Record<string, string>, limit = this.pageSize): Promise<WorkflowRun | null> {
    const first = await this.listRunsPage(limit, 1);
    const match = findRunByInputs(runsOf(first), expected);
    if (match) return match;

    const total = extractTotalCount(first);
    if (total !== null && total > limit) {
      const lastPage = Math.ceil(total / limit);
      log.debug({ total, lastPage }, 'Checking last page of runs');
      const last = await this.listRunsPage(limit, lastPage);
      return findRunByInputs(runsOf(last), expected);
    }
    return null;
  }

  /**
   * Repeat `findRun` a few times. Returns the run id, or '' when nothing
   * matched; API errors during a pass are not fatal.
   */
  async correlate(expected: Record<string, string>, options: CorrelateOptions = {}): Promise<string> {
    const attempts = options.attempts ?? 3;
    const retryDelayMs = options.retryDelayMs ?? 1000;
    const limit = options.limit ?? this.pageSize;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const run = await this.findRun(expected, limit);
        if (run) {
          log.debug({ runId: run.id, attempt }, 'Correlated workflow run');
          return String(run.id);
        }
      } catch (error) {
        if (!(error instanceof ForgeError)) throw error;
        log.warn({ err: error, attempt }, 'Run search failed');
      }

      if (attempt < attempts) {
        await this.sleep(retryDelayMs);
      }
    }
    return '';
  }

  async triggerLogRetrieval(request: LogRetrievalRequest): Promise<void> {
    await this.trigger(this.session.workflows.log, {
      job_id: request.jobId,
      remote_log_path: request.remoteLogPath,
      request_id: request.requestId,
      start_offset: String(request.startOffset ?? 0),
    });
  }

  async triggerBridgeAction(request: BridgeActionRequest): Promise<void> {
    await this.trigger(this.session.workflows.bridge, {
      raw_command: request.rawCommand,
      denylist: (request.denylist ?? []).join('\n'),
      target_dir: request.targetDir ?? '',
      artifact_paths: request.artifactPaths.join('\n'),
      request_id: request.requestId,
    });
  }

  /**
   * Dispatch a code sync and return its run id ('' if it could not be found).
   */
  async triggerSync(request: SyncRequest): Promise<string> {
    const inputs: WorkflowInputs = {
      branch: request.branch,
      commit_sha: request.commitSha,
      force: request.force ? 'true' : 'false',
      target_dir: request.targetDir ?? '',
    };
    await this.trigger(this.session.workflows.sync, inputs);
    await this.sleep(this.settleDelayMs);
    return this.correlate(inputs);
  }
}
