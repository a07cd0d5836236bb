/**
 * Mediated Transport
 *
 * Carries out remote operations by dispatching workflows on the forge and
 * collecting their results. Slow (tens of seconds) but needs nothing beyond
 * forge credentials.
 */

import { TransportMethod, type ExecResult, type LogSyncResult, type SyncResult } from '@bridgeline/shared';
import type { ArtifactRetriever } from '../forge/artifacts.js';
import { newRequestId, type WorkflowDispatcher } from '../forge/dispatcher.js';
import type { RunPoller } from '../forge/run-poller.js';
import { ForgeError } from '../forge/errors.js';
import type { LogSync } from '../logs/log-sync.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('transport:mediated');

export interface MediatedExecRequest {
  /** Fully composed command (env exports included) */
  command: string;
  targetDir?: string | undefined;
  denylist: string[];
  artifactPaths: string[];
  downloadDir?: string | undefined;
  wait: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface MediatedSyncRequest {
  branch: string;
  commitSha: string;
  force: boolean;
  targetDir?: string | undefined;
  wait: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface MediatedDeps {
  dispatcher: WorkflowDispatcher;
  poller: RunPoller;
  artifacts: ArtifactRetriever;
  logSync: LogSync;
  requestIdFactory?: () => string;
}

export class MediatedTransport {
  private readonly dispatcher: WorkflowDispatcher;
  private readonly poller: RunPoller;
  private readonly artifacts: ArtifactRetriever;
  readonly logSync: LogSync;
  private readonly requestIdFactory: () => string;

  constructor(deps: MediatedDeps) {
    this.dispatcher = deps.dispatcher;
    this.poller = deps.poller;
    this.artifacts = deps.artifacts;
    this.logSync = deps.logSync;
    this.requestIdFactory = deps.requestIdFactory ?? (() => newRequestId());
  }

  async exec(request: MediatedExecRequest): Promise<ExecResult> {
    const requestId = this.requestIdFactory();
    await this.dispatcher.triggerBridgeAction({
      rawCommand: request.command,
      artifactPaths: request.artifactPaths,
      requestId,
      denylist: request.denylist,
      targetDir: request.targetDir,
    });
    log.info({ requestId }, 'Bridge action dispatched');

    if (!request.wait) {
      return { method: TransportMethod.WORKFLOW, waited: false, exitCode: 0, stdout: '', stderr: '', requestId };
    }

    const run = await this.poller.waitForRequest(requestId, request.timeoutMs, request.signal);
    const output = await this.artifacts.fetchBridgeOutputLog(requestId).catch((error: unknown) => {
      log.warn({ err: error, requestId }, 'Could not fetch bridge output');
      return null;
    });

    const result: ExecResult = {
      method: TransportMethod.WORKFLOW,
      waited: true,
      exitCode: run.conclusion === 'success' ? 0 : 1,
      stdout: output ?? '',
      stderr: '',
      requestId,
      runId: run.runId,
      htmlUrl: run.htmlUrl,
      conclusion: run.conclusion,
    };

    if (request.downloadDir && result.exitCode === 0) {
      try {
        await this.artifacts.downloadBridgeArtifact(requestId, request.downloadDir);
        result.downloadedTo = request.downloadDir;
      } catch (error) {
        if (error instanceof ForgeError) {
          throw new ForgeError(`Artifact download failed: ${error.message}`, { cause: error });
        }
        throw error;
      }
    }
    return result;
  }

  async fetchLog(
    jobId: string,
    remoteLogPath: string,
    options: { refresh?: boolean; signal?: AbortSignal } = {}
  ): Promise<LogSyncResult> {
    return this.logSync.sync(jobId, remoteLogPath, options);
  }

  async sync(request: MediatedSyncRequest): Promise<SyncResult> {
    const runId = await this.dispatcher.triggerSync({
      branch: request.branch,
      commitSha: request.commitSha,
      force: request.force,
      targetDir: request.targetDir,
    });

    if (!request.wait || !runId) {
      const pending: SyncResult = { method: TransportMethod.WORKFLOW, waited: false, success: true };
      if (runId) pending.runId = runId;
      return pending;
    }

    const run = await this.poller.waitForCompletion(runId, request.timeoutMs, request.signal);
    const result: SyncResult = {
      method: TransportMethod.WORKFLOW,
      waited: true,
      success: run.conclusion === 'success',
      runId,
      htmlUrl: run.htmlUrl,
      conclusion: run.conclusion,
    };
    if (result.success) {
      result.syncedSha = request.commitSha;
    } else {
      result.error = `Sync failed: ${run.conclusion}`;
    }
    return result;
  }
}
