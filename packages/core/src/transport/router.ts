/**
 * Transport Router
 *
 * Chooses the direct SSH path when it is enabled and answers a probe, and
 * falls back to the mediated workflow path otherwise. A failed direct
 * attempt is never retried within the same call: it falls back exactly once.
 */

import {
  TransportMethod,
  type ExecResult,
  type LogSyncResult,
  type SyncResult,
} from '@bridgeline/shared';
import type { SshTunnelTransport } from '../tunnel/ssh-transport.js';
import { TunnelNotAvailableError } from '../tunnel/errors.js';
import { AbortError } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';
import { buildDirectCommand, buildWorkflowCommand, mergeDenylists } from './commands.js';
import type { MediatedTransport } from './mediated.js';

const log = createLogger('transport:router');

// ============================================================================
// Types
// ============================================================================

export interface RouteOptions {
  /** Skip the direct path entirely */
  noTunnel?: boolean;
  bridgeName?: string | undefined;
}

export interface ExecRequest extends RouteOptions {
  command: string;
  targetDir: string;
  env?: Record<string, string>;
  denylist?: string[];
  artifactPaths?: string[];
  downloadDir?: string | undefined;
  wait?: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface FetchLogRequest extends RouteOptions {
  jobId: string;
  remoteLogPath: string;
  tail?: number | undefined;
  head?: number | undefined;
  refresh?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type FetchLogResult =
  | { method: typeof TransportMethod.SSH_TUNNEL; content: string }
  | { method: typeof TransportMethod.WORKFLOW; sync: LogSyncResult };

export interface SyncCodeRequest extends RouteOptions {
  branch: string;
  commitSha: string;
  force: boolean;
  targetDir: string;
  remote?: string;
  wait?: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface FallbackNotice {
  operation: string;
  reason: string;
}

export interface TransportRouterOptions {
  tunnel: SshTunnelTransport | null;
  /** A factory defers forge credential checks until the mediated path is taken */
  mediated: MediatedTransport | (() => MediatedTransport);
  /** Called once per fallback, e.g. to tell the user */
  onFallback?: (notice: FallbackNotice) => void;
  /** Denylist entries always sent with mediated exec */
  baseDenylist?: string[];
}

// ============================================================================
// Router
// ============================================================================

export class TransportRouter {
  private readonly tunnel: SshTunnelTransport | null;
  private readonly mediatedSource: MediatedTransport | (() => MediatedTransport);
  private mediatedInstance: MediatedTransport | null = null;
  private readonly onFallback: ((notice: FallbackNotice) => void) | undefined;
  private readonly baseDenylist: string[];

  constructor(options: TransportRouterOptions) {
    this.tunnel = options.tunnel;
    this.mediatedSource = options.mediated;
    this.onFallback = options.onFallback;
    this.baseDenylist = options.baseDenylist ?? [];
  }

  /**
   * Whether `execCommand` would try the direct path first.
   */
  static prefersDirect(request: Pick<ExecRequest, 'noTunnel' | 'artifactPaths' | 'downloadDir'>): boolean {
    const wantsArtifacts = (request.artifactPaths?.length ?? 0) > 0 || Boolean(request.downloadDir);
    return !request.noTunnel && !wantsArtifacts;
  }

  async execCommand(request: ExecRequest): Promise<ExecResult> {
    const env = request.env ?? {};
    const direct = TransportRouter.prefersDirect(request);

    return this.route(
      'exec',
      { noTunnel: !direct, bridgeName: request.bridgeName },
      async (tunnel) => {
        const result = await tunnel.runRemoteCommand(buildDirectCommand(request.command, request.targetDir, env), {
          bridgeName: request.bridgeName,
          timeoutMs: request.timeoutMs,
        });
        return {
          method: TransportMethod.SSH_TUNNEL,
          waited: true,
          exitCode: result.exitCode,
          stdout: result.stdout,
          stderr: result.stderr,
        };
      },
      () =>
        this.mediated.exec({
          command: buildWorkflowCommand(request.command, env),
          targetDir: request.targetDir,
          denylist: mergeDenylists(this.baseDenylist, request.denylist ?? []),
          artifactPaths: request.artifactPaths ?? [],
          downloadDir: request.downloadDir,
          wait: request.wait ?? true,
          timeoutMs: request.timeoutMs,
          ...(request.signal ? { signal: request.signal } : {}),
        })
    );
  }

  async fetchLog(request: FetchLogRequest): Promise<FetchLogResult> {
    return this.route<FetchLogResult>(
      'fetch log',
      request,
      async (tunnel) => {
        const content = await tunnel.fetchLog(request.remoteLogPath, {
          bridgeName: request.bridgeName,
          tail: request.tail,
          head: request.head,
          ...(request.timeoutMs === undefined ? {} : { timeoutMs: request.timeoutMs }),
        });
        return { method: TransportMethod.SSH_TUNNEL, content };
      },
      async () => {
        const sync = await this.mediated.fetchLog(request.jobId, request.remoteLogPath, {
          refresh: request.refresh ?? false,
          ...(request.signal ? { signal: request.signal } : {}),
        });
        return { method: TransportMethod.WORKFLOW, sync };
      }
    );
  }

  async syncCode(request: SyncCodeRequest): Promise<SyncResult> {
    return this.route(
      'sync',
      request,
      async (tunnel) => {
        const result = await tunnel.syncCode({
          targetDir: request.targetDir,
          branch: request.branch,
          force: request.force,
          bridgeName: request.bridgeName,
          timeoutMs: request.timeoutMs,
          ...(request.remote ? { remote: request.remote } : {}),
        });
        const synced: SyncResult = { method: TransportMethod.SSH_TUNNEL, waited: true, success: result.success };
        if (result.syncedSha) synced.syncedSha = result.syncedSha;
        if (result.error) synced.error = result.error;
        return synced;
      },
      () =>
        this.mediated.sync({
          branch: request.branch,
          commitSha: request.commitSha,
          force: request.force,
          targetDir: request.targetDir,
          wait: request.wait ?? true,
          timeoutMs: request.timeoutMs,
          ...(request.signal ? { signal: request.signal } : {}),
        })
    );
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private get mediated(): MediatedTransport {
    if (!this.mediatedInstance) {
      this.mediatedInstance =
        typeof this.mediatedSource === 'function' ? this.mediatedSource() : this.mediatedSource;
    }
    return this.mediatedInstance;
  }

  private async route<T>(
    operation: string,
    options: RouteOptions,
    direct: (tunnel: SshTunnelTransport) => Promise<T>,
    mediated: () => Promise<T>
  ): Promise<T> {
    if (options.noTunnel || !this.tunnel) {
      return mediated();
    }

    let reason: string;
    try {
      if (await this.tunnel.isAvailable(options.bridgeName)) {
        log.debug({ operation }, 'Using SSH tunnel');
        return await direct(this.tunnel);
      }
      reason = 'Tunnel not available';
    } catch (error) {
      if (error instanceof AbortError) throw error;
      reason =
        error instanceof TunnelNotAvailableError
          ? 'Tunnel not available'
          : `SSH ${operation} failed: ${error instanceof Error ? error.message : String(error)}`;
    }

    log.info({ operation, reason }, 'Falling back to workflow');
    this.onFallback?.({ operation, reason });
    return mediated();
  }
}
