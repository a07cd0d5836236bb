/**
 * Per-invocation wiring: configuration, forge session, transports and
 * caches. Everything that needs forge credentials is built on first use,
 * so tunnel-only commands work without them.
 */

import { loadConfig, type BridgelineConfig } from '../config/index.js';
import { ArtifactRetriever } from '../forge/artifacts.js';
import { WorkflowDispatcher } from '../forge/dispatcher.js';
import { RunPoller } from '../forge/run-poller.js';
import { createForgeSession, type ForgeSession } from '../forge/session.js';
import { FollowLoop } from '../follow/follow-loop.js';
import { CachedJobStatusSource } from '../jobs/status.js';
import { JobCache } from '../logs/job-cache.js';
import { LogSync } from '../logs/log-sync.js';
import { MediatedTransport } from '../transport/mediated.js';
import { TransportRouter, type FallbackNotice } from '../transport/router.js';
import { defaultHelperPath, loadTunnelConfig, type TunnelConfig } from '../tunnel/profiles.js';
import { SshTunnelTransport } from '../tunnel/ssh-transport.js';

export interface CliContextOptions {
  env?: NodeJS.ProcessEnv;
  config?: BridgelineConfig;
  fetch?: typeof fetch;
  helperBin?: string;
}

export interface ForgeServices {
  session: ForgeSession;
  dispatcher: WorkflowDispatcher;
  poller: RunPoller;
  artifacts: ArtifactRetriever;
  logSync: LogSync;
  mediated: MediatedTransport;
}

export class CliContext {
  readonly config: BridgelineConfig;
  readonly jobCache: JobCache;
  private readonly fetchFn: typeof fetch | undefined;
  private readonly helperBin: string;
  private forgeServices: ForgeServices | null = null;
  private tunnelConfigPromise: Promise<TunnelConfig> | null = null;

  constructor(options: CliContextOptions = {}) {
    this.config = options.config ?? loadConfig(options.env);
    this.jobCache = new JobCache(this.config.jobCachePath);
    this.fetchFn = options.fetch;
    this.helperBin = options.helperBin ?? defaultHelperPath();
  }

  /**
   * Forge-backed services. Throws ForgeAuthError when credentials are missing.
   */
  forge(): ForgeServices {
    if (this.forgeServices) return this.forgeServices;

    const session = createForgeSession(this.config, this.fetchFn ? { fetch: this.fetchFn } : {});
    const dispatcher = new WorkflowDispatcher(session);
    const poller = new RunPoller(dispatcher);
    const artifacts = new ArtifactRetriever(session);
    const logSync = new LogSync({
      cacheDir: this.config.logCacheDir,
      jobCache: this.jobCache,
      dispatcher,
      artifacts,
      timeoutMs: this.config.remoteTimeoutSec * 1000,
    });
    const mediated = new MediatedTransport({ dispatcher, poller, artifacts, logSync });

    this.forgeServices = { session, dispatcher, poller, artifacts, logSync, mediated };
    return this.forgeServices;
  }

  async tunnelConfig(): Promise<TunnelConfig> {
    if (!this.tunnelConfigPromise) {
      this.tunnelConfigPromise = loadTunnelConfig(this.config.homeDir, this.helperBin);
    }
    return this.tunnelConfigPromise;
  }

  async tunnel(): Promise<SshTunnelTransport> {
    const config = await this.tunnelConfig();
    return new SshTunnelTransport(config, {
      helperDownloadUrl: this.config.helperDownloadUrl,
      ...(this.fetchFn ? { fetch: this.fetchFn } : {}),
    });
  }

  /**
   * Router over both transports. The tunnel is left out when no bridge is
   * configured, so the router goes straight to workflows.
   */
  async router(onFallback?: (notice: FallbackNotice) => void): Promise<TransportRouter> {
    const config = await this.tunnelConfig();
    const tunnel = config.bridges.size > 0 ? await this.tunnel() : null;
    return new TransportRouter({
      tunnel,
      mediated: () => this.forge().mediated,
      baseDenylist: this.config.bridgeDenylist,
      ...(onFallback ? { onFallback } : {}),
    });
  }

  /**
   * Forge services are only built once a mediated follow needs them.
   */
  followLoop(): FollowLoop {
    return new FollowLoop({
      logSync: () => this.forge().logSync,
      jobCache: this.jobCache,
      statusSource: new CachedJobStatusSource(this.jobCache),
    });
  }
}
