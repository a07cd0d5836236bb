/**
 * ForgeSession
 *
 * Client, repository and workflow names for one invocation. Sessions are
 * passed explicitly to every forge consumer rather than cached process-wide;
 * an optional expiry forces callers to build a fresh one.
 */

import type { BridgelineConfig, GitPlatform } from '../config/index.js';
import { createForgeClient, type ForgeClient, type ForgeClientOptions } from './client.js';
import { ForgeAuthError } from './errors.js';

export interface WorkflowFiles {
  log: string;
  sync: string;
  bridge: string;
}

export interface ForgeSessionOptions {
  fetch?: typeof fetch;
  /** Lifetime in ms; omitted means the session never expires */
  ttlMs?: number;
  now?: () => number;
  clientOptions?: Partial<Omit<ForgeClientOptions, 'server' | 'token'>>;
}

const REPO_PATTERN = /^[^/\s]+\/[^/\s]+$/;

const ENV_NAMES: Record<GitPlatform, { repo: string; token: string; label: string }> = {
  gitea: { repo: 'BRIDGELINE_GITEA_REPO', token: 'BRIDGELINE_GITEA_TOKEN', label: 'Gitea' },
  github: { repo: 'BRIDGELINE_GITHUB_REPO', token: 'BRIDGELINE_GITHUB_TOKEN', label: 'GitHub' },
};

export class ForgeSession {
  private readonly expiresAt: number | null;
  private readonly now: () => number;

  constructor(
    private readonly forgeClient: ForgeClient,
    readonly repo: string,
    readonly workflows: WorkflowFiles,
    options: { ttlMs?: number; now?: () => number } = {}
  ) {
    this.now = options.now ?? Date.now;
    this.expiresAt = options.ttlMs === undefined ? null : this.now() + options.ttlMs;
  }

  get client(): ForgeClient {
    this.assertValid();
    return this.forgeClient;
  }

  get apiBase(): string {
    return this.client.getApiBase(this.repo);
  }

  get isExpired(): boolean {
    return this.expiresAt !== null && this.now() >= this.expiresAt;
  }

  assertValid(): void {
    if (this.isExpired) {
      throw new ForgeAuthError('Forge session expired', 'Start a new session and retry');
    }
  }

  runsUrl(limit: number, page: number): string {
    return `${this.apiBase}/runs?${this.client.getPaginationParams(limit, page)}`;
  }

  rawFileUrl(ref: string, path: string): string {
    return this.client.getRawFileUrl(this.repo, ref, path);
  }
}

/**
 * Validate credentials for the configured platform and open a session.
 */
export function createForgeSession(
  config: BridgelineConfig,
  options: ForgeSessionOptions = {}
): ForgeSession {
  const platform = config.platform;
  const settings = config[platform];
  const names = ENV_NAMES[platform];

  const repo = settings.repo;
  if (!repo) {
    throw new ForgeAuthError(
      `${names.label} operations require ${names.repo} to be set`,
      `Use 'owner/repo' format, e.g. export ${names.repo}='my-org/my-repo'`
    );
  }
  if (!REPO_PATTERN.test(repo)) {
    throw new ForgeAuthError(
      `Invalid ${names.repo} format '${repo}'. Expected 'owner/repo'`,
      `export ${names.repo}='owner/repo'`
    );
  }

  const token = settings.token;
  if (!token) {
    throw new ForgeAuthError(
      `${names.label} operations require ${names.token} to be set`,
      `export ${names.token}='<token>'`
    );
  }

  const clientOptions: ForgeClientOptions = {
    ...options.clientOptions,
    server: settings.server,
    token,
  };
  if (options.fetch) {
    clientOptions.fetch = options.fetch;
  }

  const sessionOptions: { ttlMs?: number; now?: () => number } = {};
  if (options.ttlMs !== undefined) sessionOptions.ttlMs = options.ttlMs;
  if (options.now) sessionOptions.now = options.now;

  return new ForgeSession(
    createForgeClient(platform, clientOptions),
    repo,
    config.workflows,
    sessionOptions
  );
}
