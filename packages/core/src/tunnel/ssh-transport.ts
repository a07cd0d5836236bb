/**
 * SSH Tunnel Transport
 *
 * Runs commands on the Bridge over SSH, with the WebSocket helper as the
 * ProxyCommand. Every ssh invocation targets `<user>@localhost` on the
 * profile's port; the helper forwards `%h:%p` through the proxy.
 */

import { createInterface } from 'node:readline';
import { execa } from 'execa';
import { isTerminalJobStatus, type BridgeProfile } from '@bridgeline/shared';
import type { JobStatusSource } from '../jobs/status.js';
import { AbortError, delay, type SleepFn } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';
import { shellQuote } from '../utils/shell.js';
import { BridgeNotFoundError, TunnelError, TunnelNotAvailableError } from './errors.js';
import { ensureHelperBinary, isExecutable } from './helper-binary.js';
import type { TunnelConfig } from './profiles.js';

const log = createLogger('tunnel:ssh');

// ============================================================================
// Types
// ============================================================================

export interface RemoteCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * A long-running child whose stdout is consumed line by line.
 */
export interface StreamingProcess {
  readonly lines: AsyncIterable<string>;
  kill(): void;
  /** Settles once the child has exited; never rejects */
  readonly exited: Promise<void>;
}

export type StreamingSpawner = (file: string, args: string[]) => StreamingProcess;

export interface SshTransportOptions {
  helperDownloadUrl: string;
  fetch?: typeof fetch;
  spawnStreaming?: StreamingSpawner;
  sleep?: SleepFn;
  /** Between status checks while following (default: 5000) */
  followStatusIntervalMs?: number;
  /** After a terminal status, before stopping (default: 3000) */
  followGraceMs?: number;
  /** Between `test -f` probes while waiting for a file (default: 5000) */
  fileWaitIntervalMs?: number;
  now?: () => number;
}

export interface SshArgsOptions {
  batch?: boolean;
  connectTimeoutSec?: number;
  remoteCommand?: string;
}

export interface FollowOptions {
  bridgeName?: string | undefined;
  tailLines?: number;
  jobId?: string;
  statusSource?: JobStatusSource;
  signal?: AbortSignal;
  onLine: (line: string) => void;
}

export interface FetchLogOptions {
  bridgeName?: string | undefined;
  tail?: number | undefined;
  head?: number | undefined;
  timeoutMs?: number;
}

export interface SshSyncOptions {
  targetDir: string;
  branch: string;
  force: boolean;
  remote?: string;
  bridgeName?: string | undefined;
  timeoutMs?: number;
}

export interface SshSyncResult {
  success: boolean;
  syncedSha: string | null;
  error: string | null;
}

export interface TunnelStatus {
  configured: boolean;
  bridgeName: string | null;
  sshWorks: boolean;
  proxyUrl: string | null;
  helperPath: string | null;
  bridges: string[];
  defaultBridge: string | null;
  error: string | null;
}

// ============================================================================
// Command Builders
// ============================================================================

export function toWebSocketUrl(proxyUrl: string): string {
  if (proxyUrl.startsWith('https://')) return `wss://${proxyUrl.slice('https://'.length)}`;
  if (proxyUrl.startsWith('http://')) return `ws://${proxyUrl.slice('http://'.length)}`;
  return proxyUrl;
}

/**
 * ProxyCommand value for ssh. Quiet mode discards the helper's stderr
 * chatter through a `sh -c` wrapper.
 */
export function buildProxyCommand(profile: BridgeProfile, helperBin: string, quiet = false): string {
  const wsUrl = toWebSocketUrl(profile.proxyUrl);
  if (quiet) {
    return `sh -c ${shellQuote(`${shellQuote(helperBin)} ${shellQuote(wsUrl)} stdio://%h:%p 2>/dev/null`)}`;
  }
  return `${shellQuote(helperBin)} ${shellQuote(wsUrl)} ${shellQuote('stdio://%h:%p')}`;
}

export function buildSshArgs(
  profile: BridgeProfile,
  helperBin: string,
  options: SshArgsOptions = {}
): string[] {
  const args = ['-o', 'StrictHostKeyChecking=no', '-o', 'UserKnownHostsFile=/dev/null'];
  if (options.batch) {
    args.push('-o', 'BatchMode=yes');
  }
  if (options.connectTimeoutSec !== undefined) {
    args.push('-o', `ConnectTimeout=${options.connectTimeoutSec}`);
  }
  args.push(
    '-o',
    `ProxyCommand=${buildProxyCommand(profile, helperBin, true)}`,
    '-o',
    'LogLevel=ERROR',
    '-p',
    String(profile.sshPort),
    `${profile.sshUser}@localhost`
  );
  if (options.remoteCommand) {
    args.push(options.remoteCommand);
  }
  return args;
}

/**
 * Run through a login shell so the Bridge's profile (PATH etc.) applies.
 */
export function wrapRemoteCommand(command: string): string {
  return `LC_ALL=C LANG=C bash -l -c ${shellQuote(command)}`;
}

export function buildLogReadCommand(path: string, options: { tail?: number | undefined; head?: number | undefined }): string {
  const quoted = shellQuote(path);
  if (options.tail !== undefined) return `tail -n ${options.tail} ${quoted}`;
  if (options.head !== undefined) return `head -n ${options.head} ${quoted}`;
  return `cat ${quoted}`;
}

export function buildSyncCommand(targetDir: string, branch: string, force: boolean, remote = 'origin'): string {
  const update = force ? `git reset --hard "${remote}/${branch}"` : 'git pull --ff-only';
  return [
    `cd "${targetDir}"`,
    'git fetch --all',
    `git checkout "${branch}"`,
    update,
    'git rev-parse HEAD',
  ].join(' && ');
}

function execaStreaming(file: string, args: string[]): StreamingProcess {
  const subprocess = execa(file, args, { buffer: false, reject: false, stdin: 'ignore' });
  const exited = subprocess.then(
    () => undefined,
    () => undefined
  );
  const lines = subprocess.stdout
    ? createInterface({ input: subprocess.stdout, crlfDelay: Infinity })
    : (async function* empty(): AsyncGenerator<string> {})();
  return {
    lines,
    kill: () => {
      subprocess.kill();
    },
    exited,
  };
}

/**
 * Sleep that ends quietly (rather than rejecting) when the signal fires.
 */
async function pause(sleep: SleepFn, ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, signal);
  } catch (error) {
    if (!(error instanceof AbortError)) throw error;
  }
}

// ============================================================================
// Transport
// ============================================================================

export class SshTunnelTransport {
  private readonly helperDownloadUrl: string;
  private readonly fetchFn: typeof fetch | undefined;
  private readonly spawnStreaming: StreamingSpawner;
  private readonly sleep: SleepFn;
  private readonly followStatusIntervalMs: number;
  private readonly followGraceMs: number;
  private readonly fileWaitIntervalMs: number;
  private readonly now: () => number;

  constructor(
    readonly config: TunnelConfig,
    options: SshTransportOptions
  ) {
    this.helperDownloadUrl = options.helperDownloadUrl;
    this.fetchFn = options.fetch;
    this.spawnStreaming = options.spawnStreaming ?? execaStreaming;
    this.sleep = options.sleep ?? delay;
    this.followStatusIntervalMs = options.followStatusIntervalMs ?? 5000;
    this.followGraceMs = options.followGraceMs ?? 3000;
    this.fileWaitIntervalMs = options.fileWaitIntervalMs ?? 5000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Profile to use, or the reason there is none.
   */
  resolveBridge(name?: string | null): BridgeProfile {
    const profile = this.config.getBridge(name);
    if (profile) return profile;
    if (name) throw new BridgeNotFoundError(name);
    throw new TunnelNotAvailableError();
  }

  async ensureHelper(): Promise<string> {
    const options: Parameters<typeof ensureHelperBinary>[0] = {
      binPath: this.config.helperBin,
      downloadUrl: this.helperDownloadUrl,
    };
    if (this.fetchFn) options.fetch = this.fetchFn;
    return ensureHelperBinary(options);
  }

  /**
   * `echo ok` over the tunnel. Any failure reads as false.
   */
  async testConnectivity(profile: BridgeProfile, timeoutSec = 10): Promise<boolean> {
    try {
      const helper = await this.ensureHelper();
      const args = buildSshArgs(profile, helper, {
        batch: true,
        connectTimeoutSec: timeoutSec,
        remoteCommand: 'echo ok',
      });
      const result = await execa('ssh', args, {
        reject: false,
        timeout: (timeoutSec + 5) * 1000,
        stdin: 'ignore',
      });
      return result.exitCode === 0 && String(result.stdout).includes('ok');
    } catch (error) {
      log.debug({ err: error, bridge: profile.name }, 'Tunnel probe failed');
      return false;
    }
  }

  async isAvailable(bridgeName?: string | null, retries = 1): Promise<boolean> {
    const profile = this.config.getBridge(bridgeName);
    if (!profile) return false;

    for (let attempt = 0; attempt <= retries; attempt++) {
      if (await this.testConnectivity(profile)) return true;
      if (attempt < retries) {
        await this.sleep(1000);
      }
    }
    return false;
  }

  /**
   * Run a shell command on the Bridge. A non-zero exit is reported, not thrown.
   */
  async runRemoteCommand(
    command: string,
    options: { bridgeName?: string | undefined; timeoutMs?: number } = {}
  ): Promise<RemoteCommandResult> {
    const profile = this.resolveBridge(options.bridgeName);
    const helper = await this.ensureHelper();
    const args = buildSshArgs(profile, helper, { batch: true, remoteCommand: wrapRemoteCommand(command) });

    log.debug({ bridge: profile.name, command }, 'Running remote command');
    const result = await execa('ssh', args, {
      reject: false,
      stdin: 'ignore',
      ...(options.timeoutMs === undefined ? {} : { timeout: options.timeoutMs }),
    });

    return {
      stdout: String(result.stdout ?? ''),
      stderr: String(result.stderr ?? ''),
      exitCode: result.exitCode ?? 1,
      timedOut: result.timedOut,
    };
  }

  /**
   * One-shot read of a remote log (whole file, head or tail).
   */
  async fetchLog(path: string, options: FetchLogOptions = {}): Promise<string> {
    const commandOptions: { bridgeName?: string | undefined; timeoutMs?: number } = {
      bridgeName: options.bridgeName,
    };
    if (options.timeoutMs !== undefined) commandOptions.timeoutMs = options.timeoutMs;

    const result = await this.runRemoteCommand(buildLogReadCommand(path, options), commandOptions);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new TunnelError(`Failed to read log file: ${detail}`);
    }
    return result.stdout;
  }

  /**
   * Poll `test -f` until the file exists. Returns false on timeout or abort.
   */
  async waitForRemoteFile(
    path: string,
    timeoutMs: number,
    options: { bridgeName?: string | undefined; signal?: AbortSignal } = {}
  ): Promise<boolean> {
    const deadline = this.now() + timeoutMs;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (!controller.signal.aborted) {
        const result = await this.runRemoteCommand(`test -f ${shellQuote(path)}`, {
          bridgeName: options.bridgeName,
          timeoutMs: 30000,
        });
        if (result.exitCode === 0) return true;
        if (this.now() >= deadline) return false;
        await pause(this.sleep, this.fileWaitIntervalMs, controller.signal);
      }
      return false;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Stream new lines of a remote file with `tail -f` until the job reaches
   * a terminal status (plus a grace period), the stream ends, or the caller
   * aborts. The child is always killed and awaited before returning.
   *
   * @returns the terminal status that ended the follow, or null
   */
  async followRemoteFile(path: string, options: FollowOptions): Promise<string | null> {
    const profile = this.resolveBridge(options.bridgeName);
    const helper = await this.ensureHelper();
    const tailLines = options.tailLines ?? 50;
    const remoteCommand = wrapRemoteCommand(`tail -n ${tailLines} -f ${shellQuote(path)}`);
    const child = this.spawnStreaming('ssh', buildSshArgs(profile, helper, { batch: true, remoteCommand }));

    // Wakes the status loop when the stream ends or the caller aborts
    const wake = new AbortController();
    const onAbort = (): void => wake.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) wake.abort();

    const pump = (async () => {
      try {
        for await (const line of child.lines) {
          options.onLine(line);
        }
      } catch (error) {
        log.warn({ err: error, path }, 'Remote log stream failed');
      } finally {
        wake.abort();
      }
    })();

    let finalStatus: string | null = null;
    try {
      while (!wake.signal.aborted) {
        await pause(this.sleep, this.followStatusIntervalMs, wake.signal);
        if (wake.signal.aborted || !options.jobId || !options.statusSource) continue;

        const status = await this.safeStatus(options.statusSource, options.jobId);
        if (isTerminalJobStatus(status)) {
          finalStatus = status;
          log.debug({ jobId: options.jobId, status }, 'Job finished, draining remaining output');
          await pause(this.sleep, this.followGraceMs, wake.signal);
          break;
        }
      }
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      child.kill();
      await child.exited;
      await pump;
    }

    return finalStatus;
  }

  async syncCode(options: SshSyncOptions): Promise<SshSyncResult> {
    const command = buildSyncCommand(options.targetDir, options.branch, options.force, options.remote);
    const timeoutMs = options.timeoutMs ?? 60000;
    const result = await this.runRemoteCommand(command, { bridgeName: options.bridgeName, timeoutMs });

    if (result.timedOut) {
      return { success: false, syncedSha: null, error: `Sync command timed out after ${timeoutMs / 1000}s` };
    }
    if (result.exitCode === 0) {
      const lines = result.stdout.trim().split('\n');
      return { success: true, syncedSha: (lines[lines.length - 1] ?? '').trim(), error: null };
    }
    return {
      success: false,
      syncedSha: null,
      error: result.stderr.trim() || result.stdout.trim() || 'Unknown error',
    };
  }

  async getStatus(bridgeName?: string | null): Promise<TunnelStatus> {
    const profile = this.config.getBridge(bridgeName);
    const status: TunnelStatus = {
      configured: profile !== undefined,
      bridgeName: profile?.name ?? null,
      sshWorks: false,
      proxyUrl: profile?.proxyUrl ?? null,
      helperPath: (await isExecutable(this.config.helperBin)) ? this.config.helperBin : null,
      bridges: this.config.listBridges().map((bridge) => bridge.name),
      defaultBridge: this.config.defaultBridge,
      error: null,
    };

    if (!profile) {
      status.error = bridgeName
        ? `Bridge '${bridgeName}' not found.`
        : "No bridge configured. Run 'bridgeline tunnel add <name> <url>' first.";
      return status;
    }

    if (!status.helperPath) {
      try {
        status.helperPath = await this.ensureHelper();
      } catch (error) {
        status.error = error instanceof Error ? error.message : String(error);
        return status;
      }
    }

    status.sshWorks = await this.testConnectivity(profile);
    if (!status.sshWorks) {
      status.error = 'SSH connection failed. Check the proxy URL and the helper server on the Bridge.';
    }
    return status;
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async safeStatus(source: JobStatusSource, jobId: string): Promise<string | null> {
    try {
      return await source.getStatus(jobId);
    } catch (error) {
      log.warn({ err: error, jobId }, 'Status check failed');
      return null;
    }
  }
}
