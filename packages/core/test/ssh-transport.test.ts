/**
 * SSH Tunnel Transport Tests
 */

import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { execa } from 'execa';
import { BridgeNotFoundError, TunnelError, TunnelNotAvailableError } from '../src/tunnel/errors.js';
import { TunnelConfig, createBridgeProfile } from '../src/tunnel/profiles.js';
import {
  SshTunnelTransport,
  buildLogReadCommand,
  buildProxyCommand,
  buildSshArgs,
  buildSyncCommand,
  toWebSocketUrl,
  wrapRemoteCommand,
  type StreamingProcess,
} from '../src/tunnel/ssh-transport.js';
import { createInstantSleep } from './helpers/fake-fetch.js';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = vi.mocked(execa);

interface FakeResult {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  timedOut?: boolean;
}

function execaReturns(...results: FakeResult[]): void {
  for (const result of results) {
    const value = { stdout: '', stderr: '', exitCode: 0, timedOut: false, ...result };
    execaMock.mockImplementationOnce((() => Promise.resolve(value)) as unknown as typeof execa);
  }
}

const gpu = createBridgeProfile('gpu', 'https://gpu.example.com');

describe('command builders', () => {
  it('should map http(s) proxy URLs to websocket URLs', () => {
    expect(toWebSocketUrl('https://gpu.example.com')).toBe('wss://gpu.example.com');
    expect(toWebSocketUrl('http://localhost:8080')).toBe('ws://localhost:8080');
    expect(toWebSocketUrl('wss://already.example.com')).toBe('wss://already.example.com');
  });

  it('should build the ProxyCommand', () => {
    expect(buildProxyCommand(gpu, '/opt/bin/rtunnel')).toBe('/opt/bin/rtunnel wss://gpu.example.com stdio://%h:%p');
    expect(buildProxyCommand(gpu, '/opt/bin/rtunnel', true)).toBe(
      "sh -c '/opt/bin/rtunnel wss://gpu.example.com stdio://%h:%p 2>/dev/null'"
    );
  });

  it('should quote a helper path with spaces in quiet mode', () => {
    expect(buildProxyCommand(gpu, '/opt/my tools/rtunnel', true)).toBe(
      `sh -c ''"'"'/opt/my tools/rtunnel'"'"' wss://gpu.example.com stdio://%h:%p 2>/dev/null'`
    );
  });

  it('should build ssh arguments targeting localhost on the profile port', () => {
    expect(
      buildSshArgs(gpu, '/opt/bin/rtunnel', { batch: true, connectTimeoutSec: 10, remoteCommand: 'echo ok' })
    ).toEqual([
      '-o',
      'StrictHostKeyChecking=no',
      '-o',
      'UserKnownHostsFile=/dev/null',
      '-o',
      'BatchMode=yes',
      '-o',
      'ConnectTimeout=10',
      '-o',
      "ProxyCommand=sh -c '/opt/bin/rtunnel wss://gpu.example.com stdio://%h:%p 2>/dev/null'",
      '-o',
      'LogLevel=ERROR',
      '-p',
      '22222',
      'root@localhost',
      'echo ok',
    ]);
  });

  it('should wrap remote commands in a quoted login shell', () => {
    expect(wrapRemoteCommand('nvidia-smi')).toBe('LC_ALL=C LANG=C bash -l -c nvidia-smi');
    expect(wrapRemoteCommand("echo 'hi'")).toBe(`LC_ALL=C LANG=C bash -l -c 'echo '"'"'hi'"'"''`);
  });

  it('should build log read commands', () => {
    expect(buildLogReadCommand('/logs/a b.log', { tail: 20 })).toBe("tail -n 20 '/logs/a b.log'");
    expect(buildLogReadCommand('/logs/a.log', { head: 5 })).toBe('head -n 5 /logs/a.log');
    expect(buildLogReadCommand('/logs/a.log', {})).toBe('cat /logs/a.log');
  });

  it('should build sync commands', () => {
    expect(buildSyncCommand('/srv/app', 'main', false)).toBe(
      'cd "/srv/app" && git fetch --all && git checkout "main" && git pull --ff-only && git rev-parse HEAD'
    );
    expect(buildSyncCommand('/srv/app', 'dev', true, 'upstream')).toBe(
      'cd "/srv/app" && git fetch --all && git checkout "dev" && git reset --hard "upstream/dev" && git rev-parse HEAD'
    );
  });
});

describe('SshTunnelTransport', () => {
  let dir: string;
  let helperBin: string;
  let config: TunnelConfig;
  let sleep: ReturnType<typeof createInstantSleep>;
  let transport: SshTunnelTransport;

  beforeEach(async () => {
    execaMock.mockReset();
    dir = await mkdtemp(join(tmpdir(), 'bridgeline-ssh-'));
    helperBin = join(dir, 'rtunnel');
    await writeFile(helperBin, '#!/bin/sh\n');
    await chmod(helperBin, 0o755);

    config = new TunnelConfig(dir, helperBin);
    config.addBridge(gpu);
    sleep = createInstantSleep();
    transport = new SshTunnelTransport(config, {
      helperDownloadUrl: 'https://downloads.example.com/rtunnel.tar.gz',
      sleep: sleep.sleep,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('resolveBridge', () => {
    it('should explain a missing bridge', () => {
      expect(() => transport.resolveBridge('cpu')).toThrow(BridgeNotFoundError);
      expect(() => new SshTunnelTransport(new TunnelConfig(dir), { helperDownloadUrl: '' }).resolveBridge()).toThrow(
        TunnelNotAvailableError
      );
    });
  });

  describe('runRemoteCommand', () => {
    it('should run the wrapped command over ssh', async () => {
      execaReturns({ stdout: 'hello\n', exitCode: 0 });

      const result = await transport.runRemoteCommand('echo hello', { timeoutMs: 5000 });

      expect(result).toEqual({ stdout: 'hello\n', stderr: '', exitCode: 0, timedOut: false });
      expect(execaMock).toHaveBeenCalledWith(
        'ssh',
        buildSshArgs(gpu, helperBin, { batch: true, remoteCommand: "LC_ALL=C LANG=C bash -l -c 'echo hello'" }),
        { reject: false, stdin: 'ignore', timeout: 5000 }
      );
    });

    it('should report non-zero exits', async () => {
      execaReturns({ stderr: 'boom', exitCode: 3 });

      const result = await transport.runRemoteCommand('false');

      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe('boom');
    });
  });

  describe('fetchLog', () => {
    it('should return the remote output', async () => {
      execaReturns({ stdout: 'a\nb\n' });

      expect(await transport.fetchLog('/logs/a.log', { tail: 2 })).toBe('a\nb\n');
    });

    it('should throw a tunnel error when the read fails', async () => {
      execaReturns({ stderr: 'tail: cannot open /logs/a.log\n', exitCode: 1 });

      await expect(transport.fetchLog('/logs/a.log')).rejects.toThrow(
        new TunnelError('Failed to read log file: tail: cannot open /logs/a.log')
      );
    });
  });

  describe('waitForRemoteFile', () => {
    let clock: number;
    let waits: number[];
    let waiting: SshTunnelTransport;

    beforeEach(() => {
      clock = 0;
      waits = [];
      waiting = new SshTunnelTransport(config, {
        helperDownloadUrl: '',
        now: () => clock,
        sleep: async (ms: number) => {
          waits.push(ms);
          clock += ms;
        },
      });
    });

    it('should return once a late file appears', async () => {
      execaReturns({ exitCode: 1 }, { exitCode: 1 }, { exitCode: 0 });

      expect(await waiting.waitForRemoteFile('/logs/a.log', 60000)).toBe(true);
      expect(waits).toEqual([5000, 5000]);
      expect(execaMock).toHaveBeenLastCalledWith(
        'ssh',
        buildSshArgs(gpu, helperBin, { batch: true, remoteCommand: "LC_ALL=C LANG=C bash -l -c 'test -f /logs/a.log'" }),
        { reject: false, stdin: 'ignore', timeout: 30000 }
      );
    });

    it('should give up when the file never appears', async () => {
      execaReturns({ exitCode: 1 }, { exitCode: 1 }, { exitCode: 1 }, { exitCode: 1 });

      expect(await waiting.waitForRemoteFile('/logs/a.log', 12000)).toBe(false);
      expect(execaMock).toHaveBeenCalledTimes(4);
      expect(waits).toEqual([5000, 5000, 5000]);
    });
  });

  describe('isAvailable', () => {
    it('should be false without a bridge and never run ssh', async () => {
      expect(await transport.isAvailable('cpu')).toBe(false);
      expect(execaMock).not.toHaveBeenCalled();
    });

    it('should retry once before giving up', async () => {
      execaReturns({ exitCode: 255 }, { exitCode: 255 });

      expect(await transport.isAvailable()).toBe(false);
      expect(execaMock).toHaveBeenCalledTimes(2);
      expect(sleep.calls).toEqual([1000]);
    });

    it('should be true when the probe echoes ok', async () => {
      execaReturns({ stdout: 'ok\n' });

      expect(await transport.isAvailable()).toBe(true);
    });
  });

  describe('syncCode', () => {
    const options = { targetDir: '/srv/app', branch: 'main', force: false };

    it('should report the synced sha from the last line', async () => {
      execaReturns({ stdout: 'Already up to date.\nabc123\n' });

      expect(await transport.syncCode(options)).toEqual({ success: true, syncedSha: 'abc123', error: null });
    });

    it('should report a timeout', async () => {
      execaReturns({ exitCode: 1, timedOut: true });

      expect(await transport.syncCode(options)).toEqual({
        success: false,
        syncedSha: null,
        error: 'Sync command timed out after 60s',
      });
    });

    it('should report the remote error', async () => {
      execaReturns({ stderr: 'fatal: not a git repository\n', exitCode: 128 });

      expect(await transport.syncCode(options)).toEqual({
        success: false,
        syncedSha: null,
        error: 'fatal: not a git repository',
      });
    });
  });

  describe('followRemoteFile', () => {
    function fakeStream(lines: string[], endOnKill: boolean) {
      let release: () => void = () => undefined;
      const killed = new Promise<void>((resolve) => {
        release = resolve;
      });
      const kill = vi.fn(() => release());
      const child: StreamingProcess = {
        lines: (async function* () {
          yield* lines;
          if (endOnKill) await killed;
        })(),
        kill,
        exited: Promise.resolve(),
      };
      return { child, kill };
    }

    it('should stream lines until the job reaches a terminal status', async () => {
      const stream = fakeStream(['epoch 1', 'epoch 2'], true);
      const spawn = vi.fn(() => stream.child);
      const statuses = ['RUNNING', 'SUCCEEDED'];
      const statusSource = { getStatus: vi.fn(async () => statuses.shift() ?? null) };
      const following = new SshTunnelTransport(config, {
        helperDownloadUrl: '',
        sleep: sleep.sleep,
        spawnStreaming: spawn,
      });
      const lines: string[] = [];

      const status = await following.followRemoteFile('/logs/a.log', {
        jobId: 'j1',
        statusSource,
        tailLines: 10,
        onLine: (line) => lines.push(line),
      });

      expect(status).toBe('SUCCEEDED');
      expect(lines).toEqual(['epoch 1', 'epoch 2']);
      expect(sleep.calls).toEqual([5000, 5000, 3000]);
      expect(stream.kill).toHaveBeenCalledTimes(1);
      expect(spawn).toHaveBeenCalledWith(
        'ssh',
        buildSshArgs(gpu, helperBin, {
          batch: true,
          remoteCommand: "LC_ALL=C LANG=C bash -l -c 'tail -n 10 -f /logs/a.log'",
        })
      );
    });

    it('should stop when the stream ends', async () => {
      const stream = fakeStream(['only line'], false);
      const following = new SshTunnelTransport(config, {
        helperDownloadUrl: '',
        sleep: sleep.sleep,
        spawnStreaming: () => stream.child,
      });
      const lines: string[] = [];

      const status = await following.followRemoteFile('/logs/a.log', { onLine: (line) => lines.push(line) });

      expect(status).toBeNull();
      expect(lines).toEqual(['only line']);
      expect(stream.kill).toHaveBeenCalledTimes(1);
    });

    it('should stop at once when already aborted', async () => {
      const stream = fakeStream([], true);
      const controller = new AbortController();
      controller.abort();
      const following = new SshTunnelTransport(config, {
        helperDownloadUrl: '',
        sleep: sleep.sleep,
        spawnStreaming: () => stream.child,
      });

      const status = await following.followRemoteFile('/logs/a.log', {
        signal: controller.signal,
        onLine: () => undefined,
      });

      expect(status).toBeNull();
      expect(sleep.calls).toEqual([]);
      expect(stream.kill).toHaveBeenCalledTimes(1);
    });
  });

  describe('getStatus', () => {
    it('should report an unconfigured tunnel', async () => {
      const empty = new SshTunnelTransport(new TunnelConfig(dir, helperBin), { helperDownloadUrl: '' });

      const status = await empty.getStatus();

      expect(status).toEqual({
        configured: false,
        bridgeName: null,
        sshWorks: false,
        proxyUrl: null,
        helperPath: helperBin,
        bridges: [],
        defaultBridge: null,
        error: "No bridge configured. Run 'bridgeline tunnel add <name> <url>' first.",
      });
    });

    it('should report a working connection', async () => {
      execaReturns({ stdout: 'ok\n' });

      const status = await transport.getStatus();

      expect(status).toMatchObject({
        configured: true,
        bridgeName: 'gpu',
        sshWorks: true,
        proxyUrl: 'https://gpu.example.com',
        bridges: ['gpu'],
        defaultBridge: 'gpu',
        error: null,
      });
    });
  });
});
