/**
 * Transport Router Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { ExecResult, LogSyncResult, SyncResult } from '@bridgeline/shared';
import type { MediatedTransport } from '../src/transport/mediated.js';
import { TransportRouter, type FallbackNotice } from '../src/transport/router.js';
import { TunnelError, TunnelNotAvailableError } from '../src/tunnel/errors.js';
import type { SshSyncResult, SshTunnelTransport } from '../src/tunnel/ssh-transport.js';
import { AbortError } from '../src/utils/delay.js';

const mediatedExecResult: ExecResult = {
  method: 'workflow',
  waited: true,
  exitCode: 0,
  stdout: 'from workflow\n',
  stderr: '',
  requestId: '1700000000-1',
};

const logSyncResult: LogSyncResult = {
  cachePath: '/tmp/cache/j1.log',
  mode: 'full',
  bytesAdded: 4,
  offset: 4,
  noNewContent: false,
};

function createFakeTunnel(available = true) {
  const fake = {
    isAvailable: vi.fn(async () => available),
    runRemoteCommand: vi.fn(async () => ({ stdout: 'from ssh\n', stderr: '', exitCode: 0, timedOut: false })),
    fetchLog: vi.fn(async () => 'tail output\n'),
    syncCode: vi.fn(async (): Promise<SshSyncResult> => ({ success: true, syncedSha: 'abc123', error: null })),
  };
  return { fake, tunnel: fake as unknown as SshTunnelTransport };
}

function createFakeMediated() {
  const fake = {
    exec: vi.fn(async () => mediatedExecResult),
    fetchLog: vi.fn(async () => logSyncResult),
    sync: vi.fn(
      async (): Promise<SyncResult> => ({ method: 'workflow', waited: true, success: true, runId: '11', syncedSha: 'abc123' })
    ),
  };
  return { fake, mediated: fake as unknown as MediatedTransport };
}

const execRequest = { command: 'nvidia-smi', targetDir: '/srv/app', timeoutMs: 30_000 };

describe('TransportRouter', () => {
  describe('prefersDirect', () => {
    it('should prefer the tunnel unless disabled or artifacts are wanted', () => {
      expect(TransportRouter.prefersDirect({})).toBe(true);
      expect(TransportRouter.prefersDirect({ noTunnel: true })).toBe(false);
      expect(TransportRouter.prefersDirect({ artifactPaths: ['out/'] })).toBe(false);
      expect(TransportRouter.prefersDirect({ downloadDir: './results' })).toBe(false);
      expect(TransportRouter.prefersDirect({ artifactPaths: [] })).toBe(true);
    });
  });

  describe('execCommand', () => {
    it('should run over ssh with env exports and a cd', async () => {
      const { fake, tunnel } = createFakeTunnel();
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel, mediated });

      const result = await router.execCommand({ ...execRequest, env: { CUDA_VISIBLE_DEVICES: '0' } });

      expect(result).toEqual({ method: 'ssh_tunnel', waited: true, exitCode: 0, stdout: 'from ssh\n', stderr: '' });
      expect(fake.runRemoteCommand).toHaveBeenCalledWith(
        'export CUDA_VISIBLE_DEVICES="0" && cd "/srv/app" && nvidia-smi',
        { bridgeName: undefined, timeoutMs: 30_000 }
      );
      expect(mediatedFake.exec).not.toHaveBeenCalled();
    });

    it('should fall back exactly once when the ssh attempt fails', async () => {
      const { fake, tunnel } = createFakeTunnel();
      fake.runRemoteCommand.mockRejectedValueOnce(new TunnelError('connection reset'));
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const notices: FallbackNotice[] = [];
      const router = new TransportRouter({ tunnel, mediated, onFallback: (notice) => notices.push(notice) });

      const result = await router.execCommand(execRequest);

      expect(result).toBe(mediatedExecResult);
      expect(fake.runRemoteCommand).toHaveBeenCalledTimes(1);
      expect(mediatedFake.exec).toHaveBeenCalledTimes(1);
      expect(notices).toEqual([{ operation: 'exec', reason: 'SSH exec failed: connection reset' }]);
    });

    it('should fall back when the tunnel does not answer', async () => {
      const { fake, tunnel } = createFakeTunnel(false);
      const { mediated } = createFakeMediated();
      const notices: FallbackNotice[] = [];
      const router = new TransportRouter({ tunnel, mediated, onFallback: (notice) => notices.push(notice) });

      await router.execCommand(execRequest);

      expect(fake.runRemoteCommand).not.toHaveBeenCalled();
      expect(notices).toEqual([{ operation: 'exec', reason: 'Tunnel not available' }]);
    });

    it('should report a missing bridge as an unavailable tunnel', async () => {
      const { fake, tunnel } = createFakeTunnel();
      fake.isAvailable.mockRejectedValueOnce(new TunnelNotAvailableError());
      const { mediated } = createFakeMediated();
      const notices: FallbackNotice[] = [];
      const router = new TransportRouter({ tunnel, mediated, onFallback: (notice) => notices.push(notice) });

      await router.execCommand(execRequest);

      expect(notices).toEqual([{ operation: 'exec', reason: 'Tunnel not available' }]);
    });

    it('should send artifact requests straight to the workflow with merged denylists', async () => {
      const { fake, tunnel } = createFakeTunnel();
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const notices: FallbackNotice[] = [];
      const router = new TransportRouter({
        tunnel,
        mediated,
        baseDenylist: ['rm -rf /'],
        onFallback: (notice) => notices.push(notice),
      });

      await router.execCommand({
        ...execRequest,
        env: { SEED: '1' },
        denylist: ['shutdown,reboot', 'rm -rf /'],
        artifactPaths: ['out/metrics.json'],
        wait: false,
      });

      expect(fake.isAvailable).not.toHaveBeenCalled();
      expect(notices).toEqual([]);
      expect(mediatedFake.exec).toHaveBeenCalledWith({
        command: 'export SEED="1" && nvidia-smi',
        targetDir: '/srv/app',
        denylist: ['rm -rf /', 'shutdown', 'reboot'],
        artifactPaths: ['out/metrics.json'],
        downloadDir: undefined,
        wait: false,
        timeoutMs: 30_000,
      });
    });

    it('should rethrow aborts instead of falling back', async () => {
      const { fake, tunnel } = createFakeTunnel();
      fake.runRemoteCommand.mockRejectedValueOnce(new AbortError());
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel, mediated });

      await expect(router.execCommand(execRequest)).rejects.toThrow(AbortError);
      expect(mediatedFake.exec).not.toHaveBeenCalled();
    });

    it('should use the workflow when no tunnel is configured', async () => {
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel: null, mediated });

      await router.execCommand(execRequest);

      expect(mediatedFake.exec).toHaveBeenCalledTimes(1);
    });
  });

  describe('mediated factory', () => {
    it('should only build the mediated transport when it is needed, and only once', async () => {
      const { tunnel } = createFakeTunnel();
      const { mediated } = createFakeMediated();
      const factory = vi.fn(() => mediated);
      const router = new TransportRouter({ tunnel, mediated: factory });

      await router.execCommand(execRequest);
      expect(factory).not.toHaveBeenCalled();

      await router.execCommand({ ...execRequest, noTunnel: true });
      await router.execCommand({ ...execRequest, noTunnel: true });
      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  describe('fetchLog', () => {
    it('should read over ssh with tail', async () => {
      const { fake, tunnel } = createFakeTunnel();
      const { mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel, mediated });

      const result = await router.fetchLog({ jobId: 'j1', remoteLogPath: '/logs/j1.log', tail: 20, bridgeName: 'gpu' });

      expect(result).toEqual({ method: 'ssh_tunnel', content: 'tail output\n' });
      expect(fake.isAvailable).toHaveBeenCalledWith('gpu');
      expect(fake.fetchLog).toHaveBeenCalledWith('/logs/j1.log', { bridgeName: 'gpu', tail: 20, head: undefined });
    });

    it('should sync through the workflow when the tunnel is disabled', async () => {
      const { fake, tunnel } = createFakeTunnel();
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel, mediated });

      const result = await router.fetchLog({ jobId: 'j1', remoteLogPath: '/logs/j1.log', noTunnel: true, refresh: true });

      expect(result).toEqual({ method: 'workflow', sync: logSyncResult });
      expect(fake.isAvailable).not.toHaveBeenCalled();
      expect(mediatedFake.fetchLog).toHaveBeenCalledWith('j1', '/logs/j1.log', { refresh: true });
    });
  });

  describe('syncCode', () => {
    const syncRequest = {
      branch: 'main',
      commitSha: 'abc123',
      force: false,
      targetDir: '/srv/app',
      timeoutMs: 120_000,
    };

    it('should report the sha synced over ssh', async () => {
      const { fake, tunnel } = createFakeTunnel();
      const { mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel, mediated });

      const result = await router.syncCode({ ...syncRequest, remote: 'upstream' });

      expect(result).toEqual({ method: 'ssh_tunnel', waited: true, success: true, syncedSha: 'abc123' });
      expect(fake.syncCode).toHaveBeenCalledWith({
        targetDir: '/srv/app',
        branch: 'main',
        force: false,
        bridgeName: undefined,
        timeoutMs: 120_000,
        remote: 'upstream',
      });
    });

    it('should report an ssh sync failure without falling back', async () => {
      const { fake, tunnel } = createFakeTunnel();
      fake.syncCode.mockResolvedValueOnce({ success: false, syncedSha: null, error: 'merge conflict' });
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel, mediated });

      const result = await router.syncCode(syncRequest);

      expect(result).toEqual({ method: 'ssh_tunnel', waited: true, success: false, error: 'merge conflict' });
      expect(mediatedFake.sync).not.toHaveBeenCalled();
    });

    it('should dispatch the sync workflow on fallback', async () => {
      const { tunnel } = createFakeTunnel(false);
      const { fake: mediatedFake, mediated } = createFakeMediated();
      const router = new TransportRouter({ tunnel, mediated });

      await router.syncCode(syncRequest);

      expect(mediatedFake.sync).toHaveBeenCalledWith({
        branch: 'main',
        commitSha: 'abc123',
        force: false,
        targetDir: '/srv/app',
        wait: true,
        timeoutMs: 120_000,
      });
    });
  });
});
