import { describe, it, expect, vi } from 'vitest';
import type { LogSyncResult, RunResult } from '@bridgeline/shared';
import type { ArtifactRetriever } from '../src/forge/artifacts.js';
import type { WorkflowDispatcher } from '../src/forge/dispatcher.js';
import { ForgeError } from '../src/forge/errors.js';
import type { RunPoller } from '../src/forge/run-poller.js';
import type { LogSync } from '../src/logs/log-sync.js';
import { MediatedTransport, type MediatedExecRequest } from '../src/transport/mediated.js';

const RUN_URL = 'https://codeberg.org/acme/bridge/actions/runs/42';

function createMediated(conclusion = 'success') {
  const dispatcher = {
    triggerBridgeAction: vi.fn(async () => undefined),
    triggerSync: vi.fn(async () => '42'),
  };
  const run: RunResult = { status: 'completed', conclusion, runId: '42', htmlUrl: RUN_URL };
  const poller = {
    waitForRequest: vi.fn(async () => run),
    waitForCompletion: vi.fn(async () => run),
  };
  const artifacts = {
    fetchBridgeOutputLog: vi.fn(async (): Promise<string | null> => 'GPU 0: ready\n'),
    downloadBridgeArtifact: vi.fn(async () => ['/tmp/results/out.json']),
  };
  const synced: LogSyncResult = {
    cachePath: '/tmp/cache/j1.log',
    mode: 'incremental',
    bytesAdded: 0,
    offset: 9,
    noNewContent: true,
  };
  const logSync = { sync: vi.fn(async () => synced) };

  const transport = new MediatedTransport({
    dispatcher: dispatcher as unknown as WorkflowDispatcher,
    poller: poller as unknown as RunPoller,
    artifacts: artifacts as unknown as ArtifactRetriever,
    logSync: logSync as unknown as LogSync,
    requestIdFactory: () => '1700000000-4242',
  });
  return { transport, dispatcher, poller, artifacts, logSync, synced };
}

const execRequest: MediatedExecRequest = {
  command: 'nvidia-smi',
  targetDir: '/srv/app',
  denylist: ['rm -rf /'],
  artifactPaths: [],
  wait: true,
  timeoutMs: 300_000,
};

describe('MediatedTransport', () => {
  describe('exec', () => {
    it('should dispatch, wait and return captured output', async () => {
      const { transport, dispatcher, poller } = createMediated();

      const result = await transport.exec(execRequest);

      expect(dispatcher.triggerBridgeAction).toHaveBeenCalledWith({
        rawCommand: 'nvidia-smi',
        artifactPaths: [],
        requestId: '1700000000-4242',
        denylist: ['rm -rf /'],
        targetDir: '/srv/app',
      });
      expect(poller.waitForRequest).toHaveBeenCalledWith('1700000000-4242', 300_000, undefined);
      expect(result).toEqual({
        method: 'workflow',
        waited: true,
        exitCode: 0,
        stdout: 'GPU 0: ready\n',
        stderr: '',
        requestId: '1700000000-4242',
        runId: '42',
        htmlUrl: RUN_URL,
        conclusion: 'success',
      });
    });

    it('should return right after dispatch when not waiting', async () => {
      const { transport, poller } = createMediated();

      const result = await transport.exec({ ...execRequest, wait: false });

      expect(result).toEqual({
        method: 'workflow',
        waited: false,
        exitCode: 0,
        stdout: '',
        stderr: '',
        requestId: '1700000000-4242',
      });
      expect(poller.waitForRequest).not.toHaveBeenCalled();
    });

    it('should map a failed run to exit code 1', async () => {
      const { transport } = createMediated('failure');

      const result = await transport.exec(execRequest);

      expect(result.exitCode).toBe(1);
      expect(result.conclusion).toBe('failure');
    });

    it('should tolerate missing output', async () => {
      const { transport, artifacts } = createMediated();
      artifacts.fetchBridgeOutputLog.mockRejectedValueOnce(new ForgeError('HTTP 404'));

      const result = await transport.exec(execRequest);

      expect(result.stdout).toBe('');
    });

    it('should download artifacts after a successful run', async () => {
      const { transport, artifacts } = createMediated();

      const result = await transport.exec({ ...execRequest, artifactPaths: ['out.json'], downloadDir: '/tmp/results' });

      expect(artifacts.downloadBridgeArtifact).toHaveBeenCalledWith('1700000000-4242', '/tmp/results');
      expect(result.downloadedTo).toBe('/tmp/results');
    });

    it('should skip the download after a failed run', async () => {
      const { transport, artifacts } = createMediated('failure');

      const result = await transport.exec({ ...execRequest, downloadDir: '/tmp/results' });

      expect(artifacts.downloadBridgeArtifact).not.toHaveBeenCalled();
      expect(result).not.toHaveProperty('downloadedTo');
    });

    it('should wrap download failures', async () => {
      const { transport, artifacts } = createMediated();
      artifacts.downloadBridgeArtifact.mockRejectedValueOnce(new ForgeError('Artifact not found: bridge-action-1700000000-4242'));

      await expect(transport.exec({ ...execRequest, downloadDir: '/tmp/results' })).rejects.toThrow(
        'Artifact download failed: Artifact not found: bridge-action-1700000000-4242'
      );
    });
  });

  describe('fetchLog', () => {
    it('should delegate to log sync', async () => {
      const { transport, logSync, synced } = createMediated();

      expect(await transport.fetchLog('j1', '/logs/j1.log', { refresh: true })).toBe(synced);
      expect(logSync.sync).toHaveBeenCalledWith('j1', '/logs/j1.log', { refresh: true });
    });
  });

  describe('sync', () => {
    const syncRequest = {
      branch: 'main',
      commitSha: 'abc123',
      force: true,
      targetDir: '/srv/app',
      wait: true,
      timeoutMs: 120_000,
    };

    it('should report the pushed sha once the run succeeds', async () => {
      const { transport, dispatcher, poller } = createMediated();

      const result = await transport.sync(syncRequest);

      expect(dispatcher.triggerSync).toHaveBeenCalledWith({
        branch: 'main',
        commitSha: 'abc123',
        force: true,
        targetDir: '/srv/app',
      });
      expect(poller.waitForCompletion).toHaveBeenCalledWith('42', 120_000, undefined);
      expect(result).toEqual({
        method: 'workflow',
        waited: true,
        success: true,
        runId: '42',
        htmlUrl: RUN_URL,
        conclusion: 'success',
        syncedSha: 'abc123',
      });
    });

    it('should report a failed sync run', async () => {
      const { transport } = createMediated('failure');

      const result = await transport.sync(syncRequest);

      expect(result.success).toBe(false);
      expect(result.error).toBe('Sync failed: failure');
    });

    it('should not wait when the run could not be correlated', async () => {
      const { transport, dispatcher, poller } = createMediated();
      dispatcher.triggerSync.mockResolvedValueOnce('');

      const result = await transport.sync(syncRequest);

      expect(result).toEqual({ method: 'workflow', waited: false, success: true });
      expect(poller.waitForCompletion).not.toHaveBeenCalled();
    });

    it('should return the run id without waiting when asked', async () => {
      const { transport } = createMediated();

      const result = await transport.sync({ ...syncRequest, wait: false });

      expect(result).toEqual({ method: 'workflow', waited: false, success: true, runId: '42' });
    });
  });
});
