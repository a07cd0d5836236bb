/**
 * CLI Context Tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadConfig } from '../../src/config/index.js';
import { CliContext } from '../../src/control-plane/context.js';
import { ForgeAuthError } from '../../src/forge/errors.js';
import type { SshTunnelTransport } from '../../src/tunnel/ssh-transport.js';

describe('CliContext without forge credentials', () => {
  let dir: string;
  let context: CliContext;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bridgeline-context-'));
    context = new CliContext({ config: loadConfig({ BRIDGELINE_HOME: dir }) });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should refuse forge services', () => {
    expect(() => context.forge()).toThrow(ForgeAuthError);
  });

  it('should follow a log over the tunnel', async () => {
    const tunnel = {
      waitForRemoteFile: vi.fn(async () => true),
      followRemoteFile: vi.fn(async (_path: string, options: { onLine: (line: string) => void }) => {
        options.onLine('epoch 1');
        return 'SUCCEEDED';
      }),
    } as unknown as SshTunnelTransport;
    const texts: string[] = [];

    const status = await context.followLoop().followDirect(tunnel, {
      jobId: 'j1',
      remoteLogPath: '/logs/j1.log',
      onEvent: (event) => {
        if (event.type === 'new_content') texts.push(event.text);
      },
    });

    expect(status).toBe('SUCCEEDED');
    expect(texts).toEqual(['epoch 1\n']);
  });
});
