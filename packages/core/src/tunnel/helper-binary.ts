/**
 * Installs the WebSocket-to-stdio helper used as the SSH ProxyCommand.
 */

import { constants } from 'node:fs';
import { access, chmod, copyFile, mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { execa } from 'execa';
import { createLogger } from '../utils/logger.js';
import { TunnelError } from './errors.js';

const log = createLogger('tunnel:helper');

export interface HelperInstallOptions {
  binPath: string;
  downloadUrl: string;
  fetch?: typeof fetch;
}

export async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function findFile(dir: string, needle: string): Promise<string | null> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = await findFile(path, needle);
      if (nested) return nested;
    } else if (entry.isFile() && entry.name.includes(needle)) {
      return path;
    }
  }
  return null;
}

/**
 * Return the helper path, downloading and unpacking the release tarball
 * first when the binary is missing or not executable.
 */
export async function ensureHelperBinary(options: HelperInstallOptions): Promise<string> {
  const { binPath, downloadUrl } = options;
  if (await isExecutable(binPath)) {
    return binPath;
  }

  const fetchFn = options.fetch ?? fetch;
  const workDir = await mkdtemp(join(tmpdir(), 'bridgeline-helper-'));
  const helperName = basename(binPath);

  try {
    log.info({ downloadUrl, binPath }, 'Downloading tunnel helper');
    const response = await fetchFn(downloadUrl);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${downloadUrl}`);
    }

    const archive = join(workDir, 'download.tar.gz');
    const unpacked = join(workDir, 'unpacked');
    await writeFile(archive, new Uint8Array(await response.arrayBuffer()));
    await mkdir(unpacked);
    await execa('tar', ['-xzf', archive, '-C', unpacked]);

    const extracted = await findFile(unpacked, helperName);
    if (!extracted) {
      throw new Error(`${helperName} binary not found in archive`);
    }

    await mkdir(dirname(binPath), { recursive: true });
    await copyFile(extracted, binPath);
    await chmod(binPath, 0o755);
    return binPath;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TunnelError(`Failed to download ${helperName}: ${reason}`, { cause: error });
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
