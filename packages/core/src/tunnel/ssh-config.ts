/**
 * `~/.ssh/config` entries so plain `ssh <bridge>` (and editors' remote
 * plugins) can reach a Bridge without this CLI.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import type { BridgeProfile } from '@bridgeline/shared';
import type { TunnelConfig } from './profiles.js';
import { toWebSocketUrl } from './ssh-transport.js';

export function defaultSshConfigPath(): string {
  return join(homedir(), '.ssh', 'config');
}

export function generateSshConfig(profile: BridgeProfile, helperPath: string, hostAlias?: string): string {
  return [
    `Host ${hostAlias ?? profile.name}`,
    '    HostName localhost',
    `    User ${profile.sshUser}`,
    `    Port ${profile.sshPort}`,
    `    ProxyCommand ${helperPath} ${toWebSocketUrl(profile.proxyUrl)} stdio://%h:%p`,
    '    StrictHostKeyChecking no',
    '    UserKnownHostsFile /dev/null',
    '    LogLevel ERROR',
  ].join('\n');
}

export function generateAllSshConfigs(config: TunnelConfig, helperPath: string): string {
  return config
    .listBridges()
    .map((profile) => generateSshConfig(profile, helperPath))
    .join('\n\n');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace the `Host <alias>` block in `existing` (up to the next `Host`
 * line or blank line), or append the block.
 */
export function mergeSshConfig(existing: string, block: string, hostAlias: string): { content: string; updated: boolean } {
  const alias = escapeRegExp(hostAlias);
  const blockPattern = new RegExp(`^Host\\s+(?:.*\\s)?${alias}(?:\\s.*)?$(?:\\n(?!Host\\s)(?=.*\\S).*)*`, 'm');

  if (blockPattern.test(existing)) {
    const content = existing.replace(blockPattern, () => block);
    return { content, updated: true };
  }

  let content = existing;
  if (content && !content.endsWith('\n')) content += '\n';
  if (content) content += '\n';
  return { content: `${content}${block}\n`, updated: false };
}

export async function installSshConfig(
  block: string,
  hostAlias: string,
  path: string = defaultSshConfigPath()
): Promise<{ updated: boolean; path: string }> {
  await mkdir(dirname(path), { recursive: true, mode: 0o700 });

  let existing = '';
  try {
    existing = await readFile(path, 'utf-8');
  } catch {
    existing = '';
  }

  const { content, updated } = mergeSshConfig(existing, block, hostAlias);
  await writeFile(path, content, { mode: 0o600 });
  return { updated, path };
}
