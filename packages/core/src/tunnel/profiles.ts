/**
 * Bridge profiles
 *
 * Named proxy endpoints persisted in `<configDir>/bridges.json`. An older
 * single-bridge `tunnel.conf` (KEY=VALUE lines) is migrated on load.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_USER,
  bridgeFromStored,
  bridgeToStored,
  bridgesFileSchema,
  type BridgeProfile,
  type BridgesFile,
} from '@bridgeline/shared';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('tunnel:profiles');

export const BRIDGES_FILE = 'bridges.json';
export const LEGACY_TUNNEL_FILE = 'tunnel.conf';
export const HELPER_BINARY_NAME = 'rtunnel';

export function defaultHelperPath(): string {
  return join(homedir(), '.local', 'bin', HELPER_BINARY_NAME);
}

export function createBridgeProfile(
  name: string,
  proxyUrl: string,
  overrides: { sshUser?: string | undefined; sshPort?: number | undefined } = {}
): BridgeProfile {
  return {
    name,
    proxyUrl,
    sshUser: overrides.sshUser ?? DEFAULT_SSH_USER,
    sshPort: overrides.sshPort ?? DEFAULT_SSH_PORT,
  };
}

export class TunnelConfig {
  readonly bridges = new Map<string, BridgeProfile>();
  defaultBridge: string | null = null;

  constructor(
    readonly configDir: string,
    readonly helperBin: string = defaultHelperPath()
  ) {}

  get configFile(): string {
    return join(this.configDir, BRIDGES_FILE);
  }

  /**
   * Named profile; otherwise the default; otherwise the only profile.
   */
  getBridge(name?: string | null): BridgeProfile | undefined {
    if (name) {
      return this.bridges.get(name);
    }
    if (this.defaultBridge) {
      return this.bridges.get(this.defaultBridge);
    }
    if (this.bridges.size === 1) {
      return this.bridges.values().next().value;
    }
    return undefined;
  }

  addBridge(profile: BridgeProfile): void {
    this.bridges.set(profile.name, profile);
    if (this.defaultBridge === null) {
      this.defaultBridge = profile.name;
    }
  }

  removeBridge(name: string): boolean {
    if (!this.bridges.delete(name)) {
      return false;
    }
    if (this.defaultBridge === name) {
      this.defaultBridge = this.bridges.keys().next().value ?? null;
    }
    return true;
  }

  setDefault(name: string): boolean {
    if (!this.bridges.has(name)) return false;
    this.defaultBridge = name;
    return true;
  }

  listBridges(): BridgeProfile[] {
    return [...this.bridges.values()];
  }

  serialize(): BridgesFile {
    return {
      default: this.defaultBridge,
      bridges: this.listBridges().map(bridgeToStored),
    };
  }
}

/**
 * Parse the legacy `tunnel.conf` into a proxy URL and user.
 */
export function parseLegacyTunnelConf(text: string): { proxyUrl?: string; sshUser: string } {
  const result: { proxyUrl?: string; sshUser: string } = { sshUser: DEFAULT_SSH_USER };
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq < 0) continue;
    const key = line.slice(0, eq).trim();
    const value = line
      .slice(eq + 1)
      .trim()
      .replace(/^["']+|["']+$/g, '');
    if (key === 'PROXY_URL') result.proxyUrl = value;
    else if (key === 'SSH_USER') result.sshUser = value;
  }
  return result;
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return null;
  }
}

export async function loadTunnelConfig(configDir: string, helperBin?: string): Promise<TunnelConfig> {
  const config = new TunnelConfig(configDir, helperBin);

  const text = await readOptional(config.configFile);
  if (text !== null) {
    try {
      const parsed = bridgesFileSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        for (const stored of parsed.data.bridges) {
          config.bridges.set(stored.name, bridgeFromStored(stored));
        }
        config.defaultBridge = parsed.data.default;
      } else {
        log.warn({ path: config.configFile, issues: parsed.error.issues }, 'Ignoring malformed bridges file');
      }
    } catch (error) {
      log.warn({ err: error, path: config.configFile }, 'Ignoring unreadable bridges file');
    }
  }

  if (config.bridges.size === 0) {
    const legacy = await readOptional(join(configDir, LEGACY_TUNNEL_FILE));
    if (legacy !== null) {
      const { proxyUrl, sshUser } = parseLegacyTunnelConf(legacy);
      if (proxyUrl) {
        config.addBridge(createBridgeProfile('default', proxyUrl, { sshUser }));
        await saveTunnelConfig(config);
        log.info({ configDir }, 'Migrated legacy tunnel configuration');
      }
    }
  }

  return config;
}

export async function saveTunnelConfig(config: TunnelConfig): Promise<void> {
  await writeFileAtomic(config.configFile, `${JSON.stringify(config.serialize(), null, 2)}\n`);
}
