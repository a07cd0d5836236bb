import { z } from 'zod';

export const DEFAULT_SSH_USER = 'root';
export const DEFAULT_SSH_PORT = 22222;

/**
 * A named proxy endpoint for reaching a Bridge host over SSH.
 */
export interface BridgeProfile {
  name: string;
  proxyUrl: string;
  sshUser: string;
  sshPort: number;
}

// Persisted shape (snake_case) in bridges.json
export const storedBridgeSchema = z.object({
  name: z.string().min(1),
  proxy_url: z.string().min(1),
  ssh_user: z.string().min(1).default(DEFAULT_SSH_USER),
  ssh_port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SSH_PORT),
});

export type StoredBridge = z.infer<typeof storedBridgeSchema>;

export const bridgesFileSchema = z.object({
  default: z.string().nullable().default(null),
  bridges: z.array(storedBridgeSchema).default([]),
});

export type BridgesFile = z.infer<typeof bridgesFileSchema>;

export function bridgeFromStored(stored: StoredBridge): BridgeProfile {
  return {
    name: stored.name,
    proxyUrl: stored.proxy_url,
    sshUser: stored.ssh_user,
    sshPort: stored.ssh_port,
  };
}

export function bridgeToStored(profile: BridgeProfile): StoredBridge {
  return {
    name: profile.name,
    proxy_url: profile.proxyUrl,
    ssh_user: profile.sshUser,
    ssh_port: profile.sshPort,
  };
}
