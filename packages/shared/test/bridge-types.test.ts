import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_USER,
  bridgeFromStored,
  bridgeToStored,
  bridgesFileSchema,
} from '../src/types/bridge.js';

describe('Bridge Types', () => {
  it('should default user and port', () => {
    const parsed = bridgesFileSchema.parse({ bridges: [{ name: 'gpu', proxy_url: 'https://gpu.example.com' }] });

    expect(parsed.default).toBeNull();
    expect(parsed.bridges[0]).toEqual({
      name: 'gpu',
      proxy_url: 'https://gpu.example.com',
      ssh_user: DEFAULT_SSH_USER,
      ssh_port: DEFAULT_SSH_PORT,
    });
  });

  it('should coerce a port written as a string', () => {
    const parsed = bridgesFileSchema.parse({
      bridges: [{ name: 'gpu', proxy_url: 'https://gpu.example.com', ssh_port: '2222' }],
    });

    expect(parsed.bridges[0]?.ssh_port).toBe(2222);
  });

  it('should reject ports out of range', () => {
    const result = bridgesFileSchema.safeParse({
      bridges: [{ name: 'gpu', proxy_url: 'https://gpu.example.com', ssh_port: 70000 }],
    });

    expect(result.success).toBe(false);
  });

  it('should convert between stored and in-memory profiles', () => {
    const profile = { name: 'gpu', proxyUrl: 'https://gpu.example.com', sshUser: 'ubuntu', sshPort: 2222 };

    expect(bridgeToStored(profile)).toEqual({
      name: 'gpu',
      proxy_url: 'https://gpu.example.com',
      ssh_user: 'ubuntu',
      ssh_port: 2222,
    });
    expect(bridgeFromStored(bridgeToStored(profile))).toEqual(profile);
  });
});
