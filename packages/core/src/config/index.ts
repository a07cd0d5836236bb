/**
 * bridgeline configuration
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { defaultHomeDir, expandHome } from '../utils/paths.js';

const log = createLogger('config');

export const GitPlatform = {
  GITEA: 'gitea',
  GITHUB: 'github',
} as const;

export type GitPlatform = (typeof GitPlatform)[keyof typeof GitPlatform];

export const DEFAULT_GITEA_SERVER = 'https://codeberg.org';
export const DEFAULT_GITHUB_SERVER = 'https://github.com';
export const DEFAULT_HELPER_DOWNLOAD_URL =
  'https://github.com/Sarfflow/rtunnel/releases/download/nightly/rtunnel-linux-amd64.tar.gz';

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Split a comma or newline separated list, dropping blanks.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/[,\n]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse `K=V,K2=V2` into a map. Entries without `=` are ignored.
 */
export function parseEnvPairs(value: string | undefined): Record<string, string> {
  const pairs: Record<string, string> = {};
  for (const item of parseList(value)) {
    const eq = item.indexOf('=');
    if (eq <= 0) continue;
    pairs[item.slice(0, eq).trim()] = item.slice(eq + 1).trim();
  }
  return pairs;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const forgeSchema = (defaultServer: string) =>
  z.object({
    server: optionalText.transform((value) => (value ?? defaultServer).replace(/\/+$/, '')),
    repo: optionalText,
    token: optionalText,
  });

const configSchema = z.object({
  platform: optionalText.pipe(
    z
      .string()
      .transform((value) => value.toLowerCase())
      .pipe(z.enum([GitPlatform.GITEA, GitPlatform.GITHUB]))
      .optional()
  ),
  gitea: forgeSchema(DEFAULT_GITEA_SERVER),
  github: forgeSchema(DEFAULT_GITHUB_SERVER),

  workflows: z.object({
    log: optionalText.transform((value) => value ?? 'retrieve_job_log.yml'),
    sync: optionalText.transform((value) => value ?? 'sync_code.yml'),
    bridge: optionalText.transform((value) => value ?? 'run_bridge_action.yml'),
  }),

  // Paths
  homeDir: optionalText,
  logCacheDir: optionalText,
  jobCachePath: optionalText,
  targetDir: optionalText,

  // Timeouts (seconds)
  remoteTimeoutSec: z.coerce.number().int().min(5).max(86400).default(90),
  bridgeActionTimeoutSec: z.coerce.number().int().min(5).max(86400).default(300),

  bridgeDenylist: z.string().optional().transform(parseList),
  remoteEnv: z.string().optional().transform(parseEnvPairs),
  defaultRemote: optionalText.transform((value) => value ?? 'origin'),
  helperDownloadUrl: optionalText.transform((value) => value ?? DEFAULT_HELPER_DOWNLOAD_URL),
});

type ParsedConfig = z.infer<typeof configSchema>;

export type ForgeSettings = ParsedConfig['gitea'];

export interface BridgelineConfig {
  platform: GitPlatform;
  gitea: ForgeSettings;
  github: ForgeSettings;
  workflows: ParsedConfig['workflows'];
  homeDir: string;
  logCacheDir: string;
  jobCachePath: string;
  targetDir: string | undefined;
  remoteTimeoutSec: number;
  bridgeActionTimeoutSec: number;
  bridgeDenylist: string[];
  remoteEnv: Record<string, string>;
  defaultRemote: string;
  helperDownloadUrl: string;
}

/**
 * Explicit platform wins; otherwise any GitHub setting selects GitHub.
 */
export function resolvePlatform(parsed: Pick<ParsedConfig, 'platform' | 'github'>): GitPlatform {
  if (parsed.platform) return parsed.platform;
  if (parsed.github.repo || parsed.github.token) return GitPlatform.GITHUB;
  return GitPlatform.GITEA;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgelineConfig {
  const raw = {
    platform: env['BRIDGELINE_GIT_PLATFORM'],
    gitea: {
      server: env['BRIDGELINE_GITEA_SERVER'],
      repo: env['BRIDGELINE_GITEA_REPO'],
      token: env['BRIDGELINE_GITEA_TOKEN'],
    },
    github: {
      server: env['BRIDGELINE_GITHUB_SERVER'],
      repo: env['BRIDGELINE_GITHUB_REPO'],
      token: env['BRIDGELINE_GITHUB_TOKEN'] ?? env['GITHUB_TOKEN'],
    },
    workflows: {
      log: env['BRIDGELINE_LOG_WORKFLOW'],
      sync: env['BRIDGELINE_SYNC_WORKFLOW'],
      bridge: env['BRIDGELINE_BRIDGE_WORKFLOW'],
    },
    homeDir: env['BRIDGELINE_HOME'],
    logCacheDir: env['BRIDGELINE_LOG_CACHE_DIR'],
    jobCachePath: env['BRIDGELINE_JOB_CACHE'],
    targetDir: env['BRIDGELINE_TARGET_DIR'],
    remoteTimeoutSec: env['BRIDGELINE_REMOTE_TIMEOUT'],
    bridgeActionTimeoutSec: env['BRIDGELINE_BRIDGE_ACTION_TIMEOUT'],
    bridgeDenylist: env['BRIDGELINE_BRIDGE_DENYLIST'],
    remoteEnv: env['BRIDGELINE_REMOTE_ENV'],
    defaultRemote: env['BRIDGELINE_DEFAULT_REMOTE'],
    helperDownloadUrl: env['BRIDGELINE_HELPER_DOWNLOAD_URL'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new ConfigError(`Configuration validation failed: ${result.error.message}`);
  }

  const parsed = result.data;
  const homeDir = expandHome(parsed.homeDir ?? defaultHomeDir());

  const config: BridgelineConfig = {
    platform: resolvePlatform(parsed),
    gitea: parsed.gitea,
    github: parsed.github,
    workflows: parsed.workflows,
    homeDir,
    logCacheDir: expandHome(parsed.logCacheDir ?? join(homeDir, 'logs')),
    jobCachePath: expandHome(parsed.jobCachePath ?? join(homeDir, 'jobs.json')),
    targetDir: parsed.targetDir,
    remoteTimeoutSec: parsed.remoteTimeoutSec,
    bridgeActionTimeoutSec: parsed.bridgeActionTimeoutSec,
    bridgeDenylist: parsed.bridgeDenylist,
    remoteEnv: parsed.remoteEnv,
    defaultRemote: parsed.defaultRemote,
    helperDownloadUrl: parsed.helperDownloadUrl,
  };

  log.debug(
    {
      platform: config.platform,
      homeDir: config.homeDir,
      remoteTimeoutSec: config.remoteTimeoutSec,
      bridgeActionTimeoutSec: config.bridgeActionTimeoutSec,
    },
    'Configuration loaded'
  );

  return config;
}
