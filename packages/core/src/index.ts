// Configuration
export {
  loadConfig,
  resolvePlatform,
  ConfigError,
  GitPlatform,
  type BridgelineConfig,
  type ForgeSettings,
} from './config/index.js';

// Forge
export {
  BaseForgeClient,
  GiteaClient,
  GitHubClient,
  createForgeClient,
  sanitizeToken,
  type ForgeClient,
  type ForgeClientOptions,
} from './forge/client.js';
export { ForgeSession, createForgeSession } from './forge/session.js';
export { ForgeError, ForgeAuthError, TimeoutError } from './forge/errors.js';
export { WorkflowDispatcher, newRequestId } from './forge/dispatcher.js';
export { RunPoller, type PollProgressEvent } from './forge/run-poller.js';
export { ArtifactRetriever, logArtifactName, bridgeArtifactName } from './forge/artifacts.js';

// Tunnel
export {
  TunnelConfig,
  loadTunnelConfig,
  saveTunnelConfig,
  createBridgeProfile,
} from './tunnel/profiles.js';
export { SshTunnelTransport, buildSshArgs, buildProxyCommand, type TunnelStatus } from './tunnel/ssh-transport.js';
export { generateSshConfig, installSshConfig } from './tunnel/ssh-config.js';
export { TunnelError, TunnelNotAvailableError, BridgeNotFoundError } from './tunnel/errors.js';

// Transports
export { MediatedTransport } from './transport/mediated.js';
export { TransportRouter, type FallbackNotice, type FetchLogResult } from './transport/router.js';

// Logs
export { JobCache, type CachedJob } from './logs/job-cache.js';
export { LogSync, pruneOldLogs } from './logs/log-sync.js';
export { bulkRefreshLogs, type BulkRefreshResult } from './logs/bulk-refresh.js';
export { FollowLoop, type FollowEvent } from './follow/follow-loop.js';
export { CachedJobStatusSource, type JobStatusSource } from './jobs/status.js';

// CLI
export { createProgram, runCli } from './control-plane/cli.js';
export { CliContext } from './control-plane/context.js';
export { ExitCode, exitCodeFor } from './control-plane/errors.js';
