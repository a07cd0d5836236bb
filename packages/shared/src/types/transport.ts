/**
 * How a remote operation was carried out.
 */
export const TransportMethod = {
  SSH_TUNNEL: 'ssh_tunnel',
  WORKFLOW: 'workflow',
} as const;

export type TransportMethod = (typeof TransportMethod)[keyof typeof TransportMethod];

export interface ExecResult {
  method: TransportMethod;
  /** False when the command was dispatched without waiting for it */
  waited: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  requestId?: string;
  runId?: string;
  htmlUrl?: string;
  conclusion?: string;
  downloadedTo?: string;
}

export interface SyncResult {
  method: TransportMethod;
  waited: boolean;
  success: boolean;
  syncedSha?: string;
  runId?: string;
  htmlUrl?: string;
  conclusion?: string;
  error?: string;
}

export const LogSyncMode = {
  INCREMENTAL: 'incremental',
  FULL: 'full',
} as const;

export type LogSyncMode = (typeof LogSyncMode)[keyof typeof LogSyncMode];

export interface LogSyncResult {
  cachePath: string;
  mode: LogSyncMode;
  bytesAdded: number;
  offset: number;
  noNewContent: boolean;
}
