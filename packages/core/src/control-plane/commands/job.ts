/**
 * Job Command
 *
 * - logs <jobId>: show a job's remote log (once, or following it)
 * - logs: refresh cached logs for many jobs (bulk mode)
 *
 * Jobs are looked up in the local job cache, which records the remote log
 * path when a job is submitted.
 *
 * @module control-plane/commands/job
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { z } from 'zod';
import { JobStatus, LogSyncMode, TransportMethod, type LogSyncResult } from '@bridgeline/shared';
import type { FollowEvent } from '../../follow/follow-loop.js';
import { bulkRefreshLogs, type BulkRefreshResult } from '../../logs/bulk-refresh.js';
import type { CachedJob } from '../../logs/job-cache.js';
import { CliContext } from '../context.js';
import { JobNotFoundError, LogNotFoundError, ValidationError, reportError } from '../errors.js';
import {
  bold,
  dim,
  formatBytes,
  formatError,
  formatInfo,
  formatJsonResult,
  formatStatus,
  formatSuccess,
  formatTable,
  formatWarning,
  print,
  printError,
  write,
} from '../formatter.js';
import { nonNegativeInt, positiveInt, repeatable, validateOptions } from '../validators.js';

const SUCCESS_STATUSES: readonly string[] = [JobStatus.SUCCEEDED, JobStatus.JOB_SUCCEEDED];

const logsOptionsSchema = z.object({
  tail: positiveInt.optional(),
  head: positiveInt.optional(),
  path: z.boolean().default(false),
  refresh: z.boolean().default(false),
  follow: z.boolean().default(false),
  interval: positiveInt.default(30),
  status: repeatable,
  limit: nonNegativeInt.default(0),
  tunnel: z.boolean().default(true),
  bridge: z.string().optional(),
  json: z.boolean().default(false),
});

export type LogsOptions = z.infer<typeof logsOptionsSchema>;

/**
 * Create the job command with subcommands.
 */
export function createJobCommand(): Command {
  return new Command('job').description('Inspect jobs recorded in the local cache').addCommand(createLogsSubcommand());
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function createLogsSubcommand(): Command {
  return new Command('logs')
    .description('Show a job log, or refresh cached logs for many jobs when no job id is given')
    .argument('[jobId]', 'Job id')
    .option('-n, --tail <lines>', 'Show the last N lines only')
    .option('--head <lines>', 'Show the first N lines only')
    .option('--path', 'Print the remote log path without fetching it')
    .option('--refresh', 'Re-fetch the log from the beginning')
    .option('-f, --follow', 'Keep showing new log content until the job ends')
    .option('--interval <seconds>', 'Poll interval for --follow over workflows', '30')
    .option('-s, --status <status>', 'Status filter for bulk mode (repeatable)', collect)
    .option('-m, --limit <count>', 'Max cached jobs to process in bulk mode (0 = all)', '0')
    .option('--no-tunnel', 'Skip the SSH tunnel and always use workflows')
    .option('--bridge <name>', 'Bridge profile to use instead of the default')
    .action(async (jobId: string | undefined, _options: Record<string, unknown>, command: Command) => {
      const raw = command.optsWithGlobals();
      try {
        await executeJobLogs(jobId, validateOptions(logsOptionsSchema, raw));
      } catch (error) {
        reportError(error, raw['json'] === true);
      }
    });
}

/**
 * Execute the job logs command.
 */
export async function executeJobLogs(
  jobId: string | undefined,
  options: LogsOptions,
  context: CliContext = new CliContext()
): Promise<void> {
  if (!jobId) {
    if (options.tail || options.head || options.path || options.follow) {
      throw new ValidationError('--tail, --head, --path and --follow require a job id');
    }
    const result = await bulkRefreshLogs(context.jobCache, context.forge().logSync, {
      statuses: options.status,
      limit: options.limit,
      refresh: options.refresh,
    });
    renderBulkResult(result, options.json);
    if (result.errors.length > 0) process.exitCode = 1;
    return;
  }

  if (options.tail && options.head) {
    throw new ValidationError('--tail and --head cannot be combined');
  }

  const job = await context.jobCache.getJob(jobId);
  if (!job) {
    throw new JobNotFoundError(jobId);
  }
  const remoteLogPath = job.log_path;
  if (!remoteLogPath) {
    throw new LogNotFoundError(`No log file recorded for job ${jobId}`, jobId);
  }

  if (options.path) {
    print(options.json ? formatJsonResult({ job_id: jobId, log_path: remoteLogPath }) : remoteLogPath);
    return;
  }

  if (options.follow) {
    const status = await followJobLog(job, remoteLogPath, options, context);
    process.exitCode = status !== null && !SUCCESS_STATUSES.includes(status) ? 1 : 0;
    return;
  }

  await showJobLog(jobId, remoteLogPath, options, context);
}

// ============================================================================
// Single Job
// ============================================================================

function selectLines(content: string, options: Pick<LogsOptions, 'tail' | 'head'>): string[] {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  if (options.tail) return lines.slice(-options.tail);
  if (options.head) return lines.slice(0, options.head);
  return lines;
}

async function showJobLog(
  jobId: string,
  remoteLogPath: string,
  options: LogsOptions,
  context: CliContext
): Promise<void> {
  const router = await context.router((notice) => {
    if (!options.json) printError(formatWarning(`${notice.reason}; using workflow (slower)`));
  });

  const fetched = await router.fetchLog({
    jobId,
    remoteLogPath,
    tail: options.tail,
    head: options.head,
    refresh: options.refresh,
    timeoutMs: context.config.remoteTimeoutSec * 1000,
    bridgeName: options.bridge,
    noTunnel: !options.tunnel,
  });

  if (fetched.method === TransportMethod.SSH_TUNNEL) {
    renderLines(selectLines(fetched.content, {}), {
      json: options.json,
      jobId,
      logPath: remoteLogPath,
      method: fetched.method,
      tail: options.tail,
      head: options.head,
    });
    return;
  }

  const synced: LogSyncResult = fetched.sync;
  let content: string;
  try {
    content = await readFile(synced.cachePath, 'utf-8');
  } catch (error) {
    throw new LogNotFoundError(
      `Failed to retrieve log for job ${jobId}: ${error instanceof Error ? error.message : String(error)}`,
      jobId
    );
  }

  if (!options.json && synced.noNewContent && synced.mode === LogSyncMode.INCREMENTAL) {
    printError(dim('No new content. If the log was rotated, use --refresh.'));
  }

  renderLines(selectLines(content, options), {
    json: options.json,
    jobId,
    logPath: synced.cachePath,
    method: fetched.method,
    tail: options.tail,
    head: options.head,
  });
}

interface RenderLinesOptions {
  json: boolean;
  jobId: string;
  logPath: string;
  method: string;
  tail: number | undefined;
  head: number | undefined;
}

function renderLines(lines: string[], options: RenderLinesOptions): void {
  if (options.json) {
    print(
      formatJsonResult({
        job_id: options.jobId,
        log_path: options.logPath,
        method: options.method,
        lines,
        count: lines.length,
      })
    );
    return;
  }

  if (options.tail) {
    print(bold(`=== Last ${lines.length} lines ===`));
  } else if (options.head) {
    print(bold(`=== First ${lines.length} lines ===`));
  }
  for (const line of lines) {
    print(line);
  }
}

// ============================================================================
// Follow
// ============================================================================

function renderFollowEvent(event: FollowEvent, json: boolean): void {
  if (json) {
    print(JSON.stringify(event));
    return;
  }
  switch (event.type) {
    case 'initial_content':
    case 'new_content':
    case 'final_content':
      write(event.text);
      break;
    case 'warning':
      printError(formatWarning(event.message));
      break;
    case 'job_completed':
      printError(formatInfo(`Job finished with status ${formatStatus(event.status)}`));
      break;
  }
}

/**
 * Follow until the job ends or the user presses Ctrl-C.
 *
 * @returns the terminal job status, or null when interrupted
 */
async function followJobLog(
  job: CachedJob,
  remoteLogPath: string,
  options: LogsOptions,
  context: CliContext
): Promise<string | null> {
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const onEvent = (event: FollowEvent): void => renderFollowEvent(event, options.json);

  try {
    const tunnelConfig = await context.tunnelConfig();
    if (options.tunnel && tunnelConfig.bridges.size > 0) {
      const tunnel = await context.tunnel();
      if (await tunnel.isAvailable(options.bridge)) {
        if (!options.json) printError(dim('Following over SSH tunnel (Ctrl-C to stop)'));
        return await context.followLoop().followDirect(tunnel, {
          jobId: job.job_id,
          remoteLogPath,
          bridgeName: options.bridge,
          tailLines: options.tail ?? 50,
          signal: controller.signal,
          onEvent,
        });
      }
      if (!options.json) printError(formatWarning('Tunnel not available; following via workflow (slower)'));
    }

    if (!options.json) {
      printError(dim(`Following via workflow every ${options.interval}s (Ctrl-C to stop)`));
    }
    return await context.followLoop().followMediated({
      jobId: job.job_id,
      remoteLogPath,
      refresh: options.refresh,
      intervalMs: options.interval * 1000,
      signal: controller.signal,
      onEvent,
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

// ============================================================================
// Bulk
// ============================================================================

function renderBulkResult(result: BulkRefreshResult, json: boolean): void {
  if (json) {
    print(formatJsonResult(result, result.errors.length === 0));
    return;
  }

  if (result.processed === 0) {
    const filter = result.statusFilter.length > 0 ? ` matching ${result.statusFilter.join(', ')}` : '';
    print(formatInfo(`No cached jobs${filter}`));
    return;
  }

  if (result.updated.length > 0) {
    print(
      formatTable(result.updated, [
        { header: 'JOB', width: 44, value: (item) => item.jobId },
        { header: 'ADDED', width: 10, value: (item) => formatBytes(item.bytesAdded) },
        { header: 'CACHE', width: 60, value: (item) => item.cachePath },
      ])
    );
  }
  for (const jobId of result.skippedNoLogPath) {
    printError(dim(`Skipped ${jobId}: no log path recorded`));
  }
  for (const failure of result.errors) {
    printError(formatError(`${failure.jobId}: ${failure.error}`));
  }

  const summary = `Refreshed ${result.updated.length} of ${result.processed} job logs`;
  print(result.errors.length === 0 ? formatSuccess(summary) : formatWarning(summary));
}
