/**
 * Sync Command
 *
 * Pushes the local branch, then brings the Bridge checkout to the same
 * commit: `git fetch` + checkout over the SSH tunnel when it answers,
 * otherwise through the sync workflow.
 *
 * @module control-plane/commands/sync
 */

import { Command } from 'commander';
import { z } from 'zod';
import { TransportMethod, type SyncResult } from '@bridgeline/shared';
import { ConfigError } from '../../config/index.js';
import { hasUncommittedChanges, pushBranch, readLocalHead } from '../../git/local-repo.js';
import { CliContext } from '../context.js';
import { reportError } from '../errors.js';
import {
  dim,
  formatError,
  formatInfo,
  formatJsonResult,
  formatSuccess,
  formatWarning,
  print,
  printError,
} from '../formatter.js';
import { positiveInt, validateOptions } from '../validators.js';

const syncOptionsSchema = z.object({
  branch: z.string().min(1).optional(),
  remote: z.string().min(1).optional(),
  push: z.boolean().default(true),
  force: z.boolean().default(false),
  wait: z.boolean().default(true),
  timeout: positiveInt.default(120),
  tunnel: z.boolean().default(true),
  bridge: z.string().optional(),
  json: z.boolean().default(false),
});

export type SyncOptions = z.infer<typeof syncOptionsSchema>;

export function createSyncCommand(): Command {
  return new Command('sync')
    .description('Push the current branch and sync the Bridge checkout to it')
    .option('-b, --branch <name>', 'Branch to sync (default: current branch)')
    .option('-r, --remote <name>', 'Git remote to push to (default: BRIDGELINE_DEFAULT_REMOTE)')
    .option('--no-push', 'Skip git push and only sync the Bridge')
    .option('-f, --force', 'Reset the Bridge checkout hard, discarding changes there')
    .option('--no-wait', 'Do not wait for the sync workflow to finish')
    .option('--timeout <seconds>', 'Timeout when waiting for the sync', '120')
    .option('--no-tunnel', 'Skip the SSH tunnel and always use the workflow')
    .option('--bridge <name>', 'Bridge profile to use instead of the default')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const raw = command.optsWithGlobals();
      try {
        await executeSync(validateOptions(syncOptionsSchema, raw));
      } catch (error) {
        reportError(error, raw['json'] === true);
      }
    });
}

/**
 * Execute the sync command.
 */
export async function executeSync(
  options: SyncOptions,
  context: CliContext = new CliContext(),
  cwd: string = process.cwd()
): Promise<SyncResult> {
  const { config } = context;
  if (!config.targetDir) {
    throw new ConfigError('BRIDGELINE_TARGET_DIR must be set to sync code to the Bridge');
  }

  const head = await readLocalHead(cwd);
  const branch = options.branch ?? head.branch;
  const remote = options.remote ?? config.defaultRemote;

  if (!options.json && (await hasUncommittedChanges(cwd))) {
    printError(formatWarning('You have uncommitted changes. They will NOT be synced.'));
  }

  if (options.push) {
    if (!options.json) print(dim(`Pushing ${branch} to ${remote}...`));
    await pushBranch(cwd, remote, branch);
  }

  const router = await context.router((notice) => {
    if (!options.json) printError(formatWarning(`${notice.reason}; using workflow (slower)`));
  });

  const result = await router.syncCode({
    branch,
    commitSha: head.sha,
    force: options.force,
    targetDir: config.targetDir,
    remote,
    wait: options.wait,
    timeoutMs: options.timeout * 1000,
    bridgeName: options.bridge,
    noTunnel: !options.tunnel,
  });

  renderSyncResult(result, { branch, remote, subject: head.subject, sha: head.sha, targetDir: config.targetDir }, options.json);
  process.exitCode = result.success ? 0 : 1;
  return result;
}

interface SyncSummary {
  branch: string;
  remote: string;
  subject: string;
  sha: string;
  targetDir: string;
}

function renderSyncResult(result: SyncResult, summary: SyncSummary, json: boolean): void {
  if (json) {
    print(formatJsonResult({ ...result, branch: summary.branch, remote: summary.remote }, result.success));
    return;
  }

  if (!result.success) {
    printError(formatError(result.error ?? 'Sync failed'));
    if (result.htmlUrl) printError(dim(`  See: ${result.htmlUrl}`));
    return;
  }

  const shortSha = (result.syncedSha ?? summary.sha).slice(0, 7);
  if (!result.waited) {
    print(formatSuccess(`Triggered sync workflow${result.runId ? ` (run ${result.runId})` : ''}`));
    print(`  Commit: ${shortSha} - ${summary.subject}`);
    print(formatInfo('Not waiting for completion'));
    return;
  }

  print(formatSuccess(`Synced branch '${summary.branch}' (${shortSha}) to ${summary.targetDir}`));
  print(`  Commit: ${summary.subject}`);
  print(`  Method: ${result.method === TransportMethod.SSH_TUNNEL ? 'SSH tunnel' : 'workflow'}`);
}
