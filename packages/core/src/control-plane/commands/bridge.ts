/**
 * Bridge Command
 *
 * Runs a shell command on the Bridge:
 * - exec: over the SSH tunnel when it answers, otherwise via the bridge
 *   action workflow
 *
 * @module control-plane/commands/bridge
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { ExecResult } from '@bridgeline/shared';
import { ConfigError } from '../../config/index.js';
import { TransportRouter, type FallbackNotice } from '../../transport/router.js';
import { CliContext } from '../context.js';
import { reportError } from '../errors.js';
import {
  dim,
  formatInfo,
  formatJsonResult,
  formatSuccess,
  formatWarning,
  print,
  printError,
  write,
} from '../formatter.js';
import { positiveInt, repeatable, validateOptions } from '../validators.js';

const execOptionsSchema = z.object({
  denylist: repeatable,
  artifactPath: repeatable,
  download: z.string().optional(),
  wait: z.boolean().default(true),
  timeout: positiveInt.optional(),
  tunnel: z.boolean().default(true),
  bridge: z.string().optional(),
  json: z.boolean().default(false),
});

export type ExecOptions = z.infer<typeof execOptionsSchema>;

/**
 * Create the bridge command with subcommands.
 */
export function createBridgeCommand(): Command {
  return new Command('bridge')
    .description('Run commands on the Bridge host')
    .addCommand(createExecSubcommand());
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function createExecSubcommand(): Command {
  return new Command('exec')
    .description('Execute a shell command in the Bridge checkout')
    .argument('<command>', 'Shell command to run')
    .option('--denylist <pattern>', 'Extra denylist pattern (repeatable)', collect)
    .option('--artifact-path <path>', 'Path to upload as an artifact (repeatable)', collect)
    .option('--download <dir>', 'Download artifacts into this directory')
    .option('--no-wait', 'Return once the workflow is dispatched')
    .option('--timeout <seconds>', 'Maximum time to wait for completion')
    .option('--no-tunnel', 'Skip the SSH tunnel and always use the workflow')
    .option('--bridge <name>', 'Bridge profile to use instead of the default')
    .action(async (commandText: string, _options: Record<string, unknown>, command: Command) => {
      const raw = command.optsWithGlobals();
      const json = raw['json'] === true;
      try {
        await executeBridgeExec(commandText, validateOptions(execOptionsSchema, raw));
      } catch (error) {
        reportError(error, json);
      }
    });
}

/**
 * Execute the bridge exec command.
 */
export async function executeBridgeExec(
  commandText: string,
  options: ExecOptions,
  context: CliContext = new CliContext()
): Promise<ExecResult> {
  const { config } = context;
  if (!config.targetDir) {
    throw new ConfigError('BRIDGELINE_TARGET_DIR must be set to run commands on the Bridge');
  }

  const onFallback = (notice: FallbackNotice): void => {
    if (!options.json) {
      printError(formatWarning(`${notice.reason}; using workflow (slower)`));
    }
  };
  const router = await context.router(onFallback);
  const timeoutSec = options.timeout ?? config.bridgeActionTimeoutSec;

  const request = {
    command: commandText,
    targetDir: config.targetDir,
    env: config.remoteEnv,
    denylist: options.denylist,
    artifactPaths: options.artifactPath,
    downloadDir: options.download,
    wait: options.wait,
    timeoutMs: timeoutSec * 1000,
    bridgeName: options.bridge,
    noTunnel: !options.tunnel,
  };

  if (!options.json && TransportRouter.prefersDirect(request)) {
    printError(dim('Trying SSH tunnel...'));
  }

  const result = await router.execCommand(request);
  renderExecResult(result, options.json);
  process.exitCode = result.exitCode;
  return result;
}

function renderExecResult(result: ExecResult, json: boolean): void {
  if (json) {
    print(formatJsonResult(result, result.exitCode === 0));
    return;
  }

  if (!result.waited) {
    print(formatSuccess(`Bridge action dispatched (request ${result.requestId ?? 'unknown'})`));
    print(formatInfo('Not waiting for completion'));
    return;
  }

  if (result.stdout) {
    write(result.stdout.endsWith('\n') ? result.stdout : `${result.stdout}\n`);
  }
  if (result.stderr) {
    printError(result.stderr.trimEnd());
  }
  if (result.htmlUrl) {
    printError(dim(`Run: ${result.htmlUrl}`));
  }
  if (result.downloadedTo) {
    printError(formatSuccess(`Artifacts downloaded to ${result.downloadedTo}`));
  }
  if (result.exitCode !== 0) {
    printError(formatWarning(`Command failed (${result.conclusion ?? `exit code ${result.exitCode}`})`));
  }
}
