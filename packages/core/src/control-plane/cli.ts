import { Command, CommanderError } from 'commander';
import { createBridgeCommand } from './commands/bridge.js';
import { createJobCommand } from './commands/job.js';
import { createSyncCommand } from './commands/sync.js';
import { createTunnelCommand } from './commands/tunnel.js';
import { ExitCode } from './errors.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('bridgeline')
    .description('Run commands and sync job logs on a remote Bridge over SSH or forge workflows')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--json', 'Output as JSON', false);

  program.addCommand(createBridgeCommand());
  program.addCommand(createJobCommand());
  program.addCommand(createSyncCommand());
  program.addCommand(createTunnelCommand());

  applyExitOverride(program);

  return program;
}

// addCommand() does not copy settings to subcommands
function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const sub of command.commands) {
    applyExitOverride(sub);
  }
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.help' ||
        error.code === 'commander.version')
    ) {
      return;
    }
    // Usage errors were already printed by commander
    if (error instanceof CommanderError) {
      process.exitCode = ExitCode.VALIDATION;
      return;
    }
    throw error;
  }
}

export { createBridgeCommand } from './commands/bridge.js';
export { createJobCommand } from './commands/job.js';
export { createSyncCommand } from './commands/sync.js';
export { createTunnelCommand } from './commands/tunnel.js';
