/**
 * Tunnel Command
 *
 * Manages Bridge profiles for the SSH tunnel:
 * - add / remove / default: edit `bridges.json`
 * - list: show configured profiles
 * - status: probe a profile with `echo ok`
 * - ssh-config: print (or install) `~/.ssh/config` entries
 *
 * @module control-plane/commands/tunnel
 */

import { Command } from 'commander';
import { z } from 'zod';
import { createBridgeProfile, saveTunnelConfig } from '../../tunnel/profiles.js';
import { BridgeNotFoundError, TunnelNotAvailableError } from '../../tunnel/errors.js';
import { isExecutable } from '../../tunnel/helper-binary.js';
import { generateAllSshConfigs, generateSshConfig, installSshConfig } from '../../tunnel/ssh-config.js';
import { CliContext } from '../context.js';
import { reportError } from '../errors.js';
import {
  bold,
  cyan,
  dim,
  formatInfo,
  formatJsonResult,
  formatSuccess,
  formatTable,
  formatWarning,
  green,
  print,
  printError,
  red,
} from '../formatter.js';
import { bridgeName, positiveInt, validateOptions } from '../validators.js';

const addArgsSchema = z.object({
  name: bridgeName,
  url: z.string().url('Proxy URL must be an absolute URL'),
  user: z.string().min(1).optional(),
  port: positiveInt.max(65535).optional(),
});

/**
 * Create the tunnel command with subcommands.
 */
export function createTunnelCommand(): Command {
  return new Command('tunnel')
    .description('Manage SSH tunnel profiles for Bridge hosts')
    .addCommand(createAddSubcommand())
    .addCommand(createRemoveSubcommand())
    .addCommand(createListSubcommand())
    .addCommand(createDefaultSubcommand())
    .addCommand(createStatusSubcommand())
    .addCommand(createSshConfigSubcommand());
}

/**
 * Wrap an action so every error goes through the exit-code mapping.
 */
function run(command: Command, action: (json: boolean) => Promise<void>): Promise<void> {
  const json = command.optsWithGlobals()['json'] === true;
  return action(json).catch((error: unknown) => reportError(error, json));
}

// ============================================================================
// add / remove / default
// ============================================================================

function createAddSubcommand(): Command {
  return new Command('add')
    .description('Add or replace a Bridge profile')
    .argument('<name>', 'Profile name')
    .argument('<url>', 'Proxy URL of the Bridge (http(s) or ws(s))')
    .option('-u, --user <user>', 'SSH user (default: root)')
    .option('-p, --port <port>', 'SSH port on the Bridge (default: 22222)')
    .action((name: string, url: string, options: Record<string, unknown>, command: Command) =>
      run(command, async (json) => {
        const args = validateOptions(addArgsSchema, { name, url, user: options['user'], port: options['port'] });
        const context = new CliContext();
        const config = await context.tunnelConfig();
        const replaced = config.bridges.has(args.name);
        config.addBridge(createBridgeProfile(args.name, args.url, { sshUser: args.user, sshPort: args.port }));
        await saveTunnelConfig(config);

        if (json) {
          print(formatJsonResult({ name: args.name, replaced, default: config.defaultBridge }));
          return;
        }
        print(formatSuccess(`${replaced ? 'Updated' : 'Added'} bridge '${args.name}'`));
        if (config.defaultBridge === args.name) {
          print(formatInfo(`'${args.name}' is the default bridge`));
        }
      })
    );
}

function createRemoveSubcommand(): Command {
  return new Command('remove')
    .description('Remove a Bridge profile')
    .argument('<name>', 'Profile name')
    .action((name: string, _options: Record<string, unknown>, command: Command) =>
      run(command, async (json) => {
        const config = await new CliContext().tunnelConfig();
        if (!config.removeBridge(name)) {
          throw new BridgeNotFoundError(name);
        }
        await saveTunnelConfig(config);

        if (json) {
          print(formatJsonResult({ name, default: config.defaultBridge }));
          return;
        }
        print(formatSuccess(`Removed bridge '${name}'`));
        if (config.defaultBridge) {
          print(formatInfo(`Default bridge is now '${config.defaultBridge}'`));
        }
      })
    );
}

function createDefaultSubcommand(): Command {
  return new Command('default')
    .description('Set the default Bridge profile')
    .argument('<name>', 'Profile name')
    .action((name: string, _options: Record<string, unknown>, command: Command) =>
      run(command, async (json) => {
        const config = await new CliContext().tunnelConfig();
        if (!config.setDefault(name)) {
          throw new BridgeNotFoundError(name);
        }
        await saveTunnelConfig(config);
        print(json ? formatJsonResult({ default: name }) : formatSuccess(`Default bridge set to '${name}'`));
      })
    );
}

// ============================================================================
// list / status
// ============================================================================

function createListSubcommand(): Command {
  return new Command('list')
    .description('List Bridge profiles')
    .action((_options: Record<string, unknown>, command: Command) =>
      run(command, async (json) => {
        const config = await new CliContext().tunnelConfig();
        const bridges = config.listBridges();

        if (json) {
          print(formatJsonResult({ default: config.defaultBridge, bridges }));
          return;
        }
        if (bridges.length === 0) {
          print(formatInfo("No bridges configured. Run 'bridgeline tunnel add <name> <url>'."));
          return;
        }
        print(
          formatTable(bridges, [
            { header: '', width: 1, value: (bridge) => (bridge.name === config.defaultBridge ? '*' : ' ') },
            { header: 'NAME', width: 16, value: (bridge) => bridge.name },
            { header: 'USER', width: 10, value: (bridge) => bridge.sshUser },
            { header: 'PORT', width: 6, value: (bridge) => String(bridge.sshPort) },
            { header: 'PROXY URL', width: 60, value: (bridge) => bridge.proxyUrl },
          ])
        );
      })
    );
}

function createStatusSubcommand(): Command {
  return new Command('status')
    .description('Check whether a Bridge answers over the tunnel')
    .argument('[name]', 'Profile name (default: the default bridge)')
    .action((name: string | undefined, _options: Record<string, unknown>, command: Command) =>
      run(command, async (json) => {
        const tunnel = await new CliContext().tunnel();
        const status = await tunnel.getStatus(name);

        if (json) {
          print(formatJsonResult(status, status.sshWorks));
        } else {
          print(bold('Tunnel status'));
          print(`  Bridge:     ${status.bridgeName ? cyan(status.bridgeName) : dim('none')}`);
          print(`  Proxy URL:  ${status.proxyUrl ?? dim('-')}`);
          print(`  Helper:     ${status.helperPath ?? dim('not installed')}`);
          print(`  SSH:        ${status.sshWorks ? green('connected') : red('unavailable')}`);
          if (status.error) {
            printError(formatWarning(status.error));
          }
        }
        process.exitCode = status.sshWorks ? 0 : 1;
      })
    );
}

// ============================================================================
// ssh-config
// ============================================================================

function createSshConfigSubcommand(): Command {
  return new Command('ssh-config')
    .description('Print ~/.ssh/config entries for Bridge profiles')
    .option('--install', 'Write the entries into ~/.ssh/config')
    .option('--bridge <name>', 'Only this profile')
    .action((options: Record<string, unknown>, command: Command) =>
      run(command, async (json) => {
        const config = await new CliContext().tunnelConfig();
        const only = typeof options['bridge'] === 'string' ? options['bridge'] : undefined;
        const profiles = only ? [config.getBridge(only)] : config.listBridges();

        if (profiles.length === 0) {
          throw new TunnelNotAvailableError();
        }
        const selected = profiles.map((profile) => {
          if (!profile) throw new BridgeNotFoundError(only ?? '');
          return profile;
        });

        if (!(await isExecutable(config.helperBin)) && !json) {
          printError(formatWarning(`Helper not found at ${config.helperBin}; run 'bridgeline tunnel status' to install it`));
        }

        if (options['install'] !== true) {
          const text = only
            ? selected.map((profile) => generateSshConfig(profile, config.helperBin)).join('\n\n')
            : generateAllSshConfigs(config, config.helperBin);
          print(json ? formatJsonResult({ config: text }) : text);
          return;
        }

        const installed: Array<{ host: string; updated: boolean; path: string }> = [];
        for (const profile of selected) {
          const result = await installSshConfig(generateSshConfig(profile, config.helperBin), profile.name);
          installed.push({ host: profile.name, ...result });
        }

        if (json) {
          print(formatJsonResult({ installed }));
          return;
        }
        for (const entry of installed) {
          print(formatSuccess(`${entry.updated ? 'Updated' : 'Added'} Host ${entry.host} in ${entry.path}`));
        }
        print(formatInfo(`Connect with: ssh ${selected[0]?.name ?? '<bridge>'}`));
      })
    );
}
