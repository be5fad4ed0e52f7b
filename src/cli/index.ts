#!/usr/bin/env node
import { Option, program } from 'commander';

import { PRODUCT_VERSION } from '../core/version.js';
import { SEVERITIES } from '../validation/types.js';
import { createCommand, type CreateCommandOptions } from './commands/create.js';
import { deleteCommand, type DeleteCommandOptions } from './commands/delete.js';
import { describeCommand } from './commands/describe.js';
import { startCommand, stopCommand } from './commands/fleet.js';
import type { CommonOptions, ValidationOptions } from './commands/shared.js';
import { listCommand, statusCommand } from './commands/status.js';
import { updateCommand, type UpdateCommandOptions } from './commands/update.js';
import { validateCommand } from './commands/validate.js';

program
  .name('hpcstack')
  .description('HPC cluster lifecycle orchestration')
  .version(PRODUCT_VERSION)
  .option('--verbose', 'Log collaborator calls')
  .option('--state-dir <dir>', 'Local backend root (default: $HPCSTACK_HOME or ~/.hpcstack)');

const VERBOSE_DESC = 'Log collaborator calls';
const STATE_DIR_DESC = 'Local backend root';

interface GlobalOptions {
  verbose?: boolean;
  stateDir?: string;
}

/**
 * Merge the global flags into command-level options.
 * Supports both positions:
 *   hpcstack --verbose status c1    (parent parses --verbose)
 *   hpcstack status c1 --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends GlobalOptions>(opts: T): T {
  const globalOpts = program.opts<GlobalOptions>();
  return {
    ...opts,
    verbose: opts.verbose === true || globalOpts.verbose === true,
    stateDir: opts.stateDir ?? globalOpts.stateDir,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.toLowerCase();
  if (normalized !== 'true' && normalized !== 'false') {
    throw new Error(`Expected true or false, got '${value}'`);
  }
  return normalized === 'true';
}

const suppressOption = () =>
  new Option('--suppress-validators <names...>', "Validators to skip ('ALL' skips every validator)");
const failureLevelOption = () =>
  new Option('--validation-failure-level <level>', 'Lowest finding level that fails validation')
    .choices(SEVERITIES)
    .default('ERROR');

program
  .command('validate <file>')
  .description('Validate a cluster configuration')
  .addOption(suppressOption())
  .addOption(failureLevelOption())
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((file: string, opts: ValidationOptions) => validateCommand(file, withGlobalOpts(opts)));

program
  .command('create <name> <file>')
  .description('Create a cluster')
  .addOption(suppressOption())
  .addOption(failureLevelOption())
  .option('--rollback-on-failure <bool>', 'Roll back stack resources on failure', parseBoolean, true)
  .option('--wait', 'Wait for the stack to reach a stable status')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((name: string, file: string, opts: CreateCommandOptions) => createCommand(name, file, withGlobalOpts(opts)));

program
  .command('update <name> <file>')
  .description('Update a running cluster')
  .addOption(suppressOption())
  .addOption(failureLevelOption())
  .option('--force', 'Apply changes that are not allowed by their update policy')
  .option('--wait', 'Wait for the stack to reach a stable status')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((name: string, file: string, opts: UpdateCommandOptions) => updateCommand(name, file, withGlobalOpts(opts)));

program
  .command('delete <name>')
  .description('Delete a cluster')
  .option('--keep-logs', 'Keep the cluster log groups')
  .option('--wait', 'Wait for the stack to be gone')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((name: string, opts: DeleteCommandOptions) => deleteCommand(name, withGlobalOpts(opts)));

program
  .command('start <name>')
  .description('Start the compute fleet')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((name: string, opts: CommonOptions) => startCommand(name, withGlobalOpts(opts)));

program
  .command('stop <name>')
  .description('Stop the compute fleet')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((name: string, opts: CommonOptions) => stopCommand(name, withGlobalOpts(opts)));

program
  .command('status <name>')
  .description('Show the state of a cluster')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((name: string, opts: CommonOptions) => statusCommand(name, withGlobalOpts(opts)));

program
  .command('list')
  .description('List managed clusters')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((opts: CommonOptions) => listCommand(withGlobalOpts(opts)));

program
  .command('describe <name>')
  .description('Print the resolved configuration of a cluster')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .option('--state-dir <dir>', STATE_DIR_DESC)
  .action((name: string, opts: CommonOptions) => describeCommand(name, withGlobalOpts(opts)));

await program.parseAsync();
