#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'module';
import { commitPushAction } from './commands/commit-push.js';
import { doctorCommand } from './commands/doctor.js';
import UI from './ui/renderer.js';

const { colors } = UI;

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

// Configure program
program
  .name('commit-push')
  .description(
    'Commit all pending changes with a generated Conventional Commit message, then push'
  )
  .version(pkg.version, '-v, --version', 'Show version number')
  .option('--dry-run', 'Print the generated message without staging, committing or pushing')
  .option('--no-push', 'Commit but do not push')
  .option('--debug', 'Show the signals behind the generated message')
  .showHelpAfterError('Run `commit-push --help` for usage information')
  .action(async (options: { dryRun?: boolean; push?: boolean; debug?: boolean }) => {
    await commitPushAction(options);
  });

// Register commands
program.addCommand(doctorCommand);
doctorCommand.alias('check');

// Graceful shutdown
process.on('SIGINT', () => {
  console.log('');
  console.log(UI.info('Interrupted'));
  process.exit(130);
});

process.on('uncaughtException', (error) => {
  console.log('');
  console.log(UI.error('An unexpected error occurred'));
  console.log(colors.muted(error.message));
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
