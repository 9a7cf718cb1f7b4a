#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'module';
import { syncCommand } from './commands/sync.js';
import { prIssueCommand } from './commands/pr-issue.js';
import { quarterlyCommand } from './commands/quarterly.js';
import { doctorCommand } from './commands/doctor.js';
import UI from './ui/renderer.js';

const { colors } = UI;

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

// Configure program
program
  .name('jira-rollup')
  .description('Daily Jira TODO sync, PR-to-issue conversion and quarterly reports')
  .version(pkg.version, '-v, --version', 'Show version number')
  .configureHelp({
    sortSubcommands: true,
  })
  .showHelpAfterError('Run `jira-rollup --help` for usage information');

// Register commands
program.addCommand(syncCommand);
program.addCommand(prIssueCommand);
program.addCommand(quarterlyCommand);
program.addCommand(doctorCommand);

// Add aliases
syncCommand.alias('s').alias('daily');
prIssueCommand.alias('pr').alias('ticket');
quarterlyCommand.alias('q').alias('quarter');
doctorCommand.alias('check');

// Error handling
program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.help' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(err.exitCode || 1);
});

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
program.parseAsync().catch((error: unknown) => {
  console.log(UI.error(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
