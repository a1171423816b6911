#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { CLI_NAME } from './constants/index.js';
import { LogLevel } from './types/index.js';

import { setupInstallCommand } from './commands/install.js';
import { setupListCommand } from './commands/list.js';
import { setupStatusCommand } from './commands/status.js';

/**
 * labsetup CLI - Main entry point
 *
 * Provisions a fresh Linux workstation from a catalog of install units.
 */

const program = new Command();

program
  .name(CLI_NAME)
  .description('Provision a Linux workstation: system packages, applications, neuroimaging tools and shell setup')
  .version(getVersion())
  .option('--verbose', 'log debug output')
  .configureHelp({
    sortSubcommands: true
  })
  .showHelpAfterError();

setupInstallCommand(program);
setupListCommand(program);
setupStatusCommand(program);

program.hook('preAction', () => {
  if (program.opts<{ verbose?: boolean }>().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run again with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run again with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // Bare `labsetup` shows help and exits successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith(CLI_NAME)
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
