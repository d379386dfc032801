#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupClosureCommand } from './commands/closure.js';
import { setupCoordsCommand } from './commands/coords.js';

/**
 * feature-closure CLI - Main entry point
 *
 * Resolves features descriptors reachable through repository references
 * and lists the artifacts they reference.
 */

type GlobalOptions = {
  cwd?: string;
  verbose?: boolean;
};

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('fclosure')
  .description('Resolve the closure of features descriptors and the artifacts they reference')
  .version(getVersion())
  .option('--cwd <dir>', 'resolve descriptor paths from this directory')
  .option('--verbose', 'log resolution details')
  .configureHelp({ sortSubcommands: true });

// === RESOLUTION COMMANDS ===
setupClosureCommand(program);
setupCoordsCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<GlobalOptions>();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${opts.cwd ?? process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // No arguments: show help and exit successfully
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
    process.argv[1].endsWith('fclosure')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
