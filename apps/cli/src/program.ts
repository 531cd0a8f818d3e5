/**
 * Root command
 */

import { Command } from 'commander';
import { dbCommands } from './commands/db.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('quarry')
    .description('Project scaffolding toolkit - template and blueprint store management')
    .version(VERSION)
    .option('--db-path <path>', 'Path to the database file')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--log-format <format>', 'Log output format (pretty, json)');

  // Register command groups
  program.addCommand(dbCommands());

  return program;
}
