/**
 * @arch patternloom.cli.barrel
 *
 * CLI program assembly.
 */
import { Command } from 'commander';
import { createAuditCommand } from './commands/audit.js';
import { createCatalogCommand } from './commands/catalog.js';
import { createEvolveCommand } from './commands/evolve.js';
import { createFindCommand, createSearchCommand } from './commands/search.js';
import { createWeaveCommand } from './commands/weave.js';

export const VERSION = '0.3.0';

/**
 * Create the CLI program.
 */
export function createCli(): Command {
  const program = new Command();

  program
    .name('patternloom')
    .description('Recommend, evolve and audit architecture patterns built from open-source components')
    .version(VERSION);

  // Pattern commands
  program.addCommand(createWeaveCommand());
  program.addCommand(createEvolveCommand());
  program.addCommand(createAuditCommand());

  // Catalog commands
  program.addCommand(createSearchCommand());
  program.addCommand(createFindCommand());
  program.addCommand(createCatalogCommand());

  return program;
}
