/**
 * @arch patternloom.cli.command
 * @intent:cli-output
 *
 * Catalog queries: free-text search and capability lookup.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { componentToRecord } from '../../core/catalog/index.js';
import { printComponentLine } from '../formatters/catalog.js';
import { openProjectLoom, parsePositiveInt, runAction, type ProjectOptions } from './shared.js';

interface QueryOptions extends ProjectOptions {
  limit?: number;
  json?: boolean;
}

/**
 * Create the search command.
 */
export function createSearchCommand(): Command {
  return new Command('search')
    .description('Search components by name, description and capability')
    .argument('<query>', 'Text to look for')
    .option('-n, --limit <count>', 'Show at most this many results', parsePositiveInt)
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output as JSON')
    .action((query: string, options: QueryOptions) =>
      runAction(async () => {
        const loom = await openProjectLoom(options);
        const results = loom.search(query).slice(0, options.limit);

        if (options.json) {
          console.log(
            JSON.stringify(
              results.map(({ component, score }) => ({
                name: component.name,
                score,
                ...componentToRecord(component),
              })),
              null,
              2
            )
          );
          return;
        }
        if (results.length === 0) {
          console.log(chalk.yellow(`No components match "${query}".`));
          return;
        }
        for (const { component, score } of results) {
          printComponentLine(component, score);
        }
      })
    );
}

/**
 * Create the find command.
 */
export function createFindCommand(): Command {
  return new Command('find')
    .description('List components providing a capability, most popular first')
    .argument('<capability>', 'Capability name, e.g. cache or web_framework')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output as JSON')
    .action((capability: string, options: QueryOptions) =>
      runAction(async () => {
        const loom = await openProjectLoom(options);
        const components = [...loom.findByCapability(capability)].sort(
          (a, b) => b.popularityScore - a.popularityScore
        );

        if (options.json) {
          console.log(JSON.stringify(components.map((c) => c.name), null, 2));
          return;
        }
        if (components.length === 0) {
          console.log(chalk.yellow(`No components provide ${capability}.`));
          return;
        }
        for (const component of components) {
          printComponentLine(component);
        }
      })
    );
}
