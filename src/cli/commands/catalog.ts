/**
 * @arch patternloom.cli.command
 * @intent:cli-output
 *
 * Catalog management: list, show, stats, add, relate, clear.
 */
import { Command, Option } from 'commander';
import chalk from 'chalk';
import {
  RELATIONSHIP_TYPES,
  componentToRecord,
  requireCapability,
  type RelationshipType,
} from '../../core/catalog/index.js';
import { logger } from '../../utils/logger.js';
import { printComponentDetail, printComponentLine, printStats } from '../formatters/catalog.js';
import {
  openProjectLoom,
  parseList,
  parseUnitInterval,
  runAction,
  type ProjectOptions,
} from './shared.js';

interface JsonOptions extends ProjectOptions {
  json?: boolean;
}

interface AddOptions extends ProjectOptions {
  description?: string;
  capabilities?: string;
  license?: string;
  githubUrl?: string;
  tags?: string;
  popularity?: number;
  security?: number;
  cost?: number;
  complexity?: number;
  maturity?: number;
  licenseRisk?: number;
}

interface RelateOptions extends ProjectOptions {
  type: RelationshipType;
  strength?: number;
  evidence?: string;
}

interface ClearOptions extends ProjectOptions {
  yes?: boolean;
}

/**
 * Create the catalog command group.
 */
export function createCatalogCommand(): Command {
  const catalog = new Command('catalog').description('Inspect and edit the component catalog');

  catalog
    .command('list')
    .description('List every component')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output as JSON')
    .action((options: JsonOptions) =>
      runAction(async () => {
        const loom = await openProjectLoom(options);
        const components = loom.graph.getAllComponents();
        if (options.json) {
          console.log(JSON.stringify(components.map((c) => c.name), null, 2));
          return;
        }
        for (const component of components) {
          printComponentLine(component);
        }
        console.log(chalk.dim(`\n${components.length} components`));
      })
    );

  catalog
    .command('show')
    .description('Show one component')
    .argument('<name>', 'Component name')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output as JSON')
    .action((name: string, options: JsonOptions) =>
      runAction(async () => {
        const loom = await openProjectLoom(options);
        const component = loom.graph.resolveComponent(name);
        if (!component) {
          console.log(chalk.yellow(`Component not found: ${name}`));
          process.exitCode = 1;
          return;
        }
        if (options.json) {
          console.log(
            JSON.stringify({ name: component.name, ...componentToRecord(component) }, null, 2)
          );
          return;
        }
        printComponentDetail(component);
        const compatible = loom.graph.getCompatibleComponents(component.name);
        if (compatible.length > 0) {
          console.log(`  Compatible:   ${compatible.join(', ')}`);
        }
        const alternatives = loom.graph.findAlternatives(component.name);
        if (alternatives.length > 0) {
          console.log(`  Alternatives: ${alternatives.join(', ')}`);
        }
      })
    );

  catalog
    .command('stats')
    .description('Show catalog statistics')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output as JSON')
    .action((options: JsonOptions) =>
      runAction(async () => {
        const loom = await openProjectLoom(options);
        const stats = loom.graph.getStats();
        if (options.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }
        printStats(stats);
      })
    );

  catalog
    .command('add')
    .description('Add or replace a component')
    .argument('<name>', 'Component name')
    .option('-d, --description <text>', 'Description')
    .option('-c, --capabilities <list>', 'Capabilities (comma-separated)')
    .option('-l, --license <license>', 'License identifier')
    .option('--github-url <url>', 'Source repository URL')
    .option('--tags <list>', 'Compatibility tags (comma-separated)')
    .option('--popularity <score>', 'Popularity score (0-1)', parseUnitInterval)
    .option('--security <score>', 'Security score (0-1)', parseUnitInterval)
    .option('--cost <score>', 'Cost score (0-1)', parseUnitInterval)
    .option('--complexity <score>', 'Complexity score (0-1)', parseUnitInterval)
    .option('--maturity <score>', 'Maturity score (0-1)', parseUnitInterval)
    .option('--license-risk <score>', 'License risk score (0-1)', parseUnitInterval)
    .option('--config <path>', 'Config file path')
    .action((name: string, options: AddOptions) =>
      runAction(async () => {
        const loom = await openProjectLoom(options);
        const component = loom.addComponent({
          name,
          description: options.description,
          capabilities: parseList(options.capabilities ?? '').map(requireCapability),
          license: options.license,
          githubUrl: options.githubUrl,
          compatibilityTags: parseList(options.tags ?? ''),
          popularityScore: options.popularity,
          securityScore: options.security,
          costScore: options.cost,
          complexityScore: options.complexity,
          maturityScore: options.maturity,
          licenseRiskScore: options.licenseRisk,
        });
        logger.success(`Added ${component.name}`);
      })
    );

  catalog
    .command('relate')
    .description('Add or replace a relationship between two components')
    .argument('<source>', 'Source component')
    .argument('<target>', 'Target component')
    .addOption(
      new Option('-t, --type <type>', 'Relationship type')
        .choices(RELATIONSHIP_TYPES)
        .makeOptionMandatory()
    )
    .option('-s, --strength <value>', 'Strength (0-1)', parseUnitInterval)
    .option('-e, --evidence <text>', 'Supporting evidence')
    .option('--config <path>', 'Config file path')
    .action((source: string, target: string, options: RelateOptions) =>
      runAction(async () => {
        const loom = await openProjectLoom(options);
        const result = loom.addRelationship({
          source,
          target,
          type: options.type,
          strength: options.strength,
          evidence: options.evidence,
        });
        if (!result.added) {
          console.log(chalk.yellow(result.diagnostic.message));
          process.exitCode = 1;
          return;
        }
        logger.success(`Added ${source} -[${options.type}]-> ${target}`);
      })
    );

  catalog
    .command('clear')
    .description('Delete every component and relationship')
    .option('-y, --yes', 'Confirm deletion')
    .option('--config <path>', 'Config file path')
    .action((options: ClearOptions) =>
      runAction(async () => {
        if (!options.yes) {
          console.log(chalk.yellow('Refusing to clear the catalog without --yes'));
          process.exitCode = 1;
          return;
        }
        const loom = await openProjectLoom(options);
        loom.clearCatalog();
        logger.success('Catalog cleared');
      })
    );

  return catalog;
}
