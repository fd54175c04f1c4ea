/**
 * @arch patternloom.cli.command
 * @intent:cli-output
 *
 * CLI command that synthesizes patterns for a capability request.
 */
import { Command, Option } from 'commander';
import chalk from 'chalk';
import type { IntentPriority } from '../../core/catalog/index.js';
import { requireCapability } from '../../core/catalog/index.js';
import { printPatternSummary } from '../formatters/patterns.js';
import {
  openProjectLoom,
  parseList,
  parsePositiveInt,
  runAction,
  type ProjectOptions,
} from './shared.js';

interface WeaveOptions extends ProjectOptions {
  capabilities: string;
  priority: IntentPriority;
  limit?: number;
  output?: string;
  json?: boolean;
}

const PRIORITIES: IntentPriority[] = ['low', 'medium', 'high', 'critical'];

/**
 * Create the weave command.
 */
export function createWeaveCommand(): Command {
  return new Command('weave')
    .description('Generate ranked architecture patterns for a set of capabilities')
    .argument('<description>', 'What the system should do')
    .requiredOption('-c, --capabilities <list>', 'Required capabilities (comma-separated)')
    .addOption(
      new Option('-p, --priority <level>', 'Intent priority').choices(PRIORITIES).default('medium')
    )
    .option('-n, --limit <count>', 'Show at most this many patterns', parsePositiveInt)
    .option('-o, --output <file>', 'Save the top pattern to a JSON file')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output as JSON')
    .action((description: string, options: WeaveOptions) =>
      runAction(() => runWeave(description, options))
    );
}

async function runWeave(description: string, options: WeaveOptions): Promise<void> {
  const loom = await openProjectLoom(options);
  const requiredCapabilities = parseList(options.capabilities).map(requireCapability);
  const result = loom.synthesize({
    description,
    requiredCapabilities,
    priority: options.priority,
  });
  const shown = result.patterns.slice(0, options.limit ?? result.patterns.length);

  const top = result.patterns[0];
  if (options.output && top) {
    await loom.savePattern(top.pattern, options.output);
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          patterns: shown.map((woven) => ({ ...loom.describe(woven.pattern), score: woven.score })),
          matched_capabilities: result.matchedCapabilities,
          missing_capabilities: result.missingCapabilities,
        },
        null,
        2
      )
    );
    return;
  }

  if (result.missingCapabilities.length > 0) {
    console.log(chalk.yellow(`No components for: ${result.missingCapabilities.join(', ')}`));
  }
  if (shown.length === 0) {
    console.log(chalk.yellow('No patterns found.'));
    return;
  }

  console.log();
  shown.forEach((woven, index) => printPatternSummary(loom.describe(woven.pattern), index + 1));
  if (options.output && top) {
    console.log(chalk.green(`Saved "${top.pattern.name}" to ${options.output}`));
  }
}
