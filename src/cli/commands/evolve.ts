/**
 * @arch patternloom.cli.command
 * @intent:cli-output
 *
 * CLI command that applies evolutions to a saved pattern.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { printEvolutionStep, printPatternSummary } from '../formatters/patterns.js';
import { openProjectLoom, parseList, runAction, type ProjectOptions } from './shared.js';

interface EvolveOptions extends ProjectOptions {
  type: string;
  output?: string;
  json?: boolean;
}

/**
 * Create the evolve command.
 */
export function createEvolveCommand(): Command {
  return new Command('evolve')
    .description('Evolve a saved pattern toward scalability, security or cost')
    .argument('<pattern>', 'Pattern JSON file')
    .requiredOption(
      '-t, --type <list>',
      'Evolutions to apply in order (make-scalable, add-security, optimize-cost)'
    )
    .option('-o, --output <file>', 'Write the evolved pattern to a JSON file')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output as JSON')
    .action((patternFile: string, options: EvolveOptions) =>
      runAction(() => runEvolve(patternFile, options))
    );
}

async function runEvolve(patternFile: string, options: EvolveOptions): Promise<void> {
  const loom = await openProjectLoom(options);
  const { pattern, diagnostics } = await loom.loadPattern(patternFile);
  const chain = loom.evolveAll(pattern, parseList(options.type));

  if (options.output) {
    await loom.savePattern(chain.pattern, options.output);
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          pattern: loom.describe(chain.pattern),
          steps: chain.steps.map((step) => ({
            transformation: step.transformation,
            notes: step.notes,
            metric: step.metric,
            before: step.before,
            after: step.after,
            delta: step.delta,
          })),
          diagnostics,
        },
        null,
        2
      )
    );
    return;
  }

  console.log();
  for (const step of chain.steps) {
    printEvolutionStep(step);
  }
  printPatternSummary(loom.describe(chain.pattern));
  if (options.output) {
    console.log(chalk.green(`Saved "${chain.pattern.name}" to ${options.output}`));
  }
}
