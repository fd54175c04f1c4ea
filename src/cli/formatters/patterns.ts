/**
 * @arch patternloom.cli.formatter
 *
 * Human-readable rendering of patterns and evolution reports.
 */
import chalk from 'chalk';
import type { EvolutionResult } from '../../core/evolver/index.js';
import type { PatternSummary } from '../../core/patterns/index.js';

function bar(value: number): string {
  const filled = Math.round(value * 10);
  return `${'█'.repeat(filled)}${'░'.repeat(10 - filled)} ${value.toFixed(2)}`;
}

export function printPatternSummary(summary: PatternSummary, index?: number): void {
  const title = index === undefined ? summary.name : `${index}. ${summary.name}`;
  console.log(chalk.bold.cyan(title));
  if (summary.description) {
    console.log(chalk.dim(`   ${summary.description}`));
  }
  console.log(`   Confidence: ${bar(summary.confidence)}`);
  console.log(`   Complexity: ${bar(summary.complexity)}`);

  for (const component of summary.components) {
    console.log(
      `   ${chalk.green('•')} ${chalk.bold(component.name)} ${chalk.dim(`(${component.role})`)}` +
        chalk.dim(` license: ${component.license}, popularity: ${component.popularity.toFixed(2)}`)
    );
  }

  if (summary.connections.length > 0) {
    console.log(chalk.dim('   Connections:'));
    for (const connection of summary.connections) {
      console.log(
        chalk.dim(
          `     ${connection.from} → ${connection.to} [${connection.type}, ${connection.strength.toFixed(2)}]`
        )
      );
    }
  }
  if (summary.tags.length > 0) {
    console.log(chalk.dim(`   Tags: ${summary.tags.join(', ')}`));
  }
  console.log();
}

export function printEvolutionStep(step: EvolutionResult): void {
  const sign = step.delta >= 0 ? '+' : '';
  console.log(
    chalk.bold(`${step.transformation}`) +
      chalk.dim(
        ` ${step.metric}: ${step.before.toFixed(2)} → ${step.after.toFixed(2)} (${sign}${step.delta.toFixed(2)})`
      )
  );
  if (step.notes.length === 0) {
    console.log(chalk.dim('  No applicable rule'));
  }
  for (const note of step.notes) {
    console.log(`  ${chalk.green('✓')} ${note}`);
  }
  console.log();
}
