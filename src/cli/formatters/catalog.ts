/**
 * @arch patternloom.cli.formatter
 */
import chalk from 'chalk';
import type { Component } from '../../core/catalog/index.js';
import type { GraphStats } from '../../core/graph/index.js';

export function printComponentLine(component: Component, score?: number): void {
  const suffix = score === undefined ? '' : chalk.dim(` (score ${score.toFixed(2)})`);
  console.log(`${chalk.bold(component.name)}${suffix}`);
  if (component.description) {
    console.log(chalk.dim(`  ${component.description}`));
  }
  if (component.capabilities.length > 0) {
    console.log(chalk.dim(`  capabilities: ${component.capabilities.join(', ')}`));
  }
}

export function printComponentDetail(component: Component): void {
  console.log(chalk.bold.cyan(component.name));
  if (component.description) console.log(`  ${component.description}`);
  console.log(`  License:      ${component.license ?? 'Unknown'}`);
  if (component.githubUrl) console.log(`  Source:       ${component.githubUrl}`);
  console.log(`  Capabilities: ${component.capabilities.join(', ') || '-'}`);
  console.log(
    `  Scores:       popularity ${component.popularityScore.toFixed(2)}, ` +
      `security ${component.securityScore.toFixed(2)}, cost ${component.costScore.toFixed(2)}, ` +
      `complexity ${component.complexityScore.toFixed(2)}, maturity ${component.maturityScore.toFixed(2)}, ` +
      `license risk ${component.licenseRiskScore.toFixed(2)}`
  );
  if (component.compatibilityTags.length > 0) {
    console.log(`  Tags:         ${component.compatibilityTags.join(', ')}`);
  }
}

export function printStats(stats: GraphStats): void {
  console.log(chalk.bold('Catalog'));
  console.log(`  Components:    ${stats.components}`);
  console.log(`  Relationships: ${stats.relationships}`);
  console.log(`  Capabilities:  ${stats.capabilityCoverage}`);
  const ranked = Object.entries(stats.byCapability).sort(([, a = 0], [, b = 0]) => b - a);
  for (const [capability, count] of ranked) {
    console.log(chalk.dim(`    ${capability}: ${count}`));
  }
}
