/**
 * @arch patternloom.cli.command
 * @intent:cli-output
 *
 * CLI command that audits a saved pattern. Exits with code 1 when the
 * pattern has error or critical findings.
 */
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { renderAuditReport } from '../../core/auditor/index.js';
import { openProjectLoom, parseList, runAction, type ProjectOptions } from './shared.js';

interface AuditOptions extends ProjectOptions {
  checks?: string;
  format: string;
}

/**
 * Create the audit command.
 */
export function createAuditCommand(): Command {
  return new Command('audit')
    .description('Check a saved pattern for compatibility, license, security and design issues')
    .argument('<pattern>', 'Pattern JSON file')
    .option(
      '--checks <list>',
      'Checks to run (compatibility, license, security, redundancy, best-practice)'
    )
    .addOption(new Option('-f, --format <format>', 'Report format').choices(['text', 'json']).default('text'))
    .option('--config <path>', 'Config file path')
    .action((patternFile: string, options: AuditOptions) =>
      runAction(() => runAudit(patternFile, options))
    );
}

async function runAudit(patternFile: string, options: AuditOptions): Promise<void> {
  const loom = await openProjectLoom(options);
  const { pattern, findings, diagnostics } = await loom.auditFile(patternFile, {
    checks: options.checks ? parseList(options.checks) : undefined,
  });

  if (options.format === 'text') {
    console.log(chalk.bold(`Auditing "${pattern.name}" (${pattern.size} components)`));
    if (diagnostics.length > 0) {
      console.log(chalk.yellow(`${diagnostics.length} component(s) skipped while loading`));
    }
    console.log();
  }
  console.log(renderAuditReport(findings, options.format));

  if (!loom.passes(findings)) {
    process.exitCode = 1;
  }
}
