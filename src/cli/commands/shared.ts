/**
 * @arch patternloom.cli.helper
 *
 * Option parsing and Loom setup shared by the commands.
 */
import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { openLoom, type Loom } from '../../core/loom.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ProjectOptions {
  config?: string;
}

/**
 * Open the Loom for the current directory and report a partial load.
 */
export async function openProjectLoom(options: ProjectOptions): Promise<Loom> {
  const { loom, report } = await openLoom(process.cwd(), {
    configPath: options.config,
    logger,
  });
  if (report.componentsSkipped > 0 || report.relationshipsSkipped > 0) {
    console.error(
      chalk.yellow(
        `Catalog loaded partially: ${report.componentsLoaded} components ` +
          `(${report.componentsSkipped} skipped), ${report.relationshipsLoaded} relationships ` +
          `(${report.relationshipsSkipped} skipped)`
      )
    );
  }
  return loom;
}

/**
 * Split a comma-separated option into trimmed, non-empty parts.
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Commander argument parser for values in [0, 1].
 */
export function parseUnitInterval(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Run a command action, turning any thrown error into a logged failure.
 */
export async function runAction(action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.error(getErrorMessage(error));
    process.exit(1);
  }
}
