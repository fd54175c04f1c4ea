/**
 * @arch patternloom.infra.logging
 *
 * Leveled console logging. Each core component logs through a child
 * whose scope names it, e.g. `[loom:graph]`.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Severity = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const STYLE: Record<Severity, { tag: string; paint: (text: string) => string }> = {
  debug: { tag: 'DEBUG', paint: chalk.gray },
  info: { tag: 'INFO', paint: chalk.blue },
  warn: { tag: 'WARN', paint: chalk.yellow },
  error: { tag: 'ERROR', paint: chalk.red },
};

/**
 * Console logger shared by the core components and the CLI.
 * Core components receive a child; tests pass a silent one.
 */
class Logger {
  private level: LogLevel = 'info';

  constructor(private readonly scope = '') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: Severity): boolean {
    return RANK[level] >= RANK[this.level];
  }

  private write(level: Severity, message: string): void {
    if (!this.enabled(level)) return;
    const { tag, paint } = STYLE[level];
    const scoped = this.scope ? `[${this.scope}] ${message}` : message;
    const line = paint(`[${tag}] ${scoped}`);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  /** CLI confirmation; shown wherever info is. */
  success(message: string): void {
    if (this.enabled('info')) console.log(chalk.green(`✓ ${message}`));
  }

  child(scope: string): Logger {
    const child = new Logger(this.scope ? `${this.scope}:${scope}` : scope);
    child.level = this.level;
    return child;
  }
}

export function createSilentLogger(): Logger {
  const silent = new Logger();
  silent.setLevel('silent');
  return silent;
}

// Default instance for the CLI; library code takes an injected logger.
export const logger = new Logger();

export { Logger };
