import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const LEVEL_STYLE: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Leveled logger writing to stderr so stdout stays free for command
 * output (JSON in particular).
 */
export class Logger {
  constructor(
    private prefix: string = 'diffdoc',
    private readonly level: LogLevel = 'info',
    private sink: (line: string) => void = line => console.error(line),
  ) {}

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, error?: unknown): void {
    this.write('error', message, []);
    if (error != null && this.isEnabled('debug')) {
      this.sink(chalk.dim(error instanceof Error ? (error.stack ?? error.message) : String(error)));
    }
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return;
    const tag = LEVEL_STYLE[level](level.toUpperCase().padEnd(5));
    this.sink(`${chalk.dim(`[${this.prefix}]`)} ${tag} ${message}`);
    if (args.length > 0) this.sink(chalk.dim(JSON.stringify(args, null, 2)));
  }
}
