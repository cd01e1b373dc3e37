import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private level: LogLevel;
  private silent: boolean = false;

  constructor(level: LogLevel = 'warn') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setVerbose(verbose: boolean): void {
    this.level = verbose ? 'debug' : 'warn';
  }

  isVerbose(): boolean {
    return this.level === 'debug';
  }

  /**
   * Mutes all output. The interactive UI owns the terminal, so it silences
   * the logger while it is mounted.
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
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

  error(message: string, error?: unknown): void {
    if (error !== undefined) {
      const details = error instanceof Error ? error.stack || error.message : String(error);
      this.write('error', `${message}: ${details}`);
      return;
    }
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    if (this.silent || LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const timestamp = new Date().toLocaleTimeString();
    const colorFn = {
      debug: chalk.gray,
      info: chalk.blue,
      warn: chalk.yellow,
      error: chalk.red
    }[level];

    console.error(colorFn(`[${timestamp}] ${chalk.bold(level.toUpperCase())} ${message}`));
  }
}

export const logger = new Logger();
