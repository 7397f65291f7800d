import chalk from 'chalk';

export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

const RULE_WIDTH = 60;
const REDACTED = '********';

/**
 * Console logger shared by every command.
 *
 * Values registered with `addSecret` are replaced in every message before it
 * is printed, so a token echoed back in git's stderr never reaches the terminal.
 */
class LoggerService {
  private level: LogLevel = LogLevel.INFO;
  private readonly secrets = new Set<string>();

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public addSecret(value: string): void {
    if (value.trim()) {
      this.secrets.add(value);
    }
  }

  public clearSecrets(): void {
    this.secrets.clear();
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      console.error(chalk.red('❌ Error:'), this.redact(message), ...this.redactAll(args));
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      console.warn(chalk.yellow('⚠️ Warn:'), this.redact(message), ...this.redactAll(args));
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      console.log(this.redact(message), ...this.redactAll(args));
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.gray('🔍 Debug:'), this.redact(message), ...this.redactAll(args));
    }
  }

  public success(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      console.log(chalk.green('✅ Success:'), this.redact(message), ...this.redactAll(args));
    }
  }

  /**
   * Workflow step banner, e.g. "[2/6] Stage matching files"
   */
  public step(index: number, total: number, title: string): void {
    if (this.level >= LogLevel.INFO) {
      console.log(chalk.cyan(`[${index}/${total}]`), this.redact(title));
    }
  }

  public section(title: string): void {
    if (this.level >= LogLevel.INFO) {
      const rule = '='.repeat(RULE_WIDTH);
      console.log(`\n${rule}\n${chalk.bold(this.redact(title))}\n${rule}`);
    }
  }

  private redact(message: string): string {
    let result = message;
    for (const secret of this.secrets) {
      result = result.split(secret).join(REDACTED);
    }
    return result;
  }

  private redactAll(args: unknown[]): unknown[] {
    return args.map(arg => (typeof arg === 'string' ? this.redact(arg) : arg));
  }
}

export const logger = new LoggerService();
