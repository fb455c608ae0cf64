import chalk from 'chalk';
import type { LogLevel } from './types.js';

const LEVELS: Array<Exclude<LogLevel, 'silent'>> = ['debug', 'info', 'warn', 'error'];

type Meta = Record<string, unknown>;

class Logger {
  private minLevel: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    if (this.minLevel === 'silent') {
      return false;
    }

    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Meta): void {
    if (!this.shouldLog(level)) return;

    const timestamp = new Date().toISOString();
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
    const line = `[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`;

    switch (level) {
      case 'error':
        console.error(chalk.red(line));
        break;
      case 'warn':
        console.warn(chalk.yellow(line));
        break;
      case 'info':
        console.info(line);
        break;
      case 'debug':
        console.debug(chalk.gray(line));
        break;
    }
  }

  debug(message: string, meta?: Meta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Meta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Meta): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Meta): void {
    this.log('error', message, meta);
  }
}

export const logger = new Logger();
