import log from 'electron-log/node';
import { LOG_LEVELS } from '@shared/constants';

export type LogLevel = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

class Logger {
  constructor() {
    log.transports.file.level = LOG_LEVELS.INFO;
    log.transports.console.level = LOG_LEVELS.INFO;
  }

  setConsoleLevel(level: LogLevel): void {
    log.transports.console.level = level;
  }

  error(message: string, ...args: unknown[]): void {
    log.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    log.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    log.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    log.debug(message, ...args);
  }
}

export const logger = new Logger();
