import log from 'electron-log/node';
import { ENV, LOG_LEVELS } from '@shared/constants';

type LogLevel = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

const KNOWN_LEVELS: readonly string[] = Object.values(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return KNOWN_LEVELS.includes(value);
}

export function resolveConsoleLevel(value: string | undefined): LogLevel {
  if (value && isLogLevel(value)) return value;
  return LOG_LEVELS.WARN;
}

class Logger {
  constructor() {
    log.transports.console.level = resolveConsoleLevel(process.env[ENV.LOG_LEVEL]);

    const logFile = process.env[ENV.LOG_FILE];
    if (logFile) {
      log.transports.file.level = LOG_LEVELS.INFO;
      log.transports.file.resolvePathFn = () => logFile;
    } else {
      log.transports.file.level = false;
    }
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
