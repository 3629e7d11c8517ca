import { EventEmitter } from 'events';
import { LogEntry, LogLevel } from '../types/index.js';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

const severity = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/**
 * Every logger created from the same root publishes its entries here, so the
 * GUI log view sees DEBUG lines even when the console is quieter.
 */
export class LogHub extends EventEmitter {
  constructor() {
    super();
    // One subscriber per open GUI page
    this.setMaxListeners(0);
  }

  publish(entry: LogEntry): void {
    this.emit('entry', entry);
  }

  subscribe(listener: (entry: LogEntry) => void): () => void {
    this.on('entry', listener);
    return () => {
      this.off('entry', listener);
    };
  }
}

export class Logger {
  constructor(
    readonly scope: string,
    private readonly minLevel: LogLevel = 'INFO',
    readonly hub: LogHub = new LogHub()
  ) {}

  child(scope: string): Logger {
    return new Logger(scope, this.minLevel, this.hub);
  }

  debug(message: string): void {
    this.log('DEBUG', message);
  }

  info(message: string): void {
    this.log('INFO', message);
  }

  warn(message: string): void {
    this.log('WARNING', message);
  }

  error(message: string, error?: unknown): void {
    this.log('ERROR', message);
    if (error !== undefined && severity(this.minLevel) <= severity('DEBUG')) {
      console.error(error);
    }
  }

  log(level: LogLevel, message: string): void {
    this.hub.publish({ level, scope: this.scope, message, timestamp: new Date() });

    if (severity(level) < severity(this.minLevel)) return;

    const line = `[${this.scope}] ${message}`;
    switch (level) {
      case 'ERROR':
        console.error(line);
        break;
      case 'WARNING':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
