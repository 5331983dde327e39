import { join } from 'node:path';
import pino from 'pino';
import type { DestinationStream, Level, Logger, StreamEntry } from 'pino';
import type { LogLevelName } from './schemas.js';

// ============================================================
// Process-wide logging
// Initialized once at process start; components get a handle
// through their `logger` option instead of reading the global.
// ============================================================

export interface LoggingOptions {
  logDir: string;
  level: LogLevelName;
  console: boolean;
  file: boolean;
  /** Base of the log file name; a timestamp is appended. */
  name?: string;
  /** Replaces stderr as the console sink. */
  consoleStream?: DestinationStream;
}

const LEVELS: Record<LogLevelName, Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
};

let root: Logger | undefined;
let logFilePath: string | undefined;

export function toPinoLevel(level: LogLevelName): Level {
  return LEVELS[level];
}

/** `<name>_<YYYYMMDD_HHMMSS>.log` */
export function logFileName(name: string, now = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${name}_${date}_${time}.log`;
}

export function initLogging(opts: LoggingOptions): Logger {
  if (root) {
    throw new Error('Logging is already initialized for this process');
  }

  const level = toPinoLevel(opts.level);
  const streams: StreamEntry[] = [];

  if (opts.console) {
    streams.push({ level, stream: opts.consoleStream ?? pino.destination({ fd: 2, sync: true }) });
  }
  if (opts.file) {
    logFilePath = join(opts.logDir, logFileName(opts.name ?? 'prefill-bench'));
    streams.push({ level, stream: pino.destination({ dest: logFilePath, mkdir: true, sync: true }) });
  }

  root = streams.length > 0
    ? pino({ level, base: undefined, timestamp: pino.stdTimeFunctions.isoTime }, pino.multistream(streams))
    : pino({ level: 'silent' });
  return root;
}

export function isLoggingInitialized(): boolean {
  return root !== undefined;
}

/** Named child of the process logger. */
export function getLogger(component: string): Logger {
  if (!root) {
    throw new Error(`Logging requested by "${component}" before initLogging() was called`);
  }
  return root.child({ component });
}

export function getLogFilePath(): string | undefined {
  return logFilePath;
}

export function shutdownLogging(): void {
  root?.flush();
  root = undefined;
  logFilePath = undefined;
}

/** Default for components constructed without a logger. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

// --- Section helpers ---

const WIDTH = 60;

export function logHeader(logger: Logger, title: string, char = '='): void {
  logger.info(char.repeat(WIDTH));
  logger.info(title);
  logger.info(char.repeat(WIDTH));
}
