/**
 * Structured Logging Module
 *
 * pino-based logging with scoped child loggers. Everything goes to stderr:
 * stdout belongs to the lyric display.
 */

import pino, { DestinationStream, Logger } from 'pino';
import pinoPretty from 'pino-pretty';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;
const scopedLoggers: Logger[] = [];

// Scoped loggers exist from import time on; the sink behind them is swapped
// when initLogger() decides between JSON and pretty output.
let sink: DestinationStream | null = null;
const output: DestinationStream = {
  write: (msg: string) => {
    sink ??= createSink(defaultPretty());
    sink.write(msg);
  },
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

function defaultLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  return isLogLevel(envLevel) ? envLevel : 'warn';
}

function defaultPretty(): boolean {
  return process.env.NODE_ENV !== 'production' && process.stderr.isTTY === true;
}

function createSink(pretty: boolean): DestinationStream {
  if (pretty) {
    return pinoPretty({
      destination: 2,
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname,module',
      messageFormat: '[{module}] {msg}',
    });
  }
  return pino.destination(2);
}

/**
 * Initialize logging. Call once at startup, after the CLI flags are known.
 *
 * Modules grab their scoped logger at import time, so the level is applied to
 * the root and to every scoped logger handed out so far.
 */
export function initLogger(config: LoggerConfig = {}): void {
  const level = config.level ?? defaultLevel();
  sink = createSink(config.pretty ?? defaultPretty());

  const root = getRootLogger();
  root.level = level;
  for (const scoped of scopedLoggers) {
    scoped.level = level;
  }
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  const scoped = getRootLogger().child({ module });
  scopedLoggers.push(scoped);
  return scoped;
}

/**
 * Get the root logger instance.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: defaultLevel() }, output);
  }
  return rootLogger;
}
