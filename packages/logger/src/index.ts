import { Chalk } from 'chalk';
import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

// Colour is forced: logs usually go to a pipe, where detection would turn it off.
const forcedColor = new Chalk({ level: 1 });

export function createLogger(level: string = 'info'): Logger {
  const options: LoggerOptions = {
    level,
    base: undefined,
  };

  // stdout belongs to command output; logs go to stderr.
  return pino(options, pino.destination({ fd: 2, sync: true }));
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Debug line that is rendered green when NETFORM_LOG_COLOR is set.
 */
export function colorizedDebug(logger: Logger, msg: string, fields: Record<string, unknown> = {}): void {
  if (!logger.isLevelEnabled('debug')) return;

  const text = process.env.NETFORM_LOG_COLOR === undefined ? msg : forcedColor.green(msg);
  logger.debug(fields, text);
}
