/**
 * Leveled logging with consistent formatting.
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: pc.dim('debug'),
  info: pc.cyan('info '),
  warn: pc.yellow('warn '),
  error: pc.red('error'),
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Where lines go (default: stderr, so stdout stays free for results) */
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'warn'];
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(`${TAGS[level]} ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}
