import { appendFileSync, existsSync, mkdirSync, renameSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  critical: 'error',
};

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function combineSinks(...sinks: LogSink[]): LogSink {
  return (level, line) => {
    for (const sink of sinks) {
      sink(level, line);
    }
  };
}

export interface FileSinkOptions {
  /** Size at which the file is rotated. */
  maxBytes?: number;
  /** Rotated files kept as `<file>.1` (newest) to `<file>.<backups>`. */
  backups?: number;
  clock?: () => Date;
  /** Called once when a write fails; the sink stops writing afterwards. */
  onError?: (error: unknown) => void;
}

export const DEFAULT_LOG_FILE_MAX_BYTES = 10 * 1024 * 1024;
export const DEFAULT_LOG_FILE_BACKUPS = 5;

function rotate(filePath: string, backups: number): void {
  if (backups <= 0) {
    writeFileSync(filePath, '');
    return;
  }
  for (let index = backups - 1; index >= 1; index -= 1) {
    const source = `${filePath}.${index}`;
    if (existsSync(source)) {
      renameSync(source, `${filePath}.${index + 1}`);
    }
  }
  renameSync(filePath, `${filePath}.1`);
}

/**
 * Appends `<ISO time> <LEVEL> <line>` entries to a file, rotating it before an entry would take
 * it past `maxBytes`. Throws when the file's directory cannot be created.
 */
export function createFileSink(filePath: string, options: FileSinkOptions = {}): LogSink {
  const maxBytes = options.maxBytes ?? DEFAULT_LOG_FILE_MAX_BYTES;
  const backups = options.backups ?? DEFAULT_LOG_FILE_BACKUPS;
  const clock = options.clock ?? (() => new Date());
  const onError =
    options.onError ??
    ((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`Cannot write log file ${filePath}: ${detail}`);
    });

  mkdirSync(path.dirname(filePath), { recursive: true });
  let broken = false;

  return (level, line) => {
    if (broken) {
      return;
    }
    const entry = `${clock().toISOString()} ${level.toUpperCase()} ${line}\n`;
    try {
      const size = existsSync(filePath) ? statSync(filePath).size : 0;
      if (size > 0 && size + Buffer.byteLength(entry) > maxBytes) {
        rotate(filePath, backups);
      }
      appendFileSync(filePath, entry, 'utf8');
    } catch (error) {
      broken = true;
      onError(error);
    }
  };
}

/** Accepts the level names of the CLI and config file, case-insensitively. */
export function parseLogLevel(input: string): LogLevel | null {
  return LEVEL_ALIASES[input.trim().toLowerCase()] ?? null;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;

  const write = (messageLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[messageLevel] < LEVEL_ORDER[level]) {
      return;
    }
    sink(messageLevel, `[${scope}] ${message}`);
  };

  return {
    level,
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink }),
  };
}

export interface ProgressLogger {
  tick(detail?: string): void;
  readonly completed: number;
}

/** Logs `[k/n] (pct%)` lines, at most once every `every` completions and always on the last. */
export function createProgressLogger(
  logger: Logger,
  total: number,
  every: number = 1
): ProgressLogger {
  let completed = 0;

  return {
    tick(detail?: string): void {
      completed += 1;
      if (completed % every !== 0 && completed !== total) {
        return;
      }
      const pct = total > 0 ? ((completed / total) * 100).toFixed(1) : '100.0';
      logger.info(`[${completed}/${total}] (${pct}%)${detail ? ` ${detail}` : ''}`);
    },
    get completed(): number {
      return completed;
    },
  };
}
