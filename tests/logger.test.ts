import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  combineSinks,
  createFileSink,
  createLogger,
  createProgressLogger,
  LOG_LEVELS,
  parseLogLevel,
} from '../src/utils/logger';
import { recordingSink } from './helpers';

describe('logger property tests', () => {
  it('drops messages below the configured level', () => {
    fc.assert(
      fc.property(fc.constantFrom(...LOG_LEVELS), (level) => {
        const log = recordingSink();
        const logger = createLogger('test', { level, sink: log.sink });

        logger.debug('d');
        logger.info('i');
        logger.warn('w');
        logger.error('e');

        const threshold = LOG_LEVELS.indexOf(level);
        expect(log.entries.map(([entryLevel]) => entryLevel)).toEqual(LOG_LEVELS.slice(threshold));
      }),
      { numRuns: 20 }
    );
  });

  it('logs the last tick whatever the interval', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 20 }), fc.integer({ min: 1, max: 5 }), (total, every) => {
        const log = recordingSink();
        const progress = createProgressLogger(createLogger('run', { sink: log.sink }), total, every);

        for (let i = 0; i < total; i += 1) {
          progress.tick();
        }

        expect(progress.completed).toBe(total);
        expect(log.lines[log.lines.length - 1]).toBe(`[run] [${total}/${total}] (100.0%)`);
      }),
      { numRuns: 50 }
    );
  });
});

describe('logger unit tests', () => {
  it('prefixes the scope and nests child scopes', () => {
    const log = recordingSink();
    const logger = createLogger('benchmark', { sink: log.sink });

    logger.info('started');
    logger.child('tesseract').warn('slow image');

    expect(log.lines).toEqual(['[benchmark] started', '[benchmark:tesseract] slow image']);
  });

  it('writes warnings and errors to stderr by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    try {
      const logger = createLogger('cli');
      logger.info('hello');
      logger.warn('careful');
      logger.error('broken');

      expect(log).toHaveBeenCalledWith('[cli] hello');
      expect(warn).toHaveBeenCalledWith('[cli] careful');
      expect(error).toHaveBeenCalledWith('[cli] broken');
    } finally {
      log.mockRestore();
      warn.mockRestore();
      error.mockRestore();
    }
  });

  it('parses level names and their aliases', () => {
    expect(parseLogLevel(' INFO ')).toBe('info');
    expect(parseLogLevel('warning')).toBe('warn');
    expect(parseLogLevel('critical')).toBe('error');
    expect(parseLogLevel('trace')).toBeNull();
  });

  it('reports progress every n completions with a detail', () => {
    const log = recordingSink();
    const progress = createProgressLogger(createLogger('run', { sink: log.sink }), 4, 2);

    progress.tick('a.jpg');
    progress.tick('b.jpg');
    progress.tick('c.jpg');
    progress.tick('d.jpg failed: timeout');

    expect(log.lines).toEqual(['[run] [2/4] (50.0%) b.jpg', '[run] [4/4] (100.0%) d.jpg failed: timeout']);
  });
});

describe('file sink', () => {
  let dir: string;
  const clock = () => new Date('2026-03-01T09:05:07.000Z');

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends timestamped lines and creates the directory', () => {
    const file = path.join(dir, 'logs', 'bench.log');
    const logger = createLogger('app', { level: 'debug', sink: createFileSink(file, { clock }) });

    logger.debug('loading');
    logger.warn('slow image');

    expect(readFileSync(file, 'utf8')).toBe(
      '2026-03-01T09:05:07.000Z DEBUG [app] loading\n2026-03-01T09:05:07.000Z WARN [app] slow image\n'
    );
  });

  it('rotates before a line would pass the size limit and keeps the newest backups', () => {
    const file = path.join(dir, 'bench.log');
    const logger = createLogger('app', { sink: createFileSink(file, { clock, maxBytes: 60, backups: 2 }) });

    for (const message of ['first', 'second', 'third', 'fourth']) {
      logger.info(message);
    }

    expect(readFileSync(file, 'utf8')).toBe('2026-03-01T09:05:07.000Z INFO [app] fourth\n');
    expect(readFileSync(`${file}.1`, 'utf8')).toBe('2026-03-01T09:05:07.000Z INFO [app] third\n');
    expect(readFileSync(`${file}.2`, 'utf8')).toBe('2026-03-01T09:05:07.000Z INFO [app] second\n');
    expect(existsSync(`${file}.3`)).toBe(false);
  });

  it('reports a failed write once and stops writing', () => {
    const errors: unknown[] = [];
    const sink = createFileSink(dir, { clock, onError: (error) => errors.push(error) });

    sink('info', '[app] one');
    sink('info', '[app] two');

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(Error);
  });

  it('feeds every combined sink', () => {
    const first = recordingSink();
    const second = recordingSink();
    const logger = createLogger('app', { sink: combineSinks(first.sink, second.sink) });

    logger.info('hello');

    expect(first.lines).toEqual(['[app] hello']);
    expect(second.lines).toEqual(['[app] hello']);
  });
});
