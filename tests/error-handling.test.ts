import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import {
  ERROR_MESSAGES,
  EXIT_CODES,
  createEngineLoadError,
  createInvalidComparisonError,
  createInvalidConfigError,
  createReportError,
  exitCodeFor,
  formatErrorMessage,
  logError,
  retryWithBackoff,
} from '../src/utils/error-handling';
import {
  EvaluationError,
  EvaluationErrorCode,
  FatalIOError,
  ParseError,
  RecognitionError,
} from '../src/types/evaluation-errors';
import { createLogger } from '../src/utils/logger';
import { recordingSink } from './helpers';

const ALL_CODES = Object.values(EvaluationErrorCode);

describe('Error handling property tests', () => {
  it('formats every error code with a message and a recovery suggestion', () => {
    fc.assert(
      fc.property(fc.constantFrom(...ALL_CODES), (code) => {
        const error = new EvaluationError(ERROR_MESSAGES[code].message, code);
        const formatted = formatErrorMessage(error);

        expect(formatted.code).toBe(code);
        expect(formatted.message.length).toBeGreaterThan(0);
        expect(formatted.recoverySuggestion?.length ?? 0).toBeGreaterThan(0);
      }),
      { numRuns: 25 }
    );
  });

  it('maps every error code to a non-zero exit code', () => {
    fc.assert(
      fc.property(fc.constantFrom(...ALL_CODES), (code) => {
        expect(exitCodeFor(new EvaluationError('x', code))).toBeGreaterThan(0);
      }),
      { numRuns: 25 }
    );
  });

  it('retries with the given delays until the operation succeeds', async () => {
    const delays = [1, 2, 4, 8, 16];
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: delays.length }), async (failCount) => {
        vi.useFakeTimers();
        try {
          const operation = vi.fn((): Promise<string> => {
            if (operation.mock.calls.length <= failCount) {
              return Promise.reject(new Error('fail'));
            }
            return Promise.resolve('ok');
          });

          const promise = retryWithBackoff(operation, { delaysMs: delays });

          for (let i = 0; i < failCount; i += 1) {
            await vi.advanceTimersByTimeAsync(delays[i]);
          }

          const result = await promise;
          expect(result).toBe('ok');
          expect(operation).toHaveBeenCalledTimes(failCount + 1);
        } finally {
          vi.useRealTimers();
        }
      }),
      { numRuns: 10 }
    );
  });
});

describe('Error handling unit tests', () => {
  it('formats foreign errors and thrown strings as recognition failures', () => {
    expect(formatErrorMessage(new Error('oops'))).toMatchObject({
      code: EvaluationErrorCode.RECOGNITION_FAILED,
      message: 'oops',
    });
    expect(formatErrorMessage('socket hang up').message).toBe('socket hang up');
    expect(formatErrorMessage(undefined).message).toBe('The engine failed to recognize the image.');
  });

  it('tags errors with their codes', () => {
    expect(new ParseError('bad json', 3).message).toBe('Line 3: bad json');
    expect(new RecognitionError('timeout', 'a.jpg', true).code).toBe(EvaluationErrorCode.TIMEOUT);
    expect(new FatalIOError('gone', '/data').recoverable).toBe(false);
  });

  it('builds the fatal errors the CLI reports', () => {
    expect(createEngineLoadError('tesseract', new Error('no traineddata')).message).toBe(
      'Failed to load engine "tesseract": no traineddata'
    );
    expect(createInvalidConfigError().message).toBe('Invalid configuration.');
    expect(createInvalidComparisonError('need two').code).toBe(EvaluationErrorCode.INVALID_COMPARISON);
    expect(createReportError('/out/r.md', 'EACCES').message).toBe('Failed to write report /out/r.md: EACCES');
  });

  it('groups error codes into exit codes', () => {
    expect(exitCodeFor(createInvalidConfigError())).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(createEngineLoadError('x', 'y'))).toBe(EXIT_CODES.MODEL_INIT_ERROR);
    expect(exitCodeFor(new FatalIOError('gone', '/data'))).toBe(EXIT_CODES.DATA_ERROR);
    expect(exitCodeFor(createInvalidComparisonError())).toBe(EXIT_CODES.EVALUATION_ERROR);
    expect(exitCodeFor(createReportError('r.md', 'x'))).toBe(EXIT_CODES.REPORT_ERROR);
    expect(exitCodeFor(new Error('bug'))).toBe(EXIT_CODES.UNKNOWN_ERROR);
  });

  it('logs the code, the message and the recovery suggestion', () => {
    const log = recordingSink();

    logError(createLogger('cli', { sink: log.sink }), createInvalidConfigError('Unknown config key: x'));

    expect(log.entries).toEqual([
      ['error', '[cli] INVALID_CONFIG: Unknown config key: x'],
      ['error', '[cli] Run "ocr-bench config generate" to get a valid starting point.'],
    ]);
  });

  it('logs the stack trace only at debug level', () => {
    const log = recordingSink();

    logError(createLogger('cli', { sink: log.sink, level: 'debug' }), new Error('bug'));

    expect(log.entries.map(([level]) => level)).toEqual(['error', 'error', 'debug']);
  });

  it('fails after exhausting retry attempts', async () => {
    vi.useFakeTimers();
    try {
      const operation = vi.fn((): Promise<void> => Promise.reject(new Error('fail')));
      const onRetry = vi.fn();

      const promise = retryWithBackoff(operation, { delaysMs: [1, 2], onRetry });
      const expectation = expect(promise).rejects.toThrow('fail');

      await vi.advanceTimersByTimeAsync(1);
      await vi.advanceTimersByTimeAsync(2);

      await expectation;
      expect(onRetry).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
