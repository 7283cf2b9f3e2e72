import {
  EvaluationError,
  EvaluationErrorCode,
  type ErrorMessage,
} from '@/types/evaluation-errors';
import type { Logger } from '@/utils/logger';

export const ERROR_MESSAGES: Record<EvaluationErrorCode, ErrorMessage> = {
  [EvaluationErrorCode.PARSE_ERROR]: {
    code: EvaluationErrorCode.PARSE_ERROR,
    message: 'Malformed manifest line.',
    recoverySuggestion: 'Each line must be "<image path>\\t<JSON array of annotations>".',
  },
  [EvaluationErrorCode.RECOGNITION_FAILED]: {
    code: EvaluationErrorCode.RECOGNITION_FAILED,
    message: 'The engine failed to recognize the image.',
    recoverySuggestion: 'Check the image file and the engine logs, then rerun the evaluation.',
  },
  [EvaluationErrorCode.TIMEOUT]: {
    code: EvaluationErrorCode.TIMEOUT,
    message: 'timeout',
    recoverySuggestion: 'Raise --timeout or lower --concurrency for slow backends.',
  },
  [EvaluationErrorCode.DATASET_MISMATCH]: {
    code: EvaluationErrorCode.DATASET_MISMATCH,
    message: 'Compared summaries cover different image sets.',
    recoverySuggestion: 'Evaluate every engine against the same images directory.',
  },
  [EvaluationErrorCode.FATAL_IO]: {
    code: EvaluationErrorCode.FATAL_IO,
    message: 'Dataset or manifest could not be read.',
    recoverySuggestion: 'Check --images-dir and make sure each label directory has a Label.txt.',
  },
  [EvaluationErrorCode.ENGINE_LOAD_FAILED]: {
    code: EvaluationErrorCode.ENGINE_LOAD_FAILED,
    message: 'Failed to load recognition engine.',
    recoverySuggestion: 'Check the engine options and that its model or server is available.',
  },
  [EvaluationErrorCode.INVALID_CONFIG]: {
    code: EvaluationErrorCode.INVALID_CONFIG,
    message: 'Invalid configuration.',
    recoverySuggestion: 'Run "ocr-bench config generate" to get a valid starting point.',
  },
  [EvaluationErrorCode.INVALID_COMPARISON]: {
    code: EvaluationErrorCode.INVALID_COMPARISON,
    message: 'Invalid comparison request.',
    recoverySuggestion: 'Pass one summary per engine, with distinct engine names.',
  },
  [EvaluationErrorCode.REPORT_FAILED]: {
    code: EvaluationErrorCode.REPORT_FAILED,
    message: 'Failed to write the report.',
    recoverySuggestion: 'Check that --output-dir is writable.',
  },
};

/** Process exit codes, grouped the way the CLI reports fatal errors. */
export const EXIT_CODES = {
  SUCCESS: 0,
  CONFIG_ERROR: 1,
  MODEL_INIT_ERROR: 2,
  DATA_ERROR: 3,
  EVALUATION_ERROR: 4,
  REPORT_ERROR: 5,
  UNKNOWN_ERROR: 99,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const EXIT_CODE_BY_ERROR: Record<EvaluationErrorCode, ExitCode> = {
  [EvaluationErrorCode.PARSE_ERROR]: EXIT_CODES.DATA_ERROR,
  [EvaluationErrorCode.RECOGNITION_FAILED]: EXIT_CODES.EVALUATION_ERROR,
  [EvaluationErrorCode.TIMEOUT]: EXIT_CODES.EVALUATION_ERROR,
  [EvaluationErrorCode.DATASET_MISMATCH]: EXIT_CODES.DATA_ERROR,
  [EvaluationErrorCode.FATAL_IO]: EXIT_CODES.DATA_ERROR,
  [EvaluationErrorCode.ENGINE_LOAD_FAILED]: EXIT_CODES.MODEL_INIT_ERROR,
  [EvaluationErrorCode.INVALID_CONFIG]: EXIT_CODES.CONFIG_ERROR,
  [EvaluationErrorCode.INVALID_COMPARISON]: EXIT_CODES.EVALUATION_ERROR,
  [EvaluationErrorCode.REPORT_FAILED]: EXIT_CODES.REPORT_ERROR,
};

export function formatErrorMessage(error: unknown): ErrorMessage {
  if (error instanceof EvaluationError) {
    const fallback = ERROR_MESSAGES[error.code];
    return {
      code: error.code,
      message: error.message || fallback.message,
      recoverySuggestion: fallback.recoverySuggestion,
    };
  }

  if (error instanceof Error) {
    return {
      code: EvaluationErrorCode.RECOGNITION_FAILED,
      message: error.message || ERROR_MESSAGES[EvaluationErrorCode.RECOGNITION_FAILED].message,
      recoverySuggestion:
        ERROR_MESSAGES[EvaluationErrorCode.RECOGNITION_FAILED].recoverySuggestion,
    };
  }

  return {
    code: EvaluationErrorCode.RECOGNITION_FAILED,
    message:
      typeof error === 'string' && error.length > 0
        ? error
        : ERROR_MESSAGES[EvaluationErrorCode.RECOGNITION_FAILED].message,
    recoverySuggestion: ERROR_MESSAGES[EvaluationErrorCode.RECOGNITION_FAILED].recoverySuggestion,
  };
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof EvaluationError) {
    return EXIT_CODE_BY_ERROR[error.code];
  }
  return EXIT_CODES.UNKNOWN_ERROR;
}

export function logError(logger: Logger, error: unknown): void {
  const formatted = formatErrorMessage(error);
  logger.error(`${formatted.code}: ${formatted.message}`);
  if (formatted.recoverySuggestion) {
    logger.error(formatted.recoverySuggestion);
  }
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
}

export function createEngineLoadError(engineId: string, cause: unknown): EvaluationError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new EvaluationError(
    `Failed to load engine "${engineId}": ${detail}`,
    EvaluationErrorCode.ENGINE_LOAD_FAILED,
    false
  );
}

export function createInvalidConfigError(message?: string): EvaluationError {
  return new EvaluationError(
    message ?? ERROR_MESSAGES[EvaluationErrorCode.INVALID_CONFIG].message,
    EvaluationErrorCode.INVALID_CONFIG,
    false
  );
}

export function createInvalidComparisonError(message?: string): EvaluationError {
  return new EvaluationError(
    message ?? ERROR_MESSAGES[EvaluationErrorCode.INVALID_COMPARISON].message,
    EvaluationErrorCode.INVALID_COMPARISON,
    false
  );
}

export function createReportError(path: string, cause: unknown): EvaluationError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new EvaluationError(
    `Failed to write report ${path}: ${detail}`,
    EvaluationErrorCode.REPORT_FAILED,
    false
  );
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: {
    delaysMs?: number[];
    onRetry?: (error: unknown, attempt: number) => void;
  } = {}
): Promise<T> {
  const delays = options.delaysMs ?? [1000, 2000, 4000];

  for (let attempt = 0; attempt <= delays.length; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= delays.length) {
        throw error;
      }

      options.onRetry?.(error, attempt + 1);
      await new Promise((resolve) => setTimeout(resolve, delays[attempt]));
    }
  }

  throw new Error('Retry attempts exhausted.');
}
