export enum EvaluationErrorCode {
  PARSE_ERROR = 'PARSE_ERROR',
  RECOGNITION_FAILED = 'RECOGNITION_FAILED',
  TIMEOUT = 'TIMEOUT',
  DATASET_MISMATCH = 'DATASET_MISMATCH',
  FATAL_IO = 'FATAL_IO',
  ENGINE_LOAD_FAILED = 'ENGINE_LOAD_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_COMPARISON = 'INVALID_COMPARISON',
  REPORT_FAILED = 'REPORT_FAILED',
}

export interface ErrorMessage {
  code: EvaluationErrorCode;
  message: string;
  recoverySuggestion?: string;
}

export class EvaluationError extends Error {
  public readonly code: EvaluationErrorCode;
  public readonly recoverable: boolean;

  constructor(message: string, code: EvaluationErrorCode, recoverable: boolean = true) {
    super(message);
    this.name = 'EvaluationError';
    this.code = code;
    this.recoverable = recoverable;
  }
}

export class ParseError extends EvaluationError {
  public readonly lineNumber: number;

  constructor(message: string, lineNumber: number) {
    super(`Line ${lineNumber}: ${message}`, EvaluationErrorCode.PARSE_ERROR, true);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
  }
}

export class RecognitionError extends EvaluationError {
  public readonly imagePath: string;

  constructor(message: string, imagePath: string, timedOut: boolean = false) {
    super(
      message,
      timedOut ? EvaluationErrorCode.TIMEOUT : EvaluationErrorCode.RECOGNITION_FAILED,
      true
    );
    this.name = 'RecognitionError';
    this.imagePath = imagePath;
  }
}

export interface DatasetDifference {
  engineName: string;
  missing: string[];
  unexpected: string[];
}

export class DatasetMismatchError extends EvaluationError {
  public readonly referenceEngine: string;
  public readonly differences: DatasetDifference[];

  constructor(referenceEngine: string, differences: DatasetDifference[]) {
    const detail = differences
      .map(
        (difference) =>
          `${difference.engineName} (missing ${difference.missing.length}, unexpected ${difference.unexpected.length})`
      )
      .join(', ');
    super(
      `Summaries were computed over different image sets than ${referenceEngine}: ${detail}.`,
      EvaluationErrorCode.DATASET_MISMATCH,
      false
    );
    this.name = 'DatasetMismatchError';
    this.referenceEngine = referenceEngine;
    this.differences = differences;
  }
}

export class FatalIOError extends EvaluationError {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message, EvaluationErrorCode.FATAL_IO, false);
    this.name = 'FatalIOError';
    this.path = path;
  }
}
