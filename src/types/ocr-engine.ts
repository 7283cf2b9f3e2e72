export type EngineKind = 'local' | 'remote';

export interface OCRResult {
  text: string;
  confidence?: number;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

/**
 * A concrete recognition backend. `process` is allowed to reject; the evaluation core never
 * calls it directly and goes through a {@link RecognitionEngine} instead.
 */
export interface IOCREngine {
  id: string;
  kind: EngineKind;
  isLoading: boolean;
  load(): Promise<void>;
  process(imagePath: string, options?: ProcessOptions): Promise<OCRResult>;
  destroy(): Promise<void>;
  describe(): Record<string, unknown>;
}

export interface SucceededOutcome {
  imagePath: string;
  recognizedText: string;
  succeeded: true;
  latencyMs?: number;
}

export interface FailedOutcome {
  imagePath: string;
  recognizedText: '';
  succeeded: false;
  errorDetail: string;
  latencyMs?: number;
}

export type RecognitionOutcome = SucceededOutcome | FailedOutcome;

/** The only engine surface the evaluation core depends on. Implementations never reject. */
export interface RecognitionEngine {
  recognize(imagePath: string): Promise<RecognitionOutcome>;
}
