import type { IOCREngine, RecognitionEngine, RecognitionOutcome } from '@/types/ocr-engine';
import { RecognitionError } from '@/types/evaluation-errors';
import { formatErrorMessage } from '@/utils/error-handling';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const TIMEOUT_DETAIL = 'timeout';

export interface RecognizerOptions {
  /** Per-call deadline; `0` disables it. */
  timeoutMs?: number;
  now?: () => number;
}

function failed(imagePath: string, errorDetail: string, latencyMs?: number): RecognitionOutcome {
  return {
    imagePath,
    recognizedText: '',
    succeeded: false,
    errorDetail,
    ...(latencyMs !== undefined ? { latencyMs } : {}),
  };
}

async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  imagePath: string,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return await run(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle the deadline first so an engine rejecting on abort cannot win the race.
      reject(new RecognitionError(TIMEOUT_DETAIL, imagePath, true));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Adapts a backend to the evaluation contract: `recognize` never rejects, and every fault,
 * including a missed deadline, comes back as a failed outcome.
 */
export function createRecognizer(
  engine: IOCREngine,
  options: RecognizerOptions = {}
): RecognitionEngine {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const now = options.now ?? (() => performance.now());

  return {
    async recognize(imagePath: string): Promise<RecognitionOutcome> {
      const startedAt = now();
      try {
        const result = await withDeadline(
          (signal) => engine.process(imagePath, { signal }),
          imagePath,
          timeoutMs
        );
        return {
          imagePath,
          recognizedText: result.text,
          succeeded: true,
          latencyMs: now() - startedAt,
        };
      } catch (error) {
        return failed(imagePath, formatErrorMessage(error).message, now() - startedAt);
      }
    },
  };
}
