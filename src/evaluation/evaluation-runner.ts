import type { GroundTruthRecord, EvaluationRecord, EvaluationSummary } from '@/types/evaluation';
import type { RecognitionEngine, RecognitionOutcome } from '@/types/ocr-engine';
import type { ImageValidation } from '@/dataset/image-validation';
import { aggregate } from '@/evaluation/aggregator';
import { evaluateRecord, type ScoringOptions } from '@/evaluation/record-evaluator';
import { createInvalidConfigError, formatErrorMessage } from '@/utils/error-handling';

export const DEFAULT_CONCURRENCY = 2;

export interface RunEvaluationOptions {
  engineName: string;
  recognizer: RecognitionEngine;
  records: readonly GroundTruthRecord[];
  /** Maximum number of images in flight against the engine. */
  concurrency?: number;
  /** Maps a dataset key to the file the engine should read. Defaults to the key itself. */
  resolveImage?: (imageKey: string) => string;
  checkImage?: (resolvedPath: string) => Promise<ImageValidation>;
  scoring?: ScoringOptions;
  onProgress?: (outcome: RecognitionOutcome) => void;
}

export interface EvaluationRun {
  records: EvaluationRecord[];
  summary: EvaluationSummary;
}

function groupByImage(records: readonly GroundTruthRecord[]): Map<string, GroundTruthRecord[]> {
  const groups = new Map<string, GroundTruthRecord[]>();
  for (const record of records) {
    const group = groups.get(record.imagePath);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.imagePath, [record]);
    }
  }
  return groups;
}

async function recognizeOne(
  imageKey: string,
  options: RunEvaluationOptions
): Promise<RecognitionOutcome> {
  try {
    const resolved = options.resolveImage ? options.resolveImage(imageKey) : imageKey;
    if (options.checkImage) {
      const validation = await options.checkImage(resolved);
      if (!validation.valid) {
        return { imagePath: imageKey, recognizedText: '', succeeded: false, errorDetail: validation.reason };
      }
    }
    const outcome = await options.recognizer.recognize(resolved);
    return { ...outcome, imagePath: imageKey };
  } catch (error) {
    // Recognizers are not supposed to reject; one that does still only fails its own image.
    return {
      imagePath: imageKey,
      recognizedText: '',
      succeeded: false,
      errorDetail: formatErrorMessage(error).message,
    };
  }
}

/**
 * Recognizes every distinct image once through a bounded worker pool, scores it against each
 * of its ground-truth records and aggregates once all images have settled.
 */
export async function runEvaluation(options: RunEvaluationOptions): Promise<EvaluationRun> {
  const groups = groupByImage(options.records);
  const imageKeys = [...groups.keys()];
  const outcomes = new Map<string, RecognitionOutcome>();
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isSafeInteger(concurrency) || concurrency < 1) {
    throw createInvalidConfigError(`concurrency must be an integer >= 1, got ${concurrency}.`);
  }

  let queueIndex = 0;
  const worker = async (): Promise<void> => {
    while (queueIndex < imageKeys.length) {
      const imageKey = imageKeys[queueIndex];
      queueIndex += 1;
      const outcome = await recognizeOne(imageKey, options);
      outcomes.set(imageKey, outcome);
      options.onProgress?.(outcome);
    }
  };

  const workerCount = Math.min(concurrency, imageKeys.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const records = options.records.map((groundTruth) => {
    const outcome = outcomes.get(groundTruth.imagePath);
    if (!outcome) {
      throw new Error(`No outcome recorded for ${groundTruth.imagePath}`);
    }
    return evaluateRecord(groundTruth, outcome, options.scoring);
  });

  return { records, summary: aggregate(options.engineName, records) };
}
