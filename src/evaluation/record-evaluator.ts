import { distance } from 'fastest-levenshtein';
import type { EvaluationRecord, GroundTruthRecord } from '@/types/evaluation';
import type { RecognitionOutcome } from '@/types/ocr-engine';

export interface ScoringOptions {
  caseSensitive?: boolean;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Edit-distance accuracy: `1 - d / max(len)`, with two empty strings scoring 1. Lengths and
 * distance are both counted in UTF-16 code units.
 */
export function calculateAccuracy(reference: string, recognized: string): number {
  const maxLength = Math.max(reference.length, recognized.length);
  if (maxLength === 0) {
    return 1.0;
  }
  return clampUnit(1.0 - distance(reference, recognized) / maxLength);
}

export function evaluateRecord(
  groundTruth: GroundTruthRecord,
  outcome: RecognitionOutcome,
  options: ScoringOptions = {}
): EvaluationRecord {
  if (!outcome.succeeded) {
    return {
      imagePath: groundTruth.imagePath,
      groundTruth,
      outcome,
      exactMatch: false,
      accuracy: 0.0,
    };
  }

  const caseSensitive = options.caseSensitive ?? true;
  const reference = caseSensitive ? groundTruth.transcription : groundTruth.transcription.toLowerCase();
  const recognized = caseSensitive ? outcome.recognizedText : outcome.recognizedText.toLowerCase();

  return {
    imagePath: groundTruth.imagePath,
    groundTruth,
    outcome,
    exactMatch: recognized === reference,
    accuracy: calculateAccuracy(reference, recognized),
  };
}
