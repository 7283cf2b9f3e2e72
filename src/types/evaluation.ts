import type { EngineKind, RecognitionOutcome } from '@/types/ocr-engine';

export type Point = readonly [number, number];
export type Quad = readonly [Point, Point, Point, Point];

export interface GroundTruthRecord {
  readonly imagePath: string;
  readonly transcription: string;
  readonly points?: Quad;
  readonly difficult: boolean;
  /** Label directory relative to the dataset root, when loaded through dataset discovery. */
  readonly directory?: string;
  readonly lineNumber: number;
}

export interface EvaluationRecord {
  readonly imagePath: string;
  readonly groundTruth: GroundTruthRecord;
  readonly outcome: RecognitionOutcome;
  readonly exactMatch: boolean;
  readonly accuracy: number;
}

export const ACCURACY_BUCKETS = [
  '[0.9,1.0]',
  '[0.8,0.9)',
  '[0.7,0.8)',
  '[0.6,0.7)',
  '[0,0.6)',
] as const;

export type AccuracyBucket = (typeof ACCURACY_BUCKETS)[number];

export type AccuracyDistribution = Readonly<Record<AccuracyBucket, number>>;

export interface FailureEntry {
  readonly imagePath: string;
  readonly errorDetail: string;
}

export interface LatencyStats {
  readonly totalMs: number;
  readonly averageMs: number;
}

export interface DirectorySummary {
  readonly directory: string;
  readonly totalImages: number;
  readonly averageAccuracy: number;
  readonly exactMatchCount: number;
  readonly exactMatchRate: number;
}

export interface EvaluationSummary {
  readonly engineName: string;
  readonly totalImages: number;
  readonly succeededImages: number;
  readonly exactMatchCount: number;
  /** `null` marks an empty dataset; it is never reported as a real 0. */
  readonly overallAccuracy: number | null;
  readonly exactMatchRate: number | null;
  readonly accuracyDistribution: AccuracyDistribution;
  readonly failures: readonly FailureEntry[];
  readonly imagePaths: readonly string[];
  readonly latency: LatencyStats | null;
  readonly directories: readonly DirectorySummary[];
}

export interface RankedEngine {
  readonly rank: number;
  readonly engineName: string;
  readonly summary: EvaluationSummary;
  readonly deltaFromTop: number | null;
}

export interface ComparisonResult {
  readonly rankings: readonly RankedEngine[];
  readonly topEngine: string;
}

export interface TechnicalDetails {
  readonly engineId: string;
  readonly kind: EngineKind;
  readonly options: Record<string, unknown>;
  readonly initializationMs: number;
  readonly totalProcessingMs: number;
  readonly averageProcessingMs: number;
  readonly timestamp: string;
}

export interface EngineRunResult {
  readonly summary: EvaluationSummary;
  readonly records: readonly EvaluationRecord[];
  readonly technicalDetails: TechnicalDetails;
  readonly skippedLines: number;
}
