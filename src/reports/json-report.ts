import type {
  AccuracyDistribution,
  DirectorySummary,
  EngineRunResult,
  EvaluationRecord,
  EvaluationSummary,
  FailureEntry,
  GroundTruthRecord,
  LatencyStats,
  TechnicalDetails,
} from '@/types/evaluation';
import type { EngineKind, RecognitionOutcome } from '@/types/ocr-engine';
import { toQuad } from '@/dataset/manifest-parser';
import { aggregate } from '@/evaluation/aggregator';
import { JsonReader, type JsonObject } from '@/reports/json-reader';

export const RUN_REPORT_VERSION = 1;

const reader: JsonReader = new JsonReader('run report');

function readGroundTruth(value: unknown, field: string): GroundTruthRecord {
  const source = reader.object(value, field);
  const points = source.points === undefined ? undefined : toQuad(source.points);
  if (points === null) {
    reader.fail(`${field}.points`, 'four [x, y] pairs');
  }
  const directory = source.directory === undefined ? undefined : reader.string(source, 'directory', field);

  return {
    imagePath: reader.string(source, 'imagePath', field),
    transcription: reader.string(source, 'transcription', field),
    ...(points ? { points } : {}),
    difficult: reader.boolean(source, 'difficult', field),
    ...(directory !== undefined ? { directory } : {}),
    lineNumber: reader.number(source, 'lineNumber', field),
  };
}

function readOutcome(value: unknown, field: string): RecognitionOutcome {
  const source = reader.object(value, field);
  const imagePath = reader.string(source, 'imagePath', field);
  const latencyMs = reader.optionalNumber(source, 'latencyMs', field);
  const latency = latencyMs !== undefined ? { latencyMs } : {};

  if (reader.boolean(source, 'succeeded', field)) {
    return {
      imagePath,
      recognizedText: reader.string(source, 'recognizedText', field),
      succeeded: true,
      ...latency,
    };
  }
  return {
    imagePath,
    recognizedText: '',
    succeeded: false,
    errorDetail: reader.string(source, 'errorDetail', field),
    ...latency,
  };
}

function readRecord(value: unknown, index: number): EvaluationRecord {
  const field = `records[${index}]`;
  const source = reader.object(value, field);
  return {
    imagePath: reader.string(source, 'imagePath', field),
    groundTruth: readGroundTruth(source.groundTruth, `${field}.groundTruth`),
    outcome: readOutcome(source.outcome, `${field}.outcome`),
    exactMatch: reader.boolean(source, 'exactMatch', field),
    accuracy: reader.number(source, 'accuracy', field),
  };
}

function readKind(source: JsonObject, field: string): EngineKind {
  const kind = source.kind;
  return kind === 'local' || kind === 'remote' ? kind : reader.fail(`${field}.kind`, '"local" or "remote"');
}

function readTechnicalDetails(value: unknown): TechnicalDetails {
  const field = 'technicalDetails';
  const source = reader.object(value, field);
  return {
    engineId: reader.string(source, 'engineId', field),
    kind: readKind(source, field),
    options: reader.object(source.options, `${field}.options`),
    initializationMs: reader.number(source, 'initializationMs', field),
    totalProcessingMs: reader.number(source, 'totalProcessingMs', field),
    averageProcessingMs: reader.number(source, 'averageProcessingMs', field),
    timestamp: reader.string(source, 'timestamp', field),
  };
}

function readDistribution(json: JsonReader, value: unknown, field: string): AccuracyDistribution {
  const source = json.object(value, field);
  return {
    '[0.9,1.0]': json.number(source, '[0.9,1.0]', field),
    '[0.8,0.9)': json.number(source, '[0.8,0.9)', field),
    '[0.7,0.8)': json.number(source, '[0.7,0.8)', field),
    '[0.6,0.7)': json.number(source, '[0.6,0.7)', field),
    '[0,0.6)': json.number(source, '[0,0.6)', field),
  };
}

function readLatency(json: JsonReader, value: unknown, field: string): LatencyStats | null {
  if (value === null) {
    return null;
  }
  const source = json.object(value, field);
  return {
    totalMs: json.number(source, 'totalMs', field),
    averageMs: json.number(source, 'averageMs', field),
  };
}

/**
 * Reads a stored `EvaluationSummary` field by field. Comparison documents embed these since they
 * carry no per-record results to recompute them from.
 */
export function readSummary(json: JsonReader, value: unknown, field: string): EvaluationSummary {
  const source = json.object(value, field);

  const failures = json.array(source, 'failures', field).map((entry, index): FailureEntry => {
    const failureField = `${field}.failures[${index}]`;
    const failure = json.object(entry, failureField);
    return {
      imagePath: json.string(failure, 'imagePath', failureField),
      errorDetail: json.string(failure, 'errorDetail', failureField),
    };
  });

  const imagePaths = json.array(source, 'imagePaths', field).map((entry, index) =>
    typeof entry === 'string' ? entry : json.fail(`${field}.imagePaths[${index}]`, 'a string')
  );

  const directories = json.array(source, 'directories', field).map((entry, index): DirectorySummary => {
    const directoryField = `${field}.directories[${index}]`;
    const directory = json.object(entry, directoryField);
    return {
      directory: json.string(directory, 'directory', directoryField),
      totalImages: json.number(directory, 'totalImages', directoryField),
      averageAccuracy: json.number(directory, 'averageAccuracy', directoryField),
      exactMatchCount: json.number(directory, 'exactMatchCount', directoryField),
      exactMatchRate: json.number(directory, 'exactMatchRate', directoryField),
    };
  });

  return {
    engineName: json.string(source, 'engineName', field),
    totalImages: json.number(source, 'totalImages', field),
    succeededImages: json.number(source, 'succeededImages', field),
    exactMatchCount: json.number(source, 'exactMatchCount', field),
    overallAccuracy: json.nullableNumber(source, 'overallAccuracy', field),
    exactMatchRate: json.nullableNumber(source, 'exactMatchRate', field),
    accuracyDistribution: readDistribution(json, source.accuracyDistribution, `${field}.accuracyDistribution`),
    failures,
    imagePaths,
    latency: readLatency(json, source.latency, `${field}.latency`),
    directories,
  };
}

export function serializeRunResult(result: EngineRunResult): string {
  return JSON.stringify({ version: RUN_REPORT_VERSION, ...result }, null, 2);
}

/**
 * Restores a run written by `serializeRunResult`. The summary is recomputed from the stored
 * records, so it always agrees with them.
 */
export function parseRunResult(text: string): EngineRunResult {
  const root = reader.object(reader.parse(text), 'report');
  if (root.version !== RUN_REPORT_VERSION) {
    reader.fail('version', String(RUN_REPORT_VERSION));
  }
  const storedRecords = root.records;
  if (!Array.isArray(storedRecords)) {
    reader.fail('records', 'an array');
  }

  const summary = reader.object(root.summary, 'summary');
  const records = storedRecords.map(readRecord);
  return {
    summary: aggregate(reader.string(summary, 'engineName', 'summary'), records),
    records,
    technicalDetails: readTechnicalDetails(root.technicalDetails),
    skippedLines: reader.number(root, 'skippedLines', 'report'),
  };
}
