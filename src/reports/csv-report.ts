import type { EvaluationRecord } from '@/types/evaluation';

export const CSV_COLUMNS = [
  'directory',
  'image_path',
  'ground_truth',
  'recognized_text',
  'accuracy',
  'exact_match',
  'succeeded',
  'error_detail',
  'latency_ms',
] as const;

/** Quotes a field when it holds a comma, quote or line break (RFC 4180). */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function toRow(record: EvaluationRecord): string[] {
  const { outcome } = record;
  return [
    record.groundTruth.directory ?? '.',
    record.imagePath,
    record.groundTruth.transcription,
    outcome.recognizedText,
    record.accuracy.toFixed(4),
    String(record.exactMatch),
    String(outcome.succeeded),
    outcome.succeeded ? '' : outcome.errorDetail,
    outcome.latencyMs !== undefined ? outcome.latencyMs.toFixed(1) : '',
  ];
}

export function renderCsvReport(records: readonly EvaluationRecord[]): string {
  const rows = [[...CSV_COLUMNS], ...records.map(toRow)];
  return rows.map((row) => row.map(escapeCsvField).join(',')).join('\r\n') + '\r\n';
}
