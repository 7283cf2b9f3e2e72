import { ACCURACY_BUCKETS, type EngineRunResult, type EvaluationRecord } from '@/types/evaluation';
import {
  escapeTableCell,
  formatMs,
  formatPercent,
  formatRatio,
  imageName,
} from '@/reports/format';

export const DEFAULT_ROWS_PER_DIRECTORY = 10;

export interface MarkdownReportOptions {
  rowsPerDirectory?: number;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

function technicalSection(result: EngineRunResult): string[] {
  const details = result.technicalDetails;
  const lines = [
    '## Technical Details',
    '',
    `- **Engine**: ${details.engineId}`,
    `- **Kind**: ${details.kind}`,
  ];

  for (const [key, value] of Object.entries(details.options)) {
    if (key !== 'prompt') {
      lines.push(`- **${key}**: ${describeValue(value)}`);
    }
  }

  lines.push(
    `- **Initialization**: ${formatMs(details.initializationMs)}`,
    `- **Total processing time**: ${formatMs(details.totalProcessingMs)}`,
    `- **Average processing time**: ${formatMs(details.averageProcessingMs)} per image`,
    ''
  );

  const prompt = details.options.prompt;
  if (typeof prompt === 'string') {
    lines.push('### Prompt', '', '```', prompt, '```', '');
  }
  return lines;
}

function statisticsSection(result: EngineRunResult): string[] {
  const { summary } = result;
  const lines = [
    '## Statistics',
    '',
    `- **Succeeded images**: ${summary.succeededImages}`,
    `- **Exact matches**: ${summary.exactMatchCount}`,
    `- **Exact match rate**: ${formatRatio(summary.exactMatchRate)}`,
    `- **Skipped manifest lines**: ${result.skippedLines}`,
  ];
  if (summary.latency) {
    lines.push(`- **Average latency**: ${formatMs(summary.latency.averageMs)}`);
  }

  lines.push('', '### Accuracy Distribution', '');
  for (const bucket of ACCURACY_BUCKETS) {
    const count = summary.accuracyDistribution[bucket];
    lines.push(`- **${bucket}**: ${count} images (${formatPercent(count, summary.totalImages)})`);
  }
  lines.push('');
  return lines;
}

function directorySection(result: EngineRunResult, rowsPerDirectory: number): string[] {
  const lines = [
    '## Directory Results',
    '',
    '| Directory | Images | Average accuracy | Exact matches | Exact match rate |',
    '|---|---|---|---|---|',
  ];
  for (const directory of result.summary.directories) {
    lines.push(
      `| ${escapeTableCell(directory.directory)} | ${directory.totalImages} | ` +
        `${formatRatio(directory.averageAccuracy)} | ${directory.exactMatchCount} | ` +
        `${formatRatio(directory.exactMatchRate)} |`
    );
  }
  lines.push('');

  const byDirectory = new Map<string, EvaluationRecord[]>();
  for (const record of result.records) {
    const key = record.groundTruth.directory ?? '.';
    const group = byDirectory.get(key) ?? [];
    group.push(record);
    byDirectory.set(key, group);
  }

  for (const directory of result.summary.directories) {
    const records = byDirectory.get(directory.directory) ?? [];
    lines.push(
      `### ${directory.directory}`,
      '',
      '| Image | Ground truth | Recognized | Accuracy | Exact match |',
      '|---|---|---|---|---|'
    );
    for (const record of records.slice(0, rowsPerDirectory)) {
      lines.push(
        `| ${escapeTableCell(imageName(record.imagePath))} | ` +
          `${escapeTableCell(record.groundTruth.transcription)} | ` +
          `${escapeTableCell(record.outcome.recognizedText)} | ` +
          `${record.accuracy.toFixed(4)} | ${record.exactMatch ? '✓' : '✗'} |`
      );
    }
    if (records.length > rowsPerDirectory) {
      lines.push('| ... | ... | ... | ... | ... |', `| (${records.length} records) | | | | |`);
    }
    lines.push('');
  }
  return lines;
}

function failureSection(result: EngineRunResult): string[] {
  const { failures } = result.summary;
  if (failures.length === 0) {
    return ['## Failures', '', 'None.', ''];
  }
  return [
    '## Failures',
    '',
    ...failures.map(
      (failure) => `- \`${failure.imagePath}\`: ${escapeTableCell(failure.errorDetail)}`
    ),
    '',
  ];
}

const METHOD_SECTION = [
  '## Method',
  '',
  '1. **Exact match**: the recognized text equals the ground truth; the rate is exact matches / records.',
  '2. **Edit-distance accuracy**: `1 - levenshtein(truth, recognized) / max(len(truth), len(recognized))`, 1 when both are empty.',
  '3. **Overall accuracy**: the mean edit-distance accuracy over all records. A failed recognition scores 0.',
  '',
];

export function renderMarkdownReport(
  result: EngineRunResult,
  options: MarkdownReportOptions = {}
): string {
  const { summary, technicalDetails } = result;
  const rowsPerDirectory = options.rowsPerDirectory ?? DEFAULT_ROWS_PER_DIRECTORY;

  return [
    `# ${summary.engineName} OCR Accuracy Report`,
    '',
    `**Run at**: ${technicalDetails.timestamp}`,
    `**Engine**: ${technicalDetails.engineId}`,
    `**Total images**: ${summary.totalImages}`,
    `**Overall accuracy**: ${formatRatio(summary.overallAccuracy)}`,
    '',
    ...technicalSection(result),
    ...statisticsSection(result),
    ...directorySection(result, rowsPerDirectory),
    ...failureSection(result),
    ...METHOD_SECTION,
  ].join('\n');
}
