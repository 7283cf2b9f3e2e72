import type { ComparisonResult, EvaluationSummary, RankedEngine } from '@/types/evaluation';
import { compareSummaries } from '@/evaluation/comparator';
import { escapeTableCell, formatDelta, formatRatio } from '@/reports/format';
import { JsonReader } from '@/reports/json-reader';
import { readSummary } from '@/reports/json-report';

export const COMPARISON_REPORT_VERSION = 1;

export interface SkippedEngineEntry {
  engineId: string;
  reason: string;
}

export interface ComparisonReportOptions {
  generatedAt: string;
  skippedEngines?: readonly SkippedEngineEntry[];
}

export interface ComparisonDocument {
  version: number;
  generatedAt: string;
  topEngine: string;
  imageCount: number;
  rankings: {
    rank: number;
    engineName: string;
    deltaFromTop: number | null;
    summary: EvaluationSummary;
  }[];
  skippedEngines: SkippedEngineEntry[];
}

export interface StoredComparison {
  comparison: ComparisonResult;
  generatedAt: string;
  skippedEngines: SkippedEngineEntry[];
}

function rankingRow(entry: RankedEngine): string {
  const { summary } = entry;
  return (
    `| ${entry.rank} | ${escapeTableCell(entry.engineName)} | ${formatRatio(summary.overallAccuracy)} | ` +
    `${formatRatio(summary.exactMatchRate)} | ${formatDelta(entry.deltaFromTop)} | ` +
    `${summary.totalImages} | ${summary.failures.length} |`
  );
}

function directoryComparison(comparison: ComparisonResult): string[] {
  const directories = [
    ...new Set(
      comparison.rankings.flatMap((entry) => entry.summary.directories.map((dir) => dir.directory))
    ),
  ].sort();
  if (directories.length === 0) {
    return [];
  }

  const engines = comparison.rankings.map((entry) => entry.engineName);
  const lines = [
    '## Per-Directory Accuracy',
    '',
    `| Directory | ${engines.map(escapeTableCell).join(' | ')} |`,
    `|---|${engines.map(() => '---').join('|')}|`,
  ];
  for (const directory of directories) {
    const cells = comparison.rankings.map((entry) => {
      const match = entry.summary.directories.find((dir) => dir.directory === directory);
      return match ? match.averageAccuracy.toFixed(4) : '-';
    });
    lines.push(`| ${escapeTableCell(directory)} | ${cells.join(' | ')} |`);
  }
  lines.push('');
  return lines;
}

export function renderComparisonReport(
  comparison: ComparisonResult,
  options: ComparisonReportOptions
): string {
  const top = comparison.rankings[0];
  const lines = [
    '# OCR Engine Comparison',
    '',
    `**Generated at**: ${options.generatedAt}`,
    `**Engines**: ${comparison.rankings.length}`,
    `**Images**: ${top ? top.summary.imagePaths.length : 0}`,
    '',
    '## Ranking',
    '',
    '| Rank | Engine | Overall accuracy | Exact match rate | Delta from top | Records | Failures |',
    '|---|---|---|---|---|---|---|',
    ...comparison.rankings.map(rankingRow),
    '',
    ...directoryComparison(comparison),
    '## Best Engine',
    '',
    top
      ? `**${comparison.topEngine}** with overall accuracy ${formatRatio(top.summary.overallAccuracy)}.`
      : `**${comparison.topEngine}**`,
    '',
  ];

  const skipped = options.skippedEngines ?? [];
  if (skipped.length > 0) {
    lines.push('## Skipped Engines', '');
    for (const engine of skipped) {
      lines.push(`- **${engine.engineId}**: ${escapeTableCell(engine.reason)}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function toComparisonDocument(
  comparison: ComparisonResult,
  options: ComparisonReportOptions
): ComparisonDocument {
  return {
    version: COMPARISON_REPORT_VERSION,
    generatedAt: options.generatedAt,
    topEngine: comparison.topEngine,
    imageCount: comparison.rankings[0]?.summary.imagePaths.length ?? 0,
    rankings: comparison.rankings.map((entry) => ({
      rank: entry.rank,
      engineName: entry.engineName,
      deltaFromTop: entry.deltaFromTop,
      summary: entry.summary,
    })),
    skippedEngines: [...(options.skippedEngines ?? [])],
  };
}

export function serializeComparison(comparison: ComparisonResult, options: ComparisonReportOptions): string {
  return JSON.stringify(toComparisonDocument(comparison, options), null, 2);
}

/**
 * Restores a comparison written by `serializeComparison`. Ranks and deltas are recomputed from
 * the stored summaries.
 */
export function parseComparisonDocument(text: string): StoredComparison {
  const reader = new JsonReader('comparison report');
  const root = reader.object(reader.parse(text), 'report');
  if (root.version !== COMPARISON_REPORT_VERSION) {
    reader.fail('version', String(COMPARISON_REPORT_VERSION));
  }

  const entries = reader.array(root, 'rankings', 'report').map((value, index) => {
    const field = `rankings[${index}]`;
    const ranking = reader.object(value, field);
    return {
      engineName: reader.string(ranking, 'engineName', field),
      summary: readSummary(reader, ranking.summary, `${field}.summary`),
    };
  });
  if (entries.length === 0) {
    reader.fail('rankings', 'a non-empty array');
  }

  const skippedEngines = reader.array(root, 'skippedEngines', 'report').map((value, index) => {
    const field = `skippedEngines[${index}]`;
    const skipped = reader.object(value, field);
    return {
      engineId: reader.string(skipped, 'engineId', field),
      reason: reader.string(skipped, 'reason', field),
    };
  });

  return {
    comparison: compareSummaries(entries),
    generatedAt: reader.string(root, 'generatedAt', 'report'),
    skippedEngines,
  };
}
