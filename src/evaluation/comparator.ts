import { DatasetMismatchError, type DatasetDifference } from '@/types/evaluation-errors';
import type { ComparisonResult, EvaluationSummary, RankedEngine } from '@/types/evaluation';
import { createInvalidComparisonError } from '@/utils/error-handling';

export interface ComparisonEntry {
  engineName: string;
  summary: EvaluationSummary;
}

function compareNullableDesc(left: number | null, right: number | null): number {
  if (left === right) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  return right - left;
}

function compareNames(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function rankOrder(left: ComparisonEntry, right: ComparisonEntry): number {
  return (
    compareNullableDesc(left.summary.overallAccuracy, right.summary.overallAccuracy) ||
    compareNullableDesc(left.summary.exactMatchRate, right.summary.exactMatchRate) ||
    compareNames(left.engineName, right.engineName)
  );
}

function diffImageSets(reference: ReadonlySet<string>, entry: ComparisonEntry): DatasetDifference {
  const actual = new Set(entry.summary.imagePaths);
  return {
    engineName: entry.engineName,
    missing: [...reference].filter((imagePath) => !actual.has(imagePath)).sort(),
    unexpected: [...actual].filter((imagePath) => !reference.has(imagePath)).sort(),
  };
}

/** Throws before ranking anything when the summaries do not share one image set. */
export function assertSameDataset(entries: readonly ComparisonEntry[]): void {
  const [reference, ...others] = entries;
  if (!reference) {
    return;
  }

  const referenceSet = new Set(reference.summary.imagePaths);
  const differences = others
    .map((entry) => diffImageSets(referenceSet, entry))
    .filter((difference) => difference.missing.length > 0 || difference.unexpected.length > 0);

  if (differences.length > 0) {
    throw new DatasetMismatchError(reference.engineName, differences);
  }
}

export function compareSummaries(entries: readonly ComparisonEntry[]): ComparisonResult {
  if (entries.length === 0) {
    throw createInvalidComparisonError('At least one summary is required for a comparison.');
  }

  const names = new Set<string>();
  for (const entry of entries) {
    if (names.has(entry.engineName)) {
      throw createInvalidComparisonError(`Engine compared more than once: ${entry.engineName}`);
    }
    names.add(entry.engineName);
  }

  assertSameDataset(entries);

  const sorted = [...entries].sort(rankOrder);
  const top = sorted[0];
  const topAccuracy = top.summary.overallAccuracy;

  const rankings = sorted.map(
    (entry, index): RankedEngine => ({
      rank: index + 1,
      engineName: entry.engineName,
      summary: entry.summary,
      deltaFromTop:
        entry.summary.overallAccuracy === null || topAccuracy === null
          ? null
          : entry.summary.overallAccuracy - topAccuracy,
    })
  );

  return { rankings, topEngine: top.engineName };
}
