import type {
  AccuracyBucket,
  AccuracyDistribution,
  DirectorySummary,
  EvaluationRecord,
  EvaluationSummary,
  FailureEntry,
} from '@/types/evaluation';

const UNGROUPED_DIRECTORY = '.';

export function bucketFor(accuracy: number): AccuracyBucket {
  if (accuracy >= 0.9) return '[0.9,1.0]';
  if (accuracy >= 0.8) return '[0.8,0.9)';
  if (accuracy >= 0.7) return '[0.7,0.8)';
  if (accuracy >= 0.6) return '[0.6,0.7)';
  return '[0,0.6)';
}

export function emptyDistribution(): Record<AccuracyBucket, number> {
  return {
    '[0.9,1.0]': 0,
    '[0.8,0.9)': 0,
    '[0.7,0.8)': 0,
    '[0.6,0.7)': 0,
    '[0,0.6)': 0,
  };
}

/** Sums in ascending order so the floating-point result does not depend on input order. */
function stableSum(values: number[]): number {
  return [...values].sort((a, b) => a - b).reduce((sum, value) => sum + value, 0);
}

interface DirectoryTotals {
  accuracies: number[];
  exactMatches: number;
}

/**
 * Folds scored records into a summary. Every numeric field is independent of record order;
 * `failures` keeps encounter order.
 */
export function aggregate(
  engineName: string,
  records: readonly EvaluationRecord[]
): EvaluationSummary {
  const distribution = emptyDistribution();
  const failures: FailureEntry[] = [];
  const imagePaths = new Set<string>();
  const directories = new Map<string, DirectoryTotals>();

  const accuracies: number[] = [];
  const latencies: number[] = [];
  let exactMatchCount = 0;
  let succeededImages = 0;

  for (const record of records) {
    accuracies.push(record.accuracy);
    distribution[bucketFor(record.accuracy)] += 1;
    imagePaths.add(record.imagePath);

    if (record.exactMatch) {
      exactMatchCount += 1;
    }

    if (record.outcome.succeeded) {
      succeededImages += 1;
    } else {
      failures.push({ imagePath: record.imagePath, errorDetail: record.outcome.errorDetail });
    }

    if (record.outcome.latencyMs !== undefined) {
      latencies.push(record.outcome.latencyMs);
    }

    const directory = record.groundTruth.directory ?? UNGROUPED_DIRECTORY;
    const totals = directories.get(directory) ?? { accuracies: [], exactMatches: 0 };
    totals.accuracies.push(record.accuracy);
    totals.exactMatches += record.exactMatch ? 1 : 0;
    directories.set(directory, totals);
  }

  const totalImages = records.length;
  const hasData = totalImages > 0;
  const latencyTotal = stableSum(latencies);

  return {
    engineName,
    totalImages,
    succeededImages,
    exactMatchCount,
    overallAccuracy: hasData ? stableSum(accuracies) / totalImages : null,
    exactMatchRate: hasData ? exactMatchCount / totalImages : null,
    accuracyDistribution: distribution satisfies AccuracyDistribution,
    failures,
    imagePaths: [...imagePaths].sort(),
    latency:
      latencies.length > 0
        ? { totalMs: latencyTotal, averageMs: latencyTotal / latencies.length }
        : null,
    directories: [...directories.entries()]
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(
        ([directory, totals]): DirectorySummary => ({
          directory,
          totalImages: totals.accuracies.length,
          averageAccuracy: stableSum(totals.accuracies) / totals.accuracies.length,
          exactMatchCount: totals.exactMatches,
          exactMatchRate: totals.exactMatches / totals.accuracies.length,
        })
      ),
  };
}
