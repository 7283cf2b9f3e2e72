import type { IOCREngine } from '@/types/ocr-engine';
import type { ComparisonResult, EngineRunResult } from '@/types/evaluation';
import type { Dataset } from '@/dataset/dataset-loader';
import { resolveImagePath } from '@/dataset/dataset-loader';
import { validateImage } from '@/dataset/image-validation';
import { EngineFactory, type EngineOptions } from '@/engines/engine-factory';
import { createRecognizer } from '@/engines/recognizer';
import { compareSummaries } from '@/evaluation/comparator';
import { runEvaluation } from '@/evaluation/evaluation-runner';
import type { ScoringOptions } from '@/evaluation/record-evaluator';
import {
  createEngineLoadError,
  createInvalidComparisonError,
  formatErrorMessage,
} from '@/utils/error-handling';
import { createLogger, createProgressLogger, type Logger } from '@/utils/logger';

export interface EvaluateEngineOptions {
  engineOptions?: EngineOptions;
  concurrency?: number;
  timeoutMs?: number;
  scoring?: ScoringOptions;
  /** Check extension, existence and size before handing an image to the engine. Defaults to true. */
  validateImages?: boolean;
  progressEvery?: number;
}

export interface EngineRequest {
  engineId: string;
  engineOptions?: EngineOptions;
}

export interface SkippedEngine {
  engineId: string;
  reason: string;
}

export interface EngineComparison {
  runs: EngineRunResult[];
  comparison: ComparisonResult;
  skipped: SkippedEngine[];
}

export interface BenchmarkManagerOptions {
  logger?: Logger;
  now?: () => number;
  clock?: () => Date;
}

export class BenchmarkManager {
  private readonly factory: EngineFactory;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly clock: () => Date;

  constructor(factory: EngineFactory, options: BenchmarkManagerOptions = {}) {
    this.factory = factory;
    this.logger = options.logger ?? createLogger('benchmark');
    this.now = options.now ?? (() => performance.now());
    this.clock = options.clock ?? (() => new Date());
  }

  /** Loads one engine, runs it over the dataset and always destroys it afterwards. */
  async evaluateEngine(
    engineId: string,
    dataset: Dataset,
    options: EvaluateEngineOptions = {}
  ): Promise<EngineRunResult> {
    const engineOptions = options.engineOptions ?? {};
    const logger = this.logger.child(engineId);

    const initStartedAt = this.now();
    const engine = await this.factory.create(engineId, engineOptions);
    try {
      await engine.load();
    } catch (error) {
      await this.destroyQuietly(engine, logger);
      throw createEngineLoadError(engineId, error);
    }
    const initializationMs = this.now() - initStartedAt;
    logger.info(`Engine loaded in ${initializationMs.toFixed(0)} ms`);

    try {
      const imageCount = new Set(dataset.records.map((record) => record.imagePath)).size;
      const progress = createProgressLogger(logger, imageCount, options.progressEvery ?? 1);

      const runStartedAt = this.now();
      const run = await runEvaluation({
        engineName: engineId,
        recognizer: createRecognizer(engine, { timeoutMs: options.timeoutMs, now: this.now }),
        records: dataset.records,
        concurrency: options.concurrency,
        resolveImage: (imageKey) => resolveImagePath(dataset.rootDir, imageKey),
        checkImage: options.validateImages === false ? undefined : validateImage,
        scoring: options.scoring,
        onProgress: (outcome) => {
          progress.tick(
            outcome.succeeded ? outcome.imagePath : `${outcome.imagePath} failed: ${outcome.errorDetail}`
          );
        },
      });
      const totalProcessingMs = this.now() - runStartedAt;

      return {
        summary: run.summary,
        records: run.records,
        skippedLines: dataset.skippedLines,
        technicalDetails: {
          engineId,
          kind: engine.kind,
          options: engine.describe(),
          initializationMs,
          totalProcessingMs,
          averageProcessingMs: imageCount > 0 ? totalProcessingMs / imageCount : 0,
          timestamp: this.clock().toISOString(),
        },
      };
    } finally {
      await this.destroyQuietly(engine, logger);
    }
  }

  /**
   * Evaluates each requested engine in turn over the same dataset. Engines that cannot be
   * created or loaded are skipped; at least two must finish for the comparison to run.
   */
  async compareEngines(
    requests: readonly EngineRequest[],
    dataset: Dataset,
    options: Omit<EvaluateEngineOptions, 'engineOptions'> = {}
  ): Promise<EngineComparison> {
    const runs: EngineRunResult[] = [];
    const skipped: SkippedEngine[] = [];

    for (const request of requests) {
      try {
        runs.push(
          await this.evaluateEngine(request.engineId, dataset, {
            ...options,
            engineOptions: request.engineOptions,
          })
        );
      } catch (error) {
        const reason = formatErrorMessage(error).message;
        this.logger.warn(`Skipping ${request.engineId}: ${reason}`);
        skipped.push({ engineId: request.engineId, reason });
      }
    }

    if (runs.length < 2) {
      throw createInvalidComparisonError(
        `At least two engines must complete to compare; ${runs.length} of ${requests.length} did.`
      );
    }

    const comparison = compareSummaries(
      runs.map((run) => ({ engineName: run.summary.engineName, summary: run.summary }))
    );
    return { runs, comparison, skipped };
  }

  private async destroyQuietly(engine: IOCREngine, logger: Logger): Promise<void> {
    try {
      await engine.destroy();
    } catch (error) {
      logger.warn(`Engine cleanup failed: ${formatErrorMessage(error).message}`);
    }
  }
}
