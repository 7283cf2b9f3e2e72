import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { EngineRunResult } from '@/types/evaluation';
import { BenchmarkManager, type EngineComparison } from '@/benchmark-manager';
import {
  CONFIG_ENV,
  CONFIG_FORMATS,
  configFormatFor,
  DEFAULT_CONFIG,
  getConfigValue,
  isConfigFormat,
  isRecord,
  isSettableConfigKey,
  parseConfig,
  parseConfigScalar,
  readConfigDocument,
  serializeConfig,
  setConfigValue,
  type AppConfig,
  type ConfigFormat,
} from '@/config/settings';
import { loadDataset, type Dataset } from '@/dataset/dataset-loader';
import type { EngineFactory, EngineOptions } from '@/engines/engine-factory';
import { formatRatio } from '@/reports/format';
import { ReportWriter } from '@/reports/report-writer';
import { createInvalidComparisonError, createInvalidConfigError } from '@/utils/error-handling';
import type { Logger } from '@/utils/logger';

export interface CommandContext {
  config: AppConfig;
  /** Config file named by `--config` or the environment, if any. */
  configPath?: string;
  logger: Logger;
  factory: EngineFactory;
  /** Receives command output meant for stdout, one block per call. */
  print: (text: string) => void;
  clock: () => Date;
}

export interface EvaluateCommandArgs {
  engineId: string;
  imagesDir: string;
  /** JSON object merged over the engine's configured options. */
  modelConfig?: string;
  reportName?: string;
}

export interface CompareCommandArgs {
  engineIds: string[];
  imagesDir: string;
  modelConfig?: string;
  comparisonReport?: string;
}

export interface ConfigSetArgs {
  configPath?: string;
  key: string;
  value: string;
}

export interface ConfigGenerateArgs {
  output?: string;
  format?: string;
}

export function parseModelConfig(json: string): EngineOptions {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw createInvalidConfigError(`--model-config is not valid JSON: ${detail}`);
  }
  if (!isRecord(parsed)) {
    throw createInvalidConfigError('--model-config must be a JSON object.');
  }
  return parsed;
}

/**
 * Splits `--model-config` for a comparison: an object whose keys all name compared engines maps
 * each engine to its own options, any other object applies to every engine.
 */
export function modelConfigPerEngine(
  engineIds: readonly string[],
  overrides: EngineOptions
): Map<string, EngineOptions> {
  const keys = Object.keys(overrides);
  const perEngine = keys.length > 0 && keys.every((key) => engineIds.includes(key));

  const result = new Map<string, EngineOptions>();
  for (const engineId of engineIds) {
    if (!perEngine) {
      result.set(engineId, overrides);
      continue;
    }
    const options = overrides[engineId];
    if (options === undefined) {
      continue;
    }
    if (!isRecord(options)) {
      throw createInvalidConfigError(`--model-config entry "${engineId}" must be a JSON object.`);
    }
    result.set(engineId, options);
  }
  return result;
}

async function loadEvaluationDataset(context: CommandContext, imagesDir: string): Promise<Dataset> {
  const { evaluation } = context.config;
  const dataset = await loadDataset(imagesDir, {
    annotationPolicy: evaluation.annotationPolicy,
    skipDifficult: evaluation.skipDifficult,
  });

  for (const error of dataset.errors) {
    context.logger.warn(`Skipped manifest line: ${error.message}`);
  }
  context.logger.info(
    `Loaded ${dataset.records.length} ground-truth records from ` +
      `${dataset.labelDirectories.length} label directories (${dataset.skippedLines} lines skipped)`
  );
  return dataset;
}

function runOptions(config: AppConfig) {
  return {
    concurrency: config.evaluation.concurrency,
    timeoutMs: config.evaluation.timeoutMs,
    scoring: { caseSensitive: config.evaluation.caseSensitive },
  };
}

function logRunSummary(logger: Logger, result: EngineRunResult): void {
  const { summary } = result;
  logger.info(`Evaluation finished: ${summary.engineName}`);
  logger.info(
    `Records: ${summary.totalImages}, succeeded: ${summary.succeededImages}, failed: ${summary.failures.length}`
  );
  logger.info(`Overall accuracy: ${formatRatio(summary.overallAccuracy)}`);
  logger.info(`Exact match rate: ${formatRatio(summary.exactMatchRate)}`);
}

export async function runEvaluateCommand(
  context: CommandContext,
  args: EvaluateCommandArgs
): Promise<EngineRunResult> {
  const { config, logger } = context;
  const engineOptions: EngineOptions = {
    ...(config.models[args.engineId] ?? {}),
    ...(args.modelConfig ? parseModelConfig(args.modelConfig) : {}),
  };

  const dataset = await loadEvaluationDataset(context, args.imagesDir);
  const manager = new BenchmarkManager(context.factory, {
    logger: logger.child('benchmark'),
    clock: context.clock,
  });
  const result = await manager.evaluateEngine(args.engineId, dataset, {
    ...runOptions(config),
    engineOptions,
  });
  logRunSummary(logger, result);

  const writer = new ReportWriter(config.output.reportsDir, logger.child('reports'));
  await writer.writeRunReports(result, {
    format: config.output.reportFormat,
    name: args.reportName,
    date: context.clock(),
  });
  return result;
}

export async function runCompareCommand(
  context: CommandContext,
  args: CompareCommandArgs
): Promise<EngineComparison> {
  const { config, logger } = context;
  const engineIds = [...new Set(args.engineIds)];
  if (engineIds.length < 2) {
    throw createInvalidComparisonError('compare needs at least two distinct engines.');
  }

  const overrides = modelConfigPerEngine(
    engineIds,
    args.modelConfig ? parseModelConfig(args.modelConfig) : {}
  );

  const dataset = await loadEvaluationDataset(context, args.imagesDir);
  const manager = new BenchmarkManager(context.factory, {
    logger: logger.child('benchmark'),
    clock: context.clock,
  });
  const outcome = await manager.compareEngines(
    engineIds.map((engineId) => ({
      engineId,
      engineOptions: { ...(config.models[engineId] ?? {}), ...(overrides.get(engineId) ?? {}) },
    })),
    dataset,
    runOptions(config)
  );

  for (const entry of outcome.comparison.rankings) {
    logger.info(
      `#${entry.rank} ${entry.engineName}: ${formatRatio(entry.summary.overallAccuracy)}`
    );
  }
  logger.info(`Best engine: ${outcome.comparison.topEngine}`);

  const writer = new ReportWriter(config.output.reportsDir, logger.child('reports'));
  const date = context.clock();
  for (const run of outcome.runs) {
    await writer.writeRunReports(run, { format: config.output.reportFormat, date });
  }
  await writer.writeComparisonReports(outcome.comparison, {
    name: args.comparisonReport,
    generatedAt: context.clock().toISOString(),
    skippedEngines: outcome.skipped,
  });
  return outcome;
}

export function runConfigShow(context: CommandContext, key?: string): void {
  if (key === undefined) {
    context.print(JSON.stringify(context.config, null, 2));
    return;
  }

  const value = getConfigValue(context.config, key);
  if (value === undefined) {
    throw createInvalidConfigError(`Unknown config key: ${key}`);
  }
  context.print(typeof value === 'string' ? value : JSON.stringify(value, null, 2));
}

function resolveGenerateFormat(args: ConfigGenerateArgs): ConfigFormat {
  if (args.format !== undefined) {
    if (!isConfigFormat(args.format)) {
      throw createInvalidConfigError(
        `--format must be one of ${CONFIG_FORMATS.join(', ')}, got "${args.format}".`
      );
    }
    return args.format;
  }
  return (args.output !== undefined ? configFormatFor(args.output) : null) ?? 'json';
}

/** Writes the defaults to `--output`, or prints them; the format follows `--format`, then the file extension. */
export async function runConfigGenerate(context: CommandContext, args: ConfigGenerateArgs = {}): Promise<void> {
  const content = serializeConfig(DEFAULT_CONFIG, resolveGenerateFormat(args));
  const { output } = args;
  if (output === undefined) {
    context.print(content.trimEnd());
    return;
  }

  try {
    await mkdir(path.dirname(output), { recursive: true });
    await writeFile(output, content, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw createInvalidConfigError(`Cannot write config file ${output}: ${detail}`);
  }
  context.logger.info(`Default configuration written to ${output}`);
}

/** Sets one dotted key in the config file, creating the file when it does not exist yet. */
export async function runConfigSet(context: CommandContext, args: ConfigSetArgs): Promise<void> {
  const { configPath, key } = args;
  if (configPath === undefined) {
    throw createInvalidConfigError(
      `config set needs a config file: pass --config or set ${CONFIG_ENV.CONFIG_PATH}.`
    );
  }
  if (!isSettableConfigKey(key)) {
    throw createInvalidConfigError(`Unknown config key: ${key}`);
  }

  const current = await readConfigDocument(configPath, { allowMissing: true });
  if (!isRecord(current)) {
    throw createInvalidConfigError(`${configPath}: top level must be an object`);
  }
  const value = parseConfigScalar(args.value);
  const updated = setConfigValue(current, key, value);
  parseConfig(updated, configPath);

  const format = configFormatFor(configPath) ?? 'json';
  try {
    await mkdir(path.dirname(configPath), { recursive: true });
    await writeFile(configPath, serializeConfig(updated, format), 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw createInvalidConfigError(`Cannot write config file ${configPath}: ${detail}`);
  }
  context.logger.info(`Set ${key} to ${JSON.stringify(value)} in ${configPath}`);
}
