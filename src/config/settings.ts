import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { AnnotationPolicy } from '@/dataset/manifest-parser';
import type { EngineOptions } from '@/engines/engine-factory';
import { DEFAULT_TIMEOUT_MS } from '@/engines/recognizer';
import { DEFAULT_CONCURRENCY } from '@/evaluation/evaluation-runner';
import {
  DEFAULT_VL_BASE_URL,
  DEFAULT_VL_MAX_TOKENS,
  DEFAULT_VL_MODEL,
  DEFAULT_VL_TEMPERATURE,
} from '@/engines/vision-language-engine';
import { createInvalidConfigError } from '@/utils/error-handling';
import { parseLogLevel, type LogLevel } from '@/utils/logger';

export const REPORT_FORMATS = ['markdown', 'json', 'csv', 'all'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const CONFIG_FORMATS = ['json', 'yaml'] as const;

export type ConfigFormat = (typeof CONFIG_FORMATS)[number];

export const CONFIG_ENV = {
  CONFIG_PATH: 'OCR_EVALUATION_CONFIG',
  LOG_LEVEL: 'OCR_EVALUATION_LOG_LEVEL',
  LOG_FILE: 'OCR_EVALUATION_LOG_FILE',
  OUTPUT_DIR: 'OCR_EVALUATION_OUTPUT_DIR',
  LMSTUDIO_URL: 'LMSTUDIO_URL',
} as const;

export type Environment = Readonly<Record<string, string | undefined>>;

export interface EvaluationSettings {
  caseSensitive: boolean;
  annotationPolicy: AnnotationPolicy;
  skipDifficult: boolean;
  concurrency: number;
  timeoutMs: number;
}

export interface AppConfig {
  /** Engine id to the option mapping handed to that engine. */
  models: Record<string, EngineOptions>;
  evaluation: EvaluationSettings;
  /** `file` adds a rotating log file next to the console output. */
  logging: { level: LogLevel; file: string | null };
  output: { reportsDir: string; reportFormat: ReportFormat };
}

export interface ConfigOverrides {
  models?: Record<string, EngineOptions>;
  evaluation?: Partial<EvaluationSettings>;
  logging?: Partial<AppConfig['logging']>;
  output?: Partial<AppConfig['output']>;
}

export const DEFAULT_CONFIG: AppConfig = {
  models: {
    tesseract: {
      lang: 'eng',
      single_line: true,
      min_confidence: 0,
    },
    'qwen-vl': {
      model_name: DEFAULT_VL_MODEL,
      base_url: DEFAULT_VL_BASE_URL,
      temperature: DEFAULT_VL_TEMPERATURE,
      max_tokens: DEFAULT_VL_MAX_TOKENS,
      clean_response: true,
    },
  },
  evaluation: {
    caseSensitive: true,
    annotationPolicy: 'first',
    skipDifficult: false,
    concurrency: DEFAULT_CONCURRENCY,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  logging: { level: 'info', file: null },
  output: { reportsDir: 'data/reports', reportFormat: 'all' },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function isConfigFormat(value: string): value is ConfigFormat {
  return CONFIG_FORMATS.some((format) => format === value);
}

/** `.json`, `.yml` and `.yaml` files are config files; anything else is not. */
export function configFormatFor(filePath: string): ConfigFormat | null {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.yml' || extension === '.yaml') return 'yaml';
  return null;
}

export function isAnnotationPolicy(value: string): value is AnnotationPolicy {
  return value === 'first' || value === 'all';
}

function fail(source: string, message: string): never {
  throw createInvalidConfigError(`${source}: ${message}`);
}

function section(value: Record<string, unknown>, key: string, source: string): Record<string, unknown> | undefined {
  const entry = value[key];
  if (entry === undefined) {
    return undefined;
  }
  if (!isRecord(entry)) {
    fail(source, `"${key}" must be an object`);
  }
  return entry;
}

function optionalBoolean(value: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const entry = value[key];
  if (entry === undefined || typeof entry === 'boolean') {
    return entry;
  }
  return fail(source, `"${key}" must be a boolean`);
}

function optionalString(value: Record<string, unknown>, key: string, source: string): string | undefined {
  const entry = value[key];
  if (entry === undefined || typeof entry === 'string') {
    return entry;
  }
  return fail(source, `"${key}" must be a string`);
}

function optionalNullableString(
  value: Record<string, unknown>,
  key: string,
  source: string
): string | null | undefined {
  const entry = value[key];
  if (entry === undefined || entry === null || typeof entry === 'string') {
    return entry;
  }
  return fail(source, `"${key}" must be a string or null`);
}

function optionalInteger(
  value: Record<string, unknown>,
  key: string,
  min: number,
  source: string
): number | undefined {
  const entry = value[key];
  if (entry === undefined) {
    return undefined;
  }
  if (typeof entry !== 'number' || !Number.isInteger(entry) || entry < min) {
    fail(source, `"${key}" must be an integer >= ${min}`);
  }
  return entry;
}

/** Validates an untyped config document (parsed JSON) into overrides of the defaults. */
export function parseConfig(value: unknown, source: string = 'config'): ConfigOverrides {
  if (!isRecord(value)) {
    fail(source, 'top level must be an object');
  }

  const overrides: ConfigOverrides = {};

  const models = section(value, 'models', source);
  if (models) {
    const engines: Record<string, EngineOptions> = {};
    for (const [engineId, options] of Object.entries(models)) {
      if (!isRecord(options)) {
        fail(source, `options for model "${engineId}" must be an object`);
      }
      engines[engineId] = { ...options };
    }
    overrides.models = engines;
  }

  const evaluation = section(value, 'evaluation', source);
  if (evaluation) {
    const annotationPolicy = optionalString(evaluation, 'annotationPolicy', source);
    if (annotationPolicy !== undefined && !isAnnotationPolicy(annotationPolicy)) {
      fail(source, `"annotationPolicy" must be "first" or "all", got "${annotationPolicy}"`);
    }
    overrides.evaluation = {
      caseSensitive: optionalBoolean(evaluation, 'caseSensitive', source),
      annotationPolicy,
      skipDifficult: optionalBoolean(evaluation, 'skipDifficult', source),
      concurrency: optionalInteger(evaluation, 'concurrency', 1, source),
      timeoutMs: optionalInteger(evaluation, 'timeoutMs', 0, source),
    };
  }

  const logging = section(value, 'logging', source);
  if (logging) {
    const level = optionalString(logging, 'level', source);
    const file = optionalNullableString(logging, 'file', source);
    overrides.logging = {};
    if (level !== undefined) {
      const parsed = parseLogLevel(level);
      if (!parsed) {
        fail(source, `unknown log level "${level}"`);
      }
      overrides.logging.level = parsed;
    }
    if (file !== undefined) {
      overrides.logging.file = file;
    }
  }

  const output = section(value, 'output', source);
  if (output) {
    const reportFormat = optionalString(output, 'reportFormat', source);
    if (reportFormat !== undefined && !isReportFormat(reportFormat)) {
      fail(source, `"reportFormat" must be one of ${REPORT_FORMATS.join(', ')}`);
    }
    overrides.output = {
      reportsDir: optionalString(output, 'reportsDir', source),
      reportFormat,
    };
  }

  return overrides;
}

/** Deep-merges overrides into a config; options of the same engine are merged key by key. */
export function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  const models: Record<string, EngineOptions> = {};
  for (const [engineId, options] of Object.entries(base.models)) {
    models[engineId] = { ...options };
  }
  for (const [engineId, options] of Object.entries(overrides.models ?? {})) {
    models[engineId] = { ...(models[engineId] ?? {}), ...options };
  }

  const evaluation = overrides.evaluation ?? {};
  const output = overrides.output ?? {};
  return {
    models,
    evaluation: {
      caseSensitive: evaluation.caseSensitive ?? base.evaluation.caseSensitive,
      annotationPolicy: evaluation.annotationPolicy ?? base.evaluation.annotationPolicy,
      skipDifficult: evaluation.skipDifficult ?? base.evaluation.skipDifficult,
      concurrency: evaluation.concurrency ?? base.evaluation.concurrency,
      timeoutMs: evaluation.timeoutMs ?? base.evaluation.timeoutMs,
    },
    logging: {
      level: overrides.logging?.level ?? base.logging.level,
      file: overrides.logging?.file !== undefined ? overrides.logging.file : base.logging.file,
    },
    output: {
      reportsDir: output.reportsDir ?? base.output.reportsDir,
      reportFormat: output.reportFormat ?? base.output.reportFormat,
    },
  };
}

/** Parses config file text in the given format; an empty YAML document is an empty config. */
export function parseConfigText(text: string, format: ConfigFormat, source: string): unknown {
  try {
    return format === 'yaml' ? (parseYaml(text) ?? {}) : JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw createInvalidConfigError(
      `Config file ${source} is not valid ${format === 'yaml' ? 'YAML' : 'JSON'}: ${detail}`
    );
  }
}

export function serializeConfig(value: unknown, format: ConfigFormat): string {
  return format === 'yaml' ? stringifyYaml(value, { indent: 2 }) : `${JSON.stringify(value, null, 2)}\n`;
}

function requireConfigFormat(configPath: string): ConfigFormat {
  const format = configFormatFor(configPath);
  if (!format) {
    throw createInvalidConfigError(
      `Unsupported config file ${configPath}: use a .json, .yml or .yaml file.`
    );
  }
  return format;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the raw document of a config file without validating it. With `allowMissing`, a file
 * that does not exist yet reads as an empty document.
 */
export async function readConfigDocument(
  configPath: string,
  options: { allowMissing?: boolean } = {}
): Promise<unknown> {
  const format = requireConfigFormat(configPath);

  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (error) {
    if (options.allowMissing && isMissingFile(error)) {
      return {};
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw createInvalidConfigError(`Cannot read config file ${configPath}: ${detail}`);
  }

  return parseConfigText(text, format, configPath);
}

export async function loadConfigFile(configPath: string): Promise<ConfigOverrides> {
  return parseConfig(await readConfigDocument(configPath), configPath);
}

export function applyEnvOverrides(config: AppConfig, env: Environment): AppConfig {
  const overrides: ConfigOverrides = {};

  const level = env[CONFIG_ENV.LOG_LEVEL];
  if (level) {
    const parsed = parseLogLevel(level);
    if (!parsed) {
      throw createInvalidConfigError(`${CONFIG_ENV.LOG_LEVEL}: unknown log level "${level}"`);
    }
    overrides.logging = { level: parsed };
  }

  const logFile = env[CONFIG_ENV.LOG_FILE];
  if (logFile) {
    overrides.logging = { ...overrides.logging, file: logFile };
  }

  const outputDir = env[CONFIG_ENV.OUTPUT_DIR];
  if (outputDir) {
    overrides.output = { reportsDir: outputDir };
  }

  const lmStudioUrl = env[CONFIG_ENV.LMSTUDIO_URL];
  if (lmStudioUrl) {
    overrides.models = { 'qwen-vl': { base_url: lmStudioUrl } };
  }

  return mergeConfig(config, overrides);
}

/** Defaults, then the config file (from `configPath` or the environment), then the environment. */
export async function loadAppConfig(
  options: { configPath?: string; env?: Environment } = {}
): Promise<AppConfig> {
  const env = options.env ?? {};
  const configPath = options.configPath ?? env[CONFIG_ENV.CONFIG_PATH];
  const fromFile = configPath ? await loadConfigFile(configPath) : {};
  return applyEnvOverrides(mergeConfig(DEFAULT_CONFIG, fromFile), env);
}

/** Looks up a dotted key such as `evaluation.concurrency`; `undefined` when any segment is missing. */
export function getConfigValue(config: AppConfig, key: string): unknown {
  let current: unknown = config;
  for (const segment of key.split('.')) {
    if (!isRecord(current) || !(segment in current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/** `models.<engine>.<option>`, or a leaf of the fixed sections such as `evaluation.concurrency`. */
export function isSettableConfigKey(key: string): boolean {
  const segments = key.split('.');
  if (segments.some((segment) => segment === '')) {
    return false;
  }
  if (segments[0] === 'models') {
    return segments.length === 3;
  }
  const current = getConfigValue(DEFAULT_CONFIG, key);
  return current !== undefined && !isRecord(current);
}

/** Reads a command-line value as a boolean, integer or decimal where it looks like one. */
export function parseConfigScalar(raw: string): string | number | boolean | null {
  const trimmed = raw.trim();
  const lower = trimmed.toLowerCase();
  if (lower === 'true' || lower === 'false') return lower === 'true';
  if (lower === 'null') return null;
  if (/^-?\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);
  if (/^-?\d+\.\d+$/.test(trimmed)) return Number.parseFloat(trimmed);
  return raw;
}

/** Returns a copy of a raw config document with the dotted key set, creating sections as needed. */
export function setConfigValue(
  document: Record<string, unknown>,
  key: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = key.split('.');
  if (rest.length === 0) {
    return { ...document, [head]: value };
  }

  const child = document[head];
  const nested: Record<string, unknown> | null = child === undefined ? {} : isRecord(child) ? child : null;
  if (!nested) {
    throw createInvalidConfigError(`Cannot set ${key}: "${head}" is not a section.`);
  }
  return { ...document, [head]: setConfigValue(nested, rest.join('.'), value) };
}
