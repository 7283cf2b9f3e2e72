import { parseArgs } from 'node:util';
import {
  applyEnvOverrides,
  CONFIG_ENV,
  DEFAULT_CONFIG,
  isAnnotationPolicy,
  isReportFormat,
  loadAppConfig,
  mergeConfig,
  REPORT_FORMATS,
  type AppConfig,
  type ConfigOverrides,
  type Environment,
} from '@/config/settings';
import { createDefaultEngineFactory, type EngineFactory } from '@/engines/engine-factory';
import {
  runCompareCommand,
  runConfigGenerate,
  runConfigSet,
  runConfigShow,
  runEvaluateCommand,
  type CommandContext,
} from '@/cli/commands';
import {
  createInvalidConfigError,
  EXIT_CODES,
  exitCodeFor,
  logError,
  type ExitCode,
} from '@/utils/error-handling';
import {
  combineSinks,
  consoleSink,
  createFileSink,
  createLogger,
  parseLogLevel,
  type Logger,
  type LogSink,
} from '@/utils/logger';

export const VERSION = '1.0.0';

export const DEFAULT_IMAGES_DIR = 'data/images';

export const USAGE = `Usage: ocr-bench <command> [options]

Commands:
  evaluate <engine>            Evaluate one engine on a labelled image dataset
  compare <engine> <engine>... Evaluate several engines on the same dataset and rank them
  config show [--key a.b]      Print the effective configuration, or one value of it
  config set <key> <value>     Write one value into the config file named by --config
  config generate [--output f] Print or write the default configuration (--format json | yaml)

Options:
  -i, --images-dir <dir>       Dataset root holding label directories (default: ${DEFAULT_IMAGES_DIR})
  -o, --output-dir <dir>       Directory reports are written to
  -c, --config <file>          Configuration file (.json, .yml or .yaml)
      --model-config <json>    Engine options merged over the configured ones; in compare, an
                               object keyed by the compared engines sets options per engine
      --report-format <fmt>    ${REPORT_FORMATS.join(' | ')}
      --report-name <name>     Report file name without extension (evaluate)
      --comparison-report <n>  Comparison report file name (compare, default: model_comparison)
      --concurrency <n>        Images recognized at the same time
      --timeout <ms>           Per-image deadline, 0 disables it
      --annotation-policy <p>  first | all
      --log-level <level>      debug | info | warn | error
      --log-file <file>        Also write the log to this file, rotated at 10 MiB
  -v, --verbose                Same as --log-level debug
  -h, --help                   Show this help
      --version                Show the version`;

const CLI_OPTIONS = {
  'images-dir': { type: 'string', short: 'i' },
  'output-dir': { type: 'string', short: 'o' },
  config: { type: 'string', short: 'c' },
  'model-config': { type: 'string' },
  'report-format': { type: 'string' },
  'report-name': { type: 'string' },
  'comparison-report': { type: 'string' },
  concurrency: { type: 'string' },
  timeout: { type: 'string' },
  'annotation-policy': { type: 'string' },
  'log-level': { type: 'string' },
  'log-file': { type: 'string' },
  verbose: { type: 'boolean', short: 'v' },
  key: { type: 'string' },
  output: { type: 'string' },
  format: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean' },
} as const;

function parseCliArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: CLI_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw createInvalidConfigError(error instanceof Error ? error.message : String(error));
  }
}

export type CliValues = ReturnType<typeof parseCliArgs>['values'];

type CliFlag = keyof typeof CLI_OPTIONS;

const GLOBAL_FLAGS: readonly CliFlag[] = ['config', 'log-level', 'log-file', 'verbose', 'help', 'version'];

const RUN_FLAGS: readonly CliFlag[] = [
  'images-dir',
  'output-dir',
  'model-config',
  'report-format',
  'concurrency',
  'timeout',
  'annotation-policy',
];

const COMMAND_FLAGS = new Map<string, readonly CliFlag[]>([
  ['evaluate', [...RUN_FLAGS, 'report-name']],
  ['compare', [...RUN_FLAGS, 'comparison-report']],
  ['config show', ['key', 'output-dir', 'report-format', 'concurrency', 'timeout', 'annotation-policy']],
  ['config set', []],
  ['config generate', ['output', 'format']],
]);

function commandName(positionals: readonly string[]): string {
  const [command, action] = positionals;
  return command === 'config' && action !== undefined ? `config ${action}` : command;
}

/** Rejects flags the command would otherwise ignore. Unknown commands are left to dispatch. */
export function assertFlagsUsed(command: string, values: CliValues): void {
  const allowed = COMMAND_FLAGS.get(command);
  if (!allowed) {
    return;
  }
  for (const [flag, value] of Object.entries(values)) {
    if (value === undefined) {
      continue;
    }
    const known = (candidate: CliFlag): boolean => candidate === flag;
    if (!GLOBAL_FLAGS.some(known) && !allowed.some(known)) {
      throw createInvalidConfigError(`--${flag} is not used by ${command}.`);
    }
  }
}

function parseInteger(flag: string, value: string, min: number): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < min) {
    throw createInvalidConfigError(`--${flag} must be an integer >= ${min}, got "${value}".`);
  }
  return parsed;
}

/** Flags win over the environment, which wins over the config file. */
export function overridesFromFlags(values: CliValues): ConfigOverrides {
  const overrides: ConfigOverrides = { evaluation: {}, logging: {}, output: {} };

  const logLevel = values.verbose ? 'debug' : values['log-level'];
  if (logLevel !== undefined) {
    const level = parseLogLevel(logLevel);
    if (!level) {
      throw createInvalidConfigError(`Unknown log level "${logLevel}".`);
    }
    overrides.logging = { level };
  }
  if (values['log-file'] !== undefined) {
    overrides.logging = { ...overrides.logging, file: values['log-file'] };
  }

  const reportFormat = values['report-format'];
  if (reportFormat !== undefined) {
    if (!isReportFormat(reportFormat)) {
      throw createInvalidConfigError(
        `--report-format must be one of ${REPORT_FORMATS.join(', ')}, got "${reportFormat}".`
      );
    }
    overrides.output = { ...overrides.output, reportFormat };
  }
  if (values['output-dir'] !== undefined) {
    overrides.output = { ...overrides.output, reportsDir: values['output-dir'] };
  }

  const policy = values['annotation-policy'];
  if (policy !== undefined) {
    if (!isAnnotationPolicy(policy)) {
      throw createInvalidConfigError(`--annotation-policy must be "first" or "all", got "${policy}".`);
    }
    overrides.evaluation = { ...overrides.evaluation, annotationPolicy: policy };
  }
  if (values.concurrency !== undefined) {
    overrides.evaluation = {
      ...overrides.evaluation,
      concurrency: parseInteger('concurrency', values.concurrency, 1),
    };
  }
  if (values.timeout !== undefined) {
    overrides.evaluation = {
      ...overrides.evaluation,
      timeoutMs: parseInteger('timeout', values.timeout, 0),
    };
  }

  return overrides;
}

export interface CliIO {
  env?: Environment;
  sink?: LogSink;
  print?: (text: string) => void;
  factory?: (logger: Logger) => EngineFactory;
  clock?: () => Date;
}

function resolveConfigPath(values: CliValues, env: Environment): string | undefined {
  return values.config ?? env[CONFIG_ENV.CONFIG_PATH];
}

async function dispatch(
  positionals: string[],
  values: CliValues,
  context: CommandContext
): Promise<ExitCode> {
  const [command, ...rest] = positionals;
  const imagesDir = values['images-dir'] ?? DEFAULT_IMAGES_DIR;

  switch (command) {
    case 'evaluate': {
      const [engineId] = rest;
      if (!engineId || rest.length > 1) {
        throw createInvalidConfigError('evaluate takes exactly one engine name.');
      }
      await runEvaluateCommand(context, {
        engineId,
        imagesDir,
        modelConfig: values['model-config'],
        reportName: values['report-name'],
      });
      return EXIT_CODES.SUCCESS;
    }
    case 'compare':
      await runCompareCommand(context, {
        engineIds: rest,
        imagesDir,
        modelConfig: values['model-config'],
        comparisonReport: values['comparison-report'],
      });
      return EXIT_CODES.SUCCESS;
    case 'config': {
      const [action, ...args] = rest;
      if (action === 'show' && args.length === 0) {
        runConfigShow(context, values.key);
        return EXIT_CODES.SUCCESS;
      }
      if (action === 'set') {
        const [key, value] = args;
        if (key === undefined || value === undefined || args.length > 2) {
          throw createInvalidConfigError('config set takes a key and a value.');
        }
        await runConfigSet(context, { configPath: context.configPath, key, value });
        return EXIT_CODES.SUCCESS;
      }
      if (action === 'generate' && args.length === 0) {
        await runConfigGenerate(context, { output: values.output, format: values.format });
        return EXIT_CODES.SUCCESS;
      }
      throw createInvalidConfigError(
        `Unknown config action "${[action, ...args].join(' ')}". Use show, set or generate.`
      );
    }
    default:
      throw createInvalidConfigError(`Unknown command "${command}".`);
  }
}

function createSink(config: AppConfig, io: CliIO, logger: Logger): LogSink {
  const base = io.sink ?? consoleSink;
  const file = config.logging.file;
  if (file === null) {
    return base;
  }
  try {
    return combineSinks(base, createFileSink(file, { clock: io.clock }));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    logger.warn(`Cannot open log file ${file}: ${detail}`);
    return base;
  }
}

export async function main(argv: readonly string[], io: CliIO = {}): Promise<ExitCode> {
  const print = io.print ?? ((text: string) => console.log(text));
  const env = io.env ?? process.env;
  let logger = createLogger('ocr-bench', { sink: io.sink });

  try {
    const { values, positionals } = parseCliArgs(argv);
    if (values.help) {
      print(USAGE);
      return EXIT_CODES.SUCCESS;
    }
    if (values.version) {
      print(VERSION);
      return EXIT_CODES.SUCCESS;
    }
    if (positionals.length === 0) {
      print(USAGE);
      return EXIT_CODES.CONFIG_ERROR;
    }

    const command = commandName(positionals);
    assertFlagsUsed(command, values);

    const configPath = resolveConfigPath(values, env);
    // `config set` may create the file, so it is not read up front.
    const base =
      command === 'config set'
        ? applyEnvOverrides(DEFAULT_CONFIG, env)
        : await loadAppConfig({ configPath, env });
    const config: AppConfig = mergeConfig(base, overridesFromFlags(values));
    logger = createLogger('ocr-bench', { level: config.logging.level, sink: io.sink });
    logger = createLogger('ocr-bench', { level: config.logging.level, sink: createSink(config, io, logger) });

    const factory = io.factory ? io.factory(logger) : createDefaultEngineFactory(logger);
    return await dispatch(positionals, values, {
      config,
      configPath,
      logger,
      factory,
      print,
      clock: io.clock ?? (() => new Date()),
    });
  } catch (error) {
    logError(logger, error);
    return exitCodeFor(error);
  }
}
