import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  applyEnvOverrides,
  CONFIG_ENV,
  DEFAULT_CONFIG,
  getConfigValue,
  isSettableConfigKey,
  loadAppConfig,
  loadConfigFile,
  mergeConfig,
  parseConfig,
  parseConfigScalar,
  setConfigValue,
} from '../src/config/settings';
import { EvaluationError, EvaluationErrorCode } from '../src/types/evaluation-errors';

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'settings-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function configFile(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, content, 'utf8');
  return file;
}

describe('parseConfig', () => {
  it('reads every section of a config document', () => {
    const overrides = parseConfig({
      models: { tesseract: { lang: 'deu' } },
      evaluation: { caseSensitive: false, annotationPolicy: 'all', concurrency: 4, timeoutMs: 0 },
      logging: { level: 'WARNING' },
      output: { reportsDir: 'out', reportFormat: 'csv' },
    });

    expect(overrides).toEqual({
      models: { tesseract: { lang: 'deu' } },
      evaluation: {
        caseSensitive: false,
        annotationPolicy: 'all',
        skipDifficult: undefined,
        concurrency: 4,
        timeoutMs: 0,
      },
      logging: { level: 'warn' },
      output: { reportsDir: 'out', reportFormat: 'csv' },
    });
  });

  it('names the source and the field it rejects', () => {
    const cases: [unknown, string][] = [
      [[], 'custom.json: top level must be an object'],
      [{ models: 'tesseract' }, 'custom.json: "models" must be an object'],
      [{ models: { tesseract: 1 } }, 'custom.json: options for model "tesseract" must be an object'],
      [{ evaluation: { concurrency: 0 } }, 'custom.json: "concurrency" must be an integer >= 1'],
      [{ evaluation: { timeoutMs: 1.5 } }, 'custom.json: "timeoutMs" must be an integer >= 0'],
      [{ evaluation: { caseSensitive: 'no' } }, 'custom.json: "caseSensitive" must be a boolean'],
      [
        { evaluation: { annotationPolicy: 'last' } },
        'custom.json: "annotationPolicy" must be "first" or "all", got "last"',
      ],
      [{ logging: { level: 'loud' } }, 'custom.json: unknown log level "loud"'],
      [{ logging: { file: 3 } }, 'custom.json: "file" must be a string or null'],
      [{ output: { reportFormat: 'pdf' } }, 'custom.json: "reportFormat" must be one of markdown, json, csv, all'],
    ];

    for (const [document, message] of cases) {
      expect(() => parseConfig(document, 'custom.json')).toThrow(message);
    }
  });
});

describe('mergeConfig', () => {
  it('merges engine options key by key and keeps unset fields', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, {
      models: { tesseract: { lang: 'fra' }, custom: { endpoint: 'x' } },
      evaluation: { concurrency: 8 },
    });

    expect(merged.models.tesseract).toEqual({ lang: 'fra', single_line: true, min_confidence: 0 });
    expect(merged.models.custom).toEqual({ endpoint: 'x' });
    expect(merged.evaluation).toEqual({ ...DEFAULT_CONFIG.evaluation, concurrency: 8 });
    expect(merged.output).toEqual(DEFAULT_CONFIG.output);
    expect(DEFAULT_CONFIG.models.tesseract.lang).toBe('eng');
  });

  it('lets an explicit null switch the log file off', () => {
    const withFile = mergeConfig(DEFAULT_CONFIG, { logging: { file: 'logs/bench.log' } });

    expect(withFile.logging).toEqual({ level: 'info', file: 'logs/bench.log' });
    expect(mergeConfig(withFile, { logging: { level: 'debug' } }).logging.file).toBe('logs/bench.log');
    expect(mergeConfig(withFile, { logging: { file: null } }).logging.file).toBeNull();
  });
});

describe('applyEnvOverrides', () => {
  it('applies the log level, output directory and server URL from the environment', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      [CONFIG_ENV.LOG_LEVEL]: 'debug',
      [CONFIG_ENV.OUTPUT_DIR]: '/tmp/reports',
      [CONFIG_ENV.LMSTUDIO_URL]: 'ws://gpu-box:1234',
    });

    expect(config.logging.level).toBe('debug');
    expect(config.output.reportsDir).toBe('/tmp/reports');
    expect(config.models['qwen-vl']).toMatchObject({ base_url: 'ws://gpu-box:1234', max_tokens: 50 });
  });

  it('reads the log file from the environment', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, { [CONFIG_ENV.LOG_FILE]: '/tmp/bench.log' });

    expect(config.logging).toEqual({ level: 'info', file: '/tmp/bench.log' });
  });

  it('rejects an unknown log level', () => {
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { [CONFIG_ENV.LOG_LEVEL]: 'chatty' })).toThrow(
      'OCR_EVALUATION_LOG_LEVEL: unknown log level "chatty"'
    );
  });
});

describe('loadAppConfig', () => {
  it('returns the defaults without a file or environment', async () => {
    expect(await loadAppConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('layers the file named by the environment under the environment overrides', async () => {
    const file = await configFile(
      'layered.json',
      JSON.stringify({ logging: { level: 'error' }, output: { reportsDir: 'from-file', reportFormat: 'json' } })
    );

    const config = await loadAppConfig({
      env: { [CONFIG_ENV.CONFIG_PATH]: file, [CONFIG_ENV.OUTPUT_DIR]: 'from-env' },
    });

    expect(config.logging.level).toBe('error');
    expect(config.output).toEqual({ reportsDir: 'from-env', reportFormat: 'json' });
  });

  it('reports unreadable and malformed files as configuration errors', async () => {
    const broken = await configFile('broken.json', '{ "logging": ');

    await expect(loadConfigFile(path.join(dir, 'missing.json'))).rejects.toThrow(
      `Cannot read config file ${path.join(dir, 'missing.json')}`
    );
    const error = await loadConfigFile(broken).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(EvaluationError);
    expect(error instanceof EvaluationError && error.code).toBe(EvaluationErrorCode.INVALID_CONFIG);
    expect(error instanceof Error && error.message.startsWith(`Config file ${broken} is not valid JSON:`)).toBe(true);
  });
});

describe('YAML config files', () => {
  it('loads .yml and .yaml files', async () => {
    const yml = await configFile('bench.yml', 'evaluation:\n  concurrency: 3\nlogging:\n  file: logs/bench.log\n');
    const yaml = await configFile('bench.yaml', 'models:\n  tesseract:\n    lang: deu\n');

    const fromYml = await loadAppConfig({ configPath: yml });
    expect(fromYml.evaluation.concurrency).toBe(3);
    expect(fromYml.logging).toEqual({ level: 'info', file: 'logs/bench.log' });

    const fromYaml = await loadAppConfig({ configPath: yaml });
    expect(fromYaml.models.tesseract).toEqual({ lang: 'deu', single_line: true, min_confidence: 0 });
  });

  it('treats an empty YAML file as an empty config', async () => {
    const empty = await configFile('empty.yaml', '');

    expect(await loadAppConfig({ configPath: empty })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects malformed YAML and unknown file types', async () => {
    const broken = await configFile('broken.yaml', 'logging: [unclosed\n');
    const toml = await configFile('bench.toml', 'level = "info"\n');

    const error = await loadConfigFile(broken).catch((caught: unknown) => caught);
    expect(error instanceof EvaluationError && error.message.startsWith(`Config file ${broken} is not valid YAML:`)).toBe(
      true
    );
    await expect(loadConfigFile(toml)).rejects.toThrow(
      `Unsupported config file ${toml}: use a .json, .yml or .yaml file.`
    );
  });
});

describe('config set helpers', () => {
  it('parses command-line values into config scalars', () => {
    expect(parseConfigScalar('8')).toBe(8);
    expect(parseConfigScalar('-3')).toBe(-3);
    expect(parseConfigScalar('0.5')).toBe(0.5);
    expect(parseConfigScalar('TRUE')).toBe(true);
    expect(parseConfigScalar('false')).toBe(false);
    expect(parseConfigScalar('null')).toBeNull();
    expect(parseConfigScalar('1.2.3')).toBe('1.2.3');
    expect(parseConfigScalar('deu')).toBe('deu');
  });

  it('accepts leaves of the fixed sections and engine options', () => {
    expect(isSettableConfigKey('evaluation.concurrency')).toBe(true);
    expect(isSettableConfigKey('logging.file')).toBe(true);
    expect(isSettableConfigKey('models.tesseract.lang')).toBe(true);
    expect(isSettableConfigKey('models.tesseract')).toBe(false);
    expect(isSettableConfigKey('evaluation')).toBe(false);
    expect(isSettableConfigKey('evaluation.missing')).toBe(false);
    expect(isSettableConfigKey('output..reportsDir')).toBe(false);
  });

  it('sets a dotted key without touching the input document', () => {
    const document = { evaluation: { concurrency: 2 } };

    expect(setConfigValue(document, 'evaluation.timeoutMs', 0)).toEqual({
      evaluation: { concurrency: 2, timeoutMs: 0 },
    });
    expect(setConfigValue(document, 'models.tesseract.lang', 'deu')).toEqual({
      evaluation: { concurrency: 2 },
      models: { tesseract: { lang: 'deu' } },
    });
    expect(document).toEqual({ evaluation: { concurrency: 2 } });
    expect(() => setConfigValue({ logging: 'loud' }, 'logging.level', 'info')).toThrow(
      'Cannot set logging.level: "logging" is not a section.'
    );
  });
});

describe('getConfigValue', () => {
  it('looks up dotted keys', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'evaluation.concurrency')).toBe(2);
    expect(getConfigValue(DEFAULT_CONFIG, 'models.qwen-vl.max_tokens')).toBe(50);
    expect(getConfigValue(DEFAULT_CONFIG, 'output')).toEqual({ reportsDir: 'data/reports', reportFormat: 'all' });
  });

  it('returns undefined for unknown keys', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'evaluation.missing')).toBeUndefined();
    expect(getConfigValue(DEFAULT_CONFIG, 'logging.level.deeper')).toBeUndefined();
  });
});
