import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import {
  DEFAULT_SIMILARITY_MODEL,
  loadRunConfigFile,
  mergeRunOptions,
  parseRunOptions,
  readCbConfig,
} from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { createLogger, formatMeta, getLogLevel, setLogLevel } from '../src/logger.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'config-test-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ============ Run options ============

describe('parseRunOptions', () => {
  it('fills in defaults', () => {
    expect(parseRunOptions({})).toEqual({
      task: 'text',
      chatTemplate: false,
      skipQuestion: false,
      similarityModelId: DEFAULT_SIMILARITY_MODEL,
      datasetField: 'text',
      verbose: false,
      device: 'CPU',
      language: 'en',
      backend: 'native',
      numInferenceSteps: 4,
      seed: 42,
      maxNewTokens: 128,
      topK: 5,
      maxAttempts: 5,
    });
  });

  it('reports every invalid field', () => {
    expect(() => parseRunOptions({ task: 'audio', numSamples: 0 })).toThrow(ConfigurationError);
    expect(() => parseRunOptions({ numSamples: 0 })).toThrow(
      'Invalid run options: numSamples: Number must be greater than 0',
    );
  });
});

describe('loadRunConfigFile', () => {
  it('reads YAML options', () => {
    const path = join(dir, 'run.yaml');
    writeFileSync(path, 'task: text-to-image\nbaseModel: base\nnumSamples: 4\n');
    expect(loadRunConfigFile(path)).toEqual({
      task: 'text-to-image',
      baseModel: 'base',
      numSamples: 4,
    });
  });

  it('reads JSON options', () => {
    const path = join(dir, 'run.json');
    writeFileSync(path, JSON.stringify({ verbose: true, topK: 2 }));
    expect(loadRunConfigFile(path)).toEqual({ verbose: true, topK: 2 });
  });

  it('treats an empty file as no options', () => {
    const path = join(dir, 'run.yml');
    writeFileSync(path, '');
    expect(loadRunConfigFile(path)).toEqual({});
  });

  it('rejects unknown keys, missing files and other formats', () => {
    const path = join(dir, 'run.json');
    writeFileSync(path, JSON.stringify({ baseModle: 'typo' }));
    expect(() => loadRunConfigFile(path)).toThrow(`Invalid run configuration ${path}`);
    expect(() => loadRunConfigFile(join(dir, 'absent.yaml'))).toThrow(
      `Run configuration file not found: ${join(dir, 'absent.yaml')}`,
    );
    expect(() => loadRunConfigFile(join(dir, 'run.toml'))).toThrow(
      "Unsupported run configuration format '.toml'",
    );
  });

  it('rejects unparseable files', () => {
    const path = join(dir, 'run.json');
    writeFileSync(path, '{ not json');
    expect(() => loadRunConfigFile(path)).toThrow(`Could not parse run configuration ${path}`);
  });
});

describe('mergeRunOptions', () => {
  it('lets given flags override file options', () => {
    const merged = mergeRunOptions(
      { baseModel: 'from-file', numSamples: 8, verbose: true },
      { baseModel: 'from-flag', numSamples: undefined, verbose: undefined },
    );
    expect(merged.baseModel).toBe('from-flag');
    expect(merged.numSamples).toBe(8);
    expect(merged.verbose).toBe(true);
  });

  it('validates the merged result', () => {
    expect(() => mergeRunOptions({}, { topK: -1 })).toThrow(ConfigurationError);
  });
});

// ============ Continuous-batching configuration ============

describe('readCbConfig', () => {
  let error: MockInstance;

  beforeEach(() => {
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('returns the parsed object', () => {
    const path = join(dir, 'cb.json');
    const config = { max_num_batched_tokens: 256, enable_prefix_caching: true };
    writeFileSync(path, JSON.stringify(config));
    expect(readCbConfig(path)).toEqual(config);
    expect(error).not.toHaveBeenCalled();
  });

  it('logs and returns an empty configuration for a missing file', () => {
    const path = join(dir, 'absent.json');
    expect(readCbConfig(path)).toEqual({});
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining(`Configuration file not found at: ${path}`),
    );
  });

  it('logs and returns an empty configuration for malformed JSON', () => {
    const path = join(dir, 'cb.json');
    writeFileSync(path, '{ "a": ');
    expect(readCbConfig(path)).toEqual({});
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining(`Invalid JSON format in configuration file: ${path}`),
    );
  });

  it('rejects JSON that is not an object', () => {
    const path = join(dir, 'cb.json');
    writeFileSync(path, '[1, 2]');
    expect(readCbConfig(path)).toEqual({});
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining(`Configuration file does not hold a JSON object: ${path}`),
    );
  });
});

// ============ Logger ============

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('routes levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('test');

    logger.info('loaded', { count: 3 });
    logger.warn('slow');
    expect(log).toHaveBeenCalledWith(expect.stringContaining('loaded count=3'));
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('slow'));
  });

  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('warn');
    expect(getLogLevel()).toBe('warn');
    createLogger('test').info('hidden');
    expect(log).not.toHaveBeenCalled();
  });

  it('formats metadata as key=value pairs', () => {
    expect(formatMeta({ attempt: 2, delay: '2s', nested: { a: 1 } })).toBe(
      ' attempt=2 delay=2s nested={"a":1}',
    );
    expect(formatMeta()).toBe('');
  });
});
