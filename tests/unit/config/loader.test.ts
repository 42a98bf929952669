import fs from 'fs';
import os from 'os';
import path from 'path';
import { deepMerge, loadConfig, requireApiKey } from '../../../src/config/loader';
import { ConfigValidationError } from '../../../src/config/validator';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'research-graph-config-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function writeYaml(content: string): void {
    fs.writeFileSync(path.join(cwd, 'config.yaml'), content);
  }

  it('should fall back to defaults', () => {
    const config = loadConfig({}, { cwd, env: {} });

    expect(config.gemini.model).toBe('gemini-2.0-flash');
    expect(config.gemini.research_model).toBe('gemini-2.5-flash');
    expect(config.gemini.api_key).toBeUndefined();
    expect(config.storage).toEqual({ driver: 'file', dir: '.research-graph/threads' });
    expect(config.logging.level).toBe('info');
    expect(config.engine.max_steps).toBe(50);
  });

  it('should layer yaml, environment and cli overrides in that order', () => {
    writeYaml(['gemini:', '  model: yaml-model', '  max_retries: 4', 'storage:', '  dir: yaml-dir', 'logging:', '  level: warn'].join('\n'));

    const config = loadConfig(
      { logging: { level: 'debug' } },
      { cwd, env: { GEMINI_API_KEY: 'test-key', GEMINI_MODEL: 'env-model', RESEARCH_GRAPH_STORE_DIR: 'env-dir' } },
    );

    expect(config.gemini.api_key).toBe('test-key');
    expect(config.gemini.model).toBe('env-model');
    expect(config.gemini.max_retries).toBe(4);
    expect(config.gemini.research_model).toBe('gemini-2.5-flash');
    expect(config.storage.dir).toBe('env-dir');
    expect(config.logging.level).toBe('debug');
  });

  it('should switch to the memory store from yaml', () => {
    writeYaml('storage:\n  driver: memory\n');

    expect(loadConfig({}, { cwd, env: {} }).storage.driver).toBe('memory');
  });

  it('should accept an empty yaml file', () => {
    writeYaml('');

    expect(loadConfig({}, { cwd, env: {} }).engine.max_steps).toBe(50);
  });

  it('should reject yaml that is not a mapping', () => {
    writeYaml('- just\n- a list\n');

    expect(() => loadConfig({}, { cwd, env: {} })).toThrow(ConfigValidationError);
  });

  it('should list every invalid field', () => {
    writeYaml('engine:\n  max_steps: 0\nlogging:\n  level: loud\n');

    try {
      loadConfig({}, { cwd, env: {} });
      throw new Error('expected loadConfig to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (!(err instanceof ConfigValidationError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^logging\.level: /);
      expect(err.issues[1]).toMatch(/^engine\.max_steps: /);
      expect(err.message.startsWith('Configuration validation failed:\n  - logging.level: ')).toBe(true);
    }
  });
});

describe('requireApiKey', () => {
  it('should return the configured key', () => {
    const config = loadConfig({ gemini: { api_key: 'test-key' } }, { cwd: path.join(os.tmpdir(), 'research-graph-missing'), env: {} });
    expect(requireApiKey(config)).toBe('test-key');
  });

  it('should explain how to provide a missing key', () => {
    const config = loadConfig({}, { cwd: path.join(os.tmpdir(), 'research-graph-missing'), env: {} });
    expect(() => requireApiKey(config)).toThrow('gemini.api_key: set GEMINI_API_KEY or add gemini.api_key to config.yaml');
  });
});

describe('deepMerge', () => {
  it('should merge nested objects without touching the inputs', () => {
    const target = { a: { b: 1, c: 2 }, list: [1, 2] };
    const result = deepMerge(target, { a: { c: 3 }, list: [9], skipped: undefined });

    expect(result).toEqual({ a: { b: 1, c: 3 }, list: [9] });
    expect(target).toEqual({ a: { b: 1, c: 2 }, list: [1, 2] });
  });
});
