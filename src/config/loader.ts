import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, ConfigValidationError } from './validator';
import type { Config } from './validator';
import { defaults } from './defaults';

/**
 * DeepPartial allows for recursive partials of the Config type.
 * Used for YAML and CLI overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding config.yaml and .env (default: process.cwd()) */
  cwd?: string;
  /** Environment to read; when omitted `.env` is loaded into process.env first */
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? loadDotenv(cwd);

  // 1. Defaults
  let merged: Record<string, unknown> = deepMerge({}, defaults);

  // 2. config.yaml (if present)
  const yamlPath = path.join(cwd, 'config.yaml');
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isPlainObject(parsedYaml)) {
      merged = deepMerge(merged, parsedYaml);
    } else if (parsedYaml !== null && parsedYaml !== undefined) {
      throw new ConfigValidationError([`${yamlPath}: expected a mapping at the top level`]);
    }
  }

  // 3. Environment variables
  merged = deepMerge(merged, {
    gemini: {
      api_key: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL,
      research_model: env.GEMINI_RESEARCH_MODEL,
    },
    storage: { dir: env.RESEARCH_GRAPH_STORE_DIR },
    logging: { level: env.RESEARCH_GRAPH_LOG_LEVEL },
  });

  // 4. CLI arguments
  merged = deepMerge(merged, cliOverrides);

  // 5. Validate
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}

/** The API key, or a ConfigValidationError naming how to provide it. */
export function requireApiKey(config: Config): string {
  if (!config.gemini.api_key) {
    throw new ConfigValidationError(['gemini.api_key: set GEMINI_API_KEY or add gemini.api_key to config.yaml']);
  }
  return config.gemini.api_key;
}

function loadDotenv(cwd: string): NodeJS.ProcessEnv {
  dotenv.config({ path: path.join(cwd, '.env') });
  return process.env;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge for config objects. Returns a new object; `undefined` in the
 * source never overwrites a value.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue)) {
      result[key] = deepMerge(isPlainObject(targetValue) ? targetValue : {}, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}
