/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config file (~/.helpdesk/config.toml or $HELPDESK_CONFIG)
 * 2. Load and validate it against the partial schema
 * 3. Merge with defaults (user values override defaults)
 * 4. Apply HELPDESK_* environment overrides
 * 5. Validate the result against the full schema
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { loadEnv, type EnvVars } from './env.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Config file to read (defaults to getConfigPath()) */
  configPath?: string;
  /** Write the commented template when the file doesn't exist */
  createIfMissing?: boolean;
  /** Skip HELPDESK_* overrides (used by `config set` to validate the file alone) */
  ignoreEnv?: boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source values overriding target.
 * Undefined source values leave the target untouched.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function isTomlTable(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return isPlainObject(value) && !(value instanceof Date);
}

function readTomlFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Parse a string into the type config values use.
 * Handles booleans, numbers, and strings.
 */
export function parseValue(value: string): boolean | number | string {
  const lower = value.trim().toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

function parseBooleanOverride(name: string, value: string): boolean {
  const lower = value.toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(lower)) return true;
  if (['false', '0', 'no', 'off'].includes(lower)) return false;
  throw new ConfigError(`${name} must be a boolean (true/false), got "${value}"`);
}

function parseNumberOverride(name: string, value: string): number {
  const num = Number(value);
  if (Number.isNaN(num)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return num;
}

/**
 * Build a sparse config object from HELPDESK_* (and PORT/HOST/LOG_LEVEL)
 * environment variables. Enum values pass through as strings and are
 * checked by the full schema afterwards.
 */
export function envOverrides(env: EnvVars): PlainObject {
  const bool = (name: keyof EnvVars): boolean | undefined => {
    const value = env[name];
    return value === undefined ? undefined : parseBooleanOverride(name, value);
  };
  const num = (name: keyof EnvVars): number | undefined => {
    const value = env[name];
    return value === undefined ? undefined : parseNumberOverride(name, value);
  };

  return {
    llm: { provider: env.HELPDESK_LLM_PROVIDER, model: env.HELPDESK_LLM_MODEL },
    embedding: { provider: env.HELPDESK_EMBEDDING_PROVIDER, model: env.HELPDESK_EMBEDDING_MODEL },
    vector_store: { backend: env.HELPDESK_VECTOR_STORE, persist_dir: env.HELPDESK_PERSIST_DIR },
    knowledge_base: { path: env.HELPDESK_KNOWLEDGE_BASE },
    search: { rerank: bool('HELPDESK_RERANK'), top_k: num('HELPDESK_TOP_K') },
    rag: {
      hyde: bool('HELPDESK_HYDE'),
      rag_fusion: bool('HELPDESK_RAG_FUSION'),
      k_queries: num('HELPDESK_K_QUERIES'),
      rrf_k: num('HELPDESK_RRF_K'),
    },
    server: { host: env.HOST, port: num('PORT') },
    logging: { level: env.LOG_LEVEL },
  };
}

/**
 * Load the effective configuration.
 *
 * @throws ConfigError if the file is not valid TOML, or if the merged
 * result (file + env) fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { configPath = getConfigPath(), createIfMissing = true, ignoreEnv = false } = options;

  let fileConfig: PlainObject = {};
  if (fs.existsSync(configPath)) {
    fileConfig = readTomlFile(configPath);
  } else if (createIfMissing) {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  }

  const partial = PartialConfigSchema.safeParse(fileConfig);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(partial.error.issues)}`
    );
  }

  let merged = deepMerge(DEFAULT_CONFIG, partial.data);
  if (!ignoreEnv) {
    merged = deepMerge(merged, envOverrides(loadEnv()));
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error.issues)}`);
  }

  return result.data;
}

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue(config, 'rag.k_queries') => 4
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a config value by dot-notation path and write it back to the file.
 * The change is validated against the full schema before anything is written.
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  if (getConfigValue(DEFAULT_CONFIG, key) === undefined) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readTomlFile(configPath) : {};
  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let current: TOML.JsonMap = config;
  for (const part of parts) {
    const next = current[part];
    if (isTomlTable(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  const result = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!result.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(result.error.issues)}`,
      'Run: helpdesk config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * List all config values in a flat format.
 * Returns entries like ['llm.model', 'gpt-4.1-mini']
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
