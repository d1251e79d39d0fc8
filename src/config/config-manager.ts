/**
 * Unified Configuration Loader
 *
 * Loads, merges and validates configuration from, in increasing priority:
 * user-level (~/.config/insightflow/config.json), project-level
 * (.insightflow/config.json) and environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { getConfigPath, getProjectConfigPath } from '../paths.js';
import type { ZodIssue } from 'zod';
import { AppConfigSchema, type AppConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

type Env = Record<string, string | undefined>;
type ConfigObject = Record<string, unknown>;

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: Env;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: AppConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project' | 'env'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

// =============================================================================
// DEEP MERGE
// =============================================================================

function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow spread with 1-level nested object merge; arrays replace.
 */
export function deepMergeConfigs(base: ConfigObject, override: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] = isPlainObject(value) && isPlainObject(baseValue) ? { ...baseValue, ...value } : value;
  }

  return result;
}

// =============================================================================
// SOURCES
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): ConfigObject | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isPlainObject(parsed)) {
      warnings.push(`${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/** env var -> [section, key, kind] */
const ENV_OVERRIDES: Array<[string, string, string, 'number' | 'string']> = [
  ['INSIGHTFLOW_MAX_CONCURRENCY', 'orchestrator', 'maxConcurrency', 'number'],
  ['INSIGHTFLOW_AGENT_TIMEOUT_MS', 'orchestrator', 'agentTimeoutMs', 'number'],
  ['INSIGHTFLOW_CACHE_TTL_MS', 'cache', 'ttlMs', 'number'],
  ['INSIGHTFLOW_CACHE_MAX_ENTRIES', 'cache', 'maxEntries', 'number'],
  ['INSIGHTFLOW_DB_PATH', 'storage', 'dbPath', 'string'],
  ['INSIGHTFLOW_DATASET_DIR', 'storage', 'datasetDir', 'string'],
  ['INSIGHTFLOW_LOG_LEVEL', 'logging', 'level', 'string'],
  ['INSIGHTFLOW_LOG_FILE', 'logging', 'file', 'string'],
  ['INSIGHTFLOW_LLM_MODEL', 'llm', 'model', 'string'],
  ['ANTHROPIC_API_KEY', 'llm', 'apiKey', 'string'],
  ['INSIGHTFLOW_PYTHON', 'sandbox', 'interpreter', 'string'],
  ['PORT', 'server', 'port', 'number'],
];

/**
 * Build the environment layer. Numbers that do not parse are passed through
 * as strings so validation reports them.
 */
export function configFromEnv(env: Env): ConfigObject {
  const layer: Record<string, ConfigObject> = {};

  const set = (section: string, key: string, value: unknown): void => {
    layer[section] = { ...layer[section], [key]: value };
  };

  for (const [name, section, key, kind] of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const num = Number(raw);
    set(section, key, kind === 'number' && Number.isFinite(num) ? num : raw.trim());
  }

  const mock = env.AGENT_MOCK?.toLowerCase();
  if (mock === '1' || mock === 'true' || mock === 'yes') {
    set('llm', 'provider', 'mock');
  }

  return layer;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Remove the value at `path` from a nested object (copy-on-write).
 */
function withoutPath(obj: ConfigObject, path: ReadonlyArray<string | number>): ConfigObject {
  if (path.length === 0) return {};
  const [head, ...rest] = path;
  const key = String(head);
  const copy: ConfigObject = { ...obj };
  const child = copy[key];
  if (rest.length === 0 || !isPlainObject(child)) {
    delete copy[key];
  } else {
    copy[key] = withoutPath(child, rest);
  }
  return copy;
}

/**
 * Load configuration from every source.
 *
 * Validation problems never throw: each offending field is reported as a
 * warning and dropped, so its default applies.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, env = process.env, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath(env);
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  let projectRaw: ConfigObject | null = null;
  if (!skipProject) {
    const projectConfigPath = getProjectConfigPath(cwd);
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  const envRaw = configFromEnv(env);
  sources.push({ path: 'environment', level: 'env', loaded: Object.keys(envRaw).length > 0 });

  let merged: ConfigObject = {};
  for (const layer of [userRaw, projectRaw, envRaw]) {
    if (layer) merged = deepMergeConfigs(merged, layer);
  }

  // Each pass removes at least one offending path, so this terminates.
  for (;;) {
    const result = AppConfigSchema.safeParse(merged);
    if (result.success) {
      return { config: result.data, sources, warnings };
    }

    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      warnings.push(`config validation: ${path}: ${issue.message}`);
      for (const dropped of pathsToDrop(issue)) {
        merged = withoutPath(merged, dropped);
      }
    }
  }
}

/**
 * For `unrecognized_keys` the issue path points at the parent object and the
 * offending keys are listed separately.
 */
function pathsToDrop(issue: ZodIssue): Array<(string | number)[]> {
  if (issue.code === 'unrecognized_keys') {
    return issue.keys.map((key) => [...issue.path, key]);
  }
  return [issue.path];
}
