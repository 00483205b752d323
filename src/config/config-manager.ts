/**
 * Configuration Loader
 *
 * Merges, in order: schema defaults, the user file
 * (~/.config/roundloop/config.json), the project file (.roundloop/config.json)
 * and environment overrides. Each file is validated on its own; an invalid
 * file is skipped with a warning so one typo never blocks a run.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getConfigPath, getProjectDir } from '../paths.js';
import { LoopConfigSchema, type LoopConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  skipUser?: boolean;
  skipProject?: boolean;
  /** Environment used for overrides (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigLoadResult {
  config: LoopConfig;
  sources: Array<{ path: string; level: 'user' | 'project' | 'env'; loaded: boolean }>;
  /** Non-fatal problems found while loading */
  warnings: string[];
}

type RawConfig = Record<string, unknown>;

// =============================================================================
// DEEP MERGE
// =============================================================================

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge of plain objects; arrays and scalars replace.
 */
export function deepMergeConfigs(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] = isPlainObject(value) && isPlainObject(baseValue) ? deepMergeConfigs(baseValue, value) : value;
  }

  return result;
}

// =============================================================================
// SOURCES
// =============================================================================

function formatIssues(label: string, issues: Array<{ path: (string | number)[]; message: string }>): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${label}: ${path}: ${issue.message}`;
  });
}

/**
 * Read and validate one JSON config file. Returns null when the file is
 * missing or rejected.
 */
function loadJsonFile(filePath: string, warnings: string[]): RawConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  if (!isPlainObject(parsed)) {
    warnings.push(`${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
    return null;
  }

  const check = LoopConfigSchema.safeParse(parsed);
  if (!check.success) {
    warnings.push(...formatIssues(filePath, check.error.issues));
    return null;
  }

  return parsed;
}

function parsePositiveInt(name: string, value: string, warnings: string[]): number | undefined {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    warnings.push(`${name}: expected a positive integer, got '${value}'`);
    return undefined;
  }
  return n;
}

/**
 * Environment overrides, as a partial config.
 */
export function configFromEnv(env: NodeJS.ProcessEnv, warnings: string[] = []): RawConfig {
  const raw: RawConfig = {};

  if (env.ROUNDLOOP_MODEL) raw.model = env.ROUNDLOOP_MODEL;
  if (env.ROUNDLOOP_MODEL_CODE) raw.codeModel = env.ROUNDLOOP_MODEL_CODE;
  if (env.ROUNDLOOP_MODEL_LIGHT) raw.lightModel = env.ROUNDLOOP_MODEL_LIGHT;

  if (env.ROUNDLOOP_MODEL_FALLBACK_LIST !== undefined) {
    raw.fallbackModels = env.ROUNDLOOP_MODEL_FALLBACK_LIST.split(',')
      .map((m) => m.trim())
      .filter((m) => m.length > 0);
  }

  if (env.ROUNDLOOP_MAX_ROUNDS) {
    const maxRounds = parsePositiveInt('ROUNDLOOP_MAX_ROUNDS', env.ROUNDLOOP_MAX_ROUNDS, warnings);
    if (maxRounds !== undefined) raw.maxRounds = maxRounds;
  }

  if (env.ROUNDLOOP_PAID_TIER !== undefined) {
    raw.routing = { paidTier: ['1', 'true', 'yes'].includes(env.ROUNDLOOP_PAID_TIER.toLowerCase()) };
  }

  if (env.ROUNDLOOP_LOG_LEVEL) {
    raw.logging = { level: env.ROUNDLOOP_LOG_LEVEL };
  }

  return raw;
}

// =============================================================================
// LOADER
// =============================================================================

export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipUser = false, skipProject = false, env = process.env } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];
  let merged: RawConfig = {};

  if (!skipUser) {
    const userConfigPath = getConfigPath(env);
    const userRaw = loadJsonFile(userConfigPath, warnings);
    sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });
    if (userRaw) merged = deepMergeConfigs(merged, userRaw);
  }

  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    const projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
    if (projectRaw) merged = deepMergeConfigs(merged, projectRaw);
  }

  const envRaw = configFromEnv(env, warnings);
  const withEnv = deepMergeConfigs(merged, envRaw);
  const result = LoopConfigSchema.safeParse(withEnv);
  sources.push({ path: '(environment)', level: 'env', loaded: Object.keys(envRaw).length > 0 });

  if (result.success) {
    return { config: result.data, sources, warnings };
  }

  // Only the environment can break an otherwise valid merge
  warnings.push(...formatIssues('environment', result.error.issues));
  return { config: LoopConfigSchema.parse(merged), sources, warnings };
}
