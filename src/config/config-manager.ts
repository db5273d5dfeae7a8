/**
 * Unified Configuration Loader
 *
 * Loads, merges and validates configuration from the user-level
 * (~/.config/agent-timeline/config.json) and project-level
 * (.agent-timeline/config.json) files, or from one explicit file.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getConfigPath, getProjectDir } from '../paths.js';
import { ConfigError, toError } from '../errors/index.js';
import {
  UserConfigSchema,
  resolveConfig,
  type TimelineConfig,
  type ValidatedUserConfig,
} from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
  /** Load only this file instead of the user/project pair */
  configPath?: string;
}

export interface ConfigLoadResult {
  /** Validated config as written (sections that failed validation dropped) */
  config: ValidatedUserConfig;
  /** Config with defaults applied */
  resolved: TimelineConfig;
  sources: Array<{ path: string; level: 'user' | 'project' | 'explicit'; loaded: boolean }>;
  /** Non-fatal problems: unreadable files, validation issues */
  warnings: string[];
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// DEEP MERGE
// =============================================================================

/**
 * Shallow spread with a 1-level nested object merge; arrays replace.
 */
function deepMergeConfigs(base: JsonObject, override: JsonObject): JsonObject {
  const result: JsonObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    if (isJsonObject(value) && isJsonObject(baseValue)) {
      result[key] = { ...baseValue, ...value };
    } else {
      result[key] = value;
    }
  }

  return result;
}

// =============================================================================
// LOADER
// =============================================================================

function loadJsonFile(filePath: string, warnings: string[]): JsonObject | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isJsonObject(parsed)) {
      const kind = Array.isArray(parsed) ? 'array' : typeof parsed;
      warnings.push(new ConfigError(`expected a JSON object, got ${kind}`, filePath).toLogString());
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(new ConfigError('failed to parse JSON', filePath, toError(err)).toLogString());
    return null;
  }
}

/**
 * Validate the merged object. Sections with issues are reported and
 * dropped, so a best-effort config is always returned.
 */
function validate(merged: JsonObject, warnings: string[]): ValidatedUserConfig {
  let candidate: JsonObject = { ...merged };

  for (;;) {
    const result = UserConfigSchema.safeParse(candidate);
    if (result.success) {
      return result.data;
    }

    const invalidKeys = new Set<string>();
    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      warnings.push(`config validation: ${path}: ${issue.message}`);
      const top = issue.path[0];
      if (typeof top === 'string') {
        invalidKeys.add(top);
      }
    }

    if (invalidKeys.size === 0) {
      return {};
    }

    const next: JsonObject = {};
    for (const [key, value] of Object.entries(candidate)) {
      if (!invalidKeys.has(key)) {
        next[key] = value;
      }
    }
    candidate = next;
  }
}

/**
 * Load configuration.
 *
 * Priority: user ← project (project overrides user). With `configPath`
 * only that file is read.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false, configPath } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];
  let merged: JsonObject = {};

  if (configPath) {
    const raw = loadJsonFile(configPath, warnings);
    sources.push({ path: configPath, level: 'explicit', loaded: raw !== null });
    if (raw === null && !existsSync(configPath)) {
      warnings.push(new ConfigError('config file not found', configPath).toLogString());
    }
    merged = raw ?? {};
  } else {
    const userConfigPath = getConfigPath();
    const userRaw = loadJsonFile(userConfigPath, warnings);
    sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });
    if (userRaw) {
      merged = { ...userRaw };
    }

    if (!skipProject) {
      const projectConfigPath = join(getProjectDir(cwd), 'config.json');
      const projectRaw = loadJsonFile(projectConfigPath, warnings);
      sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
      if (projectRaw) {
        merged = deepMergeConfigs(merged, projectRaw);
      }
    }
  }

  const config = validate(merged, warnings);
  return { config, resolved: resolveConfig(config), sources, warnings };
}
