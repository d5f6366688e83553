// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading and saving configuration files from disk.
 * Handles global and workspace configuration files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import { UxplorePaths } from '../paths.js';
import { isJsonObject } from '../types.js';
import type { JsonObject, JsonValue } from '../types.js';
import type { AgentCommandConfig, PipelineConfig, WorkspaceConfig } from './types.js';
import { getExampleConfig } from './utils.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.uxplore.json', '.uxplore/config.json', 'uxplore.config.json'];

export interface LoadedConfig {
  config: WorkspaceConfig | null;
  configPath: string | null;
}

function readString(source: JsonObject, key: string, file: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  logger.warn(`${file}: "${key}" must be a string, ignoring`);
  return undefined;
}

function readNumber(source: JsonObject, key: string, file: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return value;
  logger.warn(`${file}: "${key}" must be a number, ignoring`);
  return undefined;
}

function readBoolean(source: JsonObject, key: string, file: string): boolean | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  logger.warn(`${file}: "${key}" must be true or false, ignoring`);
  return undefined;
}

function readObject(source: JsonObject, key: string, file: string): JsonObject | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (isJsonObject(value)) return value;
  logger.warn(`${file}: "${key}" must be an object, ignoring`);
  return undefined;
}

function readStringList(source: JsonObject, key: string, file: string): string[] | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value) && value.every((item: JsonValue) => typeof item === 'string')) {
    return value.map(String);
  }
  logger.warn(`${file}: "${key}" must be a list of strings, ignoring`);
  return undefined;
}

function readStringMap(source: JsonObject, key: string, file: string): Record<string, string> | undefined {
  const value = readObject(source, key, file);
  if (!value) return undefined;
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[name] = entry;
    } else {
      logger.warn(`${file}: "${key}.${name}" must be a string, ignoring`);
    }
  }
  return result;
}

/** Drop undefined entries so layers merge by presence. */
function compact<T extends object>(value: T): T | undefined {
  const entries = Object.entries(value).filter(([, entry]) => entry !== undefined);
  return entries.length > 0 ? value : undefined;
}

/**
 * Build a workspace config from parsed JSON. Ill-typed keys are dropped
 * with a warning; unknown keys are ignored.
 */
export function parseWorkspaceConfig(raw: JsonObject, file: string = '<config>'): WorkspaceConfig {
  const config: WorkspaceConfig = {
    provider: readString(raw, 'provider', file),
    model: readString(raw, 'model', file),
    baseUrl: readString(raw, 'baseUrl', file),
    temperature: readNumber(raw, 'temperature', file),
    maxRetries: readNumber(raw, 'maxRetries', file),
    database: readString(raw, 'database', file),
    promptsDir: readString(raw, 'promptsDir', file),
  };

  const agent = readObject(raw, 'agent', file);
  if (agent) {
    const agentConfig: AgentCommandConfig = {
      command: readString(agent, 'command', file),
      args: readStringList(agent, 'args', file),
      env: readStringMap(agent, 'env', file),
    };
    config.agent = compact(agentConfig);
  }

  const pipeline = readObject(raw, 'pipeline', file);
  if (pipeline) {
    const pipelineConfig: PipelineConfig = {
      maxDepth: readNumber(pipeline, 'maxDepth', file),
      stepsPerDepth: readNumber(pipeline, 'stepsPerDepth', file),
      stressStepBudget: readNumber(pipeline, 'stressStepBudget', file),
      pollIntervalMs: readNumber(pipeline, 'pollIntervalMs', file),
      flushIntervalMs: readNumber(pipeline, 'flushIntervalMs', file),
      useReasonAsContent: readBoolean(pipeline, 'useReasonAsContent', file),
    };
    config.pipeline = compact(pipelineConfig);
  }

  const defaults = readObject(raw, 'defaults', file);
  if (defaults) {
    config.defaults = compact({
      persona: readString(defaults, 'persona', file),
      category: readString(defaults, 'category', file),
    });
  }

  return config;
}

/**
 * Read and parse one config file. A file that fails to parse is reported
 * and treated as empty.
 */
function readConfigFile(configPath: string): WorkspaceConfig | null {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isJsonObject(parsed)) {
      logger.warn(`Ignoring ${configPath}: expected a JSON object`);
      return null;
    }
    return parseWorkspaceConfig(parsed, configPath);
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return null;
  }
}

/**
 * Load global configuration from ~/.uxplore/config.json.
 * This applies to all workspaces unless overridden by a workspace config.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string): LoadedConfig {
  const configPath = overrideDir
    ? path.join(overrideDir, 'config.json')
    : UxplorePaths.globalConfig();

  if (fs.existsSync(configPath)) {
    return { config: readConfigFile(configPath), configPath };
  }
  return { config: null, configPath: null };
}

/**
 * Find and load workspace configuration from the current directory.
 * Searches for .uxplore.json, .uxplore/config.json, or uxplore.config.json
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): LoadedConfig {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: readConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}

/**
 * Initialize a new .uxplore.json file in the current directory.
 */
export function initConfig(cwd: string = process.cwd()): {
  success: boolean;
  path: string;
  error?: string;
} {
  const configPath = path.join(cwd, CONFIG_FILES[0]);

  if (fs.existsSync(configPath)) {
    return {
      success: false,
      path: configPath,
      error: 'Config file already exists',
    };
  }

  try {
    fs.writeFileSync(configPath, getExampleConfig());
    return { success: true, path: configPath };
  } catch (error) {
    return {
      success: false,
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
