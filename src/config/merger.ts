// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > workspace config > global config > defaults
 */

import { AGENT_COMMAND, PIPELINE_CONFIG, SYNTHESIS_CONFIG } from '../constants.js';
import { UxplorePaths } from '../paths.js';
import { DEFAULT_PERSONA } from '../pipeline/stages.js';
import type { WorkspaceConfig, ResolvedConfig } from './types.js';

/**
 * Default configuration values. The database path is resolved at merge
 * time so UXPLORE_HOME is honored.
 */
export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'database'> = {
  provider: 'auto',
  temperature: SYNTHESIS_CONFIG.TEMPERATURE,
  maxRetries: 0,
  agent: {
    command: AGENT_COMMAND.COMMAND,
    args: [...AGENT_COMMAND.ARGS],
    env: {},
  },
  pipeline: {
    maxDepth: PIPELINE_CONFIG.MAX_DEPTH,
    stepsPerDepth: PIPELINE_CONFIG.STEPS_PER_DEPTH,
    stressStepBudget: PIPELINE_CONFIG.STRESS_STEP_BUDGET,
    pollIntervalMs: PIPELINE_CONFIG.POLL_INTERVAL_MS,
    flushIntervalMs: PIPELINE_CONFIG.FLUSH_INTERVAL_MS,
    useReasonAsContent: false,
  },
  defaults: {
    persona: DEFAULT_PERSONA,
    category: 'Other',
  },
};

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  provider?: string;
  model?: string;
  baseUrl?: string;
  database?: string;
  promptsDir?: string;
  agentCommand?: string;
}

/**
 * Apply a workspace config layer to the resolved config.
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.provider) config.provider = source.provider;
  if (source.model) config.model = source.model;
  if (source.baseUrl) config.baseUrl = source.baseUrl;
  if (source.temperature !== undefined) config.temperature = source.temperature;
  if (source.maxRetries !== undefined) config.maxRetries = source.maxRetries;
  if (source.database) config.database = source.database;
  if (source.promptsDir) config.promptsDir = source.promptsDir;

  if (source.agent) {
    if (source.agent.command) config.agent.command = source.agent.command;
    if (source.agent.args) config.agent.args = [...source.agent.args];
    if (source.agent.env) config.agent.env = { ...config.agent.env, ...source.agent.env };
  }

  const pipeline = source.pipeline;
  if (pipeline) {
    if (pipeline.maxDepth !== undefined) config.pipeline.maxDepth = pipeline.maxDepth;
    if (pipeline.stepsPerDepth !== undefined) config.pipeline.stepsPerDepth = pipeline.stepsPerDepth;
    if (pipeline.stressStepBudget !== undefined) config.pipeline.stressStepBudget = pipeline.stressStepBudget;
    if (pipeline.pollIntervalMs !== undefined) config.pipeline.pollIntervalMs = pipeline.pollIntervalMs;
    if (pipeline.flushIntervalMs !== undefined) config.pipeline.flushIntervalMs = pipeline.flushIntervalMs;
    if (pipeline.useReasonAsContent !== undefined) config.pipeline.useReasonAsContent = pipeline.useReasonAsContent;
  }

  if (source.defaults) {
    if (source.defaults.persona) config.defaults.persona = source.defaults.persona;
    if (source.defaults.category) config.defaults.category = source.defaults.category;
  }
}

/**
 * Merge configuration layers into a resolved config.
 */
export function mergeConfig(
  globalConfig: WorkspaceConfig | null,
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    ...DEFAULT_CONFIG,
    database: UxplorePaths.database(),
    agent: { ...DEFAULT_CONFIG.agent, args: [...DEFAULT_CONFIG.agent.args], env: { ...DEFAULT_CONFIG.agent.env } },
    pipeline: { ...DEFAULT_CONFIG.pipeline },
    defaults: { ...DEFAULT_CONFIG.defaults },
  };

  if (globalConfig) applyWorkspaceConfig(config, globalConfig);
  if (workspaceConfig) applyWorkspaceConfig(config, workspaceConfig);

  if (cliOptions.provider) config.provider = cliOptions.provider;
  if (cliOptions.model) config.model = cliOptions.model;
  if (cliOptions.baseUrl) config.baseUrl = cliOptions.baseUrl;
  if (cliOptions.database) config.database = cliOptions.database;
  if (cliOptions.promptsDir) config.promptsDir = cliOptions.promptsDir;
  if (cliOptions.agentCommand) config.agent.command = cliOptions.agentCommand;

  return config;
}
