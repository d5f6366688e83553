// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Utilities
 *
 * Helper functions for working with resolved configuration.
 */

import { AGENT_COMMAND, PIPELINE_CONFIG, SYNTHESIS_CONFIG } from '../constants.js';
import type { PipelineSettings } from '../pipeline/runner.js';
import { DEFAULT_PERSONA } from '../pipeline/stages.js';
import type { CreateProviderOptions } from '../providers/index.js';
import type { ResolvedConfig, WorkspaceConfig } from './types.js';

/**
 * Runner settings taken from the resolved config.
 */
export function getPipelineSettings(config: ResolvedConfig): PipelineSettings {
  return {
    stepsPerDepth: config.pipeline.stepsPerDepth,
    stressStepBudget: config.pipeline.stressStepBudget,
    pollIntervalMs: config.pipeline.pollIntervalMs,
    flushIntervalMs: config.pipeline.flushIntervalMs,
    useReasonAsContent: config.pipeline.useReasonAsContent,
  };
}

/**
 * Provider settings taken from the resolved config. API keys are left to
 * the provider, which reads them from the environment.
 */
export function getProviderConfig(config: ResolvedConfig): CreateProviderOptions {
  return {
    type: config.provider,
    model: config.model,
    baseUrl: config.baseUrl,
    temperature: config.temperature,
    maxRetries: config.maxRetries,
    maxTokens: SYNTHESIS_CONFIG.MAX_TOKENS,
  };
}

/**
 * Create an example configuration file content.
 */
export function getExampleConfig(): string {
  const example: WorkspaceConfig = {
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
      useReasonAsContent: false,
    },
    defaults: {
      persona: DEFAULT_PERSONA,
      category: 'Other',
    },
  };

  return JSON.stringify(example, null, 2) + '\n';
}
