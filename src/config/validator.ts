// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Functions for validating workspace configuration.
 */

import { CATEGORIES, PERSONAS } from '../pipeline/stages.js';
import { PIPELINE_CONFIG } from '../constants.js';
import type { WorkspaceConfig } from './types.js';

/**
 * Valid provider names.
 */
const VALID_PROVIDERS = ['anthropic', 'openai', 'ollama', 'mock', 'auto'];

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate workspace configuration.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  if (config.provider && !VALID_PROVIDERS.includes(config.provider)) {
    warnings.push(`Unknown provider "${config.provider}". Valid: ${VALID_PROVIDERS.join(', ')}`);
  }

  if (config.temperature !== undefined && (config.temperature < 0 || config.temperature > 2)) {
    warnings.push('temperature must be between 0 and 2');
  }

  if (config.maxRetries !== undefined && (!Number.isInteger(config.maxRetries) || config.maxRetries < 0)) {
    warnings.push('maxRetries must be a non-negative integer');
  }

  if (config.agent?.command !== undefined && !config.agent.command.trim()) {
    warnings.push('agent.command must not be empty');
  }

  if (config.agent?.args && !config.agent.args.some(arg => arg.includes('{{goal}}'))) {
    warnings.push('agent.args has no {{goal}} placeholder; the goal is only passed through UXPLORE_GOAL');
  }

  const pipeline = config.pipeline;
  if (pipeline) {
    if (pipeline.maxDepth !== undefined
      && (!isPositiveInteger(pipeline.maxDepth) || pipeline.maxDepth > PIPELINE_CONFIG.MAX_DEPTH_LIMIT)) {
      warnings.push(`pipeline.maxDepth must be an integer from 1 to ${PIPELINE_CONFIG.MAX_DEPTH_LIMIT}`);
    }
    for (const key of ['stepsPerDepth', 'stressStepBudget', 'pollIntervalMs', 'flushIntervalMs'] as const) {
      const value = pipeline[key];
      if (value !== undefined && !isPositiveInteger(value)) {
        warnings.push(`pipeline.${key} must be a positive integer`);
      }
    }
  }

  const persona = config.defaults?.persona;
  if (persona && !(persona in PERSONAS)) {
    warnings.push(`Unknown persona "${persona}" uses the UX Designer prompts. Known: ${Object.keys(PERSONAS).join(', ')}`);
  }

  const category = config.defaults?.category;
  if (category && !CATEGORIES.some(known => known === category)) {
    warnings.push(`Unknown category "${category}". Known: ${CATEGORIES.join(', ')}`);
  }

  return warnings;
}
