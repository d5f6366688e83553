// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for workspace and resolved configuration.
 */

/**
 * How the UI-automation agent is launched.
 */
export interface AgentCommandConfig {
  /** Executable to run */
  command?: string;

  /** Arguments; {{goal}} and {{steps}} are substituted per run */
  args?: string[];

  /** Extra environment for the agent process */
  env?: Record<string, string>;
}

/**
 * Pipeline tunables.
 */
export interface PipelineConfig {
  /** Default navigation depth for new explorations */
  maxDepth?: number;

  /** Agent steps granted per level of depth */
  stepsPerDepth?: number;

  /** Step ceiling for the stress-testing stage */
  stressStepBudget?: number;

  /** How often cancellation is checked while the agent runs (ms) */
  pollIntervalMs?: number;

  /** How often agent narration is flushed to the log (ms) */
  flushIntervalMs?: number;

  /** Accept the agent's reason as stage content when it gives no answer */
  useReasonAsContent?: boolean;
}

/**
 * Workspace configuration for uxplore.
 * Can be defined in .uxplore.json or .uxplore/config.json in the project root.
 */
export interface WorkspaceConfig {
  /** Completion provider for synthesis (auto, openai, anthropic, ollama, mock) */
  provider?: string;

  /** Model name to use */
  model?: string;

  /** Custom base URL for API */
  baseUrl?: string;

  /** Sampling temperature for synthesis */
  temperature?: number;

  /** Retries for transient provider errors */
  maxRetries?: number;

  /** SQLite database file */
  database?: string;

  /** Directory whose templates override the bundled prompts */
  promptsDir?: string;

  agent?: AgentCommandConfig;

  pipeline?: PipelineConfig;

  /** Defaults for `uxplore run` */
  defaults?: {
    persona?: string;
    category?: string;
  };
}

/**
 * Configuration after all layers are merged.
 */
export interface ResolvedConfig {
  provider: string;
  model?: string;
  baseUrl?: string;
  temperature: number;
  maxRetries: number;
  database: string;
  promptsDir?: string;
  agent: Required<AgentCommandConfig>;
  pipeline: Required<PipelineConfig>;
  defaults: {
    persona: string;
    category: string;
  };
}
