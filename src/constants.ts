// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for uxplore.
 */

/**
 * Pipeline timing and budget defaults.
 */
export const PIPELINE_CONFIG = {
  /** Agent steps granted per level of max depth (stages 1 and 2) */
  STEPS_PER_DEPTH: 30,
  /** Fixed step budget of the stress-testing stage, capped by the stage 1-2 budget */
  STRESS_STEP_BUDGET: 100,
  /** How often the cancellation flag is polled while an agent runs (ms) */
  POLL_INTERVAL_MS: 2000,
  /** How often buffered agent narration is flushed to observers (ms) */
  FLUSH_INTERVAL_MS: 3000,
  /** Default navigation depth */
  MAX_DEPTH: 6,
  /** Upper bound accepted for max depth */
  MAX_DEPTH_LIMIT: 20,
} as const;

/**
 * Default command that runs the UI-automation agent.
 */
export const AGENT_COMMAND = {
  COMMAND: 'droidrun',
  ARGS: ['run', '{{goal}}', '--steps', '{{steps}}'],
} as const;

/**
 * Completion defaults for the synthesis call.
 */
export const SYNTHESIS_CONFIG = {
  TEMPERATURE: 0.15,
  MAX_TOKENS: 8192,
} as const;
