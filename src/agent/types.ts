// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/** Channel an agent's incidental output arrived on. */
export type OutputStream = 'stdout' | 'stderr';

/** Sink for the agent's running narration. */
export type OutputSink = (text: string, stream: OutputStream) => void;

/**
 * One bounded agent run.
 * @property {string} goal - Natural-language instructions for the agent.
 * @property {number} stepBudget - Maximum number of agent actions.
 * @property {AbortSignal} signal - Aborted when the run is cancelled.
 * @property {OutputSink} onOutput - Receives narration as it is produced.
 */
export interface AgentRunRequest {
  goal: string;
  stepBudget: number;
  signal: AbortSignal;
  onOutput: OutputSink;
}

/**
 * What the agent reports when a run finishes.
 * An absent success flag counts as failure.
 */
export interface AgentRunResult {
  success?: boolean;
  reason: string;
  finalAnswer?: string;
}

/**
 * Autonomous UI-exploring agent.
 */
export interface ExplorationAgent {
  run(request: AgentRunRequest): Promise<AgentRunResult>;
}

/**
 * Classified outcome of one invocation.
 * output is the captured stage content, or null when there is none.
 */
export interface AgentOutcome {
  status: 'success' | 'failure' | 'cancelled';
  success: boolean;
  reason: string;
  output: string | null;
}
