// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Agent Invoker
 *
 * Runs one bounded agent invocation under a supervision loop that polls
 * the cancellation flag, batches the agent's narration into log events
 * and classifies the result.
 */

import { logger } from '../logger.js';
import type { CancellationFlag } from '../pipeline/cancellation.js';
import type { EventLevel } from '../pipeline/events.js';
import { OutputBuffer } from './output-buffer.js';
import type { AgentOutcome, AgentRunResult, ExplorationAgent } from './types.js';

export const STOPPED_BY_USER = 'Stopped by user';

export interface AgentInvokerOptions {
  /** How often the cancellation flag is checked while the agent runs. */
  pollIntervalMs: number;
  /** How often buffered narration is forwarded to onLog. */
  flushIntervalMs: number;
  /** Use the agent's reason as content when it gives no final answer. */
  useReasonAsContent?: boolean;
  /** Receives batched narration. */
  onLog?: (message: string, level: EventLevel) => void;
}

type Settled =
  | { kind: 'result'; result: AgentRunResult }
  | { kind: 'error'; error: Error };

const POLL_TICK = Symbol('poll-tick');

/**
 * Resolve with the promise's value, or with POLL_TICK after ms.
 */
function raceTick<T>(promise: Promise<T>, ms: number): Promise<T | typeof POLL_TICK> {
  let timer: NodeJS.Timeout | undefined;
  const tick = new Promise<typeof POLL_TICK>(resolve => {
    timer = setTimeout(() => resolve(POLL_TICK), ms);
  });
  return Promise.race([promise, tick]).finally(() => clearTimeout(timer));
}

export class AgentInvoker {
  constructor(
    private agent: ExplorationAgent,
    private options: AgentInvokerOptions
  ) {}

  /**
   * Run the agent once.
   *
   * Returns a cancelled outcome as soon as the flag is seen, aborting the
   * run. Agent errors become failure outcomes. The output buffers are
   * closed on every path.
   */
  async invoke(goal: string, stepBudget: number, cancellation: CancellationFlag): Promise<AgentOutcome> {
    const onLog = this.options.onLog;
    const stdout = new OutputBuffer(text => onLog?.(text, 'agent'), this.options.flushIntervalMs);
    const stderr = new OutputBuffer(text => onLog?.(text, 'error'), this.options.flushIntervalMs);
    const controller = new AbortController();

    stdout.start();
    stderr.start();
    logger.agentInvocation(goal.length, stepBudget);
    logger.payload('Goal', goal);

    try {
      if (cancellation.isRequested()) {
        return cancelledOutcome();
      }

      // Mapped so an abandoned run can never surface as an unhandled rejection.
      const settled: Promise<Settled> = this.startRun({
        goal,
        stepBudget,
        signal: controller.signal,
        onOutput: (text, stream) => (stream === 'stderr' ? stderr : stdout).write(text),
      }).then(
        (result): Settled => ({ kind: 'result', result }),
        (error: unknown): Settled => ({ kind: 'error', error: error instanceof Error ? error : new Error(String(error)) })
      );

      for (;;) {
        const next = await raceTick(settled, this.options.pollIntervalMs);
        if (next !== POLL_TICK) {
          return this.classify(next);
        }
        if (cancellation.isRequested()) {
          controller.abort(new Error(STOPPED_BY_USER));
          logger.debug('Agent run aborted by cancellation');
          return cancelledOutcome();
        }
      }
    } finally {
      stdout.close();
      stderr.close();
    }
  }

  /**
   * Start the run, turning a synchronous throw into a rejection.
   */
  private startRun(request: Parameters<ExplorationAgent['run']>[0]): Promise<AgentRunResult> {
    try {
      return this.agent.run(request);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private classify(settled: Settled): AgentOutcome {
    if (settled.kind === 'error') {
      logger.debug(`Agent run threw: ${settled.error.message}`);
      return { status: 'failure', success: false, reason: settled.error.message, output: null };
    }

    const { result } = settled;
    if (result.success !== true) {
      const reason = result.success === undefined
        ? result.reason || 'Agent returned no success flag'
        : result.reason || 'Agent reported failure';
      return { status: 'failure', success: false, reason, output: null };
    }

    let output = result.finalAnswer?.trim() || null;
    if (!output && this.options.useReasonAsContent) {
      output = result.reason.trim() || null;
    }
    return { status: 'success', success: true, reason: result.reason, output };
  }
}

function cancelledOutcome(): AgentOutcome {
  return { status: 'cancelled', success: false, reason: STOPPED_BY_USER, output: null };
}
