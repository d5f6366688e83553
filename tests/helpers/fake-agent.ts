// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Scripted stand-in for the UI-automation agent.
 */

import type { AgentRunRequest, AgentRunResult, ExplorationAgent, OutputStream } from '../../src/agent/types.js';

export interface ScriptedRun {
  /** Result to resolve with. */
  result?: AgentRunResult;
  /** Reject with this error instead. */
  error?: Error;
  /** Throw synchronously from run(). */
  throwSync?: Error;
  /** Output emitted before settling. */
  output?: Array<{ text: string; stream?: OutputStream }>;
  /** Resolve after this many milliseconds. */
  delayMs?: number;
  /** Never settle on its own; reject once the run is aborted. */
  hang?: boolean;
  /** Called when the run starts, before anything else. */
  onStart?: (request: AgentRunRequest) => void;
}

/**
 * Successful run whose final answer is the given text.
 */
export function answer(text: string): ScriptedRun {
  return { result: { success: true, reason: 'Goal reached', finalAnswer: text } };
}

export class ScriptedAgent implements ExplorationAgent {
  readonly requests: AgentRunRequest[] = [];
  private script: ScriptedRun[];

  constructor(script: ScriptedRun[] = []) {
    this.script = [...script];
  }

  get callCount(): number {
    return this.requests.length;
  }

  run(request: AgentRunRequest): Promise<AgentRunResult> {
    this.requests.push(request);
    const step = this.script.shift() ?? { result: { success: true, reason: 'done', finalAnswer: 'report' } };
    step.onStart?.(request);

    if (step.throwSync) {
      throw step.throwSync;
    }

    for (const chunk of step.output ?? []) {
      request.onOutput(chunk.text, chunk.stream ?? 'stdout');
    }

    if (step.hang) {
      return new Promise((_resolve, reject) => {
        request.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }

    return new Promise((resolve, reject) => {
      const settle = (): void => {
        if (step.error) {
          reject(step.error);
        } else {
          resolve(step.result ?? { success: true, reason: 'done', finalAnswer: 'report' });
        }
      };
      if (step.delayMs) {
        setTimeout(settle, step.delayMs);
      } else {
        settle();
      }
    });
  }
}
