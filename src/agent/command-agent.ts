// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command Agent
 *
 * Drives an external UI-automation command as a child process. The goal
 * and step budget are passed through {{goal}} / {{steps}} in the argument
 * list and the UXPLORE_GOAL / UXPLORE_STEP_BUDGET environment variables.
 * Output is streamed as narration; the last stdout line that is a JSON
 * object with "success" or "reason" is the run's result:
 *
 *   {"success": true, "reason": "Goal reached", "final_answer": "# Report..."}
 */

import { spawn } from 'child_process';
import { logger } from '../logger.js';
import { isJsonObject } from '../types.js';
import { parseJsonStrict } from '../utils/json-parser.js';
import type { AgentRunRequest, AgentRunResult, ExplorationAgent } from './types.js';

/** Keep at most this much stdout for result parsing. */
const MAX_CAPTURED_OUTPUT = 256 * 1024;

export interface CommandAgentConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Substitute {{goal}} and {{steps}} in each argument.
 */
export function expandArgs(args: string[], goal: string, stepBudget: number): string[] {
  // Function replacers keep "$&" and friends in the goal literal.
  return args.map(arg => arg
    .replace(/\{\{\s*goal\s*\}\}/g, () => goal)
    .replace(/\{\{\s*steps\s*\}\}/g, () => String(stepBudget)));
}

/**
 * Find the result line in the agent's stdout, scanning from the end.
 */
export function parseAgentResult(stdout: string): AgentRunResult | null {
  const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(Boolean);

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (!line.startsWith('{')) continue;

    const parsed = parseJsonStrict(line);
    if (!parsed.ok || !isJsonObject(parsed.value)) continue;

    const value = parsed.value;
    if (!('success' in value) && !('reason' in value)) continue;

    const finalAnswer = typeof value.final_answer === 'string'
      ? value.final_answer
      : typeof value.finalAnswer === 'string' ? value.finalAnswer : undefined;

    return {
      success: typeof value.success === 'boolean' ? value.success : undefined,
      reason: typeof value.reason === 'string' ? value.reason : '',
      finalAnswer,
    };
  }

  return null;
}

export class CommandAgent implements ExplorationAgent {
  constructor(private config: CommandAgentConfig) {}

  run(request: AgentRunRequest): Promise<AgentRunResult> {
    const args = expandArgs(this.config.args, request.goal, request.stepBudget);
    logger.debug(`Spawning agent: ${this.config.command} (${args.length} args)`);

    return new Promise((resolve, reject) => {
      const proc = spawn(this.config.command, args, {
        cwd: this.config.cwd,
        env: {
          ...process.env,
          ...this.config.env,
          UXPLORE_GOAL: request.goal,
          UXPLORE_STEP_BUDGET: String(request.stepBudget),
        },
        stdio: ['ignore', 'pipe', 'pipe'],
        signal: request.signal,
        killSignal: 'SIGTERM',
      });

      let captured = '';
      let lastError = '';

      // Decode across chunk boundaries so split multi-byte characters survive.
      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');

      proc.stdout.on('data', (text: string) => {
        captured = (captured + text).slice(-MAX_CAPTURED_OUTPUT);
        request.onOutput(text, 'stdout');
      });

      proc.stderr.on('data', (text: string) => {
        const trimmed = text.trim();
        if (trimmed) {
          lastError = trimmed.split('\n').pop() ?? trimmed;
        }
        request.onOutput(text, 'stderr');
      });

      proc.on('error', (error) => {
        reject(error);
      });

      proc.on('close', (code, signal) => {
        const result = parseAgentResult(captured);
        if (result) {
          resolve(result);
          return;
        }
        if (signal) {
          resolve({ success: false, reason: `Agent command terminated by ${signal}` });
          return;
        }
        if (code !== 0) {
          const detail = lastError ? `: ${lastError}` : '';
          resolve({ success: false, reason: `Agent command exited with code ${code}${detail}` });
          return;
        }
        resolve({ reason: 'Agent command printed no result line' });
      });
    });
  }
}
