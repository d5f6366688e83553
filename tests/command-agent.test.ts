// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { CommandAgent, expandArgs, parseAgentResult } from '../src/agent/command-agent.js';
import type { AgentRunRequest, OutputStream } from '../src/agent/types.js';

describe('expandArgs', () => {
  it('substitutes goal and step placeholders', () => {
    expect(expandArgs(['run', '{{goal}}', '--steps', '{{steps}}'], 'Open settings', 60))
      .toEqual(['run', 'Open settings', '--steps', '60']);
  });

  it('tolerates whitespace inside the braces', () => {
    expect(expandArgs(['--goal={{ goal }}'], 'x', 1)).toEqual(['--goal=x']);
  });

  it('leaves other arguments untouched', () => {
    expect(expandArgs(['--device', 'emulator-5554'], 'x', 1)).toEqual(['--device', 'emulator-5554']);
  });

  it('keeps dollar sequences in the goal literal', () => {
    const goal = "Tap the button labelled $& then the one labelled $' and pay $$5 for $`";
    expect(expandArgs(['--goal={{goal}}'], goal, 3)).toEqual([`--goal=${goal}`]);
  });
});

describe('parseAgentResult', () => {
  it('reads the last result line', () => {
    const stdout = [
      'Step 1: open app',
      '{"success": false, "reason": "first attempt"}',
      'Step 2: retry',
      '{"success": true, "reason": "Goal reached", "final_answer": "# Report"}',
    ].join('\n');

    expect(parseAgentResult(stdout)).toEqual({ success: true, reason: 'Goal reached', finalAnswer: '# Report' });
  });

  it('accepts camelCase finalAnswer', () => {
    expect(parseAgentResult('{"success": true, "reason": "ok", "finalAnswer": "text"}'))
      .toEqual({ success: true, reason: 'ok', finalAnswer: 'text' });
  });

  it('leaves success undefined when the line has only a reason', () => {
    expect(parseAgentResult('{"reason": "ran out of steps"}'))
      .toEqual({ success: undefined, reason: 'ran out of steps', finalAnswer: undefined });
  });

  it('skips JSON lines that are not results', () => {
    const stdout = '{"success": true, "reason": "done"}\n{"screen": "home"}';
    expect(parseAgentResult(stdout)).toEqual({ success: true, reason: 'done', finalAnswer: undefined });
  });

  it('ignores malformed JSON lines', () => {
    expect(parseAgentResult('{"success": tru')).toBeNull();
  });

  it('returns null when there is no result line', () => {
    expect(parseAgentResult('just narration\nmore narration')).toBeNull();
  });

  it('handles CRLF line endings', () => {
    expect(parseAgentResult('hello\r\n{"success": true, "reason": "ok"}\r\n'))
      .toEqual({ success: true, reason: 'ok', finalAnswer: undefined });
  });
});

describe('CommandAgent', () => {
  function nodeAgent(script: string, extraArgs: string[] = []): CommandAgent {
    return new CommandAgent({ command: process.execPath, args: ['-e', script, ...extraArgs] });
  }

  function request(chunks: Array<[string, OutputStream]> = [], signal = new AbortController().signal): AgentRunRequest {
    return {
      goal: 'Open settings',
      stepBudget: 12,
      signal,
      onOutput: (text, stream) => {
        chunks.push([text, stream]);
      },
    };
  }

  it('decodes characters split across output chunks', async () => {
    const script = `
      const buf = Buffer.from(JSON.stringify({ success: true, reason: 'Goal reached', final_answer: 'Café ✓' }) + '\\n');
      const cut = buf.indexOf(0xc3) + 1;
      process.stdout.write(buf.subarray(0, cut));
      setTimeout(() => process.stdout.write(buf.subarray(cut)), 50);
    `;
    const chunks: Array<[string, OutputStream]> = [];

    const result = await nodeAgent(script).run(request(chunks));

    expect(result).toEqual({ success: true, reason: 'Goal reached', finalAnswer: 'Café ✓' });
    expect(chunks.map(([text]) => text).join('')).toBe(
      '{"success":true,"reason":"Goal reached","final_answer":"Café ✓"}\n'
    );
    expect(chunks.every(([, stream]) => stream === 'stdout')).toBe(true);
  });

  it('passes the goal and step budget through arguments and environment', async () => {
    const script = `
      const goal = process.argv[process.argv.length - 2];
      const steps = process.argv[process.argv.length - 1];
      console.log(JSON.stringify({
        success: goal === process.env.UXPLORE_GOAL && steps === process.env.UXPLORE_STEP_BUDGET,
        reason: goal + ' / ' + steps,
      }));
    `;

    const result = await nodeAgent(script, ['{{goal}}', '{{steps}}']).run(request());

    expect(result).toEqual({ success: true, reason: 'Open settings / 12', finalAnswer: undefined });
  });

  it('reports a non-zero exit with the last stderr line', async () => {
    const script = `
      process.stderr.write('connecting\\ndevice offline\\n');
      process.exitCode = 3;
    `;
    const chunks: Array<[string, OutputStream]> = [];

    const result = await nodeAgent(script).run(request(chunks));

    expect(result).toEqual({ success: false, reason: 'Agent command exited with code 3: device offline' });
    expect(chunks).toEqual([['connecting\ndevice offline\n', 'stderr']]);
  });

  it('treats a clean exit without a result line as unsuccessful', async () => {
    const result = await nodeAgent("console.log('done')").run(request());
    expect(result).toEqual({ reason: 'Agent command printed no result line' });
  });

  it('rejects when the run is aborted', async () => {
    const controller = new AbortController();
    const run = nodeAgent('setTimeout(() => {}, 10000)').run(request([], controller.signal));

    controller.abort();

    await expect(run).rejects.toMatchObject({ name: 'AbortError' });
  });
});
