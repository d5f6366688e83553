// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi } from 'vitest';
import { AgentInvoker, STOPPED_BY_USER } from '../src/agent/invoker.js';
import { CancellationFlag } from '../src/pipeline/cancellation.js';
import type { EventLevel } from '../src/pipeline/events.js';
import { ScriptedAgent, answer } from './helpers/fake-agent.js';

function createInvoker(agent: ScriptedAgent, options: { useReasonAsContent?: boolean } = {}) {
  const logs: Array<{ message: string; level: EventLevel }> = [];
  const invoker = new AgentInvoker(agent, {
    pollIntervalMs: 5,
    flushIntervalMs: 1000,
    useReasonAsContent: options.useReasonAsContent,
    onLog: (message, level) => logs.push({ message, level }),
  });
  return { invoker, logs };
}

describe('AgentInvoker', () => {
  describe('classification', () => {
    it('returns the trimmed final answer on success', async () => {
      const agent = new ScriptedAgent([answer('  # Report\nAll good  ')]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome).toEqual({ status: 'success', success: true, reason: 'Goal reached', output: '# Report\nAll good' });
    });

    it('passes goal and step budget to the agent', async () => {
      const agent = new ScriptedAgent([answer('ok')]);
      const { invoker } = createInvoker(agent);

      await invoker.invoke('find the settings screen', 90, new CancellationFlag());

      expect(agent.requests[0].goal).toBe('find the settings screen');
      expect(agent.requests[0].stepBudget).toBe(90);
    });

    it('treats success false as failure with the agent reason', async () => {
      const agent = new ScriptedAgent([{ result: { success: false, reason: 'App crashed' } }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome).toEqual({ status: 'failure', success: false, reason: 'App crashed', output: null });
    });

    it('treats a missing success flag as failure', async () => {
      const agent = new ScriptedAgent([{ result: { reason: '' } }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome.status).toBe('failure');
      expect(outcome.reason).toBe('Agent returned no success flag');
    });

    it('uses a generic reason when a failed run gives none', async () => {
      const agent = new ScriptedAgent([{ result: { success: false, reason: '' } }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome.reason).toBe('Agent reported failure');
    });

    it('converts a rejected run into a failure', async () => {
      const agent = new ScriptedAgent([{ error: new Error('device offline') }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome).toEqual({ status: 'failure', success: false, reason: 'device offline', output: null });
    });

    it('converts a synchronous throw into a failure', async () => {
      const agent = new ScriptedAgent([{ throwSync: new Error('bad config') }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome.status).toBe('failure');
      expect(outcome.reason).toBe('bad config');
    });

    it('reports success with null output when there is no final answer', async () => {
      const agent = new ScriptedAgent([{ result: { success: true, reason: 'Finished exploring' } }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome.status).toBe('success');
      expect(outcome.output).toBeNull();
    });

    it('uses the reason as content when configured', async () => {
      const agent = new ScriptedAgent([{ result: { success: true, reason: 'Finished exploring' } }]);
      const { invoker } = createInvoker(agent, { useReasonAsContent: true });

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome.output).toBe('Finished exploring');
    });
  });

  describe('cancellation', () => {
    it('does not start the agent when already cancelled', async () => {
      const agent = new ScriptedAgent([answer('never')]);
      const { invoker } = createInvoker(agent);
      const flag = new CancellationFlag();
      flag.request();

      const outcome = await invoker.invoke('explore', 30, flag);

      expect(outcome).toEqual({ status: 'cancelled', success: false, reason: STOPPED_BY_USER, output: null });
      expect(agent.callCount).toBe(0);
    });

    it('aborts a running agent when cancellation is requested', async () => {
      const flag = new CancellationFlag();
      let signal: AbortSignal | undefined;
      const agent = new ScriptedAgent([{
        hang: true,
        onStart: (request) => {
          signal = request.signal;
          setTimeout(() => flag.request(), 10);
        },
      }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, flag);

      expect(outcome.status).toBe('cancelled');
      expect(outcome.reason).toBe('Stopped by user');
      expect(signal?.aborted).toBe(true);
    });

    it('keeps polling until a slow agent finishes', async () => {
      const agent = new ScriptedAgent([{ ...answer('slow report'), delayMs: 30 }]);
      const { invoker } = createInvoker(agent);

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome.output).toBe('slow report');
    });
  });

  describe('output forwarding', () => {
    it('flushes buffered stdout as agent logs and stderr as error logs', async () => {
      const agent = new ScriptedAgent([{
        ...answer('done'),
        output: [
          { text: 'Opening app\n' },
          { text: 'Tapping login\n' },
          { text: 'warning: slow frame\n', stream: 'stderr' },
        ],
      }]);
      const { invoker, logs } = createInvoker(agent);

      await invoker.invoke('explore', 30, new CancellationFlag());

      expect(logs).toEqual([
        { message: 'Opening app\nTapping login', level: 'agent' },
        { message: 'warning: slow frame', level: 'error' },
      ]);
    });

    it('flushes output even when the run fails', async () => {
      const agent = new ScriptedAgent([{ error: new Error('boom'), output: [{ text: 'partial progress' }] }]);
      const { invoker, logs } = createInvoker(agent);

      await invoker.invoke('explore', 30, new CancellationFlag());

      expect(logs).toEqual([{ message: 'partial progress', level: 'agent' }]);
    });

    it('contains errors thrown by the log callback', async () => {
      const agent = new ScriptedAgent([{ ...answer('done'), output: [{ text: 'noise' }] }]);
      const onLog = vi.fn(() => {
        throw new Error('observer broke');
      });
      const invoker = new AgentInvoker(agent, { pollIntervalMs: 5, flushIntervalMs: 1000, onLog });

      const outcome = await invoker.invoke('explore', 30, new CancellationFlag());

      expect(outcome.output).toBe('done');
      expect(onLog).toHaveBeenCalledWith('noise', 'agent');
    });
  });
});
