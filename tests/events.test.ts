// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi } from 'vitest';
import { ExplorationEvents, ObserverSet } from '../src/pipeline/events.js';
import type { LogEvent, ProgressEvent, StageEvent } from '../src/pipeline/events.js';

describe('ObserverSet', () => {
  it('forwards every callback to each observer', () => {
    const first = { onProgress: vi.fn(), onLog: vi.fn(), onStageChange: vi.fn(), onStart: vi.fn() };
    const second = { onProgress: vi.fn() };
    const observers = new ObserverSet([first, second]);

    observers.onStart('abc12345');
    observers.onProgress('Stage 1', 5);
    observers.onLog('hello', 'info');
    observers.onStageChange(1, 'running', 'Starting');

    expect(first.onStart).toHaveBeenCalledWith('abc12345');
    expect(first.onProgress).toHaveBeenCalledWith('Stage 1', 5);
    expect(second.onProgress).toHaveBeenCalledWith('Stage 1', 5);
    expect(first.onLog).toHaveBeenCalledWith('hello', 'info');
    expect(first.onStageChange).toHaveBeenCalledWith(1, 'running', 'Starting');
  });

  it('keeps notifying when an observer throws', () => {
    const failing = {
      onProgress: vi.fn(() => {
        throw new Error('broken UI');
      }),
    };
    const healthy = { onProgress: vi.fn() };
    const observers = new ObserverSet([failing]);
    observers.add(healthy);

    expect(() => observers.onProgress('Stage 2', 30)).not.toThrow();
    expect(healthy.onProgress).toHaveBeenCalledWith('Stage 2', 30);
  });
});

describe('ExplorationEvents', () => {
  it('publishes events tagged with the exploration id', () => {
    const events = new ExplorationEvents();
    const progress: ProgressEvent[] = [];
    const logs: LogEvent[] = [];
    const stages: StageEvent[] = [];
    events.on('progress', event => progress.push(event));
    events.on('log', event => logs.push(event));
    events.on('stage', event => stages.push(event));

    events.onStart('run-1');
    events.onProgress('Stage 1: Basic Exploration', 5);
    events.onLog('Tapped login', 'agent');
    events.onStageChange(1, 'completed', 'done');

    expect(progress).toHaveLength(1);
    expect(progress[0]).toMatchObject({ explorationId: 'run-1', message: 'Stage 1: Basic Exploration', percent: 5 });
    expect(logs[0]).toMatchObject({ explorationId: 'run-1', message: 'Tapped login', level: 'agent' });
    expect(stages[0]).toMatchObject({ explorationId: 'run-1', stage: 1, status: 'completed', message: 'done' });
    expect(Number.isNaN(Date.parse(progress[0].timestamp))).toBe(false);
  });

  it('does not replay events to late listeners', () => {
    const events = new ExplorationEvents();
    events.onStart('run-2');
    events.onProgress('early', 5);

    const late = vi.fn();
    events.on('progress', late);
    events.onProgress('later', 25);

    expect(late).toHaveBeenCalledTimes(1);
    expect(late.mock.calls[0][0]).toMatchObject({ message: 'later', percent: 25 });
  });

  it('feeds subscribed observers until detached', () => {
    const events = new ExplorationEvents();
    const observer = { onStart: vi.fn(), onProgress: vi.fn(), onLog: vi.fn(), onStageChange: vi.fn() };
    const detach = events.subscribe(observer);

    events.onStart('run-3');
    events.onStageChange(2, 'running', 'Starting persona analysis...');
    events.onProgress('Stage 2: Persona Analysis', 30);
    events.onLog('Stage 2 completed', 'success');
    detach();
    events.onProgress('after detach', 55);

    expect(observer.onStart).toHaveBeenCalledWith('run-3');
    expect(observer.onStageChange).toHaveBeenCalledWith(2, 'running', 'Starting persona analysis...');
    expect(observer.onProgress).toHaveBeenCalledTimes(1);
    expect(observer.onProgress).toHaveBeenCalledWith('Stage 2: Persona Analysis', 30);
    expect(observer.onLog).toHaveBeenCalledWith('Stage 2 completed', 'success');
    expect(events.listenerCount('progress')).toBe(0);
  });
});
