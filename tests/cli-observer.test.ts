// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach } from 'vitest';
import { ConsoleObserver, formatLogLine } from '../src/cli/observer.js';
import type { ConsoleSink } from '../src/cli/observer.js';
import { ExplorationEvents } from '../src/pipeline/events.js';

class RecordingSink implements ConsoleSink {
  calls: string[] = [];

  print(line: string): void {
    this.calls.push(`print ${line}`);
  }
  progress(message: string, percent: number): void {
    this.calls.push(`progress ${percent} ${message}`);
  }
  stageStart(stage: number, name: string): void {
    this.calls.push(`start ${stage} ${name}`);
  }
  stageSucceed(stage: number, name: string): void {
    this.calls.push(`succeed ${stage} ${name}`);
  }
  stageFail(stage: number, reason: string): void {
    this.calls.push(`fail ${stage} ${reason}`);
  }
  stop(): void {
    this.calls.push('stop');
  }
}

describe('formatLogLine', () => {
  it('indents agent narration under one marker', () => {
    expect(formatLogLine('Opening app\nTapping login', 'agent')).toBe('│ Opening app\n  Tapping login');
  });

  it('leaves other levels as they are', () => {
    expect(formatLogLine('Stage 1 completed', 'success')).toBe('Stage 1 completed');
  });
});

describe('ConsoleObserver', () => {
  let sink: RecordingSink;

  beforeEach(() => {
    sink = new RecordingSink();
  });

  it('maps pipeline events to sink calls', () => {
    const observer = new ConsoleObserver(sink);

    observer.onStart('a1b2c3d4');
    observer.onStageChange(1, 'running', 'Starting basic exploration...');
    observer.onProgress('Stage 1: Basic Exploration', 5);
    observer.onStageChange(1, 'completed', 'Basic Exploration complete');
    observer.onStageChange(2, 'failed', 'App crashed');
    observer.onStageChange(3, 'pending', '');
    observer.onLog('Stage 2 (Persona Analysis) failed: App crashed', 'error');
    observer.onProgress('Stage 2 (Persona Analysis) failed: App crashed', -1);

    expect(sink.calls).toEqual([
      'print Exploration a1b2c3d4',
      'start 1 Basic Exploration',
      'progress 5 Stage 1: Basic Exploration',
      'succeed 1 Basic Exploration',
      'fail 2 App crashed',
      'print Stage 2 (Persona Analysis) failed: App crashed',
      'stop',
    ]);
  });

  it('hides agent output unless asked', () => {
    new ConsoleObserver(sink).onLog('Tapping login', 'agent');
    expect(sink.calls).toEqual([]);

    new ConsoleObserver(sink, { showAgentOutput: true }).onLog('Tapping login', 'agent');
    expect(sink.calls).toEqual(['print │ Tapping login']);
  });

  it('names stages outside the pipeline by number', () => {
    new ConsoleObserver(sink).onStageChange(7, 'running', '');
    expect(sink.calls).toEqual(['start 7 Stage 7']);
  });

  it('renders a run published through the event transport', () => {
    const events = new ExplorationEvents();
    events.subscribe(new ConsoleObserver(sink));

    events.onStart('e5f6a7b8');
    events.onStageChange(1, 'running', 'Starting basic exploration...');
    events.onLog('Tapping login', 'agent');
    events.onStageChange(1, 'completed', 'Basic Exploration complete');
    events.onProgress('Exploration stopped', -1);

    expect(sink.calls).toEqual([
      'print Exploration e5f6a7b8',
      'start 1 Basic Exploration',
      'succeed 1 Basic Exploration',
      'stop',
    ]);
  });
});
