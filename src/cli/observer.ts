// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import chalk from 'chalk';
import type { EventLevel, PipelineObserver } from '../pipeline/events.js';
import { STAGE_NAMES } from '../pipeline/stages.js';
import type { StageStatus } from '../types.js';

/**
 * Where console output goes. The spinner implements this in the CLI;
 * tests pass a recorder.
 */
export interface ConsoleSink {
  print(line: string): void;
  progress(message: string, percent: number): void;
  stageStart(stage: number, name: string): void;
  stageSucceed(stage: number, name: string): void;
  stageFail(stage: number, reason: string): void;
  stop(): void;
}

const LEVEL_COLORS: Record<EventLevel, (text: string) => string> = {
  info: chalk.blue,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  agent: chalk.dim,
};

/**
 * Format one log event for the terminal. Multi-line agent narration is
 * indented under a single marker.
 */
export function formatLogLine(message: string, level: EventLevel): string {
  const color = LEVEL_COLORS[level];
  if (level === 'agent') {
    return message
      .split('\n')
      .map((line, index) => color(`${index === 0 ? '│' : ' '} ${line}`))
      .join('\n');
  }
  return color(message);
}

/**
 * Renders pipeline events on the terminal.
 */
export class ConsoleObserver implements PipelineObserver {
  constructor(
    private sink: ConsoleSink,
    private options: { showAgentOutput: boolean } = { showAgentOutput: false }
  ) {}

  onStart(explorationId: string): void {
    this.sink.print(chalk.bold(`Exploration ${explorationId}`));
  }

  onProgress(message: string, percent: number): void {
    if (percent < 0) {
      this.sink.stop();
      return;
    }
    this.sink.progress(message, percent);
  }

  onLog(message: string, level: EventLevel): void {
    if (level === 'agent' && !this.options.showAgentOutput) {
      return;
    }
    this.sink.print(formatLogLine(message, level));
  }

  onStageChange(stage: number, status: StageStatus, message: string): void {
    const name = stage === 1 || stage === 2 || stage === 3 || stage === 4 ? STAGE_NAMES[stage] : `Stage ${stage}`;
    switch (status) {
      case 'running':
        this.sink.stageStart(stage, name);
        break;
      case 'completed':
        this.sink.stageSucceed(stage, name);
        break;
      case 'failed':
        this.sink.stageFail(stage, message);
        break;
      case 'pending':
        break;
    }
  }
}
