// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Pipeline events: the observer contract the runner reports through and
 * an in-process transport that republishes events to any listener.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import type { StageStatus } from '../types.js';

export type EventLevel = 'info' | 'success' | 'warning' | 'error' | 'agent';

/**
 * Receives live updates from a running exploration. All callbacks are
 * optional and fire-and-forget.
 */
export interface PipelineObserver {
  /** Called once the exploration record exists. */
  onStart?(explorationId: string): void;
  /** percent is 0-100, or -1 when the run failed or was stopped. */
  onProgress?(message: string, percent: number): void;
  onLog?(message: string, level: EventLevel): void;
  onStageChange?(stage: number, status: StageStatus, message: string): void;
}

export interface StartEvent {
  explorationId: string;
  timestamp: string;
}

export interface ProgressEvent {
  explorationId: string;
  message: string;
  percent: number;
  timestamp: string;
}

export interface LogEvent {
  explorationId: string;
  message: string;
  level: EventLevel;
  timestamp: string;
}

export interface StageEvent {
  explorationId: string;
  stage: number;
  status: StageStatus;
  message: string;
  timestamp: string;
}

export interface ExplorationEventMap {
  start: [StartEvent];
  progress: [ProgressEvent];
  log: [LogEvent];
  stage: [StageEvent];
}

/**
 * Fan observer calls out to several observers. A throwing observer is
 * logged at debug level and never interrupts the pipeline.
 */
export class ObserverSet implements PipelineObserver {
  private observers: PipelineObserver[];

  constructor(observers: PipelineObserver[] = []) {
    this.observers = [...observers];
  }

  add(observer: PipelineObserver): void {
    this.observers.push(observer);
  }

  onStart(explorationId: string): void {
    this.each(observer => observer.onStart?.(explorationId));
  }

  onProgress(message: string, percent: number): void {
    this.each(observer => observer.onProgress?.(message, percent));
  }

  onLog(message: string, level: EventLevel): void {
    this.each(observer => observer.onLog?.(message, level));
  }

  onStageChange(stage: number, status: StageStatus, message: string): void {
    this.each(observer => observer.onStageChange?.(stage, status, message));
  }

  private each(call: (observer: PipelineObserver) => void): void {
    for (const observer of this.observers) {
      try {
        call(observer);
      } catch (error) {
        logger.debug(`Observer failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

/**
 * Live-update transport for one exploration. Events are published in
 * production order with no replay: a listener attached late misses what
 * came before.
 */
export class ExplorationEvents extends EventEmitter<ExplorationEventMap> implements PipelineObserver {
  private explorationId = '';

  /**
   * Tag subsequent events with the exploration id.
   */
  onStart(explorationId: string): void {
    this.explorationId = explorationId;
    this.emit('start', { explorationId, timestamp: new Date().toISOString() });
  }

  onProgress(message: string, percent: number): void {
    this.emit('progress', { explorationId: this.explorationId, message, percent, timestamp: new Date().toISOString() });
  }

  onLog(message: string, level: EventLevel): void {
    this.emit('log', { explorationId: this.explorationId, message, level, timestamp: new Date().toISOString() });
  }

  onStageChange(stage: number, status: StageStatus, message: string): void {
    this.emit('stage', { explorationId: this.explorationId, stage, status, message, timestamp: new Date().toISOString() });
  }

  /**
   * Replay published events into an observer. Returns the detach function.
   */
  subscribe(observer: PipelineObserver): () => void {
    const onStart = (event: StartEvent) => observer.onStart?.(event.explorationId);
    const onProgress = (event: ProgressEvent) => observer.onProgress?.(event.message, event.percent);
    const onLog = (event: LogEvent) => observer.onLog?.(event.message, event.level);
    const onStage = (event: StageEvent) => observer.onStageChange?.(event.stage, event.status, event.message);

    this.on('start', onStart);
    this.on('progress', onProgress);
    this.on('log', onLog);
    this.on('stage', onStage);

    return () => {
      this.off('start', onStart);
      this.off('progress', onProgress);
      this.off('log', onLog);
      this.off('stage', onStage);
    };
  }
}
