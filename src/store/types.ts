// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type {
  ExplorationParams,
  ExplorationRecord,
  ExplorationStatus,
  JsonObject,
  ReportScores,
  StageStatus,
} from '../types.js';

/**
 * Changes applied to a stage record.
 * @property {string} [content] - Text captured from an agent stage.
 * @property {JsonObject} [data] - Structured content of the synthesis stage.
 */
export interface StageUpdate {
  status: StageStatus;
  content?: string;
  data?: JsonObject;
  error?: string;
}

/** Exploration with the scores of its result, when one exists. */
export interface ExplorationSummary extends ExplorationRecord {
  uxScore: number | null;
  complexityScore: number | null;
}

export interface ExplorationFilter {
  category?: string;
  persona?: string;
  status?: ExplorationStatus;
  limit?: number;
}

export interface ComparisonFilter {
  category?: string;
  persona?: string;
}

/** Result copied aside for cross-run comparison. */
export interface ComparisonSnapshot extends ReportScores {
  id: number;
  explorationId: string;
  snapshotName: string;
  appName: string;
  category: string;
  persona: string;
  keyMetrics: JsonObject;
  createdAt: string;
}

/**
 * Persistence operations the pipeline runner depends on.
 * Writes are keyed by exploration id, so concurrent runners never touch
 * each other's rows.
 */
export interface StageStore {
  /** Create an exploration in the pending state and return its id. */
  createExploration(params: ExplorationParams): string;

  /** Declare a stage in the pending state and return its id. */
  createStage(explorationId: string, stageNumber: number, stageName: string): number;

  /**
   * Apply an update to a stage. Completed and failed stages are
   * immutable; returns false when the update was refused.
   */
  updateStage(stageId: number, update: StageUpdate): boolean;

  updateExplorationStatus(explorationId: string, status: ExplorationStatus, error?: string): void;

  /** Record the index of the stage currently executing. */
  updateExplorationStage(explorationId: string, stageNumber: number): void;

  /** Text of every completed stage that captured content, by stage number. */
  getStageContents(explorationId: string): Map<number, string>;

  /** Insert or replace the single result of an exploration. */
  saveResult(explorationId: string, report: JsonObject, scores: ReportScores): void;

  /** Copy a saved result into the comparison table. */
  createComparisonSnapshot(explorationId: string, name?: string): ComparisonSnapshot;

  /** Run several writes atomically; a throw rolls all of them back. */
  transaction<T>(work: () => T): T;
}
