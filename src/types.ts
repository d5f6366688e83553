// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

// ============================================
// JSON values
// ============================================

/** Any value representable in JSON. */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/** A JSON object with string keys. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Check whether a value is a plain JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// Explorations and stages
// ============================================

/** Overall lifecycle of one exploration. */
export type ExplorationStatus = 'pending' | 'running' | 'completed' | 'failed' | 'stopped';

/** Lifecycle of one of the four stages. */
export type StageStatus = 'pending' | 'running' | 'completed' | 'failed';

/** Stage numbers, 1-3 agent driven, 4 synthesis. */
export type StageNumber = 1 | 2 | 3 | 4;

/**
 * Parameters for a single exploration run.
 * @property {string} [id] - Caller-supplied identifier; generated when absent.
 * @property {string} [customNavigation] - Free text steering stages 2 and 3.
 * @property {number} maxDepth - Navigation depth hint, scales the step budget.
 * @property {boolean} saveToMemory - Snapshot the result for later comparison.
 */
export interface ExplorationParams {
  id?: string;
  appName: string;
  category: string;
  persona: string;
  customNavigation?: string;
  maxDepth: number;
  saveToMemory: boolean;
}

/** Persisted exploration record. */
export interface ExplorationRecord {
  id: string;
  appName: string;
  category: string;
  persona: string;
  customNavigation: string | null;
  maxDepth: number;
  saveToMemory: boolean;
  status: ExplorationStatus;
  currentStage: number;
  totalStages: number;
  errorMessage: string | null;
  createdAt: string;
  startedAt: string | null;
  updatedAt: string;
  completedAt: string | null;
}

/** Persisted stage record. */
export interface StageRecord {
  id: number;
  explorationId: string;
  stageNumber: number;
  stageName: string;
  status: StageStatus;
  content: string | null;
  data: JsonObject | null;
  errorMessage: string | null;
  startedAt: string | null;
  completedAt: string | null;
}

/** Scores derived from the synthesized report. */
export interface ReportScores {
  uxScore: number;
  complexityScore: number;
}

/** Persisted result record. */
export interface ResultRecord extends ReportScores {
  explorationId: string;
  report: JsonObject;
  createdAt: string;
}

/** Terminal outcome of a pipeline run. */
export type RunOutcome =
  | { status: 'completed'; explorationId: string; result: JsonObject; scores: ReportScores }
  | { status: 'failed'; explorationId: string; stage: StageNumber; reason: string }
  | { status: 'stopped'; explorationId: string };

// ============================================
// Providers
// ============================================

/**
 * Configuration shared by completion providers.
 * @property {number} [maxRetries] - Retries for transient failures; 0 disables.
 */
export interface ProviderConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}
