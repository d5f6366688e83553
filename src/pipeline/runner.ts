// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Pipeline Runner
 *
 * Drives one exploration through its four stages: three agent passes
 * (basic, persona, stress) followed by a synthesis of their reports.
 * Owns every exploration and stage status transition.
 */

import { AgentInvoker, STOPPED_BY_USER } from '../agent/invoker.js';
import type { AgentOutcome, ExplorationAgent } from '../agent/types.js';
import { ResultAggregator } from '../analysis/aggregator.js';
import type { AggregatedResult } from '../analysis/aggregator.js';
import { PIPELINE_CONFIG } from '../constants.js';
import { PipelineError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { PromptBuilder } from '../prompts/builder.js';
import type { PromptContext } from '../prompts/builder.js';
import type { PromptStore } from '../prompts/store.js';
import type { BaseProvider } from '../providers/base.js';
import type { StageStore } from '../store/types.js';
import type { ExplorationParams, ExplorationStatus, RunOutcome, StageNumber } from '../types.js';
import { CancellationFlag } from './cancellation.js';
import { ObserverSet } from './events.js';
import type { EventLevel, PipelineObserver } from './events.js';
import {
  AGENT_STAGES,
  PROGRESS_ABORTED,
  PROGRESS_COMPLETE,
  STAGE_NAMES,
  STAGE_PROGRESS,
  TOTAL_STAGES,
  stageDisplayName,
} from './stages.js';
import type { AgentStage } from './stages.js';

/**
 * Tunables for a runner.
 */
export interface PipelineSettings {
  stepsPerDepth: number;
  stressStepBudget: number;
  pollIntervalMs: number;
  flushIntervalMs: number;
  /** Use the agent's reason as stage content when it gives no final answer. */
  useReasonAsContent: boolean;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  stepsPerDepth: PIPELINE_CONFIG.STEPS_PER_DEPTH,
  stressStepBudget: PIPELINE_CONFIG.STRESS_STEP_BUDGET,
  pollIntervalMs: PIPELINE_CONFIG.POLL_INTERVAL_MS,
  flushIntervalMs: PIPELINE_CONFIG.FLUSH_INTERVAL_MS,
  useReasonAsContent: false,
};

export interface PipelineRunnerOptions {
  store: StageStore;
  agent: ExplorationAgent;
  provider: BaseProvider;
  prompts: PromptStore;
  observers?: PipelineObserver[];
  settings?: Partial<PipelineSettings>;
}

/** Legal exploration status transitions. */
const TRANSITIONS: Record<ExplorationStatus, readonly ExplorationStatus[]> = {
  pending: ['running', 'failed', 'stopped'],
  running: ['completed', 'failed', 'stopped'],
  completed: [],
  failed: [],
  stopped: [],
};

/**
 * Mutable state of one run.
 */
interface RunState {
  explorationId: string;
  params: ExplorationParams;
  context: PromptContext;
  cancellation: CancellationFlag;
  status: ExplorationStatus;
  stageIds: Map<number, number>;
  activeStage: StageNumber | null;
}

/**
 * Step budget for an agent stage. The stress stage gets its fixed budget,
 * never more than the other stages.
 */
export function stepBudgetFor(stage: AgentStage, maxDepth: number, settings: PipelineSettings): number {
  const scaled = Math.max(1, maxDepth) * settings.stepsPerDepth;
  return stage === 3 ? Math.min(settings.stressStepBudget, scaled) : scaled;
}

export class PipelineRunner {
  private store: StageStore;
  private observer: ObserverSet;
  private settings: PipelineSettings;
  private prompts: PromptBuilder;
  private invoker: AgentInvoker;
  private aggregator: ResultAggregator;

  constructor(options: PipelineRunnerOptions) {
    this.store = options.store;
    this.observer = new ObserverSet(options.observers);
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...options.settings };
    this.prompts = new PromptBuilder(options.prompts);
    this.invoker = new AgentInvoker(options.agent, {
      pollIntervalMs: this.settings.pollIntervalMs,
      flushIntervalMs: this.settings.flushIntervalMs,
      useReasonAsContent: this.settings.useReasonAsContent,
      onLog: (message, level) => this.observer.onLog(message, level),
    });
    this.aggregator = new ResultAggregator(options.provider, this.prompts);
  }

  /**
   * Run one exploration to a terminal state.
   *
   * Stage failures and cancellation are reported through the outcome.
   * Store failures and illegal transitions are re-thrown after a
   * best-effort attempt to mark the exploration failed.
   */
  async run(params: ExplorationParams, cancellation: CancellationFlag = new CancellationFlag()): Promise<RunOutcome> {
    if (!params.appName.trim()) {
      throw new PipelineError('An application name is required');
    }
    if (!Number.isInteger(params.maxDepth) || params.maxDepth < 1) {
      throw new PipelineError(`Max depth must be a positive integer, got ${params.maxDepth}`);
    }

    const explorationId = this.store.createExploration(params);
    const state: RunState = {
      explorationId,
      params,
      context: {
        explorationId,
        appName: params.appName,
        category: params.category,
        persona: params.persona,
        customNavigation: params.customNavigation,
        maxDepth: params.maxDepth,
      },
      cancellation,
      status: 'pending',
      stageIds: new Map(),
      activeStage: null,
    };
    this.observer.onStart(explorationId);

    try {
      for (let stage = 1; stage <= TOTAL_STAGES; stage++) {
        const name = stage === 2 ? stageDisplayName(2, params.persona) : STAGE_NAMES[stageNumber(stage)];
        state.stageIds.set(stage, this.store.createStage(explorationId, stage, name));
      }

      this.emitLog(`Starting exploration ${explorationId} of ${params.appName} as ${params.persona}`, 'info');

      for (const stage of AGENT_STAGES) {
        if (cancellation.isRequested()) {
          return this.stop(state);
        }
        if (state.status === 'pending') {
          this.transition(state, 'running');
        }
        const failed = await this.runAgentStage(state, stage);
        if (failed) {
          return failed;
        }
      }

      if (cancellation.isRequested()) {
        return this.stop(state);
      }
      const outcome = await this.runSynthesisStage(state);

      if (outcome.status === 'completed' && params.saveToMemory) {
        this.saveSnapshot(state);
      }
      return outcome;
    } catch (error) {
      this.recordUnexpectedFailure(state, error);
      throw error;
    }
  }

  // ============================================
  // Stages
  // ============================================

  /**
   * Run one agent stage. Returns a terminal outcome when the run must
   * end here, or null to continue with the next stage.
   */
  private async runAgentStage(state: RunState, stage: AgentStage): Promise<RunOutcome | null> {
    const stageId = this.beginStage(state, stage);
    const started = Date.now();

    let outcome: AgentOutcome;
    try {
      const goal = this.prompts.buildStageGoal(stage, state.context);
      const budget = stepBudgetFor(stage, state.params.maxDepth, this.settings);
      outcome = await this.invoker.invoke(goal, budget, state.cancellation);
    } catch (error) {
      return this.failStage(state, stage, errorMessage(error), started);
    }

    if (outcome.status === 'cancelled') {
      this.finishStage(state, stage);
      this.store.updateStage(stageId, { status: 'failed', error: outcome.reason });
      this.observer.onStageChange(stage, 'failed', outcome.reason);
      logger.stageEnd(stage, STAGE_NAMES[stage], false, secondsSince(started));
      return this.stop(state);
    }
    if (!outcome.success) {
      return this.failStage(state, stage, outcome.reason || 'Agent execution failed', started);
    }
    if (!outcome.output) {
      return this.failStage(state, stage, 'Agent produced no output', started);
    }

    this.finishStage(state, stage);
    this.store.updateStage(stageId, { status: 'completed', content: outcome.output });
    this.observer.onStageChange(stage, 'completed', `${STAGE_NAMES[stage]} complete`);
    this.observer.onProgress(`Stage ${stage} complete`, STAGE_PROGRESS[stage].end);
    this.emitLog(`Stage ${stage} completed`, 'success');
    logger.stageEnd(stage, STAGE_NAMES[stage], true, secondsSince(started));
    return null;
  }

  /**
   * Stage 4: synthesize the stored stage reports into the final result.
   */
  private async runSynthesisStage(state: RunState): Promise<RunOutcome> {
    const stage = 4;
    const stageId = this.beginStage(state, stage);
    const started = Date.now();
    const stageTexts = this.store.getStageContents(state.explorationId);

    let aggregated: AggregatedResult;
    try {
      aggregated = await this.aggregator.aggregate(stageTexts, state.context);
    } catch (error) {
      return this.failStage(state, stage, errorMessage(error), started);
    }

    // Stage 4 stays active until the commit, so a rollback marks it failed.
    const previous = state.status;
    try {
      this.store.transaction(() => {
        this.store.updateStage(stageId, { status: 'completed', data: aggregated.report });
        this.store.saveResult(state.explorationId, aggregated.report, aggregated.scores);
        this.transition(state, 'completed');
      });
    } catch (error) {
      state.status = previous;
      throw error;
    }
    this.finishStage(state, stage);

    this.observer.onStageChange(stage, 'completed', 'Analysis complete');
    this.observer.onProgress('Exploration complete', PROGRESS_COMPLETE);
    this.emitLog(`Exploration ${state.explorationId} completed (UX score ${aggregated.scores.uxScore})`, 'success');
    logger.stageEnd(stage, STAGE_NAMES[stage], true, secondsSince(started));

    return {
      status: 'completed',
      explorationId: state.explorationId,
      result: aggregated.report,
      scores: aggregated.scores,
    };
  }

  /**
   * Record a stage as running and announce it.
   */
  private beginStage(state: RunState, stage: StageNumber): number {
    const stageId = this.stageIdOf(state, stage);
    const name = STAGE_NAMES[stage];

    this.store.updateExplorationStage(state.explorationId, stage);
    this.store.updateStage(stageId, { status: 'running' });
    state.activeStage = stage;

    logger.stageStart(stage, name, state.explorationId);
    this.observer.onStageChange(stage, 'running', `Starting ${name.toLowerCase()}...`);
    this.observer.onProgress(`Stage ${stage}: ${name}`, STAGE_PROGRESS[stage].start);
    return stageId;
  }

  private finishStage(state: RunState, stage: StageNumber): void {
    if (state.activeStage === stage) {
      state.activeStage = null;
    }
  }

  /**
   * Mark a stage and the exploration failed.
   */
  private failStage(state: RunState, stage: StageNumber, reason: string, started: number): RunOutcome {
    const stageId = this.stageIdOf(state, stage);
    const message = `Stage ${stage} (${STAGE_NAMES[stage]}) failed: ${reason}`;

    this.finishStage(state, stage);
    this.store.updateStage(stageId, { status: 'failed', error: reason });
    this.observer.onStageChange(stage, 'failed', reason);
    logger.stageEnd(stage, STAGE_NAMES[stage], false, secondsSince(started));

    this.transition(state, 'failed', message);
    this.emitLog(message, 'error');
    this.observer.onProgress(message, PROGRESS_ABORTED);
    return { status: 'failed', explorationId: state.explorationId, stage, reason: message };
  }

  /**
   * Mark the exploration stopped. Stages not yet started stay pending.
   */
  private stop(state: RunState): RunOutcome {
    const reason = state.cancellation.getReason() ?? STOPPED_BY_USER;
    this.transition(state, 'stopped', reason);
    this.emitLog(`Exploration ${state.explorationId} stopped: ${reason}`, 'warning');
    this.observer.onProgress('Exploration stopped', PROGRESS_ABORTED);
    return { status: 'stopped', explorationId: state.explorationId };
  }

  // ============================================
  // Helpers
  // ============================================

  private transition(state: RunState, next: ExplorationStatus, error?: string): void {
    if (!TRANSITIONS[state.status].includes(next)) {
      throw new PipelineError(
        `Illegal exploration transition ${state.status} → ${next}`,
        state.explorationId
      );
    }
    this.store.updateExplorationStatus(state.explorationId, next, error);
    state.status = next;
  }

  /**
   * Best effort: leave the records in a failed state when an unexpected
   * error escapes. A failure here is logged, the original error wins.
   */
  private recordUnexpectedFailure(state: RunState, error: unknown): void {
    const message = `Exploration aborted: ${errorMessage(error)}`;
    logger.error(message, error instanceof Error ? error : undefined);

    try {
      const stage = state.activeStage;
      const stageId = stage === null ? undefined : state.stageIds.get(stage);
      if (stageId !== undefined) {
        this.store.updateStage(stageId, { status: 'failed', error: errorMessage(error) });
      }
      if (TRANSITIONS[state.status].includes('failed')) {
        this.store.updateExplorationStatus(state.explorationId, 'failed', message);
        state.status = 'failed';
      }
    } catch (storeError) {
      logger.error(`Could not record failure of ${state.explorationId}: ${errorMessage(storeError)}`);
    }

    this.emitLog(message, 'error');
    this.observer.onProgress(message, PROGRESS_ABORTED);
  }

  private saveSnapshot(state: RunState): void {
    try {
      const snapshot = this.store.createComparisonSnapshot(state.explorationId);
      this.emitLog(`Saved comparison snapshot "${snapshot.snapshotName}"`, 'success');
    } catch (error) {
      const message = `Could not save comparison snapshot: ${errorMessage(error)}`;
      logger.warn(message);
      this.observer.onLog(message, 'warning');
    }
  }

  private stageIdOf(state: RunState, stage: StageNumber): number {
    const stageId = state.stageIds.get(stage);
    if (stageId === undefined) {
      throw new PipelineError(`Stage ${stage} was never created`, state.explorationId);
    }
    return stageId;
  }

  private emitLog(message: string, level: EventLevel): void {
    logger.verbose(message);
    this.observer.onLog(message, level);
  }
}

function stageNumber(value: number): StageNumber {
  if (value === 1 || value === 2 || value === 3 || value === 4) {
    return value;
  }
  throw new PipelineError(`No such stage: ${value}`);
}

function secondsSince(started: number): number {
  return (Date.now() - started) / 1000;
}
