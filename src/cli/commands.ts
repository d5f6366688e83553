// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Actions behind the uxplore subcommands.
 */

import chalk from 'chalk';
import { CommandAgent } from '../agent/command-agent.js';
import {
  getPipelineSettings,
  getProviderConfig,
  initConfig,
  loadGlobalConfig,
  loadWorkspaceConfig,
  mergeConfig,
  validateConfig,
} from '../config/index.js';
import type { CLIOptions, ResolvedConfig } from '../config/index.js';
import { PIPELINE_CONFIG } from '../constants.js';
import { StageExecutionError, UxploreError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { bindSignal, CancellationFlag } from '../pipeline/cancellation.js';
import { ExplorationEvents } from '../pipeline/events.js';
import { PipelineRunner } from '../pipeline/runner.js';
import { CATEGORIES, PERSONAS } from '../pipeline/stages.js';
import { PromptStore } from '../prompts/store.js';
import { createProvider } from '../providers/index.js';
import { spinner } from '../spinner.js';
import { ExplorationDatabase } from '../store/database.js';
import type { ExplorationParams, RunOutcome } from '../types.js';
import { colorStatus, formatComparison, formatExplorationList, formatReport, formatStages } from './format.js';
import { ConsoleObserver } from './observer.js';

export interface GlobalOptions extends CLIOptions {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

export interface RunOptions {
  category?: string;
  persona?: string;
  navigation?: string;
  maxDepth?: string;
  saveToMemory?: boolean;
  id?: string;
}

/**
 * Load and merge configuration, reporting config warnings.
 */
export function resolveConfig(options: GlobalOptions): ResolvedConfig {
  const { config: globalConfig, configPath: globalPath } = loadGlobalConfig();
  const { config: workspaceConfig, configPath } = loadWorkspaceConfig();

  for (const [file, config] of [[globalPath, globalConfig], [configPath, workspaceConfig]] as const) {
    if (!config || !file) continue;
    const warnings = validateConfig(config);
    if (warnings.length > 0) {
      console.log(chalk.yellow(`Config warnings (${file}):`));
      for (const w of warnings) {
        console.log(chalk.yellow(`  - ${w}`));
      }
    }
    logger.verbose(`Config: ${file}`);
  }

  return mergeConfig(globalConfig, workspaceConfig, options);
}

/**
 * Open the database for a command and close it afterwards.
 */
function withDatabase<T>(config: ResolvedConfig, action: (db: ExplorationDatabase) => T): T {
  const db = new ExplorationDatabase(config.database);
  try {
    return action(db);
  } finally {
    db.close();
  }
}

/**
 * Parse --max-depth, falling back to the configured default.
 */
export function parseMaxDepth(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1 || depth > PIPELINE_CONFIG.MAX_DEPTH_LIMIT) {
    throw new UxploreError(`--max-depth must be an integer from 1 to ${PIPELINE_CONFIG.MAX_DEPTH_LIMIT}, got "${value}"`);
  }
  return depth;
}

/**
 * Build run parameters from the command line and configured defaults.
 */
export function buildRunParams(appName: string, options: RunOptions, config: ResolvedConfig): ExplorationParams {
  const navigation = options.navigation?.trim();
  return {
    id: options.id,
    appName: appName.trim(),
    category: options.category ?? config.defaults.category,
    persona: options.persona ?? config.defaults.persona,
    customNavigation: navigation ? navigation : undefined,
    maxDepth: parseMaxDepth(options.maxDepth, config.pipeline.maxDepth),
    saveToMemory: options.saveToMemory ?? false,
  };
}

function reportOutcome(outcome: RunOutcome): void {
  switch (outcome.status) {
    case 'completed':
      console.log(chalk.green(`\n✓ Exploration ${outcome.explorationId} completed`));
      console.log(chalk.bold(`UX score: ${outcome.scores.uxScore.toFixed(1)}   Complexity: ${outcome.scores.complexityScore.toFixed(1)}`));
      console.log(chalk.dim(`Run "uxplore show ${outcome.explorationId}" for the full report.`));
      break;
    case 'failed':
      console.error('\n' + new StageExecutionError(outcome.reason, outcome.stage).getFullMessage());
      process.exitCode = 1;
      break;
    case 'stopped':
      console.log(chalk.yellow(`\nExploration ${outcome.explorationId} stopped.`));
      process.exitCode = 130;
      break;
  }
}

export async function runCommand(appName: string, options: RunOptions, globals: GlobalOptions): Promise<void> {
  const config = resolveConfig(globals);
  const params = buildRunParams(appName, options, config);

  if (!(params.persona in PERSONAS)) {
    logger.warn(`Unknown persona "${params.persona}", using the UX Designer prompts`);
  }

  const db = new ExplorationDatabase(config.database);
  const provider = createProvider(getProviderConfig(config));
  const events = new ExplorationEvents();
  const detachConsole = events.subscribe(
    new ConsoleObserver(spinner, { showAgentOutput: Boolean(globals.verbose || globals.debug || globals.trace) })
  );
  const runner = new PipelineRunner({
    store: db,
    agent: new CommandAgent(config.agent),
    provider,
    prompts: PromptStore.withOverrides(config.promptsDir),
    observers: [events],
    settings: getPipelineSettings(config),
  });

  const cancellation = new CancellationFlag();
  cancellation.onRequested(() => {
    spinner.print(chalk.yellow('Stopping after the current step... (Ctrl+C again to force quit)'));
  });
  const detach = bindSignal(cancellation);

  logger.verbose(`Synthesis provider: ${provider.getName()} (${provider.getModel()})`);

  try {
    const outcome = await runner.run(params, cancellation);
    reportOutcome(outcome);
  } finally {
    spinner.stop();
    detach();
    detachConsole();
    db.close();
  }
}

export interface ListOptions {
  category?: string;
  persona?: string;
  limit?: string;
}

export function listCommand(options: ListOptions, globals: GlobalOptions): void {
  const config = resolveConfig(globals);
  const limit = options.limit === undefined ? undefined : Number(options.limit);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new UxploreError(`--limit must be a positive integer, got "${options.limit}"`);
  }
  const explorations = withDatabase(config, db =>
    db.listExplorations({ category: options.category, persona: options.persona, limit })
  );
  console.log(formatExplorationList(explorations));
}

export function showCommand(id: string | undefined, options: { json?: boolean }, globals: GlobalOptions): void {
  const config = resolveConfig(globals);
  withDatabase(config, db => {
    const result = id ? db.getResult(id) : db.getLatestResult();
    if (!result) {
      throw new UxploreError(id ? `No result for exploration ${id}` : 'No completed explorations yet');
    }
    if (options.json) {
      console.log(JSON.stringify(result.report, null, 2));
      return;
    }
    const exploration = db.getExploration(result.explorationId);
    if (exploration) {
      console.log(chalk.bold(`${exploration.appName} (${exploration.category}, ${exploration.persona})`) +
        chalk.dim(` [${exploration.id}] `) + colorStatus(exploration.status));
    }
    console.log(formatReport(result));
  });
}

export function stagesCommand(id: string, globals: GlobalOptions): void {
  const config = resolveConfig(globals);
  withDatabase(config, db => {
    const exploration = db.getExploration(id);
    if (!exploration) {
      throw new UxploreError(`Exploration not found: ${id}`);
    }
    console.log(chalk.bold(`${exploration.appName} `) + colorStatus(exploration.status));
    if (exploration.errorMessage) {
      console.log(chalk.red(exploration.errorMessage));
    }
    console.log('');
    console.log(formatStages(db.getStages(id)));
  });
}

export function compareCommand(options: { category?: string; persona?: string }, globals: GlobalOptions): void {
  const config = resolveConfig(globals);
  const snapshots = withDatabase(config, db =>
    db.getComparisonData({ category: options.category, persona: options.persona })
  );
  console.log(formatComparison(snapshots));
}

export function snapshotCommand(id: string, options: { name?: string }, globals: GlobalOptions): void {
  const config = resolveConfig(globals);
  const snapshot = withDatabase(config, db => db.createComparisonSnapshot(id, options.name));
  logger.success(`Saved snapshot "${snapshot.snapshotName}"`);
}

export function deleteCommand(id: string, globals: GlobalOptions): void {
  const config = resolveConfig(globals);
  const deleted = withDatabase(config, db => db.deleteExploration(id));
  if (!deleted) {
    throw new UxploreError(`Exploration not found: ${id}`);
  }
  logger.success(`Deleted exploration ${id}`);
}

export function personasCommand(): void {
  console.log(chalk.bold('Personas'));
  for (const persona of Object.keys(PERSONAS)) {
    console.log(`  ${persona}`);
  }
  console.log(chalk.bold('\nCategories'));
  for (const category of CATEGORIES) {
    console.log(`  ${category}`);
  }
}

export function initCommand(): void {
  const result = initConfig();
  if (!result.success) {
    throw new UxploreError(`${result.error ?? 'Could not write config'}: ${result.path}`);
  }
  logger.success(`Created ${result.path}`);
}

/**
 * Print an error with its suggestions and set a failing exit code.
 */
export function handleCommandError(error: unknown): void {
  spinner.stop();
  console.error(describeError(error));
  if (error instanceof Error) {
    logger.debug(error.stack ?? error.message);
  }
  process.exitCode = 1;
}
