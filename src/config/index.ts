// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (WorkspaceConfig, ResolvedConfig)
 * - loader.ts    - File I/O and typed parsing of config files
 * - validator.ts - Config validation
 * - merger.ts    - Config merging with priority handling
 * - utils.ts     - Views of the resolved config for the runner and providers
 */

export type {
  AgentCommandConfig,
  PipelineConfig,
  WorkspaceConfig,
  ResolvedConfig,
} from './types.js';

export {
  CONFIG_FILES,
  loadGlobalConfig,
  loadWorkspaceConfig,
  parseWorkspaceConfig,
  initConfig,
} from './loader.js';
export type { LoadedConfig } from './loader.js';

export { validateConfig } from './validator.js';

export { DEFAULT_CONFIG, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

export { getExampleConfig, getPipelineSettings, getProviderConfig } from './utils.js';
