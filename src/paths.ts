// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management for uxplore.
 *
 * All ~/.uxplore paths and the bundled resource directories are defined
 * here. Each getter computes its path at call time so tests can redirect
 * them through environment variables.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';

/**
 * Get the base uxplore directory.
 * Supports override via UXPLORE_HOME environment variable.
 */
export function getUxploreHome(): string {
  if (process.env.UXPLORE_HOME) {
    return process.env.UXPLORE_HOME;
  }
  return join(homedir(), '.uxplore');
}

/**
 * Locate the package root (the directory holding package.json).
 * Works from both src/ and the compiled dist/src/ layout.
 */
export function getPackageRoot(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error('Could not locate the uxplore package root');
    }
    dir = parent;
  }
  return dir;
}

export const UxplorePaths = {
  /**
   * Base directory (~/.uxplore)
   */
  home: (): string => getUxploreHome(),

  /**
   * Global config file
   */
  globalConfig: (): string => join(getUxploreHome(), 'config.json'),

  /**
   * Default SQLite database holding explorations and results
   */
  database: (): string => join(getUxploreHome(), 'uxplore.db'),

  // ============================================
  // Bundled resources
  // ============================================

  /**
   * Prompt templates shipped with the package
   */
  bundledPrompts: (): string => join(getPackageRoot(), 'prompts'),

  /**
   * User prompt overrides. UXPLORE_PROMPTS_DIR takes precedence.
   */
  userPrompts: (): string => process.env.UXPLORE_PROMPTS_DIR || join(getUxploreHome(), 'prompts'),

  /**
   * Static data files (report defaults, categories)
   */
  data: (): string => join(getPackageRoot(), 'data'),
} as const;

/**
 * Ensure a specific directory exists.
 * Creates parent directories as needed.
 */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}
