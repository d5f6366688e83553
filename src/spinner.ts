// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Centralized spinner management using ora for progress of a running
 * exploration.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { logger } from './logger.js';

/**
 * Manages a single spinner instance with TTY detection and state management.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean = true;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isSpinning(): boolean {
    return this.spinner !== null;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    try {
      if (this.spinner) {
        this.spinner.stop();
      }

      this.spinner = ora({
        text,
        color: 'cyan',
        spinner: 'dots',
        discardStdin: false, // Ctrl+C must still reach the SIGINT handler
      }).start();
    } catch (error) {
      logger.debug(`Spinner unavailable: ${error instanceof Error ? error.message : String(error)}`);
      this.spinner = null;
    }
  }

  /**
   * Update the spinner text, starting it if needed.
   */
  update(text: string): void {
    if (!this.isEnabled()) return;
    if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.start(text);
    }
  }

  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Print a line above the spinner without disturbing it.
   */
  print(line: string): void {
    if (this.spinner) {
      this.spinner.clear();
      console.log(line);
      this.spinner.render();
    } else {
      console.log(line);
    }
  }

  // ============================================
  // Convenience methods for pipeline stages
  // ============================================

  /**
   * Show progress of a running exploration.
   */
  progress(message: string, percent: number): void {
    this.update(`${chalk.cyan(`[${String(percent).padStart(3)}%]`)} ${message}`);
  }

  stageStart(stage: number, name: string): void {
    this.update(chalk.yellow(`Stage ${stage}/4: ${name}...`));
  }

  stageSucceed(stage: number, name: string): void {
    this.succeed(chalk.green(`✓ Stage ${stage}: ${name}`));
  }

  stageFail(stage: number, reason: string): void {
    this.fail(chalk.red(`✗ Stage ${stage}`) + chalk.dim(` (${reason})`));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
