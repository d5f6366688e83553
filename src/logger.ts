// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for pipeline output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - stage transitions with timing */
  VERBOSE = 1,
  /** Debug - store writes, provider details */
  DEBUG = 2,
  /** Trace - full prompts and completions */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;
  private paused: boolean = false;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Pause all logging (used while a spinner owns the line).
   */
  pause(): void {
    this.paused = true;
  }

  /**
   * Resume logging.
   */
  resume(): void {
    this.paused = false;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return !this.paused && this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a stage starting at VERBOSE level.
   */
  stageStart(stage: number, name: string, explorationId: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.cyan(`\n▶ Stage ${stage}: ${name}`) + chalk.dim(` [${explorationId}]`));
    }
  }

  /**
   * Log a stage finishing at VERBOSE level.
   */
  stageEnd(stage: number, name: string, succeeded: boolean, durationSeconds: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const duration = durationSeconds.toFixed(1);
      if (succeeded) {
        console.log(chalk.green(`✓ Stage ${stage}: ${name}`) + chalk.dim(` (${duration}s)`));
      } else {
        console.log(chalk.red(`✗ Stage ${stage}: ${name}`) + chalk.dim(` (failed, ${duration}s)`));
      }
    }
  }

  /**
   * Log an agent invocation at DEBUG level.
   */
  agentInvocation(goalLength: number, stepBudget: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Agent] Starting run (${goalLength} chars goal, ${stepBudget} steps)`));
    }
  }

  /**
   * Log a completion request at DEBUG level.
   */
  completionRequest(model: string, promptLength: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[API] Sending to ${model} (${promptLength.toLocaleString()} chars)...`));
    }
  }

  /**
   * Log a completion response at DEBUG level.
   */
  completionResponse(length: number, durationSeconds: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[API] Response: ${length.toLocaleString()} chars, ${durationSeconds.toFixed(2)}s`));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log a full prompt or completion body at TRACE level.
   */
  payload(label: string, text: string, maxLength: number = 500): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      const truncated = text.length > maxLength ? text.slice(0, maxLength) + '...' : text;
      console.log(chalk.gray('\n' + '='.repeat(60)));
      console.log(chalk.gray(`[${label}] ${text.length} chars`));
      console.log(chalk.gray('='.repeat(60)));
      console.log(chalk.gray(`  "${this.sanitize(truncated)}"`));
      console.log(chalk.gray('='.repeat(60) + '\n'));
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    console.log(chalk.blue(`Info: ${message}`));
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
