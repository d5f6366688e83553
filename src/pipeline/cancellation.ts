// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Cooperative cancellation for a single exploration.
 * The caller owns the flag; the runner and the agent invoker only poll it.
 */

import { logger } from '../logger.js';

/**
 * Callback for when cancellation is requested.
 */
export type CancellationCallback = (reason: string) => void;

/**
 * Set-once cancellation flag. Once set it stays set; start a new
 * exploration with a new flag.
 */
export class CancellationFlag {
  private requested = false;
  private reason: string | null = null;
  private callbacks: CancellationCallback[] = [];

  /**
   * Request cancellation. Subsequent calls are ignored.
   */
  request(reason: string = 'Stopped by user'): void {
    if (this.requested) {
      return;
    }

    this.requested = true;
    this.reason = reason;
    logger.debug(`Cancellation requested: ${reason}`);

    for (const callback of this.callbacks) {
      try {
        callback(reason);
      } catch (error) {
        logger.error(`Cancellation callback error: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  /**
   * Check if cancellation was requested.
   */
  isRequested(): boolean {
    return this.requested;
  }

  /**
   * Reason given to request(), or null while not requested.
   */
  getReason(): string | null {
    return this.reason;
  }

  /**
   * Register a callback fired once when cancellation is requested.
   * Returns a function that unregisters it.
   */
  onRequested(callback: CancellationCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      this.callbacks = this.callbacks.filter(cb => cb !== callback);
    };
  }
}

/**
 * Route a process signal to a cancellation flag. The first signal
 * requests cancellation; a second one calls onForce (typically exit).
 * Returns a function that detaches the listener.
 */
export function bindSignal(
  flag: CancellationFlag,
  signal: NodeJS.Signals = 'SIGINT',
  onForce: () => void = () => process.exit(130)
): () => void {
  const listener = (): void => {
    if (flag.isRequested()) {
      onForce();
      return;
    }
    flag.request('Stopped by user');
  };
  process.on(signal, listener);
  return () => {
    process.off(signal, listener);
  };
}
