// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Time-batched buffer for agent narration. Text accumulates in memory and
 * is handed to the sink on a fixed interval, so a chatty agent produces
 * one log event per interval instead of one per line.
 */

import { logger } from '../logger.js';

export type FlushSink = (text: string) => void;

export class OutputBuffer {
  private buffer = '';
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(
    private sink: FlushSink,
    private intervalMs: number
  ) {}

  /**
   * Start the periodic flush. The timer does not keep the process alive.
   */
  start(): void {
    if (this.timer || this.closed) {
      return;
    }
    this.timer = setInterval(() => this.flush(), this.intervalMs);
    this.timer.unref();
  }

  /**
   * Append text. Ignored once the buffer is closed.
   */
  write(text: string): void {
    if (this.closed) {
      return;
    }
    this.buffer += text;
  }

  /**
   * Hand buffered text to the sink. Whitespace-only content is dropped.
   * Sink errors are logged and never reach the writer.
   */
  flush(): void {
    const text = this.buffer.trim();
    this.buffer = '';
    if (!text) {
      return;
    }
    try {
      this.sink(text);
    } catch (error) {
      logger.debug(`Output sink failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Stop the timer and flush whatever remains. Safe to call twice.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.flush();
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
