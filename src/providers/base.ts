// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { ProviderConfig } from '../types.js';
import { ProviderError } from '../errors.js';
import { logger } from '../logger.js';
import { withRetry } from './retry.js';

/**
 * Abstract base class for completion providers.
 * Implement doComplete() to add support for a new model backend.
 */
export abstract class BaseProvider {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Send a single prompt and return the completion text.
   * Transient failures are retried up to config.maxRetries times (default 0).
   * @throws ProviderError when the backend fails
   */
  async complete(prompt: string): Promise<string> {
    const started = Date.now();
    logger.completionRequest(this.getModel(), prompt.length);
    logger.payload('Prompt', prompt);

    try {
      const text = await withRetry(() => this.doComplete(prompt), {
        maxRetries: this.config.maxRetries ?? 0,
        onRetry: (attempt, error, delayMs) => {
          logger.warn(`${this.getName()} request failed (${error.message}), retry ${attempt} in ${delayMs}ms`);
        },
      });
      logger.completionResponse(text.length, (Date.now() - started) / 1000);
      logger.payload('Completion', text);
      return text;
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`${this.getName()} completion failed: ${cause.message}`, this.getName(), cause);
    }
  }

  /**
   * Backend-specific completion call.
   */
  protected abstract doComplete(prompt: string): Promise<string>;

  /**
   * Get the name of this provider for display purposes.
   */
  abstract getName(): string;

  /**
   * Get the current model being used.
   */
  abstract getModel(): string;
}
