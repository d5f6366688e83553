// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Mock Provider for Testing
 *
 * A configurable mock provider that returns scripted completions
 * for deterministic runs without real API calls.
 *
 * Supports two modes:
 * 1. In-process: Pass responses directly to constructor
 * 2. File-based: Load responses from a JSON file (UXPLORE_MOCK_FILE)
 */

import { readFileSync, existsSync } from 'fs';
import { BaseProvider } from './base.js';
import { isJsonObject } from '../types.js';

/**
 * A single mock response configuration.
 */
export interface MockResponse {
  /** Text content to return */
  content?: string;
  /** Simulate an error */
  error?: Error;
  /** Resolve after this many milliseconds */
  delayMs?: number;
}

/**
 * Configuration for MockProvider.
 */
export interface MockProviderConfig {
  /** Queue of responses to return in order */
  responses?: MockResponse[];
  /** Default response when queue is empty */
  defaultResponse?: string;
  /** Model name to report (default: 'mock-model') */
  model?: string;
}

/**
 * Record of a single call to the provider.
 */
export interface MockCall {
  prompt: string;
  timestamp: Date;
}

/**
 * Mock provider for testing.
 */
export class MockProvider extends BaseProvider {
  private responseQueue: MockResponse[];
  private defaultResponse: string;
  private modelName: string;
  private callHistory: MockCall[] = [];

  /**
   * Load mock configuration from a JSON file of the form
   * { "responses": [{ "content": "..." } | { "error": "..." }], "defaultResponse": "..." }.
   */
  static loadFromFile(filePath: string): MockProviderConfig {
    if (!existsSync(filePath)) {
      throw new Error(`Mock responses file not found: ${filePath}`);
    }

    const data: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    if (!isJsonObject(data)) {
      throw new Error(`Mock responses file must contain a JSON object: ${filePath}`);
    }

    const responses: MockResponse[] = [];
    if (Array.isArray(data.responses)) {
      for (const entry of data.responses) {
        if (!isJsonObject(entry)) continue;
        if (typeof entry.error === 'string') {
          responses.push({ error: new Error(entry.error) });
        } else if (typeof entry.content === 'string') {
          responses.push({ content: entry.content });
        }
      }
    }

    return {
      responses,
      defaultResponse: typeof data.defaultResponse === 'string' ? data.defaultResponse : undefined,
      model: typeof data.model === 'string' ? data.model : undefined,
    };
  }

  /**
   * Create a MockProvider from a responses file.
   */
  static fromFile(filePath: string): MockProvider {
    return new MockProvider(MockProvider.loadFromFile(filePath));
  }

  constructor(config: MockProviderConfig = {}) {
    super({});
    this.responseQueue = [...(config.responses || [])];
    this.defaultResponse = config.defaultResponse || 'Mock response';
    this.modelName = config.model || 'mock-model';
  }

  /**
   * Add responses to the queue.
   */
  addResponses(responses: MockResponse[]): void {
    this.responseQueue.push(...responses);
  }

  /**
   * Get the call history.
   */
  getCallHistory(): MockCall[] {
    return [...this.callHistory];
  }

  /**
   * Get the most recent call.
   */
  getLastCall(): MockCall | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  /**
   * Get call count.
   */
  getCallCount(): number {
    return this.callHistory.length;
  }

  /**
   * Reset the provider state.
   */
  reset(): void {
    this.callHistory = [];
    this.responseQueue = [];
  }

  protected async doComplete(prompt: string): Promise<string> {
    this.callHistory.push({ prompt, timestamp: new Date() });

    const next = this.responseQueue.shift() ?? { content: this.defaultResponse };
    if (next.delayMs) {
      await new Promise(resolve => setTimeout(resolve, next.delayMs));
    }
    if (next.error) {
      throw next.error;
    }
    return next.content ?? '';
  }

  getName(): string {
    return 'Mock';
  }

  getModel(): string {
    return this.modelName;
  }
}
