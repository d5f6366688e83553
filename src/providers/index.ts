// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { BaseProvider } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
import { MockProvider } from './mock.js';
import { ErrorCategory, UxploreError } from '../errors.js';
import { logger } from '../logger.js';
import type { ProviderConfig } from '../types.js';

export { BaseProvider } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
export { MockProvider } from './mock.js';

export interface CreateProviderOptions extends ProviderConfig {
  type: string;
}

/** Provider factory function type */
export type ProviderFactory = (options: CreateProviderOptions) => BaseProvider;

/** Registry of provider factories */
const providerFactories = new Map<string, ProviderFactory>();

providerFactories.set('anthropic', (options) => new AnthropicProvider(options));
providerFactories.set('openai', (options) => new OpenAICompatibleProvider(options));
providerFactories.set('ollama', (options) => createOllamaProvider(options));
providerFactories.set('mock', (options) => {
  const file = process.env.UXPLORE_MOCK_FILE;
  return file ? MockProvider.fromFile(file) : new MockProvider({ model: options.model });
});

/**
 * Get list of registered provider types.
 */
export function getProviderTypes(): string[] {
  return Array.from(providerFactories.keys());
}

/**
 * Factory function to create a provider based on type.
 * The type 'auto' picks a provider from the environment.
 */
export function createProvider(options: CreateProviderOptions): BaseProvider {
  if (options.type === 'auto') {
    return detectProvider(options);
  }

  const factory = providerFactories.get(options.type);
  if (!factory) {
    const available = getProviderTypes().join(', ');
    throw new UxploreError(`Unknown provider type: ${options.type}. Available: ${available}`, ErrorCategory.CONFIGURATION, [
      'Set "provider" in .uxplore.json or pass --provider',
    ]);
  }

  return factory(options);
}

/**
 * Detect the best available provider based on environment.
 */
export function detectProvider(config: ProviderConfig = {}): BaseProvider {
  if (process.env.ANTHROPIC_API_KEY) {
    logger.verbose('Using Anthropic provider (found ANTHROPIC_API_KEY)');
    return new AnthropicProvider(config);
  }

  if (process.env.OPENAI_API_KEY) {
    logger.verbose('Using OpenAI provider (found OPENAI_API_KEY)');
    return new OpenAICompatibleProvider(config);
  }

  logger.verbose('Using Ollama provider (no API keys found, assuming local)');
  return createOllamaProvider(config);
}
