// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error taxonomy for the exploration pipeline.
 * Every error carries a category and recovery suggestions for the CLI.
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  STAGE = 'stage',
  SYNTHESIS = 'synthesis',
  PROVIDER = 'provider',
  PROMPT = 'prompt',
  STORAGE = 'storage',
  CONFIGURATION = 'configuration',
  PIPELINE = 'pipeline',
  UNKNOWN = 'unknown',
}

/**
 * Base class for all uxplore errors.
 */
export class UxploreError extends Error {
  constructor(
    message: string,
    public category: ErrorCategory = ErrorCategory.UNKNOWN,
    public suggestions: string[] = [],
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'UxploreError';
  }

  /**
   * Format the full error with suggestions
   */
  getFullMessage(): string {
    let output = `❌ ${this.message}\n`;
    output += `\n📌 Category: ${this.category}\n`;

    if (this.suggestions.length > 0) {
      output += `\n💡 Suggestions:\n`;
      this.suggestions.forEach((suggestion, index) => {
        output += `   ${index + 1}. ${suggestion}\n`;
      });
    }

    if (this.retryable) {
      output += `\n🔄 This error is retryable. Start a new exploration with the same parameters.\n`;
    }

    return output;
  }
}

/**
 * An agent-driven stage failed or produced no usable content.
 */
export class StageExecutionError extends UxploreError {
  constructor(message: string, public stage: number) {
    super(message, ErrorCategory.STAGE, [
      'Check that the device is connected and the app is installed',
      'Run with --verbose to see the agent narration',
      'Increase --max-depth if the agent ran out of steps',
    ], true);
    this.name = 'StageExecutionError';
  }
}

/**
 * The synthesis completion could not be turned into a report document.
 */
export class SynthesisError extends UxploreError {
  constructor(message: string, public rawOutput?: string) {
    super(message, ErrorCategory.SYNTHESIS, [
      'Use a model that follows JSON output instructions reliably',
      'Run with --trace to inspect the raw completion',
    ], true);
    this.name = 'SynthesisError';
  }
}

/**
 * The completion provider failed.
 */
export class ProviderError extends UxploreError {
  constructor(message: string, public provider: string, public cause?: Error) {
    super(message, ErrorCategory.PROVIDER, [
      'Check your API key and quota limits',
      'Verify the provider endpoint is reachable',
      'Set maxRetries in the config to retry transient failures',
    ], true);
    this.name = 'ProviderError';
  }
}

/**
 * A prompt template referenced a placeholder that was not supplied.
 */
export class MissingPlaceholderError extends UxploreError {
  constructor(public placeholder: string, public template: string) {
    super(`Missing value for placeholder "{{${placeholder}}}" in template "${template}"`, ErrorCategory.PROMPT, [
      `Remove "{{${placeholder}}}" from the overriding template`,
      'Compare the template with the bundled version in prompts/',
    ]);
    this.name = 'MissingPlaceholderError';
  }
}

/**
 * A prompt template does not exist in any template directory.
 */
export class TemplateNotFoundError extends UxploreError {
  constructor(public template: string, searched: string[]) {
    super(`Prompt template not found: ${template} (searched ${searched.join(', ')})`, ErrorCategory.PROMPT, [
      'Check the template name for typos',
      'Ensure custom templates use the .txt extension',
    ]);
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * A persistence operation failed.
 */
export class StoreError extends UxploreError {
  constructor(message: string, public cause?: Error) {
    super(message, ErrorCategory.STORAGE, [
      'Check that the database path is writable',
      'Set "database" in the config to use a different location',
    ]);
    this.name = 'StoreError';
  }
}

/**
 * An unrecoverable pipeline problem such as an illegal state transition.
 */
export class PipelineError extends UxploreError {
  constructor(message: string, public explorationId?: string) {
    super(message, ErrorCategory.PIPELINE, ['Report this as a bug with the exploration id']);
    this.name = 'PipelineError';
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle error with user-friendly output
 */
export function describeError(error: unknown): string {
  if (error instanceof UxploreError) {
    return error.getFullMessage();
  }
  return new UxploreError(errorMessage(error)).getFullMessage();
}
