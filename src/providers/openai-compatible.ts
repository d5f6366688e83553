import OpenAI from 'openai';
import { BaseProvider } from './base.js';
import type { ProviderConfig } from '../types.js';

const DEFAULT_MODEL = 'gpt-4o';
const DEFAULT_OLLAMA_MODEL = 'llama3.2';
const MAX_TOKENS = 4096;

// Models that use max_completion_tokens instead of max_tokens
const COMPLETION_TOKEN_MODELS = ['gpt-5', 'o1', 'o3'];

/**
 * OpenAI-compatible provider that works with:
 * - OpenAI API
 * - Ollama (via OpenAI compatibility layer)
 * - OpenRouter, vLLM and other OpenAI-compatible servers
 */
export class OpenAICompatibleProvider extends BaseProvider {
  private client: OpenAI;
  private model: string;
  private providerName: string;

  constructor(config: ProviderConfig & { providerName?: string } = {}) {
    super(config);
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY || 'not-needed',
      baseURL: config.baseUrl,
    });
    this.model = config.model || DEFAULT_MODEL;
    this.providerName = config.providerName || 'OpenAI';
  }

  private getTokenParams(): { max_tokens?: number; max_completion_tokens?: number } {
    const maxTokens = this.config.maxTokens ?? MAX_TOKENS;
    const usesCompletionTokens = COMPLETION_TOKEN_MODELS.some(m => this.model.startsWith(m));
    return usesCompletionTokens
      ? { max_completion_tokens: maxTokens }
      : { max_tokens: maxTokens };
  }

  protected async doComplete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      ...this.getTokenParams(),
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
      messages: [{ role: 'user', content: prompt }],
    });

    return response.choices[0]?.message?.content ?? '';
  }

  getName(): string {
    return this.providerName;
  }

  getModel(): string {
    return this.model;
  }
}

/**
 * Create a provider for a local Ollama server.
 */
export function createOllamaProvider(config: ProviderConfig = {}): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider({
    ...config,
    baseUrl: config.baseUrl || process.env.OLLAMA_HOST || 'http://localhost:11434/v1',
    apiKey: 'ollama',
    model: config.model || DEFAULT_OLLAMA_MODEL,
    providerName: 'Ollama',
  });
}
