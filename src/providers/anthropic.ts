import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './base.js';
import type { ProviderConfig } from '../types.js';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const MAX_TOKENS = 4096;

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic;
  private model: string;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
      ...(config.baseUrl && { baseURL: config.baseUrl }),
    });
    this.model = config.model || DEFAULT_MODEL;
  }

  protected async doComplete(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.config.maxTokens ?? MAX_TOKENS,
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
      messages: [{ role: 'user', content: prompt }],
    });

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }
    return content;
  }

  getName(): string {
    return 'Anthropic';
  }

  getModel(): string {
    return this.model;
  }
}
