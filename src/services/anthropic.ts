import Anthropic from '@anthropic-ai/sdk';
import type { Link2PostConfig } from '../types/config.js';
import type { LLMService } from './llm-service.js';
import { ConfigError, EmptyResponseError, LLMNotAvailableError, MissingApiKeyError } from '../utils/errors.js';

const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';

export class AnthropicService implements LLMService {
  readonly provider = 'anthropic';
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private lastError: Error | null = null;

  constructor(config: Link2PostConfig) {
    if (!config.anthropic) {
      throw new ConfigError('Anthropic configuration not found in config');
    }

    const apiKey = config.anthropic.apiKey;
    if (!apiKey) {
      throw new MissingApiKeyError('Anthropic', 'ANTHROPIC_API_KEY');
    }

    this.model = config.anthropic.model || DEFAULT_MODEL;
    this.maxTokens = config.anthropic.maxTokens ?? 4096;
    this.temperature = config.generation.temperature ?? 0.7;
    this.client = new Anthropic({ apiKey });
  }

  async isAvailable(): Promise<boolean> {
    try {
      // Minimal request to test the key and model
      await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch (error) {
      this.lastError = error instanceof Error ? error : new Error(String(error));
      return false;
    }
  }

  async ensureAvailable(): Promise<void> {
    const available = await this.isAvailable();
    if (available) {
      return;
    }

    const error = this.lastError;
    let errorMsg = '';

    if (error) {
      const errorStr = error.toString();

      if (errorStr.includes('401') || errorStr.includes('authentication')) {
        errorMsg += '✗ Authentication failed: Invalid API key\n';
        errorMsg += '  - Check ANTHROPIC_API_KEY in your .env file or environment\n';
      } else if (errorStr.includes('model')) {
        errorMsg += `✗ Model not found: ${this.model}\n`;
        errorMsg += '  - Check anthropic.model in .link2postrc.json\n';
      } else if (errorStr.includes('network') || errorStr.includes('ENOTFOUND')) {
        errorMsg += '✗ Network error: Cannot reach Anthropic API\n';
        errorMsg += '  - Check your internet connection\n';
      } else {
        errorMsg += `✗ Error: ${error.message}\n`;
      }
    }

    throw new LLMNotAvailableError('Anthropic', errorMsg, { cause: error ?? undefined });
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: [
        {
          role: 'user',
          content: prompt,
        },
      ],
    });

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    if (text.length === 0) {
      throw new EmptyResponseError('Anthropic');
    }
    return text;
  }

  getModelName(): string {
    return this.model;
  }

  getTemperature(): number {
    return this.temperature;
  }
}
