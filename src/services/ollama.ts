import { Ollama } from 'ollama';
import type { Link2PostConfig } from '../types/config.js';
import type { LLMService } from './llm-service.js';
import { ConfigError, OllamaNotAvailableError, ModelNotFoundError, errorMessage } from '../utils/errors.js';

export class OllamaService implements LLMService {
  readonly provider = 'ollama';
  private client: Ollama;
  private model: string;
  private temperature: number;

  constructor(config: Link2PostConfig) {
    if (!config.ollama) {
      throw new ConfigError('Ollama configuration not found in config');
    }

    this.model = config.ollama.model;
    this.temperature = config.generation.temperature ?? 0.7;
    this.client = new Ollama({
      host: config.ollama.host,
    });
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.list();
      return true;
    } catch {
      return false;
    }
  }

  async checkModel(): Promise<boolean> {
    try {
      const models = await this.client.list();
      return models.models.some((m) => m.name.includes(this.model));
    } catch {
      return false;
    }
  }

  async ensureAvailable(): Promise<void> {
    const available = await this.isAvailable();
    if (!available) {
      throw new OllamaNotAvailableError();
    }

    const hasModel = await this.checkModel();
    if (!hasModel) {
      throw new ModelNotFoundError(this.model);
    }
  }

  async generate(prompt: string): Promise<string> {
    try {
      const response = await this.client.generate({
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: this.temperature,
        },
      });

      return response.response;
    } catch (error) {
      if (errorMessage(error).includes('model')) {
        throw new ModelNotFoundError(this.model);
      }
      throw error;
    }
  }

  getModelName(): string {
    return this.model;
  }

  getTemperature(): number {
    return this.temperature;
  }
}
