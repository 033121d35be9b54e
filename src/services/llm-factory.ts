import type { Link2PostConfig } from '../types/config.js';
import type { LLMService } from './llm-service.js';
import { OllamaService } from './ollama.js';
import { AnthropicService } from './anthropic.js';

export function createLLMService(config: Link2PostConfig): LLMService {
  switch (config.llm.provider) {
    case 'ollama':
      return new OllamaService(config);
    case 'anthropic':
      return new AnthropicService(config);
  }
}
