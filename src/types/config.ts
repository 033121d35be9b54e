import type { PlatformId } from './platform.js';

export type LLMProvider = 'ollama' | 'anthropic';

export interface Link2PostConfig {
  llm: {
    provider: LLMProvider;
  };
  ollama?: {
    host: string;
    model: string;
  };
  anthropic?: {
    apiKey?: string;
    model: string;
    maxTokens?: number;
  };
  firecrawl?: {
    apiKey?: string;
    apiUrl?: string;
  };
  generation: {
    temperature?: number;
    audience?: string;
    tone?: string;
    platforms?: PlatformId[];
    hashtags?: string[];
    maxContentChars?: number;
  };
  output?: {
    dir?: string;
  };
}

export const DEFAULT_AUDIENCE = 'general professional audience';
export const DEFAULT_TONE = 'informative and engaging';

export const DEFAULT_CONFIG: Link2PostConfig = {
  llm: {
    provider: 'ollama',
  },
  ollama: {
    host: 'http://127.0.0.1:11434',
    model: 'llama3.1',
  },
  anthropic: {
    model: 'claude-3-5-sonnet-20241022',
    maxTokens: 4096,
  },
  firecrawl: {},
  generation: {
    temperature: 0.7,
    audience: DEFAULT_AUDIENCE,
    tone: DEFAULT_TONE,
    platforms: ['twitter', 'linkedin', 'facebook', 'instagram'],
    hashtags: [],
    maxContentChars: 12000,
  },
  output: {
    dir: 'outputs',
  },
};
