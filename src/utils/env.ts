import type { Link2PostConfig } from '../types/config.js';

export type Environment = Record<string, string | undefined>;

/**
 * Copy secrets and host overrides from the environment into a config.
 * Environment values win over the config file. The input is not modified.
 */
export function applyEnvironment(config: Link2PostConfig, env: Environment): Link2PostConfig {
  const result: Link2PostConfig = structuredClone(config);

  if (env.FIRECRAWL_API_KEY) {
    result.firecrawl = { ...result.firecrawl, apiKey: env.FIRECRAWL_API_KEY };
  }
  if (env.FIRECRAWL_API_URL) {
    result.firecrawl = { ...result.firecrawl, apiUrl: env.FIRECRAWL_API_URL };
  }
  if (env.ANTHROPIC_API_KEY && result.anthropic) {
    result.anthropic = { ...result.anthropic, apiKey: env.ANTHROPIC_API_KEY };
  }
  if (env.OLLAMA_HOST && result.ollama) {
    result.ollama = { ...result.ollama, host: env.OLLAMA_HOST };
  }

  return result;
}
