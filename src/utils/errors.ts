export class Link2PostError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'Link2PostError';
  }
}

export class EmptyContentError extends Link2PostError {
  constructor() {
    super('Nothing to adapt: generated text is empty');
    this.name = 'EmptyContentError';
  }
}

export class UnknownPlatformError extends Link2PostError {
  readonly platform: string;

  constructor(platform: string, available: readonly string[]) {
    super(`Unknown platform "${platform}". Available: ${available.join(', ')}`);
    this.name = 'UnknownPlatformError';
    this.platform = platform;
  }
}

export class InvalidUrlError extends Link2PostError {
  constructor(url: string) {
    super(`Invalid URL: "${url}". Use a full http(s) address, e.g. https://example.com`);
    this.name = 'InvalidUrlError';
  }
}

export class FetchError extends Link2PostError {
  readonly url: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to fetch ${url}: ${reason}`, options);
    this.name = 'FetchError';
    this.url = url;
  }
}

export class GenerationError extends Link2PostError {
  readonly platform: string;

  constructor(platform: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to generate ${platform} post: ${reason}`, options);
    this.name = 'GenerationError';
    this.platform = platform;
  }
}

export class OllamaNotAvailableError extends Link2PostError {
  constructor() {
    super(
      'Ollama is not available. Please ensure Ollama is running.\n\nInstall: https://ollama.ai\nStart: ollama serve'
    );
    this.name = 'OllamaNotAvailableError';
  }
}

export class ModelNotFoundError extends Link2PostError {
  constructor(model: string) {
    super(`Model '${model}' not found. Run: ollama pull ${model}`);
    this.name = 'ModelNotFoundError';
  }
}

export class LLMNotAvailableError extends Link2PostError {
  readonly provider: string;

  constructor(provider: string, detail: string, options?: { cause?: unknown }) {
    super(`${provider} API is not available.\n${detail}`, options);
    this.name = 'LLMNotAvailableError';
    this.provider = provider;
  }
}

export class EmptyResponseError extends Link2PostError {
  constructor(provider: string) {
    super(`No text content in ${provider} response`);
    this.name = 'EmptyResponseError';
  }
}

export class MissingApiKeyError extends Link2PostError {
  constructor(provider: string, envVar: string) {
    super(`${provider} API key not found. Set ${envVar} in your environment or .env file.`);
    this.name = 'MissingApiKeyError';
  }
}

export class ConfigError extends Link2PostError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class FileSystemError extends Link2PostError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`File system error: ${message}`, options);
    this.name = 'FileSystemError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
