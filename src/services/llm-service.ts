import type { LLMProvider } from '../types/config.js';

/**
 * A text-generation backend. Post drafts for every platform go through
 * one of these; the platform adapter never talks to it.
 */
export interface LLMService {
  readonly provider: LLMProvider;

  /** Cheap reachability probe; never throws. */
  isAvailable(): Promise<boolean>;

  /**
   * @throws when the backend is unreachable or the model is missing
   */
  ensureAvailable(): Promise<void>;

  /** Complete a single prompt and return the raw text. */
  generate(prompt: string): Promise<string>;

  getModelName(): string;

  getTemperature(): number;
}
