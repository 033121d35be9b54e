import type { PlatformId } from '../types/platform.js';
import type { GenerationRequest } from '../types/post.js';
import type { LLMService } from './llm-service.js';
import { GenerationError, errorMessage } from '../utils/errors.js';
import { clip } from '../utils/text.js';

export const DEFAULT_SYSTEM_PROMPT = `You are a social media content expert. Your job is to create engaging, platform-optimized posts from website content.
Follow these guidelines:
1. Tailor the post to the platform's style and stay within its character limit
2. Include relevant hashtags (max 5) that will increase visibility
3. Add a compelling call-to-action with the website URL
4. Adapt the content to the specified target audience and tone
5. If the author or publication date is known, reference it to add credibility`;

const PLATFORM_STYLE: Record<PlatformId, string> = {
  twitter: 'Short and punchy. One idea, one link. No markdown.',
  linkedin: 'Professional. Short paragraphs with generous line breaks. Open with a strong first line.',
  facebook: 'Conversational. Invite comments with a question. Moderate length.',
  instagram: 'Visual and personal. Emojis welcome. Hashtags at the end.',
};

export interface PostGeneratorOptions {
  systemPrompt?: string;
  maxContentChars?: number;
}

export function buildPostPrompt(systemPrompt: string, request: GenerationRequest, maxContentChars: number): string {
  const { sourceContent: content, platform } = request;
  const hashtagLine = request.customHashtags.length > 0
    ? `\nAlways include these hashtags: ${request.customHashtags.join(' ')}`
    : '';

  return `${systemPrompt}

PLATFORM:
${platform.displayName} (at most ${platform.characterLimit} characters)
Style: ${PLATFORM_STYLE[platform.identifier]}

AUDIENCE:
${request.audience ?? 'general audience'}

TONE:
${request.tone ?? 'neutral'}${hashtagLine}

WEBSITE CONTENT:
Title: ${content.title}
Description: ${content.description}
URL: ${content.url}

${clip(content.mainContent, maxContentChars)}

Write a SINGLE ${platform.displayName} post. Reply with the post text only.`;
}

/**
 * Strip wrappers models like to add around the answer: code fences,
 * a "Post:" label, surrounding quotes.
 */
export function cleanResponse(response: string): string {
  let text = response.trim();

  const fenced = text.match(/^```[\w-]*\n([\s\S]*?)\n```$/);
  if (fenced) {
    text = fenced[1].trim();
  }

  text = text.replace(/^(?:\*\*)?post:(?:\*\*)?\s*/i, '');

  if (text.length >= 2 && /^["“]/.test(text) && /["”]$/.test(text)) {
    text = text.slice(1, -1).trim();
  }

  return text;
}

export class PostGenerator {
  private systemPrompt: string;
  private maxContentChars: number;

  constructor(
    private llm: LLMService,
    options: PostGeneratorOptions = {}
  ) {
    this.systemPrompt = options.systemPrompt?.trim() || DEFAULT_SYSTEM_PROMPT;
    this.maxContentChars = options.maxContentChars ?? 12000;
  }

  /**
   * @throws GenerationError wrapping whatever the LLM backend raised
   */
  async generate(request: GenerationRequest): Promise<string> {
    const prompt = buildPostPrompt(this.systemPrompt, request, this.maxContentChars);

    let response: string;
    try {
      response = await this.llm.generate(prompt);
    } catch (error) {
      throw new GenerationError(request.platform.identifier, errorMessage(error), { cause: error });
    }

    return cleanResponse(response);
  }
}
