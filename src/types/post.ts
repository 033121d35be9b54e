import type { PlatformId, PlatformSpec } from './platform.js';

export interface ContentPreferences {
  audience: string;
  tone: string;
  hashtags: string[];
}

export interface WebsiteContent {
  title: string;
  description: string;
  mainContent: string;
  url: string;
}

/** Built once per (URL, platform) pair and dropped after the post is adapted. */
export interface GenerationRequest {
  readonly sourceContent: WebsiteContent;
  readonly platform: PlatformSpec;
  readonly audience?: string;
  readonly tone?: string;
  readonly customHashtags: readonly string[];
}

export interface Post {
  readonly platform: PlatformId;
  readonly body: string;
  readonly hashtags: readonly string[];
  readonly truncated: boolean;
}

export type ValidationRule =
  | 'body-within-limit'
  | 'hashtags-well-formed'
  | 'hashtags-unique'
  | 'composed-within-limit';

export interface ValidationResult {
  valid: boolean;
  violations: ValidationRule[];
}

export interface PlatformResult {
  platform: PlatformSpec;
  post: Post;
  validation: ValidationResult;
}
