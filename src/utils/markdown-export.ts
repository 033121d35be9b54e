import { join } from 'path';
import type { ContentPreferences, PlatformResult } from '../types/post.js';
import type { FileSystemService } from '../services/file-system.js';
import { composePostText } from '../services/platform-adapter.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** 2024-03-09 14:05:07 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** social_media_posts_20240309_140507.md */
export function outputFileName(date: Date): string {
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `social_media_posts_${stamp}.md`;
}

export function renderPostsMarkdown(
  url: string,
  preferences: ContentPreferences,
  results: readonly PlatformResult[],
  generatedAt: Date
): string {
  const lines = [
    '# Generated Social Media Posts',
    '',
    `**Source URL:** ${url}`,
    `**Generated at:** ${formatTimestamp(generatedAt)}`,
    `**Target Audience:** ${preferences.audience}`,
    `**Content Tone:** ${preferences.tone}`,
    '',
    '## Generated Posts',
  ];

  for (const { platform, post } of results) {
    const text = composePostText(post);
    lines.push(
      '',
      `### ${platform.displayName}`,
      '',
      '```',
      text,
      '```',
      '',
      `**Hashtags:** ${post.hashtags.length > 0 ? post.hashtags.join(' ') : '(none)'}`,
      `**Characters:** ${text.length} / ${platform.characterLimit}${post.truncated ? ' (truncated)' : ''}`
    );
  }

  return lines.join('\n') + '\n';
}

/** Write the report under `dir` and return its path. */
export function savePostsMarkdown(
  fs: FileSystemService,
  dir: string,
  url: string,
  preferences: ContentPreferences,
  results: readonly PlatformResult[],
  generatedAt: Date = new Date()
): string {
  fs.ensureDirectory(dir);
  const filePath = join(dir, outputFileName(generatedAt));
  fs.writeFile(filePath, renderPostsMarkdown(url, preferences, results, generatedAt));
  return filePath;
}
