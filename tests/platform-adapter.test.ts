import { describe, it, expect } from 'vitest';
import { adapt, composePostText, trailingHashtags, validate } from '../src/services/platform-adapter.js';
import { PLATFORM_IDS, PLATFORM_SPECS } from '../src/types/platform.js';
import type { Post } from '../src/types/post.js';
import { EmptyContentError, UnknownPlatformError } from '../src/utils/errors.js';
import { hashtagKey } from '../src/utils/hashtags.js';
import { ELLIPSIS } from '../src/utils/text.js';
import { seededRandom } from './fakes.js';

const twitter = PLATFORM_SPECS.twitter;
const linkedin = PLATFORM_SPECS.linkedin;

describe('adapt', () => {
  it('keeps a short post as-is and appends custom hashtags to the list', () => {
    const post = adapt('Check out our launch! #launch #ai', linkedin, ['#startup']);

    expect(post).toEqual({
      platform: 'linkedin',
      body: 'Check out our launch! #launch #ai',
      hashtags: ['#launch', '#ai', '#startup'],
      truncated: false,
    });
  });

  it('truncates a 300 character post for twitter at a word boundary', () => {
    const raw = 'abcdefghi '.repeat(30);
    expect(raw.length).toBe(300);

    const post = adapt(raw, twitter);

    expect(post.truncated).toBe(true);
    expect(post.body.length).toBe(280);
    expect(post.body.endsWith(`abcdefghi${ELLIPSIS}`)).toBe(true);
    expect(post.hashtags).toEqual([]);
  });

  it('rejects empty and whitespace-only text', () => {
    expect(() => adapt('', twitter)).toThrow(EmptyContentError);
    expect(() => adapt('  \n\t ', twitter)).toThrow(EmptyContentError);
  });

  it('rejects platforms outside the fixed set', () => {
    expect(() => adapt('hello', { identifier: 'mastodon', characterLimit: 500 })).toThrow(UnknownPlatformError);
  });

  it('rejects a known platform with a different limit', () => {
    expect(() => adapt('hello', { identifier: 'twitter', characterLimit: 500 })).toThrow(UnknownPlatformError);
  });

  it('deduplicates hashtags case-insensitively keeping the first spelling', () => {
    const post = adapt('Go #TypeScript! Yes #typescript and #Node', linkedin, ['#node', 'typeSCRIPT', 'deno']);

    expect(post.hashtags).toEqual(['#TypeScript', '#Node', '#deno']);
  });

  it('normalizes custom hashtags', () => {
    const post = adapt('Plain text', linkedin, ['startup', '#ai-tools', '###', '']);

    expect(post.hashtags).toEqual(['#startup', '#aitools']);
  });

  it('drops the last custom hashtag first when the trailing line does not fit', () => {
    const raw = 'x'.repeat(272);

    const post = adapt(raw, twitter, ['#one', '#two']);

    expect(post.truncated).toBe(false);
    expect(post.hashtags).toEqual(['#one']);
    expect(composePostText(post)).toBe(`${raw}\n#one`);
  });

  it('keeps the trailing line when it fits exactly', () => {
    const raw = 'y'.repeat(270);

    const post = adapt(raw, twitter, ['#one', '#two']);

    expect(post.hashtags).toEqual(['#one', '#two']);
    expect(composePostText(post).length).toBe(280);
  });

  it('moves hashtags lost to truncation into the trailing line before custom ones', () => {
    const raw = 'abcdefghi '.repeat(25) + 'finally ' + 'y'.repeat(30) + ' #late';

    const post = adapt(raw, twitter, ['#averyverylongtag']);

    expect(post.truncated).toBe(true);
    expect(post.body).toBe('abcdefghi '.repeat(25) + `finally${ELLIPSIS}`);
    expect(post.hashtags).toEqual(['#late']);
    expect(trailingHashtags(post)).toEqual(['#late']);
  });

  it('never drops hashtags that stay inline in the body', () => {
    const raw = '#early ' + 'abcdefghi '.repeat(30) + '#late';

    const post = adapt(raw, twitter, ['#x']);

    expect(post.truncated).toBe(true);
    expect(post.body.startsWith('#early ')).toBe(true);
    expect(post.body.length).toBe(277);
    expect(post.hashtags).toEqual(['#early']);
    expect(trailingHashtags(post)).toEqual([]);
  });

  it('returns a frozen post', () => {
    const post = adapt('Hello #world', twitter);

    expect(Object.isFrozen(post)).toBe(true);
    expect(Object.isFrozen(post.hashtags)).toBe(true);
  });

  it('is deterministic', () => {
    const raw = 'Ship it. '.repeat(50) + '#release';

    expect(adapt(raw, twitter, ['#devops'])).toEqual(adapt(raw, twitter, ['#devops']));
  });
});

describe('adapt over generated drafts', () => {
  const random = seededRandom(20240309);
  const words = ['launch', 'editor', 'sync', 'fast', '#ai', '#AI', '#launch', '#dev_tools', 'C#', 'new!', 'devices,', '\n', 'https://example.com/a#b'];

  function draft(): string {
    const count = 1 + Math.floor(random() * 900);
    const parts = ['launch'];
    for (let i = 0; i < count; i++) {
      parts.push(words[Math.floor(random() * words.length)]);
    }
    // Occasional long unbroken token
    if (random() < 0.1) {
      parts.push('z'.repeat(Math.floor(random() * 400)));
    }
    return parts.join(random() < 0.5 ? ' ' : '  ');
  }

  const cases = Array.from({ length: 200 }, () => ({
    raw: draft(),
    platform: PLATFORM_SPECS[PLATFORM_IDS[Math.floor(random() * PLATFORM_IDS.length)]],
    custom: random() < 0.5 ? ['#startup', 'growth', '#AI', '#averyveryverylonghashtagindeed'] : [],
  }));

  it('keeps body and composed text within the limit', () => {
    for (const { raw, platform, custom } of cases) {
      const post = adapt(raw, platform, custom);
      expect(post.body.length).toBeLessThanOrEqual(platform.characterLimit);
      expect(composePostText(post).length).toBeLessThanOrEqual(platform.characterLimit);
    }
  });

  it('cuts only at whitespace', () => {
    for (const { raw, platform, custom } of cases) {
      const post = adapt(raw, platform, custom);
      if (!post.truncated) {
        expect([raw, raw.trimEnd()]).toContain(post.body);
        continue;
      }

      expect(post.body.endsWith(ELLIPSIS)).toBe(true);
      const kept = post.body.slice(0, -ELLIPSIS.length);
      if (kept.length > 0) {
        expect(raw.startsWith(kept)).toBe(true);
        expect(/\s/.test(raw[kept.length])).toBe(true);
      }
    }
  });

  it('produces unique, well-formed hashtags and passes validation', () => {
    for (const { raw, platform, custom } of cases) {
      const post = adapt(raw, platform, custom);
      const keys = post.hashtags.map(hashtagKey);
      expect(new Set(keys).size).toBe(keys.length);
      expect(validate(post)).toEqual({ valid: true, violations: [] });
    }
  });
});

describe('composePostText', () => {
  it('puts hashtags that are not inline on a trailing line', () => {
    const post = adapt('Check out our launch! #launch #ai', linkedin, ['#startup']);

    expect(composePostText(post)).toBe('Check out our launch! #launch #ai\n#startup');
  });

  it('returns the body alone when every hashtag is inline', () => {
    const post = adapt('All inline #one #two', linkedin, ['#ONE']);

    expect(composePostText(post)).toBe('All inline #one #two');
  });
});

describe('validate', () => {
  it('reports every violated rule', () => {
    const post: Post = {
      platform: 'twitter',
      body: 'x'.repeat(281),
      hashtags: ['#ok', '#OK', 'bad tag'],
      truncated: false,
    };

    expect(validate(post)).toEqual({
      valid: false,
      violations: ['body-within-limit', 'hashtags-well-formed', 'hashtags-unique', 'composed-within-limit'],
    });
  });

  it('flags a trailing line that overflows a body within the limit', () => {
    const post: Post = { platform: 'twitter', body: 'x'.repeat(275), hashtags: ['#toolong'], truncated: false };

    expect(validate(post)).toEqual({ valid: false, violations: ['composed-within-limit'] });
  });

  it('does not modify the post', () => {
    const post: Post = { platform: 'instagram', body: 'Hi #there', hashtags: ['#there', '#there'], truncated: false };
    const copy = structuredClone(post);

    validate(post);

    expect(post).toEqual(copy);
  });
});
