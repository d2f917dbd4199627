import type { Tag } from '@core/types/tag';

const BODY_CHARS = `a-zA-Z0-9_\\-:()'",\\s`;
const POST_PROCESSOR_CHARS = 'a-zA-Z\\-';

/**
 * Build the tag pattern:
 *
 *     < body [::processor] [~] />
 *
 * The body is matched lazily and capped at `maxTagLength` characters so a
 * stray `<` cannot make the scan run across the whole buffer.
 */
export function createTagPattern(maxTagLength: number): RegExp {
  return new RegExp(
    `<([${BODY_CHARS}]{1,${maxTagLength}}?)(?:::([${POST_PROCESSOR_CHARS}]+))?(~?)\\/>`,
    'g'
  );
}

/**
 * Build a Tag from one match of the pattern.
 */
export function parseTagMatch(match: RegExpMatchArray): Tag {
  return {
    source: match[0],
    path: match[1],
    postProcessor: match[2] || undefined,
    raw: match[3] === '~',
    offset: match.index ?? 0
  };
}

/**
 * All tag occurrences, left to right, non-overlapping.
 */
export function scanTags(text: string, pattern: RegExp): Tag[] {
  return [...text.matchAll(new RegExp(pattern.source, 'g'))].map(parseTagMatch);
}

/**
 * Replace every tag with `render(tag)`; text between tags is untouched.
 */
export function replaceTags(text: string, pattern: RegExp, render: (tag: Tag) => string): string {
  let result = '';
  let lastIndex = 0;

  for (const tag of scanTags(text, pattern)) {
    result += text.slice(lastIndex, tag.offset) + render(tag);
    lastIndex = tag.offset + tag.source.length;
  }

  return result + text.slice(lastIndex);
}
