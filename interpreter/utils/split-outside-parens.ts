import { NestingDepthError } from '@core/errors';

export interface SplitOptions {
  /** Throw once parenthesis nesting goes deeper than this */
  maxDepth?: number;
}

/**
 * Split `input` on `delimiter`, treating parenthesized spans as opaque.
 *
 * Depth rises on `(` and falls on `)` (never below zero); the delimiter only
 * splits at depth zero. An empty trailing segment is dropped, empty segments
 * elsewhere are kept.
 *
 * @example
 * splitOutsideParentheses('a(b:c):d') // ['a(b:c)', 'd']
 */
export function splitOutsideParentheses(
  input: string,
  delimiter: string = ':',
  options: SplitOptions = {}
): string[] {
  const result: string[] = [];
  let buffer = '';
  let depth = 0;

  for (const char of input) {
    if (char === '(') {
      depth++;
      if (options.maxDepth !== undefined && depth > options.maxDepth) {
        throw new NestingDepthError(input, options.maxDepth);
      }
      buffer += char;
    } else if (char === ')') {
      if (depth > 0) depth--;
      buffer += char;
    } else if (char === delimiter && depth === 0) {
      result.push(buffer);
      buffer = '';
    } else {
      buffer += char;
    }
  }

  if (buffer !== '') {
    result.push(buffer);
  }

  return result;
}
