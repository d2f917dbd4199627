import type { ArgumentToken } from '@core/types/tag';
import {
  NULL,
  boolValue,
  numberValue,
  stringValue,
  type Value
} from '@core/types/value';

const REFERENCE_PATTERN = /^([a-z]+):([a-zA-Z0-9:_-]+)$/;
const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export type ReferenceResolver = (token: Extract<ArgumentToken, { type: 'reference' }>) => Value;

/**
 * Split an argument list on commas outside quotes.
 *
 * Single and double quotes are tracked separately, so `'` inside a
 * `"`-quoted string does not close it. A backslash inside quotes keeps the
 * next character from closing the string. Pieces are trimmed; an empty
 * (all-whitespace) list yields no pieces.
 */
export function splitArgumentList(raw: string): string[] {
  if (raw.trim() === '') {
    return [];
  }

  const pieces: string[] = [];
  let buffer = '';
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];

    if (quote) {
      buffer += char;
      if (char === '\\' && i + 1 < raw.length) {
        buffer += raw[++i];
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      buffer += char;
    } else if (char === ',') {
      pieces.push(buffer.trim());
      buffer = '';
    } else {
      buffer += char;
    }
  }

  pieces.push(buffer.trim());
  return pieces;
}

/**
 * Classify one trimmed argument piece. Order matters: a quoted string wins
 * over everything, then variable references, numbers, booleans and null.
 */
export function classifyArgument(token: string): ArgumentToken {
  if (isQuoted(token)) {
    return { type: 'string', value: unescape(token.slice(1, -1)) };
  }

  const reference = REFERENCE_PATTERN.exec(token);
  if (reference) {
    return { type: 'reference', source: reference[1], path: reference[2].split(':') };
  }

  if (NUMERIC_PATTERN.test(token)) {
    return { type: 'number', value: Number(token) };
  }

  const lowered = token.toLowerCase();
  if (lowered === 'true' || lowered === 'false') {
    return { type: 'bool', value: lowered === 'true' };
  }
  if (lowered === 'null') {
    return { type: 'null' };
  }

  return { type: 'unrecognized', text: token };
}

export function tokenizeArguments(raw: string): ArgumentToken[] {
  return splitArgumentList(raw).map(classifyArgument);
}

/**
 * Turn tokens into call arguments. References are resolved eagerly through
 * `resolveReference`; unrecognized tokens become Null.
 */
export function evaluateArguments(
  tokens: ArgumentToken[],
  resolveReference: ReferenceResolver,
  onUnrecognized?: (text: string) => void
): Value[] {
  return tokens.map(token => {
    switch (token.type) {
      case 'string':
        return stringValue(token.value);
      case 'number':
        return numberValue(token.value);
      case 'bool':
        return boolValue(token.value);
      case 'null':
        return NULL;
      case 'reference':
        return resolveReference(token);
      case 'unrecognized':
        onUnrecognized?.(token.text);
        return NULL;
    }
  });
}

function isQuoted(token: string): boolean {
  if (token.length < 2) {
    return false;
  }
  const first = token[0];
  return (first === '"' || first === "'") && token[token.length - 1] === first;
}

/** A backslash makes the next character literal; a trailing one is dropped */
function unescape(text: string): string {
  return text.replace(/\\([\s\S]?)/g, '$1');
}
