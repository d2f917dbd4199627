import { containerOf, type Value } from '@core/types/value';

export interface DisplayFormatOptions {
  /** HTML-escape the rendered text; on unless the tag carried the raw marker */
  sanitize?: boolean;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Render a value as substitution text.
 */
export function formatForDisplay(value: Value, options: DisplayFormatOptions = {}): string {
  const { sanitize = true } = options;
  const text = renderValue(value);
  return sanitize ? escapeHtml(text) : text;
}

function renderValue(value: Value): string {
  switch (value.kind) {
    case 'null':
      return '';
    case 'bool':
      return value.value ? '1' : '';
    case 'number':
      return formatNumber(value.value);
    case 'string':
      return value.value;
    case 'sequence':
    case 'mapping':
    case 'object':
      return dumpValue(value);
  }
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) {
    return 'NAN';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'INF' : '-INF';
  }
  return String(value);
}

/**
 * Debug dump of a structured value:
 *
 *     Array
 *     (
 *         [0] => Flour
 *         [1] => Sugar
 *     )
 *
 * Objects are titled `<Type> Object`. Each nesting level indents by eight
 * spaces. Scalars inside render as they would on their own. A value that
 * contains itself is printed as its title followed by `*RECURSION*`.
 */
export function dumpValue(value: Value, level: number = 0, seen: Set<object> = new Set()): string {
  if (value.kind !== 'sequence' && value.kind !== 'mapping' && value.kind !== 'object') {
    return renderValue(value);
  }

  const title = value.kind === 'object' ? `${value.handle.typeName} Object` : 'Array';
  const identity = containerOf(value);
  if (seen.has(identity)) {
    return `${title}\n *RECURSION*`;
  }

  const pad = ' '.repeat(level * 8);
  let out = `${title}\n${pad}(\n`;

  seen.add(identity);
  for (const [key, item] of dumpEntries(value)) {
    out += `${pad}    [${key}] => ${dumpValue(item, level + 1, seen)}\n`;
  }
  seen.delete(identity);

  out += `${pad})\n`;
  return out;
}

function dumpEntries(value: Value): Array<[string, Value]> {
  switch (value.kind) {
    case 'sequence':
      return value.items.map((item, index): [string, Value] => [String(index), item]);
    case 'mapping':
      return [...value.entries];
    case 'object': {
      const entries: Array<[string, Value]> = [];
      for (const name of value.handle.propertyNames()) {
        const property = value.handle.getProperty(name);
        if (property !== undefined) {
          entries.push([name, property]);
        }
      }
      return entries;
    }
    default:
      return [];
  }
}

