import { TagErrorCode } from '@core/errors';
import type { DiagnosticSink } from '@core/types/diagnostics';
import { ValueSource } from '@core/types/sources';
import {
  EMPTY_STRING,
  numberValue,
  stringValue,
  type Value
} from '@core/types/value';
import type { ResolutionContext } from '@interpreter/env/ResolutionContext';
import { JSONFormatter } from '@interpreter/core/json-formatter';
import { postProcessLogger } from '@core/utils/logger';

export interface PostProcessInput {
  value: Value;
  source: ValueSource;
  /** Path segments after the source selector */
  remainingPath: string[];
  context: ResolutionContext;
  jsonIndent: number;
}

export interface PostProcessorDefinition {
  name: string;
  aliases?: string[];
  description: string;
  implementation: (input: PostProcessInput) => Value;
}

export const builtinPostProcessors: PostProcessorDefinition[] = [
  {
    name: 'json',
    description: 'Compact JSON encoding',
    implementation: ({ value }) => stringValue(JSONFormatter.stringify(value))
  },
  {
    name: 'pjson',
    aliases: ['jsonp', 'prettyjson', 'json-p', 'pretty-json'],
    description: 'Pretty-printed JSON encoding',
    implementation: ({ value, jsonIndent }) =>
      stringValue(JSONFormatter.stringify(value, { pretty: true, indent: jsonIndent }))
  },
  {
    name: 'length',
    description: 'Byte length of a string',
    implementation: ({ value }) =>
      value.kind === 'string' ? numberValue(Buffer.byteLength(value.value, 'utf8')) : EMPTY_STRING
  },
  {
    name: 'count',
    description: 'Element count of a sequence, mapping or countable object',
    implementation: ({ value }) => {
      switch (value.kind) {
        case 'sequence':
          return numberValue(value.items.length);
        case 'mapping':
          return numberValue(value.entries.size);
        case 'object':
          return value.handle.count ? numberValue(value.handle.count()) : EMPTY_STRING;
        default:
          return EMPTY_STRING;
      }
    }
  },
  {
    name: 'upper',
    description: 'Uppercase a string',
    implementation: ({ value }) => value.kind === 'string' ? stringValue(value.value.toUpperCase()) : EMPTY_STRING
  },
  {
    name: 'lower',
    description: 'Lowercase a string',
    implementation: ({ value }) => value.kind === 'string' ? stringValue(value.value.toLowerCase()) : EMPTY_STRING
  },
  {
    name: 'unset',
    description: 'Remove a top-level session key; always renders empty',
    implementation: ({ source, remainingPath, context }) => {
      // Session only, and only a direct key; other sources are read-only
      if (source === ValueSource.Session && remainingPath.length === 1) {
        const removed = context.stores.session.delete(remainingPath[0]);
        postProcessLogger.debug('Unset session key', { key: remainingPath[0], removed });
      }
      return EMPTY_STRING;
    }
  }
];

const postProcessorTable: ReadonlyMap<string, PostProcessorDefinition> = new Map(
  builtinPostProcessors.flatMap(definition =>
    [definition.name, ...(definition.aliases ?? [])].map(
      (name): [string, PostProcessorDefinition] => [name, definition]
    )
  )
);

export function getPostProcessor(name: string): PostProcessorDefinition | undefined {
  return postProcessorTable.get(name);
}

export interface ApplyPostProcessorOptions {
  jsonIndent?: number;
  report?: DiagnosticSink;
  tag?: string;
}

/**
 * Apply the named terminal transform. No name passes the value through;
 * an unknown name yields the empty string.
 */
export function applyPostProcessor(
  name: string | undefined,
  value: Value,
  source: ValueSource,
  remainingPath: string[],
  context: ResolutionContext,
  options: ApplyPostProcessorOptions = {}
): Value {
  if (name === undefined) {
    return value;
  }

  const definition = getPostProcessor(name);
  if (!definition) {
    const message = `Unknown post-processor '${name}'`;
    postProcessLogger.warn(message, { tag: options.tag });
    options.report?.({
      code: TagErrorCode.UNKNOWN_POST_PROCESSOR,
      tag: options.tag ?? name,
      message
    });
    return EMPTY_STRING;
  }

  return definition.implementation({
    value,
    source,
    remainingPath,
    context,
    jsonIndent: options.jsonIndent ?? 4
  });
}
