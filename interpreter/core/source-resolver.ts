import { SOURCE_KEYWORDS, ValueSource, type ReadonlyStore } from '@core/types/sources';
import { NULL, mappingValue, type Value } from '@core/types/value';
import type { ResolutionContext } from '@interpreter/env/ResolutionContext';

export interface ResolvedSource {
  source: ValueSource;
  value: Value;
  /** False only for a named global that is not defined */
  found: boolean;
}

/**
 * Which source a selector names. Anything that is not a store keyword is a
 * named-global lookup.
 */
export function sourceFor(identifier: string): ValueSource {
  return SOURCE_KEYWORDS.get(identifier) ?? ValueSource.Global;
}

/**
 * Resolve a selector to its starting value. Store keywords yield a live
 * mapping view of the store; other identifiers read the global namespace
 * and yield Null when absent.
 */
export function resolveSource(identifier: string, context: ResolutionContext): ResolvedSource {
  const source = sourceFor(identifier);

  if (source === ValueSource.Global) {
    const value = context.globals.get(identifier);
    return { source, value: value ?? NULL, found: value !== undefined };
  }

  return { source, value: mappingValue(storeFor(source, context)), found: true };
}

function storeFor(source: Exclude<ValueSource, ValueSource.Global>, context: ResolutionContext): ReadonlyStore {
  switch (source) {
    case ValueSource.Session:
      return context.stores.session;
    case ValueSource.Form:
      return context.stores.form;
    case ValueSource.Query:
      return context.stores.query;
    case ValueSource.Cookie:
      return context.stores.cookies;
    case ValueSource.Server:
      return context.stores.server;
    case ValueSource.Registry:
      return context.registry.entries;
  }
}
