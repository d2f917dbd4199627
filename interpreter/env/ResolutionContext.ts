import type { ReadonlyStore, StoreBundle } from '@core/types/sources';
import type { MethodHandler, Value } from '@core/types/value';
import { LocalRegistry } from '@core/registry/LocalRegistry';
import { GlobalNamespace } from './GlobalNamespace';
import { toStore } from '@interpreter/utils/value-conversion';

/**
 * Request-scoped collaborators a resolution pass reads from.
 * One context per request; nothing here is shared across invocations.
 */
export interface ResolutionContext {
  stores: StoreBundle;
  registry: LocalRegistry;
  globals: GlobalNamespace;
}

type StoreInput = ReadonlyMap<string, Value> | Record<string, unknown>;

export interface ResolutionContextInit {
  query?: StoreInput;
  form?: StoreInput;
  cookies?: StoreInput;
  server?: StoreInput;
  /** A `Map` is used as-is so that `unset` writes reach the caller's session */
  session?: Map<string, Value> | Record<string, unknown>;
  registry?: LocalRegistry;
  globals?: GlobalNamespace | Record<string, unknown>;
  functions?: Record<string, MethodHandler>;
}

export function createResolutionContext(init: ResolutionContextInit = {}): ResolutionContext {
  const globals = init.globals instanceof GlobalNamespace
    ? init.globals
    : new GlobalNamespace(init.globals);

  for (const [name, handler] of Object.entries(init.functions ?? {})) {
    globals.defineFunction(name, handler);
  }

  return {
    stores: {
      query: toReadonlyStore(init.query),
      form: toReadonlyStore(init.form),
      cookies: toReadonlyStore(init.cookies),
      server: toReadonlyStore(init.server),
      session: init.session instanceof Map ? init.session : toStore(init.session ?? {})
    },
    registry: init.registry ?? new LocalRegistry(),
    globals
  };
}

function toReadonlyStore(input: StoreInput | undefined): ReadonlyStore {
  if (input instanceof Map) {
    return input;
  }
  return toStore(input ?? {});
}
