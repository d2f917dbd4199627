import type { Value } from './value';

export enum ValueSource {
  Query = 'get',
  Form = 'post',
  Cookie = 'cookie',
  Server = 'server',
  Session = 'session',
  Registry = 'registry',
  Global = 'global'
}

/** Selector keywords that pick a collaborator store instead of a global */
export const SOURCE_KEYWORDS: ReadonlyMap<string, ValueSource> = new Map([
  ['session', ValueSource.Session],
  ['post', ValueSource.Form],
  ['get', ValueSource.Query],
  ['cookie', ValueSource.Cookie],
  ['server', ValueSource.Server],
  ['registry', ValueSource.Registry]
]);

export type ReadonlyStore = ReadonlyMap<string, Value>;

/**
 * Request-scoped stores. Only the session store is ever written to,
 * and only by the `unset` post-processor.
 */
export interface StoreBundle {
  query: ReadonlyStore;
  form: ReadonlyStore;
  cookies: ReadonlyStore;
  server: ReadonlyStore;
  session: Map<string, Value>;
}
