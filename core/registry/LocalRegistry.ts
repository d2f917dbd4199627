import { randomBytes } from 'crypto';
import type { Value } from '@core/types/value';
import { registryLogger } from '@core/utils/logger';

/** 32 random bytes, hex encoded */
const TOKEN_BYTES = 32;

/**
 * Ephemeral token → value store. Values registered here are reachable from
 * tags as `<registry:TOKEN/>` for the lifetime of the owning context.
 */
export class LocalRegistry {
  private readonly values = new Map<string, Value>();

  /**
   * Store a value under a fresh token and return the token.
   */
  register(value: Value): string {
    let token = randomBytes(TOKEN_BYTES).toString('hex');
    while (this.values.has(token)) {
      token = randomBytes(TOKEN_BYTES).toString('hex');
    }
    this.values.set(token, value);
    registryLogger.debug('Registered local value', { token, kind: value.kind });
    return token;
  }

  get(token: string): Value | undefined {
    return this.values.get(token);
  }

  has(token: string): boolean {
    return this.values.has(token);
  }

  get size(): number {
    return this.values.size;
  }

  /** Read-only view backing the `registry` source */
  get entries(): ReadonlyMap<string, Value> {
    return this.values;
  }
}
