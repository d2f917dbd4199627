import type { MethodHandler, Value } from '@core/types/value';
import { toValue } from '@interpreter/utils/value-conversion';

/**
 * Named globals reachable as `<name/>`, plus the explicit table of free
 * functions that call accessors may invoke when there is no object context.
 */
export class GlobalNamespace {
  private readonly values = new Map<string, Value>();
  private readonly functions = new Map<string, MethodHandler>();

  constructor(initial?: Record<string, unknown>) {
    if (initial) {
      for (const [name, value] of Object.entries(initial)) {
        this.define(name, value);
      }
    }
  }

  /** Accepts a Value or plain data, which is converted */
  define(name: string, value: unknown): this {
    this.values.set(name, toValue(value));
    return this;
  }

  get(name: string): Value | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  delete(name: string): boolean {
    return this.values.delete(name);
  }

  defineFunction(name: string, handler: MethodHandler): this {
    this.functions.set(name, handler);
    return this;
  }

  getFunction(name: string): MethodHandler | undefined {
    return this.functions.get(name);
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }
}
