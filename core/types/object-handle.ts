import {
  OBJECT_HANDLE_SYMBOL,
  type MethodHandler,
  type ObjectHandle,
  type Value
} from './value';

/**
 * A property is either a fixed value or a zero-argument getter evaluated on read.
 * Returning `undefined` from a getter means the property is not set.
 */
export type PropertyDefinition = Value | (() => Value | undefined);

export interface ObjectDefinition {
  properties?: Record<string, PropertyDefinition>;
  methods?: Record<string, MethodHandler>;
  /** Makes the handle countable for the `count` post-processor */
  count?: () => number;
}

/**
 * Handle backed by an explicit registration table. Names that are not
 * registered are unreachable from tags, including inherited prototype members.
 */
export class RegisteredObject implements ObjectHandle {
  readonly [OBJECT_HANDLE_SYMBOL] = true as const;
  private readonly properties: Map<string, PropertyDefinition>;
  private readonly methods: Map<string, MethodHandler>;
  count?: () => number;

  constructor(
    public readonly typeName: string,
    definition: ObjectDefinition = {}
  ) {
    this.properties = new Map(Object.entries(definition.properties ?? {}));
    this.methods = new Map(Object.entries(definition.methods ?? {}));
    if (definition.count) {
      this.count = definition.count;
    }
  }

  getProperty(name: string): Value | undefined {
    const property = this.properties.get(name);
    if (property === undefined) {
      return undefined;
    }
    return typeof property === 'function' ? property() : property;
  }

  propertyNames(): string[] {
    return [...this.properties.keys()];
  }

  hasMethod(name: string): boolean {
    return this.methods.has(name);
  }

  callMethod(name: string, args: Value[]): Value {
    const method = this.methods.get(name);
    if (!method) {
      throw new TypeError(`${this.typeName} has no method '${name}'`);
    }
    return method(args);
  }
}

export function defineObject(typeName: string, definition: ObjectDefinition = {}): ObjectHandle {
  return new RegisteredObject(typeName, definition);
}
