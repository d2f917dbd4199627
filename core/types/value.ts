/**
 * Dynamic values threaded through tag resolution.
 *
 * Every value the engine sees is one of these variants; the path walker,
 * post-processors and formatter all switch on `kind`.
 */

export const OBJECT_HANDLE_SYMBOL = Symbol.for('tagweave.ObjectHandle');

export type ValueKind =
  | 'null'
  | 'bool'
  | 'number'
  | 'string'
  | 'sequence'
  | 'mapping'
  | 'object';

export interface NullValue {
  kind: 'null';
}

export interface BoolValue {
  kind: 'bool';
  value: boolean;
}

export interface NumberValue {
  kind: 'number';
  value: number;
}

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface SequenceValue {
  kind: 'sequence';
  items: readonly Value[];
}

export interface MappingValue {
  kind: 'mapping';
  /** Live view; collaborator stores are exposed without copying */
  entries: ReadonlyMap<string, Value>;
}

export interface ObjectValue {
  kind: 'object';
  handle: ObjectHandle;
}

export type Value =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | SequenceValue
  | MappingValue
  | ObjectValue;

export type ScalarValue = NullValue | BoolValue | NumberValue | StringValue;

/**
 * Handler registered for a method or free function.
 * Receives already-resolved argument values.
 */
export type MethodHandler = (args: Value[]) => Value;

/**
 * Opaque object capability. Only names in its registration table are reachable.
 */
export interface ObjectHandle {
  readonly [OBJECT_HANDLE_SYMBOL]: true;
  /** Used as the dump title, e.g. `Cookie Object` */
  readonly typeName: string;
  getProperty(name: string): Value | undefined;
  propertyNames(): string[];
  hasMethod(name: string): boolean;
  callMethod(name: string, args: Value[]): Value;
  /** Present only on countable handles */
  count?(): number;
}

/** Values produced by the constructors below; caller data never lands here */
const builtValues = new WeakSet<object>();

function built<T extends Value>(value: T): T {
  builtValues.add(value);
  return value;
}

export const NULL: NullValue = built<NullValue>(Object.freeze({ kind: 'null' }));

export function nullValue(): NullValue {
  return NULL;
}

export function boolValue(value: boolean): BoolValue {
  return built({ kind: 'bool', value });
}

export function numberValue(value: number): NumberValue {
  return built({ kind: 'number', value });
}

export function stringValue(value: string): StringValue {
  return built({ kind: 'string', value });
}

export function sequenceValue(items: readonly Value[]): SequenceValue {
  return built({ kind: 'sequence', items });
}

export function mappingValue(entries: ReadonlyMap<string, Value>): MappingValue {
  return built({ kind: 'mapping', entries });
}

export function objectValue(handle: ObjectHandle): ObjectValue {
  return built({ kind: 'object', handle });
}

export const EMPTY_STRING: StringValue = built<StringValue>(Object.freeze({ kind: 'string', value: '' }));

export function isObjectHandle(value: unknown): value is ObjectHandle {
  return typeof value === 'object' && value !== null && OBJECT_HANDLE_SYMBOL in value;
}

/**
 * True only for Values made by this module's constructors. Caller records
 * that merely carry a `kind` field are data, not Values.
 */
export function isValue(candidate: unknown): candidate is Value {
  return typeof candidate === 'object' && candidate !== null && builtValues.has(candidate);
}

/**
 * Identity of a structured value for cycle checks: the wrapped collection
 * or handle.
 */
export function containerOf(value: SequenceValue | MappingValue | ObjectValue): object {
  switch (value.kind) {
    case 'sequence':
      return value.items;
    case 'mapping':
      return value.entries;
    case 'object':
      return value.handle;
  }
}
