import {
  NULL,
  boolValue,
  containerOf,
  isObjectHandle,
  isValue,
  mappingValue,
  numberValue,
  objectValue,
  sequenceValue,
  stringValue,
  type Value
} from '@core/types/value';

/**
 * Convert plain host data into a Value.
 *
 * Accepts JSON-like data, `Map`s with string keys, object handles and
 * prebuilt Values. Functions, symbols and class instances other than
 * handles have no tag-visible form and become Null.
 */
export function toValue(native: unknown): Value {
  if (native === null || native === undefined) {
    return NULL;
  }
  if (isValue(native)) {
    return native;
  }
  if (isObjectHandle(native)) {
    return objectValue(native);
  }

  if (typeof native === 'boolean') {
    return boolValue(native);
  }
  if (typeof native === 'number') {
    return numberValue(native);
  }
  if (typeof native === 'bigint') {
    return numberValue(Number(native));
  }
  if (typeof native === 'string') {
    return stringValue(native);
  }
  if (typeof native !== 'object') {
    return NULL;
  }

  if (Array.isArray(native)) {
    return sequenceValue(native.map(item => toValue(item)));
  }

  if (native instanceof Map) {
    const entries = new Map<string, Value>();
    for (const [key, item] of native) {
      entries.set(String(key), toValue(item));
    }
    return mappingValue(entries);
  }

  if (native instanceof Date) {
    return stringValue(native.toISOString());
  }

  if (isPlainObject(native)) {
    return mappingValue(toStore(native));
  }

  return NULL;
}

/**
 * Convert a record of host data into a string-keyed store of Values.
 */
export function toStore(record: object): Map<string, Value> {
  const entries = new Map<string, Value>();
  for (const [key, item] of Object.entries(record)) {
    entries.set(key, toValue(item));
  }
  return entries;
}

export type NativeValue =
  | null
  | boolean
  | number
  | string
  | NativeValue[]
  | { [key: string]: NativeValue };

/**
 * Convert a Value back into JSON-compatible data.
 * Object handles become a plain object of their registered properties.
 * A value nested inside itself converts to null at the point of recursion.
 */
export function toNative(value: Value, seen: Set<object> = new Set()): NativeValue {
  if (value.kind === 'null') {
    return null;
  }
  if (value.kind === 'bool' || value.kind === 'number' || value.kind === 'string') {
    return value.value;
  }

  const identity = containerOf(value);
  if (seen.has(identity)) {
    return null;
  }
  seen.add(identity);

  let result: NativeValue;
  if (value.kind === 'sequence') {
    result = value.items.map(item => toNative(item, seen));
  } else {
    const record: { [key: string]: NativeValue } = {};
    if (value.kind === 'mapping') {
      for (const [key, item] of value.entries) {
        record[key] = toNative(item, seen);
      }
    } else {
      for (const name of value.handle.propertyNames()) {
        const property = value.handle.getProperty(name);
        record[name] = property === undefined ? null : toNative(property, seen);
      }
    }
    result = record;
  }

  seen.delete(identity);
  return result;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
