/**
 * Walks accessor chains against resolved values.
 */

import { LookupFailedError, TagErrorCode, TagweaveError } from '@core/errors';
import type { Accessor, ArgumentToken, CallAccessor, KeyAccessor } from '@core/types/tag';
import type { DiagnosticSink } from '@core/types/diagnostics';
import { NULL, type Value } from '@core/types/value';
import type { ResolutionContext } from '@interpreter/env/ResolutionContext';
import { evaluateArguments, tokenizeArguments } from '@interpreter/utils/argument-tokenizer';
import { resolutionLogger } from '@core/utils/logger';
import { resolveSource } from './source-resolver';

const CALL_PATTERN = /^([a-zA-Z0-9_]+)\(([\s\S]*)\)$/;
const INDEX_PATTERN = /^(?:0|[1-9]\d*)$/;

export interface WalkOptions {
  /** Receives fail-soft events such as unrecognized argument tokens */
  report?: DiagnosticSink;
  /** Tag text attached to reported diagnostics */
  tag?: string;
}

/**
 * A segment is a call iff it reads `name(...)` with the closing parenthesis last.
 */
export function parseAccessor(segment: string): Accessor {
  const call = CALL_PATTERN.exec(segment);
  if (call) {
    return { type: 'call', name: call[1], rawArgs: call[2].trim() };
  }
  return { type: 'key', name: segment };
}

/**
 * Apply each accessor in turn. The first segment that cannot be resolved
 * stops the walk with a LookupFailedError; remaining accessors are skipped.
 */
export function walkPath(
  initial: Value,
  accessors: Accessor[],
  context: ResolutionContext,
  options: WalkOptions = {}
): Value {
  let current = initial;

  for (let index = 0; index < accessors.length; index++) {
    const accessor = accessors[index];
    current = accessor.type === 'key'
      ? lookupKey(current, accessor, accessors, index)
      : invokeCall(current, accessor, accessors, index, context, options);
  }

  return current;
}

/**
 * Resolve a `source:key:key` argument reference. Only key lookups are
 * performed; any failure yields Null. Failures other than a missing key
 * (a throwing property getter) are also reported.
 */
export function resolveReference(
  token: Extract<ArgumentToken, { type: 'reference' }>,
  context: ResolutionContext,
  options: WalkOptions = {}
): Value {
  const { value } = resolveSource(token.source, context);
  const accessors: KeyAccessor[] = token.path.map(name => ({ type: 'key', name }));

  try {
    return walkPath(value, accessors, context);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    resolutionLogger.debug('Argument reference did not resolve', {
      source: token.source,
      path: token.path,
      error: message
    });
    if (!(error instanceof LookupFailedError)) {
      const reference = [token.source, ...token.path].join(':');
      options.report?.({
        code: TagErrorCode.LOOKUP_FAILED,
        tag: options.tag ?? reference,
        message: `Argument reference '${reference}' failed: ${message}`,
        cause: error
      });
    }
    return NULL;
  }
}

function lookupKey(current: Value, accessor: KeyAccessor, accessors: Accessor[], index: number): Value {
  const { name } = accessor;

  switch (current.kind) {
    case 'mapping': {
      const entry = current.entries.get(name);
      if (entry !== undefined) {
        return entry;
      }
      break;
    }
    case 'sequence': {
      if (INDEX_PATTERN.test(name)) {
        const item = current.items[Number(name)];
        if (item !== undefined) {
          return item;
        }
      }
      break;
    }
    case 'object': {
      const property = current.handle.getProperty(name);
      if (property !== undefined) {
        return property;
      }
      break;
    }
    default:
      break;
  }

  throw lookupFailure(`No key '${name}' on ${describeValue(current)}`, current, accessors, index, name);
}

function invokeCall(
  current: Value,
  accessor: CallAccessor,
  accessors: Accessor[],
  index: number,
  context: ResolutionContext,
  options: WalkOptions
): Value {
  const { name } = accessor;
  const args = evaluateArguments(
    tokenizeArguments(accessor.rawArgs),
    token => resolveReference(token, context, options),
    text => options.report?.({
      code: TagErrorCode.INVALID_ARGUMENT_TOKEN,
      tag: options.tag ?? accessor.rawArgs,
      message: `Unrecognized argument '${text}' passed to ${name}() as null`
    })
  );

  if (current.kind === 'object' && current.handle.hasMethod(name)) {
    const handle = current.handle;
    return guardCall(() => handle.callMethod(name, args), current, accessors, index, name);
  }

  if (current.kind === 'null') {
    const fn = context.globals.getFunction(name);
    if (fn) {
      return guardCall(() => fn(args), current, accessors, index, name);
    }
  }

  throw lookupFailure(`No callable '${name}' on ${describeValue(current)}`, current, accessors, index, name);
}

/**
 * Host handlers may throw anything; surface it as a lookup failure so the
 * tag fails on its own.
 */
function guardCall(
  call: () => Value,
  current: Value,
  accessors: Accessor[],
  index: number,
  name: string
): Value {
  try {
    return call();
  } catch (error) {
    if (error instanceof TagweaveError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw lookupFailure(`Call to '${name}' failed: ${message}`, current, accessors, index, name, {
      code: TagErrorCode.METHOD_FAILED,
      cause: error
    });
  }
}

function lookupFailure(
  message: string,
  current: Value,
  accessors: Accessor[],
  index: number,
  segment: string,
  options?: { code?: TagErrorCode; cause?: unknown }
): LookupFailedError {
  return new LookupFailedError(
    message,
    {
      accessors,
      failedAtIndex: index,
      failedSegment: segment,
      currentKind: current.kind
    },
    options
  );
}

function describeValue(value: Value): string {
  return value.kind === 'object' ? `${value.handle.typeName} object` : value.kind;
}
