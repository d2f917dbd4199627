/**
 * tagweave API Entry Point
 *
 * Resolves `<source:path::processor~/>` tags in rendered text.
 *
 * @example
 * ```typescript
 * const context = createResolutionContext({
 *   session: { userid: 42 },
 *   globals: { site: { name: 'Bakery' } }
 * });
 *
 * renderTemplate('<p>Welcome to <site:name/>, user <session:userid/></p>', context);
 * // '<p>Welcome to Bakery, user 42</p>'
 * ```
 */
import { ConfigLoader } from '@core/config/loader';
import { TagResolver, type TagResolverOptions } from '@interpreter/index';
import type { ResolutionContext } from '@interpreter/env/ResolutionContext';

// Errors
export {
  TagweaveError,
  ErrorSeverity,
  TagErrorCode,
  LookupFailedError,
  NestingDepthError,
  ConfigError
} from '@core/errors';

// Value model
export {
  NULL,
  EMPTY_STRING,
  nullValue,
  boolValue,
  numberValue,
  stringValue,
  sequenceValue,
  mappingValue,
  objectValue,
  isObjectHandle,
  isValue
} from '@core/types/value';
export type {
  Value,
  ValueKind,
  ScalarValue,
  ObjectHandle,
  MethodHandler
} from '@core/types/value';
export { defineObject, RegisteredObject } from '@core/types/object-handle';
export type { ObjectDefinition, PropertyDefinition } from '@core/types/object-handle';
export { ValueSource } from '@core/types/sources';
export type { StoreBundle, ReadonlyStore } from '@core/types/sources';
export type { Tag, Accessor, PathExpression, ArgumentToken } from '@core/types/tag';
export type { TagDiagnostic, DiagnosticSink } from '@core/types/diagnostics';
export { toValue, toNative } from '@interpreter/utils/value-conversion';

// Collaborators
export { LocalRegistry } from '@core/registry/LocalRegistry';
export { createResolutionContext, GlobalNamespace, TagResolver, resolveBuffer } from '@interpreter/index';
export type { ResolutionContext, ResolutionContextInit, TagResolverOptions } from '@interpreter/index';

// Building blocks
export { splitOutsideParentheses } from '@interpreter/utils/split-outside-parens';
export { splitArgumentList, classifyArgument, tokenizeArguments } from '@interpreter/utils/argument-tokenizer';
export { resolveSource, sourceFor } from '@interpreter/core/source-resolver';
export { walkPath, parseAccessor } from '@interpreter/core/path-walker';
export { applyPostProcessor, builtinPostProcessors, getPostProcessor } from '@interpreter/builtin/post-processors';
export { formatForDisplay, escapeHtml, dumpValue } from '@interpreter/utils/display-formatter';
export { encodeJson } from '@interpreter/core/json-formatter';
export { createTagPattern, scanTags } from '@interpreter/core/tag-scanner';

// Configuration
export { ConfigLoader } from '@core/config/loader';
export { DEFAULT_CONFIG } from '@core/config/types';
export type { TagweaveConfig, ResolvedConfig } from '@core/config/types';

export interface RenderOptions extends TagResolverOptions {
  /** Load `tagweave.config.json` from this directory (and the global config) */
  projectPath?: string;
}

/**
 * Resolve every tag in `text`. Configuration files are read only when
 * `projectPath` is given.
 */
export function renderTemplate(text: string, context: ResolutionContext, options: RenderOptions = {}): string {
  return createRenderer(context, options).resolveBuffer(text);
}

/**
 * Bind a resolver to one request's context for repeated use.
 */
export function createRenderer(context: ResolutionContext, options: RenderOptions = {}): TagResolver {
  const { projectPath, ...resolverOptions } = options;
  if (projectPath !== undefined && !resolverOptions.config) {
    resolverOptions.config = new ConfigLoader(projectPath).loadResolved();
  }
  return new TagResolver(context, resolverOptions);
}
