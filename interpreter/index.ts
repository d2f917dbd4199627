import { DEFAULT_CONFIG, type ResolvedConfig } from '@core/config/types';
import { resolveJsonIndent, resolveLimit } from '@core/config/validation';
import { TagErrorCode, TagweaveError, isTagErrorCode } from '@core/errors';
import type { DiagnosticSink, TagDiagnostic } from '@core/types/diagnostics';
import type { Tag } from '@core/types/tag';
import { resolutionLogger, scannerLogger } from '@core/utils/logger';
import { applyPostProcessor } from './builtin/post-processors';
import { parseAccessor, walkPath } from './core/path-walker';
import { resolveSource } from './core/source-resolver';
import { createTagPattern, replaceTags } from './core/tag-scanner';
import type { ResolutionContext } from './env/ResolutionContext';
import { formatForDisplay } from './utils/display-formatter';
import { splitOutsideParentheses } from './utils/split-outside-parens';

export interface TagResolverOptions {
  /**
   * Resolved configuration; individual options below override it. Limits
   * that are not positive integers fall back to the defaults.
   */
  config?: ResolvedConfig;
  /** Default sanitization for tags without the raw marker */
  sanitize?: boolean;
  maxTagLength?: number;
  maxDepth?: number;
  jsonIndent?: number;
  /** Receives every fail-soft event of a pass */
  onDiagnostic?: DiagnosticSink;
}

/**
 * Substitutes tags in rendered text against one request's collaborators.
 *
 * Each tag resolves independently: a failing tag becomes the empty string
 * and the rest of the buffer is still processed. Nothing is thrown to the
 * caller.
 */
export class TagResolver {
  private readonly pattern: RegExp;
  private readonly sanitize: boolean;
  private readonly maxDepth: number;
  private readonly jsonIndent: number;
  private readonly onDiagnostic?: DiagnosticSink;

  constructor(
    private readonly context: ResolutionContext,
    options: TagResolverOptions = {}
  ) {
    const config = options.config ?? DEFAULT_CONFIG;
    this.pattern = createTagPattern(
      resolveLimit('maxTagLength', options.maxTagLength ?? config.limits.maxTagLength)
    );
    this.sanitize = options.sanitize ?? config.output.sanitize;
    this.maxDepth = resolveLimit('maxDepth', options.maxDepth ?? config.limits.maxDepth);
    this.jsonIndent = resolveJsonIndent(options.jsonIndent ?? config.output.jsonIndent);
    this.onDiagnostic = options.onDiagnostic;
  }

  resolveBuffer(text: string): string {
    let count = 0;
    const output = replaceTags(text, this.pattern, tag => {
      count++;
      return this.resolveTag(tag);
    });
    scannerLogger.debug('Resolved buffer', { tags: count, length: text.length });
    return output;
  }

  /**
   * Resolve a single tag to its substitution text.
   */
  resolveTag(tag: Tag): string {
    const report = (diagnostic: TagDiagnostic): void => this.report(diagnostic);

    try {
      const [selector = '', ...remainingPath] = splitOutsideParentheses(tag.path, ':', {
        maxDepth: this.maxDepth
      });
      const { source, value, found } = resolveSource(selector, this.context);
      if (!found) {
        resolutionLogger.debug('Named global is not defined', { tag: tag.source, name: selector });
      }

      const resolved = walkPath(value, remainingPath.map(parseAccessor), this.context, {
        report,
        tag: tag.source
      });

      const processed = applyPostProcessor(tag.postProcessor, resolved, source, remainingPath, this.context, {
        jsonIndent: this.jsonIndent,
        report,
        tag: tag.source
      });

      return formatForDisplay(processed, { sanitize: tag.raw ? false : this.sanitize });
    } catch (error) {
      // Lookup failures skip post-processing and substitute nothing
      this.report({
        code: errorCode(error),
        tag: tag.source,
        message: error instanceof Error ? error.message : String(error),
        cause: error
      });
      return '';
    }
  }

  private report(diagnostic: TagDiagnostic): void {
    resolutionLogger.debug(diagnostic.message, { code: diagnostic.code, tag: diagnostic.tag });
    if (!this.onDiagnostic) {
      return;
    }
    try {
      this.onDiagnostic(diagnostic);
    } catch (error) {
      resolutionLogger.warn('Diagnostic handler threw', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}

function errorCode(error: unknown): TagErrorCode {
  if (error instanceof TagweaveError && isTagErrorCode(error.code)) {
    return error.code;
  }
  return TagErrorCode.LOOKUP_FAILED;
}

/**
 * Resolve every tag in `text` against `context`.
 */
export function resolveBuffer(
  text: string,
  context: ResolutionContext,
  options: TagResolverOptions = {}
): string {
  return new TagResolver(context, options).resolveBuffer(text);
}

export { createResolutionContext } from './env/ResolutionContext';
export type { ResolutionContext, ResolutionContextInit } from './env/ResolutionContext';
export { GlobalNamespace } from './env/GlobalNamespace';
