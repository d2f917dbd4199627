import { TagweaveError, ErrorSeverity } from './TagweaveError';
import { TagErrorCode } from './codes';

/**
 * Parenthesis nesting in a tag path went past the configured limit.
 */
export class NestingDepthError extends TagweaveError {
  constructor(input: string, maxDepth: number) {
    super(`Parenthesis nesting exceeds the limit of ${maxDepth}`, {
      code: TagErrorCode.MAX_DEPTH_EXCEEDED,
      severity: ErrorSeverity.Recoverable,
      details: { input, maxDepth }
    });
    this.name = 'NestingDepthError';
  }
}
