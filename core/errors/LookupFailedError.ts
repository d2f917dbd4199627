import { TagweaveError, ErrorSeverity } from './TagweaveError';
import { TagErrorCode } from './codes';
import type { Accessor } from '@core/types/tag';

/**
 * Details specific to path lookup failures.
 */
export interface LookupFailedErrorDetails {
  [key: string]: unknown;
  /** The accessor chain being walked */
  accessors: Accessor[];
  /** Index in the chain where the walk stopped */
  failedAtIndex: number;
  /** The segment name that could not be resolved */
  failedSegment: string;
  /** Kind of the value the accessor was applied to */
  currentKind: string;
}

/**
 * A path segment could not be resolved against the current value.
 * The tag that raised it substitutes to the empty string.
 */
export class LookupFailedError extends TagweaveError {
  declare public readonly details: LookupFailedErrorDetails;

  constructor(
    message: string,
    details: LookupFailedErrorDetails,
    options: { code?: TagErrorCode; cause?: unknown } = {}
  ) {
    super(message, {
      code: options.code ?? TagErrorCode.LOOKUP_FAILED,
      severity: ErrorSeverity.Recoverable,
      details,
      cause: options.cause
    });
    this.name = 'LookupFailedError';
  }
}
