import type { TagErrorCode } from '@core/errors/codes';

/**
 * A fail-soft event raised while resolving one tag. Reported to the
 * caller's `onDiagnostic` hook; never thrown out of a resolution pass.
 */
export interface TagDiagnostic {
  code: TagErrorCode;
  /** Matched tag text, or the argument/segment text when no tag is known */
  tag: string;
  message: string;
  cause?: unknown;
}

export type DiagnosticSink = (diagnostic: TagDiagnostic) => void;
