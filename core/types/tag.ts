/**
 * Parsed forms of a tag occurrence and the pieces of its path.
 */

/**
 * One recognized `<path::processor~/>` occurrence.
 */
export interface Tag {
  /** Full matched text, e.g. `<session:user::json~/>` */
  source: string;
  /** Raw path body before splitting; never empty */
  path: string;
  postProcessor?: string;
  /** Set by the `~` marker; disables HTML escaping */
  raw: boolean;
  /** Offset of the match in the scanned buffer */
  offset: number;
}

export interface KeyAccessor {
  type: 'key';
  name: string;
}

export interface CallAccessor {
  type: 'call';
  name: string;
  /** Argument list text between the outer parentheses, trimmed */
  rawArgs: string;
}

export type Accessor = KeyAccessor | CallAccessor;

/**
 * A path split on top-level `:`. The first segment selects the source.
 */
export interface PathExpression {
  selector: string;
  segments: string[];
  accessors: Accessor[];
}

export type ArgumentToken =
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'bool'; value: boolean }
  | { type: 'null' }
  | { type: 'reference'; source: string; path: string[] }
  | { type: 'unrecognized'; text: string };
