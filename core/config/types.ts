/**
 * Configuration types for tagweave
 */

export interface TagweaveConfig {
  limits?: LimitsConfig;
  output?: OutputConfig;
}

export interface LimitsConfig {
  /** Longest tag body the scanner will match */
  maxTagLength?: number;
  /** Deepest parenthesis nesting accepted in a tag path */
  maxDepth?: number;
}

export interface OutputConfig {
  /** HTML-escape substitutions of tags without the raw marker */
  sanitize?: boolean;
  /** Indent width of the pretty JSON post-processors */
  jsonIndent?: number;
}

export interface ResolvedConfig {
  limits: Required<LimitsConfig>;
  output: Required<OutputConfig>;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  limits: {
    maxTagLength: 1024,
    maxDepth: 32
  },
  output: {
    sanitize: true,
    jsonIndent: 4
  }
};
