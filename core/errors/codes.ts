export enum TagErrorCode {
  NO_MATCH = 'NO_MATCH',
  LOOKUP_FAILED = 'LOOKUP_FAILED',
  UNKNOWN_POST_PROCESSOR = 'UNKNOWN_POST_PROCESSOR',
  INVALID_ARGUMENT_TOKEN = 'INVALID_ARGUMENT_TOKEN',
  MAX_DEPTH_EXCEEDED = 'MAX_DEPTH_EXCEEDED',
  METHOD_FAILED = 'METHOD_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

const TAG_ERROR_CODES: ReadonlySet<string> = new Set(Object.values(TagErrorCode));

export function isTagErrorCode(code: string): code is TagErrorCode {
  return TAG_ERROR_CODES.has(code);
}
