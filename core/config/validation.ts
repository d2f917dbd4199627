import { ConfigError } from '@core/errors';
import { configLogger } from '@core/utils/logger';
import { DEFAULT_CONFIG, type LimitsConfig } from './types';

export type LimitKey = keyof LimitsConfig;

const MAX_JSON_INDENT = 10;

/**
 * A limit must be a positive integer. Anything else is logged as
 * CONFIG_INVALID and replaced by the default.
 */
export function resolveLimit(key: LimitKey, value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_CONFIG.limits[key];
  }
  if (!Number.isInteger(value) || value <= 0) {
    warnInvalid(`limits.${key} must be a positive integer`, `limits.${key}`, value);
    return DEFAULT_CONFIG.limits[key];
  }
  return value;
}

/**
 * JSON indent width, 0 through 10.
 */
export function resolveJsonIndent(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_CONFIG.output.jsonIndent;
  }
  if (!Number.isInteger(value) || value < 0 || value > MAX_JSON_INDENT) {
    warnInvalid(`output.jsonIndent must be an integer between 0 and ${MAX_JSON_INDENT}`, 'output.jsonIndent', value);
    return DEFAULT_CONFIG.output.jsonIndent;
  }
  return value;
}

function warnInvalid(message: string, setting: string, value: number): void {
  const error = new ConfigError(message, { setting, value });
  configLogger.warn(error.message, { code: error.code, value });
}
