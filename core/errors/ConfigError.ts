import { TagweaveError, ErrorSeverity } from './TagweaveError';
import { TagErrorCode } from './codes';

/**
 * A configuration value was rejected. The loader logs it and falls back
 * to the default for that setting.
 */
export class ConfigError extends TagweaveError {
  constructor(message: string, details: { filePath?: string; setting?: string; value?: unknown } = {}, cause?: unknown) {
    super(message, {
      code: TagErrorCode.CONFIG_INVALID,
      severity: ErrorSeverity.Warning,
      details,
      cause
    });
    this.name = 'ConfigError';
  }
}
