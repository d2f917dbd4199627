import type { Value } from '@core/types/value';
import { toNative } from '@interpreter/utils/value-conversion';

export interface JSONFormatOptions {
  pretty?: boolean;
  indent?: number;
}

export class JSONFormatter {
  /**
   * Encode a Value as JSON. Slashes and non-ASCII characters are left
   * unescaped; non-finite numbers encode as null.
   */
  static stringify(value: Value, options: JSONFormatOptions = {}): string {
    const { pretty = false, indent = 4 } = options;
    return JSON.stringify(toNative(value), null, pretty ? indent : undefined);
  }
}

export function encodeJson(value: Value, options: JSONFormatOptions = {}): string {
  return JSONFormatter.stringify(value, options);
}
