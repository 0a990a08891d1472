import { RangeParseResult, RangeParseError } from '../../../domain/value-objects/ParsedRange';

const DIGITS = /^\d+$/;

/**
 * Parses HTTP Range header strings
 * Only a single range in the bytes unit is accepted
 */
export class RangeParser {
  private static readonly BYTES_PREFIX = 'bytes=';
  private static readonly RANGE_SEPARATOR = '-';

  /**
   * Parses Range header value
   */
  static parse(range: string): RangeParseResult {
    const trimmed = range.trim();
    if (!trimmed.startsWith(this.BYTES_PREFIX)) {
      return {
        success: false,
        error: RangeParseError.INVALID_UNIT,
        message: `Unsupported range unit in '${trimmed}'`
      };
    }

    const rangeValue = trimmed.slice(this.BYTES_PREFIX.length).trim();
    if (!rangeValue) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: 'Empty range value after bytes= prefix'
      };
    }

    // Check for multiple ranges (not supported)
    if (rangeValue.includes(',')) {
      return {
        success: false,
        error: RangeParseError.MULTIPLE_RANGES,
        message: 'Multiple ranges are not supported'
      };
    }

    const parts = rangeValue.split(this.RANGE_SEPARATOR);
    if (parts.length !== 2) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: `Invalid range format, expected 'start-end', got '${rangeValue}'`
      };
    }

    const startStr = parts[0].trim();
    const endStr = parts[1].trim();

    if ((startStr && !DIGITS.test(startStr)) || (endStr && !DIGITS.test(endStr))) {
      return {
        success: false,
        error: RangeParseError.INVALID_NUMBER,
        message: `Invalid start or end value: start='${startStr}', end='${endStr}'`
      };
    }

    // Case 1: bytes=-SUFFIX (suffix from end)
    if (!startStr && endStr) {
      return { success: true, value: { type: 'suffix', suffix: Number(endStr) } };
    }

    // Case 2: bytes=START- (from START to end)
    if (startStr && !endStr) {
      return { success: true, value: { type: 'start-only', start: Number(startStr) } };
    }

    // Case 3: bytes=START-END (fixed range)
    if (startStr && endStr) {
      return { success: true, value: { type: 'start-end', start: Number(startStr), end: Number(endStr) } };
    }

    return {
      success: false,
      error: RangeParseError.INVALID_FORMAT,
      message: 'Range must have at least start or end value'
    };
  }
}
