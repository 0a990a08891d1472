/**
 * Parsed HTTP Range header value
 * A single range in one of the three forms RFC 9110 allows
 */
export type ParsedRange =
  | { type: 'start-only'; start: number }
  | { type: 'start-end'; start: number; end: number }
  | { type: 'suffix'; suffix: number };

export enum RangeParseError {
  INVALID_UNIT = 'INVALID_UNIT',
  INVALID_FORMAT = 'INVALID_FORMAT',
  MULTIPLE_RANGES = 'MULTIPLE_RANGES',
  INVALID_NUMBER = 'INVALID_NUMBER'
}

export type RangeParseResult =
  | { success: true; value: ParsedRange }
  | { success: false; error: RangeParseError; message: string };
