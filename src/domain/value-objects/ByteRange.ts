/**
 * Immutable inclusive byte range inside a file
 */
export class ByteRange {
  constructor(
    public readonly start: number,
    public readonly end: number
  ) {
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
      throw new Error(`ByteRange: start and end must be integers, got start=${start}, end=${end}`);
    }
    if (start < 0 || end < 0) {
      throw new Error(`ByteRange: start and end must be non-negative, got start=${start}, end=${end}`);
    }
    if (start > end) {
      throw new Error(`ByteRange: start must be <= end, got start=${start}, end=${end}`);
    }
  }

  /**
   * Number of bytes covered (inclusive)
   */
  get size(): number {
    return this.end - this.start + 1;
  }

  /**
   * Formats the range as Content-Range header value
   */
  toContentRange(fileSize: number): string {
    return `bytes ${this.start}-${this.end}/${fileSize}`;
  }

  /**
   * Range covering the whole file, null for an empty file
   */
  static wholeFile(fileSize: number): ByteRange | null {
    return fileSize > 0 ? new ByteRange(0, fileSize - 1) : null;
  }

  /**
   * bytes=START-  (runs to the end of the file)
   */
  static fromStartOnly(start: number, fileSize: number): ByteRange | null {
    if (start >= fileSize) {
      return null;
    }
    return new ByteRange(start, fileSize - 1);
  }

  /**
   * bytes=-SUFFIX  (last SUFFIX bytes)
   */
  static fromSuffix(suffix: number, fileSize: number): ByteRange | null {
    if (suffix === 0 || fileSize === 0) {
      return null;
    }
    return new ByteRange(Math.max(fileSize - suffix, 0), fileSize - 1);
  }

  /**
   * bytes=START-END, an END past the file is clamped to the last byte
   */
  static fromStartEnd(start: number, end: number, fileSize: number): ByteRange | null {
    if (start >= fileSize || end < start) {
      return null;
    }
    return new ByteRange(start, Math.min(end, fileSize - 1));
  }
}
