/**
 * Utility for formatting byte values
 */
export class ByteFormatter {
  private static readonly UNIT = 1024;
  private static readonly PREFIXES = 'KMGTPE';

  /**
   * Formats bytes with binary prefixes: "512 B", "1.50 KB", "2.00 GB"
   */
  static toHumanReadable(bytes: number): string {
    const whole = Math.max(0, Math.trunc(bytes));
    if (whole < this.UNIT) {
      return `${whole} B`;
    }
    let div = this.UNIT;
    let exp = 0;
    for (let n = Math.trunc(whole / this.UNIT); n >= this.UNIT && exp < this.PREFIXES.length - 1; n = Math.trunc(n / this.UNIT)) {
      div *= this.UNIT;
      exp++;
    }
    return `${(whole / div).toFixed(2)} ${this.PREFIXES[exp]}B`;
  }

  /**
   * Formats a transfer rate, e.g. "1.00 MB/s"
   */
  static toSpeed(bytesPerSecond: number): string {
    return `${this.toHumanReadable(bytesPerSecond)}/s`;
  }

  /**
   * Share of total in percent, 0 for an empty total
   */
  static toPercentage(value: number, total: number): number {
    return total > 0 ? (value / total) * 100 : 0;
  }
}
