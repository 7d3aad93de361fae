/**
 * Warnings held back while the alternate screen is up.
 *
 * Identical messages collapse into one entry with a count, and only the
 * first MAX_DISTINCT_WARNINGS distinct messages are kept.
 */

export const MAX_DISTINCT_WARNINGS = 50;

interface Entry {
  readonly args: unknown[];
  count: number;
}

export class WarningBuffer {
  private readonly entries = new Map<string, Entry>();
  private dropped = 0;

  get size(): number {
    return this.entries.size;
  }

  add(args: unknown[]): void {
    const key = args.map(String).join(" ");
    const entry = this.entries.get(key);
    if (entry) {
      entry.count++;
      return;
    }
    if (this.entries.size >= MAX_DISTINCT_WARNINGS) {
      this.dropped++;
      return;
    }
    this.entries.set(key, { args, count: 1 });
  }

  /**
   * Hand every held warning to `warn`, oldest first, and empty the buffer.
   */
  flush(warn: (...args: unknown[]) => void): void {
    for (const { args, count } of this.entries.values()) {
      if (count > 1) {
        warn(...args, `(repeated ${count} times)`);
      } else {
        warn(...args);
      }
    }
    if (this.dropped > 0) {
      warn(`${this.dropped} more warnings not shown`);
    }
    this.entries.clear();
    this.dropped = 0;
  }
}
