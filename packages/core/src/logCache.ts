import type { LogRecord } from "@knxlens/contracts";

export interface AppendResult {
  appended: number;
  evicted: number;
}

export class LogCache {
  private items: LogRecord[] = [];

  constructor(private readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new RangeError(`cache size must be a positive integer, got ${maxSize}`);
    }
  }

  get capacity(): number {
    return this.maxSize;
  }

  get size(): number {
    return this.items.length;
  }

  records(): readonly LogRecord[] {
    return this.items;
  }

  clear(): void {
    this.items = [];
  }

  /** Full rebuild; only the newest `capacity` records survive. */
  replace(records: readonly LogRecord[]): void {
    this.items = records.length > this.maxSize ? records.slice(-this.maxSize) : records.slice();
  }

  append(records: readonly LogRecord[]): AppendResult {
    if (records.length === 0) return { appended: 0, evicted: 0 };
    const next = this.items.concat(records);
    const evicted = Math.max(0, next.length - this.maxSize);
    this.items = evicted > 0 ? next.slice(evicted) : next;
    return { appended: records.length, evicted };
  }
}
