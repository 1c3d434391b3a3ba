import type { PayloadHistoryEntry } from "@knxlens/contracts";

export const ANNOTATION_DEPTH = 3;

/** Entries kept per address; older ones are dropped first. */
export const HISTORY_LIMIT = ANNOTATION_DEPTH * 10;

export class PayloadHistoryStore {
  private readonly byKey = new Map<string, PayloadHistoryEntry[]>();

  get size(): number {
    return this.byKey.size;
  }

  clear(): void {
    this.byKey.clear();
  }

  /** Keeps each key's list ascending by timestamp; in-order appends stay O(1). */
  append(destKey: string, entry: PayloadHistoryEntry): void {
    let entries = this.byKey.get(destKey);
    if (!entries) {
      entries = [];
      this.byKey.set(destKey, entries);
    }
    let insertAt = entries.length;
    while (insertAt > 0 && (entries[insertAt - 1]?.timestamp ?? "") > entry.timestamp) {
      insertAt -= 1;
    }
    entries.splice(insertAt, 0, { timestamp: entry.timestamp, payload: entry.payload });
    if (entries.length > HISTORY_LIMIT) entries.splice(0, entries.length - HISTORY_LIMIT);
  }

  get(destKey: string): readonly PayloadHistoryEntry[] {
    return this.byKey.get(destKey) ?? [];
  }

  /** Most recent entries across `destKeys`, oldest first. */
  latest(destKeys: Iterable<string>, count = ANNOTATION_DEPTH): PayloadHistoryEntry[] {
    const combined: PayloadHistoryEntry[] = [];
    for (const key of destKeys) {
      const entries = this.byKey.get(key);
      if (!entries) continue;
      combined.push(...entries.slice(-count));
    }
    combined.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
    return combined.slice(-count);
  }

  /** `"<latest> (<previous>, <older>)"`, or "" when nothing was seen. */
  annotation(destKeys: Iterable<string>): string {
    const latest = this.latest(destKeys);
    const current = latest[latest.length - 1];
    if (!current) return "";
    const previous = latest
      .slice(0, -1)
      .reverse()
      .map((entry) => entry.payload);
    return previous.length > 0 ? `${current.payload} (${previous.join(", ")})` : current.payload;
  }
}
