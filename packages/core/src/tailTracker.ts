import type { TailCursor, TailDecision } from "@knxlens/contracts";
import { readFileChunk, type FileSnapshot } from "./source.js";

const NEWLINE = 0x0a;

export function decideTail(cursor: TailCursor, snapshot: FileSnapshot): TailDecision {
  if (snapshot.sizeBytes < cursor.sizeBytes) return "truncated";
  if (snapshot.sizeBytes === cursor.sizeBytes && snapshot.mtimeMs === cursor.mtimeMs) return "unchanged";
  return "append";
}

function splitAtLastNewline(buffer: Buffer): { complete: Buffer; rest: Buffer } {
  const lastNewline = buffer.lastIndexOf(NEWLINE);
  if (lastNewline < 0) return { complete: Buffer.alloc(0), rest: buffer };
  return { complete: buffer.subarray(0, lastNewline + 1), rest: buffer.subarray(lastNewline + 1) };
}

/**
 * Remembers how far a growing file has been consumed. Bytes after the last newline stay
 * pending until their line is terminated; an unchanged poll never takes them in.
 */
export class TailTracker {
  private cursor: TailCursor | null = null;
  private pending: Buffer = Buffer.alloc(0);

  get position(): TailCursor | null {
    return this.cursor ? { ...this.cursor } : null;
  }

  get hasPending(): boolean {
    return this.pending.length > 0;
  }

  reset(): void {
    this.cursor = null;
    this.pending = Buffer.alloc(0);
  }

  /** Starts tracking after a full read; returns the bytes holding complete lines. */
  begin(content: Buffer, snapshot: FileSnapshot): Buffer {
    const { complete, rest } = splitAtLastNewline(content);
    this.pending = Buffer.from(rest);
    this.cursor = { offset: content.length, sizeBytes: snapshot.sizeBytes, mtimeMs: snapshot.mtimeMs };
    return complete;
  }

  check(snapshot: FileSnapshot): TailDecision {
    if (!this.cursor) return "truncated";
    return decideTail(this.cursor, snapshot);
  }

  async readAppended(filePath: string, snapshot: FileSnapshot): Promise<Buffer> {
    if (!this.cursor) {
      throw new Error("tail tracker has no cursor; run a full load first");
    }
    const offset = this.cursor.offset;
    const chunk = await readFileChunk(filePath, offset, snapshot.sizeBytes - offset);
    const { complete, rest } = splitAtLastNewline(Buffer.concat([this.pending, chunk]));
    this.pending = Buffer.from(rest);
    this.cursor = { offset: offset + chunk.length, sizeBytes: snapshot.sizeBytes, mtimeMs: snapshot.mtimeMs };
    return complete;
  }
}
