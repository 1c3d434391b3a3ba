import type { ParsedLine } from "@knxlens/contracts";
import type { LineParser } from "./types.js";
import { buildParsedLine, splitDelimited } from "./common.js";

const DELIMITER = ";";

/** Semicolon rows: 0 timestamp, 1 source, 4 destination, 6 payload. */
export class DelimitedLineParser implements LineParser {
  format = "delimited" as const;

  matches(line: string): boolean {
    return line.includes(DELIMITER);
  }

  parse(line: string): ParsedLine | null {
    const row = splitDelimited(line.trim(), DELIMITER);
    if (row.length < 5) return null;
    return buildParsedLine({
      timestamp: row[0],
      sourceKey: row[1],
      destKey: row[4],
      payload: row[6],
    });
  }
}
