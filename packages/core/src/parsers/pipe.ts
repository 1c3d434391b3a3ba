import type { ParsedLine } from "@knxlens/contracts";
import type { LineParser } from "./types.js";
import { buildParsedLine } from "./common.js";

const GROUP_ADDRESS_ANYWHERE = /\d+\/\d+\/\d+/;

/** `timestamp | source | source name | destination | destination name | payload` */
export class PipeLineParser implements LineParser {
  format = "pipe" as const;

  matches(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed.includes(" | ")) return false;
    const parts = trimmed.split("|");
    return parts.length > 4 && GROUP_ADDRESS_ANYWHERE.test(parts[3] ?? "");
  }

  parse(line: string): ParsedLine | null {
    const parts = line.trim().split("|").map((part) => part.trim());
    if (parts.length < 4) return null;
    return buildParsedLine({
      timestamp: parts[0],
      sourceKey: parts[1],
      destKey: parts[3],
      payload: parts[5],
    });
  }
}
