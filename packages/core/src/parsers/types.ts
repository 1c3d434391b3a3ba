import type { LogFormat, ParsedLine } from "@knxlens/contracts";

export interface LineParser {
  format: LogFormat;
  /** True when a sniffed line has this parser's layout. */
  matches(line: string): boolean;
  /** Null for lines that do not carry a usable record. */
  parse(line: string): ParsedLine | null;
}
