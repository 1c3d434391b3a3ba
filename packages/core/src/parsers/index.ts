import type { LogFormat, ParsedLine, TimeFilter } from "@knxlens/contracts";
import type { LineParser } from "./types.js";
import { createLogger } from "../logger.js";
import { passesTimeFilter } from "../timeFilter.js";
import { errorMessage } from "../utils.js";
import { DETECTION_WINDOW, isContentLine } from "./common.js";
import { DelimitedLineParser } from "./delimited.js";
import { PipeLineParser } from "./pipe.js";

const log = createLogger("parser");

export interface ParseLinesResult {
  lines: ParsedLine[];
  skipped: number;
}

export class LineParserRegistry {
  private readonly parsers: LineParser[];

  constructor(parsers?: LineParser[]) {
    this.parsers = parsers ?? [new PipeLineParser(), new DelimitedLineParser()];
  }

  private byFormat(format: LogFormat): LineParser | undefined {
    return this.parsers.find((parser) => parser.format === format);
  }

  /** The first sniffed line any parser recognises decides the format. */
  detectFormat(lines: Iterable<string>): LogFormat | null {
    let inspected = 0;
    for (const line of lines) {
      if (!isContentLine(line)) continue;
      for (const parser of this.parsers) {
        if (parser.matches(line)) return parser.format;
      }
      inspected += 1;
      if (inspected >= DETECTION_WINDOW) break;
    }
    return null;
  }

  parseLine(line: string, format: LogFormat, timeFilter: TimeFilter | null = null): ParsedLine | null {
    const trimmed = line.trim();
    if (!trimmed) return null;
    const parser = this.byFormat(format);
    if (!parser) return null;
    try {
      const parsed = parser.parse(trimmed);
      if (!parsed) {
        log.debug(`skipping line without destination address: '${trimmed}'`);
        return null;
      }
      if (!passesTimeFilter(parsed.timestamp, timeFilter)) {
        return null;
      }
      return parsed;
    } catch (error) {
      log.debug(`skipping unparsable line '${trimmed}': ${errorMessage(error)}`);
      return null;
    }
  }

  parseLines(lines: Iterable<string>, format: LogFormat, timeFilter: TimeFilter | null = null): ParseLinesResult {
    const out: ParsedLine[] = [];
    let skipped = 0;
    for (const line of lines) {
      if (!line.trim()) continue;
      const parsed = this.parseLine(line, format, timeFilter);
      if (parsed) {
        out.push(parsed);
      } else {
        skipped += 1;
      }
    }
    return { lines: out, skipped };
  }
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
