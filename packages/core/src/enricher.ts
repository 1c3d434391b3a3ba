import type { LogRecord, ParsedLine } from "@knxlens/contracts";
import type { CatalogLookup } from "./catalog.js";
import { NOT_AVAILABLE } from "./utils.js";

export function buildSearchString(fields: Omit<LogRecord, "searchString">): string {
  return [fields.timestamp, fields.sourceKey, fields.sourceName, fields.destKey, fields.destName, fields.payload]
    .join(" ")
    .toLowerCase();
}

export function enrichLine(line: ParsedLine, lookup: CatalogLookup): LogRecord {
  const fields = {
    timestamp: line.timestamp,
    sourceKey: line.sourceKey,
    sourceName: lookup.deviceName(line.sourceKey) ?? NOT_AVAILABLE,
    destKey: line.destKey,
    destName: lookup.addressName(line.destKey) ?? NOT_AVAILABLE,
    payload: line.payload ?? NOT_AVAILABLE,
  };
  return Object.freeze({ ...fields, searchString: buildSearchString(fields) });
}
