import type { ParsedLine } from "@knxlens/contracts";
import { GROUP_ADDRESS_PATTERN, NOT_AVAILABLE } from "../utils.js";

export const DETECTION_WINDOW = 20;

export function isSeparatorLine(line: string): boolean {
  return line.trim().startsWith("=");
}

export function isContentLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 0 && !isSeparatorLine(trimmed);
}

export function isGroupAddress(value: string): boolean {
  return GROUP_ADDRESS_PATTERN.test(value);
}

/**
 * Splits one row on `delimiter`, honouring double-quoted fields and `""` escapes.
 */
export function splitDelimited(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;
  let fieldStart = true;

  for (let idx = 0; idx < line.length; idx += 1) {
    const char = line[idx];
    if (inQuotes) {
      if (char === '"') {
        if (line[idx + 1] === '"') {
          current += '"';
          idx += 1;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }
    if (char === '"' && fieldStart) {
      inQuotes = true;
      fieldStart = false;
      continue;
    }
    if (char === delimiter) {
      fields.push(current);
      current = "";
      fieldStart = true;
      continue;
    }
    current += char;
    fieldStart = false;
  }
  fields.push(current);
  return fields;
}

export function buildParsedLine(fields: {
  timestamp: string | undefined;
  sourceKey: string | undefined;
  destKey: string | undefined;
  payload: string | undefined;
}): ParsedLine | null {
  const timestamp = fields.timestamp?.trim() ?? "";
  const destKey = fields.destKey?.trim() ?? "";
  if (!timestamp || !destKey || !isGroupAddress(destKey)) return null;
  const sourceKey = fields.sourceKey?.trim() || NOT_AVAILABLE;
  return {
    timestamp,
    sourceKey,
    destKey,
    payload: fields.payload === undefined ? null : fields.payload.trim(),
  };
}
