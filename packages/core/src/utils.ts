import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import os from "node:os";
import path from "node:path";

export const GROUP_ADDRESS_PATTERN = /^\d+\/\d+\/\d+/;
export const EXACT_GROUP_ADDRESS_PATTERN = /^\d+\/\d+\/\d+$/;
export const NOT_AVAILABLE = "N/A";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

export function asString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asStringArray(value: unknown): string[] {
  return asArray(value)
    .map((item) => asString(item).trim())
    .filter((item) => item.length > 0);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function naturalParts(input: string): Array<string | number> {
  return input
    .split(/(\d+)/)
    .filter((part) => part !== "")
    .map((part) => (/^\d+$/.test(part) ? Number(part) : part.toLowerCase()));
}

export function compareNatural(left: string, right: string): number {
  const a = naturalParts(left);
  const b = naturalParts(right);
  const len = Math.min(a.length, b.length);
  for (let idx = 0; idx < len; idx += 1) {
    const lhs = a[idx];
    const rhs = b[idx];
    if (lhs === rhs || lhs === undefined || rhs === undefined) continue;
    if (typeof lhs === "number" && typeof rhs === "number") return lhs - rhs;
    if (typeof lhs === "number") return -1;
    if (typeof rhs === "number") return 1;
    return lhs < rhs ? -1 : 1;
  }
  return a.length - b.length;
}

export async function md5File(filePath: string): Promise<string> {
  const hash = createHash("md5");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export function pathTail(inputPath: string): string {
  const trimmed = inputPath.replace(/[\\/]+$/g, "");
  if (!trimmed) return inputPath;
  const parts = trimmed.split(/[\\/]/);
  return parts[parts.length - 1] || trimmed;
}
