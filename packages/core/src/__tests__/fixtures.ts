import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { LogRecord } from "@knxlens/contracts";
import { buildSearchString } from "../enricher.js";

export const SAMPLE_PROJECT = {
  devices: {
    "1.1.5": {
      name: "Sensor A",
      channels: {
        "1": { text: "Temperature", function_text: "Living room", communication_object_ids: ["co1"] },
      },
      communication_object_ids: ["co1", "co2"],
    },
    "1.1.6": {
      name: "Switch actuator",
      channels: { "2": { name: "Channel B", communication_object_ids: ["co3"] } },
      communication_object_ids: ["co3"],
    },
  },
  group_addresses: {
    "1/2/3": { name: "Temp", dpt: { main: 9, sub: 1 } },
    "1/2/4": { name: "Humidity" },
    "1/1/1": { name: "Light kitchen" },
    "2/0/1": { name: "" },
  },
  group_ranges: {
    "1": { name: "Climate", group_ranges: { "1/2": { name: "Sensors" } } },
    "2": { name: "Misc" },
  },
  communication_objects: {
    co1: { name: "Temp out", number: 1, group_address_links: ["1/2/3"] },
    co2: { text: "Humidity", number: 2, group_address_links: ["1/2/4"] },
    co3: { name: "Switch", number: 0, group_address_links: ["1/1/1", "1/2/3"] },
  },
  locations: {
    house: {
      name: "House",
      identifier: "house",
      devices: [],
      spaces: {
        living: { name: "Living room", identifier: "living", devices: ["1.1.5"], spaces: {} },
        kitchen: { name: "Kitchen", identifier: "kitchen", devices: ["1.1.6"], spaces: {} },
      },
    },
  },
  topology: {
    areas: {
      a1: { address: 1, name: "Ground floor", lines: { l1: { address: 1, name: "Main line" } } },
    },
  },
};

export function pipeRow(timestamp: string, source: string, dest: string, payload?: string): string {
  const base = `${timestamp} | ${source.padEnd(9)} |${"".padEnd(30)} | ${dest.padEnd(8)} | ${"".padEnd(34)}`;
  return payload === undefined ? base : `${base}| ${payload}`;
}

export async function tempDir(prefix = "knx-lens-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeLines(filePath: string, lines: string[]): Promise<void> {
  await writeFile(filePath, lines.map((line) => `${line}\n`).join(""), "utf8");
}

export function makeRecord(fields: {
  timestamp?: string;
  sourceKey?: string;
  sourceName?: string;
  destKey: string;
  destName?: string;
  payload?: string;
}): LogRecord {
  const base = {
    timestamp: fields.timestamp ?? "2024-05-01 10:00:00",
    sourceKey: fields.sourceKey ?? "1.1.1",
    sourceName: fields.sourceName ?? "N/A",
    destKey: fields.destKey,
    destName: fields.destName ?? "N/A",
    payload: fields.payload ?? "N/A",
  };
  return { ...base, searchString: buildSearchString(base) };
}
