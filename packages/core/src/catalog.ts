import { readFile } from "node:fs/promises";
import type {
  CatalogArea,
  CatalogChannel,
  CatalogCommunicationObject,
  CatalogDevice,
  CatalogGroupAddress,
  CatalogGroupRange,
  CatalogLine,
  CatalogSpace,
  ProjectCatalog,
} from "@knxlens/contracts";
import { CatalogLoadError } from "./errors.js";
import { createLogger } from "./logger.js";
import { asArray, asRecord, asString, asStringArray, errorMessage, md5File } from "./utils.js";

const log = createLogger("catalog");

export const PROJECT_CACHE_SUFFIX = ".cache.json";

function mapRecord<T>(value: unknown, normalize: (entry: Record<string, unknown>) => T): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [key, entry] of Object.entries(asRecord(value))) {
    out[key] = normalize(asRecord(entry));
  }
  return out;
}

function optionalString(value: unknown): string | undefined {
  const text = asString(value).trim();
  return text ? text : undefined;
}

function normalizeChannel(raw: Record<string, unknown>): CatalogChannel {
  const channel: CatalogChannel = { communication_object_ids: asStringArray(raw.communication_object_ids) };
  const name = optionalString(raw.name);
  const text = optionalString(raw.text);
  const functionText = optionalString(raw.function_text);
  if (name !== undefined) channel.name = name;
  if (text !== undefined) channel.text = text;
  if (functionText !== undefined) channel.function_text = functionText;
  return channel;
}

function normalizeDevice(raw: Record<string, unknown>): CatalogDevice {
  return {
    name: asString(raw.name).trim(),
    channels: mapRecord(raw.channels, normalizeChannel),
    communication_object_ids: asStringArray(raw.communication_object_ids),
  };
}

function normalizeCommunicationObject(raw: Record<string, unknown>): CatalogCommunicationObject {
  const co: CatalogCommunicationObject = { group_address_links: asStringArray(raw.group_address_links) };
  const name = optionalString(raw.name);
  const text = optionalString(raw.text);
  const functionText = optionalString(raw.function_text);
  if (name !== undefined) co.name = name;
  if (text !== undefined) co.text = text;
  if (functionText !== undefined) co.function_text = functionText;
  if (typeof raw.number === "number" || typeof raw.number === "string") co.number = raw.number;
  return co;
}

function normalizeGroupAddress(raw: Record<string, unknown>): CatalogGroupAddress {
  const address: CatalogGroupAddress = { name: asString(raw.name).trim() };
  if (raw.dpt !== undefined && raw.dpt !== null) address.dpt = raw.dpt;
  return address;
}

function normalizeGroupRange(raw: Record<string, unknown>): CatalogGroupRange {
  const range: CatalogGroupRange = {};
  const name = optionalString(raw.name);
  if (name !== undefined) range.name = name;
  if (raw.group_ranges && typeof raw.group_ranges === "object") {
    range.group_ranges = mapRecord(raw.group_ranges, normalizeGroupRange);
  }
  return range;
}

function normalizeSpace(raw: Record<string, unknown>): CatalogSpace {
  const space: CatalogSpace = {
    devices: asArray(raw.devices).map((item) => asString(item)).filter(Boolean),
    spaces: mapRecord(raw.spaces, normalizeSpace),
  };
  const name = optionalString(raw.name);
  const identifier = optionalString(raw.identifier);
  if (name !== undefined) space.name = name;
  if (identifier !== undefined) space.identifier = identifier;
  return space;
}

function normalizeLine(raw: Record<string, unknown>): CatalogLine {
  const line: CatalogLine = { address: asString(raw.address) };
  const name = optionalString(raw.name);
  if (name !== undefined) line.name = name;
  return line;
}

function normalizeArea(raw: Record<string, unknown>): CatalogArea {
  const area: CatalogArea = { address: asString(raw.address), lines: mapRecord(raw.lines, normalizeLine) };
  const name = optionalString(raw.name);
  if (name !== undefined) area.name = name;
  return area;
}

/**
 * Accepts either a bare project object or the `{ md5, project }` cache wrapper the
 * project loader writes. Missing sections become empty maps.
 */
export function normalizeCatalog(input: unknown): ProjectCatalog {
  const root = asRecord(input);
  const project = "project" in root && "md5" in root ? asRecord(root.project) : root;
  return {
    devices: mapRecord(project.devices, normalizeDevice),
    group_addresses: mapRecord(project.group_addresses, normalizeGroupAddress),
    group_ranges: mapRecord(project.group_ranges, normalizeGroupRange),
    communication_objects: mapRecord(project.communication_objects, normalizeCommunicationObject),
    locations: mapRecord(project.locations, normalizeSpace),
    topology: { areas: mapRecord(asRecord(project.topology).areas, normalizeArea) },
  };
}

export function emptyCatalog(): ProjectCatalog {
  return normalizeCatalog({});
}

export async function loadCatalog(catalogPath: string): Promise<ProjectCatalog> {
  let raw: string;
  try {
    raw = await readFile(catalogPath, "utf8");
  } catch (error) {
    throw new CatalogLoadError(`project catalog not found: ${catalogPath}`, error);
  }
  try {
    return normalizeCatalog(JSON.parse(raw));
  } catch (error) {
    throw new CatalogLoadError(`project catalog is not valid JSON: ${catalogPath} (${errorMessage(error)})`, error);
  }
}

/**
 * Resolves a project path to its parsed catalog. JSON paths load directly; a vendor project
 * file is served from its `<path>.cache.json` sibling when the cached hash still matches.
 */
export async function loadProjectCatalog(projectPath: string): Promise<ProjectCatalog> {
  if (projectPath.toLowerCase().endsWith(".json")) {
    return loadCatalog(projectPath);
  }

  let currentMd5: string;
  try {
    currentMd5 = await md5File(projectPath);
  } catch (error) {
    throw new CatalogLoadError(`project file not found: ${projectPath}`, error);
  }

  const cachePath = `${projectPath}${PROJECT_CACHE_SUFFIX}`;
  let cache: Record<string, unknown>;
  try {
    cache = asRecord(JSON.parse(await readFile(cachePath, "utf8")));
  } catch (error) {
    throw new CatalogLoadError(
      `no parsed catalog for ${projectPath}; expected ${cachePath} written by the project loader`,
      error,
    );
  }
  if (asString(cache.md5) !== currentMd5) {
    throw new CatalogLoadError(`catalog cache ${cachePath} is stale; re-run the project loader`);
  }
  log.info(`project ${projectPath} loaded from cache`);
  return normalizeCatalog(cache.project);
}

export interface CatalogLookup {
  deviceName(key: string): string | undefined;
  addressName(key: string): string | undefined;
}

export function createCatalogLookup(catalog: ProjectCatalog): CatalogLookup {
  const devices = new Map(Object.entries(catalog.devices).map(([key, device]) => [key, device.name]));
  const addresses = new Map(Object.entries(catalog.group_addresses).map(([key, address]) => [key, address.name]));
  return {
    deviceName: (key) => devices.get(key) || undefined,
    addressName: (key) => addresses.get(key) || undefined,
  };
}
