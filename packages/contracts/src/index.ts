export type LogFormat = "pipe" | "delimited";
export type TreeKind = "building" | "devices" | "addresses";
export type SelectionPrefix = "none" | "partial" | "all";
export type EntityKind = "group_address" | "communication_object";
export type SessionState = "closed" | "loaded" | "tailing" | "reloading" | "tailing_disabled" | "static";
export type TailDecision = "unchanged" | "append" | "truncated";

export interface ParsedLine {
  timestamp: string;
  sourceKey: string;
  destKey: string;
  payload: string | null;
}

export interface LogRecord {
  readonly timestamp: string;
  readonly sourceKey: string;
  readonly sourceName: string;
  readonly destKey: string;
  readonly destName: string;
  readonly payload: string;
  readonly searchString: string;
}

export interface PayloadHistoryEntry {
  timestamp: string;
  payload: string;
}

export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

export interface TimeFilter {
  start: TimeOfDay | null;
  end: TimeOfDay | null;
}

export interface CatalogDevice {
  name: string;
  channels: Record<string, CatalogChannel>;
  communication_object_ids: string[];
}

export interface CatalogChannel {
  name?: string;
  text?: string;
  function_text?: string;
  communication_object_ids: string[];
}

export interface CatalogCommunicationObject {
  name?: string;
  text?: string;
  function_text?: string;
  number?: number | string;
  group_address_links: string[];
}

export interface CatalogGroupAddress {
  name: string;
  dpt?: unknown;
}

export interface CatalogGroupRange {
  name?: string;
  group_ranges?: Record<string, CatalogGroupRange>;
}

export interface CatalogSpace {
  name?: string;
  identifier?: string;
  devices: string[];
  spaces: Record<string, CatalogSpace>;
}

export interface CatalogLine {
  address: number | string;
  name?: string;
}

export interface CatalogArea {
  address: number | string;
  name?: string;
  lines: Record<string, CatalogLine>;
}

export interface ProjectCatalog {
  devices: Record<string, CatalogDevice>;
  group_addresses: Record<string, CatalogGroupAddress>;
  group_ranges: Record<string, CatalogGroupRange>;
  communication_objects: Record<string, CatalogCommunicationObject>;
  locations: Record<string, CatalogSpace>;
  topology: { areas: Record<string, CatalogArea> };
}

export type TreeNodeKind =
  | { type: "branch" }
  | { type: "leaf"; entityKind: EntityKind; destKeys: ReadonlySet<string>; displayName: string };

export interface TreeData {
  id: string;
  label: string;
  kind: TreeNodeKind;
  children: Map<string, TreeData>;
}

export interface RenderedTreeNode {
  id: string;
  label: string;
  prefix: SelectionPrefix;
  annotation: string;
  children: RenderedTreeNode[];
}

export interface NamedFilterRules {
  keys: Set<string>;
  regexes: RegExp[];
}

export interface ProjectConfig {
  path: string;
  password: string;
}

export interface LogConfig {
  file: string;
  path: string;
  maxLogLines: number;
  maxCacheSize: number;
  pollIntervalMs: number;
  idleTimeoutMs: number;
  timeFilterStart: string;
  timeFilterEnd: string;
}

export interface FiltersConfig {
  path: string;
}

export interface AppConfig {
  project: ProjectConfig;
  log: LogConfig;
  filters: FiltersConfig;
}

export interface TailCursor {
  offset: number;
  mtimeMs: number;
  sizeBytes: number;
}

export interface ProjectionResult {
  rows: LogRecord[];
  matchedCount: number;
  truncated: boolean;
}

export interface SessionStatus {
  state: SessionState;
  sourcePath: string;
  format: LogFormat | null;
  cachedRecords: number;
  lastError: string;
  tailingPaused: boolean;
}

export type StreamEventType =
  | "session_loaded"
  | "records_appended"
  | "session_reloaded"
  | "session_error"
  | "filters_changed"
  | "state_changed";

export interface StreamEnvelope {
  id: string;
  type: StreamEventType;
  version: number;
  payload: Record<string, unknown>;
}
