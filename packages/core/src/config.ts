import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AppConfig, FiltersConfig, LogConfig, ProjectConfig } from "@knxlens/contracts";
import { DEFAULT_CONFIG, DEFAULT_LOG_FILE_NAME, DEFAULT_NAMED_FILTER_FILE_NAME } from "./defaults.js";
import { createLogger } from "./logger.js";
import { parseTimeOfDay } from "./timeFilter.js";
import { expandHome } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".knx-lens", "config.toml");

const log = createLogger("config");

export interface PartialAppConfigInput {
  project?: Partial<ProjectConfig>;
  log?: Partial<LogConfig>;
  filters?: Partial<FiltersConfig>;
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const numeric = Number(value);
    return Number.isFinite(numeric) ? numeric : null;
  }
  return null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function trimmedOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" ? value.trim() : fallback;
}

function timeOrEmpty(value: unknown): string {
  const raw = trimmedOrDefault(value, "");
  if (!raw) return "";
  return parseTimeOfDay(raw) ? raw : "";
}

function mergeProject(input?: Partial<ProjectConfig>): ProjectConfig {
  const defaults = DEFAULT_CONFIG.project;
  return {
    path: trimmedOrDefault(input?.path, defaults.path),
    password: typeof input?.password === "string" ? input.password : defaults.password,
  };
}

function mergeLog(input?: Partial<LogConfig>): LogConfig {
  const defaults = DEFAULT_CONFIG.log;
  return {
    file: trimmedOrDefault(input?.file, defaults.file),
    path: trimmedOrDefault(input?.path, defaults.path) || defaults.path,
    maxLogLines: positiveIntOrDefault(input?.maxLogLines, defaults.maxLogLines),
    maxCacheSize: positiveIntOrDefault(input?.maxCacheSize, defaults.maxCacheSize),
    pollIntervalMs: positiveIntOrDefault(input?.pollIntervalMs, defaults.pollIntervalMs),
    idleTimeoutMs: positiveIntOrDefault(input?.idleTimeoutMs, defaults.idleTimeoutMs),
    timeFilterStart: timeOrEmpty(input?.timeFilterStart),
    timeFilterEnd: timeOrEmpty(input?.timeFilterEnd),
  };
}

function mergeFilters(input?: Partial<FiltersConfig>): FiltersConfig {
  return {
    path: trimmedOrDefault(input?.path, DEFAULT_CONFIG.filters.path),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    project: mergeProject(input?.project),
    log: mergeLog(input?.log),
    filters: mergeFilters(input?.filters),
  };
}

/**
 * Environment variables win over the file, mirroring the `.env` keys the bus logger writes.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const overrides: PartialAppConfigInput = {
    project: { ...config.project },
    log: { ...config.log },
    filters: { ...config.filters },
  };
  if (env.KNX_PROJECT_PATH) overrides.project = { ...overrides.project, path: env.KNX_PROJECT_PATH };
  if (env.KNX_PASSWORD) overrides.project = { ...overrides.project, password: env.KNX_PASSWORD };
  if (env.LOG_FILE) overrides.log = { ...overrides.log, file: env.LOG_FILE };
  if (env.LOG_PATH) overrides.log = { ...overrides.log, path: env.LOG_PATH };
  if (env.MAX_LOG_LINES) overrides.log = { ...overrides.log, maxLogLines: Number(env.MAX_LOG_LINES) };
  return mergeConfig(overrides);
}

export function resolveLogFilePath(config: AppConfig): string {
  if (config.log.file) return path.resolve(expandHome(config.log.file));
  return path.resolve(expandHome(config.log.path), DEFAULT_LOG_FILE_NAME);
}

export function resolveNamedFilterPath(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): string {
  if (config.filters.path) return path.resolve(expandHome(config.filters.path));
  return path.join(path.dirname(configPath), DEFAULT_NAMED_FILTER_FILE_NAME);
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return mergeConfig();
  }
  try {
    const parsed = TOML.parse(raw) as PartialAppConfigInput;
    return mergeConfig(parsed);
  } catch (error) {
    log.warn(`ignoring unreadable config ${configPath}:`, error);
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}
