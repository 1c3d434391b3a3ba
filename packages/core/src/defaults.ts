import type { AppConfig } from "@knxlens/contracts";

export const DEFAULT_LOG_FILE_NAME = "knx_bus.log";
export const DEFAULT_NAMED_FILTER_FILE_NAME = "named_filters.toml";

export const DEFAULT_CONFIG: AppConfig = {
  project: {
    path: "",
    password: "",
  },
  log: {
    file: "",
    path: ".",
    maxLogLines: 10_000,
    maxCacheSize: 50_000,
    pollIntervalMs: 2_000,
    idleTimeoutMs: 3_600_000,
    timeFilterStart: "",
    timeFilterEnd: "",
  },
  filters: {
    path: "",
  },
};
