import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { createLogger } from "./logger.js";
import { errorMessage, expandHome } from "./utils.js";

const log = createLogger("discovery");

export const LOG_FILE_GLOBS = ["*.log", "*.txt", "*.zip"];

export interface DiscoveredLogFile {
  path: string;
  name: string;
  sizeBytes: number;
  mtimeMs: number;
  isArchive: boolean;
}

/** Candidate log sources directly inside `directory`, newest first. */
export async function discoverLogFiles(directory: string): Promise<DiscoveredLogFile[]> {
  const root = path.resolve(expandHome(directory));
  const matches = await fg(LOG_FILE_GLOBS, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    deep: 1,
    caseSensitiveMatch: false,
    suppressErrors: true,
    unique: true,
    followSymbolicLinks: false,
  });

  const files: DiscoveredLogFile[] = [];
  for (const filePath of matches) {
    try {
      const fileStat = await stat(filePath);
      files.push({
        path: path.resolve(filePath),
        name: path.basename(filePath),
        sizeBytes: fileStat.size,
        mtimeMs: fileStat.mtimeMs,
        isArchive: filePath.toLowerCase().endsWith(".zip"),
      });
    } catch (error) {
      log.debug(`skipping ${filePath}: ${errorMessage(error)}`);
    }
  }
  return files.sort((a, b) => b.mtimeMs - a.mtimeMs || a.name.localeCompare(b.name));
}
