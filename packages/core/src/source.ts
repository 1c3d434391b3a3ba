import { open, readFile, stat } from "node:fs/promises";
import AdmZip from "adm-zip";
import { ArchiveMissingMemberError, SourceNotFoundError } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("source");
const utf8 = new TextDecoder("utf-8", { fatal: true });

export interface FileSnapshot {
  sizeBytes: number;
  mtimeMs: number;
}

export interface LogSourceContent {
  content: Buffer;
  /** Null for archive members, which never tail. */
  snapshot: FileSnapshot | null;
  isArchive: boolean;
  memberName: string;
}

export function isArchivePath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(".zip");
}

export function isTailablePath(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return lower.endsWith(".log") || lower.endsWith(".txt");
}

/** UTF-8, falling back to latin1 for logs written by Windows tools. */
export function decodeText(buffer: Buffer): string {
  try {
    return utf8.decode(buffer);
  } catch {
    return buffer.toString("latin1");
  }
}

export async function statSource(filePath: string): Promise<FileSnapshot> {
  try {
    const fileStat = await stat(filePath);
    return { sizeBytes: fileStat.size, mtimeMs: fileStat.mtimeMs };
  } catch (error) {
    throw new SourceNotFoundError(filePath, error);
  }
}

function readArchiveMember(archivePath: string): LogSourceContent {
  const zip = new AdmZip(archivePath);
  const member = zip
    .getEntries()
    .find((entry) => !entry.isDirectory && entry.entryName.toLowerCase().endsWith(".log"));
  if (!member) {
    throw new ArchiveMissingMemberError(archivePath);
  }
  log.debug(`reading archive member ${member.entryName} from ${archivePath}`);
  return { content: member.getData(), snapshot: null, isArchive: true, memberName: member.entryName };
}

export async function readLogSource(filePath: string): Promise<LogSourceContent> {
  const snapshot = await statSource(filePath);
  if (isArchivePath(filePath)) {
    return readArchiveMember(filePath);
  }
  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SourceNotFoundError(filePath, error);
  }
  return { content, snapshot: { sizeBytes: content.length, mtimeMs: snapshot.mtimeMs }, isArchive: false, memberName: "" };
}

export async function readFileChunk(filePath: string, offset: number, length: number): Promise<Buffer> {
  if (length <= 0) return Buffer.alloc(0);
  const fileHandle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await fileHandle.read(buffer, 0, buffer.length, offset);
    return buffer.subarray(0, bytesRead);
  } finally {
    await fileHandle.close();
  }
}
