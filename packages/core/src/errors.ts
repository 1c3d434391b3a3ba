export type ErrorCategory =
  | "format_undetermined"
  | "source_not_found"
  | "archive_missing_member"
  | "catalog_load"
  | "invalid_pattern"
  | "invalid_time"
  | "filter_store";

export class KnxLensError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.category = category;
    this.name = "KnxLensError";
  }
}

export class FormatUndeterminedError extends KnxLensError {
  constructor(sourcePath: string) {
    super(
      "format_undetermined",
      `cannot determine log format of ${sourcePath} (expected "timestamp | source | ... | destination | ..." or ";"-separated rows)`,
    );
    this.name = "FormatUndeterminedError";
  }
}

export class SourceNotFoundError extends KnxLensError {
  constructor(sourcePath: string, cause?: unknown) {
    super("source_not_found", `log file not found: ${sourcePath}`, { cause });
    this.name = "SourceNotFoundError";
  }
}

export class ArchiveMissingMemberError extends KnxLensError {
  constructor(archivePath: string) {
    super("archive_missing_member", `no .log file found in archive: ${archivePath}`);
    this.name = "ArchiveMissingMemberError";
  }
}

export class CatalogLoadError extends KnxLensError {
  constructor(message: string, cause?: unknown) {
    super("catalog_load", message, { cause });
    this.name = "CatalogLoadError";
  }
}

export class InvalidPatternError extends KnxLensError {
  constructor(pattern: string, cause?: unknown) {
    super("invalid_pattern", `invalid regular expression: ${pattern}`, { cause });
    this.name = "InvalidPatternError";
  }
}

export class InvalidTimeError extends KnxLensError {
  constructor(value: string) {
    super("invalid_time", `invalid time of day: ${value} (expected HH:MM or HH:MM:SS)`);
    this.name = "InvalidTimeError";
  }
}

export class FilterStoreError extends KnxLensError {
  constructor(message: string, cause?: unknown) {
    super("filter_store", message, { cause });
    this.name = "FilterStoreError";
  }
}

export function isKnxLensError(error: unknown): error is KnxLensError {
  return error instanceof KnxLensError;
}
