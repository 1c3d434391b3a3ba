import type { LogRecord, ProjectionResult } from "@knxlens/contracts";
import { isShowingEverything, isVisible, type FilterCriteria } from "./filterEvaluator.js";

/** Unfiltered appends may run this far past the row cap before a full re-projection. */
export const APPEND_SLACK_ROWS = 1000;

export interface AppendProjection {
  rows: LogRecord[];
  reprojectNeeded: boolean;
}

export class DisplayProjector {
  private armed = true;
  private warning: string | null = null;
  private renderedCount = 0;

  constructor(private maxLogLines: number) {}

  get maxRows(): number {
    return this.maxLogLines;
  }

  setMaxRows(maxLogLines: number): void {
    this.maxLogLines = maxLogLines;
    this.rearm();
  }

  /** Called on every filter or selection change and on reload. */
  rearm(): void {
    this.armed = true;
    this.warning = null;
  }

  project(records: readonly LogRecord[], criteria: FilterCriteria): ProjectionResult {
    const matched = records.filter((record) => isVisible(record, criteria));
    const truncated = matched.length > this.maxLogLines;
    const rows = truncated ? matched.slice(-this.maxLogLines) : matched;
    if (truncated && this.armed) {
      this.armed = false;
      this.warning = `showing the last ${this.maxLogLines} of ${matched.length} matching rows`;
    }
    this.renderedCount = rows.length;
    return { rows, matchedCount: matched.length, truncated };
  }

  projectAppend(records: readonly LogRecord[], criteria: FilterCriteria): AppendProjection {
    const rows = records.filter((record) => isVisible(record, criteria));
    if (isShowingEverything(criteria) && this.renderedCount + rows.length > this.maxLogLines + APPEND_SLACK_ROWS) {
      return { rows: [], reprojectNeeded: true };
    }
    this.renderedCount += rows.length;
    return { rows, reprojectNeeded: false };
  }

  /** Returns the truncation warning once, then null until re-armed and truncated again. */
  takeWarning(): string | null {
    const out = this.warning;
    this.warning = null;
    return out;
  }
}
