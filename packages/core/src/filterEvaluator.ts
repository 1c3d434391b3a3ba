import type { LogRecord } from "@knxlens/contracts";
import { InvalidPatternError } from "./errors.js";
import type { SelectionModel } from "./selection.js";

export interface FilterCriteria {
  orKeys: ReadonlySet<string>;
  regexes: readonly RegExp[];
  globalRegex: RegExp | null;
}

export const SHOW_EVERYTHING: FilterCriteria = { orKeys: new Set(), regexes: [], globalRegex: null };

export function buildCriteria(selection: SelectionModel, globalRegex: RegExp | null): FilterCriteria {
  return { orKeys: selection.effectiveOrKeys(), regexes: selection.activeRegexes(), globalRegex };
}

export function isShowingEverything(criteria: FilterCriteria): boolean {
  return criteria.orKeys.size === 0 && criteria.regexes.length === 0 && criteria.globalRegex === null;
}

export function isVisible(record: LogRecord, criteria: FilterCriteria): boolean {
  const orMatch =
    (criteria.orKeys.size === 0 && criteria.regexes.length === 0) ||
    criteria.orKeys.has(record.destKey) ||
    criteria.regexes.some((regex) => regex.test(record.searchString));
  if (!orMatch) return false;
  return criteria.globalRegex === null || criteria.globalRegex.test(record.searchString);
}

export function compileCaseInsensitive(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern, "i");
  } catch {
    return null;
  }
}

/** Empty input clears the regex; a pattern that does not compile throws. */
export function compileGlobalRegex(pattern: string): RegExp | null {
  if (!pattern.trim()) return null;
  try {
    return new RegExp(pattern, "i");
  } catch (error) {
    throw new InvalidPatternError(pattern, error);
  }
}
