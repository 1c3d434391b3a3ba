import type { NamedFilterRules, SelectionPrefix } from "@knxlens/contracts";

export type ToggleOutcome = "selected" | "deselected" | "noop";

export function prefixForKeys(keys: ReadonlySet<string>, selected: ReadonlySet<string>): SelectionPrefix {
  if (keys.size === 0) return "none";
  let hits = 0;
  for (const key of keys) {
    if (selected.has(key)) hits += 1;
  }
  if (hits === 0) return "none";
  return hits === keys.size ? "all" : "partial";
}

/**
 * Tree-picked keys plus the set of active named filters. `version` increments on every
 * mutation so views can tell when their cached prefixes are stale.
 */
export class SelectionModel {
  private readonly selected = new Set<string>();
  private readonly active = new Set<string>();
  private filters: ReadonlyMap<string, NamedFilterRules> = new Map();
  private revision = 0;

  get version(): number {
    return this.revision;
  }

  get selectedKeys(): ReadonlySet<string> {
    return this.selected;
  }

  get activeNamedFilters(): ReadonlySet<string> {
    return this.active;
  }

  get namedFilters(): ReadonlyMap<string, NamedFilterRules> {
    return this.filters;
  }

  private bump(): void {
    this.revision += 1;
  }

  /** Replaces the filter definitions; active names that vanished are dropped. */
  setNamedFilters(filters: ReadonlyMap<string, NamedFilterRules>): void {
    this.filters = filters;
    for (const name of Array.from(this.active)) {
      if (!filters.has(name)) this.active.delete(name);
    }
    this.bump();
  }

  isSelected(key: string): boolean {
    return this.selected.has(key);
  }

  select(keys: Iterable<string>): void {
    for (const key of keys) this.selected.add(key);
    this.bump();
  }

  deselect(keys: Iterable<string>): void {
    for (const key of keys) this.selected.delete(key);
    this.bump();
  }

  /** A fully selected set is removed; anything less is promoted to fully selected. */
  toggleKeys(keys: ReadonlySet<string>): ToggleOutcome {
    if (keys.size === 0) return "noop";
    if (prefixForKeys(keys, this.selected) === "all") {
      this.deselect(keys);
      return "deselected";
    }
    this.select(keys);
    return "selected";
  }

  clear(): void {
    this.selected.clear();
    this.active.clear();
    this.bump();
  }

  /** Returns whether the filter is active afterwards; unknown names stay inactive. */
  toggleNamedFilter(name: string): boolean {
    if (this.active.has(name)) {
      this.active.delete(name);
      this.bump();
      return false;
    }
    if (!this.filters.has(name)) return false;
    this.active.add(name);
    this.bump();
    return true;
  }

  effectiveOrKeys(): Set<string> {
    const keys = new Set(this.selected);
    for (const name of this.active) {
      for (const key of this.filters.get(name)?.keys ?? []) keys.add(key);
    }
    return keys;
  }

  activeRegexes(): RegExp[] {
    const out: RegExp[] = [];
    for (const name of this.active) {
      out.push(...(this.filters.get(name)?.regexes ?? []));
    }
    return out;
  }

  namedFilterPrefix(name: string): SelectionPrefix {
    if (this.active.has(name)) return "all";
    const rules = this.filters.get(name);
    if (!rules) return "none";
    const prefix = prefixForKeys(rules.keys, this.effectiveOrKeys());
    return prefix === "none" ? "none" : "partial";
  }
}
