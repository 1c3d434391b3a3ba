import { describe, expect, it } from "vitest";
import type { NamedFilterRules } from "@knxlens/contracts";
import { prefixForKeys, SelectionModel } from "../selection.js";

function filters(entries: Record<string, NamedFilterRules>): Map<string, NamedFilterRules> {
  return new Map(Object.entries(entries));
}

describe("prefixForKeys", () => {
  it("derives none, partial and all from the overlap", () => {
    const selected = new Set(["1/1/1", "1/1/2"]);
    expect(prefixForKeys(new Set(), selected)).toBe("none");
    expect(prefixForKeys(new Set(["2/0/1"]), selected)).toBe("none");
    expect(prefixForKeys(new Set(["1/1/1", "2/0/1"]), selected)).toBe("partial");
    expect(prefixForKeys(new Set(["1/1/1", "1/1/2"]), selected)).toBe("all");
  });
});

describe("SelectionModel", () => {
  it("promotes a partial selection before removing it", () => {
    const selection = new SelectionModel();
    expect(selection.toggleKeys(new Set())).toBe("noop");
    selection.select(["1/1/1"]);
    expect(selection.toggleKeys(new Set(["1/1/1", "1/1/2"]))).toBe("selected");
    expect(Array.from(selection.selectedKeys).sort()).toEqual(["1/1/1", "1/1/2"]);
    expect(selection.toggleKeys(new Set(["1/1/1", "1/1/2"]))).toBe("deselected");
    expect(selection.selectedKeys.size).toBe(0);
  });

  it("bumps the version on every mutation", () => {
    const selection = new SelectionModel();
    const before = selection.version;
    selection.select(["1/1/1"]);
    selection.deselect(["1/1/1"]);
    selection.clear();
    expect(selection.version).toBe(before + 3);
  });

  it("adds the keys and patterns of active named filters", () => {
    const selection = new SelectionModel();
    selection.setNamedFilters(
      filters({ Lights: { keys: new Set(["1/1/1"]), regexes: [/kitchen/i] }, Climate: { keys: new Set(["1/2/3"]), regexes: [] } }),
    );
    selection.select(["2/0/1"]);
    expect(selection.toggleNamedFilter("Lights")).toBe(true);
    expect(Array.from(selection.effectiveOrKeys()).sort()).toEqual(["1/1/1", "2/0/1"]);
    expect(selection.activeRegexes()).toHaveLength(1);
    expect(selection.namedFilterPrefix("Lights")).toBe("all");
    expect(selection.namedFilterPrefix("Climate")).toBe("none");
    selection.select(["1/2/3"]);
    expect(selection.namedFilterPrefix("Climate")).toBe("partial");
    expect(selection.toggleNamedFilter("Lights")).toBe(false);
    expect(selection.activeRegexes()).toEqual([]);
  });

  it("keeps unknown filters inactive and drops vanished ones", () => {
    const selection = new SelectionModel();
    expect(selection.toggleNamedFilter("Ghost")).toBe(false);
    selection.setNamedFilters(filters({ Lights: { keys: new Set(["1/1/1"]), regexes: [] } }));
    selection.toggleNamedFilter("Lights");
    selection.setNamedFilters(new Map());
    expect(selection.activeNamedFilters.size).toBe(0);
    expect(selection.effectiveOrKeys().size).toBe(0);
  });

  it("clears tree keys and named filters together", () => {
    const selection = new SelectionModel();
    selection.setNamedFilters(filters({ Lights: { keys: new Set(["1/1/1"]), regexes: [] } }));
    selection.toggleNamedFilter("Lights");
    selection.select(["1/2/3"]);
    selection.clear();
    expect(selection.selectedKeys.size).toBe(0);
    expect(selection.activeNamedFilters.size).toBe(0);
  });
});
