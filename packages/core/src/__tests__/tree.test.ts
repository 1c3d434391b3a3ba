import { describe, expect, it } from "vitest";
import type { RenderedTreeNode } from "@knxlens/contracts";
import { normalizeCatalog } from "../catalog.js";
import { compileNamedFilter } from "../namedFilters.js";
import { PayloadHistoryStore } from "../payloadHistory.js";
import { prefixForKeys, SelectionModel } from "../selection.js";
import { buildTree, communicationObjectLabel, smartName } from "../tree/builders.js";
import { countNodes } from "../tree/filterTree.js";
import { renderNamedFilterTree } from "../tree/namedFilterTree.js";
import { TreeView } from "../tree/treeView.js";
import { SAMPLE_PROJECT } from "./fixtures.js";

const catalog = normalizeCatalog(SAMPLE_PROJECT);

interface Outline {
  label: string;
  children?: Outline[];
}

function outline(node: RenderedTreeNode): Outline {
  return node.children.length > 0 ? { label: node.label, children: node.children.map(outline) } : { label: node.label };
}

function flatten(node: RenderedTreeNode, out: RenderedTreeNode[] = []): RenderedTreeNode[] {
  out.push(node);
  for (const child of node.children) flatten(child, out);
  return out;
}

function prefixes(node: RenderedTreeNode): Record<string, string> {
  return Object.fromEntries(flatten(node).map((item) => [item.id, item.prefix]));
}

function expectConsistent(view: TreeView, selection: SelectionModel): void {
  const rendered = view.render(selection, new PayloadHistoryStore());
  for (const node of flatten(rendered)) {
    expect(node.prefix, node.id).toBe(prefixForKeys(view.keysOf(node.id), selection.selectedKeys));
  }
}

describe("tree builders", () => {
  it("builds the group address tree with range names and fallbacks", () => {
    const view = new TreeView(buildTree("addresses", catalog));
    expect(outline(view.render(new SelectionModel(), new PayloadHistoryStore()))).toEqual({
      label: "Group addresses",
      children: [
        {
          label: "(1) Climate",
          children: [
            { label: "(1/1) Middle group 1/1", children: [{ label: "(1/1/1) Light kitchen" }] },
            { label: "(1/2) Sensors", children: [{ label: "(1/2/3) Temp" }, { label: "(1/2/4) Humidity" }] },
          ],
        },
        {
          label: "(2) Misc",
          children: [{ label: "(2/0) Middle group 2/0", children: [{ label: "(2/0/1) N/A" }] }],
        },
      ],
    });
    expect(view.has("ga_sub_1_2")).toBe(true);
    expect(Array.from(view.keysOf("ga_main_1")).sort()).toEqual(["1/1/1", "1/2/3", "1/2/4"]);
  });

  it("builds the device tree with channels and device-level objects", () => {
    const view = new TreeView(buildTree("devices", catalog));
    expect(outline(view.render(new SelectionModel(), new PayloadHistoryStore()))).toEqual({
      label: "Devices",
      children: [
        {
          label: "(1) Ground floor",
          children: [
            {
              label: "(1.1) Main line",
              children: [
                {
                  label: "(1.1.5) Sensor A",
                  children: [
                    { label: "2: Humidity → [1/2/4]" },
                    { label: "Temperature - Living room", children: [{ label: "1: Temp out → [1/2/3]" }] },
                  ],
                },
                {
                  label: "(1.1.6) Switch actuator",
                  children: [{ label: "Channel B", children: [{ label: "0: Switch → [1/1/1, 1/2/3]" }] }],
                },
              ],
            },
          ],
        },
      ],
    });
    expect(view.has("ch_1.1.5_1")).toBe(true);
    expect(view.has("co_co2")).toBe(true);
  });

  it("builds the building tree from nested spaces", () => {
    const view = new TreeView(buildTree("building", catalog));
    const rendered = view.render(new SelectionModel(), new PayloadHistoryStore());
    expect(rendered.label).toBe("Building");
    expect(rendered.children.map((node) => node.label)).toEqual(["House"]);
    expect(rendered.children[0]?.children.map((node) => node.id)).toEqual(["loc_kitchen", "loc_living"]);
    expect(countNodes(view.data)).toBe(11);
  });

  it("names entries by text and function text before falling back", () => {
    expect(smartName({ text: "Temperature", function_text: "Hall" }, "x")).toBe("Temperature - Hall");
    expect(smartName({ name: "Output" }, "x")).toBe("Output");
    expect(smartName({}, "Channel-7")).toBe("Channel-7");
    expect(communicationObjectLabel("9", { group_address_links: [] })).toBe("?: CO-9 → []");
  });
});

describe("TreeView selection", () => {
  it("propagates tri-state prefixes across shared group addresses", () => {
    const view = new TreeView(buildTree("building", catalog));
    const selection = new SelectionModel();

    expect(view.toggle("co_co1", selection)).toBe("selected");
    expect(prefixes(view.render(selection, new PayloadHistoryStore()))).toMatchObject({
      co_co1: "all",
      "ch_1.1.5_1": "all",
      "dev_1.1.5": "partial",
      loc_living: "partial",
      co_co3: "partial",
      "ch_1.1.6_2": "partial",
      loc_kitchen: "partial",
      loc_house: "partial",
    });
    expectConsistent(view, selection);

    expect(view.toggle("co_co3", selection)).toBe("selected");
    expect(view.prefixOf("loc_kitchen", selection)).toBe("all");
    expect(view.prefixOf("loc_house", selection)).toBe("partial");
    expectConsistent(view, selection);

    expect(view.toggle("co_co3", selection)).toBe("deselected");
    expect(view.prefixOf("co_co1", selection)).toBe("none");
    expect(selection.selectedKeys.size).toBe(0);
    expectConsistent(view, selection);
  });

  it("resyncs after the selection changes elsewhere", () => {
    const view = new TreeView(buildTree("addresses", catalog));
    const selection = new SelectionModel();
    view.toggle("ga_sub_1_2", selection);
    expect(view.prefixOf("ga_main_1", selection)).toBe("partial");
    selection.select(["1/1/1"]);
    expect(view.prefixOf("ga_main_1", selection)).toBe("all");
    selection.clear();
    expect(view.prefixOf("ga_1/2/3", selection)).toBe("none");
  });

  it("ignores unknown ids and empty branches", () => {
    const view = new TreeView(buildTree("addresses", catalog));
    const selection = new SelectionModel();
    expect(view.toggle("nope", selection)).toBe("noop");
    expect(view.keysOf("nope").size).toBe(0);
  });

  it("annotates leaves with recent payloads", () => {
    const view = new TreeView(buildTree("devices", catalog));
    const history = new PayloadHistoryStore();
    history.append("1/2/3", { timestamp: "2024-05-01 10:00:01", payload: "21.5" });
    history.append("1/1/1", { timestamp: "2024-05-01 10:00:02", payload: "1" });
    const byId = new Map(flatten(view.render(new SelectionModel(), history)).map((node) => [node.id, node]));
    expect(byId.get("co_co1")?.annotation).toBe("21.5");
    expect(byId.get("co_co3")?.annotation).toBe("1 (21.5)");
    expect(byId.get("co_co2")?.annotation).toBe("");
    expect(byId.get("dev_1.1.5")?.annotation).toBe("");
  });
});

describe("tree search", () => {
  it("keeps only matching paths", () => {
    const view = new TreeView(buildTree("addresses", catalog)).filter("HUMID");
    const ids = flatten(view.render(new SelectionModel(), new PayloadHistoryStore())).map((node) => node.id);
    expect(ids).toEqual(["ga_root", "ga_main_1", "ga_sub_1_2", "ga_1/2/4"]);
  });

  it("keeps the whole subtree of a matching branch", () => {
    const view = new TreeView(buildTree("addresses", catalog)).filter("sensors");
    expect(Array.from(view.keysOf("ga_sub_1_2")).sort()).toEqual(["1/2/3", "1/2/4"]);
    expect(view.has("ga_main_2")).toBe(false);
  });

  it("toggles only the keys visible in the filtered view", () => {
    const full = new TreeView(buildTree("addresses", catalog));
    const filtered = full.filter("humid");
    const selection = new SelectionModel();
    expect(filtered.toggle("ga_main_1", selection)).toBe("selected");
    expect(Array.from(selection.selectedKeys)).toEqual(["1/2/4"]);
    expect(full.prefixOf("ga_sub_1_2", selection)).toBe("partial");
  });

  it("returns an empty root when nothing matches", () => {
    const view = new TreeView(buildTree("addresses", catalog)).filter("zzz");
    expect(countNodes(view.data)).toBe(1);
  });
});

describe("named filter tree", () => {
  it("renders filters with rule children", () => {
    const selection = new SelectionModel();
    selection.setNamedFilters(new Map([["Lights", compileNamedFilter("Lights", ["1/1/1", "kitchen"])]]));
    selection.select(["1/1/1"]);
    const history = new PayloadHistoryStore();
    history.append("1/1/1", { timestamp: "2024-05-01 10:00:02", payload: "1" });

    const tree = renderNamedFilterTree([{ name: "Lights", rules: ["1/1/1", "kitchen"] }], selection, history);
    const filter = tree.children[0];
    expect(filter).toMatchObject({ id: "nf:Lights", label: "Lights", prefix: "partial" });
    expect(filter?.children).toEqual([
      { id: "nf:Lights#0", label: "1/1/1", prefix: "all", annotation: "1", children: [] },
      { id: "nf:Lights#1", label: "kitchen", prefix: "none", annotation: "", children: [] },
    ]);

    selection.toggleNamedFilter("Lights");
    const active = renderNamedFilterTree([{ name: "Lights", rules: ["1/1/1", "kitchen"] }], selection, history);
    expect(active.children[0]?.prefix).toBe("all");
    expect(active.children[0]?.children.map((child) => child.prefix)).toEqual(["all", "all"]);
  });
});
