import type { RenderedTreeNode, SelectionPrefix, TreeData } from "@knxlens/contracts";
import type { PayloadHistoryStore } from "../payloadHistory.js";
import { prefixForKeys, type SelectionModel, type ToggleOutcome } from "../selection.js";
import { filterTreeData } from "./filterTree.js";

interface ViewNode {
  data: TreeData;
  parent: ViewNode | null;
  children: ViewNode[];
  keys: ReadonlySet<string>;
  prefix: SelectionPrefix;
}

/**
 * Selection state over one immutable tree. Descendant key sets are computed once per
 * structure; prefixes are patched in place after a toggle and fully recomputed only when the
 * selection changed elsewhere.
 */
export class TreeView {
  private readonly root: ViewNode;
  private readonly byId = new Map<string, ViewNode>();
  private readonly byKey = new Map<string, ViewNode[]>();
  private syncedVersion = -1;

  constructor(readonly data: TreeData) {
    this.root = this.index(data, null);
  }

  private index(data: TreeData, parent: ViewNode | null): ViewNode {
    const node: ViewNode = { data, parent, children: [], keys: new Set(), prefix: "none" };
    if (!this.byId.has(data.id)) this.byId.set(data.id, node);
    const keys = new Set<string>();
    if (data.kind.type === "leaf") {
      for (const key of data.kind.destKeys) {
        keys.add(key);
        const owners = this.byKey.get(key);
        if (owners) owners.push(node);
        else this.byKey.set(key, [node]);
      }
    }
    for (const child of data.children.values()) {
      const childNode = this.index(child, node);
      node.children.push(childNode);
      for (const key of childNode.keys) keys.add(key);
    }
    node.keys = keys;
    return node;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  keysOf(id: string): ReadonlySet<string> {
    return this.byId.get(id)?.keys ?? new Set();
  }

  prefixOf(id: string, selection: SelectionModel): SelectionPrefix {
    this.sync(selection);
    return this.byId.get(id)?.prefix ?? "none";
  }

  toggle(id: string, selection: SelectionModel): ToggleOutcome {
    const node = this.byId.get(id);
    if (!node) return "noop";
    const wasSynced = this.syncedVersion === selection.version;
    const outcome = selection.toggleKeys(node.keys);
    if (outcome === "noop") return outcome;
    if (wasSynced) {
      this.propagate(node.keys, selection);
      this.syncedVersion = selection.version;
    } else {
      this.sync(selection);
    }
    return outcome;
  }

  /** Recomputes every node that shares a key with `keys`: the toggled subtree, its ancestors, and other owners of those keys. */
  private propagate(keys: ReadonlySet<string>, selection: SelectionModel): void {
    const touched = new Set<ViewNode>();
    for (const key of keys) {
      for (const owner of this.byKey.get(key) ?? []) {
        let current: ViewNode | null = owner;
        while (current && !touched.has(current)) {
          touched.add(current);
          current = current.parent;
        }
      }
    }
    for (const node of touched) {
      node.prefix = prefixForKeys(node.keys, selection.selectedKeys);
    }
  }

  sync(selection: SelectionModel): void {
    if (this.syncedVersion === selection.version) return;
    const visit = (node: ViewNode): void => {
      node.prefix = prefixForKeys(node.keys, selection.selectedKeys);
      for (const child of node.children) visit(child);
    };
    visit(this.root);
    this.syncedVersion = selection.version;
  }

  filter(text: string): TreeView {
    return new TreeView(filterTreeData(this.data, text));
  }

  render(selection: SelectionModel, history: PayloadHistoryStore): RenderedTreeNode {
    this.sync(selection);
    const visit = (node: ViewNode): RenderedTreeNode => ({
      id: node.data.id,
      label: node.data.label,
      prefix: node.prefix,
      annotation: node.data.kind.type === "leaf" ? history.annotation(node.data.kind.destKeys) : "",
      children: node.children.map(visit),
    });
    return visit(this.root);
  }
}
