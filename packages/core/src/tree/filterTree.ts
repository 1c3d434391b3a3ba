import type { TreeData } from "@knxlens/contracts";

/**
 * Case-insensitive substring search on labels. A matching node keeps its whole subtree; a
 * branch that does not match survives only through matching descendants. The root is always
 * returned, possibly without children.
 */
export function filterTreeData(root: TreeData, text: string): TreeData {
  const needle = text.trim().toLowerCase();
  if (!needle) return root;

  const visit = (node: TreeData): TreeData | null => {
    if (node.label.toLowerCase().includes(needle)) return node;
    const children = keepMatching(node);
    return children.size > 0 ? { ...node, children } : null;
  };

  const keepMatching = (node: TreeData): Map<string, TreeData> => {
    const children = new Map<string, TreeData>();
    for (const [key, child] of node.children) {
      const kept = visit(child);
      if (kept) children.set(key, kept);
    }
    return children;
  };

  return { ...root, children: keepMatching(root) };
}

export function countNodes(node: TreeData): number {
  let total = 1;
  for (const child of node.children.values()) total += countNodes(child);
  return total;
}
