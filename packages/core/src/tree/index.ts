export * from "./builders.js";
export * from "./filterTree.js";
export * from "./namedFilterTree.js";
export * from "./treeView.js";
