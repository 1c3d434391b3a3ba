import type { RenderedTreeNode } from "@knxlens/contracts";
import type { NamedFilterDefinition } from "../namedFilters.js";
import type { PayloadHistoryStore } from "../payloadHistory.js";
import type { SelectionModel } from "../selection.js";
import { EXACT_GROUP_ADDRESS_PATTERN } from "../utils.js";

export const NAMED_FILTER_ROOT_ID = "nf_root";
const NAMED_FILTER_ID_PREFIX = "nf:";

export function namedFilterNodeId(name: string): string {
  return `${NAMED_FILTER_ID_PREFIX}${name}`;
}

export function namedFilterNameFromId(id: string): string | null {
  return id.startsWith(NAMED_FILTER_ID_PREFIX) ? id.slice(NAMED_FILTER_ID_PREFIX.length) : null;
}

export function renderNamedFilterTree(
  definitions: readonly NamedFilterDefinition[],
  selection: SelectionModel,
  history: PayloadHistoryStore,
): RenderedTreeNode {
  const effective = selection.effectiveOrKeys();
  return {
    id: NAMED_FILTER_ROOT_ID,
    label: "Named filters",
    prefix: "none",
    annotation: "",
    children: definitions.map(({ name, rules }): RenderedTreeNode => {
      const active = selection.activeNamedFilters.has(name);
      return {
        id: namedFilterNodeId(name),
        label: name,
        prefix: selection.namedFilterPrefix(name),
        annotation: "",
        children: rules.map((rule, idx): RenderedTreeNode => {
          const isKey = EXACT_GROUP_ADDRESS_PATTERN.test(rule);
          return {
            id: `${namedFilterNodeId(name)}#${idx}`,
            label: rule,
            prefix: active || (isKey && effective.has(rule)) ? "all" : "none",
            annotation: isKey ? history.annotation([rule]) : "",
            children: [],
          };
        }),
      };
    }),
  };
}
