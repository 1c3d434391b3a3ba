import type {
  CatalogChannel,
  CatalogCommunicationObject,
  CatalogDevice,
  CatalogGroupRange,
  CatalogSpace,
  EntityKind,
  ProjectCatalog,
  TreeData,
  TreeKind,
} from "@knxlens/contracts";
import { createLogger } from "../logger.js";
import { asString, compareNatural, NOT_AVAILABLE } from "../utils.js";

const log = createLogger("tree");

export const ROOT_LABELS: Record<TreeKind, string> = {
  building: "Building",
  devices: "Devices",
  addresses: "Group addresses",
};

export function branch(id: string, label: string): TreeData {
  return { id, label, kind: { type: "branch" }, children: new Map() };
}

export function leaf(id: string, label: string, entityKind: EntityKind, destKeys: Iterable<string>): TreeData {
  return {
    id,
    label,
    kind: { type: "leaf", entityKind, destKeys: new Set(destKeys), displayName: label },
    children: new Map(),
  };
}

function childOf(parent: TreeData, key: string, create: () => TreeData): TreeData {
  const existing = parent.children.get(key);
  if (existing) return existing;
  const node = create();
  parent.children.set(key, node);
  return node;
}

/** Reorders every child map by natural key order, depth first. */
export function sortTree(node: TreeData): TreeData {
  const sorted = Array.from(node.children.entries()).sort((a, b) => compareNatural(a[0], b[0]));
  node.children = new Map(sorted);
  for (const child of node.children.values()) sortTree(child);
  return node;
}

/** `"text - function_text"`, else `name`, else the fallback. */
export function smartName(entry: Pick<CatalogChannel, "name" | "text" | "function_text">, fallback: string): string {
  const parts = [entry.text, entry.function_text].filter((part): part is string => Boolean(part));
  if (parts.length > 0) return parts.join(" - ");
  return entry.name || fallback;
}

export function communicationObjectLabel(coId: string, co: CatalogCommunicationObject): string {
  const number = co.number === undefined ? "?" : asString(co.number);
  return `${number}: ${smartName(co, `CO-${coId}`)} → [${co.group_address_links.join(", ")}]`;
}

function addCommunicationObjects(parent: TreeData, coIds: Iterable<string>, catalog: ProjectCatalog): void {
  for (const coId of coIds) {
    const co = catalog.communication_objects[coId];
    if (!co) continue;
    const label = communicationObjectLabel(coId, co);
    parent.children.set(label, leaf(`co_${coId}`, label, "communication_object", co.group_address_links));
  }
}

function addDeviceChildren(deviceNode: TreeData, address: string, device: CatalogDevice, catalog: ProjectCatalog): void {
  const processed = new Set<string>();
  for (const [channelId, channel] of Object.entries(device.channels)) {
    const channelName = smartName(channel, `Channel-${channelId}`);
    const channelNode = childOf(deviceNode, channelName, () => branch(`ch_${address}_${channelId}`, channelName));
    addCommunicationObjects(channelNode, channel.communication_object_ids, catalog);
    for (const coId of channel.communication_object_ids) processed.add(coId);
  }
  const deviceLevel = device.communication_object_ids.filter((coId) => !processed.has(coId));
  addCommunicationObjects(deviceNode, new Set(deviceLevel), catalog);
}

function flattenRanges(ranges: Record<string, CatalogGroupRange>, out = new Map<string, string>()): Map<string, string> {
  for (const [address, range] of Object.entries(ranges)) {
    if (range.name) out.set(address, range.name);
    if (range.group_ranges) flattenRanges(range.group_ranges, out);
  }
  return out;
}

export function buildAddressTree(catalog: ProjectCatalog): TreeData {
  const root = branch("ga_root", ROOT_LABELS.addresses);
  const rangeNames = flattenRanges(catalog.group_ranges);

  for (const [address, details] of Object.entries(catalog.group_addresses)) {
    const parts = address.split("/");
    if (parts.length !== 3) continue;
    const [mainKey = "", middlePart = ""] = parts;
    const middleKey = `${mainKey}/${middlePart}`;
    const mainNode = childOf(root, mainKey, () =>
      branch(`ga_main_${mainKey}`, `(${mainKey}) ${rangeNames.get(mainKey) ?? `Main group ${mainKey}`}`),
    );
    const middleNode = childOf(mainNode, middleKey, () =>
      branch(
        `ga_sub_${middleKey.replace("/", "_")}`,
        `(${middleKey}) ${rangeNames.get(middleKey) ?? `Middle group ${middleKey}`}`,
      ),
    );
    const label = `(${address}) ${details.name || NOT_AVAILABLE}`;
    middleNode.children.set(address, leaf(`ga_${address}`, label, "group_address", [address]));
  }
  return sortTree(root);
}

function topologyLabel(id: string, name: string | undefined, fallback: string): string {
  return name && name !== fallback ? `(${id}) ${name}` : fallback;
}

export function buildDeviceTree(catalog: ProjectCatalog): TreeData {
  const root = branch("pa_root", ROOT_LABELS.devices);
  const areaNames = new Map<string, string>();
  const lineNames = new Map<string, string>();
  for (const area of Object.values(catalog.topology.areas)) {
    const areaId = asString(area.address);
    areaNames.set(areaId, area.name ?? "");
    for (const line of Object.values(area.lines)) {
      lineNames.set(`${areaId}.${asString(line.address)}`, line.name ?? "");
    }
  }

  for (const [address, device] of Object.entries(catalog.devices)) {
    const parts = address.split(".");
    if (parts.length !== 3) {
      log.warn(`skipping malformed individual address: ${address}`);
      continue;
    }
    const [areaId = "", linePart = "", deviceId = ""] = parts;
    const lineId = `${areaId}.${linePart}`;
    const areaNode = childOf(root, areaId, () =>
      branch(`pa_${areaId}`, topologyLabel(areaId, areaNames.get(areaId), `Area ${areaId}`)),
    );
    const lineNode = childOf(areaNode, linePart, () =>
      branch(`pa_${lineId}`, topologyLabel(lineId, lineNames.get(lineId), `Line ${lineId}`)),
    );
    const deviceNode = childOf(lineNode, deviceId, () =>
      branch(`dev_${address}`, `(${address}) ${device.name || NOT_AVAILABLE}`),
    );
    addDeviceChildren(deviceNode, address, device, catalog);
  }
  return sortTree(root);
}

export function buildBuildingTree(catalog: ProjectCatalog): TreeData {
  const root = branch("bldg_root", ROOT_LABELS.building);

  const visit = (space: CatalogSpace, parent: TreeData): void => {
    const spaceName = space.name ?? "Unnamed space";
    const spaceNode = childOf(parent, spaceName, () => branch(`loc_${space.identifier ?? spaceName}`, spaceName));
    for (const address of space.devices) {
      const device = catalog.devices[address];
      if (!device) continue;
      const deviceLabel = `(${address}) ${device.name || "Unnamed"}`;
      const deviceNode = childOf(spaceNode, deviceLabel, () => branch(`dev_${address}`, deviceLabel));
      addDeviceChildren(deviceNode, address, device, catalog);
    }
    for (const child of Object.values(space.spaces)) visit(child, spaceNode);
  };

  for (const location of Object.values(catalog.locations)) visit(location, root);
  return sortTree(root);
}

export function buildTree(kind: TreeKind, catalog: ProjectCatalog): TreeData {
  switch (kind) {
    case "building":
      return buildBuildingTree(catalog);
    case "devices":
      return buildDeviceTree(catalog);
    case "addresses":
      return buildAddressTree(catalog);
  }
}
