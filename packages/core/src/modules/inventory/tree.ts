// ============================================
// Location tree helpers — pure, operate on id/parent pairs
// ============================================

export interface LocationNode {
  id: string;
  parentId: string | null;
  name: string;
}

export const LOCATION_PATH_SEPARATOR = " / ";

/**
 * Full path for every location, e.g. "Warehouse / Rack A / Shelf 2".
 * A broken parent chain (cycle or missing parent) stops at the last
 * location that resolved.
 */
export function buildLocationPaths(
  nodes: readonly LocationNode[]
): Map<string, string> {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  const paths = new Map<string, string>();

  for (const node of nodes) {
    const names: string[] = [];
    const seen = new Set<string>();
    let current: LocationNode | undefined = node;
    while (current && !seen.has(current.id)) {
      seen.add(current.id);
      names.unshift(current.name);
      current = current.parentId ? byId.get(current.parentId) : undefined;
    }
    paths.set(node.id, names.join(LOCATION_PATH_SEPARATOR));
  }

  return paths;
}

/** Ids of every location below `rootId`, not including it */
export function collectDescendantIds(
  nodes: readonly LocationNode[],
  rootId: string
): Set<string> {
  const children = new Map<string, string[]>();
  for (const node of nodes) {
    if (!node.parentId) continue;
    const siblings = children.get(node.parentId) ?? [];
    siblings.push(node.id);
    children.set(node.parentId, siblings);
  }

  const descendants = new Set<string>();
  const queue = [...(children.get(rootId) ?? [])];
  while (queue.length > 0) {
    const id = queue.shift();
    if (!id || descendants.has(id)) continue;
    descendants.add(id);
    queue.push(...(children.get(id) ?? []));
  }
  return descendants;
}

/** A location may not become its own ancestor */
export function wouldCreateCycle(
  nodes: readonly LocationNode[],
  locationId: string,
  newParentId: string | null
): boolean {
  if (!newParentId) return false;
  if (newParentId === locationId) return true;
  return collectDescendantIds(nodes, locationId).has(newParentId);
}
