export interface ZoneDiff {
  added: Set<string>;
  removed: Set<string>;
}

/** `added = current − previous`, `removed = previous − current`. */
export const diffZones = (previous: ReadonlySet<string>, current: ReadonlySet<string>): ZoneDiff => {
  const added = new Set<string>();
  const removed = new Set<string>();
  for (const id of current) {
    if (!previous.has(id)) added.add(id);
  }
  for (const id of previous) {
    if (!current.has(id)) removed.add(id);
  }
  return { added, removed };
};
