import type { ImpactRecord } from '../types/impact';

// Partition records by node, keys in ascending node order. Record order within a partition is preserved.
export function groupByNode(records: readonly ImpactRecord[]): Map<string, ImpactRecord[]> {
  const groups = new Map<string, ImpactRecord[]>();
  for (const record of records) {
    const group = groups.get(record.node);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.node, [record]);
    }
  }

  const sorted = new Map<string, ImpactRecord[]>();
  for (const node of [...groups.keys()].sort()) {
    const group = groups.get(node);
    if (group) sorted.set(node, group);
  }
  return sorted;
}
