import type { Catalog } from '../catalog/catalog';
import { extractInstances } from '../inventory/inventoryExtractor';
import type { RawInventory } from '../types/k8s';
import {
  Criticality,
  type Assessment,
  type CatalogGap,
  type ContainerInstance,
  type ImpactRecord,
  type Scope
} from '../types/impact';

// Lower rank is more severe and sorts first
export const CRITICALITY_RANK: Readonly<Record<Criticality, number>> = {
  [Criticality.HIGH]: 1,
  [Criticality.MEDIUM]: 2,
  [Criticality.LOW]: 3,
  [Criticality.UNKNOWN]: 4
};

export const IMPACT_LABEL: Readonly<Record<Criticality, string>> = {
  [Criticality.HIGH]: 'High impact',
  [Criticality.MEDIUM]: 'Moderate impact',
  [Criticality.LOW]: 'Low impact',
  [Criticality.UNKNOWN]: 'Unknown impact'
};

const NO_DEPENDENCIES: readonly string[] = Object.freeze([]);

// Used for every container the catalog does not describe
export const UNKNOWN_ENTRY = Object.freeze({
  description: 'No information available',
  dependencies: NO_DEPENDENCIES,
  criticality: Criticality.UNKNOWN
});

export interface ResolveOptions {
  // Report a missing (namespace, container) once instead of once per instance
  dedupeGaps?: boolean | undefined;
}

export interface ResolveResult {
  records: ImpactRecord[];
  gaps: CatalogGap[];
}

export function impactLabel(criticality: Criticality): string {
  return IMPACT_LABEL[criticality];
}

export function criticalityRank(criticality: Criticality): number {
  return CRITICALITY_RANK[criticality];
}

function toRecord(
  instance: ContainerInstance,
  info: { description: string; dependencies: readonly string[]; criticality: Criticality }
): ImpactRecord {
  return Object.freeze({
    namespace: instance.namespace,
    pod: instance.pod,
    container: instance.container,
    node: instance.node,
    description: info.description,
    dependencies: info.dependencies,
    criticality: info.criticality,
    criticalityRank: criticalityRank(info.criticality),
    impactLabel: impactLabel(info.criticality)
  });
}

// Join every instance against the catalog. Never throws: misses become gaps.
export function resolveImpact(
  instances: readonly ContainerInstance[],
  catalog: Catalog,
  options: ResolveOptions = {}
): ResolveResult {
  const records: ImpactRecord[] = [];
  const gaps: CatalogGap[] = [];
  const reported = new Set<string>();

  for (const instance of instances) {
    const entry = catalog.lookup(instance.namespace, instance.container);
    if (entry) {
      records.push(toRecord(instance, entry));
      continue;
    }

    records.push(toRecord(instance, UNKNOWN_ENTRY));

    const gapKey = `${instance.namespace}/${instance.container}`;
    if (options.dedupeGaps && reported.has(gapKey)) continue;
    reported.add(gapKey);
    gaps.push({
      namespace: instance.namespace,
      container: instance.container,
      pod: instance.pod,
      node: instance.node
    });
  }

  return { records, gaps };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Total order: rank, namespace, container, then node and pod so replicas are stable too
export function compareRecords(a: ImpactRecord, b: ImpactRecord): number {
  return (
    a.criticalityRank - b.criticalityRank ||
    compareText(a.namespace, b.namespace) ||
    compareText(a.container, b.container) ||
    compareText(a.node, b.node) ||
    compareText(a.pod, b.pod)
  );
}

export function sortRecords(records: readonly ImpactRecord[]): readonly ImpactRecord[] {
  return Object.freeze([...records].sort(compareRecords));
}

function compareGaps(a: CatalogGap, b: CatalogGap): number {
  return (
    compareText(a.namespace, b.namespace) ||
    compareText(a.container, b.container) ||
    compareText(a.node, b.node) ||
    compareText(a.pod, b.pod)
  );
}

// Extract, resolve and sort into the snapshot every report reads from
export function assess(
  inventory: RawInventory,
  scope: Scope,
  catalog: Catalog,
  options: ResolveOptions = {}
): Assessment {
  const instances = extractInstances(inventory, scope);
  const { records, gaps } = resolveImpact(instances, catalog, options);

  return Object.freeze({
    scope,
    records: sortRecords(records),
    gaps: Object.freeze([...gaps].sort(compareGaps))
  });
}
