// `unknown` is never declared in the catalog; the resolver assigns it to
// containers the catalog does not describe.
export enum Criticality {
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
  UNKNOWN = 'unknown'
}

export type CatalogCriticality = Exclude<Criticality, Criticality.UNKNOWN>;

export interface CatalogEntry {
  namespace: string;
  name: string;
  description: string;
  // Fully qualified "namespace/name" references, in declared order
  dependencies: readonly string[];
  criticality: CatalogCriticality;
}

export interface ContainerInstance {
  namespace: string;
  pod: string;
  container: string;
  node: string;
}

export interface ImpactRecord {
  namespace: string;
  pod: string;
  container: string;
  node: string;
  description: string;
  dependencies: readonly string[];
  criticality: Criticality;
  criticalityRank: number;
  impactLabel: string;
}

// A running container the catalog has no entry for
export interface CatalogGap {
  namespace: string;
  container: string;
  pod: string;
  node: string;
}

export type Scope = { kind: 'single-node'; node: string } | { kind: 'all-nodes' };

// Immutable result of one run, shared by every report and export
export interface Assessment {
  scope: Scope;
  records: readonly ImpactRecord[];
  gaps: readonly CatalogGap[];
}
