import type { Criticality } from './impact';

export interface GraphVertex {
  id: string;
  label: string;
  criticality: Criticality;
  description: string;
  dependencies: string[];
}

export interface GraphEdge {
  from: string;
  to: string;
}

export interface DependencyGraph {
  nodes: GraphVertex[];
  edges: GraphEdge[];
}

export type GraphExport = Record<string, DependencyGraph>;
