import { z } from 'zod';
import { Criticality, type ImpactRecord } from '../types/impact';
import type { DependencyGraph, GraphEdge, GraphExport, GraphVertex } from '../types/graph';
import { groupByNode } from './partition';
import { fullName } from './reportFormatter';

export type ConsolidatedExport = Record<string, ImpactRecord[]>;

export function buildConsolidated(records: readonly ImpactRecord[]): ConsolidatedExport {
  const consolidated: ConsolidatedExport = {};
  for (const [node, group] of groupByNode(records)) {
    consolidated[node] = group;
  }
  return consolidated;
}

// Edges point at the literal dependency string; targets outside this graph are kept.
export function buildDependencyGraph(records: readonly ImpactRecord[]): DependencyGraph {
  const vertices = new Map<string, GraphVertex>();
  const edges: GraphEdge[] = [];

  for (const record of records) {
    const id = fullName(record);
    if (!vertices.has(id)) {
      vertices.set(id, {
        id,
        label: record.container,
        criticality: record.criticality,
        description: record.description,
        dependencies: [...record.dependencies]
      });
    }

    for (const dependency of record.dependencies) {
      edges.push({ from: id, to: dependency });
    }
  }

  return { nodes: [...vertices.values()], edges };
}

export function buildGraphExport(records: readonly ImpactRecord[]): GraphExport {
  const graphs: GraphExport = {};
  for (const [node, group] of groupByNode(records)) {
    graphs[node] = buildDependencyGraph(group);
  }
  return graphs;
}

const graphExportSchema = z.record(
  z.string(),
  z.object({
    nodes: z.array(
      z.object({
        id: z.string(),
        label: z.string(),
        criticality: z.nativeEnum(Criticality),
        description: z.string(),
        dependencies: z.array(z.string())
      })
    ),
    edges: z.array(z.object({ from: z.string(), to: z.string() }))
  })
);

export function parseGraphExport(content: string): GraphExport {
  return graphExportSchema.parse(JSON.parse(content));
}
