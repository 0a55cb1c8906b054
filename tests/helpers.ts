import { Catalog } from '../src/catalog/catalog';
import { CRITICALITY_RANK, IMPACT_LABEL } from '../src/analysis/impactResolver';
import { Criticality, type ImpactRecord } from '../src/types/impact';
import type { RawInventory, RawPod } from '../src/types/k8s';

export function makeRecord(overrides: Partial<ImpactRecord> = {}): ImpactRecord {
  const criticality = overrides.criticality ?? Criticality.LOW;
  return {
    namespace: 'default',
    pod: 'pod-1',
    container: 'app',
    node: 'node-1',
    description: 'Test container',
    dependencies: [],
    criticalityRank: CRITICALITY_RANK[criticality],
    impactLabel: IMPACT_LABEL[criticality],
    ...overrides,
    criticality
  };
}

export function makePod(namespace: string, name: string, containers: string[], nodeName?: string): RawPod {
  return {
    metadata: { name, namespace },
    spec: {
      ...(nodeName ? { nodeName } : {}),
      containers: containers.map(c => ({ name: c }))
    }
  };
}

export function makeInventory(pods: RawPod[], nodes: string[] = []): RawInventory {
  return {
    nodes: nodes.map(name => ({ metadata: { name } })),
    pods
  };
}

export const sampleCatalog = Catalog.fromDocument({
  shop: {
    api: {
      description: 'Public API',
      dependencies: ['shop/db', 'auth/login'],
      criticality: 'high'
    },
    db: {
      description: 'Orders database',
      dependencies: [],
      criticality: 'medium'
    }
  },
  auth: {
    login: {
      description: 'Login service',
      dependencies: ['shop/db'],
      criticality: 'low'
    }
  }
});
