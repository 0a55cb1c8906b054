import type { RawInventory, RawPod } from '../types/k8s';
import type { ContainerInstance, Scope } from '../types/impact';

// Node label for pods the scheduler has not placed yet
export const UNSCHEDULED_NODE = 'Unknown';

export const ALL_NODES_LABEL = 'all_nodes';

function podNamespace(pod: RawPod): string {
  return pod.metadata?.namespace || 'default';
}

function podNode(pod: RawPod): string | undefined {
  return pod.spec?.nodeName || undefined;
}

function inScope(node: string | undefined, scope: Scope): boolean {
  if (scope.kind === 'all-nodes') return true;
  return node !== undefined && node === scope.node;
}

// One instance per (pod, container). Callers must not rely on the order.
export function extractInstances(inventory: RawInventory, scope: Scope): ContainerInstance[] {
  const instances: ContainerInstance[] = [];

  for (const pod of inventory.pods) {
    const node = podNode(pod);
    if (!inScope(node, scope)) continue;

    const namespace = podNamespace(pod);
    const podName = pod.metadata?.name || '';
    for (const container of pod.spec?.containers || []) {
      instances.push({
        namespace,
        pod: podName,
        container: container.name,
        node: node ?? UNSCHEDULED_NODE
      });
    }
  }

  return instances;
}

// Falls back to the nodes pods are scheduled on when the snapshot has no node list
export function listNodeNames(inventory: RawInventory): string[] {
  const names = new Set<string>();

  for (const node of inventory.nodes) {
    if (node.metadata?.name) names.add(node.metadata.name);
  }

  if (names.size === 0) {
    for (const pod of inventory.pods) {
      const node = podNode(pod);
      if (node) names.add(node);
    }
  }

  return [...names].sort();
}

export function scopeLabel(scope: Scope): string {
  return scope.kind === 'single-node' ? scope.node : ALL_NODES_LABEL;
}
