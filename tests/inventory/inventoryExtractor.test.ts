import { describe, it, expect } from 'vitest';
import {
  UNSCHEDULED_NODE,
  extractInstances,
  listNodeNames,
  scopeLabel
} from '../../src/inventory/inventoryExtractor';
import { makeInventory, makePod } from '../helpers';

function byPodAndContainer(a: { pod: string; container: string }, b: { pod: string; container: string }): number {
  return `${a.pod}/${a.container}`.localeCompare(`${b.pod}/${b.container}`);
}

describe('inventoryExtractor', () => {
  const inventory = makeInventory(
    [
      makePod('web', 'frontend-1', ['nginx', 'sidecar'], 'node-a'),
      makePod('db', 'postgres-0', ['postgres'], 'node-b'),
      makePod('batch', 'pending-job', ['worker'])
    ],
    ['node-a', 'node-b']
  );

  describe('extractInstances', () => {
    it('should yield one instance per container for a single node', () => {
      const instances = extractInstances(inventory, { kind: 'single-node', node: 'node-a' });

      expect(instances.sort(byPodAndContainer)).toEqual([
        { namespace: 'web', pod: 'frontend-1', container: 'nginx', node: 'node-a' },
        { namespace: 'web', pod: 'frontend-1', container: 'sidecar', node: 'node-a' }
      ]);
    });

    it('should exclude unscheduled pods from a single node scope', () => {
      const instances = extractInstances(inventory, { kind: 'single-node', node: 'node-b' });

      expect(instances).toEqual([{ namespace: 'db', pod: 'postgres-0', container: 'postgres', node: 'node-b' }]);
    });

    it('should label unscheduled pods as Unknown across all nodes', () => {
      const instances = extractInstances(inventory, { kind: 'all-nodes' });

      expect(instances).toHaveLength(4);
      expect(instances.find(i => i.pod === 'pending-job')?.node).toBe(UNSCHEDULED_NODE);
      expect(UNSCHEDULED_NODE).toBe('Unknown');
    });

    it('should return nothing for a node without pods', () => {
      expect(extractInstances(inventory, { kind: 'single-node', node: 'node-z' })).toEqual([]);
    });

    it('should default a missing namespace to default', () => {
      const raw = makeInventory([{ metadata: { name: 'bare' }, spec: { nodeName: 'n1', containers: [{ name: 'c' }] } }]);

      expect(extractInstances(raw, { kind: 'all-nodes' })).toEqual([
        { namespace: 'default', pod: 'bare', container: 'c', node: 'n1' }
      ]);
    });

    it('should tolerate pods without a spec', () => {
      const raw = makeInventory([{ metadata: { name: 'empty', namespace: 'x' } }]);

      expect(extractInstances(raw, { kind: 'all-nodes' })).toEqual([]);
    });
  });

  describe('listNodeNames', () => {
    it('should return node names in ascending order', () => {
      const raw = makeInventory([], ['worker-2', 'control-plane', 'worker-1']);

      expect(listNodeNames(raw)).toEqual(['control-plane', 'worker-1', 'worker-2']);
    });

    it('should derive nodes from scheduled pods when no node list is available', () => {
      const raw = makeInventory([
        makePod('a', 'p1', ['c'], 'n2'),
        makePod('a', 'p2', ['c'], 'n1'),
        makePod('a', 'p3', ['c'], 'n2'),
        makePod('a', 'p4', ['c'])
      ]);

      expect(listNodeNames(raw)).toEqual(['n1', 'n2']);
    });
  });

  describe('scopeLabel', () => {
    it('should use the node name or all_nodes', () => {
      expect(scopeLabel({ kind: 'single-node', node: 'node-a' })).toBe('node-a');
      expect(scopeLabel({ kind: 'all-nodes' })).toBe('all_nodes');
    });
  });
});
