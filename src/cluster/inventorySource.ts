import { readFile } from 'fs/promises';
import { z } from 'zod';
import type * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { SourceUnavailable, formatErrorMessage } from '../errors';
import type { RawInventory } from '../types/k8s';

const logger = getLogger();

type InventoryApi = Pick<k8s.CoreV1Api, 'listNode' | 'listPodForAllNamespaces'>;

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new SourceUnavailable('cluster', `Timed out after ${timeoutMs}ms waiting for ${what}`));
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

// Snapshot of every node and every pod in every namespace
export async function fetchInventory(api: InventoryApi, timeoutMs: number): Promise<RawInventory> {
  try {
    const [nodes, pods] = await withTimeout(
      Promise.all([api.listNode(), api.listPodForAllNamespaces()]),
      timeoutMs,
      'cluster inventory'
    );
    logger.info(`Inventory fetched: ${nodes.items.length} node(s), ${pods.items.length} pod(s)`);
    return { nodes: nodes.items, pods: pods.items };
  } catch (error: unknown) {
    if (error instanceof SourceUnavailable) throw error;
    throw new SourceUnavailable('cluster', `Failed to retrieve cluster inventory: ${formatErrorMessage(error)}`, {
      cause: error
    });
  }
}

const rawPodSchema = z.object({
  metadata: z.object({ name: z.string().optional(), namespace: z.string().optional() }).optional(),
  spec: z
    .object({
      nodeName: z.string().optional(),
      containers: z.array(z.object({ name: z.string() })).optional()
    })
    .optional()
});

const rawNodeSchema = z.object({
  metadata: z.object({ name: z.string().optional() }).optional()
});

// Either a captured { nodes, pods } inventory or a plain `kubectl get pods -o json` list
const snapshotSchema = z.union([
  z.object({ nodes: z.array(rawNodeSchema), pods: z.array(rawPodSchema) }),
  z.object({ items: z.array(rawPodSchema) }).transform(list => ({ nodes: [], pods: list.items }))
]);

export function parseInventorySnapshot(document: unknown, source = 'inventory'): RawInventory {
  const parsed = snapshotSchema.safeParse(document);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new SourceUnavailable(source, `Invalid inventory snapshot ${source}: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}

export async function loadInventorySnapshot(path: string): Promise<RawInventory> {
  let document: unknown;
  try {
    document = JSON.parse(await readFile(path, 'utf8'));
  } catch (error: unknown) {
    throw new SourceUnavailable(path, `Inventory snapshot ${path} could not be loaded: ${formatErrorMessage(error)}`, {
      cause: error
    });
  }

  const inventory = parseInventorySnapshot(document, path);
  logger.info(`Inventory loaded from ${path}: ${inventory.nodes.length} node(s), ${inventory.pods.length} pod(s)`);
  return inventory;
}
