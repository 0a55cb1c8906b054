// Minimal shapes of the Kubernetes objects the inventory is built from.
// V1Pod and V1Node from @kubernetes/client-node are assignable to these.

export interface RawContainer {
  name: string;
}

export interface RawPod {
  metadata?:
    | {
        name?: string | undefined;
        namespace?: string | undefined;
      }
    | undefined;
  spec?:
    | {
        nodeName?: string | undefined;
        containers?: RawContainer[] | undefined;
      }
    | undefined;
}

export interface RawNode {
  metadata?: { name?: string | undefined } | undefined;
}

// Point-in-time snapshot of the cluster
export interface RawInventory {
  nodes: RawNode[];
  pods: RawPod[];
}
