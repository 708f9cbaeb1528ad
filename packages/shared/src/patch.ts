/**
 * Patch application over node snapshots.
 *
 * The browser runtime keeps a snapshot mirror of the committed tree and
 * validates every patch against it before touching the DOM; the server
 * uses the same routine in tests to check diff round-trips.
 */

import { DiffInvariantViolation } from "./errors";
import { ROOT_MOUNT_ID, type NodeSnapshot, type PatchOp } from "./protocol";

export interface IndexedNode {
  node: NodeSnapshot;
  parent: NodeSnapshot | null;
}

export type SnapshotIndex = Map<string, IndexedNode>;

/**
 * Map every node id in a snapshot to the node and its parent.
 */
export function indexSnapshot(tree: NodeSnapshot | null): SnapshotIndex {
  const index: SnapshotIndex = new Map();
  const visit = (node: NodeSnapshot, parent: NodeSnapshot | null): void => {
    index.set(node.id, { node, parent });
    for (const child of node.children) visit(child, node);
  };
  if (tree) visit(tree, null);
  return index;
}

export function cloneSnapshot(node: NodeSnapshot): NodeSnapshot {
  return {
    id: node.id,
    kind: node.kind,
    props: structuredClone(node.props),
    ...(node.text !== undefined && { text: node.text }),
    events: [...node.events],
    children: node.children.map(cloneSnapshot),
  };
}

/**
 * Apply patch operations in order, returning a new tree.
 * The input tree is not modified.
 *
 * @throws DiffInvariantViolation when an op references a node the tree does not hold
 */
export function applyPatches(tree: NodeSnapshot | null, ops: readonly PatchOp[]): NodeSnapshot | null {
  let root = tree ? cloneSnapshot(tree) : null;
  const index = indexSnapshot(root);

  const lookup = (op: string, id: string): IndexedNode => {
    const entry = index.get(id);
    if (!entry) throw DiffInvariantViolation.unknownNode(op, id);
    return entry;
  };

  const forget = (node: NodeSnapshot): void => {
    index.delete(node.id);
    for (const child of node.children) forget(child);
  };

  for (const op of ops) {
    switch (op.op) {
      case "insert": {
        const node = cloneSnapshot(op.node);
        if (op.parentId === ROOT_MOUNT_ID) {
          if (root) throw new DiffInvariantViolation("insert at mount point while a root is mounted");
          root = node;
          for (const [id, entry] of indexSnapshot(node)) index.set(id, entry);
          break;
        }
        const parent = lookup(op.op, op.parentId).node;
        parent.children.splice(Math.min(op.index, parent.children.length), 0, node);
        for (const [id, entry] of indexSnapshot(node)) {
          index.set(id, entry.parent ? entry : { node: entry.node, parent });
        }
        break;
      }
      case "remove": {
        const { node, parent } = lookup(op.op, op.id);
        if (parent) {
          parent.children = parent.children.filter((child) => child.id !== op.id);
        } else {
          root = null;
        }
        forget(node);
        break;
      }
      case "reorder": {
        const parent = lookup(op.op, op.parentId).node;
        const byId = new Map(parent.children.map((child) => [child.id, child]));
        if (byId.size !== op.order.length) {
          throw new DiffInvariantViolation(
            `reorder of ${op.parentId} lists ${op.order.length} of ${byId.size} children`,
            { parentId: op.parentId },
          );
        }
        parent.children = op.order.map((id) => {
          const child = byId.get(id);
          if (!child) throw DiffInvariantViolation.unknownNode(op.op, id);
          return child;
        });
        break;
      }
      case "updateProps": {
        const { node } = lookup(op.op, op.id);
        for (const key of op.unset) delete node.props[key];
        Object.assign(node.props, structuredClone(op.set));
        if (op.events) node.events = [...op.events];
        break;
      }
      case "updateText": {
        const { node } = lookup(op.op, op.id);
        if (op.text === null) {
          delete node.text;
        } else {
          node.text = op.text;
        }
        break;
      }
    }
  }

  return root;
}

/**
 * Indices (into `sequence`) of one longest strictly increasing subsequence.
 * Used to decide whether children moved and which ones the DOM must move.
 */
export function longestIncreasingSubsequence(sequence: readonly number[]): number[] {
  const tails: number[] = [];
  const previous: number[] = new Array<number>(sequence.length).fill(-1);

  sequence.forEach((value, i) => {
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (sequence[tails[mid]] < value) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    if (lo > 0) previous[i] = tails[lo - 1];
    tails[lo] = i;
  });

  const result: number[] = [];
  let cursor = tails.length > 0 ? tails[tails.length - 1] : -1;
  while (cursor !== -1) {
    result.push(cursor);
    cursor = previous[cursor];
  }
  return result.reverse();
}
