/**
 * Diff engine.
 *
 * Compares two built trees node by node, matching children by id and
 * kind, and emits the patch operations that turn the first into the
 * second. Per parent the order is: removals, at most one reorder,
 * inserts in ascending final index, then recursion into the survivors.
 */

import {
  DiffInvariantViolation,
  ROOT_MOUNT_ID,
  jsonEqual,
  longestIncreasingSubsequence,
  sameStringList,
  type JsonObject,
  type PatchOp,
  type UpdatePropsOp,
} from "yoguido-shared";
import { eventNames, toSnapshot, type ComponentNode } from "../tree/node";

export function diff(previous: ComponentNode | null, next: ComponentNode | null): PatchOp[] {
  const ops: PatchOp[] = [];
  if (previous === next) {
    return ops;
  }
  if (!previous) {
    if (next) ops.push({ op: "insert", parentId: ROOT_MOUNT_ID, index: 0, node: toSnapshot(next) });
    return ops;
  }
  if (!next) {
    ops.push({ op: "remove", id: previous.id });
    return ops;
  }
  if (previous.id !== next.id || previous.kind !== next.kind) {
    ops.push({ op: "remove", id: previous.id });
    ops.push({ op: "insert", parentId: ROOT_MOUNT_ID, index: 0, node: toSnapshot(next) });
    return ops;
  }
  diffNode(previous, next, ops);
  return ops;
}

function diffNode(previous: ComponentNode, next: ComponentNode, ops: PatchOp[]): void {
  if (previous === next) {
    return;
  }
  if (previous.text !== next.text) {
    ops.push({ op: "updateText", id: next.id, text: next.text ?? null });
  }
  const props = diffProps(previous, next);
  if (props) {
    ops.push(props);
  }
  diffChildren(previous, next, ops);
}

function diffProps(previous: ComponentNode, next: ComponentNode): UpdatePropsOp | null {
  const set: JsonObject = {};
  const unset: string[] = [];

  for (const [key, value] of Object.entries(next.props)) {
    if (!Object.hasOwn(previous.props, key) || !jsonEqual(previous.props[key], value)) {
      set[key] = value;
    }
  }
  for (const key of Object.keys(previous.props)) {
    if (!Object.hasOwn(next.props, key)) unset.push(key);
  }

  const previousEvents = eventNames(previous);
  const nextEvents = eventNames(next);
  const eventsChanged = !sameStringList(previousEvents, nextEvents);

  if (Object.keys(set).length === 0 && unset.length === 0 && !eventsChanged) {
    return null;
  }
  return { op: "updateProps", id: next.id, set, unset, ...(eventsChanged && { events: nextEvents }) };
}

function diffChildren(previous: ComponentNode, next: ComponentNode, ops: PatchOp[]): void {
  const nextById = new Map(next.children.map((child) => [child.id, child]));
  const survivors = new Map<string, ComponentNode>();

  for (const child of previous.children) {
    const match = nextById.get(child.id);
    if (match && match.kind === child.kind) {
      survivors.set(child.id, child);
    } else {
      ops.push({ op: "remove", id: child.id });
    }
  }

  // Survivor positions in the old order, listed in the new order.
  const oldPosition = new Map([...survivors.keys()].map((id, index) => [id, index]));
  const order = next.children.filter((child) => survivors.has(child.id)).map((child) => child.id);
  const positions = order.map((id) => oldPosition.get(id) ?? -1);
  if (longestIncreasingSubsequence(positions).length < positions.length) {
    ops.push({ op: "reorder", parentId: next.id, order });
  }

  next.children.forEach((child, index) => {
    if (!survivors.has(child.id)) {
      ops.push({ op: "insert", parentId: next.id, index, node: toSnapshot(child) });
    }
  });

  for (const child of next.children) {
    const before = survivors.get(child.id);
    if (before) diffNode(before, child, ops);
  }
}

/**
 * Reject patches that reference a node present in neither tree.
 *
 * @throws DiffInvariantViolation
 */
export function verifyPatches(
  previous: ComponentNode | null,
  next: ComponentNode | null,
  ops: readonly PatchOp[],
): void {
  const known = new Set<string>([ROOT_MOUNT_ID]);
  const collect = (node: ComponentNode | null): void => {
    if (!node) return;
    known.add(node.id);
    for (const child of node.children) collect(child);
  };
  collect(previous);
  collect(next);

  const check = (op: PatchOp, id: string): void => {
    if (!known.has(id)) throw DiffInvariantViolation.unknownNode(op.op, id);
  };

  for (const op of ops) {
    switch (op.op) {
      case "insert":
        check(op, op.parentId);
        check(op, op.node.id);
        break;
      case "remove":
      case "updateProps":
      case "updateText":
        check(op, op.id);
        break;
      case "reorder":
        check(op, op.parentId);
        for (const id of op.order) check(op, id);
        break;
    }
  }
}
