import type { JsonValue, NodeSnapshot } from "yoguido-shared";

/**
 * What a handler receives when the browser forwards an event.
 */
export interface HandlerEvent {
  readonly sessionId: string;
  readonly nodeId: string;
  readonly name: string;
  readonly payload: JsonValue | undefined;
  /** Aborted when the handler exceeds the configured timeout */
  readonly signal: AbortSignal;
  navigateTo(path: string): void;
  getCurrentPath(): string;
}

export type EventHandler = (event: HandlerEvent) => unknown;

/**
 * One node of a built tree. Ids are derived from the tree position
 * (and an optional key), so equal ids across two renders denote the same
 * logical node.
 */
export interface ComponentNode {
  readonly id: string;
  readonly kind: string;
  readonly key?: string;
  readonly text?: string;
  readonly props: Readonly<Record<string, JsonValue>>;
  readonly children: ComponentNode[];
  readonly handlers: Readonly<Record<string, EventHandler>>;
}

export function eventNames(node: ComponentNode): string[] {
  return Object.keys(node.handlers).sort();
}

export function toSnapshot(node: ComponentNode): NodeSnapshot {
  return {
    id: node.id,
    kind: node.kind,
    props: { ...node.props },
    ...(node.text !== undefined && { text: node.text }),
    events: eventNames(node),
    children: node.children.map(toSnapshot),
  };
}

export function indexNodes(root: ComponentNode | null): Map<string, ComponentNode> {
  const index = new Map<string, ComponentNode>();
  const visit = (node: ComponentNode): void => {
    index.set(node.id, node);
    for (const child of node.children) visit(child);
  };
  if (root) visit(root);
  return index;
}
