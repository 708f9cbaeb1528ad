/**
 * Tree builder.
 *
 * Keeps an explicit stack of open containers. Every node created goes into
 * the container on top of the stack; `openContainer()` and
 * `closeContainer()` must balance.
 * The public `UI` surface wraps this in callback composition.
 */

import { BuildError, type JsonValue } from "yoguido-shared";
import type { DependencyMap, DependencyTracker } from "../state/tracker";
import { ChildIdAllocator, ROOT_NODE_ID } from "./ids";
import type { ComponentNode, EventHandler } from "./node";

export interface NodeSpec {
  text?: string;
  /** `undefined` values are dropped */
  props?: Record<string, JsonValue | undefined>;
  handlers?: Record<string, EventHandler | undefined>;
}

/**
 * An event delivered since the last commit, with what its handler returned.
 */
export interface RecordedEvent {
  nodeId: string;
  name: string;
  payload: JsonValue | undefined;
  result: unknown;
}

export interface TreeBuilderOptions {
  route: string;
  rootProps?: Record<string, JsonValue>;
  pendingEvents?: readonly RecordedEvent[];
  tracker: DependencyTracker;
}

export interface BuiltTree {
  root: ComponentNode;
  dependencies: DependencyMap;
}

interface Frame {
  node: ComponentNode;
  ids: ChildIdAllocator;
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function definedEntries<V>(record: Record<string, V | undefined> = {}): Record<string, V> {
  const result: Record<string, V> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export class TreeBuilder {
  readonly route: string;
  private readonly stack: Frame[];
  private readonly pending = new Map<string, RecordedEvent>();
  private readonly tracker: DependencyTracker;
  private finished = false;

  constructor(options: TreeBuilderOptions) {
    this.route = options.route;
    this.tracker = options.tracker;
    for (const event of options.pendingEvents ?? []) {
      this.pending.set(`${event.nodeId}#${event.name}`, event);
    }
    const root: ComponentNode = {
      id: ROOT_NODE_ID,
      kind: "page",
      props: { ...options.rootProps },
      children: [],
      handlers: {},
    };
    this.stack = [{ node: root, ids: new ChildIdAllocator(ROOT_NODE_ID) }];
  }

  get depth(): number {
    return this.stack.length - 1;
  }

  /**
   * The latest event of this name delivered to the node since the last commit.
   */
  pendingEvent(nodeId: string, name: string): RecordedEvent | undefined {
    return this.pending.get(`${nodeId}#${name}`);
  }

  /**
   * Append a leaf to the open container. `spec` may be computed from the
   * node's id, which is how primitives look up their pending events.
   */
  leaf(kind: string, spec: NodeSpec | ((id: string) => NodeSpec), key?: string): ComponentNode {
    const node = this.create(kind, spec, key);
    this.top().node.children.push(node);
    return node;
  }

  openContainer(kind: string, spec: NodeSpec | ((id: string) => NodeSpec), key?: string): ComponentNode {
    const node = this.create(kind, spec, key);
    this.top().node.children.push(node);
    this.stack.push({ node, ids: new ChildIdAllocator(node.id) });
    this.tracker.enterContainer();
    return node;
  }

  /**
   * Close the innermost open container. When `node` is given it must be
   * that container.
   */
  closeContainer(node?: ComponentNode): ComponentNode {
    if (this.stack.length <= 1) {
      throw new BuildError(this.route, "closeContainer() called with no open container");
    }
    const frame = this.top();
    if (node && frame.node !== node) {
      throw new BuildError(
        this.route,
        `closeContainer() expected ${node.id} but ${frame.node.id} is the innermost open container`,
      );
    }
    this.stack.pop();
    this.tracker.exitContainer(frame.node.id);
    return frame.node;
  }

  /**
   * Run a container body and close the container afterwards.
   */
  within(node: ComponentNode, body: () => void): ComponentNode {
    const result: unknown = body();
    if (isPromiseLike(result)) {
      throw new BuildError(this.route, `Body of ${node.id} returned a promise; render functions are synchronous`);
    }
    return this.closeContainer(node);
  }

  finish(): BuiltTree {
    if (this.finished) {
      throw new BuildError(this.route, "finish() called twice");
    }
    if (this.stack.length !== 1) {
      throw new BuildError(this.route, `${this.top().node.id} was never closed`);
    }
    this.finished = true;
    const root = this.stack[0].node;
    return { root, dependencies: this.tracker.finish(root.id) };
  }

  private top(): Frame {
    return this.stack[this.stack.length - 1];
  }

  private create(kind: string, spec: NodeSpec | ((id: string) => NodeSpec), key?: string): ComponentNode {
    if (this.finished) {
      throw new BuildError(this.route, `Cannot add ${kind} after the tree was finished`);
    }
    const id = this.top().ids.next(kind, key);
    if (id === null) {
      throw new BuildError(this.route, `Duplicate key '${key}' under ${this.top().node.id}`);
    }
    const resolved = typeof spec === "function" ? spec(id) : spec;
    this.tracker.attribute(id);
    return {
      id,
      kind,
      ...(key !== undefined && { key }),
      ...(resolved.text !== undefined && { text: resolved.text }),
      props: definedEntries(resolved.props),
      children: [],
      handlers: definedEntries(resolved.handlers),
    };
  }
}
