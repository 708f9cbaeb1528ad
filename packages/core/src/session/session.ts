/**
 * RenderSession - the server-side state of one connected client.
 *
 * Holds the committed tree, the session's state containers and the route.
 * Every render and every dispatch runs under the session's mutex; the
 * methods documented as "locked" expect the caller to hold it through
 * `exclusive()`.
 */

import { Logger, Mutex, type KernelLogger } from "yoguido-kernel";
import {
  BuildError,
  NotFoundError,
  StateError,
  ValidationError,
  isDiffInvariantViolation,
  type ErrorMessage,
  type ResyncMessage,
  type ServerMessage,
  type WireError,
  type YoGuidoError,
} from "yoguido-shared";
import { diff, verifyPatches } from "../diff/diff";
import {
  normalizePath,
  type GuardContext,
  type PageDefinition,
  type Registry,
} from "../registry/registry";
import {
  StateContainer,
  defineState,
  isContainerOf,
  stateInstanceId,
  type StateDefinition,
  type StateFields,
  type StateInstance,
  type StateOwner,
} from "../state/state";
import { DependencyMap, DependencyTracker } from "../state/tracker";
import { TreeBuilder, isPromiseLike, type RecordedEvent } from "../tree/builder";
import { indexNodes, toSnapshot, type ComponentNode, type EventHandler } from "../tree/node";
import { UI, type UIHost, type WidgetMemory } from "../ui/ui";
import { runInSession, type SessionScope } from "./scope";

/** Redirect hops a chain of page guards may take before the render fails */
export const MAX_REDIRECTS = 5;

export const ROUTE_STATE = defineState("__route", { path: "/" });

export interface RenderSessionOptions {
  id: string;
  registry: Registry;
  /** Title used when no page is resolved (default: 'YoGuido App') */
  appTitle?: string;
  now?: () => number;
}

export interface RenderResult {
  message: ServerMessage;
  /** Nodes that depended on the containers changed since the previous commit */
  affected: ReadonlySet<string>;
}

interface Committed {
  tree: ComponentNode | null;
  nodes: Map<string, ComponentNode>;
  dependencies: DependencyMap;
  route: string;
  title: string;
}

interface Built {
  root: ComponentNode;
  dependencies: DependencyMap;
  route: string;
  title: string;
}

export type DestroyReason = "leave" | "disconnect" | "idle" | "shutdown";

export class RenderSession implements StateOwner, UIHost, SessionScope {
  readonly id: string;
  private readonly registry: Registry;
  private readonly appTitle: string;
  private readonly now: () => number;
  private readonly lock = new Mutex();
  private readonly log: KernelLogger;

  private readonly states = new Map<string, StateInstance>();
  private readonly definitions = new Map<string, StateDefinition<StateFields>>();
  private readonly route: StateContainer<{ path: string }>;
  private readonly dirty = new Set<string>();
  private readonly widgets = new Map<string, WidgetMemory>();
  private pendingEvents: RecordedEvent[] = [];
  private tracker: DependencyTracker | null = null;
  private committed: Committed;
  private _version = 0;
  private _lastActivity: number;
  private closed = false;

  constructor(options: RenderSessionOptions) {
    this.id = options.id;
    this.registry = options.registry;
    this.appTitle = options.appTitle ?? "YoGuido App";
    this.now = options.now ?? Date.now;
    this._lastActivity = this.now();
    this.log = Logger.for(this).child({ session: this.id });
    this.route = this.useState(ROUTE_STATE);
    this.committed = { tree: null, nodes: new Map(), dependencies: new DependencyMap(), route: "/", title: "" };
    this.log.info("session created");
  }

  get sessionId(): string {
    return this.id;
  }

  get version(): number {
    return this._version;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isBusy(): boolean {
    return this.lock.isLocked;
  }

  get isDirty(): boolean {
    return this.dirty.size > 0 || this.pendingEvents.length > 0;
  }

  get tree(): ComponentNode | null {
    return this.committed.tree;
  }

  get dependencies(): DependencyMap {
    return this.committed.dependencies;
  }

  // ===========================================================================
  // Locking
  // ===========================================================================

  /**
   * Run `fn` while holding the session lock. Rejects with
   * `NotFoundError('session')` when the session is (or gets) destroyed.
   */
  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      this.assertOpen();
      this.touch();
      const result = await fn();
      this.assertOpen();
      return result;
    });
  }

  touch(): void {
    this._lastActivity = this.now();
  }

  // ===========================================================================
  // State
  // ===========================================================================

  trackRead(instanceId: string): void {
    this.tracker?.record(instanceId);
  }

  markDirty(instanceId: string): void {
    this.dirty.add(instanceId);
  }

  /**
   * Return the session's container for `(definition, key)`, creating it
   * with `initial` on first use.
   */
  useState<T extends StateFields>(
    definition: StateDefinition<T>,
    initial?: Partial<T>,
    key?: string,
  ): StateContainer<T> {
    const registered = this.definitions.get(definition.name);
    if (registered && registered !== definition) {
      throw new ValidationError(
        "definition",
        `State "${definition.name}" is already defined by another definition in this session`,
        { code: "VALIDATION_CONSTRAINT" },
      );
    }
    const instanceId = stateInstanceId(definition.name, key);
    const existing = this.states.get(instanceId);
    if (isContainerOf(existing, definition)) {
      return existing;
    }
    const container = new StateContainer(definition, this, initial, key);
    this.definitions.set(definition.name, definition);
    this.states.set(instanceId, container);
    return container;
  }

  getState<T extends StateFields>(definition: StateDefinition<T>, key?: string): StateContainer<T> | undefined {
    const existing = this.states.get(stateInstanceId(definition.name, key));
    return isContainerOf(existing, definition) ? existing : undefined;
  }

  recallWidget(nodeId: string): WidgetMemory | undefined {
    return this.widgets.get(nodeId);
  }

  rememberWidget(nodeId: string, memory: WidgetMemory): void {
    this.widgets.set(nodeId, memory);
  }

  // ===========================================================================
  // Navigation
  // ===========================================================================

  navigateTo(path: string): void {
    const normalized = normalizePath(path);
    if (normalized !== "/" && !this.registry.isRegistered(normalized)) {
      this.log.warn({ path: normalized }, "navigating to an unregistered path");
    }
    this.route.set("path", normalized);
  }

  getCurrentPath(): string {
    return this.route.get("path");
  }

  isCurrentPage(path: string): boolean {
    return this.getCurrentPath() === normalizePath(path);
  }

  getCurrentPageTitle(): string {
    const { page } = this.registry.resolve(this.getCurrentPath());
    return page.title || this.appTitle;
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  /**
   * Handler registered for `eventName` on `nodeId` in the committed tree.
   */
  resolveHandler(nodeId: string, eventName: string): EventHandler | undefined {
    const node = this.committed.nodes.get(nodeId);
    return node && Object.hasOwn(node.handlers, eventName) ? node.handlers[eventName] : undefined;
  }

  /**
   * Make an event (and its handler's result) visible to the next render pass.
   */
  recordEvent(event: RecordedEvent): void {
    this.pendingEvents.push(event);
  }

  // ===========================================================================
  // Rendering (locked)
  // ===========================================================================

  /**
   * Navigate and render. Locked.
   */
  navigate(path: string): RenderResult {
    this.navigateTo(path);
    return this.render();
  }

  /**
   * Full tree of the committed render, rendering first if nothing was
   * committed yet or state changed since. Locked.
   */
  resync(): ServerMessage {
    if (!this.committed.tree) {
      return this.render().message;
    }
    if (this.isDirty) {
      const { message } = this.render();
      return message.type === "patch" ? this.resyncMessage(message.notice) : message;
    }
    return this.resyncMessage();
  }

  /**
   * Render pending state changes, or return `null` when nothing changed. Locked.
   */
  refresh(): RenderResult | null {
    return this.isDirty ? this.render() : null;
  }

  /**
   * Build, diff, verify and commit. Locked.
   *
   * - a build failure keeps the committed tree and answers with an error message
   * - a first render or a route change answers with a resync
   * - a diff invariant violation commits and answers with a resync
   */
  render(notice?: WireError): RenderResult {
    this.assertOpen();
    let built: Built;
    try {
      built = this.build();
    } catch (error) {
      const buildError = BuildError.from(this.route.peek("path"), error);
      this.log.error({ err: buildError, route: buildError.route }, "render failed");
      this.pendingEvents = [];
      return { message: this.errorMessage(buildError), affected: new Set() };
    }

    const previous = this.committed.tree;
    if (!previous || this.committed.route !== built.route) {
      const affected = this.commit(built, 0);
      return { message: this.resyncMessage(notice), affected };
    }

    const ops = diff(previous, built.root);
    try {
      verifyPatches(previous, built.root, ops);
    } catch (error) {
      if (!isDiffInvariantViolation(error)) throw error;
      this.log.error({ err: error }, "diff invariant violated, sending full tree");
      const affected = this.commit(built, 0);
      return { message: this.resyncMessage(notice), affected };
    }

    const affected = this.commit(built, ops.length);
    return {
      message: { type: "patch", version: this._version, ops, ...(notice && { notice }) },
      affected,
    };
  }

  resyncMessage(notice?: WireError): ResyncMessage {
    const tree = this.committed.tree;
    if (!tree) {
      throw new StateError("empty", `Session ${this.id} has no committed tree`);
    }
    return {
      type: "resync",
      version: this._version,
      route: this.committed.route,
      title: this.committed.title,
      fullTree: toSnapshot(tree),
      ...(notice && { notice }),
    };
  }

  errorMessage(error: YoGuidoError): ErrorMessage {
    return {
      type: "error",
      version: this._version,
      error: { code: error.code, message: error.message },
      transient: true,
    };
  }

  destroy(reason: DestroyReason = "leave"): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.states.clear();
    this.widgets.clear();
    this.pendingEvents = [];
    this.committed = { tree: null, nodes: new Map(), dependencies: new DependencyMap(), route: "/", title: "" };
    this.log.info({ reason }, "session destroyed");
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertOpen(): void {
    if (this.closed) {
      throw new NotFoundError("session", this.id);
    }
  }

  private build(): Built {
    const page = this.resolvePage();
    const route = this.route.peek("path");
    const tracker = new DependencyTracker();
    const builder = new TreeBuilder({
      route,
      rootProps: { route },
      pendingEvents: this.pendingEvents,
      tracker,
    });
    const ui = new UI(builder, this);

    this.tracker = tracker;
    try {
      runInSession(this, () => this.renderPage(ui, page, route));
      const { root, dependencies } = builder.finish();
      return { root, dependencies, route, title: page.title || this.appTitle };
    } catch (error) {
      throw BuildError.from(route, error);
    } finally {
      this.tracker = null;
    }
  }

  /**
   * Resolve the current route, following guard redirects.
   */
  private resolvePage(): PageDefinition {
    const start = this.route.peek("path");
    const visited = [start];
    let resolved = this.registry.resolve(start);

    while (resolved.page.guard) {
      let verdict: true | string;
      try {
        verdict = resolved.page.guard(this.guardContext(resolved.path));
      } catch (error) {
        throw BuildError.from(resolved.path, error);
      }
      if (verdict === true) break;
      if (visited.length > MAX_REDIRECTS) {
        throw new BuildError(start, `Too many redirects: ${[...visited, verdict].join(" -> ")}`);
      }
      visited.push(normalizePath(verdict));
      resolved = this.registry.resolve(verdict);
    }

    if (resolved.path !== start) {
      this.log.debug({ from: start, to: resolved.path }, "page guard redirected");
      this.route.set("path", resolved.path);
    }
    if (!resolved.found) {
      this.log.warn({ path: resolved.path }, "no page registered for path");
    }
    return resolved.page;
  }

  private guardContext(path: string): GuardContext {
    return {
      path,
      sessionId: this.id,
      useState: <T extends StateFields>(definition: StateDefinition<T>, initial?: Partial<T>, key?: string) =>
        this.useState(definition, initial, key),
    };
  }

  private renderPage(ui: UI, page: PageDefinition, route: string): void {
    const renderBody = (): void => {
      const result: unknown = page.render(ui);
      if (isPromiseLike(result)) {
        throw new BuildError(route, `Page ${page.path} returned a promise; render functions are synchronous`);
      }
    };

    if (page.layout === undefined) {
      renderBody();
      return;
    }

    const layout = this.registry.getLayout(page.layout);
    if (!layout) {
      throw new NotFoundError("layout", page.layout, `Page ${page.path} uses unknown layout "${page.layout}"`);
    }

    let rendered = false;
    const result: unknown = layout(ui, () => {
      if (rendered) {
        throw new BuildError(route, `Layout "${page.layout}" rendered the page twice`);
      }
      rendered = true;
      renderBody();
    });
    if (isPromiseLike(result)) {
      throw new BuildError(route, `Layout "${page.layout}" returned a promise; render functions are synchronous`);
    }
    if (!rendered) {
      this.log.warn({ layout: page.layout, route }, "layout did not render its page");
    }
  }

  private commit(built: Built, opCount: number): Set<string> {
    const affected = this.committed.dependencies.affectedBy(this.dirty);
    const changed = [...this.dirty];

    this._version++;
    this.committed = {
      tree: built.root,
      nodes: indexNodes(built.root),
      dependencies: built.dependencies,
      route: built.route,
      title: built.title,
    };
    this.dirty.clear();
    this.pendingEvents = [];
    for (const nodeId of this.widgets.keys()) {
      if (!this.committed.nodes.has(nodeId)) this.widgets.delete(nodeId);
    }

    this.log.debug(
      { version: this._version, route: built.route, ops: opCount, changed, affected: [...affected] },
      "render committed",
    );
    return affected;
  }
}
