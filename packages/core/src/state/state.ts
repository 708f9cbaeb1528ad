/**
 * State containers.
 *
 * A state definition declares a named shape with defaults. Each render
 * session owns its containers: reads through `get()` register a dependency
 * edge for the node being built, writes through `set()` / `update()` bump
 * the version and mark the container dirty for the next render.
 *
 * @example
 * ```typescript
 * const Counter = defineState('counter', { count: 0 });
 *
 * registry.page('/', (ui) => {
 *   const counter = ui.useState(Counter);
 *   ui.button(`Count: ${counter.get('count')}`, {
 *     onClick: () => counter.update({ count: counter.peek('count') + 1 }),
 *   });
 * });
 * ```
 */

import { ValidationError } from "yoguido-shared";

export type StateFields = Record<string, unknown>;

export interface StateDefinition<T extends StateFields> {
  readonly name: string;
  readonly defaults: Readonly<T>;
}

/**
 * Declare a state shape. The definition object is the identity of the
 * state: two definitions sharing a name cannot live in one session.
 */
export function defineState<T extends StateFields>(name: string, defaults: T): StateDefinition<T> {
  if (!name) {
    throw ValidationError.required("name", "State definitions need a name");
  }
  return Object.freeze({ name, defaults: Object.freeze({ ...defaults }) });
}

/**
 * Receives reads and effective writes from the containers it owns.
 */
export interface StateOwner {
  trackRead(instanceId: string): void;
  markDirty(instanceId: string): void;
}

/**
 * Type-erased view of a container, as held by a session registry.
 */
export interface StateInstance {
  readonly instanceId: string;
  readonly definition: StateDefinition<StateFields>;
  readonly version: number;
  snapshot(): StateFields;
}

export function stateInstanceId(name: string, key?: string): string {
  return key === undefined ? name : `${name}:${key}`;
}

export class StateContainer<T extends StateFields> implements StateInstance {
  readonly instanceId: string;
  private fields: T;
  private _version = 0;

  constructor(
    readonly definition: StateDefinition<T>,
    private readonly owner: StateOwner,
    initial: Partial<T> = {},
    key?: string,
  ) {
    this.instanceId = stateInstanceId(definition.name, key);
    this.fields = { ...definition.defaults, ...initial };
  }

  get version(): number {
    return this._version;
  }

  /**
   * Tracked read: during a render the node under construction becomes a
   * dependent of this container.
   */
  get<K extends keyof T>(field: K): T[K] {
    this.owner.trackRead(this.instanceId);
    return this.fields[field];
  }

  /** Untracked read. */
  peek<K extends keyof T>(field: K): T[K] {
    return this.fields[field];
  }

  /**
   * @returns whether the value changed
   */
  set<K extends keyof T>(field: K, value: T[K]): boolean {
    if (Object.is(this.fields[field], value)) {
      return false;
    }
    this.fields[field] = value;
    this.touch();
    return true;
  }

  /**
   * Write several fields at once. Counts as one mutation when anything changed;
   * `undefined` entries are ignored.
   */
  update(patch: Partial<T>): boolean {
    const fields: StateFields = this.fields;
    const entries: Array<[string, unknown]> = Object.entries(patch);
    let changed = false;
    for (const [field, value] of entries) {
      if (value === undefined || Object.is(fields[field], value)) continue;
      fields[field] = value;
      changed = true;
    }
    if (changed) {
      this.touch();
    }
    return changed;
  }

  snapshot(): T {
    return { ...this.fields };
  }

  private touch(): void {
    this._version++;
    this.owner.markDirty(this.instanceId);
  }
}

/**
 * Narrow a registry entry to the container of a given definition.
 */
export function isContainerOf<T extends StateFields>(
  value: StateInstance | undefined,
  definition: StateDefinition<T>,
): value is StateContainer<T> {
  return value instanceof StateContainer && value.definition === definition;
}
