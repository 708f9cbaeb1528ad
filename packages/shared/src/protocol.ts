/**
 * Wire Protocol
 *
 * Node snapshots, patch operations and the messages exchanged between the
 * server-side render session and the browser runtime. Everything here is
 * plain JSON so both sides can share the same definitions.
 *
 * @example
 * ```typescript
 * const message: PatchMessage = {
 *   type: 'patch',
 *   version: 2,
 *   ops: [{ op: 'updateText', id: 'root/button0', text: 'Count: 1' }],
 * };
 * ```
 */

import type { YoGuidoErrorCode } from "./errors";

// =============================================================================
// Values
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Id of the synthetic mount point that owns the page root.
 * Inserting the first tree, or re-inserting a replaced root, targets it.
 */
export const ROOT_MOUNT_ID = "$root";

// =============================================================================
// Nodes
// =============================================================================

/**
 * Serialized form of a component node.
 * Handlers are reduced to the event names the client must forward.
 */
export interface NodeSnapshot {
  id: string;
  kind: string;
  props: JsonObject;
  text?: string;
  events: string[];
  children: NodeSnapshot[];
}

// =============================================================================
// Patch Operations
// =============================================================================

export interface InsertOp {
  op: "insert";
  parentId: string;
  index: number;
  node: NodeSnapshot;
}

export interface RemoveOp {
  op: "remove";
  id: string;
}

/**
 * Rearranges a parent's children into `order`.
 * `order` lists every child the parent holds when the op is applied.
 */
export interface ReorderOp {
  op: "reorder";
  parentId: string;
  order: string[];
}

export interface UpdatePropsOp {
  op: "updateProps";
  id: string;
  set: JsonObject;
  unset: string[];
  /** Replacement event list, present only when it changed */
  events?: string[];
}

export interface UpdateTextOp {
  op: "updateText";
  id: string;
  text: string | null;
}

export type PatchOp = InsertOp | RemoveOp | ReorderOp | UpdatePropsOp | UpdateTextOp;

export type PatchOpType = PatchOp["op"];

// =============================================================================
// Server -> Client
// =============================================================================

export interface WireError {
  code: YoGuidoErrorCode;
  message: string;
}

export interface PatchMessage {
  type: "patch";
  version: number;
  ops: PatchOp[];
  /** Non-fatal problem raised while handling the event (e.g. a failing handler) */
  notice?: WireError;
}

export interface ResyncMessage {
  type: "resync";
  version: number;
  route: string;
  title: string;
  fullTree: NodeSnapshot;
  notice?: WireError;
}

export interface ErrorMessage {
  type: "error";
  version: number;
  error: WireError;
  transient: true;
}

export type ServerMessage = PatchMessage | ResyncMessage | ErrorMessage;

// =============================================================================
// Client -> Server
// =============================================================================

export interface ClientEvent {
  session: string;
  node: string;
  event: string;
  payload?: JsonValue;
}

export interface NavigateRequest {
  session: string;
  path: string;
}

export interface SessionRequest {
  session: string;
}

/**
 * Data embedded in the initial HTML document for the browser runtime.
 */
export interface BootstrapData {
  session: string;
  basePath: string;
  /** Suffix of the document title */
  appTitle: string;
  stream: boolean;
  message: ServerMessage;
}

// =============================================================================
// Guards
// =============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isServerMessage(value: unknown): value is ServerMessage {
  if (!isJsonObject(value) || typeof value.version !== "number") {
    return false;
  }
  switch (value.type) {
    case "patch":
      return Array.isArray(value.ops);
    case "resync":
      return isJsonObject(value.fullTree) && typeof value.route === "string";
    case "error":
      return isJsonObject(value.error);
    default:
      return false;
  }
}
