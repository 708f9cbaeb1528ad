/**
 * # YoGuido Shared
 *
 * Platform-independent definitions used by both the server engine and the
 * browser runtime.
 *
 * - **Protocol** - node snapshots, patch operations, wire messages
 * - **Patches** - `applyPatches` over snapshots and the LIS helper
 * - **Elements** - the node kind to HTML element mapping
 * - **Errors** - the coded error hierarchy
 *
 * ```typescript
 * import { applyPatches, type PatchMessage } from 'yoguido-shared';
 *
 * const next = applyPatches(tree, message.ops);
 * ```
 *
 * @module yoguido-shared
 */

export * from "./protocol";
export * from "./errors";
export * from "./equality";
export * from "./patch";
export * from "./elements";
