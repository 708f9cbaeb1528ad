/**
 * Session scope.
 *
 * Render passes and event handlers run inside the scope of their session,
 * which lets the navigation helpers work as plain functions.
 *
 * @example
 * ```typescript
 * ui.button('Users', { onClick: () => navigateTo('/admin/users') });
 * ```
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { ContextError } from "yoguido-shared";

export interface SessionScope {
  readonly sessionId: string;
  navigateTo(path: string): void;
  getCurrentPath(): string;
  isCurrentPage(path: string): boolean;
  getCurrentPageTitle(): string;
}

const storage = new AsyncLocalStorage<SessionScope>();

export function runInSession<T>(scope: SessionScope, fn: () => T): T {
  return storage.run(scope, fn);
}

export function currentSession(): SessionScope {
  const scope = storage.getStore();
  if (!scope) {
    throw ContextError.notFound("Session scope");
  }
  return scope;
}

export function tryCurrentSession(): SessionScope | undefined {
  return storage.getStore();
}

export function navigateTo(path: string): void {
  currentSession().navigateTo(path);
}

export function getCurrentPath(): string {
  return currentSession().getCurrentPath();
}

export function isCurrentPage(path: string): boolean {
  return currentSession().isCurrentPage(path);
}

export function getCurrentPageTitle(): string {
  return currentSession().getCurrentPageTitle();
}
