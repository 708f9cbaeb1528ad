/**
 * Registry - pages and layouts, registered once at startup.
 *
 * The registry is frozen before the app serves its first request and is
 * then shared, read-only, by every session.
 *
 * @example
 * ```typescript
 * const registry = new Registry()
 *   .layout('admin', (ui, renderPage) => {
 *     ui.sidebar(() => ui.link('Users', '/admin/users'));
 *     ui.container(renderPage);
 *   })
 *   .page('/admin', dashboard, { title: 'Dashboard', layout: 'admin' })
 *   .page('/admin/users', users, { layout: 'admin' });
 * ```
 */

import { NotFoundError, StateError, ValidationError, type JsonValue } from "yoguido-shared";
import { Logger } from "yoguido-kernel";
import type { StateContainer, StateDefinition, StateFields } from "../state/state";
import type { UI } from "../ui/ui";

export type PageRender = (ui: UI) => void;

/**
 * Wraps a page. `renderPage` builds the page content wherever the layout
 * calls it.
 */
export type LayoutRender = (ui: UI, renderPage: () => void) => void;

export interface GuardContext {
  readonly path: string;
  readonly sessionId: string;
  useState<T extends StateFields>(
    definition: StateDefinition<T>,
    initial?: Partial<T>,
    key?: string,
  ): StateContainer<T>;
}

/**
 * Runs before a page is built. Return `true` to render it, or a path to
 * redirect to.
 */
export type PageGuard = (context: GuardContext) => true | string;

export interface PageOptions {
  /** Defaults to the render function's name in title case */
  title?: string;
  layout?: string;
  guard?: PageGuard;
  meta?: Record<string, JsonValue>;
}

export interface PageDefinition {
  readonly path: string;
  readonly title: string;
  readonly render: PageRender;
  readonly layout?: string;
  readonly guard?: PageGuard;
  readonly meta: Readonly<Record<string, JsonValue>>;
}

export const NOT_FOUND_TITLE = "404 - Page Not Found";

export interface ResolvedPage {
  /** Normalized requested path */
  path: string;
  page: PageDefinition;
  found: boolean;
}

export function normalizePath(path: string): string {
  const [pathname] = path.split(/[?#]/);
  const trimmed = pathname.trim();
  const withSlash = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  return withSlash.length > 1 ? withSlash.replace(/\/+$/, "") || "/" : withSlash;
}

function titleFromName(render: PageRender, path: string): string {
  const source = render.name || path.split("/").filter(Boolean).pop() || "Home";
  const words = source
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[\s_-]+/)
    .filter(Boolean);
  return words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join(" ");
}

export class Registry {
  private readonly pages = new Map<string, PageDefinition>();
  private readonly layouts = new Map<string, LayoutRender>();
  private frozen = false;
  private readonly log = Logger.for(this);

  page(path: string, render: PageRender, options: PageOptions = {}): this {
    this.assertOpen("register a page");
    if (!path.startsWith("/")) {
      throw new ValidationError("path", `Page path must start with "/": ${path}`, {
        code: "VALIDATION_FORMAT",
        received: path,
      });
    }
    const normalized = normalizePath(path);
    if (this.pages.has(normalized)) {
      throw new ValidationError("path", `Page ${normalized} is already registered`, {
        code: "VALIDATION_CONSTRAINT",
      });
    }
    this.pages.set(normalized, {
      path: normalized,
      title: options.title ?? titleFromName(render, normalized),
      render,
      layout: options.layout,
      guard: options.guard,
      meta: { ...options.meta },
    });
    this.log.debug({ path: normalized, layout: options.layout }, "page registered");
    return this;
  }

  layout(name: string, render: LayoutRender): this {
    this.assertOpen("register a layout");
    if (this.layouts.has(name)) {
      throw new ValidationError("name", `Layout ${name} is already registered`, {
        code: "VALIDATION_CONSTRAINT",
      });
    }
    this.layouts.set(name, render);
    return this;
  }

  /**
   * Freeze the registry. Every page's layout must exist.
   */
  freeze(): this {
    if (this.frozen) {
      return this;
    }
    for (const page of this.pages.values()) {
      if (page.layout !== undefined && !this.layouts.has(page.layout)) {
        throw new NotFoundError("layout", page.layout, `Page ${page.path} uses unknown layout "${page.layout}"`);
      }
    }
    this.frozen = true;
    this.log.info({ pages: this.pages.size, layouts: this.layouts.size }, "registry frozen");
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  isRegistered(path: string): boolean {
    return this.pages.has(normalizePath(path));
  }

  paths(): string[] {
    return [...this.pages.keys()];
  }

  getLayout(name: string): LayoutRender | undefined {
    return this.layouts.get(name);
  }

  /**
   * Map a path to its page. `/` falls back to the first registered page;
   * anything else unregistered gets the built-in not-found page.
   */
  resolve(path: string): ResolvedPage {
    const normalized = normalizePath(path);
    const page = this.pages.get(normalized);
    if (page) {
      return { path: normalized, page, found: true };
    }
    if (normalized === "/") {
      const first = this.pages.values().next();
      if (!first.done) {
        return { path: normalized, page: first.value, found: true };
      }
    }
    return { path: normalized, page: this.notFoundPage(normalized), found: false };
  }

  private notFoundPage(path: string): PageDefinition {
    const available = this.paths();
    return {
      path,
      title: NOT_FOUND_TITLE,
      render: (ui) => {
        ui.title(NOT_FOUND_TITLE, { level: 1 });
        ui.text("The requested page could not be found.");
        ui.text(`Current page: ${path}`);
        ui.text(`Available pages: ${available.length > 0 ? available.join(", ") : "none"}`);
      },
      meta: {},
    };
  }

  private assertOpen(operation: string): void {
    if (this.frozen) {
      throw StateError.frozen(operation);
    }
  }
}
