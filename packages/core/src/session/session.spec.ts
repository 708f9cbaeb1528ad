/**
 * RenderSession tests: render cycle, dependency tracking, guards, layouts
 * and failure handling.
 */

import { Logger } from "yoguido-kernel";
import { ContextError, NotFoundError } from "yoguido-shared";
import { Registry } from "../registry/registry";
import { defineState } from "../state/state";
import { findNode, openTestSession } from "../testing";
import type { UI } from "../ui/ui";
import { currentSession, navigateTo } from "./scope";
import { RenderSession } from "./session";

beforeAll(() => {
  Logger.configure({ level: "silent" });
});

const Counter = defineState("counter", { count: 0 });
const A = defineState("a", { value: 0 });
const B = defineState("b", { value: 0 });
const Auth = defineState("auth", { user: "" });

function counter(ui: UI): void {
  const state = ui.useState(Counter);
  ui.button(`Count: ${state.get("count")}`, {
    onClick: () => state.set("count", state.peek("count") + 1),
  });
}

describe("RenderSession", () => {
  // ===========================================================================
  // Render cycle
  // ===========================================================================

  describe("render cycle", () => {
    it("should answer the first render with the full tree", async () => {
      const { message, session } = await openTestSession((registry) => registry.page("/", counter));

      expect(message).toEqual({
        type: "resync",
        version: 1,
        route: "/",
        title: "Counter",
        fullTree: {
          id: "root",
          kind: "page",
          props: { route: "/" },
          events: [],
          children: [
            {
              id: "root/button0",
              kind: "button",
              props: { variant: "default" },
              text: "Count: 0",
              events: ["click"],
              children: [],
            },
          ],
        },
      });
      expect(session.version).toBe(1);
    });

    it("should answer a click with a minimal patch", async () => {
      const { dispatch } = await openTestSession((registry) => registry.page("/", counter));

      const message = await dispatch("root/button0", "click");

      expect(message).toEqual({
        type: "patch",
        version: 2,
        ops: [{ op: "updateText", id: "root/button0", text: "Count: 1" }],
      });
    });

    it("should report the nodes that read changed state", async () => {
      const { session } = await openTestSession((registry) =>
        registry.page("/", (ui) => {
          ui.text(`a=${ui.useState(A).get("value")}`);
          ui.text(`b=${ui.useState(B).get("value")}`);
        }),
      );

      const result = await session.exclusive(() => {
        session.getState(A)?.set("value", 1);
        return session.render();
      });

      expect([...result.affected]).toEqual(["root/text0"]);
      expect(result.message).toEqual({
        type: "patch",
        version: 2,
        ops: [{ op: "updateText", id: "root/text0", text: "a=1" }],
      });
    });

    it("should attribute reads inside a container body to its nodes", async () => {
      const { session } = await openTestSession((registry) =>
        registry.page("/", (ui) => {
          ui.card(() => {
            ui.text(`a=${ui.useState(A).get("value")}`);
          });
        }),
      );

      expect(session.dependencies.toJSON()).toEqual({ a: ["root/card0/text0"] });
    });

    it("should resync without rendering when nothing changed", async () => {
      const { session } = await openTestSession((registry) => registry.page("/", counter));

      const message = await session.exclusive(() => session.resync());

      expect(message).toMatchObject({ type: "resync", version: 1 });
    });

    it("should refresh only when state changed", async () => {
      const { session } = await openTestSession((registry) => registry.page("/", counter));

      expect(await session.exclusive(() => session.refresh())).toBeNull();

      session.getState(Counter)?.set("count", 5);
      const result = await session.exclusive(() => session.refresh());

      expect(result?.message).toEqual({
        type: "patch",
        version: 2,
        ops: [{ op: "updateText", id: "root/button0", text: "Count: 5" }],
      });
    });

    it("should resync after a route change", async () => {
      const { session } = await openTestSession((registry) => {
        registry.page("/", counter);
        registry.page("/about", (ui) => ui.text("About"));
      });

      const { message } = await session.exclusive(() => session.navigate("/about"));

      expect(message).toMatchObject({ type: "resync", version: 2, route: "/about", title: "About" });
    });

    it("should render the first page for the root path", async () => {
      const { message } = await openTestSession((registry) => registry.page("/home", counter));

      expect(message).toMatchObject({ type: "resync", route: "/", title: "Counter" });
    });
  });

  // ===========================================================================
  // State
  // ===========================================================================

  describe("state", () => {
    it("should keep one container per definition and key", async () => {
      const { session } = await openTestSession((registry) => registry.page("/", counter));

      expect(session.useState(Counter)).toBe(session.getState(Counter));
      expect(session.useState(Counter, { count: 3 }, "other").peek("count")).toBe(3);
      expect(session.getState(Counter, "missing")).toBeUndefined();
    });

    it("should refuse two definitions with one name", async () => {
      const Clash = defineState("counter", { count: 0 });
      const { session } = await openTestSession((registry) => registry.page("/", counter));

      expect(() => session.useState(Clash)).toThrow(
        'State "counter" is already defined by another definition in this session',
      );
    });
  });

  // ===========================================================================
  // Routing
  // ===========================================================================

  describe("routing", () => {
    it("should render the not-found page for unknown paths", async () => {
      const { message, session } = await openTestSession((registry) => registry.page("/", counter), {
        path: "/nope",
      });

      expect(message).toMatchObject({ type: "resync", route: "/nope", title: "404 - Page Not Found" });
      expect(findNode(session.tree, "root/title0")?.text).toBe("404 - Page Not Found");
      expect(findNode(session.tree, "root/text1")?.text).toBe("Current page: /nope");
      expect(findNode(session.tree, "root/text2")?.text).toBe("Available pages: /");
    });

    it("should follow guard redirects", async () => {
      const { message } = await openTestSession(
        (registry) => {
          registry.page("/login", (ui) => ui.text("Sign in"));
          registry.page("/admin", (ui) => ui.text("Secret"), {
            guard: ({ useState }) => (useState(Auth).peek("user") ? true : "/login"),
          });
        },
        { path: "/admin" },
      );

      expect(message).toMatchObject({ type: "resync", version: 1, route: "/login" });
    });

    it("should stop redirect loops", async () => {
      const { message, session } = await openTestSession(
        (registry) => {
          registry.page("/a", (ui) => ui.text("a"), { guard: () => "/b" });
          registry.page("/b", (ui) => ui.text("b"), { guard: () => "/a" });
        },
        { path: "/a" },
      );

      expect(message).toEqual({
        type: "error",
        version: 0,
        error: {
          code: "BUILD_FAILED",
          message: "Too many redirects: /a -> /b -> /a -> /b -> /a -> /b -> /a",
        },
        transient: true,
      });
      expect(session.tree).toBeNull();
    });

    it("should let handlers navigate through the session scope", async () => {
      const { dispatch } = await openTestSession((registry) => {
        registry.page("/", (ui) => {
          ui.button("Go", { onClick: () => navigateTo("/next") });
        });
        registry.page("/next", (ui) => ui.text(`at ${currentSession().getCurrentPath()}`));
      });

      const message = await dispatch("root/button0", "click");

      expect(message).toMatchObject({ type: "resync", route: "/next" });
    });

    it("should refuse scope helpers outside a session", () => {
      expect(() => currentSession()).toThrow(ContextError);
    });
  });

  // ===========================================================================
  // Layouts
  // ===========================================================================

  describe("layouts", () => {
    it("should render the page where the layout asks for it", async () => {
      const { session } = await openTestSession((registry) => {
        registry.layout("main", (ui, renderPage) => {
          ui.header(() => ui.text("Brand"));
          ui.container(renderPage);
        });
        registry.page("/", (ui) => ui.text("Body"), { layout: "main" });
      });

      expect(findNode(session.tree, "root/header0/text0")?.text).toBe("Brand");
      expect(findNode(session.tree, "root/container0/text0")?.text).toBe("Body");
    });

    it("should fail when a layout renders the page twice", async () => {
      const { message } = await openTestSession((registry) => {
        registry.layout("twice", (_ui, renderPage) => {
          renderPage();
          renderPage();
        });
        registry.page("/", (ui) => ui.text("Body"), { layout: "twice" });
      });

      expect(message).toMatchObject({
        type: "error",
        error: { code: "BUILD_FAILED", message: 'Layout "twice" rendered the page twice' },
      });
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe("failures", () => {
    it("should keep the committed tree when a rebuild throws", async () => {
      const Flag = defineState("flag", { broken: false });
      const { session } = await openTestSession((registry) =>
        registry.page("/", (ui) => {
          if (ui.useState(Flag).get("broken")) {
            throw new Error("kaput");
          }
          ui.text("ok");
        }),
      );

      const result = await session.exclusive(() => {
        session.getState(Flag)?.set("broken", true);
        return session.render();
      });

      expect(result.message).toEqual({
        type: "error",
        version: 1,
        error: { code: "BUILD_FAILED", message: "Render of / failed: kaput" },
        transient: true,
      });
      expect(findNode(session.tree, "root/text0")?.text).toBe("ok");
    });

    it("should reject asynchronous pages", async () => {
      const { message } = await openTestSession((registry) =>
        registry.page("/", async (ui) => {
          ui.text("late");
        }),
      );

      expect(message).toMatchObject({
        type: "error",
        error: { message: "Page / returned a promise; render functions are synchronous" },
      });
    });

    it("should reject duplicate sibling keys", async () => {
      const { message } = await openTestSession((registry) =>
        registry.page("/", (ui) => {
          ui.text("one", { key: "k" });
          ui.text("two", { key: "k" });
        }),
      );

      expect(message).toMatchObject({ type: "error", error: { message: "Duplicate key 'k' under root" } });
    });
  });

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  describe("lifecycle", () => {
    it("should refuse work after destroy", async () => {
      const { session } = await openTestSession((registry) => registry.page("/", counter));

      session.destroy("leave");

      expect(session.isClosed).toBe(true);
      expect(session.tree).toBeNull();
      await expect(session.exclusive(() => session.resync())).rejects.toThrow(NotFoundError);
    });

    it("should track activity with the injected clock", async () => {
      let now = 1_000;
      const registry = new Registry().page("/", counter).freeze();
      const session = new RenderSession({ id: "s1", registry, now: () => now });

      now = 5_000;
      await session.exclusive(() => session.navigate("/"));

      expect(session.lastActivity).toBe(5_000);
    });
  });
});
