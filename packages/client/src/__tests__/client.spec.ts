// @vitest-environment jsdom
/**
 * Tests for YoGuidoClient
 *
 * The HTTP side runs against a routed fetch stub and pushed messages come
 * from an in-memory transport.
 */

import {
  DiffInvariantViolation,
  TransportError,
  type ClientEvent,
  type PatchMessage,
  type ResyncMessage,
  type ServerMessage,
} from "yoguido-shared";
import { YoGuidoClient, type YoGuidoClientCallbacks } from "../client";
import { HttpClient } from "../core/http";
import type { PushTransport, StreamListener } from "../core/transport";
import { NoticeBanner } from "../dom/banner";
import { snapshot } from "./helpers";

class MemoryTransport implements PushTransport {
  listener: StreamListener | null = null;
  opened = 0;

  open(listener: StreamListener): () => void {
    this.listener = listener;
    this.opened++;
    return () => {
      this.listener = null;
    };
  }

  push(data: unknown): void {
    this.listener?.frame(data);
  }
}

function counterTree(count: number) {
  return snapshot("root", "page", {
    children: [
      snapshot("root/text0", "text", { text: `Count: ${count}` }),
      snapshot("root/button0", "button", { text: "Add", events: ["click"] }),
    ],
  });
}

function resync(version: number, count: number, route = "/", title = "Counter"): ResyncMessage {
  return { type: "resync", version, route, title, fullTree: counterTree(count) };
}

function bump(version: number, count: number): PatchMessage {
  return { type: "patch", version, ops: [{ op: "updateText", id: "root/text0", text: `Count: ${count}` }] };
}

function reply(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function setup(options: { bootstrap?: ServerMessage; callbacks?: YoGuidoClientCallbacks } = {}) {
  const routes = new Map<string, (body: unknown) => Response>();
  const fetch = vi.fn(async (input: unknown, init?: RequestInit) => {
    const handler = routes.get(String(input).slice("/_yg/".length));
    if (!handler) throw new TypeError("fetch failed");
    return handler(JSON.parse(String(init?.body)));
  });
  const root = document.body.appendChild(document.createElement("div"));
  const banner = new NoticeBanner(document.body.appendChild(document.createElement("div")), { autoHideMs: 0 });
  const transport = new MemoryTransport();
  const client = new YoGuidoClient({
    root,
    bootstrap: {
      session: "s1",
      basePath: "/_yg",
      appTitle: "Test",
      stream: true,
      message: options.bootstrap ?? resync(1, 0),
    },
    http: new HttpClient({ basePath: "/_yg", fetch }),
    transport,
    banner,
    callbacks: options.callbacks,
  });
  const text = () => root.querySelector('[data-yg-id="root/text0"]')?.textContent;
  const button = () => root.querySelector('[data-yg-id="root/button0"]');
  return { client, root, routes, fetch, transport, banner, text, button };
}

describe("YoGuidoClient", () => {
  let client: YoGuidoClient | undefined;

  afterEach(() => {
    client?.dispose();
    client = undefined;
    window.history.replaceState(null, "", "/");
    document.title = "";
    document.body.replaceChildren();
  });

  describe("start", () => {
    it("should mount the bootstrap tree", async () => {
      const env = setup();
      client = env.client;

      await env.client.start();

      expect(env.text()).toBe("Count: 0");
      expect(env.client.version).toBe(1);
      expect(env.client.route).toBe("/");
      expect(document.title).toBe("Counter | Test");
      expect(env.transport.opened).toBe(1);
      expect(env.transport.listener).not.toBeNull();
    });
  });

  describe("events", () => {
    it("should send clicks and apply the reply", async () => {
      const env = setup();
      client = env.client;
      const events: unknown[] = [];
      env.routes.set("event", (body) => {
        events.push(body);
        return reply(bump(2, 1));
      });
      await env.client.start();

      env.button()?.dispatchEvent(new MouseEvent("click", { bubbles: true }));
      await env.client.idle();

      const expected: ClientEvent = { session: "s1", node: "root/button0", event: "click" };
      expect(events).toEqual([expected]);
      expect(env.text()).toBe("Count: 1");
      expect(env.client.version).toBe(2);
    });

    it("should show notices that come with a patch", async () => {
      const env = setup();
      client = env.client;
      env.routes.set("event", () =>
        reply({ ...bump(2, 0), notice: { code: "HANDLER_FAILED", message: "Save failed" } }),
      );
      await env.client.start();

      await env.client.sendEvent("root/button0", "click");

      expect(env.banner.code).toBe("HANDLER_FAILED");
      expect(env.client.version).toBe(2);
    });

    it("should show transport failures in the banner", async () => {
      const onError = vi.fn();
      const env = setup({ callbacks: { onError } });
      client = env.client;
      await env.client.start();

      await env.client.sendEvent("root/button0", "click");

      expect(onError).toHaveBeenCalledTimes(1);
      expect(env.banner.code).toBe("TRANSPORT_CONNECTION");
      expect(env.text()).toBe("Count: 0");
    });
  });

  describe("pushed messages", () => {
    it("should apply the next patch", async () => {
      const env = setup();
      client = env.client;
      await env.client.start();

      env.transport.push(bump(2, 5));
      await env.client.idle();

      expect(env.text()).toBe("Count: 5");
    });

    it("should ignore patches it has already seen", async () => {
      const env = setup();
      client = env.client;
      await env.client.start();

      env.transport.push(bump(1, 9));
      await env.client.idle();

      expect(env.text()).toBe("Count: 0");
      expect(env.fetch).not.toHaveBeenCalled();
    });

    it("should resync after a version gap", async () => {
      const env = setup();
      client = env.client;
      env.routes.set("resync", () => reply(resync(3, 3)));
      await env.client.start();

      env.transport.push(bump(3, 3));
      await env.client.idle();

      expect(env.fetch).toHaveBeenCalledWith("/_yg/resync", expect.objectContaining({ method: "POST" }));
      expect(env.text()).toBe("Count: 3");
      expect(env.client.version).toBe(3);
    });

    it("should resync when a patch does not fit the tree", async () => {
      const onError = vi.fn();
      const env = setup({ callbacks: { onError } });
      client = env.client;
      env.routes.set("resync", () => reply(resync(2, 2)));
      await env.client.start();

      env.transport.push({ type: "patch", version: 2, ops: [{ op: "remove", id: "root/ghost" }] });
      await env.client.idle();

      expect(onError).toHaveBeenCalledWith(expect.any(DiffInvariantViolation));
      expect(env.text()).toBe("Count: 2");
      expect(env.client.version).toBe(2);
    });

    it("should show error messages and keep the page", async () => {
      const env = setup();
      client = env.client;
      await env.client.start();

      env.transport.push({
        type: "error",
        version: 1,
        error: { code: "HANDLER_TIMEOUT", message: "Too slow" },
        transient: true,
      });
      await env.client.idle();

      expect(env.banner.code).toBe("HANDLER_TIMEOUT");
      expect(env.text()).toBe("Count: 0");
    });

    it("should ignore a resync older than the shown version", async () => {
      const env = setup();
      client = env.client;
      await env.client.start();

      env.transport.push(bump(2, 5));
      env.transport.push(bump(3, 6));
      env.transport.push(resync(2, 5));
      await env.client.idle();

      expect(env.client.version).toBe(3);
      expect(env.text()).toBe("Count: 6");
      expect(env.client.tree?.children[0]?.text).toBe("Count: 6");
    });

    it("should mount a resync of the shown version", async () => {
      const env = setup();
      client = env.client;
      env.routes.set("resync", () => reply(resync(1, 4)));
      await env.client.start();

      await env.client.resync();

      expect(env.client.version).toBe(1);
      expect(env.text()).toBe("Count: 4");
    });

    it("should resync when the stream comes back", async () => {
      const env = setup();
      client = env.client;
      env.routes.set("resync", () => reply(resync(4, 4)));
      await env.client.start();

      env.transport.listener?.resumed();
      await env.client.idle();

      expect(env.fetch).toHaveBeenCalledWith("/_yg/resync", expect.objectContaining({ method: "POST" }));
      expect(env.client.version).toBe(4);
      expect(env.text()).toBe("Count: 4");
    });

    it("should show a stream that gave up in the banner", async () => {
      const onError = vi.fn();
      const env = setup({ callbacks: { onError } });
      client = env.client;
      await env.client.start();
      const error = TransportError.connection("Event stream lost after 3 retries", "/_yg/stream?session=s1");

      env.transport.listener?.error(error);

      expect(onError).toHaveBeenCalledWith(error);
      expect(env.banner.code).toBe("TRANSPORT_CONNECTION");
    });

    it("should report unreadable frames without the banner", async () => {
      const onError = vi.fn();
      const env = setup({ callbacks: { onError } });
      client = env.client;
      await env.client.start();

      env.transport.listener?.error(new TransportError("parse", "Malformed stream frame"));

      expect(onError).toHaveBeenCalledTimes(1);
      expect(env.banner.code).toBeUndefined();
    });

    it("should expire when the stream says so", async () => {
      const onExpired = vi.fn();
      const env = setup({ callbacks: { onExpired } });
      client = env.client;
      await env.client.start();

      env.transport.push({ type: "expired", session: "s1" });
      await env.client.idle();

      expect(onExpired).toHaveBeenCalledTimes(1);
      expect(env.client.isExpired).toBe(true);
      expect(env.banner.code).toBe("NOT_FOUND_SESSION");
      expect(env.transport.listener).toBeNull();
    });

    it("should ignore other stream control frames", async () => {
      const onMessage = vi.fn();
      const env = setup({ callbacks: { onMessage } });
      client = env.client;
      await env.client.start();
      onMessage.mockClear();

      env.transport.push({ type: "connected", session: "s1" });
      await env.client.idle();

      expect(onMessage).not.toHaveBeenCalled();
    });
  });

  describe("navigation", () => {
    it("should load the new page and push a history entry", async () => {
      const env = setup();
      client = env.client;
      env.routes.set("navigate", () => reply(resync(2, 0, "/about", "About")));
      await env.client.start();

      await env.client.navigate("/about");

      expect(window.location.pathname).toBe("/about");
      expect(document.title).toBe("About | Test");
      expect(env.client.route).toBe("/about");
    });

    it("should follow the back button", async () => {
      const env = setup();
      client = env.client;
      const requests: unknown[] = [];
      env.routes.set("navigate", (body) => {
        requests.push(body);
        return reply(resync(2, 0, "/about", "About"));
      });
      await env.client.start();
      window.history.pushState(null, "", "/about");

      window.dispatchEvent(new PopStateEvent("popstate"));
      await env.client.idle();

      expect(requests).toEqual([{ session: "s1", path: "/about" }]);
      expect(env.client.route).toBe("/about");
    });
  });

  describe("session expiry", () => {
    it("should stop and report when the server forgot the session", async () => {
      const onExpired = vi.fn();
      const env = setup({ callbacks: { onExpired } });
      client = env.client;
      env.routes.set("event", () =>
        reply({ error: { code: "NOT_FOUND_SESSION", message: "Session not found: s1" } }, 404),
      );
      await env.client.start();

      await env.client.sendEvent("root/button0", "click");
      await env.client.sendEvent("root/button0", "click");

      expect(onExpired).toHaveBeenCalledTimes(1);
      expect(env.client.isExpired).toBe(true);
      expect(env.banner.code).toBe("NOT_FOUND_SESSION");
      expect(env.transport.listener).toBeNull();
      expect(env.fetch).toHaveBeenCalledTimes(1);
    });
  });

  describe("dispose", () => {
    it("should stop listening to the page and the transport", async () => {
      const env = setup();
      client = env.client;
      await env.client.start();

      env.client.dispose();
      env.button()?.dispatchEvent(new MouseEvent("click", { bubbles: true }));
      await env.client.idle();

      expect(env.fetch).not.toHaveBeenCalled();
      expect(env.transport.listener).toBeNull();
    });
  });
});
