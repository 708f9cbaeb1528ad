import { Logger } from "yoguido-kernel";
import { Registry } from "../registry/registry";
import { RenderSession } from "./session";
import { InMemorySessionStore } from "./store";

beforeAll(() => {
  Logger.configure({ level: "silent" });
});

describe("InMemorySessionStore", () => {
  const registry = new Registry().page("/", (ui) => ui.text("hi")).freeze();

  function sessionAt(id: string, time: number): RenderSession {
    return new RenderSession({ id, registry, now: () => time });
  }

  it("should store sessions by id", () => {
    const store = new InMemorySessionStore();
    const session = sessionAt("s1", 0);

    store.set(session);

    expect(store.get("s1")).toBe(session);
    expect(store.has("s1")).toBe(true);
    expect(store.size).toBe(1);
    expect(store.delete("s1")).toBe(true);
    expect(store.delete("s1")).toBe(false);
  });

  it("should sweep idle sessions only", () => {
    const store = new InMemorySessionStore();
    const idle = sessionAt("idle", 0);
    const active = sessionAt("active", 9_000);
    store.set(idle);
    store.set(active);

    const swept = store.sweep(10_000, 5_000);

    expect(swept).toEqual(["idle"]);
    expect(idle.isClosed).toBe(true);
    expect(store.has("idle")).toBe(false);
    expect(store.has("active")).toBe(true);
  });

  it("should leave busy sessions alone", async () => {
    const store = new InMemorySessionStore();
    const session = sessionAt("busy", 0);
    store.set(session);

    let swept: string[] = [];
    await session.exclusive(() => {
      swept = store.sweep(10_000, 5_000);
    });

    expect(swept).toEqual([]);
    expect(session.isClosed).toBe(false);
  });
});
