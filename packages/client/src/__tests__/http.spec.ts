/**
 * Tests for HttpClient
 */

import { TransportError, type ServerMessage } from "yoguido-shared";
import { HttpClient, ServerReplyError } from "../core/http";

function reply(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function clientFor(respond: (input: unknown, init?: RequestInit) => Promise<Response>, requestTimeout?: number) {
  const fetch = vi.fn(respond);
  return { fetch, http: new HttpClient({ basePath: "/_yg", fetch, requestTimeout }) };
}

const patch: ServerMessage = {
  type: "patch",
  version: 2,
  ops: [{ op: "updateText", id: "root/text0", text: "Count: 1" }],
};

describe("HttpClient", () => {
  it("should post events as JSON and return the reply", async () => {
    const { fetch, http } = clientFor(async () => reply(patch));

    const message = await http.event({ session: "s1", node: "root/button0", event: "click" });

    expect(message).toEqual(patch);
    expect(fetch).toHaveBeenCalledWith(
      "/_yg/event",
      expect.objectContaining({
        method: "POST",
        body: JSON.stringify({ session: "s1", node: "root/button0", event: "click" }),
      }),
    );
  });

  it("should post navigation and resync requests to their routes", async () => {
    const { fetch, http } = clientFor(async () => reply(patch));

    await http.navigate({ session: "s1", path: "/about" });
    await http.resync("s1");

    expect(fetch.mock.calls.map(([url]) => url)).toEqual(["/_yg/navigate", "/_yg/resync"]);
  });

  it("should reject replies that are not server messages", async () => {
    const { http } = clientFor(async () => reply({ ok: true }));

    const error = await http.resync("s1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: "TRANSPORT_PARSE", transportCode: "parse" });
  });

  it("should carry the server's error code", async () => {
    const { http } = clientFor(async () =>
      reply({ error: { code: "NOT_FOUND_SESSION", message: "Session not found: s1" } }, 404),
    );

    const error = await http.resync("s1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerReplyError);
    expect(error).toMatchObject({
      serverCode: "NOT_FOUND_SESSION",
      statusCode: 404,
      message: "Session not found: s1",
      sessionExpired: true,
    });
  });

  it("should not treat other 404s as an expired session", async () => {
    const { http } = clientFor(async () => reply({ error: { code: "NOT_FOUND_RESOURCE", message: "nope" } }, 404));

    const error = await http.resync("s1").catch((e: unknown) => e);

    expect(error).toMatchObject({ serverCode: "NOT_FOUND_RESOURCE", sessionExpired: false });
  });

  it("should drop unknown server codes", async () => {
    const { http } = clientFor(async () => reply({ error: { code: "TEAPOT", message: "short and stout" } }, 418));

    const error = await http.resync("s1").catch((e: unknown) => e);

    expect(error).toMatchObject({ serverCode: undefined, statusCode: 418, message: "short and stout" });
  });

  it("should wrap network failures", async () => {
    const { http } = clientFor(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await http.resync("s1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ transportCode: "connection", message: "Request to /_yg/resync failed" });
  });

  it("should time out slow requests", async () => {
    const { http } = clientFor(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const abort = new Error("aborted");
            abort.name = "AbortError";
            reject(abort);
          });
        }),
      10,
    );

    const error = await http.resync("s1").catch((e: unknown) => e);

    expect(error).toMatchObject({ transportCode: "timeout", message: "Request timed out after 10ms" });
  });

  it("should send leave requests with keepalive", async () => {
    const { fetch, http } = clientFor(async () => reply({ left: true }));

    await http.leave("s1");

    expect(fetch).toHaveBeenCalledWith("/_yg/leave", expect.objectContaining({ keepalive: true }));
  });

  it("should build the stream URL for a session", () => {
    const { http } = clientFor(async () => reply(patch));

    expect(http.streamUrl("a b")).toBe("/_yg/stream?session=a%20b");
  });
});
