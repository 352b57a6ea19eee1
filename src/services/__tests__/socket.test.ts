import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { SocketService, sanitizeMetadata } from "../socket.js";

describe("sanitizeMetadata", () => {
  it("redacts secrets, shortens strings and flattens special objects", () => {
    const sanitized = sanitizeMetadata({
      password: "test-secret",
      nested: { apiKey: "test-key", ok: 1 },
      long: "a".repeat(250),
      when: new Date("2024-01-01T00:00:00.000Z"),
      err: new Error("bad"),
      fn: () => 1,
    });

    assert.deepEqual(sanitized, {
      password: "[Redacted]",
      nested: { apiKey: "[Redacted]", ok: 1 },
      long: "a".repeat(200) + "...",
      when: "2024-01-01T00:00:00.000Z",
      err: { name: "Error", message: "bad" },
    });
  });

  it("cuts deep nesting and cycles", () => {
    const cyclic: Record<string, unknown> = { name: "x" };
    cyclic.self = cyclic;

    assert.deepEqual(sanitizeMetadata({ a: { b: { c: { d: { e: 1 } } } } }), { a: { b: { c: { d: "[Too Deep]" } } } });
    assert.deepEqual(sanitizeMetadata(cyclic), { name: "x", self: "[Circular]" });
    assert.equal(sanitizeMetadata(undefined), undefined);
  });
});

describe("SocketService", () => {
  it("tracks sockets per session", () => {
    const service = new SocketService();
    service.track("s1", "socket-a");
    service.track("s1", "socket-b");
    service.track("s2", "socket-c");

    assert.equal(service.getConnectedSessionsCount(), 2);
    service.untrack("s1", "socket-a");
    assert.equal(service.isSessionConnected("s1"), true);
    service.untrack("s1", "socket-b");
    assert.equal(service.isSessionConnected("s1"), false);
    assert.equal(service.getConnectedSessionsCount(), 1);
  });

  it("ignores emits before initialization and closes cleanly", async () => {
    const service = new SocketService();
    service.track("s1", "socket-a");
    service.emitLog("s1", "Turn Started", "Processando sua mensagem");
    service.emitSnapshot({
      sessionId: "s1",
      cart: { items: [], total: 0, confirmed: false },
      profile: { name: null, address: null, payment: null },
      orderReady: false,
      messageCount: 0,
    });

    await service.close();
    assert.equal(service.getConnectedSessionsCount(), 0);
  });
});
