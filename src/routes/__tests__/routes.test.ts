import { after, describe, it } from "node:test";
import assert from "node:assert/strict";
import request from "supertest";
import { createApp } from "../../app.js";
import { createAppContext } from "../../context.js";
import type { AppContext } from "../../context.js";
import { loadConfig } from "../../config/env.js";
import { APOLOGIES, TimeoutError } from "../../utils/errors.js";
import { WELCOME_MESSAGE } from "../../orderFlow/prompts.js";
import { FakeQueryClient, ScriptedCompletion, quietLogger, reply, toolCalls } from "../../testing/fakes.js";
import type { CompletionDecision } from "../../types/index.js";

const contexts: AppContext[] = [];

function buildContext(decisions: Array<CompletionDecision | Error> = []): AppContext {
  const context = createAppContext(loadConfig({ NODE_ENV: "test" }), {
    logger: quietLogger(),
    queryClient: new FakeQueryClient(),
    completion: new ScriptedCompletion(decisions),
  });
  contexts.push(context);
  return context;
}

function buildApp(decisions: Array<CompletionDecision | Error> = []) {
  return createApp(buildContext(decisions));
}

after(async () => {
  await Promise.all(contexts.map((context) => context.close()));
});

describe("GET /health", () => {
  it("reports the service status", async () => {
    const response = await request(buildApp()).get("/health");

    assert.equal(response.status, 200);
    assert.equal(response.body.status, "ok");
    assert.equal(response.body.service, "pastel-order-agent");
    assert.equal(response.body.activeSessions, 0);
  });
});

describe("POST /chat", () => {
  it("requires a message", async () => {
    const response = await request(buildApp()).post("/chat").send({ sessionId: "s1" });

    assert.equal(response.status, 400);
    assert.deepEqual(response.body, {
      error: "Validation error",
      message: "Request body must include 'message' field (non-empty string).",
    });
  });

  it("requires a session id", async () => {
    const response = await request(buildApp()).post("/chat").send({ message: "oi" });

    assert.equal(response.status, 400);
    assert.deepEqual(response.body, {
      error: "Validation error",
      message:
        "Request body must include 'sessionId' field (non-empty string) - a unique identifier for this chat session.",
    });
  });

  it("rejects malformed JSON", async () => {
    const response = await request(buildApp())
      .post("/chat")
      .set("Content-Type", "application/json")
      .send('{"sessionId": ');

    assert.equal(response.status, 400);
    assert.equal(response.body.error, "Validation error");
  });

  it("runs a turn and returns the reply with the session snapshot", async () => {
    const app = buildApp([toolCalls(["add_to_cart", { item: "queijo", quantity: 2 }]), reply("Dois de queijo anotados!")]);

    const response = await request(app).post("/chat").send({ sessionId: "s1", message: "2 de queijo" });

    assert.equal(response.status, 200);
    assert.deepEqual(response.body, {
      reply: "Dois de queijo anotados!",
      failed: false,
      snapshot: {
        sessionId: "s1",
        cart: { items: [{ name: "Pastel de Queijo", quantity: 2, unitPrice: 7.5 }], total: 15, confirmed: false },
        profile: { name: null, address: null, payment: null },
        orderReady: false,
        messageCount: 4,
      },
    });
  });

  it("answers with an apology when the model times out", async () => {
    const app = buildApp([new TimeoutError("Model decision", 10)]);

    const response = await request(app).post("/chat").send({ sessionId: "s1", message: "oi" });

    assert.equal(response.status, 200);
    assert.equal(response.body.reply, APOLOGIES.UNREACHABLE);
    assert.equal(response.body.failed, true);
    assert.equal(response.body.snapshot.messageCount, 2);
  });
});

describe("session routes", () => {
  it("describes a session", async () => {
    const app = buildApp([reply("Olá!")]);
    await request(app).post("/chat").send({ sessionId: "s1", message: "oi" });

    const response = await request(app).get("/sessions/s1");

    assert.equal(response.status, 200);
    assert.equal(response.body.sessionId, "s1");
    assert.equal(response.body.messageCount, 2);
    assert.equal(response.body.welcome, WELCOME_MESSAGE);
    assert.deepEqual(
      { ...response.body.diagnostics, createdAt: undefined },
      { createdAt: undefined, hasName: false, hasAddress: false, hasPayment: false, cartItems: 0 }
    );
  });

  it("describes an unknown session without storing it", async () => {
    const context = buildContext();
    const app = createApp(context);

    const first = await request(app).get("/sessions/visitor-1");
    await request(app).get("/sessions/visitor-2");

    assert.equal(first.status, 200);
    assert.equal(first.body.sessionId, "visitor-1");
    assert.equal(first.body.messageCount, 0);
    assert.deepEqual(first.body.diagnostics, {
      createdAt: null,
      hasName: false,
      hasAddress: false,
      hasPayment: false,
      cartItems: 0,
    });
    assert.equal(context.sessions.size, 0);
  });

  it("resets a session", async () => {
    const app = buildApp([reply("Olá!")]);
    await request(app).post("/chat").send({ sessionId: "s1", message: "oi" });

    const response = await request(app).post("/sessions/s1/reset");

    assert.equal(response.status, 200);
    assert.deepEqual(response.body, {
      sessionId: "s1",
      cart: { items: [], total: 0, confirmed: false },
      profile: { name: null, address: null, payment: null },
      orderReady: false,
      messageCount: 0,
    });
  });
});

describe("unknown routes", () => {
  it("returns 404 with the route name", async () => {
    const response = await request(buildApp()).get("/nope");

    assert.equal(response.status, 404);
    assert.deepEqual(response.body, { error: "Not found", message: "Route GET /nope not found" });
  });
});
