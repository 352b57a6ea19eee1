import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { OrderAgent } from "../index.js";
import { ToolRouter } from "../toolRouter.js";
import { MAX_ROUNDS_FALLBACK } from "../prompts.js";
import { SessionRegistry } from "../../services/sessionRegistry.js";
import { ToolRegistry } from "../../tools/index.js";
import { APOLOGIES, CompletionError, TimeoutError } from "../../utils/errors.js";
import { createLogger, LogLevel } from "../../utils/logger.js";
import { FakeQueryClient, ScriptedCompletion, reply, toolCalls } from "../../testing/fakes.js";
import type { CompletionDecision, LogEmitter } from "../../types/index.js";

class StepRecorder implements LogEmitter {
  readonly steps: string[] = [];

  emitLog(_sessionId: string, step: string): void {
    this.steps.push(step);
  }
}

function buildAgent(
  decisions: Array<CompletionDecision | Error>,
  { texts = [], maxToolRounds = 5 }: { texts?: Array<string | Error>; maxToolRounds?: number } = {}
) {
  const recorder = new StepRecorder();
  const logger = createLogger(LogLevel.ERROR, recorder);
  const sessions = new SessionRegistry();
  const completion = new ScriptedCompletion(decisions, texts);
  const tools = new ToolRegistry();
  const router = new ToolRouter(tools, {
    queryClient: new FakeQueryClient(),
    completion,
    logger,
    schemaDescription: async () => "Node types:\n- Pastel { name, price }",
  });
  const agent = new OrderAgent({ sessions, tools, router, completion, logger }, { maxToolRounds, historyWindow: 40 });
  return { agent, sessions, completion, recorder };
}

describe("OrderAgent", () => {
  it("answers directly when the model needs no tools", async () => {
    const { agent, completion, recorder } = buildAgent([reply("Olá! Qual o seu nome?")]);

    const result = await agent.handleTurn({ sessionId: "s1", message: "oi" });

    assert.equal(result.reply, "Olá! Qual o seu nome?");
    assert.equal(result.failed, false);
    assert.equal(result.forced, false);
    assert.deepEqual(result.toolCalls, []);
    assert.equal(result.snapshot.messageCount, 2);
    assert.equal(completion.requests[0]?.tools.length, 7);
    assert.deepEqual(
      completion.requests[0]?.history.map((message) => message.content),
      ["oi"]
    );
    assert.deepEqual(recorder.steps, ["Turn Started", "Model Deciding", "Responding", "Turn Completed"]);
  });

  it("executes tool calls in request order before replying", async () => {
    const { agent, sessions, completion, recorder } = buildAgent([
      toolCalls(["add_to_cart", { item: "queijo", quantity: 2 }], ["set_profile_field", { field: "name", value: "Ana" }]),
      reply("Anotado, Ana! Dois pastéis de queijo."),
    ]);

    const result = await agent.handleTurn({ sessionId: "s1", message: "Sou a Ana, quero 2 de queijo" });
    const session = sessions.getOrCreate("s1");

    assert.equal(result.reply, "Anotado, Ana! Dois pastéis de queijo.");
    assert.deepEqual(
      result.toolCalls.map((call) => [call.name, call.result.status]),
      [
        ["add_to_cart", "ok"],
        ["set_profile_field", "ok"],
      ]
    );
    assert.deepEqual(result.snapshot.cart.items, [{ name: "Pastel de Queijo", quantity: 2, unitPrice: 7.5 }]);
    assert.equal(result.snapshot.cart.total, 15);
    assert.equal(result.snapshot.profile.name, "Ana");
    assert.deepEqual(
      session.history.map((message) => message.role),
      ["user", "assistant", "tool", "tool", "assistant"]
    );
    assert.equal(completion.requests[1]?.history.length, 4);
    assert.ok(completion.requests[1]?.system.includes("- customer_name: Ana"));
    assert.deepEqual(recorder.steps, [
      "Turn Started",
      "Model Deciding",
      "Tool Executing",
      "Tool Executing",
      "Model Deciding",
      "Responding",
      "Turn Completed",
    ]);
  });

  it("stores tool results as JSON tied to their call ids", async () => {
    const { agent, sessions } = buildAgent([toolCalls(["view_cart", {}]), reply("Seu carrinho está vazio.")]);

    await agent.handleTurn({ sessionId: "s1", message: "o que tem no carrinho?" });
    const toolMessage = sessions.getOrCreate("s1").history[2];

    assert.ok(toolMessage && toolMessage.role === "tool");
    assert.equal(toolMessage.toolCallId, "call-1");
    assert.equal(toolMessage.name, "view_cart");
    assert.deepEqual(JSON.parse(toolMessage.content), {
      status: "ok",
      message: "O carrinho está vazio.",
      data: { items: [], total: 0, confirmed: false },
    });
  });

  it("reports unknown tools back to the model", async () => {
    const { agent } = buildAgent([toolCalls(["order_pizza", {}]), reply("Só trabalhamos com pastéis!")]);

    const result = await agent.handleTurn({ sessionId: "s1", message: "quero uma pizza" });

    assert.equal(result.reply, "Só trabalhamos com pastéis!");
    assert.equal(result.toolCalls[0]?.result.status, "error");
    assert.equal(result.toolCalls[0]?.result.message, "Ferramenta desconhecida: order_pizza.");
  });

  it("forces a reply once the tool round bound is reached", async () => {
    const { agent, completion } = buildAgent(
      [toolCalls(["view_cart", {}]), toolCalls(["view_cart", {}]), toolCalls(["view_cart", {}]), reply("Seu carrinho está vazio.")],
      { maxToolRounds: 2 }
    );

    const result = await agent.handleTurn({ sessionId: "s1", message: "carrinho?" });

    assert.equal(result.reply, "Seu carrinho está vazio.");
    assert.equal(result.forced, true);
    assert.equal(result.failed, false);
    assert.equal(result.toolCalls.length, 2);
    assert.equal(completion.requests.length, 4);
    assert.equal(completion.requests[3]?.tools.length, 0);
    assert.equal(completion.requests[3]?.temperature, 0.3);
    assert.equal(completion.requests[0]?.temperature, undefined);
  });

  it("falls back to a fixed reply when the forced decision still asks for tools", async () => {
    const { agent } = buildAgent(
      [toolCalls(["view_cart", {}]), toolCalls(["view_cart", {}]), toolCalls(["view_cart", {}])],
      { maxToolRounds: 1 }
    );

    const result = await agent.handleTurn({ sessionId: "s1", message: "carrinho?" });

    assert.equal(result.reply, MAX_ROUNDS_FALLBACK);
    assert.equal(result.forced, true);
    assert.equal(result.toolCalls.length, 1);
  });

  it("keeps the gathered tool results when the forced decision fails", async () => {
    const { agent, sessions } = buildAgent(
      [toolCalls(["view_cart", {}]), toolCalls(["view_cart", {}]), new CompletionError("malformed")],
      { maxToolRounds: 1 }
    );

    const result = await agent.handleTurn({ sessionId: "s1", message: "carrinho?" });

    assert.equal(result.reply, MAX_ROUNDS_FALLBACK);
    assert.equal(result.forced, true);
    assert.equal(result.failed, false);
    assert.equal(result.toolCalls.length, 1);
    assert.equal(result.toolCalls[0]?.name, "view_cart");
    const history = sessions.get("s1")?.history ?? [];
    assert.deepEqual(
      history.map((message) => message.role),
      ["user", "assistant", "tool", "assistant"]
    );
    assert.equal(history[3]?.content, MAX_ROUNDS_FALLBACK);
  });

  it("apologises on a model timeout and keeps earlier turns intact", async () => {
    const { agent, sessions, recorder } = buildAgent([
      toolCalls(["add_to_cart", { item: "queijo", quantity: 2 }]),
      reply("Anotado!"),
      new TimeoutError("Model decision", 10),
    ]);

    await agent.handleTurn({ sessionId: "s1", message: "2 de queijo" });
    const before = sessions.snapshot("s1");
    recorder.steps.length = 0;

    const result = await agent.handleTurn({ sessionId: "s1", message: "e mais um de carne" });
    const session = sessions.getOrCreate("s1");

    assert.equal(result.reply, APOLOGIES.UNREACHABLE);
    assert.equal(result.failed, true);
    assert.deepEqual(result.snapshot.cart, before.cart);
    assert.deepEqual(result.snapshot.profile, before.profile);
    assert.deepEqual(
      session.history.map((message) => message.content),
      ["2 de queijo", "", session.history[2]?.content, "Anotado!", "e mais um de carne", APOLOGIES.UNREACHABLE]
    );
    assert.deepEqual(recorder.steps, ["Turn Started", "Model Deciding", "Turn Failed"]);
  });

  it("rolls back partial tool rounds when a tool fails", async () => {
    const { agent, sessions } = buildAgent([toolCalls(["menu", { question: "sabores doces" }])], {
      texts: [new CompletionError("model down")],
    });

    const result = await agent.handleTurn({ sessionId: "s1", message: "quais os doces?" });

    assert.equal(result.failed, true);
    assert.equal(result.reply, APOLOGIES.GENERIC);
    assert.deepEqual(
      sessions.getOrCreate("s1").history.map((message) => [message.role, message.content]),
      [
        ["user", "quais os doces?"],
        ["assistant", APOLOGIES.GENERIC],
      ]
    );
  });

  it("serialises turns for the same session", async () => {
    const { agent, completion } = buildAgent([reply("Primeira"), reply("Segunda")]);

    const [first, second] = await Promise.all([
      agent.handleTurn({ sessionId: "s1", message: "um" }),
      agent.handleTurn({ sessionId: "s1", message: "dois" }),
    ]);

    assert.equal(first.reply, "Primeira");
    assert.equal(second.reply, "Segunda");
    assert.deepEqual(
      completion.requests[1]?.history.map((message) => message.content),
      ["um", "Primeira", "dois"]
    );
  });

  it("resets a session to an empty cart, profile and history", async () => {
    const { agent, sessions } = buildAgent([toolCalls(["add_to_cart", { item: "carne" }]), reply("Feito!")]);
    await agent.handleTurn({ sessionId: "s1", message: "um de carne" });

    await agent.resetSession("s1");

    assert.deepEqual(sessions.snapshot("s1"), {
      sessionId: "s1",
      cart: { items: [], total: 0, confirmed: false },
      profile: { name: null, address: null, payment: null },
      orderReady: false,
      messageCount: 0,
    });
  });
});
