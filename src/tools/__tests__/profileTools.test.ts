import { describe, it } from "node:test";
import assert from "node:assert/strict";
import setProfileFieldTool from "../setProfileField.js";
import confirmOrderTool from "../confirmOrder.js";
import addToCartTool from "../addToCart.js";
import { ToolRegistry } from "../index.js";
import { makeSession, makeToolDeps } from "../../testing/fakes.js";

describe("set_profile_field", () => {
  it("records the name", async () => {
    const session = makeSession();
    const result = await setProfileFieldTool.execute(session, { field: "name", value: "Ana" }, makeToolDeps());

    assert.deepEqual(result, { status: "ok", message: "Registrei nome: Ana.", data: { field: "name", value: "Ana" } });
    assert.equal(session.profile.name, "Ana");
  });

  it("refuses the address before the cart has items", async () => {
    const session = makeSession();
    const result = await setProfileFieldTool.execute(
      session,
      { field: "address", value: "Rua das Flores, 10" },
      makeToolDeps()
    );

    assert.equal(result.status, "precondition_failed");
    assert.equal(result.message, "O endereço só pode ser registrado depois que houver itens no carrinho.");
    assert.equal(session.profile.address, null);
  });

  it("rejects unknown fields and blank values", async () => {
    const session = makeSession();
    const deps = makeToolDeps();

    const unknown = await setProfileFieldTool.execute(session, { field: "email", value: "ana@example.com" }, deps);
    const blank = await setProfileFieldTool.execute(session, { field: "payment", value: "  " }, deps);

    assert.equal(unknown.status, "invalid_arguments");
    assert.deepEqual(blank, {
      status: "invalid_arguments",
      message: "Preciso de um valor para forma de pagamento.",
      data: { field: "payment" },
    });
  });
});

describe("confirm_order", () => {
  it("lists what is still missing", async () => {
    const result = await confirmOrderTool.execute(makeSession(), {}, makeToolDeps());

    assert.deepEqual(result, {
      status: "precondition_failed",
      message: "Ainda falta: cart_items, name, address, payment.",
      data: { precondition: "order_complete", missing: ["cart_items", "name", "address", "payment"] },
    });
  });

  it("confirms a complete order until the cart changes", async () => {
    const session = makeSession();
    const deps = makeToolDeps();
    await addToCartTool.execute(session, { item: "queijo", quantity: 2 }, deps);
    await setProfileFieldTool.execute(session, { field: "name", value: "Ana" }, deps);
    await setProfileFieldTool.execute(session, { field: "address", value: "Rua das Flores, 10" }, deps);
    await setProfileFieldTool.execute(session, { field: "payment", value: "PIX" }, deps);

    const result = await confirmOrderTool.execute(session, {}, deps);

    assert.deepEqual(result, {
      status: "ok",
      message: "Pedido confirmado! Total R$15,00. Muito obrigado por escolher o Pastel do Mau!",
      data: { total: 15 },
    });
    assert.equal(session.cart.confirmed, true);

    await addToCartTool.execute(session, { item: "carne" }, deps);
    assert.equal(session.cart.confirmed, false);
  });
});

describe("ToolRegistry", () => {
  it("exposes the closed tool set by name", () => {
    const registry = new ToolRegistry();
    assert.deepEqual(
      registry.list().map((tool) => tool.name),
      ["menu", "add_to_cart", "remove_from_cart", "view_cart", "clear_cart", "set_profile_field", "confirm_order"]
    );
    assert.equal(registry.get("view_cart")?.name, "view_cart");
    assert.equal(registry.get("order_pizza"), undefined);
  });

  it("refuses duplicate names", () => {
    assert.throws(() => new ToolRegistry([confirmOrderTool, confirmOrderTool]), /Duplicate tool name: confirm_order/);
  });
});
