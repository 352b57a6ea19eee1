import { z } from "genkit";
import { defineOrderTool } from "./defineOrderTool.js";
import { getCartSnapshot, lineSubtotal } from "../services/cart.js";
import { formatCurrency } from "../orderFlow/utils.js";

const viewCartTool = defineOrderTool(
  {
    name: "view_cart",
    description: "Show the cart items and the running total.",
    inputSchema: z.object({}),
  },
  (session) => {
    const snapshot = getCartSnapshot(session.cart);
    if (snapshot.items.length === 0) {
      return { status: "ok", message: "O carrinho está vazio.", data: snapshot };
    }

    const lines = snapshot.items.map(
      (item) =>
        `${item.quantity}× ${item.name} — ${formatCurrency(item.unitPrice)} cada (subtotal ${formatCurrency(lineSubtotal(item))})`
    );
    return {
      status: "ok",
      message: ["Itens no carrinho:", ...lines, `Total: ${formatCurrency(snapshot.total)}`].join("\n"),
      data: snapshot,
    };
  }
);

export default viewCartTool;
