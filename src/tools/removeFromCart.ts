import { z } from "genkit";
import { defineOrderTool } from "./defineOrderTool.js";
import { lineSubtotal, removeFromCart } from "../services/cart.js";
import { extractQuantityPrefix, findBestMatch, formatCurrency } from "../orderFlow/utils.js";

const removeFromCartTool = defineOrderTool(
  {
    name: "remove_from_cart",
    description: "Remove a pastel from the cart, or reduce its quantity when a quantity is given.",
    inputSchema: z.object({
      item: z.string().min(1).describe("Pastel name or flavor already in the cart"),
      quantity: z.number().int().positive().optional().describe("How many to remove; omit to remove the whole line"),
    }),
  },
  (session, { item, quantity }, { logger }) => {
    if (session.cart.items.length === 0) {
      return {
        status: "precondition_failed",
        message: "O carrinho já está vazio.",
        data: { precondition: "cart_not_empty" },
      };
    }

    const hint = extractQuantityPrefix(item);
    const line = findBestMatch(hint.item || item, session.cart.items, (candidate) => candidate.name);
    if (!line) {
      return { status: "not_found", message: "Esse sabor não está no carrinho." };
    }

    const remaining = removeFromCart(session.cart, line, quantity ?? hint.quantity);
    logger.debug("Cart item removed", { sessionId: session.id, item: line.name, remaining });

    if (remaining === 0) {
      return { status: "ok", message: `Removi ${line.name} do carrinho.`, data: { item: line.name, quantity: 0 } };
    }

    return {
      status: "ok",
      message: `Atualizei ${line.name} para ${remaining}× (subtotal ${formatCurrency(lineSubtotal(line))}).`,
      data: { item: line.name, quantity: remaining },
    };
  }
);

export default removeFromCartTool;
