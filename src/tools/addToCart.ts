import { z } from "genkit";
import { defineOrderTool } from "./defineOrderTool.js";
import { loadMenuPrices } from "../database/menuQueries.js";
import type { MenuPrice } from "../database/menuQueries.js";
import { addToCart, lineSubtotal } from "../services/cart.js";
import { extractQuantityPrefix, findBestMatch, formatCurrency } from "../orderFlow/utils.js";
import { QueryError, errorMessage } from "../utils/errors.js";

/**
 * An explicit quantity wins unless it is the default 1 and the item text carries a larger count.
 * Anything below 1 becomes 1.
 */
export function resolveQuantity(explicit: number | undefined, parsed: number | null): number {
  let quantity = explicit ?? parsed ?? 1;
  if (quantity <= 1 && parsed !== null && parsed > 1) {
    quantity = parsed;
  }
  return quantity > 0 ? quantity : 1;
}

const addToCartTool = defineOrderTool(
  {
    name: "add_to_cart",
    description: "Add a pastel to the cart after confirming the flavor and quantity.",
    inputSchema: z.object({
      item: z.string().min(1).describe("Pastel name or flavor, e.g. 'Pastel de Queijo'"),
      quantity: z.coerce.number().int().optional().describe("How many to add (defaults to 1)"),
    }),
  },
  async (session, { item, quantity }, { queryClient, logger }) => {
    const hint = extractQuantityPrefix(item);
    const finalQuantity = resolveQuantity(quantity, hint.quantity);

    let menu: MenuPrice[];
    try {
      menu = await loadMenuPrices(queryClient, logger);
    } catch (error) {
      if (!(error instanceof QueryError)) throw error;
      logger.warn("Menu unavailable for add to cart", { sessionId: session.id, error: errorMessage(error) });
      return { status: "error", message: "Não consegui consultar o cardápio agora." };
    }

    const entry = findBestMatch(hint.item || item, menu, (candidate) => candidate.name);
    if (!entry) {
      logger.debug("Menu lookup had no confident match", { sessionId: session.id, item });
      return { status: "not_found", message: "Não encontrei esse sabor no cardápio." };
    }

    const alreadyInCart = session.cart.items.length;
    const line = addToCart(session.cart, entry, finalQuantity);
    const merged = session.cart.items.length === alreadyInCart;
    const subtotal = formatCurrency(lineSubtotal(line));

    logger.debug(merged ? "Updated cart item" : "Added new cart item", {
      sessionId: session.id,
      item: line.name,
      quantity: line.quantity,
    });

    return {
      status: "ok",
      message: merged
        ? `Atualizei o carrinho: agora são ${line.quantity}× ${line.name} (subtotal ${subtotal}).`
        : `Adicionei ${finalQuantity}× ${line.name} ao carrinho (subtotal ${subtotal}).`,
      data: { item: { ...line } },
    };
  }
);

export default addToCartTool;
