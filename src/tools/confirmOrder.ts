import { z } from "genkit";
import { defineOrderTool } from "./defineOrderTool.js";
import { cartTotal } from "../services/cart.js";
import { missingProfileFields } from "../services/profile.js";
import { formatCurrency } from "../orderFlow/utils.js";

const confirmOrderTool = defineOrderTool(
  {
    name: "confirm_order",
    description:
      "Confirm the order after the customer explicitly approves the summary. Requires cart items, name, address and payment method.",
    inputSchema: z.object({}),
  },
  (session, _input, { logger }) => {
    const { cart, profile } = session;
    const missing: string[] = missingProfileFields(profile);
    if (cart.items.length === 0) {
      missing.unshift("cart_items");
    }

    if (missing.length > 0) {
      return {
        status: "precondition_failed",
        message: `Ainda falta: ${missing.join(", ")}.`,
        data: { precondition: "order_complete", missing },
      };
    }

    cart.confirmed = true;
    logger.info("Order confirmed", { sessionId: session.id, total: cartTotal(cart), items: cart.items.length });

    return {
      status: "ok",
      message: `Pedido confirmado! Total ${formatCurrency(cartTotal(cart))}. Muito obrigado por escolher o Pastel do Mau!`,
      data: { total: cartTotal(cart) },
    };
  }
);

export default confirmOrderTool;
