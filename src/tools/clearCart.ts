import { z } from "genkit";
import { defineOrderTool } from "./defineOrderTool.js";
import { clearCart } from "../services/cart.js";

const clearCartTool = defineOrderTool(
  {
    name: "clear_cart",
    description: "Empty the cart when the customer wants to start over.",
    inputSchema: z.object({}),
  },
  (session) => {
    clearCart(session.cart);
    return { status: "ok", message: "Esvaziei o carrinho. Pode recomeçar o pedido!" };
  }
);

export default clearCartTool;
