/**
 * The closed set of tools the model may call, dispatched by name
 */

import type { OrderTool } from "../types/agent.js";
import menuTool from "./menu.js";
import addToCartTool from "./addToCart.js";
import removeFromCartTool from "./removeFromCart.js";
import viewCartTool from "./viewCart.js";
import clearCartTool from "./clearCart.js";
import setProfileFieldTool from "./setProfileField.js";
import confirmOrderTool from "./confirmOrder.js";

export const ORDER_TOOLS: readonly OrderTool[] = [
  menuTool,
  addToCartTool,
  removeFromCartTool,
  viewCartTool,
  clearCartTool,
  setProfileFieldTool,
  confirmOrderTool,
];

export class ToolRegistry {
  private tools = new Map<string, OrderTool>();

  constructor(tools: readonly OrderTool[] = ORDER_TOOLS) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): OrderTool | undefined {
    return this.tools.get(name);
  }

  list(): OrderTool[] {
    return Array.from(this.tools.values());
  }
}
