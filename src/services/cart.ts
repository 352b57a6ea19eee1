/**
 * Cart state operations. The total is always derived from the items.
 */

import type { Cart, CartItem, CartSnapshot } from "../types/session.js";
import { normalizeText, toCents } from "../orderFlow/utils.js";

export function createCart(): Cart {
  return { items: [], confirmed: false };
}

export function cartTotal(cart: Cart): number {
  const cents = cart.items.reduce((sum, item) => sum + toCents(item.unitPrice) * item.quantity, 0);
  return cents / 100;
}

export function lineSubtotal(item: CartItem): number {
  return (toCents(item.unitPrice) * item.quantity) / 100;
}

export function findCartItem(cart: Cart, name: string): CartItem | undefined {
  const target = normalizeText(name);
  return cart.items.find((item) => normalizeText(item.name) === target);
}

/**
 * Add a resolved menu entry; an item already in the cart gets its quantity increased
 */
export function addToCart(cart: Cart, entry: { name: string; price: number }, quantity: number): CartItem {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new RangeError(`Cart quantity must be a positive integer, got ${quantity}`);
  }

  cart.confirmed = false;

  const existing = findCartItem(cart, entry.name);
  if (existing) {
    existing.quantity += quantity;
    return existing;
  }

  const item: CartItem = {
    name: entry.name,
    quantity,
    unitPrice: entry.price,
  };
  cart.items.push(item);
  return item;
}

/**
 * Decrease an item by `quantity`, or drop it when quantity is null or covers the whole line.
 * Returns the remaining quantity (0 when the line was removed).
 */
export function removeFromCart(cart: Cart, item: CartItem, quantity: number | null): number {
  cart.confirmed = false;

  if (quantity === null || quantity >= item.quantity) {
    cart.items = cart.items.filter((existing) => existing !== item);
    return 0;
  }

  item.quantity -= quantity;
  return item.quantity;
}

export function clearCart(cart: Cart): void {
  cart.items = [];
  cart.confirmed = false;
}

export function getCartSnapshot(cart: Cart): CartSnapshot {
  return {
    items: cart.items.map((item) => ({ ...item })),
    total: cartTotal(cart),
    confirmed: cart.confirmed,
  };
}
