/**
 * Customer profile operations
 */

import type { Cart, CustomerProfile, ProfileField } from "../types/session.js";

export const PROFILE_FIELDS: readonly ProfileField[] = ["name", "address", "payment"] as const;

export function createProfile(): CustomerProfile {
  return { name: null, address: null, payment: null };
}

export function isProfileField(value: string): value is ProfileField {
  return PROFILE_FIELDS.some((field) => field === value);
}

export type SetFieldOutcome =
  | { ok: true; field: ProfileField; value: string }
  | { ok: false; reason: "empty_value" | "cart_empty" };

/**
 * Write a profile field. The delivery address is only accepted once the cart has items.
 */
export function setProfileField(
  profile: CustomerProfile,
  cart: Cart,
  field: ProfileField,
  rawValue: string
): SetFieldOutcome {
  const value = rawValue.trim();
  if (!value) {
    return { ok: false, reason: "empty_value" };
  }

  if (field === "address" && cart.items.length === 0) {
    return { ok: false, reason: "cart_empty" };
  }

  profile[field] = value;
  return { ok: true, field, value };
}

export function missingProfileFields(profile: CustomerProfile): ProfileField[] {
  return PROFILE_FIELDS.filter((field) => !profile[field]);
}

/**
 * Every customer field set, items in the cart and the order confirmed
 */
export function isOrderReady(profile: CustomerProfile, cart: Cart): boolean {
  return missingProfileFields(profile).length === 0 && cart.items.length > 0 && cart.confirmed;
}
