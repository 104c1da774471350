/**
 * Order-to-Resource Aggregation
 *
 * Walks the order lines, resolves each line's recipe, scales it by the line
 * quantity and sums it into five sparse buckets. Addition is the only
 * operation, so the result does not depend on line order.
 */

import type { ResourceDeltas } from "@catering/contracts";
import { lookup, resolveVariant } from "./catalog.js";
import { assertPositiveInteger, InvariantViolation } from "./errors.js";
import type { AggregateTotals, Catalog, MutableTotals, OrderLine } from "./types.js";

export function emptyTotals(): MutableTotals {
  return { food: {}, packaging: {}, condiments: {}, guestware: {}, serviceUtensils: {} };
}

function addScaled<K extends string>(
  target: Partial<Record<K, number>>,
  deltas: Partial<Record<K, number>> | undefined,
  quantity: number,
): void {
  if (!deltas) return;
  for (const resource of Object.keys(deltas) as K[]) {
    const amount = deltas[resource];
    if (typeof amount !== "number" || amount === 0) continue;
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvariantViolation(`Catalog delta for ${resource} must be non-negative, got ${amount}`, { resource, amount });
    }
    target[resource] = (target[resource] ?? 0) + amount * quantity;
  }
}

/** Add `quantity` units of a resolved recipe into the running totals. */
export function addDeltas(totals: MutableTotals, deltas: ResourceDeltas, quantity: number): void {
  addScaled(totals.food, deltas.food, quantity);
  addScaled(totals.packaging, deltas.packaging, quantity);
  addScaled(totals.condiments, deltas.condiments, quantity);
  addScaled(totals.guestware, deltas.guestware, quantity);
  addScaled(totals.serviceUtensils, deltas.serviceUtensils, quantity);
}

/** Freeze each bucket; callers derive new copies instead of editing. */
export function freezeTotals(totals: MutableTotals): AggregateTotals {
  return Object.freeze({
    food: Object.freeze({ ...totals.food }),
    packaging: Object.freeze({ ...totals.packaging }),
    condiments: Object.freeze({ ...totals.condiments }),
    guestware: Object.freeze({ ...totals.guestware }),
    serviceUtensils: Object.freeze({ ...totals.serviceUtensils }),
  });
}

export function cloneTotals(totals: AggregateTotals): MutableTotals {
  return {
    food: { ...totals.food },
    packaging: { ...totals.packaging },
    condiments: { ...totals.condiments },
    guestware: { ...totals.guestware },
    serviceUtensils: { ...totals.serviceUtensils },
  };
}

/**
 * Compute the five resource totals for an order.
 *
 * Only resources some line actually contributed appear in the output.
 * An unknown item or variant throws ConfigurationError; a quantity that is
 * not a positive integer throws InvariantViolation.
 */
export function aggregate(lines: readonly OrderLine[], catalog: Catalog): AggregateTotals {
  const totals = emptyTotals();

  for (const line of lines) {
    assertPositiveInteger(line.quantity, "quantity");
    const entry = lookup(catalog, line.key);
    const deltas = resolveVariant(catalog, entry, line.key.modifiers);
    addDeltas(totals, deltas, line.quantity);
  }

  return freezeTotals(totals);
}
