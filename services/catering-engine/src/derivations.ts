/**
 * Post-Aggregation Derivations
 *
 * Serving-count driven guestware. Meal servings (never beverages) size the
 * plates, napkins and wrapped cutlery the guest asked for. Headcount is
 * informational: it only produces a recommended utensil-set count.
 */

import { cloneTotals, freezeTotals } from "./aggregator.js";
import { countsTowardServings, lookup, servingsFor } from "./catalog.js";
import { assertNonNegativeNumber, assertPositiveInteger, InvariantViolation } from "./errors.js";
import type { AggregateTotals, Catalog, GuestRequestToggles, OrderLine } from "./types.js";

export interface GuestServiceInput {
  headcount: number;
  totalServings: number;
  toggles: GuestRequestToggles;
}

/** Σ declared servings × quantity over every non-beverage line. */
export function computeTotalServings(lines: readonly OrderLine[], catalog: Catalog): number {
  let total = 0;
  for (const line of lines) {
    assertPositiveInteger(line.quantity, "quantity");
    const entry = lookup(catalog, line.key);
    if (!countsTowardServings(entry)) continue;
    total += servingsFor(entry) * line.quantity;
  }
  return total;
}

/**
 * Return a new totals object with guest-requested disposables added.
 *
 * - plates / napkins / cutlerySets: + totalServings when the matching toggle
 *   (plates / napkins / utensils) is on and there is at least one serving.
 * - utensils off: the serving-utensil bucket is emptied, including tongs and
 *   forks the recipes already contributed.
 */
export function applyDerivations(totals: AggregateTotals, input: GuestServiceInput): AggregateTotals {
  validateGuestServiceInput(input);
  const next = cloneTotals(totals);
  const { totalServings, toggles } = input;

  if (totalServings > 0) {
    if (toggles.plates) next.guestware.plates = (next.guestware.plates ?? 0) + totalServings;
    if (toggles.napkins) next.guestware.napkins = (next.guestware.napkins ?? 0) + totalServings;
    if (toggles.utensils) next.guestware.cutlerySets = (next.guestware.cutlerySets ?? 0) + totalServings;
  }

  if (!toggles.utensils) {
    next.serviceUtensils = {};
  }

  return freezeTotals(next);
}

/** Recommended wrapped utensil sets: one per head, none when no headcount was given. */
export function recommendUtensilSets(headcount: number): number {
  assertNonNegativeNumber(headcount, "headcount");
  if (!Number.isInteger(headcount)) {
    throw new InvariantViolation(`headcount must be an integer, got ${headcount}`, { headcount });
  }
  return headcount;
}

function validateGuestServiceInput(input: GuestServiceInput): void {
  assertNonNegativeNumber(input.headcount, "headcount");
  assertNonNegativeNumber(input.totalServings, "totalServings");
  if (!Number.isInteger(input.headcount) || !Number.isInteger(input.totalServings)) {
    throw new InvariantViolation("headcount and totalServings must be integers", {
      headcount: input.headcount,
      totalServings: input.totalServings,
    });
  }
}
