import { describe, expect, it } from "vitest";
import { defaultCatalog as catalog } from "@catering/data";
import { aggregate } from "./aggregator.js";
import { ConfigurationError, InvariantViolation } from "./errors.js";
import { buildComboLine, buildMenuItemLine, createOrderLine } from "./order-lines.js";
import { createSelectionKey } from "./selection-key.js";
import type { AggregateTotals, OrderLine } from "./types.js";

// ── Helpers ────────────────────────────────────────────

function scaleTotals(totals: AggregateTotals, factor: number): Record<string, Record<string, number>> {
  const scaled: Record<string, Record<string, number>> = {};
  for (const [category, bucket] of Object.entries(totals)) {
    const out: Record<string, number> = {};
    for (const [resource, value] of Object.entries(bucket)) {
      if (typeof value === "number") out[resource] = value * factor;
    }
    scaled[category] = out;
  }
  return scaled;
}

/** One line per orderable entry, with modifiers where the entry needs them. */
function everyEntry(quantity: number): OrderLine[] {
  const combos = catalog.comboTiers.map((tier) =>
    buildComboLine(catalog, { tierId: tier.id, protein: "bacon", griddleChoice: "french-toast", quantity }),
  );
  const items = catalog.items.map((item) =>
    buildMenuItemLine(catalog, {
      itemId: item.id,
      quantity,
      beverageType: item.coldBeverageBags === undefined ? undefined : "lemonade",
    }),
  );
  return [...combos, ...items];
}

const smallBaconPancakes = (quantity: number) =>
  buildComboLine(catalog, { tierId: "small", protein: "bacon", griddleChoice: "buttermilk-pancakes", quantity });

// ── aggregate ──────────────────────────────────────────

describe("aggregate", () => {
  it("returns five empty buckets for an empty order", () => {
    expect(aggregate([], catalog)).toEqual({
      food: {},
      packaging: {},
      condiments: {},
      guestware: {},
      serviceUtensils: {},
    });
  });

  it("scales a combo box by its quantity", () => {
    expect(aggregate([smallBaconPancakes(2)], catalog)).toEqual({
      food: { eggsOz: 80, redPotatoesOz: 120, baconSlices: 40, pancakes: 40 },
      packaging: { halfPans: 6, largeBases: 2 },
      condiments: { butterPackets: 20, syrupPackets: 20, ketchupPackets: 20 },
      guestware: { plates: 20 },
      serviceUtensils: { servingForks: 4, servingTongs: 4 },
    });
  });

  it("totals a steakburger bundle", () => {
    const line = buildMenuItemLine(catalog, { itemId: "steakburgers_10", quantity: 1 });
    expect(aggregate([line], catalog)).toEqual({
      food: {
        steakburgerPatties: 10,
        burgerBuns: 10,
        tomatoSlices: 20,
        onionSlices: 20,
        lettuceLeaves: 10,
        pickleChips: 50,
      },
      packaging: { halfPans: 2, soupCups: 3 },
      condiments: { mayoPackets: 10, ketchupPackets: 10, mustardPackets: 10 },
      guestware: {},
      serviceUtensils: { servingTongs: 2, servingSpoons: 2 },
    });
  });

  it("only writes resources some line contributed", () => {
    const totals = aggregate([buildMenuItemLine(catalog, { itemId: "fries_60oz", quantity: 1 })], catalog);
    expect(totals.food).toEqual({ friesOz: 60 });
    expect(Object.keys(totals.guestware)).toHaveLength(0);
    expect("pancakes" in totals.food).toBe(false);
  });

  it("does not depend on line order", () => {
    const lines = everyEntry(2);
    const reversed = [...lines].reverse();
    const rotated = [...lines.slice(5), ...lines.slice(0, 5)];
    const expected = aggregate(lines, catalog);
    expect(aggregate(reversed, catalog)).toEqual(expected);
    expect(aggregate(rotated, catalog)).toEqual(expected);
  });

  it("scales every catalog entry linearly", () => {
    const singles = everyEntry(1);
    const triples = everyEntry(3);
    expect(triples).toHaveLength(singles.length);
    singles.forEach((single, i) => {
      expect(aggregate(triples.slice(i, i + 1), catalog)).toEqual(scaleTotals(aggregate([single], catalog), 3));
    });
  });

  it("treats two lines for one selection like a single merged line", () => {
    const split = aggregate([smallBaconPancakes(3), smallBaconPancakes(4)], catalog);
    expect(split).toEqual(aggregate([smallBaconPancakes(7)], catalog));
  });

  it("keeps flavors in separate buckets", () => {
    const lines = [
      buildMenuItemLine(catalog, { itemId: "cold_bag", quantity: 2, beverageType: "orange-juice" }),
      buildMenuItemLine(catalog, { itemId: "cold_bag", quantity: 1, beverageType: "Apple Juice" }),
    ];
    const totals = aggregate(lines, catalog);
    expect(totals.food).toEqual({ "ColdBeverage::OrangeJuice": 2, "ColdBeverage::AppleJuice": 1 });
    expect(totals.packaging).toEqual({ coldBeveragePouches: 3 });
    expect(totals.guestware).toEqual({ coldCups: 48, coldCupLids: 48, straws: 48 });
  });

  it("returns frozen totals", () => {
    const totals = aggregate([smallBaconPancakes(1)], catalog);
    expect(Object.isFrozen(totals)).toBe(true);
    expect(Object.isFrozen(totals.food)).toBe(true);
  });

  it("rejects non-positive and fractional quantities", () => {
    const key = createSelectionKey("AlaCarteItem", "fries_60oz");
    expect(() => aggregate([{ key, displayLabel: "Fries", quantity: 0 }], catalog)).toThrow(InvariantViolation);
    expect(() => aggregate([{ key, displayLabel: "Fries", quantity: 1.5 }], catalog)).toThrow(InvariantViolation);
  });

  it("surfaces unknown items as ConfigurationError", () => {
    const line = createOrderLine(createSelectionKey("MainItem", "lobster_roll"), "Lobster Roll", 1);
    expect(() => aggregate([line], catalog)).toThrow(ConfigurationError);
  });

  it("rejects a plain item carrying a flavor modifier", () => {
    const key = createSelectionKey("AlaCarteItem", "fries_60oz", { beverageType: "soda" });
    expect(() => aggregate([createOrderLine(key, "Fries", 1)], catalog)).toThrow(ConfigurationError);
  });
});
