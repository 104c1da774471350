import { describe, expect, it } from "vitest";
import {
  catalogConfigSchema,
  orderLineBodySchema,
  packSizeSchema,
  prepReportBodySchema,
  resourceDeltasSchema
} from "./schemas.js";

function minimalCatalog() {
  return {
    version: "test",
    proteins: [{ id: "bacon", label: "Bacon", food: "baconSlices" }],
    griddleChoices: [{ id: "pancakes", label: "Pancakes" }],
    beverageTypes: [{ id: "orange-juice", label: "Orange Juice", food: "ColdBeverage::OrangeJuice" }],
    comboTiers: [
      {
        id: "small",
        label: "Small Combo Box",
        servings: 10,
        eggs: { food: { eggsOz: 40 } },
        potatoes: { food: { redPotatoesOz: 60 } },
        protein: { pieces: 20, deltas: { packaging: { largeBases: 1 } } },
        griddle: { pancakes: { food: { pancakes: 20 } } },
        service: { guestware: { plates: 10 } }
      }
    ],
    items: [
      {
        id: "cold_bag",
        label: "Cold Beverage Bag",
        group: "Beverages",
        kind: "AlaCarteItem",
        category: "beverage",
        servings: 16,
        deltas: { guestware: { coldCups: 16 } },
        coldBeverageBags: 1
      }
    ]
  };
}

// ============================================================================
// Resource deltas
// ============================================================================

describe("resourceDeltasSchema", () => {
  it("accepts sparse buckets", () => {
    const parsed = resourceDeltasSchema.parse({ food: { eggsOz: 40 } });
    expect(parsed).toEqual({ food: { eggsOz: 40 } });
  });

  it("rejects a resource filed under the wrong bucket", () => {
    expect(resourceDeltasSchema.safeParse({ food: { halfPans: 1 } }).success).toBe(false);
  });

  it("rejects negative amounts", () => {
    expect(resourceDeltasSchema.safeParse({ condiments: { ketchupPackets: -1 } }).success).toBe(false);
  });

  it("rejects unknown buckets", () => {
    expect(resourceDeltasSchema.safeParse({ drinks: { soda: 1 } }).success).toBe(false);
  });
});

// ============================================================================
// Catalog
// ============================================================================

describe("catalogConfigSchema", () => {
  it("accepts a minimal catalog", () => {
    expect(catalogConfigSchema.safeParse(minimalCatalog()).success).toBe(true);
  });

  it("rejects duplicate ids across tiers and items, ignoring case", () => {
    const catalog = minimalCatalog();
    catalog.items = catalog.items.map((item) => ({ ...item, id: "SMALL" }));
    const result = catalogConfigSchema.safeParse(catalog);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Duplicate catalog id: SMALL");
    }
  });

  it("requires a griddle recipe for every griddle choice", () => {
    const catalog = minimalCatalog();
    catalog.griddleChoices.push({ id: "french-toast", label: "French Toast" });
    const result = catalogConfigSchema.safeParse(catalog);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["comboTiers", 0, "griddle"]);
    }
  });

  it("only lets beverages route beverage bags", () => {
    const catalog = minimalCatalog();
    catalog.items = catalog.items.map((item) => ({ ...item, category: "food" }));
    expect(catalogConfigSchema.safeParse(catalog).success).toBe(false);
  });

  it("restricts beverage options to cold beverage resources", () => {
    const catalog = minimalCatalog();
    catalog.beverageTypes = catalog.beverageTypes.map((option) => ({ ...option, food: "eggsOz" }));
    expect(catalogConfigSchema.safeParse(catalog).success).toBe(false);
  });
});

// ============================================================================
// Pack sizes
// ============================================================================

describe("packSizeSchema", () => {
  const base = {
    resource: "eggsOz",
    itemName: "Liquid Eggs",
    sku: "1001",
    measure: "weight",
    conversion: { kind: "ozEach", value: 1 },
    amountPerUnit: 320,
    unitLabel: "bag",
    unitsPerCase: 2
  };

  it("accepts a weighed pack", () => {
    expect(packSizeSchema.safeParse(base).success).toBe(true);
  });

  it("rejects a count measure with a weight conversion", () => {
    expect(packSizeSchema.safeParse({ ...base, measure: "count", countLabel: "eggs" }).success).toBe(false);
  });

  it("requires a countLabel on counted packs", () => {
    const counted = { ...base, resource: "burgerBuns", measure: "count", conversion: { kind: "count" } };
    expect(packSizeSchema.safeParse(counted).success).toBe(false);
    expect(packSizeSchema.safeParse({ ...counted, countLabel: "buns" }).success).toBe(true);
  });

  it("rejects a zero pack size", () => {
    expect(packSizeSchema.safeParse({ ...base, amountPerUnit: 0 }).success).toBe(false);
  });
});

// ============================================================================
// Request bodies
// ============================================================================

describe("orderLineBodySchema", () => {
  it("defaults modifiers to an empty map", () => {
    const parsed = orderLineBodySchema.parse({ kind: "AlaCarteItem", itemId: "fries_60oz", quantity: 2 });
    expect(parsed.modifiers).toEqual({});
  });

  it("rejects fractional and zero quantities", () => {
    expect(orderLineBodySchema.safeParse({ kind: "MainItem", itemId: "x", quantity: 1.5 }).success).toBe(false);
    expect(orderLineBodySchema.safeParse({ kind: "MainItem", itemId: "x", quantity: 0 }).success).toBe(false);
  });

  it("rejects unknown kinds", () => {
    expect(orderLineBodySchema.safeParse({ kind: "Drink", itemId: "x", quantity: 1 }).success).toBe(false);
  });
});

describe("prepReportBodySchema", () => {
  const toggles = { plates: true, napkins: false, utensils: true };

  it("defaults headcount to zero", () => {
    const parsed = prepReportBodySchema.parse({
      lines: [{ kind: "AlaCarteItem", itemId: "fries_60oz", quantity: 1 }],
      toggles
    });
    expect(parsed.headcount).toBe(0);
  });

  it("requires at least one line", () => {
    expect(prepReportBodySchema.safeParse({ lines: [], toggles }).success).toBe(false);
  });

  it("accepts pickup times with an offset", () => {
    const result = prepReportBodySchema.safeParse({
      lines: [{ kind: "AlaCarteItem", itemId: "fries_60oz", quantity: 1 }],
      toggles,
      pickupAt: "2026-10-19T07:30:00-05:00"
    });
    expect(result.success).toBe(true);
  });
});
