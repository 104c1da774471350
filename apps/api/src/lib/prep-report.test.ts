import { describe, expect, it } from "vitest";
import { prepReportBodySchema } from "@catering/contracts";
import { defaultCatalog, defaultPackTable } from "@catering/data";
import { ConfigurationError, createCateringEngine } from "@catering/engine";
import { buildPrepReportResponse, describeCatalog, toOrderLine } from "./prep-report.js";

const engine = createCateringEngine(defaultCatalog, defaultPackTable);

describe("toOrderLine", () => {
  it("canonicalizes combo options given by label", () => {
    const line = toOrderLine(defaultCatalog, {
      kind: "ComboBox",
      itemId: "Small",
      modifiers: { protein: "Bacon", griddleChoice: "French Toast" },
      quantity: 2
    });
    expect(line.displayLabel).toBe("Small Combo Box | Bacon | French Toast");
    expect(line.key.itemId).toBe("small");
    expect(line.key.modifiers).toEqual({ protein: "bacon", griddleChoice: "french-toast" });
    expect(line.quantity).toBe(2);
  });

  it("keeps a caller-supplied label", () => {
    const line = toOrderLine(defaultCatalog, {
      kind: "AlaCarteItem",
      itemId: "fries_60oz",
      modifiers: {},
      quantity: 1,
      displayLabel: "Fries for the front table"
    });
    expect(line.displayLabel).toBe("Fries for the front table");
  });

  it("rejects an item filed under the wrong kind", () => {
    expect(() =>
      toOrderLine(defaultCatalog, { kind: "MainItem", itemId: "fries_60oz", modifiers: {}, quantity: 1 })
    ).toThrow(ConfigurationError);
  });

  it("rejects a modifier the item does not take", () => {
    expect(() =>
      toOrderLine(defaultCatalog, {
        kind: "AlaCarteItem",
        itemId: "fries_60oz",
        modifiers: { beverageType: "soda" },
        quantity: 1
      })
    ).toThrow("fries_60oz does not take a beverageType modifier");
  });

  it("rejects a combo without a protein", () => {
    expect(() =>
      toOrderLine(defaultCatalog, {
        kind: "ComboBox",
        itemId: "small",
        modifiers: { griddleChoice: "french-toast" },
        quantity: 1
      })
    ).toThrow(ConfigurationError);
  });
});

describe("buildPrepReportResponse", () => {
  it("serializes the pickup window as ISO timestamps", () => {
    const body = prepReportBodySchema.parse({
      lines: [
        { kind: "AlaCarteItem", itemId: "fries_60oz", quantity: 1 },
        { kind: "AlaCarteItem", itemId: "FRIES_60OZ", quantity: 1 }
      ],
      headcount: 12,
      toggles: { plates: true, napkins: true, utensils: false },
      pickupAt: "2026-10-19T07:30:00-05:00"
    });

    const response = buildPrepReportResponse(engine, body, 15);
    expect(response.pickup?.pickupAt).toBe("2026-10-19T12:30:00.000Z");
    expect(response.pickup?.readyAt).toBe("2026-10-19T12:15:00.000Z");
    expect(response.pickup?.leadMinutes).toBe(15);
    expect(response.lines).toHaveLength(1);
    expect(response.lines[0]?.quantity).toBe(2);
    expect(response.totalServings).toBe(20);
    expect(response.recommendedUtensilSets).toBe(12);
    expect(response.totals.guestware).toEqual({ plates: 20, napkins: 20 });
    expect(response.totals.serviceUtensils).toEqual({});
  });

  it("returns a null pickup when none was requested", () => {
    const body = prepReportBodySchema.parse({
      lines: [{ kind: "AlaCarteItem", itemId: "coffee_box", quantity: 1 }],
      toggles: { plates: false, napkins: false, utensils: false }
    });
    expect(buildPrepReportResponse(engine, body, 10).pickup).toBeNull();
  });
});

describe("describeCatalog", () => {
  it("flags items that need a beverage type", () => {
    const summary = describeCatalog(defaultCatalog);
    expect(summary.items.filter((i) => i.requiresBeverageType).map((i) => i.id)).toEqual(["cold_bag"]);
    expect(summary.comboTiers.map((t) => t.id)).toEqual(["small", "medium", "large"]);
  });
});
