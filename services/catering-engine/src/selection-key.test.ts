import { describe, expect, it } from "vitest";
import { canonicalSelectionKey, createSelectionKey, getModifier, selectionKeysEqual } from "./selection-key.js";

describe("createSelectionKey", () => {
  it("freezes the key and its modifiers", () => {
    const key = createSelectionKey("ComboBox", "small", { protein: "bacon" });
    expect(Object.isFrozen(key)).toBe(true);
    expect(Object.isFrozen(key.modifiers)).toBe(true);
  });

  it("copies the caller's modifier map", () => {
    const modifiers: Record<string, string> = { protein: "bacon" };
    const key = createSelectionKey("ComboBox", "small", modifiers);
    modifiers.protein = "sampler-ham";
    expect(key.modifiers.protein).toBe("bacon");
  });
});

describe("canonicalSelectionKey", () => {
  it("normalizes case and padding and sorts modifiers by name", () => {
    const key = createSelectionKey("ComboBox", " Small ", { protein: "Bacon", griddleChoice: "French-Toast" });
    expect(canonicalSelectionKey(key)).toBe(
      '["ComboBox","small",[["griddlechoice","french-toast"],["protein","bacon"]]]',
    );
  });

  it("has no modifier segment for plain items", () => {
    expect(canonicalSelectionKey(createSelectionKey("AlaCarteItem", "fries_60oz"))).toBe('["AlaCarteItem","fries_60oz",[]]');
  });
});

describe("selectionKeysEqual", () => {
  it("ignores case, whitespace and modifier order", () => {
    const a = createSelectionKey("ComboBox", "Small", { " Protein ": " BACON ", griddleChoice: "buttermilk-pancakes" });
    const b = createSelectionKey("ComboBox", "small", { griddleChoice: "Buttermilk-Pancakes", protein: "bacon" });
    expect(selectionKeysEqual(a, b)).toBe(true);
  });

  it("distinguishes kinds", () => {
    const a = createSelectionKey("MainItem", "steakburgers_10");
    const b = createSelectionKey("AlaCarteItem", "steakburgers_10");
    expect(selectionKeysEqual(a, b)).toBe(false);
  });

  it("distinguishes modifier values", () => {
    const a = createSelectionKey("AlaCarteItem", "cold_bag", { beverageType: "orange-juice" });
    const b = createSelectionKey("AlaCarteItem", "cold_bag", { beverageType: "apple-juice" });
    expect(selectionKeysEqual(a, b)).toBe(false);
  });

  it("keeps separator characters inside a value from forging another modifier", () => {
    const a = createSelectionKey("AlaCarteItem", "cold_bag", { beverageType: "soda|protein=bacon" });
    const b = createSelectionKey("AlaCarteItem", "cold_bag", { beverageType: "soda", protein: "bacon" });
    expect(selectionKeysEqual(a, b)).toBe(false);
  });

  it("keeps separator characters inside an item id from forging a modifier", () => {
    const a = createSelectionKey("AlaCarteItem", "cold_bag|beveragetype=soda");
    const b = createSelectionKey("AlaCarteItem", "cold_bag", { beverageType: "soda" });
    expect(selectionKeysEqual(a, b)).toBe(false);
  });
});

describe("getModifier", () => {
  it("matches the modifier name case-insensitively", () => {
    expect(getModifier({ " Protein ": "bacon" }, "protein")).toBe("bacon");
    expect(getModifier({ protein: "bacon" }, "griddleChoice")).toBeUndefined();
  });
});
