/**
 * Order Line Model
 *
 * The working order is an immutable OrderState value. Every mutation returns
 * a new state; lines with equal selection keys are merged by adding their
 * quantities, so the order never holds two lines for the same selection.
 */

import { findBeverageType, findGriddleChoice, findProtein } from "./catalog.js";
import { assertPositiveInteger, ConfigurationError, InvariantViolation } from "./errors.js";
import {
  canonicalSelectionKey,
  createSelectionKey,
  Modifier,
  normalizeToken,
  selectionKeysEqual,
} from "./selection-key.js";
import type { Catalog, OrderLine, OrderState, SelectionKey } from "./types.js";

export function emptyOrder(): OrderState {
  return Object.freeze({ lines: Object.freeze([]) });
}

export function createOrderLine(key: SelectionKey, displayLabel: string, quantity: number): OrderLine {
  assertPositiveInteger(quantity, "quantity");
  return Object.freeze({ key, displayLabel, quantity });
}

function withLines(lines: OrderLine[]): OrderState {
  return Object.freeze({ lines: Object.freeze(lines) });
}

function assertIndex(state: OrderState, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= state.lines.length) {
    throw new InvariantViolation(`Order line index ${index} out of range`, { index, length: state.lines.length });
  }
}

/**
 * Append a line, or add its quantity to the existing line with an equal key.
 * The existing line keeps its position and label.
 */
export function addOrMergeLine(state: OrderState, line: OrderLine): OrderState {
  assertPositiveInteger(line.quantity, "quantity");
  const existingIndex = state.lines.findIndex((l) => selectionKeysEqual(l.key, line.key));

  if (existingIndex === -1) {
    return withLines([...state.lines, line]);
  }

  const lines = state.lines.map((l, i) =>
    i === existingIndex ? createOrderLine(l.key, l.displayLabel, l.quantity + line.quantity) : l,
  );
  return withLines(lines);
}

export function removeLine(state: OrderState, index: number): OrderState {
  assertIndex(state, index);
  return withLines(state.lines.filter((_, i) => i !== index));
}

/**
 * Edit = remove, then merge-or-add. Editing a line into a selection that
 * already exists elsewhere in the order merges the two.
 */
export function replaceLine(state: OrderState, index: number, newLine: OrderLine): OrderState {
  return addOrMergeLine(removeLine(state, index), newLine);
}

export function clearOrder(): OrderState {
  return emptyOrder();
}

/** Throws InvariantViolation on a non-positive quantity or two lines with equal keys. */
export function assertOrderInvariants(lines: readonly OrderLine[]): void {
  const seen = new Set<string>();
  for (const line of lines) {
    assertPositiveInteger(line.quantity, "quantity");
    const canonical = canonicalSelectionKey(line.key);
    if (seen.has(canonical)) {
      throw new InvariantViolation(`Duplicate selection in order: ${line.displayLabel}`, { key: canonical });
    }
    seen.add(canonical);
  }
}

// ── Line builders ────────────────────────────────────────────────

export interface ComboSelection {
  tierId: string;
  protein: string;
  griddleChoice: string;
  quantity: number;
}

export interface MenuItemSelection {
  itemId: string;
  quantity: number;
  beverageType?: string;
}

/** "Small Combo Box | Bacon | Buttermilk Pancakes" */
export function buildComboLine(catalog: Catalog, selection: ComboSelection): OrderLine {
  const protein = findProtein(catalog, selection.protein);
  const griddle = findGriddleChoice(catalog, selection.griddleChoice);
  if (!protein || !griddle) {
    throw new ConfigurationError(`Unknown combo option: ${selection.protein} / ${selection.griddleChoice}`, {
      protein: selection.protein,
      griddleChoice: selection.griddleChoice,
    });
  }

  const tier = catalog.comboTiers.find((t) => normalizeToken(t.id) === normalizeToken(selection.tierId));
  if (!tier) {
    throw new ConfigurationError(`Unknown combo tier: ${selection.tierId}`, { itemId: selection.tierId });
  }

  const key = createSelectionKey("ComboBox", tier.id, {
    [Modifier.PROTEIN]: protein.id,
    [Modifier.GRIDDLE_CHOICE]: griddle.id,
  });
  return createOrderLine(key, `${tier.label} | ${protein.label} | ${griddle.label}`, selection.quantity);
}

/** Main items and à la carte items; the cold beverage bag also takes its flavor. */
export function buildMenuItemLine(catalog: Catalog, selection: MenuItemSelection): OrderLine {
  const item = catalog.items.find((i) => normalizeToken(i.id) === normalizeToken(selection.itemId));
  if (!item) {
    throw new ConfigurationError(`Unknown menu item: ${selection.itemId}`, { itemId: selection.itemId });
  }

  if (item.coldBeverageBags === undefined) {
    return createOrderLine(createSelectionKey(item.kind, item.id), item.label, selection.quantity);
  }

  const beverage = selection.beverageType === undefined ? undefined : findBeverageType(catalog, selection.beverageType);
  if (!beverage) {
    throw new ConfigurationError(`${item.id} requires a known beverage type`, {
      itemId: item.id,
      beverageType: selection.beverageType,
    });
  }
  const key = createSelectionKey(item.kind, item.id, { [Modifier.BEVERAGE_TYPE]: beverage.id });
  return createOrderLine(key, `${item.label} | ${beverage.label}`, selection.quantity);
}
