import type { SelectionKind } from "@catering/contracts";
import type { SelectionKey, SelectionModifiers } from "./types.js";

export const Modifier = {
  PROTEIN: "protein",
  GRIDDLE_CHOICE: "griddleChoice",
  BEVERAGE_TYPE: "beverageType",
} as const;

/** Case-insensitive, whitespace-trimmed form used for every identity comparison. */
export function normalizeToken(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Build an immutable selection key. Modifier insertion order is kept for
 * display; equality ignores it.
 */
export function createSelectionKey(
  kind: SelectionKind,
  itemId: string,
  modifiers: SelectionModifiers = {},
): SelectionKey {
  return Object.freeze({
    kind,
    itemId,
    modifiers: Object.freeze({ ...modifiers }),
  });
}

/**
 * Canonical string identity: kind, normalized item id, then normalized
 * `[name, value]` pairs sorted by name, JSON-encoded so no value can
 * impersonate a separator.
 */
export function canonicalSelectionKey(key: SelectionKey): string {
  const modifiers = Object.entries(key.modifiers)
    .map(([name, value]): [string, string] => [normalizeToken(name), normalizeToken(value)])
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify([key.kind, normalizeToken(key.itemId), modifiers]);
}

export function selectionKeysEqual(a: SelectionKey, b: SelectionKey): boolean {
  return canonicalSelectionKey(a) === canonicalSelectionKey(b);
}

/** Look a modifier up by name, ignoring the case and padding of the name. */
export function getModifier(modifiers: SelectionModifiers, name: string): string | undefined {
  const wanted = normalizeToken(name);
  for (const [modifierName, value] of Object.entries(modifiers)) {
    if (normalizeToken(modifierName) === wanted) return value;
  }
  return undefined;
}
