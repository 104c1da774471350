/**
 * Item Catalog
 *
 * Read-only lookups over the static catalog configuration. Combo tiers are
 * resolved from their sub-recipes (eggs + potatoes + chosen protein +
 * chosen griddle item + service kit); every other entry has a fixed recipe,
 * except the cold beverage bag whose bags are routed to the chosen flavor.
 */

import type {
  BeverageOption,
  GriddleOption,
  ProteinOption,
  ResourceCategory,
  ResourceDeltas,
} from "@catering/contracts";
import { ConfigurationError, InvariantViolation } from "./errors.js";
import { getModifier, Modifier, normalizeToken } from "./selection-key.js";
import type { Catalog, CatalogEntry, SelectionKey, SelectionModifiers } from "./types.js";

type CatalogOption = { id: string; label: string };

function findOption<T extends CatalogOption>(options: readonly T[], value: string): T | undefined {
  const wanted = normalizeToken(value);
  return options.find((o) => normalizeToken(o.id) === wanted || normalizeToken(o.label) === wanted);
}

function requireOption<T extends CatalogOption>(
  options: readonly T[],
  modifiers: SelectionModifiers,
  modifierName: string,
  itemId: string,
): T {
  const value = getModifier(modifiers, modifierName);
  if (value === undefined) {
    throw new ConfigurationError(`${itemId} requires a ${modifierName} modifier`, { itemId, modifier: modifierName });
  }
  const option = findOption(options, value);
  if (!option) {
    throw new ConfigurationError(`Unknown ${modifierName} "${value}" for ${itemId}`, {
      itemId,
      modifier: modifierName,
      value,
    });
  }
  return option;
}

export function findProtein(catalog: Catalog, value: string): ProteinOption | undefined {
  return findOption(catalog.proteins, value);
}

export function findGriddleChoice(catalog: Catalog, value: string): GriddleOption | undefined {
  return findOption(catalog.griddleChoices, value);
}

export function findBeverageType(catalog: Catalog, value: string): BeverageOption | undefined {
  return findOption(catalog.beverageTypes, value);
}

/** Modifier names an entry takes. Combos choose a protein and a griddle item; cold bags choose a flavor. */
export function acceptedModifiers(entry: CatalogEntry): readonly string[] {
  if (entry.kind === "ComboBox") return [Modifier.PROTEIN, Modifier.GRIDDLE_CHOICE];
  return entry.item.coldBeverageBags === undefined ? [] : [Modifier.BEVERAGE_TYPE];
}

function assertAcceptedModifiers(entry: CatalogEntry, key: SelectionKey): CatalogEntry {
  const accepted = acceptedModifiers(entry).map(normalizeToken);
  for (const name of Object.keys(key.modifiers)) {
    if (accepted.includes(normalizeToken(name))) continue;
    throw new ConfigurationError(`${key.itemId} does not take a ${name} modifier`, {
      kind: key.kind,
      itemId: key.itemId,
      modifier: name,
    });
  }
  return entry;
}

/**
 * Resolve a selection key to its catalog entry.
 * Throws ConfigurationError when the item id is unknown, filed under a
 * different kind, or carries a modifier the entry does not take.
 */
export function lookup(catalog: Catalog, key: SelectionKey): CatalogEntry {
  const wanted = normalizeToken(key.itemId);

  if (key.kind === "ComboBox") {
    const tier = catalog.comboTiers.find((t) => normalizeToken(t.id) === wanted);
    if (!tier) {
      throw new ConfigurationError(`Unknown combo tier: ${key.itemId}`, { kind: key.kind, itemId: key.itemId });
    }
    return assertAcceptedModifiers({ kind: "ComboBox", tier }, key);
  }

  const item = catalog.items.find((i) => normalizeToken(i.id) === wanted);
  if (!item || item.kind !== key.kind) {
    throw new ConfigurationError(`Unknown ${key.kind}: ${key.itemId}`, { kind: key.kind, itemId: key.itemId });
  }
  return assertAcceptedModifiers({ kind: item.kind, item }, key);
}

type DeltaMap<K extends string> = Partial<Record<K, number>>;

function sumCategory<K extends string>(category: ResourceCategory, maps: Array<DeltaMap<K> | undefined>): DeltaMap<K> | undefined {
  let result: DeltaMap<K> | undefined;
  for (const map of maps) {
    if (!map) continue;
    result ??= {};
    for (const resource of Object.keys(map) as K[]) {
      const amount = map[resource];
      if (amount === undefined) continue;
      if (!Number.isFinite(amount) || amount < 0) {
        throw new InvariantViolation(`Invalid ${category} delta for ${resource}: ${amount}`, { category, resource, amount });
      }
      result[resource] = (result[resource] ?? 0) + amount;
    }
  }
  return result;
}

/** Sum recipe parts into one delta set. Every amount must be non-negative. */
export function sumDeltas(...parts: ResourceDeltas[]): ResourceDeltas {
  const deltas: ResourceDeltas = {};
  const food = sumCategory("food", parts.map((p) => p.food));
  const packaging = sumCategory("packaging", parts.map((p) => p.packaging));
  const condiments = sumCategory("condiments", parts.map((p) => p.condiments));
  const guestware = sumCategory("guestware", parts.map((p) => p.guestware));
  const serviceUtensils = sumCategory("serviceUtensils", parts.map((p) => p.serviceUtensils));
  if (food) deltas.food = food;
  if (packaging) deltas.packaging = packaging;
  if (condiments) deltas.condiments = condiments;
  if (guestware) deltas.guestware = guestware;
  if (serviceUtensils) deltas.serviceUtensils = serviceUtensils;
  return deltas;
}

function singleDelta<K extends string>(resource: K, amount: number): DeltaMap<K> {
  const delta: DeltaMap<K> = {};
  delta[resource] = amount;
  return delta;
}

/**
 * Resource deltas for one unit of an entry with the given modifiers.
 *
 * Combo boxes require `protein` and `griddleChoice`; the cold beverage bag
 * requires `beverageType`. The unchosen griddle recipe never contributes.
 */
export function resolveVariant(catalog: Catalog, entry: CatalogEntry, modifiers: SelectionModifiers): ResourceDeltas {
  if (entry.kind === "ComboBox") {
    const { tier } = entry;
    const protein = requireOption(catalog.proteins, modifiers, Modifier.PROTEIN, tier.id);
    const griddle = requireOption(catalog.griddleChoices, modifiers, Modifier.GRIDDLE_CHOICE, tier.id);
    const griddleRecipe = tier.griddle[griddle.id];
    if (!griddleRecipe) {
      throw new ConfigurationError(`Tier ${tier.id} has no recipe for ${griddle.id}`, {
        itemId: tier.id,
        griddleChoice: griddle.id,
      });
    }

    const proteinRecipe: ResourceDeltas = sumDeltas(
      { food: singleDelta(protein.food, tier.protein.pieces) },
      tier.protein.deltas,
    );
    return sumDeltas(tier.eggs, tier.potatoes, proteinRecipe, griddleRecipe, tier.service);
  }

  const { item } = entry;
  if (item.coldBeverageBags === undefined) return sumDeltas(item.deltas);

  const beverage = requireOption(catalog.beverageTypes, modifiers, Modifier.BEVERAGE_TYPE, item.id);
  return sumDeltas(item.deltas, { food: singleDelta(beverage.food, item.coldBeverageBags) });
}

export function servingsFor(entry: CatalogEntry): number {
  return entry.kind === "ComboBox" ? entry.tier.servings : entry.item.servings;
}

/** Beverages serve guests but are never counted as meal servings. */
export function countsTowardServings(entry: CatalogEntry): boolean {
  return entry.kind === "ComboBox" || entry.item.category !== "beverage";
}
