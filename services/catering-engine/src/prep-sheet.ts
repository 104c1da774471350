/**
 * Kitchen Prep Sheet
 *
 * Turns aggregated totals into the lines a cook reads: eggs in quarts,
 * potatoes and fries by bag, proteins by weight, griddle counts, and the
 * guest-facing plating reference. Weights come from the pack table so the
 * prep sheet and the purchasing rows never disagree.
 */

import type { AnyResource, PackSize, PackTable } from "@catering/contracts";
import { coldBeverageResources } from "@catering/contracts";
import { toPackAmount } from "./inventory-impact.js";
import {
  condimentLabels,
  foodLabels,
  guestwareLabels,
  packagingLabels,
  serviceUtensilLabels,
} from "./resource-labels.js";
import type { AggregateTotals } from "./types.js";
import {
  bagOverflowDescription,
  containerCountFromPieceCount,
  formatQuantity,
  friendlyRoundUp,
  ouncesToPounds,
  pluralize,
} from "./units.js";

const EGG_QUARTS_PER_POUND = 0.465;
const CAMBRO_QUARTS = 4;
const PORTION_OZ = 6;
const COLD_BEVERAGE_BAG_OZ = 128;

export interface CountRow {
  resource: string;
  label: string;
  total: number;
}

export interface PrepSheet {
  foodLines: string[];
  platingReference: string[];
  packaging: CountRow[];
  condiments: CountRow[];
  guestware: CountRow[];
  serviceUtensils: CountRow[];
}

function findPack(packTable: PackTable, resource: AnyResource): PackSize | undefined {
  return packTable.packs.find((p) => p.resource === resource);
}

/** Pounds for a weighed resource, rounded the guest-friendly way; null when the pack table has no weight for it. */
function poundsFor(packTable: PackTable, resource: AnyResource, quantity: number): number | null {
  const pack = findPack(packTable, resource);
  if (!pack || pack.measure !== "weight") return null;
  return friendlyRoundUp(ouncesToPounds(toPackAmount(pack, quantity)));
}

function weighedLine(packTable: PackTable, resource: AnyResource, label: string, quantity: number, unit: string): string {
  const pounds = poundsFor(packTable, resource, quantity);
  const counted = `${label}: ${formatQuantity(quantity)} ${unit}`;
  return pounds === null ? counted : `${counted} (${formatQuantity(pounds)} lb)`;
}

function bagOunces(packTable: PackTable, resource: AnyResource): number | null {
  const pack = findPack(packTable, resource);
  if (!pack || pack.measure !== "weight" || pack.conversion.kind !== "ozEach" || pack.conversion.value !== 1) return null;
  return pack.amountPerUnit;
}

export function eggsPrepLine(eggsOz: number): string {
  const quarts = friendlyRoundUp(ouncesToPounds(eggsOz) * EGG_QUARTS_PER_POUND);
  return `Scrambled Eggs: ${formatQuantity(quarts)} qt (${(quarts / CAMBRO_QUARTS).toFixed(1)} of a ${CAMBRO_QUARTS}-qt Cambro)`;
}

function ouncesPrepLine(packTable: PackTable, resource: AnyResource, label: string, oz: number): string {
  const perBag = bagOunces(packTable, resource);
  if (perBag === null) return `${label}: ${formatQuantity(oz)} oz`;
  return bagOverflowDescription(oz, perBag, PORTION_OZ, label);
}

function chickenStripsLine(packTable: PackTable, pieces: number): string {
  const base = weighedLine(packTable, "chickenStrips", foodLabels.chickenStrips, pieces, "pcs");
  const pack = findPack(packTable, "chickenStrips");
  if (!pack || pack.conversion.kind !== "ozEach") return base;

  const count = containerCountFromPieceCount(pieces, pack.conversion.value, ouncesToPounds(pack.amountPerUnit));
  if (count.fullContainers === 0) return base;
  const bags = `${count.fullContainers} ${pluralize(count.fullContainers, pack.unitLabel, pack.unitPluralLabel)}`;
  return count.exact ? `${base} → open ${bags}` : `${base} → open ${bags} PLUS ${count.leftoverPieces} pcs`;
}

function toppingsLine(totals: AggregateTotals): string | null {
  const parts: string[] = [];
  const toppings = [
    ["tomatoSlices", "tomato slices"],
    ["onionSlices", "onion slices"],
    ["lettuceLeaves", "lettuce leaves"],
    ["pickleChips", "pickle chips"],
  ] as const;
  for (const [resource, noun] of toppings) {
    const value = totals.food[resource] ?? 0;
    if (value > 0) parts.push(`${formatQuantity(value)} ${noun}`);
  }
  return parts.length > 0 ? `Toppings: ${parts.join(", ")}` : null;
}

export function buildFoodLines(totals: AggregateTotals, packTable: PackTable): string[] {
  const { food, packaging, condiments } = totals;
  const lines: string[] = [];

  if (food.eggsOz) lines.push(eggsPrepLine(food.eggsOz));
  if (food.redPotatoesOz) lines.push(ouncesPrepLine(packTable, "redPotatoesOz", foodLabels.redPotatoesOz, food.redPotatoesOz));
  if (food.baconSlices) lines.push(weighedLine(packTable, "baconSlices", foodLabels.baconSlices, food.baconSlices, "slices"));
  if (food.sausageLinks) lines.push(weighedLine(packTable, "sausageLinks", foodLabels.sausageLinks, food.sausageLinks, "links"));
  if (food.hamPieces) lines.push(weighedLine(packTable, "hamPieces", foodLabels.hamPieces, food.hamPieces, "pcs"));
  if (food.pancakes) lines.push(`${foodLabels.pancakes}: ${formatQuantity(food.pancakes)} pancakes`);
  if (food.frenchToastSlices) lines.push(`${foodLabels.frenchToastSlices}: ${formatQuantity(food.frenchToastSlices)} slices`);
  if (food.chickenStrips) lines.push(chickenStripsLine(packTable, food.chickenStrips));
  if (food.friesOz) lines.push(ouncesPrepLine(packTable, "friesOz", foodLabels.friesOz, food.friesOz));
  if (food.onionRings) lines.push(`${foodLabels.onionRings}: ${formatQuantity(food.onionRings)} rings`);
  if (food.steakburgerPatties) lines.push(`${foodLabels.steakburgerPatties}: ${formatQuantity(food.steakburgerPatties)} patties`);
  if (food.crispyChickenFillets) {
    lines.push(`${foodLabels.crispyChickenFillets}: ${formatQuantity(food.crispyChickenFillets)} fillets`);
  }
  if (food.grilledChickenFillets) {
    lines.push(`${foodLabels.grilledChickenFillets}: ${formatQuantity(food.grilledChickenFillets)} fillets`);
  }
  if (food.burgerBuns) lines.push(`${foodLabels.burgerBuns}: ${formatQuantity(food.burgerBuns)} buns`);

  const toppings = toppingsLine(totals);
  if (toppings) lines.push(toppings);

  if (condiments.powderedSugarCups) {
    const cups = condiments.powderedSugarCups;
    lines.push(`Powdered Sugar: ${formatQuantity(cups)} ${pluralize(cups, "cup")} (2 oz)`);
  }

  if (packaging.coffeeBoxes) {
    const boxes = packaging.coffeeBoxes;
    lines.push(`Coffee: ${formatQuantity(boxes)} ${pluralize(boxes, "box", "boxes")} (brew packs: ${formatQuantity(food.coffeePacks ?? 0)})`);
  }

  for (const resource of coldBeverageResources) {
    const bags = food[resource];
    if (!bags) continue;
    lines.push(
      `Cold Beverage Bag: ${formatQuantity(bags)} ${pluralize(bags, "bag")} | ${foodLabels[resource]} (${formatQuantity(bags * COLD_BEVERAGE_BAG_OZ)} oz total)`,
    );
  }

  return lines;
}

/** Guest-facing counts; French toast is plated as two triangles per slice. */
export function buildPlatingReference(totals: AggregateTotals): string[] {
  const { food } = totals;
  const lines: string[] = [];
  if (food.frenchToastSlices) {
    lines.push(`French Toast: ${formatQuantity(food.frenchToastSlices * 2)} triangles (from ${formatQuantity(food.frenchToastSlices)} slices)`);
  }
  if (food.pancakes) lines.push(`Buttermilk Pancakes: ${formatQuantity(food.pancakes)} pancakes`);
  if (food.onionRings) lines.push(`Onion Rings: ${formatQuantity(food.onionRings)} rings`);
  if (food.steakburgerPatties) lines.push(`Steakburgers: ${formatQuantity(food.steakburgerPatties)} assembled`);
  return lines;
}

function countRows<K extends string>(bucket: Readonly<Partial<Record<K, number>>>, labels: Record<K, string>): CountRow[] {
  const rows: CountRow[] = [];
  for (const resource of Object.keys(labels) as K[]) {
    const total = bucket[resource] ?? 0;
    if (total > 0) rows.push({ resource, label: labels[resource], total });
  }
  return rows;
}

export function buildPrepSheet(totals: AggregateTotals, packTable: PackTable): PrepSheet {
  return {
    foodLines: buildFoodLines(totals, packTable),
    platingReference: buildPlatingReference(totals),
    packaging: countRows(totals.packaging, packagingLabels),
    condiments: countRows(totals.condiments, condimentLabels),
    guestware: countRows(totals.guestware, guestwareLabels),
    serviceUtensils: countRows(totals.serviceUtensils, serviceUtensilLabels),
  };
}
