/**
 * Inventory Impact Projection
 *
 * Read-only projection of aggregated totals onto purchasable supplier units
 * (bags, cases, bottles, loaves). Rows follow the pack table's order and only
 * appear for resources the order actually uses.
 */

import type { AnyResource, PackSize, PackTable } from "@catering/contracts";
import { ceilCount, formatQuantity, friendlyRoundUp, ouncesToPounds, pluralize } from "./units.js";
import type { AggregateTotals, InventoryImpactRow } from "./types.js";

const OUNCES_PER_POUND = 16;

/** Look up any resource across the five buckets. Resource names are unique across buckets. */
export function totalFor(totals: AggregateTotals, resource: AnyResource): number {
  const buckets: ReadonlyArray<Readonly<Partial<Record<string, number>>>> = [
    totals.food,
    totals.packaging,
    totals.condiments,
    totals.guestware,
    totals.serviceUtensils,
  ];
  for (const bucket of buckets) {
    const value = bucket[resource];
    if (typeof value === "number") return value;
  }
  return 0;
}

/** Ounces (weight / volume packs) or pieces (count packs) for a resource quantity. */
export function toPackAmount(pack: PackSize, quantity: number): number {
  switch (pack.conversion.kind) {
    case "ozEach":
      return quantity * pack.conversion.value;
    case "perPound":
      return (quantity / pack.conversion.value) * OUNCES_PER_POUND;
    case "count":
      return quantity;
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function describeAmount(pack: PackSize, quantity: number, amount: number): string {
  let measured: string | null = null;
  if (pack.measure === "weight") {
    measured = `${formatQuantity(friendlyRoundUp(ouncesToPounds(amount)))} lb`;
  } else if (pack.measure === "volume") {
    measured = `${formatQuantity(amount)} fl oz`;
  }

  const counted = pack.countLabel ? `${formatQuantity(quantity)} ${pack.countLabel}` : null;
  if (counted && measured) return `${counted} (${measured})`;
  return counted ?? measured ?? formatQuantity(quantity);
}

export function projectPack(pack: PackSize, quantity: number): InventoryImpactRow {
  const amount = toPackAmount(pack, quantity);
  const purchaseUnits = ceilCount(amount / pack.amountPerUnit);
  const caseFraction = round2(amount / (pack.amountPerUnit * pack.unitsPerCase));
  const unit = pluralize(purchaseUnits, pack.unitLabel, pack.unitPluralLabel);

  return {
    resource: pack.resource,
    itemName: pack.itemName,
    purchaseSku: pack.sku,
    purchaseUnits,
    unitLabel: unit,
    caseFraction,
    impactDescription: `${describeAmount(pack, quantity, amount)} → ${purchaseUnits} ${unit} (≈ ${caseFraction.toFixed(2)} case)`,
  };
}

/**
 * Compute purchasing rows for every pack-table resource with a positive total.
 * Pure: the same totals always yield an equal list, and totals are never touched.
 */
export function computeInventoryImpact(totals: AggregateTotals, packTable: PackTable): InventoryImpactRow[] {
  const rows: InventoryImpactRow[] = [];
  for (const pack of packTable.packs) {
    const quantity = totalFor(totals, pack.resource);
    if (quantity <= 0) continue;
    rows.push(projectPack(pack, quantity));
  }
  return rows;
}
