import type { PackTable } from "@catering/contracts";
import { aggregate } from "./aggregator.js";
import { applyDerivations, computeTotalServings, recommendUtensilSets } from "./derivations.js";
import { computeInventoryImpact } from "./inventory-impact.js";
import { addOrMergeLine, assertOrderInvariants, emptyOrder } from "./order-lines.js";
import { computePickupWindow, DEFAULT_READY_LEAD_MINUTES, type PickupWindow } from "./pickup.js";
import { buildPrepSheet, type PrepSheet } from "./prep-sheet.js";
import type {
  AggregateTotals,
  Catalog,
  GuestRequestToggles,
  InventoryImpactRow,
  OrderLine,
} from "./types.js";

export interface PrepReportInput {
  lines: readonly OrderLine[];
  headcount: number;
  toggles: GuestRequestToggles;
  pickupAt?: Date;
  readyLeadMinutes?: number;
}

export interface PrepReport {
  lines: readonly OrderLine[];
  totalServings: number;
  headcount: number;
  recommendedUtensilSets: number;
  totals: AggregateTotals;
  inventoryImpact: InventoryImpactRow[];
  prepSheet: PrepSheet;
  pickup: PickupWindow | null;
}

export interface CateringEngine {
  readonly catalog: Catalog;
  readonly packTable: PackTable;
  aggregate(lines: readonly OrderLine[]): AggregateTotals;
  computeTotalServings(lines: readonly OrderLine[]): number;
  applyDerivations(
    totals: AggregateTotals,
    headcount: number,
    toggles: GuestRequestToggles,
    lines: readonly OrderLine[],
  ): AggregateTotals;
  computeInventoryImpact(totals: AggregateTotals): InventoryImpactRow[];
  buildPrepReport(input: PrepReportInput): PrepReport;
}

/**
 * Bind the catalog and pack table once and expose the calculation pipeline.
 * Every call recomputes from scratch; nothing is cached between calls.
 */
export function createCateringEngine(catalog: Catalog, packTable: PackTable): CateringEngine {
  const engine: CateringEngine = {
    catalog,
    packTable,
    aggregate: (lines) => aggregate(lines, catalog),
    computeTotalServings: (lines) => computeTotalServings(lines, catalog),
    applyDerivations: (totals, headcount, toggles, lines) =>
      applyDerivations(totals, { headcount, totalServings: computeTotalServings(lines, catalog), toggles }),
    computeInventoryImpact: (totals) => computeInventoryImpact(totals, packTable),
    buildPrepReport: (input) => {
      // Incoming lines may repeat a selection; merging keeps one line per key.
      const merged = input.lines.reduce(addOrMergeLine, emptyOrder()).lines;
      assertOrderInvariants(merged);
      const totalServings = computeTotalServings(merged, catalog);
      const raw = aggregate(merged, catalog);
      const totals = applyDerivations(raw, { headcount: input.headcount, totalServings, toggles: input.toggles });

      return {
        lines: merged,
        totalServings,
        headcount: input.headcount,
        recommendedUtensilSets: recommendUtensilSets(input.headcount),
        totals,
        inventoryImpact: computeInventoryImpact(totals, packTable),
        prepSheet: buildPrepSheet(totals, packTable),
        pickup: input.pickupAt
          ? computePickupWindow(input.pickupAt, input.readyLeadMinutes ?? DEFAULT_READY_LEAD_MINUTES)
          : null,
      };
    },
  };
  return engine;
}
