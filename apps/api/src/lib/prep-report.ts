import type { OrderLineBody, PrepReportBody } from "@catering/contracts";
import {
  buildComboLine,
  buildMenuItemLine,
  createOrderLine,
  createSelectionKey,
  formatServiceTime,
  getModifier,
  lookup,
  Modifier,
  type Catalog,
  type CateringEngine,
  type OrderLine,
  type PrepReport
} from "@catering/engine";

/**
 * Turn a request line into an order line. Kind and item are checked against
 * the catalog first; the builders then canonicalize option ids and labels.
 * A caller-supplied display label replaces the generated one.
 */
export function toOrderLine(catalog: Catalog, body: OrderLineBody): OrderLine {
  const probe = createSelectionKey(body.kind, body.itemId, body.modifiers);
  const entry = lookup(catalog, probe);

  const line =
    entry.kind === "ComboBox"
      ? buildComboLine(catalog, {
          tierId: entry.tier.id,
          protein: getModifier(probe.modifiers, Modifier.PROTEIN) ?? "",
          griddleChoice: getModifier(probe.modifiers, Modifier.GRIDDLE_CHOICE) ?? "",
          quantity: body.quantity
        })
      : buildMenuItemLine(catalog, {
          itemId: entry.item.id,
          quantity: body.quantity,
          beverageType: getModifier(probe.modifiers, Modifier.BEVERAGE_TYPE)
        });

  return body.displayLabel ? createOrderLine(line.key, body.displayLabel, line.quantity) : line;
}

export type PrepReportResponse = Omit<PrepReport, "pickup"> & {
  pickup: {
    pickupAt: string;
    readyAt: string;
    pickupLocal: string;
    readyLocal: string;
    leadMinutes: number;
  } | null;
};

export function buildPrepReportResponse(
  engine: CateringEngine,
  body: PrepReportBody,
  readyLeadMinutes: number
): PrepReportResponse {
  const report = engine.buildPrepReport({
    lines: body.lines.map((line) => toOrderLine(engine.catalog, line)),
    headcount: body.headcount,
    toggles: body.toggles,
    pickupAt: body.pickupAt ? new Date(body.pickupAt) : undefined,
    readyLeadMinutes
  });

  const { pickup } = report;
  return {
    ...report,
    pickup: pickup
      ? {
          pickupAt: pickup.pickupAt.toISOString(),
          readyAt: pickup.readyAt.toISOString(),
          pickupLocal: formatServiceTime(pickup.pickupAt),
          readyLocal: formatServiceTime(pickup.readyAt),
          leadMinutes: pickup.leadMinutes
        }
      : null
  };
}

/** Catalog summary for clients building an order form. */
export function describeCatalog(catalog: Catalog) {
  return {
    version: catalog.version,
    comboTiers: catalog.comboTiers.map((t) => ({ id: t.id, label: t.label, servings: t.servings })),
    proteins: catalog.proteins.map((p) => ({ id: p.id, label: p.label })),
    griddleChoices: catalog.griddleChoices,
    beverageTypes: catalog.beverageTypes.map((b) => ({ id: b.id, label: b.label })),
    items: catalog.items.map((i) => ({
      id: i.id,
      label: i.label,
      group: i.group,
      kind: i.kind,
      category: i.category,
      servings: i.servings,
      requiresBeverageType: i.coldBeverageBags !== undefined
    }))
  };
}
