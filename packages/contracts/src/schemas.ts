import { z } from "zod";
import {
  allResources,
  coldBeverageResources,
  condimentResources,
  foodResources,
  guestwareResources,
  packagingResources,
  selectionKinds,
  serviceUtensilResources
} from "./resources.js";

export const foodResourceSchema = z.enum(foodResources);
export const packagingResourceSchema = z.enum(packagingResources);
export const condimentResourceSchema = z.enum(condimentResources);
export const guestwareResourceSchema = z.enum(guestwareResources);
export const serviceUtensilResourceSchema = z.enum(serviceUtensilResources);
export const anyResourceSchema = z.enum(allResources);

const deltaQuantitySchema = z.number().finite().nonnegative();

// ============================================================================
// CATALOG CONFIGURATION
// ============================================================================

/** Per-unit resource consumption across the five buckets. Absent buckets contribute nothing. */
export const resourceDeltasSchema = z
  .object({
    food: z.record(foodResourceSchema, deltaQuantitySchema).optional(),
    packaging: z.record(packagingResourceSchema, deltaQuantitySchema).optional(),
    condiments: z.record(condimentResourceSchema, deltaQuantitySchema).optional(),
    guestware: z.record(guestwareResourceSchema, deltaQuantitySchema).optional(),
    serviceUtensils: z.record(serviceUtensilResourceSchema, deltaQuantitySchema).optional()
  })
  .strict();

const optionIdSchema = z.string().trim().min(1);

export const proteinOptionSchema = z.object({
  id: optionIdSchema,
  label: z.string().min(1),
  /** Food bucket that receives the tier's protein piece count. */
  food: foodResourceSchema
});

export const griddleOptionSchema = z.object({
  id: optionIdSchema,
  label: z.string().min(1)
});

export const beverageOptionSchema = z.object({
  id: optionIdSchema,
  label: z.string().min(1),
  food: z.enum(coldBeverageResources)
});

export const comboTierSchema = z.object({
  id: optionIdSchema,
  label: z.string().min(1),
  servings: z.number().int().nonnegative(),
  eggs: resourceDeltasSchema,
  potatoes: resourceDeltasSchema,
  protein: z.object({
    pieces: z.number().int().nonnegative(),
    deltas: resourceDeltasSchema
  }),
  /** One recipe per griddle choice id; only the chosen one is applied. */
  griddle: z.record(z.string(), resourceDeltasSchema),
  service: resourceDeltasSchema
});

export const menuItemSchema = z.object({
  id: optionIdSchema,
  label: z.string().min(1),
  group: z.string().min(1),
  kind: z.enum(["MainItem", "AlaCarteItem"]),
  category: z.enum(["food", "beverage"]),
  servings: z.number().int().nonnegative(),
  deltas: resourceDeltasSchema,
  /** Bags routed into the food bucket of the chosen beverage type. */
  coldBeverageBags: z.number().int().positive().optional()
});

function findDuplicate(ids: string[]): string | undefined {
  const seen = new Set<string>();
  for (const id of ids) {
    const normalized = id.trim().toLowerCase();
    if (seen.has(normalized)) return id;
    seen.add(normalized);
  }
  return undefined;
}

export const catalogConfigSchema = z
  .object({
    version: z.string().min(1),
    proteins: z.array(proteinOptionSchema).min(1),
    griddleChoices: z.array(griddleOptionSchema).min(1),
    beverageTypes: z.array(beverageOptionSchema),
    comboTiers: z.array(comboTierSchema).min(1),
    items: z.array(menuItemSchema)
  })
  .superRefine((catalog, ctx) => {
    const catalogIds = [...catalog.comboTiers.map((t) => t.id), ...catalog.items.map((i) => i.id)];
    const duplicate = findDuplicate(catalogIds);
    if (duplicate) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate catalog id: ${duplicate}` });
    }

    for (const [index, tier] of catalog.comboTiers.entries()) {
      for (const choice of catalog.griddleChoices) {
        if (!tier.griddle[choice.id]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["comboTiers", index, "griddle"],
            message: `Tier ${tier.id} has no recipe for griddle choice ${choice.id}`
          });
        }
      }
    }

    for (const [index, item] of catalog.items.entries()) {
      if (item.coldBeverageBags !== undefined && item.category !== "beverage") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["items", index, "category"],
          message: `Item ${item.id} routes beverage bags but is not a beverage`
        });
      }
    }
  });

export type ResourceDeltas = z.infer<typeof resourceDeltasSchema>;
export type ProteinOption = z.infer<typeof proteinOptionSchema>;
export type GriddleOption = z.infer<typeof griddleOptionSchema>;
export type BeverageOption = z.infer<typeof beverageOptionSchema>;
export type ComboTierSpec = z.infer<typeof comboTierSchema>;
export type MenuItemSpec = z.infer<typeof menuItemSchema>;
export type CatalogConfig = z.infer<typeof catalogConfigSchema>;

// ============================================================================
// SKU PACK SIZES
// ============================================================================

export const packConversionSchema = z.discriminatedUnion("kind", [
  /** Each resource unit weighs (or holds) `value` ounces. */
  z.object({ kind: z.literal("ozEach"), value: z.number().positive() }),
  /** `value` resource units make one pound. */
  z.object({ kind: z.literal("perPound"), value: z.number().positive() }),
  /** Resource units are counted directly. */
  z.object({ kind: z.literal("count") })
]);

export const packSizeSchema = z
  .object({
    resource: anyResourceSchema,
    itemName: z.string().min(1),
    sku: z.string().min(1),
    measure: z.enum(["weight", "volume", "count"]),
    conversion: packConversionSchema,
    /** Ounces (weight, volume) or pieces (count) in one purchasable unit. */
    amountPerUnit: z.number().positive(),
    unitLabel: z.string().min(1),
    unitPluralLabel: z.string().min(1).optional(),
    unitsPerCase: z.number().int().positive(),
    countLabel: z.string().min(1).optional()
  })
  .superRefine((pack, ctx) => {
    const counted = pack.conversion.kind === "count";
    if (counted !== (pack.measure === "count")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["conversion"],
        message: `Pack ${pack.sku}: count measure requires count conversion and vice versa`
      });
    }
    if (pack.measure === "count" && !pack.countLabel) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["countLabel"], message: `Pack ${pack.sku}: countLabel required` });
    }
  });

export const packTableSchema = z.object({
  version: z.string().min(1),
  packs: z.array(packSizeSchema)
});

export type PackConversion = z.infer<typeof packConversionSchema>;
export type PackSize = z.infer<typeof packSizeSchema>;
export type PackTable = z.infer<typeof packTableSchema>;

// ============================================================================
// REQUEST BODY SCHEMAS (for API input validation)
// ============================================================================

export const orderLineBodySchema = z.object({
  kind: z.enum(selectionKinds),
  itemId: z.string().trim().min(1),
  modifiers: z.record(z.string()).default({}),
  quantity: z.number().int().positive(),
  displayLabel: z.string().trim().min(1).optional()
});

export const guestRequestTogglesSchema = z.object({
  plates: z.boolean(),
  napkins: z.boolean(),
  utensils: z.boolean()
});

export const prepReportBodySchema = z.object({
  lines: z.array(orderLineBodySchema).min(1),
  headcount: z.number().int().nonnegative().default(0),
  toggles: guestRequestTogglesSchema,
  pickupAt: z.string().datetime({ offset: true }).optional()
});

export type OrderLineBody = z.infer<typeof orderLineBodySchema>;
export type GuestRequestToggles = z.infer<typeof guestRequestTogglesSchema>;
export type PrepReportBody = z.infer<typeof prepReportBodySchema>;
