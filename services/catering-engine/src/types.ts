import type {
  AnyResource,
  CatalogConfig,
  ComboTierSpec,
  CondimentResource,
  FoodResource,
  GuestwareResource,
  MenuItemSpec,
  PackagingResource,
  ResourceCategory,
  ResourceOf,
  SelectionKind,
  ServiceUtensilResource
} from "@catering/contracts";

export type { GuestRequestToggles } from "@catering/contracts";

export type Catalog = CatalogConfig;

export type SelectionModifiers = Readonly<Record<string, string>>;

export type SelectionKey = {
  readonly kind: SelectionKind;
  readonly itemId: string;
  readonly modifiers: SelectionModifiers;
};

export type OrderLine = {
  readonly key: SelectionKey;
  readonly displayLabel: string;
  readonly quantity: number;
};

/** The working order, owned by the caller and replaced (never mutated) on every change. */
export type OrderState = {
  readonly lines: readonly OrderLine[];
};

export type CatalogEntry =
  | { kind: "ComboBox"; tier: ComboTierSpec }
  | { kind: "MainItem" | "AlaCarteItem"; item: MenuItemSpec };

export type ResourceTotals<K extends string> = Readonly<Partial<Record<K, number>>>;

export type AggregateTotals = {
  readonly food: ResourceTotals<FoodResource>;
  readonly packaging: ResourceTotals<PackagingResource>;
  readonly condiments: ResourceTotals<CondimentResource>;
  readonly guestware: ResourceTotals<GuestwareResource>;
  readonly serviceUtensils: ResourceTotals<ServiceUtensilResource>;
};

export type MutableTotals = {
  [C in ResourceCategory]: Partial<Record<ResourceOf<C>, number>>;
};

export type InventoryImpactRow = {
  resource: AnyResource;
  itemName: string;
  purchaseSku: string;
  purchaseUnits: number;
  unitLabel: string;
  caseFraction: number;
  impactDescription: string;
};
