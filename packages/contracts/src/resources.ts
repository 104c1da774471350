export const coldBeverageTypes = ["AppleJuice", "OrangeJuice", "IcedTea", "Lemonade", "Soda"] as const;

export type ColdBeverageType = (typeof coldBeverageTypes)[number];

export type ColdBeverageResource = `ColdBeverage::${ColdBeverageType}`;

export const coldBeverageResources = [
  "ColdBeverage::AppleJuice",
  "ColdBeverage::OrangeJuice",
  "ColdBeverage::IcedTea",
  "ColdBeverage::Lemonade",
  "ColdBeverage::Soda"
] as const satisfies readonly ColdBeverageResource[];

export const foodResources = [
  "eggsOz",
  "redPotatoesOz",
  "baconSlices",
  "sausageLinks",
  "hamPieces",
  "pancakes",
  "frenchToastSlices",
  "chickenStrips",
  "friesOz",
  "onionRings",
  "steakburgerPatties",
  "crispyChickenFillets",
  "grilledChickenFillets",
  "burgerBuns",
  "tomatoSlices",
  "onionSlices",
  "lettuceLeaves",
  "pickleChips",
  "coffeePacks",
  ...coldBeverageResources
] as const;

export type FoodResource = (typeof foodResources)[number];

export const packagingResources = ["halfPans", "largeBases", "soupCups", "coffeeBoxes", "coldBeveragePouches"] as const;

export type PackagingResource = (typeof packagingResources)[number];

export const condimentResources = [
  "butterPackets",
  "syrupPackets",
  "ketchupPackets",
  "mayoPackets",
  "mustardPackets",
  "powderedSugarCups",
  "sugarPackets",
  "creamerCups"
] as const;

export type CondimentResource = (typeof condimentResources)[number];

export const guestwareResources = [
  "plates",
  "napkins",
  "cutlerySets",
  "hotCups",
  "hotCupLids",
  "stirrers",
  "coldCups",
  "coldCupLids",
  "straws"
] as const;

export type GuestwareResource = (typeof guestwareResources)[number];

export const serviceUtensilResources = ["servingForks", "servingTongs", "servingSpoons"] as const;

export type ServiceUtensilResource = (typeof serviceUtensilResources)[number];

/** The five independent accumulation buckets. */
export const resourceCategories = ["food", "packaging", "condiments", "guestware", "serviceUtensils"] as const;

export type ResourceCategory = (typeof resourceCategories)[number];

export type ResourceOf<C extends ResourceCategory> = {
  food: FoodResource;
  packaging: PackagingResource;
  condiments: CondimentResource;
  guestware: GuestwareResource;
  serviceUtensils: ServiceUtensilResource;
}[C];

export const allResources = [
  ...foodResources,
  ...packagingResources,
  ...condimentResources,
  ...guestwareResources,
  ...serviceUtensilResources
] as const;

export type AnyResource = (typeof allResources)[number];

export const selectionKinds = ["ComboBox", "MainItem", "AlaCarteItem"] as const;

export type SelectionKind = (typeof selectionKinds)[number];
