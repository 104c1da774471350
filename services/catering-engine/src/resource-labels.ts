import type {
  CondimentResource,
  FoodResource,
  GuestwareResource,
  PackagingResource,
  ServiceUtensilResource,
} from "@catering/contracts";

// Exhaustive by type: adding a resource identifier without a label fails the type-check.

export const foodLabels: Record<FoodResource, string> = {
  eggsOz: "Scrambled Eggs",
  redPotatoesOz: "Red Pots",
  baconSlices: "Bacon",
  sausageLinks: "Pork Sausage Links",
  hamPieces: "Sampler Ham",
  pancakes: "Buttermilk Pancakes",
  frenchToastSlices: "French Toast",
  chickenStrips: "Chicken Strips",
  friesOz: "French Fries",
  onionRings: "Onion Rings",
  steakburgerPatties: "Steakburgers",
  crispyChickenFillets: "Crispy Chicken Fillets",
  grilledChickenFillets: "Grilled Chicken Fillets",
  burgerBuns: "Burger Buns",
  tomatoSlices: "Tomato Slices",
  onionSlices: "Onion Slices",
  lettuceLeaves: "Lettuce Leaves",
  pickleChips: "Pickle Chips",
  coffeePacks: "Coffee Brew Packs",
  "ColdBeverage::AppleJuice": "Apple Juice",
  "ColdBeverage::OrangeJuice": "Orange Juice",
  "ColdBeverage::IcedTea": "Iced Tea",
  "ColdBeverage::Lemonade": "Lemonade",
  "ColdBeverage::Soda": "Soda",
};

export const packagingLabels: Record<PackagingResource, string> = {
  halfPans: "Aluminum Half Pans",
  largeBases: "Plastic Large Bases",
  soupCups: "Soup Cups",
  coffeeBoxes: "Coffee Boxes",
  coldBeveragePouches: "Cold Beverage Pouches",
};

export const condimentLabels: Record<CondimentResource, string> = {
  butterPackets: "Butter Packets",
  syrupPackets: "Syrup Packets",
  ketchupPackets: "Ketchup Packets",
  mayoPackets: "Mayo Packets",
  mustardPackets: "Mustard Packets",
  powderedSugarCups: "Powdered Sugar (2 oz cups)",
  sugarPackets: "Sugar Packets",
  creamerCups: "Creamer Cups",
};

export const guestwareLabels: Record<GuestwareResource, string> = {
  plates: "Plates",
  napkins: "Napkins",
  cutlerySets: "Wrapped Cutlery Sets",
  hotCups: "Hot Cups",
  hotCupLids: "Hot Cup Lids",
  stirrers: "Stirrers",
  coldCups: "Cold Cups",
  coldCupLids: "Cold Cup Lids",
  straws: "Straws",
};

export const serviceUtensilLabels: Record<ServiceUtensilResource, string> = {
  servingForks: "Serving Forks",
  servingTongs: "Serving Tongs",
  servingSpoons: "Serving Spoons",
};
