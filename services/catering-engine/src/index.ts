export * from "./aggregator.js";
export * from "./catalog.js";
export * from "./derivations.js";
export * from "./engine.js";
export * from "./errors.js";
export * from "./inventory-impact.js";
export * from "./order-lines.js";
export * from "./pickup.js";
export * from "./prep-sheet.js";
export * from "./resource-labels.js";
export * from "./selection-key.js";
export type * from "./types.js";
export * from "./units.js";
