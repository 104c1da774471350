export * from "./resources.js";
export * from "./schemas.js";
