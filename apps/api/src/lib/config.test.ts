import { describe, expect, it } from "vitest";
import { loadApiConfig } from "./config.js";

describe("loadApiConfig", () => {
  it("falls back to defaults", () => {
    expect(loadApiConfig({})).toEqual({ port: 4000, readyLeadMinutes: 10, catalogPath: undefined });
  });

  it("coerces numeric variables", () => {
    expect(loadApiConfig({ PORT: "8080", READY_LEAD_MINUTES: "15", CATALOG_PATH: " ./menu.json " })).toEqual({
      port: 8080,
      readyLeadMinutes: 15,
      catalogPath: "./menu.json"
    });
  });

  it("rejects a malformed port", () => {
    expect(() => loadApiConfig({ PORT: "not-a-port" })).toThrow();
  });
});
