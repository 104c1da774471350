import { readFileSync } from "node:fs";
import {
  catalogConfigSchema,
  packTableSchema,
  type CatalogConfig,
  type PackTable
} from "@catering/contracts";

function readJson(fileUrl: URL): unknown {
  return JSON.parse(readFileSync(fileUrl, "utf8"));
}

/**
 * Parse and validate a catalog configuration. Throws a ZodError when the
 * file drifts from the schema, so a broken catalog fails at startup.
 */
export function parseCatalogConfig(raw: unknown): CatalogConfig {
  return catalogConfigSchema.parse(raw);
}

export function parsePackTable(raw: unknown): PackTable {
  return packTableSchema.parse(raw);
}

export function loadCatalogConfig(fileUrl: URL = new URL("./catalog.json", import.meta.url)): CatalogConfig {
  return parseCatalogConfig(readJson(fileUrl));
}

export function loadPackTable(fileUrl: URL = new URL("./pack-sizes.json", import.meta.url)): PackTable {
  return parsePackTable(readJson(fileUrl));
}

export const defaultCatalog: CatalogConfig = loadCatalogConfig();

export const defaultPackTable: PackTable = loadPackTable();
