import fs from "node:fs";
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { config as loadEnv } from "dotenv";
import cors from "cors";
import express from "express";
import { defaultCatalog, defaultPackTable, loadCatalogConfig } from "@catering/data";
import { createCateringEngine } from "@catering/engine";
import { handleRequestError, send404 } from "./lib/api-error.js";
import { loadApiConfig } from "./lib/config.js";
import { createV1Router } from "./routes/v1.js";

function bootstrapEnv() {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "../../.env"),
    path.resolve(here, "../../../.env"),
  ];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return;
  }
}

bootstrapEnv();

const config = loadApiConfig();
const catalog = config.catalogPath
  ? loadCatalogConfig(pathToFileURL(path.resolve(config.catalogPath)))
  : defaultCatalog;
const engine = createCateringEngine(catalog, defaultPackTable);

const app = express();
app.use(cors());
app.use(express.json({ limit: "1mb" }));
app.use("/v1", createV1Router(engine, config));
app.use((_req, res) => send404(res, "route"));
app.use(handleRequestError);

app.listen(config.port, () => {
  console.log(`catering-prep API listening on :${config.port} (catalog ${catalog.version})`);
});
