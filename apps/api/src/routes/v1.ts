import express from "express";
import { prepReportBodySchema } from "@catering/contracts";
import type { CateringEngine } from "@catering/engine";
import { sendComputationError, sendValidationError } from "../lib/api-error.js";
import type { ApiConfig } from "../lib/config.js";
import { buildPrepReportResponse, describeCatalog } from "../lib/prep-report.js";

export function createV1Router(engine: CateringEngine, config: ApiConfig): express.Router {
  const v1Router = express.Router();

  v1Router.get("/health", (_req, res) => {
    res.json({ ok: true, service: "catering-prep-api", version: "v1", catalogVersion: engine.catalog.version });
  });

  v1Router.get("/catalog", (_req, res) => {
    res.json(describeCatalog(engine.catalog));
  });

  v1Router.post("/prep-report", (req, res) => {
    const parsed = prepReportBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      return res.json(buildPrepReportResponse(engine, parsed.data, config.readyLeadMinutes));
    } catch (error) {
      return sendComputationError(res, error);
    }
  });

  return v1Router;
}
