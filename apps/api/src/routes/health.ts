import { Router } from "express";
import type { RagService } from "@docqa/core";
import type { HealthResponse } from "@docqa/types";
import { asyncHandler } from "../middleware/error-handler.js";

export interface HealthRouterDependencies {
  rag: RagService;
  name: string;
  version: string;
}

export function createHealthRouter(deps: HealthRouterDependencies): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      message: deps.name,
      version: deps.version,
      health: "/health",
      documents: "/api/documents",
      query: "/api/query",
    });
  });

  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const { indexAvailable, generatorAvailable } = await deps.rag.health();
      const body: HealthResponse = {
        status: indexAvailable && generatorAvailable ? "healthy" : "degraded",
        timestamp: new Date().toISOString(),
        generatorAvailable,
        indexAvailable,
      };
      res.json(body);
    }),
  );

  return router;
}
