import express, { type Express } from "express";
import type { RagService } from "@docqa/core";
import type { Logger } from "@docqa/logger";
import { extractText, type ParseResult } from "@docqa/parser";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { createRequestContext } from "./middleware/request-context.js";
import { createDocumentRouter } from "./routes/documents.js";
import { createHealthRouter } from "./routes/health.js";
import { createQueryRouter } from "./routes/query.js";
import type { UploadStore } from "./upload-store.js";

export const API_NAME = "Document Q&A API";
export const API_VERSION = "1.0.0";

const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export interface AppDependencies {
  rag: RagService;
  uploads: UploadStore;
  logger: Logger;
  /** Text extraction for stored uploads. Defaults to the parser package. */
  extract?: (filePath: string) => Promise<ParseResult>;
  maxUploadBytes?: number;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(createRequestContext(deps.logger));
  app.use(express.json({ limit: "1mb" }));

  app.use(createHealthRouter({ rag: deps.rag, name: API_NAME, version: API_VERSION }));
  app.use(
    "/api/documents",
    createDocumentRouter({
      rag: deps.rag,
      uploads: deps.uploads,
      extract: deps.extract ?? extractText,
      maxUploadBytes: deps.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES,
    }),
  );
  app.use("/api", createQueryRouter({ rag: deps.rag }));

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.logger));

  return app;
}
