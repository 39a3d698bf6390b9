import { Router } from "express";
import { z } from "zod";
import { EMPTY_INDEX_ANSWER, type RagService } from "@docqa/core";
import { ValidationError } from "@docqa/errors";
import { asyncHandler } from "../middleware/error-handler.js";

export const queryRequestSchema = z.object({
  query: z.string().trim().min(1, "Query must not be empty"),
  topK: z.number().int().min(1).max(10).optional(),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

function fieldMessages(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "body";
    fields[key] ??= issue.message;
  }
  return fields;
}

export function createQueryRouter(deps: { rag: RagService }): Router {
  const router = Router();

  router.post(
    "/query",
    asyncHandler(async (req, res) => {
      const parsed = queryRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError("Invalid query request", fieldMessages(parsed.error));
      }

      if (await deps.rag.isEmpty()) {
        throw new ValidationError(EMPTY_INDEX_ANSWER);
      }

      res.json(await deps.rag.ask(parsed.data.query, parsed.data.topK));
    }),
  );

  router.get(
    "/stats",
    asyncHandler(async (_req, res) => {
      res.json(await deps.rag.stats());
    }),
  );

  return router;
}
