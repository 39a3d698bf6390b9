import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { createChildLogger, type Logger } from "@docqa/logger";

// Extend Express Request with requestId and a request-scoped logger
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      logger?: Logger;
    }
  }
}

const REQUEST_ID_HEADER = "x-request-id";

/**
 * Tag every request with an id (the caller's `x-request-id` when present)
 * and a child logger that carries it.
 */
export function createRequestContext(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.header(REQUEST_ID_HEADER);
    const requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();

    req.requestId = requestId;
    req.logger = createChildLogger(logger, { requestId });
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const startedAt = Date.now();
    res.on("finish", () => {
      req.logger?.info(
        {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "Request completed",
      );
    });

    next();
  };
}

export function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}
