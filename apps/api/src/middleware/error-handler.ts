import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from "express";
import multer from "multer";
import { AppError, ValidationError } from "@docqa/errors";
import type { Logger } from "@docqa/logger";
import type { ApiErrorResponse } from "@docqa/types";
import { getRequestId } from "./request-context.js";

interface ErrorReply {
  statusCode: number;
  body: ApiErrorResponse;
}

export function toErrorReply(err: unknown, requestId: string): ErrorReply {
  if (err instanceof ValidationError) {
    const hasFields = Object.keys(err.fields).length > 0;
    return {
      statusCode: err.statusCode,
      body: {
        success: false,
        error: {
          code: err.code,
          message: err.message,
          requestId,
          ...(hasFields ? { details: err.fields } : {}),
        },
      },
    };
  }

  if (AppError.isAppError(err)) {
    return {
      statusCode: err.statusCode,
      body: {
        success: false,
        error: {
          code: err.code,
          message: err.message,
          requestId,
          ...(err.details ? { details: err.details } : {}),
        },
      },
    };
  }

  if (err instanceof multer.MulterError) {
    const tooLarge = err.code === "LIMIT_FILE_SIZE";
    return {
      statusCode: tooLarge ? 413 : 400,
      body: {
        success: false,
        error: {
          code: tooLarge ? "PAYLOAD_TOO_LARGE" : "VALIDATION_ERROR",
          message: err.message,
          requestId,
        },
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
    },
  };
}

/**
 * Final error middleware. Operational errors answer with their own status and
 * message; anything else is logged with its stack and answered with a bare 500.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = getRequestId(req);
    const { statusCode, body } = toErrorReply(err, requestId);
    const log = req.logger ?? logger;

    if (statusCode >= 500) {
      log.error({ err, statusCode }, "Request failed");
    } else {
      log.warn({ code: body.error.code, statusCode, message: body.error.message }, "Request rejected");
    }

    res.status(statusCode).json(body);
  };
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    success: false,
    error: {
      code: "NOT_FOUND",
      message: `Route ${req.method} ${req.path} not found`,
      requestId: getRequestId(req),
    },
  } satisfies ApiErrorResponse);
};

/** Forward rejections from async route handlers to the error middleware. */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}
