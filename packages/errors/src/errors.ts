import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      ...options,
    });
  }
}

export class UnsupportedFormatError extends AppError {
  public readonly extension: string;

  constructor(extension: string, allowed: readonly string[], options?: ErrorExtras) {
    super({
      message: `Unsupported file format: ${extension || "(none)"}. Allowed types: ${allowed.join(", ")}`,
      statusCode: 415,
      code: "UNSUPPORTED_FORMAT",
      ...options,
    });
    this.extension = extension;
  }
}

export class ExtractionFailureError extends AppError {
  constructor(message = "Failed to extract text from document", options?: ErrorExtras) {
    super({ message, statusCode: 422, code: "EXTRACTION_FAILURE", ...options });
  }
}

export class EmptyContentError extends AppError {
  constructor(
    message = "No text content could be extracted from the document",
    options?: ErrorExtras,
  ) {
    super({ message, statusCode: 422, code: "EMPTY_CONTENT", ...options });
  }
}

export class IndexUnavailableError extends AppError {
  constructor(message = "Vector index is unavailable", options?: ErrorExtras) {
    super({ message, statusCode: 503, code: "INDEX_UNAVAILABLE", ...options });
  }
}

export class GenerationFailureError extends AppError {
  constructor(message = "Answer generation failed", options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "GENERATION_FAILURE", ...options });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Validation error",
    fields: Record<string, string> = {},
    options?: ErrorExtras,
  ) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...options });
    this.service = service;
  }
}
