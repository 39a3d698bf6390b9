export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ConfigurationError,
  UnsupportedFormatError,
  ExtractionFailureError,
  EmptyContentError,
  IndexUnavailableError,
  GenerationFailureError,
  NotFoundError,
  ValidationError,
  ExternalServiceError,
} from "./errors.js";
