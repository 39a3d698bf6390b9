/**
 * Property names whose values never reach log output. API keys for the
 * embedding provider and Qdrant travel inside config objects, so one nesting
 * level is covered as well.
 */
const SECRET_KEYS = ["apiKey", "cohereApiKey", "qdrantApiKey", "authorization", "token", "password", "secret"];

export const REDACT_PATHS: string[] = [
  ...SECRET_KEYS,
  ...SECRET_KEYS.map((key) => `*.${key}`),
  "req.headers.authorization",
];

export const REDACTED = "[REDACTED]";
