import { z } from "zod";
import { ConfigurationError } from "@docqa/errors";
import { DEFAULT_ASSISTANT_ROLE, type AppConfig } from "@docqa/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for every environment variable in .env.example. Validates,
 * transforms and fills defaults so the result maps straight onto AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: positiveInt("8000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Ollama ----------
    OLLAMA_HOST: z.string().url().default("http://localhost:11434"),
    OLLAMA_MODEL: z.string().min(1).default("llama3.2"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["ollama", "cohere"]).default("ollama"),
    EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
    COHERE_API_KEY: z.string().optional(),

    // ---------- Vector index ----------
    VECTOR_INDEX: z.enum(["local", "qdrant"]).default("local"),
    INDEX_PERSIST_DIR: z.string().min(1).default("./vector_index"),
    COLLECTION_NAME: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "COLLECTION_NAME may only contain letters, digits, _ and -")
      .default("documents"),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),

    // ---------- Chunking ----------
    CHUNK_SIZE: positiveInt("500"),
    CHUNK_OVERLAP: nonNegativeInt("100"),

    // ---------- Storage & retrieval ----------
    UPLOAD_DIR: z.string().min(1).default("./uploads"),
    TOP_K_RESULTS: positiveInt("3"),

    // ---------- Generation ----------
    GENERATION_TEMPERATURE: z
      .string()
      .default("0.7")
      .transform(Number)
      .pipe(z.number().min(0).max(2)),
    GENERATION_MAX_TOKENS: positiveInt("512"),
    ASSISTANT_ROLE: z.string().min(1).default(DEFAULT_ASSISTANT_ROLE),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.VECTOR_INDEX === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_INDEX is qdrant",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) into an
 * {@link AppConfig}.
 *
 * Throws a ConfigurationError listing every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const fields = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid environment: ${fields.join("; ")}`, {
      details: { issues: fields },
    });
  }

  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    ollama: {
      host: parsed.OLLAMA_HOST,
      model: parsed.OLLAMA_MODEL,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      cohereApiKey: parsed.COHERE_API_KEY,
    },

    vectorIndex: {
      type: parsed.VECTOR_INDEX,
      collectionName: parsed.COLLECTION_NAME,
      persistDir: parsed.INDEX_PERSIST_DIR,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    generation: {
      temperature: parsed.GENERATION_TEMPERATURE,
      maxTokens: parsed.GENERATION_MAX_TOKENS,
      assistantRole: parsed.ASSISTANT_ROLE,
    },

    uploadDir: parsed.UPLOAD_DIR,
    topK: parsed.TOP_K_RESULTS,
  };
}
