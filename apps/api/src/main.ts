import "dotenv/config";
import { SlidingWindowChunker } from "@docqa/chunker";
import { parseEnv } from "@docqa/config";
import { AnswerGenerator, PromptBuilder, RagService } from "@docqa/core";
import { createEmbeddingProvider } from "@docqa/embeddings";
import { errorMessage } from "@docqa/errors";
import { OllamaGenerationBackend } from "@docqa/generator";
import { createChildLogger, createLogger } from "@docqa/logger";
import { createVectorIndex } from "@docqa/vector-index";
import { createApp } from "./app.js";
import { UploadStore } from "./upload-store.js";

async function main(): Promise<void> {
  const config = parseEnv(process.env);
  const logger = createLogger({ level: config.logLevel, service: "docqa-api" });

  const embedder = createEmbeddingProvider({
    provider: config.embedding.provider,
    ollama: { host: config.ollama.host, model: config.embedding.model },
    cohere: config.embedding.cohereApiKey
      ? { apiKey: config.embedding.cohereApiKey, model: config.embedding.model }
      : undefined,
  });
  const index = createVectorIndex(
    config.vectorIndex,
    createChildLogger(logger, { component: "vector-index" }),
  );
  const generator = new AnswerGenerator({
    backend: new OllamaGenerationBackend({ host: config.ollama.host }),
    model: config.ollama.model,
    options: {
      temperature: config.generation.temperature,
      maxTokens: config.generation.maxTokens,
    },
    promptBuilder: new PromptBuilder(config.generation.assistantRole),
    logger: createChildLogger(logger, { component: "generator" }),
  });

  const rag = new RagService({
    chunker: new SlidingWindowChunker(config.chunking),
    embedder,
    index,
    generator,
    defaultTopK: config.topK,
    logger: createChildLogger(logger, { component: "rag" }),
  });

  const uploads = new UploadStore(config.uploadDir, logger);
  const app = createApp({ rag, uploads, logger });

  logger.info(
    {
      ollamaHost: config.ollama.host,
      model: config.ollama.model,
      embedding: `${embedder.name}/${embedder.model}`,
      vectorIndex: config.vectorIndex.type,
      collection: config.vectorIndex.collectionName,
      uploadDir: uploads.directory,
    },
    "Starting API",
  );
  try {
    logger.info(await rag.stats(), "Index ready");
  } catch (err: unknown) {
    // The API still starts; /health reports the index as unavailable.
    logger.warn({ err }, "Index not readable at startup");
  }

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "API listening");
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error(`[api] Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
