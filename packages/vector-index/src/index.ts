import { ConfigurationError } from "@docqa/errors";
import type { Logger } from "@docqa/logger";
import type { VectorIndexConfig } from "@docqa/types";
import type { IVectorIndex } from "./vector-index.interface.js";
import { LocalVectorIndex } from "./local-index.js";
import { QdrantVectorIndex } from "./qdrant-index.js";

export type { IVectorIndex } from "./vector-index.interface.js";
export { LocalVectorIndex } from "./local-index.js";
export type { LocalVectorIndexConfig } from "./local-index.js";
export { QdrantVectorIndex, pointIdFor } from "./qdrant-index.js";
export type { QdrantVectorIndexConfig } from "./qdrant-index.js";
export { cosineDistance } from "./cosine.js";

export function createVectorIndex(config: VectorIndexConfig, logger?: Logger): IVectorIndex {
  switch (config.type) {
    case "local":
      return new LocalVectorIndex({
        persistDir: config.persistDir,
        collectionName: config.collectionName,
        logger,
      });
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ConfigurationError("qdrantUrl is required for the Qdrant vector index");
      }
      return new QdrantVectorIndex({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        collectionName: config.collectionName,
        logger,
      });
    default:
      throw new ConfigurationError(`Unknown vector index type: ${String(config.type)}`);
  }
}
