import { ConfigurationError } from "@docqa/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { OllamaEmbeddingProvider } from "./ollama-provider.js";
import type { OllamaProviderConfig } from "./ollama-provider.js";

export type EmbeddingProviderType = "ollama" | "cohere";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  ollama?: OllamaProviderConfig;
  cohere?: CohereProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "ollama":
      if (!config.ollama) {
        throw new ConfigurationError("Ollama config is required when provider is 'ollama'");
      }
      return new OllamaEmbeddingProvider(config.ollama);
    case "cohere":
      if (!config.cohere) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
