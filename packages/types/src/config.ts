import type { ChunkingConfig } from "./chunk.js";
import type { GenerationOptions } from "./pipeline.js";

export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EmbeddingProviderType = "ollama" | "cohere";

export type VectorIndexType = "local" | "qdrant";

export interface AppConfig {
  nodeEnv: NodeEnv;
  port: number;
  logLevel: LogLevel;
  ollama: OllamaConfig;
  embedding: EmbeddingConfig;
  vectorIndex: VectorIndexConfig;
  chunking: ChunkingConfig;
  generation: GenerationConfig;
  uploadDir: string;
  topK: number;
}

export interface OllamaConfig {
  host: string;
  model: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  model: string;
  cohereApiKey?: string;
}

export interface VectorIndexConfig {
  type: VectorIndexType;
  collectionName: string;
  persistDir: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}

export interface GenerationConfig extends GenerationOptions {
  assistantRole: string;
}

/** Opening line of every prompt unless ASSISTANT_ROLE overrides it. */
export const DEFAULT_ASSISTANT_ROLE =
  "You are a helpful AI assistant. Answer the user's question based on the provided context from the uploaded documents.";
