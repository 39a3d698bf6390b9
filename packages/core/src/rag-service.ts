import type { IChunker } from "@docqa/chunker";
import type { IEmbeddingProvider } from "@docqa/embeddings";
import { createSilentLogger, type Logger } from "@docqa/logger";
import type { Document, IndexStats, QueryResponse } from "@docqa/types";
import type { IVectorIndex } from "@docqa/vector-index";
import type { AnswerGenerator } from "./answer-generator.js";
import { ingest } from "./ingestion-pipeline.js";
import { Retriever } from "./retriever.js";

export const EMPTY_INDEX_ANSWER =
  "No documents have been indexed yet. Please upload documents first.";

export interface RagServiceDependencies {
  chunker: IChunker;
  embedder: IEmbeddingProvider;
  index: IVectorIndex;
  generator: AnswerGenerator;
  /** Results per question when `ask` is called without `topK`. */
  defaultTopK: number;
  logger?: Logger;
}

/**
 * Entry point for everything the HTTP layer does with documents: ingest,
 * ask, remove, list and count.
 */
export class RagService {
  private readonly chunker: IChunker;
  private readonly embedder: IEmbeddingProvider;
  private readonly index: IVectorIndex;
  private readonly generator: AnswerGenerator;
  private readonly retriever: Retriever;
  private readonly defaultTopK: number;
  private readonly logger: Logger;

  constructor(deps: RagServiceDependencies) {
    this.chunker = deps.chunker;
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.generator = deps.generator;
    this.retriever = new Retriever(deps.index);
    this.defaultTopK = deps.defaultTopK;
    this.logger = deps.logger ?? createSilentLogger();
  }

  async ingest(text: string, documentId: string, filename: string): Promise<Document> {
    return ingest(
      { text, documentId, filename, uploadTime: new Date().toISOString() },
      {
        chunker: this.chunker,
        embeddingProvider: this.embedder,
        vectorIndex: this.index,
        logger: this.logger,
      },
    );
  }

  /** True while nothing is indexed. Counts chunks only. */
  async isEmpty(): Promise<boolean> {
    return (await this.index.countChunks()) === 0;
  }

  async ask(question: string, topK: number = this.defaultTopK): Promise<QueryResponse> {
    if (await this.isEmpty()) {
      return {
        answer: EMPTY_INDEX_ANSWER,
        sources: [],
        query: question,
        timestamp: new Date().toISOString(),
      };
    }

    const queryEmbedding = await this.embedder.embed(question);
    const retrieval = await this.retriever.retrieve(queryEmbedding, topK);
    this.logger.debug({ topK, retrieved: retrieval.sources.length }, "Retrieved passages");

    return this.generator.generate(question, retrieval);
  }

  async remove(documentId: string): Promise<number> {
    const deleted = await this.index.deleteByDocument(documentId);
    if (deleted === 0) {
      this.logger.debug({ documentId }, "No chunks to delete");
    }
    return deleted;
  }

  async list(): Promise<Document[]> {
    return this.index.listDocuments();
  }

  async stats(): Promise<IndexStats> {
    const [chunkCount, documentCount] = await Promise.all([
      this.index.countChunks(),
      this.index.countDocuments(),
    ]);
    return { chunkCount, documentCount };
  }

  /** Reachability of the index and the generation model, for health reporting. */
  async health(): Promise<{ indexAvailable: boolean; generatorAvailable: boolean }> {
    const [indexAvailable, generatorAvailable] = await Promise.all([
      this.index.healthCheck(),
      this.generator.availabilityCheck(),
    ]);
    return { indexAvailable, generatorAvailable };
  }
}
