import type { IChunker } from "@docqa/chunker";
import type { IEmbeddingProvider } from "@docqa/embeddings";
import { EmptyContentError } from "@docqa/errors";
import type { Logger } from "@docqa/logger";
import type { Document } from "@docqa/types";
import type { IVectorIndex } from "@docqa/vector-index";

export interface IngestionInput {
  text: string;
  documentId: string;
  filename: string;
  /** Captured once by the caller so every chunk shares it. */
  uploadTime: string;
}

export interface IngestionDependencies {
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorIndex: IVectorIndex;
  logger?: Logger;
}

/**
 * Ingestion pipeline: Chunk -> Embed -> Store
 *
 * Nothing reaches the index until every chunk has an embedding, and the
 * index applies the batch all-or-nothing.
 */
export async function ingest(input: IngestionInput, deps: IngestionDependencies): Promise<Document> {
  const chunks = deps.chunker.chunk(input.text);
  if (chunks.length === 0) {
    throw new EmptyContentError(`No text content could be extracted from ${input.filename}`);
  }
  deps.logger?.debug(
    { documentId: input.documentId, chunkCount: chunks.length, strategy: deps.chunker.strategy },
    "Chunked document",
  );

  const embeddings = await deps.embeddingProvider.embedBatch(chunks);

  await deps.vectorIndex.insert({
    chunks,
    embeddings,
    documentId: input.documentId,
    filename: input.filename,
    uploadTime: input.uploadTime,
  });

  deps.logger?.info(
    { documentId: input.documentId, filename: input.filename, chunkCount: chunks.length },
    "Ingested document",
  );

  return {
    documentId: input.documentId,
    filename: input.filename,
    uploadTime: input.uploadTime,
    chunkCount: chunks.length,
  };
}
