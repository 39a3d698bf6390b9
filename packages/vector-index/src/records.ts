import { ValidationError } from "@docqa/errors";
import { chunkIdFor } from "@docqa/types";
import type { Chunk, Document, InsertChunksInput } from "@docqa/types";

export type ChunkMetadata = Omit<Chunk, "text" | "embedding">;

/**
 * Turn an insert request into chunk records. Throws before anything is
 * written when the request is malformed.
 */
export function buildChunkRecords(input: InsertChunksInput, expectedDimensions?: number): Chunk[] {
  const { chunks, embeddings, documentId, filename, uploadTime } = input;

  if (chunks.length !== embeddings.length) {
    throw new ValidationError(
      `Got ${String(chunks.length)} chunks but ${String(embeddings.length)} embeddings`,
      { embeddings: "must match chunks one-to-one" },
    );
  }
  if (!documentId) {
    throw new ValidationError("documentId is required", { documentId: "Required" });
  }

  const dimensions = expectedDimensions ?? embeddings[0]?.length ?? 0;

  return chunks.map((text, chunkIndex) => {
    const embedding = embeddings[chunkIndex] ?? [];
    assertDimensions(embedding, dimensions);
    if (text.trim().length === 0) {
      throw new ValidationError(`Chunk ${String(chunkIndex)} is empty`, { chunks: "must be non-empty" });
    }

    return {
      chunkId: chunkIdFor(documentId, chunkIndex),
      documentId,
      chunkIndex,
      text,
      embedding,
      filename,
      uploadTime,
      totalChunks: chunks.length,
    };
  });
}

export function assertDimensions(vector: number[], dimensions: number): void {
  if (vector.length === 0 || (dimensions > 0 && vector.length !== dimensions)) {
    throw new ValidationError(
      `Embedding has ${String(vector.length)} dimensions, expected ${String(dimensions)}`,
      { embedding: "dimension mismatch" },
    );
  }
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ValidationError(`topK must be a positive integer, got ${String(topK)}`, {
      topK: "must be a positive integer",
    });
  }
}

/**
 * One Document per distinct `documentId`, in first-seen order. Chunk
 * metadata is identical across a document, so the first chunk stands for all.
 */
export function groupDocuments(chunks: Iterable<ChunkMetadata>): Document[] {
  const documents = new Map<string, Document>();

  for (const chunk of chunks) {
    if (!documents.has(chunk.documentId)) {
      documents.set(chunk.documentId, {
        documentId: chunk.documentId,
        filename: chunk.filename,
        uploadTime: chunk.uploadTime,
        chunkCount: chunk.totalChunks,
      });
    }
  }

  return [...documents.values()];
}

export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === "number");
}

/** Shape check for chunk records read back from storage. */
export function isChunkMetadata(value: unknown): value is ChunkMetadata {
  return (
    typeof value === "object" &&
    value !== null &&
    "chunkId" in value &&
    typeof value.chunkId === "string" &&
    "documentId" in value &&
    typeof value.documentId === "string" &&
    "chunkIndex" in value &&
    typeof value.chunkIndex === "number" &&
    "filename" in value &&
    typeof value.filename === "string" &&
    "uploadTime" in value &&
    typeof value.uploadTime === "string" &&
    "totalChunks" in value &&
    typeof value.totalChunks === "number"
  );
}

export function isChunk(value: unknown): value is Chunk {
  return (
    isChunkMetadata(value) &&
    "text" in value &&
    typeof value.text === "string" &&
    "embedding" in value &&
    isNumberArray(value.embedding)
  );
}
