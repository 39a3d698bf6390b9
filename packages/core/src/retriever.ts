import { ConfigurationError } from "@docqa/errors";
import type { IVectorIndex } from "@docqa/vector-index";
import type { Retrieval, SearchResult, SourceDocument } from "@docqa/types";

/** Longest source excerpt shown to callers, in code points. */
export const DISPLAY_CONTENT_LIMIT = 200;

/**
 * Cosine distance to a relevance score in [0, 1], rounded to 3 decimals.
 * Anything at or beyond orthogonal scores 0.
 */
export function relevanceScore(distance: number): number {
  const similarity = Math.min(1, Math.max(0, 1 - distance));
  return Math.round(similarity * 1000) / 1000;
}

/**
 * Cut `text` to `limit` code points and mark the cut with "...". Counting code
 * points rather than UTF-16 units keeps surrogate pairs whole.
 */
export function truncateForDisplay(text: string, limit = DISPLAY_CONTENT_LIMIT): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= limit) return text;
  return `${codePoints.slice(0, limit).join("")}...`;
}

export function toSourceDocument(result: SearchResult): SourceDocument {
  return {
    documentId: result.chunk.documentId,
    filename: result.chunk.filename,
    chunkIndex: result.chunk.chunkIndex,
    relevanceScore: relevanceScore(result.distance),
    content: truncateForDisplay(result.chunk.text),
  };
}

/**
 * Nearest-neighbour lookup that turns raw search hits into attributed
 * sources. Sources carry display excerpts; passages keep the full text for
 * the prompt.
 */
export class Retriever {
  constructor(private readonly index: IVectorIndex) {
    if (index.metric !== "cosine") {
      throw new ConfigurationError(`Unsupported distance metric: ${String(index.metric)}`);
    }
  }

  async retrieve(queryEmbedding: number[], topK: number): Promise<Retrieval> {
    const results = await this.index.search(queryEmbedding, topK);

    return {
      sources: results.map(toSourceDocument),
      passages: results.map((result) => ({
        text: result.chunk.text,
        filename: result.chunk.filename,
      })),
    };
  }
}
