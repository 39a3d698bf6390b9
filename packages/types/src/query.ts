import type { Chunk } from "./chunk.js";

export type DistanceMetric = "cosine";

export interface SearchResult {
  chunk: Chunk;
  /** Cosine distance: 0 = same direction, 2 = opposite. */
  distance: number;
}

export interface SourceDocument {
  documentId: string;
  filename: string;
  chunkIndex: number;
  /** In [0, 1], rounded to 3 decimals. */
  relevanceScore: number;
  /** Display text, possibly truncated. */
  content: string;
}

/** Full passage text handed to the context assembler. */
export interface RetrievedPassage {
  text: string;
  filename: string;
}

export interface Retrieval {
  sources: SourceDocument[];
  passages: RetrievedPassage[];
}

export interface QueryResponse {
  answer: string;
  sources: SourceDocument[];
  query: string;
  timestamp: string;
}
