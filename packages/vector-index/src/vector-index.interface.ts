import type {
  Chunk,
  DistanceMetric,
  Document,
  InsertChunksInput,
  SearchResult,
} from "@docqa/types";

/**
 * Durable store of chunks keyed by chunk id, queryable by nearest-neighbour
 * similarity and by exact `documentId` match.
 *
 * Storage failures surface as IndexUnavailableError from every operation and
 * are never retried here. Writes for the same document must be serialized by
 * the caller.
 */
export interface IVectorIndex {
  /** Distance metric search results are reported in. */
  readonly metric: DistanceMetric;

  /**
   * Store a document's chunks. Assigns `chunkIndex` 0..n-1 in input order and
   * `totalChunks = n`. All-or-nothing; a no-op when either list is empty.
   */
  insert(input: InsertChunksInput): Promise<void>;

  /** Nearest first. Empty when the index is empty. */
  search(queryEmbedding: number[], topK: number): Promise<SearchResult[]>;

  /** Chunks of one document ordered by `chunkIndex`. */
  get(documentId: string): Promise<Chunk[]>;

  /** Number of chunks removed; 0 when the document is unknown. */
  deleteByDocument(documentId: string): Promise<number>;

  listDocuments(): Promise<Document[]>;
  countChunks(): Promise<number>;
  countDocuments(): Promise<number>;

  /** Never throws. */
  healthCheck(): Promise<boolean>;
}
