export interface Chunk {
  chunkId: string;
  documentId: string;
  /** 0-based and contiguous within a document. */
  chunkIndex: number;
  text: string;
  embedding: number[];
  filename: string;
  uploadTime: string;
  totalChunks: number;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * One emitted window. `startChar`/`endChar` are the raw window bounds in
 * code points before trimming, so consecutive windows can be checked for
 * coverage.
 */
export interface ChunkWindow {
  content: string;
  index: number;
  startChar: number;
  endChar: number;
}

/** Deterministic chunk identity, unique across the index. */
export function chunkIdFor(documentId: string, chunkIndex: number): string {
  return `${documentId}_chunk_${String(chunkIndex)}`;
}
