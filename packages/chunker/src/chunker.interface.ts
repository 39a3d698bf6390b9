import type { ChunkWindow } from "@docqa/types";

export interface IChunker {
  readonly strategy: string;
  /** Trimmed, non-empty passages in document order. */
  chunk(text: string): string[];
  /** Same passages with their raw window bounds. */
  windows(text: string): ChunkWindow[];
}
