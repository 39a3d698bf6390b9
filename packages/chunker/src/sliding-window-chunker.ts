import { ConfigurationError } from "@docqa/errors";
import type { ChunkWindow, ChunkingConfig } from "@docqa/types";
import type { IChunker } from "./chunker.interface.js";

/**
 * Fixed-size character windows with overlap.
 *
 * Windows start every `chunkSize - chunkOverlap` characters. Each window is
 * trimmed; a window that is blank after trimming is skipped without
 * disturbing the stride. The window that reaches the end of the text is the
 * last one.
 */
export class SlidingWindowChunker implements IChunker {
  readonly strategy = "sliding-window";
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(config: ChunkingConfig) {
    const { chunkSize, chunkOverlap } = config;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigurationError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
      throw new ConfigurationError(
        `chunkOverlap must be a non-negative integer, got ${String(chunkOverlap)}`,
      );
    }
    if (chunkOverlap >= chunkSize) {
      throw new ConfigurationError(
        `chunkOverlap (${String(chunkOverlap)}) must be smaller than chunkSize (${String(chunkSize)})`,
      );
    }

    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
  }

  get step(): number {
    return this.chunkSize - this.chunkOverlap;
  }

  chunk(text: string): string[] {
    return this.windows(text).map((w) => w.content);
  }

  /** Offsets count code points, so a window never splits a surrogate pair. */
  windows(text: string): ChunkWindow[] {
    const chars = Array.from(text);
    const results: ChunkWindow[] = [];
    let index = 0;

    for (let startChar = 0; startChar < chars.length; startChar += this.step) {
      const endChar = Math.min(startChar + this.chunkSize, chars.length);
      const content = chars.slice(startChar, endChar).join("").trim();

      if (content.length > 0) {
        results.push({ content, index, startChar, endChar });
        index++;
      }

      if (startChar + this.chunkSize >= chars.length) break;
    }

    return results;
  }
}
