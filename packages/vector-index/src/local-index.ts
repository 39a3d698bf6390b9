import fs from "node:fs/promises";
import path from "node:path";
import { AppError, IndexUnavailableError, ValidationError, errorMessage } from "@docqa/errors";
import { createSilentLogger, type Logger } from "@docqa/logger";
import type { Chunk, Document, InsertChunksInput, SearchResult } from "@docqa/types";
import type { IVectorIndex } from "./vector-index.interface.js";
import { cosineDistance } from "./cosine.js";
import {
  assertDimensions,
  assertTopK,
  buildChunkRecords,
  groupDocuments,
  isChunk,
} from "./records.js";

const FORMAT_VERSION = 1;

export interface LocalVectorIndexConfig {
  persistDir: string;
  collectionName: string;
  logger?: Logger;
}

interface PersistedCollection {
  version: number;
  collectionName: string;
  metric: "cosine";
  updatedAt: string;
  chunks: Chunk[];
}

/**
 * File-backed index: one JSON document per collection at
 * `<persistDir>/<collectionName>.json`, searched by brute-force cosine
 * distance.
 *
 * The collection is loaded on first use. Mutations run one at a time; each
 * builds the next chunk list, writes it to a temp file, renames it over the
 * collection file and only then swaps it in, so a failed write leaves both
 * disk and memory untouched.
 */
export class LocalVectorIndex implements IVectorIndex {
  readonly metric = "cosine";
  readonly filePath: string;

  private readonly collectionName: string;
  private readonly logger: Logger;
  private chunks: Chunk[] | null = null;
  private loading: Promise<Chunk[]> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(config: LocalVectorIndexConfig) {
    this.collectionName = config.collectionName;
    this.filePath = path.resolve(config.persistDir, `${config.collectionName}.json`);
    this.logger = config.logger ?? createSilentLogger();
  }

  async insert(input: InsertChunksInput): Promise<void> {
    if (input.chunks.length === 0 || input.embeddings.length === 0) {
      return;
    }

    await this.mutate((current) => {
      const dimensions = current[0]?.embedding.length;
      const records = buildChunkRecords(input, dimensions);

      if (current.some((chunk) => chunk.documentId === input.documentId)) {
        throw new ValidationError(`Document ${input.documentId} is already indexed`, {
          documentId: "already indexed",
        });
      }

      return { next: [...current, ...records], result: undefined };
    });

    this.logger.info(
      { documentId: input.documentId, chunkCount: input.chunks.length },
      "Added chunks to local index",
    );
  }

  async search(queryEmbedding: number[], topK: number): Promise<SearchResult[]> {
    assertTopK(topK);
    const chunks = await this.load();

    if (chunks.length === 0) {
      return [];
    }

    assertDimensions(queryEmbedding, chunks[0]?.embedding.length ?? 0);

    return chunks
      .map((chunk) => ({ chunk, distance: cosineDistance(queryEmbedding, chunk.embedding) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topK)
      .map(({ chunk, distance }) => ({ chunk: copyChunk(chunk), distance }));
  }

  async get(documentId: string): Promise<Chunk[]> {
    const chunks = await this.load();

    return chunks
      .filter((chunk) => chunk.documentId === documentId)
      .sort((a, b) => a.chunkIndex - b.chunkIndex)
      .map(copyChunk);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const deleted = await this.mutate((current) => {
      const next = current.filter((chunk) => chunk.documentId !== documentId);
      if (next.length === current.length) {
        return { next: current, result: 0 };
      }
      return { next, result: current.length - next.length };
    });

    if (deleted > 0) {
      this.logger.info({ documentId, deleted }, "Deleted chunks from local index");
    }

    return deleted;
  }

  async listDocuments(): Promise<Document[]> {
    return groupDocuments(await this.load());
  }

  async countChunks(): Promise<number> {
    return (await this.load()).length;
  }

  async countDocuments(): Promise<number> {
    return (await this.listDocuments()).length;
  }

  /** Readable collection and a writable persist directory (or nearest existing parent). */
  async healthCheck(): Promise<boolean> {
    try {
      await this.load();
      await fs.access(await nearestExistingDir(path.dirname(this.filePath)), fs.constants.W_OK);
      return true;
    } catch (error: unknown) {
      this.logger.debug({ err: error, filePath: this.filePath }, "Local index health check failed");
      return false;
    }
  }

  private load(): Promise<Chunk[]> {
    if (this.chunks) {
      return Promise.resolve(this.chunks);
    }

    // A failed load is not cached, so the next call tries the disk again.
    this.loading ??= this.readFromDisk()
      .then((chunks) => {
        this.chunks = chunks;
        return chunks;
      })
      .finally(() => {
        this.loading = null;
      });

    return this.loading;
  }

  private async readFromDisk(): Promise<Chunk[]> {
    let raw: string;

    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === "ENOENT") {
        this.logger.debug({ filePath: this.filePath }, "Starting empty collection");
        return [];
      }
      throw new IndexUnavailableError(
        `Cannot read collection '${this.collectionName}' at ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      throw new IndexUnavailableError(
        `Collection '${this.collectionName}' at ${this.filePath} is corrupt: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (!isPersistedCollection(parsed)) {
      throw new IndexUnavailableError(
        `Collection '${this.collectionName}' at ${this.filePath} has an unrecognised format`,
      );
    }

    this.logger.debug(
      { filePath: this.filePath, chunkCount: parsed.chunks.length },
      "Loaded collection",
    );
    return parsed.chunks;
  }

  private mutate<T>(apply: (current: Chunk[]) => { next: Chunk[]; result: T }): Promise<T> {
    const run = this.writeQueue.then(async () => {
      const current = await this.load();
      const { next, result } = apply(current);

      if (next !== current) {
        await this.writeToDisk(next);
        this.chunks = next;
      }

      return result;
    });

    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }

  private async writeToDisk(chunks: Chunk[]): Promise<void> {
    const store: PersistedCollection = {
      version: FORMAT_VERSION,
      collectionName: this.collectionName,
      metric: this.metric,
      updatedAt: new Date().toISOString(),
      chunks,
    };
    const tempPath = `${this.filePath}.${String(process.pid)}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(store), "utf8");
      await fs.rename(tempPath, this.filePath);
    } catch (error: unknown) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn({ tempPath, err: cleanupError }, "Failed to remove temp file");
      });
      if (AppError.isAppError(error)) throw error;
      throw new IndexUnavailableError(
        `Failed to persist collection '${this.collectionName}' to ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

/** Stored chunks never leave the index; callers get copies. */
function copyChunk(chunk: Chunk): Chunk {
  return { ...chunk, embedding: [...chunk.embedding] };
}

async function nearestExistingDir(dir: string): Promise<string> {
  let current = dir;

  for (;;) {
    const stats = await statIfExists(current);
    if (stats) {
      if (!stats.isDirectory()) {
        throw new IndexUnavailableError(`${current} is not a directory`);
      }
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      throw new IndexUnavailableError(`No existing directory above ${dir}`);
    }
    current = parent;
  }
}

async function statIfExists(target: string) {
  try {
    return await fs.stat(target);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function isPersistedCollection(
  value: unknown,
): value is Pick<PersistedCollection, "version" | "chunks"> {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    value.version === FORMAT_VERSION &&
    "chunks" in value &&
    Array.isArray(value.chunks) &&
    value.chunks.every(isChunk)
  );
}
