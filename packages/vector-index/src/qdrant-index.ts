import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { AppError, IndexUnavailableError, ValidationError, errorMessage } from "@docqa/errors";
import { createSilentLogger, type Logger } from "@docqa/logger";
import type { Chunk, Document, InsertChunksInput, SearchResult } from "@docqa/types";
import type { IVectorIndex } from "./vector-index.interface.js";
import {
  assertTopK,
  buildChunkRecords,
  groupDocuments,
  isChunkMetadata,
  isNumberArray,
  type ChunkMetadata,
} from "./records.js";

const SCROLL_PAGE_SIZE = 256;

export interface QdrantVectorIndexConfig {
  url: string;
  apiKey?: string;
  collectionName: string;
  logger?: Logger;
}

type PointId = string | number;

interface QdrantPoint {
  id: PointId;
  payload?: Record<string, unknown> | null;
  vector?: unknown;
}

/**
 * Qdrant only accepts UUIDs or integers as point ids, so the chunk id is
 * hashed into a name-based UUID and kept in the payload as well.
 */
export function pointIdFor(chunkId: string): string {
  const hex = createHash("sha1").update(chunkId).digest("hex");
  const variant = ((parseInt(hex.slice(16, 18), 16) & 0x3f) | 0x80).toString(16);

  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(18, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

function isAlreadyExists(error: unknown): boolean {
  if (typeof error === "object" && error !== null && "status" in error && error.status === 409) {
    return true;
  }
  return errorMessage(error).includes("already exists");
}

function documentFilter(documentId: string) {
  return { must: [{ key: "documentId", match: { value: documentId } }] };
}

/**
 * Qdrant-backed index. The collection is created with cosine distance on the
 * first insert, once the embedding size is known. Qdrant reports cosine
 * similarity, which is converted back to distance (`1 - score`).
 */
export class QdrantVectorIndex implements IVectorIndex {
  readonly metric = "cosine";

  private readonly client: QdrantClient;
  private readonly collectionName: string;
  private readonly logger: Logger;
  private collectionReady = false;
  private creatingCollection: Promise<void> | null = null;

  constructor(config: QdrantVectorIndexConfig) {
    this.client = new QdrantClient({ url: config.url, apiKey: config.apiKey });
    this.collectionName = config.collectionName;
    this.logger = config.logger ?? createSilentLogger();
  }

  async insert(input: InsertChunksInput): Promise<void> {
    if (input.chunks.length === 0 || input.embeddings.length === 0) {
      return;
    }

    const records = buildChunkRecords(input);

    await this.guard("insert", async () => {
      await this.ensureCollection(records[0]?.embedding.length ?? 0);

      const existing = await this.client.count(this.collectionName, {
        filter: documentFilter(input.documentId),
        exact: true,
      });
      if (existing.count > 0) {
        throw new ValidationError(`Document ${input.documentId} is already indexed`, {
          documentId: "already indexed",
        });
      }

      // One upsert call so the batch is applied as a single operation.
      await this.client.upsert(this.collectionName, {
        wait: true,
        points: records.map((chunk) => ({
          id: pointIdFor(chunk.chunkId),
          vector: chunk.embedding,
          payload: {
            chunkId: chunk.chunkId,
            documentId: chunk.documentId,
            chunkIndex: chunk.chunkIndex,
            text: chunk.text,
            filename: chunk.filename,
            uploadTime: chunk.uploadTime,
            totalChunks: chunk.totalChunks,
          },
        })),
      });
    });

    this.logger.info(
      { documentId: input.documentId, chunkCount: records.length },
      "Added chunks to Qdrant",
    );
  }

  async search(queryEmbedding: number[], topK: number): Promise<SearchResult[]> {
    assertTopK(topK);

    return this.guard("search", async () => {
      if (!(await this.collectionExists())) return [];

      const results = await this.client.search(this.collectionName, {
        vector: queryEmbedding,
        limit: topK,
        with_payload: true,
        with_vector: true,
      });

      return results.map((point) => ({
        chunk: this.toChunk(point),
        distance: Math.min(2, Math.max(0, 1 - point.score)),
      }));
    });
  }

  async get(documentId: string): Promise<Chunk[]> {
    return this.guard("get", async () => {
      const points = await this.scrollAll(documentId, true);
      return points.map((p) => this.toChunk(p)).sort((a, b) => a.chunkIndex - b.chunkIndex);
    });
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const deleted = await this.guard("deleteByDocument", async () => {
      if (!(await this.collectionExists())) return 0;

      const { count } = await this.client.count(this.collectionName, {
        filter: documentFilter(documentId),
        exact: true,
      });
      if (count === 0) return 0;

      await this.client.delete(this.collectionName, {
        wait: true,
        filter: documentFilter(documentId),
      });
      return count;
    });

    if (deleted > 0) {
      this.logger.info({ documentId, deleted }, "Deleted chunks from Qdrant");
    }
    return deleted;
  }

  async listDocuments(): Promise<Document[]> {
    return this.guard("listDocuments", async () => {
      const points = await this.scrollAll(undefined, false);
      return groupDocuments(points.map((p) => this.toMetadata(p)));
    });
  }

  async countChunks(): Promise<number> {
    return this.guard("countChunks", async () => {
      if (!(await this.collectionExists())) return 0;
      const { count } = await this.client.count(this.collectionName, { exact: true });
      return count;
    });
  }

  async countDocuments(): Promise<number> {
    return (await this.listDocuments()).length;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async collectionExists(): Promise<boolean> {
    if (this.collectionReady) return true;

    const collections = await this.client.getCollections();
    this.collectionReady = collections.collections.some((c) => c.name === this.collectionName);
    return this.collectionReady;
  }

  /**
   * Create the collection once. Concurrent first inserts share one attempt;
   * a failed attempt is not cached.
   */
  private ensureCollection(dimensions: number): Promise<void> {
    if (this.collectionReady) return Promise.resolve();

    this.creatingCollection ??= this.createCollection(dimensions).finally(() => {
      this.creatingCollection = null;
    });

    return this.creatingCollection;
  }

  private async createCollection(dimensions: number): Promise<void> {
    if (await this.collectionExists()) return;

    try {
      await this.client.createCollection(this.collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      });
    } catch (error: unknown) {
      // Another process created it between our check and the call.
      if (!isAlreadyExists(error)) throw error;
      this.logger.debug({ collection: this.collectionName }, "Collection already exists");
    }

    await this.client.createPayloadIndex(this.collectionName, {
      field_name: "documentId",
      field_schema: "keyword",
    });

    this.collectionReady = true;
    this.logger.info({ collection: this.collectionName, dimensions }, "Created Qdrant collection");
  }

  private async scrollAll(documentId: string | undefined, withVector: boolean): Promise<QdrantPoint[]> {
    if (!(await this.collectionExists())) return [];

    const points: QdrantPoint[] = [];
    let offset: PointId | undefined;

    do {
      const page = await this.client.scroll(this.collectionName, {
        filter: documentId === undefined ? undefined : documentFilter(documentId),
        limit: SCROLL_PAGE_SIZE,
        offset,
        with_payload: true,
        with_vector: withVector,
      });

      points.push(...page.points);
      const next = page.next_page_offset;
      offset = typeof next === "string" || typeof next === "number" ? next : undefined;
    } while (offset !== undefined);

    return points;
  }

  private toMetadata(point: QdrantPoint): ChunkMetadata {
    const payload = point.payload ?? {};

    if (!isChunkMetadata(payload)) {
      throw new IndexUnavailableError(
        `Point ${String(point.id)} in '${this.collectionName}' has a malformed payload`,
      );
    }

    return {
      chunkId: payload.chunkId,
      documentId: payload.documentId,
      chunkIndex: payload.chunkIndex,
      filename: payload.filename,
      uploadTime: payload.uploadTime,
      totalChunks: payload.totalChunks,
    };
  }

  private toChunk(point: QdrantPoint): Chunk {
    const metadata = this.toMetadata(point);
    const text = point.payload?.["text"];

    if (typeof text !== "string") {
      throw new IndexUnavailableError(
        `Point ${String(point.id)} in '${this.collectionName}' has no text`,
      );
    }

    return {
      ...metadata,
      text,
      embedding: isNumberArray(point.vector) ? point.vector : [],
    };
  }

  /**
   * Run a Qdrant operation, surfacing transport and server failures as
   * IndexUnavailableError. Errors this class raises itself pass through.
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      throw new IndexUnavailableError(
        `Qdrant ${operation} on '${this.collectionName}' failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
