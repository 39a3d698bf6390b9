import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { IndexUnavailableError, ValidationError } from "@docqa/errors";
import type { InsertChunksInput } from "@docqa/types";
import { LocalVectorIndex } from "./local-index.js";

const UPLOAD_TIME = "2026-01-15T10:00:00.000Z";

function doc(documentId: string, vectors: number[][], filename = `${documentId}.txt`): InsertChunksInput {
  return {
    chunks: vectors.map((_, i) => `${documentId} passage ${String(i)}`),
    embeddings: vectors,
    documentId,
    filename,
    uploadTime: UPLOAD_TIME,
  };
}

describe("LocalVectorIndex", () => {
  let dir: string;
  let index: LocalVectorIndex;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "docqa-index-"));
    index = new LocalVectorIndex({ persistDir: dir, collectionName: "docs" });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("stores the collection at <persistDir>/<collectionName>.json", () => {
    expect(index.filePath).toBe(path.join(dir, "docs.json"));
    expect(index.metric).toBe("cosine");
  });

  describe("empty index", () => {
    it("searches, lists and counts to nothing", async () => {
      expect(await index.search([1, 0], 3)).toEqual([]);
      expect(await index.listDocuments()).toEqual([]);
      expect(await index.countChunks()).toBe(0);
      expect(await index.countDocuments()).toBe(0);
    });

    it("deleting an unknown document returns 0 without creating a file", async () => {
      expect(await index.deleteByDocument("missing")).toBe(0);
      await expect(fs.access(index.filePath)).rejects.toThrow();
    });
  });

  describe("insert", () => {
    it("assigns contiguous chunk indices and totalChunks", async () => {
      await index.insert(doc("d1", [[1, 0], [0, 1], [1, 1]]));

      const chunks = await index.get("d1");

      expect(chunks.map((c) => c.chunkIndex)).toEqual([0, 1, 2]);
      expect(chunks.map((c) => c.chunkId)).toEqual(["d1_chunk_0", "d1_chunk_1", "d1_chunk_2"]);
      expect(chunks.every((c) => c.totalChunks === 3)).toBe(true);
      expect(chunks[1]).toEqual({
        chunkId: "d1_chunk_1",
        documentId: "d1",
        chunkIndex: 1,
        text: "d1 passage 1",
        embedding: [0, 1],
        filename: "d1.txt",
        uploadTime: UPLOAD_TIME,
        totalChunks: 3,
      });
    });

    it("is a no-op for an empty batch", async () => {
      await index.insert(doc("d1", []));

      expect(await index.countChunks()).toBe(0);
      await expect(fs.access(index.filePath)).rejects.toThrow();
    });

    it("rejects mismatched chunk and embedding counts without writing", async () => {
      const input = { ...doc("d1", [[1, 0], [0, 1]]), embeddings: [[1, 0]] };

      await expect(index.insert(input)).rejects.toThrow(ValidationError);
      expect(await index.countChunks()).toBe(0);
      await expect(fs.access(index.filePath)).rejects.toThrow();
    });

    it("rejects embeddings whose size differs from the collection", async () => {
      await index.insert(doc("d1", [[1, 0]]));

      await expect(index.insert(doc("d2", [[1, 0, 0]]))).rejects.toThrow(
        "Embedding has 3 dimensions, expected 2",
      );
      expect(await index.countChunks()).toBe(1);
    });

    it("rejects a second insert for the same document", async () => {
      await index.insert(doc("d1", [[1, 0]]));

      await expect(index.insert(doc("d1", [[0, 1]]))).rejects.toThrow(
        "Document d1 is already indexed",
      );
      expect(await index.countChunks()).toBe(1);
    });

    it("keeps concurrent inserts of different documents", async () => {
      await Promise.all([
        index.insert(doc("a", [[1, 0]])),
        index.insert(doc("b", [[0, 1], [1, 1]])),
        index.insert(doc("c", [[1, 1]])),
      ]);

      const reopened = new LocalVectorIndex({ persistDir: dir, collectionName: "docs" });
      expect(await reopened.countChunks()).toBe(4);
      expect((await reopened.listDocuments()).map((d) => d.documentId).sort()).toEqual([
        "a",
        "b",
        "c",
      ]);
    });
  });

  describe("search", () => {
    beforeEach(async () => {
      await index.insert(doc("d1", [[1, 0], [-1, 0]]));
      await index.insert(doc("d2", [[1, 1], [0, 1]]));
    });

    it("orders results by ascending cosine distance", async () => {
      const results = await index.search([1, 0], 4);

      expect(results.map((r) => r.chunk.chunkId)).toEqual([
        "d1_chunk_0",
        "d2_chunk_0",
        "d2_chunk_1",
        "d1_chunk_1",
      ]);
      expect(results[0]?.distance).toBe(0);
      expect(results[1]?.distance).toBeCloseTo(1 - Math.SQRT1_2, 10);
      expect(results[2]?.distance).toBe(1);
      expect(results[3]?.distance).toBe(2);
    });

    it("returns at most topK results", async () => {
      const results = await index.search([1, 0], 2);
      expect(results).toHaveLength(2);
    });

    it("returns everything when topK exceeds the index size", async () => {
      expect(await index.search([0, 1], 10)).toHaveLength(4);
    });

    it("rejects a non-positive topK", async () => {
      await expect(index.search([1, 0], 0)).rejects.toThrow(ValidationError);
    });

    it("rejects a query of the wrong size", async () => {
      await expect(index.search([1, 0, 0], 2)).rejects.toThrow(ValidationError);
    });
  });

  describe("returned chunks", () => {
    it("are copies that cannot change the stored index", async () => {
      await index.insert(doc("d1", [[1, 0]]));

      const [hit] = await index.search([1, 0], 1);
      if (!hit) throw new Error("expected a search hit");
      hit.chunk.text = "changed";
      hit.chunk.embedding[0] = -1;

      const [fetched] = await index.get("d1");
      if (!fetched) throw new Error("expected a stored chunk");
      fetched.embedding.push(5);

      const [again] = await index.get("d1");
      expect(again?.text).toBe("d1 passage 0");
      expect(again?.embedding).toEqual([1, 0]);
      expect((await index.search([1, 0], 1))[0]?.distance).toBe(0);
    });
  });

  describe("deleteByDocument", () => {
    it("removes every chunk of the document and nothing else", async () => {
      await index.insert(doc("d1", [[1, 0], [0.9, 0.1], [0.8, 0.2]]));
      await index.insert(doc("d2", [[0, 1]]));

      expect(await index.deleteByDocument("d1")).toBe(3);

      const results = await index.search([1, 0], 10);
      expect(results.map((r) => r.chunk.documentId)).toEqual(["d2"]);
      expect((await index.listDocuments()).map((d) => d.documentId)).toEqual(["d2"]);
      expect(await index.countChunks()).toBe(1);
      expect(await index.get("d1")).toEqual([]);
    });

    it("persists the deletion", async () => {
      await index.insert(doc("d1", [[1, 0]]));
      await index.deleteByDocument("d1");

      const reopened = new LocalVectorIndex({ persistDir: dir, collectionName: "docs" });
      expect(await reopened.countChunks()).toBe(0);
    });
  });

  describe("listDocuments", () => {
    it("groups chunks into one entry per document", async () => {
      await index.insert(doc("d1", [[1, 0], [0, 1], [1, 1]], "returns.md"));
      await index.insert(doc("d2", [[1, 0], [0, 1], [1, 1], [1, 2], [2, 1]], "catalog.pdf"));

      expect(await index.listDocuments()).toEqual([
        { documentId: "d1", filename: "returns.md", uploadTime: UPLOAD_TIME, chunkCount: 3 },
        { documentId: "d2", filename: "catalog.pdf", uploadTime: UPLOAD_TIME, chunkCount: 5 },
      ]);
      expect(await index.countChunks()).toBe(8);
      expect(await index.countDocuments()).toBe(2);
    });
  });

  describe("persistence", () => {
    it("reloads stored chunks in a new instance", async () => {
      await index.insert(doc("d1", [[1, 0], [0, 1]]));

      const reopened = new LocalVectorIndex({ persistDir: dir, collectionName: "docs" });
      const [nearest] = await reopened.search([0, 1], 1);

      expect(nearest?.chunk.chunkId).toBe("d1_chunk_1");
      expect(nearest?.distance).toBe(0);
    });

    it("keeps collections apart", async () => {
      await index.insert(doc("d1", [[1, 0]]));

      const other = new LocalVectorIndex({ persistDir: dir, collectionName: "other" });
      expect(await other.countChunks()).toBe(0);
    });

    it("creates the persist directory on first write", async () => {
      const nested = new LocalVectorIndex({
        persistDir: path.join(dir, "a", "b"),
        collectionName: "docs",
      });
      await nested.insert(doc("d1", [[1, 0]]));

      await expect(fs.access(path.join(dir, "a", "b", "docs.json"))).resolves.toBeUndefined();
    });
  });

  describe("unavailable storage", () => {
    it("reports a corrupt collection file", async () => {
      await fs.writeFile(index.filePath, "{not json", "utf8");

      await expect(index.search([1, 0], 1)).rejects.toThrow(IndexUnavailableError);
      await expect(index.listDocuments()).rejects.toThrow(IndexUnavailableError);
      await expect(index.countChunks()).rejects.toThrow(/is corrupt/);
      expect(await index.healthCheck()).toBe(false);
    });

    it("reports a file in an unknown format", async () => {
      await fs.writeFile(index.filePath, JSON.stringify({ version: 99, chunks: [] }), "utf8");

      await expect(index.countChunks()).rejects.toThrow(/unrecognised format/);
    });

    it("reports a persist path that is not a directory", async () => {
      const blocker = path.join(dir, "blocker");
      await fs.writeFile(blocker, "", "utf8");
      const broken = new LocalVectorIndex({ persistDir: blocker, collectionName: "docs" });

      await expect(broken.countChunks()).rejects.toThrow(IndexUnavailableError);
      await expect(broken.insert(doc("d1", [[1, 0]]))).rejects.toThrow(IndexUnavailableError);
      expect(await broken.healthCheck()).toBe(false);
    });

    it("checks a missing persist directory without creating it", async () => {
      const persistDir = path.join(dir, "not", "yet");
      const fresh = new LocalVectorIndex({ persistDir, collectionName: "docs" });

      expect(await fresh.healthCheck()).toBe(true);
      await expect(fs.access(path.join(dir, "not"))).rejects.toThrow();
    });

    it("is healthy once the collection is readable", async () => {
      expect(await index.healthCheck()).toBe(true);
    });
  });
});
