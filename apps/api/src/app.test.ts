import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import request from "supertest";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { SlidingWindowChunker } from "@docqa/chunker";
import { AnswerGenerator, RagService } from "@docqa/core";
import type { IEmbeddingProvider } from "@docqa/embeddings";
import type { IGenerationBackend } from "@docqa/generator";
import { createSilentLogger } from "@docqa/logger";
import { LocalVectorIndex } from "@docqa/vector-index";
import { createApp } from "./app.js";
import { UploadStore } from "./upload-store.js";

function letterVector(text: string): number[] {
  return ["A", "B", "C"].map((letter) => text.split(letter).length - 1);
}

const embedder: IEmbeddingProvider = {
  name: "letters",
  model: "letters-v1",
  embed: (text) => Promise.resolve(letterVector(text)),
  embedBatch: (texts) => Promise.resolve(texts.map(letterVector)),
  healthCheck: () => Promise.resolve(true),
};

describe("HTTP API", () => {
  let dir: string;
  let uploadDir: string;
  let backend: IGenerationBackend;
  let index: LocalVectorIndex;
  let uploads: UploadStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "docqa-api-"));
    uploadDir = path.join(dir, "uploads");
    backend = {
      name: "fake",
      generate: vi.fn().mockResolvedValue("Answer from the documents."),
      listModels: vi.fn().mockResolvedValue(["llama3.2:latest"]),
    };

    index = new LocalVectorIndex({ persistDir: path.join(dir, "index"), collectionName: "documents" });
    uploads = new UploadStore(uploadDir);

    const rag = new RagService({
      chunker: new SlidingWindowChunker({ chunkSize: 4, chunkOverlap: 1 }),
      embedder,
      index,
      generator: new AnswerGenerator({ backend, model: "llama3.2" }),
      defaultTopK: 3,
    });

    app = createApp({ rag, uploads, logger: createSilentLogger() });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function uploadAbc(): Promise<string> {
    const res = await request(app)
      .post("/api/documents/upload")
      .attach("file", Buffer.from("A. B. C."), "abc.txt");
    expect(res.status).toBe(201);
    const documentId: unknown = res.body.documentId;
    if (typeof documentId !== "string") throw new Error("upload returned no documentId");
    return documentId;
  }

  async function storedUploads(): Promise<string[]> {
    return fs.readdir(uploadDir).catch(() => []);
  }

  describe("GET /", () => {
    it("describes the API", async () => {
      const res = await request(app).get("/");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        message: "Document Q&A API",
        version: "1.0.0",
        health: "/health",
        documents: "/api/documents",
        query: "/api/query",
      });
    });
  });

  describe("GET /health", () => {
    it("is healthy when the index and the model are available", async () => {
      const res = await request(app).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: "healthy",
        generatorAvailable: true,
        indexAvailable: true,
      });
      expect(typeof res.body.timestamp).toBe("string");
    });

    it("is degraded when the generation backend is down", async () => {
      vi.mocked(backend.listModels).mockRejectedValue(new Error("ECONNREFUSED"));

      const res = await request(app).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: "degraded",
        generatorAvailable: false,
        indexAvailable: true,
      });
    });
  });

  describe("POST /api/documents/upload", () => {
    it("stores, indexes and describes the document", async () => {
      const res = await request(app)
        .post("/api/documents/upload")
        .attach("file", Buffer.from("A. B. C."), "abc.txt");

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        filename: "abc.txt",
        chunkCount: 3,
        message: "Document uploaded and indexed successfully",
      });
      expect(await storedUploads()).toEqual([`${String(res.body.documentId)}.txt`]);
    });

    it("rejects an unsupported extension before storing anything", async () => {
      const res = await request(app)
        .post("/api/documents/upload")
        .attach("file", Buffer.from("binary"), "report.docx");

      expect(res.status).toBe(415);
      expect(res.body.success).toBe(false);
      expect(res.body.error).toMatchObject({
        code: "UNSUPPORTED_FORMAT",
        message: "Unsupported file format: .docx. Allowed types: .txt, .md, .pdf",
      });
      expect(await storedUploads()).toEqual([]);
    });

    it("rejects a document without text and removes the stored file", async () => {
      const res = await request(app)
        .post("/api/documents/upload")
        .attach("file", Buffer.from("   \n\n  "), "blank.md");

      expect(res.status).toBe(422);
      expect(res.body.error.code).toBe("EMPTY_CONTENT");
      expect(await storedUploads()).toEqual([]);
    });

    it("reports the ingestion error when removing the stored file also fails", async () => {
      vi.spyOn(uploads, "remove").mockRejectedValue(new Error("EBUSY: resource busy"));

      const res = await request(app)
        .post("/api/documents/upload")
        .attach("file", Buffer.from("  \n "), "blank.txt");

      expect(res.status).toBe(422);
      expect(res.body.error.code).toBe("EMPTY_CONTENT");
      expect(uploads.remove).toHaveBeenCalledTimes(1);
    });

    it("requires a file", async () => {
      const res = await request(app).post("/api/documents/upload").field("note", "no file");

      expect(res.status).toBe(400);
      expect(res.body.error).toMatchObject({
        code: "VALIDATION_ERROR",
        message: "No file uploaded",
        details: { file: "Required" },
      });
    });
  });

  describe("GET /api/documents", () => {
    it("lists indexed documents with a total", async () => {
      const documentId = await uploadAbc();

      const res = await request(app).get("/api/documents");

      expect(res.status).toBe(200);
      expect(res.body.totalCount).toBe(1);
      expect(res.body.documents).toEqual([
        {
          documentId,
          filename: "abc.txt",
          uploadTime: expect.any(String),
          chunkCount: 3,
        },
      ]);
    });
  });

  describe("DELETE /api/documents/:documentId", () => {
    it("deletes the chunks and keeps the uploaded file", async () => {
      const documentId = await uploadAbc();

      const res = await request(app).delete(`/api/documents/${documentId}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        documentId,
        message: "Successfully deleted document and 3 chunks",
        success: true,
      });
      expect(await storedUploads()).toEqual([`${documentId}.txt`]);

      const stats = await request(app).get("/api/stats");
      expect(stats.body).toEqual({ chunkCount: 0, documentCount: 0 });
    });

    it("answers 404 for an unknown document", async () => {
      const res = await request(app).delete("/api/documents/missing-id");

      expect(res.status).toBe(404);
      expect(res.body.error).toMatchObject({
        code: "NOT_FOUND",
        message: "Document with ID missing-id not found",
      });
    });
  });

  describe("POST /api/query", () => {
    it("refuses to answer before anything is indexed", async () => {
      const res = await request(app).post("/api/query").send({ query: "What is A?" });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe(
        "No documents have been indexed yet. Please upload documents first.",
      );
      expect(backend.generate).not.toHaveBeenCalled();
    });

    it("answers with sources from the indexed documents", async () => {
      const documentId = await uploadAbc();

      const res = await request(app).post("/api/query").send({ query: "A", topK: 2 });

      expect(res.status).toBe(200);
      expect(res.body.answer).toBe("Answer from the documents.");
      expect(res.body.query).toBe("A");
      expect(res.body.sources).toEqual([
        { documentId, filename: "abc.txt", chunkIndex: 0, relevanceScore: 0.707, content: "A. B" },
        { documentId, filename: "abc.txt", chunkIndex: 1, relevanceScore: 0, content: "B. C" },
      ]);
    });

    it("checks for an empty index by counting chunks only", async () => {
      await uploadAbc();
      const countDocuments = vi.spyOn(index, "countDocuments");

      const res = await request(app).post("/api/query").send({ query: "A" });

      expect(res.status).toBe(200);
      expect(countDocuments).not.toHaveBeenCalled();
    });

    it("falls back to the configured topK", async () => {
      await uploadAbc();

      const res = await request(app).post("/api/query").send({ query: "C" });

      expect(res.body.sources).toHaveLength(3);
    });

    it("validates the request body", async () => {
      const res = await request(app).post("/api/query").send({ query: "  ", topK: 11 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("VALIDATION_ERROR");
      expect(Object.keys(res.body.error.details).sort()).toEqual(["query", "topK"]);
    });
  });

  describe("GET /api/stats", () => {
    it("counts chunks and documents", async () => {
      await uploadAbc();

      const res = await request(app).get("/api/stats");

      expect(res.body).toEqual({ chunkCount: 3, documentCount: 1 });
    });
  });

  describe("errors", () => {
    it("echoes the caller's request id in the error envelope", async () => {
      const res = await request(app).delete("/api/documents/nope").set("x-request-id", "req-123");

      expect(res.headers["x-request-id"]).toBe("req-123");
      expect(res.body.error.requestId).toBe("req-123");
    });

    it("answers unknown routes with 404", async () => {
      const res = await request(app).get("/api/unknown");

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe("NOT_FOUND");
    });
  });
});
