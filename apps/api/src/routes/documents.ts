import { randomUUID } from "node:crypto";
import { Router } from "express";
import multer from "multer";
import type { RagService } from "@docqa/core";
import { NotFoundError, UnsupportedFormatError, ValidationError } from "@docqa/errors";
import { extensionOf, isSupportedFile, type ParseResult } from "@docqa/parser";
import {
  SUPPORTED_EXTENSIONS,
  type DeleteDocumentResponse,
  type Document,
  type DocumentListResponse,
  type DocumentUploadResponse,
} from "@docqa/types";
import { asyncHandler } from "../middleware/error-handler.js";
import type { UploadStore } from "../upload-store.js";

export interface DocumentRouterDependencies {
  rag: RagService;
  uploads: UploadStore;
  extract: (filePath: string) => Promise<ParseResult>;
  maxUploadBytes: number;
}

export function createDocumentRouter(deps: DocumentRouterDependencies): Router {
  const router = Router();

  // Held in memory until the extension check passes, then written under the
  // document id.
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (isSupportedFile(file.originalname)) {
        cb(null, true);
      } else {
        cb(new UnsupportedFormatError(extensionOf(file.originalname), SUPPORTED_EXTENSIONS));
      }
    },
  });

  router.post(
    "/upload",
    upload.single("file"),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) {
        throw new ValidationError("No file uploaded", { file: "Required" });
      }

      const documentId = randomUUID();
      const filePath = await deps.uploads.save(
        documentId,
        extensionOf(file.originalname),
        file.buffer,
      );

      let document: Document;
      try {
        const { text } = await deps.extract(filePath);
        document = await deps.rag.ingest(text, documentId, file.originalname);
      } catch (error: unknown) {
        // Nothing was indexed, so the stored file has no document to belong to.
        // A failed cleanup is logged; the ingestion error is what the caller sees.
        await deps.uploads.remove(filePath).catch((cleanupError: unknown) => {
          req.logger?.warn({ err: cleanupError, filePath }, "Failed to remove stored upload");
        });
        throw error;
      }

      const body: DocumentUploadResponse = {
        documentId,
        filename: file.originalname,
        chunkCount: document.chunkCount,
        uploadTime: document.uploadTime,
        message: "Document uploaded and indexed successfully",
      };
      res.status(201).json(body);
    }),
  );

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const documents = await deps.rag.list();
      const body: DocumentListResponse = { documents, totalCount: documents.length };
      res.json(body);
    }),
  );

  router.delete(
    "/:documentId",
    asyncHandler(async (req, res) => {
      const { documentId } = req.params;
      if (!documentId) {
        throw new ValidationError("documentId is required", { documentId: "Required" });
      }
      const deleted = await deps.rag.remove(documentId);

      if (deleted === 0) {
        throw new NotFoundError(`Document with ID ${documentId} not found`);
      }

      const body: DeleteDocumentResponse = {
        documentId,
        message: `Successfully deleted document and ${String(deleted)} chunks`,
        success: true,
      };
      res.json(body);
    }),
  );

  return router;
}
