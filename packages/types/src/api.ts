import type { Document } from "./document.js";

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  requestId: string;
  details?: unknown;
}

export interface DocumentUploadResponse {
  documentId: string;
  filename: string;
  chunkCount: number;
  uploadTime: string;
  message: string;
}

export interface DocumentListResponse {
  documents: Document[];
  totalCount: number;
}

export interface DeleteDocumentResponse {
  documentId: string;
  message: string;
  success: boolean;
}

export type HealthStatus = "healthy" | "degraded";

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  generatorAvailable: boolean;
  indexAvailable: boolean;
}
