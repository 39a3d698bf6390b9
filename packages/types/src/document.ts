/**
 * A logical document. Never stored on its own: the index derives it by
 * grouping chunk metadata on `documentId`.
 */
export interface Document {
  documentId: string;
  filename: string;
  /** ISO-8601 timestamp captured once per ingestion. */
  uploadTime: string;
  chunkCount: number;
}

export interface IndexStats {
  chunkCount: number;
  documentCount: number;
}

export const SUPPORTED_EXTENSIONS = [".txt", ".md", ".pdf"] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];
