export interface InsertChunksInput {
  chunks: string[];
  embeddings: number[][];
  documentId: string;
  filename: string;
  uploadTime: string;
}

export interface GenerationOptions {
  temperature: number;
  maxTokens: number;
}
