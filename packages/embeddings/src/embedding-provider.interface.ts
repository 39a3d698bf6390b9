export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;

  /** Embed a query. */
  embed(text: string): Promise<number[]>;
  /** Embed passages; output order matches input order. */
  embedBatch(texts: string[]): Promise<number[][]>;
  healthCheck(): Promise<boolean>;
}
