import { Ollama } from "ollama";
import { ExternalServiceError, errorMessage } from "@docqa/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const BATCH_SIZE = 32;

export interface OllamaProviderConfig {
  host: string;
  model: string;
}

export class OllamaEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "ollama";
  readonly model: string;
  private readonly client: Ollama;

  constructor(private readonly config: OllamaProviderConfig) {
    this.client = new Ollama({ host: config.host });
    this.model = config.model;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);

    if (!embedding) {
      throw new ExternalServiceError("Ollama returned no embedding for the query", this.name);
    }

    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      allEmbeddings.push(...(await this.embedChunk(batch)));
    }

    return allEmbeddings;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.list();
      return true;
    } catch {
      return false;
    }
  }

  private async embedChunk(batch: string[]): Promise<number[][]> {
    let embeddings: number[][];

    try {
      const response = await this.client.embed({ model: this.model, input: batch });
      embeddings = response.embeddings;
    } catch (error: unknown) {
      throw new ExternalServiceError(
        `Failed to create embeddings via Ollama (${this.model}) at ${this.config.host}: ${errorMessage(error)}`,
        this.name,
        { cause: error },
      );
    }

    if (embeddings.length !== batch.length || embeddings.some((e) => e.length === 0)) {
      throw new ExternalServiceError(
        `Ollama returned ${String(embeddings.length)} embeddings for ${String(batch.length)} inputs. Is ${this.model} an embedding model?`,
        this.name,
      );
    }

    return embeddings;
  }
}
