import { CohereClient } from "cohere-ai";
import { ExternalServiceError, errorMessage } from "@docqa/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const BATCH_SIZE = 96; // Cohere limit

type CohereInputType = "search_document" | "search_query";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  private client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.request([text], "search_query");

    if (!embedding) {
      throw new ExternalServiceError("Cohere returned no embedding for the query", this.name);
    }

    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      allEmbeddings.push(...(await this.request(batch, "search_document")));
    }

    return allEmbeddings;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async request(texts: string[], inputType: CohereInputType): Promise<number[][]> {
    let embeddings: number[][] | undefined;

    try {
      const response = await this.client.v2.embed({
        texts,
        model: this.model,
        inputType,
        embeddingTypes: ["float"],
      });
      embeddings = response.embeddings.float;
    } catch (error: unknown) {
      throw new ExternalServiceError(
        `Cohere embedding failed (${this.model}): ${errorMessage(error)}`,
        this.name,
        { cause: error },
      );
    }

    if (!embeddings || embeddings.length !== texts.length) {
      throw new ExternalServiceError(
        `Cohere returned ${String(embeddings?.length ?? 0)} embeddings for ${String(texts.length)} inputs`,
        this.name,
      );
    }

    return embeddings;
  }
}
