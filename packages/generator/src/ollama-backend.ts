import { Ollama } from "ollama";
import { GenerationFailureError, errorMessage } from "@docqa/errors";
import type { GenerationOptions } from "@docqa/types";
import type { IGenerationBackend } from "./generation-backend.interface.js";

export interface OllamaBackendConfig {
  host: string;
}

export class OllamaGenerationBackend implements IGenerationBackend {
  readonly name = "ollama";
  private readonly client: Ollama;

  constructor(private readonly config: OllamaBackendConfig) {
    this.client = new Ollama({ host: config.host });
  }

  async generate(model: string, prompt: string, options: GenerationOptions): Promise<string> {
    try {
      const response = await this.client.generate({
        model,
        prompt,
        stream: false,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
      });

      return response.response.trim();
    } catch (error: unknown) {
      throw new GenerationFailureError(
        `Ollama generation failed (${model}) at ${this.config.host}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await this.client.list();
      return response.models.map((m) => m.name);
    } catch (error: unknown) {
      throw new GenerationFailureError(
        `Failed to list Ollama models at ${this.config.host}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
