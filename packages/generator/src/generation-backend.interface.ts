import type { GenerationOptions } from "@docqa/types";

export interface IGenerationBackend {
  readonly name: string;
  generate(model: string, prompt: string, options: GenerationOptions): Promise<string>;
  listModels(): Promise<string[]>;
}
