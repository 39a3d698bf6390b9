import { errorMessage } from "@docqa/errors";
import type { IGenerationBackend } from "@docqa/generator";
import { createSilentLogger, type Logger } from "@docqa/logger";
import type { GenerationOptions, QueryResponse, Retrieval } from "@docqa/types";
import { assembleContext } from "./context-assembler.js";
import { PromptBuilder } from "./prompt-builder.js";

export const DEFAULT_GENERATION_OPTIONS: GenerationOptions = {
  temperature: 0.7,
  maxTokens: 512,
};

export interface AnswerGeneratorConfig {
  backend: IGenerationBackend;
  model: string;
  options?: Partial<GenerationOptions>;
  promptBuilder?: PromptBuilder;
  logger?: Logger;
}

/**
 * Turns a retrieval into a grounded answer: assemble context, build the
 * prompt, call the backend. A backend failure becomes the answer text so the
 * caller still gets the sources it asked for.
 */
export class AnswerGenerator {
  readonly model: string;

  private readonly backend: IGenerationBackend;
  private readonly options: GenerationOptions;
  private readonly promptBuilder: PromptBuilder;
  private readonly logger: Logger;

  constructor(config: AnswerGeneratorConfig) {
    this.backend = config.backend;
    this.model = config.model;
    this.options = { ...DEFAULT_GENERATION_OPTIONS, ...config.options };
    this.promptBuilder = config.promptBuilder ?? new PromptBuilder();
    this.logger = config.logger ?? createSilentLogger();
  }

  async generate(question: string, retrieval: Retrieval): Promise<QueryResponse> {
    const context = assembleContext(retrieval.passages);
    const prompt = this.promptBuilder.build(question, context);

    let answer: string;
    try {
      answer = await this.backend.generate(this.model, prompt, this.options);
    } catch (error: unknown) {
      this.logger.warn(
        { err: error, model: this.model, backend: this.backend.name },
        "Answer generation failed",
      );
      answer = `Error generating response: ${errorMessage(error)}`;
    }

    return {
      answer,
      sources: retrieval.sources,
      query: question,
      timestamp: new Date().toISOString(),
    };
  }

  /** Whether the backend is reachable and serves the configured model. */
  async availabilityCheck(): Promise<boolean> {
    try {
      const models = await this.backend.listModels();
      return models.some((name) => name === this.model || name.startsWith(this.model));
    } catch (error: unknown) {
      this.logger.warn({ err: error, backend: this.backend.name }, "Generator availability check failed");
      return false;
    }
  }
}
