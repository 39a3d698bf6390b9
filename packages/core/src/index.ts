export { RagService, EMPTY_INDEX_ANSWER } from "./rag-service.js";
export type { RagServiceDependencies } from "./rag-service.js";

export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionInput } from "./ingestion-pipeline.js";

export {
  Retriever,
  DISPLAY_CONTENT_LIMIT,
  relevanceScore,
  truncateForDisplay,
  toSourceDocument,
} from "./retriever.js";

export { assembleContext, NO_CONTEXT } from "./context-assembler.js";
export { PromptBuilder, INSUFFICIENT_CONTEXT_ANSWER } from "./prompt-builder.js";

export { AnswerGenerator, DEFAULT_GENERATION_OPTIONS } from "./answer-generator.js";
export type { AnswerGeneratorConfig } from "./answer-generator.js";
