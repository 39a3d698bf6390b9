export type { IGenerationBackend } from "./generation-backend.interface.js";
export { OllamaGenerationBackend } from "./ollama-backend.js";
export type { OllamaBackendConfig } from "./ollama-backend.js";
