export type * from "./api.js";
export type * from "./chunk.js";
export { chunkIdFor } from "./chunk.js";
export type * from "./config.js";
export { DEFAULT_ASSISTANT_ROLE } from "./config.js";
export type * from "./document.js";
export { SUPPORTED_EXTENSIONS } from "./document.js";
export type * from "./pipeline.js";
export type * from "./query.js";
