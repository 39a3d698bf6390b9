export type { IChunker } from "./chunker.interface.js";
export { SlidingWindowChunker } from "./sliding-window-chunker.js";
