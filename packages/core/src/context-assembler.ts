import type { RetrievedPassage } from "@docqa/types";

export const NO_CONTEXT = "No relevant context found.";

/**
 * Join retrieved passages into the prompt's context block, one
 * `[Source i: filename]` section per passage in retrieval order.
 */
export function assembleContext(passages: RetrievedPassage[]): string {
  if (passages.length === 0) return NO_CONTEXT;

  return passages
    .map((passage, i) => `[Source ${String(i + 1)}: ${passage.filename}]\n${passage.text}`)
    .join("\n\n");
}
