import { DEFAULT_ASSISTANT_ROLE } from "@docqa/types";

export const INSUFFICIENT_CONTEXT_ANSWER =
  "I don't have enough information in the documents to answer this question.";

/**
 * Fixed instruction template around the assembled context. Output depends
 * only on the role line and the `(question, context)` pair.
 */
export class PromptBuilder {
  constructor(private readonly assistantRole: string = DEFAULT_ASSISTANT_ROLE) {}

  build(question: string, context: string): string {
    return [
      this.assistantRole,
      "",
      "Context from documents:",
      context,
      "",
      `User Question: ${question}`,
      "",
      "Instructions:",
      "- Answer the question using ONLY the information from the context above",
      `- If the context doesn't contain enough information to answer, say "${INSUFFICIENT_CONTEXT_ANSWER}"`,
      "- Be concise and accurate",
      "- If referencing specific details, mention the source document",
      "",
      "Answer:",
    ].join("\n");
  }
}
