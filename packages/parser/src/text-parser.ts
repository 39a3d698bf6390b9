import type { IParser, ParseResult } from "./parser.interface.js";

/**
 * Plain text and markdown parser. Decodes UTF-8 and trims surrounding
 * whitespace; markdown is kept as-is.
 */
export class TextParser implements IParser {
  readonly supportedExtensions = [".txt", ".md"] as const;

  async parse(input: Uint8Array): Promise<ParseResult> {
    const text = new TextDecoder("utf-8").decode(input).trim();

    return { text, pageCount: 1 };
  }
}
