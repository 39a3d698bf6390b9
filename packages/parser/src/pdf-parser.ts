import pdfParse from "pdf-parse/lib/pdf-parse.js";
import type { IParser, ParseResult } from "./parser.interface.js";

export class PdfParser implements IParser {
  readonly supportedExtensions = [".pdf"] as const;

  async parse(input: Uint8Array): Promise<ParseResult> {
    const parsed = await pdfParse(Buffer.from(input));

    return {
      text: parsed.text.trim(),
      pageCount: parsed.numpages,
    };
  }
}
