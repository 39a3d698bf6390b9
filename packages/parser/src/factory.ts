import fs from "node:fs/promises";
import path from "node:path";
import { SUPPORTED_EXTENSIONS } from "@docqa/types";
import { AppError, ExtractionFailureError, UnsupportedFormatError, errorMessage } from "@docqa/errors";
import type { IParser, ParseResult } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";

const allParsers: IParser[] = [new TextParser(), new PdfParser()];

export function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

export function isSupportedFile(fileName: string): boolean {
  const extension = extensionOf(fileName);
  return allParsers.some((p) => p.supportedExtensions.includes(extension));
}

/**
 * Select the parser for a file name by extension.
 * Unknown extensions are rejected rather than guessed.
 */
export function getParser(fileName: string): IParser {
  const extension = extensionOf(fileName);
  const parser = allParsers.find((p) => p.supportedExtensions.includes(extension));

  if (!parser) {
    throw new UnsupportedFormatError(extension, SUPPORTED_EXTENSIONS);
  }

  return parser;
}

/**
 * Read a file from disk and return its plain text.
 *
 * The extension is checked before the file is touched. Read and decode
 * failures surface as ExtractionFailureError.
 */
export async function extractText(filePath: string): Promise<ParseResult> {
  const parser = getParser(filePath);

  try {
    const buffer = await fs.readFile(filePath);
    return await parser.parse(buffer);
  } catch (error: unknown) {
    if (AppError.isAppError(error)) throw error;
    throw new ExtractionFailureError(
      `Failed to extract text from ${path.basename(filePath)}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
