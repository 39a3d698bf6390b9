export type { IParser, ParseResult } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export { getParser, extractText, isSupportedFile, extensionOf } from "./factory.js";
