export interface ParseResult {
  text: string;
  pageCount: number;
}

export interface IParser {
  readonly supportedExtensions: readonly string[];
  parse(input: Uint8Array): Promise<ParseResult>;
}
