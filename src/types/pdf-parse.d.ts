// pdf-parse's package entry runs a self-test when it is loaded without a
// parent module (ESM importers, test runners), so the library is imported
// from its lib path, which @types/pdf-parse does not cover.
declare module "pdf-parse/lib/pdf-parse.js" {
  export interface PDFParseOptions {
    pagerender?: (pageData: unknown) => Promise<string> | string;
    max?: number;
  }

  export interface PDFParseResult {
    numpages: number;
    numrender: number;
    info: Record<string, unknown>;
    metadata: unknown;
    text: string;
    version: string;
  }

  export default function pdfParse(
    dataBuffer: Buffer | Uint8Array,
    options?: PDFParseOptions
  ): Promise<PDFParseResult>;
}
