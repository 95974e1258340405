/**
 * PDF Ingest: Type Definitions
 *
 * Shared types and interfaces for the ingestion pipeline.  Every external
 * capability (parse service, page renderer, LLM) sits behind one of the
 * interfaces below.
 */

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Text recovered from a PDF by a parser */
export interface ParsedPdf {
  /** Page (or document) texts in reading order */
  pages: string[];
  /** Page count when the parser reports one */
  pageCount?: number;
  /** Name of the parser that produced the text */
  parser: string;
}

/**
 * Contract for PDF text sources.
 *
 * Implementations may throw; the pipeline converts failures into an empty
 * document with `parseError` set.
 */
export interface PdfParser {
  readonly name: string;
  parse(buffer: Buffer, fileName: string): Promise<ParsedPdf>;
}

// ---------------------------------------------------------------------------
// Features
// ---------------------------------------------------------------------------

export interface DocumentFeatures {
  /** ISO 639-1 code, or "Unknown" */
  language: string;
  /** A markdown table header + separator row was found */
  hasTables: boolean;
  /** A markdown image reference was found */
  hasImages: boolean;
}

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

export interface ExtractedImage {
  fileName: string;
  /** Source page number (1-indexed) */
  page: number;
  mimeType: string;
  data: Buffer;
}

export interface PageRenderer {
  render(buffer: Buffer): Promise<ExtractedImage[]>;
}

export interface EmbeddedImageSource {
  extract(buffer: Buffer): Promise<ExtractedImage[]>;
}

// ---------------------------------------------------------------------------
// LLM
// ---------------------------------------------------------------------------

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LlmProvider {
  /** Model used for completions (reported back to callers) */
  readonly model: string;
  /** Returns the content of the first choice, or "" when there is none */
  complete(messages: ChatMessage[]): Promise<string>;
  listModels(): Promise<string[]>;
}

export type TransformPreset = "table" | "summary" | "report" | "article";

export type TransformResult =
  | { success: true; output: string; model: string; prompt: string }
  | { success: false; error: string };

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

/** A JSON value as produced by `JSON.parse` */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface JsonObject {
  [key: string]: JsonValue;
}

export interface FlatTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

export interface ExportFile {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

export interface ExportBundle {
  files: ExportFile[];
  /** First rows of the flattened table, when one could be built */
  preview?: FlatTable;
  /** Per-format failures; the remaining formats are still produced */
  errors: string[];
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface StoredDocument {
  documentId: string;
  fileName: string;
  text: string;
  createdAt: Date;
}

export interface IngestionReport {
  documentId: string;
  fileName: string;
  text: string;
  parser: string;
  pageCount?: number;
  parseError?: string;
  features: DocumentFeatures;
  transformAvailable: boolean;
  transformUnavailableReason?: string;
  pageImages: ExtractedImage[];
  embeddedImages: ExtractedImage[];
  /** Paths written by the image store, when one is configured */
  savedImagePaths: string[];
}

export type TransformReport =
  | {
      success: true;
      documentId?: string;
      output: string;
      model: string;
      exports: ExportBundle;
    }
  | { success: false; documentId?: string; error: string };
