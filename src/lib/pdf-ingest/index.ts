/**
 * PDF Ingest: Public API
 *
 * Barrel export; import everything from `@/lib/pdf-ingest`.
 */

export { IngestPipeline, isPdf } from "./pipeline";
export type { IngestPipelineOptions, TransformInput } from "./pipeline";
export { loadConfig } from "./config";
export type { IngestConfig } from "./config";
export { IngestError, errorMessage } from "./errors";
export { DocumentStore } from "./document-store";
export { detectFeatures, detectLanguage, containsTables, containsImages } from "./features";
export {
    PRESET_PROMPTS,
    TRANSFORM_PRESETS,
    isTransformPreset,
    resolvePrompt,
    transformText,
} from "./transform";
export { interpretOutput, toTable } from "./structured";
export { buildExports } from "./exporters";
export { LlamaParseParser } from "./parsers/llama-parse";
export { PdfTextParser } from "./parsers/pdf-text";
export { MupdfPageRenderer } from "./images/page-renderer";
export { EmbeddedImageExtractor } from "./images/embedded";
export { ImageStore } from "./images/store";
export { OpenAIChatProvider } from "./llm/openai";
export type {
    DocumentFeatures,
    ExportBundle,
    ExportFile,
    ExtractedImage,
    FlatTable,
    IngestionReport,
    LlmProvider,
    PdfParser,
    TransformPreset,
    TransformReport,
} from "./types";
