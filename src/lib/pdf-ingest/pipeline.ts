/**
 * PDF Ingest: Pipeline
 *
 * Sequences the ingestion steps:
 *
 *   validate → parse → detect features → render pages / pull embedded images
 *
 * and, on request, LLM transformation followed by the export bundle.  Every
 * external capability is injected, `fromConfig` wires the built-in ones.
 */

import { v4 as uuidv4 } from "uuid";
import { loadConfig, type IngestConfig } from "./config";
import { DocumentStore } from "./document-store";
import { IngestError, errorMessage } from "./errors";
import { buildExports } from "./exporters";
import { detectFeatures } from "./features";
import { EmbeddedImageExtractor } from "./images/embedded";
import { MupdfPageRenderer } from "./images/page-renderer";
import { ImageStore } from "./images/store";
import { OpenAIChatProvider } from "./llm/openai";
import { joinPages, sampleText } from "./normalize";
import { LlamaParseParser } from "./parsers/llama-parse";
import { PdfTextParser } from "./parsers/pdf-text";
import { transformText } from "./transform";
import type {
    EmbeddedImageSource,
    ExtractedImage,
    IngestionReport,
    LlmProvider,
    PageRenderer,
    PdfParser,
    TransformReport,
} from "./types";

export const DEFAULT_MIN_TRANSFORM_LENGTH = 100;

const PDF_MAGIC = "%PDF-";
/** Some producers put junk before the header; readers accept it within 1 KiB */
const PDF_MAGIC_WINDOW = 1024;

export interface IngestPipelineOptions {
    parser: PdfParser;
    pageRenderer?: PageRenderer | null;
    embeddedImages?: EmbeddedImageSource | null;
    llm?: LlmProvider | null;
    imageStore?: ImageStore | null;
    store?: DocumentStore;
    minTransformLength?: number;
}

export interface TransformInput {
    documentId?: string;
    text?: string;
}

interface ParseOutcome {
    text: string;
    parser: string;
    pageCount?: number;
    parseError?: string;
}

export function isPdf(buffer: Buffer): boolean {
    return buffer.subarray(0, PDF_MAGIC_WINDOW).includes(PDF_MAGIC);
}

export class IngestPipeline {
    private readonly parser: PdfParser;
    private readonly pageRenderer: PageRenderer | null;
    private readonly embeddedImages: EmbeddedImageSource | null;
    private readonly llm: LlmProvider | null;
    private readonly imageStore: ImageStore | null;
    private readonly store: DocumentStore;
    private readonly minTransformLength: number;

    constructor(options: IngestPipelineOptions) {
        this.parser = options.parser;
        this.pageRenderer = options.pageRenderer ?? null;
        this.embeddedImages = options.embeddedImages ?? null;
        this.llm = options.llm ?? null;
        this.imageStore = options.imageStore ?? null;
        this.store = options.store ?? new DocumentStore();
        this.minTransformLength = options.minTransformLength ?? DEFAULT_MIN_TRANSFORM_LENGTH;
    }

    /** Pipeline with the built-in parser, renderers and LLM for a config */
    static fromConfig(config: IngestConfig = loadConfig()): IngestPipeline {
        const parser: PdfParser = config.llamaCloudApiKey
            ? new LlamaParseParser({
                  apiKey: config.llamaCloudApiKey,
                  baseUrl: config.llamaCloudBaseUrl,
                  resultType: config.llamaParseResultType,
                  pollIntervalMs: config.llamaParsePollIntervalMs,
                  timeoutMs: config.llamaParseTimeoutMs,
              })
            : new PdfTextParser();

        const llm = config.openaiApiKey
            ? new OpenAIChatProvider({
                  apiKey: config.openaiApiKey,
                  baseUrl: config.openaiBaseUrl,
                  model: config.openaiModel,
                  temperature: config.openaiTemperature,
              })
            : null;

        return new IngestPipeline({
            parser,
            pageRenderer: new MupdfPageRenderer({ dpi: config.pageImageDpi }),
            embeddedImages: new EmbeddedImageExtractor(),
            llm,
            imageStore: config.imageOutputDir ? new ImageStore(config.imageOutputDir) : null,
            store: new DocumentStore(config.documentCacheSize),
            minTransformLength: config.minTransformLength,
        });
    }

    get llmProvider(): LlmProvider | null {
        return this.llm;
    }

    // ---------------------------------------------------------------------------
    // Ingestion
    // ---------------------------------------------------------------------------

    async ingest(buffer: Buffer, fileName: string): Promise<IngestionReport> {
        if (buffer.length === 0) {
            throw new IngestError("File is empty.");
        }
        if (!isPdf(buffer)) {
            throw new IngestError(`${fileName} is not a PDF file.`);
        }

        const documentId = uuidv4();
        const parsed = await this.parse(buffer, fileName);

        this.store.put({ documentId, fileName, text: parsed.text, createdAt: new Date() });

        const features = detectFeatures(parsed.text);
        const unavailable = parsed.parseError
            ? "The document could not be parsed."
            : this.transformUnavailableReason(parsed.text);

        const report: IngestionReport = {
            documentId,
            fileName,
            text: parsed.text,
            parser: parsed.parser,
            pageCount: parsed.pageCount,
            parseError: parsed.parseError,
            features,
            transformAvailable: unavailable === null,
            transformUnavailableReason: unavailable ?? undefined,
            pageImages: await this.collectImages("page", this.pageRenderer, buffer),
            embeddedImages: await this.collectImages("embedded", this.embeddedImages, buffer),
            savedImagePaths: [],
        };

        if (this.imageStore) {
            report.savedImagePaths = await this.saveImages(this.imageStore, report);
        }

        console.info(
            `[IngestPipeline] ${fileName}: ${parsed.text.length} chars, language ${report.features.language}, ` +
                `${report.pageImages.length} page images, ${report.embeddedImages.length} embedded images`
        );

        return report;
    }

    /** Parse without throwing: failures yield empty text and `parseError` */
    async parse(buffer: Buffer, fileName: string): Promise<ParseOutcome> {
        try {
            const result = await this.parser.parse(buffer, fileName);
            const text = joinPages(result.pages);

            console.debug(`[IngestPipeline] Parsed text length: ${text.length}`);
            console.debug(`[IngestPipeline] Sample: ${sampleText(text)}`);

            return { text, parser: result.parser, pageCount: result.pageCount };
        } catch (error) {
            const message = errorMessage(error);
            console.error(`[IngestPipeline] Failed to parse PDF: ${message}`);
            return { text: "", parser: this.parser.name, parseError: message };
        }
    }

    // ---------------------------------------------------------------------------
    // Transformation
    // ---------------------------------------------------------------------------

    /**
     * Rewrite a stored document (or raw text) with the LLM and build the
     * export bundle from the output.
     *
     * @throws IngestError for unknown documents, missing LLM configuration
     *         or text below the minimum transform length
     */
    async transform(input: TransformInput, presetOrCustom?: string | null): Promise<TransformReport> {
        const documentId = input.documentId;
        let text: string;

        if (documentId) {
            const document = this.store.get(documentId);
            if (!document) {
                throw new IngestError(`Unknown document: ${documentId}`, 404);
            }
            text = document.text;
        } else if (typeof input.text === "string") {
            text = input.text;
        } else {
            throw new IngestError("Provide either a documentId or text to transform.");
        }

        if (!this.llm) {
            throw new IngestError("OPENAI_API_KEY is not set.", 503);
        }
        const unavailable = this.transformUnavailableReason(text);
        if (unavailable) {
            throw new IngestError(unavailable);
        }

        const result = await transformText(this.llm, text, presetOrCustom);
        if (!result.success) {
            return { success: false, documentId, error: result.error };
        }

        const exports = await buildExports(result.output);
        return {
            success: true,
            documentId,
            output: result.output,
            model: result.model,
            exports,
        };
    }

    private transformUnavailableReason(text: string): string | null {
        if (text.trim().length < this.minTransformLength) {
            return `Parsed text is too short (less than ${this.minTransformLength} characters). GPT transformation features are disabled.`;
        }
        if (!this.llm) {
            return "OPENAI_API_KEY is not set.";
        }
        return null;
    }

    private async saveImages(imageStore: ImageStore, report: IngestionReport): Promise<string[]> {
        try {
            return [
                ...(await imageStore.save("images", report.pageImages)),
                ...(await imageStore.save("embedded_images", report.embeddedImages)),
            ];
        } catch (error) {
            console.warn(`[IngestPipeline] Saving images failed: ${errorMessage(error)}`);
            return [];
        }
    }

    private async collectImages(
        kind: "page" | "embedded",
        source: PageRenderer | EmbeddedImageSource | null,
        buffer: Buffer
    ): Promise<ExtractedImage[]> {
        if (!source) {
            return [];
        }

        try {
            return "render" in source ? await source.render(buffer) : await source.extract(buffer);
        } catch (error) {
            console.warn(`[IngestPipeline] ${kind} image extraction failed: ${errorMessage(error)}`);
            return [];
        }
    }
}
