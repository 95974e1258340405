/**
 * All settings come from environment variables (Next.js loads `.env.local`
 * on its own).  `loadConfig` reads `process.env` unless given another env object.
 */

export type ParseResultType = "text" | "markdown";

export interface IngestConfig {
    llamaCloudApiKey?: string;
    llamaCloudBaseUrl: string;
    llamaParseResultType: ParseResultType;
    llamaParsePollIntervalMs: number;
    llamaParseTimeoutMs: number;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    openaiModel: string;
    openaiTemperature: number;
    minTransformLength: number;
    pageImageDpi: number;
    imageOutputDir?: string;
    maxFileSizeBytes: number;
    documentCacheSize: number;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_LLAMA_CLOUD_BASE_URL = "https://api.cloud.llamaindex.ai";
export const DEFAULT_OPENAI_MODEL = "gpt-4o";

/**
 * Returns the trimmed key, or undefined when it is blank or still the
 * placeholder from the example env file.
 */
export function readApiKey(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    if (!trimmed) {
        return undefined;
    }
    if (trimmed.includes("your_openai_api_key_here") || trimmed.startsWith("your_")) {
        return undefined;
    }
    return trimmed;
}

function readString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function readNumber(env: Env, name: string, fallback: number, min = 0): number {
    const raw = env[name]?.trim();
    if (!raw) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
        console.warn(`[config] Ignoring invalid ${name}="${raw}", using ${fallback}`);
        return fallback;
    }
    return value;
}

function readResultType(value: string | undefined): ParseResultType {
    const normalized = value?.trim().toLowerCase();
    if (!normalized) {
        return "text";
    }
    if (normalized === "text" || normalized === "markdown") {
        return normalized;
    }
    console.warn(`[config] Unknown LLAMA_PARSE_RESULT_TYPE="${value}", using "text"`);
    return "text";
}

export function loadConfig(env: Env = process.env): IngestConfig {
    return {
        llamaCloudApiKey: readApiKey(env.LLAMA_CLOUD_API_KEY),
        llamaCloudBaseUrl: (readString(env.LLAMA_CLOUD_BASE_URL) ?? DEFAULT_LLAMA_CLOUD_BASE_URL).replace(/\/+$/, ""),
        llamaParseResultType: readResultType(env.LLAMA_PARSE_RESULT_TYPE),
        llamaParsePollIntervalMs: readNumber(env, "LLAMA_PARSE_POLL_INTERVAL_MS", 1000),
        llamaParseTimeoutMs: readNumber(env, "LLAMA_PARSE_TIMEOUT_MS", 300_000, 1),
        openaiApiKey: readApiKey(env.OPENAI_API_KEY),
        openaiBaseUrl: readString(env.OPENAI_BASE_URL),
        openaiModel: readString(env.OPENAI_MODEL) ?? DEFAULT_OPENAI_MODEL,
        openaiTemperature: readNumber(env, "OPENAI_TEMPERATURE", 0.1),
        minTransformLength: readNumber(env, "INGEST_MIN_TRANSFORM_LENGTH", 100),
        pageImageDpi: readNumber(env, "INGEST_PAGE_IMAGE_DPI", 150, 1),
        imageOutputDir: readString(env.INGEST_IMAGE_OUTPUT_DIR),
        maxFileSizeBytes: readNumber(env, "INGEST_MAX_FILE_SIZE_MB", 50, 0.001) * 1024 * 1024,
        documentCacheSize: readNumber(env, "INGEST_DOCUMENT_CACHE_SIZE", 20, 1),
    };
}
